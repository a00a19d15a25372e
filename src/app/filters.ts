import { CategoryChoices, isAuctionStatus } from "./choices";
import { AuctionFilter, AuctionOrderField, AuctionOrdering } from "./models";

// Status filter value for auctions that have not started yet
export const UpcomingStatus = "Upcoming";

export const OrderingFields: readonly AuctionOrderField[] = [
  "start_date",
  "end_date",
  "max_price",
  "quantity",
  "category",
  "status",
];

// Query parameters a filtered listing carries into its page links
export const FilterParams = [
  "status",
  "category",
  "start_date",
  "end_date",
  "min_price",
  "max_price",
  "search",
  "ordering",
] as const;

export type FilterParam = (typeof FilterParams)[number];

export type FilterQuery = Partial<Record<FilterParam, string>>;

export interface FieldError {
  readonly field: FilterParam;
  readonly code: string;
  readonly message: string;
}

export class InvalidFilterError extends Error {
  constructor(readonly errors: readonly FieldError[]) {
    super(errors.map((error) => `${error.field}: ${error.message}`).join("; "));
  }
}

export interface ParsedFilter {
  readonly filter: AuctionFilter;
  // The accepted parameters, as given
  readonly params: Record<string, string>;
}

const IsoDate = /^\d{4}-\d{2}-\d{2}$/;
const Decimal = /^-?\d+(\.\d+)?$/;

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function isCalendarDate(raw: string): boolean {
  if (!IsoDate.test(raw)) {
    return false;
  }
  const parsed = new Date(`${raw}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && isoDate(parsed) === raw;
}

function invalidChoice(field: FilterParam, value: string): FieldError {
  return {
    field,
    code: "invalid_choice",
    message: `Select a valid choice. ${value} is not one of the available choices.`,
  };
}

/**
 * Splits on commas and whitespace. Unknown fields are dropped rather than
 * rejected.
 */
export function parseOrdering(raw: string): AuctionOrdering[] {
  const ordering: AuctionOrdering[] = [];
  for (const term of raw.split(",").map((t) => t.trim())) {
    const descending = term.startsWith("-");
    const name = descending ? term.slice(1) : term;
    const field = OrderingFields.find((candidate) => candidate === name);
    if (field) {
      ordering.push({ field, descending });
    }
  }
  return ordering;
}

/**
 * Turns listing query parameters into a store filter. Empty parameters are
 * ignored; every invalid one is reported in a single InvalidFilterError.
 * @param today Reference date for the upcoming status
 */
export function parseAuctionFilter(
  query: FilterQuery,
  today: Date = new Date(),
): ParsedFilter {
  const errors: FieldError[] = [];
  const params: Record<string, string> = {};
  const filter: {
    -readonly [K in keyof AuctionFilter]: AuctionFilter[K];
  } = {};

  for (const key of FilterParams) {
    const raw = query[key];
    if (raw === undefined || raw === "") {
      continue;
    }
    const before = errors.length;
    switch (key) {
      case "status":
        if (raw === UpcomingStatus) {
          filter.startsAfter = isoDate(today);
        } else if (isAuctionStatus(raw)) {
          filter.status = raw;
        } else {
          errors.push(invalidChoice(key, raw));
        }
        break;
      case "category":
        if (CategoryChoices.includes(raw)) {
          filter.category = raw;
        } else {
          errors.push(invalidChoice(key, raw));
        }
        break;
      case "start_date":
      case "end_date":
        if (!isCalendarDate(raw)) {
          errors.push({ field: key, code: "invalid", message: "Enter a valid date." });
        } else if (key === "start_date") {
          filter.startDate = raw;
        } else {
          filter.endDate = raw;
        }
        break;
      case "min_price":
      case "max_price":
        if (!Decimal.test(raw)) {
          errors.push({ field: key, code: "invalid", message: "Enter a number." });
        } else if (key === "min_price") {
          filter.minPrice = raw;
        } else {
          filter.maxPrice = raw;
        }
        break;
      case "search": {
        const terms = raw.split(/[\s,]+/).filter((term) => term !== "");
        if (terms.length > 0) {
          filter.search = terms;
        }
        break;
      }
      case "ordering": {
        const ordering = parseOrdering(raw);
        if (ordering.length > 0) {
          filter.ordering = ordering;
        }
        break;
      }
    }
    if (errors.length === before) {
      params[key] = raw;
    }
  }

  if (errors.length > 0) {
    throw new InvalidFilterError(errors);
  }
  return { filter, params };
}
