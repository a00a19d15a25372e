import {
  AcceptedBidders,
  AuctionStatus,
  Condition,
  Currency,
} from "./choices";

export interface Category {
  readonly id: number;
  readonly name: string;
}

export interface Tag {
  readonly id: number;
  readonly name: string;
}

export interface NewAuction {
  readonly id: string;
  readonly author: string;
  readonly auctionName: string;
  readonly description: string;
  readonly categoryId: number;
  // ISO dates, YYYY-MM-DD
  readonly startDate: string;
  readonly endDate: string;
  // Decimal string with two fraction digits
  readonly maxPrice: string;
  readonly quantity: number;
  readonly acceptedBidders: AcceptedBidders;
  // ISO 3166 country codes
  readonly acceptedLocations: string[];
  readonly status: AuctionStatus;
  readonly currency: Currency;
  readonly condition: Condition;
}

export interface Auction {
  readonly id: string;
  readonly author: string;
  readonly auctionName: string;
  readonly description: string;
  readonly category: string;
  readonly startDate: string;
  readonly endDate: string;
  readonly maxPrice: string;
  readonly quantity: number;
  readonly acceptedBidders: string;
  readonly acceptedLocations: string[];
  readonly status: string;
  readonly currency: string;
  readonly condition: string;
  readonly topBid: string | null;
  readonly tags: string[];
}

export type AuctionOrderField =
  | "start_date"
  | "end_date"
  | "max_price"
  | "quantity"
  | "category"
  | "status";

export interface AuctionOrdering {
  readonly field: AuctionOrderField;
  readonly descending: boolean;
}

export interface AuctionFilter {
  readonly status?: AuctionStatus;
  // ISO date; only auctions starting after it
  readonly startsAfter?: string;
  readonly category?: string;
  // ISO dates: starting on or after, ending on or before
  readonly startDate?: string;
  readonly endDate?: string;
  // Decimal strings bounding the max price, inclusive
  readonly minPrice?: string;
  readonly maxPrice?: string;
  // Every term must appear in the name, the description or a tag name
  readonly search?: readonly string[];
  // Applied before the default newest-first order
  readonly ordering?: readonly AuctionOrdering[];
}

export interface User {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly isSuperuser: boolean;
}

export interface NewUser {
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly isSuperuser: boolean;
}

const AuctionStringFields = [
  "id",
  "author",
  "auctionName",
  "description",
  "category",
  "startDate",
  "endDate",
  "maxPrice",
  "acceptedBidders",
  "status",
  "currency",
  "condition",
] as const;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Checks a decoded value, such as a cache entry, has the shape of an Auction
 */
export function isAuction(value: unknown): value is Auction {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const fields = new Map<string, unknown>(Object.entries(value));
  const topBid = fields.get("topBid");
  return (
    AuctionStringFields.every((key) => typeof fields.get(key) === "string") &&
    typeof fields.get("quantity") === "number" &&
    isStringArray(fields.get("acceptedLocations")) &&
    isStringArray(fields.get("tags")) &&
    (topBid === null || typeof topBid === "string")
  );
}
