export const DefaultPageSize = 10;
export const MaxPageSize = 100;
export const LastPageKeyword = "last";

export class InvalidPageError extends Error {
  constructor() {
    super("Invalid page.");
  }
}

export interface PageRequest {
  readonly page?: string;
  readonly pageSize?: string;
}

export interface Page {
  readonly page: number;
  readonly pageSize: number;
  readonly pageCount: number;
  readonly offset: number;
}

const Digits = /^\d+$/;

// Plain decimal digits only: "1.0", "1e1" and "0x2" are not page numbers
function parseCount(raw: string): number | undefined {
  return Digits.test(raw) ? Number(raw) : undefined;
}

function parsePageSize(raw: string | undefined): number {
  const value = raw === undefined ? undefined : parseCount(raw);
  if (value === undefined || value < 1) {
    return DefaultPageSize;
  }
  return Math.min(value, MaxPageSize);
}

/**
 * Resolves page-number pagination. An unparsable page size falls back to the
 * default, a page outside 1..pageCount is an InvalidPageError. An empty
 * result still has one (empty) page.
 */
export function resolvePage(request: PageRequest, count: number): Page {
  const pageSize = parsePageSize(request.pageSize);
  const pageCount = Math.max(1, Math.ceil(count / pageSize));

  let page: number;
  if (request.page === undefined || request.page === "") {
    page = 1;
  } else if (request.page === LastPageKeyword) {
    page = pageCount;
  } else {
    const requested = parseCount(request.page);
    if (requested === undefined || requested < 1 || requested > pageCount) {
      throw new InvalidPageError();
    }
    page = requested;
  }
  return { page, pageSize, pageCount, offset: (page - 1) * pageSize };
}

export function pageLink(
  path: string,
  page: number,
  pageSize: number,
  extra: Record<string, string> = {},
): string {
  const params = new URLSearchParams({
    ...extra,
    page: String(page),
    page_size: String(pageSize),
  });
  return `${path}?${params.toString()}`;
}
