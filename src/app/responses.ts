import type { Response } from "express";
import type { FieldError } from "./filters";

const ErrorTypes = new Map<number, string>([
  [400, "bad_request"],
  [401, "unauthorized"],
  [403, "forbidden"],
  [404, "not_found"],
  [405, "method_not_allowed"],
  [406, "not_acceptable"],
  [408, "timeout"],
  [409, "conflict"],
  [429, "too_many_requests"],
  [500, "internal_server_error"],
  [503, "service_unavailable"],
]);

export interface ErrorEntry {
  readonly code: string;
  readonly message: string;
  readonly field_name: string | null;
}

export interface ErrorBody {
  readonly type: string;
  readonly errors: ErrorEntry[];
}

export function errorType(status: number): string {
  return ErrorTypes.get(status) ?? "unknown";
}

/**
 * The body of every error response. A plain message is a request-level error
 * coded with the response type; field errors keep their own codes.
 */
export function errorBody(
  status: number,
  errors: string | readonly FieldError[],
): ErrorBody {
  const type = errorType(status);
  if (typeof errors === "string") {
    return { type, errors: [{ code: type, message: errors, field_name: null }] };
  }
  return {
    type,
    errors: errors.map((error) => ({
      code: error.code,
      message: error.message,
      field_name: error.field,
    })),
  };
}

export function sendError(
  res: Response,
  status: number,
  errors: string | readonly FieldError[],
): void {
  res.status(status).json(errorBody(status, errors));
}
