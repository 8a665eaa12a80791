/**
 * Typed results for the SPC engine. Domain conditions are returned, not thrown.
 */

export type SpcErrorCode =
  | "INSUFFICIENT_DATA"
  | "INVALID_PARAMETER"
  | "STALE_BASELINE"
  | "NOT_FOUND";

export interface SpcError {
  code: SpcErrorCode;
  message: string;
}

export type SpcFailure = { success: false; error: SpcError };

export type SpcResult<T> = { success: true; data: T } | SpcFailure;

export function ok<T>(data: T): SpcResult<T> {
  return { success: true, data };
}

export function fail(code: SpcErrorCode, message: string): SpcFailure {
  return { success: false, error: { code, message } };
}
