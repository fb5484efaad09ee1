export type ErrorCode =
  | "TrustedHeaderMissing"
  | "CircuitNotRegistered"
  | "SkipSpanExceeded"
  | "NonAdvancingRequest"
  | "StaleOrOutOfOrderFulfillment"
  | "UnauthorizedCallback"
  | "MalformedCallback"
  | "ZeroHeaderHash"
  | "InvalidValue"
  | "GenesisAlreadySet"
  | "UnauthorizedAdmin"
  | "UnknownRequest"
  | "SourceUnavailable"
  | "InvalidSourceResponse"
  | "InvalidConfig";

/**
 * Every precondition failure in the light client surfaces as one of these.
 * A thrown HeaderSyncError means the unit of work left no state behind.
 */
export class HeaderSyncError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = "HeaderSyncError";
    this.code = code;
  }
}

export const isHeaderSyncError = (
  err: unknown,
  code?: ErrorCode,
): err is HeaderSyncError =>
  err instanceof HeaderSyncError && (code === undefined || err.code === code);
