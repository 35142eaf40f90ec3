/**
 * Error taxonomy for store and delivery failures
 */

export type StoreErrorCode =
  | "unavailable" // account, network or timeout; retry next cycle
  | "conflict" // insert on an existing id
  | "not_found" // record or record type absent
  | "permission" // store refused the operation, e.g. an unindexed query
  | "invalid"; // malformed request

export class StoreError extends Error {
  readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
    this.code = code;
  }
}

export function isStoreError(error: unknown, code?: StoreErrorCode): error is StoreError {
  return error instanceof StoreError && (code === undefined || error.code === code);
}

export type InjectionFailureKind =
  | "denied" // platform refused the automation capability
  | "failed" // capability present but the delivery did not go through
  | "unsupported"; // no mechanism available on this machine

export class InjectionError extends Error {
  readonly kind: InjectionFailureKind;

  constructor(kind: InjectionFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InjectionError";
    this.kind = kind;
  }
}
