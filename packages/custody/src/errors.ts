/**
 * @custodia/custody — Error taxonomy.
 */

export type CustodyErrorCode =
  | "UNAUTHORIZED"
  | "ALREADY_EXISTS"
  | "NOT_FOUND"
  | "INVALID_INPUT"
  | "INVALID_STATE"
  | "EXPIRED"
  | "CAPACITY_EXCEEDED"
  | "TRANSFER_FAILED";

/**
 * Structured error from the custody engine.
 * Always thrown — never returns error codes silently. A thrown operation
 * leaves no trace: no state change, no history, no event.
 */
export class CustodyError extends Error {
  public readonly code: CustodyErrorCode;
  /** Record key the failure concerns, when there is one */
  public readonly key: string | undefined;

  constructor(code: CustodyErrorCode, message: string, key?: string) {
    super(message);
    this.name = "CustodyError";
    this.code = code;
    this.key = key;
  }
}

export function isCustodyError(error: unknown, code?: CustodyErrorCode): error is CustodyError {
  return error instanceof CustodyError && (code === undefined || error.code === code);
}
