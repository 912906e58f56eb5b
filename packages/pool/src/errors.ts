/**
 * Swap pool errors.
 *
 * Every failed pool operation throws a SwapError and leaves the pool
 * unchanged. The core never retries; `retryAfterHeight` tells a caller the
 * first height at which a time-dependent failure can succeed.
 */

export type SwapErrorCode =
  | "INVALID_ARGUMENT"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_RESERVE"
  | "DUPLICATE_SWAP"
  | "ALREADY_USED"
  | "NOT_FOUND"
  | "ALREADY_FINAL"
  | "EXPIRED"
  | "NOT_YET_EXPIRED"
  | "INVALID_SECRET"
  | "UNAUTHORIZED"
  | "PAUSED"
  | "ZERO_RESULT";

export class SwapError extends Error {
  public readonly code: SwapErrorCode;
  public readonly retryAfterHeight: number | undefined;

  constructor(code: SwapErrorCode, message: string, retryAfterHeight?: number) {
    super(message);
    this.name = "SwapError";
    this.code = code;
    this.retryAfterHeight = retryAfterHeight;
  }
}

export function isSwapError(err: unknown): err is SwapError {
  return err instanceof SwapError;
}
