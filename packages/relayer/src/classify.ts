/**
 * @hashlock/relayer — Failure classification.
 *
 * Maps a thrown value onto what a caller should do about it. The pool
 * never retries; this is where that decision is made.
 */

import type { SwapErrorCode } from "@hashlock/pool";
import { isSwapError } from "@hashlock/pool";
import type { ClassifiedError, FailureKind } from "./types.js";

const KIND_BY_CODE: Readonly<Record<SwapErrorCode, FailureKind>> = {
  INVALID_ARGUMENT: "permanent",
  DUPLICATE_SWAP: "permanent",
  ALREADY_USED: "permanent",
  NOT_FOUND: "permanent",
  ALREADY_FINAL: "permanent",
  INVALID_SECRET: "permanent",
  UNAUTHORIZED: "permanent",
  ZERO_RESULT: "permanent",
  EXPIRED: "expired",
  NOT_YET_EXPIRED: "retry_later",
  PAUSED: "retry_later",
  INSUFFICIENT_BALANCE: "retry_later",
  INSUFFICIENT_RESERVE: "retry_later",
};

export function classifyError(err: unknown): ClassifiedError {
  if (isSwapError(err)) {
    return {
      kind: KIND_BY_CODE[err.code],
      code: err.code,
      retryAfterHeight: err.retryAfterHeight,
      message: err.message,
    };
  }
  return {
    kind: "unknown",
    code: undefined,
    retryAfterHeight: undefined,
    message: err instanceof Error ? err.message : String(err),
  };
}
