/**
 * Shared lifecycle for sender swaps and counterparty locks.
 *
 *   open → completed
 *   open → refunded
 *
 * Both terminal states are permanent and mutually exclusive.
 */

import { SwapError } from "./errors.js";
import type { HtlcStatus } from "./types.js";

const VALID_TRANSITIONS: Record<HtlcStatus, readonly HtlcStatus[]> = {
  open: ["completed", "refunded"],
  completed: [],
  refunded: [],
};

export function statusOf(record: { readonly completed: boolean; readonly refunded: boolean }): HtlcStatus {
  if (record.completed) return "completed";
  if (record.refunded) return "refunded";
  return "open";
}

export function assertTransition(
  label: string,
  record: { readonly completed: boolean; readonly refunded: boolean },
  to: HtlcStatus,
): void {
  const from = statusOf(record);
  if (!VALID_TRANSITIONS[from].includes(to)) {
    throw new SwapError("ALREADY_FINAL", `${label} is already ${from}`);
  }
}

/**
 * Completion window: `height <= timeLock`.
 */
export function assertNotExpired(label: string, timeLock: number, height: number): void {
  if (height > timeLock) {
    throw new SwapError("EXPIRED", `${label} expired at height ${timeLock} (now ${height})`);
  }
}

/**
 * Refund window: `height > timeLock`. Carries the first height a retry
 * can succeed at.
 */
export function assertExpired(label: string, timeLock: number, height: number): void {
  if (height <= timeLock) {
    throw new SwapError(
      "NOT_YET_EXPIRED",
      `${label} is refundable after height ${timeLock} (now ${height})`,
      timeLock + 1,
    );
  }
}
