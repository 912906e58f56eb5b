/**
 * @hashlock/relayer — Types.
 */

import type { Address } from "@hashlock/types";
import type { SwapErrorCode } from "@hashlock/pool";

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Relayer settings in domain units, built from the environment by
 * `toRelayerConfig()`.
 */
export interface RelayerConfig {
  /** Account that holds the responder role on the target pool */
  readonly responder: Address;
  /** Sender-side window the deployment expects, in blocks */
  readonly defaultTimeLockWindow: number;
  /** Longest window given to a counterparty lock, in blocks */
  readonly responderWindow: number;
  /** Blocks the lock must expire ahead of the sender swap */
  readonly safetyMargin: number;
  /** Smallest swap amount the relayer answers, raw units */
  readonly minSwapAmount: bigint;
  /** Largest swap amount the relayer answers, raw units */
  readonly maxSwapAmount: bigint;
}

// ─── Error Classification ────────────────────────────────────────────────

/**
 * - permanent: retrying can never succeed
 * - expired: the window has closed; never retry forward
 * - retry_later: may succeed at a later height or after an admin action
 * - unknown: not a pool error
 */
export type FailureKind = "permanent" | "expired" | "retry_later" | "unknown";

export interface ClassifiedError {
  readonly kind: FailureKind;
  readonly code: SwapErrorCode | undefined;
  readonly retryAfterHeight: number | undefined;
  readonly message: string;
}

// ─── Outcomes ────────────────────────────────────────────────────────────

export type RelayTrigger = "swap.initiated" | "swap.secret_revealed";

export type RelayOutcome =
  | {
      readonly kind: "responded";
      readonly hashLock: string;
      readonly swapId: string;
      readonly amount: bigint;
      readonly timeLock: number;
    }
  | {
      readonly kind: "completed";
      readonly hashLock: string;
      readonly recipient: string;
      readonly amount: bigint;
    }
  | {
      readonly kind: "skipped";
      readonly trigger: RelayTrigger;
      readonly hashLock: string;
      readonly reason: string;
    }
  | {
      readonly kind: "failed";
      readonly trigger: RelayTrigger;
      readonly hashLock: string;
      readonly error: ClassifiedError;
    };

// ─── Errors ──────────────────────────────────────────────────────────────

export type RelayerErrorCode = "INVALID_CONFIG" | "SAME_POOL";

export class RelayerError extends Error {
  public readonly code: RelayerErrorCode;

  constructor(code: RelayerErrorCode, message: string) {
    super(message);
    this.name = "RelayerError";
    this.code = code;
  }
}
