/**
 * Swap pool types.
 *
 * Records are immutable snapshots; every transition replaces the stored
 * record with a new object. Amounts are bigint ledger units.
 */

import type { Address, ChainId, HashLock, SwapId } from "@hashlock/types";
import type { EventStore } from "@hashlock/event-store";
import type { ChainClock } from "./chain-clock.js";

// =============================================================================
// Records
// =============================================================================

/**
 * Funds a sender locked in custody against a hash commitment.
 * `recipient` is an identifier on the other ledger.
 */
export interface SenderSwap {
  readonly swapId: SwapId;
  readonly hashLock: HashLock;
  /** Absolute height; completion is allowed up to and including it */
  readonly timeLock: number;
  readonly sender: Address;
  readonly recipient: Address;
  readonly amount: bigint;
  readonly completed: boolean;
  readonly refunded: boolean;
  /** Ledger time at creation, unix seconds */
  readonly createdAt: number;
  readonly createdAtHeight: number;
  /** Advisory only; never consulted by complete or refund */
  readonly counterpartyLinked: boolean;
}

/**
 * Funds the responder minted into custody for a recipient on this ledger.
 */
export interface CounterpartyLock {
  readonly hashLock: HashLock;
  readonly timeLock: number;
  readonly recipient: Address;
  readonly amount: bigint;
  readonly completed: boolean;
  readonly refunded: boolean;
  readonly createdAt: number;
  readonly createdAtHeight: number;
}

export type HtlcStatus = "open" | "completed" | "refunded";

// =============================================================================
// Roles
// =============================================================================

export type Role = "owner" | "responder";

// =============================================================================
// Results
// =============================================================================

export interface DepositResult {
  readonly nativeAmount: bigint;
  readonly units: bigint;
}

export interface WithdrawResult {
  readonly units: bigint;
  readonly nativeAmount: bigint;
}

/**
 * Value currently held in custody, split by the record kind holding it.
 */
export interface OpenExposure {
  readonly openSwaps: number;
  readonly lockedInSwaps: bigint;
  readonly openLocks: number;
  readonly lockedInLocks: bigint;
  readonly custodyBalance: bigint;
}

// =============================================================================
// Configuration
// =============================================================================

export interface SwapPoolOptions {
  /** Label for the ledger this pool runs on */
  readonly chainId: ChainId;
  readonly name: string;
  readonly symbol: string;
  /** Display decimals for ledger units. Default: 18 */
  readonly decimals?: number;
  /** Account that holds locked and prepared funds */
  readonly custody: string;
  readonly owner: string;
  readonly responder: string;
  /** Units per native unit, scaled by RATE_PRECISION */
  readonly rate: bigint;
  /** Window used when an operation omits one, in blocks */
  readonly defaultTimeLockWindow: number;
  readonly clock: ChainClock;
  /** Where pool events are appended. Default: a fresh InMemoryEventStore */
  readonly eventStore?: EventStore;
}
