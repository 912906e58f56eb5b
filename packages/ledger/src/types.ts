/**
 * @hashlock/ledger — Internal types for the balance ledger.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint in memory and decimal strings when serialized
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@hashlock/types";

// ─── Balance Types ───────────────────────────────────────────────────────

/**
 * A non-zero balance held by one account.
 */
export interface AccountBalance {
  readonly account: Address;
  readonly balance: bigint;
}

/**
 * Result of checking `totalSupply == sum(balances)`.
 */
export interface ConservationResult {
  readonly valid: boolean;
  readonly totalSupply: bigint;
  readonly sumOfBalances: bigint;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the balance ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * One serialized balance line.
 */
export interface BalanceLine {
  readonly account: Address;
  /** Decimal string of the raw unit amount */
  readonly balance: string;
}

/**
 * Serializable snapshot of the entire ledger state.
 * Used for persistence and rehydration.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly totalSupply: string;
  readonly balances: readonly BalanceLine[];
  readonly createdAt: string;
}
