/**
 * @hashlock/ledger — Fungible balance ledger.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces the conservation invariants:
 * - totalSupply always equals the sum of balances
 * - No balance is ever negative
 * - All arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Validate before mutate: a failed call changes nothing
 * - Zero runtime dependencies
 */

// Core engine
export { BalanceLedger } from "./balance-ledger.js";

// Unit arithmetic
export { parseUnits, formatUnits } from "./unit-math.js";

// Types
export type {
  AccountBalance,
  BalanceLine,
  ConservationResult,
  LedgerErrorCode,
  LedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
