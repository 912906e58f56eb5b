/**
 * @hashlock/pool — Hashed-timelock swap engine for one ledger.
 *
 * Two pools, one per ledger, never call each other. A sender locks units
 * on one pool against a hash; the responder prepares matching units on
 * the other; revealing the secret releases both.
 *
 * @packageDocumentation
 */

// Engine
export { SwapPool, swapStreamId, lockStreamId } from "./swap-pool.js";

// Components
export { SenderSwapBook } from "./sender-swaps.js";
export type { InitiateParams } from "./sender-swaps.js";
export { CounterpartyLockBook } from "./counterparty-locks.js";
export type { RespondParams, ExpectedRelease } from "./counterparty-locks.js";
export { AccessGate } from "./access-gate.js";
export { RateConverter, RATE_PRECISION, nativeToUnits, unitsToNative } from "./rate-converter.js";
export { statusOf } from "./lifecycle.js";

// Clock
export { ManualClock } from "./chain-clock.js";
export type { ChainClock, ManualClockOptions } from "./chain-clock.js";

// Hash commitments
export {
  generateSecret,
  hashSecret,
  verifySecret,
  deriveSwapId,
  toAddress,
  toBytes32,
  toHashLock,
} from "./hash-lock.js";
export type { SwapIdInput } from "./hash-lock.js";

// Errors
export { SwapError, isSwapError } from "./errors.js";
export type { SwapErrorCode } from "./errors.js";

// Types
export type {
  SenderSwap,
  CounterpartyLock,
  HtlcStatus,
  Role,
  DepositResult,
  WithdrawResult,
  OpenExposure,
  SwapPoolOptions,
} from "./types.js";
