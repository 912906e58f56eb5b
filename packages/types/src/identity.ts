/**
 * Identity Types
 *
 * Identifiers shared by every ledger engine and its observers.
 *
 * Rules:
 * - Addresses are `0x` + 40 hex characters, lower case once normalised
 * - Hash-sized values (hash locks, secrets, swap IDs) are `0x` + 64 hex
 * - The all-zero value is never a valid address or hash lock
 */

/**
 * Chain label for a ledger instance (e.g., "ledger-a", "eip155:1").
 */
export type ChainId = string;

/**
 * A 20-byte account identifier.
 */
export type Address = `0x${string}`;

/**
 * A 32-byte value in hex form.
 */
export type Bytes32 = `0x${string}`;

/** SHA-256 digest of a swap secret. */
export type HashLock = Bytes32;

/** The 32-byte preimage that opens a hash lock. */
export type Secret = Bytes32;

/** Deterministic identifier of a sender-side swap. */
export type SwapId = Bytes32;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

export const ZERO_BYTES32: Bytes32 =
  "0x0000000000000000000000000000000000000000000000000000000000000000";
