/**
 * Hash commitment primitive.
 *
 * A hash lock is the SHA-256 digest of a 32-byte secret. Both ledgers use
 * the same function, so a secret revealed on one opens the lock on the
 * other.
 *
 * Rules:
 * - Secrets and digests are `0x` + 64 lowercase hex
 * - The all-zero digest is never a valid lock
 * - A swap ID is derived from canonical JSON, so field order never matters
 */

import { createHash, randomBytes } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Address, Bytes32, HashLock, Secret, SwapId } from "@hashlock/types";
import { isAddress, isBytes32, isZeroAddress, isZeroBytes32 } from "@hashlock/types";
import { SwapError } from "./errors.js";

// =============================================================================
// Secrets
// =============================================================================

/**
 * Generate a fresh random 32-byte secret.
 */
export function generateSecret(): Secret {
  return `0x${randomBytes(32).toString("hex")}`;
}

/**
 * Hash a secret into its lock.
 */
export function hashSecret(secret: string): HashLock {
  const normalized = toBytes32(secret, "secret");
  const digest = createHash("sha256")
    .update(Buffer.from(normalized.slice(2), "hex"))
    .digest("hex");
  return `0x${digest}`;
}

/**
 * True when `secret` opens `hashLock`. Malformed input never matches.
 */
export function verifySecret(secret: string, hashLock: string): boolean {
  if (!isBytes32(secret) || !isBytes32(hashLock)) return false;
  return hashSecret(secret) === hashLock.toLowerCase();
}

// =============================================================================
// Swap IDs
// =============================================================================

export interface SwapIdInput {
  readonly hashLock: HashLock;
  readonly sender: Address;
  readonly recipient: Address;
  readonly amount: bigint;
  readonly height: number;
  readonly timestamp: number;
}

/**
 * Derive the swap ID from the swap's creation parameters.
 * Collisions are possible in principle; callers must check for them.
 */
export function deriveSwapId(input: SwapIdInput): SwapId {
  const encoded = canonicalize({
    hashLock: input.hashLock.toLowerCase(),
    sender: input.sender.toLowerCase(),
    recipient: input.recipient.toLowerCase(),
    amount: input.amount.toString(),
    height: input.height,
    timestamp: input.timestamp,
  });
  return `0x${createHash("sha256").update(encoded).digest("hex")}`;
}

// =============================================================================
// Boundary normalization
// =============================================================================

/**
 * Validate and lowercase an address. The zero address is rejected.
 */
export function toAddress(value: string, field: string): Address {
  if (!isAddress(value)) {
    throw new SwapError("INVALID_ARGUMENT", `${field} must be a 0x-prefixed 20-byte hex address, got "${value}"`);
  }
  if (isZeroAddress(value)) {
    throw new SwapError("INVALID_ARGUMENT", `${field} must not be the zero address`);
  }
  return `0x${value.slice(2).toLowerCase()}`;
}

/**
 * Validate and lowercase a 32-byte value. Zero is allowed here; callers
 * that need a non-zero lock use toHashLock.
 */
export function toBytes32(value: string, field: string): Bytes32 {
  if (!isBytes32(value)) {
    throw new SwapError("INVALID_ARGUMENT", `${field} must be 0x-prefixed 32-byte hex, got "${value}"`);
  }
  return `0x${value.slice(2).toLowerCase()}`;
}

export function toHashLock(value: string): HashLock {
  const hashLock = toBytes32(value, "hashLock");
  if (isZeroBytes32(hashLock)) {
    throw new SwapError("INVALID_ARGUMENT", "hashLock must not be zero");
  }
  return hashLock;
}

export function toPositiveAmount(value: bigint, field: string): bigint {
  if (typeof value !== "bigint" || value <= 0n) {
    throw new SwapError("INVALID_ARGUMENT", `${field} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

export function toWindow(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new SwapError("INVALID_ARGUMENT", `${field} must be a positive whole number of blocks, got ${value}`);
  }
  return value;
}
