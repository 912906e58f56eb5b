/**
 * @hashlock/types — Shared domain types for the hashlock bridge.
 *
 * These types are used across all packages:
 * - Addresses and 32-byte identifiers (hash locks, secrets, swap IDs)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Identity types
export type {
  ChainId,
  Address,
  Bytes32,
  HashLock,
  Secret,
  SwapId,
} from "./identity.js";
export { ZERO_ADDRESS, ZERO_BYTES32 } from "./identity.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isBytes32,
  isZeroAddress,
  isZeroBytes32,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
