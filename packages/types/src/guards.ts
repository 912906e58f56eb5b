/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared identifiers and events.
 * These enable safe runtime validation at system boundaries
 * (operation arguments, deserialized events, configuration).
 */

import type { Address, Bytes32 } from "./identity.js";
import { ZERO_ADDRESS, ZERO_BYTES32 } from "./identity.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Identity guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const BYTES32_PATTERN = /^0x[0-9a-fA-F]{64}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isBytes32(value: unknown): value is Bytes32 {
  return typeof value === "string" && BYTES32_PATTERN.test(value);
}

/** True for the all-zero address, in any letter case. */
export function isZeroAddress(value: Address): boolean {
  return value.toLowerCase() === ZERO_ADDRESS;
}

/** True for the all-zero 32-byte value, in any letter case. */
export function isZeroBytes32(value: Bytes32): boolean {
  return value.toLowerCase() === ZERO_BYTES32;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "swap", "lock", "gate"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source) &&
    typeof v.chainId === "string" &&
    typeof v.height === "number" &&
    Number.isInteger(v.height) &&
    v.height >= 0
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
