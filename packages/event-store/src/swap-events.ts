/**
 * @hashlock/event-store — Swap Domain Event Definitions.
 *
 * The catalog of every event a swap pool emits.
 *
 * Naming convention: `<component>.<action>`
 * Examples:
 * - swap.initiated
 * - swap.secret_revealed
 * - lock.created
 * - pool.rate_updated
 * - gate.paused
 *
 * Amounts are decimal strings so payloads survive canonical JSON.
 */

import type { EventMetadata } from "@hashlock/types";
import { isAddress, isBytes32 } from "@hashlock/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";
import type { StoredEvent } from "./types.js";

// =============================================================================
// Sender Swap Events
// =============================================================================

export type SwapInitiatedPayload = {
  readonly swapId: string;
  readonly hashLock: string;
  readonly sender: string;
  readonly recipient: string;
  readonly amount: string;
  readonly timeLock: number;
};

export type SwapCompletedPayload = {
  readonly swapId: string;
  readonly secret: string;
};

/** Ledger-wide reveal; the trigger relayers watch for. */
export type SecretRevealedPayload = {
  readonly hashLock: string;
  readonly secret: string;
  readonly recipient: string;
  readonly amount: string;
};

export type SwapRefundedPayload = {
  readonly swapId: string;
  readonly sender: string;
  readonly amount: string;
};

export type SwapLinkedPayload = {
  readonly swapId: string;
  readonly hashLock: string;
};

// =============================================================================
// Counterparty Lock Events
// =============================================================================

export type LockCreatedPayload = {
  readonly hashLock: string;
  readonly recipient: string;
  readonly amount: string;
  readonly timeLock: number;
};

export type LockCompletedPayload = {
  readonly hashLock: string;
  readonly secret: string;
  readonly recipient: string;
  readonly amount: string;
};

export type LockRefundedPayload = {
  readonly hashLock: string;
  readonly amount: string;
};

// =============================================================================
// Pool Events
// =============================================================================

export type DepositedPayload = {
  readonly account: string;
  readonly nativeAmount: string;
  readonly units: string;
};

export type WithdrawnPayload = {
  readonly account: string;
  readonly units: string;
  readonly nativeAmount: string;
};

export type RateUpdatedPayload = {
  readonly oldRate: string;
  readonly newRate: string;
};

export type EmergencyWithdrawalPayload = {
  readonly to: string;
  readonly nativeAmount: string;
};

// =============================================================================
// Gate Events
// =============================================================================

export type OwnerTransferredPayload = {
  readonly previousOwner: string;
  readonly newOwner: string;
};

export type ResponderChangedPayload = {
  readonly previousResponder: string;
  readonly newResponder: string;
};

export type PauseChangedPayload = {
  readonly by: string;
};

// =============================================================================
// Event Type Constants
// =============================================================================

/**
 * All swap pool event types as constants.
 * Use these instead of string literals for type safety.
 */
export const SWAP_EVENTS = {
  // Sender side
  SWAP_INITIATED: "swap.initiated",
  SWAP_COMPLETED: "swap.completed",
  SECRET_REVEALED: "swap.secret_revealed",
  SWAP_REFUNDED: "swap.refunded",
  SWAP_LINKED: "swap.linked",

  // Counterparty side
  LOCK_CREATED: "lock.created",
  LOCK_COMPLETED: "lock.completed",
  LOCK_REFUNDED: "lock.refunded",

  // Pool
  DEPOSITED: "pool.deposited",
  WITHDRAWN: "pool.withdrawn",
  RATE_UPDATED: "pool.rate_updated",
  EMERGENCY_WITHDRAWAL: "pool.emergency_withdrawal",

  // Gate
  OWNER_TRANSFERRED: "gate.owner_transferred",
  RESPONDER_CHANGED: "gate.responder_changed",
  PAUSED: "gate.paused",
  UNPAUSED: "gate.unpaused",
} as const;

export type SwapEventType = (typeof SWAP_EVENTS)[keyof typeof SWAP_EVENTS];

/**
 * Payload shape per event type.
 */
export interface SwapEventPayloads {
  "swap.initiated": SwapInitiatedPayload;
  "swap.completed": SwapCompletedPayload;
  "swap.secret_revealed": SecretRevealedPayload;
  "swap.refunded": SwapRefundedPayload;
  "swap.linked": SwapLinkedPayload;
  "lock.created": LockCreatedPayload;
  "lock.completed": LockCompletedPayload;
  "lock.refunded": LockRefundedPayload;
  "pool.deposited": DepositedPayload;
  "pool.withdrawn": WithdrawnPayload;
  "pool.rate_updated": RateUpdatedPayload;
  "pool.emergency_withdrawal": EmergencyWithdrawalPayload;
  "gate.owner_transferred": OwnerTransferredPayload;
  "gate.responder_changed": ResponderChangedPayload;
  "gate.paused": PauseChangedPayload;
  "gate.unpaused": PauseChangedPayload;
}

/**
 * A domain event whose payload is known from its type.
 */
export interface TypedDomainEvent<T extends SwapEventType> {
  readonly type: T;
  readonly metadata: EventMetadata;
  readonly payload: SwapEventPayloads[T];
}

export type TypedStoredEvent<T extends SwapEventType> = StoredEvent & {
  readonly event: TypedDomainEvent<T>;
};

// =============================================================================
// Payload Guards
// =============================================================================

const AMOUNT_PATTERN = /^\d+$/;

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isAmount(v: unknown): boolean {
  return typeof v === "string" && AMOUNT_PATTERN.test(v);
}

function isHeight(v: unknown): boolean {
  return typeof v === "number" && Number.isInteger(v) && v >= 0;
}

type PayloadGuards = {
  readonly [K in SwapEventType]: (p: unknown) => p is SwapEventPayloads[K];
};

const PAYLOAD_GUARDS: PayloadGuards = {
  "swap.initiated": (p): p is SwapInitiatedPayload =>
    isObject(p) &&
    isBytes32(p.swapId) &&
    isBytes32(p.hashLock) &&
    isAddress(p.sender) &&
    isAddress(p.recipient) &&
    isAmount(p.amount) &&
    isHeight(p.timeLock),
  "swap.completed": (p): p is SwapCompletedPayload =>
    isObject(p) && isBytes32(p.swapId) && isBytes32(p.secret),
  "swap.secret_revealed": (p): p is SecretRevealedPayload =>
    isObject(p) &&
    isBytes32(p.hashLock) &&
    isBytes32(p.secret) &&
    isAddress(p.recipient) &&
    isAmount(p.amount),
  "swap.refunded": (p): p is SwapRefundedPayload =>
    isObject(p) && isBytes32(p.swapId) && isAddress(p.sender) && isAmount(p.amount),
  "swap.linked": (p): p is SwapLinkedPayload =>
    isObject(p) && isBytes32(p.swapId) && isBytes32(p.hashLock),
  "lock.created": (p): p is LockCreatedPayload =>
    isObject(p) &&
    isBytes32(p.hashLock) &&
    isAddress(p.recipient) &&
    isAmount(p.amount) &&
    isHeight(p.timeLock),
  "lock.completed": (p): p is LockCompletedPayload =>
    isObject(p) &&
    isBytes32(p.hashLock) &&
    isBytes32(p.secret) &&
    isAddress(p.recipient) &&
    isAmount(p.amount),
  "lock.refunded": (p): p is LockRefundedPayload =>
    isObject(p) && isBytes32(p.hashLock) && isAmount(p.amount),
  "pool.deposited": (p): p is DepositedPayload =>
    isObject(p) && isAddress(p.account) && isAmount(p.nativeAmount) && isAmount(p.units),
  "pool.withdrawn": (p): p is WithdrawnPayload =>
    isObject(p) && isAddress(p.account) && isAmount(p.units) && isAmount(p.nativeAmount),
  "pool.rate_updated": (p): p is RateUpdatedPayload =>
    isObject(p) && isAmount(p.oldRate) && isAmount(p.newRate),
  "pool.emergency_withdrawal": (p): p is EmergencyWithdrawalPayload =>
    isObject(p) && isAddress(p.to) && isAmount(p.nativeAmount),
  "gate.owner_transferred": (p): p is OwnerTransferredPayload =>
    isObject(p) && isAddress(p.previousOwner) && isAddress(p.newOwner),
  "gate.responder_changed": (p): p is ResponderChangedPayload =>
    isObject(p) && isAddress(p.previousResponder) && isAddress(p.newResponder),
  "gate.paused": (p): p is PauseChangedPayload => isObject(p) && isAddress(p.by),
  "gate.unpaused": (p): p is PauseChangedPayload => isObject(p) && isAddress(p.by),
};

/**
 * Narrow a stored event to a specific swap event type, checking the
 * payload shape as well as the type string.
 */
export function isSwapEvent<T extends SwapEventType>(
  stored: StoredEvent,
  type: T,
): stored is TypedStoredEvent<T> {
  return stored.event.type === type && PAYLOAD_GUARDS[type](stored.event.payload);
}

// =============================================================================
// Schema Definitions
// =============================================================================

const DESCRIPTIONS: Readonly<Record<SwapEventType, string>> = {
  "swap.initiated": "Funds were locked in custody against a hash commitment",
  "swap.completed": "A sender swap was completed with the correct secret",
  "swap.secret_revealed": "A secret was revealed on this ledger",
  "swap.refunded": "An expired sender swap was refunded to its sender",
  "swap.linked": "A sender swap was cross-checked against a counterparty lock",
  "lock.created": "The responder prepared a counterparty lock",
  "lock.completed": "A counterparty lock was released to its recipient",
  "lock.refunded": "An expired counterparty lock was refunded and burned",
  "pool.deposited": "Native value was deposited for ledger units",
  "pool.withdrawn": "Ledger units were withdrawn for native value",
  "pool.rate_updated": "The conversion rate was changed",
  "pool.emergency_withdrawal": "The owner withdrew the whole native reserve",
  "gate.owner_transferred": "Ownership was transferred",
  "gate.responder_changed": "The responder role was reassigned",
  "gate.paused": "Mutating operations were paused",
  "gate.unpaused": "Mutating operations were resumed",
};

/** Component that emits each event type. */
export function sourceOf(type: SwapEventType): EventMetadata["source"] {
  if (type.startsWith("swap.")) return "swap";
  if (type.startsWith("lock.")) return "lock";
  if (type.startsWith("gate.")) return "gate";
  return "ledger";
}

function schemaFor<T extends SwapEventType>(type: T): EventSchema {
  return {
    type,
    version: 1,
    description: DESCRIPTIONS[type],
    source: sourceOf(type),
    validate: PAYLOAD_GUARDS[type],
  };
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every swap pool event registered at
 * version 1.
 */
export function createSwapCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const type of Object.values(SWAP_EVENTS)) {
    catalog.register(schemaFor(type));
  }
  return catalog;
}
