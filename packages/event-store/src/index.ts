/**
 * @hashlock/event-store — Append-only event streams.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore, one per ledger
 * - Hash chain over the global log for tamper evidence
 * - EventCatalog for schema validation
 * - Swap pool domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore, MAX_HANDLER_FAILURES } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions, HandlerFailure } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Swap domain events
export { SWAP_EVENTS, createSwapCatalog, isSwapEvent, sourceOf } from "./swap-events.js";
export type {
  SwapEventType,
  SwapEventPayloads,
  TypedDomainEvent,
  TypedStoredEvent,
  SwapInitiatedPayload,
  SwapCompletedPayload,
  SecretRevealedPayload,
  SwapRefundedPayload,
  SwapLinkedPayload,
  LockCreatedPayload,
  LockCompletedPayload,
  LockRefundedPayload,
  DepositedPayload,
  WithdrawnPayload,
  RateUpdatedPayload,
  EmergencyWithdrawalPayload,
  OwnerTransferredPayload,
  ResponderChangedPayload,
  PauseChangedPayload,
} from "./swap-events.js";
