/**
 * @custodia/event-store — Append-only event log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with hash-chained entries and subscriptions
 * - EventCatalog for per-type payload validation
 * - Custody domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashableEvent,
  EventHandler,
  HandlerErrorSink,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Custody domain events
export {
  CUSTODY_EVENTS,
  createCustodyCatalog,
  isCustodyEventPayload,
} from "./custody-events.js";
export type { CustodyEventType, CustodyEventPayload } from "./custody-events.js";
