/**
 * @custodia/custody — Custody & conditional release engine.
 *
 * Holds value or state on behalf of principals and releases or transfers
 * it only when a single-evaluation condition holds, exactly once:
 * - Owner / member / beneficiary / depositor guards
 * - Lazy expiry against an injected clock
 * - Payouts ordered checks → effects → transfer, with full rollback
 * - Events committed only with the outermost operation
 */

// Engine
export { CustodyEngine, DEFAULT_PAGE_SIZE, DEFAULT_PAGE_MAX } from "./engine.js";
export type {
  CustodyEngineOptions,
  RecordDraft,
  CreateGuard,
  CreateOptions,
  VoidGuard,
  RedeemOptions,
  CancelOptions,
  PageRequest,
  EngineReconciliation,
  EngineSnapshot,
  EventLog,
} from "./engine.js";

// Components
export { AccessControl } from "./access-control.js";
export type { AccessChange, AccessListener, AccessSnapshot } from "./access-control.js";
export {
  applyTransition,
  assertLive,
  assertNotExpired,
  effectiveStatus,
  isExpired,
  statusText,
  toView,
} from "./lifecycle.js";
export type { Transition } from "./lifecycle.js";
export { Disbursement } from "./disbursement.js";
export { TransactionCoordinator, streamIdFor } from "./transaction.js";
export type { TransactionCoordinatorOptions } from "./transaction.js";

// Collaborators
export { SystemClock, ManualClock, toIsoTimestamp } from "./clock.js";
export type { Clock } from "./clock.js";
export { call, assertContext, requireNoValue, requireExactValue } from "./identity.js";
export type { CallContext } from "./identity.js";
export { InMemoryValueTransfer } from "./value-transfer.js";
export type {
  ValueTransfer,
  TransferRequest,
  TransferReceipt,
  TransferOutcome,
  RecipientHook,
} from "./value-transfer.js";

// Errors
export { CustodyError, isCustodyError } from "./errors.js";
export type { CustodyErrorCode } from "./errors.js";

// Config & logging
export { ConfigSchema, loadConfig, engineOptionsFromConfig } from "./config.js";
export type { AppConfig, ConfiguredEngineOptions } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { LoggerConfig } from "./logger.js";
