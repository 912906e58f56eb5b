/**
 * @hashlock/relayer — Event-driven relayer between two swap pools.
 *
 * Provides:
 * - Relayer: reacts to one pool's events by acting on the other
 * - classifyError: what to do about a failed pool operation
 * - Supply audit across ledgers
 * - Environment configuration and logging
 *
 * @packageDocumentation
 */

export { MAX_OUTCOMES, Relayer } from "./relayer.js";
export type { RelayerOptions } from "./relayer.js";

export { classifyError } from "./classify.js";

export {
  auditSupply,
  checkAggregateSupply,
  checkConservation,
  checkCustodyBacking,
  reportLedger,
} from "./supply-audit.js";
export type { LedgerSupplyReport, SupplyAuditResult, SupplyCheckResult } from "./supply-audit.js";

export { ConfigSchema, loadConfig, toRelayerConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";

export type {
  RelayerConfig,
  FailureKind,
  ClassifiedError,
  RelayTrigger,
  RelayOutcome,
  RelayerErrorCode,
} from "./types.js";
export { RelayerError } from "./types.js";
