/**
 * @hashlock/relayer — Cross-ledger relayer.
 *
 * Watches one pool's event stream and drives the other pool:
 * - swap.initiated on the source → respond() on the target
 * - swap.secret_revealed on the source → completeLock() on the target
 *
 * Rules:
 * - The counterparty window always closes `safetyMargin` blocks before
 *   the sender swap expires, or the relayer does not respond
 * - Failures are caught here, classified and logged; they never reach
 *   the source pool's caller
 * - Every reaction is recorded as a RelayOutcome; only the latest
 *   `maxOutcomes` are kept until drained
 */

import type { Logger } from "pino";
import type { StoredEvent, Subscription, SecretRevealedPayload, SwapInitiatedPayload } from "@hashlock/event-store";
import { SWAP_EVENTS, isSwapEvent } from "@hashlock/event-store";
import type { SwapPool } from "@hashlock/pool";
import { classifyError } from "./classify.js";
import type { RelayOutcome, RelayTrigger, RelayerConfig } from "./types.js";
import { RelayerError } from "./types.js";

/** Default number of outcomes kept before the oldest are dropped. */
export const MAX_OUTCOMES = 1000;

export interface RelayerOptions {
  readonly source: SwapPool;
  readonly target: SwapPool;
  /** Caller used on the target. Default: the configured responder */
  readonly actor?: string;
  readonly config: RelayerConfig;
  readonly logger: Logger;
  /** Outcomes kept between drains. Default: MAX_OUTCOMES */
  readonly maxOutcomes?: number;
}

export class Relayer {
  private readonly _source: SwapPool;
  private readonly _target: SwapPool;
  private readonly _actor: string;
  private readonly _config: RelayerConfig;
  private readonly _log: Logger;
  private readonly _maxOutcomes: number;
  private _outcomes: RelayOutcome[] = [];
  private _subscription: Subscription | undefined;

  constructor(options: RelayerOptions) {
    if (options.source === options.target) {
      throw new RelayerError("SAME_POOL", "Source and target must be different pools");
    }
    const maxOutcomes = options.maxOutcomes ?? MAX_OUTCOMES;
    if (!Number.isSafeInteger(maxOutcomes) || maxOutcomes <= 0) {
      throw new RelayerError("INVALID_CONFIG", `maxOutcomes must be a positive integer, got ${String(maxOutcomes)}`);
    }
    this._maxOutcomes = maxOutcomes;
    this._source = options.source;
    this._target = options.target;
    this._actor = options.actor ?? options.config.responder;
    this._config = options.config;
    this._log = options.logger.child({
      source: options.source.chainId,
      target: options.target.chainId,
    });
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  /** Subscribe to the source stream. Calling twice has no effect. */
  start(): void {
    if (this._subscription !== undefined) return;
    this._subscription = this._source.events.subscribeAll((stored) => this.handle(stored));
    this._log.info({ actor: this._actor }, "Relayer started");
  }

  stop(): void {
    if (this._subscription === undefined) return;
    this._subscription.unsubscribe();
    this._subscription = undefined;
    this._log.info("Relayer stopped");
  }

  get running(): boolean {
    return this._subscription !== undefined;
  }

  get outcomes(): readonly RelayOutcome[] {
    return [...this._outcomes];
  }

  /** Return the recorded outcomes and forget them. */
  drainOutcomes(): RelayOutcome[] {
    const drained = this._outcomes;
    this._outcomes = [];
    return drained;
  }

  // ─── Reactions ───────────────────────────────────────────────────────

  private handle(stored: StoredEvent): void {
    if (isSwapEvent(stored, SWAP_EVENTS.SWAP_INITIATED)) {
      this.record(this.onInitiated(stored.event.payload));
    } else if (isSwapEvent(stored, SWAP_EVENTS.SECRET_REVEALED)) {
      this.record(this.onSecretRevealed(stored.event.payload));
    }
  }

  private onInitiated(event: SwapInitiatedPayload): RelayOutcome {
    const amount = BigInt(event.amount);
    const { minSwapAmount, maxSwapAmount, responderWindow, safetyMargin } = this._config;

    if (amount < minSwapAmount || amount > maxSwapAmount) {
      return this.skip(
        "swap.initiated",
        event.hashLock,
        `amount ${event.amount} outside [${minSwapAmount.toString()}, ${maxSwapAmount.toString()}]`,
      );
    }

    const remaining = event.timeLock - this._source.height;
    const window = Math.min(responderWindow, remaining - safetyMargin);
    if (window <= 0) {
      return this.skip(
        "swap.initiated",
        event.hashLock,
        `${remaining} blocks left on the sender swap, safety margin is ${safetyMargin}`,
      );
    }

    try {
      const lock = this._target.respond(this._actor, event.hashLock, event.recipient, amount, window);
      return {
        kind: "responded",
        hashLock: lock.hashLock,
        swapId: event.swapId,
        amount: lock.amount,
        timeLock: lock.timeLock,
      };
    } catch (err) {
      return { kind: "failed", trigger: "swap.initiated", hashLock: event.hashLock, error: classifyError(err) };
    }
  }

  private onSecretRevealed(event: SecretRevealedPayload): RelayOutcome {
    try {
      const lock = this._target.completeLock(this._actor, event.hashLock, event.secret);
      return {
        kind: "completed",
        hashLock: lock.hashLock,
        recipient: lock.recipient,
        amount: lock.amount,
      };
    } catch (err) {
      return {
        kind: "failed",
        trigger: "swap.secret_revealed",
        hashLock: event.hashLock,
        error: classifyError(err),
      };
    }
  }

  private skip(trigger: RelayTrigger, hashLock: string, reason: string): RelayOutcome {
    return { kind: "skipped", trigger, hashLock, reason };
  }

  private record(outcome: RelayOutcome): void {
    this._outcomes.push(outcome);
    if (this._outcomes.length > this._maxOutcomes) {
      this._outcomes.shift();
    }

    switch (outcome.kind) {
      case "responded":
        this._log.info(
          { hashLock: outcome.hashLock, swapId: outcome.swapId, timeLock: outcome.timeLock },
          "Counterparty lock created",
        );
        break;
      case "completed":
        this._log.info(
          { hashLock: outcome.hashLock, recipient: outcome.recipient },
          "Counterparty lock released",
        );
        break;
      case "skipped":
        this._log.info(
          { hashLock: outcome.hashLock, trigger: outcome.trigger, reason: outcome.reason },
          "Event skipped",
        );
        break;
      case "failed":
        this._log.warn(
          {
            hashLock: outcome.hashLock,
            trigger: outcome.trigger,
            kind: outcome.error.kind,
            code: outcome.error.code,
            retryAfterHeight: outcome.error.retryAfterHeight,
          },
          outcome.error.message,
        );
        break;
    }
  }
}
