/**
 * Swap Pool — one ledger's engine.
 *
 * Ties the balance ledger, rate converter, access gate and both swap state
 * machines together behind a single API, and publishes every committed
 * change to the pool's event store. Two pools never reference each other;
 * a relayer watching one pool's events drives the other.
 *
 * Rules:
 * - Every mutating operation takes the caller first
 * - The custody account is never a caller, recipient or role holder
 * - Order of checks: pause → arguments → role → state → balance
 * - Events are appended after the change is applied
 * - A failed operation changes nothing and emits nothing
 */

import { randomUUID } from "node:crypto";
import type { Address, ChainId, EventMetadata, HashLock, SwapId } from "@hashlock/types";
import { isAddress, isBytes32 } from "@hashlock/types";
import type { AccountBalance, ConservationResult } from "@hashlock/ledger";
import { BalanceLedger } from "@hashlock/ledger";
import type { EventStore, SwapEventPayloads, SwapEventType } from "@hashlock/event-store";
import { InMemoryEventStore, SWAP_EVENTS, sourceOf } from "@hashlock/event-store";
import { AccessGate } from "./access-gate.js";
import type { ChainClock } from "./chain-clock.js";
import { CounterpartyLockBook } from "./counterparty-locks.js";
import { SwapError } from "./errors.js";
import {
  toAddress,
  toBytes32,
  toHashLock,
  toPositiveAmount,
  toWindow,
} from "./hash-lock.js";
import { RateConverter } from "./rate-converter.js";
import { SenderSwapBook } from "./sender-swaps.js";
import type {
  CounterpartyLock,
  DepositResult,
  OpenExposure,
  Role,
  SenderSwap,
  SwapPoolOptions,
  WithdrawResult,
} from "./types.js";

type PendingEvent = {
  [K in SwapEventType]: { readonly type: K; readonly payload: SwapEventPayloads[K] };
}[SwapEventType];

const POOL_STREAM = "pool";
const GATE_STREAM = "gate";

export function swapStreamId(swapId: SwapId): string {
  return `swap:${swapId}`;
}

export function lockStreamId(hashLock: HashLock): string {
  return `lock:${hashLock}`;
}

export class SwapPool {
  readonly chainId: ChainId;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly custody: Address;
  readonly defaultTimeLockWindow: number;

  private readonly _clock: ChainClock;
  private readonly _events: EventStore;
  private readonly _ledger = new BalanceLedger();
  private readonly _rate: RateConverter;
  private readonly _gate: AccessGate;
  private readonly _swaps: SenderSwapBook;
  private readonly _locks: CounterpartyLockBook;
  private _nativeReserve = 0n;

  constructor(options: SwapPoolOptions) {
    const decimals = options.decimals ?? 18;
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 77) {
      throw new SwapError("INVALID_ARGUMENT", `decimals must be an integer in [0, 77], got ${decimals}`);
    }

    this.chainId = options.chainId;
    this.name = options.name;
    this.symbol = options.symbol;
    this.decimals = decimals;
    this.custody = toAddress(options.custody, "custody");
    this.defaultTimeLockWindow = toWindow(options.defaultTimeLockWindow, "defaultTimeLockWindow");

    this._clock = options.clock;
    this._events = options.eventStore ?? new InMemoryEventStore();
    this._rate = new RateConverter(options.rate);
    this._gate = new AccessGate(
      this.toAccount(options.owner, "owner"),
      this.toAccount(options.responder, "responder"),
    );
    this._swaps = new SenderSwapBook(this._ledger, this.custody, this._clock);
    this._locks = new CounterpartyLockBook(this._ledger, this.custody, this._clock);
  }

  // ─── Deposit / Withdraw ──────────────────────────────────────────────

  /**
   * Exchange native value for ledger units at the current rate.
   */
  depositNativeForUnits(caller: string, nativeAmount: bigint): DepositResult {
    this._gate.assertNotPaused();
    const account = this.toAccount(caller, "caller");
    toPositiveAmount(nativeAmount, "nativeAmount");

    const units = this._rate.toUnits(nativeAmount);
    if (units === 0n) {
      throw new SwapError("ZERO_RESULT", `${nativeAmount.toString()} native buys zero units at the current rate`);
    }

    this._ledger.mint(account, units);
    this._nativeReserve += nativeAmount;

    this.emit(POOL_STREAM, account, POOL_STREAM, [
      {
        type: SWAP_EVENTS.DEPOSITED,
        payload: { account, nativeAmount: nativeAmount.toString(), units: units.toString() },
      },
    ]);
    return { nativeAmount, units };
  }

  /**
   * Burn ledger units and pay out native value at the current rate.
   */
  withdrawUnitsForNative(caller: string, units: bigint): WithdrawResult {
    this._gate.assertNotPaused();
    const account = this.toAccount(caller, "caller");
    toPositiveAmount(units, "units");

    const balance = this._ledger.balanceOf(account);
    if (balance < units) {
      throw new SwapError(
        "INSUFFICIENT_BALANCE",
        `${account} holds ${balance.toString()}, needs ${units.toString()}`,
      );
    }
    const nativeAmount = this._rate.toNative(units);
    if (nativeAmount === 0n) {
      throw new SwapError("ZERO_RESULT", `${units.toString()} units redeem for zero native at the current rate`);
    }
    if (nativeAmount > this._nativeReserve) {
      throw new SwapError(
        "INSUFFICIENT_RESERVE",
        `Reserve holds ${this._nativeReserve.toString()}, needs ${nativeAmount.toString()}`,
      );
    }

    this._ledger.burn(account, units);
    this._nativeReserve -= nativeAmount;

    this.emit(POOL_STREAM, account, POOL_STREAM, [
      {
        type: SWAP_EVENTS.WITHDRAWN,
        payload: { account, units: units.toString(), nativeAmount: nativeAmount.toString() },
      },
    ]);
    return { units, nativeAmount };
  }

  // ─── Sender swaps ────────────────────────────────────────────────────

  /**
   * Lock `amount` of the caller's units against `hashLock` for
   * `recipient` on the other ledger.
   */
  initiate(
    caller: string,
    hashLock: string,
    recipient: string,
    amount: bigint,
    timeLockWindow?: number,
  ): SenderSwap {
    this._gate.assertNotPaused();
    const sender = this.toAccount(caller, "caller");
    const lock = toHashLock(hashLock);
    const to = this.toAccount(recipient, "recipient");
    toPositiveAmount(amount, "amount");
    const window = toWindow(timeLockWindow ?? this.defaultTimeLockWindow, "timeLockWindow");

    const swap = this._swaps.initiate({
      sender,
      hashLock: lock,
      recipient: to,
      amount,
      timeLockWindow: window,
    });

    this.emit(swapStreamId(swap.swapId), sender, swap.hashLock, [
      {
        type: SWAP_EVENTS.SWAP_INITIATED,
        payload: {
          swapId: swap.swapId,
          hashLock: swap.hashLock,
          sender: swap.sender,
          recipient: swap.recipient,
          amount: swap.amount.toString(),
          timeLock: swap.timeLock,
        },
      },
    ]);
    return swap;
  }

  /**
   * Complete a swap by revealing its secret. Anyone may call.
   */
  complete(caller: string, swapId: string, secret: string): SenderSwap {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    const id = toBytes32(swapId, "swapId");
    const preimage = toBytes32(secret, "secret");

    const swap = this._swaps.complete(id, preimage);

    this.emit(swapStreamId(id), actor, swap.hashLock, [
      { type: SWAP_EVENTS.SWAP_COMPLETED, payload: { swapId: id, secret: preimage } },
      {
        type: SWAP_EVENTS.SECRET_REVEALED,
        payload: {
          hashLock: swap.hashLock,
          secret: preimage,
          recipient: swap.recipient,
          amount: swap.amount.toString(),
        },
      },
    ]);
    return swap;
  }

  /**
   * Return an expired swap's units to its sender. Sender only.
   */
  refund(caller: string, swapId: string): SenderSwap {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    const id = toBytes32(swapId, "swapId");

    const swap = this._swaps.refund(actor, id);

    this.emit(swapStreamId(id), actor, swap.hashLock, [
      {
        type: SWAP_EVENTS.SWAP_REFUNDED,
        payload: { swapId: id, sender: swap.sender, amount: swap.amount.toString() },
      },
    ]);
    return swap;
  }

  /**
   * Cross-check a swap against a lock and flag the swap as linked.
   * Responder only; advisory.
   */
  link(caller: string, swapId: string, hashLock: string): SenderSwap {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    const id = toBytes32(swapId, "swapId");
    const lockId = toHashLock(hashLock);
    this._gate.authorize(actor, "responder");

    const swap = this._swaps.require(id);
    const lock = this._locks.require(lockId);
    if (swap.hashLock !== lock.hashLock) {
      throw new SwapError("INVALID_ARGUMENT", `Swap ${id} is not locked by ${lockId}`);
    }
    if (swap.recipient !== lock.recipient || swap.amount !== lock.amount) {
      throw new SwapError(
        "INVALID_ARGUMENT",
        `Swap ${id} and lock ${lockId} disagree on recipient or amount`,
      );
    }

    const linked = this._swaps.markLinked(id);

    this.emit(swapStreamId(id), actor, lockId, [
      { type: SWAP_EVENTS.SWAP_LINKED, payload: { swapId: id, hashLock: lockId } },
    ]);
    return linked;
  }

  // ─── Counterparty locks ──────────────────────────────────────────────

  /**
   * Prepare a lock for a swap seen on the other ledger. Responder only.
   */
  respond(
    caller: string,
    hashLock: string,
    recipient: string,
    amount: bigint,
    timeLockWindow?: number,
  ): CounterpartyLock {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    const lockId = toHashLock(hashLock);
    const to = this.toAccount(recipient, "recipient");
    toPositiveAmount(amount, "amount");
    const window = toWindow(timeLockWindow ?? this.defaultTimeLockWindow, "timeLockWindow");
    this._gate.authorize(actor, "responder");

    const lock = this._locks.respond({ hashLock: lockId, recipient: to, amount, timeLockWindow: window });

    this.emit(lockStreamId(lockId), actor, lockId, [
      {
        type: SWAP_EVENTS.LOCK_CREATED,
        payload: {
          hashLock: lockId,
          recipient: lock.recipient,
          amount: lock.amount.toString(),
          timeLock: lock.timeLock,
        },
      },
    ]);
    return lock;
  }

  /**
   * Release a lock to its recipient with the revealed secret. Anyone may
   * call.
   */
  completeLock(caller: string, hashLock: string, secret: string): CounterpartyLock {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    const lockId = toHashLock(hashLock);
    const preimage = toBytes32(secret, "secret");

    const lock = this._locks.complete(lockId, preimage);
    this.emitLockCompleted(actor, lock, preimage);
    return lock;
  }

  /**
   * Release a lock on behalf of its recipient, checking that the lock
   * matches what was observed on the other ledger. Responder only.
   */
  autoCompleteLock(
    caller: string,
    hashLock: string,
    secret: string,
    recipient: string,
    amount: bigint,
  ): CounterpartyLock {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    const lockId = toHashLock(hashLock);
    const preimage = toBytes32(secret, "secret");
    const to = this.toAccount(recipient, "recipient");
    toPositiveAmount(amount, "amount");
    this._gate.authorize(actor, "responder");

    const lock = this._locks.complete(lockId, preimage, { recipient: to, amount });
    this.emitLockCompleted(actor, lock, preimage);
    return lock;
  }

  /**
   * Burn an expired lock's units. Responder only.
   */
  refundLock(caller: string, hashLock: string): CounterpartyLock {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    const lockId = toHashLock(hashLock);
    this._gate.authorize(actor, "responder");

    const lock = this._locks.refund(lockId);

    this.emit(lockStreamId(lockId), actor, lockId, [
      {
        type: SWAP_EVENTS.LOCK_REFUNDED,
        payload: { hashLock: lockId, amount: lock.amount.toString() },
      },
    ]);
    return lock;
  }

  // ─── Administration ──────────────────────────────────────────────────

  /** Responder only. Returns the previous rate. */
  setRate(caller: string, rate: bigint): bigint {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    toPositiveAmount(rate, "rate");
    this._gate.authorize(actor, "responder");

    const oldRate = this._rate.setRate(rate);

    this.emit(POOL_STREAM, actor, POOL_STREAM, [
      {
        type: SWAP_EVENTS.RATE_UPDATED,
        payload: { oldRate: oldRate.toString(), newRate: rate.toString() },
      },
    ]);
    return oldRate;
  }

  transferOwnership(caller: string, newOwner: string): void {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    const next = this.toAccount(newOwner, "newOwner");
    this._gate.authorize(actor, "owner");

    const previousOwner = this._gate.transferOwnership(next);

    this.emit(GATE_STREAM, actor, GATE_STREAM, [
      { type: SWAP_EVENTS.OWNER_TRANSFERRED, payload: { previousOwner, newOwner: next } },
    ]);
  }

  setResponder(caller: string, newResponder: string): void {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    const next = this.toAccount(newResponder, "newResponder");
    this._gate.authorize(actor, "owner");

    const previousResponder = this._gate.setResponder(next);

    this.emit(GATE_STREAM, actor, GATE_STREAM, [
      {
        type: SWAP_EVENTS.RESPONDER_CHANGED,
        payload: { previousResponder, newResponder: next },
      },
    ]);
  }

  pause(caller: string): void {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    this._gate.authorize(actor, "owner");

    this._gate.pause();

    this.emit(GATE_STREAM, actor, GATE_STREAM, [
      { type: SWAP_EVENTS.PAUSED, payload: { by: actor } },
    ]);
  }

  unpause(caller: string): void {
    const actor = this.toAccount(caller, "caller");
    this._gate.authorize(actor, "owner");

    this._gate.unpause();

    this.emit(GATE_STREAM, actor, GATE_STREAM, [
      { type: SWAP_EVENTS.UNPAUSED, payload: { by: actor } },
    ]);
  }

  /**
   * Pay the whole native reserve out to the owner. Outstanding ledger
   * units are left unbacked. Returns the amount paid.
   */
  emergencyWithdraw(caller: string): bigint {
    this._gate.assertNotPaused();
    const actor = this.toAccount(caller, "caller");
    this._gate.authorize(actor, "owner");

    const nativeAmount = this._nativeReserve;
    this._nativeReserve = 0n;

    this.emit(POOL_STREAM, actor, POOL_STREAM, [
      {
        type: SWAP_EVENTS.EMERGENCY_WITHDRAWAL,
        payload: { to: actor, nativeAmount: nativeAmount.toString() },
      },
    ]);
    return nativeAmount;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getSwap(swapId: string): SenderSwap | undefined {
    return isBytes32(swapId) ? this._swaps.get(toBytes32(swapId, "swapId")) : undefined;
  }

  getLock(hashLock: string): CounterpartyLock | undefined {
    return isBytes32(hashLock) ? this._locks.get(toBytes32(hashLock, "hashLock")) : undefined;
  }

  /** True once `height > timeLock`. Throws NOT_FOUND for unknown swaps. */
  isSwapExpired(swapId: string): boolean {
    return this._swaps.isExpired(toBytes32(swapId, "swapId"));
  }

  isLockExpired(hashLock: string): boolean {
    return this._locks.isExpired(toBytes32(hashLock, "hashLock"));
  }

  isAuthorized(caller: string, role: Role): boolean {
    return isAddress(caller) && this._gate.isAuthorized(caller, role);
  }

  balanceOf(account: string): bigint {
    return isAddress(account) ? this._ledger.balanceOf(normalizeAddress(account)) : 0n;
  }

  holders(): readonly AccountBalance[] {
    return this._ledger.holders();
  }

  get totalSupply(): bigint {
    return this._ledger.totalSupply;
  }

  get nativeReserve(): bigint {
    return this._nativeReserve;
  }

  get rate(): bigint {
    return this._rate.rate;
  }

  get owner(): Address {
    return this._gate.owner;
  }

  get responder(): Address {
    return this._gate.responder;
  }

  get paused(): boolean {
    return this._gate.paused;
  }

  get height(): number {
    return this._clock.height();
  }

  get events(): EventStore {
    return this._events;
  }

  verifyConservation(): ConservationResult {
    return this._ledger.verifyConservation();
  }

  /**
   * Units currently held in custody and the open records holding them.
   * `custodyBalance` always equals the two locked totals combined.
   */
  openExposure(): OpenExposure {
    const swaps = this._swaps.listOpen();
    const locks = this._locks.listOpen();
    return {
      openSwaps: swaps.length,
      lockedInSwaps: swaps.reduce((sum, s) => sum + s.amount, 0n),
      openLocks: locks.length,
      lockedInLocks: locks.reduce((sum, l) => sum + l.amount, 0n),
      custodyBalance: this._ledger.balanceOf(this.custody),
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /** Normalize an account that acts on or receives from the pool. Custody never does. */
  private toAccount(value: string, field: string): Address {
    const account = toAddress(value, field);
    if (account === this.custody) {
      throw new SwapError("INVALID_ARGUMENT", `${field} must not be the custody account`);
    }
    return account;
  }

  private emitLockCompleted(actor: Address, lock: CounterpartyLock, secret: string): void {
    this.emit(lockStreamId(lock.hashLock), actor, lock.hashLock, [
      {
        type: SWAP_EVENTS.LOCK_COMPLETED,
        payload: {
          hashLock: lock.hashLock,
          secret,
          recipient: lock.recipient,
          amount: lock.amount.toString(),
        },
      },
    ]);
  }

  private emit(
    streamId: string,
    actor: Address,
    correlationId: string,
    pending: readonly PendingEvent[],
  ): void {
    const timestamp = new Date(this._clock.now() * 1000).toISOString();
    const height = this._clock.height();
    this._events.append(
      streamId,
      pending.map((e) => {
        const metadata: EventMetadata = {
          eventId: randomUUID(),
          timestamp,
          actor,
          correlationId,
          source: sourceOf(e.type),
          chainId: this.chainId,
          height,
        };
        return { type: e.type, metadata, payload: e.payload };
      }),
    );
  }
}

function normalizeAddress(account: Address): Address {
  return `0x${account.slice(2).toLowerCase()}`;
}
