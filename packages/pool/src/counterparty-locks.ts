/**
 * Counterparty Lock State Machine.
 *
 * The responder mints units into custody for the recipient of a swap
 * started on the other ledger. Anyone holding the revealed secret can
 * release them to the recipient before the time lock; afterwards the
 * responder burns them, undoing the preparation mint.
 *
 * Rules:
 * - One lock per hash lock, ever (a used hash lock is never reused)
 * - Inputs are validated before any balance moves
 * - Records are never deleted
 */

import type { Address, HashLock, Secret } from "@hashlock/types";
import type { BalanceLedger } from "@hashlock/ledger";
import type { ChainClock } from "./chain-clock.js";
import { SwapError } from "./errors.js";
import { verifySecret } from "./hash-lock.js";
import { assertExpired, assertNotExpired, assertTransition, statusOf } from "./lifecycle.js";
import type { CounterpartyLock } from "./types.js";

export interface RespondParams {
  readonly hashLock: HashLock;
  readonly recipient: Address;
  readonly amount: bigint;
  readonly timeLockWindow: number;
}

/**
 * What the releasing party observed on the other ledger. When given, the
 * lock must match it exactly.
 */
export interface ExpectedRelease {
  readonly recipient: Address;
  readonly amount: bigint;
}

export class CounterpartyLockBook {
  private readonly locks: Map<HashLock, CounterpartyLock> = new Map();

  constructor(
    private readonly ledger: BalanceLedger,
    private readonly custody: Address,
    private readonly clock: ChainClock,
  ) {}

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  respond(params: RespondParams): CounterpartyLock {
    if (params.recipient === this.custody) {
      throw new SwapError("INVALID_ARGUMENT", "The custody account cannot receive a lock");
    }
    if (this.locks.has(params.hashLock)) {
      throw new SwapError("ALREADY_USED", `Hash lock ${params.hashLock} has already been used`);
    }

    this.ledger.mint(this.custody, params.amount);

    const height = this.clock.height();
    const lock: CounterpartyLock = {
      hashLock: params.hashLock,
      timeLock: height + params.timeLockWindow,
      recipient: params.recipient,
      amount: params.amount,
      completed: false,
      refunded: false,
      createdAt: this.clock.now(),
      createdAtHeight: height,
    };
    this.locks.set(params.hashLock, lock);
    return lock;
  }

  /**
   * Release custody units to the recipient.
   */
  complete(hashLock: HashLock, secret: Secret, expected?: ExpectedRelease): CounterpartyLock {
    const lock = this.require(hashLock);
    const label = `Lock ${hashLock}`;
    assertTransition(label, lock, "completed");
    assertNotExpired(label, lock.timeLock, this.clock.height());
    if (!verifySecret(secret, hashLock)) {
      throw new SwapError("INVALID_SECRET", `Secret does not match ${label}`);
    }
    if (expected !== undefined) {
      if (expected.recipient !== lock.recipient) {
        throw new SwapError(
          "INVALID_ARGUMENT",
          `${label} pays ${lock.recipient}, observed recipient ${expected.recipient}`,
        );
      }
      if (expected.amount !== lock.amount) {
        throw new SwapError(
          "INVALID_ARGUMENT",
          `${label} holds ${lock.amount.toString()}, observed amount ${expected.amount.toString()}`,
        );
      }
    }

    this.ledger.transfer(this.custody, lock.recipient, lock.amount);

    const updated: CounterpartyLock = { ...lock, completed: true };
    this.locks.set(hashLock, updated);
    return updated;
  }

  /**
   * Burn custody units once the time lock has passed.
   */
  refund(hashLock: HashLock): CounterpartyLock {
    const lock = this.require(hashLock);
    const label = `Lock ${hashLock}`;
    assertTransition(label, lock, "refunded");
    assertExpired(label, lock.timeLock, this.clock.height());

    this.ledger.burn(this.custody, lock.amount);

    const updated: CounterpartyLock = { ...lock, refunded: true };
    this.locks.set(hashLock, updated);
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(hashLock: HashLock): CounterpartyLock | undefined {
    return this.locks.get(hashLock);
  }

  require(hashLock: HashLock): CounterpartyLock {
    const lock = this.locks.get(hashLock);
    if (lock === undefined) {
      throw new SwapError("NOT_FOUND", `Lock ${hashLock} not found`);
    }
    return lock;
  }

  isExpired(hashLock: HashLock): boolean {
    return this.clock.height() > this.require(hashLock).timeLock;
  }

  listOpen(): readonly CounterpartyLock[] {
    return [...this.locks.values()].filter((l) => statusOf(l) === "open");
  }

  get size(): number {
    return this.locks.size;
  }
}
