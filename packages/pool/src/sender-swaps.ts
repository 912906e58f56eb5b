/**
 * Sender Swap State Machine.
 *
 * The party who knows a secret locks ledger units in custody against its
 * hash. Revealing the secret before the time lock burns the units (they
 * are released on the other ledger); otherwise the sender takes them back.
 *
 * Rules:
 * - Inputs are validated before any balance moves
 * - A swap ID is never overwritten
 * - Records are never deleted
 */

import type { Address, HashLock, Secret, SwapId } from "@hashlock/types";
import type { BalanceLedger } from "@hashlock/ledger";
import type { ChainClock } from "./chain-clock.js";
import { SwapError } from "./errors.js";
import { deriveSwapId, verifySecret } from "./hash-lock.js";
import { assertExpired, assertNotExpired, assertTransition, statusOf } from "./lifecycle.js";
import type { SenderSwap } from "./types.js";

export interface InitiateParams {
  readonly sender: Address;
  readonly hashLock: HashLock;
  readonly recipient: Address;
  readonly amount: bigint;
  readonly timeLockWindow: number;
}

export class SenderSwapBook {
  private readonly swaps: Map<SwapId, SenderSwap> = new Map();

  constructor(
    private readonly ledger: BalanceLedger,
    private readonly custody: Address,
    private readonly clock: ChainClock,
  ) {}

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Lock `amount` from the sender in custody. Arguments are expected to be
   * normalized already.
   */
  initiate(params: InitiateParams): SenderSwap {
    if (params.sender === this.custody || params.recipient === this.custody) {
      throw new SwapError("INVALID_ARGUMENT", "The custody account cannot send or receive a swap");
    }
    const balance = this.ledger.balanceOf(params.sender);
    if (balance < params.amount) {
      throw new SwapError(
        "INSUFFICIENT_BALANCE",
        `${params.sender} holds ${balance.toString()}, needs ${params.amount.toString()}`,
      );
    }

    const height = this.clock.height();
    const createdAt = this.clock.now();
    const swapId = deriveSwapId({
      hashLock: params.hashLock,
      sender: params.sender,
      recipient: params.recipient,
      amount: params.amount,
      height,
      timestamp: createdAt,
    });
    if (this.swaps.has(swapId)) {
      throw new SwapError("DUPLICATE_SWAP", `Swap ${swapId} already exists`);
    }

    this.ledger.transfer(params.sender, this.custody, params.amount);

    const swap: SenderSwap = {
      swapId,
      hashLock: params.hashLock,
      timeLock: height + params.timeLockWindow,
      sender: params.sender,
      recipient: params.recipient,
      amount: params.amount,
      completed: false,
      refunded: false,
      createdAt,
      createdAtHeight: height,
      counterpartyLinked: false,
    };
    this.swaps.set(swapId, swap);
    return swap;
  }

  /**
   * Complete with the secret. Custody units are burned.
   */
  complete(swapId: SwapId, secret: Secret): SenderSwap {
    const swap = this.require(swapId);
    const label = `Swap ${swapId}`;
    assertTransition(label, swap, "completed");
    assertNotExpired(label, swap.timeLock, this.clock.height());
    if (!verifySecret(secret, swap.hashLock)) {
      throw new SwapError("INVALID_SECRET", `Secret does not match hash lock of ${label}`);
    }

    this.ledger.burn(this.custody, swap.amount);

    const updated: SenderSwap = { ...swap, completed: true };
    this.swaps.set(swapId, updated);
    return updated;
  }

  /**
   * Return custody units to the sender once the time lock has passed.
   */
  refund(caller: Address, swapId: SwapId): SenderSwap {
    const swap = this.require(swapId);
    const label = `Swap ${swapId}`;
    assertTransition(label, swap, "refunded");
    if (caller !== swap.sender) {
      throw new SwapError("UNAUTHORIZED", `Only the sender ${swap.sender} may refund ${label}`);
    }
    assertExpired(label, swap.timeLock, this.clock.height());

    this.ledger.transfer(this.custody, swap.sender, swap.amount);

    const updated: SenderSwap = { ...swap, refunded: true };
    this.swaps.set(swapId, updated);
    return updated;
  }

  /**
   * Mark the swap as cross-checked against a counterparty lock.
   */
  markLinked(swapId: SwapId): SenderSwap {
    const swap = this.require(swapId);
    const updated: SenderSwap = { ...swap, counterpartyLinked: true };
    this.swaps.set(swapId, updated);
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(swapId: SwapId): SenderSwap | undefined {
    return this.swaps.get(swapId);
  }

  require(swapId: SwapId): SenderSwap {
    const swap = this.swaps.get(swapId);
    if (swap === undefined) {
      throw new SwapError("NOT_FOUND", `Swap ${swapId} not found`);
    }
    return swap;
  }

  isExpired(swapId: SwapId): boolean {
    return this.clock.height() > this.require(swapId).timeLock;
  }

  /** Swaps still holding funds in custody. */
  listOpen(): readonly SenderSwap[] {
    return [...this.swaps.values()].filter((s) => statusOf(s) === "open");
  }

  get size(): number {
    return this.swaps.size;
  }
}
