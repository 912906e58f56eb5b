/**
 * Colocated completion.
 *
 * When both pools run in one process, a swap and its counterparty lock
 * can be completed together. The target lock is checked before the
 * sender swap is touched so a failure leaves both pools unchanged.
 * Demo and test convenience only; across real ledgers the relayer does
 * this work.
 */

import type { CounterpartyLock, SenderSwap, SwapPool } from "@hashlock/pool";
import { SwapError, toBytes32 } from "@hashlock/pool";

export interface ColocatedResult {
  readonly swap: SenderSwap;
  readonly lock: CounterpartyLock;
}

export function completeColocated(
  source: SwapPool,
  target: SwapPool,
  caller: string,
  swapId: string,
  secret: string,
): ColocatedResult {
  const id = toBytes32(swapId, "swapId");
  const pending = source.getSwap(id);
  if (pending === undefined) {
    throw new SwapError("NOT_FOUND", `Swap ${id} not found on ${source.chainId}`);
  }

  const lock = target.getLock(pending.hashLock);
  if (lock === undefined) {
    throw new SwapError("NOT_FOUND", `Lock ${pending.hashLock} not found on ${target.chainId}`);
  }
  if (lock.completed || lock.refunded) {
    throw new SwapError("ALREADY_FINAL", `Lock ${lock.hashLock} on ${target.chainId} is already final`);
  }
  if (target.isLockExpired(lock.hashLock)) {
    throw new SwapError("EXPIRED", `Lock ${lock.hashLock} on ${target.chainId} has expired`);
  }
  if (target.paused) {
    throw new SwapError("PAUSED", `${target.chainId} is paused`);
  }

  const swap = source.complete(caller, id, secret);
  return { swap, lock: target.completeLock(caller, swap.hashLock, secret) };
}
