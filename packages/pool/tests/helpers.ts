/**
 * Shared fixtures for pool tests.
 */

import { expect } from "vitest";
import { ManualClock } from "../src/chain-clock.js";
import { SwapError } from "../src/errors.js";
import type { SwapErrorCode } from "../src/errors.js";
import { RATE_PRECISION } from "../src/rate-converter.js";
import { SwapPool } from "../src/swap-pool.js";
import type { SwapPoolOptions } from "../src/types.js";

export const OWNER = "0x00000000000000000000000000000000000000a0";
export const RESPONDER = "0x00000000000000000000000000000000000000a1";
export const CUSTODY = "0x00000000000000000000000000000000000000c0";
export const ALICE = "0x00000000000000000000000000000000000000b1";
export const BOB = "0x00000000000000000000000000000000000000b2";
export const MALLORY = "0x00000000000000000000000000000000000000e0";

export const SECRET = `0x${"11".repeat(32)}`;
export const WRONG_SECRET = `0x${"22".repeat(32)}`;

/** 1000 ledger units per native unit */
export const RATE = 1000n * RATE_PRECISION;

/** One whole token / native unit at 18 decimals */
export const ONE = 10n ** 18n;

export function createPool(
  clock: ManualClock,
  overrides: Partial<SwapPoolOptions> = {},
): SwapPool {
  return new SwapPool({
    chainId: "ledger-a",
    name: "Bridge Token",
    symbol: "BRG",
    custody: CUSTODY,
    owner: OWNER,
    responder: RESPONDER,
    rate: RATE,
    defaultTimeLockWindow: 100,
    clock,
    ...overrides,
  });
}

/**
 * Run `fn`, assert it throws a SwapError with `code`, and return it.
 */
export function expectSwapError(fn: () => unknown, code: SwapErrorCode): SwapError {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(SwapError);
    if (err instanceof SwapError) {
      expect(err.code).toBe(code);
      return err;
    }
  }
  throw new Error(`Expected SwapError ${code}, but nothing was thrown`);
}
