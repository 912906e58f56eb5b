/**
 * Shared fixtures for relayer tests: two pools on independent clocks and
 * a logger that records lines in memory.
 */

import pino from "pino";
import type { Logger } from "pino";
import { ManualClock, RATE_PRECISION, SwapPool } from "@hashlock/pool";
import type { RelayerConfig } from "../src/types.js";

export const OWNER = "0x00000000000000000000000000000000000000a0";
export const RESPONDER = "0x00000000000000000000000000000000000000a1";
export const CUSTODY = "0x00000000000000000000000000000000000000c0";
export const ALICE = "0x00000000000000000000000000000000000000b1";
export const BOB = "0x00000000000000000000000000000000000000b2";
export const MALLORY = "0x00000000000000000000000000000000000000e0";

export const SECRET = `0x${"11".repeat(32)}`;
export const ONE = 10n ** 18n;

export const CONFIG: RelayerConfig = {
  responder: RESPONDER,
  defaultTimeLockWindow: 100,
  responderWindow: 40,
  safetyMargin: 5,
  minSwapAmount: ONE,
  maxSwapAmount: 1000n * ONE,
};

export function createPool(chainId: string, clock: ManualClock): SwapPool {
  return new SwapPool({
    chainId,
    name: "Bridge Token",
    symbol: "BRG",
    custody: CUSTODY,
    owner: OWNER,
    responder: RESPONDER,
    rate: 1000n * RATE_PRECISION,
    defaultTimeLockWindow: 100,
    clock,
  });
}

export interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

/** A pino logger writing parsed JSON lines into `lines`. */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(msg: string): void {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
