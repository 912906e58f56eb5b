/**
 * Tests for config.ts — loadConfig + toRelayerConfig, and createLogger.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { LedgerError } from "@hashlock/ledger";
import { loadConfig, toRelayerConfig } from "../src/config.js";
import { createLogger } from "../src/logger.js";
import { RelayerError } from "../src/types.js";

const ADDRESS = "0x00000000000000000000000000000000000000A1";

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ RESPONDER_ADDRESS: ADDRESS });

    expect(config).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      RESPONDER_ADDRESS: ADDRESS,
      DEFAULT_TIME_LOCK_BLOCKS: 100,
      RESPONDER_WINDOW_BLOCKS: 50,
      SAFETY_MARGIN_BLOCKS: 5,
      MIN_SWAP_AMOUNT: "0",
      MAX_SWAP_AMOUNT: "1000000",
      TOKEN_DECIMALS: 18,
    });
  });

  it("coerces numeric strings", () => {
    const config = loadConfig({
      RESPONDER_ADDRESS: ADDRESS,
      DEFAULT_TIME_LOCK_BLOCKS: "240",
      SAFETY_MARGIN_BLOCKS: "0",
      TOKEN_DECIMALS: "6",
    });

    expect(config.DEFAULT_TIME_LOCK_BLOCKS).toBe(240);
    expect(config.SAFETY_MARGIN_BLOCKS).toBe(0);
    expect(config.TOKEN_DECIMALS).toBe(6);
  });

  it("requires a responder address", () => {
    expect(() => loadConfig({})).toThrow(ZodError);
    expect(() => loadConfig({ RESPONDER_ADDRESS: "0x1234" })).toThrow(ZodError);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ RESPONDER_ADDRESS: ADDRESS, LOG_LEVEL: "loud" })).toThrow(ZodError);
    expect(() => loadConfig({ RESPONDER_ADDRESS: ADDRESS, RESPONDER_WINDOW_BLOCKS: "0" })).toThrow(
      ZodError,
    );
    expect(() => loadConfig({ RESPONDER_ADDRESS: ADDRESS, MAX_SWAP_AMOUNT: "-5" })).toThrow(ZodError);
  });
});

// =============================================================================
// toRelayerConfig
// =============================================================================

describe("toRelayerConfig", () => {
  it("converts token amounts to raw units and lowercases the responder", () => {
    const config = toRelayerConfig(
      loadConfig({
        RESPONDER_ADDRESS: ADDRESS,
        MIN_SWAP_AMOUNT: "0.5",
        MAX_SWAP_AMOUNT: "250",
        TOKEN_DECIMALS: "6",
      }),
    );

    expect(config).toEqual({
      responder: "0x00000000000000000000000000000000000000a1",
      defaultTimeLockWindow: 100,
      responderWindow: 50,
      safetyMargin: 5,
      minSwapAmount: 500_000n,
      maxSwapAmount: 250_000_000n,
    });
  });

  it("rejects a minimum above the maximum", () => {
    const env = loadConfig({ RESPONDER_ADDRESS: ADDRESS, MIN_SWAP_AMOUNT: "10", MAX_SWAP_AMOUNT: "1" });

    expect(() => toRelayerConfig(env)).toThrow(RelayerError);
    expect(() => toRelayerConfig(env)).toThrow("MIN_SWAP_AMOUNT (10) exceeds MAX_SWAP_AMOUNT (1)");
  });

  it("rejects a responder window that does not close before the sender's", () => {
    const env = loadConfig({
      RESPONDER_ADDRESS: ADDRESS,
      DEFAULT_TIME_LOCK_BLOCKS: "60",
      RESPONDER_WINDOW_BLOCKS: "55",
    });

    expect(() => toRelayerConfig(env)).toThrow("must be below DEFAULT_TIME_LOCK_BLOCKS (55 + 5 >= 60)");
  });

  it("rejects more fractional digits than the token has", () => {
    const env = loadConfig({ RESPONDER_ADDRESS: ADDRESS, MIN_SWAP_AMOUNT: "0.001", TOKEN_DECIMALS: "2" });

    expect(() => toRelayerConfig(env)).toThrow(LedgerError);
  });
});

// =============================================================================
// createLogger
// =============================================================================

describe("createLogger", () => {
  it("uses the configured level", () => {
    const logger = createLogger({ LOG_LEVEL: "warn", NODE_ENV: "production" });

    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
  });
});
