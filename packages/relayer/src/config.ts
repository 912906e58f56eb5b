/**
 * @hashlock/relayer — Configuration.
 *
 * Loads and validates relayer configuration from environment variables
 * using Zod, then converts token amounts into raw units.
 */

import { z } from "zod";
import { parseUnits } from "@hashlock/ledger";
import type { RelayerConfig } from "./types.js";
import { RelayerError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const DECIMAL = /^\d+(\.\d+)?$/;

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Identity
  RESPONDER_ADDRESS: z
    .string()
    .regex(/^0x[0-9a-fA-F]{40}$/, "RESPONDER_ADDRESS must be a 20-byte hex address"),

  // Windows, in blocks
  DEFAULT_TIME_LOCK_BLOCKS: z.coerce.number().int().min(1).default(100),
  RESPONDER_WINDOW_BLOCKS: z.coerce.number().int().min(1).default(50),
  SAFETY_MARGIN_BLOCKS: z.coerce.number().int().min(0).default(5),

  // Limits, in whole tokens
  MIN_SWAP_AMOUNT: z.string().regex(DECIMAL, "MIN_SWAP_AMOUNT must be a decimal").default("0"),
  MAX_SWAP_AMOUNT: z
    .string()
    .regex(DECIMAL, "MAX_SWAP_AMOUNT must be a decimal")
    .default("1000000"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(77).default(18),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Convert validated env config into relayer settings.
 *
 * The counterparty window must close before the sender's, so the
 * responder window plus the safety margin must be shorter than the
 * default sender window.
 */
export function toRelayerConfig(config: AppConfig): RelayerConfig {
  const minSwapAmount = parseUnits(config.MIN_SWAP_AMOUNT, config.TOKEN_DECIMALS);
  const maxSwapAmount = parseUnits(config.MAX_SWAP_AMOUNT, config.TOKEN_DECIMALS);

  if (minSwapAmount > maxSwapAmount) {
    throw new RelayerError(
      "INVALID_CONFIG",
      `MIN_SWAP_AMOUNT (${config.MIN_SWAP_AMOUNT}) exceeds MAX_SWAP_AMOUNT (${config.MAX_SWAP_AMOUNT})`,
    );
  }
  if (config.RESPONDER_WINDOW_BLOCKS + config.SAFETY_MARGIN_BLOCKS >= config.DEFAULT_TIME_LOCK_BLOCKS) {
    throw new RelayerError(
      "INVALID_CONFIG",
      `RESPONDER_WINDOW_BLOCKS + SAFETY_MARGIN_BLOCKS must be below DEFAULT_TIME_LOCK_BLOCKS ` +
        `(${config.RESPONDER_WINDOW_BLOCKS} + ${config.SAFETY_MARGIN_BLOCKS} >= ${config.DEFAULT_TIME_LOCK_BLOCKS})`,
    );
  }

  return {
    responder: `0x${config.RESPONDER_ADDRESS.slice(2).toLowerCase()}`,
    defaultTimeLockWindow: config.DEFAULT_TIME_LOCK_BLOCKS,
    responderWindow: config.RESPONDER_WINDOW_BLOCKS,
    safetyMargin: config.SAFETY_MARGIN_BLOCKS,
    minSwapAmount,
    maxSwapAmount,
  };
}
