/**
 * @hashlock/ledger — Decimal unit conversions.
 *
 * Balances are raw integer units. Humans and configuration files speak
 * in decimal strings ("1.5" tokens with 18 decimals). These helpers
 * convert between the two without floating point.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 * - Fractional digits beyond `decimals` are rejected, never rounded
 */

import { LedgerError } from "./types.js";

/**
 * Parse a decimal string into raw units scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "1" with decimals=18 → 1000000000000000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseUnits(amount: string, decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new LedgerError("INVALID_AMOUNT", `Decimals must be a non-negative integer, got: ${String(decimals)}`);
  }

  const trimmed = amount.trim();
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert raw units back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 0n with decimals=0 → "0"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatUnits(value: bigint, decimals: number): string {
  if (decimals === 0) {
    return value.toString();
  }

  const negative = value < 0n;
  const abs = negative ? -value : value;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}
