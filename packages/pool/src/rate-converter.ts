/**
 * Rate Converter — native value ↔ ledger units.
 *
 * `rate` is ledger units per native unit, scaled by RATE_PRECISION, so
 * a rate of 1000 × 10^18 means one native unit buys 1000 ledger units.
 *
 * Rules:
 * - All arithmetic is bigint
 * - Both directions round toward zero
 * - A round trip never returns more native value than went in
 */

import { SwapError } from "./errors.js";

export const RATE_PRECISION = 10n ** 18n;

/**
 * floor(nativeAmount * rate / RATE_PRECISION)
 */
export function nativeToUnits(nativeAmount: bigint, rate: bigint): bigint {
  return (nativeAmount * rate) / RATE_PRECISION;
}

/**
 * floor(units * RATE_PRECISION / rate)
 */
export function unitsToNative(units: bigint, rate: bigint): bigint {
  return (units * RATE_PRECISION) / rate;
}

export class RateConverter {
  private _rate: bigint;

  constructor(rate: bigint) {
    this._rate = RateConverter.validate(rate);
  }

  get rate(): bigint {
    return this._rate;
  }

  toUnits(nativeAmount: bigint): bigint {
    return nativeToUnits(nativeAmount, this._rate);
  }

  toNative(units: bigint): bigint {
    return unitsToNative(units, this._rate);
  }

  /**
   * Replace the rate and return the previous one.
   */
  setRate(rate: bigint): bigint {
    const previous = this._rate;
    this._rate = RateConverter.validate(rate);
    return previous;
  }

  private static validate(rate: bigint): bigint {
    if (typeof rate !== "bigint" || rate <= 0n) {
      throw new SwapError("INVALID_ARGUMENT", `rate must be a positive integer, got ${String(rate)}`);
    }
    return rate;
  }
}
