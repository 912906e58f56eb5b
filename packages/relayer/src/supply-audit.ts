/**
 * @hashlock/relayer — Supply audit.
 *
 * Structural checks over a set of pools, one per ledger:
 * - Per-ledger conservation (totalSupply == sum of balances)
 * - Custody backing (custody balance == open swaps + open locks)
 * - Aggregate supply across ledgers
 *
 * Pure reads. Each check returns pass/fail with evidence.
 */

import type { SwapPool } from "@hashlock/pool";

// =============================================================================
// Types
// =============================================================================

export interface LedgerSupplyReport {
  readonly chainId: string;
  readonly symbol: string;
  readonly totalSupply: bigint;
  readonly sumOfBalances: bigint;
  readonly nativeReserve: bigint;
  readonly openSwaps: number;
  readonly lockedInSwaps: bigint;
  readonly openLocks: number;
  readonly lockedInLocks: bigint;
  readonly custodyBalance: bigint;
}

export interface SupplyCheckResult {
  /** Name of the invariant */
  readonly invariant: string;
  readonly holds: boolean;
  /** Evidence of violations (empty if holds) */
  readonly violations: readonly string[];
}

export interface SupplyAuditResult {
  readonly verdict: "PASS" | "FAIL";
  readonly ledgers: readonly LedgerSupplyReport[];
  readonly aggregateSupply: bigint;
  readonly checks: readonly SupplyCheckResult[];
  readonly totalViolations: number;
  /** ISO 8601 timestamp */
  readonly auditedAt: string;
}

// =============================================================================
// Individual Checks
// =============================================================================

export function reportLedger(pool: SwapPool): LedgerSupplyReport {
  const conservation = pool.verifyConservation();
  const exposure = pool.openExposure();
  return {
    chainId: pool.chainId,
    symbol: pool.symbol,
    totalSupply: conservation.totalSupply,
    sumOfBalances: conservation.sumOfBalances,
    nativeReserve: pool.nativeReserve,
    openSwaps: exposure.openSwaps,
    lockedInSwaps: exposure.lockedInSwaps,
    openLocks: exposure.openLocks,
    lockedInLocks: exposure.lockedInLocks,
    custodyBalance: exposure.custodyBalance,
  };
}

export function checkConservation(reports: readonly LedgerSupplyReport[]): SupplyCheckResult {
  const violations = reports
    .filter((r) => r.totalSupply !== r.sumOfBalances)
    .map(
      (r) =>
        `Conservation violation on ${r.chainId}: ` +
        `totalSupply=${r.totalSupply.toString()}, sumOfBalances=${r.sumOfBalances.toString()}`,
    );
  return { invariant: "ledger_conservation", holds: violations.length === 0, violations };
}

export function checkCustodyBacking(reports: readonly LedgerSupplyReport[]): SupplyCheckResult {
  const violations = reports
    .filter((r) => r.custodyBalance !== r.lockedInSwaps + r.lockedInLocks)
    .map(
      (r) =>
        `Custody mismatch on ${r.chainId}: custody=${r.custodyBalance.toString()}, ` +
        `openSwaps=${r.lockedInSwaps.toString()}, openLocks=${r.lockedInLocks.toString()}`,
    );
  return { invariant: "custody_backing", holds: violations.length === 0, violations };
}

/**
 * Check that supply summed over every ledger equals `expected`.
 *
 * While a transfer is in flight the counterparty lock adds its amount
 * on the target ledger; once it settles or refunds the sum returns.
 */
export function checkAggregateSupply(
  pools: readonly SwapPool[],
  expected: bigint,
): SupplyCheckResult {
  const actual = pools.reduce((sum, p) => sum + p.totalSupply, 0n);
  const violations =
    actual === expected
      ? []
      : [
          `Aggregate supply ${actual.toString()} across ${pools.length} ledgers, ` +
            `expected ${expected.toString()}, delta=${(actual - expected).toString()}`,
        ];
  return { invariant: "aggregate_supply", holds: violations.length === 0, violations };
}

// =============================================================================
// Combined Audit
// =============================================================================

export function auditSupply(
  pools: readonly SwapPool[],
  now: () => string = () => new Date().toISOString(),
): SupplyAuditResult {
  const ledgers = pools.map(reportLedger);
  const checks = [checkConservation(ledgers), checkCustodyBacking(ledgers)];
  const totalViolations = checks.reduce((sum, c) => sum + c.violations.length, 0);

  return {
    verdict: totalViolations === 0 ? "PASS" : "FAIL",
    ledgers,
    aggregateSupply: ledgers.reduce((sum, r) => sum + r.totalSupply, 0n),
    checks,
    totalViolations,
    auditedAt: now(),
  };
}
