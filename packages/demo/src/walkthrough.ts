/**
 * The demo scenarios, independent of how they are printed.
 *
 * Two pools on independent clocks, a relayer from ledger A to ledger B,
 * and three transfers: one settled through the relayer, one that times
 * out and is refunded on both sides, and one completed colocated.
 */

import type { Logger } from "pino";
import { ManualClock, RATE_PRECISION, SwapPool, generateSecret, hashSecret } from "@hashlock/pool";
import { formatUnits } from "@hashlock/ledger";
import { Relayer, auditSupply, checkAggregateSupply } from "@hashlock/relayer";
import type { RelayOutcome, RelayerConfig, SupplyAuditResult } from "@hashlock/relayer";
import { completeColocated } from "./colocated.js";

// =============================================================================
// Actors
// =============================================================================

export const OWNER = "0x00000000000000000000000000000000000000a0";
export const RESPONDER = "0x00000000000000000000000000000000000000a1";
export const CUSTODY = "0x00000000000000000000000000000000000000c0";
export const ALICE = "0x00000000000000000000000000000000000000b1";
export const BOB = "0x00000000000000000000000000000000000000b2";

const DECIMALS = 18;
const ONE = 10n ** BigInt(DECIMALS);

// =============================================================================
// Reporting
// =============================================================================

export interface Reporter {
  step(title: string): void;
  ok(msg: string): void;
  info(label: string, value: string): void;
  hash(label: string, value: string): void;
  warn(msg: string): void;
}

export interface WalkthroughOptions {
  readonly reporter: Reporter;
  readonly logger: Logger;
  readonly config: RelayerConfig;
  /** Called between steps. */
  readonly pause?: () => Promise<void>;
  /** Secret source. Default: generateSecret */
  readonly secrets?: () => string;
}

export interface WalkthroughResult {
  readonly outcomes: readonly RelayOutcome[];
  readonly audit: SupplyAuditResult;
  readonly aggregateHolds: boolean;
  readonly balances: {
    readonly aliceOnA: bigint;
    readonly bobOnA: bigint;
    readonly bobOnB: bigint;
  };
  readonly events: { readonly ledgerA: number; readonly ledgerB: number };
  readonly integrity: boolean;
}

export const TOTAL_STEPS = 7;

// =============================================================================
// Scenarios
// =============================================================================

export async function runWalkthrough(options: WalkthroughOptions): Promise<WalkthroughResult> {
  const { reporter: out, logger, config } = options;
  const pause = options.pause ?? (() => Promise.resolve());
  const nextSecret = options.secrets ?? generateSecret;
  const fmt = (units: bigint): string => `${formatUnits(units, DECIMALS)} BRG`;

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  out.step("Boot");
  const clockA = new ManualClock({ height: 1_000 });
  const clockB = new ManualClock({ height: 5_000 });
  const pool = (chainId: string, clock: ManualClock): SwapPool =>
    new SwapPool({
      chainId,
      name: "Bridge Token",
      symbol: "BRG",
      decimals: DECIMALS,
      custody: CUSTODY,
      owner: OWNER,
      responder: config.responder,
      rate: 1000n * RATE_PRECISION,
      defaultTimeLockWindow: config.defaultTimeLockWindow,
      clock,
    });
  const ledgerA = pool("ledger-a", clockA);
  const ledgerB = pool("ledger-b", clockB);
  out.ok(`Ledger A at height ${clockA.height()}, ledger B at height ${clockB.height()}`);

  const relayer = new Relayer({ source: ledgerA, target: ledgerB, config, logger });
  relayer.start();
  out.ok(`Relayer A → B started (window ${config.responderWindow}, margin ${config.safetyMargin})`);
  await pause();

  // ─── Step 2: Deposit ────────────────────────────────────────────────

  out.step("Deposit");
  const deposit = ledgerA.depositNativeForUnits(ALICE, ONE);
  out.info("native in", formatUnits(deposit.nativeAmount, DECIMALS));
  out.info("units out", fmt(deposit.units));
  out.ok(`Alice holds ${fmt(ledgerA.balanceOf(ALICE))} on ledger A`);
  const startingSupply = ledgerA.totalSupply + ledgerB.totalSupply;
  await pause();

  // ─── Step 3: Lock ───────────────────────────────────────────────────

  out.step("Initiate Swap");
  const secret = nextSecret();
  const swap = ledgerA.initiate(ALICE, hashSecret(secret), BOB, 250n * ONE);
  out.hash("swap id", swap.swapId);
  out.hash("hash lock", swap.hashLock);
  out.info("expires at", `ledger A height ${swap.timeLock}`);
  const lock = ledgerB.getLock(swap.hashLock);
  if (lock !== undefined) {
    out.ok(`Relayer locked ${fmt(lock.amount)} for Bob on B until height ${lock.timeLock}`);
  } else {
    out.warn("Relayer did not respond");
  }
  await pause();

  // ─── Step 4: Reveal ─────────────────────────────────────────────────

  out.step("Reveal Secret");
  clockA.advance(3);
  clockB.advance(3);
  ledgerA.complete(ALICE, swap.swapId, secret);
  out.ok("Secret revealed on ledger A");
  out.ok(`Bob holds ${fmt(ledgerB.balanceOf(BOB))} on ledger B`);
  await pause();

  // ─── Step 5: Timeout ────────────────────────────────────────────────

  out.step("Timeout & Refund");
  const abandoned = ledgerA.initiate(ALICE, hashSecret(nextSecret()), BOB, 100n * ONE);
  const abandonedLock = ledgerB.getLock(abandoned.hashLock);
  out.info("sender expiry", `A@${abandoned.timeLock}`);
  if (abandonedLock !== undefined) {
    out.info("lock expiry", `B@${abandonedLock.timeLock}`);
    clockB.advanceTo(abandonedLock.timeLock + 1);
    ledgerB.refundLock(config.responder, abandonedLock.hashLock);
    out.ok("Responder refunded the counterparty lock first");
  }
  clockA.advanceTo(abandoned.timeLock + 1);
  ledgerA.refund(ALICE, abandoned.swapId);
  out.ok(`Alice refunded; she holds ${fmt(ledgerA.balanceOf(ALICE))} on A`);
  await pause();

  // ─── Step 6: Colocated ──────────────────────────────────────────────

  out.step("Colocated Completion");
  relayer.stop();
  const colocatedSecret = nextSecret();
  const direct = ledgerA.initiate(ALICE, hashSecret(colocatedSecret), BOB, 50n * ONE, 20);
  ledgerB.respond(config.responder, direct.hashLock, BOB, direct.amount, 10);
  completeColocated(ledgerA, ledgerB, BOB, direct.swapId, colocatedSecret);
  out.ok("Swap and lock completed in one call");
  await pause();

  // ─── Step 7: Audit ──────────────────────────────────────────────────

  out.step("Audit");
  const audit = auditSupply([ledgerA, ledgerB]);
  const aggregate = checkAggregateSupply([ledgerA, ledgerB], startingSupply);
  const integrityA = ledgerA.events.verifyIntegrity();
  const integrityB = ledgerB.events.verifyIntegrity();
  for (const ledger of audit.ledgers) {
    out.info(ledger.chainId, `supply ${fmt(ledger.totalSupply)}, custody ${fmt(ledger.custodyBalance)}`);
  }
  out.info("aggregate", fmt(audit.aggregateSupply));
  if (audit.verdict === "PASS" && aggregate.holds) {
    out.ok("Supply conserved on each ledger and across both");
  } else {
    for (const check of [...audit.checks, aggregate]) {
      for (const v of check.violations) out.warn(v);
    }
  }
  if (integrityA.valid && integrityB.valid) {
    out.ok(`Event logs intact (${ledgerA.events.globalPosition()} + ${ledgerB.events.globalPosition()} events)`);
  } else {
    out.warn("Event log integrity check failed");
  }

  return {
    outcomes: relayer.outcomes,
    audit,
    aggregateHolds: aggregate.holds,
    balances: {
      aliceOnA: ledgerA.balanceOf(ALICE),
      bobOnA: ledgerA.balanceOf(BOB),
      bobOnB: ledgerB.balanceOf(BOB),
    },
    events: { ledgerA: ledgerA.events.globalPosition(), ledgerB: ledgerB.events.globalPosition() },
    integrity: integrityA.valid && integrityB.valid,
  };
}
