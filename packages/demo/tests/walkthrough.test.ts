/**
 * Runs the demo scenarios end to end with a recording reporter.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import type { RelayerConfig } from "@hashlock/relayer";
import { RESPONDER, TOTAL_STEPS, runWalkthrough } from "../src/walkthrough.js";
import type { Reporter } from "../src/walkthrough.js";

const ONE = 10n ** 18n;

const CONFIG: RelayerConfig = {
  responder: RESPONDER,
  defaultTimeLockWindow: 100,
  responderWindow: 50,
  safetyMargin: 5,
  minSwapAmount: 0n,
  maxSwapAmount: 1_000_000n * ONE,
};

function recorder(): { reporter: Reporter; steps: string[]; warnings: string[] } {
  const steps: string[] = [];
  const warnings: string[] = [];
  return {
    steps,
    warnings,
    reporter: {
      step: (title) => steps.push(title),
      ok: () => undefined,
      info: () => undefined,
      hash: () => undefined,
      warn: (msg) => warnings.push(msg),
    },
  };
}

function counterSecrets(): () => string {
  let n = 0;
  return () => {
    n++;
    return `0x${n.toString(16).padStart(64, "0")}`;
  };
}

describe("runWalkthrough", () => {
  it("settles, refunds and completes colocated with supply conserved", async () => {
    const { reporter, steps, warnings } = recorder();

    const result = await runWalkthrough({
      reporter,
      logger: pino({ level: "silent" }),
      config: CONFIG,
      secrets: counterSecrets(),
    });

    expect(steps).toHaveLength(TOTAL_STEPS);
    expect(warnings).toEqual([]);
    expect(result.outcomes.map((o) => o.kind)).toEqual(["responded", "completed", "responded"]);
    expect(result.balances).toEqual({
      aliceOnA: 700n * ONE,
      bobOnA: 0n,
      bobOnB: 300n * ONE,
    });
    expect(result.audit.verdict).toBe("PASS");
    expect(result.audit.aggregateSupply).toBe(1000n * ONE);
    expect(result.aggregateHolds).toBe(true);
    expect(result.events).toEqual({ ledgerA: 9, ledgerB: 6 });
    expect(result.integrity).toBe(true);
  });
});
