import assert from "node:assert/strict";
import test from "node:test";
import { createDisabledCache, createMemoryCache } from "../cache/cache";
import { AssessmentCancelledError } from "../errors";
import { createLogger } from "../logger";
import { sleep } from "../retry";
import { NOW, sampleGraph, testConfig } from "../testing/fixtures";
import type { SignalName, SignalResult } from "../types";
import { evaluateTier1, smoothedTestRatio } from "./tier1";

function deps(overrides: Partial<Parameters<typeof evaluateTier1>[0]> = {}) {
  return {
    graph: sampleGraph(),
    cache: createMemoryCache<SignalResult>(),
    config: testConfig(),
    now: () => NOW,
    ...overrides,
  };
}

test("a loosely coupled, well tested file stays LOW without escalation", async () => {
  const result = await evaluateTier1(deps(), "src/low.ts");
  assert.equal(result.risk_level, "LOW");
  assert.equal(result.escalate, false);
  assert.deepEqual(result.values, { coupling: 3, max_co_change_frequency: 0.1, test_ratio: 0.9 });

  const coupling = result.signals.coupling;
  assert.equal(coupling.status, "ok");
  if (coupling.status === "ok") {
    assert.equal(coupling.result.evidence_text, "File is connected to 3 other files (LOW coupling)");
    assert.equal(coupling.result.signal_level, "LOW");
    assert.equal(coupling.result.computed_at, NOW.toISOString());
    assert.equal(coupling.cache_hit, false);
  }
  const coChange = result.signals.co_change;
  assert.equal(coChange.status === "ok" && coChange.result.evidence_text, "Co-changes with lib/a.ts in 10% of commits (LOW)");
});

test("a hot file escalates with HIGH levels on all three signals", async () => {
  const result = await evaluateTier1(deps(), "src/hot.ts");
  assert.equal(result.risk_level, "HIGH");
  assert.equal(result.escalate, true);
  assert.deepEqual(result.values, { coupling: 15, max_co_change_frequency: 0.8, test_ratio: 0.2 });
  for (const outcome of Object.values(result.signals)) {
    assert.equal(outcome.status === "ok" && outcome.result.signal_level, "HIGH");
  }
  const partners = result.signals.co_change.status === "ok" ? result.signals.co_change.result.details?.partners : null;
  assert.deepEqual(partners, [{ file: "src/hot-config.ts", frequency: 0.8 }]);
});

test("identical inputs give identical escalation decisions", async () => {
  const first = await evaluateTier1(deps(), "src/hot.ts");
  const second = await evaluateTier1(deps(), "src/hot.ts");
  assert.deepEqual(second.values, first.values);
  assert.equal(second.escalate, first.escalate);
});

test("results are the same with the cache disabled", async () => {
  const cache = createMemoryCache<SignalResult>();
  const warm = deps({ cache });
  await evaluateTier1(warm, "src/hot.ts");
  const cached = await evaluateTier1(warm, "src/hot.ts");
  const uncached = await evaluateTier1(deps({ cache: createDisabledCache<SignalResult>() }), "src/hot.ts");

  assert.equal(cached.signals.coupling.status === "ok" && cached.signals.coupling.cache_hit, true);
  assert.equal(uncached.signals.coupling.status === "ok" && uncached.signals.coupling.cache_hit, false);
  assert.deepEqual(uncached.values, cached.values);
  assert.equal(uncached.escalate, cached.escalate);
  assert.equal(uncached.risk_level, cached.risk_level);
});

test("a signal that overruns its timeout is unknown and does not escalate", async () => {
  const graph = sampleGraph();
  const logger = createLogger("run-tier1");
  const result = await evaluateTier1(
    deps({
      logger,
      graph: {
        ...graph,
        coupling: async (file) => {
          await sleep(120);
          return graph.coupling(file);
        },
      },
    }),
    "src/low.ts",
  );
  assert.deepEqual(result.signals.coupling, { status: "unknown", reason: "signal coupling timed out after 50ms" });
  assert.deepEqual(result.values, { max_co_change_frequency: 0.1, test_ratio: 0.9 });
  assert.equal(result.escalate, false);
  assert.ok(logger.getEvents().some((event) => event.event === "SIGNAL_TIMEOUT" && event.data?.signal === "coupling"));
});

test("disabled signals are skipped as absent evidence", async () => {
  const gate = {
    isEnabled: async (name: SignalName) => name !== "test_ratio",
    falsePositiveRate: async (name: SignalName) => (name === "coupling" ? 0.02 : 0),
  };
  const result = await evaluateTier1(deps({ gate }), "src/hot.ts");
  assert.deepEqual(result.signals.test_ratio, { status: "disabled" });
  assert.equal(result.values.test_ratio, undefined);
  assert.equal(result.escalate, true);
  assert.equal(result.signals.coupling.status === "ok" && result.signals.coupling.result.false_positive_rate, 0.02);
});

test("cancellation aborts the baseline evaluation", async () => {
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(evaluateTier1(deps(), "src/hot.ts", { signal: controller.signal }), AssessmentCancelledError);
});

test("smoothedTestRatio treats a file without any lines as uncovered", () => {
  assert.equal(smoothedTestRatio(0, 0), 0);
  assert.equal(smoothedTestRatio(99, 19), 0.2);
  assert.equal(smoothedTestRatio(0, 10), 11);
});
