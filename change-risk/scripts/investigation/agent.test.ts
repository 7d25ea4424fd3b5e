import assert from "node:assert/strict";
import test from "node:test";
import { createMemoryCache } from "../cache/cache";
import { withDefaults, type RiskConfig } from "../config";
import { ReasoningMalformedResponseError } from "../errors";
import { createLogger } from "../logger";
import type { Decision } from "../reasoning/schemas";
import type { ReasoningService } from "../reasoning/service";
import { createBm25Index, incidentDocument } from "../search/bm25";
import { evaluateTier1 } from "../signals/tier1";
import { NOW, sampleGraph, testConfig } from "../testing/fixtures";
import type { SignalResult, Synthesis } from "../types";
import { investigateFile } from "./agent";
import { createBudgetManager } from "./budget";

type Step<T> = T | Error | "hang";

function hang(signal?: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

function after<T>(ms: number, value: T, signal?: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(value), ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true },
    );
  });
}

function slow(delayMs: number, decisions: Decision[]) {
  const calls: string[] = [];
  const service: ReasoningService = {
    model: "slow",
    decide(request, options) {
      calls.push(`decide:${request.hop}`);
      const next = decisions.shift();
      return next ? after(delayMs, next, options.signal) : Promise.reject(new Error("script exhausted"));
    },
    synthesize(request, options) {
      calls.push(`synthesize:${request.hops}`);
      return after(delayMs, REPORT, options.signal);
    },
  };
  return { service, calls };
}

function scripted(decisions: Array<Step<Decision>>, syntheses: Array<Step<Synthesis>>) {
  const calls: Array<{ role: string; hop: number; strict: boolean }> = [];
  const play = <T>(steps: Array<Step<T>>, signal?: AbortSignal): Promise<T> => {
    const step = steps.shift();
    if (step === undefined) return Promise.reject(new Error("script exhausted"));
    if (step === "hang") return hang(signal);
    if (step instanceof Error) return Promise.reject(step);
    return Promise.resolve(step);
  };
  const service: ReasoningService = {
    model: "scripted",
    decide(request, options) {
      calls.push({ role: "decide", hop: request.hop, strict: options.strict });
      return play(decisions, options.signal);
    },
    synthesize(request, options) {
      calls.push({ role: "synthesize", hop: request.hops, strict: options.strict });
      return play(syntheses, options.signal);
    },
  };
  return { service, calls };
}

const REPORT: Synthesis = {
  risk_level: "HIGH",
  confidence: 0.8,
  key_evidence: ["owner changed 9 days ago"],
  recommendations: ["Ask alice to review"],
  reasoning_text: "Recent owner change on a hot file.",
};

async function setup(service: ReasoningService, config: RiskConfig = testConfig()) {
  config.investigation.callTimeoutMs = 20;
  const graph = sampleGraph();
  const cache = createMemoryCache<SignalResult>();
  const incidents = await graph.listIncidents();
  const logger = createLogger("run-test", { now: () => NOW });
  const tier1 = await evaluateTier1({ graph, cache, config, now: () => NOW }, "src/hot.ts");
  const deps = {
    graph,
    cache,
    search: createBm25Index(incidents.map(incidentDocument)),
    config,
    logger,
    now: () => NOW,
    reasoning: service,
    budget: createBudgetManager(config.investigation, logger, "run-test"),
  };
  return { deps, tier1, logger };
}

test("gathers Tier-2 signals then synthesizes with the model's confidence", async () => {
  const { service, calls } = scripted(
    [
      { action: "CALCULATE_SIGNAL", target: "ownership_churn", reasoning: "who owns this" },
      { action: "CALCULATE_SIGNAL", target: "incident_similarity", reasoning: "past incidents" },
      { action: "FINALIZE", reasoning: "enough" },
    ],
    [REPORT],
  );
  const { deps, tier1 } = await setup(service);
  const result = await investigateFile(deps, { file: "src/hot.ts", changedFiles: ["src/hot.ts"], tier1 });

  assert.equal(result.trace.hops, 3);
  assert.equal(result.trace.stop_reason, "finalize_requested");
  assert.equal(result.trace.synthesis_source, "reasoning");
  assert.equal(result.synthesis.risk_level, "HIGH");
  assert.equal(result.synthesis.confidence, 0.8);
  assert.deepEqual(
    result.signals.map((signal) => signal.name),
    ["ownership_churn", "incident_similarity"],
  );
  assert.deepEqual(
    result.evidence_chain.map((item) => item.kind),
    ["tier1_signal", "tier1_signal", "tier1_signal", "context", "decision", "tier2_signal", "decision", "tier2_signal", "decision"],
  );
  assert.equal(result.evidence_chain[8].id, "E-009");
  assert.equal(result.trace.decisions.every((decision) => !decision.overridden), true);
  assert.deepEqual(
    calls.map((call) => `${call.role}:${call.hop}`),
    ["decide:1", "decide:2", "decide:3", "synthesize:3"],
  );
});

test("the third hop is forced to FINALIZE", async () => {
  const { service, calls } = scripted(
    [
      { action: "EXPAND_CONTEXT", reasoning: "look around" },
      { action: "CALCULATE_SIGNAL", target: "ownership_churn", reasoning: "owner" },
      { action: "CALCULATE_SIGNAL", target: "incident_similarity", reasoning: "one more" },
    ],
    [REPORT],
  );
  const { deps, tier1 } = await setup(service);
  const result = await investigateFile(deps, { file: "src/hot.ts", changedFiles: ["src/hot.ts"], tier1 });

  assert.equal(result.trace.hops, 3);
  assert.equal(result.trace.stop_reason, "hop_limit");
  assert.equal(result.trace.expanded, true);
  assert.equal(result.trace.context_nodes, 17);
  assert.deepEqual(
    result.signals.map((signal) => signal.name),
    ["ownership_churn"],
  );
  assert.deepEqual(result.trace.decisions[2], {
    hop: 3,
    action: "FINALIZE",
    requested: { action: "CALCULATE_SIGNAL", target: "incident_similarity" },
    reasoning: "one more",
    overridden: true,
  });
  assert.equal(calls.filter((call) => call.role === "decide").length, 3);
});

test("a second expansion request finalizes instead of looping", async () => {
  const { service } = scripted(
    [
      { action: "EXPAND_CONTEXT", reasoning: "look around" },
      { action: "EXPAND_CONTEXT", reasoning: "look further" },
    ],
    [REPORT],
  );
  const { deps, tier1 } = await setup(service);
  const result = await investigateFile(deps, { file: "src/hot.ts", changedFiles: ["src/hot.ts"], tier1 });

  assert.equal(result.trace.hops, 2);
  assert.equal(result.trace.stop_reason, "finalize_requested");
  assert.deepEqual(result.trace.decisions[1], {
    hop: 2,
    action: "FINALIZE",
    requested: { action: "EXPAND_CONTEXT" },
    reasoning: "look further",
    overridden: true,
  });
});

test("a signal that moves the combined level is recorded as a breakthrough", async () => {
  const config = withDefaults({
    cache: { backend: "memory" },
    validation: { storePath: null },
    thresholds: { coupling: { medium: 20 }, testRatio: { low: 0.15, medium: 0.1 } },
  });
  const { service } = scripted(
    [
      { action: "CALCULATE_SIGNAL", target: "ownership_churn", reasoning: "owner" },
      { action: "FINALIZE", reasoning: "done" },
    ],
    [REPORT],
  );
  const { deps, tier1 } = await setup(service, config);
  const result = await investigateFile(deps, { file: "src/hot.ts", changedFiles: ["src/hot.ts"], tier1 });

  assert.deepEqual(result.trace.breakthroughs, [
    { hop: 1, level_before: "MEDIUM", level_after: "HIGH", triggering_signal: "ownership_churn", is_escalation: true },
  ]);
});

test("reasoning timeouts on every call fall back to a zero-confidence heuristic", async () => {
  const { service } = scripted(["hang", "hang"], ["hang", "hang"]);
  const { deps, tier1, logger } = await setup(service);
  const result = await investigateFile(deps, { file: "src/hot.ts", changedFiles: ["src/hot.ts"], tier1 });

  assert.equal(result.trace.hops, 1);
  assert.equal(result.trace.stop_reason, "reasoning_timeout");
  assert.equal(result.trace.synthesis_source, "heuristic");
  assert.equal(result.synthesis.confidence, 0);
  assert.equal(result.synthesis.risk_level, "HIGH");
  assert.equal(
    result.synthesis.reasoning_text,
    "Heuristic assessment (reasoning synthesize call timed out after 20ms): 3 of 3 known signals are HIGH.",
  );
  assert.equal(logger.getEvents().filter((event) => event.event === "REASONING_TIMEOUT").length, 2);
});

test("a decision timeout caps the confidence of a later synthesis", async () => {
  const { service } = scripted(["hang"], [{ ...REPORT, confidence: 0.9 }]);
  const { deps, tier1 } = await setup(service);
  const result = await investigateFile(deps, { file: "src/hot.ts", changedFiles: ["src/hot.ts"], tier1 });

  assert.equal(result.trace.synthesis_source, "reasoning");
  assert.equal(result.synthesis.confidence, 0.3);
});

test("a malformed decision is retried once with the strict prompt", async () => {
  const { service, calls } = scripted(
    [new ReasoningMalformedResponseError("decide", "bad"), { action: "FINALIZE", reasoning: "fine" }],
    [REPORT],
  );
  const { deps, tier1 } = await setup(service);
  const result = await investigateFile(deps, { file: "src/hot.ts", changedFiles: ["src/hot.ts"], tier1 });

  assert.equal(result.trace.stop_reason, "finalize_requested");
  assert.deepEqual(
    calls.map((call) => `${call.role}:${call.strict}`),
    ["decide:false", "decide:true", "synthesize:false"],
  );
});

test("two malformed decisions stop the investigation", async () => {
  const bad = () => new ReasoningMalformedResponseError("decide", "bad");
  const { service } = scripted([bad(), bad()], [REPORT]);
  const { deps, tier1 } = await setup(service);
  const result = await investigateFile(deps, { file: "src/hot.ts", changedFiles: ["src/hot.ts"], tier1 });

  assert.equal(result.trace.stop_reason, "reasoning_malformed");
  assert.equal(result.synthesis.confidence, 0.3);
});

test("an exhausted call budget finalizes early without another model call", async () => {
  const config = testConfig();
  config.investigation.maxReasoningCallsPerRun = 1;
  const { service, calls } = scripted(
    [{ action: "CALCULATE_SIGNAL", target: "ownership_churn", reasoning: "owner" }],
    [REPORT],
  );
  const { deps, tier1 } = await setup(service, config);
  const result = await investigateFile(deps, { file: "src/hot.ts", changedFiles: ["src/hot.ts"], tier1 });

  assert.equal(result.trace.stop_reason, "budget_exhausted");
  assert.equal(result.trace.hops, 2);
  assert.equal(calls.length, 1);
  assert.equal(
    result.synthesis.reasoning_text,
    "Heuristic assessment (investigation budget exhausted): 4 of 4 known signals are HIGH.",
  );
});

test("a cancelled assessment stops before consulting the model", async () => {
  const { service, calls } = scripted([], []);
  const { deps, tier1 } = await setup(service);
  const controller = new AbortController();
  controller.abort();
  const result = await investigateFile(deps, {
    file: "src/hot.ts",
    changedFiles: ["src/hot.ts"],
    tier1,
    signal: controller.signal,
  });

  assert.equal(result.trace.stop_reason, "cancelled");
  assert.equal(result.trace.hops, 1);
  assert.equal(result.synthesis.confidence, 0);
  assert.equal(calls.length, 0);
});

test("a slow model cannot run the investigation past its wall-clock budget", async () => {
  const config = testConfig();
  config.investigation.wallClockBudgetMs = 250;
  const { service, calls } = slow(240, [
    { action: "CALCULATE_SIGNAL", target: "ownership_churn", reasoning: "owner" },
    { action: "FINALIZE", reasoning: "done" },
  ]);
  const { deps, tier1, logger } = await setup(service, config);
  config.investigation.callTimeoutMs = 1000;

  const startedAt = Date.now();
  const result = await investigateFile(deps, { file: "src/hot.ts", changedFiles: ["src/hot.ts"], tier1 });
  const elapsed = Date.now() - startedAt;

  assert.ok(elapsed < 300, `elapsed ${elapsed}ms`);
  assert.equal(result.trace.stop_reason, "budget_exhausted");
  assert.equal(result.trace.synthesis_source, "heuristic");
  assert.equal(result.synthesis.confidence, 0);
  assert.equal(calls.includes("synthesize:2"), false);
  assert.equal(logger.getEvents().some((event) => event.event === "REASONING_TIMEOUT"), false);
});

test("cancelling mid-hop lets the running call finish before stopping", async () => {
  const { service, calls } = slow(40, [{ action: "CALCULATE_SIGNAL", target: "ownership_churn", reasoning: "owner" }]);
  const { deps, tier1 } = await setup(service);
  deps.config.investigation.callTimeoutMs = 1000;
  const controller = new AbortController();
  setTimeout(() => controller.abort(), 5);

  const result = await investigateFile(deps, {
    file: "src/hot.ts",
    changedFiles: ["src/hot.ts"],
    tier1,
    signal: controller.signal,
  });

  assert.deepEqual(calls, ["decide:1"]);
  assert.deepEqual(
    result.signals.map((signal) => signal.name),
    ["ownership_churn"],
  );
  assert.equal(result.trace.hops, 2);
  assert.equal(result.trace.stop_reason, "cancelled");
  assert.equal(result.synthesis.confidence, 0);
});
