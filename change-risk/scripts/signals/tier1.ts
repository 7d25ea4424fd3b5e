import type { EphemeralCache } from "../cache/cache";
import type { RiskConfig } from "../config";
import type { GraphReader } from "../graph/types";
import { emitterFor, type RiskLogger } from "../logger";
import type { SignalOutcome, SignalResult, Tier1Result, Tier1SignalName, Tier1Values } from "../types";
import { evaluateSignal, type SignalComputation, type SignalGate } from "./evaluate";
import { coChangeLevel, couplingLevel, shouldEscalate, testRatioLevel } from "./thresholds";

export const CO_CHANGE_PARTNER_LIMIT = 5;

export interface Tier1Deps {
  graph: GraphReader;
  cache: EphemeralCache<SignalResult>;
  config: RiskConfig;
  gate?: SignalGate;
  logger?: RiskLogger;
  now?: () => Date;
}

export async function computeCoupling(graph: GraphReader, file: string, config: RiskConfig): Promise<SignalComputation> {
  const info = await graph.coupling(file);
  const level = couplingLevel(info.count, config.thresholds);
  return {
    value: info.count,
    signal_level: level,
    evidence_text: `File is connected to ${info.count} other files (${level} coupling)`,
    details: { connected: info.connected.slice(0, 10) },
  };
}

export async function computeCoChange(graph: GraphReader, file: string, config: RiskConfig): Promise<SignalComputation> {
  const partners = await graph.coChanged(file);
  const top = partners[0];
  const max = top?.frequency ?? 0;
  const level = coChangeLevel(max, config.thresholds);
  return {
    value: max,
    signal_level: level,
    evidence_text: top
      ? `Co-changes with ${top.partner} in ${Math.round(max * 100)}% of commits (${level})`
      : `No co-change partners in the last ${config.temporal.windowDays} days (${level})`,
    details: {
      partners: partners
        .slice(0, CO_CHANGE_PARTNER_LIMIT)
        .map((partner) => ({ file: partner.partner, frequency: partner.frequency })),
    },
  };
}

/** `(test_loc + 1) / (source_loc + 1)`; no lines at all counts as 0, not full coverage. */
export function smoothedTestRatio(sourceLoc: number, testLoc: number): number {
  if (sourceLoc === 0 && testLoc === 0) return 0;
  return (testLoc + 1) / (sourceLoc + 1);
}

export async function computeTestRatio(graph: GraphReader, file: string, config: RiskConfig): Promise<SignalComputation> {
  const coverage = await graph.testRatio(file);
  const ratio = smoothedTestRatio(coverage.source_loc, coverage.test_loc);
  const level = testRatioLevel(ratio, config.thresholds);
  return {
    value: ratio,
    signal_level: level,
    evidence_text:
      coverage.test_files.length === 0
        ? `No test files found (ratio ${ratio.toFixed(2)}, ${level})`
        : `Test ratio ${ratio.toFixed(2)} (${coverage.test_loc} test LOC / ${coverage.source_loc} source LOC, ${level})`,
    details: {
      test_files: coverage.test_files,
      source_loc: coverage.source_loc,
      test_loc: coverage.test_loc,
    },
  };
}

const COMPUTERS: Record<
  Tier1SignalName,
  (graph: GraphReader, file: string, config: RiskConfig) => Promise<SignalComputation>
> = {
  coupling: computeCoupling,
  co_change: computeCoChange,
  test_ratio: computeTestRatio,
};

export function tier1Values(signals: Record<Tier1SignalName, SignalOutcome>): Tier1Values {
  const values: Tier1Values = {};
  if (signals.coupling.status === "ok") values.coupling = signals.coupling.result.value;
  if (signals.co_change.status === "ok") values.max_co_change_frequency = signals.co_change.result.value;
  if (signals.test_ratio.status === "ok") values.test_ratio = signals.test_ratio.result.value;
  return values;
}

/**
 * Baseline evaluation of one changed file: the three signals run concurrently,
 * each cache-or-compute under its own timeout, then the escalation rule.
 */
export async function evaluateTier1(
  deps: Tier1Deps,
  file: string,
  options: { signal?: AbortSignal } = {},
): Promise<Tier1Result> {
  const startedAt = Date.now();
  const evaluate = (name: Tier1SignalName) =>
    evaluateSignal(name, file, () => COMPUTERS[name](deps.graph, file, deps.config), {
      cache: deps.cache,
      ttlMs: deps.config.cache.ttlMs,
      timeoutMs: deps.config.tier1.signalTimeoutMs,
      gate: deps.gate,
      logger: deps.logger,
      now: deps.now,
      signal: options.signal,
      node: "tier1",
    });

  const [coupling, coChange, testRatio] = await Promise.all([
    evaluate("coupling"),
    evaluate("co_change"),
    evaluate("test_ratio"),
  ]);
  const signals = { coupling, co_change: coChange, test_ratio: testRatio };
  const values = tier1Values(signals);
  const escalate = shouldEscalate(values, deps.config.thresholds);
  const result: Tier1Result = {
    file_path: file,
    risk_level: escalate ? "HIGH" : "LOW",
    escalate,
    signals,
    values,
    duration_ms: Date.now() - startedAt,
  };

  emitterFor(deps.logger)({
    node: "tier1",
    file,
    level: "info",
    event: escalate ? "TIER1_ESCALATED" : "TIER1_BASELINE_LOW",
    data: { ...values, duration_ms: result.duration_ms },
  });
  return result;
}
