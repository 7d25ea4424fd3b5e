import { writeTraceArtifact } from "./artifacts";
import { traceKey, type EphemeralCache } from "./cache/cache";
import { mapLimit } from "./concurrency";
import type { RiskConfig } from "./config";
import { AssessmentCancelledError } from "./errors";
import { classifyFailure, emptyFailTaxonomy } from "./failures";
import type { GraphReader } from "./graph/types";
import { investigateFile } from "./investigation/agent";
import { createBudgetManager, type BudgetManager } from "./investigation/budget";
import { tier1Evidence } from "./investigation/context";
import { baselineConfidence, heuristicSynthesis, knownTier1Signals, recommendationsFor } from "./investigation/synthesis";
import { emitterFor, type RiskLogger } from "./logger";
import type { ReasoningService } from "./reasoning/service";
import type { IncidentSearchIndex } from "./search/bm25";
import type { SignalGate } from "./signals/evaluate";
import { evaluateTier1 } from "./signals/tier1";
import { compareLevels } from "./signals/thresholds";
import { TIER1_SIGNALS } from "./types";
import type {
  ChangeAssessment,
  FileFailure,
  InvestigationTrace,
  RiskAssessment,
  RiskLevel,
  SignalName,
  SignalResult,
  Tier1Result,
} from "./types";

export interface AssessDeps {
  runId: string;
  graph: GraphReader;
  cache: EphemeralCache<SignalResult>;
  traceCache?: EphemeralCache<InvestigationTrace>;
  search: IncidentSearchIndex;
  config: RiskConfig;
  gate?: SignalGate;
  reasoning: ReasoningService | null;
  budget?: BudgetManager;
  logger?: RiskLogger;
  now?: () => Date;
}

function tier1Gaps(tier1: Tier1Result): Pick<RiskAssessment, "unknown_signals" | "disabled_signals"> {
  const unknown: RiskAssessment["unknown_signals"] = [];
  const disabled: SignalName[] = [];
  for (const name of TIER1_SIGNALS) {
    const outcome = tier1.signals[name];
    if (outcome.status === "unknown") unknown.push({ name, reason: outcome.reason });
    if (outcome.status === "disabled") disabled.push(name);
  }
  return { unknown_signals: unknown, disabled_signals: disabled };
}

function baselineAssessment(tier1: Tier1Result, changedFiles: string[], config: RiskConfig, at: Date): RiskAssessment {
  const signals = knownTier1Signals(tier1);
  return {
    file_path: tier1.file_path,
    phase: "baseline",
    risk_level: "LOW",
    confidence: baselineConfidence(tier1),
    escalated: false,
    signals,
    ...tier1Gaps(tier1),
    evidence_chain: tier1Evidence(tier1, at),
    key_evidence: signals.map((signal) => signal.evidence_text),
    recommendations: recommendationsFor({
      file: tier1.file_path,
      tier1,
      signals: [],
      changedFiles,
      thresholds: config.thresholds,
    }),
    reasoning_text: "Tier-1 signals are below the escalation thresholds.",
  };
}

/** No reasoning service: risk from the Tier-1 HIGH count alone, confidence 0. */
export function degradedAssessment(
  tier1: Tier1Result,
  changedFiles: string[],
  config: RiskConfig,
  at: Date,
  cause = "reasoning service unavailable",
): RiskAssessment {
  const synthesis = heuristicSynthesis({
    file: tier1.file_path,
    tier1,
    signals: [],
    changedFiles,
    thresholds: config.thresholds,
    cause,
  });
  return {
    file_path: tier1.file_path,
    phase: "degraded",
    risk_level: synthesis.risk_level,
    confidence: 0,
    escalated: true,
    signals: knownTier1Signals(tier1),
    ...tier1Gaps(tier1),
    evidence_chain: tier1Evidence(tier1, at),
    key_evidence: synthesis.key_evidence,
    recommendations: synthesis.recommendations,
    reasoning_text: synthesis.reasoning_text,
  };
}

function highestLevel(levels: RiskLevel[]): RiskLevel {
  return levels.reduce<RiskLevel>((max, level) => (compareLevels(level, max) > 0 ? level : max), "LOW");
}

/**
 * Assesses a change set. Tier-1 runs for every file; escalated files are
 * investigated one after another. A failure stays local to its file.
 */
export async function assessChange(
  deps: AssessDeps,
  files: string[],
  options: { signal?: AbortSignal } = {},
): Promise<ChangeAssessment> {
  const emit = emitterFor(deps.logger);
  const now = deps.now ?? (() => new Date());
  const startedAt = Date.now();
  const generatedAt = now().toISOString();
  const changedFiles = [...new Set(files)];
  const budget =
    deps.budget ?? createBudgetManager(deps.config.investigation, deps.logger, deps.runId, () => now().getTime());
  const failures: FileFailure[] = [];
  const failTaxonomy = emptyFailTaxonomy();

  const fail = (file: string, error: unknown) => {
    const failure = classifyFailure(error);
    failTaxonomy[failure.kind] += 1;
    failures.push({ file_path: file, ...failure });
    emit({
      node: "assess",
      file,
      level: "error",
      event: "FILE_ASSESSMENT_FAILED",
      data: { kind: failure.kind, error: failure.message },
    });
  };

  emit({
    node: "assess",
    level: "info",
    event: "ASSESSMENT_START",
    data: { files: changedFiles.length, reasoning: deps.reasoning?.model ?? null },
  });

  const tier1Results = await mapLimit(changedFiles, deps.config.tier1.concurrency, async (file) => {
    try {
      return await evaluateTier1(
        { graph: deps.graph, cache: deps.cache, config: deps.config, gate: deps.gate, logger: deps.logger, now },
        file,
        { signal: options.signal },
      );
    } catch (error) {
      fail(file, error);
      return null;
    }
  });

  const investigate = deps.reasoning !== null && deps.config.investigation.enabled;
  const assessments: RiskAssessment[] = [];
  let investigated = 0;

  for (const tier1 of tier1Results) {
    if (!tier1) continue;
    const file = tier1.file_path;
    if (!tier1.escalate) {
      assessments.push(baselineAssessment(tier1, changedFiles, deps.config, now()));
      continue;
    }
    if (!investigate || !deps.reasoning) {
      emit({ node: "assess", file, level: "warn", event: "INVESTIGATION_SKIPPED_DEGRADED" });
      assessments.push(
        degradedAssessment(
          tier1,
          changedFiles,
          deps.config,
          now(),
          deps.reasoning ? "investigation disabled" : "reasoning service unavailable",
        ),
      );
      continue;
    }

    try {
      if (options.signal?.aborted) throw new AssessmentCancelledError("investigation");
      const result = await investigateFile(
        {
          graph: deps.graph,
          cache: deps.cache,
          search: deps.search,
          config: deps.config,
          gate: deps.gate,
          logger: deps.logger,
          now,
          reasoning: deps.reasoning,
          budget,
        },
        { file, changedFiles, tier1, signal: options.signal },
      );
      investigated += 1;

      await deps.traceCache?.set(traceKey(deps.runId, file), result.trace, deps.config.cache.ttlMs).catch((error: unknown) => {
        emit({ node: "assess", file, level: "warn", event: "TRACE_CACHE_WRITE_FAILED", data: { error } });
      });
      if (deps.config.output.writeTraces) {
        try {
          const written = writeTraceArtifact({
            tracesDir: deps.config.output.tracesDir,
            run_id: deps.runId,
            generated_at: generatedAt,
            trace: result.trace,
            evidence_chain: result.evidence_chain,
          });
          emit({ node: "assess", file, level: "info", event: "TRACE_WRITTEN", data: { path: written.path } });
        } catch (error) {
          emit({ node: "assess", file, level: "warn", event: "TRACE_WRITE_FAILED", data: { error } });
        }
      }

      const tier1Gap = tier1Gaps(tier1);
      assessments.push({
        file_path: file,
        phase: "investigation",
        risk_level: result.synthesis.risk_level,
        confidence: result.synthesis.confidence,
        escalated: true,
        signals: [...knownTier1Signals(tier1), ...result.signals],
        unknown_signals: [...tier1Gap.unknown_signals, ...result.unknown_signals],
        disabled_signals: [...tier1Gap.disabled_signals, ...result.disabled_signals],
        evidence_chain: result.evidence_chain,
        key_evidence: result.synthesis.key_evidence,
        recommendations: result.synthesis.recommendations,
        reasoning_text: result.synthesis.reasoning_text,
        trace: result.trace,
      });
    } catch (error) {
      fail(file, error);
    }
  }

  let cacheHits = 0;
  let cacheLookups = 0;
  for (const tier1 of tier1Results) {
    if (!tier1) continue;
    for (const name of TIER1_SIGNALS) {
      const outcome = tier1.signals[name];
      if (outcome.status !== "ok") continue;
      cacheLookups += 1;
      if (outcome.cache_hit) cacheHits += 1;
    }
  }

  const escalatedCount = tier1Results.filter((tier1) => tier1?.escalate).length;
  const result: ChangeAssessment = {
    run_id: deps.runId,
    generated_at: generatedAt,
    overall_risk: highestLevel(assessments.map((assessment) => assessment.risk_level)),
    degraded: escalatedCount > 0 && !investigate,
    files: assessments,
    failures,
    fail_taxonomy_summary: failTaxonomy,
    stats: {
      files_total: changedFiles.length,
      files_escalated: escalatedCount,
      files_investigated: investigated,
      files_failed: failures.length,
      cache_hits: cacheHits,
      cache_misses: cacheLookups - cacheHits,
      duration_ms: Date.now() - startedAt,
    },
  };

  emit({
    node: "assess",
    level: "info",
    event: "ASSESSMENT_DONE",
    data: { overall_risk: result.overall_risk, degraded: result.degraded, ...result.stats },
  });
  return result;
}
