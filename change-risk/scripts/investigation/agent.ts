import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import { withTimeout } from "../concurrency";
import { ReasoningMalformedResponseError, ReasoningTimeoutError, errorMessage } from "../errors";
import type { NeighborNode } from "../graph/types";
import { emitterFor } from "../logger";
import type { ReasoningCallOptions, ReasoningService } from "../reasoning/service";
import type { Decision } from "../reasoning/schemas";
import { calculateTier2, type Tier2Deps } from "../signals/tier2";
import { TIER2_SIGNALS } from "../types";
import type {
  Breakthrough,
  DecisionRecord,
  EvidenceItem,
  InvestigationTrace,
  RiskLevel,
  SignalName,
  SignalOutcome,
  SignalResult,
  StopReason,
  Synthesis,
  Tier1Result,
  Tier2SignalName,
} from "../types";
import type { BudgetManager } from "./budget";
import { appendEvidence, createContextArena, tier1Evidence, type ContextNode } from "./context";
import { capConfidence, combinedLevel, detectBreakthrough, heuristicSynthesis } from "./synthesis";

export const MAX_HOPS = 3;
const CONTEXT_SAMPLE_LIMIT = 20;

export interface InvestigationDeps extends Tier2Deps {
  reasoning: ReasoningService;
  budget: BudgetManager;
}

export interface InvestigationRequest {
  file: string;
  changedFiles: string[];
  tier1: Tier1Result;
  signal?: AbortSignal;
}

export interface InvestigationResult {
  synthesis: Synthesis;
  signals: SignalResult[];
  unknown_signals: Array<{ name: SignalName; reason: string }>;
  disabled_signals: SignalName[];
  evidence_chain: EvidenceItem[];
  trace: InvestigationTrace;
}

export interface InvestigationState {
  file_path: string;
  changed_files: string[];
  tier1: Tier1Result;
  hop: number;
  context: ContextNode[];
  expanded: boolean;
  signals: SignalResult[];
  unknown_signals: Array<{ name: SignalName; reason: string }>;
  disabled_signals: SignalName[];
  evidence: EvidenceItem[];
  decisions: InvestigationTrace["decisions"];
  pending: Decision | null;
  stop_reason: StopReason | null;
  confidence_cap: number | null;
  breakthroughs: Breakthrough[];
  current_level: RiskLevel;
  synthesis: Synthesis | null;
  synthesis_source: "reasoning" | "heuristic" | null;
}

type CallOutcome<T> = { ok: true; value: T } | { ok: false; stop: StopReason; error: unknown };

function contextSample(nodes: ContextNode[]): NeighborNode[] {
  return nodes
    .flatMap((node): NeighborNode[] =>
      node.relation === "root" ? [] : [{ path: node.path, hop: node.hop, relation: node.relation }],
    )
    .slice(0, CONTEXT_SAMPLE_LIMIT);
}

function attemptedSignals(state: InvestigationState): Set<SignalName> {
  return new Set<SignalName>([
    ...state.signals.map((signal) => signal.name),
    ...state.unknown_signals.map((signal) => signal.name),
    ...state.disabled_signals,
  ]);
}

function availableSignals(state: InvestigationState): Tier2SignalName[] {
  const attempted = attemptedSignals(state);
  return TIER2_SIGNALS.filter((name) => !attempted.has(name));
}

function decisionRecord(hop: number, taken: Decision, requested: Decision): DecisionRecord {
  const overridden = taken !== requested;
  return {
    hop,
    action: taken.action,
    ...(taken.action === "CALCULATE_SIGNAL" ? { target: taken.target } : {}),
    ...(overridden
      ? {
          requested:
            requested.action === "CALCULATE_SIGNAL"
              ? { action: requested.action, target: requested.target }
              : { action: requested.action },
        }
      : {}),
    reasoning: requested.reasoning,
    overridden,
  };
}

function describeNeighbors(nodes: NeighborNode[]): string {
  const dependencies = nodes.filter((node) => node.relation === "dependency").length;
  return `${nodes.length} nodes (${dependencies} dependency, ${nodes.length - dependencies} co-change)`;
}

/**
 * Bounded investigation of one escalated file. The reasoning service picks
 * at most MAX_HOPS actions; the last hop always finalizes.
 *
 * Cancellation is observed at DECIDE only: a reasoning call or Tier-2
 * computation already running finishes its hop first. Every reasoning call
 * is bounded by the smaller of `callTimeoutMs` and the wall-clock budget
 * left, and hitting the budget deadline ends the investigation as
 * `budget_exhausted`.
 */
export async function investigateFile(
  deps: InvestigationDeps,
  request: InvestigationRequest,
): Promise<InvestigationResult> {
  const emit = emitterFor(deps.logger);
  const now = deps.now ?? (() => new Date());
  const file = request.file;
  const parent = request.signal;
  const cfg = deps.config.investigation;
  const startedAt = now().getTime();

  const callReasoning = async <T>(
    role: "decide" | "synthesize",
    hop: number,
    run: (options: ReasoningCallOptions) => Promise<T>,
  ): Promise<CallOutcome<T>> => {
    let lastError: unknown = null;
    for (const strict of [false, true]) {
      const budget = deps.budget.shouldStopInvestigation(file);
      if (budget.stop) return { ok: false, stop: "budget_exhausted", error: new Error(budget.reason) };
      const remaining = deps.budget.remainingMs(file);
      const budgetBound = remaining < cfg.callTimeoutMs;
      const timeoutMs = budgetBound ? remaining : cfg.callTimeoutMs;
      deps.budget.recordReasoningCall(file, { role, hop, strict });
      try {
        const value = await withTimeout(
          (signal) => run({ strict, signal }),
          timeoutMs,
          () => new ReasoningTimeoutError(role, timeoutMs),
        );
        return { ok: true, value };
      } catch (error) {
        lastError = error;
        if (error instanceof ReasoningTimeoutError && budgetBound) {
          emit({
            node: "investigation",
            file,
            level: "warn",
            event: "REASONING_BUDGET_DEADLINE",
            data: { role, hop, timeout_ms: timeoutMs },
          });
          return { ok: false, stop: "budget_exhausted", error: new Error("wallClockBudgetMs exceeded") };
        }
        if (error instanceof ReasoningTimeoutError) {
          emit({ node: "investigation", file, level: "warn", event: "REASONING_TIMEOUT", data: { role, hop } });
          return { ok: false, stop: "reasoning_timeout", error };
        }
        if (error instanceof ReasoningMalformedResponseError) {
          emit({
            node: "investigation",
            file,
            level: "warn",
            event: "REASONING_MALFORMED",
            data: { role, hop, strict, error: error.message },
          });
          if (!strict) {
            emit({ node: "investigation", file, level: "info", event: "REASONING_RETRY_STRICT", data: { role, hop } });
            continue;
          }
          return { ok: false, stop: "reasoning_malformed", error };
        }
        emit({
          node: "investigation",
          file,
          level: "error",
          event: "REASONING_UNAVAILABLE",
          data: { role, hop, error: errorMessage(error) },
        });
        return { ok: false, stop: "reasoning_unavailable", error };
      }
    }
    return { ok: false, stop: "reasoning_malformed", error: lastError };
  };

  const InvestigationAnnotation = Annotation.Root({
    file_path: Annotation<string>(),
    changed_files: Annotation<string[]>(),
    tier1: Annotation<Tier1Result>(),
    hop: Annotation<number>(),
    context: Annotation<ContextNode[]>(),
    expanded: Annotation<boolean>(),
    signals: Annotation<SignalResult[]>(),
    unknown_signals: Annotation<InvestigationState["unknown_signals"]>(),
    disabled_signals: Annotation<SignalName[]>(),
    evidence: Annotation<EvidenceItem[]>(),
    decisions: Annotation<InvestigationState["decisions"]>(),
    pending: Annotation<Decision | null>(),
    stop_reason: Annotation<StopReason | null>(),
    confidence_cap: Annotation<number | null>(),
    breakthroughs: Annotation<Breakthrough[]>(),
    current_level: Annotation<RiskLevel>(),
    synthesis: Annotation<Synthesis | null>(),
    synthesis_source: Annotation<InvestigationState["synthesis_source"]>(),
  });

  const app = new StateGraph(InvestigationAnnotation)
    .addNode("init", async (state: InvestigationState): Promise<InvestigationState> => {
      emit({
        node: "investigation",
        file,
        level: "info",
        event: "INVESTIGATION_START",
        data: { changed_files: state.changed_files.length, level: state.current_level },
      });
      const arena = createContextArena(file);
      let evidence = tier1Evidence(state.tier1, now());
      try {
        const neighbors = await deps.graph.neighbors(file, 1);
        arena.admit(neighbors);
        evidence = appendEvidence(
          evidence,
          { hop: 0, kind: "context", summary: `Loaded 1-hop context: ${describeNeighbors(neighbors)}` },
          now(),
        );
      } catch (error) {
        evidence = appendEvidence(
          evidence,
          { hop: 0, kind: "note", summary: `Context unavailable: ${errorMessage(error)}` },
          now(),
        );
      }
      return { ...state, context: arena.nodes(), evidence };
    })
    .addNode("decide", async (state: InvestigationState): Promise<InvestigationState> => {
      const hop = state.hop + 1;
      const stopWith = (stop: StopReason, reasoning: string, cap: number | null): InvestigationState => ({
        ...state,
        hop,
        pending: { action: "FINALIZE", reasoning },
        stop_reason: stop,
        confidence_cap: cap,
        decisions: [...state.decisions, { hop, action: "FINALIZE", reasoning, overridden: true }],
        evidence: appendEvidence(
          state.evidence,
          { hop, kind: "decision", summary: `Finalize (${stop}): ${reasoning}` },
          now(),
        ),
      });

      if (parent?.aborted) return stopWith("cancelled", "assessment cancelled", state.confidence_cap);
      const budget = deps.budget.shouldStopInvestigation(file);
      if (budget.stop) return stopWith("budget_exhausted", budget.reason ?? "budget exhausted", state.confidence_cap);

      const available = availableSignals(state);
      const outcome = await callReasoning("decide", hop, (options) =>
        deps.reasoning.decide(
          {
            file_path: file,
            changed_files: state.changed_files,
            hop,
            max_hops: MAX_HOPS,
            tier1: state.tier1,
            evidence: state.evidence,
            signals: state.signals,
            available_signals: available,
            can_expand: !state.expanded,
            context_size: state.context.length,
            context_sample: contextSample(state.context),
          },
          options,
        ),
      );
      if (!outcome.ok) {
        const cap = outcome.stop === "budget_exhausted" ? state.confidence_cap : cfg.degradedConfidenceCap;
        return stopWith(outcome.stop, errorMessage(outcome.error), cap);
      }

      const decision = outcome.value;
      const illegal =
        (decision.action === "CALCULATE_SIGNAL" && !available.includes(decision.target)) ||
        (decision.action === "EXPAND_CONTEXT" && state.expanded);
      let pending: Decision = decision;
      let stop: StopReason | null = null;
      if (hop >= MAX_HOPS && decision.action !== "FINALIZE") {
        pending = { action: "FINALIZE", reasoning: decision.reasoning };
        stop = "hop_limit";
        emit({
          node: "investigation",
          file,
          level: "info",
          event: "INVESTIGATION_HOP_LIMIT",
          data: { hop, requested: decision.action },
        });
      } else if (illegal) {
        pending = { action: "FINALIZE", reasoning: decision.reasoning };
        stop = "finalize_requested";
      } else if (decision.action === "FINALIZE") {
        stop = "finalize_requested";
      }
      const overridden = pending !== decision;

      emit({
        node: "investigation",
        file,
        level: "info",
        event: "INVESTIGATION_DECISION",
        data: {
          hop,
          action: decision.action,
          target: decision.action === "CALCULATE_SIGNAL" ? decision.target : null,
          overridden,
        },
      });
      const target = decision.action === "CALCULATE_SIGNAL" ? decision.target : undefined;
      return {
        ...state,
        hop,
        pending,
        stop_reason: stop,
        decisions: [...state.decisions, decisionRecord(hop, pending, decision)],
        evidence: appendEvidence(
          state.evidence,
          {
            hop,
            kind: "decision",
            summary: `${decision.action}${target ? ` ${target}` : ""}${overridden ? " (overridden: FINALIZE)" : ""}: ${decision.reasoning}`,
          },
          now(),
        ),
      };
    })
    .addNode("calculate_signal", async (state: InvestigationState): Promise<InvestigationState> => {
      const pending = state.pending;
      if (!pending || pending.action !== "CALCULATE_SIGNAL") return state;
      const name = pending.target;

      const outcome: SignalOutcome = await calculateTier2(deps, name, file);

      if (outcome.status === "disabled") {
        return {
          ...state,
          disabled_signals: [...state.disabled_signals, name],
          evidence: appendEvidence(
            state.evidence,
            { hop: state.hop, kind: "note", summary: `${name} disabled by the validator`, signal: name },
            now(),
          ),
        };
      }
      if (outcome.status === "unknown") {
        return {
          ...state,
          unknown_signals: [...state.unknown_signals, { name, reason: outcome.reason }],
          evidence: appendEvidence(
            state.evidence,
            { hop: state.hop, kind: "note", summary: `${name} unknown: ${outcome.reason}`, signal: name },
            now(),
          ),
        };
      }

      const signals = [...state.signals, outcome.result];
      const level = combinedLevel(state.tier1, signals);
      const breakthrough = detectBreakthrough(state.current_level, level, state.hop, name);
      if (breakthrough) {
        emit({ node: "investigation", file, level: "info", event: "BREAKTHROUGH", data: { ...breakthrough } });
      }
      return {
        ...state,
        signals,
        current_level: level,
        breakthroughs: breakthrough ? [...state.breakthroughs, breakthrough] : state.breakthroughs,
        evidence: appendEvidence(
          state.evidence,
          {
            hop: state.hop,
            kind: "tier2_signal",
            summary: outcome.result.evidence_text,
            signal: name,
            signal_level: outcome.result.signal_level,
          },
          now(),
        ),
      };
    })
    .addNode("expand_context", async (state: InvestigationState): Promise<InvestigationState> => {
      const arena = createContextArena(file, state.context);
      let summary: string;
      try {
        const neighbors = await deps.graph.neighbors(file, 2);
        const { added } = arena.admit(neighbors);
        summary = `Expanded context to 2 hops: ${added} new of ${describeNeighbors(neighbors)}`;
        emit({
          node: "investigation",
          file,
          level: "info",
          event: "CONTEXT_EXPANDED",
          data: { added, total: arena.nodes().length },
        });
      } catch (error) {
        summary = `Context expansion failed: ${errorMessage(error)}`;
      }
      return {
        ...state,
        expanded: true,
        context: arena.nodes(),
        evidence: appendEvidence(state.evidence, { hop: state.hop, kind: "context", summary }, now()),
      };
    })
    .addNode("finalize", (state: InvestigationState): InvestigationState => {
      const stop = state.stop_reason ?? "finalize_requested";
      emit({
        node: "investigation",
        file,
        level: "info",
        event: "INVESTIGATION_FINALIZED",
        data: { hop: state.hop, stop_reason: stop, signals: state.signals.length },
      });
      return { ...state, stop_reason: stop };
    })
    .addNode("synthesize", async (state: InvestigationState): Promise<InvestigationState> => {
      const stop = state.stop_reason ?? "finalize_requested";
      const heuristic = (cause: string): InvestigationState => {
        emit({ node: "investigation", file, level: "warn", event: "SYNTHESIS_HEURISTIC", data: { cause } });
        return {
          ...state,
          synthesis: heuristicSynthesis({
            file,
            tier1: state.tier1,
            signals: state.signals,
            changedFiles: state.changed_files,
            thresholds: deps.config.thresholds,
            cause,
          }),
          synthesis_source: "heuristic",
        };
      };

      if (stop === "cancelled" || parent?.aborted) return heuristic("assessment cancelled");
      if (stop === "budget_exhausted") return heuristic("investigation budget exhausted");

      const outcome = await callReasoning("synthesize", state.hop, (options) =>
        deps.reasoning.synthesize(
          {
            file_path: file,
            changed_files: state.changed_files,
            tier1: state.tier1,
            evidence: state.evidence,
            signals: state.signals,
            stop_reason: stop,
            hops: state.hop,
          },
          options,
        ),
      );
      if (!outcome.ok && outcome.stop === "budget_exhausted") {
        return { ...heuristic("investigation budget exhausted"), stop_reason: "budget_exhausted" };
      }
      if (!outcome.ok) return heuristic(errorMessage(outcome.error));
      return { ...state, synthesis: capConfidence(outcome.value, state.confidence_cap), synthesis_source: "reasoning" };
    })
    .addEdge(START, "init")
    .addEdge("init", "decide")
    .addConditionalEdges(
      "decide",
      (state: InvestigationState) => {
        if (state.pending?.action === "CALCULATE_SIGNAL") return "calculate_signal";
        if (state.pending?.action === "EXPAND_CONTEXT") return "expand_context";
        return "finalize";
      },
      ["calculate_signal", "expand_context", "finalize"],
    )
    .addEdge("calculate_signal", "decide")
    .addEdge("expand_context", "decide")
    .addEdge("finalize", "synthesize")
    .addEdge("synthesize", END)
    .compile();

  deps.budget.beginInvestigation(file);
  const initial: InvestigationState = {
    file_path: file,
    changed_files: request.changedFiles,
    tier1: request.tier1,
    hop: 0,
    context: [],
    expanded: false,
    signals: [],
    unknown_signals: [],
    disabled_signals: [],
    evidence: [],
    decisions: [],
    pending: null,
    stop_reason: null,
    confidence_cap: null,
    breakthroughs: [],
    current_level: combinedLevel(request.tier1, []),
    synthesis: null,
    synthesis_source: null,
  };
  const final = await app.invoke(initial);

  const stopReason = final.stop_reason ?? "finalize_requested";
  const synthesis =
    final.synthesis ??
    heuristicSynthesis({
      file,
      tier1: request.tier1,
      signals: final.signals,
      changedFiles: request.changedFiles,
      thresholds: deps.config.thresholds,
      cause: "no synthesis produced",
    });
  const trace: InvestigationTrace = {
    file_path: file,
    hops: final.hop,
    stop_reason: stopReason,
    decisions: final.decisions,
    context_nodes: final.context.length,
    expanded: final.expanded,
    breakthroughs: final.breakthroughs,
    synthesis_source: final.synthesis_source ?? "heuristic",
    duration_ms: now().getTime() - startedAt,
  };
  deps.budget.finishInvestigation(file, { stop_reason: stopReason });
  emit({
    node: "investigation",
    file,
    level: "info",
    event: "INVESTIGATION_DONE",
    data: {
      hops: trace.hops,
      stop_reason: stopReason,
      risk_level: synthesis.risk_level,
      confidence: synthesis.confidence,
      source: trace.synthesis_source,
    },
  });

  return {
    synthesis,
    signals: final.signals,
    unknown_signals: final.unknown_signals,
    disabled_signals: final.disabled_signals,
    evidence_chain: final.evidence,
    trace,
  };
}
