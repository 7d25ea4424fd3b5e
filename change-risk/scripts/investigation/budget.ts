import type { RiskConfig } from "../config";
import { emitterFor, type RiskLogger } from "../logger";

export interface BudgetState {
  runStartMs: number;
  reasoningCallsTotal: number;
  reasoningCallsPerFile: Record<string, number>;
  investigationStartMs: Record<string, number>;
  investigationsFinished: number;
  stopReason: string | null;
}

export interface BudgetManager {
  beginInvestigation: (file: string) => void;
  recordReasoningCall: (file: string, meta: { role: "decide" | "synthesize"; hop: number; strict: boolean }) => void;
  shouldStopRun: () => { stop: boolean; reason?: string };
  shouldStopInvestigation: (file: string) => { stop: boolean; reason?: string };
  /** Wall-clock milliseconds left for this investigation, never below 0. */
  remainingMs: (file: string) => number;
  finishInvestigation: (file: string, result: { stop_reason: string }) => void;
  snapshot: () => BudgetState;
}

export function createBudgetManager(
  config: RiskConfig["investigation"],
  logger: RiskLogger | undefined,
  runId: string,
  now: () => number = () => Date.now(),
): BudgetManager {
  const emit = emitterFor(logger);
  const state: BudgetState = {
    runStartMs: now(),
    reasoningCallsTotal: 0,
    reasoningCallsPerFile: {},
    investigationStartMs: {},
    investigationsFinished: 0,
    stopReason: null,
  };

  const shouldStopRun = (): { stop: boolean; reason?: string } => {
    if (state.reasoningCallsTotal >= config.maxReasoningCallsPerRun) {
      const reason = "maxReasoningCallsPerRun reached";
      if (!state.stopReason) {
        state.stopReason = reason;
        emit({
          node: "budget",
          level: "warn",
          event: "BUDGET_STOP_RUN",
          data: { reason, run_id: runId, calls: state.reasoningCallsTotal },
        });
      }
      return { stop: true, reason };
    }
    return { stop: false };
  };

  const elapsedMs = (file: string): number => now() - (state.investigationStartMs[file] ?? state.runStartMs);

  return {
    beginInvestigation(file) {
      state.investigationStartMs[file] = now();
      if (!(file in state.reasoningCallsPerFile)) state.reasoningCallsPerFile[file] = 0;
    },
    recordReasoningCall(file, meta) {
      state.reasoningCallsTotal += 1;
      state.reasoningCallsPerFile[file] = (state.reasoningCallsPerFile[file] ?? 0) + 1;
      emit({ node: "budget", file, level: "info", event: "BUDGET_REASONING_CALL_RECORDED", data: { ...meta } });
    },
    shouldStopRun,
    shouldStopInvestigation(file) {
      const run = shouldStopRun();
      if (run.stop) return run;
      const elapsed = elapsedMs(file);
      if (elapsed > config.wallClockBudgetMs) {
        const reason = "wallClockBudgetMs exceeded";
        emit({
          node: "budget",
          file,
          level: "warn",
          event: "BUDGET_STOP_INVESTIGATION",
          data: { reason, elapsed_ms: elapsed, budget_ms: config.wallClockBudgetMs },
        });
        return { stop: true, reason };
      }
      return { stop: false };
    },
    remainingMs(file) {
      return Math.max(0, config.wallClockBudgetMs - elapsedMs(file));
    },
    finishInvestigation(file, result) {
      state.investigationsFinished += 1;
      emit({
        node: "budget",
        file,
        level: "info",
        event: "BUDGET_INVESTIGATION_FINISHED",
        data: { stop_reason: result.stop_reason, calls: state.reasoningCallsPerFile[file] ?? 0 },
      });
    },
    snapshot() {
      return {
        ...state,
        reasoningCallsPerFile: { ...state.reasoningCallsPerFile },
        investigationStartMs: { ...state.investigationStartMs },
      };
    },
  };
}
