import { RiskCheckError, errorMessage } from "./errors";
import type { FailKind } from "./types";

export function emptyFailTaxonomy(): Record<FailKind, number> {
  return {
    GRAPH_UNAVAILABLE: 0,
    REASONING_TIMEOUT: 0,
    REASONING_MALFORMED: 0,
    VALIDATOR_WRITE_FAILED: 0,
    CANCELLED: 0,
    UNKNOWN: 0,
  };
}

export function classifyFailure(error: unknown): { kind: FailKind; message: string; hints: string[] } {
  const message = errorMessage(error);
  const kind: FailKind = error instanceof RiskCheckError ? error.kind : inferKind(message);

  if (kind === "GRAPH_UNAVAILABLE") {
    return {
      kind,
      message,
      hints: ["Check graph store connectivity", "Raise graph.latencyBudgetMs if queries are slow", "Retry later"],
    };
  }
  if (kind === "REASONING_TIMEOUT") {
    return {
      kind,
      message,
      hints: ["Raise investigation.callTimeoutMs", "Check reasoning provider latency"],
    };
  }
  if (kind === "REASONING_MALFORMED") {
    return {
      kind,
      message,
      hints: ["Constrain reasoning output shape more tightly", "Inspect reasoning audits for the raw response"],
    };
  }
  if (kind === "VALIDATOR_WRITE_FAILED") {
    return {
      kind,
      message,
      hints: ["Check validation.storePath is writable"],
    };
  }
  if (kind === "CANCELLED") {
    return { kind, message, hints: [] };
  }
  return {
    kind: "UNKNOWN",
    message,
    hints: ["Inspect run events for details"],
  };
}

function inferKind(message: string): FailKind {
  const lower = message.toLowerCase();
  if (lower.includes("aborted") || lower.includes("cancel")) return "CANCELLED";
  if (lower.includes("timed out") || lower.includes("timeout")) return "REASONING_TIMEOUT";
  return "UNKNOWN";
}
