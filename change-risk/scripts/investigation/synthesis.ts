import { z } from "zod";
import type { Thresholds } from "../config";
import { levelFromHighCount } from "../signals/thresholds";
import type {
  Breakthrough,
  RiskLevel,
  SignalName,
  SignalResult,
  Synthesis,
  Tier1Result,
  Tier1SignalName,
} from "../types";
import { TIER1_SIGNALS } from "../types";

const PartnerDetailsSchema = z.object({
  partners: z.array(z.object({ file: z.string(), frequency: z.number() })),
});

const OwnershipDetailsSchema = z.object({
  previous_owner: z.string().nullable(),
  days_since_transition: z.number().nullable(),
});

const IncidentDetailsSchema = z.object({
  matches: z.array(z.object({ incident_id: z.string(), score: z.number() })),
});

export function knownTier1Signals(tier1: Tier1Result): SignalResult[] {
  const out: SignalResult[] = [];
  for (const name of TIER1_SIGNALS) {
    const outcome = tier1.signals[name];
    if (outcome.status === "ok") out.push(outcome.result);
  }
  return out;
}

export function combinedLevel(tier1: Tier1Result, tier2: SignalResult[]): RiskLevel {
  return levelFromHighCount([...knownTier1Signals(tier1), ...tier2].map((signal) => signal.signal_level));
}

/** Fraction of the Tier-1 signals that produced a value. */
export function baselineConfidence(tier1: Tier1Result): number {
  return Number((knownTier1Signals(tier1).length / TIER1_SIGNALS.length).toFixed(2));
}

function tier1Result(tier1: Tier1Result, name: Tier1SignalName): SignalResult | null {
  const outcome = tier1.signals[name];
  return outcome.status === "ok" ? outcome.result : null;
}

/**
 * Partners that usually change together with `file` but are absent from the
 * change set.
 */
export function forgottenUpdates(
  tier1: Tier1Result,
  changedFiles: string[],
  thresholds: Thresholds,
): Array<{ file: string; frequency: number }> {
  const coChange = tier1Result(tier1, "co_change");
  const parsed = PartnerDetailsSchema.safeParse(coChange?.details);
  if (!parsed.success) return [];
  const changed = new Set(changedFiles);
  return parsed.data.partners.filter(
    (partner) => partner.frequency > thresholds.coChange.low && !changed.has(partner.file),
  );
}

export function recommendationsFor(params: {
  file: string;
  tier1: Tier1Result;
  signals: SignalResult[];
  changedFiles: string[];
  thresholds: Thresholds;
}): string[] {
  const out: string[] = [];
  for (const missing of forgottenUpdates(params.tier1, params.changedFiles, params.thresholds)) {
    out.push(
      `Check whether ${missing.file} also needs an update (changed together in ${Math.round(missing.frequency * 100)}% of commits)`,
    );
  }

  const coupling = tier1Result(params.tier1, "coupling");
  if (coupling && coupling.signal_level === "HIGH") {
    out.push(`Review the ${coupling.value} files connected to ${params.file} for breakage`);
  }
  const testRatio = tier1Result(params.tier1, "test_ratio");
  if (testRatio && testRatio.signal_level !== "LOW") {
    out.push(`Add tests for ${params.file} (test ratio ${testRatio.value.toFixed(2)})`);
  }

  for (const signal of params.signals) {
    if (signal.signal_level === "LOW") continue;
    if (signal.name === "ownership_churn") {
      const details = OwnershipDetailsSchema.safeParse(signal.details);
      if (details.success && details.data.previous_owner) {
        out.push(
          `Ask ${details.data.previous_owner} to review: ownership changed ${details.data.days_since_transition ?? "?"} days ago`,
        );
      }
    }
    if (signal.name === "incident_similarity") {
      const details = IncidentDetailsSchema.safeParse(signal.details);
      const top = details.success ? details.data.matches[0] : undefined;
      if (top) out.push(`Compare the change against the remediation of incident ${top.incident_id}`);
    }
  }
  return out;
}

/**
 * Deterministic synthesis used when the reasoning service cannot produce
 * one. Confidence is always 0.
 */
export function heuristicSynthesis(params: {
  file: string;
  tier1: Tier1Result;
  signals: SignalResult[];
  changedFiles: string[];
  thresholds: Thresholds;
  cause: string;
}): Synthesis {
  const all = [...knownTier1Signals(params.tier1), ...params.signals];
  const highs = all.filter((signal) => signal.signal_level === "HIGH");
  return {
    risk_level: combinedLevel(params.tier1, params.signals),
    confidence: 0,
    key_evidence: (highs.length > 0 ? highs : all).map((signal) => signal.evidence_text),
    recommendations: recommendationsFor(params),
    reasoning_text: `Heuristic assessment (${params.cause}): ${highs.length} of ${all.length} known signals are HIGH.`,
  };
}

export function detectBreakthrough(
  before: RiskLevel,
  after: RiskLevel,
  hop: number,
  triggering: SignalName,
): Breakthrough | null {
  if (before === after) return null;
  const rank: Record<RiskLevel, number> = { LOW: 0, MEDIUM: 1, HIGH: 2 };
  return {
    hop,
    level_before: before,
    level_after: after,
    triggering_signal: triggering,
    is_escalation: rank[after] > rank[before],
  };
}

export function capConfidence(synthesis: Synthesis, cap: number | null): Synthesis {
  if (cap === null || synthesis.confidence <= cap) return synthesis;
  return { ...synthesis, confidence: cap };
}
