import type { Thresholds } from "../config";
import type { RiskLevel, Tier1Values } from "../types";

export function couplingLevel(count: number, t: Thresholds): RiskLevel {
  if (count <= t.coupling.low) return "LOW";
  if (count <= t.coupling.medium) return "MEDIUM";
  return "HIGH";
}

export function coChangeLevel(frequency: number, t: Thresholds): RiskLevel {
  if (frequency <= t.coChange.low) return "LOW";
  if (frequency <= t.coChange.medium) return "MEDIUM";
  return "HIGH";
}

export function testRatioLevel(ratio: number, t: Thresholds): RiskLevel {
  if (ratio >= t.testRatio.low) return "LOW";
  if (ratio >= t.testRatio.medium) return "MEDIUM";
  return "HIGH";
}

/** `null` means no ownership transition inside the window. */
export function ownershipLevel(daysSinceTransition: number | null, t: Thresholds): RiskLevel {
  if (daysSinceTransition === null) return "LOW";
  if (daysSinceTransition < t.ownershipDays.high) return "HIGH";
  if (daysSinceTransition <= t.ownershipDays.medium) return "MEDIUM";
  return "LOW";
}

export function incidentLevel(topScore: number, t: Thresholds): RiskLevel {
  if (topScore >= t.incidentScore.high) return "HIGH";
  if (topScore >= t.incidentScore.medium) return "MEDIUM";
  return "LOW";
}

/** Missing values (unknown or disabled signals) never trigger escalation. */
export function shouldEscalate(values: Tier1Values, t: Thresholds): boolean {
  return (
    (values.coupling !== undefined && values.coupling > t.coupling.medium) ||
    (values.max_co_change_frequency !== undefined && values.max_co_change_frequency > t.coChange.medium) ||
    (values.test_ratio !== undefined && values.test_ratio < t.testRatio.medium)
  );
}

/** Two or more HIGH signals is HIGH, exactly one is MEDIUM. */
export function levelFromHighCount(levels: RiskLevel[]): RiskLevel {
  const highs = levels.filter((level) => level === "HIGH").length;
  if (highs >= 2) return "HIGH";
  if (highs === 1) return "MEDIUM";
  return "LOW";
}

const RANK: Record<RiskLevel, number> = { LOW: 0, MEDIUM: 1, HIGH: 2 };

export function compareLevels(left: RiskLevel, right: RiskLevel): number {
  return RANK[left] - RANK[right];
}
