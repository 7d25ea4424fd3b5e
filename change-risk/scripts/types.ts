export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";

export type Tier1SignalName = "coupling" | "co_change" | "test_ratio";
export type Tier2SignalName = "ownership_churn" | "incident_similarity";
export type SignalName = Tier1SignalName | Tier2SignalName;

export const TIER1_SIGNALS: readonly Tier1SignalName[] = ["coupling", "co_change", "test_ratio"];
export const TIER2_SIGNALS: readonly Tier2SignalName[] = ["ownership_churn", "incident_similarity"];

export interface SignalResult {
  name: SignalName;
  file_path: string;
  value: number;
  evidence_text: string;
  false_positive_rate: number;
  signal_level: RiskLevel;
  computed_at: string;
  details?: Record<string, unknown>;
}

export type SignalOutcome =
  | { status: "ok"; result: SignalResult; cache_hit: boolean }
  | { status: "unknown"; reason: string }
  | { status: "disabled" };

export interface Tier1Values {
  coupling?: number;
  max_co_change_frequency?: number;
  test_ratio?: number;
}

export interface Tier1Result {
  file_path: string;
  risk_level: "LOW" | "HIGH";
  escalate: boolean;
  signals: Record<Tier1SignalName, SignalOutcome>;
  values: Tier1Values;
  duration_ms: number;
}

export type EvidenceKind = "tier1_signal" | "tier2_signal" | "context" | "decision" | "note";

export interface EvidenceItem {
  id: string;
  hop: number;
  kind: EvidenceKind;
  summary: string;
  signal?: SignalName;
  signal_level?: RiskLevel;
  at: string;
}

export interface Breakthrough {
  hop: number;
  level_before: RiskLevel;
  level_after: RiskLevel;
  triggering_signal: SignalName;
  is_escalation: boolean;
}

export type StopReason =
  | "finalize_requested"
  | "hop_limit"
  | "reasoning_timeout"
  | "reasoning_malformed"
  | "reasoning_unavailable"
  | "budget_exhausted"
  | "cancelled";

export interface Synthesis {
  risk_level: RiskLevel;
  confidence: number;
  key_evidence: string[];
  recommendations: string[];
  reasoning_text: string;
}

export type AssessmentPhase = "baseline" | "investigation" | "degraded";

export type DecisionAction = "CALCULATE_SIGNAL" | "EXPAND_CONTEXT" | "FINALIZE";

/** `action` is what the agent did; `requested` is kept only when the model's choice was overridden. */
export interface DecisionRecord {
  hop: number;
  action: DecisionAction;
  target?: string;
  requested?: { action: DecisionAction; target?: string };
  reasoning: string;
  overridden: boolean;
}

export interface InvestigationTrace {
  file_path: string;
  hops: number;
  stop_reason: StopReason;
  decisions: DecisionRecord[];
  context_nodes: number;
  expanded: boolean;
  breakthroughs: Breakthrough[];
  synthesis_source: "reasoning" | "heuristic";
  duration_ms: number;
}

export interface RiskAssessment {
  file_path: string;
  phase: AssessmentPhase;
  risk_level: RiskLevel;
  confidence: number;
  escalated: boolean;
  signals: SignalResult[];
  unknown_signals: Array<{ name: SignalName; reason: string }>;
  disabled_signals: SignalName[];
  evidence_chain: EvidenceItem[];
  key_evidence: string[];
  recommendations: string[];
  reasoning_text: string;
  trace?: InvestigationTrace;
}

export interface SignalStat {
  name: string;
  total_uses: number;
  false_positives: number;
  true_positives: number;
  fp_rate: number;
  enabled: boolean;
  disabled_at: string | null;
  updated_at: string;
}

export interface FeedbackEvent {
  signal_name: string;
  was_false_positive: boolean;
  reason: string;
  ts: string;
}

export type EventLevel = "info" | "warn" | "error";

export interface RiskEvent {
  ts: string;
  run_id: string;
  node: string;
  file?: string | null;
  level: EventLevel;
  event: string;
  data?: Record<string, unknown>;
}

export interface ReasoningAudit {
  ts: string;
  run_id: string;
  file?: string | null;
  hop?: number;
  role: "decide" | "synthesize";
  model: string;
  prompt_hash: string;
  strict: boolean;
  ok: boolean;
  duration_ms: number;
  prompt_chars: number;
  completion_chars: number;
  error?: string;
}

export type FailKind =
  | "GRAPH_UNAVAILABLE"
  | "REASONING_TIMEOUT"
  | "REASONING_MALFORMED"
  | "VALIDATOR_WRITE_FAILED"
  | "CANCELLED"
  | "UNKNOWN";

export interface FileFailure {
  file_path: string;
  kind: FailKind;
  message: string;
  hints: string[];
}

export interface ChangeAssessment {
  run_id: string;
  generated_at: string;
  overall_risk: RiskLevel;
  degraded: boolean;
  files: RiskAssessment[];
  failures: FileFailure[];
  fail_taxonomy_summary: Record<FailKind, number>;
  stats: {
    files_total: number;
    files_escalated: number;
    files_investigated: number;
    files_failed: number;
    cache_hits: number;
    cache_misses: number;
    duration_ms: number;
  };
}
