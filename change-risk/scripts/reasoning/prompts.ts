import type { EvidenceItem, SignalOutcome, SignalResult, Tier1Result } from "../types";
import type { DecisionRequest, SynthesisRequest } from "./service";

const STRICT_SUFFIX = [
  "Your previous answer could not be parsed.",
  "Return exactly one JSON object and nothing else: no markdown fences, no commentary.",
  "Use only the field names and enum values listed above.",
];

function safeExcerpt(value: string, maxChars: number): string {
  const flat = value.replace(/\s+/g, " ").trim();
  return flat.length <= maxChars ? flat : `${flat.slice(0, maxChars)}…`;
}

export function evidenceLinesForPrompt(evidence: EvidenceItem[], limit: number): string[] {
  return evidence.slice(-limit).map((item) => {
    const signal = item.signal ? ` ${item.signal}=${item.signal_level ?? "?"}` : "";
    return `[ID:${item.id}] (hop ${item.hop}, ${item.kind}${signal}) ${safeExcerpt(item.summary, 300)}`;
  });
}

function outcomeLine(name: string, outcome: SignalOutcome): string {
  if (outcome.status === "ok") return `- ${name}: ${outcome.result.signal_level} (${outcome.result.evidence_text})`;
  if (outcome.status === "disabled") return `- ${name}: disabled (no evidence)`;
  return `- ${name}: unknown (${safeExcerpt(outcome.reason, 120)})`;
}

function signalLines(signals: SignalResult[]): string[] {
  if (signals.length === 0) return ["- none yet"];
  return signals.map((signal) => `- ${signal.name}: ${signal.signal_level} (${signal.evidence_text})`);
}

export function tier1Lines(tier1: Tier1Result): string[] {
  return Object.entries(tier1.signals).map(([name, outcome]) => outcomeLine(name, outcome));
}

export function buildDecisionPrompts(
  request: DecisionRequest,
  options: { strict: boolean; maxEvidence: number },
): { systemPrompt: string; userPrompt: string } {
  const actions = [
    request.available_signals.length > 0
      ? `{"action":"CALCULATE_SIGNAL","target":${request.available_signals.map((name) => `"${name}"`).join("|")},"reasoning":string}`
      : null,
    request.can_expand ? '{"action":"EXPAND_CONTEXT","reasoning":string}' : null,
    '{"action":"FINALIZE","reasoning":string}',
  ].filter((line): line is string => line !== null);

  return {
    systemPrompt: [
      "You investigate the risk of a pending code change using graph evidence.",
      "Each turn choose exactly one next step. Gather only evidence that could change the risk level.",
      "Finalize as soon as the evidence is sufficient.",
      "Allowed responses:",
      ...actions,
      ...(options.strict ? STRICT_SUFFIX : []),
    ].join("\n"),
    userPrompt: [
      `File under review: ${request.file_path}`,
      `Hop ${request.hop} of ${request.max_hops}`,
      `Changed files (${request.changed_files.length}): ${request.changed_files.slice(0, 20).join(", ")}`,
      `Baseline result: ${request.tier1.risk_level}, escalated=${request.tier1.escalate}`,
      ...tier1Lines(request.tier1),
      "On-demand signals gathered:",
      ...signalLines(request.signals),
      `Context nodes loaded: ${request.context_size}`,
      ...request.context_sample.slice(0, 10).map((node) => `- ${node.path} (hop ${node.hop}, ${node.relation})`),
      "Evidence so far:",
      ...evidenceLinesForPrompt(request.evidence, options.maxEvidence),
    ].join("\n"),
  };
}

export function buildSynthesisPrompts(
  request: SynthesisRequest,
  options: { strict: boolean; maxEvidence: number },
): { systemPrompt: string; userPrompt: string } {
  return {
    systemPrompt: [
      "You write the final risk assessment for a pending code change.",
      "Base every statement on the evidence lines; cite evidence IDs in key_evidence.",
      "confidence reflects evidence strength: low when signals are missing or contradictory.",
      'Respond with {"risk_level":"LOW"|"MEDIUM"|"HIGH","confidence":number between 0 and 1,"key_evidence":string[],"recommendations":string[],"reasoning_text":string}.',
      ...(options.strict ? STRICT_SUFFIX : []),
    ].join("\n"),
    userPrompt: [
      `File under review: ${request.file_path}`,
      `Changed files (${request.changed_files.length}): ${request.changed_files.slice(0, 20).join(", ")}`,
      `Investigation stopped after ${request.hops} hop(s): ${request.stop_reason}`,
      ...tier1Lines(request.tier1),
      "On-demand signals:",
      ...signalLines(request.signals),
      "Evidence:",
      ...evidenceLinesForPrompt(request.evidence, options.maxEvidence),
    ].join("\n"),
  };
}
