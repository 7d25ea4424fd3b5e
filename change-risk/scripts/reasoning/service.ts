import type { RiskConfig } from "../config";
import type { NeighborNode } from "../graph/types";
import { ReasoningMalformedResponseError, errorMessage } from "../errors";
import type {
  EvidenceItem,
  ReasoningAudit,
  SignalResult,
  StopReason,
  Synthesis,
  Tier1Result,
  Tier2SignalName,
} from "../types";
import { chatJSON, resolveProviderRuntimeConfig, type FetchLike, type ProviderRuntimeConfig } from "./llm";
import { buildDecisionPrompts, buildSynthesisPrompts } from "./prompts";
import { DecisionSchema, SynthesisSchema, describeIssues, extractJson, type Decision } from "./schemas";

export interface DecisionRequest {
  file_path: string;
  changed_files: string[];
  hop: number;
  max_hops: number;
  tier1: Tier1Result;
  evidence: EvidenceItem[];
  signals: SignalResult[];
  available_signals: Tier2SignalName[];
  can_expand: boolean;
  context_size: number;
  context_sample: NeighborNode[];
}

export interface SynthesisRequest {
  file_path: string;
  changed_files: string[];
  tier1: Tier1Result;
  evidence: EvidenceItem[];
  signals: SignalResult[];
  stop_reason: StopReason;
  hops: number;
}

export interface ReasoningCallOptions {
  strict: boolean;
  signal?: AbortSignal;
}

/**
 * Boundary to the model. Implementations throw ReasoningMalformedResponseError
 * for output that is not a valid decision or synthesis.
 */
export interface ReasoningService {
  readonly model: string;
  decide: (request: DecisionRequest, options: ReasoningCallOptions) => Promise<Decision>;
  synthesize: (request: SynthesisRequest, options: ReasoningCallOptions) => Promise<Synthesis>;
}

function parseDecision(content: string): Decision {
  let raw: unknown;
  try {
    raw = extractJson(content);
  } catch (error) {
    throw new ReasoningMalformedResponseError("decide", errorMessage(error), content);
  }
  const parsed = DecisionSchema.safeParse(raw);
  if (!parsed.success) throw new ReasoningMalformedResponseError("decide", describeIssues(parsed.error), content);
  return parsed.data;
}

function parseSynthesis(content: string): Synthesis {
  let raw: unknown;
  try {
    raw = extractJson(content);
  } catch (error) {
    throw new ReasoningMalformedResponseError("synthesize", errorMessage(error), content);
  }
  const parsed = SynthesisSchema.safeParse(raw);
  if (!parsed.success) throw new ReasoningMalformedResponseError("synthesize", describeIssues(parsed.error), content);
  return parsed.data;
}

export function createLlmReasoningService(params: {
  runtime: ProviderRuntimeConfig;
  runId: string;
  maxEvidenceItems: number;
  onAudit?: (audit: ReasoningAudit) => void;
  fetchImpl?: FetchLike;
}): ReasoningService {
  return {
    model: params.runtime.model,
    decide(request, options) {
      const prompts = buildDecisionPrompts(request, { strict: options.strict, maxEvidence: params.maxEvidenceItems });
      return chatJSON({
        config: params.runtime,
        ...prompts,
        parse: parseDecision,
        signal: options.signal,
        fetchImpl: params.fetchImpl,
        audit: {
          run_id: params.runId,
          file: request.file_path,
          hop: request.hop,
          role: "decide",
          strict: options.strict,
          onAudit: params.onAudit,
        },
      });
    },
    synthesize(request, options) {
      const prompts = buildSynthesisPrompts(request, { strict: options.strict, maxEvidence: params.maxEvidenceItems });
      return chatJSON({
        config: params.runtime,
        ...prompts,
        parse: parseSynthesis,
        signal: options.signal,
        fetchImpl: params.fetchImpl,
        audit: {
          run_id: params.runId,
          file: request.file_path,
          hop: request.hops,
          role: "synthesize",
          strict: options.strict,
          onAudit: params.onAudit,
        },
      });
    },
  };
}

/** Null when no provider key is configured; the caller then runs in degraded mode. */
export function createReasoningServiceFromEnv(params: {
  config: RiskConfig;
  runId: string;
  onAudit?: (audit: ReasoningAudit) => void;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: FetchLike;
}): ReasoningService | null {
  const runtime = resolveProviderRuntimeConfig(
    {
      provider: params.config.llm.provider,
      model: params.config.llm.model,
      temperature: params.config.llm.temperature,
    },
    params.env,
  );
  if (!runtime) return null;
  return createLlmReasoningService({
    runtime,
    runId: params.runId,
    maxEvidenceItems: params.config.investigation.maxEvidenceItemsForPrompt,
    onAudit: params.onAudit,
    fetchImpl: params.fetchImpl,
  });
}
