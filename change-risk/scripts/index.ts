export { assessChange, degradedAssessment, type AssessDeps } from "./assess";
export {
  cacheKey,
  createDisabledCache,
  createMemoryCache,
  createSignalCache,
  invalidateOnCommit,
  invalidateOnIncidentLink,
  traceKey,
  type EphemeralCache,
} from "./cache/cache";
export { loadConfig, parseConfig, withDefaults, type RiskConfig, type Thresholds } from "./config";
export * from "./errors";
export { createGraphAdapter, adapterOptionsFromConfig } from "./graph/adapter";
export { createMemoryGraph } from "./graph/memoryGraph";
export { loadSnapshot, parseSnapshot } from "./graph/snapshot";
export type { GraphReader, GraphStore, GraphWriter } from "./graph/types";
export { investigateFile, MAX_HOPS, type InvestigationDeps, type InvestigationResult } from "./investigation/agent";
export { createBudgetManager, type BudgetManager } from "./investigation/budget";
export { createLogger, type RiskLogger } from "./logger";
export { createLlmReasoningService, createReasoningServiceFromEnv, type ReasoningService } from "./reasoning/service";
export { createBm25Index, incidentDocument, type IncidentSearchIndex } from "./search/bm25";
export { evaluateTier1 } from "./signals/tier1";
export { calculateTier2 } from "./signals/tier2";
export { shouldEscalate } from "./signals/thresholds";
export { createCoChangeBuilder, type CoChangeBuilder } from "./temporal/coChangeBuilder";
export { ingestCommit, linkIncident } from "./temporal/ingest";
export type * from "./types";
export { TIER1_SIGNALS, TIER2_SIGNALS } from "./types";
export { createJsonStatStore, createMemoryStatStore, type SignalStatStore } from "./validation/store";
export { createSignalValidator, type SignalValidator } from "./validation/validator";
