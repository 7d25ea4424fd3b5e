import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

export const CONFIG_PATH = path.join("change-risk", "config", "risk.config.json");

export interface Thresholds {
  coupling: { low: number; medium: number };
  coChange: { low: number; medium: number };
  testRatio: { low: number; medium: number };
  ownershipDays: { high: number; medium: number };
  incidentScore: { medium: number; high: number };
}

export type CacheBackend = "memory" | "file" | "none";

export interface RiskConfig {
  thresholds: Thresholds;
  cache: { backend: CacheBackend; ttlMs: number; dir: string };
  graph: { snapshotPath: string; latencyBudgetMs: number; edgeLatencyBudgetMs: number; retries: number };
  tier1: { signalTimeoutMs: number; concurrency: number };
  temporal: { windowDays: number; minFrequency: number; maxFilesPerCommit: number };
  tier2: { ownershipWindowDays: number; recentCommitLimit: number; incidentLimit: number; signalTimeoutMs: number };
  investigation: {
    enabled: boolean;
    callTimeoutMs: number;
    wallClockBudgetMs: number;
    degradedConfidenceCap: number;
    maxReasoningCallsPerRun: number;
    maxEvidenceItemsForPrompt: number;
  };
  validation: { storePath: string | null; fpRateThreshold: number; minUses: number };
  llm: { provider: string | null; model: string | null; temperature: number };
  output: { runsDir: string; writeTraces: boolean; tracesDir: string };
}

const LowMediumSchema = z.object({ low: z.number(), medium: z.number() }).partial();

export const RiskConfigFileSchema = z.object({
  thresholds: z
    .object({
      coupling: LowMediumSchema,
      coChange: LowMediumSchema,
      testRatio: LowMediumSchema,
      ownershipDays: z.object({ high: z.number(), medium: z.number() }).partial(),
      incidentScore: z.object({ medium: z.number(), high: z.number() }).partial(),
    })
    .partial()
    .optional(),
  cache: z
    .object({
      backend: z.enum(["memory", "file", "none"]),
      ttlMs: z.number().int().positive(),
      dir: z.string(),
    })
    .partial()
    .optional(),
  graph: z
    .object({
      snapshotPath: z.string(),
      latencyBudgetMs: z.number().positive(),
      edgeLatencyBudgetMs: z.number().positive(),
      retries: z.number().int().min(0),
    })
    .partial()
    .optional(),
  tier1: z
    .object({
      signalTimeoutMs: z.number().positive(),
      concurrency: z.number().int().positive(),
    })
    .partial()
    .optional(),
  temporal: z
    .object({
      windowDays: z.number().int().positive(),
      minFrequency: z.number().min(0).max(1),
      maxFilesPerCommit: z.number().int().positive(),
    })
    .partial()
    .optional(),
  tier2: z
    .object({
      ownershipWindowDays: z.number().int().positive(),
      recentCommitLimit: z.number().int().positive(),
      incidentLimit: z.number().int().positive(),
      signalTimeoutMs: z.number().positive(),
    })
    .partial()
    .optional(),
  investigation: z
    .object({
      enabled: z.boolean(),
      callTimeoutMs: z.number().positive(),
      wallClockBudgetMs: z.number().positive(),
      degradedConfidenceCap: z.number().min(0).max(1),
      maxReasoningCallsPerRun: z.number().int().positive(),
      maxEvidenceItemsForPrompt: z.number().int().positive(),
    })
    .partial()
    .optional(),
  validation: z
    .object({
      storePath: z.string().nullable(),
      fpRateThreshold: z.number().min(0).max(1),
      minUses: z.number().int().positive(),
    })
    .partial()
    .optional(),
  llm: z
    .object({
      provider: z.string().nullable(),
      model: z.string().nullable(),
      temperature: z.number().min(0).max(2),
    })
    .partial()
    .optional(),
  output: z
    .object({
      runsDir: z.string(),
      writeTraces: z.boolean(),
      tracesDir: z.string(),
    })
    .partial()
    .optional(),
});

export type RiskConfigFile = z.infer<typeof RiskConfigFileSchema>;

export function withDefaults(config: RiskConfigFile = {}): RiskConfig {
  const t = config.thresholds;
  return {
    thresholds: {
      coupling: { low: t?.coupling?.low ?? 5, medium: t?.coupling?.medium ?? 10 },
      coChange: { low: t?.coChange?.low ?? 0.3, medium: t?.coChange?.medium ?? 0.7 },
      testRatio: { low: t?.testRatio?.low ?? 0.8, medium: t?.testRatio?.medium ?? 0.3 },
      ownershipDays: { high: t?.ownershipDays?.high ?? 30, medium: t?.ownershipDays?.medium ?? 90 },
      incidentScore: { medium: t?.incidentScore?.medium ?? 5, high: t?.incidentScore?.high ?? 10 },
    },
    cache: {
      backend: config.cache?.backend ?? "memory",
      ttlMs: config.cache?.ttlMs ?? 15 * 60 * 1000,
      dir: config.cache?.dir ?? path.join("cache", "signals"),
    },
    graph: {
      snapshotPath: config.graph?.snapshotPath ?? path.join("change-risk", "fixtures", "sample-graph.json"),
      latencyBudgetMs: config.graph?.latencyBudgetMs ?? 50,
      edgeLatencyBudgetMs: config.graph?.edgeLatencyBudgetMs ?? 20,
      retries: config.graph?.retries ?? 1,
    },
    tier1: {
      signalTimeoutMs: config.tier1?.signalTimeoutMs ?? 50,
      concurrency: config.tier1?.concurrency ?? 4,
    },
    temporal: {
      windowDays: config.temporal?.windowDays ?? 90,
      minFrequency: config.temporal?.minFrequency ?? 0.3,
      maxFilesPerCommit: config.temporal?.maxFilesPerCommit ?? 200,
    },
    tier2: {
      ownershipWindowDays: config.tier2?.ownershipWindowDays ?? 90,
      recentCommitLimit: config.tier2?.recentCommitLimit ?? 10,
      incidentLimit: config.tier2?.incidentLimit ?? 5,
      signalTimeoutMs: config.tier2?.signalTimeoutMs ?? 500,
    },
    investigation: {
      enabled: config.investigation?.enabled ?? true,
      callTimeoutMs: config.investigation?.callTimeoutMs ?? 3000,
      wallClockBudgetMs: config.investigation?.wallClockBudgetMs ?? 8000,
      degradedConfidenceCap: config.investigation?.degradedConfidenceCap ?? 0.3,
      maxReasoningCallsPerRun: config.investigation?.maxReasoningCallsPerRun ?? 60,
      maxEvidenceItemsForPrompt: config.investigation?.maxEvidenceItemsForPrompt ?? 30,
    },
    validation: {
      storePath: config.validation?.storePath === undefined ? path.join("cache", "signal-stats.json") : config.validation.storePath,
      fpRateThreshold: config.validation?.fpRateThreshold ?? 0.03,
      minUses: config.validation?.minUses ?? 20,
    },
    llm: {
      provider: config.llm?.provider ?? null,
      model: config.llm?.model ?? null,
      temperature: config.llm?.temperature ?? 0.1,
    },
    output: {
      runsDir: config.output?.runsDir ?? "runs",
      writeTraces: config.output?.writeTraces ?? false,
      tracesDir: config.output?.tracesDir ?? "traces",
    },
  };
}

export function parseConfig(raw: unknown): RiskConfig {
  const parsed = RiskConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid risk config: ${issues.join("; ")}`);
  }
  return withDefaults(parsed.data);
}

export async function loadConfig(configPath = CONFIG_PATH): Promise<RiskConfig> {
  let text: string;
  try {
    text = await readFile(configPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return withDefaults();
    }
    throw error;
  }
  return parseConfig(JSON.parse(text));
}
