import "dotenv/config";
import { z } from "zod";
import { assessChange } from "./assess";
import { writeJsonPretty, writeRunPayload } from "./artifacts";
import { createMemoryCache, createSignalCache } from "./cache/cache";
import { CONFIG_PATH, loadConfig, type RiskConfig } from "./config";
import { errorMessage } from "./errors";
import { classifyFailure } from "./failures";
import { adapterOptionsFromConfig, createGraphAdapter } from "./graph/adapter";
import { createMemoryGraph } from "./graph/memoryGraph";
import { loadSnapshot } from "./graph/snapshot";
import { createBudgetManager } from "./investigation/budget";
import { createLogger, formatEventLine, type RiskLogger } from "./logger";
import { createReasoningServiceFromEnv } from "./reasoning/service";
import { createBm25Index, incidentDocument } from "./search/bm25";
import { createCoChangeBuilder } from "./temporal/coChangeBuilder";
import type { InvestigationTrace, ReasoningAudit } from "./types";
import { createJsonStatStore, createMemoryStatStore } from "./validation/store";
import { createSignalValidator } from "./validation/validator";

const SignalNameSchema = z.enum(["coupling", "co_change", "test_ratio", "ownership_churn", "incident_similarity"]);

const USAGE = [
  "usage:",
  "  check <file...> [--graph <snapshot.json>] [--config <risk.config.json>] [--verbose]",
  "  feedback <signal> <fp|tp> [reason...]",
  "  enable <signal> [--reset]",
  "  stats",
  "  rebuild-coupling [--graph <snapshot.json>] [--out <snapshot.json>]",
].join("\n");

interface ParsedArgs {
  command: string | undefined;
  positional: string[];
  flags: Map<string, string | true>;
}

function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const positional: string[] = [];
  const flags = new Map<string, string | true>();
  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const next = rest[i + 1];
    if (next !== undefined && !next.startsWith("--") && arg !== "--verbose" && arg !== "--reset") {
      flags.set(arg.slice(2), next);
      i += 1;
    } else {
      flags.set(arg.slice(2), true);
    }
  }
  return { command, positional, flags };
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === "string" ? value : undefined;
}

function formatRunId(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}

function createValidator(config: RiskConfig, logger: RiskLogger) {
  const store = config.validation.storePath ? createJsonStatStore(config.validation.storePath) : createMemoryStatStore();
  return createSignalValidator({
    store,
    fpRateThreshold: config.validation.fpRateThreshold,
    minUses: config.validation.minUses,
    logger,
  });
}

async function runCheck(args: ParsedArgs, config: RiskConfig, runId: string, logger: RiskLogger) {
  if (args.positional.length === 0) throw new Error(`check needs at least one file\n${USAGE}`);
  const snapshotPath = stringFlag(args, "graph") ?? config.graph.snapshotPath;
  const snapshot = await loadSnapshot(snapshotPath);
  const store = createMemoryGraph(snapshot);
  const audits: ReasoningAudit[] = [];
  const reasoning = createReasoningServiceFromEnv({ config, runId, onAudit: (audit) => audits.push(audit) });
  const budget = createBudgetManager(config.investigation, logger, runId);

  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error("interrupted"));
  process.once("SIGINT", onSigint);
  try {
    const result = await assessChange(
      {
        runId,
        graph: createGraphAdapter(store, adapterOptionsFromConfig(config.graph, logger)),
        cache: createSignalCache(config.cache),
        traceCache: createMemoryCache<InvestigationTrace>(),
        search: createBm25Index(snapshot.incidents.map(incidentDocument)),
        config,
        gate: createValidator(config, logger),
        reasoning,
        budget,
        logger,
      },
      args.positional,
      { signal: controller.signal },
    );

    for (const file of result.files) {
      console.log(`${file.risk_level.padEnd(6)} ${file.confidence.toFixed(2)} ${file.phase.padEnd(13)} ${file.file_path}`);
      for (const recommendation of file.recommendations) console.log(`         - ${recommendation}`);
    }
    for (const failure of result.failures) {
      console.log(`FAILED ${failure.kind} ${failure.file_path}: ${failure.message}`);
    }
    console.log(`overall: ${result.overall_risk}${result.degraded ? " (degraded: no reasoning service)" : ""}`);

    return {
      snapshot_path: snapshotPath,
      reasoning_model: reasoning?.model ?? null,
      assessment: result,
      llm_audits: audits,
      budget_snapshot_end: budget.snapshot(),
    };
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

async function runFeedback(args: ParsedArgs, config: RiskConfig, logger: RiskLogger) {
  const [rawName, verdict, ...reason] = args.positional;
  const name = SignalNameSchema.safeParse(rawName);
  if (!name.success || (verdict !== "fp" && verdict !== "tp")) throw new Error(`invalid feedback arguments\n${USAGE}`);
  const result = await createValidator(config, logger).recordFeedback(name.data, verdict === "fp", reason.join(" "));
  if (!result.recorded) throw new Error(result.error);
  console.log(JSON.stringify(result.stat, null, 2));
  return { feedback: result.stat };
}

async function runEnable(args: ParsedArgs, config: RiskConfig, logger: RiskLogger) {
  const name = SignalNameSchema.safeParse(args.positional[0]);
  if (!name.success) throw new Error(`invalid signal name\n${USAGE}`);
  const stat = await createValidator(config, logger).enable(name.data, { resetCounters: args.flags.has("reset") });
  console.log(JSON.stringify(stat, null, 2));
  return { enabled: stat };
}

async function runStats(config: RiskConfig, logger: RiskLogger) {
  const stats = await createValidator(config, logger).listStats();
  for (const stat of stats) {
    console.log(
      `${stat.name.padEnd(20)} ${stat.enabled ? "enabled " : "DISABLED"} uses=${stat.total_uses} fp_rate=${stat.fp_rate.toFixed(4)}`,
    );
  }
  return { stats };
}

async function runRebuildCoupling(args: ParsedArgs, config: RiskConfig, logger: RiskLogger) {
  const snapshotPath = stringFlag(args, "graph") ?? config.graph.snapshotPath;
  const outPath = stringFlag(args, "out") ?? snapshotPath;
  const snapshot = await loadSnapshot(snapshotPath);
  const store = createMemoryGraph(snapshot);
  const builder = createCoChangeBuilder({ graph: store, config: config.temporal, logger });
  const result = await builder.rebuildFull();
  writeJsonPretty(outPath, { ...snapshot, co_changes: await store.listCoChangeEdges() });
  console.log(`co-change edges: ${result.edges_written} written to ${outPath}`);
  return { coupling: result, out_path: outPath };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const startedAt = new Date();
  const runId = formatRunId(startedAt);
  const configPath = stringFlag(args, "config") ?? CONFIG_PATH;
  const logger = createLogger(runId, {
    sink: args.flags.has("verbose") ? (event) => console.error(formatEventLine(event)) : undefined,
  });
  let config: RiskConfig | null = null;

  try {
    config = await loadConfig(configPath);
    let output: Record<string, unknown>;
    if (args.command === "check") output = await runCheck(args, config, runId, logger);
    else if (args.command === "feedback") output = await runFeedback(args, config, logger);
    else if (args.command === "enable") output = await runEnable(args, config, logger);
    else if (args.command === "stats") output = await runStats(config, logger);
    else if (args.command === "rebuild-coupling") output = await runRebuildCoupling(args, config, logger);
    else {
      console.error(USAGE);
      process.exitCode = 2;
      return;
    }

    if (args.command === "check") {
      const written = writeRunPayload(config.output.runsDir, runId, {
        run_id: runId,
        generated_at: startedAt.toISOString(),
        command: args.command,
        config_path: configPath,
        config,
        status: "ok",
        ...output,
        events: logger.getEvents(),
      });
      console.log(`Run written: ${written.path}`);
    }
  } catch (error) {
    const failure = classifyFailure(error);
    console.error(errorMessage(error));
    process.exitCode = 1;
    if (args.command === "check") {
      const written = writeRunPayload(config?.output.runsDir ?? "runs", runId, {
        run_id: runId,
        generated_at: startedAt.toISOString(),
        command: args.command,
        config_path: configPath,
        ...(config ? { config } : {}),
        status: "error",
        error: failure,
        events: logger.getEvents(),
      });
      console.error(`Run written: ${written.path}`);
    }
  }
}

void main();
