import type { RiskConfig } from "../config";
import { withTimeout } from "../concurrency";
import { GraphUnavailableError, errorMessage, isGraphUnavailable } from "../errors";
import { emitterFor, type RiskLogger } from "../logger";
import { withRetry } from "../retry";
import type { GraphReader } from "./types";

type GraphOperation = keyof GraphReader;

export interface GraphAdapterOptions {
  latencyBudgetMs: number;
  edgeLatencyBudgetMs: number;
  retries: number;
  logger?: RiskLogger;
}

export function adapterOptionsFromConfig(config: RiskConfig["graph"], logger?: RiskLogger): GraphAdapterOptions {
  return {
    latencyBudgetMs: config.latencyBudgetMs,
    edgeLatencyBudgetMs: config.edgeLatencyBudgetMs,
    retries: config.retries,
    logger,
  };
}

/**
 * Wraps a graph store so each call runs under its latency budget. A call that
 * throws or overruns raises GraphUnavailableError and is retried `retries` times.
 */
export function createGraphAdapter(inner: GraphReader, options: GraphAdapterOptions): GraphReader {
  const emit = emitterFor(options.logger);

  const budgetFor = (operation: GraphOperation, hops = 1) => {
    if (operation === "coChanged") return options.edgeLatencyBudgetMs;
    if (operation === "neighbors") return options.latencyBudgetMs * Math.max(1, hops);
    return options.latencyBudgetMs;
  };

  const call = <T>(operation: GraphOperation, file: string, run: () => Promise<T>, hops?: number): Promise<T> => {
    const budget = budgetFor(operation, hops);
    return withRetry(
      async () => {
        try {
          return await withTimeout(
            () => run(),
            budget,
            () => new GraphUnavailableError(operation, `exceeded ${budget}ms latency budget`),
          );
        } catch (error) {
          if (isGraphUnavailable(error)) throw error;
          throw new GraphUnavailableError(operation, errorMessage(error), { cause: error });
        }
      },
      {
        retries: options.retries,
        baseDelayMs: 0,
        maxDelayMs: 0,
        jitter: false,
        retryOn: isGraphUnavailable,
        onRetry: ({ attempt, error }) =>
          emit({
            node: "graph",
            file,
            level: "warn",
            event: "GRAPH_RETRY",
            data: { operation, attempt, error: errorMessage(error) },
          }),
        onGiveup: ({ attempt, error }) =>
          emit({
            node: "graph",
            file,
            level: "error",
            event: "GRAPH_UNAVAILABLE",
            data: { operation, attempts: attempt, error: errorMessage(error) },
          }),
      },
    );
  };

  return {
    coupling: (file) => call("coupling", file, () => inner.coupling(file)),
    coChanged: (file) => call("coChanged", file, () => inner.coChanged(file)),
    testRatio: (file) => call("testRatio", file, () => inner.testRatio(file)),
    ownershipHistory: (file, windowDays) =>
      call("ownershipHistory", file, () => inner.ownershipHistory(file, windowDays)),
    neighbors: (file, hops) => call("neighbors", file, () => inner.neighbors(file, hops), hops),
    recentCommits: (file, limit) => call("recentCommits", file, () => inner.recentCommits(file, limit)),
  };
}
