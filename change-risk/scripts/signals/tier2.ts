import type { EphemeralCache } from "../cache/cache";
import type { RiskConfig } from "../config";
import type { GraphReader, OwnershipHistory } from "../graph/types";
import type { RiskLogger } from "../logger";
import type { IncidentSearchIndex } from "../search/bm25";
import type { SignalOutcome, SignalResult, Tier2SignalName } from "../types";
import { evaluateSignal, type SignalComputation, type SignalGate } from "./evaluate";
import { incidentLevel, ownershipLevel } from "./thresholds";

const DAY_MS = 24 * 60 * 60 * 1000;
const CURRENT_OWNER_DAYS = 30;

export interface Tier2Deps {
  graph: GraphReader;
  cache: EphemeralCache<SignalResult>;
  search: IncidentSearchIndex;
  config: RiskConfig;
  gate?: SignalGate;
  logger?: RiskLogger;
  now?: () => Date;
}

export interface OwnershipTransition {
  current_owner: string | null;
  previous_owner: string | null;
  days_since_transition: number | null;
  commit_count: number;
}

function topAuthor(commits: OwnershipHistory["commits"], exclude?: string | null): string | null {
  const counts = new Map<string, number>();
  for (const commit of commits) {
    if (commit.author === exclude) continue;
    counts.set(commit.author, (counts.get(commit.author) ?? 0) + 1);
  }
  let best: string | null = null;
  let bestCount = 0;
  for (const [author, count] of [...counts.entries()].sort(([left], [right]) => left.localeCompare(right))) {
    if (count > bestCount) {
      best = author;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Current owner: most commits in the last 30 days (or the whole window when
 * the file was not touched recently). Previous owner: most commits before that,
 * other than the current owner. The transition is the current owner's first
 * commit after the previous owner's last one.
 */
export function ownershipTransition(history: OwnershipHistory): OwnershipTransition {
  const asOf = Date.parse(history.as_of);
  const cutoff = asOf - CURRENT_OWNER_DAYS * DAY_MS;
  const recent = history.commits.filter((commit) => Date.parse(commit.timestamp) > cutoff);
  const older = history.commits.filter((commit) => Date.parse(commit.timestamp) <= cutoff);

  const current = topAuthor(recent) ?? topAuthor(history.commits);
  const previous = topAuthor(older, current);
  const base = { current_owner: current, previous_owner: previous, commit_count: history.commits.length };
  if (!current || !previous) return { ...base, days_since_transition: null };

  const previousLast = Math.max(
    ...history.commits.filter((commit) => commit.author === previous).map((commit) => Date.parse(commit.timestamp)),
  );
  const takeovers = history.commits
    .filter((commit) => commit.author === current && Date.parse(commit.timestamp) > previousLast)
    .map((commit) => Date.parse(commit.timestamp));
  if (takeovers.length === 0) return { ...base, previous_owner: null, days_since_transition: null };
  return { ...base, days_since_transition: Math.floor((asOf - Math.min(...takeovers)) / DAY_MS) };
}

export async function computeOwnershipChurn(
  graph: GraphReader,
  file: string,
  config: RiskConfig,
): Promise<SignalComputation> {
  const history = await graph.ownershipHistory(file, config.tier2.ownershipWindowDays);
  const transition = ownershipTransition(history);
  const level = ownershipLevel(transition.days_since_transition, config.thresholds);
  const details = { ...transition, window_days: history.window_days };

  if (transition.commit_count === 0) {
    return {
      value: -1,
      signal_level: level,
      evidence_text: `No commits in the last ${history.window_days} days (stable file)`,
      details,
    };
  }
  const head = `${transition.commit_count} commits in ${history.window_days} days, primary owner ${transition.current_owner}`;
  return {
    value: transition.days_since_transition ?? -1,
    signal_level: level,
    evidence_text:
      transition.days_since_transition === null
        ? `${head}, no ownership transition (${level})`
        : `${head}, took over from ${transition.previous_owner} ${transition.days_since_transition} days ago (${level})`,
    details,
  };
}

export async function computeIncidentSimilarity(
  graph: GraphReader,
  search: IncidentSearchIndex,
  file: string,
  config: RiskConfig,
): Promise<SignalComputation> {
  const commits = await graph.recentCommits(file, config.tier2.recentCommitLimit);
  if (commits.length === 0) {
    return {
      value: 0,
      signal_level: "LOW",
      evidence_text: "No recent commits to compare against incidents",
      details: { matches: [] },
    };
  }
  const hits = await search.rank(commits.map((commit) => commit.message).join("\n"), config.tier2.incidentLimit);
  const top = hits[0];
  const score = top?.score ?? 0;
  const level = incidentLevel(score, config.thresholds);
  return {
    value: score,
    signal_level: level,
    evidence_text: top
      ? `Recent commits resemble incident ${top.incident_id} (BM25 ${score.toFixed(2)}, ${level})`
      : `No similar incidents found (${level})`,
    details: {
      matches: hits.map((hit) => ({ incident_id: hit.incident_id, score: Number(hit.score.toFixed(4)) })),
      commits_compared: commits.length,
    },
  };
}

/** On-demand Tier-2 signal, cache-or-compute like Tier-1. */
export function calculateTier2(
  deps: Tier2Deps,
  name: Tier2SignalName,
  file: string,
  options: { signal?: AbortSignal } = {},
): Promise<SignalOutcome> {
  const compute =
    name === "ownership_churn"
      ? () => computeOwnershipChurn(deps.graph, file, deps.config)
      : () => computeIncidentSimilarity(deps.graph, deps.search, file, deps.config);
  return evaluateSignal(name, file, compute, {
    cache: deps.cache,
    ttlMs: deps.config.cache.ttlMs,
    timeoutMs: deps.config.tier2.signalTimeoutMs,
    gate: deps.gate,
    logger: deps.logger,
    now: deps.now,
    signal: options.signal,
    node: "tier2",
  });
}
