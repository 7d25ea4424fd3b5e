import type { RiskConfig } from "../config";
import type { CoChangeEdge, CommitNode, GraphWriter } from "../graph/types";
import { emitterFor, type RiskLogger } from "../logger";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CoChangeOptions {
  windowDays: number;
  minFrequency: number;
  maxFilesPerCommit: number;
}

export interface CoChangeWindow {
  start: string;
  end: string;
}

export interface CoChangeBuildResult {
  mode: "full" | "incremental";
  window: CoChangeWindow;
  commits_considered: number;
  commits_skipped_huge: number;
  files_recomputed: number;
  edges_written: number;
}

/**
 * Pairwise co-change frequency over `commits`:
 * `co_change_count / (commits touching a + commits touching b - co_change_count)`.
 * With `restrictTo`, only pairs with at least one file in the set are emitted.
 */
export function computeCoChangeEdges(
  commits: CommitNode[],
  options: CoChangeOptions,
  restrictTo?: ReadonlySet<string>,
): { edges: CoChangeEdge[]; considered: number; skipped: number } {
  const touches = new Map<string, number>();
  const pairs = new Map<string, { a: string; b: string; count: number }>();
  let considered = 0;
  let skipped = 0;

  for (const commit of commits) {
    const files = [...new Set(commit.files)].sort();
    if (files.length > options.maxFilesPerCommit) {
      skipped += 1;
      continue;
    }
    considered += 1;
    for (const file of files) touches.set(file, (touches.get(file) ?? 0) + 1);
    for (let i = 0; i < files.length; i += 1) {
      for (let j = i + 1; j < files.length; j += 1) {
        const a = files[i];
        const b = files[j];
        if (restrictTo && !restrictTo.has(a) && !restrictTo.has(b)) continue;
        const key = `${a}\u0000${b}`;
        const pair = pairs.get(key) ?? { a, b, count: 0 };
        pair.count += 1;
        pairs.set(key, pair);
      }
    }
  }

  const edges: CoChangeEdge[] = [];
  for (const pair of pairs.values()) {
    const either = (touches.get(pair.a) ?? 0) + (touches.get(pair.b) ?? 0) - pair.count;
    const frequency = either > 0 ? pair.count / either : 0;
    if (frequency < options.minFrequency) continue;
    edges.push({
      a: pair.a,
      b: pair.b,
      frequency,
      co_change_count: pair.count,
      window_days: options.windowDays,
    });
  }
  edges.sort((left, right) => left.a.localeCompare(right.a) || left.b.localeCompare(right.b));
  return { edges, considered, skipped };
}

export interface CoChangeBuilder {
  rebuildFull: () => Promise<CoChangeBuildResult>;
  updateIncremental: () => Promise<CoChangeBuildResult>;
  /** Files whose edges must be recomputed on the next incremental run, e.g. after a backfilled commit. */
  markDirty: (files: string[]) => void;
  lastWindow: () => CoChangeWindow | null;
}

export function createCoChangeBuilder(params: {
  graph: GraphWriter;
  config: RiskConfig["temporal"];
  now?: () => Date;
  logger?: RiskLogger;
}): CoChangeBuilder {
  const now = params.now ?? (() => new Date());
  const emit = emitterFor(params.logger);
  const options: CoChangeOptions = {
    windowDays: params.config.windowDays,
    minFrequency: params.config.minFrequency,
    maxFilesPerCommit: params.config.maxFilesPerCommit,
  };
  let last: { start: number; end: number } | null = null;
  const dirty = new Set<string>();

  const windowAt = (end: Date) => ({ start: end.getTime() - options.windowDays * DAY_MS, end: end.getTime() });
  const describe = (window: { start: number; end: number }): CoChangeWindow => ({
    start: new Date(window.start).toISOString(),
    end: new Date(window.end).toISOString(),
  });
  const inWindow = (window: { start: number; end: number }) =>
    params.graph.listCommits({ from: new Date(window.start), to: new Date(window.end) });

  const rebuildFull = async (): Promise<CoChangeBuildResult> => {
    const window = windowAt(now());
    const commits = await inWindow(window);
    const built = computeCoChangeEdges(commits, options);
    await params.graph.replaceCoChangeEdges(null, built.edges);
    last = window;
    dirty.clear();
    const result: CoChangeBuildResult = {
      mode: "full",
      window: describe(window),
      commits_considered: built.considered,
      commits_skipped_huge: built.skipped,
      files_recomputed: new Set(commits.flatMap((commit) => commit.files)).size,
      edges_written: built.edges.length,
    };
    emit({ node: "temporal", level: "info", event: "COCHANGE_REBUILD_FULL", data: { ...result } });
    return result;
  };

  const updateIncremental = async (): Promise<CoChangeBuildResult> => {
    const previous = last;
    if (!previous) return rebuildFull();

    const window = windowAt(now());
    const touched = new Set(dirty);
    const entered = await params.graph.listCommits({ from: new Date(previous.end + 1), to: new Date(window.end) });
    const expired =
      window.start > previous.start
        ? await params.graph.listCommits({ from: new Date(previous.start), to: new Date(window.start - 1) })
        : [];
    for (const commit of [...entered, ...expired]) {
      if (new Set(commit.files).size > options.maxFilesPerCommit) continue;
      for (const file of commit.files) touched.add(file);
    }

    let built: ReturnType<typeof computeCoChangeEdges> = { edges: [], considered: 0, skipped: 0 };
    if (touched.size > 0) {
      built = computeCoChangeEdges(await inWindow(window), options, touched);
      await params.graph.replaceCoChangeEdges(touched, built.edges);
    }
    last = window;
    dirty.clear();
    const result: CoChangeBuildResult = {
      mode: "incremental",
      window: describe(window),
      commits_considered: built.considered,
      commits_skipped_huge: built.skipped,
      files_recomputed: touched.size,
      edges_written: built.edges.length,
    };
    emit({
      node: "temporal",
      level: "info",
      event: "COCHANGE_UPDATE_INCREMENTAL",
      data: { ...result, entered: entered.length, expired: expired.length },
    });
    return result;
  };

  return {
    rebuildFull,
    updateIncremental,
    markDirty(files) {
      const unique = new Set(files);
      if (unique.size > options.maxFilesPerCommit) return;
      for (const file of unique) dirty.add(file);
    },
    lastWindow: () => (last ? describe(last) : null),
  };
}
