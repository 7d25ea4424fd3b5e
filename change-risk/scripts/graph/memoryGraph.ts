import { parseSnapshot } from "./snapshot";
import type {
  CoChangeEdge,
  CoChangePartner,
  CommitNode,
  FileNode,
  GraphSnapshotInput,
  GraphStore,
  IncidentNode,
  NeighborNode,
  NeighborRelation,
} from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

function pairKey(a: string, b: string): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

function normalizeEdge(edge: CoChangeEdge): CoChangeEdge {
  return edge.a <= edge.b ? { ...edge } : { ...edge, a: edge.b, b: edge.a };
}

function addLink(map: Map<string, Set<string>>, from: string, to: string): void {
  const set = map.get(from) ?? new Set<string>();
  set.add(to);
  map.set(from, set);
}

function byTimestampDesc(left: CommitNode, right: CommitNode): number {
  return Date.parse(right.timestamp) - Date.parse(left.timestamp) || left.sha.localeCompare(right.sha);
}

/**
 * In-process graph store backed by a snapshot. Structural nodes are replaced
 * wholesale by `reload`; commits, incidents and co-change edges are mutable
 * through the writer half.
 */
export function createMemoryGraph(
  input: GraphSnapshotInput,
  options: { now?: () => Date } = {},
): GraphStore & { reload: (next: GraphSnapshotInput) => void } {
  const now = options.now ?? (() => new Date());
  const files = new Map<string, FileNode>();
  const dependencies = new Map<string, Set<string>>();
  const testsBySource = new Map<string, Set<string>>();
  const commits = new Map<string, CommitNode>();
  const coChanges = new Map<string, CoChangeEdge>();
  const incidents = new Map<string, IncidentNode>();

  const reload = (next: GraphSnapshotInput) => {
    const snapshot = parseSnapshot(next);
    files.clear();
    dependencies.clear();
    testsBySource.clear();
    commits.clear();
    coChanges.clear();
    incidents.clear();
    for (const file of snapshot.files) files.set(file.path, file);
    for (const dep of snapshot.dependencies) {
      if (dep.from === dep.to) continue;
      addLink(dependencies, dep.from, dep.to);
      addLink(dependencies, dep.to, dep.from);
    }
    for (const link of snapshot.tests) addLink(testsBySource, link.source, link.test);
    for (const commit of snapshot.commits) commits.set(commit.sha, commit);
    for (const edge of snapshot.co_changes) {
      if (edge.a === edge.b) continue;
      coChanges.set(pairKey(edge.a, edge.b), normalizeEdge(edge));
    }
    for (const incident of snapshot.incidents) incidents.set(incident.id, incident);
  };

  reload(input);

  const partnersOf = (file: string): CoChangePartner[] => {
    const out: CoChangePartner[] = [];
    for (const edge of coChanges.values()) {
      if (edge.a !== file && edge.b !== file) continue;
      out.push({
        partner: edge.a === file ? edge.b : edge.a,
        frequency: edge.frequency,
        co_change_count: edge.co_change_count,
        window_days: edge.window_days,
      });
    }
    return out.sort((left, right) => right.frequency - left.frequency || left.partner.localeCompare(right.partner));
  };

  const commitsTouching = (file: string): CommitNode[] =>
    [...commits.values()].filter((commit) => commit.files.includes(file)).sort(byTimestampDesc);

  return {
    reload,

    async coupling(file) {
      const connected = [...(dependencies.get(file) ?? [])].sort();
      return { count: connected.length, connected };
    },

    async coChanged(file) {
      return partnersOf(file);
    },

    async testRatio(file) {
      const testFiles = [...(testsBySource.get(file) ?? [])].sort();
      return {
        source_loc: files.get(file)?.loc ?? 0,
        test_loc: testFiles.reduce((sum, test) => sum + (files.get(test)?.loc ?? 0), 0),
        test_files: testFiles,
      };
    },

    async ownershipHistory(file, windowDays) {
      const asOf = now();
      const cutoff = asOf.getTime() - windowDays * DAY_MS;
      return {
        window_days: windowDays,
        as_of: asOf.toISOString(),
        commits: commitsTouching(file)
          .filter((commit) => {
            const at = Date.parse(commit.timestamp);
            return at >= cutoff && at <= asOf.getTime();
          })
          .map((commit) => ({ sha: commit.sha, author: commit.author, timestamp: commit.timestamp })),
      };
    },

    async neighbors(file, hops) {
      const seen = new Set<string>([file]);
      const out: NeighborNode[] = [];
      let frontier = [file];
      for (let hop = 1; hop <= hops && frontier.length > 0; hop += 1) {
        const found = new Map<string, NeighborRelation>();
        for (const current of frontier) {
          for (const dep of dependencies.get(current) ?? []) {
            if (!seen.has(dep) && !found.has(dep)) found.set(dep, "dependency");
          }
          for (const partner of partnersOf(current)) {
            if (!seen.has(partner.partner) && !found.has(partner.partner)) found.set(partner.partner, "co_change");
          }
        }
        const ordered = [...found.entries()].sort(([left], [right]) => left.localeCompare(right));
        for (const [path, relation] of ordered) {
          seen.add(path);
          out.push({ path, hop, relation });
        }
        frontier = ordered.map(([path]) => path);
      }
      return out;
    },

    async recentCommits(file, limit) {
      return commitsTouching(file).slice(0, Math.max(0, limit));
    },

    async listCommits(range) {
      const from = range.from.getTime();
      const to = range.to.getTime();
      return [...commits.values()]
        .filter((commit) => {
          const at = Date.parse(commit.timestamp);
          return at >= from && at <= to;
        })
        .sort((left, right) => Date.parse(left.timestamp) - Date.parse(right.timestamp) || left.sha.localeCompare(right.sha));
    },

    async appendCommit(commit) {
      commits.set(commit.sha, { ...commit, files: [...new Set(commit.files)] });
    },

    async replaceCoChangeEdges(touched, edges) {
      if (touched === null) {
        coChanges.clear();
      } else {
        for (const [key, edge] of coChanges) {
          if (touched.has(edge.a) || touched.has(edge.b)) coChanges.delete(key);
        }
      }
      for (const edge of edges) {
        if (edge.a === edge.b) continue;
        coChanges.set(pairKey(edge.a, edge.b), normalizeEdge(edge));
      }
    },

    async listCoChangeEdges() {
      return [...coChanges.values()].sort((left, right) => left.a.localeCompare(right.a) || left.b.localeCompare(right.b));
    },

    async linkIncident(incident) {
      const existing = incidents.get(incident.id);
      const merged: IncidentNode = existing
        ? {
            ...existing,
            ...incident,
            caused_by: [...new Set([...existing.caused_by, ...incident.caused_by])],
            affects: [...new Set([...existing.affects, ...incident.affects])],
          }
        : incident;
      incidents.set(incident.id, merged);
      return merged;
    },

    async listIncidents() {
      return [...incidents.values()];
    },
  };
}
