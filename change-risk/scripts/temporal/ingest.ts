import { invalidateOnCommit, invalidateOnIncidentLink, type EphemeralCache } from "../cache/cache";
import type { CommitNode, GraphWriter, IncidentNode } from "../graph/types";
import { emitterFor, type RiskLogger } from "../logger";
import { incidentDocument, type IncidentSearchIndex } from "../search/bm25";
import type { SignalResult } from "../types";
import type { CoChangeBuildResult, CoChangeBuilder } from "./coChangeBuilder";

export interface IngestDeps {
  graph: GraphWriter;
  cache: EphemeralCache<SignalResult>;
  builder?: CoChangeBuilder;
  search?: IncidentSearchIndex;
  logger?: RiskLogger;
}

export async function ingestCommit(
  deps: IngestDeps,
  commit: CommitNode,
): Promise<{ invalidated: string[]; coupling: CoChangeBuildResult | null }> {
  await deps.graph.appendCommit(commit);
  const invalidated = await invalidateOnCommit(deps.cache, [...new Set(commit.files)]);
  deps.builder?.markDirty(commit.files);
  const coupling = deps.builder ? await deps.builder.updateIncremental() : null;
  emitterFor(deps.logger)({
    node: "ingest",
    level: "info",
    event: "COMMIT_INGESTED",
    data: { sha: commit.sha, files: commit.files.length, invalidated: invalidated.length },
  });
  return { invalidated, coupling };
}

export async function linkIncident(
  deps: IngestDeps,
  incident: IncidentNode,
): Promise<{ incident: IncidentNode; invalidated: string[] }> {
  const merged = await deps.graph.linkIncident(incident);
  deps.search?.upsert(incidentDocument(merged));
  const invalidated = await invalidateOnIncidentLink(deps.cache, merged.affects);
  emitterFor(deps.logger)({
    node: "ingest",
    level: "info",
    event: "INCIDENT_LINKED",
    data: { incident_id: merged.id, affects: merged.affects.length },
  });
  return { incident: merged, invalidated };
}
