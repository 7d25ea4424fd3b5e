import { z } from "zod";

export const FileNodeSchema = z.object({
  path: z.string().min(1),
  loc: z.number().int().min(0),
  language: z.string().optional(),
});

export const SymbolNodeSchema = z.object({
  file: z.string(),
  name: z.string(),
  line: z.number().int().min(0),
});

export const CommitNodeSchema = z.object({
  sha: z.string().min(1),
  author: z.string().min(1),
  message: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  files: z.array(z.string()),
});

export const CoChangeEdgeSchema = z.object({
  a: z.string(),
  b: z.string(),
  frequency: z.number().min(0).max(1),
  co_change_count: z.number().int().min(0),
  window_days: z.number().int().positive(),
});

export const IncidentNodeSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string(),
  created_at: z.string(),
  caused_by: z.array(z.string()).default([]),
  affects: z.array(z.string()).default([]),
});

export const GraphSnapshotSchema = z.object({
  generated_at: z.string().optional(),
  files: z.array(FileNodeSchema),
  functions: z.array(SymbolNodeSchema).default([]),
  classes: z.array(SymbolNodeSchema).default([]),
  dependencies: z.array(z.object({ from: z.string(), to: z.string() })).default([]),
  tests: z.array(z.object({ test: z.string(), source: z.string() })).default([]),
  commits: z.array(CommitNodeSchema).default([]),
  co_changes: z.array(CoChangeEdgeSchema).default([]),
  incidents: z.array(IncidentNodeSchema).default([]),
});

export type FileNode = z.infer<typeof FileNodeSchema>;
export type CommitNode = z.infer<typeof CommitNodeSchema>;
export type CoChangeEdge = z.infer<typeof CoChangeEdgeSchema>;
export type IncidentNode = z.infer<typeof IncidentNodeSchema>;
export type GraphSnapshot = z.infer<typeof GraphSnapshotSchema>;
export type GraphSnapshotInput = z.input<typeof GraphSnapshotSchema>;

export interface CouplingInfo {
  count: number;
  connected: string[];
}

export interface CoChangePartner {
  partner: string;
  frequency: number;
  co_change_count: number;
  window_days: number;
}

export interface TestCoverage {
  source_loc: number;
  test_loc: number;
  test_files: string[];
}

export interface OwnershipHistory {
  window_days: number;
  as_of: string;
  commits: Array<{ sha: string; author: string; timestamp: string }>;
}

export type NeighborRelation = "dependency" | "co_change";

export interface NeighborNode {
  path: string;
  hop: number;
  relation: NeighborRelation;
}

/** Read-only queries used on the assessment path. */
export interface GraphReader {
  coupling: (file: string) => Promise<CouplingInfo>;
  coChanged: (file: string) => Promise<CoChangePartner[]>;
  testRatio: (file: string) => Promise<TestCoverage>;
  ownershipHistory: (file: string, windowDays: number) => Promise<OwnershipHistory>;
  neighbors: (file: string, hops: number) => Promise<NeighborNode[]>;
  recentCommits: (file: string, limit: number) => Promise<CommitNode[]>;
}

export interface CommitRange {
  from: Date;
  to: Date;
}

/** Writes performed by the coupling builder and the ingestion hooks. */
export interface GraphWriter {
  listCommits: (range: CommitRange) => Promise<CommitNode[]>;
  appendCommit: (commit: CommitNode) => Promise<void>;
  /** `files === null` replaces every edge; otherwise only edges touching `files`. */
  replaceCoChangeEdges: (files: ReadonlySet<string> | null, edges: CoChangeEdge[]) => Promise<void>;
  listCoChangeEdges: () => Promise<CoChangeEdge[]>;
  linkIncident: (incident: IncidentNode) => Promise<IncidentNode>;
  listIncidents: () => Promise<IncidentNode[]>;
}

export type GraphStore = GraphReader & GraphWriter;
