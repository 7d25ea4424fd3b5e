import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import type { EvidenceItem, InvestigationTrace } from "./types";

export function ensureDir(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true });
}

export function writeJsonPretty(filePath: string, data: unknown): void {
  writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
}

export function buildDatedDirName(generatedAt: string): string {
  return generatedAt.slice(0, 10);
}

export function toSafeFileName(filePath: string): string {
  return filePath.replace(/\//g, "__").replace(/[^a-zA-Z0-9_.-]/g, "_");
}

interface WriteTraceArtifactParams {
  tracesDir: string;
  run_id: string;
  generated_at: string;
  trace: InvestigationTrace;
  evidence_chain: EvidenceItem[];
}

export function writeTraceArtifact(params: WriteTraceArtifactParams): { path: string } {
  const dateDir = buildDatedDirName(params.generated_at);
  const fileName = `${params.run_id}__${toSafeFileName(params.trace.file_path)}.json`;
  const relativePath = path.join(params.tracesDir, dateDir, fileName);
  const absolutePath = path.resolve(process.cwd(), relativePath);

  ensureDir(path.dirname(absolutePath));
  writeJsonPretty(absolutePath, {
    meta: {
      trace_version: 1,
      run_id: params.run_id,
      generated_at: params.generated_at,
      file_path: params.trace.file_path,
    },
    trace: params.trace,
    evidence: params.evidence_chain,
  });
  return { path: relativePath };
}

export function writeRunPayload(runsDir: string, runId: string, payload: unknown): { path: string } {
  const relativePath = path.join(runsDir, `${runId}.json`);
  const absolutePath = path.resolve(process.cwd(), relativePath);
  ensureDir(path.dirname(absolutePath));
  writeJsonPretty(absolutePath, payload);
  return { path: relativePath };
}
