import { readFile } from "node:fs/promises";
import { GraphSnapshotSchema, type GraphSnapshot } from "./types";

export function parseSnapshot(raw: unknown, source = "snapshot"): GraphSnapshot {
  const parsed = GraphSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid graph ${source}: ${issues}`);
  }
  return parsed.data;
}

export async function loadSnapshot(snapshotPath: string): Promise<GraphSnapshot> {
  const text = await readFile(snapshotPath, "utf-8");
  return parseSnapshot(JSON.parse(text), snapshotPath);
}
