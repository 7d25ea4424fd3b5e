import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { CacheBackend, RiskConfig } from "../config";
import type { SignalName, SignalResult } from "../types";

export type CacheLookup<V> = { hit: true; value: V } | { hit: false };

export interface EphemeralCache<V> {
  readonly backend: CacheBackend;
  get: (key: string) => Promise<CacheLookup<V>>;
  set: (key: string, value: V, ttlMs: number) => Promise<void>;
  delete: (key: string) => Promise<void>;
}

export const COMMIT_INVALIDATED_SIGNALS: readonly SignalName[] = [
  "coupling",
  "co_change",
  "test_ratio",
  "ownership_churn",
];

export function cacheKey(signal: SignalName, filePath: string): string {
  return `${signal}:${filePath}`;
}

export function traceKey(runId: string, filePath: string): string {
  return `trace:${runId}:${filePath}`;
}

export async function invalidateOnCommit<V>(cache: EphemeralCache<V>, files: string[]): Promise<string[]> {
  const keys = files.flatMap((file) => COMMIT_INVALIDATED_SIGNALS.map((signal) => cacheKey(signal, file)));
  await Promise.all(keys.map((key) => cache.delete(key)));
  return keys;
}

export async function invalidateOnIncidentLink<V>(cache: EphemeralCache<V>, files: string[]): Promise<string[]> {
  const keys = files.map((file) => cacheKey("incident_similarity", file));
  await Promise.all(keys.map((key) => cache.delete(key)));
  return keys;
}

export function createMemoryCache<V>(options: { now?: () => number } = {}): EphemeralCache<V> {
  const now = options.now ?? (() => Date.now());
  const entries = new Map<string, { value: V; expiresAt: number }>();

  return {
    backend: "memory",
    async get(key) {
      const entry = entries.get(key);
      if (!entry) return { hit: false };
      if (entry.expiresAt <= now()) {
        entries.delete(key);
        return { hit: false };
      }
      return { hit: true, value: entry.value };
    },
    async set(key, value, ttlMs) {
      entries.set(key, { value, expiresAt: now() + ttlMs });
    },
    async delete(key) {
      entries.delete(key);
    },
  };
}

/** Every lookup misses; used to check that results do not depend on caching. */
export function createDisabledCache<V>(): EphemeralCache<V> {
  return {
    backend: "none",
    async get() {
      return { hit: false };
    },
    async set() {},
    async delete() {},
  };
}

function sanitize(value: string): string {
  return value.replace(/[^a-zA-Z0-9_.-]/g, "_");
}

const FileEntrySchema = z.object({
  key: z.string(),
  expires_at: z.number(),
  value: z.unknown(),
});

export function createFileCache<V>(options: {
  dir: string;
  parse: (raw: unknown) => V | undefined;
  now?: () => number;
}): EphemeralCache<V> {
  const now = options.now ?? (() => Date.now());
  const fileFor = (key: string) => path.join(options.dir, `${sanitize(key)}.json`);

  return {
    backend: "file",
    async get(key) {
      let text: string;
      try {
        text = await readFile(fileFor(key), "utf-8");
      } catch {
        return { hit: false };
      }
      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch {
        return { hit: false };
      }
      const entry = FileEntrySchema.safeParse(raw);
      if (!entry.success || entry.data.key !== key || entry.data.expires_at <= now()) {
        return { hit: false };
      }
      const value = options.parse(entry.data.value);
      return value === undefined ? { hit: false } : { hit: true, value };
    },
    async set(key, value, ttlMs) {
      await mkdir(options.dir, { recursive: true });
      const entry = { key, expires_at: now() + ttlMs, value };
      await writeFile(fileFor(key), `${JSON.stringify(entry, null, 2)}\n`, "utf-8");
    },
    async delete(key) {
      await rm(fileFor(key), { force: true });
    },
  };
}

export const SignalResultSchema = z.object({
  name: z.enum(["coupling", "co_change", "test_ratio", "ownership_churn", "incident_similarity"]),
  file_path: z.string(),
  value: z.number(),
  evidence_text: z.string(),
  false_positive_rate: z.number(),
  signal_level: z.enum(["LOW", "MEDIUM", "HIGH"]),
  computed_at: z.string(),
  details: z.record(z.unknown()).optional(),
});

function parseSignalResult(raw: unknown): SignalResult | undefined {
  const parsed = SignalResultSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export function createSignalCache(
  config: RiskConfig["cache"],
  options: { now?: () => number } = {},
): EphemeralCache<SignalResult> {
  if (config.backend === "none") return createDisabledCache();
  if (config.backend === "file") {
    return createFileCache({ dir: config.dir, parse: parseSignalResult, now: options.now });
  }
  return createMemoryCache(options);
}
