import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import type { SignalResult } from "../types";
import {
  cacheKey,
  createDisabledCache,
  createMemoryCache,
  createSignalCache,
  invalidateOnCommit,
  invalidateOnIncidentLink,
  traceKey,
} from "./cache";

function result(name: SignalResult["name"], file: string, value: number): SignalResult {
  return {
    name,
    file_path: file,
    value,
    evidence_text: `${name}=${value}`,
    false_positive_rate: 0,
    signal_level: "LOW",
    computed_at: "2026-03-01T00:00:00.000Z",
  };
}

test("memory cache expires entries after their ttl", async () => {
  let clock = 1_000;
  const cache = createMemoryCache<number>({ now: () => clock });
  await cache.set("coupling:a.ts", 4, 100);

  assert.deepEqual(await cache.get("coupling:a.ts"), { hit: true, value: 4 });
  clock = 1_099;
  assert.deepEqual(await cache.get("coupling:a.ts"), { hit: true, value: 4 });
  clock = 1_100;
  assert.deepEqual(await cache.get("coupling:a.ts"), { hit: false });
});

test("keys follow the signal:file and trace:run:file layout", () => {
  assert.equal(cacheKey("co_change", "src/a.ts"), "co_change:src/a.ts");
  assert.equal(traceKey("run-1", "src/a.ts"), "trace:run-1:src/a.ts");
});

test("a commit invalidates the four commit-sensitive signals only", async () => {
  const cache = createMemoryCache<SignalResult>();
  for (const name of ["coupling", "co_change", "test_ratio", "ownership_churn", "incident_similarity"] as const) {
    await cache.set(cacheKey(name, "a.ts"), result(name, "a.ts", 1), 60_000);
  }
  await cache.set(cacheKey("coupling", "b.ts"), result("coupling", "b.ts", 2), 60_000);

  const deleted = await invalidateOnCommit(cache, ["a.ts"]);
  assert.deepEqual(deleted, ["coupling:a.ts", "co_change:a.ts", "test_ratio:a.ts", "ownership_churn:a.ts"]);
  assert.equal((await cache.get("coupling:a.ts")).hit, false);
  assert.equal((await cache.get("incident_similarity:a.ts")).hit, true);
  assert.equal((await cache.get("coupling:b.ts")).hit, true);

  await invalidateOnIncidentLink(cache, ["a.ts"]);
  assert.equal((await cache.get("incident_similarity:a.ts")).hit, false);
});

test("disabled cache always misses", async () => {
  const cache = createDisabledCache<number>();
  await cache.set("coupling:a.ts", 3, 60_000);
  assert.deepEqual(await cache.get("coupling:a.ts"), { hit: false });
  assert.equal(cache.backend, "none");
});

test("file cache round-trips signal results and honours ttl", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "risk-cache-"));
  let clock = 5_000;
  try {
    const cache = createSignalCache({ backend: "file", ttlMs: 900_000, dir }, { now: () => clock });
    const stored = result("test_ratio", "src/a.ts", 0.25);
    await cache.set(cacheKey("test_ratio", "src/a.ts"), stored, 1_000);

    assert.deepEqual(await cache.get(cacheKey("test_ratio", "src/a.ts")), { hit: true, value: stored });
    clock = 6_000;
    assert.deepEqual(await cache.get(cacheKey("test_ratio", "src/a.ts")), { hit: false });

    await cache.set(cacheKey("coupling", "src/a.ts"), result("coupling", "src/a.ts", 3), 1_000);
    await cache.delete(cacheKey("coupling", "src/a.ts"));
    assert.deepEqual(await cache.get(cacheKey("coupling", "src/a.ts")), { hit: false });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
