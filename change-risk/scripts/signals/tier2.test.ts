import assert from "node:assert/strict";
import test from "node:test";
import { createMemoryCache } from "../cache/cache";
import { withDefaults } from "../config";
import { createBm25Index, incidentDocument } from "../search/bm25";
import { NOW, sampleGraph, testConfig } from "../testing/fixtures";
import type { SignalResult } from "../types";
import { calculateTier2, computeIncidentSimilarity, computeOwnershipChurn, ownershipTransition } from "./tier2";

async function searchIndex() {
  const incidents = await sampleGraph().listIncidents();
  return createBm25Index(incidents.map(incidentDocument));
}

test("a recent ownership transition is HIGH churn", async () => {
  const out = await computeOwnershipChurn(sampleGraph(), "src/hot.ts", testConfig());
  assert.equal(out.signal_level, "HIGH");
  assert.equal(out.value, 9);
  assert.equal(out.evidence_text, "4 commits in 90 days, primary owner bob, took over from alice 9 days ago (HIGH)");
});

test("a single recent owner without transition is LOW", async () => {
  const out = await computeOwnershipChurn(sampleGraph(), "src/low.ts", testConfig());
  assert.equal(out.signal_level, "LOW");
  assert.equal(out.value, -1);
  assert.equal(out.evidence_text, "1 commits in 90 days, primary owner carol, no ownership transition (LOW)");
});

test("an untouched file is stable", async () => {
  const out = await computeOwnershipChurn(sampleGraph(), "lib/b.ts", testConfig());
  assert.equal(out.signal_level, "LOW");
  assert.equal(out.evidence_text, "No commits in the last 90 days (stable file)");
});

test("a transition 30-90 days ago is MEDIUM", () => {
  const transition = ownershipTransition({
    window_days: 90,
    as_of: NOW.toISOString(),
    commits: [
      { sha: "d2", author: "dave", timestamp: "2026-02-10T00:00:00.000Z" },
      { sha: "d1", author: "dave", timestamp: "2026-01-15T00:00:00.000Z" },
      { sha: "a2", author: "alice", timestamp: "2026-01-05T00:00:00.000Z" },
      { sha: "a1", author: "alice", timestamp: "2025-12-20T00:00:00.000Z" },
    ],
  });
  assert.deepEqual(transition, {
    current_owner: "dave",
    previous_owner: "alice",
    days_since_transition: 45,
    commit_count: 4,
  });
});

test("incident similarity ranks recent commit messages against incidents", async () => {
  const out = await computeIncidentSimilarity(sampleGraph(), await searchIndex(), "src/hot.ts", testConfig());
  assert.ok(Math.abs(out.value - 3.496) < 0.01);
  assert.equal(out.signal_level, "LOW");
  assert.equal(out.evidence_text, "Recent commits resemble incident INC-1 (BM25 3.50, LOW)");

  const sensitive = withDefaults({ thresholds: { incidentScore: { medium: 2, high: 10 } } });
  const medium = await computeIncidentSimilarity(sampleGraph(), await searchIndex(), "src/hot.ts", sensitive);
  assert.equal(medium.signal_level, "MEDIUM");
});

test("a file without commits has no incident similarity", async () => {
  const out = await computeIncidentSimilarity(sampleGraph(), await searchIndex(), "lib/b.ts", testConfig());
  assert.deepEqual(out, {
    value: 0,
    signal_level: "LOW",
    evidence_text: "No recent commits to compare against incidents",
    details: { matches: [] },
  });
});

test("calculateTier2 caches results and honours disabled signals", async () => {
  const cache = createMemoryCache<SignalResult>();
  const deps = { graph: sampleGraph(), cache, search: await searchIndex(), config: testConfig(), now: () => NOW };
  const first = await calculateTier2(deps, "ownership_churn", "src/hot.ts");
  const second = await calculateTier2(deps, "ownership_churn", "src/hot.ts");
  assert.equal(first.status === "ok" && first.cache_hit, false);
  assert.equal(second.status === "ok" && second.cache_hit, true);

  const gated = await calculateTier2(
    { ...deps, gate: { isEnabled: async () => false, falsePositiveRate: async () => 0 } },
    "incident_similarity",
    "src/hot.ts",
  );
  assert.deepEqual(gated, { status: "disabled" });
});

test("a failing search makes the signal unknown", async () => {
  const deps = {
    graph: sampleGraph(),
    cache: createMemoryCache<SignalResult>(),
    search: {
      ...createBm25Index(),
      rank: async () => {
        throw new Error("index offline");
      },
    },
    config: testConfig(),
  };
  assert.deepEqual(await calculateTier2(deps, "incident_similarity", "src/hot.ts"), {
    status: "unknown",
    reason: "index offline",
  });
});
