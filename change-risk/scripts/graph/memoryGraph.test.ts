import assert from "node:assert/strict";
import test from "node:test";
import { NOW, sampleGraph, sampleSnapshot } from "../testing/fixtures";
import { createMemoryGraph } from "./memoryGraph";

test("coupling counts distinct structurally connected files", async () => {
  const graph = sampleGraph();
  assert.equal((await graph.coupling("src/hot.ts")).count, 15);
  assert.deepEqual(await graph.coupling("src/low.ts"), {
    count: 3,
    connected: ["lib/a.ts", "lib/b.ts", "lib/c.ts"],
  });
  assert.deepEqual(await graph.coupling("missing.ts"), { count: 0, connected: [] });
});

test("co-change edges read the same from both ends", async () => {
  const graph = sampleGraph();
  const fromHot = await graph.coChanged("src/hot.ts");
  const fromConfig = await graph.coChanged("src/hot-config.ts");
  assert.deepEqual(fromHot, [{ partner: "src/hot-config.ts", frequency: 0.8, co_change_count: 8, window_days: 90 }]);
  assert.deepEqual(fromConfig, [{ partner: "src/hot.ts", frequency: 0.8, co_change_count: 8, window_days: 90 }]);
});

test("testRatio reports source and linked test lines", async () => {
  const graph = sampleGraph();
  assert.deepEqual(await graph.testRatio("src/low.ts"), {
    source_loc: 99,
    test_loc: 89,
    test_files: ["src/low.test.ts"],
  });
});

test("ownershipHistory keeps commits inside the window, newest first", async () => {
  const graph = sampleGraph();
  const wide = await graph.ownershipHistory("src/hot.ts", 90);
  assert.equal(wide.as_of, NOW.toISOString());
  assert.deepEqual(
    wide.commits.map((commit) => commit.sha),
    ["c4", "c3", "c2", "c1"],
  );
  const narrow = await graph.ownershipHistory("src/hot.ts", 30);
  assert.deepEqual(
    narrow.commits.map((commit) => `${commit.sha}:${commit.author}`),
    ["c4:bob", "c3:bob"],
  );
});

test("neighbors tags each node with the hop it was reached at", async () => {
  const graph = sampleGraph();
  assert.deepEqual(await graph.neighbors("src/low.ts", 1), [
    { path: "lib/a.ts", hop: 1, relation: "dependency" },
    { path: "lib/b.ts", hop: 1, relation: "dependency" },
    { path: "lib/c.ts", hop: 1, relation: "dependency" },
  ]);
  const twoHop = await graph.neighbors("src/low.ts", 2);
  assert.deepEqual(twoHop[3], { path: "lib/core.ts", hop: 2, relation: "dependency" });
  assert.equal(twoHop.length, 4);

  const hot = await graph.neighbors("src/hot.ts", 1);
  assert.equal(hot.length, 16);
  assert.deepEqual(hot[15], { path: "src/hot-config.ts", hop: 1, relation: "co_change" });
});

test("recentCommits returns the newest commits first", async () => {
  const graph = sampleGraph();
  const commits = await graph.recentCommits("src/hot.ts", 2);
  assert.deepEqual(
    commits.map((commit) => commit.sha),
    ["c4", "c3"],
  );
});

test("replaceCoChangeEdges only replaces edges of touched files", async () => {
  const graph = sampleGraph();
  await graph.replaceCoChangeEdges(new Set(["src/low.ts"]), [
    { a: "src/low.ts", b: "lib/b.ts", frequency: 0.5, co_change_count: 2, window_days: 90 },
  ]);
  assert.deepEqual(await graph.listCoChangeEdges(), [
    { a: "lib/b.ts", b: "src/low.ts", frequency: 0.5, co_change_count: 2, window_days: 90 },
    { a: "src/hot-config.ts", b: "src/hot.ts", frequency: 0.8, co_change_count: 8, window_days: 90 },
  ]);

  await graph.replaceCoChangeEdges(null, []);
  assert.deepEqual(await graph.listCoChangeEdges(), []);
});

test("linkIncident merges links of an existing incident", async () => {
  const graph = sampleGraph();
  const merged = await graph.linkIncident({
    id: "INC-1",
    title: "Checkout payment timeout",
    description: "Payment timeout during checkout after retry change",
    created_at: "2026-01-12T00:00:00.000Z",
    caused_by: ["c2"],
    affects: ["src/hot-config.ts"],
  });
  assert.deepEqual(merged.caused_by, ["c1", "c2"]);
  assert.deepEqual(merged.affects, ["src/hot.ts", "src/hot-config.ts"]);
  assert.equal((await graph.listIncidents()).length, 2);
});

test("reload replaces the structural snapshot wholesale", async () => {
  const graph = createMemoryGraph(sampleSnapshot(), { now: () => NOW });
  graph.reload({ files: [{ path: "src/low.ts", loc: 10 }] });
  assert.deepEqual(await graph.coupling("src/low.ts"), { count: 0, connected: [] });
  assert.deepEqual(await graph.listIncidents(), []);
});

test("invalid snapshots are rejected with the failing path", () => {
  assert.throws(() => createMemoryGraph({ files: [{ path: "", loc: 1 }] }), /Invalid graph snapshot: files\.0\.path/);
});
