import { withDefaults, type RiskConfig } from "../config";
import { createMemoryGraph } from "../graph/memoryGraph";
import type { GraphSnapshotInput } from "../graph/types";

export const NOW = new Date("2026-03-01T00:00:00.000Z");

const modules = Array.from({ length: 15 }, (_, i) => `mod/m${String(i + 1).padStart(2, "0")}.ts`);

/**
 * `src/low.ts`: coupling 3, co-change max 0.1, test ratio 0.9.
 * `src/hot.ts`: coupling 15, co-change max 0.8, test ratio 0.2, owner
 * changed from alice to bob 9 days before NOW.
 */
export function sampleSnapshot(): GraphSnapshotInput {
  return {
    generated_at: NOW.toISOString(),
    files: [
      { path: "src/low.ts", loc: 99 },
      { path: "src/low.test.ts", loc: 89 },
      { path: "src/hot.ts", loc: 99 },
      { path: "src/hot.test.ts", loc: 19 },
      { path: "src/hot-config.ts", loc: 40 },
      { path: "lib/a.ts", loc: 10 },
      { path: "lib/b.ts", loc: 10 },
      { path: "lib/c.ts", loc: 10 },
      { path: "lib/core.ts", loc: 5 },
      ...modules.map((path) => ({ path, loc: 20 })),
    ],
    functions: [{ file: "src/hot.ts", name: "checkout", line: 12 }],
    classes: [{ file: "src/low.ts", name: "Formatter", line: 3 }],
    dependencies: [
      { from: "src/low.ts", to: "lib/a.ts" },
      { from: "src/low.ts", to: "lib/b.ts" },
      { from: "lib/c.ts", to: "src/low.ts" },
      { from: "lib/a.ts", to: "lib/core.ts" },
      ...modules.map((to) => ({ from: "src/hot.ts", to })),
    ],
    tests: [
      { test: "src/low.test.ts", source: "src/low.ts" },
      { test: "src/hot.test.ts", source: "src/hot.ts" },
    ],
    commits: [
      {
        sha: "c1",
        author: "alice",
        message: "Add checkout retry for payment timeout",
        timestamp: "2025-12-15T10:00:00.000Z",
        files: ["src/hot.ts", "src/hot-config.ts"],
      },
      {
        sha: "c2",
        author: "alice",
        message: "Tune payment timeout handling",
        timestamp: "2026-01-10T10:00:00.000Z",
        files: ["src/hot.ts", "src/hot-config.ts"],
      },
      {
        sha: "c3",
        author: "bob",
        message: "Refactor checkout session cache",
        timestamp: "2026-02-20T00:00:00.000Z",
        files: ["src/hot.ts", "src/hot-config.ts"],
      },
      {
        sha: "c4",
        author: "bob",
        message: "Fix checkout payment timeout race",
        timestamp: "2026-02-25T00:00:00.000Z",
        files: ["src/hot.ts"],
      },
      {
        sha: "c5",
        author: "carol",
        message: "Rename formatter helpers",
        timestamp: "2026-02-01T00:00:00.000Z",
        files: ["src/low.ts", "lib/a.ts"],
      },
    ],
    co_changes: [
      { a: "src/hot.ts", b: "src/hot-config.ts", frequency: 0.8, co_change_count: 8, window_days: 90 },
      { a: "src/low.ts", b: "lib/a.ts", frequency: 0.1, co_change_count: 1, window_days: 90 },
    ],
    incidents: [
      {
        id: "INC-1",
        title: "Checkout payment timeout",
        description: "Payment timeout during checkout after retry change",
        created_at: "2026-01-12T00:00:00.000Z",
        caused_by: ["c1"],
        affects: ["src/hot.ts"],
      },
      {
        id: "INC-2",
        title: "Report export slow",
        description: "Nightly report export exceeded its window",
        created_at: "2026-01-20T00:00:00.000Z",
      },
    ],
  };
}

export function sampleGraph() {
  return createMemoryGraph(sampleSnapshot(), { now: () => NOW });
}

export function testConfig(): RiskConfig {
  return withDefaults({ cache: { backend: "memory" }, validation: { storePath: null } });
}
