import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import lockfile from "proper-lockfile";
import { z } from "zod";
import { createKeyedLock } from "../concurrency";
import { errorMessage } from "../errors";
import type { FeedbackEvent, SignalStat } from "../types";

/**
 * Persistence behind the metric validator. `update` must be atomic per
 * signal: concurrent callers see each other's writes.
 */
export interface SignalStatStore {
  get: (name: string) => Promise<SignalStat | null>;
  list: () => Promise<SignalStat[]>;
  update: (name: string, mutate: (current: SignalStat | null) => SignalStat) => Promise<SignalStat>;
  appendFeedback: (event: FeedbackEvent) => Promise<void>;
  feedback: () => Promise<FeedbackEvent[]>;
}

export const SignalStatSchema = z.object({
  name: z.string(),
  total_uses: z.number().int().min(0),
  false_positives: z.number().int().min(0),
  true_positives: z.number().int().min(0),
  fp_rate: z.number().min(0).max(1),
  enabled: z.boolean(),
  disabled_at: z.string().nullable(),
  updated_at: z.string(),
});

export const FeedbackEventSchema = z.object({
  signal_name: z.string(),
  was_false_positive: z.boolean(),
  reason: z.string(),
  ts: z.string(),
});

export const StatFileSchema = z.object({
  version: z.literal(1),
  updated_at: z.string(),
  stats: z.record(SignalStatSchema),
  feedback: z.array(FeedbackEventSchema).default([]),
});

type StatFile = z.infer<typeof StatFileSchema>;

export function createMemoryStatStore(): SignalStatStore {
  const stats = new Map<string, SignalStat>();
  const events: FeedbackEvent[] = [];
  const runExclusive = createKeyedLock();

  return {
    async get(name) {
      const stat = stats.get(name);
      return stat ? { ...stat } : null;
    },
    async list() {
      return [...stats.values()].map((stat) => ({ ...stat })).sort((left, right) => left.name.localeCompare(right.name));
    },
    update(name, mutate) {
      return runExclusive(name, async () => {
        const current = stats.get(name);
        const next = mutate(current ? { ...current } : null);
        stats.set(name, next);
        return { ...next };
      });
    },
    async appendFeedback(event) {
      events.push({ ...event });
    },
    async feedback() {
      return [...events];
    },
  };
}

const LOCK_STALE_MS = 10_000;
const LOCK_UPDATE_MS = 2_000;

/**
 * Whole-file JSON store. Every write holds `<file>.lock` across processes
 * for the whole load, mutate and save, and replaces the file by a temp-file
 * rename, so a crash leaves either the old or the new file.
 */
export function createJsonStatStore(filePath: string): SignalStatStore {
  const runExclusive = createKeyedLock();
  const FILE_LOCK = "stat-file";
  const lockPath = `${filePath}.lock`;

  const withFileLock = <T>(work: () => Promise<T>): Promise<T> =>
    runExclusive(FILE_LOCK, async () => {
      await mkdir(path.dirname(filePath), { recursive: true });
      const lockState: { compromised: Error | null } = { compromised: null };
      const release = await lockfile.lock(filePath, {
        realpath: false,
        lockfilePath: lockPath,
        stale: LOCK_STALE_MS,
        update: LOCK_UPDATE_MS,
        retries: { retries: 40, factor: 1.5, minTimeout: 10, maxTimeout: 500 },
        onCompromised: (error) => {
          lockState.compromised = error;
        },
      });
      try {
        const result = await work();
        if (lockState.compromised) {
          throw new Error(`Signal stat lock compromised at ${lockPath}: ${errorMessage(lockState.compromised)}`);
        }
        return result;
      } finally {
        await release();
      }
    });

  const load = async (): Promise<StatFile> => {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return { version: 1, updated_at: new Date(0).toISOString(), stats: {}, feedback: [] };
      }
      throw error;
    }
    const parsed = StatFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Invalid signal stat file at ${filePath}: ${issue.path.join(".")}: ${issue.message}`);
    }
    return parsed.data;
  };

  const save = async (data: StatFile): Promise<void> => {
    await mkdir(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.${process.pid}.tmp`;
    await writeFile(tmp, `${JSON.stringify({ ...data, updated_at: new Date().toISOString() }, null, 2)}\n`, "utf-8");
    await rename(tmp, filePath);
  };

  return {
    async get(name) {
      const data = await load();
      return data.stats[name] ?? null;
    },
    async list() {
      const data = await load();
      return Object.values(data.stats).sort((left, right) => left.name.localeCompare(right.name));
    },
    update(name, mutate) {
      return withFileLock(async () => {
        const data = await load();
        const next = mutate(data.stats[name] ?? null);
        data.stats[name] = next;
        await save(data);
        return next;
      });
    },
    appendFeedback(event) {
      return withFileLock(async () => {
        const data = await load();
        data.feedback.push(event);
        await save(data);
      });
    },
    async feedback() {
      return (await load()).feedback;
    },
  };
}
