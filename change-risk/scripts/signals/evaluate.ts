import { cacheKey, type EphemeralCache } from "../cache/cache";
import { withTimeout } from "../concurrency";
import { AssessmentCancelledError, SignalTimeoutError, errorMessage } from "../errors";
import { emitterFor, type RiskLogger } from "../logger";
import type { RiskLevel, SignalName, SignalOutcome, SignalResult } from "../types";

/** Read side of the metric validator used while computing signals. */
export interface SignalGate {
  isEnabled: (name: SignalName) => Promise<boolean>;
  falsePositiveRate: (name: SignalName) => Promise<number>;
}

export interface SignalComputation {
  value: number;
  signal_level: RiskLevel;
  evidence_text: string;
  details?: Record<string, unknown>;
}

export interface SignalContext {
  cache: EphemeralCache<SignalResult>;
  ttlMs: number;
  timeoutMs: number;
  gate?: SignalGate;
  logger?: RiskLogger;
  now?: () => Date;
  signal?: AbortSignal;
  node: string;
}

/**
 * Cache-or-compute for one signal of one file. Disabled signals are skipped;
 * a timeout or graph failure yields `unknown`. Only cancellation throws.
 */
export async function evaluateSignal(
  name: SignalName,
  filePath: string,
  compute: (signal: AbortSignal) => Promise<SignalComputation>,
  ctx: SignalContext,
): Promise<SignalOutcome> {
  const emit = emitterFor(ctx.logger);
  const now = ctx.now ?? (() => new Date());

  if (ctx.signal?.aborted) throw new AssessmentCancelledError(`${name} signal`);
  if (ctx.gate && !(await ctx.gate.isEnabled(name))) {
    emit({ node: ctx.node, file: filePath, level: "info", event: "SIGNAL_SKIPPED_DISABLED", data: { signal: name } });
    return { status: "disabled" };
  }

  const key = cacheKey(name, filePath);
  let computed: { result: SignalResult; cacheHit: boolean };
  try {
    computed = await withTimeout(
      async (signal) => {
        const cached = await ctx.cache.get(key).catch((error: unknown) => {
          emit({
            node: ctx.node,
            file: filePath,
            level: "warn",
            event: "CACHE_READ_FAILED",
            data: { key, error: errorMessage(error) },
          });
          return { hit: false } as const;
        });
        if (cached.hit) return { result: cached.value, cacheHit: true };
        const out = await compute(signal);
        const result: SignalResult = {
          name,
          file_path: filePath,
          value: out.value,
          evidence_text: out.evidence_text,
          false_positive_rate: ctx.gate ? await ctx.gate.falsePositiveRate(name) : 0,
          signal_level: out.signal_level,
          computed_at: now().toISOString(),
          ...(out.details ? { details: out.details } : {}),
        };
        return { result, cacheHit: false };
      },
      ctx.timeoutMs,
      () => new SignalTimeoutError(name, ctx.timeoutMs),
      ctx.signal,
    );
  } catch (error) {
    if (ctx.signal?.aborted) throw new AssessmentCancelledError(`${name} signal`);
    const timedOut = error instanceof SignalTimeoutError;
    emit({
      node: ctx.node,
      file: filePath,
      level: "warn",
      event: timedOut ? "SIGNAL_TIMEOUT" : "SIGNAL_UNKNOWN",
      data: { signal: name, error: errorMessage(error) },
    });
    return { status: "unknown", reason: errorMessage(error) };
  }

  if (!computed.cacheHit) {
    try {
      await ctx.cache.set(key, computed.result, ctx.ttlMs);
    } catch (error) {
      emit({
        node: ctx.node,
        file: filePath,
        level: "warn",
        event: "CACHE_WRITE_FAILED",
        data: { key, error: errorMessage(error) },
      });
    }
  }
  return { status: "ok", result: computed.result, cache_hit: computed.cacheHit };
}
