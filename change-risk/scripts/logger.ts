import type { RiskEvent } from "./types";

function truncate(value: string, maxChars = 200): string {
  if (value.length <= maxChars) {
    return value;
  }
  return `${value.slice(0, maxChars)}…`;
}

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return (
    normalized.includes("api_key") ||
    normalized.includes("apikey") ||
    normalized.includes("authorization") ||
    normalized.includes("token") ||
    normalized.includes("secret") ||
    normalized.includes("prompt") ||
    normalized.endsWith("_text")
  );
}

export function safeData(input: unknown): Record<string, unknown> | undefined {
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    return undefined;
  }

  const sanitize = (value: unknown, depth: number): unknown => {
    if (depth > 3) {
      return "[truncated-depth]";
    }
    if (typeof value === "string") {
      return truncate(value);
    }
    if (typeof value === "number" || typeof value === "boolean" || value === null) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.slice(0, 20).map((item) => sanitize(item, depth + 1));
    }
    if (value instanceof Error) {
      return truncate(value.message);
    }
    if (typeof value === "object") {
      const out: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(value)) {
        if (isSensitiveKey(key)) {
          out[key] = "[redacted]";
          continue;
        }
        out[key] = sanitize(child, depth + 1);
      }
      return out;
    }
    return String(value);
  };

  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(input)) {
    out[key] = isSensitiveKey(key) ? "[redacted]" : sanitize(child, 1);
  }
  return out;
}

export type LogInput = Omit<RiskEvent, "ts" | "run_id">;

export interface RiskLogger {
  log: (event: LogInput) => void;
  getEvents: () => RiskEvent[];
}

export function createLogger(
  runId: string,
  options: { sink?: (event: RiskEvent) => void; now?: () => Date } = {},
): RiskLogger {
  const events: RiskEvent[] = [];
  const now = options.now ?? (() => new Date());

  return {
    log(event) {
      const entry: RiskEvent = {
        ts: now().toISOString(),
        run_id: runId,
        node: event.node,
        file: event.file ?? null,
        level: event.level,
        event: event.event,
        data: safeData(event.data),
      };
      events.push(entry);
      options.sink?.(entry);
    },
    getEvents() {
      return [...events];
    },
  };
}

export function formatEventLine(event: RiskEvent): string {
  const file = event.file ? ` ${event.file}` : "";
  const data = event.data ? ` ${JSON.stringify(event.data)}` : "";
  return `${event.ts} ${event.level.toUpperCase()} [${event.node}]${file} ${event.event}${data}`;
}

/** No-op emitter for components constructed without a logger. */
export function emitterFor(logger?: RiskLogger): (event: LogInput) => void {
  return logger ? logger.log : () => {};
}
