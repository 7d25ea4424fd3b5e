import type { FailKind } from "./types";

export class RiskCheckError extends Error {
  readonly kind: FailKind;

  constructor(kind: FailKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class GraphUnavailableError extends RiskCheckError {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super("GRAPH_UNAVAILABLE", `graph ${operation} unavailable: ${message}`, options);
    this.operation = operation;
  }
}

export class ReasoningTimeoutError extends RiskCheckError {
  readonly timeoutMs: number;

  constructor(role: string, timeoutMs: number) {
    super("REASONING_TIMEOUT", `reasoning ${role} call timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class ReasoningMalformedResponseError extends RiskCheckError {
  readonly raw: string;

  constructor(role: string, detail: string, raw = "") {
    super("REASONING_MALFORMED", `reasoning ${role} response malformed: ${detail}`);
    this.raw = raw.slice(0, 500);
  }
}

export class ValidatorWriteError extends RiskCheckError {
  constructor(signalName: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? "unknown");
    super("VALIDATOR_WRITE_FAILED", `failed to persist feedback for ${signalName}: ${reason}`, options);
  }
}

export class AssessmentCancelledError extends RiskCheckError {
  constructor(where: string) {
    super("CANCELLED", `risk check cancelled during ${where}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isGraphUnavailable(error: unknown): error is GraphUnavailableError {
  return error instanceof GraphUnavailableError;
}

/** A single signal overran its join timeout. Recorded as an unknown signal, never a file failure. */
export class SignalTimeoutError extends Error {
  readonly signal: string;

  constructor(signal: string, timeoutMs: number) {
    super(`signal ${signal} timed out after ${timeoutMs}ms`);
    this.name = "SignalTimeoutError";
    this.signal = signal;
  }
}
