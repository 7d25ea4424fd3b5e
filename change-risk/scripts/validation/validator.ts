import { ValidatorWriteError, errorMessage } from "../errors";
import { emitterFor, type RiskLogger } from "../logger";
import type { SignalGate } from "../signals/evaluate";
import type { FeedbackEvent, SignalName, SignalStat } from "../types";
import type { SignalStatStore } from "./store";

export interface ValidatorOptions {
  store: SignalStatStore;
  fpRateThreshold: number;
  minUses: number;
  logger?: RiskLogger;
  now?: () => Date;
}

export type FeedbackResult = { recorded: true; stat: SignalStat } | { recorded: false; error: string };

export interface SignalValidator extends SignalGate {
  recordFeedback: (name: string, wasFalsePositive: boolean, reason: string) => Promise<FeedbackResult>;
  enable: (name: string, options?: { resetCounters?: boolean }) => Promise<SignalStat>;
  stats: (name: string) => Promise<SignalStat>;
  listStats: () => Promise<SignalStat[]>;
}

export function emptyStat(name: string, at: string): SignalStat {
  return {
    name,
    total_uses: 0,
    false_positives: 0,
    true_positives: 0,
    fp_rate: 0,
    enabled: true,
    disabled_at: null,
    updated_at: at,
  };
}

/** Disable exactly when both hold: enough uses and a rate strictly above the threshold. */
export function shouldDisable(stat: SignalStat, fpRateThreshold: number, minUses: number): boolean {
  return stat.total_uses >= minUses && stat.fp_rate > fpRateThreshold;
}

export function createSignalValidator(options: ValidatorOptions): SignalValidator {
  const emit = emitterFor(options.logger);
  const now = options.now ?? (() => new Date());

  const readStat = async (name: string): Promise<SignalStat | null> => {
    try {
      return await options.store.get(name);
    } catch (error) {
      emit({ node: "validator", level: "warn", event: "VALIDATOR_READ_FAILED", data: { signal: name, error } });
      return null;
    }
  };

  return {
    async isEnabled(name: SignalName) {
      const stat = await readStat(name);
      return stat?.enabled ?? true;
    },

    async falsePositiveRate(name: SignalName) {
      const stat = await readStat(name);
      return stat?.fp_rate ?? 0;
    },

    async recordFeedback(name, wasFalsePositive, reason) {
      const at = now().toISOString();
      let disabledNow = false;
      try {
        const stat = await options.store.update(name, (current) => {
          const base = current ?? emptyStat(name, at);
          const falsePositives = base.false_positives + (wasFalsePositive ? 1 : 0);
          const truePositives = base.true_positives + (wasFalsePositive ? 0 : 1);
          const totalUses = base.total_uses + 1;
          const next: SignalStat = {
            ...base,
            total_uses: totalUses,
            false_positives: falsePositives,
            true_positives: truePositives,
            fp_rate: falsePositives / totalUses,
            updated_at: at,
          };
          if (next.enabled && shouldDisable(next, options.fpRateThreshold, options.minUses)) {
            disabledNow = true;
            return { ...next, enabled: false, disabled_at: at };
          }
          return next;
        });
        const event: FeedbackEvent = { signal_name: name, was_false_positive: wasFalsePositive, reason, ts: at };
        await options.store.appendFeedback(event);

        emit({
          node: "validator",
          level: "info",
          event: "SIGNAL_FEEDBACK_RECORDED",
          data: { signal: name, false_positive: wasFalsePositive, total_uses: stat.total_uses, fp_rate: stat.fp_rate },
        });
        if (disabledNow) {
          emit({
            node: "validator",
            level: "warn",
            event: "SIGNAL_DISABLED",
            data: { signal: name, total_uses: stat.total_uses, fp_rate: stat.fp_rate },
          });
        }
        return { recorded: true, stat };
      } catch (cause) {
        const error = new ValidatorWriteError(name, { cause });
        emit({ node: "validator", level: "error", event: "VALIDATOR_WRITE_FAILED", data: { signal: name, error } });
        return { recorded: false, error: errorMessage(error) };
      }
    },

    async enable(name, enableOptions = {}) {
      const at = now().toISOString();
      const stat = await options.store.update(name, (current) => {
        const base = current ?? emptyStat(name, at);
        if (enableOptions.resetCounters) return emptyStat(name, at);
        return { ...base, enabled: true, disabled_at: null, updated_at: at };
      });
      emit({
        node: "validator",
        level: "info",
        event: "SIGNAL_ENABLED",
        data: { signal: name, reset_counters: enableOptions.resetCounters ?? false },
      });
      return stat;
    },

    async stats(name) {
      return (await options.store.get(name)) ?? emptyStat(name, now().toISOString());
    },

    listStats: () => options.store.list(),
  };
}
