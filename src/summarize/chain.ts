import { MAX_TIMELINE_SECTIONS, MIN_SUMMARY_INPUT } from "../constants.js";
import { errorMessage, ProcessingFault } from "../errors.js";
import type { Logger } from "../logger.js";
import type {
  CuratorSummary,
  ParagraphSummary,
  SummaryMode,
  TimelineSection,
} from "../types.js";
import type { RuleBasedSummarizer } from "./ruleBased.js";

export type Attempt<T> = { ok: true; value: T } | { ok: false; reason: string };

export function produced<T>(value: T): Attempt<T> {
  return { ok: true, value };
}

export function unavailable<T>(reason: string): Attempt<T> {
  return { ok: false, reason };
}

/** A model-backed tier. `ok: false` means "try the next tier", never an error. */
export interface SummaryStrategy {
  readonly name: string;
  keySummary(text: string): Promise<Attempt<ParagraphSummary[]>>;
  curate(text: string): Promise<Attempt<CuratorSummary>>;
  timeline(text: string): Promise<Attempt<TimelineSection[]>>;
}

export type Baseline = Pick<RuleBasedSummarizer, "keySummary" | "curate" | "timeline">;

/**
 * Tries each strategy in priority order and returns the first structurally
 * usable result; the rule-based baseline answers when every tier declines.
 * Only a fault in the baseline escapes, as a ProcessingFault.
 */
export class SummarizationFallbackChain {
  constructor(
    private readonly tiers: SummaryStrategy[],
    private readonly baseline: Baseline,
    private readonly logger: Logger
  ) {}

  keySummary(text: string): Promise<ParagraphSummary[]> {
    return this.resolve(
      "key_summary",
      text,
      (tier) => tier.keySummary(text),
      (v) => v.length > 0 && v.every((p) => p.paragraph_summary.trim().length > 0),
      () => this.baseline.keySummary(text)
    );
  }

  curate(text: string): Promise<CuratorSummary> {
    return this.resolve(
      "curator",
      text,
      (tier) => tier.curate(text),
      (v) =>
        v.title.trim().length > 0 &&
        v.one_line_summary.trim().length > 0 &&
        v.key_points.length > 0,
      () => this.baseline.curate(text)
    );
  }

  timeline(text: string): Promise<TimelineSection[]> {
    return this.resolve(
      "timeline",
      text,
      (tier) => tier.timeline(text),
      (v) => v.length > 0 && v.length <= MAX_TIMELINE_SECTIONS,
      () => this.baseline.timeline(text)
    );
  }

  private async resolve<T>(
    mode: SummaryMode,
    text: string,
    attempt: (tier: SummaryStrategy) => Promise<Attempt<T>>,
    usable: (value: T) => boolean,
    fallback: () => T
  ): Promise<T> {
    // Near-empty input only ever gets the baseline's placeholder
    if (text.trim().length >= MIN_SUMMARY_INPUT) {
      for (const tier of this.tiers) {
        try {
          const outcome = await attempt(tier);
          if (outcome.ok && usable(outcome.value)) {
            this.logger.info({ mode, tier: tier.name }, "Summary produced");
            return outcome.value;
          }
          const reason = outcome.ok ? "empty or malformed result" : outcome.reason;
          this.logger.debug({ mode, tier: tier.name, reason }, "Summary tier declined");
        } catch (err) {
          this.logger.warn({ mode, tier: tier.name, err }, "Summary tier failed, falling back");
        }
      }
    }

    try {
      return fallback();
    } catch (err) {
      this.logger.error({ mode, err }, "Rule-based summarization failed");
      throw new ProcessingFault(`요약 처리 중 오류가 발생했습니다: ${errorMessage(err)}`, { cause: err });
    }
  }
}
