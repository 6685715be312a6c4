import { fetch } from "undici";
import { z } from "zod";
import type { Logger } from "../logger.js";
import type { CuratorSummary, ParagraphSummary, TimelineSection } from "../types.js";
import { produced, unavailable, type Attempt, type SummaryStrategy } from "./chain.js";
import type { RuleBasedSummarizer } from "./ruleBased.js";
import { segmentParagraphs } from "./text.js";

export interface LocalLlmOptions {
  enabled: boolean;
  baseUrl: string; // e.g., http://localhost:11434
  model: string;
  timeoutMs?: number;
  logger: Logger;
}

const GenerateResponseSchema = z.object({ response: z.string() });

const MAX_KEY_POINTS = 3;

function paragraphPrompt(text: string) {
  return [
    "Summarize the following passage in one or two sentences.",
    "Use the same language as the passage and reply with the summary only.",
    "",
    text,
  ].join("\n");
}

/**
 * Local generative tier backed by an Ollama-compatible service. It only knows
 * how to summarize a paragraph; the mode shapes come from the rule-based
 * segmentation around it.
 */
export class LocalLlmSummaryStrategy implements SummaryStrategy {
  readonly name = "local";

  constructor(
    private readonly opts: LocalLlmOptions,
    private readonly rules: Pick<RuleBasedSummarizer, "curate" | "timelineGroups" | "timelineSection">
  ) {}

  async keySummary(text: string): Promise<Attempt<ParagraphSummary[]>> {
    const ready = await this.ready();
    if (!ready.ok) return ready;

    const summaries: ParagraphSummary[] = [];
    for (const paragraph of segmentParagraphs(text)) {
      const summary = await this.summarizeParagraph(paragraph);
      if (summary === null) return unavailable("local model produced no summary");
      summaries.push({ paragraph_summary: summary });
    }
    return produced(summaries);
  }

  async curate(text: string): Promise<Attempt<CuratorSummary>> {
    const ready = await this.ready();
    if (!ready.ok) return ready;

    const oneLine = await this.summarizeParagraph(text);
    if (oneLine === null) return unavailable("local model produced no summary");

    const keyPoints: string[] = [];
    for (const paragraph of segmentParagraphs(text).slice(0, MAX_KEY_POINTS)) {
      const point = await this.summarizeParagraph(paragraph);
      if (point === null) return unavailable("local model produced no summary");
      keyPoints.push(point);
    }

    return produced({
      title: this.rules.curate(text).title,
      one_line_summary: oneLine,
      key_points: keyPoints,
    });
  }

  async timeline(text: string): Promise<Attempt<TimelineSection[]>> {
    const ready = await this.ready();
    if (!ready.ok) return ready;

    const sections: TimelineSection[] = [];
    const groups = this.rules.timelineGroups(text);
    for (const [i, group] of groups.entries()) {
      const summary = await this.summarizeParagraph(group.join(". "));
      if (summary === null) return unavailable("local model produced no summary");
      sections.push({ ...this.rules.timelineSection(group, i), summary });
    }
    return produced(sections);
  }

  /** `null` when the service answers without a usable summary. */
  async summarizeParagraph(text: string): Promise<string | null> {
    const res = await fetch(`${this.opts.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: this.opts.model, prompt: paragraphPrompt(text), stream: false }),
      signal: AbortSignal.timeout(this.opts.timeoutMs ?? 120000),
    });
    if (!res.ok) {
      this.opts.logger.debug({ status: res.status }, "Local model request rejected");
      return null;
    }
    const parsed = GenerateResponseSchema.safeParse(await res.json());
    if (!parsed.success) return null;
    const summary = parsed.data.response.trim();
    return summary.length > 0 ? summary : null;
  }

  private async ready(): Promise<Attempt<true>> {
    if (!this.opts.enabled) return unavailable("local summarizer disabled");
    try {
      const res = await fetch(`${this.opts.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(5000),
      });
      return res.ok ? produced(true) : unavailable(`local model service returned ${res.status}`);
    } catch (err) {
      this.opts.logger.debug({ err }, "Local model service unreachable");
      return unavailable(`local model service not reachable at ${this.opts.baseUrl}`);
    }
  }
}
