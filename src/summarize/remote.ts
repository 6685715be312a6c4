import { fetch } from "undici";
import { z } from "zod";
import { MAX_TIMELINE_SECTIONS } from "../constants.js";
import type { Logger } from "../logger.js";
import type { CuratorSummary, ParagraphSummary, TimelineSection } from "../types.js";
import { produced, unavailable, type Attempt, type SummaryStrategy } from "./chain.js";

export interface GroqSummaryOptions {
  enabled: boolean;
  apiKey?: string;
  baseUrl: string; // e.g., https://api.groq.com/openai/v1
  model: string;
  timeoutMs?: number;
  logger: Logger;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const KeySummarySchema = z.object({
  summaries: z.array(z.object({ paragraph_summary: z.string().min(1) })).min(1),
});

const CuratorSchema = z.object({
  title: z.string().min(1),
  one_line_summary: z.string().min(1),
  key_points: z.array(z.string().min(1)).min(1),
});

const TimelineSchema = z.object({
  sections: z
    .array(
      z.object({
        timestamp: z.string(),
        subtitle: z.string(),
        summary: z.string().min(1),
        keywords: z.array(z.string()),
        oneline_summary: z.string(),
      })
    )
    .min(1),
});

const LANGUAGE_RULE = "Write in the same language as the transcript. Respond with a single JSON object and nothing else.";

const PROMPTS = {
  key_summary: `You summarize video transcripts paragraph by paragraph. Return {"summaries":[{"paragraph_summary":string}]} with one concise summary per paragraph, in order. ${LANGUAGE_RULE}`,
  curator: `You curate video transcripts. Return {"title":string,"one_line_summary":string,"key_points":[string,string,string]} where key points do not repeat each other. ${LANGUAGE_RULE}`,
  timeline: `You split video transcripts into chronological sections of about three minutes each, at most ${MAX_TIMELINE_SECTIONS}. Return {"sections":[{"timestamp":"1-3분","subtitle":string,"summary":string,"keywords":[string],"oneline_summary":string}]}; oneline_summary restates the section casually. ${LANGUAGE_RULE}`,
} as const;

/** Remote generative tier: Groq's OpenAI-compatible chat completions in JSON mode. */
export class GroqSummaryStrategy implements SummaryStrategy {
  readonly name = "remote";

  constructor(private readonly opts: GroqSummaryOptions) {}

  async keySummary(text: string): Promise<Attempt<ParagraphSummary[]>> {
    const out = await this.complete(PROMPTS.key_summary, text, KeySummarySchema);
    return out.ok ? produced(out.value.summaries) : out;
  }

  async curate(text: string): Promise<Attempt<CuratorSummary>> {
    return this.complete(PROMPTS.curator, text, CuratorSchema);
  }

  async timeline(text: string): Promise<Attempt<TimelineSection[]>> {
    const out = await this.complete(PROMPTS.timeline, text, TimelineSchema);
    return out.ok ? produced(out.value.sections.slice(0, MAX_TIMELINE_SECTIONS)) : out;
  }

  private async complete<T>(system: string, text: string, schema: z.ZodType<T>): Promise<Attempt<T>> {
    if (!this.opts.enabled || !this.opts.apiKey) {
      return unavailable("remote summarizer not configured");
    }

    const res = await fetch(`${this.opts.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.opts.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.opts.model,
        temperature: 0.2,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: system },
          { role: "user", content: text },
        ],
      }),
      signal: AbortSignal.timeout(this.opts.timeoutMs ?? 60000),
    });
    if (!res.ok) {
      const body = await res.text();
      throw new Error(`Groq summarization failed: ${res.status} ${body}`);
    }

    const completion = ChatCompletionSchema.parse(await res.json());
    const content = completion.choices[0].message.content ?? "";
    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch {
      return unavailable("remote summarizer returned non-JSON content");
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      this.opts.logger.debug({ issues: parsed.error.issues }, "Remote summary failed validation");
      return unavailable("remote summarizer returned malformed JSON");
    }
    return produced(parsed.data);
  }
}
