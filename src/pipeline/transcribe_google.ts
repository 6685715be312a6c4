import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import crypto from "node:crypto";
import { fetch } from "undici";
import { z } from "zod";
import { CollaboratorUnavailable } from "../errors.js";
import type { Logger } from "../logger.js";
import type { BackendTranscript, TranscriptSegment } from "../types.js";
import type { TranscribeOptions, TranscriptionBackend } from "./transcribe.js";

export const SPEECH_UNRECOGNIZED = "음성을 인식할 수 없습니다";

export type WavConverter = (inputPath: string, outPath: string, signal?: AbortSignal) => Promise<string>;

export interface GoogleSpeechOptions {
  apiKey?: string;
  baseUrl: string; // e.g., https://speech.googleapis.com/v1
  toWav: WavConverter;
  languages?: string[]; // tried in order until one yields text
  tmpDir?: string;
  logger: Logger;
}

const RecognizeResponseSchema = z.object({
  results: z
    .array(
      z.object({
        alternatives: z.array(z.object({ transcript: z.string().optional() })).optional(),
        languageCode: z.string().optional(),
      })
    )
    .optional(),
});

/**
 * Google Speech-to-Text backend. Audio is re-encoded to 16 kHz mono PCM,
 * sent inline to `speech:recognize`, and retried in English when Korean
 * recognition comes back empty.
 */
export class GoogleSpeechBackend implements TranscriptionBackend {
  private readonly languages: string[];

  constructor(private readonly opts: GoogleSpeechOptions) {
    this.languages = opts.languages ?? ["ko-KR", "en-US"];
  }

  async transcribe(audioPath: string, options: TranscribeOptions): Promise<BackendTranscript> {
    if (!this.opts.apiKey) {
      throw new CollaboratorUnavailable("google", "Google API 오류: GOOGLE_SPEECH_API_KEY not set");
    }

    const wavPath = path.join(
      this.opts.tmpDir ?? os.tmpdir(),
      `google_${crypto.randomUUID()}.wav`
    );
    try {
      await this.opts.toWav(audioPath, wavPath, options.signal);
      const content = fs.readFileSync(wavPath).toString("base64");

      for (const languageCode of this.languages) {
        const transcripts = await this.recognize(content, languageCode, options.signal);
        if (transcripts.length > 0) {
          return toTranscript(transcripts, languageCode);
        }
        this.opts.logger.debug({ languageCode }, "Google returned no results, trying next language");
      }
      throw new Error(SPEECH_UNRECOGNIZED);
    } finally {
      await fs.promises.rm(wavPath, { force: true });
    }
  }

  private async recognize(content: string, languageCode: string, signal?: AbortSignal): Promise<string[]> {
    const url = `${this.opts.baseUrl}/speech:recognize?key=${encodeURIComponent(this.opts.apiKey ?? "")}`;
    const res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        config: {
          encoding: "LINEAR16",
          sampleRateHertz: 16000,
          languageCode,
          enableAutomaticPunctuation: true,
        },
        audio: { content },
      }),
      signal,
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Google API 오류: ${res.status} ${text}`);
    }
    const body = RecognizeResponseSchema.parse(await res.json());
    return (body.results ?? [])
      .map((r) => r.alternatives?.[0]?.transcript?.trim() ?? "")
      .filter((t) => t.length > 0);
  }
}

// Inline recognition carries no timings; each result becomes one untimed segment.
function toTranscript(transcripts: string[], languageCode: string): BackendTranscript {
  const segments: TranscriptSegment[] = transcripts.map((text, idx) => ({
    id: idx,
    start: 0,
    end: 0,
    text,
  }));
  return {
    text: transcripts.join(" "),
    language: languageCode,
    segments,
  };
}
