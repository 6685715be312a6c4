import fs from "node:fs";
import path from "node:path";
import { fetch, FormData, File } from "undici";
import { z } from "zod";
import { CollaboratorUnavailable } from "../errors.js";
import type { Logger } from "../logger.js";
import type { BackendTranscript, TranscriptSegment } from "../types.js";
import type { TranscribeOptions, TranscriptionBackend } from "./transcribe.js";

export interface LocalWhisperOptions {
  baseUrl: string; // e.g., http://localhost:5689
  timeoutMs: number;
  language?: string;
  logger: Logger;
}

// OpenAI-compatible verbose_json
const VerboseJsonSchema = z.object({
  text: z.string().optional(),
  language: z.string().optional(),
  segments: z
    .array(
      z.object({
        id: z.number().optional(),
        start: z.number().optional(),
        end: z.number().optional(),
        text: z.string().optional(),
      })
    )
    .optional(),
});

type VerboseJson = z.infer<typeof VerboseJsonSchema>;

/**
 * Whisper backend: a local ASR service speaking the OpenAI transcription API.
 * The whole file goes up in one request.
 */
export class LocalWhisperBackend implements TranscriptionBackend {
  private readonly language: string;

  constructor(private readonly opts: LocalWhisperOptions) {
    this.language = opts.language ?? "ko";
  }

  async transcribe(audioPath: string, options: TranscribeOptions): Promise<BackendTranscript> {
    await this.ensureAvailable(options.signal);

    const { model } = options;
    this.opts.logger.debug({ audioPath, model }, "Transcribing entire file with local ASR");

    const form = new FormData();
    const audioBuffer = fs.readFileSync(audioPath);
    const fileName = path.basename(audioPath);
    form.append("file", new File([audioBuffer], fileName, { type: getAudioMimeType(fileName) }));
    form.append("model", model);
    form.append("task", "transcribe");
    form.append("language", this.language);
    form.append("response_format", "verbose_json");

    const timeout = AbortSignal.timeout(this.opts.timeoutMs);
    const response = await fetch(`${this.opts.baseUrl}/openai/v1/audio/transcriptions`, {
      method: "POST",
      body: form,
      signal: options.signal ? AbortSignal.any([options.signal, timeout]) : timeout,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Local ASR transcription failed: ${response.status} ${errorText}`);
    }

    const raw = VerboseJsonSchema.parse(await response.json());
    return normalizeVerboseJson(raw, this.language);
  }

  private async ensureAvailable(signal?: AbortSignal) {
    try {
      const healthCheck = await fetch(`${this.opts.baseUrl}/healthz`, { signal });
      if (healthCheck.ok) return;
      await healthCheck.body?.cancel();
    } catch (err) {
      if (signal?.aborted) throw err;
    }
    throw new CollaboratorUnavailable(
      "whisper",
      `Local ASR service is not available at ${this.opts.baseUrl}`
    );
  }
}

export function normalizeVerboseJson(raw: VerboseJson, fallbackLanguage: string): BackendTranscript {
  const segments: TranscriptSegment[] = (raw.segments ?? []).map((s, idx) => ({
    id: s.id ?? idx,
    start: s.start ?? 0,
    end: s.end ?? 0,
    text: (s.text ?? "").trim(),
  }));
  const text = raw.text ?? segments.map((s) => s.text).join(" ");
  return {
    text: text.trim(),
    language: raw.language ?? fallbackLanguage,
    segments,
  };
}

function getAudioMimeType(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  const mimeTypes: Record<string, string> = {
    ".mp3": "audio/mpeg",
    ".wav": "audio/wav",
    ".m4a": "audio/mp4",
    ".aac": "audio/aac",
    ".ogg": "audio/ogg",
    ".flac": "audio/flac",
  };
  return mimeTypes[ext] || "audio/wav";
}
