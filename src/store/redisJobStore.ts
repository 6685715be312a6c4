import { Redis } from "ioredis";
import { z } from "zod";
import type { Job, JobPatch, TranscriptionResult } from "../types.js";
import { mergeJob, newJobRecord, type JobStore } from "./jobStore.js";

// The subset of ioredis the store needs
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
}

// Transcription results are stored verbatim; only their tag is checked on read.
const StoredJobSchema = z.object({
  id: z.string(),
  stage: z.enum(["SUBMITTED", "FETCHING_INFO", "EXTRACTING_AUDIO", "TRANSCRIBING", "COMPLETED", "FAILED"]),
  status: z.string(),
  completed: z.boolean(),
  success: z.boolean(),
  result: z.custom<TranscriptionResult>(isStoredTranscription).optional(),
  error: z.string().optional(),
  metadata: z
    .object({
      title: z.string(),
      duration: z.number(),
      uploader: z.string(),
      view_count: z.number(),
    })
    .optional(),
  created_at: z.string(),
});

export class RedisJobStore implements JobStore {
  constructor(
    private readonly client: KeyValueClient,
    private readonly ttlSeconds: number
  ) {}

  static fromUrl(redisUrl: string, ttlSeconds: number) {
    return new RedisJobStore(new Redis(redisUrl, { maxRetriesPerRequest: 2 }), ttlSeconds);
  }

  async create(id: string): Promise<Job> {
    const job = newJobRecord(id);
    await this.write(job);
    return job;
  }

  async update(id: string, patch: JobPatch): Promise<void> {
    const current = await this.get(id);
    if (!current || current.completed) return;
    await this.write(mergeJob(current, patch));
  }

  async get(id: string): Promise<Job | null> {
    const raw = await this.client.get(key(id));
    if (!raw) return null;
    const parsed = StoredJobSchema.safeParse(parseJson(raw));
    return parsed.success ? parsed.data : null;
  }

  private async write(job: Job) {
    await this.client.set(key(job.id), JSON.stringify(job), "EX", this.ttlSeconds);
  }
}

// Corrupt values read as missing, like values that fail the schema
function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function key(id: string) {
  return `job:${id}`;
}

function isStoredTranscription(value: unknown): value is TranscriptionResult {
  return typeof value === "object" && value !== null && "success" in value && "method" in value;
}
