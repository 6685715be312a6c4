import Fastify from "fastify";
import formbody from "@fastify/formbody";
import { z } from "zod";
import {
  ALLOWED_URL_HOSTS,
  AUDIO_FORMATS,
  DEFAULT_WHISPER_MODEL,
  isValidModel,
  JOB_ERRORS,
  TRANSCRIPTION_METHODS,
} from "./constants.js";
import { ValidationError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { JobOrchestrator } from "./pipeline/orchestrator.js";
import type { JobStore } from "./store/jobStore.js";
import type { SummarizationFallbackChain } from "./summarize/chain.js";
import type { SummaryMode } from "./types.js";

export interface AppDependencies {
  orchestrator: Pick<JobOrchestrator, "submit" | "cancel">;
  store: JobStore;
  chain: Pick<SummarizationFallbackChain, "keySummary" | "curate" | "timeline">;
  logger: Logger;
}

// Browser forms post empty strings for untouched fields
function formField<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (v === "" ? undefined : v), schema);
}

const TranscribeSchema = z.object({
  url: z
    .string({ required_error: JOB_ERRORS.INVALID_URL, invalid_type_error: JOB_ERRORS.INVALID_URL })
    .refine((url) => ALLOWED_URL_HOSTS.some((host) => url.includes(host)), JOB_ERRORS.INVALID_URL),
  format: formField(z.enum(AUDIO_FORMATS).default("mp3")),
  method: formField(z.enum(TRANSCRIPTION_METHODS).default("whisper")),
  model: formField(
    z
      .string()
      .default(DEFAULT_WHISPER_MODEL)
      .refine(isValidModel, (model) => ({ message: `Unsupported Whisper model: ${model}` }))
  ),
});

const SummarizeSchema = z.object({
  text: z.string({ required_error: "text is required" }),
});

const SUMMARY_ROUTES = new Map<string, SummaryMode>([
  ["key_summary", "key_summary"],
  ["curator", "curator"],
  ["timeline_summary", "timeline"],
]);

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid request body");
  }
  return parsed.data;
}

export function buildApp(deps: AppDependencies) {
  const { orchestrator, store, chain } = deps;
  const app = Fastify({ logger: deps.logger });

  app.register(formbody);

  app.setErrorHandler((error, req, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      req.log.error({ err: error }, "Request failed");
    }
    return reply.code(statusCode).send({ error: error.message });
  });

  app.post("/transcribe", async (req) => {
    const request = parseBody(TranscribeSchema, req.body);
    const job = await orchestrator.submit(request);
    return { job_id: job.id };
  });

  app.get<{ Params: { jobId: string } }>("/status/:jobId", async (req, reply) => {
    const job = await store.get(req.params.jobId);
    if (!job) {
      return reply.code(404).send({ error: JOB_ERRORS.NOT_FOUND });
    }
    return job;
  });

  app.delete<{ Params: { jobId: string } }>("/jobs/:jobId", async (req, reply) => {
    const { jobId } = req.params;
    const job = await store.get(jobId);
    if (!job) {
      return reply.code(404).send({ error: JOB_ERRORS.NOT_FOUND });
    }
    return { job_id: jobId, cancelled: orchestrator.cancel(jobId) };
  });

  app.post<{ Params: { mode: string } }>("/summarize/:mode", async (req) => {
    const mode = SUMMARY_ROUTES.get(req.params.mode);
    if (!mode) {
      throw new ValidationError(`Unknown summary mode: ${req.params.mode}`);
    }
    const { text } = parseBody(SummarizeSchema, req.body);

    switch (mode) {
      case "key_summary":
        return chain.keySummary(text);
      case "curator":
        return chain.curate(text);
      case "timeline":
        return chain.timeline(text);
    }
  });

  app.get("/healthz", async () => ({ ok: true }));

  return app;
}
