import crypto from "node:crypto";
import { JOB_ERRORS, STATUS_TEXT } from "../constants.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { JobStore } from "../store/jobStore.js";
import type { Job, TranscribeRequest, TranscriptionResult } from "../types.js";
import type { Downloader } from "./download.js";
import type { TranscriptionCoordinator } from "./transcribe.js";

export interface OrchestratorDependencies {
  store: JobStore;
  downloader: Downloader;
  coordinator: Pick<TranscriptionCoordinator, "transcribe">;
  logger: Logger;
  newJobId?: () => string;
}

interface RunningTask {
  controller: AbortController;
  done: Promise<void>;
}

class JobCancelled extends Error {
  constructor() {
    super(JOB_ERRORS.CANCELLED);
    this.name = "JobCancelled";
  }
}

/**
 * Drives a submitted job through fetch → extract → transcribe.
 *
 * A job either reaches COMPLETED with a result or FAILED with an error; stage
 * faults are recorded on the job, never rethrown. Whatever the downloader wrote
 * for the job is released on every exit path.
 */
export class JobOrchestrator {
  private readonly tasks = new Map<string, RunningTask>();
  private readonly newJobId: () => string;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.newJobId = deps.newJobId ?? (() => crypto.randomUUID());
  }

  /** Creates the job and schedules its pipeline on the next turn of the event loop. */
  async submit(request: TranscribeRequest): Promise<Job> {
    const job = await this.deps.store.create(this.newJobId());
    const controller = new AbortController();

    const done = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.run(job.id, request, controller.signal))
      .catch((err: unknown) => {
        this.deps.logger.error({ err, jobId: job.id }, "Job runner crashed");
      })
      .finally(() => {
        this.tasks.delete(job.id);
      });

    this.tasks.set(job.id, { controller, done });
    this.deps.logger.info({ jobId: job.id, method: request.method, format: request.format }, "Job submitted");
    return job;
  }

  /** Aborts an in-flight job. Returns false when it is not running. */
  cancel(jobId: string): boolean {
    const task = this.tasks.get(jobId);
    if (!task || task.controller.signal.aborted) return false;
    task.controller.abort();
    this.deps.logger.info({ jobId }, "Job cancellation requested");
    return true;
  }

  isRunning(jobId: string): boolean {
    return this.tasks.has(jobId);
  }

  async wait(jobId: string): Promise<void> {
    await this.tasks.get(jobId)?.done;
  }

  async drain(): Promise<void> {
    await Promise.all([...this.tasks.values()].map((t) => t.done));
  }

  async run(jobId: string, request: TranscribeRequest, signal: AbortSignal): Promise<void> {
    const { store, downloader, coordinator } = this.deps;
    const log = this.deps.logger.child({ jobId });

    try {
      checkCancelled(signal);
      await store.update(jobId, { stage: "FETCHING_INFO", status: STATUS_TEXT.FETCHING_INFO });
      const metadata = await downloader.fetchMetadata(request.url, signal);
      checkCancelled(signal);
      if (!metadata) {
        await this.fail(jobId, JOB_ERRORS.METADATA_UNAVAILABLE);
        return;
      }
      log.info({ title: metadata.title, duration: metadata.duration }, "Video metadata fetched");

      await store.update(jobId, {
        stage: "EXTRACTING_AUDIO",
        status: STATUS_TEXT.EXTRACTING_AUDIO(request.format),
        metadata,
      });
      const audioPath = await downloader.extractAudio(jobId, request.url, request.format, signal);
      checkCancelled(signal);
      if (!audioPath) {
        await this.fail(jobId, JOB_ERRORS.EXTRACTION_FAILED);
        return;
      }

      await store.update(jobId, {
        stage: "TRANSCRIBING",
        status: STATUS_TEXT.TRANSCRIBING(request.method),
      });
      const result = await coordinator.transcribe(audioPath, request.method, {
        model: request.model,
        signal,
      });
      checkCancelled(signal);

      if (result.success) {
        await this.complete(jobId, result);
        log.info({ method: result.method }, "Job completed");
      } else {
        await this.fail(jobId, result.error || JOB_ERRORS.UNKNOWN);
      }
    } catch (err) {
      // collaborators interrupted by the signal reject with their own abort errors
      const message = signal.aborted ? JOB_ERRORS.CANCELLED : errorMessage(err) || JOB_ERRORS.UNKNOWN;
      log.error({ err }, "Job failed");
      await this.fail(jobId, message);
    } finally {
      await downloader.release(jobId).catch((err: unknown) => {
        log.warn({ err }, "Cleanup warning");
      });
    }
  }

  private async complete(jobId: string, result: TranscriptionResult) {
    await this.deps.store.update(jobId, {
      stage: "COMPLETED",
      status: STATUS_TEXT.COMPLETED,
      completed: true,
      success: true,
      result,
    });
  }

  private async fail(jobId: string, error: string) {
    this.deps.logger.warn({ jobId, error }, "Job marked failed");
    await this.deps.store.update(jobId, {
      stage: "FAILED",
      status: STATUS_TEXT.FAILED,
      completed: true,
      success: false,
      error,
    });
  }
}

function checkCancelled(signal: AbortSignal) {
  if (signal.aborted) throw new JobCancelled();
}
