import { STATUS_TEXT } from "../constants.js";
import type { Job, JobPatch } from "../types.js";

/**
 * Keyed job registry. Only the orchestrator writes; status handlers read.
 * No iteration API; eviction is internal to each implementation.
 */
export interface JobStore {
  create(id: string): Promise<Job>;
  /** Merges `patch`. Missing or already-completed jobs are left untouched. */
  update(id: string, patch: JobPatch): Promise<void>;
  get(id: string): Promise<Job | null>;
}

export function newJobRecord(id: string, now: Date = new Date()): Job {
  return {
    id,
    stage: "SUBMITTED",
    status: STATUS_TEXT.SUBMITTED,
    completed: false,
    success: false,
    created_at: now.toISOString(),
  };
}

export function mergeJob(current: Job, patch: JobPatch): Job {
  return { ...current, ...patch, id: current.id, created_at: current.created_at };
}

export interface MemoryJobStoreOptions {
  capacity?: number;
  ttlMs?: number;
  now?: () => number;
}

interface Entry {
  job: Job;
  expiresAt: number;
}

// In-memory storage - no persistence beyond the process
export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Entry>();
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: MemoryJobStoreOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 1000);
    this.ttlMs = options.ttlMs ?? 24 * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  async create(id: string): Promise<Job> {
    const now = this.now();
    this.purgeExpired(now);
    // Running jobs are never evicted; the store grows past capacity until one finishes
    while (this.jobs.size >= this.capacity) {
      if (!this.evictCompleted()) break;
    }
    const job = newJobRecord(id, new Date(now));
    this.jobs.set(id, { job, expiresAt: now + this.ttlMs });
    return { ...job };
  }

  async update(id: string, patch: JobPatch): Promise<void> {
    const entry = this.live(id);
    if (!entry || entry.job.completed) return;
    entry.job = mergeJob(entry.job, patch);
  }

  async get(id: string): Promise<Job | null> {
    const entry = this.live(id);
    return entry ? { ...entry.job } : null;
  }

  get size(): number {
    return this.jobs.size;
  }

  private live(id: string): Entry | undefined {
    const entry = this.jobs.get(id);
    if (entry && entry.expiresAt <= this.now()) {
      this.jobs.delete(id);
      return undefined;
    }
    return entry;
  }

  private purgeExpired(now: number) {
    for (const [id, entry] of this.jobs) {
      if (entry.expiresAt <= now) this.jobs.delete(id);
    }
  }

  // Drops the oldest finished job; false when every job is still running
  private evictCompleted(): boolean {
    for (const [id, entry] of this.jobs) {
      if (entry.job.completed) {
        this.jobs.delete(id);
        return true;
      }
    }
    return false;
  }
}
