import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildApp } from "../../src/app.js";
import { silentLogger } from "../../src/logger.js";
import type { Downloader } from "../../src/pipeline/download.js";
import { JobOrchestrator } from "../../src/pipeline/orchestrator.js";
import { MemoryJobStore } from "../../src/store/jobStore.js";
import { SummarizationFallbackChain, type Baseline } from "../../src/summarize/chain.js";
import { RuleBasedSummarizer } from "../../src/summarize/ruleBased.js";
import type { TranscriptionResult } from "../../src/types.js";

const VIDEO_URL = "https://www.youtube.com/watch?v=abc123";

const RESULT: TranscriptionResult = {
  text: "테스트 전사 결과",
  language: "ko",
  segments: [{ id: 0, start: 0, end: 3, text: "테스트 전사 결과" }],
  success: true,
  method: "whisper",
};

function harness(baseline: Baseline = new RuleBasedSummarizer(new Set())) {
  const logger = silentLogger();
  const store = new MemoryJobStore();
  const downloader: Downloader = {
    fetchMetadata: vi.fn(async () => ({ title: "Test video", duration: 10, uploader: "tester", view_count: 1 })),
    extractAudio: vi.fn(async () => "/downloads/job/audio.mp3"),
    release: vi.fn(async () => undefined),
  };
  const coordinator = { transcribe: vi.fn(async () => RESULT) };
  const orchestrator = new JobOrchestrator({ store, downloader, coordinator, logger });
  const chain = new SummarizationFallbackChain([], baseline, logger);
  const app = buildApp({ orchestrator, store, chain, logger });
  return { app, store, downloader, coordinator, orchestrator };
}

let h: ReturnType<typeof harness>;

beforeEach(async () => {
  h = harness();
  await h.app.ready();
});

afterEach(async () => {
  await h.orchestrator.drain();
  await h.app.close();
});

const form = (fields: Record<string, string>) => ({
  payload: new URLSearchParams(fields).toString(),
  headers: { "content-type": "application/x-www-form-urlencoded" },
});

describe("POST /transcribe", () => {
  it("accepts a form submission and runs the job to completion", async () => {
    const res = await h.app.inject({
      method: "POST",
      url: "/transcribe",
      ...form({ url: VIDEO_URL, format: "wav", method: "whisper", model: "small" }),
    });

    expect(res.statusCode).toBe(200);
    const { job_id } = res.json<{ job_id: string }>();
    await h.orchestrator.wait(job_id);

    const status = await h.app.inject({ method: "GET", url: `/status/${job_id}` });
    expect(status.statusCode).toBe(200);
    expect(status.json()).toMatchObject({
      id: job_id,
      stage: "COMPLETED",
      status: "변환 완료!",
      completed: true,
      success: true,
      result: RESULT,
    });
    expect(h.downloader.extractAudio).toHaveBeenCalledWith(job_id, VIDEO_URL, "wav", expect.any(AbortSignal));
    expect(h.coordinator.transcribe).toHaveBeenCalledWith("/downloads/job/audio.mp3", "whisper", {
      model: "small",
      signal: expect.any(AbortSignal),
    });
  });

  it("applies defaults for omitted and blank fields", async () => {
    const res = await h.app.inject({ method: "POST", url: "/transcribe", ...form({ url: VIDEO_URL, format: "" }) });
    const { job_id } = res.json<{ job_id: string }>();
    await h.orchestrator.wait(job_id);

    expect(h.downloader.extractAudio).toHaveBeenCalledWith(job_id, VIDEO_URL, "mp3", expect.any(AbortSignal));
    expect(h.coordinator.transcribe).toHaveBeenCalledWith("/downloads/job/audio.mp3", "whisper", {
      model: "base",
      signal: expect.any(AbortSignal),
    });
  });

  it("accepts JSON bodies", async () => {
    const res = await h.app.inject({
      method: "POST",
      url: "/transcribe",
      payload: { url: "https://youtu.be/abc123", method: "both" },
    });
    expect(res.statusCode).toBe(200);
  });

  it("rejects URLs that are not YouTube", async () => {
    const res = await h.app.inject({ method: "POST", url: "/transcribe", ...form({ url: "https://vimeo.com/1" }) });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "유효한 YouTube URL을 입력해주세요" });
  });

  it("rejects a missing URL", async () => {
    const res = await h.app.inject({ method: "POST", url: "/transcribe", payload: {} });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "유효한 YouTube URL을 입력해주세요" });
  });

  it("rejects unknown methods and models", async () => {
    const badMethod = await h.app.inject({
      method: "POST",
      url: "/transcribe",
      ...form({ url: VIDEO_URL, method: "azure" }),
    });
    const badModel = await h.app.inject({
      method: "POST",
      url: "/transcribe",
      ...form({ url: VIDEO_URL, model: "huge" }),
    });

    expect(badMethod.statusCode).toBe(400);
    expect(badModel.statusCode).toBe(400);
    expect(badModel.json()).toEqual({ error: "Unsupported Whisper model: huge" });
  });
});

describe("GET /status/:jobId", () => {
  it("returns 404 for unknown jobs", async () => {
    const res = await h.app.inject({ method: "GET", url: "/status/nope" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "작업을 찾을 수 없습니다" });
  });
});

describe("DELETE /jobs/:jobId", () => {
  it("returns 404 for unknown jobs", async () => {
    const res = await h.app.inject({ method: "DELETE", url: "/jobs/nope" });
    expect(res.statusCode).toBe(404);
  });

  it("reports that a finished job was not cancelled", async () => {
    const created = await h.app.inject({ method: "POST", url: "/transcribe", ...form({ url: VIDEO_URL }) });
    const { job_id } = created.json<{ job_id: string }>();
    await h.orchestrator.wait(job_id);

    const res = await h.app.inject({ method: "DELETE", url: `/jobs/${job_id}` });
    expect(res.json()).toEqual({ job_id, cancelled: false });
  });
});

describe("POST /summarize/:mode", () => {
  const text = "Short paragraph here.";

  it("serves each summary mode", async () => {
    const key = await h.app.inject({ method: "POST", url: "/summarize/key_summary", payload: { text } });
    const curator = await h.app.inject({ method: "POST", url: "/summarize/curator", payload: { text } });
    const timeline = await h.app.inject({ method: "POST", url: "/summarize/timeline_summary", payload: { text } });

    expect(key.json()).toEqual([{ paragraph_summary: "Short paragraph here." }]);
    expect(curator.json()).toEqual({
      title: "Short paragraph here",
      one_line_summary: "Short paragraph here.",
      key_points: ["Short paragraph here"],
    });
    expect(timeline.json()).toEqual([
      {
        timestamp: "1-3분",
        subtitle: "Short paragraph here",
        summary: "Short paragraph here.",
        keywords: [],
        oneline_summary: "Short paragraph here 라는 내용이에요.",
      },
    ]);
  });

  it("rejects unknown modes and missing text", async () => {
    const mode = await h.app.inject({ method: "POST", url: "/summarize/haiku", payload: { text } });
    const missing = await h.app.inject({ method: "POST", url: "/summarize/curator", payload: {} });

    expect(mode.statusCode).toBe(400);
    expect(mode.json()).toEqual({ error: "Unknown summary mode: haiku" });
    expect(missing.statusCode).toBe(400);
    expect(missing.json()).toEqual({ error: "text is required" });
  });

  it("answers 500 when the rule-based tier fails", async () => {
    const rules = new RuleBasedSummarizer(new Set());
    const broken = harness({
      keySummary: rules.keySummary.bind(rules),
      curate: () => {
        throw new Error("boom");
      },
      timeline: rules.timeline.bind(rules),
    });

    const res = await broken.app.inject({ method: "POST", url: "/summarize/curator", payload: { text } });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "요약 처리 중 오류가 발생했습니다: boom" });
    await broken.app.close();
  });
});

describe("GET /healthz", () => {
  it("reports ok", async () => {
    const res = await h.app.inject({ method: "GET", url: "/healthz" });
    expect(res.json()).toEqual({ ok: true });
  });
});
