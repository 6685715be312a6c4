import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { getGlobalDispatcher, MockAgent, setGlobalDispatcher, type Dispatcher } from "undici";
import { CollaboratorUnavailable } from "../../src/errors.js";
import { silentLogger } from "../../src/logger.js";
import { GoogleSpeechBackend, SPEECH_UNRECOGNIZED } from "../../src/pipeline/transcribe_google.js";
import { LocalWhisperBackend, normalizeVerboseJson } from "../../src/pipeline/transcribe_local.js";

const ASR = "http://asr.test";
const SPEECH = "https://speech.test";

let agent: MockAgent;
let original: Dispatcher;
let dir: string;
let audioPath: string;

beforeEach(() => {
  original = getGlobalDispatcher();
  agent = new MockAgent();
  agent.disableNetConnect();
  setGlobalDispatcher(agent);

  dir = fs.mkdtempSync(path.join(os.tmpdir(), "tubescribe-backends-"));
  audioPath = path.join(dir, "audio.mp3");
  fs.writeFileSync(audioPath, Buffer.from("ID3-not-really-audio"));
});

afterEach(async () => {
  setGlobalDispatcher(original);
  await agent.close();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("LocalWhisperBackend", () => {
  const whisper = () =>
    new LocalWhisperBackend({ baseUrl: ASR, timeoutMs: 60000, logger: silentLogger() });

  it("uploads the file and normalizes the verbose transcript", async () => {
    const pool = agent.get(ASR);
    pool.intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });
    pool.intercept({ path: "/openai/v1/audio/transcriptions", method: "POST" }).reply(200, {
      text: " 안녕하세요 ",
      language: "ko",
      segments: [{ id: 0, start: 0, end: 1.5, text: " 안녕하세요 " }],
    });

    await expect(whisper().transcribe(audioPath, { model: "small" })).resolves.toEqual({
      text: "안녕하세요",
      language: "ko",
      segments: [{ id: 0, start: 0, end: 1.5, text: "안녕하세요" }],
    });
  });

  it("reports an unhealthy service as unavailable", async () => {
    agent.get(ASR).intercept({ path: "/healthz", method: "GET" }).reply(503, "starting");

    const attempt = whisper().transcribe(audioPath, { model: "base" });
    await expect(attempt).rejects.toBeInstanceOf(CollaboratorUnavailable);
    await expect(attempt).rejects.toThrow("Local ASR service is not available at http://asr.test");
  });

  it("reports an unreachable service as unavailable", async () => {
    await expect(whisper().transcribe(audioPath, { model: "base" })).rejects.toThrow(
      "Local ASR service is not available at http://asr.test"
    );
  });

  it("surfaces transcription errors with the service response", async () => {
    const pool = agent.get(ASR);
    pool.intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });
    pool.intercept({ path: "/openai/v1/audio/transcriptions", method: "POST" }).reply(500, "model crashed");

    await expect(whisper().transcribe(audioPath, { model: "base" })).rejects.toThrow(
      "Local ASR transcription failed: 500 model crashed"
    );
  });
});

describe("normalizeVerboseJson", () => {
  it("joins segment text and fills defaults when fields are missing", () => {
    expect(normalizeVerboseJson({ segments: [{ text: " one " }, { text: "two", start: 1, end: 2 }] }, "ko")).toEqual({
      text: "one two",
      language: "ko",
      segments: [
        { id: 0, start: 0, end: 0, text: "one" },
        { id: 1, start: 1, end: 2, text: "two" },
      ],
    });
  });
});

describe("GoogleSpeechBackend", () => {
  const recognize = (p: string) => p.startsWith("/v1/speech:recognize");
  const converted: string[] = [];

  const google = (apiKey?: string) =>
    new GoogleSpeechBackend({
      apiKey,
      baseUrl: `${SPEECH}/v1`,
      tmpDir: dir,
      logger: silentLogger(),
      toWav: async (_input, out) => {
        converted.push(out);
        await fs.promises.writeFile(out, Buffer.from("RIFF-fake"));
        return out;
      },
    });

  beforeEach(() => {
    converted.length = 0;
  });

  it("requires an API key", async () => {
    await expect(google().transcribe(audioPath, { model: "base" })).rejects.toThrow(
      "Google API 오류: GOOGLE_SPEECH_API_KEY not set"
    );
  });

  it("retries in English when Korean recognition is empty and removes the temp file", async () => {
    const pool = agent.get(SPEECH);
    pool.intercept({ path: recognize, method: "POST" }).reply(200, {});
    pool.intercept({ path: recognize, method: "POST" }).reply(200, {
      results: [
        { alternatives: [{ transcript: "hello there" }] },
        { alternatives: [{ transcript: " general " }] },
      ],
    });

    await expect(google("test-secret").transcribe(audioPath, { model: "base" })).resolves.toEqual({
      text: "hello there general",
      language: "en-US",
      segments: [
        { id: 0, start: 0, end: 0, text: "hello there" },
        { id: 1, start: 0, end: 0, text: "general" },
      ],
    });
    expect(converted).toHaveLength(1);
    expect(fs.existsSync(converted[0])).toBe(false);
  });

  it("fails when no language yields text", async () => {
    const pool = agent.get(SPEECH);
    pool.intercept({ path: recognize, method: "POST" }).reply(200, {}).times(2);

    await expect(google("test-secret").transcribe(audioPath, { model: "base" })).rejects.toThrow(SPEECH_UNRECOGNIZED);
  });

  it("surfaces HTTP errors", async () => {
    agent.get(SPEECH).intercept({ path: recognize, method: "POST" }).reply(403, "forbidden");

    await expect(google("test-secret").transcribe(audioPath, { model: "base" })).rejects.toThrow(
      "Google API 오류: 403 forbidden"
    );
    expect(fs.existsSync(converted[0])).toBe(false);
  });
});
