import "dotenv/config";
import path from "node:path";
import fs from "node:fs";

export interface ServiceConfig {
  port: number;
  host: string;
  logLevel: string;
  downloadDir: string;
  ffmpegCmd: string;
  ytdlpCmd: string;
  // Local ASR service (Whisper backend)
  localAsrBaseUrl: string; // e.g., http://localhost:5689
  localTimeoutMs: number;
  // Google Speech-to-Text backend
  googleSpeechApiKey?: string;
  googleSpeechBaseUrl: string;
  // Remote generative summarizer (Groq, OpenAI-compatible chat completions)
  remoteSummaryEnabled: boolean;
  groqApiKey?: string;
  groqBaseUrl: string;
  groqSummaryModel: string;
  // Local generative summarizer (Ollama-compatible)
  localLlmEnabled: boolean;
  localLlmBaseUrl: string;
  localLlmModel: string;
  // Job registry
  redisUrl?: string;
  jobTtlSeconds: number;
  jobCapacity: number;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function parsePositiveInt(value: string | undefined, fallback: number) {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseFlag(value: string | undefined) {
  return value === "true" || value === "1";
}

const rootDir = path.resolve(process.cwd());

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const downloadDir = env.DOWNLOAD_DIR || path.join(rootDir, "downloads");

  const localTimeoutMs = Math.max(
    60000,
    parsePositiveInt(env.LOCAL_TIMEOUT_MS, 7200000)
  ); // whole files go to the ASR service in one request

  ensureDir(downloadDir);

  return {
    port: parsePositiveInt(env.PORT, 8000),
    host: env.HOST || "0.0.0.0",
    logLevel: env.LOG_LEVEL || "info",
    downloadDir,
    ffmpegCmd: env.FFMPEG_CMD || "ffmpeg",
    ytdlpCmd: env.YTDLP_CMD || "yt-dlp",
    localAsrBaseUrl: env.LOCAL_ASR_BASE_URL || "http://localhost:5689",
    localTimeoutMs,
    googleSpeechApiKey: env.GOOGLE_SPEECH_API_KEY || undefined,
    googleSpeechBaseUrl:
      env.GOOGLE_SPEECH_BASE_URL || "https://speech.googleapis.com/v1",
    remoteSummaryEnabled: parseFlag(env.REMOTE_SUMMARY_ENABLED),
    groqApiKey: env.GROQ_API_KEY || undefined,
    groqBaseUrl: env.GROQ_BASE_URL || "https://api.groq.com/openai/v1",
    groqSummaryModel: env.GROQ_SUMMARY_MODEL || "llama-3.1-8b-instant",
    localLlmEnabled: parseFlag(env.LOCAL_LLM_ENABLED),
    localLlmBaseUrl: env.LOCAL_LLM_BASE_URL || "http://localhost:11434",
    localLlmModel: env.LOCAL_LLM_MODEL || "qwen2.5:3b",
    redisUrl: env.REDIS_URL || undefined,
    jobTtlSeconds: parsePositiveInt(env.JOB_TTL_SECONDS, 60 * 60 * 24),
    jobCapacity: parsePositiveInt(env.JOB_CAPACITY, 1000),
  };
}
