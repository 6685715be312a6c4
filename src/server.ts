import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { convertToWav16kMono, YtdlpDownloader } from "./pipeline/download.js";
import { JobOrchestrator } from "./pipeline/orchestrator.js";
import { TranscriptionCoordinator } from "./pipeline/transcribe.js";
import { GoogleSpeechBackend } from "./pipeline/transcribe_google.js";
import { LocalWhisperBackend } from "./pipeline/transcribe_local.js";
import { MemoryJobStore, type JobStore } from "./store/jobStore.js";
import { RedisJobStore } from "./store/redisJobStore.js";
import { SummarizationFallbackChain } from "./summarize/chain.js";
import { LocalLlmSummaryStrategy } from "./summarize/local.js";
import { RuleBasedSummarizer } from "./summarize/ruleBased.js";
import { GroqSummaryStrategy } from "./summarize/remote.js";

const cfg = loadConfig();
const logger = createLogger(cfg.logLevel);
const component = (name: string) => logger.child({ component: name });

const store: JobStore = cfg.redisUrl
  ? RedisJobStore.fromUrl(cfg.redisUrl, cfg.jobTtlSeconds)
  : new MemoryJobStore({ capacity: cfg.jobCapacity, ttlMs: cfg.jobTtlSeconds * 1000 });

const coordinator = new TranscriptionCoordinator(
  {
    whisper: new LocalWhisperBackend({
      baseUrl: cfg.localAsrBaseUrl,
      timeoutMs: cfg.localTimeoutMs,
      logger: component("whisper"),
    }),
    google: new GoogleSpeechBackend({
      apiKey: cfg.googleSpeechApiKey,
      baseUrl: cfg.googleSpeechBaseUrl,
      toWav: (input, out, signal) => convertToWav16kMono(cfg.ffmpegCmd, input, out, signal),
      tmpDir: cfg.downloadDir,
      logger: component("google"),
    }),
  },
  component("coordinator")
);

const orchestrator = new JobOrchestrator({
  store,
  downloader: new YtdlpDownloader({
    downloadDir: cfg.downloadDir,
    ytdlpCmd: cfg.ytdlpCmd,
    ffmpegCmd: cfg.ffmpegCmd,
    logger: component("downloader"),
  }),
  coordinator,
  logger: component("orchestrator"),
});

const rules = new RuleBasedSummarizer();
const chain = new SummarizationFallbackChain(
  [
    new GroqSummaryStrategy({
      enabled: cfg.remoteSummaryEnabled,
      apiKey: cfg.groqApiKey,
      baseUrl: cfg.groqBaseUrl,
      model: cfg.groqSummaryModel,
      logger: component("summary-remote"),
    }),
    new LocalLlmSummaryStrategy(
      {
        enabled: cfg.localLlmEnabled,
        baseUrl: cfg.localLlmBaseUrl,
        model: cfg.localLlmModel,
        logger: component("summary-local"),
      },
      rules
    ),
  ],
  rules,
  component("summarizer")
);

const app = buildApp({ orchestrator, store, chain, logger });

const start = async () => {
  try {
    await app.listen({ port: cfg.port, host: cfg.host });
  } catch (err) {
    app.log.error({ err }, "Failed to start server");
    process.exit(1);
  }
};

let shuttingDown = false;
const shutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  app.log.info({ signal }, "Shutting down, waiting for running jobs");
  try {
    await app.close();
    await orchestrator.drain();
    process.exit(0);
  } catch (err) {
    app.log.error({ err }, "Shutdown failed");
    process.exit(1);
  }
};

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

void start();
