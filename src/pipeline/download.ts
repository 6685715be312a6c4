import path from "node:path";
import fs from "node:fs";
import { z } from "zod";
import { AUDIO_EXTENSIONS } from "../constants.js";
import type { Logger } from "../logger.js";
import { runCommand } from "../utils/process.js";
import type { AudioFormat, VideoMetadata } from "../types.js";

export interface Downloader {
  fetchMetadata(url: string, signal?: AbortSignal): Promise<VideoMetadata | null>;
  extractAudio(jobId: string, url: string, format: AudioFormat, signal?: AbortSignal): Promise<string | null>;
  /** Removes everything the downloader wrote for `jobId`. */
  release(jobId: string): Promise<void>;
}

export interface YtdlpDownloaderOptions {
  downloadDir: string;
  ytdlpCmd: string;
  ffmpegCmd: string;
  logger: Logger;
}

const AUDIO_QUALITY = "192K";

const YtdlpInfoSchema = z.object({
  title: z.string().nullish(),
  duration: z.number().nullish(),
  uploader: z.string().nullish(),
  view_count: z.number().nullish(),
});

// Each job downloads into its own directory, so concurrent jobs never share a path.
export class YtdlpDownloader implements Downloader {
  constructor(private readonly opts: YtdlpDownloaderOptions) {}

  async fetchMetadata(url: string, signal?: AbortSignal): Promise<VideoMetadata | null> {
    try {
      const { stdout } = await runCommand(
        this.opts.ytdlpCmd,
        ["--dump-single-json", "--skip-download", "--no-playlist", "--quiet", url],
        { signal }
      );
      const info = YtdlpInfoSchema.parse(JSON.parse(stdout));
      return {
        title: info.title ?? "Unknown",
        duration: info.duration ?? 0,
        uploader: info.uploader ?? "Unknown",
        view_count: info.view_count ?? 0,
      };
    } catch (err) {
      if (signal?.aborted) throw err;
      this.opts.logger.warn({ err, url }, "Failed to fetch video metadata");
      return null;
    }
  }

  async extractAudio(jobId: string, url: string, format: AudioFormat, signal?: AbortSignal): Promise<string | null> {
    const outBaseDir = this.jobDir(jobId);
    fs.mkdirSync(outBaseDir, { recursive: true });
    const outPath = path.join(outBaseDir, `audio.%(ext)s`);

    try {
      await runCommand(
        this.opts.ytdlpCmd,
        [
          "--format", "bestaudio/best",
          "--extract-audio",
          "--audio-format", format,
          "--audio-quality", AUDIO_QUALITY,
          "--no-playlist",
          "--no-progress",
          "--ffmpeg-location", this.opts.ffmpegCmd,
          "--output", outPath,
          url,
        ],
        { signal }
      );
    } catch (err) {
      if (signal?.aborted) throw err;
      this.opts.logger.warn({ err, url, jobId }, "yt-dlp audio extraction failed");
    }

    // yt-dlp can exit non-zero after the post-processor already wrote the file
    return findAudioFile(outBaseDir, format);
  }

  async release(jobId: string): Promise<void> {
    await fs.promises.rm(this.jobDir(jobId), { recursive: true, force: true });
  }

  private jobDir(jobId: string) {
    return path.join(this.opts.downloadDir, `job_${jobId}`);
  }
}

export function findAudioFile(dir: string, preferredFormat: AudioFormat): string | null {
  if (!fs.existsSync(dir)) return null;
  const files = fs
    .readdirSync(dir)
    .filter((f) => f.startsWith("audio.") && AUDIO_EXTENSIONS.some((ext) => f.toLowerCase().endsWith(ext)))
    .sort();
  if (files.length === 0) return null;
  const preferred = files.find((f) => f === `audio.${preferredFormat}`);
  return path.join(dir, preferred ?? files[0]);
}

export async function convertToWav16kMono(
  ffmpegCmd: string,
  inputPath: string,
  outPath: string,
  signal?: AbortSignal
): Promise<string> {
  await runCommand(
    ffmpegCmd,
    ["-y", "-i", inputPath, "-ac", "1", "-ar", "16000", "-c:a", "pcm_s16le", outPath],
    { signal }
  );
  if (!fs.existsSync(outPath)) {
    throw new Error("ffmpeg did not produce the WAV file");
  }
  return outPath;
}
