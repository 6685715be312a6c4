import path from "node:path";
import fs from "node:fs";
import { AUDIO_EXTENSIONS, BACKEND_NAMES } from "../constants.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type {
  BackendName,
  BackendTranscript,
  DualTranscriptionResult,
  SingleTranscriptionResult,
  TranscriptionFailure,
  TranscriptionMethod,
  TranscriptionResult,
} from "../types.js";

export interface TranscribeOptions {
  model: string;
  signal?: AbortSignal;
}

export interface TranscriptionBackend {
  transcribe(audioPath: string, options: TranscribeOptions): Promise<BackendTranscript>;
}

export type BackendRegistry = Record<BackendName, TranscriptionBackend>;

const SIBLINGS_SHOWN = 5;

/**
 * Runs the requested recognition backends over one audio file.
 * Backend faults never escape: each becomes a `success: false` entry, and in
 * `both` mode one backend failing has no effect on the other.
 */
export class TranscriptionCoordinator {
  constructor(
    private readonly backends: BackendRegistry,
    private readonly logger: Logger
  ) {}

  async transcribe(
    audioPath: string,
    method: TranscriptionMethod,
    options: TranscribeOptions
  ): Promise<TranscriptionResult> {
    const problem = await checkAudioFile(audioPath);
    if (problem) {
      this.logger.warn({ audioPath, method }, problem);
      return failure(problem, method);
    }

    if (method !== "both") {
      return this.runBackend(method, audioPath, options);
    }

    // Independent calls: neither waits on nor observes the other's outcome
    const [whisper, google] = await Promise.all(
      BACKEND_NAMES.map((name) => this.runBackend(name, audioPath, options))
    );
    const dual: DualTranscriptionResult = {
      whisper,
      google,
      success: true,
      method: "both",
    };
    return dual;
  }

  private async runBackend(
    name: BackendName,
    audioPath: string,
    options: TranscribeOptions
  ): Promise<SingleTranscriptionResult> {
    const started = Date.now();
    try {
      const transcript = await this.backends[name].transcribe(audioPath, options);
      this.logger.info(
        { backend: name, durationMs: Date.now() - started, chars: transcript.text.length },
        "Backend transcription finished"
      );
      return { ...transcript, success: true, method: name };
    } catch (err) {
      this.logger.warn({ backend: name, err }, "Backend transcription failed");
      return failure(errorMessage(err), name);
    }
  }
}

function failure(error: string, method: TranscriptionMethod): TranscriptionFailure {
  return { text: "", error, success: false, method };
}

/** Returns a human-readable problem with `audioPath`, or null when it is usable. */
export async function checkAudioFile(audioPath: string): Promise<string | null> {
  if (!audioPath) {
    return "오디오 파일 경로가 제공되지 않았습니다.";
  }

  if (!fs.existsSync(audioPath)) {
    const directory = path.dirname(audioPath);
    if (!fs.existsSync(directory)) {
      return `파일을 찾을 수 없습니다: ${audioPath}\n디렉토리도 존재하지 않습니다: ${directory}`;
    }
    const files = listAudioFiles(directory);
    const shown = files.slice(0, SIBLINGS_SHOWN).join(", ");
    const more = files.length > SIBLINGS_SHOWN ? ` (그 외 ${files.length - SIBLINGS_SHOWN}개 더)` : "";
    return `파일을 찾을 수 없습니다: ${audioPath}\n디렉토리 ${directory}의 오디오 파일들: ${shown}${more}`;
  }

  try {
    const stat = await fs.promises.stat(audioPath);
    if (stat.size === 0) {
      return `오디오 파일이 비어있습니다: ${audioPath}`;
    }
  } catch (err) {
    return `파일 접근 오류: ${audioPath} - ${errorMessage(err)}`;
  }
  return null;
}

function listAudioFiles(directory: string): string[] {
  return fs
    .readdirSync(directory)
    .filter((f) => AUDIO_EXTENSIONS.some((ext) => f.toLowerCase().endsWith(ext)))
    .sort();
}
