/**
 * Centralized names, defaults and user-facing messages.
 * Messages are Korean: the service transcribes Korean-first and the
 * status strings are shown to end users as-is.
 */

// Default Whisper size hint sent to the local ASR service
export const DEFAULT_WHISPER_MODEL = "base";

// Valid Whisper size hints
export const VALID_WHISPER_MODELS = [
  // Multilingual models
  "tiny",
  "base",
  "small",
  "medium",
  "large",
  "large-v2",
  "large-v3",
  "turbo",

  // English-only models
  "tiny.en",
  "base.en",
  "small.en",
  "medium.en",
] as const;

export type WhisperModel = (typeof VALID_WHISPER_MODELS)[number];

export function isValidModel(model: string): model is WhisperModel {
  return VALID_WHISPER_MODELS.some((m) => m === model);
}

export const BACKEND_NAMES = ["whisper", "google"] as const;
export const TRANSCRIPTION_METHODS = ["whisper", "google", "both"] as const;
export const AUDIO_FORMATS = ["mp3", "wav"] as const;

// Hosts a submitted URL must mention
export const ALLOWED_URL_HOSTS = ["youtube.com", "youtu.be"] as const;

// Extensions listed when a media file is missing
export const AUDIO_EXTENSIONS = [".mp3", ".wav", ".m4a", ".ogg"] as const;

export const STATUS_TEXT = {
  SUBMITTED: "작업 대기 중...",
  FETCHING_INFO: "비디오 정보 확인 중...",
  EXTRACTING_AUDIO: (format: string) => `오디오 추출 중... (${format})`,
  TRANSCRIBING: (method: string) => `음성 인식 중... (${method})`,
  COMPLETED: "변환 완료!",
  FAILED: "변환 실패",
} as const;

export const JOB_ERRORS = {
  METADATA_UNAVAILABLE: "비디오 정보를 가져올 수 없습니다",
  EXTRACTION_FAILED: "오디오 추출에 실패했습니다",
  CANCELLED: "작업이 취소되었습니다",
  UNKNOWN: "알 수 없는 오류",
  INVALID_URL: "유효한 YouTube URL을 입력해주세요",
  NOT_FOUND: "작업을 찾을 수 없습니다",
} as const;

// Below this many characters the summarizers only emit placeholders
export const MIN_SUMMARY_INPUT = 20;
export const MAX_TIMELINE_SECTIONS = 8;

export const SUMMARY_PLACEHOLDERS = {
  PARAGRAPH: "요약할 내용이 충분하지 않습니다.",
  TITLE: "제목을 생성할 수 없습니다",
  KEY_POINT: "핵심 내용을 추출할 수 없습니다.",
} as const;
