import type {
  AUDIO_FORMATS,
  BACKEND_NAMES,
  TRANSCRIPTION_METHODS,
} from "./constants.js";

export type AudioFormat = (typeof AUDIO_FORMATS)[number];
export type BackendName = (typeof BACKEND_NAMES)[number];
export type TranscriptionMethod = (typeof TRANSCRIPTION_METHODS)[number];

export interface TranscribeRequest {
  url: string;
  format: AudioFormat;
  method: TranscriptionMethod;
  model: string; // Whisper size hint, e.g. base
}

export interface VideoMetadata {
  title: string;
  duration: number; // seconds
  uploader: string;
  view_count: number;
}

export interface TranscriptSegment {
  id: number;
  start: number; // seconds
  end: number; // seconds
  text: string;
}

// What a recognition backend hands back
export interface BackendTranscript {
  text: string;
  language: string;
  segments: TranscriptSegment[];
}

export interface TranscriptionSuccess extends BackendTranscript {
  success: true;
  method: BackendName;
}

export interface TranscriptionFailure {
  text: "";
  error: string;
  success: false;
  method?: TranscriptionMethod;
}

export type SingleTranscriptionResult = TranscriptionSuccess | TranscriptionFailure;

// `success` only says the dispatch ran; per-backend outcomes live inside.
export type DualTranscriptionResult = {
  [K in BackendName]: SingleTranscriptionResult;
} & {
  success: true;
  method: "both";
};

export type TranscriptionResult = SingleTranscriptionResult | DualTranscriptionResult;

export type JobStage =
  | "SUBMITTED"
  | "FETCHING_INFO"
  | "EXTRACTING_AUDIO"
  | "TRANSCRIBING"
  | "COMPLETED"
  | "FAILED";

export interface Job {
  id: string;
  stage: JobStage;
  status: string;
  completed: boolean;
  success: boolean;
  result?: TranscriptionResult;
  error?: string;
  metadata?: VideoMetadata;
  created_at: string;
}

export type JobPatch = Partial<Omit<Job, "id" | "created_at">>;

export type SummaryMode = "key_summary" | "curator" | "timeline";

export interface ParagraphSummary {
  paragraph_summary: string;
}

export interface CuratorSummary {
  title: string;
  one_line_summary: string;
  key_points: string[];
}

export interface TimelineSection {
  timestamp: string;
  subtitle: string;
  summary: string;
  keywords: string[];
  oneline_summary: string;
}
