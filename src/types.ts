import type { PrivacyStatus } from "./constants.js";

export type MediaKind = "audio" | "video";

export type Tier = "primary" | "secondary" | "degraded";

export interface TranscriptionRequest {
  sourcePath: string;
  filename: string; // declared name, carries the extension
  sizeBytes: number;
  language?: string; // hint, e.g. en
}

export interface TranscriptionResult {
  transcript: string;
  wordCount: number;
  durationSeconds: number;
  language: string;
  tier: Tier;
  provider: string;
  model?: string;
}

/** What a single provider hands back before the pipeline tags it. */
export interface ProviderTranscript {
  text: string;
  language?: string;
  durationSeconds?: number;
  model?: string;
}

export interface UploadMetadata {
  title?: string;
  description?: string;
  caption?: string;
  tags?: string[];
  privacy?: PrivacyStatus;
}

export interface ResolvedUploadMetadata {
  title: string;
  description: string;
  tags: string[];
  privacy: PrivacyStatus;
}

export interface UploadRecord {
  filename: string;
  platform: string;
  remoteId: string;
  uploadedAt: string;
  privacy: PrivacyStatus;
  tags: string[];
  title: string;
  description: string;
}

export type WorkflowState =
  | "Idle"
  | "Authorizing"
  | "Authorized"
  | "Uploading"
  | "Recorded"
  | "Aborted";

export interface ClipDescriptor {
  clipFilename: string;
  durationSeconds: number;
  start: number;
  end: number;
  createdAt: string;
}
