/**
 * Centralized model, format and platform constants.
 */

// Default model requested from the local ASR service
export const DEFAULT_WHISPER_MODEL = "distil-large-v3";

export const DEFAULT_GROQ_MODEL = "whisper-large-v3-turbo";

export const DEFAULT_GEMINI_MODEL = "gemini-1.5-flash";

export const AUDIO_EXTENSIONS = [
  "mp3",
  "wav",
  "m4a",
  "flac",
  "aac",
  "ogg",
] as const;

export const VIDEO_EXTENSIONS = ["mp4", "mov", "avi", "mkv", "webm"] as const;

export type AudioExtension = (typeof AUDIO_EXTENSIONS)[number];
export type VideoExtension = (typeof VIDEO_EXTENSIONS)[number];
export type MediaExtension = AudioExtension | VideoExtension;

export function isAudioExtension(ext: string): ext is AudioExtension {
  return AUDIO_EXTENSIONS.some((e) => e === ext);
}

export function isVideoExtension(ext: string): ext is VideoExtension {
  return VIDEO_EXTENSIONS.some((e) => e === ext);
}

// Rough bitrates used to estimate duration when the container can't be read
export const ASSUMED_BITRATE_BPS = {
  audio: 128_000,
  video: 2_000_000,
} as const;

export const PRIVACY_STATUSES = ["public", "unlisted", "private"] as const;
export type PrivacyStatus = (typeof PRIVACY_STATUSES)[number];

export const YOUTUBE_UPLOAD_SCOPE =
  "https://www.googleapis.com/auth/youtube.upload";

// People & Blogs
export const YOUTUBE_DEFAULT_CATEGORY_ID = "22";

export const GOOGLE_AUTH_URL = "https://accounts.google.com/o/oauth2/v2/auth";
export const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
export const YOUTUBE_UPLOAD_URL =
  "https://www.googleapis.com/upload/youtube/v3/videos";
export const GEMINI_BASE_URL =
  "https://generativelanguage.googleapis.com/v1beta";
