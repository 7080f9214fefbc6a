import "dotenv/config";
import path from "node:path";
import fs from "node:fs";
import os from "node:os";
import {
  DEFAULT_GEMINI_MODEL,
  DEFAULT_GROQ_MODEL,
  DEFAULT_WHISPER_MODEL,
  PRIVACY_STATUSES,
  type PrivacyStatus,
} from "./constants.js";

export type RecordStoreBackend = "file" | "redis";

export interface ServiceConfig {
  port: number;
  host: string;
  apiKey: string;
  logLevel: string;
  mediaDir: string; // uploaded + trimmed media, selectable for publishing
  workDir: string; // parent of per-request scoped temp dirs
  maxUploadBytes: number;
  ffmpegCmd: string;
  // Local ASR service configuration
  localAsrBaseUrl: string; // e.g., http://localhost:5689
  localAsrModel: string; // default model for local service
  localTimeoutMs: number; // timeout for local transcription requests
  // Cloud speech-to-text
  groqApiKey: string;
  groqBaseUrl: string;
  groqWhisperModel: string;
  groqLimitsFile: string;
  // Caption generation
  geminiApiKey: string;
  geminiModel: string;
  // Publishing
  youtubeClientSecrets: string;
  oauthRedirectPort: number;
  oauthTimeoutMs: number;
  defaultPrivacy: PrivacyStatus;
  maxTags: number;
  recordStore: RecordStoreBackend;
  uploadRecordsFile: string;
  redisUrl: string;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function intFromEnv(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function privacyFromEnv(name: string, fallback: PrivacyStatus): PrivacyStatus {
  const raw = process.env[name]?.trim().toLowerCase();
  return PRIVACY_STATUSES.find((p) => p === raw) ?? fallback;
}

export const rootDir = path.resolve(process.cwd());

export function loadConfig(): ServiceConfig {
  const mediaDir = process.env.MEDIA_DIR || path.join(rootDir, "media");
  const workDir = process.env.WORK_DIR || path.join(os.tmpdir(), "clipline");
  const uploadRecordsFile =
    process.env.UPLOAD_RECORDS_FILE ||
    path.join(rootDir, "data", "upload_records.json");

  const recordStore: RecordStoreBackend =
    process.env.RECORD_STORE === "redis" ? "redis" : "file";

  const localTimeoutMs = Math.max(
    60000,
    intFromEnv("LOCAL_TIMEOUT_MS", 7200000)
  ); // Default 2 hours for full file processing

  ensureDir(mediaDir);
  ensureDir(workDir);
  if (recordStore === "file") ensureDir(path.dirname(uploadRecordsFile));

  return {
    port: intFromEnv("PORT", 5688),
    host: process.env.HOST || "0.0.0.0",
    apiKey: process.env.API_KEY || "",
    logLevel: process.env.LOG_LEVEL || "info",
    mediaDir,
    workDir,
    maxUploadBytes: intFromEnv("MAX_UPLOAD_BYTES", 16 * 1024 * 1024, 1),
    ffmpegCmd: process.env.FFMPEG_CMD || "ffmpeg",
    localAsrBaseUrl: process.env.LOCAL_ASR_BASE_URL || "http://localhost:5689",
    localAsrModel: process.env.LOCAL_ASR_MODEL || DEFAULT_WHISPER_MODEL,
    localTimeoutMs,
    groqApiKey: process.env.GROQ_API_KEY || "",
    groqBaseUrl: process.env.GROQ_BASE_URL || "https://api.groq.com/openai/v1",
    groqWhisperModel: process.env.GROQ_WHISPER_MODEL || DEFAULT_GROQ_MODEL,
    groqLimitsFile:
      process.env.GROQ_LIMITS_FILE || path.join(os.tmpdir(), "groq-limits.json"),
    geminiApiKey: process.env.GEMINI_API_KEY || "",
    geminiModel: process.env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL,
    youtubeClientSecrets:
      process.env.YOUTUBE_CLIENT_SECRETS ||
      path.join(rootDir, "client_secrets.json"),
    oauthRedirectPort: intFromEnv("OAUTH_REDIRECT_PORT", 0),
    oauthTimeoutMs: intFromEnv("OAUTH_TIMEOUT_MS", 5 * 60 * 1000, 1),
    defaultPrivacy: privacyFromEnv("DEFAULT_PRIVACY", "public"),
    maxTags: intFromEnv("MAX_TAGS", 15, 1),
    recordStore,
    uploadRecordsFile,
    redisUrl: process.env.REDIS_URL || "redis://localhost:6379",
  };
}
