import "dotenv/config";
import { Redis } from "ioredis";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { YOUTUBE_UPLOAD_SCOPE } from "./constants.js";
import { buildApp } from "./app.js";
import { CloudQuota } from "./limits/rateLimiter.js";
import { TranscriptionPipeline } from "./pipeline/transcribe.js";
import { LocalAsrProvider } from "./pipeline/transcribe_local.js";
import { GroqProvider } from "./pipeline/transcribe_groq.js";
import { MetadataFallback } from "./pipeline/transcribe_degraded.js";
import { ClipService } from "./pipeline/trim.js";
import { CaptionGenerator } from "./pipeline/caption.js";
import { LoopbackAuthorizer } from "./publish/oauth.js";
import { YouTubePlatform } from "./publish/youtube.js";
import { UploadWorkflow } from "./publish/workflow.js";
import { FileUploadRecordStore, type UploadRecordStore } from "./store/uploadRecords.js";
import { RedisUploadRecordStore } from "./store/redisUploadRecords.js";

const cfg = loadConfig();
const log = createLogger(cfg.logLevel);

// Long-lived service handles, built once and shared by every request
const redis = cfg.recordStore === "redis" ? new Redis(cfg.redisUrl) : null;
const records: UploadRecordStore = redis
  ? new RedisUploadRecordStore(redis)
  : new FileUploadRecordStore(cfg.uploadRecordsFile);

const transcription = new TranscriptionPipeline({
  providers: [
    new LocalAsrProvider({
      baseUrl: cfg.localAsrBaseUrl,
      model: cfg.localAsrModel,
      timeoutMs: cfg.localTimeoutMs,
    }),
    new GroqProvider({
      apiKey: cfg.groqApiKey,
      baseUrl: cfg.groqBaseUrl,
      model: cfg.groqWhisperModel,
      quota: new CloudQuota(cfg.groqLimitsFile),
    }),
  ],
  fallback: new MetadataFallback(),
  workDir: cfg.workDir,
  maxUploadBytes: cfg.maxUploadBytes,
  ffmpegCmd: cfg.ffmpegCmd,
  log,
});

const platform = new YouTubePlatform({
  authorizer: new LoopbackAuthorizer({
    clientSecretsPath: cfg.youtubeClientSecrets,
    scopes: [YOUTUBE_UPLOAD_SCOPE],
    port: cfg.oauthRedirectPort,
    timeoutMs: cfg.oauthTimeoutMs,
    log,
  }),
  log,
});

const app = await buildApp({
  log,
  apiKey: cfg.apiKey,
  mediaDir: cfg.mediaDir,
  workDir: cfg.workDir,
  maxUploadBytes: cfg.maxUploadBytes,
  maxTags: cfg.maxTags,
  platformName: platform.name,
  transcription,
  clips: new ClipService({ mediaDir: cfg.mediaDir, ffmpegCmd: cfg.ffmpegCmd, log }),
  captions: new CaptionGenerator({ apiKey: cfg.geminiApiKey, model: cfg.geminiModel }),
  uploads: new UploadWorkflow({
    platform,
    store: records,
    mediaDir: cfg.mediaDir,
    defaultPrivacy: cfg.defaultPrivacy,
    maxTags: cfg.maxTags,
    log,
  }),
  records,
});

const shutdown = async () => {
  await app.close();
  await redis?.quit();
  process.exit(0);
};

const start = async () => {
  try {
    await app.listen({ port: cfg.port, host: cfg.host });
    app.log.info(
      {
        providers: transcription.providerNames,
        recordStore: cfg.recordStore,
        mediaDir: cfg.mediaDir,
      },
      `listening on :${cfg.port}`
    );
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

const onSignal = () => {
  shutdown().catch((err: unknown) => {
    log.error({ err }, "Shutdown failed");
    process.exit(1);
  });
};

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

await start();
