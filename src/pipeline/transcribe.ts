import path from "node:path";
import fs from "node:fs/promises";
import type { Logger } from "../logger.js";
import { ProviderUnavailableError, errorMessage } from "../errors.js";
import { withScopedTempDir } from "../utils/tempDir.js";
import { runCommand, type CommandRunner } from "../utils/process.js";
import type {
  MediaKind,
  ProviderTranscript,
  Tier,
  TranscriptionRequest,
  TranscriptionResult,
} from "../types.js";
import {
  countWords,
  estimateDurationSeconds,
  extractAudioTrack,
  validateMedia,
  type MediaInfo,
} from "./media.js";

/** Everything a provider may look at for one request. */
export interface TierInput {
  filename: string;
  kind: MediaKind;
  sizeBytes: number;
  language?: string;
  workDir: string;
  sourcePath: string;
  estimatedDurationSeconds: number;
  /** Path to an audio file providers can send; extracted on first call. */
  audio(): Promise<string>;
}

export interface TranscriptionProvider {
  readonly name: string;
  readonly tier: Exclude<Tier, "degraded">;
  attempt(input: TierInput): Promise<ProviderTranscript>;
}

/** Last resort. Must not throw. */
export interface FallbackProvider {
  readonly name: string;
  describe(input: TierInput): ProviderTranscript;
}

export interface PipelineOptions {
  providers: TranscriptionProvider[];
  fallback: FallbackProvider;
  workDir: string;
  maxUploadBytes: number;
  ffmpegCmd: string;
  log: Logger;
  run?: CommandRunner;
}

export class TranscriptionPipeline {
  private readonly log: Logger;
  private readonly run: CommandRunner;

  constructor(private readonly opts: PipelineOptions) {
    this.log = opts.log.child({ component: "transcription" });
    this.run = opts.run ?? runCommand;
  }

  get providerNames(): string[] {
    return [...this.opts.providers.map((p) => p.name), this.opts.fallback.name];
  }

  validate(filename: string, sizeBytes: number): MediaInfo {
    return validateMedia(filename, sizeBytes, this.opts.maxUploadBytes);
  }

  async transcribe(req: TranscriptionRequest): Promise<TranscriptionResult> {
    const media = this.validate(req.filename, req.sizeBytes);

    return withScopedTempDir(
      this.opts.workDir,
      "transcribe-",
      async (dir) => {
        const sourcePath = path.join(dir, `input.${media.ext}`);
        await fs.copyFile(req.sourcePath, sourcePath);
        const input = await this.buildInput(req, media, dir, sourcePath);

        for (const provider of this.opts.providers) {
          try {
            const out = await provider.attempt(input);
            if (!out.text.trim()) {
              throw new ProviderUnavailableError(provider.name, "Empty transcript");
            }
            this.log.info(
              { provider: provider.name, tier: provider.tier, file: req.filename },
              "Transcription succeeded"
            );
            return buildResult(out, provider.tier, provider.name, input);
          } catch (err) {
            this.log.warn(
              { provider: provider.name, tier: provider.tier, err: errorMessage(err) },
              "Provider failed, trying next tier"
            );
          }
        }

        this.log.warn({ file: req.filename }, "All providers failed, returning degraded result");
        const degraded = this.opts.fallback.describe(input);
        return buildResult(degraded, "degraded", this.opts.fallback.name, input);
      },
      this.log
    );
  }

  private async buildInput(
    req: TranscriptionRequest,
    media: MediaInfo,
    workDir: string,
    sourcePath: string
  ): Promise<TierInput> {
    const estimatedDurationSeconds = await estimateDurationSeconds(
      sourcePath,
      media,
      req.sizeBytes
    );

    let audioPath: Promise<string> | undefined;
    const audio = () => {
      if (media.kind === "audio") return Promise.resolve(sourcePath);
      audioPath ??= extractAudioTrack(this.opts.ffmpegCmd, sourcePath, workDir, this.run).catch(
        (err: unknown) => {
          throw new ProviderUnavailableError("ffmpeg", "Could not extract audio track", {
            cause: err,
          });
        }
      );
      return audioPath;
    };

    return {
      filename: req.filename,
      kind: media.kind,
      sizeBytes: req.sizeBytes,
      language: req.language,
      workDir,
      sourcePath,
      estimatedDurationSeconds,
      audio,
    };
  }
}

function buildResult(
  out: ProviderTranscript,
  tier: Tier,
  provider: string,
  input: TierInput
): TranscriptionResult {
  const transcript = out.text.trim();
  const duration = out.durationSeconds ?? input.estimatedDurationSeconds;
  const result: TranscriptionResult = {
    transcript,
    wordCount: countWords(transcript),
    durationSeconds: Number.isFinite(duration) ? Math.max(0, duration) : 0,
    language: out.language || input.language || "unknown",
    tier,
    provider,
    ...(out.model ? { model: out.model } : {}),
  };
  return Object.freeze(result);
}
