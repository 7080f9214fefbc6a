import fs from "node:fs/promises";
import { ProviderUnavailableError } from "../errors.js";
import type { CloudQuota } from "../limits/rateLimiter.js";
import type { ProviderTranscript } from "../types.js";
import type { TierInput, TranscriptionProvider } from "./transcribe.js";
import {
  ProviderRequestError,
  normalizeVerboseJson,
  requestVerboseTranscription,
  type VerboseJson,
} from "./openai_audio.js";

// Groq rejects request bodies above 25MB
const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

export interface GroqOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  quota?: CloudQuota;
  retryDelaysMs?: number[];
  timeoutMs?: number;
}

/** Secondary tier: Groq-hosted Whisper behind an OpenAI-compatible API. */
export class GroqProvider implements TranscriptionProvider {
  readonly name = "groq";
  readonly tier = "secondary";
  private readonly retryDelaysMs: number[];

  constructor(private readonly opts: GroqOptions) {
    this.retryDelaysMs = opts.retryDelaysMs ?? [1000, 3000];
  }

  async attempt(input: TierInput): Promise<ProviderTranscript> {
    if (!this.opts.apiKey) {
      throw new ProviderUnavailableError(this.name, "GROQ_API_KEY not set");
    }

    const audioPath = await input.audio();
    const { size } = await fs.stat(audioPath);
    if (size > MAX_UPLOAD_BYTES) {
      throw new ProviderUnavailableError(
        this.name,
        `Audio is ${size} bytes, above the ${MAX_UPLOAD_BYTES} byte upload limit`
      );
    }

    await this.opts.quota?.reserve(input.estimatedDurationSeconds);

    const raw = await this.transcribeWithRetries(audioPath, input.language);
    return normalizeVerboseJson(raw, this.opts.model);
  }

  private async transcribeWithRetries(
    filePath: string,
    language: string | undefined
  ): Promise<VerboseJson> {
    let attempt = 0;
    while (true) {
      try {
        return await requestVerboseTranscription({
          provider: this.name,
          url: `${this.opts.baseUrl}/audio/transcriptions`,
          filePath,
          model: this.opts.model,
          language,
          headers: { Authorization: `Bearer ${this.opts.apiKey}` },
          timeoutMs: this.opts.timeoutMs,
        });
      } catch (err) {
        const backoffMs = this.retryDelaysMs[attempt];
        if (err instanceof ProviderRequestError && err.retryable && backoffMs !== undefined) {
          attempt++;
          await new Promise((r) => setTimeout(r, backoffMs));
          continue;
        }
        throw err;
      }
    }
  }
}
