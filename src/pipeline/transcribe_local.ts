import { fetch } from "undici";
import { ProviderUnavailableError } from "../errors.js";
import type { ProviderTranscript } from "../types.js";
import type { TierInput, TranscriptionProvider } from "./transcribe.js";
import { normalizeVerboseJson, requestVerboseTranscription } from "./openai_audio.js";

export interface LocalAsrOptions {
  baseUrl: string; // e.g. http://localhost:5689
  model: string;
  timeoutMs: number;
  healthTimeoutMs?: number;
}

/**
 * Primary tier: the locally hosted Whisper service. One instance is created at
 * startup and shared by every request.
 */
export class LocalAsrProvider implements TranscriptionProvider {
  readonly name = "local-asr";
  readonly tier = "primary";

  constructor(private readonly opts: LocalAsrOptions) {}

  async attempt(input: TierInput): Promise<ProviderTranscript> {
    await this.ensureAvailable();

    const raw = await requestVerboseTranscription({
      provider: this.name,
      url: `${this.opts.baseUrl}/openai/v1/audio/transcriptions`,
      filePath: await input.audio(),
      model: this.opts.model,
      language: input.language,
      task: "transcribe",
      timeoutMs: this.opts.timeoutMs,
    });

    return normalizeVerboseJson(raw, this.opts.model);
  }

  private async ensureAvailable(): Promise<void> {
    try {
      const healthCheck = await fetch(`${this.opts.baseUrl}/healthz`, {
        signal: AbortSignal.timeout(this.opts.healthTimeoutMs ?? 5000),
      });
      await healthCheck.body?.cancel();
      if (!healthCheck.ok) {
        throw new Error(`health check returned ${healthCheck.status}`);
      }
    } catch (error) {
      throw new ProviderUnavailableError(
        this.name,
        `Local ASR service is not available at ${this.opts.baseUrl}`,
        { cause: error }
      );
    }
  }
}
