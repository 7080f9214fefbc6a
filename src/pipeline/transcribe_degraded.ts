import path from "node:path";
import type { ProviderTranscript } from "../types.js";
import type { FallbackProvider, TierInput } from "./transcribe.js";

export const PLACEHOLDER_PREFIX = "[Transcription unavailable]";

/**
 * Degraded tier. Describes the file instead of transcribing it, using only
 * what the pipeline already knows, so it can't fail.
 */
export class MetadataFallback implements FallbackProvider {
  readonly name = "metadata";

  describe(input: TierInput): ProviderTranscript {
    return {
      text: placeholderTranscript(input.filename),
      durationSeconds: input.estimatedDurationSeconds,
      language: input.language,
    };
  }
}

export function placeholderTranscript(filename: string): string {
  const title = path
    .parse(filename)
    .name.replace(/[_\-.]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  return `${PLACEHOLDER_PREFIX} ${title || "untitled media"}`;
}
