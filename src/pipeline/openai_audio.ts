import fs from "node:fs/promises";
import path from "node:path";
import { fetch, FormData, File } from "undici";
import { z } from "zod";
import type { ProviderTranscript } from "../types.js";

/**
 * Shared client for OpenAI-compatible `audio/transcriptions` endpoints. Both
 * the local ASR service and Groq speak this dialect.
 */

export class ProviderRequestError extends Error {
  constructor(
    public readonly provider: string,
    public readonly status: number,
    body: string
  ) {
    super(`${provider} transcription failed: ${status} ${body}`);
    this.name = "ProviderRequestError";
  }

  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

const VerboseJsonSchema = z.object({
  text: z.string().default(""),
  language: z.string().optional(),
  duration: z.number().nonnegative().optional(),
  segments: z
    .array(
      z.object({
        start: z.number().optional(),
        end: z.number().optional(),
        text: z.string().optional(),
      })
    )
    .optional(),
});

export type VerboseJson = z.infer<typeof VerboseJsonSchema>;

export interface VerboseTranscriptionRequest {
  provider: string;
  url: string;
  filePath: string;
  model: string;
  language?: string;
  task?: "transcribe" | "translate";
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export async function requestVerboseTranscription(
  req: VerboseTranscriptionRequest
): Promise<VerboseJson> {
  const form = new FormData();
  const audioBuffer = await fs.readFile(req.filePath);
  const fileName = path.basename(req.filePath);
  const file = new File([audioBuffer], fileName, {
    type: getAudioMimeType(fileName),
  });

  form.append("file", file);
  form.append("model", req.model);
  if (req.task) form.append("task", req.task);
  if (req.language) form.append("language", req.language);
  form.append("response_format", "verbose_json");

  const response = await fetch(req.url, {
    method: "POST",
    headers: req.headers,
    body: form,
    signal: req.timeoutMs ? AbortSignal.timeout(req.timeoutMs) : undefined,
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new ProviderRequestError(req.provider, response.status, errorText);
  }

  const parsed = VerboseJsonSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new Error(
      `${req.provider} returned an unexpected payload: ${parsed.error.message}`
    );
  }
  return parsed.data;
}

export function normalizeVerboseJson(
  raw: VerboseJson,
  model: string
): ProviderTranscript {
  const segments = raw.segments ?? [];
  const text = raw.text.trim() || segments.map((s) => (s.text ?? "").trim()).join(" ").trim();
  const lastEnd = segments.length ? segments[segments.length - 1].end : undefined;
  return {
    text,
    language: raw.language,
    durationSeconds: raw.duration ?? lastEnd,
    model,
  };
}

export function getAudioMimeType(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  const mimeTypes: Record<string, string> = {
    ".mp3": "audio/mpeg",
    ".wav": "audio/wav",
    ".m4a": "audio/mp4",
    ".aac": "audio/aac",
    ".ogg": "audio/ogg",
    ".flac": "audio/flac",
  };
  return mimeTypes[ext] || "audio/wav";
}
