import { fetch } from "undici";
import { z } from "zod";
import { AppError } from "../errors.js";
import { GEMINI_BASE_URL } from "../constants.js";

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
      })
    )
    .default([]),
});

export interface CaptionGeneratorOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
}

const DEFAULT_INSTRUCTIONS =
  "Write a short, engaging social media caption for this video transcript. " +
  "End with three to six relevant hashtags.";

/** Caption writer backed by Gemini's generateContent REST endpoint. */
export class CaptionGenerator {
  constructor(private readonly opts: CaptionGeneratorOptions) {}

  get enabled(): boolean {
    return this.opts.apiKey.length > 0;
  }

  async generate(transcript: string, instructions?: string): Promise<string> {
    if (!this.enabled) {
      throw new AppError("CaptionFailed", "GEMINI_API_KEY not configured");
    }

    const prompt = `${instructions?.trim() || DEFAULT_INSTRUCTIONS}\n\nTranscript:\n${transcript}`;
    const baseUrl = this.opts.baseUrl ?? GEMINI_BASE_URL;
    const url = `${baseUrl}/models/${encodeURIComponent(this.opts.model)}:generateContent`;

    let body: unknown;
    try {
      const res = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": this.opts.apiKey,
        },
        body: JSON.stringify({ contents: [{ role: "user", parts: [{ text: prompt }] }] }),
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? 60000),
      });
      if (!res.ok) {
        const text = await res.text();
        throw new Error(`Gemini request failed: ${res.status} ${text}`);
      }
      body = await res.json();
    } catch (err) {
      throw new AppError("CaptionFailed", "AI generation failed", undefined, { cause: err });
    }

    const caption = extractCandidateText(body);
    if (!caption) {
      throw new AppError("CaptionFailed", "No response from AI model");
    }
    return caption;
  }
}

export function extractCandidateText(body: unknown): string {
  const parsed = GenerateContentSchema.safeParse(body);
  if (!parsed.success) return "";
  const first = parsed.data.candidates[0];
  return (first?.content?.parts ?? [])
    .map((part) => part.text ?? "")
    .join("")
    .trim();
}
