import path from "node:path";
import fs from "node:fs/promises";
import { runCommand, type CommandRunner } from "../utils/process.js";
import { AppError } from "../errors.js";
import {
  ASSUMED_BITRATE_BPS,
  isAudioExtension,
  isVideoExtension,
  type MediaExtension,
} from "../constants.js";
import type { MediaKind } from "../types.js";

export interface MediaInfo {
  ext: MediaExtension;
  kind: MediaKind;
}

export function classifyMedia(filename: string): MediaInfo | null {
  const ext = path.extname(filename).slice(1).toLowerCase();
  if (isAudioExtension(ext)) return { ext, kind: "audio" };
  if (isVideoExtension(ext)) return { ext, kind: "video" };
  return null;
}

/**
 * Format is checked before size so that an unsupported upload is never
 * reported as too large.
 */
export function validateMedia(
  filename: string,
  sizeBytes: number,
  maxBytes: number
): MediaInfo {
  const media = classifyMedia(filename);
  if (!media) {
    throw new AppError(
      "UnsupportedFormat",
      `File type not supported: ${path.extname(filename) || filename}`
    );
  }
  if (sizeBytes > maxBytes) {
    throw new AppError(
      "TooLarge",
      `File is ${sizeBytes} bytes, limit is ${maxBytes} bytes`
    );
  }
  return media;
}

/** Pulls the audio track out of a container as 16kHz mono PCM WAV. */
export async function extractAudioTrack(
  ffmpegCmd: string,
  inputPath: string,
  outDir: string,
  run: CommandRunner = runCommand
): Promise<string> {
  const outPath = path.join(outDir, `${path.parse(inputPath).name}.wav`);
  await run(ffmpegCmd, [
    "-y",
    "-i", inputPath,
    "-vn",
    "-acodec", "pcm_s16le",
    "-ar", "16000",
    "-ac", "1",
    outPath,
  ]);
  return outPath;
}

const WAV_HEADER_PROBE_BYTES = 4096;

/**
 * Reads duration from a RIFF/WAVE header. Returns undefined for anything that
 * isn't a readable PCM WAV.
 */
export async function readWavDurationSeconds(
  filePath: string
): Promise<number | undefined> {
  const handle = await fs.open(filePath, "r");
  try {
    const { size } = await handle.stat();
    const header = Buffer.alloc(Math.min(WAV_HEADER_PROBE_BYTES, size));
    await handle.read(header, 0, header.length, 0);
    return parseWavDuration(header, size);
  } finally {
    await handle.close();
  }
}

export function parseWavDuration(
  header: Buffer,
  fileSize: number
): number | undefined {
  if (header.length < 12) return undefined;
  if (header.toString("ascii", 0, 4) !== "RIFF") return undefined;
  if (header.toString("ascii", 8, 12) !== "WAVE") return undefined;

  let byteRate: number | undefined;
  let offset = 12;
  while (offset + 8 <= header.length) {
    const chunkId = header.toString("ascii", offset, offset + 4);
    const chunkSize = header.readUInt32LE(offset + 4);
    const dataStart = offset + 8;

    if (chunkId === "fmt " && dataStart + 12 <= header.length) {
      byteRate = header.readUInt32LE(dataStart + 8);
    } else if (chunkId === "data") {
      if (!byteRate) return undefined;
      // streamed WAVs often leave the data size unset
      const available = Math.max(0, fileSize - dataStart);
      return Math.min(chunkSize, available) / byteRate;
    }
    offset = dataStart + chunkSize + (chunkSize % 2);
  }
  return undefined;
}

export function estimateDurationFromSize(
  sizeBytes: number,
  kind: MediaKind
): number {
  return Math.max(0, (sizeBytes * 8) / ASSUMED_BITRATE_BPS[kind]);
}

export async function estimateDurationSeconds(
  filePath: string,
  media: MediaInfo,
  sizeBytes: number
): Promise<number> {
  if (media.ext === "wav") {
    try {
      const fromHeader = await readWavDurationSeconds(filePath);
      if (fromHeader !== undefined) return fromHeader;
    } catch {
      // unreadable header, fall through to size estimate
    }
  }
  return estimateDurationFromSize(sizeBytes, media.kind);
}

export function formatDuration(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(whole / 3600);
  const m = Math.floor((whole % 3600) / 60);
  const s = whole % 60;
  const mmss = `${pad2(m)}:${pad2(s)}`;
  return h > 0 ? `${pad2(h)}:${mmss}` : mmss;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

function pad2(n: number) {
  return n.toString().padStart(2, "0");
}
