import path from "node:path";
import fs from "node:fs";
import type { Logger } from "../logger.js";
import { AppError } from "../errors.js";
import { runCommand, type CommandRunner } from "../utils/process.js";
import type { ClipDescriptor } from "../types.js";
import { classifyMedia } from "./media.js";

export interface ClipServiceOptions {
  mediaDir: string;
  ffmpegCmd: string;
  log: Logger;
  run?: CommandRunner;
  now?: () => Date;
  timeoutMs?: number;
}

/** Cuts `[start, end)` seconds out of a media-store asset with ffmpeg. */
export class ClipService {
  private readonly run: CommandRunner;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly opts: ClipServiceOptions) {
    this.run = opts.run ?? runCommand;
    this.now = opts.now ?? (() => new Date());
    this.log = opts.log.child({ component: "clips" });
  }

  async createClip(filename: string, start: number, end: number): Promise<ClipDescriptor> {
    if (!Number.isFinite(start) || !Number.isFinite(end) || start < 0 || end <= start) {
      throw new AppError("InvalidRequest", "Invalid time range");
    }
    const inputPath = resolveMediaPath(this.opts.mediaDir, filename);
    if (classifyMedia(filename)?.kind !== "video") {
      throw new AppError("UnsupportedFormat", `Not a video file: ${filename}`);
    }

    const createdAt = this.now();
    const clipFilename = `${path.parse(filename).name}_clip_${compactTimestamp(createdAt)}.mp4`;
    const clipPath = path.join(this.opts.mediaDir, clipFilename);
    const duration = end - start;

    try {
      await this.run(
        this.opts.ffmpegCmd,
        [
          "-y",
          "-ss", String(start),
          "-i", inputPath,
          "-t", String(duration),
          "-c:v", "libx264",
          "-c:a", "aac",
          clipPath,
        ],
        { timeoutMs: this.opts.timeoutMs ?? 300000 }
      );
    } catch (err) {
      this.log.error({ err, filename }, "ffmpeg failed to create clip");
      fs.rmSync(clipPath, { force: true });
      throw new AppError("ClipFailed", "Failed to create video clip", undefined, { cause: err });
    }

    this.log.info({ filename, clipFilename, start, end }, "Clip created");
    return {
      clipFilename,
      durationSeconds: duration,
      start,
      end,
      createdAt: createdAt.toISOString(),
    };
  }
}

/**
 * Resolves a bare filename inside the media store. Anything with a directory
 * component is refused.
 */
export function resolveMediaPath(mediaDir: string, filename: string): string {
  if (!filename || path.basename(filename) !== filename || filename.startsWith(".")) {
    throw new AppError("InvalidRequest", `Invalid filename: ${filename}`);
  }
  const fullPath = path.join(mediaDir, filename);
  if (!fs.existsSync(fullPath)) {
    throw new AppError("AssetNotFound", `Media not found: ${filename}`);
  }
  return fullPath;
}

export function compactTimestamp(d: Date): string {
  const p = (n: number) => n.toString().padStart(2, "0");
  return (
    `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_` +
    `${p(d.getHours())}${p(d.getMinutes())}${p(d.getSeconds())}`
  );
}
