import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ClipService, compactTimestamp, resolveMediaPath } from "../../src/pipeline/trim.js";
import { silentLogger } from "../../src/logger.js";
import type { CommandRunner } from "../../src/utils/process.js";
import { makeTempDir, removeDir, thrownBy, writeFile } from "../helpers.js";

describe("ClipService", () => {
  let mediaDir: string;
  const createdAt = new Date(2026, 3, 2, 14, 5, 9);

  beforeEach(() => {
    mediaDir = makeTempDir();
    writeFile(mediaDir, "tour.mp4", Buffer.alloc(64));
    writeFile(mediaDir, "voice.mp3", Buffer.alloc(64));
  });

  afterEach(() => removeDir(mediaDir));

  const service = (run: CommandRunner) =>
    new ClipService({
      mediaDir,
      ffmpegCmd: "/usr/bin/ffmpeg",
      log: silentLogger(),
      run,
      now: () => createdAt,
    });

  it("re-encodes the requested range into a timestamped clip", async () => {
    const run = vi.fn<CommandRunner>(async () => ({ stdout: "", stderr: "" }));

    const clip = await service(run).createClip("tour.mp4", 12.5, 40);

    expect(clip).toEqual({
      clipFilename: "tour_clip_20260402_140509.mp4",
      durationSeconds: 27.5,
      start: 12.5,
      end: 40,
      createdAt: createdAt.toISOString(),
    });
    expect(run).toHaveBeenCalledWith(
      "/usr/bin/ffmpeg",
      [
        "-y",
        "-ss", "12.5",
        "-i", path.join(mediaDir, "tour.mp4"),
        "-t", "27.5",
        "-c:v", "libx264",
        "-c:a", "aac",
        path.join(mediaDir, "tour_clip_20260402_140509.mp4"),
      ],
      { timeoutMs: 300000 }
    );
  });

  it("rejects an empty or inverted range before running anything", async () => {
    const run = vi.fn<CommandRunner>(async () => ({ stdout: "", stderr: "" }));

    await expect(service(run).createClip("tour.mp4", 10, 10)).rejects.toMatchObject({
      kind: "InvalidRequest",
    });
    await expect(service(run).createClip("tour.mp4", -1, 5)).rejects.toMatchObject({
      kind: "InvalidRequest",
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("only clips video files", async () => {
    const run = vi.fn<CommandRunner>(async () => ({ stdout: "", stderr: "" }));

    await expect(service(run).createClip("voice.mp3", 0, 5)).rejects.toMatchObject({
      kind: "UnsupportedFormat",
    });
  });

  it("removes a partial clip when ffmpeg fails", async () => {
    const run = vi.fn<CommandRunner>(async (_cmd, args) => {
      fs.writeFileSync(args[args.length - 1], "partial");
      throw new Error("Command failed: code=1");
    });

    await expect(service(run).createClip("tour.mp4", 0, 5)).rejects.toMatchObject({
      kind: "ClipFailed",
      statusCode: 502,
    });
    expect(fs.readdirSync(mediaDir).sort()).toEqual(["tour.mp4", "voice.mp3"]);
  });
});

describe("resolveMediaPath", () => {
  let mediaDir: string;

  beforeEach(() => {
    mediaDir = makeTempDir();
    writeFile(mediaDir, "tour.mp4", "x");
  });

  afterEach(() => removeDir(mediaDir));

  it("resolves a bare filename inside the media directory", () => {
    expect(resolveMediaPath(mediaDir, "tour.mp4")).toBe(path.join(mediaDir, "tour.mp4"));
  });

  it("refuses path components and hidden names", () => {
    for (const name of ["../tour.mp4", "sub/tour.mp4", ".env", ""]) {
      expect(thrownBy(() => resolveMediaPath(mediaDir, name))).toMatchObject({ kind: "InvalidRequest" });
    }
  });

  it("reports a missing asset", () => {
    expect(thrownBy(() => resolveMediaPath(mediaDir, "gone.mp4"))).toMatchObject({
      kind: "AssetNotFound",
      statusCode: 404,
    });
  });
});

describe("compactTimestamp", () => {
  it("uses local wall-clock fields", () => {
    expect(compactTimestamp(new Date(2026, 0, 9, 3, 4, 5))).toBe("20260109_030405");
  });
});
