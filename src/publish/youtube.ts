import fs from "node:fs";
import path from "node:path";
import { fetch } from "undici";
import { z } from "zod";
import type { Logger } from "../logger.js";
import { AppError, errorMessage } from "../errors.js";
import { YOUTUBE_DEFAULT_CATEGORY_ID, YOUTUBE_UPLOAD_URL } from "../constants.js";
import type { ResolvedUploadMetadata } from "../types.js";
import type { Authorizer } from "./oauth.js";
import type { OAuthSession } from "./session.js";

export interface PublishAsset {
  filename: string;
  path: string;
}

/** Contract the upload workflow needs from a publishing platform. */
export interface PublishingPlatform {
  readonly name: string;
  authorize(): Promise<OAuthSession>;
  upload(session: OAuthSession, asset: PublishAsset, metadata: ResolvedUploadMetadata): Promise<string>;
  watchUrl(remoteId: string): string;
}

const VideoResourceSchema = z.object({ id: z.string().min(1) });

class UploadHttpError extends Error {
  constructor(
    readonly status: number,
    body: string
  ) {
    super(`YouTube upload failed: ${status} ${body}`);
    this.name = "UploadHttpError";
  }
}

export interface YouTubePlatformOptions {
  authorizer: Authorizer;
  log: Logger;
  uploadUrl?: string;
  categoryId?: string;
  retryDelaysMs?: number[];
}

/** YouTube Data API v3 resumable upload, one request for the session URI and one for the bytes. */
export class YouTubePlatform implements PublishingPlatform {
  readonly name = "youtube";
  private readonly log: Logger;
  private readonly retryDelaysMs: number[];

  constructor(private readonly opts: YouTubePlatformOptions) {
    this.log = opts.log.child({ component: "youtube" });
    this.retryDelaysMs = opts.retryDelaysMs ?? [2000, 4000, 8000];
  }

  authorize(): Promise<OAuthSession> {
    return this.opts.authorizer.authorize();
  }

  watchUrl(remoteId: string): string {
    return `https://youtube.com/watch?v=${remoteId}`;
  }

  async upload(
    session: OAuthSession,
    asset: PublishAsset,
    metadata: ResolvedUploadMetadata
  ): Promise<string> {
    const { size } = await fs.promises.stat(asset.path);
    const contentType = videoMimeType(asset.filename);

    let attempt = 0;
    while (true) {
      try {
        const sessionUri = await this.startResumableSession(session, metadata, size, contentType);
        const id = await this.sendFile(session, sessionUri, asset.path, size, contentType);
        this.log.info({ filename: asset.filename, videoId: id }, "Upload successful");
        return id;
      } catch (err) {
        const backoffMs = this.retryDelaysMs[attempt];
        const retryable = err instanceof UploadHttpError && err.status >= 500;
        if (retryable && backoffMs !== undefined) {
          attempt++;
          this.log.warn(
            { attempt, backoffMs, err: errorMessage(err) },
            "Server error, retrying upload"
          );
          await new Promise((r) => setTimeout(r, backoffMs));
          continue;
        }
        throw new AppError("UploadFailed", errorMessage(err), this.name, { cause: err });
      }
    }
  }

  private async startResumableSession(
    session: OAuthSession,
    metadata: ResolvedUploadMetadata,
    length: number,
    contentType: string
  ): Promise<string> {
    const url = new URL(this.opts.uploadUrl ?? YOUTUBE_UPLOAD_URL);
    url.searchParams.set("uploadType", "resumable");
    url.searchParams.set("part", "snippet,status");

    const res = await fetch(url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${session.accessToken}`,
        "Content-Type": "application/json; charset=UTF-8",
        "X-Upload-Content-Length": String(length),
        "X-Upload-Content-Type": contentType,
      },
      body: JSON.stringify({
        snippet: {
          categoryId: this.opts.categoryId ?? YOUTUBE_DEFAULT_CATEGORY_ID,
          title: metadata.title,
          description: metadata.description,
          tags: metadata.tags,
        },
        status: {
          privacyStatus: metadata.privacy,
          selfDeclaredMadeForKids: false,
        },
      }),
    });
    if (!res.ok) {
      throw new UploadHttpError(res.status, await res.text());
    }
    await res.body?.cancel();
    const location = res.headers.get("location");
    if (!location) {
      throw new Error("YouTube did not return a resumable session URI");
    }
    return location;
  }

  /** Streams the file from disk; each attempt opens its own read stream. */
  private async sendFile(
    session: OAuthSession,
    sessionUri: string,
    filePath: string,
    size: number,
    contentType: string
  ): Promise<string> {
    const token = session.accessToken;
    const body = fs.createReadStream(filePath);
    const res = await fetch(sessionUri, {
      method: "PUT",
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": contentType,
        "Content-Length": String(size),
      },
      body,
      duplex: "half",
    }).finally(() => body.destroy());
    if (!res.ok) {
      throw new UploadHttpError(res.status, await res.text());
    }
    const parsed = VideoResourceSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error("YouTube response did not include a video id");
    }
    return parsed.data.id;
  }
}

export function videoMimeType(filename: string): string {
  const ext = path.extname(filename).toLowerCase();
  const mimeTypes: Record<string, string> = {
    ".mp4": "video/mp4",
    ".mov": "video/quicktime",
    ".avi": "video/x-msvideo",
    ".mkv": "video/x-matroska",
    ".webm": "video/webm",
  };
  return mimeTypes[ext] || "application/octet-stream";
}
