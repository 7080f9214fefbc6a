import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ProviderTranscript } from "../src/types.js";
import type { TierInput, TranscriptionProvider } from "../src/pipeline/transcribe.js";
import type { PublishAsset, PublishingPlatform } from "../src/publish/youtube.js";
import { OAuthSession } from "../src/publish/session.js";
import { AuthorizationError } from "../src/errors.js";
import { YOUTUBE_UPLOAD_SCOPE } from "../src/constants.js";
import type { ResolvedUploadMetadata } from "../src/types.js";

export function makeTempDir(prefix = "clipline-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** 16kHz mono 16-bit PCM WAV (byte rate 32000) with `dataBytes` of silence. */
export function makeWav(dataBytes: number): Buffer {
  const header = Buffer.alloc(44);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + dataBytes, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(1, 22); // mono
  header.writeUInt32LE(16000, 24);
  header.writeUInt32LE(32000, 28);
  header.writeUInt16LE(2, 32);
  header.writeUInt16LE(16, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(dataBytes, 40);
  return Buffer.concat([header, Buffer.alloc(dataBytes)]);
}

export function writeFile(dir: string, name: string, content: Buffer | string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content);
  return filePath;
}

export class FakeProvider implements TranscriptionProvider {
  readonly calls: TierInput[] = [];

  constructor(
    readonly name: string,
    readonly tier: "primary" | "secondary",
    private readonly behaviour: ProviderTranscript | Error
  ) {}

  async attempt(input: TierInput): Promise<ProviderTranscript> {
    this.calls.push(input);
    if (this.behaviour instanceof Error) throw this.behaviour;
    return this.behaviour;
  }
}

export interface FakeUploadCall {
  asset: PublishAsset;
  metadata: ResolvedUploadMetadata;
  session: OAuthSession;
}

/** Platform stand-in that hands out in-memory sessions and numbered video ids. */
export class FakePlatform implements PublishingPlatform {
  readonly name = "youtube";
  readonly sessions: OAuthSession[] = [];
  readonly uploads: FakeUploadCall[] = [];
  authorizeError: Error | null = null;
  uploadError: Error | null = null;

  async authorize(): Promise<OAuthSession> {
    if (this.authorizeError) throw this.authorizeError;
    const session = new OAuthSession(
      "test-client",
      `test-token-${this.sessions.length + 1}`,
      [YOUTUBE_UPLOAD_SCOPE],
      new Date(Date.now() + 3600_000)
    );
    this.sessions.push(session);
    return session;
  }

  async upload(
    session: OAuthSession,
    asset: PublishAsset,
    metadata: ResolvedUploadMetadata
  ): Promise<string> {
    // reading the token proves the session is still live during upload
    void session.accessToken;
    if (this.uploadError) throw this.uploadError;
    this.uploads.push({ asset, metadata, session });
    return `video-${this.uploads.length}`;
  }

  watchUrl(remoteId: string): string {
    return `https://youtube.com/watch?v=${remoteId}`;
  }
}

export function deniedAuthorization(): AuthorizationError {
  return new AuthorizationError("denied", "Authorization was not granted: access_denied");
}

/** Runs `fn` and returns what it threw, failing if it returned normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
