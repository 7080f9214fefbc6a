import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from "undici";
import { YouTubePlatform, videoMimeType } from "../../src/publish/youtube.js";
import { OAuthSession } from "../../src/publish/session.js";
import { silentLogger } from "../../src/logger.js";
import { YOUTUBE_UPLOAD_SCOPE } from "../../src/constants.js";
import type { ResolvedUploadMetadata } from "../../src/types.js";
import { makeTempDir, removeDir, writeFile } from "../helpers.js";

const ORIGIN = "https://upload.test";
const UPLOAD_URL = `${ORIGIN}/upload/youtube/v3/videos`;
const SESSION_URI = `${ORIGIN}/upload/session/abc`;

const metadata: ResolvedUploadMetadata = {
  title: "Open house",
  description: "Great day! #Property",
  tags: ["Property"],
  privacy: "unlisted",
};

const isStartPath = (p: string) => p.startsWith("/upload/youtube/v3/videos?");

function lowerCaseKeys(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(headers).map(([k, v]) => [k.toLowerCase(), v]));
}

describe("YouTubePlatform", () => {
  let originalDispatcher: Dispatcher;
  let mockAgent: MockAgent;
  let dir: string;
  let assetPath: string;
  let session: OAuthSession;

  beforeEach(() => {
    originalDispatcher = getGlobalDispatcher();
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    setGlobalDispatcher(mockAgent);
    dir = makeTempDir();
    assetPath = writeFile(dir, "tour.mp4", Buffer.alloc(2048, 1));
    session = new OAuthSession("test-client", "test-token", [YOUTUBE_UPLOAD_SCOPE], new Date(Date.now() + 60_000));
  });

  afterEach(async () => {
    setGlobalDispatcher(originalDispatcher);
    await mockAgent.close();
    removeDir(dir);
  });

  const platform = () =>
    new YouTubePlatform({
      authorizer: { authorize: async () => session },
      log: silentLogger(),
      uploadUrl: UPLOAD_URL,
      retryDelaysMs: [0],
    });

  it("opens a resumable session, streams the file and returns the video id", async () => {
    let sentMetadata = "";
    let startHeaders: Record<string, string> = {};
    let putHeaders: Record<string, string> = {};
    const pool = mockAgent.get(ORIGIN);
    pool
      .intercept({
        path: isStartPath,
        method: "POST",
        headers: (headers: Record<string, string>) => {
          startHeaders = lowerCaseKeys(headers);
          return true;
        },
        body: (body: string) => {
          sentMetadata = body;
          return true;
        },
      })
      .reply(200, "", { headers: { location: SESSION_URI } });
    pool
      .intercept({
        path: "/upload/session/abc",
        method: "PUT",
        headers: (headers: Record<string, string>) => {
          putHeaders = lowerCaseKeys(headers);
          return true;
        },
      })
      .reply(200, { id: "vid123" });

    const id = await platform().upload(session, { filename: "tour.mp4", path: assetPath }, metadata);

    expect(id).toBe("vid123");
    expect(JSON.parse(sentMetadata)).toEqual({
      snippet: {
        categoryId: "22",
        title: "Open house",
        description: "Great day! #Property",
        tags: ["Property"],
      },
      status: { privacyStatus: "unlisted", selfDeclaredMadeForKids: false },
    });
    expect(startHeaders["x-upload-content-length"]).toBe("2048");
    expect(startHeaders["x-upload-content-type"]).toBe("video/mp4");
    expect(putHeaders["content-length"]).toBe("2048");
    expect(putHeaders["content-type"]).toBe("video/mp4");
    expect(putHeaders.authorization).toBe("Bearer test-token");
    mockAgent.assertNoPendingInterceptors();
  });

  it("retries after a server error", async () => {
    const pool = mockAgent.get(ORIGIN);
    pool.intercept({ path: isStartPath, method: "POST" }).reply(503, "backend error");
    pool
      .intercept({ path: isStartPath, method: "POST" })
      .reply(200, "", { headers: { location: SESSION_URI } });
    pool.intercept({ path: "/upload/session/abc", method: "PUT" }).reply(201, { id: "vid456" });

    const id = await platform().upload(session, { filename: "tour.mp4", path: assetPath }, metadata);

    expect(id).toBe("vid456");
    mockAgent.assertNoPendingInterceptors();
  });

  it("reopens the file when the byte transfer is retried", async () => {
    const pool = mockAgent.get(ORIGIN);
    pool
      .intercept({ path: isStartPath, method: "POST" })
      .reply(200, "", { headers: { location: SESSION_URI } })
      .times(2);
    pool.intercept({ path: "/upload/session/abc", method: "PUT" }).reply(500, "transient");
    pool.intercept({ path: "/upload/session/abc", method: "PUT" }).reply(200, { id: "vid789" });

    const id = await platform().upload(session, { filename: "tour.mp4", path: assetPath }, metadata);

    expect(id).toBe("vid789");
    mockAgent.assertNoPendingInterceptors();
  });

  it("fails without retrying on a client error", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: isStartPath, method: "POST" })
      .reply(403, "quotaExceeded");

    await expect(
      platform().upload(session, { filename: "tour.mp4", path: assetPath }, metadata)
    ).rejects.toMatchObject({
      kind: "UploadFailed",
      reason: "youtube",
      message: "YouTube upload failed: 403 quotaExceeded",
    });
  });

  it("fails when no session URI comes back", async () => {
    mockAgent.get(ORIGIN).intercept({ path: isStartPath, method: "POST" }).reply(200, "");

    await expect(
      platform().upload(session, { filename: "tour.mp4", path: assetPath }, metadata)
    ).rejects.toMatchObject({
      kind: "UploadFailed",
      message: "YouTube did not return a resumable session URI",
    });
  });

  it("refuses to upload with a revoked session", async () => {
    session.revoke();

    await expect(
      platform().upload(session, { filename: "tour.mp4", path: assetPath }, metadata)
    ).rejects.toMatchObject({ kind: "UploadFailed", message: "OAuth session has been revoked" });
  });

  it("builds watch URLs and picks content types", () => {
    expect(platform().watchUrl("vid123")).toBe("https://youtube.com/watch?v=vid123");
    expect(videoMimeType(path.join(dir, "a.MOV"))).toBe("video/quicktime");
    expect(videoMimeType("a.bin")).toBe("application/octet-stream");
  });
});
