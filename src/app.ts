import Fastify from "fastify";
import multipart, { type Multipart, type MultipartFile, type MultipartValue } from "@fastify/multipart";
import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { z } from "zod";
import type { Logger } from "./logger.js";
import { AppError, isAppError } from "./errors.js";
import { PRIVACY_STATUSES } from "./constants.js";
import { withScopedTempDir } from "./utils/tempDir.js";
import { formatDuration } from "./pipeline/media.js";
import type { TranscriptionPipeline } from "./pipeline/transcribe.js";
import type { ClipService } from "./pipeline/trim.js";
import type { CaptionGenerator } from "./pipeline/caption.js";
import type { UploadWorkflow } from "./publish/workflow.js";
import type { UploadRecordStore } from "./store/uploadRecords.js";
import { extractHashtags } from "./publish/tags.js";

export interface AppContext {
  log: Logger;
  apiKey: string;
  mediaDir: string;
  workDir: string;
  maxUploadBytes: number;
  maxTags: number;
  platformName: string;
  transcription: TranscriptionPipeline;
  clips: ClipService;
  captions: CaptionGenerator;
  uploads: UploadWorkflow;
  records: UploadRecordStore;
}

const ClipSchema = z.object({
  filename: z.string().min(1),
  start: z.coerce.number(),
  end: z.coerce.number(),
});

const CaptionSchema = z.object({
  transcript: z.string().trim().min(1),
  instructions: z.string().optional(),
});

const UploadSchema = z.object({
  filename: z.string().min(1),
  metadata: z
    .object({
      title: z.string().optional(),
      description: z.string().optional(),
      caption: z.string().optional(),
      tags: z.array(z.string()).optional(),
      privacy: z.enum(PRIVACY_STATUSES).optional(),
    })
    .optional(),
});

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
    throw new AppError("InvalidRequest", detail);
  }
  return parsed.data;
}

function sanitizeFilename(name: string): string {
  const base = path.basename(name).replace(/[^\w.\-]+/g, "_").replace(/^\.+/, "");
  return base || "upload";
}

interface IncomingFile {
  data: MultipartFile;
  filename: string;
}

type PartIterator = AsyncIterableIterator<Multipart>;

function recordField(fields: Record<string, string>, part: MultipartValue): void {
  if (typeof part.value === "string" && part.value.trim()) {
    fields[part.fieldname] = part.value.trim();
  }
}

/**
 * Reads parts up to the first file, keeping any fields seen on the way, and
 * checks the file's extension before anything is written.
 */
async function nextFile(
  parts: PartIterator,
  fields: Record<string, string>,
  ctx: AppContext
): Promise<IncomingFile> {
  for (let next = await parts.next(); !next.done; next = await parts.next()) {
    const part = next.value;
    if (part.type === "file") {
      if (!part.filename) {
        part.file.resume();
        throw new AppError("InvalidRequest", "No file uploaded");
      }
      const filename = sanitizeFilename(part.filename);
      ctx.transcription.validate(filename, 0);
      return { data: part, filename };
    }
    recordField(fields, part);
  }
  throw new AppError("InvalidRequest", "No file uploaded");
}

/** Collects fields sent after the file part. */
async function remainingFields(parts: PartIterator, fields: Record<string, string>): Promise<void> {
  for (let next = await parts.next(); !next.done; next = await parts.next()) {
    const part = next.value;
    if (part.type === "file") {
      part.file.resume();
      continue;
    }
    recordField(fields, part);
  }
}

/**
 * Streams the upload to a hidden sibling of `dest`. `dest` is only ever
 * replaced by a complete file.
 */
async function saveFile(incoming: IncomingFile, dest: string, maxBytes: number): Promise<number> {
  const partial = path.join(path.dirname(dest), `.${path.basename(dest)}.${randomUUID()}.part`);
  try {
    await pipeline(incoming.data.file, fs.createWriteStream(partial));
    if (incoming.data.file.truncated) {
      throw new AppError("TooLarge", `File exceeds ${maxBytes} bytes`);
    }
    const { size } = await fs.promises.stat(partial);
    await fs.promises.rename(partial, dest);
    return size;
  } finally {
    await fs.promises.rm(partial, { force: true });
  }
}

export async function buildApp(ctx: AppContext) {
  const app = Fastify({
    loggerInstance: ctx.log,
    requestTimeout: 0, // transcription and OAuth consent can take minutes
  });

  await app.register(multipart, {
    throwFileSizeLimit: false,
    limits: { fileSize: ctx.maxUploadBytes, files: 1 },
  });

  app.addHook("preHandler", async (request, reply) => {
    if (!ctx.apiKey || !request.url.startsWith("/v1/")) return;
    const apiKey = request.headers["x-api-key"];
    if (!apiKey || apiKey !== ctx.apiKey) {
      return reply
        .code(401)
        .send({ success: false, error: "Unauthorized: Invalid or missing API key" });
    }
  });

  app.setErrorHandler((error: unknown, request, reply) => {
    if (isAppError(error)) {
      request.log.warn({ kind: error.kind, reason: error.reason, err: error.message }, "Request failed");
      return reply.code(error.statusCode).send({
        success: false,
        error: error.message,
        kind: error.kind,
        ...(error.reason ? { reason: error.reason } : {}),
      });
    }
    // framework errors (bad JSON, multipart limits) carry their own 4xx status
    const statusCode =
      error instanceof Error && "statusCode" in error && typeof error.statusCode === "number"
        ? error.statusCode
        : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Unhandled error");
      return reply.code(500).send({ success: false, error: "Internal server error" });
    }
    return reply.code(statusCode).send({
      success: false,
      error: error instanceof Error ? error.message : "Bad request",
    });
  });

  app.get("/healthz", async () => ({ ok: true }));

  app.post("/v1/transcribe", async (req) => {
    const parts = req.parts();
    const fields: Record<string, string> = {};
    const incoming = await nextFile(parts, fields, ctx);
    return withScopedTempDir(ctx.workDir, "upload-", async (dir) => {
      const dest = path.join(dir, incoming.filename);
      const sizeBytes = await saveFile(incoming, dest, ctx.maxUploadBytes);
      await remainingFields(parts, fields);
      const result = await ctx.transcription.transcribe({
        sourcePath: dest,
        filename: incoming.filename,
        sizeBytes,
        language: fields.language,
      });
      return {
        success: true,
        transcript: result.transcript,
        word_count: result.wordCount,
        duration: formatDuration(result.durationSeconds),
        duration_seconds: result.durationSeconds,
        language: result.language,
        tier: result.tier,
        provider: result.provider,
      };
    }, req.log);
  });

  app.post("/v1/media", async (req) => {
    const parts = req.parts();
    const incoming = await nextFile(parts, {}, ctx);
    const sizeBytes = await saveFile(incoming, path.join(ctx.mediaDir, incoming.filename), ctx.maxUploadBytes);
    await remainingFields(parts, {});
    req.log.info({ filename: incoming.filename, size: sizeBytes }, "Media stored");
    return {
      success: true,
      filename: incoming.filename,
      size_bytes: sizeBytes,
    };
  });

  app.post("/v1/clips", async (req) => {
    const body = parseBody(ClipSchema, req.body);
    const clip = await ctx.clips.createClip(body.filename, body.start, body.end);
    return {
      success: true,
      clip_filename: clip.clipFilename,
      duration: clip.durationSeconds,
      start: clip.start,
      end: clip.end,
      created_at: clip.createdAt,
    };
  });

  app.post("/v1/captions", async (req) => {
    const body = parseBody(CaptionSchema, req.body);
    const caption = await ctx.captions.generate(body.transcript, body.instructions);
    return {
      success: true,
      caption,
      tags: extractHashtags(caption, ctx.maxTags),
    };
  });

  app.post("/v1/upload", async (req) => {
    const body = parseBody(UploadSchema, req.body);
    const outcome = await ctx.uploads.publish(body.filename, body.metadata);
    return {
      success: true,
      remote_id: outcome.record.remoteId,
      url: outcome.url,
      updated: outcome.updated,
    };
  });

  app.get("/v1/uploads/:filename", async (req) => {
    const { filename } = parseBody(z.object({ filename: z.string().min(1) }), req.params);
    const record = await ctx.records.get(ctx.platformName, filename);
    if (!record) {
      throw new AppError("RecordNotFound", `No upload record for ${filename}`);
    }
    return { success: true, record };
  });

  app.setNotFoundHandler((req, reply) => {
    reply.code(404).send({ success: false, error: `Route ${req.method} ${req.url} not found` });
  });

  return app;
}
