import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { PRIVACY_STATUSES } from "../constants.js";
import type { UploadRecord } from "../types.js";
import { KeyedMutex } from "../utils/lock.js";

export const UploadRecordSchema = z.object({
  filename: z.string().min(1),
  platform: z.string().min(1),
  remoteId: z.string().min(1),
  uploadedAt: z.string(),
  privacy: z.enum(PRIVACY_STATUSES),
  tags: z.array(z.string()),
  title: z.string(),
  description: z.string(),
});

export interface UpsertOutcome {
  record: UploadRecord;
  /** True when an earlier record for the same key was replaced. */
  updated: boolean;
}

export interface UploadRecordStore {
  get(platform: string, filename: string): Promise<UploadRecord | null>;
  upsert(record: UploadRecord): Promise<UpsertOutcome>;
}

export function recordKey(platform: string, filename: string): string {
  return `${platform}:${filename}`;
}

/**
 * Upload log kept as one JSON array on disk. Every write rewrites the file,
 * so all upserts go through a single lock and land via temp file + rename.
 */
export class FileUploadRecordStore implements UploadRecordStore {
  private readonly lock = new KeyedMutex();

  constructor(private readonly filePath: string) {}

  async get(platform: string, filename: string): Promise<UploadRecord | null> {
    const records = await this.readAll();
    return records.find((r) => r.platform === platform && r.filename === filename) ?? null;
  }

  upsert(record: UploadRecord): Promise<UpsertOutcome> {
    return this.lock.run(this.filePath, async () => {
      const records = await this.readAll();
      const idx = records.findIndex(
        (r) => r.platform === record.platform && r.filename === record.filename
      );
      const updated = idx >= 0;
      if (updated) {
        records[idx] = record;
      } else {
        records.push(record);
      }
      await this.writeAll(records);
      return { record, updated };
    });
  }

  private async readAll(): Promise<UploadRecord[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    if (!text.trim()) return [];
    const parsed = z.array(UploadRecordSchema).safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`Upload record file ${this.filePath} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async writeAll(records: UploadRecord[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(records, null, 2), "utf-8");
    await fs.rename(tmpPath, this.filePath);
  }
}
