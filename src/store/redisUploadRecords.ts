import type { UploadRecord } from "../types.js";
import { KeyedMutex } from "../utils/lock.js";
import {
  UploadRecordSchema,
  recordKey,
  type UploadRecordStore,
  type UpsertOutcome,
} from "./uploadRecords.js";

/** The two hash commands the store needs; an ioredis client satisfies it. */
export interface RecordHash {
  hget(key: string, field: string): Promise<string | null>;
  hset(key: string, field: string, value: string): Promise<number>;
}

/**
 * Upload log as a single Redis hash, one field per platform:filename. HSET
 * replaces the field, which gives the upsert; the keyed lock keeps the
 * read-before-write of one process in order.
 */
export class RedisUploadRecordStore implements UploadRecordStore {
  private readonly lock = new KeyedMutex();

  constructor(
    private readonly redis: RecordHash,
    private readonly hashKey = "upload_records"
  ) {}

  async get(platform: string, filename: string): Promise<UploadRecord | null> {
    const raw = await this.redis.hget(this.hashKey, recordKey(platform, filename));
    if (raw === null) return null;
    const parsed = UploadRecordSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Malformed upload record for ${recordKey(platform, filename)}`);
    }
    return parsed.data;
  }

  upsert(record: UploadRecord): Promise<UpsertOutcome> {
    const field = recordKey(record.platform, record.filename);
    return this.lock.run(field, async () => {
      const created = await this.redis.hset(this.hashKey, field, JSON.stringify(record));
      return { record, updated: created === 0 };
    });
  }
}
