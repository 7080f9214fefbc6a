import fs from "node:fs/promises";
import { ProviderUnavailableError } from "../errors.js";

type LimitsState = {
  minute: { windowStartMs: number; requestCount: number };
  hour: { windowStartMs: number; audioSeconds: number };
  day: { dateISO: string; requestCount: number; audioSeconds: number };
};

export interface QuotaLimits {
  requestsPerMinute: number;
  audioSecondsPerHour: number;
  requestsPerDay: number;
  audioSecondsPerDay: number;
}

// Groq free-tier limits for whisper models
export const GROQ_LIMITS: QuotaLimits = {
  requestsPerMinute: 20,
  audioSecondsPerHour: 7200,
  requestsPerDay: 2000,
  audioSecondsPerDay: 28800,
};

function emptyState(): LimitsState {
  return {
    minute: { windowStartMs: 0, requestCount: 0 },
    hour: { windowStartMs: 0, audioSeconds: 0 },
    day: { dateISO: "", requestCount: 0, audioSeconds: 0 },
  };
}

function startOfMinute(nowMs: number): number {
  return nowMs - (nowMs % 60000);
}

function startOfHour(nowMs: number): number {
  return nowMs - (nowMs % 3600000);
}

function todayISO(nowMs: number): string {
  return new Date(nowMs).toISOString().slice(0, 10);
}

/**
 * File-backed quota windows for the cloud transcription tier. Unlike a
 * waiting limiter, `reserve` fails fast so the pipeline can move on to the
 * next tier instead of holding the request.
 */
export class CloudQuota {
  private readonly limits: QuotaLimits;
  private readonly now: () => number;
  private chain: Promise<void> = Promise.resolve();

  constructor(
    private readonly stateFile: string,
    opts: { limits?: QuotaLimits; now?: () => number } = {}
  ) {
    this.limits = opts.limits ?? GROQ_LIMITS;
    this.now = opts.now ?? Date.now;
  }

  reserve(audioSeconds: number): Promise<void> {
    // reservations read-modify-write the same file
    const next = this.chain.then(() => this.reserveNow(Math.max(0, audioSeconds)));
    this.chain = next.catch(() => undefined);
    return next;
  }

  private async reserveNow(audioSeconds: number): Promise<void> {
    const now = this.now();
    const state = await this.readState();

    const today = todayISO(now);
    if (state.day.dateISO !== today) {
      state.day = { dateISO: today, requestCount: 0, audioSeconds: 0 };
    }
    const minStart = startOfMinute(now);
    if (state.minute.windowStartMs !== minStart) {
      state.minute = { windowStartMs: minStart, requestCount: 0 };
    }
    const hourStart = startOfHour(now);
    if (state.hour.windowStartMs !== hourStart) {
      state.hour = { windowStartMs: hourStart, audioSeconds: 0 };
    }

    const exceeded = this.firstExceeded(state, audioSeconds);
    if (exceeded) {
      throw new ProviderUnavailableError("groq", `Quota exhausted: ${exceeded}`);
    }

    state.minute.requestCount += 1;
    state.day.requestCount += 1;
    state.hour.audioSeconds += audioSeconds;
    state.day.audioSeconds += audioSeconds;
    await this.writeState(state);
  }

  private firstExceeded(state: LimitsState, audioSeconds: number): string | null {
    const l = this.limits;
    if (state.day.requestCount >= l.requestsPerDay) {
      return `daily request quota (${l.requestsPerDay})`;
    }
    if (state.day.audioSeconds + audioSeconds > l.audioSecondsPerDay) {
      return `daily audio seconds quota (${l.audioSecondsPerDay}s)`;
    }
    if (state.minute.requestCount >= l.requestsPerMinute) {
      return `per-minute request quota (${l.requestsPerMinute})`;
    }
    if (state.hour.audioSeconds + audioSeconds > l.audioSecondsPerHour) {
      return `hourly audio seconds quota (${l.audioSecondsPerHour}s)`;
    }
    return null;
  }

  private async readState(): Promise<LimitsState> {
    let text: string;
    try {
      text = await fs.readFile(this.stateFile, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return emptyState();
      }
      throw err;
    }
    const fallback = emptyState();
    try {
      const raw: unknown = JSON.parse(text);
      if (typeof raw !== "object" || raw === null) return fallback;
      return {
        minute: "minute" in raw && isMinute(raw.minute) ? raw.minute : fallback.minute,
        hour: "hour" in raw && isHour(raw.hour) ? raw.hour : fallback.hour,
        day: "day" in raw && isDay(raw.day) ? raw.day : fallback.day,
      };
    } catch {
      // corrupt file: start fresh windows
      return fallback;
    }
  }

  private async writeState(state: LimitsState): Promise<void> {
    await fs.writeFile(this.stateFile, JSON.stringify(state, null, 2), "utf-8");
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isMinute(v: unknown): v is LimitsState["minute"] {
  return isRecord(v) && typeof v.windowStartMs === "number" && typeof v.requestCount === "number";
}

function isHour(v: unknown): v is LimitsState["hour"] {
  return isRecord(v) && typeof v.windowStartMs === "number" && typeof v.audioSeconds === "number";
}

function isDay(v: unknown): v is LimitsState["day"] {
  return (
    isRecord(v) &&
    typeof v.dateISO === "string" &&
    typeof v.requestCount === "number" &&
    typeof v.audioSeconds === "number"
  );
}
