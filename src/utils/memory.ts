//in memory guards that sit in front of the participant store
import { IParticipant } from "../types";
import { Logger } from "./logger";
import { isNullOrUndefined } from "./data-helpers";
const logger = new Logger("memory");

export const DEFAULT_COOLDOWN_MS = 2000;
export const DEFAULT_CACHE_TTL_MS = 2000;

export interface RateLimiterOptions {
  cooldownMs?: number;
  sweepIntervalMs?: number; //0 keeps every entry for the life of the process
}

/**
 * Per roll number throttle. `check` and `record` are synchronous, so a
 * check followed by a record in the same tick cannot interleave with
 * another request.
 */
export class RateLimiter {
  private lastSeen = new Map<string, number>();
  private cooldownMs: number;
  private sweepIntervalMs: number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: RateLimiterOptions = {}) {
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 0;
  }

  get size(): number {
    return this.lastSeen.size;
  }

  //true when the roll number is still inside its cooldown window
  check(rollNumber: string): boolean {
    const last = this.lastSeen.get(rollNumber);
    if (isNullOrUndefined(last)) {
      return false;
    }
    return Date.now() - last < this.cooldownMs;
  }

  record(rollNumber: string): void {
    this.lastSeen.set(rollNumber, Date.now());
  }

  //drops entries whose cooldown already elapsed, check() answers false for them either way
  sweep(): number {
    const now = Date.now();
    let removed = 0;

    for (const [rollNumber, last] of this.lastSeen) {
      if (now - last >= this.cooldownMs) {
        this.lastSeen.delete(rollNumber);
        removed++;
      }
    }
    return removed;
  }

  start(): void {
    if (this.sweepIntervalMs <= 0 || this.sweepTimer) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) {
        logger.info(`swept ${removed} expired rate limit entries`);
      }
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}

export type CacheState = "cold" | "warm" | "stale";

interface Snapshot {
  participants: IParticipant[];
  capturedAt: number;
}

const copyParticipants = (participants: IParticipant[]): IParticipant[] =>
  participants.map((participant) => ({ ...participant }));

/**
 * Short lived copy of the ranked scoreboard. Concurrent misses may all
 * refill it; the last put wins.
 */
export class ScoreboardCache {
  private snapshot: Snapshot | null = null;
  private ttlMs: number;

  constructor(ttlMs: number = DEFAULT_CACHE_TTL_MS) {
    this.ttlMs = ttlMs;
  }

  get state(): CacheState {
    if (isNullOrUndefined(this.snapshot)) {
      return "cold";
    }
    return Date.now() - this.snapshot.capturedAt < this.ttlMs ? "warm" : "stale";
  }

  get(): IParticipant[] | undefined {
    if (this.state !== "warm" || isNullOrUndefined(this.snapshot)) {
      return undefined;
    }
    return copyParticipants(this.snapshot.participants);
  }

  put(participants: IParticipant[]): void {
    this.snapshot = {
      participants: copyParticipants(participants),
      capturedAt: Date.now(),
    };
  }
}
