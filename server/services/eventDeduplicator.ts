/**
 * Event Deduplication Service
 *
 * Slack redelivers events it believes were not acknowledged in time. Events
 * are keyed by `event_id` (and message ts) and remembered in memory for
 * DEDUPE_CONSTANTS.TTL_MS, which covers Slack's retry schedule.
 *
 * Per-process only: a restart forgets seen events.
 */

import { DEDUPE_CONSTANTS } from "../config/constants";
import { logDebug } from "../utils/logger";

export interface EventDeduplicatorOptions {
  ttlMs?: number;
  maxEntries?: number;
  now?: () => number;
}

export class EventDeduplicator {
  private seen = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: EventDeduplicatorOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEDUPE_CONSTANTS.TTL_MS;
    this.maxEntries = options.maxEntries ?? DEDUPE_CONSTANTS.MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.seen.size;
  }

  /**
   * Returns true when any key was seen within the TTL; otherwise records all
   * keys and returns false. Blank keys are ignored; no keys means "new".
   */
  isDuplicate(...rawKeys: Array<string | undefined>): boolean {
    const keys = rawKeys
      .map((key) => key?.trim())
      .filter((key): key is string => Boolean(key));
    if (keys.length === 0) {
      return false;
    }

    const now = this.now();
    if (this.seen.size >= this.maxEntries) {
      this.cleanup(now);
    }

    for (const key of keys) {
      const seenAt = this.seen.get(key);
      if (seenAt !== undefined && now - seenAt < this.ttlMs) {
        logDebug(`[Dedupe] Duplicate detected: ${key}`);
        return true;
      }
    }

    keys.forEach((key) => this.seen.set(key, now));
    return false;
  }

  private cleanup(now: number): void {
    const cutoff = now - this.ttlMs;
    this.seen.forEach((timestamp, key) => {
      if (timestamp < cutoff) this.seen.delete(key);
    });
    // still full of fresh entries: drop the oldest (Map keeps insertion order)
    while (this.seen.size >= this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
  }
}
