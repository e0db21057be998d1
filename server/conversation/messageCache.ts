/**
 * Conversation Cache
 *
 * Maps a Slack thread (root message ts) to its ordered message history.
 * Loaded once at startup and written through to disk after every append.
 *
 * All mutations and saves run on a single writer chain, so concurrent appends
 * (same thread or not) apply in call order and each save contains every
 * append queued before it. Saves replace the file atomically (temp + rename).
 *
 * History is never evicted; threads past HISTORY_WARN_THRESHOLD are logged.
 */

import { promises as fsp } from "fs";
import * as path from "path";
import { HISTORY_CONSTANTS } from "../config/constants";
import { getErrorMessage, PersistenceError } from "../utils/errorHandler";
import { errorMeta, logDebug, logError, logInfo, logWarn } from "../utils/logger";
import {
  messageCacheFileSchema,
  type ConversationMessage,
  type ConversationStore,
  type MessageCacheFile,
} from "./types";

export interface ConversationCacheOptions {
  warnThreshold?: number;
}

export class ConversationCache implements ConversationStore {
  private readonly filePath: string;
  private readonly warnThreshold: number;
  private threads = new Map<string, ConversationMessage[]>();
  private writeChain: Promise<void> = Promise.resolve();
  private tmpCounter = 0;

  constructor(filePath: string, options: ConversationCacheOptions = {}) {
    this.filePath = filePath;
    this.warnThreshold = options.warnThreshold ?? HISTORY_CONSTANTS.HISTORY_WARN_THRESHOLD;
  }

  get size(): number {
    return this.threads.size;
  }

  /**
   * Replace in-memory state with the persisted file. A missing or blank file
   * yields an empty cache; unreadable or invalid content throws PersistenceError.
   */
  async load(): Promise<Map<string, ConversationMessage[]>> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        this.threads = new Map();
        logInfo("[ConversationCache] No message cache on disk, starting empty", { path: this.filePath });
        return this.threads;
      }
      throw new PersistenceError(this.filePath, getErrorMessage(err));
    }

    if (!raw.trim()) {
      this.threads = new Map();
      return this.threads;
    }

    let data: MessageCacheFile;
    try {
      data = messageCacheFileSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new PersistenceError(this.filePath, `invalid message cache: ${getErrorMessage(err)}`);
    }

    this.threads = new Map(Object.entries(data));
    logInfo("[ConversationCache] Loaded message history", { path: this.filePath, threads: this.threads.size });
    this.threads.forEach((messages, threadTs) => {
      logDebug(`[ConversationCache] Thread ${threadTs} has ${messages.length} messages`);
    });
    return this.threads;
  }

  get(conversationId: string): ConversationMessage[] {
    return [...(this.threads.get(conversationId) ?? [])];
  }

  /**
   * Extend a thread's history and persist. Resolves once the write has been
   * attempted; a failed write is logged and the in-memory history is kept.
   */
  append(conversationId: string, messages: ConversationMessage[]): Promise<void> {
    return this.enqueue(async () => {
      const existing = this.threads.get(conversationId);
      const history = existing ?? [];
      history.push(...messages);
      if (!existing) {
        this.threads.set(conversationId, history);
      }

      if (history.length > this.warnThreshold) {
        logWarn(`[ConversationCache] Thread ${conversationId} has ${history.length} messages; history is not trimmed`);
      }

      try {
        await this.writeFile();
        logInfo(`[ConversationCache] Updated thread ${conversationId} with ${messages.length} new messages`, {
          threadTs: conversationId,
          total: history.length,
        });
      } catch (err) {
        logError("[ConversationCache] Failed to persist message cache; continuing in memory", {
          path: this.filePath,
          threadTs: conversationId,
          ...errorMeta(err),
        });
      }
    });
  }

  /**
   * Persist the whole mapping. Rejects with PersistenceError on I/O failure.
   */
  save(): Promise<void> {
    return this.enqueue(() => this.writeFile());
  }

  snapshot(): MessageCacheFile {
    const result: MessageCacheFile = {};
    this.threads.forEach((messages, threadTs) => {
      result[threadTs] = messages.map((message) => ({ ...message }));
    });
    return result;
  }

  private enqueue(work: () => Promise<void>): Promise<void> {
    const run = this.writeChain.then(work);
    // keep the chain alive after a failed step; the caller still sees the rejection
    this.writeChain = run.catch((err: unknown) => {
      logDebug("[ConversationCache] Write step failed", errorMeta(err));
    });
    return run;
  }

  private async writeFile(): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.${this.tmpCounter++}.tmp`;
    const body = JSON.stringify(this.snapshot(), null, 2);
    try {
      await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
      await fsp.writeFile(tmpPath, body, "utf-8");
      await fsp.rename(tmpPath, this.filePath);
    } catch (err) {
      await fsp.rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        logWarn("[ConversationCache] Failed to remove temp file", { path: tmpPath, ...errorMeta(cleanupErr) });
      });
      throw new PersistenceError(this.filePath, getErrorMessage(err));
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
