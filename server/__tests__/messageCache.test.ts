import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import { ConversationCache } from "../conversation/messageCache";
import type { ConversationMessage } from "../conversation/types";
import { PersistenceError } from "../utils/errorHandler";

function message(role: ConversationMessage["role"], content: string): ConversationMessage {
  return { role, content, createdAt: "2024-01-01T00:00:00.000Z" };
}

describe("ConversationCache", () => {
  let dir: string;
  let cachePath: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), "message-cache-"));
    cachePath = path.join(dir, "message_cache.json");
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  describe("load", () => {
    it("starts empty when the file does not exist", async () => {
      const cache = new ConversationCache(cachePath);
      const loaded = await cache.load();
      expect(loaded.size).toBe(0);
      expect(cache.get("1700000000.000100")).toEqual([]);
    });

    it("starts empty when the file is blank", async () => {
      await fsp.writeFile(cachePath, "  \n");
      const cache = new ConversationCache(cachePath);
      expect((await cache.load()).size).toBe(0);
    });

    it("rejects a file that is not valid JSON", async () => {
      await fsp.writeFile(cachePath, "{not json");
      await expect(new ConversationCache(cachePath).load()).rejects.toBeInstanceOf(PersistenceError);
    });

    it("rejects a file with the wrong shape", async () => {
      await fsp.writeFile(cachePath, JSON.stringify({ "1.2": [{ role: "system", content: "x" }] }));
      await expect(new ConversationCache(cachePath).load()).rejects.toBeInstanceOf(PersistenceError);
    });
  });

  it("round-trips appended history through the file", async () => {
    const cache = new ConversationCache(cachePath);
    await cache.load();
    await cache.append("1.1", [message("user", "hi"), message("assistant", "hello")]);
    await cache.append("2.2", [message("user", "other thread")]);

    const reloaded = new ConversationCache(cachePath);
    await reloaded.load();

    expect(reloaded.get("1.1")).toEqual([message("user", "hi"), message("assistant", "hello")]);
    expect(reloaded.get("2.2")).toEqual([message("user", "other thread")]);
    expect(reloaded.snapshot()).toEqual(cache.snapshot());
  });

  it("keeps both of two concurrent appends to one thread, in call order", async () => {
    const cache = new ConversationCache(cachePath);
    await cache.load();

    await Promise.all([
      cache.append("1.1", [message("user", "first")]),
      cache.append("1.1", [message("user", "second")]),
    ]);

    expect(cache.get("1.1").map((m) => m.content)).toEqual(["first", "second"]);
    const onDisk = JSON.parse(await fsp.readFile(cachePath, "utf-8"));
    expect(onDisk["1.1"].map((m: ConversationMessage) => m.content)).toEqual(["first", "second"]);
  });

  it("returns copies from get", async () => {
    const cache = new ConversationCache(cachePath);
    await cache.append("1.1", [message("user", "hi")]);

    cache.get("1.1").push(message("user", "not stored"));

    expect(cache.get("1.1")).toHaveLength(1);
  });

  it("leaves no temp files behind", async () => {
    const cache = new ConversationCache(cachePath);
    await cache.append("1.1", [message("user", "hi")]);
    await cache.save();

    expect(await fsp.readdir(dir)).toEqual(["message_cache.json"]);
  });

  it("keeps serving from memory when a save fails", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    // a directory in place of the file makes the rename fail
    await fsp.mkdir(cachePath);
    const cache = new ConversationCache(cachePath);

    await expect(cache.append("1.1", [message("user", "hi")])).resolves.toBeUndefined();

    expect(cache.get("1.1")).toEqual([message("user", "hi")]);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toContain("Failed to persist message cache");
    await expect(cache.save()).rejects.toBeInstanceOf(PersistenceError);
  });

  it("warns when a thread grows past the threshold", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const cache = new ConversationCache(cachePath, { warnThreshold: 2 });

    await cache.append("1.1", [message("user", "a"), message("assistant", "b")]);
    expect(warnSpy).not.toHaveBeenCalled();

    await cache.append("1.1", [message("user", "c")]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0][0]).toContain("Thread 1.1 has 3 messages");
  });
});
