import { describe, it, expect } from "vitest";
import { KeyedSerialQueue } from "../services/serialQueue";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedSerialQueue", () => {
  it("runs work for one key in enqueue order", async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred();
    const events: string[] = [];

    const first = queue.enqueue("thread", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
      return 1;
    });
    const second = queue.enqueue("thread", async () => {
      events.push("second");
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(["first:start"]);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
  });

  it("lets different keys run independently", async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred();
    const events: string[] = [];

    const blocked = queue.enqueue("a", async () => {
      await gate.promise;
      events.push("a");
    });
    await queue.enqueue("b", async () => {
      events.push("b");
    });

    expect(events).toEqual(["b"]);
    gate.resolve();
    await blocked;
    expect(events).toEqual(["b", "a"]);
  });

  it("continues after a failed item and forgets idle keys", async () => {
    const queue = new KeyedSerialQueue();

    const failing = queue.enqueue("thread", async () => {
      throw new Error("nope");
    });
    const next = queue.enqueue("thread", async () => "ok");

    await expect(failing).rejects.toThrow("nope");
    await expect(next).resolves.toBe("ok");

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(queue.activeKeys).toBe(0);
  });
});
