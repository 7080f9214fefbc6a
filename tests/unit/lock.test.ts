import { describe, expect, it } from "vitest";
import { KeyedMutex } from "../../src/utils/lock.js";

const tick = () => new Promise<void>((r) => setTimeout(r, 5));

describe("KeyedMutex", () => {
  it("runs work for the same key in arrival order without overlap", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (label: string) =>
      mutex.run("k", async () => {
        events.push(`${label}:start`);
        await tick();
        events.push(`${label}:end`);
        return label;
      });

    const results = await Promise.all([task("a"), task("b"), task("c")]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
    expect(mutex.pendingKeys).toBe(0);
  });

  it("lets different keys proceed independently", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (key: string) =>
      mutex.run(key, async () => {
        events.push(`${key}:start`);
        await tick();
        events.push(`${key}:end`);
      });

    await Promise.all([task("x"), task("y")]);

    expect(events.slice(0, 2)).toEqual(["x:start", "y:start"]);
  });

  it("releases the key after a failure", async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.run("k", async () => {
      throw new Error("boom");
    });
    const next = mutex.run("k", async () => "after");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
    expect(mutex.pendingKeys).toBe(0);
  });
});
