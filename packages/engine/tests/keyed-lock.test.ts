import { describe, it, expect } from "vitest";
import { KeyedLock } from "../src/keyed-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("runs tasks on one key in arrival order", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run("v-1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.run("v-1", async () => {
      order.push("second");
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block other keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.run("v-1", async () => {
      await gate.promise;
      order.push("v-1");
    });
    await lock.run("v-2", async () => {
      order.push("v-2");
    });

    expect(order).toEqual(["v-2"]);
    gate.resolve();
    await blocked;
    expect(order).toEqual(["v-2", "v-1"]);
  });

  it("releases the key when a task throws", async () => {
    const lock = new KeyedLock();
    await expect(
      lock.run("v-1", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await lock.run("v-1", async () => "next")).toBe("next");
    expect(lock.activeKeys).toBe(0);
  });

  it("forgets keys once idle", async () => {
    const lock = new KeyedLock();
    await Promise.all([lock.run("a", async () => 1), lock.run("b", async () => 2)]);
    expect(lock.activeKeys).toBe(0);
  });
});
