import { describe, it, expect } from "vitest";
import { SessionLock } from "../session-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("SessionLock", () => {
  it("runs work on one key in submission order", async () => {
    const lock = new SessionLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run("s1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.run("s1", () => {
      order.push("second");
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(order).toEqual(["first:start"]);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block other keys", async () => {
    const lock = new SessionLock();
    const gate = deferred();
    const blocked = lock.run("s1", () => gate.promise);
    await expect(lock.run("s2", () => "free")).resolves.toBe("free");
    gate.resolve();
    await blocked;
  });

  it("releases after a failure", async () => {
    const lock = new SessionLock();
    await expect(lock.run("s1", () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(lock.run("s1", () => 42)).resolves.toBe(42);
  });

  it("forgets idle keys", async () => {
    const lock = new SessionLock();
    const gate = deferred();
    const running = lock.run("s1", () => gate.promise);
    expect(lock.isLocked("s1")).toBe(true);
    gate.resolve();
    await running;
    expect(lock.isLocked("s1")).toBe(false);
  });
});
