import { describe, expect, it } from "vitest";
import { createMutex, createSemaphore } from "../../inference/server/src/util/async.js";

function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe("createMutex", () => {
  it("runs tasks one at a time in call order", async () => {
    const mutex = createMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive(async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
      return 1;
    });
    const second = mutex.runExclusive(async () => {
      order.push("second");
      return 2;
    });

    await Promise.resolve();
    expect(mutex.locked).toBe(true);
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.locked).toBe(false);
  });

  it("keeps going after a task fails", async () => {
    const mutex = createMutex();
    await expect(mutex.runExclusive(async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");
    await expect(mutex.runExclusive(async () => "after")).resolves.toBe("after");
  });
});

describe("createSemaphore", () => {
  it("rejects invalid capacities", () => {
    expect(() => createSemaphore(0)).toThrow(RangeError);
    expect(() => createSemaphore(1.5)).toThrow(RangeError);
  });

  it("grants slots up to capacity and queues the rest in order", async () => {
    const semaphore = createSemaphore(2);
    const releaseA = await semaphore.acquire();
    const releaseB = await semaphore.acquire();
    expect(semaphore.available).toBe(0);

    const granted: string[] = [];
    const waitC = semaphore.acquire().then((release) => {
      granted.push("C");
      return release;
    });
    const waitD = semaphore.acquire().then((release) => {
      granted.push("D");
      return release;
    });
    expect(semaphore.waiting).toBe(2);

    releaseA();
    const releaseC = await waitC;
    expect(granted).toEqual(["C"]);

    releaseB();
    const releaseD = await waitD;
    expect(granted).toEqual(["C", "D"]);

    releaseC();
    releaseD();
    expect(semaphore.available).toBe(2);
    expect(semaphore.waiting).toBe(0);
  });

  it("ignores a second release of the same slot", async () => {
    const semaphore = createSemaphore(1);
    const release = await semaphore.acquire();
    release();
    release();
    expect(semaphore.available).toBe(1);
  });

  it("removes an aborted waiter from the queue", async () => {
    const semaphore = createSemaphore(1);
    const release = await semaphore.acquire();
    const controller = new AbortController();

    const waiting = semaphore.acquire(controller.signal);
    expect(semaphore.waiting).toBe(1);
    controller.abort(new Error("gave up"));

    await expect(waiting).rejects.toThrow("gave up");
    expect(semaphore.waiting).toBe(0);
    release();
    expect(semaphore.available).toBe(1);
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const semaphore = createSemaphore(1);
    const controller = new AbortController();
    controller.abort(new Error("too late"));
    await expect(semaphore.acquire(controller.signal)).rejects.toThrow("too late");
    expect(semaphore.available).toBe(1);
  });
});
