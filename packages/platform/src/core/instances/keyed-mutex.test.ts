import { describe, it, expect } from "vitest";
import { KeyedMutex } from "./keyed-mutex.js";
import { OperationCancelledError } from "../engine/errors.js";

/** A promise plus the function that settles it */
function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("serves waiters on the same key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive("doc-1", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = mutex.runExclusive("doc-1", async () => {
      order.push("second");
    });
    const third = mutex.runExclusive("doc-1", async () => {
      order.push("third");
    });

    expect(mutex.isLocked("doc-1")).toBe(true);
    expect(mutex.pendingCount("doc-1")).toBe(2);

    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual(["first", "second", "third"]);
    expect(mutex.isLocked("doc-1")).toBe(false);
  });

  it("never makes different keys wait on each other", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const held = mutex.runExclusive("doc-1", () => gate.promise);
    const other = await mutex.runExclusive("doc-2", async () => "done");

    expect(other).toBe("done");
    gate.resolve();
    await held;
  });

  it("releases the key when the holder throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("doc-1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(mutex.isLocked("doc-1")).toBe(false);
    await expect(mutex.runExclusive("doc-1", async () => 42)).resolves.toBe(42);
  });

  it("rejects immediately when the signal has already aborted", async () => {
    const mutex = new KeyedMutex();
    const controller = new AbortController();
    controller.abort();
    let ran = false;

    await expect(
      mutex.runExclusive(
        "doc-1",
        async () => {
          ran = true;
        },
        controller.signal,
        "apply_template"
      )
    ).rejects.toThrow('Operation "apply_template" was cancelled before it started');

    expect(ran).toBe(false);
    expect(mutex.isLocked("doc-1")).toBe(false);
  });

  it("drops a queued waiter whose signal aborts, and serves the rest", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const controller = new AbortController();
    const order: string[] = [];

    const holder = mutex.runExclusive("doc-1", async () => {
      await gate.promise;
      order.push("holder");
    });
    const cancelled = mutex.runExclusive(
      "doc-1",
      async () => {
        order.push("cancelled");
      },
      controller.signal
    );
    const last = mutex.runExclusive("doc-1", async () => {
      order.push("last");
    });

    controller.abort();
    await expect(cancelled).rejects.toBeInstanceOf(OperationCancelledError);
    expect(mutex.pendingCount("doc-1")).toBe(1);

    gate.resolve();
    await Promise.all([holder, last]);

    expect(order).toEqual(["holder", "last"]);
  });

  it("ignores an abort once the section is entered", async () => {
    const mutex = new KeyedMutex();
    const controller = new AbortController();

    const result = await mutex.runExclusive(
      "doc-1",
      async () => {
        controller.abort();
        return "finished";
      },
      controller.signal
    );

    expect(result).toBe("finished");
  });
});
