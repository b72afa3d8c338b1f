import { describe, it, expect } from "vitest";
import { InFlightRegistry, Mutex, Semaphore } from "../src/utils/concurrency";

const tick = (ms = 5) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("Semaphore", () => {
  it("should require at least one permit", () => {
    expect(() => new Semaphore(0)).toThrow("Semaphore needs at least one permit, got 0");
  });

  it("should never run more tasks than permits", async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        semaphore.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await tick();
          active--;
        }),
      ),
    );

    expect(peak).toBe(2);
    expect(semaphore.activeCount).toBe(0);
  });

  it("should hand out permits in arrival order", async () => {
    const semaphore = new Semaphore(1);
    const started: number[] = [];

    await Promise.all(
      [0, 1, 2, 3].map((id) =>
        semaphore.run(async () => {
          started.push(id);
          await tick(1);
        }),
      ),
    );

    expect(started).toEqual([0, 1, 2, 3]);
  });

  it("should track active and pending counts", async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const second = semaphore.acquire();

    expect(semaphore.activeCount).toBe(1);
    expect(semaphore.pendingCount).toBe(1);

    semaphore.release();
    await second;
    expect(semaphore.activeCount).toBe(1);
    expect(semaphore.pendingCount).toBe(0);

    semaphore.release();
    expect(semaphore.activeCount).toBe(0);
  });

  it("should release the permit when a task fails", async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.run(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(semaphore.activeCount).toBe(0);
  });
});

describe("Mutex", () => {
  it("should serialize critical sections", async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const first = mutex.runExclusive(async () => {
      order.push("a:start");
      await tick(10);
      order.push("a:end");
    });
    const second = mutex.runExclusive(async () => {
      order.push("b:start");
      order.push("b:end");
    });
    await Promise.all([first, second]);

    expect(order).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("should keep working after a section fails", async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(() => Promise.reject(new Error("boom")))).rejects.toThrow(
      "boom",
    );
    await expect(mutex.runExclusive(async () => 42)).resolves.toBe(42);
  });
});

describe("InFlightRegistry", () => {
  it("should share one promise between callers of the same key", async () => {
    const registry = new InFlightRegistry<string, number>();
    const gate = deferred<number>();
    let starts = 0;
    const start = () => {
      starts++;
      return gate.promise;
    };

    const first = registry.join("k", start);
    const second = registry.join("k", start);

    expect(first.leader).toBe(true);
    expect(second.leader).toBe(false);
    expect(second.promise).toBe(first.promise);
    expect(starts).toBe(1);
    expect(registry.has("k")).toBe(true);

    gate.resolve(7);
    await expect(second.promise).resolves.toBe(7);
    expect(registry.has("k")).toBe(false);
  });

  it("should keep keys independent", () => {
    const registry = new InFlightRegistry<string, number>();
    registry.join("a", () => new Promise<number>(() => undefined));
    const other = registry.join("b", () => new Promise<number>(() => undefined));

    expect(other.leader).toBe(true);
    expect(registry.size).toBe(2);
  });

  it("should drop the entry when the work fails", async () => {
    const registry = new InFlightRegistry<string, number>();
    const gate = deferred<number>();
    const { promise } = registry.join("k", () => gate.promise);

    gate.reject(new Error("failed"));
    await expect(promise).rejects.toThrow("failed");
    expect(registry.has("k")).toBe(false);

    const next = registry.join("k", async () => 1);
    expect(next.leader).toBe(true);
  });
});
