import { describe, expect, it } from "vitest";
import { BackgroundTaskRegistry } from "../background-tasks.js";
import { deferred } from "../../__tests__/helpers/fixtures.js";

describe("BackgroundTaskRegistry", () => {
  it("tracks a task until it settles", async () => {
    const registry = new BackgroundTaskRegistry();
    const gate = deferred<string>();

    const outcome = registry.track("job-1", () => gate.promise);
    expect(registry.has("job-1")).toBe(true);
    expect(registry.size).toBe(1);

    gate.resolve("done");
    await expect(outcome).resolves.toBe("done");
    await registry.wait("job-1");
    expect(registry.has("job-1")).toBe(false);
  });

  it("refuses a second task under the same id", () => {
    const registry = new BackgroundTaskRegistry();
    const gate = deferred();
    void registry.track("job-1", () => gate.promise);

    expect(() => registry.track("job-1", () => gate.promise)).toThrow("Task already running: job-1");
    gate.resolve();
  });

  it("aborts the task's signal", async () => {
    const registry = new BackgroundTaskRegistry();
    const gate = deferred();
    let seen: AbortSignal | undefined;

    const outcome = registry.track("job-1", async (signal) => {
      seen = signal;
      await gate.promise;
      return signal.aborted;
    });

    expect(registry.abort("job-1")).toBe(true);
    expect(seen?.aborted).toBe(true);
    gate.resolve();
    await expect(outcome).resolves.toBe(true);
    expect(registry.abort("job-1")).toBe(false);
  });

  it("settles wait even when the task rejects", async () => {
    const registry = new BackgroundTaskRegistry();
    const outcome = registry.track("job-1", async () => {
      throw new Error("boom");
    });

    await expect(outcome).rejects.toThrow("boom");
    await expect(registry.wait("job-1")).resolves.toBeUndefined();
    await expect(registry.wait("unknown")).resolves.toBeUndefined();
  });

  it("waits for every task", async () => {
    const registry = new BackgroundTaskRegistry();
    const first = deferred();
    const second = deferred();
    void registry.track("a", () => first.promise);
    void registry.track("b", () => second.promise);

    let settled = false;
    const all = registry.waitAll().then(() => {
      settled = true;
    });
    first.resolve();
    await first.promise;
    expect(settled).toBe(false);

    second.resolve();
    await all;
    expect(settled).toBe(true);
  });
});
