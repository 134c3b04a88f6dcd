import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createCoalescedRunner } from "../src";

describe("createCoalescedRunner", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs once per tick with the latest input", async () => {
    const task = vi.fn();
    const runner = createCoalescedRunner<number>(task);

    runner.schedule(1);
    runner.schedule(2);
    runner.schedule(3);
    expect(task).not.toHaveBeenCalled();

    await vi.runAllTimersAsync();

    expect(task).toHaveBeenCalledTimes(1);
    expect(task).toHaveBeenCalledWith(3);
    expect(runner.isPending()).toBe(false);
  });

  it("flushes the pending input immediately", async () => {
    const task = vi.fn();
    const runner = createCoalescedRunner<string>(task);

    runner.schedule("a");
    await runner.flush();
    await vi.runAllTimersAsync();

    expect(task).toHaveBeenCalledTimes(1);
    expect(task).toHaveBeenCalledWith("a");
  });

  it("drops the pending input on cancel", async () => {
    const task = vi.fn();
    const runner = createCoalescedRunner<number>(task);

    runner.schedule(1);
    runner.cancel();
    await vi.runAllTimersAsync();

    expect(task).not.toHaveBeenCalled();
  });

  it("reports task failures to onError", async () => {
    const onError = vi.fn();
    const boom = new Error("boom");
    const runner = createCoalescedRunner<number>(() => {
      throw boom;
    }, { onError });

    runner.schedule(1);
    await vi.runAllTimersAsync();

    expect(onError).toHaveBeenCalledWith(boom);
  });

  it("waits for a slow run before starting the next one", async () => {
    const done: number[] = [];
    const started: number[] = [];
    let active = 0;
    let maxActive = 0;

    const runner = createCoalescedRunner<number>(async (n) => {
      started.push(n);
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, n === 1 ? 50 : 5));
      active--;
      done.push(n);
    });

    runner.schedule(1);
    await vi.advanceTimersByTimeAsync(10);
    runner.schedule(2);
    runner.schedule(3);
    await vi.runAllTimersAsync();

    expect(started).toEqual([1, 3]);
    expect(done).toEqual([1, 3]);
    expect(maxActive).toBe(1);
  });

  it("flush resolves after the run in flight and the pending one", async () => {
    const done: number[] = [];
    const runner = createCoalescedRunner<number>(async (n) => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      done.push(n);
    });

    runner.schedule(1);
    await vi.advanceTimersByTimeAsync(1);
    runner.schedule(2);

    const flushed = runner.flush();
    await vi.runAllTimersAsync();
    await flushed;

    expect(done).toEqual([1, 2]);
  });
});
