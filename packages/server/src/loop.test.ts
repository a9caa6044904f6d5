import { describe, it, expect, vi } from "vitest";
import { runLoop } from "./loop.js";

describe("runLoop", () => {
  it("repeats the iteration until aborted", async () => {
    const controller = new AbortController();
    let count = 0;

    await runLoop("test", 0, controller.signal, async () => {
      count++;
      if (count === 3) controller.abort();
    });

    expect(count).toBe(3);
  });

  it("logs a failed iteration and keeps going", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const controller = new AbortController();
    let count = 0;

    await runLoop("test", 0, controller.signal, async () => {
      count++;
      if (count === 1) throw new Error("boom");
      controller.abort();
    });

    expect(count).toBe(2);
    expect(error).toHaveBeenCalledWith("[MONITOR] test failed: boom");
  });

  it("stops while waiting for the next run", async () => {
    const controller = new AbortController();
    const iteration = vi.fn(async () => {});
    setTimeout(() => controller.abort(), 10);

    await runLoop("test", 60_000, controller.signal, iteration, { initialDelay: true });

    expect(iteration).not.toHaveBeenCalled();
  });

  it("does not run at all when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const iteration = vi.fn(async () => {});

    await runLoop("test", 0, controller.signal, iteration);

    expect(iteration).not.toHaveBeenCalled();
  });
});
