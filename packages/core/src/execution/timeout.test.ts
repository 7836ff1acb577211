import { describe, it, expect, vi, afterEach } from "vitest";
import { withTimeout } from "./timeout.js";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("passes the promise through when no timeout is given", async () => {
    await expect(withTimeout(Promise.resolve(7), undefined, () => new Error("never"))).resolves.toBe(7);
  });

  it("resolves with the value when it settles first", async () => {
    vi.useFakeTimers();
    const result = withTimeout(Promise.resolve("done"), 1000, () => new Error("late"));
    await expect(result).resolves.toBe("done");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects with the timeout error when the timer fires first", async () => {
    vi.useFakeTimers();
    const outcome = withTimeout(new Promise<never>(() => {}), 20, () => new Error("too slow")).catch(
      (e: unknown) => e,
    );
    await vi.advanceTimersByTimeAsync(20);
    const err = await outcome;
    expect(err).toBeInstanceOf(Error);
    expect(err).toHaveProperty("message", "too slow");
  });

  it("propagates the promise's own rejection", async () => {
    await expect(
      withTimeout(Promise.reject(new Error("inner")), 1000, () => new Error("late")),
    ).rejects.toThrow("inner");
  });
});
