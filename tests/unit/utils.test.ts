import { afterEach, describe, expect, it, vi } from "vitest";
import { exitCodeFor } from "../../src/commands/signals.ts";
import { generateConnectionId, isProcessAlive, safeEqual, safeKill, withTimeout } from "../../src/lib/utils.ts";

afterEach(() => {
  vi.useRealTimers();
});

describe("safeEqual", () => {
  it("matches identical strings only", () => {
    expect(safeEqual("test-secret", "test-secret")).toBe(true);
    expect(safeEqual("test-secreT", "test-secret")).toBe(false);
    expect(safeEqual("test", "test-secret")).toBe(false);
    expect(safeEqual(undefined, "test-secret")).toBe(false);
  });
});

describe("withTimeout", () => {
  it("resolves with the value when it settles in time", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, () => new Error("late"))).resolves.toBe(42);
  });

  it("rejects with the timeout error once the deadline passes", async () => {
    vi.useFakeTimers();
    const never = new Promise<number>(() => {});
    const raced = withTimeout(never, 5000, () => new Error("handshake timeout"));
    const assertion = expect(raced).rejects.toThrow("handshake timeout");
    await vi.advanceTimersByTimeAsync(5000);
    await assertion;
  });

  it("passes the original rejection through", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 1000, () => new Error("late"))).rejects.toThrow("boom");
  });
});

describe("process helpers", () => {
  it("sees the current process as alive", () => {
    expect(isProcessAlive(process.pid)).toBe(true);
    expect(safeKill(process.pid, 0)).toBe(true);
  });

  it("generates short connection ids", () => {
    expect(generateConnectionId()).toMatch(/^c-[0-9a-f]{8}$/);
  });

  it("maps SIGINT to 130", () => {
    expect(exitCodeFor("SIGINT")).toBe(130);
    expect(exitCodeFor("SIGTERM")).toBe(0);
  });
});
