/**
 * Orchestrator Retry Backoff — Unit Tests
 */

import { describe, it, expect } from "vitest";
import { CancelledError } from "../errors.js";
import { DEFAULT_BACKOFF, anySignal, computeBackoffDelay, sleep } from "./retry.js";

describe("computeBackoffDelay", () => {
  it("doubles from a 2s base", () => {
    expect([1, 2, 3, 4].map((attempt) => computeBackoffDelay(attempt))).toEqual([2_000, 4_000, 8_000, 16_000]);
  });

  it("caps at 60s", () => {
    expect(computeBackoffDelay(6)).toBe(60_000);
    expect(computeBackoffDelay(20)).toBe(60_000);
  });

  it("applies jitter within the configured fraction", () => {
    const options = { ...DEFAULT_BACKOFF, jitterFactor: 0.5 };
    expect(computeBackoffDelay(1, options, () => 0)).toBe(1_000);
    expect(computeBackoffDelay(1, options, () => 0.5)).toBe(2_000);
    expect(computeBackoffDelay(1, options, () => 1)).toBe(3_000);
  });

  it("keeps jittered delays under the cap", () => {
    expect(computeBackoffDelay(10, { ...DEFAULT_BACKOFF, jitterFactor: 0.5 }, () => 1)).toBe(60_000);
  });
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  it("rejects with the abort reason", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new CancelledError("stop"));
    await expect(pending).rejects.toThrow("stop");
  });

  it("rejects immediately on an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new CancelledError("already"));
    await expect(sleep(10_000, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});

describe("anySignal", () => {
  it("aborts with the reason of the first signal that aborts", () => {
    const a = new AbortController();
    const b = new AbortController();
    const combined = anySignal([a.signal, b.signal]);

    expect(combined.aborted).toBe(false);
    b.abort("second");
    expect(combined.aborted).toBe(true);
    expect(combined.reason).toBe("second");
  });

  it("starts aborted when an input already is", () => {
    const a = new AbortController();
    a.abort("early");
    expect(anySignal([a.signal]).reason).toBe("early");
  });
});
