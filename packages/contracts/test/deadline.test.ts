import { describe, expect, it } from "vitest";

import { ok, runWithDeadline, startWithDeadline } from "../src/index.js";

const never = (signal: AbortSignal) =>
  new Promise<never>((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });

describe("runWithDeadline", () => {
  it("passes through a result that arrives in time", async () => {
    const result = await runWithDeadline({ device: "leaf-01", timeoutMs: 1_000, stage: "apply" }, async () =>
      ok("done"),
    );
    expect(result).toEqual({ ok: true, value: "done" });
  });

  it("reports a timeout and aborts the task", async () => {
    let observed: AbortSignal | undefined;
    const result = await runWithDeadline({ device: "leaf-01", timeoutMs: 20, stage: "apply" }, (signal) => {
      observed = signal;
      return never(signal);
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("device.timeout");
      expect(result.error.details).toEqual({ device: "leaf-01", timeoutMs: 20 });
    }
    expect(observed?.aborted).toBe(true);
  });

  it("maps thrown errors to device.unreachable", async () => {
    const result = await runWithDeadline({ device: "leaf-02", timeoutMs: 1_000, stage: "apply" }, async () => {
      throw new Error("ECONNREFUSED");
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("device.unreachable");
      expect(result.error.details).toEqual({ device: "leaf-02", cause: "Error: ECONNREFUSED" });
    }
  });

  it("settles as cancelled when the caller aborts", async () => {
    const controller = new AbortController();
    const pending = runWithDeadline(
      { device: "leaf-01", timeoutMs: 5_000, stage: "precheck", signal: controller.signal },
      (signal) => never(signal),
    );
    controller.abort();

    const result = await pending;
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("change.cancelled");
      expect(result.error.details).toEqual({ stage: "precheck" });
    }
  });
});

describe("startWithDeadline", () => {
  it("settles the task separately from a timed-out result", async () => {
    let finishTask: () => void = () => undefined;
    let taskDone = false;
    const run = startWithDeadline({ device: "leaf-01", timeoutMs: 20, stage: "apply" }, async () => {
      await new Promise<void>((resolve) => {
        finishTask = resolve;
      });
      return ok("late");
    });
    const settled = run.settled.then(() => {
      taskDone = true;
    });

    const result = await run.result;
    expect(result.ok).toBe(false);
    expect(taskDone).toBe(false);

    finishTask();
    await settled;
    expect(taskDone).toBe(true);
  });
});
