import {
  createCancelledError,
  createDeviceTimeoutError,
  createDeviceUnreachableError,
} from "./errors.js";
import type { FabricError } from "./types/domain-error.js";
import { err, type Result } from "./types/result.js";

export interface DeadlineOptions {
  readonly device: string;
  readonly timeoutMs: number;
  /** Caller cancellation; settles the call as `change.cancelled`. */
  readonly signal?: AbortSignal;
  readonly stage: string;
}

export interface DeadlineRun<T> {
  /** Settles at the deadline, on caller abort, or with the task, whichever comes first. */
  readonly result: Promise<Result<T, FabricError>>;
  /** Settles once the task itself has, however late. */
  readonly settled: Promise<void>;
}

const invoke = <T>(task: (signal: AbortSignal) => Promise<T>, signal: AbortSignal): Promise<T> => {
  try {
    return task(signal);
  } catch (error) {
    return Promise.reject(error);
  }
};

const ignore = (): void => undefined;

/**
 * Runs one device call under a timer. The result settles as soon as the
 * timer fires or the caller aborts, without waiting for the device; the task
 * sees the abort through its signal. Thrown errors become
 * `device.unreachable`.
 */
export const startWithDeadline = <T>(
  options: DeadlineOptions,
  task: (signal: AbortSignal) => Promise<Result<T, FabricError>>,
): DeadlineRun<T> => {
  const controller = new AbortController();
  if (options.signal?.aborted) {
    controller.abort(options.signal.reason);
    return { result: Promise.resolve(err(createCancelledError(options.stage))), settled: Promise.resolve() };
  }

  const pending = invoke(task, controller.signal);
  const result = new Promise<Result<T, FabricError>>((resolve) => {
    let settled = false;

    const finish = (outcome: Result<T, FabricError>): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      resolve(outcome);
    };

    const onAbort = (): void => {
      controller.abort(options.signal?.reason);
      finish(err(createCancelledError(options.stage)));
    };

    const timer = setTimeout(() => {
      controller.abort(new Error(`deadline of ${options.timeoutMs}ms exceeded`));
      finish(err(createDeviceTimeoutError(options.device, options.timeoutMs)));
    }, options.timeoutMs);

    options.signal?.addEventListener("abort", onAbort, { once: true });

    void pending.then(finish, (error: unknown) => finish(err(createDeviceUnreachableError(options.device, error))));
  });

  return { result, settled: pending.then(ignore, ignore) };
};

export const runWithDeadline = <T>(
  options: DeadlineOptions,
  task: (signal: AbortSignal) => Promise<Result<T, FabricError>>,
): Promise<Result<T, FabricError>> => startWithDeadline(options, task).result;
