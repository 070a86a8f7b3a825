import {
  startWithDeadline,
  type ApplyResult,
  type ApplyTarget,
  type DeviceExecutorPort,
  type FabricError,
  type Result,
} from "@fabricops/contracts";
import { runWithSpan } from "@fabricops/telemetry";

import {
  createFleetExecutorTelemetry,
  type FleetExecutorTelemetryContext,
  type FleetExecutorTelemetryOptions,
} from "./telemetry.js";
import { WorkerPool, type HeldTask } from "./worker-pool.js";

export const DEFAULT_POOL_SIZE = 16;
export const DEFAULT_DEVICE_TIMEOUT_MS = 30_000;

export interface FleetApplyOptions {
  /** Caps how many of this call's devices run at once, inside the shared pool. */
  readonly concurrencyLimit?: number;
  readonly perDeviceTimeoutMs?: number;
}

export interface DeviceFleetExecutorOptions {
  readonly executor: DeviceExecutorPort;
  readonly pool?: WorkerPool;
  readonly poolSize?: number;
  readonly defaultTimeoutMs?: number;
  readonly telemetry?: FleetExecutorTelemetryOptions;
}

export class DeviceFleetExecutor {
  private readonly executor: DeviceExecutorPort;
  private readonly pool: WorkerPool;
  private readonly defaultTimeoutMs: number;
  private readonly telemetry: FleetExecutorTelemetryContext;

  constructor(options: DeviceFleetExecutorOptions) {
    this.executor = options.executor;
    this.pool = options.pool ?? new WorkerPool(options.poolSize ?? DEFAULT_POOL_SIZE);
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_DEVICE_TIMEOUT_MS;
    this.telemetry = createFleetExecutorTelemetry(options.telemetry);
  }

  /**
   * Applies every target and resolves once all have settled. Results are in
   * completion order; a failing device never affects the others.
   */
  async apply(targets: ReadonlyArray<ApplyTarget>, options: FleetApplyOptions = {}): Promise<ApplyResult[]> {
    const timeoutMs = options.perDeviceTimeoutMs ?? this.defaultTimeoutMs;
    const limiter =
      options.concurrencyLimit !== undefined
        ? new WorkerPool(Math.max(1, Math.floor(options.concurrencyLimit)))
        : null;

    return runWithSpan(
      this.telemetry.tracer,
      "fleet.apply",
      async (span) => {
        const results: ApplyResult[] = [];
        const schedule = (target: ApplyTarget): Promise<ApplyResult> => {
          const unit = () => this.pool.hold(() => this.applyOne(target, timeoutMs));
          return limiter ? limiter.run(unit) : unit();
        };

        await Promise.all(
          targets.map(async (target) => {
            results.push(await schedule(target));
          }),
        );

        const failed = results.filter((result) => !result.success).length;
        span.setAttribute("fabric.fleet.failed", failed);
        this.telemetry.logger.info("fleet.apply.completed", {
          devices: targets.length,
          succeeded: results.length - failed,
          failed,
        });
        return results;
      },
      { attributes: { "fabric.fleet.devices": targets.length, "fabric.fleet.timeout_ms": timeoutMs } },
    );
  }

  private applyOne(target: ApplyTarget, timeoutMs: number): HeldTask<ApplyResult> {
    const started = performance.now();
    const run = startWithDeadline({ device: target.device, timeoutMs, stage: "apply" }, (signal) =>
      this.executor.applyCommands(target.device, target.artifact.lines, { timeoutMs, signal }),
    );
    return { result: run.result.then((outcome) => this.report(target, outcome, started)), settled: run.settled };
  }

  private report(target: ApplyTarget, outcome: Result<void, FabricError>, started: number): ApplyResult {
    const durationMs = Math.round(performance.now() - started);
    const label = outcome.ok ? "success" : outcome.error.code;

    this.telemetry.metrics.resultCounter.add(1, { outcome: label });
    this.telemetry.metrics.applyDuration.record(durationMs, { outcome: label });

    if (!outcome.ok) {
      this.telemetry.logger.warn("fleet.apply.device_failed", {
        device: target.device,
        code: outcome.error.code,
        durationMs,
      });
      return { device: target.device, success: false, error: outcome.error, durationMs };
    }

    this.telemetry.logger.debug("fleet.apply.device_succeeded", { device: target.device, durationMs });
    return { device: target.device, success: true, durationMs };
  }
}

export const createDeviceFleetExecutor = (options: DeviceFleetExecutorOptions): DeviceFleetExecutor =>
  new DeviceFleetExecutor(options);
