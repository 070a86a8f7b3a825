import {
  ok,
  runWithDeadline,
  systemClock,
  type ChangeRequest,
  type Clock,
  type DeviceExecutorPort,
  type FabricError,
  type PortConfigSnapshot,
  type PreCheckResult,
  type RawPortState,
  type Result,
} from "@fabricops/contracts";
import {
  createFabricCounter,
  createFabricLogger,
  getFabricTracer,
  markSpanFailed,
  runWithSpan,
  type FabricCounter,
  type FabricLogger,
  type FabricTracer,
} from "@fabricops/telemetry";

import { normalizeMacAddresses, normalizePortStatus } from "./normalize.js";
import { buildRecommendations } from "./recommendations.js";
import { parseRunningConfig } from "./running-config.js";
import { currentStateFromSnapshot, desiredStateFromRequest, evaluateSafety } from "./safety.js";

export const DEFAULT_PRECHECK_TIMEOUT_MS = 10_000;

export interface PreCheckOptions {
  readonly desired?: Pick<ChangeRequest, "mode" | "vlan" | "allowedVlans">;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface PreCheckEngineOptions {
  readonly executor: DeviceExecutorPort;
  readonly clock?: Clock;
  readonly logger?: FabricLogger;
  readonly tracer?: FabricTracer;
  readonly verdictCounter?: FabricCounter;
  readonly defaultTimeoutMs?: number;
}

/**
 * Builds a pre-check result from raw device state. The verdict is settled
 * before recommendations are written.
 */
export const assemblePreCheck = (
  device: string,
  iface: string,
  state: RawPortState,
  checkedAt: Date,
  desiredRequest?: PreCheckOptions["desired"],
): PreCheckResult => {
  const currentConfig: PortConfigSnapshot = state.exists
    ? parseRunningConfig(state.runningConfig ?? [])
    : Object.freeze({});
  const learnedMacAddresses: ReadonlyArray<string> = Object.freeze(
    state.exists ? normalizeMacAddresses(state.macAddresses ?? []) : [],
  );
  const adminStatus = state.exists ? normalizePortStatus(state.adminState) : "unknown";
  const operStatus = state.exists ? normalizePortStatus(state.operState) : "unknown";
  const desired = desiredRequest ? desiredStateFromRequest(desiredRequest) : undefined;

  const isSafe = evaluateSafety({
    portExists: state.exists,
    currentConfig,
    learnedMacAddresses,
    desired,
  });

  const recommendations = buildRecommendations({
    device,
    interface: iface,
    portExists: state.exists,
    adminStatus,
    operStatus,
    learnedMacAddresses,
    current: currentStateFromSnapshot(currentConfig),
    desired,
    isSafe,
  });

  return Object.freeze({
    device,
    interface: iface,
    portExists: state.exists,
    adminStatus,
    operStatus,
    currentConfig,
    learnedMacAddresses,
    recommendations: Object.freeze(recommendations),
    isSafe,
    checkedAt: checkedAt.toISOString(),
  });
};

export class PreCheckEngine {
  private readonly executor: DeviceExecutorPort;
  private readonly clock: Clock;
  private readonly logger: FabricLogger;
  private readonly tracer: FabricTracer;
  private readonly verdictCounter: FabricCounter;
  private readonly defaultTimeoutMs: number;

  constructor(options: PreCheckEngineOptions) {
    this.executor = options.executor;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createFabricLogger({ name: "precheck" });
    this.tracer = options.tracer ?? getFabricTracer({ name: "precheck" });
    this.verdictCounter =
      options.verdictCounter ??
      createFabricCounter("precheck_verdicts_total", {
        description: "Pre-check verdicts by outcome.",
        instrumentation: { name: "precheck" },
      });
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_PRECHECK_TIMEOUT_MS;
  }

  async check(
    device: string,
    iface: string,
    options: PreCheckOptions = {},
  ): Promise<Result<PreCheckResult, FabricError>> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    return runWithSpan(
      this.tracer,
      "precheck.check",
      async (span): Promise<Result<PreCheckResult, FabricError>> => {
        const state = await runWithDeadline(
          { device, timeoutMs, signal: options.signal, stage: "precheck" },
          (signal) => this.executor.readState(device, iface, { timeoutMs, signal }),
        );
        if (!state.ok) {
          markSpanFailed(span, state.error.code, state.error.message);
          this.verdictCounter.add(1, { outcome: "error" });
          this.logger.warn("precheck.read_failed", {
            device,
            interface: iface,
            code: state.error.code,
          });
          return state;
        }

        const result = assemblePreCheck(device, iface, state.value, this.clock.now(), options.desired);
        span.setAttribute("fabric.precheck.safe", result.isSafe);
        this.verdictCounter.add(1, { outcome: result.isSafe ? "safe" : "unsafe" });
        this.logger.info("precheck.completed", {
          device,
          interface: iface,
          isSafe: result.isSafe,
          learnedMacs: result.learnedMacAddresses.length,
        });
        return ok(result);
      },
      { attributes: { "fabric.device": device, "fabric.interface": iface } },
    );
  }
}

export const createPreCheckEngine = (options: PreCheckEngineOptions): PreCheckEngine =>
  new PreCheckEngine(options);
