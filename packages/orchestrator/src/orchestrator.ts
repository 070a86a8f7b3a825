import { randomUUID } from "node:crypto";

import type { Span } from "@opentelemetry/api";
import { summarizeRecord } from "@fabricops/audit-store";
import { validateChangeRequest } from "@fabricops/config-synth";
import {
  createCancelledError,
  createUnsafeToConfigureError,
  ErrorCodes,
  ok,
  systemClock,
  type ApplyOutcomeRecord,
  type ApplyResult,
  type AuditRecord,
  type AuditRecordSummary,
  type AuditStorePort,
  type ChangeRequest,
  type Clock,
  type ConfigRendererPort,
  type DeviceSummary,
  type FabricError,
  type HistoryQuery,
  type InventorySourcePort,
  type PreCheckResult,
  type Result,
} from "@fabricops/contracts";
import type { DeviceFleetExecutor, FleetApplyOptions } from "@fabricops/fleet-executor";
import { toDeviceSummary } from "@fabricops/inventory";
import type { PreCheckEngine } from "@fabricops/precheck";
import { markSpanFailed, runWithSpan } from "@fabricops/telemetry";

import { ChangeTracker } from "./change-tracker.js";
import {
  createOrchestratorTelemetry,
  type OrchestratorTelemetryContext,
  type OrchestratorTelemetryOptions,
} from "./telemetry.js";
import type {
  ChangeReport,
  ConfigureOptions,
  HealthReport,
  RollbackOptions,
} from "./types.js";

export const DEFAULT_AUTHOR = "api_user";

export interface ChangeOrchestratorDependencies {
  readonly precheck: PreCheckEngine;
  readonly renderer: ConfigRendererPort;
  readonly store: AuditStorePort;
  readonly fleet: DeviceFleetExecutor;
  readonly inventory: InventorySourcePort;
}

export interface ChangeOrchestratorOptions {
  readonly clock?: Clock;
  readonly idFactory?: () => string;
  readonly apply?: FleetApplyOptions;
  readonly precheckTimeoutMs?: number;
  readonly telemetry?: OrchestratorTelemetryOptions;
}

interface ApplyExecution {
  readonly results: ReadonlyArray<ApplyResult>;
  readonly outcome: Result<ApplyOutcomeRecord, FabricError>;
}

const ABORTED = Symbol("aborted");

const waitForAbort = (signal: AbortSignal): { promise: Promise<typeof ABORTED>; dispose: () => void } => {
  let listener: (() => void) | undefined;
  const promise = new Promise<typeof ABORTED>((resolve) => {
    listener = () => resolve(ABORTED);
    if (signal.aborted) {
      resolve(ABORTED);
    } else {
      signal.addEventListener("abort", listener, { once: true });
    }
  });
  return {
    promise,
    dispose: () => {
      if (listener) {
        signal.removeEventListener("abort", listener);
      }
    },
  };
};

const firstFailure = (results: ReadonlyArray<ApplyResult>): FabricError | undefined =>
  results.find((result) => !result.success)?.error;

/**
 * Drives a change through pre-check, synthesis, commit and apply. The commit
 * always precedes the apply, so the audit trail records intent even when the
 * network refuses it; apply outcomes are stored beside the commit.
 */
export class ChangeOrchestrator {
  private readonly clock: Clock;
  private readonly idFactory: () => string;
  private readonly applyOptions: FleetApplyOptions;
  private readonly precheckTimeoutMs: number | undefined;
  private readonly telemetry: OrchestratorTelemetryContext;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly deps: ChangeOrchestratorDependencies,
    options: ChangeOrchestratorOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.idFactory = options.idFactory ?? randomUUID;
    this.applyOptions = options.apply ?? {};
    this.precheckTimeoutMs = options.precheckTimeoutMs;
    this.telemetry = createOrchestratorTelemetry(options.telemetry);
  }

  async precheck(
    device: string,
    iface: string,
    options: { readonly signal?: AbortSignal } = {},
  ): Promise<Result<PreCheckResult, FabricError>> {
    return this.checkPort(device, iface, { signal: options.signal });
  }

  async configure(input: ChangeRequest, options: ConfigureOptions = {}): Promise<ChangeReport> {
    const tracker = this.createTracker("configure");
    return runWithSpan(this.telemetry.tracer, "orchestrator.configure", async (span) => {
      const report = await this.runConfigure(tracker, input, options.signal);
      this.finish(report, span);
      return report;
    });
  }

  async rollback(commitId: string, options: RollbackOptions = {}): Promise<ChangeReport> {
    const tracker = this.createTracker("rollback");
    return runWithSpan(
      this.telemetry.tracer,
      "orchestrator.rollback",
      async (span) => {
        const report = await this.runRollback(tracker, commitId, options);
        this.finish(report, span);
        return report;
      },
      { attributes: { "fabric.rollback_of": commitId } },
    );
  }

  async history(query: HistoryQuery = {}): Promise<Result<AuditRecordSummary[], FabricError>> {
    const records = await this.deps.store.history(query);
    if (!records.ok) {
      return records;
    }

    const summaries: AuditRecordSummary[] = [];
    for (const record of records.value) {
      const outcome = await this.deps.store.getOutcome(record.commitId);
      if (!outcome.ok) {
        return outcome;
      }
      summaries.push(summarizeRecord(record, outcome.value));
    }
    return ok(summaries);
  }

  async listDevices(): Promise<Result<DeviceSummary[], FabricError>> {
    const devices = await this.deps.inventory.list();
    if (!devices.ok) {
      return devices;
    }
    return ok(devices.value.map((device) => toDeviceSummary(device)));
  }

  async health(): Promise<HealthReport> {
    const [store, inventory] = await Promise.all([
      this.deps.store.history({ limit: 1 }),
      this.deps.inventory.list(),
    ]);
    const probe = (result: Result<unknown, FabricError>) =>
      result.ok ? { ok: true } : { ok: false, code: result.error.code };
    return {
      healthy: store.ok && inventory.ok,
      checks: { store: probe(store), inventory: probe(inventory) },
    };
  }

  /** Resolves once every apply that outlived its caller has been recorded. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  get pendingApplies(): number {
    return this.inFlight.size;
  }

  private createTracker(kind: ChangeReport["kind"]): ChangeTracker {
    return new ChangeTracker(this.idFactory(), kind, this.clock, this.telemetry.logger);
  }

  /** Unknown devices stop at the inventory; executors only see devices it lists. */
  private async checkPort(
    device: string,
    iface: string,
    options: { readonly desired?: ChangeRequest; readonly signal?: AbortSignal },
  ): Promise<Result<PreCheckResult, FabricError>> {
    const known = await this.deps.inventory.resolve(device);
    if (!known.ok) {
      return known;
    }
    return this.deps.precheck.check(device, iface, { ...options, timeoutMs: this.precheckTimeoutMs });
  }

  private async runConfigure(
    tracker: ChangeTracker,
    input: ChangeRequest,
    signal: AbortSignal | undefined,
  ): Promise<ChangeReport> {
    const validated = validateChangeRequest(input);
    if (!validated.ok) {
      return tracker.fail({ stage: "validate", error: validated.error });
    }
    const request = validated.value;
    tracker.attach({ request });

    if (signal?.aborted) {
      return tracker.fail({ stage: "precheck", error: createCancelledError("precheck") }, "cancelled");
    }

    const precheck = await this.checkPort(request.device, request.interface, { desired: request, signal });
    if (!precheck.ok) {
      return precheck.error.code === ErrorCodes.cancelled
        ? tracker.fail({ stage: "precheck", error: precheck.error }, "cancelled")
        : tracker.fail({ stage: "precheck", error: precheck.error });
    }
    tracker.attach({ precheck: precheck.value });
    tracker.moveTo("prechecked", { device: request.device, interface: request.interface });

    if (!precheck.value.isSafe) {
      return tracker.fail(
        {
          stage: "precheck",
          error: createUnsafeToConfigureError(request.device, request.interface, precheck.value.recommendations),
        },
        "rejected",
      );
    }

    const artifact = this.deps.renderer.render(request);
    if (!artifact.ok) {
      return tracker.fail({ stage: "synthesize", error: artifact.error });
    }
    tracker.attach({ artifact: artifact.value });

    if (signal?.aborted) {
      return tracker.fail({ stage: "commit", error: createCancelledError("commit") }, "cancelled");
    }

    const commit = await this.deps.store.commit({
      device: request.device,
      interface: request.interface,
      artifact: artifact.value,
      author: request.author ?? DEFAULT_AUTHOR,
    });
    if (!commit.ok) {
      return tracker.fail({ stage: "commit", error: commit.error });
    }

    return this.applyCommitted(tracker, commit.value, signal);
  }

  private async runRollback(
    tracker: ChangeTracker,
    commitId: string,
    options: RollbackOptions,
  ): Promise<ChangeReport> {
    if (options.signal?.aborted) {
      return tracker.fail({ stage: "commit", error: createCancelledError("commit") }, "cancelled");
    }

    const record = await this.deps.store.rollback(commitId, options.author ?? DEFAULT_AUTHOR);
    if (!record.ok) {
      return tracker.fail({ stage: "commit", error: record.error });
    }

    tracker.attach({ artifact: record.value.artifact });
    if (options.apply === false) {
      tracker.attach({ commit: record.value });
      tracker.moveTo("committed", { commitId: record.value.commitId, rollbackOf: commitId });
      return tracker.report();
    }
    return this.applyCommitted(tracker, record.value, options.signal);
  }

  private async applyCommitted(
    tracker: ChangeTracker,
    commit: AuditRecord,
    signal: AbortSignal | undefined,
  ): Promise<ChangeReport> {
    tracker.attach({ commit });
    tracker.moveTo("committed", {
      commitId: commit.commitId,
      device: commit.device,
      interface: commit.interface,
    });

    const execution = this.startApply(commit);

    if (signal) {
      const abort = waitForAbort(signal);
      const winner = await Promise.race([execution, abort.promise]);
      abort.dispose();
      if (winner === ABORTED) {
        this.telemetry.logger.warn("orchestrator.change.detached", {
          changeId: tracker.changeId,
          commitId: commit.commitId,
        });
        return tracker.fail({ stage: "apply", error: createCancelledError("apply") }, "cancelled");
      }
      return this.completeApply(tracker, winner);
    }

    return this.completeApply(tracker, await execution);
  }

  private completeApply(tracker: ChangeTracker, execution: ApplyExecution): ChangeReport {
    tracker.recordResults(execution.results);
    tracker.moveTo("applied", { devices: execution.results.length });

    if (!execution.outcome.ok) {
      return tracker.fail({ stage: "record", error: execution.outcome.error });
    }
    tracker.attach({ outcome: execution.outcome.value });

    const failure = firstFailure(execution.results);
    if (failure) {
      return tracker.fail({ stage: "apply", error: failure });
    }
    tracker.moveTo("succeeded");
    return tracker.report();
  }

  /**
   * Applies and records the outcome. The returned promise is tracked so a
   * caller that stops waiting does not lose the outcome record.
   */
  private startApply(commit: AuditRecord): Promise<ApplyExecution> {
    const execution = (async (): Promise<ApplyExecution> => {
      const results = await this.deps.fleet.apply(
        [{ device: commit.device, artifact: commit.artifact }],
        this.applyOptions,
      );
      const outcome = await this.deps.store.recordOutcome(commit.commitId, {
        status: results.every((result) => result.success) ? "succeeded" : "failed",
        results,
      });
      if (!outcome.ok) {
        this.telemetry.logger.error("orchestrator.outcome.record_failed", {
          commitId: commit.commitId,
          code: outcome.error.code,
        });
      }
      return { results, outcome };
    })();

    const settled = execution.then(
      () => undefined,
      (error: unknown) => {
        this.telemetry.logger.error("orchestrator.apply.crashed", { commitId: commit.commitId, error });
      },
    );
    this.inFlight.add(settled);
    void settled.then(() => {
      this.inFlight.delete(settled);
    });
    return execution;
  }

  private finish(report: ChangeReport, span: Span): void {
    span.setAttribute("fabric.change.state", report.state);
    if (report.failure) {
      markSpanFailed(span, report.failure.error.code, report.failure.error.message);
    }
    this.telemetry.metrics.changeCounter.add(1, { kind: report.kind, state: report.state });
  }
}

export const createChangeOrchestrator = (
  deps: ChangeOrchestratorDependencies,
  options: ChangeOrchestratorOptions = {},
): ChangeOrchestrator => new ChangeOrchestrator(deps, options);
