import type { Clock } from "@fabricops/contracts";
import { changeLogger, type FabricLogContext, type FabricLogger } from "@fabricops/telemetry";

import type {
  ChangeFailure,
  ChangeKind,
  ChangeReport,
  ChangeState,
  StateTransition,
} from "./types.js";

const ALLOWED_TRANSITIONS: Readonly<Record<ChangeState, ReadonlyArray<ChangeState>>> = {
  // Rollbacks enter the audit trail without a pre-check.
  received: ["prechecked", "committed", "failed", "cancelled"],
  prechecked: ["rejected", "committed", "failed", "cancelled"],
  committed: ["applied", "failed", "cancelled"],
  applied: ["succeeded", "failed"],
  rejected: [],
  succeeded: [],
  failed: [],
  cancelled: [],
};

export const isTerminalState = (state: ChangeState): boolean => ALLOWED_TRANSITIONS[state].length === 0;

type ReportDetails = Omit<ChangeReport, "changeId" | "kind" | "state" | "transitions" | "failure" | "results">;

/**
 * Mutable builder for one change report. Illegal transitions throw: they
 * can only come from a bug in the pipeline.
 */
export class ChangeTracker {
  private current: ChangeState = "received";
  private readonly transitions: StateTransition[] = [];
  private details: ReportDetails = {};
  private results: ChangeReport["results"] = [];
  private failure: ChangeFailure | undefined;
  private readonly logger: FabricLogger;

  constructor(
    readonly changeId: string,
    readonly kind: ChangeKind,
    private readonly clock: Clock,
    logger: FabricLogger,
  ) {
    this.logger = changeLogger(logger, { changeId, kind });
    this.transitions.push({ state: "received", at: clock.now().toISOString() });
    this.logger.info("orchestrator.change.received");
  }

  get state(): ChangeState {
    return this.current;
  }

  attach(details: ReportDetails): void {
    this.details = { ...this.details, ...details };
  }

  recordResults(results: ChangeReport["results"]): void {
    this.results = [...results];
  }

  moveTo(state: ChangeState, context: FabricLogContext = {}): void {
    if (!ALLOWED_TRANSITIONS[this.current].includes(state)) {
      throw new Error(`Illegal change transition ${this.current} -> ${state} for ${this.changeId}.`);
    }
    this.current = state;
    this.transitions.push({ state, at: this.clock.now().toISOString() });
    this.logger.info(`orchestrator.change.${state}`, context);
  }

  fail(failure: ChangeFailure, state: "failed" | "rejected" | "cancelled" = "failed"): ChangeReport {
    this.failure = failure;
    this.moveTo(state, { stage: failure.stage, code: failure.error.code });
    return this.report();
  }

  report(): ChangeReport {
    return Object.freeze({
      changeId: this.changeId,
      kind: this.kind,
      state: this.current,
      transitions: Object.freeze([...this.transitions]),
      ...this.details,
      results: Object.freeze([...this.results]),
      ...(this.failure ? { failure: this.failure } : {}),
    });
  }
}
