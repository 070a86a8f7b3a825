import type {
  ApplyOutcomeRecord,
  ApplyResult,
  AuditRecord,
  ChangeRequest,
  ConfigurationArtifact,
  FabricError,
  PreCheckResult,
} from "@fabricops/contracts";

export type ChangeState =
  | "received"
  | "prechecked"
  | "rejected"
  | "committed"
  | "applied"
  | "succeeded"
  | "failed"
  | "cancelled";

export type ChangeStage = "validate" | "precheck" | "synthesize" | "commit" | "apply" | "record";

export type ChangeKind = "configure" | "rollback";

export interface StateTransition {
  readonly state: ChangeState;
  readonly at: string;
}

export interface ChangeFailure {
  readonly stage: ChangeStage;
  readonly error: FabricError;
}

/**
 * Everything one change went through. `commit` is present once the intent
 * is in the audit trail, whether or not the network accepted it.
 */
export interface ChangeReport {
  readonly changeId: string;
  readonly kind: ChangeKind;
  readonly state: ChangeState;
  readonly transitions: ReadonlyArray<StateTransition>;
  readonly request?: ChangeRequest;
  readonly precheck?: PreCheckResult;
  readonly artifact?: ConfigurationArtifact;
  readonly commit?: AuditRecord;
  readonly results: ReadonlyArray<ApplyResult>;
  readonly outcome?: ApplyOutcomeRecord;
  readonly failure?: ChangeFailure;
}

export interface ConfigureOptions {
  readonly signal?: AbortSignal;
}

export interface RollbackOptions {
  readonly author?: string;
  /** Defaults to true; false only records the rollback intent. */
  readonly apply?: boolean;
  readonly signal?: AbortSignal;
}

export interface HealthReport {
  readonly healthy: boolean;
  readonly checks: Readonly<Record<"store" | "inventory", { readonly ok: boolean; readonly code?: string }>>;
}
