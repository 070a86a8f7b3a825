import type { ApplyResult } from "./apply.js";
import type { ConfigurationArtifact } from "./change.js";

export type AuditRecordKind = "change" | "rollback";

export interface AuditRecord {
  readonly commitId: string;
  readonly sequence: number;
  readonly device: string;
  readonly interface: string;
  readonly artifact: ConfigurationArtifact;
  readonly author: string;
  readonly committedAt: string;
  readonly parentCommitId: string | null;
  readonly kind: AuditRecordKind;
  readonly rollbackOf?: string;
  readonly message: string;
}

export interface CommitInput {
  readonly device: string;
  readonly interface: string;
  readonly artifact: ConfigurationArtifact;
  readonly author: string;
  readonly kind?: AuditRecordKind;
  readonly rollbackOf?: string;
}

export interface HistoryQuery {
  readonly device?: string;
  readonly interface?: string;
  readonly limit?: number;
}

export type ApplyOutcomeStatus = "succeeded" | "failed";

export interface ApplyOutcomeRecord {
  readonly commitId: string;
  readonly status: ApplyOutcomeStatus;
  readonly results: ReadonlyArray<ApplyResult>;
  readonly recordedAt: string;
}

export interface AuditRecordSummary {
  readonly commitId: string;
  readonly device: string;
  readonly interface: string;
  readonly author: string;
  readonly committedAt: string;
  readonly parentCommitId: string | null;
  readonly kind: AuditRecordKind;
  readonly rollbackOf?: string;
  readonly message: string;
  readonly applyStatus: ApplyOutcomeStatus | "pending";
}
