import type {
  ApplyOutcomeRecord,
  AuditRecord,
  CommitInput,
  HistoryQuery,
} from "../../types/audit.js";
import type { FabricError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";

export type RecordOutcomeInput = Omit<ApplyOutcomeRecord, "commitId" | "recordedAt">;

export interface AuditStorePort {
  commit(input: CommitInput): Promise<Result<AuditRecord, FabricError>>;
  get(commitId: string): Promise<Result<AuditRecord, FabricError>>;
  current(device: string, iface: string): Promise<Result<AuditRecord | null, FabricError>>;
  history(query?: HistoryQuery): Promise<Result<ReadonlyArray<AuditRecord>, FabricError>>;
  iterateHistory(query?: HistoryQuery): AsyncIterable<Result<AuditRecord, FabricError>>;
  rollback(commitId: string, author: string): Promise<Result<AuditRecord, FabricError>>;
  recordOutcome(
    commitId: string,
    outcome: RecordOutcomeInput,
  ): Promise<Result<ApplyOutcomeRecord, FabricError>>;
  getOutcome(commitId: string): Promise<Result<ApplyOutcomeRecord | null, FabricError>>;
}
