import type { ApplyOutcomeRecord, AuditRecord, AuditRecordSummary } from "@fabricops/contracts";

export const summarizeRecord = (
  record: AuditRecord,
  outcome: ApplyOutcomeRecord | null,
): AuditRecordSummary => ({
  commitId: record.commitId,
  device: record.device,
  interface: record.interface,
  author: record.author,
  committedAt: record.committedAt,
  parentCommitId: record.parentCommitId,
  kind: record.kind,
  ...(record.rollbackOf ? { rollbackOf: record.rollbackOf } : {}),
  message: record.message,
  applyStatus: outcome?.status ?? "pending",
});
