export {
  FileAuditStore,
  createFileAuditStore,
  openFileAuditStore,
  DEFAULT_HISTORY_LIMIT,
} from "./file-audit-store.js";
export type { FileAuditStoreOptions } from "./file-audit-store.js";
export { createNodeFsPersistence } from "./persistence.js";
export type { AuditPersistence } from "./persistence.js";
export { createMemoryPersistence } from "./memory-persistence.js";
export type { MemoryAuditPersistence } from "./memory-persistence.js";
export { KeyedMutex } from "./keyed-mutex.js";
export { computeCommitId, stableStringify, COMMIT_ID_LENGTH } from "./commit-id.js";
export type { CommitDigestInput } from "./commit-id.js";
export { summarizeRecord } from "./summary.js";
