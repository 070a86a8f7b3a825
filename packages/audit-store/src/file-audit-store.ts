import {
  createNotFoundError,
  createStoreCorruptionError,
  err,
  ok,
  systemClock,
  type ApplyOutcomeRecord,
  type AuditRecord,
  type AuditRecordKind,
  type AuditStorePort,
  type Clock,
  type CommitInput,
  type ConfigurationArtifact,
  type FabricError,
  type HistoryQuery,
  type RecordOutcomeInput,
  type Result,
} from "@fabricops/contracts";
import { createFabricLogger, type FabricLogger } from "@fabricops/telemetry";
import type { z } from "zod";

import { computeCommitId, withCollisionSuffix } from "./commit-id.js";
import { KeyedMutex } from "./keyed-mutex.js";
import {
  SEGMENTS_DIR,
  SEQUENCES_DIR,
  chainLinkPath,
  commitIndexPath,
  encodeComponent,
  isCommitId,
  outcomePath,
  parseRecordFileName,
  parseSequenceClaim,
  recordFileName,
  segmentDirectory,
  sequenceClaimPath,
  segmentKey,
  type SegmentEntry,
} from "./layout.js";
import type { AuditPersistence } from "./persistence.js";
import {
  applyOutcomeSchema,
  auditRecordSchema,
  commitIndexSchema,
  type CommitIndexEntry,
} from "./schemas.js";

export interface FileAuditStoreOptions {
  readonly persistence: AuditPersistence;
  readonly clock?: Clock;
  readonly logger?: FabricLogger;
  readonly defaultHistoryLimit?: number;
}

export const DEFAULT_HISTORY_LIMIT = 50;

const MAX_CLAIM_ATTEMPTS = 32;

class CorruptEntryError extends Error {
  constructor(readonly path: string, reason: string) {
    super(`${path}: ${reason}`);
    this.name = "CorruptEntryError";
  }
}

const decode = <TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  path: string,
  text: string,
): z.infer<TSchema> => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CorruptEntryError(path, error instanceof Error ? error.message : "unparsable JSON");
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptEntryError(path, parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  return parsed.data;
};

const serialize = (value: unknown): string => `${JSON.stringify(value, null, 2)}\n`;

const freezeArtifact = (artifact: ConfigurationArtifact): ConfigurationArtifact =>
  Object.freeze({
    device: artifact.device,
    interface: artifact.interface,
    lines: Object.freeze([...artifact.lines]),
    text: artifact.text,
    synthesizedAt: artifact.synthesizedAt,
  });

const freezeRecord = (record: AuditRecord): AuditRecord =>
  Object.freeze({ ...record, artifact: freezeArtifact(record.artifact) });

const describeCommit = (
  kind: AuditRecordKind,
  device: string,
  iface: string,
  rollbackOf: string | undefined,
): string =>
  kind === "rollback" && rollbackOf
    ? `Rollback ${device} ${iface} to ${rollbackOf}`
    : `Configure ${device} ${iface}`;

const bySequenceDescending = (a: SegmentEntry, b: SegmentEntry): number => b.sequence - a.sequence;

/**
 * Append-only audit trail. Each device/interface pair owns one history
 * segment; records are never rewritten once their file exists.
 *
 * Several instances may share one persistence root. Sequence numbers are
 * claimed with exclusive creates under `sequences/`, and each record first
 * claims the chain link after its parent, so a writer that lost a race
 * re-reads the head and tries again.
 */
export class FileAuditStore implements AuditStorePort {
  private readonly persistence: AuditPersistence;
  private readonly clock: Clock;
  private readonly logger: FabricLogger;
  private readonly defaultHistoryLimit: number;
  private readonly mutex = new KeyedMutex();
  // Lowest candidate for the next sequence claim; other writers may be ahead.
  private sequence = 0;
  private ready: Promise<void> | null = null;
  private failure: FabricError | null = null;

  constructor(options: FileAuditStoreOptions) {
    this.persistence = options.persistence;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createFabricLogger({ name: "audit-store" });
    this.defaultHistoryLimit = options.defaultHistoryLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  async initialize(): Promise<Result<void, FabricError>> {
    return this.guard("initialize", async () => ok(undefined));
  }

  async commit(input: CommitInput): Promise<Result<AuditRecord, FabricError>> {
    return this.mutex.runExclusive(segmentKey(input.device, input.interface), () =>
      this.guard("commit", () => this.appendRecord(input)),
    );
  }

  async get(commitId: string): Promise<Result<AuditRecord, FabricError>> {
    return this.guard("get", async () => {
      const record = await this.findRecord(commitId);
      return record ? ok(record) : err(createNotFoundError("Commit", commitId));
    });
  }

  async current(device: string, iface: string): Promise<Result<AuditRecord | null, FabricError>> {
    return this.guard("current", async () => {
      const head = await this.readPersistedHead(device, iface);
      if (!head) {
        return ok(null);
      }
      return ok(await this.readRecord(head.path));
    });
  }

  async history(query: HistoryQuery = {}): Promise<Result<ReadonlyArray<AuditRecord>, FabricError>> {
    const limit = query.limit ?? this.defaultHistoryLimit;
    const records: AuditRecord[] = [];
    for await (const entry of this.iterateHistory({ ...query, limit })) {
      if (!entry.ok) {
        return entry;
      }
      records.push(entry.value);
    }
    return ok(records);
  }

  async *iterateHistory(query: HistoryQuery = {}): AsyncGenerator<Result<AuditRecord, FabricError>> {
    const limit = query.limit ?? Number.POSITIVE_INFINITY;
    if (limit <= 0) {
      return;
    }

    const listed = await this.guard("history", async () => ok(await this.listEntries(query)));
    if (!listed.ok) {
      yield listed;
      return;
    }

    const entries = [...listed.value].sort(bySequenceDescending);
    let emitted = 0;
    for (const entry of entries) {
      if (emitted >= limit) {
        return;
      }
      const record = await this.guard("history", async () => ok(await this.readRecord(entry.path)));
      yield record;
      if (!record.ok) {
        return;
      }
      emitted += 1;
    }
  }

  async rollback(commitId: string, author: string): Promise<Result<AuditRecord, FabricError>> {
    const target = await this.get(commitId);
    if (!target.ok) {
      return target;
    }

    const record = await this.commit({
      device: target.value.device,
      interface: target.value.interface,
      artifact: target.value.artifact,
      author,
      kind: "rollback",
      rollbackOf: target.value.commitId,
    });
    if (record.ok) {
      this.logger.info("audit.rollback.committed", {
        commitId: record.value.commitId,
        rollbackOf: commitId,
        device: record.value.device,
        interface: record.value.interface,
      });
    }
    return record;
  }

  async recordOutcome(
    commitId: string,
    outcome: RecordOutcomeInput,
  ): Promise<Result<ApplyOutcomeRecord, FabricError>> {
    return this.guard("recordOutcome", async () => {
      const record = await this.findRecord(commitId);
      if (!record) {
        return err(createNotFoundError("Commit", commitId));
      }

      const stored: ApplyOutcomeRecord = Object.freeze({
        commitId,
        status: outcome.status,
        results: outcome.results.map((result) => ({ ...result })),
        recordedAt: this.clock.now().toISOString(),
      });
      await this.persistence.writeAtomic(outcomePath(commitId), serialize(stored));
      this.logger.debug("audit.outcome.recorded", { commitId, status: stored.status });
      return ok(stored);
    });
  }

  async getOutcome(commitId: string): Promise<Result<ApplyOutcomeRecord | null, FabricError>> {
    return this.guard("getOutcome", async () => {
      if (!isCommitId(commitId)) {
        return ok(null);
      }
      const path = outcomePath(commitId);
      const text = await this.persistence.readText(path);
      return ok(text === null ? null : decode(applyOutcomeSchema, path, text));
    });
  }

  private async appendRecord(input: CommitInput): Promise<Result<AuditRecord, FabricError>> {
    const kind = input.kind ?? "change";
    const directory = segmentDirectory(input.device, input.interface);

    for (let attempt = 0; attempt < MAX_CLAIM_ATTEMPTS; attempt += 1) {
      const head = await this.resolveHead(input.device, input.interface);
      const sequence = await this.claimSequence(head?.sequence ?? 0);
      const committedAt = this.clock.now().toISOString();
      const parentCommitId = head?.commitId ?? null;

      const baseId = computeCommitId({
        device: input.device,
        interface: input.interface,
        lines: input.artifact.lines,
        author: input.author,
        committedAt,
        sequence,
        parentCommitId,
        kind,
      });
      const claim = await this.claimCommitId(baseId, (commitId) => ({
        commitId,
        device: input.device,
        interface: input.interface,
        sequence,
        path: `${directory}/${recordFileName(sequence, commitId)}`,
      }));

      const linkPath = chainLinkPath(input.device, input.interface, parentCommitId);
      if (!(await this.persistence.createExclusive(linkPath, serialize(claim)))) {
        await this.persistence.remove(commitIndexPath(claim.commitId));
        this.logger.warn("audit.commit.head_moved", {
          device: input.device,
          interface: input.interface,
          parentCommitId,
          attempt,
        });
        continue;
      }

      const record = freezeRecord({
        commitId: claim.commitId,
        sequence,
        device: input.device,
        interface: input.interface,
        artifact: input.artifact,
        author: input.author,
        committedAt,
        parentCommitId,
        kind,
        ...(input.rollbackOf ? { rollbackOf: input.rollbackOf } : {}),
        message: describeCommit(kind, input.device, input.interface, input.rollbackOf),
      });

      try {
        await this.persistence.writeAtomic(claim.path, serialize(record));
      } catch (error) {
        await this.persistence.remove(linkPath);
        await this.persistence.remove(commitIndexPath(claim.commitId));
        throw error;
      }

      this.logger.debug("audit.commit.created", {
        commitId: record.commitId,
        sequence,
        device: record.device,
        interface: record.interface,
        kind,
      });
      return ok(record);
    }
    throw new Error(`Unable to append to ${input.device} ${input.interface}: its head kept moving.`);
  }

  private async claimSequence(floor: number): Promise<number> {
    let candidate = Math.max(this.sequence, floor) + 1;
    const claimed = (sequence: number) =>
      this.persistence.createExclusive(sequenceClaimPath(sequence), serialize({ sequence }));
    while (!(await claimed(candidate))) {
      candidate += 1;
    }
    this.sequence = candidate;
    return candidate;
  }

  private async claimCommitId(
    baseId: string,
    buildEntry: (commitId: string) => CommitIndexEntry,
  ): Promise<CommitIndexEntry> {
    for (let attempt = 0; attempt < MAX_CLAIM_ATTEMPTS; attempt += 1) {
      const entry = buildEntry(withCollisionSuffix(baseId, attempt));
      if (await this.persistence.createExclusive(commitIndexPath(entry.commitId), serialize(entry))) {
        return entry;
      }
      this.logger.warn("audit.commit.id_collision", { commitId: entry.commitId, attempt });
    }
    throw new Error(`Unable to claim a commit id derived from ${baseId}.`);
  }

  private async findRecord(commitId: string): Promise<AuditRecord | null> {
    if (!isCommitId(commitId)) {
      return null;
    }
    const indexPath = commitIndexPath(commitId);
    const indexText = await this.persistence.readText(indexPath);
    if (indexText === null) {
      return null;
    }
    const index = decode(commitIndexSchema, indexPath, indexText);
    const recordText = await this.persistence.readText(index.path);
    // A claimed id without its record belongs to an unfinished commit.
    if (recordText === null) {
      return null;
    }
    return this.parseRecord(index.path, recordText);
  }

  private async readRecord(path: string): Promise<AuditRecord> {
    const text = await this.persistence.readText(path);
    if (text === null) {
      throw new CorruptEntryError(path, "record listed but missing");
    }
    return this.parseRecord(path, text);
  }

  private parseRecord(path: string, text: string): AuditRecord {
    return freezeRecord(decode(auditRecordSchema, path, text));
  }

  private async readPersistedHead(device: string, iface: string): Promise<SegmentEntry | null> {
    const entries = await this.listSegment(segmentDirectory(device, iface));
    return entries.reduce<SegmentEntry | null>(
      (latest, entry) => (latest === null || entry.sequence > latest.sequence ? entry : latest),
      null,
    );
  }

  /** Follows chain links past the last written record, including claims still in flight. */
  private async resolveHead(device: string, iface: string): Promise<SegmentEntry | null> {
    let head = await this.readPersistedHead(device, iface);
    for (;;) {
      const path = chainLinkPath(device, iface, head?.commitId ?? null);
      const text = await this.persistence.readText(path);
      if (text === null) {
        return head;
      }
      const link = decode(commitIndexSchema, path, text);
      if (link.sequence <= (head?.sequence ?? 0)) {
        throw new CorruptEntryError(path, "chain link does not move forward");
      }
      head = { sequence: link.sequence, commitId: link.commitId, path: link.path };
    }
  }

  private async listSegment(directory: string): Promise<SegmentEntry[]> {
    const names = await this.persistence.list(directory);
    const entries: SegmentEntry[] = [];
    for (const name of names) {
      const entry = parseRecordFileName(directory, name);
      if (!entry) {
        throw new CorruptEntryError(`${directory}/${name}`, "unexpected file in history segment");
      }
      entries.push(entry);
    }
    return entries;
  }

  private async listEntries(query: HistoryQuery): Promise<SegmentEntry[]> {
    const devices =
      query.device !== undefined
        ? [encodeComponent(query.device)]
        : await this.persistence.list(SEGMENTS_DIR);

    const entries: SegmentEntry[] = [];
    for (const device of devices) {
      const interfaces =
        query.interface !== undefined
          ? [encodeComponent(query.interface)]
          : await this.persistence.list(`${SEGMENTS_DIR}/${device}`);
      for (const iface of interfaces) {
        entries.push(...(await this.listSegment(`${SEGMENTS_DIR}/${device}/${iface}`)));
      }
    }
    return entries;
  }

  private async loadSequence(): Promise<void> {
    for (const name of await this.persistence.list(SEQUENCES_DIR)) {
      const sequence = parseSequenceClaim(name);
      if (sequence === null) {
        throw new CorruptEntryError(`${SEQUENCES_DIR}/${name}`, "unexpected sequence claim");
      }
      this.sequence = Math.max(this.sequence, sequence);
    }
  }

  private async guard<T>(
    operation: string,
    task: () => Promise<Result<T, FabricError>>,
  ): Promise<Result<T, FabricError>> {
    if (this.failure) {
      return err(this.failure);
    }
    try {
      this.ready ??= this.loadSequence();
      await this.ready;
      return await task();
    } catch (error) {
      if (!this.failure) {
        this.failure = createStoreCorruptionError(
          `Audit store is unreadable (${operation}); reopen it after repairing the persistence.`,
          error,
        );
        this.logger.error("audit.store.corrupted", { operation, error });
      }
      return err(this.failure);
    }
  }
}

export const createFileAuditStore = (options: FileAuditStoreOptions): FileAuditStore =>
  new FileAuditStore(options);

/**
 * Opens a store and reads the claimed sequence numbers so new commits start
 * past the persisted history.
 */
export const openFileAuditStore = async (
  options: FileAuditStoreOptions,
): Promise<Result<FileAuditStore, FabricError>> => {
  const store = new FileAuditStore(options);
  const ready = await store.initialize();
  return ready.ok ? ok(store) : ready;
};
