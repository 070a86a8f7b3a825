import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import type { AuditRecord, Clock, ConfigurationArtifact } from "@fabricops/contracts";
import { createSilentLogger } from "@fabricops/telemetry";

import {
  computeCommitId,
  createFileAuditStore,
  createMemoryPersistence,
  createNodeFsPersistence,
  openFileAuditStore,
  summarizeRecord,
  type AuditPersistence,
} from "../src/index.js";

const FIXED_TIME = "2026-03-01T12:00:00.000Z";

const frozenClock: Clock = { now: () => new Date(FIXED_TIME) };

const buildArtifact = (device: string, iface: string, vlan: number): ConfigurationArtifact => {
  const lines = [
    `interface ${iface}`,
    "  switchport",
    "  switchport mode access",
    `  switchport access vlan ${vlan}`,
    "  no shutdown",
  ];
  return { device, interface: iface, lines, text: lines.join("\n"), synthesizedAt: FIXED_TIME };
};

const createStore = (persistence: AuditPersistence = createMemoryPersistence(), clock = frozenClock) =>
  createFileAuditStore({ persistence, clock, logger: createSilentLogger() });

const unwrap = <T>(result: { ok: true; value: T } | { ok: false; error: { code: string } }): T => {
  if (!result.ok) {
    throw new Error(`unexpected failure: ${result.error.code}`);
  }
  return result.value;
};

describe("FileAuditStore", () => {
  it("commits a record and reads it back by id", async () => {
    const store = createStore();
    const artifact = buildArtifact("leaf-01", "Eth1/1", 10);

    const committed = unwrap(
      await store.commit({ device: "leaf-01", interface: "Eth1/1", artifact, author: "alice" }),
    );

    expect(committed.commitId).toMatch(/^[0-9a-f]{12}$/);
    expect(committed.sequence).toBe(1);
    expect(committed.parentCommitId).toBeNull();
    expect(committed.kind).toBe("change");
    expect(committed.message).toBe("Configure leaf-01 Eth1/1");
    expect(committed.committedAt).toBe(FIXED_TIME);

    const loaded = unwrap(await store.get(committed.commitId));
    expect(loaded).toEqual(committed);
    expect(loaded.artifact.text).toBe(artifact.text);
  });

  it("assigns distinct ids to concurrent identical commits", async () => {
    const store = createStore();
    const artifact = buildArtifact("leaf-01", "Eth1/1", 10);

    const results = await Promise.all(
      Array.from({ length: 10 }, () =>
        store.commit({ device: "leaf-01", interface: "Eth1/1", artifact, author: "alice" }),
      ),
    );
    const records = results.map((result) => unwrap(result));

    expect(new Set(records.map((record) => record.commitId)).size).toBe(10);
    const ordered = [...records].sort((a, b) => a.sequence - b.sequence);
    expect(ordered.map((record) => record.sequence)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    ordered.forEach((record, index) => {
      expect(record.parentCommitId).toBe(index === 0 ? null : ordered[index - 1].commitId);
    });
  });

  it("suffixes a commit id that is already claimed", async () => {
    const persistence = createMemoryPersistence();
    const store = createStore(persistence);
    const artifact = buildArtifact("leaf-01", "Eth1/1", 10);
    const baseId = computeCommitId({
      device: "leaf-01",
      interface: "Eth1/1",
      lines: artifact.lines,
      author: "alice",
      committedAt: FIXED_TIME,
      sequence: 1,
      parentCommitId: null,
      kind: "change",
    });
    await persistence.createExclusive(`commits/${baseId}.json`, "{}");

    const record = unwrap(
      await store.commit({ device: "leaf-01", interface: "Eth1/1", artifact, author: "alice" }),
    );

    expect(record.commitId).toBe(`${baseId}-1`);
    expect(unwrap(await store.get(`${baseId}-1`)).sequence).toBe(1);
  });

  it("orders history by commit sequence even when the clock runs backwards", async () => {
    let millis = Date.parse(FIXED_TIME);
    const backwardsClock: Clock = {
      now: () => {
        millis -= 60_000;
        return new Date(millis);
      },
    };
    const store = createStore(createMemoryPersistence(), backwardsClock);

    const first = unwrap(
      await store.commit({
        device: "leaf-01",
        interface: "Eth1/1",
        artifact: buildArtifact("leaf-01", "Eth1/1", 10),
        author: "alice",
      }),
    );
    const second = unwrap(
      await store.commit({
        device: "leaf-02",
        interface: "Eth1/2",
        artifact: buildArtifact("leaf-02", "Eth1/2", 20),
        author: "bob",
      }),
    );
    const third = unwrap(
      await store.commit({
        device: "leaf-01",
        interface: "Eth1/1",
        artifact: buildArtifact("leaf-01", "Eth1/1", 30),
        author: "alice",
      }),
    );

    const history = unwrap(await store.history());
    expect(history.map((record) => record.commitId)).toEqual([
      third.commitId,
      second.commitId,
      first.commitId,
    ]);
    expect(third.parentCommitId).toBe(first.commitId);
    expect(second.parentCommitId).toBeNull();

    const leafOne = unwrap(await store.history({ device: "leaf-01" }));
    expect(leafOne.map((record) => record.commitId)).toEqual([third.commitId, first.commitId]);

    const latest = unwrap(await store.history({ limit: 1 }));
    expect(latest.map((record) => record.commitId)).toEqual([third.commitId]);
  });

  it("caps unrestricted history at fifty records by default", async () => {
    const store = createStore();
    for (let vlan = 1; vlan <= 55; vlan += 1) {
      unwrap(
        await store.commit({
          device: "leaf-01",
          interface: "Eth1/1",
          artifact: buildArtifact("leaf-01", "Eth1/1", vlan),
          author: "alice",
        }),
      );
    }

    const history = unwrap(await store.history());
    expect(history).toHaveLength(50);
    expect(history[0].sequence).toBe(55);
    expect(history[49].sequence).toBe(6);
  });

  it("streams history lazily through iterateHistory", async () => {
    const store = createStore();
    for (const vlan of [10, 20, 30]) {
      unwrap(
        await store.commit({
          device: "spine-01",
          interface: "Eth1/49",
          artifact: buildArtifact("spine-01", "Eth1/49", vlan),
          author: "alice",
        }),
      );
    }

    const seen: number[] = [];
    for await (const entry of store.iterateHistory({ interface: "Eth1/49" })) {
      seen.push(unwrap(entry).sequence);
      if (seen.length === 2) {
        break;
      }
    }
    expect(seen).toEqual([3, 2]);
  });

  it("returns the head record for a device interface", async () => {
    const store = createStore();
    expect(unwrap(await store.current("leaf-01", "Eth1/1"))).toBeNull();

    unwrap(
      await store.commit({
        device: "leaf-01",
        interface: "Eth1/1",
        artifact: buildArtifact("leaf-01", "Eth1/1", 10),
        author: "alice",
      }),
    );
    const latest = unwrap(
      await store.commit({
        device: "leaf-01",
        interface: "Eth1/1",
        artifact: buildArtifact("leaf-01", "Eth1/1", 20),
        author: "alice",
      }),
    );

    const head = unwrap(await store.current("leaf-01", "Eth1/1"));
    expect(head?.commitId).toBe(latest.commitId);
  });

  it("rolls back by appending a record that carries the target artifact", async () => {
    const store = createStore();
    const original = unwrap(
      await store.commit({
        device: "leaf-01",
        interface: "Eth1/1",
        artifact: buildArtifact("leaf-01", "Eth1/1", 10),
        author: "alice",
      }),
    );
    const replacement = unwrap(
      await store.commit({
        device: "leaf-01",
        interface: "Eth1/1",
        artifact: buildArtifact("leaf-01", "Eth1/1", 20),
        author: "alice",
      }),
    );

    const rollback = unwrap(await store.rollback(original.commitId, "carol"));

    expect(rollback.kind).toBe("rollback");
    expect(rollback.rollbackOf).toBe(original.commitId);
    expect(rollback.parentCommitId).toBe(replacement.commitId);
    expect(rollback.author).toBe("carol");
    expect(rollback.artifact.lines).toEqual(original.artifact.lines);
    expect(rollback.artifact.text).toBe(original.artifact.text);
    expect(rollback.message).toBe(`Rollback leaf-01 Eth1/1 to ${original.commitId}`);

    const history = unwrap(await store.history({ device: "leaf-01", interface: "Eth1/1" }));
    expect(history.map((record) => record.kind)).toEqual(["rollback", "change", "change"]);
  });

  it("reports unknown commits as not found", async () => {
    const store = createStore();

    const missing = await store.rollback("0123456789ab", "carol");
    expect(missing.ok).toBe(false);
    if (!missing.ok) {
      expect(missing.error.code).toBe("not_found");
    }

    const malformed = await store.get("../../etc/passwd");
    expect(malformed.ok).toBe(false);
    if (!malformed.ok) {
      expect(malformed.error.code).toBe("not_found");
    }
  });

  it("records apply outcomes beside the commit", async () => {
    const store = createStore();
    const record = unwrap(
      await store.commit({
        device: "leaf-01",
        interface: "Eth1/1",
        artifact: buildArtifact("leaf-01", "Eth1/1", 10),
        author: "alice",
      }),
    );
    expect(unwrap(await store.getOutcome(record.commitId))).toBeNull();
    expect(summarizeRecord(record, null).applyStatus).toBe("pending");

    const outcome = unwrap(
      await store.recordOutcome(record.commitId, {
        status: "failed",
        results: [
          {
            device: "leaf-01",
            success: false,
            durationMs: 12,
            error: { code: "device.rejected", message: "Invalid command" },
          },
        ],
      }),
    );

    expect(outcome.recordedAt).toBe(FIXED_TIME);
    expect(unwrap(await store.getOutcome(record.commitId))).toEqual(outcome);
    expect(summarizeRecord(record, outcome).applyStatus).toBe("failed");
    expect(unwrap(await store.get(record.commitId))).toEqual(record);

    const unknown = await store.recordOutcome("0123456789ab", { status: "succeeded", results: [] });
    expect(unknown.ok).toBe(false);
  });

  it("keeps sequences and parents consistent across stores sharing one root", async () => {
    const persistence = createMemoryPersistence();
    const serving = createStore(persistence);
    const oneShot = createStore(persistence);

    const uplink = unwrap(
      await oneShot.commit({
        device: "leaf-01",
        interface: "Ethernet1/2",
        artifact: buildArtifact("leaf-01", "Ethernet1/2", 20),
        author: "alice",
      }),
    );
    const first = unwrap(
      await serving.commit({
        device: "leaf-01",
        interface: "Ethernet1/1",
        artifact: buildArtifact("leaf-01", "Ethernet1/1", 10),
        author: "alice",
      }),
    );
    const second = unwrap(
      await oneShot.commit({
        device: "leaf-01",
        interface: "Ethernet1/1",
        artifact: buildArtifact("leaf-01", "Ethernet1/1", 30),
        author: "bob",
      }),
    );

    expect([uplink.sequence, first.sequence, second.sequence]).toEqual([1, 2, 3]);
    expect(second.parentCommitId).toBe(first.commitId);
    expect(unwrap(await serving.current("leaf-01", "Ethernet1/1"))?.commitId).toBe(second.commitId);
    expect(unwrap(await serving.history()).map((record) => record.commitId)).toEqual([
      second.commitId,
      first.commitId,
      uplink.commitId,
    ]);
  });

  it("chains concurrent commits from two stores on the same interface", async () => {
    const persistence = createMemoryPersistence();
    const stores = [createStore(persistence), createStore(persistence)];

    const records = await Promise.all(
      stores.map((store, index) =>
        store.commit({
          device: "leaf-01",
          interface: "Ethernet1/1",
          artifact: buildArtifact("leaf-01", "Ethernet1/1", 10 + index),
          author: "alice",
        }),
      ),
    );
    const [earlier, later] = records.map((result) => unwrap(result)).sort((a, b) => a.sequence - b.sequence);

    expect(earlier.parentCommitId).toBeNull();
    expect(later.parentCommitId).toBe(earlier.commitId);
    expect(unwrap(await stores[0].history({ interface: "Ethernet1/1", device: "leaf-01" }))).toHaveLength(2);
  });

  it("keeps path components inside the store root", async () => {
    const persistence = createMemoryPersistence();
    const store = createStore(persistence);

    unwrap(
      await store.commit({
        device: "../outside",
        interface: "Eth1/1",
        artifact: buildArtifact("../outside", "Eth1/1", 10),
        author: "alice",
      }),
    );

    const segmentPaths = [...persistence.files.keys()].filter((path) => path.startsWith("segments/"));
    expect(segmentPaths).toHaveLength(1);
    expect(segmentPaths[0].startsWith("segments/%2E%2E%2Foutside/Eth1%2F1/000000000001.")).toBe(true);
  });

  it("fails closed once a record is unparsable", async () => {
    const persistence = createMemoryPersistence();
    const store = createStore(persistence);
    const record = unwrap(
      await store.commit({
        device: "leaf-01",
        interface: "Eth1/1",
        artifact: buildArtifact("leaf-01", "Eth1/1", 10),
        author: "alice",
      }),
    );
    const segmentPath = [...persistence.files.keys()].find((path) => path.startsWith("segments/"));
    expect(segmentPath).toBeDefined();
    await persistence.writeAtomic(segmentPath ?? "", "{ not json");

    const history = await store.history();
    expect(history.ok).toBe(false);
    if (!history.ok) {
      expect(history.error.code).toBe("audit.store_corruption");
    }

    const next = await store.commit({
      device: "leaf-02",
      interface: "Eth1/2",
      artifact: buildArtifact("leaf-02", "Eth1/2", 20),
      author: "alice",
    });
    expect(next.ok).toBe(false);
    if (!next.ok) {
      expect(next.error.code).toBe("audit.store_corruption");
    }

    const lookup = await store.get(record.commitId);
    expect(lookup.ok).toBe(false);
  });

  describe("on the filesystem", () => {
    const roots: string[] = [];

    afterEach(async () => {
      await Promise.all(roots.splice(0).map((root) => rm(root, { recursive: true, force: true })));
    });

    it("continues sequence numbers and parents after reopening", async () => {
      const root = await mkdtemp(join(tmpdir(), "fabricops-audit-"));
      roots.push(root);

      const first = createStore(createNodeFsPersistence(root));
      const records: AuditRecord[] = [];
      for (const vlan of [10, 20]) {
        records.push(
          unwrap(
            await first.commit({
              device: "leaf-01",
              interface: "Eth1/1",
              artifact: buildArtifact("leaf-01", "Eth1/1", vlan),
              author: "alice",
            }),
          ),
        );
      }

      const reopened = unwrap(
        await openFileAuditStore({
          persistence: createNodeFsPersistence(root),
          clock: frozenClock,
          logger: createSilentLogger(),
        }),
      );
      const history = unwrap(await reopened.history());
      expect(history.map((record) => record.commitId)).toEqual([
        records[1].commitId,
        records[0].commitId,
      ]);

      const third = unwrap(
        await reopened.commit({
          device: "leaf-01",
          interface: "Eth1/1",
          artifact: buildArtifact("leaf-01", "Eth1/1", 30),
          author: "alice",
        }),
      );
      expect(third.sequence).toBe(3);
      expect(third.parentCommitId).toBe(records[1].commitId);

      const files = await readdir(join(root, "segments", "leaf-01", "Eth1%2F1"));
      expect(files.filter((name) => name.endsWith(".tmp"))).toEqual([]);
      expect(files).toHaveLength(3);
    });
  });
});
