import { describe, expect, it } from "vitest";

import { createFileAuditStore, createMemoryPersistence } from "@fabricops/audit-store";
import { createNxosRenderer } from "@fabricops/config-synth";
import {
  type Clock,
  type DeviceCallOptions,
  type DeviceExecutorPort,
  type FabricError,
  type RawPortState,
  type Result,
} from "@fabricops/contracts";
import { createSimulatedFleet, type SimulatedFleet } from "@fabricops/device-memory";
import { createDeviceFleetExecutor } from "@fabricops/fleet-executor";
import { createStaticInventory } from "@fabricops/inventory";
import { createPreCheckEngine } from "@fabricops/precheck";
import { createSilentLogger } from "@fabricops/telemetry";

import { createChangeOrchestrator, type ChangeReport } from "../src/index.js";

const clock: Clock = { now: () => new Date("2026-03-01T09:00:00.000Z") };

const ACCESS_VLAN_10 = [
  "interface Eth1/1",
  "  switchport",
  "  switchport mode access",
  "  switchport access vlan 10",
  "  no shutdown",
];

const SERVER_LINK_VLAN_10 = [
  "interface Eth1/1",
  "  description Server Link",
  "  switchport",
  "  switchport mode access",
  "  switchport access vlan 10",
  "  no shutdown",
];

class ApplyGate {
  readonly started: Promise<void>;
  private markStarted: () => void = () => undefined;
  private releaseGate: () => void = () => undefined;
  private readonly released: Promise<void>;

  constructor() {
    this.started = new Promise((resolve) => {
      this.markStarted = resolve;
    });
    this.released = new Promise((resolve) => {
      this.releaseGate = resolve;
    });
  }

  async pass(): Promise<void> {
    this.markStarted();
    await this.released;
  }

  release(): void {
    this.releaseGate();
  }
}

/** Holds applies at the gate so cancellation can land between commit and apply. */
class GatedExecutor implements DeviceExecutorPort {
  constructor(
    private readonly inner: DeviceExecutorPort,
    private readonly gate: ApplyGate,
  ) {}

  async readState(device: string, iface: string, options: DeviceCallOptions): Promise<Result<RawPortState, FabricError>> {
    return this.inner.readState(device, iface, options);
  }

  async applyCommands(
    device: string,
    lines: ReadonlyArray<string>,
    options: DeviceCallOptions,
  ): Promise<Result<void, FabricError>> {
    await this.gate.pass();
    return this.inner.applyCommands(device, lines, options);
  }
}

const setup = (wrap: (fleet: SimulatedFleet) => DeviceExecutorPort = (fleet) => fleet) => {
  const logger = createSilentLogger();
  const devices = createSimulatedFleet({
    devices: [{ name: "leaf-01", portCount: 4 }],
    logger,
  });
  const executor = wrap(devices);
  const store = createFileAuditStore({ persistence: createMemoryPersistence(), clock, logger });
  const inventory = createStaticInventory([
    { name: "leaf-01", hostname: "192.0.2.11", data: { role: "leaf", site: "dc1" } },
  ]);
  let nextId = 0;
  const orchestrator = createChangeOrchestrator(
    {
      precheck: createPreCheckEngine({ executor, clock, logger }),
      renderer: createNxosRenderer({ clock }),
      store,
      fleet: createDeviceFleetExecutor({ executor, telemetry: { logger } }),
      inventory,
    },
    {
      clock,
      idFactory: () => {
        nextId += 1;
        return `change-${nextId}`;
      },
      telemetry: { logger },
    },
  );
  return { devices, store, orchestrator };
};

const statesOf = (report: ChangeReport) => report.transitions.map((transition) => transition.state);

describe("ChangeOrchestrator.configure", () => {
  it("pre-checks, commits and applies an access VLAN change", async () => {
    const { devices, store, orchestrator } = setup();

    const report = await orchestrator.configure({
      device: "leaf-01",
      interface: "Eth1/1",
      mode: "access",
      vlan: 10,
      description: "Server Link",
    });

    expect(report.state).toBe("succeeded");
    expect(report.changeId).toBe("change-1");
    expect(statesOf(report)).toEqual(["received", "prechecked", "committed", "applied", "succeeded"]);
    expect(report.failure).toBeUndefined();
    expect(report.precheck?.isSafe).toBe(true);
    expect(report.artifact?.lines).toEqual(SERVER_LINK_VLAN_10);
    expect(report.commit?.artifact.lines).toEqual(SERVER_LINK_VLAN_10);
    expect(report.commit?.artifact.text).toBe(SERVER_LINK_VLAN_10.join("\n"));
    expect(report.commit?.author).toBe("api_user");
    expect(report.commit?.message).toBe("Configure leaf-01 Eth1/1");
    expect(report.results).toHaveLength(1);
    expect(report.results[0]).toMatchObject({ device: "leaf-01", success: true });
    expect(report.outcome?.status).toBe("succeeded");

    expect(devices.getPort("leaf-01", "Eth1/1")?.runningConfig).toEqual(SERVER_LINK_VLAN_10);
    const history = await orchestrator.history({ device: "leaf-01" });
    expect(history.ok && history.value.map((entry) => entry.applyStatus)).toEqual(["succeeded"]);

    const outcome = await store.getOutcome(report.commit?.commitId ?? "");
    expect(outcome.ok && outcome.value?.status).toBe("succeeded");
  });

  it("rejects a change on a port with learned MACs without committing or applying", async () => {
    const { devices, store, orchestrator } = setup();
    devices.learnMac("leaf-01", "Eth1/1", "0050.56ab.cdef");

    const report = await orchestrator.configure({
      device: "leaf-01",
      interface: "Eth1/1",
      mode: "access",
      vlan: 10,
    });

    expect(report.state).toBe("rejected");
    expect(statesOf(report)).toEqual(["received", "prechecked", "rejected"]);
    expect(report.failure?.stage).toBe("precheck");
    expect(report.failure?.error.code).toBe("precheck.unsafe_to_configure");
    expect(report.precheck?.learnedMacAddresses).toEqual(["00:50:56:ab:cd:ef"]);
    expect(report.commit).toBeUndefined();
    expect(report.results).toEqual([]);

    expect(devices.appliedBatches("leaf-01")).toEqual([]);
    const history = await store.history();
    expect(history).toEqual({ ok: true, value: [] });
  });

  it("keeps the commit and records a failed outcome when the device rejects the apply", async () => {
    const { devices, store, orchestrator } = setup();
    devices.injectFault("leaf-01", { kind: "reject", reason: "% VLAN 10 not configured" });

    const report = await orchestrator.configure({
      device: "leaf-01",
      interface: "Eth1/1",
      mode: "access",
      vlan: 10,
    });

    expect(report.state).toBe("failed");
    expect(statesOf(report)).toEqual(["received", "prechecked", "committed", "applied", "failed"]);
    expect(report.failure?.stage).toBe("apply");
    expect(report.failure?.error.code).toBe("device.rejected");
    expect(report.commit).toBeDefined();
    expect(report.outcome?.status).toBe("failed");

    const current = await store.current("leaf-01", "Eth1/1");
    expect(current.ok && current.value?.commitId).toBe(report.commit?.commitId);
    const history = await orchestrator.history();
    expect(history.ok && history.value.map((entry) => entry.applyStatus)).toEqual(["failed"]);
  });

  it("fails validation before touching the device", async () => {
    const { devices, orchestrator } = setup();

    const report = await orchestrator.configure({
      device: "leaf-01",
      interface: "Eth1/1",
      mode: "access",
      vlan: 5000,
    });

    expect(report.state).toBe("failed");
    expect(statesOf(report)).toEqual(["received", "failed"]);
    expect(report.failure?.stage).toBe("validate");
    expect(report.failure?.error.code).toBe("validation_error");
    expect(devices.appliedBatches("leaf-01")).toEqual([]);
  });

  it("fails at pre-check for an unknown device", async () => {
    const { orchestrator } = setup();

    const report = await orchestrator.configure({
      device: "leaf-99",
      interface: "Eth1/1",
      mode: "access",
      vlan: 10,
    });

    expect(report.state).toBe("failed");
    expect(report.failure?.stage).toBe("precheck");
    expect(report.failure?.error.code).toBe("not_found");
    expect(report.commit).toBeUndefined();
  });

  it("cancels without side effects when aborted before the commit", async () => {
    const { devices, store, orchestrator } = setup();
    const controller = new AbortController();
    controller.abort();

    const report = await orchestrator.configure(
      { device: "leaf-01", interface: "Eth1/1", mode: "access", vlan: 10 },
      { signal: controller.signal },
    );

    expect(report.state).toBe("cancelled");
    expect(statesOf(report)).toEqual(["received", "cancelled"]);
    expect(report.failure?.error.code).toBe("change.cancelled");
    expect(devices.appliedBatches("leaf-01")).toEqual([]);
    expect(await store.history()).toEqual({ ok: true, value: [] });
  });

  it("returns cancelled after the commit while the apply finishes and is recorded", async () => {
    const gate = new ApplyGate();
    const { devices, store, orchestrator } = setup((fleet) => new GatedExecutor(fleet, gate));
    const controller = new AbortController();

    const pending = orchestrator.configure(
      { device: "leaf-01", interface: "Eth1/1", mode: "access", vlan: 10 },
      { signal: controller.signal },
    );
    await gate.started;
    controller.abort();
    const report = await pending;

    expect(report.state).toBe("cancelled");
    expect(statesOf(report)).toEqual(["received", "prechecked", "committed", "cancelled"]);
    expect(report.failure?.stage).toBe("apply");
    const commitId = report.commit?.commitId ?? "";
    expect(await store.getOutcome(commitId)).toEqual({ ok: true, value: null });
    expect(orchestrator.pendingApplies).toBe(1);

    gate.release();
    await orchestrator.drain();

    expect(orchestrator.pendingApplies).toBe(0);
    const outcome = await store.getOutcome(commitId);
    expect(outcome.ok && outcome.value?.status).toBe("succeeded");
    expect(devices.getPort("leaf-01", "Eth1/1")?.runningConfig).toEqual(ACCESS_VLAN_10);
  });
});

describe("ChangeOrchestrator.rollback", () => {
  const configureVlan = async (orchestrator: ReturnType<typeof setup>["orchestrator"], vlan: number) => {
    const report = await orchestrator.configure({ device: "leaf-01", interface: "Eth1/1", mode: "access", vlan });
    if (!report.commit) {
      throw new Error(`configure vlan ${vlan} did not commit`);
    }
    return report.commit;
  };

  it("appends a rollback record and re-applies the old artifact", async () => {
    const { devices, orchestrator } = setup();
    const first = await configureVlan(orchestrator, 10);
    await configureVlan(orchestrator, 20);

    const report = await orchestrator.rollback(first.commitId, { author: "netops" });

    expect(report.kind).toBe("rollback");
    expect(report.state).toBe("succeeded");
    expect(statesOf(report)).toEqual(["received", "committed", "applied", "succeeded"]);
    expect(report.commit?.kind).toBe("rollback");
    expect(report.commit?.rollbackOf).toBe(first.commitId);
    expect(report.commit?.author).toBe("netops");
    expect(report.commit?.message).toBe(`Rollback leaf-01 Eth1/1 to ${first.commitId}`);
    expect(report.commit?.artifact.lines).toEqual(first.artifact.lines);
    expect(devices.getPort("leaf-01", "Eth1/1")?.runningConfig).toEqual(ACCESS_VLAN_10);
    expect(devices.appliedBatches("leaf-01")).toHaveLength(3);

    const history = await orchestrator.history({ device: "leaf-01", interface: "Eth1/1" });
    expect(history.ok && history.value.map((entry) => entry.kind)).toEqual(["rollback", "change", "change"]);
  });

  it("records the rollback intent only when apply is disabled", async () => {
    const { devices, orchestrator } = setup();
    const first = await configureVlan(orchestrator, 10);

    const report = await orchestrator.rollback(first.commitId, { apply: false });

    expect(report.state).toBe("committed");
    expect(report.commit?.author).toBe("api_user");
    expect(report.results).toEqual([]);
    expect(devices.appliedBatches("leaf-01")).toHaveLength(1);

    const history = await orchestrator.history();
    expect(history.ok && history.value[0].applyStatus).toBe("pending");
  });

  it("fails with not_found for an unknown commit", async () => {
    const { orchestrator } = setup();

    const report = await orchestrator.rollback("0123456789ab");

    expect(report.state).toBe("failed");
    expect(report.failure?.stage).toBe("commit");
    expect(report.failure?.error.code).toBe("not_found");
  });
});

describe("ChangeOrchestrator queries", () => {
  it("passes pre-checks through without a desired change", async () => {
    const { orchestrator } = setup();

    const result = await orchestrator.precheck("leaf-01", "Eth1/9");

    expect(result.ok && result.value.portExists).toBe(false);
  });

  it("lists devices without credentials", async () => {
    const { orchestrator } = setup();

    const devices = await orchestrator.listDevices();

    expect(devices).toEqual({
      ok: true,
      value: [{ name: "leaf-01", platform: "nxos", role: "leaf", site: "dc1", groups: [] }],
    });
  });

  it("reports health of the store and inventory", async () => {
    const { orchestrator } = setup();

    expect(await orchestrator.health()).toEqual({
      healthy: true,
      checks: { store: { ok: true }, inventory: { ok: true } },
    });
  });
});
