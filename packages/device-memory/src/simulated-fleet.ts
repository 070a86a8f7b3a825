import { setTimeout as sleep } from "node:timers/promises";

import {
  createDeviceRejectedError,
  createDeviceUnreachableError,
  err,
  ok,
  type DeviceCallOptions,
  type DeviceExecutorPort,
  type FabricError,
  type RawPortState,
  type Result,
} from "@fabricops/contracts";
import { createFabricLogger, type FabricLogger } from "@fabricops/telemetry";

export type SimulatedLinkState = "up" | "down";

export interface SimulatedPortSeed {
  readonly adminState?: SimulatedLinkState;
  readonly operState?: SimulatedLinkState;
  readonly runningConfig?: ReadonlyArray<string>;
  readonly macAddresses?: ReadonlyArray<string>;
}

export interface SimulatedDeviceSeed {
  readonly name: string;
  readonly ports?: Readonly<Record<string, SimulatedPortSeed>>;
  /** Adds `Eth1/1` .. `Eth1/<portCount>` with default state. */
  readonly portCount?: number;
}

export type DeviceFault =
  | { readonly kind: "unreachable" }
  | { readonly kind: "delay"; readonly ms: number }
  | { readonly kind: "reject"; readonly reason: string };

export interface SimulatedPortState {
  readonly adminState: SimulatedLinkState;
  readonly operState: SimulatedLinkState;
  readonly runningConfig: ReadonlyArray<string>;
  readonly macAddresses: ReadonlyArray<string>;
}

export interface SimulatedFleetOptions {
  readonly devices?: ReadonlyArray<SimulatedDeviceSeed>;
  readonly logger?: FabricLogger;
}

interface StoredPort {
  adminState: SimulatedLinkState;
  operState: SimulatedLinkState;
  runningConfig: string[];
  macAddresses: string[];
}

interface StoredDevice {
  readonly ports: Map<string, StoredPort>;
  readonly batches: string[][];
  faults: DeviceFault[];
}

const INTERFACE_LINE = /^interface\s+(\S+)\s*$/;

const toStoredPort = (iface: string, seed: SimulatedPortSeed = {}): StoredPort => ({
  adminState: seed.adminState ?? "up",
  operState: seed.operState ?? "down",
  runningConfig: [...(seed.runningConfig ?? [`interface ${iface}`])],
  macAddresses: [...(seed.macAddresses ?? [])],
});

const snapshotPort = (port: StoredPort): SimulatedPortState => ({
  adminState: port.adminState,
  operState: port.operState,
  runningConfig: [...port.runningConfig],
  macAddresses: [...port.macAddresses],
});

/**
 * In-process stand-in for a fleet of switches. Applying an interface block
 * replaces that port's running config and follows its shutdown state.
 */
export class SimulatedFleet implements DeviceExecutorPort {
  private readonly devices = new Map<string, StoredDevice>();
  private readonly logger: FabricLogger;

  constructor(options: SimulatedFleetOptions = {}) {
    this.logger = options.logger ?? createFabricLogger({ name: "device-memory" });
    for (const seed of options.devices ?? []) {
      this.addDevice(seed);
    }
  }

  addDevice(seed: SimulatedDeviceSeed): void {
    const ports = new Map<string, StoredPort>();
    for (let index = 1; index <= (seed.portCount ?? 0); index += 1) {
      const iface = `Eth1/${index}`;
      ports.set(iface, toStoredPort(iface));
    }
    for (const [iface, port] of Object.entries(seed.ports ?? {})) {
      ports.set(iface, toStoredPort(iface, port));
    }
    this.devices.set(seed.name, { ports, batches: [], faults: [] });
  }

  setPort(device: string, iface: string, seed: SimulatedPortSeed): void {
    this.requireDevice(device).ports.set(iface, toStoredPort(iface, seed));
  }

  learnMac(device: string, iface: string, macAddress: string): void {
    const port = this.requireDevice(device).ports.get(iface);
    if (!port) {
      throw new Error(`Unknown port ${iface} on simulated device ${device}.`);
    }
    port.macAddresses.push(macAddress);
    port.operState = "up";
  }

  /** Faults stack; every call to the device suffers all of them. */
  injectFault(device: string, fault: DeviceFault): void {
    this.requireDevice(device).faults.push(fault);
  }

  clearFaults(device: string): void {
    this.requireDevice(device).faults = [];
  }

  getPort(device: string, iface: string): SimulatedPortState | null {
    const port = this.devices.get(device)?.ports.get(iface);
    return port ? snapshotPort(port) : null;
  }

  appliedBatches(device: string): ReadonlyArray<ReadonlyArray<string>> {
    return this.devices.get(device)?.batches.map((batch) => [...batch]) ?? [];
  }

  deviceNames(): string[] {
    return [...this.devices.keys()].sort();
  }

  async readState(
    device: string,
    iface: string,
    options: DeviceCallOptions,
  ): Promise<Result<RawPortState, FabricError>> {
    const reached = await this.reach(device, options.signal);
    if (!reached.ok) {
      return reached;
    }

    const port = reached.value.ports.get(iface);
    if (!port) {
      return ok({ exists: false });
    }
    return ok({
      exists: true,
      adminState: port.adminState,
      operState: port.operState,
      runningConfig: [...port.runningConfig],
      macAddresses: [...port.macAddresses],
    });
  }

  async applyCommands(
    device: string,
    lines: ReadonlyArray<string>,
    options: DeviceCallOptions,
  ): Promise<Result<void, FabricError>> {
    const reached = await this.reach(device, options.signal);
    if (!reached.ok) {
      return reached;
    }
    const target = reached.value;

    const rejection = target.faults.find(
      (fault): fault is Extract<DeviceFault, { kind: "reject" }> => fault.kind === "reject",
    );
    if (rejection) {
      return err(createDeviceRejectedError(device, rejection.reason));
    }

    const blocks = this.splitBlocks(device, lines);
    if (!blocks.ok) {
      return blocks;
    }
    for (const block of blocks.value) {
      const port = target.ports.get(block.iface);
      if (!port) {
        return err(createDeviceRejectedError(device, `Invalid interface ${block.iface}`));
      }
    }

    for (const block of blocks.value) {
      const port = target.ports.get(block.iface);
      if (!port) {
        continue;
      }
      port.runningConfig = block.lines;
      if (block.lines.some((line) => line.trim() === "shutdown")) {
        port.adminState = "down";
        port.operState = "down";
      } else if (block.lines.some((line) => line.trim() === "no shutdown")) {
        port.adminState = "up";
      }
    }
    target.batches.push([...lines]);
    this.logger.debug("device_memory.apply.accepted", { device, lines: lines.length });
    return ok(undefined);
  }

  private splitBlocks(
    device: string,
    lines: ReadonlyArray<string>,
  ): Result<Array<{ iface: string; lines: string[] }>, FabricError> {
    const blocks: Array<{ iface: string; lines: string[] }> = [];
    for (const line of lines) {
      const header = INTERFACE_LINE.exec(line);
      if (header) {
        blocks.push({ iface: header[1], lines: [line] });
        continue;
      }
      const current = blocks.at(-1);
      if (!current || !line.startsWith(" ")) {
        return err(createDeviceRejectedError(device, `Invalid command: ${line.trim()}`));
      }
      current.lines.push(line);
    }
    return ok(blocks);
  }

  private async reach(device: string, signal?: AbortSignal): Promise<Result<StoredDevice, FabricError>> {
    const target = this.devices.get(device);
    if (!target) {
      return err(createDeviceUnreachableError(device, "no such device in the simulated fleet"));
    }
    for (const fault of target.faults) {
      if (fault.kind === "delay") {
        await sleep(fault.ms, undefined, { signal });
      }
    }
    if (target.faults.some((fault) => fault.kind === "unreachable")) {
      return err(createDeviceUnreachableError(device, "connection refused"));
    }
    return ok(target);
  }

  private requireDevice(device: string): StoredDevice {
    const target = this.devices.get(device);
    if (!target) {
      throw new Error(`Unknown simulated device ${device}.`);
    }
    return target;
  }
}

export const createSimulatedFleet = (options: SimulatedFleetOptions = {}): SimulatedFleet =>
  new SimulatedFleet(options);
