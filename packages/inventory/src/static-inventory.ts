import {
  createNotFoundError,
  err,
  ok,
  type DeviceDescriptor,
  type FabricError,
  type InventorySourcePort,
  type Result,
} from "@fabricops/contracts";

export type StaticDeviceInput = Omit<DeviceDescriptor, "groups" | "data" | "platform"> &
  Partial<Pick<DeviceDescriptor, "groups" | "data" | "platform">>;

export class StaticInventory implements InventorySourcePort {
  private readonly devices = new Map<string, DeviceDescriptor>();

  constructor(devices: ReadonlyArray<StaticDeviceInput>) {
    for (const device of devices) {
      this.devices.set(
        device.name,
        Object.freeze({
          ...device,
          platform: device.platform ?? "nxos",
          groups: Object.freeze([...(device.groups ?? [])]),
          data: Object.freeze({ ...device.data }),
        }),
      );
    }
  }

  async resolve(name: string): Promise<Result<DeviceDescriptor, FabricError>> {
    const device = this.devices.get(name);
    return device ? ok(device) : err(createNotFoundError("Device", name));
  }

  async list(): Promise<Result<ReadonlyArray<DeviceDescriptor>, FabricError>> {
    return ok([...this.devices.values()].sort((a, b) => a.name.localeCompare(b.name)));
  }
}

export const createStaticInventory = (devices: ReadonlyArray<StaticDeviceInput>): StaticInventory =>
  new StaticInventory(devices);
