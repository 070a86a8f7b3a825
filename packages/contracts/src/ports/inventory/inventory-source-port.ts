import type { FabricError } from "../../types/domain-error.js";
import type { DeviceDescriptor } from "../../types/inventory.js";
import type { Result } from "../../types/result.js";

export interface InventorySourcePort {
  resolve(name: string): Promise<Result<DeviceDescriptor, FabricError>>;
  list(): Promise<Result<ReadonlyArray<DeviceDescriptor>, FabricError>>;
}
