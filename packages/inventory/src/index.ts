export {
  YamlInventory,
  createYamlInventory,
  loadYamlInventory,
  parseInventoryDocuments,
} from "./yaml-inventory.js";
export type { InventoryDocuments, YamlInventoryFiles } from "./yaml-inventory.js";
export { StaticInventory, createStaticInventory } from "./static-inventory.js";
export type { StaticDeviceInput } from "./static-inventory.js";
export { DEFAULT_PLATFORM, resolveHost, toDeviceSummary } from "./resolve.js";
export type { InventoryDefaults, InventoryEntry } from "./schema.js";
