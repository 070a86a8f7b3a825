import type { DeviceDescriptor, DeviceSummary } from "@fabricops/contracts";

import type { InventoryDefaults, InventoryEntry } from "./schema.js";

export const DEFAULT_PLATFORM = "nxos";

/** Groups in lookup order: the host's own, depth first, each once. */
const expandGroups = (
  names: ReadonlyArray<string>,
  groups: Readonly<Record<string, InventoryEntry>>,
  seen: Set<string> = new Set(),
): string[] => {
  const ordered: string[] = [];
  for (const name of names) {
    if (seen.has(name)) {
      continue;
    }
    seen.add(name);
    ordered.push(name);
    const group = groups[name];
    if (group) {
      ordered.push(...expandGroups(group.groups, groups, seen));
    }
  }
  return ordered;
};

/**
 * Host values win over group values, which win over defaults. `data` maps
 * are merged key by key in the same precedence.
 */
export const resolveHost = (
  name: string,
  host: InventoryEntry,
  groups: Readonly<Record<string, InventoryEntry>>,
  defaults: InventoryDefaults,
): DeviceDescriptor => {
  const lineage = expandGroups(host.groups, groups)
    .map((groupName) => groups[groupName])
    .filter((group): group is InventoryEntry => group !== undefined);

  const inherit = <T>(select: (entry: InventoryEntry) => T | undefined, fallback?: T): T | undefined => {
    for (const entry of [host, ...lineage]) {
      const value = select(entry);
      if (value !== undefined) {
        return value;
      }
    }
    return fallback;
  };

  const data: Record<string, unknown> = { ...defaults.data };
  for (const group of [...lineage].reverse()) {
    Object.assign(data, group.data);
  }
  Object.assign(data, host.data);

  return Object.freeze({
    name,
    hostname: inherit((entry) => entry.hostname) ?? name,
    platform: inherit((entry) => entry.platform, defaults.platform) ?? DEFAULT_PLATFORM,
    port: inherit((entry) => entry.port, defaults.port),
    username: inherit((entry) => entry.username, defaults.username),
    password: inherit((entry) => entry.password, defaults.password),
    groups: Object.freeze(expandGroups(host.groups, groups)),
    data: Object.freeze(data),
  });
};

const stringField = (data: Readonly<Record<string, unknown>>, key: string): string | undefined => {
  const value = data[key];
  return typeof value === "string" ? value : undefined;
};

/** Credential-free view of a device. */
export const toDeviceSummary = (device: DeviceDescriptor): DeviceSummary => ({
  name: device.name,
  platform: device.platform,
  role: stringField(device.data, "role"),
  site: stringField(device.data, "site"),
  groups: [...device.groups],
});
