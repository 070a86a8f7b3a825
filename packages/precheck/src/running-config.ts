import type { PortConfigSnapshot } from "@fabricops/contracts";
import { formatVlanList, parseVlanList } from "@fabricops/config-synth";

const PATTERNS = {
  description: /^description\s+(.+)$/,
  mode: /^switchport mode\s+(access|trunk)$/,
  accessVlan: /^switchport access vlan\s+(\d+)$/,
  trunkVlans: /^switchport trunk allowed vlan\s+(?:(add)\s+)?([\d,\-\s]+)$/,
  vni: /^(?:member\s+)?vni\s+(\d+)/,
  vrf: /^vrf member\s+(\S+)$/,
} as const;

/**
 * Extracts the interface settings the safety policy and operators care about
 * from `show running-config interface` output.
 */
export const parseRunningConfig = (lines: ReadonlyArray<string>): PortConfigSnapshot => {
  const snapshot: Record<string, string> = {};
  let trunkVlans: number[] | undefined;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line || line.startsWith("!") || line.startsWith("interface ")) {
      continue;
    }

    if (line === "shutdown") {
      snapshot.shutdown = "true";
      continue;
    }
    if (line === "no shutdown") {
      snapshot.shutdown = "false";
      continue;
    }

    const description = PATTERNS.description.exec(line);
    if (description) {
      snapshot.description = description[1];
      continue;
    }
    const mode = PATTERNS.mode.exec(line);
    if (mode) {
      snapshot.mode = mode[1];
      continue;
    }
    const accessVlan = PATTERNS.accessVlan.exec(line);
    if (accessVlan) {
      snapshot.vlan = accessVlan[1];
      continue;
    }
    const trunk = PATTERNS.trunkVlans.exec(line);
    if (trunk) {
      const listed = parseVlanList(trunk[2]);
      trunkVlans = trunk[1] === "add" ? [...(trunkVlans ?? []), ...listed] : listed;
      continue;
    }
    const vni = PATTERNS.vni.exec(line);
    if (vni) {
      snapshot.vni = vni[1];
      continue;
    }
    const vrf = PATTERNS.vrf.exec(line);
    if (vrf) {
      snapshot.vrf = vrf[1];
    }
  }

  if (trunkVlans) {
    snapshot.allowedVlans = formatVlanList(trunkVlans);
  }
  // NX-OS omits `switchport mode access` from running config; an access VLAN implies it.
  if (snapshot.mode === undefined && snapshot.vlan !== undefined) {
    snapshot.mode = "access";
  }
  return Object.freeze(snapshot);
};
