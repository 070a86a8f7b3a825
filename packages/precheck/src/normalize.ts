import type { PortStatus } from "@fabricops/contracts";

const DOWN_STATES = new Set([
  "down",
  "admin-down",
  "administratively down",
  "disabled",
  "notconnect",
  "link-not-connected",
  "sfp-missing",
  "xcvr-absent",
]);

/** Maps NX-OS admin/oper state strings onto up, down or unknown. */
export const normalizePortStatus = (raw: string | undefined): PortStatus => {
  if (raw === undefined) {
    return "unknown";
  }
  const value = raw.trim().toLowerCase();
  if (value === "up" || value.startsWith("up ")) {
    return "up";
  }
  if (DOWN_STATES.has(value) || value.startsWith("down")) {
    return "down";
  }
  return "unknown";
};

const MAC_SEPARATORS = /[.:-]/g;
const MAC_HEX = /^[0-9a-f]{12}$/;

/**
 * Accepts `aabb.ccdd.eeff`, `AA-BB-CC-DD-EE-FF` and colon forms; returns
 * `aa:bb:cc:dd:ee:ff` or null for anything else.
 */
export const normalizeMacAddress = (raw: string): string | null => {
  const hex = raw.trim().toLowerCase().replace(MAC_SEPARATORS, "");
  if (!MAC_HEX.test(hex)) {
    return null;
  }
  return hex.match(/../g)?.join(":") ?? null;
};

export const normalizeMacAddresses = (raw: ReadonlyArray<string>): string[] => {
  const normalized = new Set<string>();
  for (const value of raw) {
    const mac = normalizeMacAddress(value);
    if (mac) {
      normalized.add(mac);
    }
  }
  return [...normalized].sort();
};
