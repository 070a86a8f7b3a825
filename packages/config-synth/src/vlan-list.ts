import type { ChangeRequest } from "@fabricops/contracts";

/** Sorted, de-duplicated trunk allowed set: `vlan` plus `allowedVlans`. */
export const collectTrunkVlans = (request: Pick<ChangeRequest, "vlan" | "allowedVlans">): number[] => {
  const members = new Set<number>(request.allowedVlans ?? []);
  if (request.vlan !== undefined) {
    members.add(request.vlan);
  }
  return [...members].sort((a, b) => a - b);
};

/**
 * Formats VLAN ids the way NX-OS prints them: `10,20-22,30`.
 */
export const formatVlanList = (vlans: ReadonlyArray<number>): string => {
  const sorted = [...new Set(vlans)].sort((a, b) => a - b);
  const parts: string[] = [];
  let index = 0;
  while (index < sorted.length) {
    const start = sorted[index];
    let end = start;
    while (index + 1 < sorted.length && sorted[index + 1] === end + 1) {
      index += 1;
      end = sorted[index];
    }
    parts.push(start === end ? String(start) : `${start}-${end}`);
    index += 1;
  }
  return parts.join(",");
};

export const parseVlanList = (value: string): number[] => {
  const result = new Set<number>();
  for (const part of value.split(",")) {
    const token = part.trim();
    if (!token) {
      continue;
    }
    const [from, to] = token.split("-").map((piece) => Number.parseInt(piece, 10));
    if (Number.isNaN(from)) {
      continue;
    }
    const last = to === undefined || Number.isNaN(to) ? from : to;
    for (let vlan = from; vlan <= last; vlan += 1) {
      result.add(vlan);
    }
  }
  return [...result].sort((a, b) => a - b);
};
