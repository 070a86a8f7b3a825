import type { ChangeRequest, PortConfigSnapshot, SwitchportMode } from "@fabricops/contracts";
import { collectTrunkVlans, parseVlanList } from "@fabricops/config-synth";

export interface PortVlanState {
  readonly mode: SwitchportMode;
  readonly vlans: ReadonlyArray<number>;
}

export interface SafetyInput {
  readonly portExists: boolean;
  readonly currentConfig: PortConfigSnapshot;
  readonly learnedMacAddresses: ReadonlyArray<string>;
  /** Absent when the check is not tied to a specific change. */
  readonly desired?: PortVlanState;
}

export const desiredStateFromRequest = (
  request: Pick<ChangeRequest, "mode" | "vlan" | "allowedVlans">,
): PortVlanState => ({
  mode: request.mode,
  vlans:
    request.mode === "access"
      ? request.vlan === undefined
        ? []
        : [request.vlan]
      : collectTrunkVlans(request),
});

/** Null when the running config does not pin down a mode and VLAN set. */
export const currentStateFromSnapshot = (snapshot: PortConfigSnapshot): PortVlanState | null => {
  if (snapshot.mode === "access" && snapshot.vlan !== undefined) {
    return { mode: "access", vlans: [Number.parseInt(snapshot.vlan, 10)] };
  }
  if (snapshot.mode === "trunk" && snapshot.allowedVlans !== undefined) {
    return { mode: "trunk", vlans: parseVlanList(snapshot.allowedVlans) };
  }
  return null;
};

const sameVlans = (a: ReadonlyArray<number>, b: ReadonlyArray<number>): boolean => {
  const left = [...new Set(a)].sort((x, y) => x - y);
  const right = [...new Set(b)].sort((x, y) => x - y);
  return left.length === right.length && left.every((vlan, index) => vlan === right[index]);
};

/**
 * Whether the desired state moves the port's mode or VLAN set. An unknown
 * current state, or no desired state at all, counts as a change.
 */
export const isModeOrVlanChange = (
  current: PortVlanState | null,
  desired: PortVlanState | undefined,
): boolean => {
  if (!desired || !current) {
    return true;
  }
  return current.mode !== desired.mode || !sameVlans(current.vlans, desired.vlans);
};

/**
 * The pre-check verdict. Only existence, learned MACs and the mode/VLAN
 * transition take part; link state and recommendations do not.
 */
export const evaluateSafety = (input: SafetyInput): boolean => {
  if (!input.portExists) {
    return false;
  }
  if (input.learnedMacAddresses.length === 0) {
    return true;
  }
  return !isModeOrVlanChange(currentStateFromSnapshot(input.currentConfig), input.desired);
};
