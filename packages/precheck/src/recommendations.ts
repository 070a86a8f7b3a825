import type { PortStatus } from "@fabricops/contracts";
import { formatVlanList } from "@fabricops/config-synth";

import type { PortVlanState } from "./safety.js";

export interface RecommendationInput {
  readonly device: string;
  readonly interface: string;
  readonly portExists: boolean;
  readonly adminStatus: PortStatus;
  readonly operStatus: PortStatus;
  readonly learnedMacAddresses: ReadonlyArray<string>;
  readonly current: PortVlanState | null;
  readonly desired?: PortVlanState;
  readonly isSafe: boolean;
}

export const describeVlanState = (state: PortVlanState | null): string => {
  if (!state) {
    return "unconfigured";
  }
  if (state.vlans.length === 0) {
    return `${state.mode} (no VLAN)`;
  }
  return state.mode === "access"
    ? `access VLAN ${state.vlans[0]}`
    : `trunk VLANs ${formatVlanList(state.vlans)}`;
};

export const buildRecommendations = (input: RecommendationInput): string[] => {
  if (!input.portExists) {
    return [
      `Interface ${input.interface} does not exist on ${input.device}`,
      "Verify the interface name against the device inventory",
    ];
  }

  const recommendations: string[] = [];
  if (input.adminStatus === "up" && input.operStatus === "down") {
    recommendations.push("Port is administratively up but operationally down");
  }
  if (input.adminStatus === "down") {
    recommendations.push("Port is administratively down; the change will bring it up");
  }

  const macCount = input.learnedMacAddresses.length;
  if (macCount === 0) {
    recommendations.push("No MAC addresses learned - safe to reconfigure");
  } else {
    recommendations.push(
      `${macCount} MAC address${macCount === 1 ? "" : "es"} learned - port is carrying traffic`,
    );
    if (!input.isSafe) {
      recommendations.push("Move the attached hosts or schedule a maintenance window before changing mode or VLAN");
    }
  }

  if (input.desired) {
    recommendations.push(
      `Evaluated transition: ${describeVlanState(input.current)} -> ${describeVlanState(input.desired)}`,
    );
  }

  if (input.operStatus === "down") {
    recommendations.push("Consider checking physical connectivity");
  }
  return recommendations;
};
