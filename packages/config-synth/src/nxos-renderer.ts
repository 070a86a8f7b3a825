import {
  ok,
  systemClock,
  type ChangeRequest,
  type Clock,
  type ConfigRendererPort,
  type ConfigurationArtifact,
  type FabricError,
  type Result,
} from "@fabricops/contracts";

import { validateChangeRequest } from "./schema.js";
import { collectTrunkVlans, formatVlanList } from "./vlan-list.js";

const INDENT = "  ";

export interface NxosRendererOptions {
  readonly clock?: Clock;
}

/**
 * Command lines for an interface change, in the fixed order: selector,
 * description, switchport, mode block, VXLAN block, VRF, no shutdown.
 */
export const renderInterfaceLines = (request: ChangeRequest): string[] => {
  const lines = [`interface ${request.interface}`];

  if (request.description) {
    lines.push(`${INDENT}description ${request.description}`);
  }

  lines.push(`${INDENT}switchport`);

  if (request.mode === "access") {
    lines.push(`${INDENT}switchport mode access`);
    if (request.vlan !== undefined) {
      lines.push(`${INDENT}switchport access vlan ${request.vlan}`);
    }
  } else {
    lines.push(`${INDENT}switchport mode trunk`);
    const allowed = collectTrunkVlans(request);
    if (allowed.length > 0) {
      lines.push(`${INDENT}switchport trunk allowed vlan ${formatVlanList(allowed)}`);
    }
  }

  if (request.vni !== undefined) {
    lines.push(`${INDENT}vxlan`);
    lines.push(`${INDENT}${INDENT}vni ${request.vni}`);
  }

  if (request.vrf) {
    lines.push(`${INDENT}vrf member ${request.vrf}`);
  }

  lines.push(`${INDENT}no shutdown`);
  return lines;
};

export class NxosConfigRenderer implements ConfigRendererPort {
  private readonly clock: Clock;

  constructor(options: NxosRendererOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  render(request: ChangeRequest): Result<ConfigurationArtifact, FabricError> {
    const validated = validateChangeRequest(request);
    if (!validated.ok) {
      return validated;
    }

    const lines = Object.freeze(renderInterfaceLines(validated.value));
    return ok(
      Object.freeze({
        device: validated.value.device,
        interface: validated.value.interface,
        lines,
        text: lines.join("\n"),
        synthesizedAt: this.clock.now().toISOString(),
      } satisfies ConfigurationArtifact),
    );
  }
}

export const createNxosRenderer = (options: NxosRendererOptions = {}): ConfigRendererPort =>
  new NxosConfigRenderer(options);
