export type SwitchportMode = "access" | "trunk";

export interface ChangeRequest {
  readonly device: string;
  readonly interface: string;
  readonly mode: SwitchportMode;
  /** Access VLAN, or a member of the trunk allowed set. */
  readonly vlan?: number;
  /** Additional trunk allowed VLANs; rejected on access ports. */
  readonly allowedVlans?: ReadonlyArray<number>;
  readonly description?: string;
  readonly vni?: number;
  readonly vrf?: string;
  readonly author?: string;
}

export interface ConfigurationArtifact {
  readonly device: string;
  readonly interface: string;
  readonly lines: ReadonlyArray<string>;
  readonly text: string;
  readonly synthesizedAt: string;
}
