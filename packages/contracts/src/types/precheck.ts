export type PortStatus = "up" | "down" | "unknown";

export type PortConfigSnapshot = Readonly<Record<string, string>>;

/**
 * Port state as read from a device, before normalization.
 */
export interface RawPortState {
  readonly exists: boolean;
  readonly adminState?: string;
  readonly operState?: string;
  readonly runningConfig?: ReadonlyArray<string>;
  readonly macAddresses?: ReadonlyArray<string>;
}

export interface PreCheckResult {
  readonly device: string;
  readonly interface: string;
  readonly portExists: boolean;
  readonly adminStatus: PortStatus;
  readonly operStatus: PortStatus;
  readonly currentConfig: PortConfigSnapshot;
  readonly learnedMacAddresses: ReadonlyArray<string>;
  readonly recommendations: ReadonlyArray<string>;
  readonly isSafe: boolean;
  readonly checkedAt: string;
}
