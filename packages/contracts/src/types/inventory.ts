export interface DeviceDescriptor {
  readonly name: string;
  readonly hostname: string;
  readonly platform: string;
  readonly port?: number;
  readonly username?: string;
  readonly password?: string;
  readonly groups: ReadonlyArray<string>;
  readonly data: Readonly<Record<string, unknown>>;
}

export interface DeviceSummary {
  readonly name: string;
  readonly platform: string;
  readonly role?: string;
  readonly site?: string;
  readonly groups: ReadonlyArray<string>;
}
