import type { FabricError } from "../../types/domain-error.js";
import type { RawPortState } from "../../types/precheck.js";
import type { Result } from "../../types/result.js";

export interface DeviceCallOptions {
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

/**
 * Transport to a single network device. Implementations report failures as
 * `device.unreachable`, `device.timeout` or `device.rejected`.
 */
export interface DeviceExecutorPort {
  readState(
    device: string,
    iface: string,
    options: DeviceCallOptions,
  ): Promise<Result<RawPortState, FabricError>>;
  applyCommands(
    device: string,
    lines: ReadonlyArray<string>,
    options: DeviceCallOptions,
  ): Promise<Result<void, FabricError>>;
}
