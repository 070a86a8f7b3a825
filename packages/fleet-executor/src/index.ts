export {
  DeviceFleetExecutor,
  createDeviceFleetExecutor,
  DEFAULT_DEVICE_TIMEOUT_MS,
  DEFAULT_POOL_SIZE,
} from "./executor.js";
export type { DeviceFleetExecutorOptions, FleetApplyOptions } from "./executor.js";
export { WorkerPool, type HeldTask } from "./worker-pool.js";
export { createFleetExecutorTelemetry } from "./telemetry.js";
export type {
  FleetExecutorTelemetryContext,
  FleetExecutorTelemetryMetrics,
  FleetExecutorTelemetryOptions,
} from "./telemetry.js";
