import {
  createFabricCounter,
  createFabricHistogram,
  createFabricLogger,
  getFabricTracer,
  type FabricCounter,
  type FabricHistogram,
  type FabricInstrumentationOptions,
  type FabricLogger,
  type FabricTracer,
} from "@fabricops/telemetry";

export interface FleetExecutorTelemetryMetrics {
  readonly resultCounter: FabricCounter;
  readonly applyDuration: FabricHistogram;
}

export interface FleetExecutorTelemetryOptions {
  readonly instrumentation?: FabricInstrumentationOptions;
  readonly tracer?: FabricTracer;
  readonly logger?: FabricLogger;
  readonly metrics?: Partial<FleetExecutorTelemetryMetrics>;
}

export interface FleetExecutorTelemetryContext {
  readonly tracer: FabricTracer;
  readonly logger: FabricLogger;
  readonly metrics: FleetExecutorTelemetryMetrics;
}

const DEFAULT_INSTRUMENTATION: FabricInstrumentationOptions = { name: "fleet-executor" };

export const createFleetExecutorTelemetry = (
  options: FleetExecutorTelemetryOptions = {},
): FleetExecutorTelemetryContext => {
  const instrumentation: FabricInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getFabricTracer(instrumentation);
  const logger = options.logger ?? createFabricLogger({ name: instrumentation.name ?? "fleet-executor" });
  const metrics: FleetExecutorTelemetryMetrics = {
    resultCounter:
      options.metrics?.resultCounter ??
      createFabricCounter("fleet_apply_results_total", {
        description: "Per-device apply results by outcome.",
        instrumentation,
      }),
    applyDuration:
      options.metrics?.applyDuration ??
      createFabricHistogram("fleet_apply_duration_ms", {
        description: "Duration of a single device apply.",
        unit: "ms",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics } satisfies FleetExecutorTelemetryContext;
};
