import {
  createFabricCounter,
  createFabricLogger,
  getFabricTracer,
  type FabricCounter,
  type FabricInstrumentationOptions,
  type FabricLogger,
  type FabricTracer,
} from "@fabricops/telemetry";

export interface OrchestratorTelemetryMetrics {
  readonly changeCounter: FabricCounter;
}

export interface OrchestratorTelemetryOptions {
  readonly instrumentation?: FabricInstrumentationOptions;
  readonly tracer?: FabricTracer;
  readonly logger?: FabricLogger;
  readonly metrics?: Partial<OrchestratorTelemetryMetrics>;
}

export interface OrchestratorTelemetryContext {
  readonly tracer: FabricTracer;
  readonly logger: FabricLogger;
  readonly metrics: OrchestratorTelemetryMetrics;
}

const DEFAULT_INSTRUMENTATION: FabricInstrumentationOptions = { name: "orchestrator" };

export const createOrchestratorTelemetry = (
  options: OrchestratorTelemetryOptions = {},
): OrchestratorTelemetryContext => {
  const instrumentation: FabricInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  return {
    tracer: options.tracer ?? getFabricTracer(instrumentation),
    logger: options.logger ?? createFabricLogger({ name: instrumentation.name ?? "orchestrator" }),
    metrics: {
      changeCounter:
        options.metrics?.changeCounter ??
        createFabricCounter("changes_total", {
          description: "Changes by kind and final state.",
          instrumentation,
        }),
    },
  };
};
