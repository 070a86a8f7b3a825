export type {
  FabricInstrumentationOptions,
  FabricMetricOptions,
  FabricCounter,
  FabricHistogram,
} from "./metrics.js";
export { getFabricMeter, createFabricCounter, createFabricHistogram } from "./metrics.js";

export type {
  ChangeLogScope,
  FabricLogContext,
  FabricLogger,
  FabricLoggerOptions,
  FabricLogLevel,
  FabricLogSink,
} from "./logging.js";
export { changeLogger, createFabricLogger, createSilentLogger, LOG_LEVELS } from "./logging.js";

export type { FabricTracer, RunWithSpanOptions } from "./tracing.js";
export { getFabricTracer, runWithSpan, markSpanFailed, SpanStatusCode } from "./tracing.js";
