import {
  metrics,
  type Counter,
  type Histogram,
  type Meter,
  type MetricOptions,
} from "@opentelemetry/api";

export interface FabricInstrumentationOptions {
  readonly name?: string;
  readonly version?: string;
  readonly schemaUrl?: string;
}

const DEFAULT_INSTRUMENTATION_NAME = "fabricops";

export const getFabricMeter = (options: FabricInstrumentationOptions = {}): Meter =>
  metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });

export interface FabricMetricOptions extends MetricOptions {
  readonly instrumentation?: FabricInstrumentationOptions;
}

export type FabricCounter = Counter;
export type FabricHistogram = Histogram;

export const createFabricCounter = (name: string, options: FabricMetricOptions = {}): FabricCounter => {
  const { instrumentation, ...counterOptions } = options;
  return getFabricMeter(instrumentation).createCounter(name, counterOptions);
};

export const createFabricHistogram = (
  name: string,
  options: FabricMetricOptions = {},
): FabricHistogram => {
  const { instrumentation, ...histogramOptions } = options;
  return getFabricMeter(instrumentation).createHistogram(name, histogramOptions);
};
