import {
  createFabricCounter,
  createFabricHistogram,
  createFabricLogger,
  getFabricTracer,
  runWithSpan,
  SpanStatusCode,
  type FabricCounter,
  type FabricHistogram,
  type FabricInstrumentationOptions,
  type FabricLogger,
  type FabricTracer,
} from "@fabricops/telemetry";

import {
  createFabricApiHandler,
  routeLabel,
  type FabricApiHandlerOptions,
  type FabricOrchestratorLike,
  type FetchHandler,
} from "./handler.js";

export interface FabricServerMetrics {
  readonly requestCounter: FabricCounter;
  readonly requestDuration: FabricHistogram;
}

export interface FabricServerOptions {
  readonly orchestrator: FabricOrchestratorLike;
  readonly handlerOptions?: FabricApiHandlerOptions;
  readonly metrics?: FabricServerMetrics;
  readonly instrumentation?: FabricInstrumentationOptions;
  readonly tracer?: FabricTracer;
  readonly logger?: FabricLogger;
}

/**
 * Wraps the API handler with a span per request, request metrics and a
 * JSON 500 for anything the handler throws.
 */
export const createFabricServer = (options: FabricServerOptions): FetchHandler => {
  const instrumentation = options.instrumentation ?? { name: "api" };
  const logger = options.logger ?? createFabricLogger({ name: instrumentation.name ?? "api" });
  const fetchHandler = createFabricApiHandler(options.orchestrator, { logger, ...options.handlerOptions });
  const metrics = resolveMetrics(options.metrics, instrumentation);
  const tracer = options.tracer ?? getFabricTracer(instrumentation);

  return async (request: Request): Promise<Response> => {
    const url = new URL(request.url);
    const route = routeLabel(url.pathname);
    const start = performance.now();

    try {
      return await runWithSpan(
        tracer,
        "api.request",
        async (span) => {
          span.setAttribute("http.method", request.method);
          span.setAttribute("http.target", url.pathname);

          try {
            const response = await fetchHandler(request);
            span.setAttribute("http.status_code", response.status);
            recordRequestMetrics(metrics, { durationMs: performance.now() - start, status: response.status, route });
            logger.info("api.request_completed", { method: request.method, route, status: response.status });
            return response;
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            span.setStatus({ code: SpanStatusCode.ERROR, message });
            span.setAttribute("http.status_code", 500);
            logger.error("api.request_failed", { method: request.method, route, error: message });
            throw error;
          }
        },
        { attributes: { "http.route": route } },
      );
    } catch {
      recordRequestMetrics(metrics, { durationMs: performance.now() - start, status: 500, route });

      return new Response(
        JSON.stringify({ error: { code: "internal_error", message: "Internal server error.", stage: "request" } }),
        { status: 500, headers: { "content-type": "application/json" } },
      );
    }
  };
};

interface RequestMetricContext {
  readonly status: number;
  readonly durationMs: number;
  readonly route: string;
}

const recordRequestMetrics = (metrics: FabricServerMetrics, context: RequestMetricContext): void => {
  metrics.requestCounter.add(1, { route: context.route, status: context.status });
  metrics.requestDuration.record(context.durationMs, { route: context.route, status: context.status });
};

const resolveMetrics = (
  metrics: FabricServerMetrics | undefined,
  instrumentation: FabricInstrumentationOptions,
): FabricServerMetrics =>
  metrics ?? {
    requestCounter: createFabricCounter("api_requests_total", {
      description: "Count of API requests handled",
      instrumentation,
    }),
    requestDuration: createFabricHistogram("api_request_duration_ms", {
      description: "API request duration",
      unit: "ms",
      instrumentation,
    }),
  };
