import {
  SpanStatusCode,
  trace,
  type Attributes,
  type Span,
  type SpanOptions,
  type Tracer,
} from "@opentelemetry/api";

import type { FabricInstrumentationOptions } from "./metrics.js";

export type FabricTracer = Tracer;

export interface RunWithSpanOptions {
  readonly spanOptions?: SpanOptions;
  readonly attributes?: Attributes;
  readonly onError?: (error: unknown, span: Span) => void;
}

export const getFabricTracer = (options: FabricInstrumentationOptions = {}): FabricTracer =>
  trace.getTracerProvider().getTracer(options.name ?? "fabricops", options.version, { schemaUrl: options.schemaUrl });

export const runWithSpan = async <T>(
  tracer: FabricTracer,
  name: string,
  callback: (span: Span) => Promise<T> | T,
  options: RunWithSpanOptions = {},
): Promise<T> =>
  tracer.startActiveSpan(name, options.spanOptions ?? {}, async (span): Promise<T> => {
    span.setAttributes(options.attributes ?? {});

    try {
      const result = await callback(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      span.recordException(error instanceof Error ? error : message);
      options.onError?.(error, span);
      throw error;
    } finally {
      span.end();
    }
  });

/**
 * Marks a span as failed for an error carried in a Result rather than thrown.
 */
export const markSpanFailed = (span: Span, code: string, message: string): void => {
  span.setAttribute("fabric.error_code", code);
  span.setStatus({ code: SpanStatusCode.ERROR, message });
};

export { SpanStatusCode };
