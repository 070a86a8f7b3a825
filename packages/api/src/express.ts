import express, {
  type ErrorRequestHandler,
  type Express,
  type Request as ExpressRequest,
  type RequestHandler,
} from "express";

import { createValidationError } from "@fabricops/contracts";
import type { FabricLogger } from "@fabricops/telemetry";

import type { FetchHandler } from "./handler.js";
import { errorResponse } from "./responses.js";

export interface ExpressFabricOptions {
  /** Body size accepted by the JSON parser. */
  readonly bodyLimit?: string;
  readonly logger?: FabricLogger;
}

const HOP_HEADERS = new Set(["content-length", "transfer-encoding", "connection", "host"]);

const toFetchRequest = (req: ExpressRequest, signal: AbortSignal): Request => {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (HOP_HEADERS.has(key.toLowerCase())) {
      continue;
    }
    if (typeof value === "string") {
      headers.set(key, value);
    } else if (Array.isArray(value)) {
      for (const entry of value) {
        headers.append(key, entry);
      }
    }
  }

  const method = req.method.toUpperCase();
  const payload: unknown = req.body;
  const hasBody = method !== "GET" && method !== "HEAD" && payload !== undefined;
  if (hasBody) {
    headers.set("content-type", "application/json");
  }

  return new Request(`${req.protocol}://${req.get("host") ?? "localhost"}${req.originalUrl}`, {
    method,
    headers,
    body: hasBody ? JSON.stringify(payload) : undefined,
    signal,
  });
};

/**
 * Serves a fetch-style handler from express. The request signal aborts when
 * the client goes away before the response is written.
 */
export const createExpressFabricMiddleware =
  (handler: FetchHandler): RequestHandler =>
  (req, res, next): void => {
    void (async () => {
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableEnded) {
          controller.abort();
        }
      });

      const response = await handler(toFetchRequest(req, controller.signal));
      res.statusCode = response.status;
      response.headers.forEach((value, key) => {
        res.setHeader(key, value);
      });
      res.end(await response.text());
    })().catch(next);
  };

const bodyErrorHandler =
  (logger: FabricLogger | undefined): ErrorRequestHandler =>
  (error: unknown, _req, res, next): void => {
    const status =
      typeof error === "object" && error !== null && "status" in error && typeof error.status === "number"
        ? error.status
        : 500;
    if (status >= 500) {
      next(error);
      return;
    }

    logger?.warn("api.body_rejected", { status, error });
    void (async () => {
      const response = errorResponse(
        createValidationError("Request body could not be parsed.", [
          { path: "(body)", message: error instanceof Error ? error.message : "unparsable body" },
        ]),
        { stage: "validate" },
      );
      res.statusCode = response.status;
      res.setHeader("content-type", "application/json");
      res.end(await response.text());
    })().catch(next);
  };

export const createFabricExpressApp = (handler: FetchHandler, options: ExpressFabricOptions = {}): Express => {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: options.bodyLimit ?? "256kb" }));
  app.use(createExpressFabricMiddleware(handler));
  app.use(bodyErrorHandler(options.logger));
  return app;
};
