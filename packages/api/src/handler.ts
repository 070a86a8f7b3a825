import type { z } from "zod";

import { toValidationIssues, validateChangeRequest } from "@fabricops/config-synth";
import {
  createNotFoundError,
  createValidationError,
  err,
  ok,
  type FabricError,
  type Result,
} from "@fabricops/contracts";
import type { ChangeOrchestrator } from "@fabricops/orchestrator";
import { createFabricLogger, type FabricLogger } from "@fabricops/telemetry";

import { errorResponse, jsonResponse, reportErrorResponse } from "./responses.js";
import { historyQuerySchema, precheckInputSchema, rollbackBodySchema } from "./schemas.js";

export type FabricOrchestratorLike = Pick<
  ChangeOrchestrator,
  "precheck" | "configure" | "history" | "rollback" | "listDevices" | "health"
>;

export type FetchHandler = (request: Request) => Promise<Response>;

export interface FabricApiHandlerOptions {
  readonly version?: string;
  readonly logger?: FabricLogger;
}

interface RouteContext {
  readonly request: Request;
  readonly url: URL;
  readonly params: Readonly<Record<string, string>>;
}

interface Route {
  readonly method: string;
  readonly path: string;
  readonly pattern: RegExp;
  readonly keys: ReadonlyArray<string>;
  readonly handle: (context: RouteContext) => Promise<Response>;
}

export const API_ENDPOINTS = {
  preCheck: "/api/v1/port/pre-check",
  configure: "/api/v1/port/configure",
  history: "/api/v1/history",
  rollback: "/api/v1/rollback/:commitId",
  devices: "/api/v1/devices",
  health: "/healthz",
} as const;

const compileRoute = (method: string, path: string, handle: Route["handle"]): Route => {
  const keys: string[] = [];
  const source = path
    .split("/")
    .map((segment) => {
      if (segment.startsWith(":")) {
        keys.push(segment.slice(1));
        return "([^/]+)";
      }
      return segment.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    })
    .join("/");
  return { method, path, pattern: new RegExp(`^${source}$`), keys, handle };
};

const normalizePath = (path: string): string => (path.endsWith("/") && path !== "/" ? path.slice(0, -1) : path);

const readJsonBody = async (request: Request): Promise<Result<unknown, FabricError>> => {
  const text = await request.text();
  if (text.trim().length === 0) {
    return ok({});
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return ok(parsed);
  } catch (error) {
    return err(
      createValidationError("Request body must be valid JSON.", [
        { path: "(body)", message: error instanceof Error ? error.message : "invalid JSON" },
      ]),
    );
  }
};

const parseInput = <TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  message: string,
): Result<z.output<TSchema>, FabricError> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return err(createValidationError(message, toValidationIssues(parsed.error)));
  }
  return ok(parsed.data);
};

const queryOf = (url: URL): Record<string, string> => Object.fromEntries(url.searchParams);

/**
 * Fetch-style router over the orchestrator. Every error body names the stage
 * it came from and which devices did or did not take the change.
 */
const decodeParams = (route: Route, path: string): Result<Record<string, string>, FabricError> => {
  const match = route.pattern.exec(path);
  const params: Record<string, string> = {};
  for (const [index, key] of route.keys.entries()) {
    const value = match?.[index + 1];
    if (value === undefined) {
      continue;
    }
    try {
      params[key] = decodeURIComponent(value);
    } catch {
      return err(
        createValidationError("Request path is not validly encoded.", [
          { path: key, message: "malformed percent-encoding" },
        ]),
      );
    }
  }
  return ok(params);
};

export const createFabricApiHandler = (
  orchestrator: FabricOrchestratorLike,
  options: FabricApiHandlerOptions = {},
): FetchHandler => {
  const version = options.version ?? "1.0.0";
  const logger = options.logger ?? createFabricLogger({ name: "api" });

  const routes: Route[] = [
    compileRoute("GET", "/", async () =>
      jsonResponse(200, {
        message: "Fabric port change API",
        version,
        endpoints: API_ENDPOINTS,
      }),
    ),

    compileRoute("POST", API_ENDPOINTS.preCheck, async ({ request, url }) => {
      const body = await readJsonBody(request);
      if (!body.ok) {
        return errorResponse(body.error, { stage: "validate" });
      }
      const bodyFields = typeof body.value === "object" && body.value !== null ? body.value : {};
      const input = parseInput(
        precheckInputSchema,
        { ...queryOf(url), ...bodyFields },
        "Pre-check request failed validation.",
      );
      if (!input.ok) {
        return errorResponse(input.error, { stage: "validate" });
      }

      const result = await orchestrator.precheck(input.value.device, input.value.interface, {
        signal: request.signal,
      });
      return result.ok ? jsonResponse(200, result.value) : errorResponse(result.error, { stage: "precheck" });
    }),

    compileRoute("POST", API_ENDPOINTS.configure, async ({ request }) => {
      const body = await readJsonBody(request);
      if (!body.ok) {
        return errorResponse(body.error, { stage: "validate" });
      }
      const change = validateChangeRequest(body.value);
      if (!change.ok) {
        return errorResponse(change.error, { stage: "validate" });
      }

      const report = await orchestrator.configure(change.value, { signal: request.signal });
      const failure = reportErrorResponse(report);
      if (failure) {
        return failure;
      }
      return jsonResponse(200, {
        success: true,
        changeId: report.changeId,
        commitId: report.commit?.commitId ?? null,
        timestamp: report.commit?.committedAt ?? null,
        appliedConfig: report.artifact?.text ?? "",
        message: `Successfully configured ${change.value.interface} on ${change.value.device}`,
        results: report.results,
      });
    }),

    compileRoute("GET", API_ENDPOINTS.history, async ({ url }) => {
      const query = parseInput(historyQuerySchema, queryOf(url), "History query failed validation.");
      if (!query.ok) {
        return errorResponse(query.error, { stage: "validate" });
      }
      const history = await orchestrator.history(query.value);
      return history.ok
        ? jsonResponse(200, { history: history.value })
        : errorResponse(history.error, { stage: "query" });
    }),

    compileRoute("POST", API_ENDPOINTS.rollback, async ({ request, params }) => {
      const body = await readJsonBody(request);
      if (!body.ok) {
        return errorResponse(body.error, { stage: "validate" });
      }
      const input = parseInput(rollbackBodySchema, body.value, "Rollback request failed validation.");
      if (!input.ok) {
        return errorResponse(input.error, { stage: "validate" });
      }

      const target = params.commitId ?? "";
      const report = await orchestrator.rollback(target, { ...input.value, signal: request.signal });
      const failure = reportErrorResponse(report);
      if (failure) {
        return failure;
      }
      return jsonResponse(200, {
        success: true,
        changeId: report.changeId,
        state: report.state,
        commitId: report.commit?.commitId ?? null,
        rollbackOf: target,
        timestamp: report.commit?.committedAt ?? null,
        appliedConfig: report.artifact?.text ?? "",
        message: `Successfully rolled back to commit ${target}`,
        results: report.results,
      });
    }),

    compileRoute("GET", API_ENDPOINTS.devices, async () => {
      const devices = await orchestrator.listDevices();
      return devices.ok
        ? jsonResponse(200, { devices: devices.value })
        : errorResponse(devices.error, { stage: "query" });
    }),

    compileRoute("GET", API_ENDPOINTS.health, async () => {
      const health = await orchestrator.health();
      if (!health.healthy) {
        logger.warn("api.health.degraded", { checks: health.checks });
      }
      return jsonResponse(health.healthy ? 200 : 503, health);
    }),
  ];

  return async (request: Request): Promise<Response> => {
    const url = new URL(request.url);
    const path = normalizePath(url.pathname);
    const method = request.method.toUpperCase();

    const matching = routes.filter((route) => route.pattern.test(path));
    if (matching.length === 0) {
      return errorResponse(createNotFoundError("Route", path), { stage: "query" });
    }

    const route = matching.find((candidate) => candidate.method === method);
    if (!route) {
      return new Response(
        JSON.stringify({ error: { code: "method_not_allowed", message: `${method} is not allowed on ${path}.` } }),
        {
          status: 405,
          headers: { "content-type": "application/json", allow: matching.map((candidate) => candidate.method).join(", ") },
        },
      );
    }

    const params = decodeParams(route, path);
    if (!params.ok) {
      return errorResponse(params.error, { stage: "validate" });
    }

    return route.handle({ request, url, params: params.value });
  };
};

/** Route template for a path, used to label metrics without ids. */
export const routeLabel = (pathname: string): string => {
  const path = normalizePath(pathname);
  if (path.startsWith("/api/v1/rollback/")) {
    return API_ENDPOINTS.rollback;
  }
  return Object.values(API_ENDPOINTS).find((endpoint) => endpoint === path) ?? (path === "/" ? "/" : "unmatched");
};
