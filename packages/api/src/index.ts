export { createFabricApiHandler, routeLabel, API_ENDPOINTS } from "./handler.js";
export type { FabricApiHandlerOptions, FabricOrchestratorLike, FetchHandler } from "./handler.js";
export { createFabricServer } from "./server.js";
export type { FabricServerMetrics, FabricServerOptions } from "./server.js";
export { createExpressFabricMiddleware, createFabricExpressApp } from "./express.js";
export type { ExpressFabricOptions } from "./express.js";
export { errorResponse, jsonResponse, reportErrorResponse, statusForError } from "./responses.js";
export type { ApiErrorBody, ApiStage, ErrorResponseContext } from "./responses.js";
export { historyQuerySchema, precheckInputSchema, rollbackBodySchema, MAX_HISTORY_LIMIT } from "./schemas.js";
export type { HistoryQueryInput, PrecheckInput, RollbackBody } from "./schemas.js";
