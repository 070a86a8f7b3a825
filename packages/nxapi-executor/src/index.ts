export { NxapiExecutor, createNxapiExecutor } from "./nxapi-executor.js";
export type { NxapiExecutorOptions, NxapiTransport } from "./nxapi-executor.js";
export { FetchHttpClient, defaultHttpClient } from "./http-client.js";
export type { FetchLike, HttpClient, HttpRequest, HttpResponse } from "./http-client.js";
export { buildRpcBatch } from "./jsonrpc.js";
export type { NxapiCommand, NxapiMethod } from "./jsonrpc.js";
