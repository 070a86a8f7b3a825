export { fabricConfigSchema, loadFabricConfig, parseFabricConfig, ENV_BINDINGS } from "./config.js";
export type { FabricConfig, LoadFabricConfigOptions } from "./config.js";
export { createFabricRuntime } from "./runtime.js";
export type { FabricRuntime, FabricRuntimeOptions } from "./runtime.js";
export { ensureFormat, formatOutput, parseAllowedVlans, parseInteger, OUTPUT_FORMATS } from "./output.js";
export type { OutputFormat } from "./output.js";
