export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/change.js";
export * from "./types/precheck.js";
export * from "./types/apply.js";
export * from "./types/audit.js";
export * from "./types/inventory.js";
export * from "./types/clock.js";
export * from "./errors.js";
export * from "./deadline.js";

export * from "./ports/devices/device-executor-port.js";
export * from "./ports/inventory/inventory-source-port.js";
export * from "./ports/audit/audit-store-port.js";
export * from "./ports/rendering/config-renderer-port.js";
