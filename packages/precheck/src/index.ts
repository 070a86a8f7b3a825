export {
  PreCheckEngine,
  assemblePreCheck,
  createPreCheckEngine,
  DEFAULT_PRECHECK_TIMEOUT_MS,
} from "./engine.js";
export type { PreCheckEngineOptions, PreCheckOptions } from "./engine.js";
export {
  currentStateFromSnapshot,
  desiredStateFromRequest,
  evaluateSafety,
  isModeOrVlanChange,
} from "./safety.js";
export type { PortVlanState, SafetyInput } from "./safety.js";
export { buildRecommendations, describeVlanState } from "./recommendations.js";
export type { RecommendationInput } from "./recommendations.js";
export { parseRunningConfig } from "./running-config.js";
export { normalizeMacAddress, normalizeMacAddresses, normalizePortStatus } from "./normalize.js";
