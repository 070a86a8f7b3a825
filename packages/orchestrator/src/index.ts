export { ChangeOrchestrator, createChangeOrchestrator, DEFAULT_AUTHOR } from "./orchestrator.js";
export type { ChangeOrchestratorDependencies, ChangeOrchestratorOptions } from "./orchestrator.js";
export { ChangeTracker, isTerminalState } from "./change-tracker.js";
export { createOrchestratorTelemetry } from "./telemetry.js";
export type {
  OrchestratorTelemetryContext,
  OrchestratorTelemetryMetrics,
  OrchestratorTelemetryOptions,
} from "./telemetry.js";
export type {
  ChangeFailure,
  ChangeKind,
  ChangeReport,
  ChangeStage,
  ChangeState,
  ConfigureOptions,
  HealthReport,
  RollbackOptions,
  StateTransition,
} from "./types.js";
