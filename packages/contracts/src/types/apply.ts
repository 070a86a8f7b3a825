import type { ConfigurationArtifact } from "./change.js";
import type { FabricError } from "./domain-error.js";

export interface ApplyTarget {
  readonly device: string;
  readonly artifact: ConfigurationArtifact;
}

export interface ApplyResult {
  readonly device: string;
  readonly success: boolean;
  readonly error?: FabricError;
  readonly durationMs: number;
}
