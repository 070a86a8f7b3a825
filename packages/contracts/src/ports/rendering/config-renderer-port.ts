import type { ChangeRequest, ConfigurationArtifact } from "../../types/change.js";
import type { FabricError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";

export interface ConfigRendererPort {
  render(request: ChangeRequest): Result<ConfigurationArtifact, FabricError>;
}
