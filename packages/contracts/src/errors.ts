import type { FabricError, InfraError } from "./types/domain-error.js";

export const ErrorCodes = {
  validation: "validation_error",
  unsafeToConfigure: "precheck.unsafe_to_configure",
  deviceUnreachable: "device.unreachable",
  deviceTimeout: "device.timeout",
  deviceRejected: "device.rejected",
  storeCorruption: "audit.store_corruption",
  notFound: "not_found",
  cancelled: "change.cancelled",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export const createValidationError = (
  message: string,
  issues: ReadonlyArray<ValidationIssue> = [],
): FabricError => ({
  code: ErrorCodes.validation,
  message,
  details: { issues: issues.map((issue) => ({ ...issue })) },
});

/** Undefined when the error carries no issue list. */
export const validationIssuesOf = (error: FabricError): ValidationIssue[] | undefined => {
  const issues = error.details?.issues;
  if (!Array.isArray(issues)) {
    return undefined;
  }
  return issues.flatMap((issue: unknown) =>
    typeof issue === "object" &&
    issue !== null &&
    "path" in issue &&
    "message" in issue &&
    typeof issue.path === "string" &&
    typeof issue.message === "string"
      ? [{ path: issue.path, message: issue.message }]
      : [],
  );
};

export const createUnsafeToConfigureError = (
  device: string,
  iface: string,
  recommendations: ReadonlyArray<string>,
): FabricError => ({
  code: ErrorCodes.unsafeToConfigure,
  message: `Port ${iface} on ${device} is not safe to configure. Check pre-check results.`,
  details: { device, interface: iface, recommendations: [...recommendations] },
});

export const createDeviceUnreachableError = (device: string, cause?: unknown): InfraError => ({
  code: ErrorCodes.deviceUnreachable,
  message: `Device ${device} is unreachable.`,
  details: cause === undefined ? { device } : { device, cause: describeCause(cause) },
  retryable: true,
});

export const createDeviceTimeoutError = (device: string, timeoutMs: number): InfraError => ({
  code: ErrorCodes.deviceTimeout,
  message: `Device ${device} did not respond within ${timeoutMs}ms.`,
  details: { device, timeoutMs },
  retryable: true,
});

export const createDeviceRejectedError = (device: string, reason: string): FabricError => ({
  code: ErrorCodes.deviceRejected,
  message: `Device ${device} rejected the configuration: ${reason}`,
  details: { device, reason },
});

export const createStoreCorruptionError = (message: string, cause?: unknown): InfraError => ({
  code: ErrorCodes.storeCorruption,
  message,
  details: cause === undefined ? undefined : { cause: describeCause(cause) },
  retryable: false,
});

export const createNotFoundError = (entity: string, id: string): FabricError => ({
  code: ErrorCodes.notFound,
  message: `${entity} ${id} was not found.`,
  details: { entity, id },
});

export const createCancelledError = (stage: string): FabricError => ({
  code: ErrorCodes.cancelled,
  message: `Change was cancelled during ${stage}.`,
  details: { stage },
});

export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  if (typeof cause === "string") {
    return cause;
  }
  try {
    return JSON.stringify(cause);
  } catch {
    return String(cause);
  }
};
