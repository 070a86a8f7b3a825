import {
  ErrorCodes,
  type ApplyResult,
  validationIssuesOf,
  type FabricError,
  type ValidationIssue,
} from "@fabricops/contracts";
import type { ChangeReport, ChangeStage } from "@fabricops/orchestrator";

export type ApiStage = ChangeStage | "query";

export interface ApiErrorBody {
  readonly error: {
    readonly code: string;
    readonly message: string;
    readonly stage: ApiStage;
    readonly issues?: ReadonlyArray<ValidationIssue>;
    readonly details?: Record<string, unknown>;
    readonly changeId?: string;
    readonly commitId?: string;
    readonly failedDevices: ReadonlyArray<string>;
    readonly succeededDevices: ReadonlyArray<string>;
  };
}

const STATUS_BY_CODE = new Map<string, number>([
  [ErrorCodes.validation, 400],
  [ErrorCodes.notFound, 404],
  [ErrorCodes.unsafeToConfigure, 409],
  [ErrorCodes.deviceRejected, 422],
  [ErrorCodes.cancelled, 499],
  [ErrorCodes.storeCorruption, 500],
  [ErrorCodes.deviceUnreachable, 502],
  [ErrorCodes.deviceTimeout, 504],
]);

export const statusForError = (code: string): number => STATUS_BY_CODE.get(code) ?? 500;

const JSON_HEADERS = { "content-type": "application/json" };

export const jsonResponse = (status: number, body: unknown): Response =>
  new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });

export interface ErrorResponseContext {
  readonly stage: ApiStage;
  readonly results?: ReadonlyArray<ApplyResult>;
  readonly changeId?: string;
  readonly commitId?: string;
}

export const errorResponse = (error: FabricError, context: ErrorResponseContext): Response => {
  const results = context.results ?? [];
  const issues = validationIssuesOf(error);
  const body: ApiErrorBody = {
    error: {
      code: error.code,
      message: error.message,
      stage: context.stage,
      ...(issues ? { issues } : { details: error.details }),
      ...(context.changeId ? { changeId: context.changeId } : {}),
      ...(context.commitId ? { commitId: context.commitId } : {}),
      failedDevices: results.filter((result) => !result.success).map((result) => result.device),
      succeededDevices: results.filter((result) => result.success).map((result) => result.device),
    },
  };
  return jsonResponse(statusForError(error.code), body);
};

/** Error response for a report that ended anywhere but `succeeded`. */
export const reportErrorResponse = (report: ChangeReport): Response | null => {
  if (!report.failure) {
    return null;
  }
  return errorResponse(report.failure.error, {
    stage: report.failure.stage,
    results: report.results,
    changeId: report.changeId,
    commitId: report.commit?.commitId,
  });
};
