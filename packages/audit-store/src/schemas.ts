import { z } from "zod";

const artifactSchema = z.object({
  device: z.string(),
  interface: z.string(),
  lines: z.array(z.string()),
  text: z.string(),
  synthesizedAt: z.string(),
});

export const auditRecordSchema = z.object({
  commitId: z.string(),
  sequence: z.number().int().nonnegative(),
  device: z.string(),
  interface: z.string(),
  artifact: artifactSchema,
  author: z.string(),
  committedAt: z.string(),
  parentCommitId: z.string().nullable(),
  kind: z.enum(["change", "rollback"]),
  rollbackOf: z.string().optional(),
  message: z.string(),
});

export const commitIndexSchema = z.object({
  commitId: z.string(),
  device: z.string(),
  interface: z.string(),
  sequence: z.number().int().nonnegative(),
  path: z.string(),
});

export type CommitIndexEntry = z.infer<typeof commitIndexSchema>;

const storedErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
  retryable: z.boolean().optional(),
});

export const applyOutcomeSchema = z.object({
  commitId: z.string(),
  status: z.enum(["succeeded", "failed"]),
  results: z.array(
    z.object({
      device: z.string(),
      success: z.boolean(),
      error: storedErrorSchema.optional(),
      durationMs: z.number().nonnegative(),
    }),
  ),
  recordedAt: z.string(),
});
