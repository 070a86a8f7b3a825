import { z } from "zod";

export const MAX_HISTORY_LIMIT = 1_000;

const nameSchema = (label: string) =>
  z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a string` })
    .trim()
    .min(1, `${label} is required`);

export const precheckInputSchema = z.object({
  device: nameSchema("device"),
  interface: nameSchema("interface"),
});

export const historyQuerySchema = z.object({
  device: nameSchema("device").optional(),
  interface: nameSchema("interface").optional(),
  limit: z.coerce
    .number({ invalid_type_error: "limit must be a number" })
    .int("limit must be an integer")
    .min(1, "limit must be at least 1")
    .max(MAX_HISTORY_LIMIT, `limit must be at most ${MAX_HISTORY_LIMIT}`)
    .optional(),
});

export const rollbackBodySchema = z.object({
  author: nameSchema("author").pipe(z.string().max(128, "author must be at most 128 characters")).optional(),
  apply: z.boolean({ invalid_type_error: "apply must be a boolean" }).optional(),
});

export type PrecheckInput = z.infer<typeof precheckInputSchema>;
export type HistoryQueryInput = z.infer<typeof historyQuerySchema>;
export type RollbackBody = z.infer<typeof rollbackBodySchema>;
