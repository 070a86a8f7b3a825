import { z } from "zod";

const inventoryEntrySchema = z.object({
  hostname: z.string().trim().min(1).optional(),
  platform: z.string().trim().min(1).optional(),
  port: z.number().int().min(1).max(65_535).optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  groups: z.array(z.string().min(1)).default([]),
  data: z.record(z.unknown()).default({}),
});

export type InventoryEntry = z.infer<typeof inventoryEntrySchema>;

const entryMapSchema = z.record(inventoryEntrySchema.nullable().transform((entry) => entry ?? inventoryEntrySchema.parse({})));

export const hostsDocumentSchema = entryMapSchema;
export const groupsDocumentSchema = entryMapSchema;
export const defaultsDocumentSchema = inventoryEntrySchema.omit({ hostname: true, groups: true });

export type InventoryDefaults = z.infer<typeof defaultsDocumentSchema>;
