/**
 * Zod schemas for validating options and persisted data
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import type { AttributeValue } from "./types.js";
import { ENTITY_TYPE_PATTERN } from "./validation.js";

const EntityTypeSchema = z.string().min(1).superRefine((val, ctx) => {
  if (!ENTITY_TYPE_PATTERN.test(val)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        "entity type must start with a lowercase letter and contain only lowercase letters, digits and underscores",
    });
  }
});

// Recursive attribute value: scalar, sequence or mapping
export const AttributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.array(AttributeValueSchema),
    z.record(z.string(), AttributeValueSchema),
  ])
);

// On-disk entity document written by the file backend
export const EntityDocumentSchema = z.object({
  type: EntityTypeSchema,
  id: z.number().int().positive(),
  attributes: z.record(z.string(), AttributeValueSchema),
});

export type EntityDocument = z.infer<typeof EntityDocumentSchema>;

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const BackendOptionsSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("memory") }),
  z.object({
    kind: z.literal("file"),
    root: z.string().min(1).optional(),
    indent: z.number().int().min(0).max(8).optional(),
  }),
  z.object({
    kind: z.literal("sqlite"),
    filename: z.string().min(1).optional(),
    tablePrefix: z
      .string()
      .regex(/^[a-z0-9_]*$/, "table prefix may contain only lowercase letters, digits and underscores")
      .optional(),
  }),
]);

// Plain-data part of StoreOptions; functions and backend instances are checked separately
export const StoreOptionsSchema = z.object({
  entityTypes: z
    .array(EntityTypeSchema)
    .min(1, "entityTypes must not be empty when provided")
    .optional(),
  largeValueLimit: z.number().int().positive().optional(),
  logLevel: LogLevelSchema.optional(),
});

// Environment overrides
export const EnvSchema = z.object({
  ATTRSTORE_LOG_LEVEL: LogLevelSchema.optional(),
  ATTRSTORE_LARGE_VALUE_LIMIT: z.coerce.number().int().positive().optional(),
  ATTRSTORE_ROOT: z.string().min(1).optional(),
});
