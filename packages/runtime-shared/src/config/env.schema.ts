import { ErrorCode } from "@typeforest/shared-types";
import { z } from "zod";

import { AppError } from "../common/errors/app-error";
import { formatZodIssues } from "../common/errors/wrap-error";

/** Names that can appear as a TypeScript type name. */
export const IDENTIFIER_PATTERN = /^[A-Za-z_$][\w$]*$/;

// =============================================================================
// Capability Schemas
// =============================================================================

/**
 * Infrastructure schema - shared by every entry point.
 */
export const infrastructureSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_FORMAT: z.enum(["json", "text"]).default("text"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
});

/**
 * Resolution schema - tunables for subset discovery and type naming.
 */
export const resolutionSchema = z.object({
  MIN_SUBSET_SIZE: z.coerce.number().int().min(1).default(2),
  // 2^30 subsets per column set is already far past anything usable
  MAX_FIELDS_PER_COLUMN_SET: z.coerce.number().int().min(1).max(30).default(20),
  TYPE_NAME_PREFIX: z
    .string()
    .regex(IDENTIFIER_PATTERN, "TYPE_NAME_PREFIX must be a valid identifier")
    .default("ColumnSubset"),
  CAPABILITY_MARKER: z
    .string()
    .regex(IDENTIFIER_PATTERN, "CAPABILITY_MARKER must be a valid identifier")
    .default("IColumnSubset"),
  FIRST_TYPE_ID: z.coerce.number().int().min(0).default(1),
});

// =============================================================================
// Application Schema
// =============================================================================

export const envSchema = infrastructureSchema.merge(resolutionSchema);

export type Env = z.infer<typeof envSchema>;

// =============================================================================
// Validation Functions
// =============================================================================

/**
 * Validates raw environment variables, usually `process.env`.
 *
 * @throws AppError with CONFIG_ERROR and one violation per failed variable
 */
export function validateEnv(env: Record<string, unknown>): Env {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new AppError(ErrorCode.CONFIG_ERROR, result.error, {
      operation: "validateEnv",
      violations: formatZodIssues(result.error),
    });
  }
  return result.data;
}
