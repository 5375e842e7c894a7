import { ErrorCode, ErrorMessages } from "@typeforest/shared-types";

/**
 * Debugging context for error tracing. Never part of the message itself, so
 * messages stay auditable in error-messages.ts.
 */
export interface ErrorContext {
  operation?: string;

  // Input location
  columnSetIndex?: number;
  fieldCount?: number;
  limit?: number;

  // Forest nodes
  nodeId?: number;
  parentId?: number;
  existingParentId?: number;

  // Types and registry entries
  typeName?: string;
  parentName?: string;

  /** Individual validation failures, one line each. */
  violations?: string[];
}

/**
 * Centralized error class for typeforest domain errors.
 *
 * Message is automatically derived from error code so every message lives in
 * one place.
 *
 * @param code - Error code from ErrorCode enum
 * @param cause - Original error for error chaining
 * @param context - Debugging context
 */
export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    readonly cause?: unknown,
    readonly context?: ErrorContext,
  ) {
    super(ErrorMessages[code]);
    this.name = "AppError";
  }
}
