/**
 * Error codes shared by every typeforest package.
 * Values equal their keys so codes survive JSON round trips unchanged.
 */
export enum ErrorCode {
  // Input
  INVALID_INPUT = "INVALID_INPUT",

  // Resolution
  DOMAIN_VIOLATION = "DOMAIN_VIOLATION",
  UNRESOLVED_ANCHOR = "UNRESOLVED_ANCHOR",

  // Collaborators
  REGISTRY_INVALID = "REGISTRY_INVALID",
  EMIT_FAILED = "EMIT_FAILED",

  // Infrastructure
  CONFIG_ERROR = "CONFIG_ERROR",
  UNKNOWN = "UNKNOWN",
}
