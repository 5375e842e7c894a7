export {
  AppError,
  type ErrorContext,
  formatZodIssues,
  toAppError,
} from "./common/errors";
export {
  type Env,
  envSchema,
  IDENTIFIER_PATTERN,
  infrastructureSchema,
  resolutionSchema,
  validateEnv,
} from "./config/env.schema";
export {
  createLogger,
  createPinoOptions,
  LOG_DESTINATION_FD,
  silentLogger,
} from "./logger/logger";
