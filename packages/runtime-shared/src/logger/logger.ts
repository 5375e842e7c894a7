import {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
  destination as pinoDestination,
  pino,
} from "pino";

import type { Env } from "../config/env.schema";

/** File descriptor every logger writes to; stdout carries emitted artifacts. */
export const LOG_DESTINATION_FD = 2;

/**
 * Creates pino options based on environment settings.
 * Exported for testing.
 */
export function createPinoOptions(
  nodeEnv: Env["NODE_ENV"],
  logFormat: Env["LOG_FORMAT"],
  logLevel: Env["LOG_LEVEL"] | undefined,
): LoggerOptions {
  const isProduction = nodeEnv === "production";
  const useJson = logFormat === "json" || isProduction;

  return {
    level: logLevel ?? (isProduction ? "info" : "debug"),
    transport: useJson
      ? undefined
      : {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            destination: LOG_DESTINATION_FD,
          },
        },
  };
}

/**
 * Builds the root logger for a process. JSON output goes straight to stderr;
 * text output is routed through the pino-pretty transport.
 */
export function createLogger(
  env: Pick<Env, "NODE_ENV" | "LOG_FORMAT" | "LOG_LEVEL">,
  name: string,
  destination?: DestinationStream,
): Logger {
  const options = {
    ...createPinoOptions(env.NODE_ENV, env.LOG_FORMAT, env.LOG_LEVEL),
    name,
  };
  if (options.transport) {
    return pino(options);
  }
  return pino(options, destination ?? pinoDestination(LOG_DESTINATION_FD));
}

/** Default for library entry points called without a logger. */
export const silentLogger: Logger = pino({ level: "silent" });
