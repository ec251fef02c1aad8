import type { LogContextPatch } from "../ports/log-context"
import type { Logger } from "../ports/logger"
import type { LoggerOptions } from "../ports/logger-options"
import { createNullLogger } from "./null/null-logger"
import { createPinoLogger } from "./pino/pino-logger"

export type CreateLoggerOptions = Partial<LoggerOptions> & {
  /** `false` returns a logger that drops every entry. */
  enabled?: boolean
}

export function createLogger(
  opts: CreateLoggerOptions = {},
  context: LogContextPatch = {},
): Logger {
  const { enabled = true, ...loggerOptions } = opts
  if (!enabled) return createNullLogger()

  return createPinoLogger({}, loggerOptions, context)
}
