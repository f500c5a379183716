import { createLogger, format, transports, type Logger } from "winston";

export interface PipelineLoggerOptions {
  /** Minimum level to emit. Defaults to `RELAYLINE_LOG_LEVEL`, then `warn`. */
  level?: string;
  /** Suppresses all output, e.g. in tests */
  silent?: boolean;
}

/**
 * Creates the winston logger a pipeline reports its diagnostics to.
 */
export function createPipelineLogger(
  options: PipelineLoggerOptions = {}
): Logger {
  return createLogger({
    level: options.level ?? process.env.RELAYLINE_LOG_LEVEL ?? "warn",
    silent: options.silent ?? false,
    defaultMeta: { service: "relayline" },
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.json()
    ),
    transports: [
      new transports.Console({
        stderrLevels: ["error", "warn"],
        format: format.combine(format.colorize(), format.simple()),
      }),
    ],
  });
}
