import { z } from "zod";
import { ConfigurationError } from "../errors";
import {
  createPipelineConfig,
  type PipelineConfig,
} from "../models/pipeline-config";
import { createPipelineLogger } from "./logger";

const envSchema = z.object({
  RELAYLINE_TIMEOUT_SECONDS: z.coerce.number().int().positive().optional(),
  RELAYLINE_SCHEME: z.enum(["https", "http"]).optional(),
  RELAYLINE_LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .optional(),
});

/**
 * Builds a pipeline configuration from environment variables:
 * `RELAYLINE_TIMEOUT_SECONDS`, `RELAYLINE_SCHEME` and `RELAYLINE_LOG_LEVEL`.
 * Unset variables keep their defaults.
 *
 * @throws {ConfigurationError} If a variable is set to an invalid value
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid relayline environment configuration: ${issues.join("; ")}`,
      { issues }
    );
  }

  const { RELAYLINE_TIMEOUT_SECONDS, RELAYLINE_SCHEME, RELAYLINE_LOG_LEVEL } =
    result.data;
  const config = createPipelineConfig({
    logger: createPipelineLogger({ level: RELAYLINE_LOG_LEVEL ?? "warn" }),
  });
  if (RELAYLINE_TIMEOUT_SECONDS !== undefined) {
    config.timeoutSeconds = RELAYLINE_TIMEOUT_SECONDS;
  }
  if (RELAYLINE_SCHEME !== undefined) {
    config.scheme = RELAYLINE_SCHEME;
  }
  return config;
}
