import type { Logger } from "winston";
import { createPipelineLogger } from "../utils/logger";
import type { UriScheme } from "../utils/uri-builder";
import type {
  FailureHook,
  PostSendHook,
  PreSendHook,
  TimeoutHook,
} from "./handlers";
import type { QueryParameterValue } from "./http-request";

export const DEFAULT_TIMEOUT_SECONDS = 10;

/**
 * Mutable defaults and hook slots of one {@link RequestPipeline}.
 * The pipeline reads each field when it needs it, so any field may be
 * reassigned between (or during) calls, e.g. to add an auth header after login.
 */
export interface PipelineConfig {
  /**
   * Maximum time a single dispatch may take, in seconds. `Infinity` disables
   * the limit; finite values above what a timer can hold are capped at about
   * 24.8 days.
   */
  timeoutSeconds: number;
  /** Headers sent with every request; per-request headers win on conflict */
  defaultHeaders: Record<string, string>;
  /** Query parameters sent with every request; per-request values win on conflict */
  defaultParams: Record<string, QueryParameterValue>;
  scheme: UriScheme;
  preSend?: PreSendHook;
  postSend?: PostSendHook;
  onFailure?: FailureHook;
  onTimeout?: TimeoutHook;
  logger: Logger;
}

export function defaultHeaders(): Record<string, string> {
  return {
    "Content-Type": "application/json;charset=UTF-8",
    Accept: "application/json",
  };
}

/**
 * Builds a configuration from the defaults, with `overrides` applied on top.
 * An override left `undefined` keeps its default.
 */
export function createPipelineConfig(
  overrides: Partial<PipelineConfig> = {}
): PipelineConfig {
  return {
    preSend: overrides.preSend,
    postSend: overrides.postSend,
    onFailure: overrides.onFailure,
    onTimeout: overrides.onTimeout,
    timeoutSeconds: overrides.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
    defaultHeaders: overrides.defaultHeaders ?? defaultHeaders(),
    defaultParams: overrides.defaultParams ?? {},
    scheme: overrides.scheme ?? "https",
    logger: overrides.logger ?? createPipelineLogger(),
  };
}
