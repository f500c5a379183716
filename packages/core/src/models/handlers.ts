import type { GenericResponse } from "./generic-response";
import { createHttpError, type HttpError } from "./http-error";
import type { HttpRequest } from "./http-request";

/**
 * Decision returned by a {@link PreSendHook}: either let the request go out,
 * or veto it and report `error` as its outcome instead.
 */
export type PreSendVerdict =
  | { readonly action: "send" }
  | { readonly action: "veto"; readonly error: HttpError };

export function proceed(): PreSendVerdict {
  return { action: "send" };
}

export function veto(message: string, details?: unknown): PreSendVerdict {
  return { action: "veto", error: createHttpError(message, "veto", details) };
}

/**
 * Called before anything else happens to a request. A veto stops the request
 * before the transport is touched.
 *
 * @example
 * ```typescript
 * pipeline.withPreSend(() =>
 *   session.isAuthenticated() ? proceed() : veto("Not signed in")
 * );
 * ```
 */
export interface PreSendHook {
  (request: HttpRequest<unknown>): PreSendVerdict | Promise<PreSendVerdict>;
}

/**
 * Called once a response has been classified, successful or not.
 * Never called when the pipeline failed before a response existed.
 */
export interface PostSendHook {
  (request: HttpRequest<unknown>, response: GenericResponse<unknown>): void;
}

/**
 * `exception` marks recoverable runtime failures (network, malformed bodies,
 * rejected URLs, converters that refuse a payload); `fault` marks
 * programming-level failures such as a `TypeError` thrown by a converter.
 */
export type FailureKind = "exception" | "fault";

export interface PipelineFailure {
  readonly kind: FailureKind;
  /** The value that was thrown */
  readonly cause: unknown;
  /** The diagnostic message reported on the outcome */
  readonly message: string;
}

/**
 * Called when the pipeline aborts because something threw.
 */
export interface FailureHook {
  (request: HttpRequest<unknown>, failure: PipelineFailure): void;
}

/**
 * Called when the dispatch exceeds the configured timeout, before the
 * timeout is classified as an error response.
 */
export interface TimeoutHook {
  (request: HttpRequest<unknown>): void;
}
