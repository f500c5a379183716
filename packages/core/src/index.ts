/**
 * @packageDocumentation
 * @module @relayline/core
 *
 * Relayline Core Package
 *
 * A request/response pipeline over a pluggable HTTP transport: merges default
 * headers and query parameters, dispatches under a timeout, classifies every
 * response into a typed success-or-error outcome, and runs lifecycle hooks
 * around each call.
 */

// Main exports
export { default as RequestAdapter } from "./request-adapter";
export { default as RequestPipeline } from "./request-pipeline";
export { default } from "./request-pipeline";
export { mergeHeaders, stringifyParams } from "./request-pipeline";

// Types
export type { DispatchRequest, RawResponse } from "./request-adapter";
export type { SendOptions } from "./request-pipeline";
export type {
  HttpMethod,
  HttpHeaders,
  HttpRequest,
  QueryParameters,
  QueryParameterValue,
  ResponseConverter,
} from "./models/http-request";
export type {
  GenericResponse,
  SuccessResponse,
  ErrorResponse,
} from "./models/generic-response";
export type { HttpError, HttpErrorKind } from "./models/http-error";
export type {
  PreSendVerdict,
  PreSendHook,
  PostSendHook,
  FailureHook,
  FailureKind,
  PipelineFailure,
  TimeoutHook,
} from "./models/handlers";
export type { PipelineConfig } from "./models/pipeline-config";

// Models
export { defineRequest } from "./models/http-request";
export {
  TIMEOUT_STATUS_CODE,
  EXCEPTION_STATUS_CODE,
  successResponse,
  errorResponse,
} from "./models/generic-response";
export {
  NO_ERROR_MESSAGE,
  TIMEOUT_ERROR_MESSAGE,
  createHttpError,
  httpErrorFromPayload,
} from "./models/http-error";
export { proceed, veto } from "./models/handlers";
export {
  DEFAULT_TIMEOUT_SECONDS,
  createPipelineConfig,
  defaultHeaders,
} from "./models/pipeline-config";

// Errors
export {
  RelaylineError,
  TransportError,
  ResponseDecodeError,
  ResponseParseError,
  ConverterError,
  ConfigurationError,
  describeCause,
} from "./errors";

// Utilities
export { buildUri } from "./utils/uri-builder";
export type { UriScheme } from "./utils/uri-builder";
export { classifyFailure } from "./utils/failure-classifier";
export { configFromEnv } from "./utils/env-config";
export { createPipelineLogger } from "./utils/logger";
export type { PipelineLoggerOptions } from "./utils/logger";

// Security utilities
export { validateUrl, SSRFError } from "./utils/url-validator";
export type { UrlValidationOptions } from "./utils/url-validator";
