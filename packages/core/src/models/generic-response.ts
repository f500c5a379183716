import { createHttpError, type HttpError } from "./http-error";

/**
 * Status code reported for a dispatch that did not finish in time.
 * Lies outside the range of real HTTP status codes.
 */
export const TIMEOUT_STATUS_CODE = 999;

/**
 * Status code reported when no response was ever classified
 * (veto, exception, fault).
 */
export const EXCEPTION_STATUS_CODE = -1;

/**
 * Outcome of a request whose response was classified as a success.
 */
export interface SuccessResponse<T> {
  readonly isSuccess: true;
  readonly statusCode: number;
  readonly data: NonNullable<T>;
  readonly error?: undefined;
}

/**
 * Outcome of a request that failed, for whatever reason.
 */
export interface ErrorResponse {
  readonly isSuccess: false;
  readonly statusCode: number;
  readonly data?: undefined;
  readonly error: HttpError;
}

/**
 * Result of one pipeline invocation. Branch on `isSuccess`:
 *
 * @example
 * ```typescript
 * const response = await pipeline.execute(request);
 * if (response.isSuccess) {
 *   render(response.data);
 * } else {
 *   showError(response.error.message);
 * }
 * ```
 */
export type GenericResponse<T> = SuccessResponse<T> | ErrorResponse;

export function successResponse<T>(
  data: NonNullable<T>,
  statusCode: number
): SuccessResponse<T> {
  const response: SuccessResponse<T> = { isSuccess: true, statusCode, data };
  return Object.freeze(response);
}

export function errorResponse(
  error: HttpError,
  statusCode: number
): ErrorResponse {
  const response: ErrorResponse = {
    isSuccess: false,
    statusCode,
    error:
      error.message.trim().length > 0
        ? error
        : createHttpError(error.message, error.kind, error.details),
  };
  return Object.freeze(response);
}
