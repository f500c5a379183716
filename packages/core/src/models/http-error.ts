import { z } from "zod";

/**
 * Placeholder used whenever a failure has no usable message of its own.
 */
export const NO_ERROR_MESSAGE = "No error message provided";

/**
 * Message reported for every timed-out dispatch.
 */
export const TIMEOUT_ERROR_MESSAGE = "Timeout Error";

/**
 * Which row of the error taxonomy produced an {@link HttpError}.
 * - `veto`: the pre-send hook declined the request
 * - `http`: the server answered with a non-2xx status
 * - `timeout`: the dispatch did not finish in time
 * - `exception`: a recoverable runtime failure (network, decoding, parsing, converter)
 * - `fault`: a programming-level failure
 */
export type HttpErrorKind = "veto" | "http" | "timeout" | "exception" | "fault";

/**
 * Structured error carried by a failed {@link GenericResponse}.
 */
export interface HttpError {
  /** Human-readable description. Never empty on a surfaced outcome. */
  readonly message: string;
  readonly kind: HttpErrorKind;
  /** Decoded error payload sent by the server, when there was one */
  readonly details?: unknown;
}

const errorPayloadSchema = z
  .object({
    message: z.string().nullish(),
  })
  .passthrough();

/**
 * Creates an error, substituting the placeholder for an empty message.
 */
export function createHttpError(
  message: string | null | undefined,
  kind: HttpErrorKind,
  details?: unknown
): HttpError {
  const text = message && message.trim().length > 0 ? message : NO_ERROR_MESSAGE;
  return details === undefined
    ? { message: text, kind }
    : { message: text, kind, details };
}

/**
 * Deserializes the decoded JSON body of a non-2xx response.
 * Payloads that are not objects, or whose `message` is missing or not a
 * string, get the placeholder message; the payload itself is kept as `details`.
 */
export function httpErrorFromPayload(payload: unknown): HttpError {
  const parsed = errorPayloadSchema.safeParse(payload);
  const message = parsed.success ? parsed.data.message : undefined;
  return createHttpError(message, "http", payload);
}
