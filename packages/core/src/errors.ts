/**
 * Base class for every error raised inside relayline.
 * Pipeline failures are surfaced as outcomes, so these mostly travel as the
 * `cause` of a {@link PipelineFailure} rather than reaching the caller.
 */
export class RelaylineError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    options: { cause?: unknown; details?: Record<string, unknown> } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The transport rejected before producing a response (connection refused,
 * DNS failure, socket reset...).
 */
export class TransportError extends RelaylineError {
  constructor(cause: unknown) {
    super("TRANSPORT_FAILED", describeCause(cause), { cause });
  }
}

/**
 * The response body was not valid UTF-8.
 */
export class ResponseDecodeError extends RelaylineError {
  constructor(cause: unknown) {
    super("RESPONSE_DECODE_FAILED", `Response body is not valid UTF-8: ${describeCause(cause)}`, {
      cause,
    });
  }
}

/**
 * The response body was not valid JSON.
 */
export class ResponseParseError extends RelaylineError {
  constructor(cause: unknown, body: string) {
    super("RESPONSE_PARSE_FAILED", `Response body is not valid JSON: ${describeCause(cause)}`, {
      cause,
      details: { body },
    });
  }
}

/**
 * The caller's converter could not turn the payload into data.
 */
export class ConverterError extends RelaylineError {
  constructor(message: string, cause?: unknown) {
    super("CONVERTER_FAILED", message, { cause });
  }
}

/**
 * Environment configuration did not pass validation.
 */
export class ConfigurationError extends RelaylineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_CONFIGURATION", message, { details });
  }
}

/**
 * Renders any thrown value as a single line of text.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message ? `${cause.name}: ${cause.message}` : cause.name;
  }
  if (typeof cause === "string") {
    return cause;
  }
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}
