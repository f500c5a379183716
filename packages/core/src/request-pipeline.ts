import type RequestAdapter from "./request-adapter";
import type { DispatchRequest, RawResponse } from "./request-adapter";
import {
  ConverterError,
  ResponseDecodeError,
  ResponseParseError,
  TransportError,
  describeCause,
} from "./errors";
import {
  EXCEPTION_STATUS_CODE,
  TIMEOUT_STATUS_CODE,
  errorResponse,
  successResponse,
  type ErrorResponse,
  type GenericResponse,
} from "./models/generic-response";
import {
  proceed,
  type FailureHook,
  type PostSendHook,
  type PreSendHook,
  type PreSendVerdict,
  type TimeoutHook,
} from "./models/handlers";
import {
  NO_ERROR_MESSAGE,
  TIMEOUT_ERROR_MESSAGE,
  createHttpError,
  httpErrorFromPayload,
  type HttpError,
} from "./models/http-error";
import {
  defineRequest,
  type HttpMethod,
  type HttpRequest,
  type QueryParameterValue,
  type ResponseConverter,
} from "./models/http-request";
import {
  createPipelineConfig,
  type PipelineConfig,
} from "./models/pipeline-config";
import { classifyFailure } from "./utils/failure-classifier";
import { buildUri, normalizePath, type UriScheme } from "./utils/uri-builder";

/**
 * Optional parts of a request accepted by {@link RequestPipeline.send}.
 */
export type SendOptions = Pick<
  HttpRequest<unknown>,
  "headers" | "queryParameters" | "body"
>;

/**
 * A request after defaults have been merged in, plus the string parameters
 * its URL was built from (kept for diagnostics).
 */
interface PreparedRequest extends DispatchRequest {
  readonly params: Readonly<Record<string, string>>;
}

const TIMED_OUT = Symbol("timed-out");

/** Longest delay `setTimeout` honours; larger ones fire after 1 ms */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

const utf8 = new TextDecoder("utf-8", { fatal: true });

function isPresent<T>(value: T): value is NonNullable<T> {
  return value !== null && value !== undefined;
}

function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/**
 * Merges header maps, letting `overrides` win regardless of letter case.
 */
export function mergeHeaders(
  defaults: Readonly<Record<string, string>>,
  overrides: Readonly<Record<string, string>> = {}
): Record<string, string> {
  const merged: Record<string, string> = { ...defaults };
  for (const [name, value] of Object.entries(overrides)) {
    removeHeader(merged, name);
    merged[name] = value;
  }
  return merged;
}

function removeHeader(headers: Record<string, string>, name: string): void {
  const lowered = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lowered) {
      delete headers[key];
    }
  }
}

/**
 * Stringifies parameter values, leaving out `null` and `undefined` entries.
 */
export function stringifyParams(
  params: Readonly<Record<string, QueryParameterValue>>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(params)) {
    if (isPresent(value)) {
      result[name] = String(value);
    }
  }
  return result;
}

function decodeBody(body: Uint8Array): string {
  try {
    return utf8.decode(body);
  } catch (error) {
    throw new ResponseDecodeError(error);
  }
}

function parsePayload(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ResponseParseError(error, text);
  }
}

/**
 * Runs one {@link HttpRequest} through the pipeline: pre-send veto, merge of
 * the configured defaults, dispatch under a timeout, classification of the
 * response, and the lifecycle hooks around them.
 *
 * `execute` never rejects. Every failure, including exceptions thrown by the
 * transport or the converter, comes back as a failed {@link GenericResponse}.
 *
 * @example
 * ```typescript
 * const pipeline = new RequestPipeline(new FetchRequestAdapter())
 *   .withPreSend(() => (token ? proceed() : veto("Not signed in")))
 *   .withPostSend((request, response) => audit(request.path, response.statusCode));
 *
 * const response = await pipeline.send("api.example.com", "/items/1", "GET", toItem);
 * ```
 */
export default class RequestPipeline {
  /**
   * Live configuration. Read at the moment each stage needs a value, so it can
   * be changed between calls.
   */
  public config: PipelineConfig;

  protected adapter: RequestAdapter;

  constructor(
    adapter: RequestAdapter,
    config: PipelineConfig = createPipelineConfig()
  ) {
    this.adapter = adapter;
    this.config = config;
  }

  //  #region Public methods

  public withPreSend = (hook: PreSendHook): RequestPipeline => {
    this.config.preSend = hook;
    return this;
  };

  public withPostSend = (hook: PostSendHook): RequestPipeline => {
    this.config.postSend = hook;
    return this;
  };

  public withFailureHandler = (hook: FailureHook): RequestPipeline => {
    this.config.onFailure = hook;
    return this;
  };

  public withTimeoutHandler = (hook: TimeoutHook): RequestPipeline => {
    this.config.onTimeout = hook;
    return this;
  };

  /**
   * Builds a request descriptor from its parts and executes it.
   */
  public send = <T>(
    host: string,
    path: string,
    method: HttpMethod,
    converter: ResponseConverter<T>,
    options: SendOptions = {}
  ): Promise<GenericResponse<T>> => {
    return this.execute(
      defineRequest({ ...options, host, path, method, converter })
    );
  };

  /**
   * Executes a request and classifies its outcome.
   *
   * @template T - The type produced by the request's converter
   * @returns The classified outcome; never rejects
   */
  public execute = async <T>(
    request: HttpRequest<T>
  ): Promise<GenericResponse<T>> => {
    let prepared: PreparedRequest | undefined;
    try {
      const verdict = await this.runPreSend(request);
      if (verdict.action === "veto") {
        this.config.logger.debug("Request vetoed before sending", {
          method: request.method,
          host: request.host,
          path: request.path,
          reason: verdict.error.message,
        });
        return errorResponse(verdict.error, EXCEPTION_STATUS_CODE);
      }

      prepared = this.prepare(request);
      const rawResponse = await this.dispatch(request, prepared);
      return this.classify(request, rawResponse);
    } catch (error) {
      return this.fail(request, prepared, error);
    }
  };

  //  #endregion

  //  #region Private methods

  private runPreSend = (
    request: HttpRequest<unknown>
  ): PreSendVerdict | Promise<PreSendVerdict> => {
    const { preSend } = this.config;
    return preSend ? preSend(request) : proceed();
  };

  /**
   * Merges defaults into the request and builds its URL.
   */
  private prepare = (request: HttpRequest<unknown>): PreparedRequest => {
    const { defaultHeaders, defaultParams, scheme, logger } = this.config;
    const headers = mergeHeaders(defaultHeaders, request.headers);
    const params = stringifyParams({
      ...defaultParams,
      ...request.queryParameters,
    });
    let body = request.body;

    if (request.method === "GET") {
      // GET requests carry no body, so there is nothing for Content-Type to describe
      removeHeader(headers, "Content-Type");
      if (body !== undefined) {
        logger.warn("Dropping body of GET request", {
          host: request.host,
          path: request.path,
        });
        body = undefined;
      }
    }

    const url = buildUri(scheme, request.host, request.path, params);
    return { method: request.method, url, headers, body, params };
  };

  /**
   * Hands the request to the adapter, racing it against the configured
   * timeout. A timed-out dispatch resolves to a synthetic empty response with
   * {@link TIMEOUT_STATUS_CODE}; the underlying call is abandoned, not cancelled.
   * An infinite timeout waits for the transport however long it takes.
   */
  private dispatch = async (
    request: HttpRequest<unknown>,
    prepared: PreparedRequest
  ): Promise<RawResponse> => {
    const { logger, timeoutSeconds } = this.config;
    logger.debug("Dispatching request", {
      method: prepared.method,
      url: prepared.url.toString(),
    });

    let transport: Promise<RawResponse>;
    try {
      transport = this.adapter.executeRequest(prepared);
    } catch (error) {
      throw new TransportError(error);
    }
    const guarded = transport.catch((error: unknown) => {
      throw new TransportError(error);
    });

    const delayMs = timeoutSeconds * 1000;
    if (delayMs === Infinity) {
      return guarded;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(
        () => resolve(TIMED_OUT),
        Math.min(delayMs, MAX_TIMER_DELAY_MS)
      );
    });

    try {
      const winner = await Promise.race([guarded, timeout]);
      if (winner !== TIMED_OUT) {
        return winner;
      }
    } finally {
      clearTimeout(timer);
    }

    void guarded.catch((error: unknown) => {
      logger.debug("Abandoned request failed after its timeout", {
        url: prepared.url.toString(),
        error: describeCause(error),
      });
    });
    logger.warn("Request timed out", {
      method: prepared.method,
      url: prepared.url.toString(),
      timeoutSeconds,
    });
    this.notify("onTimeout", () => this.config.onTimeout?.(request));
    return { statusCode: TIMEOUT_STATUS_CODE, body: new Uint8Array(0) };
  };

  /**
   * Turns a raw response into an outcome and reports it to `postSend`.
   *
   * @throws If the body cannot be decoded or parsed, or the converter fails
   */
  private classify = <T>(
    request: HttpRequest<T>,
    rawResponse: RawResponse
  ): GenericResponse<T> => {
    const { statusCode } = rawResponse;
    const text = decodeBody(rawResponse.body);

    let response: GenericResponse<T>;
    if (isSuccessStatus(statusCode)) {
      const data = request.converter(parsePayload(text));
      if (!isPresent(data)) {
        throw new ConverterError(
          `Converter produced no data for a ${statusCode} response`
        );
      }
      response = successResponse<T>(data, statusCode);
    } else {
      response = errorResponse(toHttpError(statusCode, text), statusCode);
    }

    this.config.logger.debug("Classified response", {
      statusCode,
      isSuccess: response.isSuccess,
    });
    this.notify("postSend", () => this.config.postSend?.(request, response));
    return response;
  };

  /**
   * Converts a thrown value into a failed outcome and reports it to `onFailure`.
   */
  private fail = (
    request: HttpRequest<unknown>,
    prepared: PreparedRequest | undefined,
    error: unknown
  ): ErrorResponse => {
    const kind = classifyFailure(error);
    const message = describeFailure(
      kind === "fault" ? "Http fault" : "Http exception",
      this.config.scheme,
      request,
      prepared,
      error
    );

    this.config.logger.error("Request failed", {
      kind,
      method: request.method,
      host: request.host,
      path: request.path,
      error: describeCause(error),
    });
    this.notify("onFailure", () =>
      this.config.onFailure?.(request, { kind, cause: error, message })
    );
    return errorResponse(createHttpError(message, kind), EXCEPTION_STATUS_CODE);
  };

  /**
   * Invokes an observer hook. Hook errors are logged and never change the outcome.
   */
  private notify = (hookName: string, invoke: () => void): void => {
    try {
      invoke();
    } catch (error) {
      this.config.logger.error(`The ${hookName} hook threw`, {
        error: describeCause(error),
      });
    }
  };

  //  #endregion
}

function toHttpError(statusCode: number, text: string): HttpError {
  if (statusCode === TIMEOUT_STATUS_CODE) {
    return createHttpError(TIMEOUT_ERROR_MESSAGE, "timeout");
  }
  if (text.length === 0) {
    return createHttpError(NO_ERROR_MESSAGE, "http");
  }
  return httpErrorFromPayload(parsePayload(text));
}

function describeFailure(
  title: string,
  scheme: UriScheme,
  request: HttpRequest<unknown>,
  prepared: PreparedRequest | undefined,
  error: unknown
): string {
  // Before preparation there is no URL object yet, and the host may be what failed
  const url = prepared
    ? prepared.url.toString()
    : `${scheme}://${request.host}${normalizePath(request.path)}`;
  const headers = prepared ? prepared.headers : request.headers ?? {};
  const params = prepared ? prepared.params : request.queryParameters ?? {};
  const body = prepared ? prepared.body : request.body;
  return [
    `${title}: ${describeCause(error)}`,
    `Method: ${request.method}`,
    `URL: ${url}`,
    `Headers: ${toJson(headers)}`,
    `Parameters: ${toJson(params)}`,
    `Body: ${body ?? "<none>"}`,
  ].join("\n");
}

function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, entry: unknown) =>
    typeof entry === "bigint" ? entry.toString() : entry
  );
}
