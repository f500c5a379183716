/**
 * Supported HTTP methods for requests
 */
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * Scalar values accepted as query parameters. They are stringified before the
 * URI is built; `null` and `undefined` entries are left out.
 */
export type QueryParameterValue =
  | string
  | number
  | boolean
  | bigint
  | null
  | undefined;

export type QueryParameters = Readonly<Record<string, QueryParameterValue>>;

export type HttpHeaders = Readonly<Record<string, string>>;

/**
 * Turns the decoded JSON payload of a successful response into application
 * data. `payload` is `null` when the response had no body.
 */
export type ResponseConverter<T> = (payload: unknown) => T;

/**
 * Declarative description of a single HTTP call.
 *
 * @template T - The type produced by the converter on success
 *
 * @example
 * ```typescript
 * const request = defineRequest({
 *   host: "api.example.com",
 *   path: "/items/1",
 *   method: "GET",
 *   converter: (payload) => ItemSchema.parse(payload),
 * });
 * ```
 */
export interface HttpRequest<T> {
  /** Host name, optionally with a port (`localhost:8080`) */
  readonly host: string;
  /** Path of the resource on the host */
  readonly path: string;
  /** The HTTP method to use */
  readonly method: HttpMethod;
  /** Per-request headers, merged over the configured defaults */
  readonly headers?: HttpHeaders;
  /** Per-request query parameters, merged over the configured defaults */
  readonly queryParameters?: QueryParameters;
  /** Raw request body. Dropped for GET requests. */
  readonly body?: string;
  /** Converter applied to the decoded payload of a successful response */
  readonly converter: ResponseConverter<T>;
}

/**
 * Creates a frozen request descriptor. The header and parameter maps are
 * copied, so later changes to the caller's objects do not leak into it.
 */
export function defineRequest<T>(request: HttpRequest<T>): HttpRequest<T> {
  return Object.freeze({
    ...request,
    headers: request.headers ? Object.freeze({ ...request.headers }) : undefined,
    queryParameters: request.queryParameters
      ? Object.freeze({ ...request.queryParameters })
      : undefined,
  });
}
