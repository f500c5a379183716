import { RequestAdapter } from "@relayline/core";
import type {
  DispatchRequest,
  RawResponse,
  UrlValidationOptions,
} from "@relayline/core";

/**
 * The subset of the Fetch API the adapter calls.
 */
export type FetchFunction = (
  input: string,
  init: RequestInit
) => Promise<Response>;

/**
 * Request adapter implementation using the native Fetch API.
 * Provides a lightweight, dependency-free transport.
 *
 * @example
 * ```typescript
 * const pipeline = new RequestPipeline(new FetchRequestAdapter());
 * const response = await pipeline.send("api.example.com", "/users", "GET", toUsers);
 * ```
 */
export default class FetchRequestAdapter extends RequestAdapter {
  private readonly fetchFn: FetchFunction;

  /**
   * @param urlValidationOptions - Optional URL validation options to prevent SSRF attacks
   * @param fetchFn - Fetch implementation to use, the global `fetch` by default
   */
  constructor(
    urlValidationOptions?: UrlValidationOptions,
    fetchFn: FetchFunction = (input, init) => fetch(input, init)
  ) {
    super(urlValidationOptions);
    this.fetchFn = fetchFn;
  }

  public async createRequest(request: DispatchRequest): Promise<RawResponse> {
    const { method, url, headers, body } = request;
    const response = await this.fetchFn(url.toString(), {
      method,
      headers: { ...headers },
      body,
    });
    return {
      statusCode: response.status,
      body: new Uint8Array(await response.arrayBuffer()),
    };
  }
}
