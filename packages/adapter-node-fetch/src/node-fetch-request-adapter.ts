import { RequestAdapter } from "@relayline/core";
import type {
  DispatchRequest,
  RawResponse,
  UrlValidationOptions,
} from "@relayline/core";
import fetch from "node-fetch";
import type { RequestInit, Response } from "node-fetch";

export type NodeFetchFunction = (
  url: string,
  init: RequestInit
) => Promise<Response>;

/**
 * Request adapter implementation using node-fetch.
 *
 * @example
 * ```typescript
 * const pipeline = new RequestPipeline(new NodeFetchRequestAdapter());
 * ```
 */
export default class NodeFetchRequestAdapter extends RequestAdapter {
  private readonly fetchFn: NodeFetchFunction;

  /**
   * Creates a new NodeFetchRequestAdapter instance.
   *
   * @param urlValidationOptions - Optional URL validation options to prevent SSRF attacks
   * @param fetchFn - node-fetch compatible function, node-fetch itself by default
   */
  constructor(
    urlValidationOptions?: UrlValidationOptions,
    fetchFn: NodeFetchFunction = fetch
  ) {
    super(urlValidationOptions);
    this.fetchFn = fetchFn;
  }

  public async createRequest(request: DispatchRequest): Promise<RawResponse> {
    const { method, url, headers, body } = request;
    const fetchConfig: RequestInit = {
      method,
      headers: { ...headers },
    };
    if (body !== undefined) {
      fetchConfig.body = body;
    }

    const response = await this.fetchFn(url.toString(), fetchConfig);
    return {
      statusCode: response.status,
      body: new Uint8Array(await response.arrayBuffer()),
    };
  }
}
