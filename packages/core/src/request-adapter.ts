import type { HttpMethod } from "./models/http-request";
import { validateUrl, type UrlValidationOptions } from "./utils/url-validator";

/**
 * A fully assembled request, ready to go on the wire.
 */
export interface DispatchRequest {
  readonly method: HttpMethod;
  readonly url: URL;
  readonly headers: Readonly<Record<string, string>>;
  /** Always undefined for GET requests */
  readonly body?: string;
}

/**
 * Status code and undecoded body bytes, exactly as the transport received them.
 */
export interface RawResponse {
  readonly statusCode: number;
  readonly body: Uint8Array;
}

/**
 * Transport capability behind a {@link RequestPipeline}.
 * Implementations resolve with whatever status the server sent and reject
 * only on connection-level failures.
 */
export default abstract class RequestAdapter {
  protected urlValidationOptions: UrlValidationOptions;

  constructor(urlValidationOptions: UrlValidationOptions = {}) {
    this.urlValidationOptions = urlValidationOptions;
  }

  public abstract createRequest(request: DispatchRequest): Promise<RawResponse>;

  public executeRequest(request: DispatchRequest): Promise<RawResponse> {
    // Validate URL to prevent SSRF attacks
    validateUrl(request.url, this.urlValidationOptions);
    return this.createRequest(request);
  }
}
