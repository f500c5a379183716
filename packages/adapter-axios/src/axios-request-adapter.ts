import { RequestAdapter } from "@relayline/core";
import type {
  DispatchRequest,
  RawResponse,
  UrlValidationOptions,
} from "@relayline/core";
import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";

const passThrough = (data: unknown): unknown => data;

function toBytes(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (data === undefined || data === null || data === "") {
    return new Uint8Array(0);
  }
  const text = typeof data === "string" ? data : JSON.stringify(data);
  return new TextEncoder().encode(text);
}

/**
 * Request adapter implementation using Axios as the underlying HTTP client.
 * Axios is told to accept every status code and leave the body untouched,
 * so classification stays with the pipeline.
 *
 * @example
 * ```typescript
 * const client = axios.create({ proxy: false });
 * const pipeline = new RequestPipeline(new AxiosRequestAdapter({}, client));
 * ```
 */
export default class AxiosRequestAdapter extends RequestAdapter {
  private readonly client: AxiosInstance;

  /**
   * Creates a new AxiosRequestAdapter instance.
   *
   * @param urlValidationOptions - Optional URL validation options to prevent SSRF attacks
   * @param client - Axios instance to send requests with, the default instance if omitted
   */
  constructor(
    urlValidationOptions?: UrlValidationOptions,
    client: AxiosInstance = axios
  ) {
    super(urlValidationOptions);
    this.client = client;
  }

  public async createRequest(request: DispatchRequest): Promise<RawResponse> {
    const { method, url, headers, body } = request;
    const axiosConfig: AxiosRequestConfig = {
      url: url.toString(),
      method,
      headers: { ...headers },
      data: body,
      responseType: "arraybuffer",
      transformRequest: [passThrough],
      transformResponse: [passThrough],
      validateStatus: () => true,
    };

    const response = await this.client.request<unknown>(axiosConfig);
    return { statusCode: response.status, body: toBytes(response.data) };
  }
}
