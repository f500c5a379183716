import { setTimeout as delay } from "node:timers/promises";
import { RequestAdapter } from "../../index";
import type {
  DispatchRequest,
  RawResponse,
  UrlValidationOptions,
} from "../../index";

type ScriptedReply =
  | { type: "response"; statusCode: number; body: Uint8Array; delayMs: number }
  | { type: "failure"; error: unknown; delayMs: number }
  | { type: "hang" };

function encode(body: string | Uint8Array): Uint8Array {
  return typeof body === "string" ? new TextEncoder().encode(body) : body;
}

/**
 * In-process transport that replays scripted replies in order and records
 * every request it receives.
 */
export default class TestAdapter extends RequestAdapter {
  public readonly calls: DispatchRequest[] = [];
  private replies: ScriptedReply[] = [];

  constructor(urlValidationOptions?: UrlValidationOptions) {
    super(urlValidationOptions);
  }

  public replyOnce(statusCode: number, body: string | Uint8Array = ""): TestAdapter {
    return this.replyAfter(0, statusCode, body);
  }

  public replyAfter(
    delayMs: number,
    statusCode: number,
    body: string | Uint8Array = ""
  ): TestAdapter {
    this.replies.push({ type: "response", statusCode, body: encode(body), delayMs });
    return this;
  }

  public failOnce(error: unknown): TestAdapter {
    return this.failAfter(0, error);
  }

  public failAfter(delayMs: number, error: unknown): TestAdapter {
    this.replies.push({ type: "failure", error, delayMs });
    return this;
  }

  /** The next request never settles */
  public hangOnce(): TestAdapter {
    this.replies.push({ type: "hang" });
    return this;
  }

  public async createRequest(request: DispatchRequest): Promise<RawResponse> {
    this.calls.push(request);
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error(
        `No scripted reply for ${request.method} ${request.url.toString()}`
      );
    }
    if (reply.type === "hang") {
      return new Promise<RawResponse>(() => undefined);
    }
    if (reply.delayMs > 0) {
      await delay(reply.delayMs);
    }
    if (reply.type === "failure") {
      throw reply.error;
    }
    return { statusCode: reply.statusCode, body: reply.body };
  }
}
