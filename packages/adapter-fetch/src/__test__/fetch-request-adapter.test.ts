import { describe, test } from "node:test";
import * as assert from "node:assert";
import {
  RequestPipeline,
  SSRFError,
  createPipelineConfig,
  createPipelineLogger,
  defineRequest,
} from "@relayline/core";
import type { HttpMethod } from "@relayline/core";
import FetchRequestAdapter from "../index";
import type { FetchFunction } from "../index";

const firstUser = { id: 1, name: "John Smith" };

interface FetchCall {
  input: string;
  init: RequestInit;
}

function stubFetch(respond: () => Response | Promise<Response>): {
  calls: FetchCall[];
  fetchFn: FetchFunction;
} {
  const calls: FetchCall[] = [];
  const fetchFn: FetchFunction = async (input, init) => {
    calls.push({ input, init });
    return respond();
  };
  return { calls, fetchFn };
}

function createPipeline(fetchFn: FetchFunction): RequestPipeline {
  return new RequestPipeline(
    new FetchRequestAdapter({}, fetchFn),
    createPipelineConfig({ logger: createPipelineLogger({ silent: true }) })
  );
}

function usersRequest(method: HttpMethod, path: string, body?: string) {
  return defineRequest({
    host: "api.example.com",
    path,
    method,
    body,
    converter: (payload: unknown) => payload ?? true,
  });
}

describe("FetchRequestAdapter", () => {
  test("Basic GET request", async () => {
    const { calls, fetchFn } = stubFetch(
      () => new Response(JSON.stringify(firstUser), { status: 200 })
    );

    const response = await createPipeline(fetchFn).execute(usersRequest("GET", "/users/1"));

    assert.strictEqual(response.isSuccess, true);
    assert.deepStrictEqual(response.data, firstUser);
    assert.strictEqual(calls[0].input, "https://api.example.com/users/1");
    assert.strictEqual(calls[0].init.method, "GET");
    assert.strictEqual(calls[0].init.body, undefined);
    assert.deepStrictEqual(calls[0].init.headers, { Accept: "application/json" });
  });

  test("POST request with data", async () => {
    const newUser = { name: "Jane Doe" };
    const { calls, fetchFn } = stubFetch(
      () => new Response(JSON.stringify({ id: 4, ...newUser }), { status: 201 })
    );

    const response = await createPipeline(fetchFn).execute(
      usersRequest("POST", "/users", JSON.stringify(newUser))
    );

    assert.strictEqual(response.statusCode, 201);
    assert.deepStrictEqual(response.data, { id: 4, name: "Jane Doe" });
    assert.strictEqual(calls[0].init.body, '{"name":"Jane Doe"}');
    assert.deepStrictEqual(calls[0].init.headers, {
      "Content-Type": "application/json;charset=UTF-8",
      Accept: "application/json",
    });
  });

  test("DELETE request without content", async () => {
    const { fetchFn } = stubFetch(() => new Response(null, { status: 204 }));

    const response = await createPipeline(fetchFn).execute(usersRequest("DELETE", "/users/1"));

    assert.strictEqual(response.statusCode, 204);
    assert.strictEqual(response.data, true);
  });

  test("Error statuses are classified, not thrown", async () => {
    const { fetchFn } = stubFetch(
      () => new Response('{"message":"User not found"}', { status: 404 })
    );

    const response = await createPipeline(fetchFn).execute(usersRequest("GET", "/users/9"));

    assert.strictEqual(response.statusCode, 404);
    assert.strictEqual(response.error?.message, "User not found");
  });

  test("Network failures become exceptions", async () => {
    const { fetchFn } = stubFetch(() => {
      throw new TypeError("fetch failed");
    });

    const response = await createPipeline(fetchFn).execute(usersRequest("GET", "/users/1"));

    assert.strictEqual(response.statusCode, -1);
    assert.strictEqual(response.error?.kind, "exception");
  });

  test("Rejects localhost before calling fetch", () => {
    const { calls, fetchFn } = stubFetch(() => new Response(null, { status: 204 }));
    const adapter = new FetchRequestAdapter({}, fetchFn);

    assert.throws(
      () =>
        adapter.executeRequest({
          method: "GET",
          url: new URL("http://localhost:3000/users"),
          headers: {},
        }),
      SSRFError
    );
    assert.strictEqual(calls.length, 0);
  });
});
