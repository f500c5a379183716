import { describe, test } from "node:test";
import * as assert from "node:assert";
import { buildUri } from "../uri-builder";

describe("buildUri", () => {
  test("Joins scheme, host and path", () => {
    assert.strictEqual(
      buildUri("https", "api.example.com", "/items/1").toString(),
      "https://api.example.com/items/1"
    );
  });

  test("Adds the leading slash to a relative path", () => {
    assert.strictEqual(
      buildUri("https", "api.example.com", "items").toString(),
      "https://api.example.com/items"
    );
  });

  test("Keeps the port of the host", () => {
    const url = buildUri("http", "api.example.com:8080", "/health");
    assert.strictEqual(url.port, "8080");
    assert.strictEqual(url.protocol, "http:");
  });

  test("Encodes query parameters", () => {
    assert.strictEqual(
      buildUri("https", "api.example.com", "/search", { q: "red shoes", tag: "a&b" }).toString(),
      "https://api.example.com/search?q=red+shoes&tag=a%26b"
    );
  });

  test("An empty parameter map adds no query string", () => {
    assert.strictEqual(buildUri("https", "api.example.com", "/items", {}).search, "");
  });
});
