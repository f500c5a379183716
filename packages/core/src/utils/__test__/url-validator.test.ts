import { describe, test } from "node:test";
import * as assert from "node:assert";
import { SSRFError, validateUrl } from "../url-validator";

describe("validateUrl", () => {
  test("Accepts public http and https URLs", () => {
    assert.doesNotThrow(() => validateUrl("https://api.example.com/items"));
    assert.doesNotThrow(() => validateUrl(new URL("http://api.example.com")));
  });

  test("Rejects other protocols", () => {
    assert.throws(() => validateUrl("ftp://files.example.com"), SSRFError);
  });

  test("Rejects malformed URLs", () => {
    assert.throws(() => validateUrl("not a url"), {
      name: "SSRFError",
      message: "Invalid URL format: not a url",
    });
  });

  test("Rejects localhost unless allowed", () => {
    for (const url of ["http://localhost:3000", "http://127.0.0.1", "http://[::1]/"]) {
      assert.throws(() => validateUrl(url), SSRFError, url);
      assert.doesNotThrow(() => validateUrl(url, { allowLocalhost: true }));
    }
  });

  test("Rejects private addresses unless allowed", () => {
    for (const url of [
      "http://10.0.0.8",
      "http://172.20.1.1",
      "http://192.168.1.10",
      "http://169.254.169.254/latest/meta-data",
      "http://[fd12::1]/",
    ]) {
      assert.throws(() => validateUrl(url), SSRFError, url);
      assert.doesNotThrow(() => validateUrl(url, { allowPrivateIPs: true }));
    }
  });

  test("Does not mistake host names for IPv6 ranges", () => {
    assert.doesNotThrow(() => validateUrl("https://fcdn.example.com"));
    assert.doesNotThrow(() => validateUrl("https://172.32.0.1"));
  });

  test("Can be disabled entirely", () => {
    assert.doesNotThrow(() =>
      validateUrl("ftp://127.0.0.1", { disableValidation: true })
    );
  });
});
