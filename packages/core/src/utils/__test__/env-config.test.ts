import { describe, test } from "node:test";
import * as assert from "node:assert";
import { configFromEnv } from "../env-config";
import { ConfigurationError } from "../../errors";

describe("configFromEnv", () => {
  test("Keeps the defaults when nothing is set", () => {
    const config = configFromEnv({});

    assert.strictEqual(config.timeoutSeconds, 10);
    assert.strictEqual(config.scheme, "https");
    assert.strictEqual(config.logger.level, "warn");
    assert.deepStrictEqual(config.defaultHeaders, {
      "Content-Type": "application/json;charset=UTF-8",
      Accept: "application/json",
    });
    assert.deepStrictEqual(config.defaultParams, {});
  });

  test("Reads timeout, scheme and log level", () => {
    const config = configFromEnv({
      RELAYLINE_TIMEOUT_SECONDS: "30",
      RELAYLINE_SCHEME: "http",
      RELAYLINE_LOG_LEVEL: "debug",
    });

    assert.strictEqual(config.timeoutSeconds, 30);
    assert.strictEqual(config.scheme, "http");
    assert.strictEqual(config.logger.level, "debug");
  });

  test("Rejects invalid values", () => {
    assert.throws(
      () => configFromEnv({ RELAYLINE_TIMEOUT_SECONDS: "soon", RELAYLINE_SCHEME: "ftp" }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigurationError);
        assert.strictEqual(error.code, "INVALID_CONFIGURATION");
        assert.ok(error.message.includes("RELAYLINE_TIMEOUT_SECONDS"));
        assert.ok(error.message.includes("RELAYLINE_SCHEME"));
        return true;
      }
    );
  });
});
