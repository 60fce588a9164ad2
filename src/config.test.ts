/**
 * Tests for environment configuration.
 *
 * Run: node --import tsx --test src/config.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { ConfigError, loadConfig, parseConcurrency } from "./config.js";

describe("loadConfig", () => {
  it("defaults to info and unbounded concurrency", () => {
    assert.deepEqual(loadConfig({}), { logLevel: "info", concurrency: 0 });
  });

  it("treats empty values as unset", () => {
    assert.deepEqual(loadConfig({ LOG_LEVEL: "", INKWELL_CONCURRENCY: "" }), {
      logLevel: "info",
      concurrency: 0,
    });
  });

  it("reads LOG_LEVEL and INKWELL_CONCURRENCY", () => {
    assert.deepEqual(loadConfig({ LOG_LEVEL: "debug", INKWELL_CONCURRENCY: "8" }), {
      logLevel: "debug",
      concurrency: 8,
    });
  });

  it("rejects an unknown log level", () => {
    assert.throws(
      () => loadConfig({ LOG_LEVEL: "loud" }),
      new ConfigError("Invalid LOG_LEVEL: loud. Must be debug, info, warn, or error.")
    );
  });

  it("rejects a bad concurrency", () => {
    assert.throws(
      () => loadConfig({ INKWELL_CONCURRENCY: "-1" }),
      new ConfigError("INKWELL_CONCURRENCY must be a non-negative integer, got: -1")
    );
  });
});

describe("parseConcurrency", () => {
  it("accepts zero and positive integers", () => {
    assert.equal(parseConcurrency("0", "x"), 0);
    assert.equal(parseConcurrency("16", "x"), 16);
  });

  it("rejects fractions and words", () => {
    assert.throws(() => parseConcurrency("1.5", "--concurrency"), ConfigError);
    assert.throws(() => parseConcurrency("many", "--concurrency"), ConfigError);
  });
});
