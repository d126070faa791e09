// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { describe, test, expect, beforeAll, afterAll } from "vitest";
import { join, relative } from "node:path";
import { optionsFromEnv, resolveConfig } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";
import { makeDocRoot, removeDocRoot } from "./helpers.js";

let root: string;

beforeAll(() => {
  root = makeDocRoot({ "index.html": "<html></html>" });
});

afterAll(() => {
  removeDocRoot(root);
});

describe("resolveConfig", () => {
  test("fills in defaults", () => {
    const config = resolveConfig({ root });
    expect(config.root).toBe(root);
    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(80);
    expect(config.index).toEqual(["index.html", "index.htm"]);
    expect(config.charset).toBe("UTF-8");
    expect(config.compression).toEqual({
      enabled: true,
      encodings: ["gzip"],
      minLength: 20,
      level: 1,
    });
    expect(config.keepAliveTimeout).toBe(65_000);
    expect(config.maxConnections).toBe(1024);
    expect(config.override).toEqual({ enabled: true, methods: "*" });
    expect(config.logLevel).toBe("warn");
  });

  test("is frozen all the way down", () => {
    const config = resolveConfig({ root, override: { methods: ["post"] } });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.compression)).toBe(true);
    expect(Object.isFrozen(config.index)).toBe(true);
    expect(Object.isFrozen(config.override)).toBe(true);
    expect(config.override.methods).toEqual(["POST"]);
  });

  test("relative roots become absolute", () => {
    const config = resolveConfig({ root: relative(process.cwd(), root) });
    expect(config.root).toBe(root);
  });

  test("missing root directory", () => {
    expect(() => resolveConfig({ root: join(root, "does-not-exist") })).toThrow(
      ConfigurationError,
    );
  });

  test("root must be a directory", () => {
    expect(() => resolveConfig({ root: join(root, "index.html") })).toThrow("is not a directory");
  });

  test("empty root", () => {
    expect(() => resolveConfig({ root: "  " })).toThrow("root: missing document root");
  });

  test("out-of-range numbers", () => {
    expect(() => resolveConfig({ root, port: 70000 })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ root, maxConnections: 0 })).toThrow("maxConnections");
    expect(() => resolveConfig({ root, compression: { level: 12 } })).toThrow(
      "compression.level",
    );
  });

  test("bad index names", () => {
    expect(() => resolveConfig({ root, index: [] })).toThrow("index");
    expect(() => resolveConfig({ root, index: ["../index.html"] })).toThrow(
      "invalid index file name",
    );
  });

  test("bad override method", () => {
    expect(() => resolveConfig({ root, override: { methods: ["PO ST"] } })).toThrow(
      "override.methods: invalid method 'PO ST'",
    );
  });
});

describe("optionsFromEnv", () => {
  test("root defaults to cwd and nothing else is set", () => {
    const { options, warnings } = optionsFromEnv({}, "/srv/www");
    expect(options).toEqual({ root: "/srv/www", compression: {}, override: {} });
    expect(warnings).toEqual([]);
  });

  test("reads every variable", () => {
    const { options } = optionsFromEnv(
      {
        DEBUG_SERVER_ROOT: "/data",
        DEBUG_SERVER_HOST: "127.0.0.1",
        DEBUG_SERVER_PORT: "9999",
        DEBUG_SERVER_INDEX: "index.html, default.htm",
        DEBUG_SERVER_CHARSET: "ISO-8859-1",
        DEBUG_SERVER_GZIP: "off",
        DEBUG_SERVER_GZIP_MIN_LENGTH: "256",
        DEBUG_SERVER_GZIP_LEVEL: "6",
        DEBUG_SERVER_ENCODINGS: "BR,gzip",
        DEBUG_SERVER_KEEPALIVE_TIMEOUT: "5",
        DEBUG_SERVER_REQUEST_TIMEOUT: "30",
        DEBUG_SERVER_MAX_CONNECTIONS: "16",
        DEBUG_SERVER_OVERRIDE: "on",
        DEBUG_SERVER_OVERRIDE_METHODS: "POST,PUT",
        DEBUG_SERVER_LOG_LEVEL: "INFO",
      },
      "/unused",
    );
    expect(options).toEqual({
      root: "/data",
      host: "127.0.0.1",
      port: 9999,
      index: ["index.html", "default.htm"],
      charset: "ISO-8859-1",
      compression: { enabled: false, minLength: 256, level: 6, encodings: ["br", "gzip"] },
      keepAliveTimeout: 5000,
      requestTimeout: 30000,
      maxConnections: 16,
      override: { enabled: true, methods: ["POST", "PUT"] },
      logLevel: "info",
    });
  });

  test("blank variables are ignored", () => {
    const { options } = optionsFromEnv({ DEBUG_SERVER_PORT: "  " }, "/srv");
    expect(options.port).toBeUndefined();
  });

  test("unknown log level falls back with a warning", () => {
    const { options, warnings } = optionsFromEnv({ DEBUG_SERVER_LOG_LEVEL: "chatty" }, "/srv");
    expect(options.logLevel).toBeUndefined();
    expect(warnings).toEqual(['The log level "chatty" is not valid, fallback to warn']);
  });

  test("override methods wildcard", () => {
    const { options } = optionsFromEnv({ DEBUG_SERVER_OVERRIDE_METHODS: "*" }, "/srv");
    expect(options.override).toEqual({ methods: "*" });
  });

  test("malformed values throw", () => {
    expect(() => optionsFromEnv({ DEBUG_SERVER_PORT: "80a" }, "/srv")).toThrow(
      "DEBUG_SERVER_PORT: expected a non-negative integer, got '80a'",
    );
    expect(() => optionsFromEnv({ DEBUG_SERVER_GZIP: "maybe" }, "/srv")).toThrow(
      ConfigurationError,
    );
    expect(() => optionsFromEnv({ DEBUG_SERVER_ENCODINGS: "zstd" }, "/srv")).toThrow(
      "unsupported encoding 'zstd'",
    );
  });
});
