// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { statSync } from "node:fs";
import * as path from "node:path";
import {
  DEFAULT_CHARSET,
  DEFAULT_COMPRESSION_LEVEL,
  DEFAULT_COMPRESSION_MIN_LENGTH,
  DEFAULT_CONTENT_TYPE,
  DEFAULT_HOST,
  DEFAULT_INDEX_FILES,
  DEFAULT_KEEPALIVE_TIMEOUT,
  DEFAULT_MAX_CONNECTIONS,
  DEFAULT_PORT,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_SERVER_NAME,
  ENV_PREFIX,
} from "./constants.js";
import { ConfigurationError } from "./errors.js";
import { isLogLevel } from "./logging.js";
import type {
  CompressionConfig,
  Encoding,
  OverrideConfig,
  ServerConfig,
  ServerOptions,
} from "./types.js";

export const ENCODINGS: readonly Encoding[] = ["gzip", "deflate", "br"];

const METHOD_TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

function isEncoding(value: string): value is Encoding {
  return (ENCODINGS as readonly string[]).includes(value);
}

function requireInteger(
  setting: string,
  value: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(
      setting,
      `expected an integer between ${min} and ${max}, got ${value}`,
    );
  }
  return value;
}

function resolveRoot(root: string): string {
  if (root.trim() === "") {
    throw new ConfigurationError("root", "missing document root");
  }
  const absolute = path.resolve(root);
  let isDirectory: boolean;
  try {
    isDirectory = statSync(absolute).isDirectory();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError("root", `cannot stat '${absolute}': ${reason}`);
  }
  if (!isDirectory) {
    throw new ConfigurationError("root", `'${absolute}' is not a directory`);
  }
  return absolute;
}

function resolveIndex(index: readonly string[]): readonly string[] {
  if (index.length === 0) {
    throw new ConfigurationError("index", "at least one index file name is required");
  }
  for (const name of index) {
    if (name === "" || name.includes("/") || name === "." || name === "..") {
      throw new ConfigurationError("index", `invalid index file name '${name}'`);
    }
  }
  return Object.freeze([...index]);
}

function resolveOverride(override: Partial<OverrideConfig> | undefined): OverrideConfig {
  const methods = override?.methods ?? "*";
  if (methods === "*") {
    return Object.freeze({ enabled: override?.enabled ?? true, methods });
  }
  const normalized = methods.map((m) => {
    if (!METHOD_TOKEN.test(m)) {
      throw new ConfigurationError("override.methods", `invalid method '${m}'`);
    }
    return m.toUpperCase();
  });
  return Object.freeze({
    enabled: override?.enabled ?? true,
    methods: Object.freeze(normalized),
  });
}

/**
 * Validate options and build the frozen configuration shared by every request.
 *
 * @throws ConfigurationError when a setting is out of range or the root is unusable.
 */
export function resolveConfig(options: ServerOptions): ServerConfig {
  const encodings = options.compression?.encodings ?? ["gzip"];
  for (const encoding of encodings) {
    if (!isEncoding(encoding)) {
      throw new ConfigurationError(
        "compression.encodings",
        `unsupported encoding '${encoding}'`,
      );
    }
  }

  const logLevel = options.logLevel ?? "warn";
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError("logLevel", `unknown level '${logLevel}'`);
  }

  const charset = options.charset ?? DEFAULT_CHARSET;
  if (!/^[A-Za-z0-9._-]+$/.test(charset)) {
    throw new ConfigurationError("charset", `invalid charset '${charset}'`);
  }

  const config: ServerConfig = {
    root: resolveRoot(options.root),
    host: options.host ?? DEFAULT_HOST,
    port: requireInteger("port", options.port ?? DEFAULT_PORT, 0, 65535),
    index: resolveIndex(options.index ?? DEFAULT_INDEX_FILES),
    charset,
    defaultType: options.defaultType ?? DEFAULT_CONTENT_TYPE,
    compression: Object.freeze({
      enabled: options.compression?.enabled ?? true,
      encodings: Object.freeze([...encodings]),
      minLength: requireInteger(
        "compression.minLength",
        options.compression?.minLength ?? DEFAULT_COMPRESSION_MIN_LENGTH,
        0,
      ),
      level: requireInteger(
        "compression.level",
        options.compression?.level ?? DEFAULT_COMPRESSION_LEVEL,
        1,
        9,
      ),
    }),
    keepAliveTimeout: requireInteger(
      "keepAliveTimeout",
      options.keepAliveTimeout ?? DEFAULT_KEEPALIVE_TIMEOUT,
      0,
    ),
    maxConnections: requireInteger(
      "maxConnections",
      options.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
      1,
    ),
    requestTimeout: requireInteger(
      "requestTimeout",
      options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT,
      0,
    ),
    override: resolveOverride(options.override),
    serverName: options.serverName ?? DEFAULT_SERVER_NAME,
    logLevel,
  };

  return Object.freeze(config);
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export interface EnvOptions {
  options: ServerOptions;
  /** Non-fatal problems, such as an unknown log level that fell back to "warn". */
  warnings: string[];
}

type Draft<T> = { -readonly [K in keyof T]?: T[K] };

function parseIntegerVar(name: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError(ENV_PREFIX + name, `expected a non-negative integer, got '${raw}'`);
  }
  return parseInt(trimmed, 10);
}

function parseSwitchVar(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case "on":
    case "true":
    case "1":
    case "yes":
      return true;
    case "off":
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new ConfigurationError(ENV_PREFIX + name, `expected on/off, got '${raw}'`);
  }
}

function parseListVar(raw: string): string[] {
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Read `DEBUG_SERVER_*` variables into {@link ServerOptions}.
 *
 * Timeouts are given in seconds. The document root defaults to `cwd`.
 */
export function optionsFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  cwd: string = process.cwd(),
): EnvOptions {
  const get = (name: string): string | undefined => {
    const value = env[ENV_PREFIX + name];
    return value === undefined || value.trim() === "" ? undefined : value;
  };
  const warnings: string[] = [];

  const options: ServerOptions = { root: get("ROOT") ?? cwd };

  const host = get("HOST");
  if (host !== undefined) options.host = host.trim();

  const port = get("PORT");
  if (port !== undefined) options.port = parseIntegerVar("PORT", port);

  const index = get("INDEX");
  if (index !== undefined) options.index = parseListVar(index);

  const charset = get("CHARSET");
  if (charset !== undefined) options.charset = charset.trim();

  const compression: Draft<CompressionConfig> = {};
  const gzip = get("GZIP");
  if (gzip !== undefined) compression.enabled = parseSwitchVar("GZIP", gzip);
  const minLength = get("GZIP_MIN_LENGTH");
  if (minLength !== undefined) {
    compression.minLength = parseIntegerVar("GZIP_MIN_LENGTH", minLength);
  }
  const level = get("GZIP_LEVEL");
  if (level !== undefined) compression.level = parseIntegerVar("GZIP_LEVEL", level);
  const encodings = get("ENCODINGS");
  if (encodings !== undefined) {
    compression.encodings = parseListVar(encodings).map((encoding) => {
      const lowered = encoding.toLowerCase();
      if (!isEncoding(lowered)) {
        throw new ConfigurationError(
          ENV_PREFIX + "ENCODINGS",
          `unsupported encoding '${encoding}'`,
        );
      }
      return lowered;
    });
  }
  options.compression = compression;

  const keepAlive = get("KEEPALIVE_TIMEOUT");
  if (keepAlive !== undefined) {
    options.keepAliveTimeout = parseIntegerVar("KEEPALIVE_TIMEOUT", keepAlive) * 1000;
  }

  const requestTimeout = get("REQUEST_TIMEOUT");
  if (requestTimeout !== undefined) {
    options.requestTimeout = parseIntegerVar("REQUEST_TIMEOUT", requestTimeout) * 1000;
  }

  const maxConnections = get("MAX_CONNECTIONS");
  if (maxConnections !== undefined) {
    options.maxConnections = parseIntegerVar("MAX_CONNECTIONS", maxConnections);
  }

  const override: Draft<OverrideConfig> = {};
  const overrideSwitch = get("OVERRIDE");
  if (overrideSwitch !== undefined) {
    override.enabled = parseSwitchVar("OVERRIDE", overrideSwitch);
  }
  const overrideMethods = get("OVERRIDE_METHODS");
  if (overrideMethods !== undefined) {
    override.methods = overrideMethods.trim() === "*" ? "*" : parseListVar(overrideMethods);
  }
  options.override = override;

  const logLevel = get("LOG_LEVEL");
  if (logLevel !== undefined) {
    const lowered = logLevel.trim().toLowerCase();
    if (isLogLevel(lowered)) {
      options.logLevel = lowered;
    } else {
      warnings.push(`The log level "${logLevel}" is not valid, fallback to warn`);
    }
  }

  return { options, warnings };
}
