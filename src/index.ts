// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

export { DebugStaticServer, type DebugStaticServerOptions } from "./server.js";
export { resolveConfig, optionsFromEnv, ENCODINGS, type EnvOptions } from "./config.js";
export {
  createLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogContext,
  type LogEntry,
} from "./logging.js";
export {
  HttpError,
  NotFoundError,
  BadRequestError,
  MethodNotAllowedError,
  ConfigurationError,
} from "./errors.js";
export type {
  Encoding,
  LogLevel,
  CompressionConfig,
  OverrideConfig,
  ServerConfig,
  ServerOptions,
  ResolvedResource,
  StaticHandler,
} from "./types.js";
export {
  createStaticHandler,
  compose,
  withAccessLog,
  withErrorBoundary,
  withMethodOverride,
  overrideCovers,
  resolveResource,
  normalizeUrlPath,
  negotiateEncoding,
  parseAcceptEncoding,
  isCompressible,
  contentTypeFor,
  type Middleware,
  type StaticHandlerOptions,
} from "./http/index.js";
export {
  DEFAULT_PORT,
  DEFAULT_INDEX_FILES,
  DEFAULT_CHARSET,
  DEFAULT_KEEPALIVE_TIMEOUT,
  DEFAULT_MAX_CONNECTIONS,
  ENV_PREFIX,
} from "./constants.js";
