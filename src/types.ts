import type { Stats } from "node:fs";

/** Content codings the server can produce. */
export type Encoding = "gzip" | "deflate" | "br";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface CompressionConfig {
  readonly enabled: boolean;
  /** Preference order used to break ties between equally weighted codings. */
  readonly encodings: readonly Encoding[];
  /** Files smaller than this many bytes are sent as-is. */
  readonly minLength: number;
  /** zlib / brotli quality level. */
  readonly level: number;
}

/**
 * Which rejected methods are turned into a 200 serving the resolved file.
 * `"*"` covers every method the static handler refuses.
 */
export interface OverrideConfig {
  readonly enabled: boolean;
  readonly methods: "*" | readonly string[];
}

/** Immutable process-wide settings, built once by {@link resolveConfig}. */
export interface ServerConfig {
  readonly root: string;
  readonly host: string;
  readonly port: number;
  readonly index: readonly string[];
  readonly charset: string;
  readonly defaultType: string;
  readonly compression: CompressionConfig;
  readonly keepAliveTimeout: number;
  readonly maxConnections: number;
  readonly requestTimeout: number;
  readonly override: OverrideConfig;
  readonly serverName: string;
  readonly logLevel: LogLevel;
}

/** Caller-facing input to {@link resolveConfig}; everything but `root` has a default. */
export interface ServerOptions {
  root: string;
  host?: string;
  port?: number;
  index?: readonly string[];
  charset?: string;
  defaultType?: string;
  compression?: Partial<CompressionConfig>;
  keepAliveTimeout?: number;
  maxConnections?: number;
  requestTimeout?: number;
  override?: Partial<OverrideConfig>;
  serverName?: string;
  logLevel?: LogLevel;
}

/** The regular file a request path maps to. */
export interface ResolvedResource {
  /** URL path after decoding and normalisation, e.g. "/docs/". */
  readonly urlPath: string;
  readonly filePath: string;
  readonly stats: Stats;
}

/** Fetch-compatible request handler. */
export type StaticHandler = (request: Request) => Promise<Response>;
