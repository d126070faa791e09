// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

/** Defaults mirroring the stock edge-debug container. */

export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 80;

export const DEFAULT_INDEX_FILES = ["index.html", "index.htm"] as const;

export const DEFAULT_CHARSET = "UTF-8";
export const DEFAULT_CONTENT_TYPE = "application/octet-stream";

export const DEFAULT_COMPRESSION_MIN_LENGTH = 20;
export const DEFAULT_COMPRESSION_LEVEL = 1;

/** Idle keep-alive window in milliseconds. */
export const DEFAULT_KEEPALIVE_TIMEOUT = 65_000;
/** Upper bound on simultaneously open client sockets. */
export const DEFAULT_MAX_CONNECTIONS = 1024;
/** Time allowed to receive a full request, in milliseconds. */
export const DEFAULT_REQUEST_TIMEOUT = 60_000;

export const DEFAULT_SERVER_NAME = "edge-debug-server";

/** Methods the static handler reads files for. */
export const STATIC_METHODS = ["GET", "HEAD"] as const;

export const ENV_PREFIX = "DEBUG_SERVER_";
