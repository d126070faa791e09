// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { open, type FileHandle } from "node:fs/promises";
import { pipeline, Readable } from "node:stream";
import { STATIC_METHODS } from "../constants.js";
import { HttpError, MethodNotAllowedError, NotFoundError } from "../errors.js";
import { silentLogger, type Logger } from "../logging.js";
import type { ResolvedResource, ServerConfig, StaticHandler } from "../types.js";
import { contentTypeFor } from "./common.js";
import { createEncoder, isCompressible, negotiateEncoding } from "./compression.js";
import { compose, withAccessLog, withErrorBoundary } from "./middleware.js";
import { withMethodOverride } from "./override.js";
import { resolveResource } from "./resolve.js";
import type { StaticHandlerOptions } from "./types.js";

function isStaticMethod(method: string): boolean {
  return (STATIC_METHODS as readonly string[]).includes(method);
}

/** Open the file now so that permission and race failures become a status, not a broken stream. */
async function openBody(resource: ResolvedResource): Promise<Readable> {
  let handle: FileHandle;
  try {
    handle = await open(resource.filePath, "r");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT" || code === "ENOTDIR") throw new NotFoundError(resource.urlPath);
    if (code === "EACCES" || code === "EPERM") {
      throw new HttpError(403, `Permission denied: ${resource.urlPath}`);
    }
    throw err;
  }
  // Capped at the stat()ed size so the body always matches Content-Length.
  return handle.createReadStream({ start: 0, end: resource.stats.size - 1 });
}

async function serveResource(
  resource: ResolvedResource,
  request: Request,
  config: ServerConfig,
  logger: Logger,
): Promise<Response> {
  const { stats } = resource;
  const contentType = contentTypeFor(resource.filePath, config);
  const headers = new Headers({
    "Content-Type": contentType,
    "Last-Modified": stats.mtime.toUTCString(),
  });

  const eligible = isCompressible(contentType, stats.size, config.compression);
  const encoding = eligible
    ? negotiateEncoding(request.headers.get("Accept-Encoding"), config.compression.encodings)
    : null;
  if (eligible) headers.set("Vary", "Accept-Encoding");
  if (encoding) {
    headers.set("Content-Encoding", encoding);
  } else {
    headers.set("Content-Length", String(stats.size));
  }

  if (request.method === "HEAD") {
    return new Response(null, { status: 200, headers });
  }
  if (stats.size === 0) {
    return new Response("", { status: 200, headers });
  }

  const source = await openBody(resource);
  // Handed over as a web stream so a cancel from the adapter destroys the file stream.
  if (!encoding) {
    return new Response(Readable.toWeb(source), { status: 200, headers });
  }

  const encoder = createEncoder(encoding, config.compression.level);
  // Tearing down either side (client gone, read error) destroys both streams.
  pipeline(source, encoder, (err) => {
    if (err && err.code !== "ERR_STREAM_PREMATURE_CLOSE") {
      logger.error(`Compressing ${resource.urlPath} failed: ${err.message}`);
    }
  });
  return new Response(Readable.toWeb(encoder), { status: 200, headers });
}

/**
 * Create a fetch-compatible static file handler for a document root.
 *
 * The returned function never rejects: failures become status responses.
 *
 * @example
 * ```typescript
 * const handler = createStaticHandler(resolveConfig({ root: "./public" }));
 * const res = await handler(new Request("http://localhost/"));
 * ```
 */
export function createStaticHandler(
  config: ServerConfig,
  options?: StaticHandlerOptions,
): StaticHandler {
  const logger = options?.logger ?? silentLogger;

  const terminal: StaticHandler = async (request) => {
    const { pathname } = new URL(request.url);
    const resource = await resolveResource(config.root, pathname, config.index);

    if (!isStaticMethod(request.method)) {
      throw new MethodNotAllowedError(request.method, resource, STATIC_METHODS);
    }
    return serveResource(resource, request, config, logger);
  };

  return compose(
    [
      withAccessLog(logger),
      withMethodOverride(config.override, logger),
      withErrorBoundary(config.charset, logger),
    ],
    terminal,
  );
}
