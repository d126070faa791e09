// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

/**
 * Method-rejection override.
 *
 * Static serving answers methods other than GET/HEAD with 405. Test clients of
 * the edge worker POST to static pages, so a 405 is replaced by the response a
 * GET for the same URL produces, provided that GET succeeds. Every other
 * status, 404 and 5xx included, goes through untouched.
 */

import type { Logger } from "../logging.js";
import type { OverrideConfig } from "../types.js";
import type { Middleware } from "./middleware.js";

const BODY_HEADERS = ["content-length", "content-type", "content-encoding", "transfer-encoding"];

export function overrideCovers(override: OverrideConfig, method: string): boolean {
  if (!override.enabled) return false;
  return override.methods === "*" || override.methods.includes(method.toUpperCase());
}

/** The same request re-issued as a body-less GET. */
export function asGetRequest(request: Request): Request {
  const headers = new Headers(request.headers);
  for (const name of BODY_HEADERS) headers.delete(name);
  return new Request(request.url, { method: "GET", headers });
}

export const withMethodOverride =
  (override: OverrideConfig, logger: Logger): Middleware =>
  (next) =>
  async (request) => {
    const response = await next(request);
    if (response.status !== 405 || !overrideCovers(override, request.method)) {
      return response;
    }

    await response.body?.cancel();
    const replayed = await next(asGetRequest(request));
    // A non-200 here means the path stopped resolving between the two passes;
    // the client gets what GET saw.
    if (replayed.status === 200) {
      logger.debug(`Served ${request.method} as GET`, {
        method: request.method,
        url: new URL(request.url).pathname,
      });
    }
    return replayed;
  };
