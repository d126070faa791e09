// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { HttpError } from "../errors.js";
import type { Logger } from "../logging.js";
import type { StaticHandler } from "../types.js";
import { errorResponse } from "./common.js";

export type Middleware = (next: StaticHandler) => StaticHandler;

/** Wrap `terminal` so that `middlewares[0]` sees the request first. */
export const compose = (
  middlewares: readonly Middleware[],
  terminal: StaticHandler,
): StaticHandler => middlewares.reduceRight((next, mw) => mw(next), terminal);

/**
 * Turn thrown errors into responses. HttpError keeps its status and headers;
 * anything else is logged and answered with 500.
 */
export const withErrorBoundary =
  (charset: string, logger: Logger): Middleware =>
  (next) =>
  async (request) => {
    try {
      return await next(request);
    } catch (error) {
      if (error instanceof HttpError) {
        return errorResponse(error.statusCode, charset, error.headers);
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Request failed: ${message}`, {
        method: request.method,
        url: request.url,
      });
      return errorResponse(500, charset);
    }
  };

/** One `info` line per request with the final status and duration. */
export const withAccessLog =
  (logger: Logger): Middleware =>
  (next) =>
  async (request) => {
    const t0 = performance.now();
    const response = await next(request);
    const url = new URL(request.url);
    logger.info(`${request.method} ${url.pathname} ${response.status}`, {
      method: request.method,
      url: url.pathname + url.search,
      status: response.status,
      durationMs: Math.round(performance.now() - t0),
    });
    return response;
  };
