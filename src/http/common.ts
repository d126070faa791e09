// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { STATUS_CODES } from "node:http";
import * as mime from "mime-types";
import type { ServerConfig } from "../types.js";

export const TEXT_CONTENT_TYPE = "text/plain";

/**
 * Content-Type for a file, derived from its extension.
 *
 * Types that carry text (per the mime-types charset table) are labelled with
 * the configured charset whatever the file's actual bytes are.
 */
export function contentTypeFor(
  filePath: string,
  config: Pick<ServerConfig, "charset" | "defaultType">,
): string {
  const type = mime.lookup(filePath) || config.defaultType;
  return withCharset(type, config.charset);
}

export function withCharset(type: string, charset: string): string {
  return mime.charset(type) ? `${type}; charset=${charset}` : type;
}

/** Bare media type of a Content-Type value, lower-cased. */
export function mediaType(contentType: string): string {
  return contentType.split(";", 1)[0].trim().toLowerCase();
}

/** Short plain-text response used for every error status. */
export function errorResponse(
  status: number,
  charset: string,
  extraHeaders?: Readonly<Record<string, string>>,
): Response {
  const headers = new Headers(extraHeaders);
  headers.set("Content-Type", withCharset(TEXT_CONTENT_TYPE, charset));
  const body = `${status} ${STATUS_CODES[status] ?? "Error"}\n`;
  return new Response(body, { status, headers });
}
