// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

/**
 * Response compression: Accept-Encoding negotiation, eligibility and the
 * streaming encoders.
 */

import * as zlib from "node:zlib";
import type { Transform } from "node:stream";
import compressible from "compressible";
import { mediaType } from "./common.js";
import type { CompressionConfig, Encoding } from "../types.js";

const ALIASES: Readonly<Record<string, string>> = { "x-gzip": "gzip" };

/** Parse an Accept-Encoding header into coding → q-value. Malformed q counts as 1. */
export function parseAcceptEncoding(header: string): Map<string, number> {
  const weights = new Map<string, number>();
  for (const part of header.split(",")) {
    const [rawCoding, ...params] = part.split(";");
    const coding = rawCoding.trim().toLowerCase();
    if (coding === "") continue;

    let q = 1;
    for (const param of params) {
      const [key, value] = param.split("=", 2).map((s) => s.trim());
      if (key.toLowerCase() === "q" && value !== undefined) {
        const parsed = Number(value);
        if (Number.isFinite(parsed)) q = Math.min(Math.max(parsed, 0), 1);
      }
    }
    const name = ALIASES[coding] ?? coding;
    weights.set(name, Math.max(weights.get(name) ?? 0, q));
  }
  return weights;
}

/**
 * Pick the coding to apply, or null to send identity.
 *
 * The highest q-value wins; ties go to the earlier entry in `supported`.
 */
export function negotiateEncoding(
  acceptEncoding: string | null,
  supported: readonly Encoding[],
): Encoding | null {
  if (!acceptEncoding) return null;
  const weights = parseAcceptEncoding(acceptEncoding);
  const wildcard = weights.get("*") ?? 0;

  let best: Encoding | null = null;
  let bestQ = 0;
  for (const encoding of supported) {
    const q = weights.get(encoding) ?? wildcard;
    if (q > bestQ) {
      best = encoding;
      bestQ = q;
    }
  }
  return best;
}

/** Whether a body of this type and size is worth compressing. */
export function isCompressible(
  contentType: string,
  size: number,
  config: CompressionConfig,
): boolean {
  if (!config.enabled || size < config.minLength) return false;
  return compressible(mediaType(contentType)) === true;
}

export function createEncoder(encoding: Encoding, level: number): Transform {
  switch (encoding) {
    case "gzip":
      return zlib.createGzip({ level });
    case "deflate":
      return zlib.createDeflate({ level });
    case "br":
      return zlib.createBrotliCompress({
        params: { [zlib.constants.BROTLI_PARAM_QUALITY]: level },
      });
  }
}
