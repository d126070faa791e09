// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { stat } from "node:fs/promises";
import type { Stats } from "node:fs";
import * as path from "node:path";
import { BadRequestError, HttpError, NotFoundError } from "../errors.js";
import type { ResolvedResource } from "../types.js";

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR", "ENAMETOOLONG"]);
const FORBIDDEN_CODES = new Set(["EACCES", "EPERM"]);

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** stat() that reports a missing entry as null. Follows symbolic links. */
async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await stat(filePath);
  } catch (err) {
    const code = errorCode(err);
    if (code !== undefined && MISSING_CODES.has(code)) return null;
    if (code !== undefined && FORBIDDEN_CODES.has(code)) {
      throw new HttpError(403, `Permission denied: ${filePath}`);
    }
    throw err;
  }
}

/**
 * Decode a URL path and collapse `.` / `..` segments.
 *
 * Returns the segments below the document root, or throws BadRequestError when
 * the path is not valid percent-encoding, contains NUL, or climbs above the root.
 */
export function normalizeUrlPath(urlPath: string): string[] {
  let decoded: string;
  try {
    decoded = decodeURIComponent(urlPath);
  } catch {
    throw new BadRequestError(`Malformed path encoding: ${urlPath}`);
  }
  if (decoded.includes("\0")) {
    throw new BadRequestError("Path contains a NUL byte");
  }

  const segments: string[] = [];
  for (const segment of decoded.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      if (segments.length === 0) {
        throw new BadRequestError(`Path escapes the document root: ${urlPath}`);
      }
      segments.pop();
      continue;
    }
    segments.push(segment);
  }
  return segments;
}

/**
 * Map a request path onto a regular file under `root`.
 *
 * A directory resolves to the first of `index` that exists as a regular file.
 * A trailing slash on something that is not a directory does not match.
 *
 * @throws NotFoundError when nothing matches.
 */
export async function resolveResource(
  root: string,
  urlPath: string,
  index: readonly string[],
): Promise<ResolvedResource> {
  const segments = normalizeUrlPath(urlPath);
  const trailingSlash = urlPath.endsWith("/");
  const normalized = "/" + segments.join("/");
  const candidate = path.join(root, ...segments);

  const stats = await statOrNull(candidate);
  if (stats === null) {
    throw new NotFoundError(normalized);
  }

  if (stats.isFile()) {
    if (trailingSlash && segments.length > 0) {
      throw new NotFoundError(normalized + "/");
    }
    return { urlPath: normalized, filePath: candidate, stats };
  }

  if (stats.isDirectory()) {
    const dirPath = segments.length > 0 ? normalized + "/" : "/";
    for (const name of index) {
      const indexPath = path.join(candidate, name);
      const indexStats = await statOrNull(indexPath);
      if (indexStats?.isFile()) {
        return { urlPath: dirPath, filePath: indexPath, stats: indexStats };
      }
    }
    throw new NotFoundError(dirPath);
  }

  throw new NotFoundError(normalized);
}
