// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

export { createStaticHandler } from "./handler.js";
export type { StaticHandlerOptions } from "./types.js";
export { compose, withAccessLog, withErrorBoundary, type Middleware } from "./middleware.js";
export { withMethodOverride, overrideCovers } from "./override.js";
export { resolveResource, normalizeUrlPath } from "./resolve.js";
export { negotiateEncoding, parseAcceptEncoding, isCompressible } from "./compression.js";
export { contentTypeFor } from "./common.js";
