// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import type { Logger } from "../logging.js";

/** Configuration options for createStaticHandler(). */
export interface StaticHandlerOptions {
  /** Receives access lines and request failures. Default: silent. */
  logger?: Logger;
}
