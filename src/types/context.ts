/**
 * Harvest context - flows through the run loop
 * Each module reads what it needs from it; run state is returned, not stored
 */

import type { HarvestConfig } from "./config";
import type { Page } from "./pexels";
import type { HarvestError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import type { Transport } from "../utils/http";

/**
 * Exactly one of data or error is set
 */
export type Result<T, E = HarvestError> =
  | { data: T; error?: never }
  | { data?: never; error: E };

/**
 * Source of result pages, addressed by cursor URL
 */
export interface PageSource {
  fetchPage(uri: string): Promise<Result<Page>>;
}

/**
 * Running totals for a single run
 */
export interface RunState {
  readonly pages: number;
  readonly photos: number;
  readonly bytes: number;
  readonly totalResults: number;
}

export interface HarvestContext {
  config: HarvestConfig;
  source: PageSource;

  // Shared with the page source; images are fetched without credentials
  transport: Transport;
  logger: Logger;

  onProgress?: (state: RunState) => void;
}
