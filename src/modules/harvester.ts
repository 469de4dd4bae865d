/**
 * Harvester Module
 * Sequential run loop: one page, then every photo in it, then the next page
 */

import { buildInitialRequest } from "./pager";
import { processPhoto } from "./fetcher";
import type { HarvestContext, Page, RunState } from "../types";

export function createRunState(): RunState {
  return { pages: 0, photos: 0, bytes: 0, totalResults: 0 };
}

/**
 * Process every photo of a page in order and return the advanced totals
 */
export async function processPage(
  ctx: HarvestContext,
  page: Page,
  state: RunState,
): Promise<RunState> {
  let { photos, bytes } = state;

  for (const photo of page.photos) {
    bytes += await processPhoto(ctx, photo);
    photos++;
  }

  return {
    pages: state.pages + 1,
    photos,
    bytes,
    totalResults: state.pages === 0 ? page.total_results : state.totalResults,
  };
}

/**
 * Follow the server's cursor until it is empty
 * The first failure of any kind aborts the run
 */
export async function harvest(ctx: HarvestContext): Promise<RunState> {
  const { config, source, logger } = ctx;

  let cursor = buildInitialRequest(config.search.query);
  let state = createRunState();

  while (cursor) {
    logger.debug(`requesting ${cursor}`);

    const { data: page, error } = await source.fetchPage(cursor);
    if (error) {
      throw error;
    }

    state = await processPage(ctx, page, state);
    // The spinner already shows progress; keep stdout clear while it draws
    if (config.logging.showProgress) {
      logger.debug(`processed: ${state.photos}`);
    } else {
      logger.info(`processed: ${state.photos}`);
    }
    ctx.onProgress?.(state);

    cursor = page.next_page;
  }

  return state;
}
