/**
 * Shared fixtures for module tests
 */

import { vi } from "vitest";
import { PageSchema } from "../types";
import type { HarvestContext, Page, PageSource, Result } from "../types";
import { Logger } from "../utils/logger";
import type { Transport } from "../utils/http";

/**
 * Finite page sequence keyed by cursor URL
 */
export class FakePageSource implements PageSource {
  readonly requests: string[] = [];

  constructor(private readonly pages: Record<string, Result<Page>>) {}

  async fetchPage(uri: string): Promise<Result<Page>> {
    this.requests.push(uri);
    const result = this.pages[uri];
    if (!result) {
      throw new Error(`Unexpected page request ${uri}`);
    }
    return result;
  }
}

export function makePage(
  imageUrls: string[],
  nextPage = "",
  totalResults = imageUrls.length,
): Result<Page> {
  return {
    data: PageSchema.parse({
      total_results: totalResults,
      photos: imageUrls.map((large2x, i) => ({ id: i + 1, src: { large2x } })),
      next_page: nextPage,
    }),
  };
}

/**
 * Image host that answers every URL with "bytes:<url>"
 * URLs listed in failures get that status instead
 */
export function fakeImageHost(failures: Record<string, number> = {}) {
  return vi.fn<Transport>(async (url) => {
    const status = failures[url];
    if (status !== undefined) {
      return new Response("nope", { status });
    }
    return new Response(`bytes:${url}`, { status: 200 });
  });
}

export function createContext(
  directory: string,
  source: PageSource,
  transport: Transport,
  logger = new Logger("error"),
): HarvestContext {
  return {
    config: {
      api: { key: "test-key" },
      output: { directory },
      search: { query: "dogs" },
      logging: { level: "error", showProgress: false },
    },
    source,
    transport,
    logger,
  };
}
