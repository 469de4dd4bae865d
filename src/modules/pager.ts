/**
 * Pager Module
 * Builds the first search URL and fetches result pages by cursor
 */

import { z } from "zod";
import { PageSchema } from "../types";
import type { Page, PageSource, Result } from "../types";
import { ConfigError, DecodeError, HarvestError } from "../utils/errors";
import { readText, sendRequest } from "../utils/http";
import type { Transport } from "../utils/http";

export const SEARCH_ENDPOINT = "https://api.pexels.com/v1/search?per_page=80&page=1";

/**
 * Build the first page URL for a query
 * Only the query parameter varies; page size and page number are fixed
 */
export function buildInitialRequest(query: string): string {
  try {
    // Throws URIError on unpaired surrogates, which URLSearchParams would rewrite silently
    encodeURIComponent(query);
  } catch (error) {
    throw new ConfigError(`Cannot encode query ${JSON.stringify(query)}`, {
      cause: error,
    });
  }

  const url = new URL(SEARCH_ENDPOINT);
  url.searchParams.set("query", query);
  return url.toString();
}

/**
 * Page source backed by the Pexels search API
 * Each cursor is requested verbatim with the raw API key as Authorization
 */
export class PexelsPageSource implements PageSource {
  constructor(
    private readonly key: string,
    private readonly transport: Transport = fetch,
  ) {}

  async fetchPage(uri: string): Promise<Result<Page>> {
    try {
      const response = await sendRequest(this.transport, uri, {
        Authorization: this.key,
      });
      const body = await readText(response, uri);
      return { data: decodePage(body, uri) };
    } catch (error) {
      if (error instanceof HarvestError) {
        return { error };
      }
      throw error;
    }
  }
}

/**
 * Parse a page body, failing with DecodeError on bad JSON or a wrong shape
 */
export function decodePage(body: string, uri: string): Page {
  let parsed: unknown;

  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new DecodeError("Cannot unmarshal json", uri, body, { cause: error });
  }

  const { error, data } = PageSchema.safeParse(parsed);
  if (error) {
    throw new DecodeError(
      `Unexpected page shape (${z.prettifyError(error)})`,
      uri,
      body,
      { cause: error },
    );
  }

  return data;
}
