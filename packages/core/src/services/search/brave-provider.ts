/**
 * Brave Search Provider Implementation
 *
 * Adapter that wraps the Brave Search client to implement SearchProvider interface
 */

import type {
  SearchCallOptions,
  SearchProvider,
  SearchResponse,
  SearchResultItem,
} from "../../interfaces/search-provider";
import { BraveSearchClient } from "../brave-search/client";
import type {
  BraveClientOptions,
  BraveSearchResponse,
  BraveSearchResult,
} from "../brave-search/types";

/**
 * Brave Search implementation of SearchProvider
 */
export class BraveSearchProvider implements SearchProvider {
  private readonly client: BraveSearchClient;

  constructor(options: BraveClientOptions) {
    this.client = new BraveSearchClient(options);
  }

  /**
   * Convert Brave-specific result to generic SearchResultItem
   */
  private convertResult(braveResult: BraveSearchResult): SearchResultItem {
    return {
      title: braveResult.title,
      url: braveResult.url,
      description: braveResult.description,
      publishedDate: braveResult.published_date,
    };
  }

  /**
   * Convert Brave response to generic SearchResponse
   */
  private convertResponse(braveResponse: BraveSearchResponse): SearchResponse {
    return {
      query: braveResponse.query,
      results: braveResponse.results.map((r) => this.convertResult(r)),
      totalResults: braveResponse.totalResults,
    };
  }

  /**
   * Execute a single web search
   */
  async search(
    term: string,
    options?: SearchCallOptions
  ): Promise<SearchResponse> {
    // Use retry logic for reliability
    const braveResponse = await this.client.searchWithRetry(
      term,
      options?.filters,
      options?.signal
    );
    return this.convertResponse(braveResponse);
  }

  /**
   * Get the provider name
   */
  getName(): string {
    return "Brave Search";
  }
}
