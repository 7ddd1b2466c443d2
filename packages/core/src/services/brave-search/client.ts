/**
 * Brave Search API client
 * Handles rate limiting, retries and core search functionality
 */

import { createLogger } from "../../utils/logger";
import { backoffDelay, sleep } from "../../utils/timing";
import { buildQueryWithFilters, buildSearchParams } from "./filters";
import {
  braveApiResponseSchema,
  type BraveClientOptions,
  type BraveSearchResponse,
  type SearchFilters,
} from "./types";

const log = createLogger("brave-search");

const BRAVE_SEARCH_API_URL = "https://api.search.brave.com/res/v1/web/search";
const DEFAULT_MIN_REQUEST_INTERVAL = 1000; // 1 second between requests
const DEFAULT_MAX_RETRIES = 3;

/**
 * Non-2xx answer from the API
 */
export class BraveApiError extends Error {
  constructor(
    readonly status: number,
    body: string
  ) {
    super(`Brave Search API error (${status}): ${body}`);
    this.name = "BraveApiError";
  }

  /**
   * Rate limits and server errors are worth another attempt
   */
  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

export class BraveSearchClient {
  private readonly apiKey: string;
  private readonly maxRetries: number;
  private readonly minRequestInterval: number;
  private readonly retryBaseDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private nextRequestAt = 0;

  constructor(options: BraveClientOptions) {
    if (!options.apiKey) {
      throw new Error("Brave Search API key is required");
    }
    this.apiKey = options.apiKey;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.minRequestInterval =
      options.minRequestIntervalMs ?? DEFAULT_MIN_REQUEST_INTERVAL;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Wait for this request's slot. Slots are reserved synchronously, so
   * concurrent callers queue up one interval apart.
   */
  private async applyRateLimit(signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextRequestAt);
    this.nextRequestAt = slot + this.minRequestInterval;
    await sleep(slot - now, signal);
  }

  /**
   * Search the web using Brave Search API
   */
  async searchWeb(
    query: string,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<BraveSearchResponse> {
    await this.applyRateLimit(signal);

    // Build query with site filters
    const modifiedQuery = buildQueryWithFilters(query, filters);
    const params = buildSearchParams(modifiedQuery, filters);
    const url = `${BRAVE_SEARCH_API_URL}?${params.toString()}`;

    const response = await this.fetchImpl(url, {
      method: "GET",
      headers: {
        Accept: "application/json",
        "Accept-Encoding": "gzip",
        "X-Subscription-Token": this.apiKey,
      },
      signal,
    });

    if (!response.ok) {
      throw new BraveApiError(response.status, await response.text());
    }

    const payload = braveApiResponseSchema.parse(await response.json());
    const webResults = payload.web?.results ?? [];

    return {
      query: modifiedQuery,
      results: webResults.map((result) => ({
        title: result.title,
        url: result.url,
        description: result.description,
        published_date: result.page_age ?? result.age,
      })),
      totalResults: webResults.length,
    };
  }

  /**
   * Search with retry logic
   */
  async searchWithRetry(
    query: string,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<BraveSearchResponse> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.searchWeb(query, filters, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        lastError = error;
        log.warn(
          { query, attempt, maxRetries: this.maxRetries, error: String(error) },
          "Search attempt failed"
        );

        if (error instanceof BraveApiError && !error.retryable) {
          break;
        }
        if (attempt < this.maxRetries) {
          // Exponential backoff
          await sleep(backoffDelay(attempt, this.retryBaseDelayMs), signal);
        }
      }
    }

    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new Error(`Search for "${query}" failed: ${reason}`, {
      cause: lastError,
    });
  }
}
