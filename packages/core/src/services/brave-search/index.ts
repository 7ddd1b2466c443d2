/**
 * Brave Search API service
 *
 * Handles web search via Brave Search API with:
 * - Rate limiting (1 request per second)
 * - Query filtering and parameter support
 * - Error handling and retries
 */

export { BraveSearchClient, BraveApiError } from "./client";
export { buildQueryWithFilters, buildSearchParams } from "./filters";
export type {
  SearchFilters,
  BraveClientOptions,
  BraveSearchResult,
  BraveSearchResponse,
} from "./types";
