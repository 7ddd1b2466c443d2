/**
 * Search Provider Interface
 *
 * Abstract interface for web search providers.
 * Allows switching between Brave Search and custom implementations.
 */

/**
 * Search filters for customizing queries
 */
export interface SearchFilters {
  // Location/language
  country?: string; // ISO 3166-1 alpha-2 country code (e.g., "US", "GB")
  language?: string; // ISO 639-1 language code (e.g., "en", "es")

  // Result configuration
  count?: number; // Number of results to return (default: 20)

  // Content filtering
  safesearch?: "off" | "moderate" | "strict"; // Safe search level

  // Site filtering (applied to query string)
  includeDomains?: string[]; // Domains to prioritize
  excludeDomains?: string[]; // Domains to exclude
}

/**
 * Single search result (provider-agnostic)
 */
export interface SearchResultItem {
  title: string;
  url: string;
  description: string;
  publishedDate?: string;
}

/**
 * Search response (provider-agnostic)
 */
export interface SearchResponse {
  query: string; // The query that was executed
  results: SearchResultItem[];
  totalResults: number;
}

export interface SearchCallOptions {
  signal?: AbortSignal;
  filters?: SearchFilters;
}

/**
 * Search Provider interface
 * All search providers must implement these methods
 */
export interface SearchProvider {
  /**
   * Execute a single web search
   */
  search(term: string, options?: SearchCallOptions): Promise<SearchResponse>;

  /**
   * Get the provider name
   */
  getName(): string;
}
