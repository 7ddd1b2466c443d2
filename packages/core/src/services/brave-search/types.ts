/**
 * Type definitions for Brave Search service
 */

import { z } from "zod";

export type { SearchFilters } from "../../interfaces/search-provider";

/**
 * Web result as returned by the Brave Search API (fields we read)
 */
export const braveWebResultSchema = z.object({
  title: z.string().default(""),
  url: z.string().default(""),
  description: z.string().default(""),
  age: z.string().optional(), // human-readable or ISO publish date
  page_age: z.string().optional(),
});

/**
 * Brave Search API payload. Responses without a `web` section carry no
 * web results (e.g. queries answered only by infoboxes).
 */
export const braveApiResponseSchema = z.object({
  web: z
    .object({
      results: z.array(braveWebResultSchema).default([]),
    })
    .optional(),
});

/**
 * Single search result from Brave
 */
export interface BraveSearchResult {
  title: string;
  url: string;
  description: string;
  published_date?: string;
}

/**
 * Brave Search API response
 */
export interface BraveSearchResponse {
  query: string;
  results: BraveSearchResult[];
  totalResults: number;
}

/**
 * Client settings
 */
export interface BraveClientOptions {
  apiKey: string;
  maxRetries?: number; // attempts per search (default: 3)
  minRequestIntervalMs?: number; // spacing between requests (default: 1000)
  retryBaseDelayMs?: number; // first backoff delay (default: 1000)
  fetchImpl?: typeof fetch; // default: global fetch
}
