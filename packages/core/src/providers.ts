/**
 * Provider Factory Functions
 *
 * Centralized provider creation from the research config and environment.
 */

import type { CompletionProvider } from "./interfaces/completion-provider";
import type { Notifier } from "./interfaces/notifier";
import type { SearchProvider } from "./interfaces/search-provider";
import { createNotifierFromEnv } from "./services/email";
import { OpenAIProvider } from "./services/llm/openai-provider";
import type { LLMConfig, ResearchConfig, SearchConfig } from "./services/research-engine/config";
import { BraveSearchProvider } from "./services/search/brave-provider";

/**
 * Create the completion provider named in the config
 */
export function createCompletionProvider(
  provider: LLMConfig["provider"],
  apiKey: string | undefined
): CompletionProvider {
  switch (provider) {
    case "openai":
      if (!apiKey) {
        throw new Error("OPENAI_API_KEY is required for the openai provider");
      }
      return new OpenAIProvider(apiKey);
  }
}

/**
 * Create the search provider named in the config
 */
export function createSearchProvider(
  provider: SearchConfig["provider"],
  apiKey: string | undefined
): SearchProvider {
  switch (provider) {
    case "brave":
      if (!apiKey) {
        throw new Error("BRAVE_SEARCH_API_KEY is required for the brave provider");
      }
      return new BraveSearchProvider({ apiKey });
  }
}

/**
 * Create every provider a research run needs from environment variables
 * and the loaded research config. The notifier is undefined unless the
 * RESEND_* variables are set.
 */
export function createProvidersFromEnv(
  config: ResearchConfig,
  env: NodeJS.ProcessEnv = process.env
): {
  completionProvider: CompletionProvider;
  searchProvider: SearchProvider;
  notifier?: Notifier;
} {
  return {
    completionProvider: createCompletionProvider(config.llm.provider, env.OPENAI_API_KEY),
    searchProvider: createSearchProvider(config.search.provider, env.BRAVE_SEARCH_API_KEY),
    notifier: createNotifierFromEnv(env, config.delivery),
  };
}
