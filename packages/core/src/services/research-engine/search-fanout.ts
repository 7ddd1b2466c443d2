/**
 * Search fan-out coordinator
 *
 * Runs one task per plan item concurrently: web search, then a model summary
 * of the results. A task never throws; its failure becomes a failed outcome,
 * so one bad search cannot abort its siblings or the aggregate call.
 */

import type {
  SearchCallOptions,
  SearchProvider,
  SearchResponse,
} from "../../interfaces/search-provider";
import type { SearchOutcome, SearchPlanItem } from "../../models/research";
import { createLogger, type Logger } from "../../utils/logger";
import { buildSummarizePrompt } from "../llm/prompts";
import type { CompletionGateway } from "./completion-gateway";
import type { ResearchConfig } from "./config";
import { describeError } from "./errors";
import { SEARCH_SUMMARY_SHAPE } from "./shapes";
import type { TraceContext } from "./trace-context";

export interface FanOutContext {
  trace: TraceContext;
  signal?: AbortSignal;
  /**
   * Called once per settled task, in completion order
   */
  onSettled?: (outcome: SearchOutcome, settled: number, total: number) => void;
}

/**
 * Render a search response as plain text for the summarizer
 */
export function formatSearchResults(response: SearchResponse): string {
  return response.results
    .map((result, i) => {
      const lines = [`${i + 1}. ${result.title}`, `   ${result.url}`];
      if (result.publishedDate) {
        lines.push(`   Published: ${result.publishedDate}`);
      }
      lines.push(`   ${result.description}`);
      return lines.join("\n");
    })
    .join("\n\n");
}

export class SearchFanOut {
  private readonly log: Logger;

  constructor(
    private readonly searchProvider: SearchProvider,
    private readonly gateway: CompletionGateway,
    private readonly config: ResearchConfig,
    log?: Logger
  ) {
    this.log = log ?? createLogger("search-fanout");
  }

  /**
   * Execute every plan item concurrently and collect outcomes as they settle.
   *
   * Resolves once all tasks settled. If the signal aborts first, resolves
   * right away with the outcomes settled so far; tasks still in flight are
   * abandoned and contribute nothing.
   */
  async executeAll(
    plan: readonly SearchPlanItem[],
    ctx: FanOutContext
  ): Promise<SearchOutcome[]> {
    const outcomes: SearchOutcome[] = [];
    const total = plan.length;
    const { signal } = ctx;

    if (signal?.aborted || total === 0) {
      return outcomes;
    }

    // Appends happen on the event loop, one settled task at a time
    const settle = async (item: SearchPlanItem): Promise<void> => {
      const outcome = await this.runTask(item, ctx);
      if (signal?.aborted) {
        return;
      }
      outcomes.push(outcome);
      ctx.onSettled?.(outcome, outcomes.length, total);
    };

    let detachAbort: () => void = () => {};
    const aborted = new Promise<void>((resolve) => {
      if (!signal) {
        return;
      }
      const onAbort = () => resolve();
      signal.addEventListener("abort", onAbort, { once: true });
      detachAbort = () => signal.removeEventListener("abort", onAbort);
    });

    try {
      await Promise.race([Promise.all(plan.map(settle)), aborted]);
    } finally {
      detachAbort();
    }

    const failed = outcomes.filter((o) => !o.succeeded).length;
    this.log.info(
      { traceId: ctx.trace.traceId, total, settled: outcomes.length, failed },
      "Search fan-out finished"
    );

    return [...outcomes];
  }

  /**
   * Run one search task. Every failure is converted to a failed outcome.
   */
  private async runTask(
    item: SearchPlanItem,
    ctx: FanOutContext
  ): Promise<SearchOutcome> {
    try {
      const options: SearchCallOptions = {
        signal: ctx.signal,
        filters: {
          count: this.config.search.resultsPerTerm,
          safesearch: this.config.search.safeSearch,
          country: this.config.search.country,
          language: this.config.search.language,
          includeDomains: this.config.search.includeDomains,
          excludeDomains: this.config.search.excludeDomains,
        },
      };

      const response = await ctx.trace.span(
        `search:${item.term}`,
        { provider: this.searchProvider.getName(), term: item.term },
        () => this.searchProvider.search(item.term, options)
      );

      if (response.results.length === 0) {
        return { item, succeeded: false, error: "Search returned no results" };
      }

      const { summary } = await this.gateway.complete(
        buildSummarizePrompt(item, formatSearchResults(response), this.config),
        SEARCH_SUMMARY_SHAPE,
        { trace: ctx.trace, stage: "search", signal: ctx.signal }
      );

      return { item, succeeded: true, summary };
    } catch (error) {
      this.log.warn(
        { traceId: ctx.trace.traceId, term: item.term, error: describeError(error) },
        "Search task failed"
      );
      return { item, succeeded: false, error: describeError(error) };
    }
  }
}
