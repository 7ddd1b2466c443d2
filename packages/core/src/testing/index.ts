/**
 * In-process stand-ins for the external providers, for tests
 */

import type {
  CompletionCallOptions,
  CompletionProvider,
  CompletionRequest,
} from "../interfaces/completion-provider";
import type { Notifier } from "../interfaces/notifier";
import type {
  SearchCallOptions,
  SearchProvider,
  SearchResponse,
} from "../interfaces/search-provider";
import type {
  SpanAttributes,
  SpanEnd,
  SpanHandle,
  TraceSink,
} from "../interfaces/trace-sink";
import type { ProgressEvent, ProgressEventType } from "../models/progress-event";
import type { DeliveryReceipt } from "../models/research";
import {
  DEFAULT_CONFIG,
  mergeConfig,
  type ConfigOverrides,
  type ResearchConfig,
} from "../services/research-engine/config";

export type CompletionHandler = (
  request: CompletionRequest,
  options?: CompletionCallOptions
) => unknown;

/**
 * Never resolves; rejects once the signal aborts
 */
export function waitForAbort(signal?: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener(
      "abort",
      () => reject(new Error("aborted")),
      { once: true }
    );
  });
}

/**
 * The term a summarize request is about (first line of its context)
 */
export function summarizedTerm(request: CompletionRequest): string {
  const firstLine = request.context.split("\n")[0] ?? "";
  return firstLine.replace("Search term: ", "");
}

export const DEFAULT_COMPLETIONS: Record<string, CompletionHandler> = {
  optimized_query: () => ({ query: "refined research topic" }),
  clarifying_questions: () => ({
    questions: [
      { question: "Which time period matters?" },
      { question: "Which region matters?" },
      { question: "How technical should it be?" },
    ],
  }),
  search_plan: () => ({
    searches: [1, 2, 3, 4, 5].map((n) => ({
      query: `term ${n}`,
      reason: `reason ${n}`,
    })),
  }),
  search_summary: (request) => ({
    summary: `summary of ${summarizedTerm(request)}`,
  }),
  research_report: () => ({
    shortSummary: "Short summary",
    markdownReport: "# Report\n\nBody",
    followUpQuestions: ["What next?"],
  }),
};

/**
 * Completion provider answering by shape name
 */
export class FakeCompletionProvider implements CompletionProvider {
  readonly calls: CompletionRequest[] = [];
  private readonly handlers: Record<string, CompletionHandler>;

  constructor(overrides: Record<string, CompletionHandler> = {}) {
    this.handlers = { ...DEFAULT_COMPLETIONS, ...overrides };
  }

  getName(): string {
    return "fake-completion";
  }

  async invoke(
    request: CompletionRequest,
    options?: CompletionCallOptions
  ): Promise<unknown> {
    this.calls.push(request);
    const handler = this.handlers[request.shape.name];
    if (!handler) {
      throw new Error(`No fake completion for ${request.shape.name}`);
    }
    return handler(request, options);
  }

  callsFor(shapeName: string): CompletionRequest[] {
    return this.calls.filter((call) => call.shape.name === shapeName);
  }
}

/**
 * Handler that fails the first `failures` calls, then defers to `then`
 */
export function failingFirst(
  failures: number,
  then: CompletionHandler
): CompletionHandler {
  let calls = 0;
  return (request, options) => {
    calls++;
    if (calls <= failures) {
      throw new Error(`scripted failure ${calls}`);
    }
    return then(request, options);
  };
}

export function searchResponse(term: string, count: number = 2): SearchResponse {
  const results = Array.from({ length: count }, (_, i) => ({
    title: `${term} result ${i + 1}`,
    url: `https://example.com/${encodeURIComponent(term)}/${i + 1}`,
    description: `About ${term}`,
  }));
  return { query: term, results, totalResults: results.length };
}

export type SearchBehavior = (
  term: string,
  options?: SearchCallOptions
) => SearchResponse | Promise<SearchResponse>;

/**
 * Search provider returning canned results; `failTerms` reject
 */
export class FakeSearchProvider implements SearchProvider {
  readonly terms: string[] = [];
  private readonly behavior: SearchBehavior;

  constructor(options: { failTerms?: string[]; behavior?: SearchBehavior } = {}) {
    const failTerms = new Set(options.failTerms ?? []);
    this.behavior =
      options.behavior ??
      ((term) => {
        if (failTerms.has(term)) {
          throw new Error(`search unavailable for ${term}`);
        }
        return searchResponse(term);
      });
  }

  getName(): string {
    return "fake-search";
  }

  async search(
    term: string,
    options?: SearchCallOptions
  ): Promise<SearchResponse> {
    this.terms.push(term);
    return this.behavior(term, options);
  }
}

export class FakeNotifier implements Notifier {
  readonly deliveries: Array<{ subject: string; body: string }> = [];

  constructor(private readonly failWith?: Error) {}

  getName(): string {
    return "fake-notifier";
  }

  async deliver(subject: string, body: string): Promise<DeliveryReceipt> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.deliveries.push({ subject, body });
    return { id: `delivery-${this.deliveries.length}`, deliveredAt: Date.now() };
  }
}

/**
 * Trace sink keeping every span in memory
 */
export class RecordingTraceSink implements TraceSink {
  readonly started: SpanHandle[] = [];
  readonly ended: Array<{ handle: SpanHandle; end?: SpanEnd }> = [];
  private counter = 0;

  startSpan(
    name: string,
    traceId: string,
    attributes: SpanAttributes = {},
    parentSpanId?: string
  ): SpanHandle {
    this.counter++;
    const handle: SpanHandle = {
      traceId,
      spanId: `span_${this.counter}`,
      parentSpanId,
      name,
      startedAt: Date.now(),
      attributes,
    };
    this.started.push(handle);
    return handle;
  }

  endSpan(handle: SpanHandle, end?: SpanEnd): void {
    this.ended.push({ handle, end });
  }
}

/**
 * Default configuration without backoff delays
 */
export function testConfig(overrides: ConfigOverrides = {}): ResearchConfig {
  return mergeConfig(
    mergeConfig(DEFAULT_CONFIG, { research: { retryBaseDelayMs: 0 } }),
    overrides
  );
}

/**
 * Pull events until one of `type` arrives; returns everything pulled,
 * that event included
 */
export async function eventsUntil(
  iterator: AsyncIterator<ProgressEvent>,
  type: ProgressEventType
): Promise<ProgressEvent[]> {
  const pulled: ProgressEvent[] = [];
  for (;;) {
    const next = await iterator.next();
    if (next.done) {
      throw new Error(
        `Stream ended before a ${type} event; got ${pulled.map((e) => e.type).join(", ")}`
      );
    }
    pulled.push(next.value);
    if (next.value.type === type) {
      return pulled;
    }
  }
}

/**
 * Pull the rest of the stream
 */
export async function drain(
  iterator: AsyncIterator<ProgressEvent>
): Promise<ProgressEvent[]> {
  const pulled: ProgressEvent[] = [];
  for (;;) {
    const next = await iterator.next();
    if (next.done) {
      return pulled;
    }
    pulled.push(next.value);
  }
}
