/**
 * Provider interfaces for dependency injection
 */

export type {
  CompletionProvider,
  CompletionRequest,
  CompletionCallOptions,
  ShapeDescriptor,
  ModelConfig,
} from "./completion-provider";

export type {
  SearchProvider,
  SearchFilters,
  SearchResultItem,
  SearchResponse,
  SearchCallOptions,
} from "./search-provider";

export type { Notifier } from "./notifier";

export type {
  TraceSink,
  SpanHandle,
  SpanAttributes,
  SpanEnd,
} from "./trace-sink";
