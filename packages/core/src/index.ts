/**
 * Core package entry point
 *
 * Exports the research engine, its provider interfaces and the bundled
 * OpenAI, Brave Search and Resend adapters.
 */

// Models
export type {
  RawQuery,
  OptimizedQuery,
  ClarifyingQuestion,
  Answer,
  QuestionAnswerPair,
  EnrichedQuery,
  SearchPlanItem,
  SearchOutcome,
  SuccessfulSearchOutcome,
  SearchResultSet,
  Report,
  DeliveryReceipt,
} from "./models/research";

export type {
  PipelineStage,
  RunStatus,
  TerminalStatus,
  RunFailure,
  RunState,
} from "./models/run-state";
export { RUN_STATUS_ORDER, isTerminalStatus } from "./models/run-state";

export type {
  EventLevel,
  EventStage,
  ProgressEvent,
  ProgressEventType,
} from "./models/progress-event";

// Interfaces
export type * from "./interfaces";

// Research engine
export * from "./services/research-engine";

// Adapters
export { OpenAIProvider } from "./services/llm";
export { BraveSearchProvider } from "./services/search";
export { BraveSearchClient, BraveApiError } from "./services/brave-search";
export {
  ResendNotifier,
  createNotifierFromEnv,
  renderReportEmail,
} from "./services/email";
export {
  createCompletionProvider,
  createSearchProvider,
  createProvidersFromEnv,
} from "./providers";

// Utilities
export { logger, createLogger, sleep, backoffDelay } from "./utils";
export type { Logger } from "./utils";
