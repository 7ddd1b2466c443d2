/**
 * Research Engine service
 *
 * Coordinates the interactive research flow:
 * 1. Optimize the query (via completion provider)
 * 2. Ask clarifying questions and wait for answers
 * 3. Plan searches (via completion provider)
 * 4. Execute searches concurrently (via search provider)
 * 5. Write the report (via completion provider)
 * 6. Optionally deliver it (via notifier)
 */

export { ResearchOrchestrator } from "./orchestrator";
export { ResearchRun } from "./research-run";
export { EventStream } from "./event-stream";
export { CompletionGateway } from "./completion-gateway";
export type { CompletionContext } from "./completion-gateway";
export { SearchFanOut, formatSearchResults } from "./search-fanout";
export type { FanOutContext } from "./search-fanout";
export { TraceContext, LoggerTraceSink, generateTraceId } from "./trace-context";
export { composeEnrichedQuery, matchAnswers } from "./enrichment";
export * from "./errors";
export * from "./shapes";
export {
  DEFAULT_CONFIG,
  clearConfigCache,
  configOverridesSchema,
  getConfig,
  getConfigPath,
  getModelConfig,
  loadConfig,
  mergeConfig,
  parseConfig,
  withConfigOverrides,
} from "./config";
export type {
  ConfigOverrides,
  DeliveryConfig,
  LLMConfig,
  ModelStep,
  ResearchConfig,
  ResearchPipelineConfig,
  SearchConfig,
} from "./config";
export type {
  ResearchDependencies,
  RunHandle,
  RunRef,
  StartOptions,
} from "./types";
