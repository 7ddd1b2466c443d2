/**
 * Type definitions for research engine
 */

import type { CompletionProvider } from "../../interfaces/completion-provider";
import type { Notifier } from "../../interfaces/notifier";
import type { SearchProvider } from "../../interfaces/search-provider";
import type { TraceSink } from "../../interfaces/trace-sink";
import type { RunState } from "../../models/run-state";
import type { Logger } from "../../utils/logger";
import type { ResearchConfig } from "./config";
import type { EventStream } from "./event-stream";

/**
 * Collaborators the orchestrator is built from
 */
export interface ResearchDependencies {
  // === Providers ===
  completionProvider: CompletionProvider;
  searchProvider: SearchProvider;
  notifier?: Notifier; // required only for runs started with deliver: true

  // === Ambient ===
  traceSink?: TraceSink; // default: spans written to the log
  logger?: Logger; // default: createLogger("research")
  config?: ResearchConfig; // default: research-config.yaml via getConfig()
}

/**
 * Per-run options
 */
export interface StartOptions {
  deliver?: boolean; // send the report through the notifier (default: false)
}

/**
 * Handle returned by start()
 */
export interface RunHandle {
  runId: string;
  traceId: string;
  events: EventStream; // single consumer, ends at the terminal event
  completion: Promise<RunState>; // resolves with the final state, never rejects
}

/**
 * Operations accept either a handle or a bare run id
 */
export type RunRef = RunHandle | string;
