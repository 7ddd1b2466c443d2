/**
 * Run state model
 */

import type {
  Answer,
  ClarifyingQuestion,
  DeliveryReceipt,
  EnrichedQuery,
  OptimizedQuery,
  RawQuery,
  Report,
  SearchOutcome,
  SearchPlanItem,
} from "./research";

/**
 * Pipeline stages, in execution order
 */
export type PipelineStage =
  | "optimize"
  | "clarify"
  | "enrich"
  | "plan"
  | "search"
  | "write"
  | "deliver";

/**
 * Run status. Non-terminal statuses only ever move forward in this order.
 */
export type RunStatus =
  | "start"
  | "optimized"
  | "questions_ready"
  | "enriched"
  | "planned"
  | "searched"
  | "written"
  | "delivered"
  | "done"
  | "failed"
  | "cancelled";

export const RUN_STATUS_ORDER: readonly RunStatus[] = [
  "start",
  "optimized",
  "questions_ready",
  "enriched",
  "planned",
  "searched",
  "written",
  "delivered",
  "done",
];

export type TerminalStatus = Extract<RunStatus, "done" | "failed" | "cancelled">;

export function isTerminalStatus(status: RunStatus): status is TerminalStatus {
  return status === "done" || status === "failed" || status === "cancelled";
}

export interface RunFailure {
  stage: PipelineStage;
  code: string;
  message: string;
}

export interface RunState {
  runId: string;
  traceId: string;
  status: RunStatus;

  rawQuery: RawQuery;
  optimizedQuery?: OptimizedQuery;
  questions?: readonly ClarifyingQuestion[];
  answers?: readonly Answer[];
  enrichedQuery?: EnrichedQuery;
  plan?: readonly SearchPlanItem[];
  searchResults: readonly SearchOutcome[];
  report?: Report;

  deliveryRequested: boolean;
  delivery?: DeliveryReceipt;

  failure?: RunFailure;
  warnings: string[];

  startedAt: number;
  updatedAt: number;
  completedAt?: number;
}
