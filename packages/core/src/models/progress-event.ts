/**
 * Progress events emitted by a research run
 */

import type { ClarifyingQuestion, Report, SearchOutcome } from "./research";
import type { PipelineStage } from "./run-state";

export type EventLevel = "info" | "warning" | "error";

/**
 * Stage an event belongs to; terminal run events use "run"
 */
export type EventStage = PipelineStage | "run";

interface ProgressEventBase {
  index: number; // contiguous from 0 within a run
  runId: string;
  stage: EventStage;
  level: EventLevel;
  message: string;
  timestamp: number;
}

export type ProgressEvent = ProgressEventBase &
  (
    | { type: "stage_started" }
    | { type: "stage_completed" }
    | { type: "need_answers"; questions: readonly ClarifyingQuestion[] }
    | {
        type: "search_settled";
        outcome: SearchOutcome;
        settled: number;
        total: number;
      }
    | { type: "warning" }
    | { type: "report_ready"; report: Report }
    | { type: "failed"; failedStage: PipelineStage; error: string }
    | { type: "cancelled" }
    | { type: "done" }
  );

export type ProgressEventType = ProgressEvent["type"];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/**
 * Event as written by the run, before it is stamped with index, run id and time
 */
export type ProgressEventInput = DistributiveOmit<
  ProgressEvent,
  "index" | "runId" | "timestamp"
>;
