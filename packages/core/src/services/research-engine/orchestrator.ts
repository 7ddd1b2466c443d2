/**
 * Research orchestrator
 *
 * Public facade of the research engine. Starts runs, routes answers,
 * regeneration and cancellation to the right run, and keeps a bounded
 * registry of runs for inspection.
 */

import type { Answer, ClarifyingQuestion } from "../../models/research";
import type { RunState } from "../../models/run-state";
import { createLogger, type Logger } from "../../utils/logger";
import { CompletionGateway } from "./completion-gateway";
import { getConfig, type ResearchConfig } from "./config";
import { InvalidRequestError, RunNotFoundError } from "./errors";
import type { EventStream } from "./event-stream";
import { ResearchRun } from "./research-run";
import { SearchFanOut } from "./search-fanout";
import { LoggerTraceSink } from "./trace-context";
import type {
  ResearchDependencies,
  RunHandle,
  RunRef,
  StartOptions,
} from "./types";

export class ResearchOrchestrator {
  readonly config: ResearchConfig;
  private readonly gateway: CompletionGateway;
  private readonly fanOut: SearchFanOut;
  private readonly log: Logger;
  private readonly runs = new Map<string, ResearchRun>();
  private readonly finished: string[] = []; // terminal run ids, oldest first

  constructor(private readonly deps: ResearchDependencies) {
    this.config = deps.config ?? getConfig();
    this.log = deps.logger ?? createLogger("research");
    this.gateway = new CompletionGateway(deps.completionProvider);
    this.fanOut = new SearchFanOut(
      deps.searchProvider,
      this.gateway,
      this.config,
      this.log.child({ component: "search-fanout" })
    );
  }

  /**
   * Start a research run. The run proceeds in the background until it needs
   * answers to its clarifying questions.
   */
  start(rawQuery: string, options: StartOptions = {}): RunHandle {
    const text = rawQuery.trim();
    if (!text) {
      throw new InvalidRequestError("Research query must not be empty");
    }

    const deliver = options.deliver ?? false;
    if (deliver && !this.deps.notifier) {
      throw new InvalidRequestError(
        "Delivery was requested but no notifier is configured"
      );
    }

    this.cancelAbandonedRuns();

    const run = new ResearchRun({ text }, deliver, {
      gateway: this.gateway,
      fanOut: this.fanOut,
      notifier: this.deps.notifier,
      traceSink: this.deps.traceSink ?? new LoggerTraceSink(this.log.child({ component: "trace" })),
      config: this.config,
      logger: this.log,
    });

    this.runs.set(run.runId, run);
    void run.completion.then(() => this.retire(run.runId));
    run.begin();

    return {
      runId: run.runId,
      traceId: run.trace.traceId,
      events: run.events,
      completion: run.completion,
    };
  }

  /**
   * Answer the pending clarifying questions and resume the run
   */
  supplyAnswers(ref: RunRef, answers: readonly Answer[]): void {
    this.getRun(ref).supplyAnswers(answers);
  }

  /**
   * Replace the pending clarifying questions with a new set
   */
  async regenerateQuestions(
    ref: RunRef
  ): Promise<readonly ClarifyingQuestion[]> {
    return this.getRun(ref).regenerateQuestions();
  }

  cancel(ref: RunRef): void {
    this.getRun(ref).cancel();
  }

  /**
   * The run's progress event stream (single consumer)
   */
  events(ref: RunRef): EventStream {
    return this.getRun(ref).events;
  }

  currentState(ref: RunRef): RunState {
    return this.getRun(ref).snapshot();
  }

  /**
   * States of all retained runs, most recently started first
   */
  listRuns(): RunState[] {
    return [...this.runs.values()]
      .map((run) => run.snapshot())
      .sort((a, b) => b.startedAt - a.startedAt);
  }

  private getRun(ref: RunRef): ResearchRun {
    const runId = typeof ref === "string" ? ref : ref.runId;
    const run = this.runs.get(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    return run;
  }

  /**
   * Make room for one more run waiting for answers by cancelling the
   * oldest ones beyond maxSuspendedRuns. They then retire like any other
   * finished run.
   */
  private cancelAbandonedRuns(): void {
    const limit = this.config.research.maxSuspendedRuns;
    // Map iteration follows insertion order: oldest first
    const suspended = [...this.runs.values()].filter(
      (run) => run.status === "questions_ready"
    );
    const excess = suspended.length - limit + 1;

    for (const run of suspended.slice(0, Math.max(0, excess))) {
      this.log.warn({ runId: run.runId, limit }, "Cancelling run left waiting for answers");
      run.cancel();
    }
  }

  /**
   * Remember a finished run and evict the oldest beyond maxRetainedRuns
   */
  private retire(runId: string): void {
    this.finished.push(runId);
    while (this.finished.length > this.config.research.maxRetainedRuns) {
      const evicted = this.finished.shift();
      if (evicted !== undefined) {
        this.runs.delete(evicted);
        this.log.debug({ runId: evicted }, "Evicted finished run");
      }
    }
  }
}
