/**
 * Research run state machine
 *
 * A ResearchRun owns everything belonging to one run: its RunState (only
 * this class writes it), its event stream, trace context and abort signal.
 *
 * Flow:
 * 1. optimize  - refine the raw query
 * 2. clarify   - generate N questions, then suspend until answers arrive
 * 3. enrich    - compose query + answers (inside supplyAnswers)
 * 4. plan      - M planned searches
 * 5. search    - concurrent fan-out, failures become data
 * 6. write     - report from the successful searches
 * 7. deliver   - optional, failures are warnings
 */

import { randomUUID } from "crypto";
import type { Notifier } from "../../interfaces/notifier";
import type { TraceSink } from "../../interfaces/trace-sink";
import type {
  ProgressEvent,
  ProgressEventInput,
} from "../../models/progress-event";
import type {
  Answer,
  ClarifyingQuestion,
  EnrichedQuery,
  OptimizedQuery,
  RawQuery,
  Report,
  SearchOutcome,
  SearchPlanItem,
  SuccessfulSearchOutcome,
} from "../../models/research";
import {
  isTerminalStatus,
  RUN_STATUS_ORDER,
  type PipelineStage,
  type RunState,
  type RunStatus,
} from "../../models/run-state";
import type { Logger } from "../../utils/logger";
import { backoffDelay, sleep } from "../../utils/timing";
import {
  buildClarifyPrompt,
  buildOptimizePrompt,
  buildPlanPrompt,
  buildWritePrompt,
} from "../llm/prompts";
import type { CompletionContext, CompletionGateway } from "./completion-gateway";
import type { ResearchConfig } from "./config";
import { composeEnrichedQuery, matchAnswers } from "./enrichment";
import {
  DeliveryError,
  describeError,
  InvalidTransitionError,
  ProviderError,
  ResearchError,
  RunCancelledError,
} from "./errors";
import { EventStream } from "./event-stream";
import type { SearchFanOut } from "./search-fanout";
import {
  CLARIFYING_QUESTIONS_SHAPE,
  OPTIMIZED_QUERY_SHAPE,
  RESEARCH_REPORT_SHAPE,
  SEARCH_PLAN_SHAPE,
} from "./shapes";
import { TraceContext } from "./trace-context";

export interface RunDependencies {
  gateway: CompletionGateway;
  fanOut: SearchFanOut;
  notifier?: Notifier;
  traceSink: TraceSink;
  config: ResearchConfig;
  logger: Logger;
}

type RunArtifacts = Partial<
  Pick<
    RunState,
    | "optimizedQuery"
    | "questions"
    | "answers"
    | "enrichedQuery"
    | "plan"
    | "report"
    | "delivery"
  >
>;

function isSuccessful(outcome: SearchOutcome): outcome is SuccessfulSearchOutcome {
  return outcome.succeeded;
}

export class ResearchRun {
  readonly runId: string;
  readonly events = new EventStream();
  readonly trace: TraceContext;
  readonly completion: Promise<RunState>;

  private state: RunState;
  private readonly controller = new AbortController();
  private readonly resolveCompletion: (state: RunState) => void;
  private readonly log: Logger;
  private nextIndex = 0;
  private activeStage: PipelineStage = "optimize";
  private regenerating = false;
  private questionSerial = 0; // ids stay unique across regenerations

  constructor(
    rawQuery: RawQuery,
    deliveryRequested: boolean,
    private readonly deps: RunDependencies
  ) {
    this.runId = randomUUID();
    this.trace = new TraceContext(deps.traceSink, "research_run", {
      runId: this.runId,
    });
    this.log = deps.logger.child({ runId: this.runId, traceId: this.trace.traceId });

    let resolve: (state: RunState) => void = () => {};
    this.completion = new Promise<RunState>((r) => {
      resolve = r;
    });
    this.resolveCompletion = resolve;

    const now = Date.now();
    this.state = {
      runId: this.runId,
      traceId: this.trace.traceId,
      status: "start",
      rawQuery,
      searchResults: [],
      deliveryRequested,
      warnings: [],
      startedAt: now,
      updatedAt: now,
    };
  }

  // ===========================================================================
  // Public surface (called by the orchestrator)
  // ===========================================================================

  get status(): RunStatus {
    return this.state.status;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this.state.status);
  }

  /**
   * Read-only copy of the run state
   */
  snapshot(): RunState {
    return structuredClone(this.state);
  }

  /**
   * Start the opening stages (optimize, clarify). Returns immediately.
   */
  begin(): void {
    this.log.info({ query: this.state.rawQuery.text }, "Research run started");
    void this.drive(() => this.runOpening());
  }

  /**
   * Resume a run suspended on its clarifying questions.
   * Validation errors leave the run untouched.
   */
  supplyAnswers(answers: readonly Answer[]): void {
    if (this.state.status !== "questions_ready" || this.regenerating) {
      throw new InvalidTransitionError(
        "supply answers",
        this.state.status,
        this.regenerating ? "questions are being regenerated" : undefined
      );
    }

    const optimizedQuery = this.require(this.state.optimizedQuery, "optimizedQuery");
    const questions = this.require(this.state.questions, "questions");
    const pairs = matchAnswers(questions, answers);

    this.activeStage = "enrich";
    this.emit({
      type: "stage_started",
      stage: "enrich",
      level: "info",
      message: "Composing enriched query from answers",
    });
    const enrichedQuery = composeEnrichedQuery(optimizedQuery, pairs);
    this.commit("enriched", {
      answers: pairs.map((pair) => pair.answer),
      enrichedQuery,
    });
    this.emit({
      type: "stage_completed",
      stage: "enrich",
      level: "info",
      message: `Enriched query with ${pairs.length} clarifications`,
    });

    void this.drive(() => this.runResearch(enrichedQuery));
  }

  /**
   * Replace the pending questions with a fresh set. The run stays suspended.
   */
  async regenerateQuestions(): Promise<readonly ClarifyingQuestion[]> {
    if (this.state.status !== "questions_ready" || this.regenerating) {
      throw new InvalidTransitionError(
        "regenerate questions",
        this.state.status,
        this.regenerating ? "questions are already being regenerated" : undefined
      );
    }

    const optimizedQuery = this.require(this.state.optimizedQuery, "optimizedQuery");
    this.regenerating = true;
    this.activeStage = "clarify";

    try {
      this.emit({
        type: "stage_started",
        stage: "clarify",
        level: "info",
        message: "Regenerating clarifying questions",
      });
      const questions = await this.withRetries("clarify", () =>
        this.generateQuestions(optimizedQuery)
      );
      this.ensureActive();

      this.commitArtifacts({ questions });
      this.emit({
        type: "stage_completed",
        stage: "clarify",
        level: "info",
        message: `Regenerated ${questions.length} clarifying questions`,
      });
      this.emitNeedAnswers(questions);
      return questions;
    } catch (error) {
      if (!(error instanceof RunCancelledError) && !this.isTerminal) {
        this.warn("clarify", `Question regeneration failed: ${describeError(error)}`);
      }
      throw error;
    } finally {
      this.regenerating = false;
    }
  }

  /**
   * Abort in-flight work and end the run as cancelled
   */
  cancel(): void {
    if (this.isTerminal) {
      throw new InvalidTransitionError("cancel", this.state.status);
    }

    this.controller.abort();
    this.transition("cancelled");
    this.emit({
      type: "cancelled",
      stage: "run",
      level: "warning",
      message: `Research run cancelled during ${this.activeStage}`,
    });
    this.log.info({ stage: this.activeStage }, "Research run cancelled");
    this.finish();
  }

  // ===========================================================================
  // Phases
  // ===========================================================================

  /**
   * Run a phase in the background. Every failure ends the run; nothing
   * escapes to the caller that resumed it.
   */
  private async drive(phase: () => Promise<void>): Promise<void> {
    try {
      await phase();
    } catch (error) {
      if (this.isTerminal || error instanceof RunCancelledError) {
        return;
      }
      this.fail(this.activeStage, error);
    }
  }

  private async runOpening(): Promise<void> {
    const { gateway, config } = this.deps;

    // 1. Optimize the raw query
    const optimizedQuery = await this.runStage(
      "optimize",
      "Optimizing research query",
      async (): Promise<OptimizedQuery> => {
        const { query } = await gateway.complete(
          buildOptimizePrompt(this.state.rawQuery, config),
          OPTIMIZED_QUERY_SHAPE,
          this.callContext("optimize")
        );
        return { text: query.trim(), derivedFrom: this.state.rawQuery };
      }
    );
    this.commit("optimized", { optimizedQuery });
    this.emit({
      type: "stage_completed",
      stage: "optimize",
      level: "info",
      message: `Optimized query: ${optimizedQuery.text}`,
    });

    // 2. Clarifying questions, then suspend
    const questions = await this.runStage(
      "clarify",
      "Generating clarifying questions",
      () => this.generateQuestions(optimizedQuery)
    );
    this.commit("questions_ready", { questions });
    this.emit({
      type: "stage_completed",
      stage: "clarify",
      level: "info",
      message: `Generated ${questions.length} clarifying questions`,
    });
    this.emitNeedAnswers(questions);
  }

  private async runResearch(enrichedQuery: EnrichedQuery): Promise<void> {
    const { config } = this.deps;

    // 4. Plan
    const plan = await this.runStage("plan", "Planning searches", () =>
      this.planSearches(enrichedQuery)
    );
    this.commit("planned", { plan });
    this.emit({
      type: "stage_completed",
      stage: "plan",
      level: "info",
      message: `Planned ${plan.length} searches`,
    });
    if (plan.length < config.research.planSize) {
      this.warn(
        "plan",
        `Planner returned ${plan.length} of ${config.research.planSize} searches`
      );
    }

    // 5. Search fan-out (never fails the run)
    await this.runSearches(plan);

    // 6. Write
    const successful = this.state.searchResults.filter(isSuccessful);
    const report = await this.runStage("write", "Writing report", () =>
      this.writeReport(enrichedQuery, successful)
    );
    this.commit("written", { report });
    this.emit({
      type: "stage_completed",
      stage: "write",
      level: "info",
      message: `Report written from ${report.sourceCount} search results`,
    });
    this.emit({
      type: "report_ready",
      stage: "write",
      level: "info",
      message: report.shortSummary,
      report,
    });

    // 7. Deliver
    if (this.state.deliveryRequested) {
      await this.deliver(report);
    }

    this.complete();
  }

  // ===========================================================================
  // Stage work
  // ===========================================================================

  private async generateQuestions(
    optimizedQuery: OptimizedQuery
  ): Promise<ClarifyingQuestion[]> {
    const { gateway, config } = this.deps;
    const { questionCount } = config.research;

    const { questions } = await gateway.complete(
      buildClarifyPrompt(optimizedQuery, config),
      CLARIFYING_QUESTIONS_SHAPE,
      this.callContext("clarify")
    );

    const texts = questions
      .map((q) => q.question.trim())
      .filter((text) => text.length > 0);

    if (texts.length < questionCount) {
      throw new ProviderError(
        `Expected ${questionCount} clarifying questions, received ${texts.length}`,
        { stage: "clarify" }
      );
    }

    return texts
      .slice(0, questionCount)
      .map((text) => ({ id: `q${++this.questionSerial}`, text }));
  }

  private async planSearches(
    enrichedQuery: EnrichedQuery
  ): Promise<SearchPlanItem[]> {
    const { gateway, config } = this.deps;

    const { searches } = await gateway.complete(
      buildPlanPrompt(enrichedQuery, config),
      SEARCH_PLAN_SHAPE,
      this.callContext("plan")
    );

    const plan = searches
      .map((s) => ({ term: s.query.trim(), rationale: s.reason.trim() }))
      .filter((item) => item.term.length > 0)
      .slice(0, config.research.planSize);

    if (plan.length === 0) {
      throw new ProviderError("Search planner returned an empty plan", {
        stage: "plan",
      });
    }

    return plan;
  }

  private async runSearches(plan: readonly SearchPlanItem[]): Promise<void> {
    this.activeStage = "search";
    this.ensureActive();
    this.emit({
      type: "stage_started",
      stage: "search",
      level: "info",
      message: `Searching ${plan.length} terms`,
    });

    await this.deps.fanOut.executeAll(plan, {
      trace: this.trace,
      signal: this.controller.signal,
      onSettled: (outcome, settled, total) => {
        this.recordOutcome(outcome);
        this.emit({
          type: "search_settled",
          stage: "search",
          level: outcome.succeeded ? "info" : "warning",
          message: outcome.succeeded
            ? `Search "${outcome.item.term}" completed (${settled}/${total})`
            : `Search "${outcome.item.term}" failed (${settled}/${total}): ${outcome.error}`,
          outcome,
          settled,
          total,
        });
      },
    });
    this.ensureActive();

    const succeeded = this.state.searchResults.filter(isSuccessful).length;
    this.commit("searched", {});
    this.emit({
      type: "stage_completed",
      stage: "search",
      level: "info",
      message: `${succeeded} of ${plan.length} searches succeeded`,
    });

    if (succeeded === 0) {
      this.warn(
        "search",
        "All searches failed; the report will be written without search results"
      );
    }
  }

  private async writeReport(
    enrichedQuery: EnrichedQuery,
    successful: readonly SuccessfulSearchOutcome[]
  ): Promise<Report> {
    const { gateway, config } = this.deps;

    const output = await gateway.complete(
      buildWritePrompt(enrichedQuery, successful, config),
      RESEARCH_REPORT_SHAPE,
      this.callContext("write")
    );

    return {
      markdown: output.markdownReport,
      shortSummary: output.shortSummary.trim(),
      followUpQuestions: output.followUpQuestions
        .map((q) => q.trim())
        .filter((q) => q.length > 0),
      sourceCount: successful.length,
    };
  }

  private async deliver(report: Report): Promise<void> {
    const { notifier, config } = this.deps;
    this.activeStage = "deliver";
    this.ensureActive();

    if (!notifier) {
      this.warn("deliver", "Delivery requested but no notifier is configured");
      return;
    }

    this.emit({
      type: "stage_started",
      stage: "deliver",
      level: "info",
      message: `Delivering report via ${notifier.getName()}`,
    });

    const topic = this.state.optimizedQuery?.text ?? this.state.rawQuery.text;
    const subject = `${config.delivery.subjectPrefix}: ${topic}`;

    try {
      const receipt = await this.trace.span(
        "deliver",
        { notifier: notifier.getName() },
        () => notifier.deliver(subject, report.markdown)
      );
      this.ensureActive();
      this.commit("delivered", { delivery: receipt });
      this.emit({
        type: "stage_completed",
        stage: "deliver",
        level: "info",
        message: "Report delivered",
      });
    } catch (error) {
      if (error instanceof RunCancelledError || this.controller.signal.aborted) {
        throw new RunCancelledError(this.runId);
      }
      const failure =
        error instanceof DeliveryError
          ? error
          : new DeliveryError(`Delivery failed: ${describeError(error)}`, {
              cause: error,
            });
      this.warn("deliver", failure.message);
    }
  }

  // ===========================================================================
  // Stage plumbing
  // ===========================================================================

  /**
   * Announce a stage, run its work with retries, and make sure the run was
   * not cancelled meanwhile. The caller commits the result.
   */
  private async runStage<T>(
    stage: PipelineStage,
    message: string,
    work: () => Promise<T>
  ): Promise<T> {
    this.activeStage = stage;
    this.ensureActive();
    this.emit({ type: "stage_started", stage, level: "info", message });
    const result = await this.withRetries(stage, work);
    this.ensureActive();
    return result;
  }

  /**
   * Attempt `work` up to stageMaxAttempts times with exponential backoff
   */
  private async withRetries<T>(
    stage: PipelineStage,
    work: () => Promise<T>
  ): Promise<T> {
    const { stageMaxAttempts, retryBaseDelayMs } = this.deps.config.research;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= stageMaxAttempts; attempt++) {
      try {
        return await work();
      } catch (error) {
        if (this.controller.signal.aborted) {
          throw new RunCancelledError(this.runId);
        }
        lastError = error;
        this.log.warn(
          { stage, attempt, maxAttempts: stageMaxAttempts, error: describeError(error) },
          "Stage attempt failed"
        );

        if (attempt < stageMaxAttempts) {
          try {
            await sleep(backoffDelay(attempt, retryBaseDelayMs), this.controller.signal);
          } catch {
            // only an abort interrupts the backoff
            throw new RunCancelledError(this.runId);
          }
        }
      }
    }

    throw lastError;
  }

  private callContext(stage: PipelineStage): CompletionContext {
    return { trace: this.trace, stage, signal: this.controller.signal };
  }

  private ensureActive(): void {
    if (this.controller.signal.aborted || this.isTerminal) {
      throw new RunCancelledError(this.runId);
    }
  }

  private require<T>(value: T | undefined, field: keyof RunState): T {
    if (value === undefined) {
      throw new Error(`Run ${this.runId} is ${this.state.status} without ${field}`);
    }
    return value;
  }

  // ===========================================================================
  // State and events
  // ===========================================================================

  /**
   * Move to the next status and store the stage's artifacts together
   */
  private commit(status: RunStatus, artifacts: RunArtifacts): void {
    this.transition(status);
    this.commitArtifacts(artifacts);
  }

  private commitArtifacts(artifacts: RunArtifacts): void {
    this.state = { ...this.state, ...artifacts, updatedAt: Date.now() };
  }

  private recordOutcome(outcome: SearchOutcome): void {
    this.state = {
      ...this.state,
      searchResults: [...this.state.searchResults, outcome],
      updatedAt: Date.now(),
    };
  }

  /**
   * Statuses only move forward; failed and cancelled are reachable from any
   * non-terminal status
   */
  private transition(next: RunStatus): void {
    const current = this.state.status;
    if (isTerminalStatus(current)) {
      throw new InvalidTransitionError(`move to ${next}`, current);
    }
    if (
      next !== "failed" &&
      next !== "cancelled" &&
      RUN_STATUS_ORDER.indexOf(next) <= RUN_STATUS_ORDER.indexOf(current)
    ) {
      throw new InvalidTransitionError(`move to ${next}`, current);
    }

    const now = Date.now();
    this.state = {
      ...this.state,
      status: next,
      updatedAt: now,
      completedAt: isTerminalStatus(next) ? now : undefined,
    };
    this.log.debug({ from: current, status: next }, "Run status changed");
  }

  private emit(input: ProgressEventInput): void {
    if (this.events.isClosed) {
      return;
    }
    const event: ProgressEvent = {
      ...input,
      index: this.nextIndex++,
      runId: this.runId,
      timestamp: Date.now(),
    };
    this.events.push(event);
  }

  private emitNeedAnswers(questions: readonly ClarifyingQuestion[]): void {
    this.emit({
      type: "need_answers",
      stage: "clarify",
      level: "info",
      message: `Waiting for answers to ${questions.length} questions`,
      questions,
    });
  }

  private warn(stage: PipelineStage, message: string): void {
    this.state = {
      ...this.state,
      warnings: [...this.state.warnings, message],
      updatedAt: Date.now(),
    };
    this.log.warn({ stage }, message);
    this.emit({ type: "warning", stage, level: "warning", message });
  }

  private complete(): void {
    this.ensureActive();
    this.transition("done");
    const warnings = this.state.warnings.length;
    this.emit({
      type: "done",
      stage: "run",
      level: "info",
      message:
        warnings > 0
          ? `Research complete with ${warnings} warning(s)`
          : "Research complete",
    });
    this.log.info(
      {
        durationMs: Date.now() - this.state.startedAt,
        searches: this.state.searchResults.length,
        warnings,
      },
      "Research run completed"
    );
    this.finish();
  }

  private fail(stage: PipelineStage, error: unknown): void {
    const message = describeError(error);
    this.state = {
      ...this.state,
      failure: {
        stage,
        code: error instanceof ResearchError ? error.code : "internal_error",
        message,
      },
    };
    this.transition("failed");
    this.emit({
      type: "failed",
      stage,
      level: "error",
      message: `Research failed during ${stage}: ${message}`,
      failedStage: stage,
      error: message,
    });
    this.log.error({ stage, error: message }, "Research run failed");
    this.finish({ error });
  }

  private finish(end?: { error?: unknown }): void {
    this.trace.finish(end);
    this.events.close();
    this.resolveCompletion(this.snapshot());
  }
}
