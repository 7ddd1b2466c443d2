import { describe, expect, it, vi } from "vitest";
import type { Notifier } from "../../interfaces/notifier";
import type { ProgressEvent, ProgressEventType } from "../../models/progress-event";
import {
  DEFAULT_COMPLETIONS,
  FakeCompletionProvider,
  FakeNotifier,
  FakeSearchProvider,
  RecordingTraceSink,
  drain,
  eventsUntil,
  failingFirst,
  testConfig,
  waitForAbort,
  type CompletionHandler,
} from "../../testing";
import type { ConfigOverrides } from "./config";
import {
  AnswerMismatchError,
  InvalidRequestError,
  InvalidTransitionError,
  ProviderError,
  RunNotFoundError,
} from "./errors";
import { ResearchOrchestrator } from "./orchestrator";
import type { RunHandle } from "./types";

const ANSWERS = [
  { questionId: "q1", text: "last five years" },
  { questionId: "q2", text: "Europe" },
  { questionId: "q3", text: "fairly technical" },
];

interface SetupOptions {
  completions?: Record<string, CompletionHandler>;
  search?: FakeSearchProvider;
  notifier?: Notifier;
  config?: ConfigOverrides;
}

function setup(options: SetupOptions = {}) {
  const completion = new FakeCompletionProvider(options.completions);
  const search = options.search ?? new FakeSearchProvider();
  const sink = new RecordingTraceSink();
  const orchestrator = new ResearchOrchestrator({
    completionProvider: completion,
    searchProvider: search,
    notifier: options.notifier,
    traceSink: sink,
    config: testConfig(options.config),
  });
  return { orchestrator, completion, search, sink };
}

async function startToQuestions(
  orchestrator: ResearchOrchestrator,
  deliver = false
): Promise<{
  handle: RunHandle;
  iterator: AsyncIterator<ProgressEvent>;
  opening: ProgressEvent[];
}> {
  const handle = orchestrator.start("battery storage", { deliver });
  const iterator = handle.events[Symbol.asyncIterator]();
  const opening = await eventsUntil(iterator, "need_answers");
  return { handle, iterator, opening };
}

function ofType<T extends ProgressEventType>(
  events: readonly ProgressEvent[],
  type: T
): Array<Extract<ProgressEvent, { type: T }>> {
  return events.filter(
    (event): event is Extract<ProgressEvent, { type: T }> => event.type === type
  );
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("ResearchOrchestrator", () => {
  describe("happy path", () => {
    it("emits the stages in order with contiguous indices", async () => {
      const { orchestrator } = setup();
      const { handle, iterator, opening } = await startToQuestions(orchestrator);

      expect(opening.map((e) => `${e.type}:${e.stage}`)).toEqual([
        "stage_started:optimize",
        "stage_completed:optimize",
        "stage_started:clarify",
        "stage_completed:clarify",
        "need_answers:clarify",
      ]);

      orchestrator.supplyAnswers(handle, ANSWERS);
      const rest = await drain(iterator);

      expect(rest.map((e) => `${e.type}:${e.stage}`)).toEqual([
        "stage_started:enrich",
        "stage_completed:enrich",
        "stage_started:plan",
        "stage_completed:plan",
        "stage_started:search",
        "search_settled:search",
        "search_settled:search",
        "search_settled:search",
        "search_settled:search",
        "search_settled:search",
        "stage_completed:search",
        "stage_started:write",
        "stage_completed:write",
        "report_ready:write",
        "done:run",
      ]);

      const all = [...opening, ...rest];
      expect(all.map((e) => e.index)).toEqual(all.map((_, i) => i));
      expect(all.every((e) => e.runId === handle.runId)).toBe(true);
      expect(rest[rest.length - 1]?.message).toBe("Research complete");
    });

    it("resolves completion with the finished state", async () => {
      const { orchestrator } = setup();
      const { handle } = await startToQuestions(orchestrator);

      orchestrator.supplyAnswers(handle, ANSWERS);
      const final = await handle.completion;

      expect(final.status).toBe("done");
      expect(final.optimizedQuery?.text).toBe("refined research topic");
      expect(final.answers).toEqual(ANSWERS);
      expect(final.plan).toHaveLength(5);
      expect(final.searchResults.filter((o) => o.succeeded)).toHaveLength(5);
      expect(final.report).toEqual({
        markdown: "# Report\n\nBody",
        shortSummary: "Short summary",
        followUpQuestions: ["What next?"],
        sourceCount: 5,
      });
      expect(final.warnings).toEqual([]);
      expect(final.delivery).toBeUndefined();
      expect(final.completedAt).toBeDefined();
    });

    it("plans from the enriched query", async () => {
      const { orchestrator, completion } = setup();
      const { handle } = await startToQuestions(orchestrator);

      orchestrator.supplyAnswers(handle, ANSWERS);
      await handle.completion;

      expect(completion.callsFor("search_plan")[0]?.context).toContain(
        [
          "Main Topic:",
          "refined research topic",
          "Clarifications:",
          "Q1: Which time period matters?",
          "A1: last five years",
          "Q2: Which region matters?",
          "A2: Europe",
          "Q3: How technical should it be?",
          "A3: fairly technical",
        ].join("\n")
      );
    });

    it("opens every span on the run's trace", async () => {
      const { orchestrator, sink } = setup();
      const { handle } = await startToQuestions(orchestrator);

      orchestrator.supplyAnswers(handle, ANSWERS);
      await handle.completion;

      expect(sink.started.every((span) => span.traceId === handle.traceId)).toBe(true);
      expect(sink.started[0]?.name).toBe("research_run");
      expect(sink.started.map((span) => span.name)).toContain("search:term 3");
      expect(sink.ended[sink.ended.length - 1]?.handle.name).toBe("research_run");
      expect(sink.ended).toHaveLength(sink.started.length);
    });
  });

  describe("search failures", () => {
    it("writes the report from the searches that succeeded", async () => {
      const { orchestrator, completion } = setup({
        search: new FakeSearchProvider({ failTerms: ["term 2", "term 4"] }),
      });
      const { handle, iterator } = await startToQuestions(orchestrator);

      orchestrator.supplyAnswers(handle, ANSWERS);
      const rest = await drain(iterator);
      const final = await handle.completion;

      const settled = ofType(rest, "search_settled");
      expect(settled.map((e) => e.settled)).toEqual([1, 2, 3, 4, 5]);
      expect(settled.filter((e) => e.level === "warning")).toHaveLength(2);
      expect(ofType(rest, "stage_completed").map((e) => e.message)).toContain(
        "3 of 5 searches succeeded"
      );

      expect(final.status).toBe("done");
      expect(final.report?.sourceCount).toBe(3);
      expect(final.warnings).toEqual([]);

      const writeContext = completion.callsFor("research_report")[0]?.context ?? "";
      expect(writeContext).toContain("Summarized search results (3):");
      expect(writeContext).toContain("## term 1\nsummary of term 1");
      expect(writeContext).not.toContain("## term 2");
    });

    it("still writes a report when every search fails", async () => {
      const { orchestrator, completion } = setup({
        search: new FakeSearchProvider({
          failTerms: ["term 1", "term 2", "term 3", "term 4", "term 5"],
        }),
      });
      const { handle, iterator } = await startToQuestions(orchestrator);

      orchestrator.supplyAnswers(handle, ANSWERS);
      const rest = await drain(iterator);
      const final = await handle.completion;

      expect(final.status).toBe("done");
      expect(final.report?.sourceCount).toBe(0);
      expect(final.warnings).toEqual([
        "All searches failed; the report will be written without search results",
      ]);
      expect(ofType(rest, "warning").map((e) => e.stage)).toEqual(["search"]);
      expect(rest[rest.length - 1]?.message).toBe("Research complete with 1 warning(s)");
      expect(completion.callsFor("research_report")[0]?.context).toContain(
        "No search results are available."
      );
    });
  });

  describe("delivery", () => {
    it("delivers the report with the configured subject", async () => {
      const notifier = new FakeNotifier();
      const { orchestrator } = setup({ notifier });
      const { handle, iterator } = await startToQuestions(orchestrator, true);

      orchestrator.supplyAnswers(handle, ANSWERS);
      const rest = await drain(iterator);
      const final = await handle.completion;

      expect(notifier.deliveries).toEqual([
        {
          subject: "Research Report: refined research topic",
          body: "# Report\n\nBody",
        },
      ]);
      expect(final.status).toBe("done");
      expect(final.delivery?.id).toBe("delivery-1");
      expect(rest.map((e) => `${e.type}:${e.stage}`).slice(-4)).toEqual([
        "report_ready:write",
        "stage_started:deliver",
        "stage_completed:deliver",
        "done:run",
      ]);
    });

    it("turns a delivery failure into a warning", async () => {
      const notifier = new FakeNotifier(new Error("mailbox full"));
      const { orchestrator } = setup({ notifier });
      const { handle, iterator } = await startToQuestions(orchestrator, true);

      orchestrator.supplyAnswers(handle, ANSWERS);
      const rest = await drain(iterator);
      const final = await handle.completion;

      expect(final.status).toBe("done");
      expect(final.delivery).toBeUndefined();
      expect(final.report?.markdown).toBe("# Report\n\nBody");
      expect(final.warnings).toEqual(["Delivery failed: mailbox full"]);
      expect(rest.map((e) => `${e.type}:${e.stage}`).slice(-3)).toEqual([
        "stage_started:deliver",
        "warning:deliver",
        "done:run",
      ]);
    });

    it("rejects delivery without a notifier", () => {
      const { orchestrator } = setup();

      expect(() => orchestrator.start("battery storage", { deliver: true })).toThrow(
        InvalidRequestError
      );
      expect(orchestrator.listRuns()).toEqual([]);
    });
  });

  describe("start", () => {
    it("rejects a blank query", () => {
      const { orchestrator } = setup();

      expect(() => orchestrator.start("   ")).toThrow("Research query must not be empty");
    });

    it("trims the raw query", async () => {
      const { orchestrator, completion } = setup();
      const handle = orchestrator.start("  battery storage \n");
      await eventsUntil(handle.events[Symbol.asyncIterator](), "need_answers");

      expect(orchestrator.currentState(handle).rawQuery.text).toBe("battery storage");
      expect(completion.callsFor("optimized_query")[0]?.context).toContain(
        "battery storage"
      );
    });
  });

  describe("answers", () => {
    it("rejects answers before the questions are ready", async () => {
      const { orchestrator } = setup({
        completions: { optimized_query: (_request, options) => waitForAbort(options?.signal) },
      });
      const handle = orchestrator.start("battery storage");

      expect(() => orchestrator.supplyAnswers(handle, ANSWERS)).toThrow(
        InvalidTransitionError
      );
      expect(orchestrator.currentState(handle).status).toBe("start");

      orchestrator.cancel(handle);
      expect((await handle.completion).status).toBe("cancelled");
    });

    it("keeps the run suspended when the answers do not match", async () => {
      const { orchestrator } = setup();
      const { handle } = await startToQuestions(orchestrator);

      let mismatch: unknown;
      try {
        orchestrator.supplyAnswers(handle, [ANSWERS[0], { questionId: "q7", text: "x" }]);
      } catch (error) {
        mismatch = error;
      }

      expect(mismatch).toBeInstanceOf(AnswerMismatchError);
      if (mismatch instanceof AnswerMismatchError) {
        expect(mismatch.missing).toEqual(["q2", "q3"]);
        expect(mismatch.unknown).toEqual(["q7"]);
      }
      expect(orchestrator.currentState(handle).status).toBe("questions_ready");

      orchestrator.supplyAnswers(handle, ANSWERS);
      expect((await handle.completion).status).toBe("done");
    });

    it("rejects a second set of answers", async () => {
      const { orchestrator } = setup();
      const { handle } = await startToQuestions(orchestrator);

      orchestrator.supplyAnswers(handle, ANSWERS);

      expect(() => orchestrator.supplyAnswers(handle, ANSWERS)).toThrow(
        InvalidTransitionError
      );
      expect((await handle.completion).status).toBe("done");
    });
  });

  describe("stage retries", () => {
    it("retries a failed stage and carries on", async () => {
      const { orchestrator, completion } = setup({
        completions: {
          optimized_query: failingFirst(1, DEFAULT_COMPLETIONS.optimized_query),
        },
      });
      const { handle, opening } = await startToQuestions(orchestrator);

      expect(completion.callsFor("optimized_query")).toHaveLength(2);
      expect(opening.map((e) => e.type)).toEqual([
        "stage_started",
        "stage_completed",
        "stage_started",
        "stage_completed",
        "need_answers",
      ]);
      expect(orchestrator.currentState(handle).status).toBe("questions_ready");
    });

    it("fails the run when too few questions come back", async () => {
      const { orchestrator, completion } = setup({
        completions: {
          clarifying_questions: () => ({
            questions: [{ question: "Only one?" }, { question: "  " }, { question: "Two?" }],
          }),
        },
      });
      const handle = orchestrator.start("battery storage");
      const events = await drain(handle.events[Symbol.asyncIterator]());
      const final = await handle.completion;

      expect(completion.callsFor("clarifying_questions")).toHaveLength(2);
      expect(final.status).toBe("failed");
      expect(final.failure).toEqual({
        stage: "clarify",
        code: "provider_error",
        message: "Expected 3 clarifying questions, received 2",
      });

      const failed = ofType(events, "failed");
      expect(failed).toHaveLength(1);
      expect(failed[0]?.failedStage).toBe("clarify");
      expect(failed[0]?.message).toBe(
        "Research failed during clarify: Expected 3 clarifying questions, received 2"
      );
      expect(events[events.length - 1]?.type).toBe("failed");
    });

    it("fails the run when the plan is empty", async () => {
      const { orchestrator, completion, search } = setup({
        completions: {
          search_plan: () => ({ searches: [{ query: "  ", reason: "blank" }] }),
        },
      });
      const { handle } = await startToQuestions(orchestrator);

      orchestrator.supplyAnswers(handle, ANSWERS);
      const final = await handle.completion;

      expect(completion.callsFor("search_plan")).toHaveLength(2);
      expect(search.terms).toEqual([]);
      expect(final.status).toBe("failed");
      expect(final.failure?.stage).toBe("plan");
      expect(final.failure?.message).toBe("Search planner returned an empty plan");
    });

    it("fails the run when the report cannot be written", async () => {
      const { orchestrator } = setup({
        completions: {
          research_report: () => {
            throw new Error("context too long");
          },
        },
      });
      const { handle } = await startToQuestions(orchestrator);

      orchestrator.supplyAnswers(handle, ANSWERS);
      const final = await handle.completion;

      expect(final.status).toBe("failed");
      expect(final.failure).toEqual({
        stage: "write",
        code: "provider_error",
        message: "fake-completion research_report call failed: context too long",
      });
      expect(final.report).toBeUndefined();
      expect(final.searchResults).toHaveLength(5);
    });
  });

  describe("plan and question sizes", () => {
    it("warns about a short plan and searches what it got", async () => {
      const { orchestrator, search } = setup({
        completions: {
          search_plan: () => ({
            searches: [
              { query: "alpha", reason: "a" },
              { query: "beta", reason: "b" },
            ],
          }),
        },
      });
      const { handle } = await startToQuestions(orchestrator);

      orchestrator.supplyAnswers(handle, ANSWERS);
      const final = await handle.completion;

      expect(final.status).toBe("done");
      expect(final.warnings).toEqual(["Planner returned 2 of 5 searches"]);
      expect([...search.terms].sort()).toEqual(["alpha", "beta"]);
    });

    it("truncates a long plan", async () => {
      const { orchestrator, search } = setup({
        completions: {
          search_plan: () => ({
            searches: [1, 2, 3, 4, 5, 6, 7].map((n) => ({
              query: `term ${n}`,
              reason: `reason ${n}`,
            })),
          }),
        },
      });
      const { handle } = await startToQuestions(orchestrator);

      orchestrator.supplyAnswers(handle, ANSWERS);
      const final = await handle.completion;

      expect(final.plan?.map((item) => item.term)).toEqual([
        "term 1",
        "term 2",
        "term 3",
        "term 4",
        "term 5",
      ]);
      expect(search.terms).toHaveLength(5);
      expect(final.warnings).toEqual([]);
    });

    it("keeps only the configured number of questions", async () => {
      const { orchestrator } = setup({
        completions: {
          clarifying_questions: () => ({
            questions: [1, 2, 3, 4, 5].map((n) => ({ question: `question ${n}` })),
          }),
        },
      });
      const { opening } = await startToQuestions(orchestrator);

      const [needAnswers] = ofType(opening, "need_answers");
      expect(needAnswers?.questions).toEqual([
        { id: "q1", text: "question 1" },
        { id: "q2", text: "question 2" },
        { id: "q3", text: "question 3" },
      ]);
    });
  });

  describe("cancel", () => {
    it("cancels while searches are in flight", async () => {
      const search = new FakeSearchProvider({
        behavior: (_term, options) => waitForAbort(options?.signal),
      });
      const { orchestrator, completion } = setup({ search });
      const { handle, iterator } = await startToQuestions(orchestrator);

      orchestrator.supplyAnswers(handle, ANSWERS);
      await vi.waitFor(() => expect(search.terms).toHaveLength(5));

      orchestrator.cancel(handle);
      const rest = await drain(iterator);
      const final = await handle.completion;
      await flush();

      const last = rest[rest.length - 1];
      expect(last?.type).toBe("cancelled");
      expect(last?.stage).toBe("run");
      expect(last?.message).toBe("Research run cancelled during search");
      expect(ofType(rest, "search_settled")).toEqual([]);

      expect(final.status).toBe("cancelled");
      expect(final.report).toBeUndefined();
      expect(orchestrator.currentState(handle).searchResults).toEqual([]);
      expect(completion.callsFor("research_report")).toEqual([]);
    });

    it("cancels a run waiting for answers", async () => {
      const { orchestrator } = setup();
      const { handle, iterator } = await startToQuestions(orchestrator);

      orchestrator.cancel(handle);
      const rest = await drain(iterator);

      expect(rest.map((e) => e.type)).toEqual(["cancelled"]);
      expect(rest[0]?.message).toBe("Research run cancelled during clarify");
      expect((await handle.completion).status).toBe("cancelled");
    });

    it("interrupts a stage backoff", async () => {
      const { orchestrator, completion } = setup({
        completions: {
          optimized_query: failingFirst(1, DEFAULT_COMPLETIONS.optimized_query),
        },
        config: { research: { retryBaseDelayMs: 60_000 } },
      });
      const handle = orchestrator.start("battery storage");
      await flush();

      orchestrator.cancel(handle);
      const final = await handle.completion;
      await flush();

      expect(final.status).toBe("cancelled");
      expect(completion.callsFor("optimized_query")).toHaveLength(1);
    });

    it("rejects every operation on a finished run", async () => {
      const { orchestrator } = setup();
      const { handle } = await startToQuestions(orchestrator);
      orchestrator.cancel(handle);

      expect(() => orchestrator.cancel(handle)).toThrow(
        "Cannot cancel while run is cancelled"
      );
      expect(() => orchestrator.supplyAnswers(handle, ANSWERS)).toThrow(
        InvalidTransitionError
      );
      await expect(orchestrator.regenerateQuestions(handle)).rejects.toBeInstanceOf(
        InvalidTransitionError
      );
    });
  });

  describe("regenerateQuestions", () => {
    it("replaces the pending questions with new ids", async () => {
      let round = 0;
      const { orchestrator } = setup({
        completions: {
          clarifying_questions: () => {
            round++;
            return {
              questions: [1, 2, 3].map((n) => ({ question: `round ${round} question ${n}` })),
            };
          },
        },
      });
      const { handle, iterator } = await startToQuestions(orchestrator);

      const fresh = await orchestrator.regenerateQuestions(handle);
      expect(fresh.map((q) => q.id)).toEqual(["q4", "q5", "q6"]);
      expect(fresh[0]?.text).toBe("round 2 question 1");

      const events = await eventsUntil(iterator, "need_answers");
      expect(events.map((e) => e.type)).toEqual([
        "stage_started",
        "stage_completed",
        "need_answers",
      ]);
      expect(ofType(events, "need_answers")[0]?.questions).toEqual(fresh);
      expect(orchestrator.currentState(handle).status).toBe("questions_ready");

      expect(() => orchestrator.supplyAnswers(handle, ANSWERS)).toThrow(
        AnswerMismatchError
      );

      orchestrator.supplyAnswers(
        handle,
        fresh.map((q) => ({ questionId: q.id, text: "yes" }))
      );
      const final = await handle.completion;
      expect(final.status).toBe("done");
      expect(final.answers?.map((a) => a.questionId)).toEqual(["q4", "q5", "q6"]);
    });

    it("keeps the old questions when regeneration fails", async () => {
      let calls = 0;
      const { orchestrator } = setup({
        completions: {
          clarifying_questions: (request, options) => {
            calls++;
            if (calls > 1) {
              throw new Error("boom");
            }
            return DEFAULT_COMPLETIONS.clarifying_questions(request, options);
          },
        },
      });
      const { handle, iterator } = await startToQuestions(orchestrator);

      await expect(orchestrator.regenerateQuestions(handle)).rejects.toBeInstanceOf(
        ProviderError
      );
      expect(calls).toBe(3);

      const state = orchestrator.currentState(handle);
      expect(state.status).toBe("questions_ready");
      expect(state.questions?.map((q) => q.id)).toEqual(["q1", "q2", "q3"]);
      expect(state.warnings).toEqual([
        "Question regeneration failed: fake-completion clarifying_questions call failed: boom",
      ]);

      const warning = await eventsUntil(iterator, "warning");
      expect(warning.map((e) => e.type)).toEqual(["stage_started", "warning"]);

      orchestrator.supplyAnswers(handle, ANSWERS);
      expect((await handle.completion).status).toBe("done");
    });

    it("rejects answers while questions are being regenerated", async () => {
      let calls = 0;
      let release: () => void = () => {};
      const { orchestrator } = setup({
        completions: {
          clarifying_questions: (request, options) => {
            calls++;
            const output = DEFAULT_COMPLETIONS.clarifying_questions(request, options);
            if (calls === 1) {
              return output;
            }
            return new Promise((resolve) => {
              release = () => resolve(output);
            });
          },
        },
      });
      const { handle } = await startToQuestions(orchestrator);

      const pending = orchestrator.regenerateQuestions(handle);

      expect(() => orchestrator.supplyAnswers(handle, ANSWERS)).toThrow(
        "Cannot supply answers while run is questions_ready (questions are being regenerated)"
      );
      await expect(orchestrator.regenerateQuestions(handle)).rejects.toBeInstanceOf(
        InvalidTransitionError
      );

      release();
      const fresh = await pending;
      expect(fresh.map((q) => q.id)).toEqual(["q4", "q5", "q6"]);
    });
  });

  describe("registry", () => {
    it("returns copies of the run state", async () => {
      const { orchestrator } = setup();
      const { handle } = await startToQuestions(orchestrator);

      const copy = orchestrator.currentState(handle);
      copy.warnings.push("tampered");

      expect(orchestrator.currentState(handle.runId).warnings).toEqual([]);
    });

    it("throws for an unknown run", () => {
      const { orchestrator } = setup();

      expect(() => orchestrator.currentState("missing")).toThrow(RunNotFoundError);
      expect(() => orchestrator.cancel("missing")).toThrow(
        "Research run missing not found"
      );
    });

    it("cancels the oldest run left waiting for answers", async () => {
      const { orchestrator } = setup({ config: { research: { maxSuspendedRuns: 1 } } });

      const first = await startToQuestions(orchestrator);
      const second = await startToQuestions(orchestrator);

      const rest = await drain(first.iterator);
      expect(rest.map((e) => e.message)).toEqual(["Research run cancelled during clarify"]);
      expect((await first.handle.completion).status).toBe("cancelled");
      expect(orchestrator.currentState(second.handle).status).toBe("questions_ready");

      orchestrator.supplyAnswers(second.handle, ANSWERS);
      expect((await second.handle.completion).status).toBe("done");
    });

    it("keeps waiting runs within the limit", async () => {
      const { orchestrator } = setup({ config: { research: { maxSuspendedRuns: 2 } } });

      const first = await startToQuestions(orchestrator);
      await startToQuestions(orchestrator);

      expect(orchestrator.currentState(first.handle).status).toBe("questions_ready");
    });

    it("evicts the oldest finished runs", async () => {
      const { orchestrator } = setup({
        completions: {
          optimized_query: () => {
            throw new Error("offline");
          },
        },
        config: { research: { maxRetainedRuns: 1 } },
      });

      const first = orchestrator.start("first topic");
      await first.completion;
      const second = orchestrator.start("second topic");
      await second.completion;

      expect(() => orchestrator.currentState(first)).toThrow(RunNotFoundError);
      expect(orchestrator.currentState(second).status).toBe("failed");
      expect(orchestrator.listRuns().map((run) => run.runId)).toEqual([second.runId]);
    });
  });
});
