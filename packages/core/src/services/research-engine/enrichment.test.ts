import { describe, expect, it } from "vitest";
import { composeEnrichedQuery, matchAnswers } from "./enrichment";
import { AnswerMismatchError } from "./errors";

const questions = [
  { id: "q1", text: "Which period?" },
  { id: "q2", text: "Which region?" },
];

describe("matchAnswers", () => {
  it("pairs answers with questions in question order", () => {
    const pairs = matchAnswers(questions, [
      { questionId: "q2", text: "Europe" },
      { questionId: "q1", text: "2020s" },
    ]);

    expect(pairs.map((p) => [p.question.id, p.answer.text])).toEqual([
      ["q1", "2020s"],
      ["q2", "Europe"],
    ]);
  });

  it("reports missing, unknown and duplicate ids", () => {
    let caught: unknown;
    try {
      matchAnswers(questions, [
        { questionId: "q1", text: "a" },
        { questionId: "q1", text: "b" },
        { questionId: "q7", text: "c" },
      ]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AnswerMismatchError);
    if (caught instanceof AnswerMismatchError) {
      expect(caught.missing).toEqual(["q2"]);
      expect(caught.unknown).toEqual(["q7"]);
      expect(caught.duplicated).toEqual(["q1"]);
      expect(caught.code).toBe("answer_mismatch");
    }
  });
});

describe("composeEnrichedQuery", () => {
  it("lays out topic and clarifications deterministically", () => {
    const optimized = { text: "EV battery recycling", derivedFrom: { text: "ev batteries" } };
    const pairs = matchAnswers(questions, [
      { questionId: "q1", text: "  2020s " },
      { questionId: "q2", text: "Europe" },
    ]);

    const enriched = composeEnrichedQuery(optimized, pairs);

    expect(enriched.text).toBe(
      [
        "Main Topic:",
        "EV battery recycling",
        "Clarifications:",
        "Q1: Which period?",
        "A1: 2020s",
        "Q2: Which region?",
        "A2: Europe",
      ].join("\n")
    );
    expect(composeEnrichedQuery(optimized, pairs).text).toBe(enriched.text);
    expect(enriched.optimizedQuery).toBe(optimized);
  });
});
