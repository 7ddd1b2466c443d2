/**
 * Query enrichment
 *
 * Pure functions for matching answers to the pending questions and composing
 * the enriched query the planner works from.
 */

import type {
  Answer,
  ClarifyingQuestion,
  EnrichedQuery,
  OptimizedQuery,
  QuestionAnswerPair,
} from "../../models/research";
import { AnswerMismatchError } from "./errors";

/**
 * Pair every pending question with its answer.
 * Throws AnswerMismatchError unless the answer ids match the question ids 1:1.
 */
export function matchAnswers(
  questions: readonly ClarifyingQuestion[],
  answers: readonly Answer[]
): QuestionAnswerPair[] {
  const questionIds = new Set(questions.map((q) => q.id));
  const byId = new Map<string, Answer>();
  const unknown: string[] = [];
  const duplicated: string[] = [];

  for (const answer of answers) {
    if (!questionIds.has(answer.questionId)) {
      unknown.push(answer.questionId);
    } else if (byId.has(answer.questionId)) {
      duplicated.push(answer.questionId);
    } else {
      byId.set(answer.questionId, answer);
    }
  }

  const missing = questions
    .filter((q) => !byId.has(q.id))
    .map((q) => q.id);

  if (missing.length > 0 || unknown.length > 0 || duplicated.length > 0) {
    throw new AnswerMismatchError({ missing, unknown, duplicated });
  }

  return questions.flatMap((question) => {
    const answer = byId.get(question.id);
    return answer ? [{ question, answer }] : [];
  });
}

/**
 * Compose the enriched query text. Deterministic: the same optimized query and
 * clarifications always produce the same text, in question order.
 */
export function composeEnrichedQuery(
  optimizedQuery: OptimizedQuery,
  clarifications: readonly QuestionAnswerPair[]
): EnrichedQuery {
  const lines = ["Main Topic:", optimizedQuery.text, "Clarifications:"];
  clarifications.forEach((pair, i) => {
    lines.push(`Q${i + 1}: ${pair.question.text}`);
    lines.push(`A${i + 1}: ${pair.answer.text.trim()}`);
  });

  return {
    text: lines.join("\n"),
    optimizedQuery,
    clarifications,
  };
}
