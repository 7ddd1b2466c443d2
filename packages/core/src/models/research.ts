/**
 * Research value types
 *
 * Every record here is created once by the engine and never mutated.
 */

export interface RawQuery {
  readonly text: string;
}

export interface OptimizedQuery {
  readonly text: string;
  readonly derivedFrom: RawQuery;
}

export interface ClarifyingQuestion {
  readonly id: string; // q1, q2... unique within a run, also across regenerations
  readonly text: string;
}

export interface Answer {
  readonly questionId: string;
  readonly text: string;
}

export interface QuestionAnswerPair {
  readonly question: ClarifyingQuestion;
  readonly answer: Answer;
}

export interface EnrichedQuery {
  readonly text: string;
  readonly optimizedQuery: OptimizedQuery;
  readonly clarifications: readonly QuestionAnswerPair[];
}

export interface SearchPlanItem {
  readonly term: string;
  readonly rationale: string;
}

/**
 * Result of one search task. A failed task carries the reason and never a summary.
 */
export type SearchOutcome =
  | {
      readonly item: SearchPlanItem;
      readonly succeeded: true;
      readonly summary: string;
    }
  | {
      readonly item: SearchPlanItem;
      readonly succeeded: false;
      readonly error: string;
    };

export type SuccessfulSearchOutcome = Extract<SearchOutcome, { succeeded: true }>;

/**
 * Outcomes in the order the tasks settled
 */
export type SearchResultSet = readonly SearchOutcome[];

export interface Report {
  readonly markdown: string;
  readonly shortSummary: string;
  readonly followUpQuestions: readonly string[];
  readonly sourceCount: number; // successful searches the report was built from
}

export interface DeliveryReceipt {
  readonly id?: string;
  readonly deliveredAt: number;
}
