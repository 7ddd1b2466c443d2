/**
 * Output shapes for each model-backed step
 *
 * The completion gateway validates every provider response against one of
 * these before a stage sees it.
 */

import { z } from "zod";

/**
 * Expected output of a completion call
 */
export interface OutputShape<T> {
  name: string;
  description: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

const optimizedQuerySchema = z.object({
  query: z.string().min(1).describe("The refined research topic"),
});

const clarifyingQuestionsSchema = z.object({
  questions: z
    .array(
      z.object({
        question: z
          .string()
          .min(1)
          .describe(
            "A meaningful question whose answer will help focus the research"
          ),
      })
    )
    .describe("Questions for the person who asked for the research"),
});

const searchPlanSchema = z.object({
  searches: z.array(
    z.object({
      query: z.string().describe("The search term to use for the web search"),
      reason: z
        .string()
        .describe("Why this search is important to the research"),
    })
  ),
});

const searchSummarySchema = z.object({
  summary: z.string().min(1).describe("Concise summary of the search results"),
});

const researchReportSchema = z.object({
  shortSummary: z.string().describe("A 2-3 sentence summary of the findings"),
  markdownReport: z.string().min(1).describe("The final report in markdown"),
  followUpQuestions: z
    .array(z.string())
    .describe("Suggested topics to research further"),
});

export type OptimizedQueryOutput = z.infer<typeof optimizedQuerySchema>;
export type ClarifyingQuestionsOutput = z.infer<typeof clarifyingQuestionsSchema>;
export type SearchPlanOutput = z.infer<typeof searchPlanSchema>;
export type SearchSummaryOutput = z.infer<typeof searchSummarySchema>;
export type ResearchReportOutput = z.infer<typeof researchReportSchema>;

export const OPTIMIZED_QUERY_SHAPE: OutputShape<OptimizedQueryOutput> = {
  name: "optimized_query",
  description: "A clearer, more searchable version of the user's topic",
  schema: optimizedQuerySchema,
};

export const CLARIFYING_QUESTIONS_SHAPE: OutputShape<ClarifyingQuestionsOutput> =
  {
    name: "clarifying_questions",
    description: "Questions that clarify what the user wants researched",
    schema: clarifyingQuestionsSchema,
  };

export const SEARCH_PLAN_SHAPE: OutputShape<SearchPlanOutput> = {
  name: "search_plan",
  description: "Web searches to perform to best answer the query",
  schema: searchPlanSchema,
};

export const SEARCH_SUMMARY_SHAPE: OutputShape<SearchSummaryOutput> = {
  name: "search_summary",
  description: "Summary of the results of one web search",
  schema: searchSummarySchema,
};

export const RESEARCH_REPORT_SHAPE: OutputShape<ResearchReportOutput> = {
  name: "research_report",
  description: "The synthesized research report",
  schema: researchReportSchema,
};
