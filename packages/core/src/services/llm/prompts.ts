/**
 * AI Prompt Configuration
 *
 * Centralized location for all prompts used by the research pipeline.
 * Prompts use template placeholders that are filled at runtime.
 *
 * Template syntax: {{placeholder}} - will be replaced with actual values
 *
 * Model and temperature settings come from research-config.yaml.
 */

import {
  getModelConfig,
  type ModelConfig,
  type ModelStep,
  type ResearchConfig,
} from "../research-engine/config";
import type {
  EnrichedQuery,
  OptimizedQuery,
  RawQuery,
  SearchPlanItem,
  SuccessfulSearchOutcome,
} from "../../models/research";

/**
 * A fully rendered prompt ready for the completion gateway
 */
export interface PromptSpec {
  instructions: string;
  content: string;
  model: ModelConfig;
}

interface PromptTemplate {
  instructions: string;
  content: string;
}

export const PROMPT_TEMPLATES: Record<ModelStep, PromptTemplate> = {
  optimize: {
    instructions: `You are a research assistant. You are given a topic someone wants researched.
Rewrite it as a single clear, specific research query that a search planner can work from.
Keep the user's intent and scope; do not answer the question.`,
    content: `Topic: {{query}}`,
  },

  clarify: {
    instructions: `You are a helpful research assistant. You are given a research query that another assistant will use to search the web for relevant information.
Your job is to write {{count}} helpful questions about the query that the person who asked it will answer.
The questions and answers will be passed to the research assistant to clarify what it should search for.
Reply only with the {{count}} questions.`,
    content: `Research query: {{query}}`,
  },

  plan: {
    instructions: `You are a helpful research assistant. Given a query and the clarifications the user gave, come up with a set of web searches to perform to best answer the query.
Output exactly {{count}} terms to query for, each with the reason it matters.`,
    content: `{{query}}`,
  },

  summarize: {
    instructions: `You are a research assistant. Given a search term and the results of a web search for it, produce a concise summary of the results.
The summary must be 2-3 paragraphs and less than 300 words. Capture the main points; write succinctly, no need for complete sentences or good grammar.
This will be consumed by someone synthesizing a report, so capture the essence and ignore any fluff.
Do not include any additional commentary other than the summary itself.`,
    content: `Search term: {{term}}
Reason for searching: {{rationale}}

Search results:
{{results}}`,
  },

  write: {
    instructions: `You are a senior researcher tasked with writing a cohesive report for a research query.
You will be provided with the original query and the summarized results of the searches made by a research assistant.
First come up with an outline for the report that describes its structure and flow, then write the report and return it as your final output.
The report should be in markdown format, detailed and lengthy: aim for 5-10 pages of content, at least 1000 words.
If no search results are available, say so plainly and limit the report to what can be stated without sources.`,
    content: `Original query:
{{query}}

Summarized search results ({{count}}):
{{summaries}}`,
  },
};

/**
 * Helper function to replace template placeholders
 */
export function renderPrompt(
  template: string,
  variables: Record<string, string | number>
): string {
  let rendered = template;
  for (const [key, value] of Object.entries(variables)) {
    const placeholder = `{{${key}}}`;
    rendered = rendered.split(placeholder).join(String(value));
  }
  return rendered;
}

function createPrompt(
  step: ModelStep,
  config: ResearchConfig,
  variables: Record<string, string | number>
): PromptSpec {
  const template = PROMPT_TEMPLATES[step];
  return {
    instructions: renderPrompt(template.instructions, variables),
    content: renderPrompt(template.content, variables),
    model: getModelConfig(step, config),
  };
}

export function buildOptimizePrompt(
  rawQuery: RawQuery,
  config: ResearchConfig
): PromptSpec {
  return createPrompt("optimize", config, { query: rawQuery.text });
}

export function buildClarifyPrompt(
  optimizedQuery: OptimizedQuery,
  config: ResearchConfig
): PromptSpec {
  return createPrompt("clarify", config, {
    query: optimizedQuery.text,
    count: config.research.questionCount,
  });
}

export function buildPlanPrompt(
  enrichedQuery: EnrichedQuery,
  config: ResearchConfig
): PromptSpec {
  return createPrompt("plan", config, {
    query: enrichedQuery.text,
    count: config.research.planSize,
  });
}

export function buildSummarizePrompt(
  item: SearchPlanItem,
  results: string,
  config: ResearchConfig
): PromptSpec {
  return createPrompt("summarize", config, {
    term: item.term,
    rationale: item.rationale,
    results,
  });
}

export function buildWritePrompt(
  enrichedQuery: EnrichedQuery,
  outcomes: readonly SuccessfulSearchOutcome[],
  config: ResearchConfig
): PromptSpec {
  const summaries =
    outcomes.length > 0
      ? outcomes
          .map((outcome) => `## ${outcome.item.term}\n${outcome.summary}`)
          .join("\n\n")
      : "No search results are available.";

  return createPrompt("write", config, {
    query: enrichedQuery.text,
    count: outcomes.length,
    summaries,
  });
}
