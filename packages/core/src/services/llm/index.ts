/**
 * Completion provider implementations and prompts
 */

export { OpenAIProvider } from "./openai-provider";
export {
  PROMPT_TEMPLATES,
  renderPrompt,
  buildOptimizePrompt,
  buildClarifyPrompt,
  buildPlanPrompt,
  buildSummarizePrompt,
  buildWritePrompt,
} from "./prompts";
export type { PromptSpec } from "./prompts";
export type { CompletionProvider } from "../../interfaces/completion-provider";
