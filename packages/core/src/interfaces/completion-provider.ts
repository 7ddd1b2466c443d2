/**
 * Completion Provider Interface
 *
 * Abstract interface for the model that answers every reasoning step of a
 * run (query optimization, questions, planning, summaries, report writing).
 * Allows switching between OpenAI and custom implementations.
 */

import type { ZodTypeAny } from "zod";

/**
 * Model settings for a single call
 */
export interface ModelConfig {
  model: string;
  temperature: number;
}

/**
 * Expected output shape: named fields with primitive/array types, expressed
 * as a zod object schema so providers can request structured output
 */
export interface ShapeDescriptor {
  name: string;
  description: string;
  schema: ZodTypeAny;
}

export interface CompletionRequest {
  instructions: string; // role instructions
  context: string; // task-specific content
  shape: ShapeDescriptor;
  model: ModelConfig;
}

export interface CompletionCallOptions {
  signal?: AbortSignal;
}

/**
 * Completion Provider interface
 * All completion providers must implement these methods
 */
export interface CompletionProvider {
  /**
   * Run one completion and return the raw structured value.
   * The value is validated against the shape by the caller; providers throw
   * on transport, timeout or provider-side errors.
   */
  invoke(
    request: CompletionRequest,
    options?: CompletionCallOptions
  ): Promise<unknown>;

  /**
   * Get the provider name
   */
  getName(): string;
}
