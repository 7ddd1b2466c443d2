/**
 * OpenAI Provider Implementation
 *
 * Implements CompletionProvider on the chat completions API with structured
 * outputs: the requested shape is sent as a JSON schema response format.
 */

import OpenAI from "openai";
import { zodResponseFormat } from "openai/helpers/zod";
import type {
  CompletionCallOptions,
  CompletionProvider,
  CompletionRequest,
} from "../../interfaces/completion-provider";

/**
 * OpenAI implementation of CompletionProvider
 */
export class OpenAIProvider implements CompletionProvider {
  private readonly client: OpenAI;

  constructor(apiKeyOrClient: string | OpenAI) {
    this.client =
      typeof apiKeyOrClient === "string"
        ? new OpenAI({ apiKey: apiKeyOrClient })
        : apiKeyOrClient;
  }

  /**
   * Get the provider name
   */
  getName(): string {
    return "openai";
  }

  async invoke(
    request: CompletionRequest,
    options?: CompletionCallOptions
  ): Promise<unknown> {
    const response = await this.client.chat.completions.create(
      {
        model: request.model.model,
        temperature: request.model.temperature,
        messages: [
          { role: "system", content: request.instructions },
          { role: "user", content: request.context },
        ],
        response_format: zodResponseFormat(
          request.shape.schema,
          request.shape.name,
          { description: request.shape.description }
        ),
      },
      { signal: options?.signal }
    );

    const message = response.choices[0]?.message;
    if (message?.refusal) {
      throw new Error(`OpenAI refused the request: ${message.refusal}`);
    }

    const content = message?.content;
    if (!content) {
      throw new Error("No content in OpenAI response");
    }

    const parsed: unknown = JSON.parse(content);
    return parsed;
  }
}
