/**
 * Completion gateway
 *
 * Uniform call contract in front of the completion provider: one prompt in,
 * one value of the expected shape out. Retries are the calling stage's job.
 */

import type { CompletionProvider } from "../../interfaces/completion-provider";
import type { PipelineStage } from "../../models/run-state";
import type { PromptSpec } from "../llm/prompts";
import { describeError, ProviderError } from "./errors";
import type { OutputShape } from "./shapes";
import type { TraceContext } from "./trace-context";

export interface CompletionContext {
  trace: TraceContext;
  stage: PipelineStage;
  signal?: AbortSignal;
}

export class CompletionGateway {
  constructor(private readonly provider: CompletionProvider) {}

  async complete<T>(
    prompt: PromptSpec,
    shape: OutputShape<T>,
    ctx: CompletionContext
  ): Promise<T> {
    const span = ctx.trace.startSpan(`completion:${shape.name}`, {
      stage: ctx.stage,
      provider: this.provider.getName(),
      model: prompt.model.model,
    });

    try {
      const raw = await this.provider.invoke(
        {
          instructions: prompt.instructions,
          context: prompt.content,
          shape: {
            name: shape.name,
            description: shape.description,
            schema: shape.schema,
          },
          model: prompt.model,
        },
        { signal: ctx.signal }
      );

      const parsed = shape.schema.safeParse(raw);
      if (!parsed.success) {
        throw new ProviderError(
          `Malformed ${shape.name} output: ${parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
            .join("; ")}`,
          { stage: ctx.stage }
        );
      }

      ctx.trace.endSpan(span);
      return parsed.data;
    } catch (error) {
      ctx.trace.endSpan(span, { error });
      if (error instanceof ProviderError) {
        throw error;
      }
      throw new ProviderError(
        `${this.provider.getName()} ${shape.name} call failed: ${describeError(error)}`,
        { cause: error, stage: ctx.stage }
      );
    }
  }
}
