/**
 * Trace context
 *
 * One TraceContext per run. It is passed explicitly to every component that
 * talks to an external provider so all spans share the run's trace id.
 */

import { randomUUID } from "crypto";
import type {
  SpanAttributes,
  SpanEnd,
  SpanHandle,
  TraceSink,
} from "../../interfaces/trace-sink";
import { createLogger, type Logger } from "../../utils/logger";
import { describeError } from "./errors";

/**
 * Trace ids follow the `trace_<32 hex>` convention of hosted trace viewers
 */
export function generateTraceId(): string {
  return `trace_${randomUUID().replace(/-/g, "")}`;
}

function generateSpanId(): string {
  return `span_${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

/**
 * Trace sink that writes spans to the structured log
 */
export class LoggerTraceSink implements TraceSink {
  private readonly log: Logger;

  constructor(log: Logger = createLogger("trace")) {
    this.log = log;
  }

  startSpan(
    name: string,
    traceId: string,
    attributes: SpanAttributes = {},
    parentSpanId?: string
  ): SpanHandle {
    const handle: SpanHandle = {
      traceId,
      spanId: generateSpanId(),
      parentSpanId,
      name,
      startedAt: Date.now(),
      attributes,
    };
    this.log.debug(
      { traceId, spanId: handle.spanId, parentSpanId, span: name, ...attributes },
      "span started"
    );
    return handle;
  }

  endSpan(handle: SpanHandle, end?: SpanEnd): void {
    const durationMs = Date.now() - handle.startedAt;
    const fields = {
      traceId: handle.traceId,
      spanId: handle.spanId,
      span: handle.name,
      durationMs,
    };
    if (end?.error !== undefined) {
      this.log.debug({ ...fields, error: describeError(end.error) }, "span failed");
    } else {
      this.log.debug(fields, "span ended");
    }
  }
}

export class TraceContext {
  readonly traceId: string;
  private readonly sink: TraceSink;
  private readonly rootSpan: SpanHandle;
  private ended = false;

  constructor(sink: TraceSink, name: string, attributes?: SpanAttributes) {
    this.traceId = generateTraceId();
    this.sink = sink;
    this.rootSpan = sink.startSpan(name, this.traceId, attributes);
  }

  startSpan(name: string, attributes?: SpanAttributes): SpanHandle {
    return this.sink.startSpan(
      name,
      this.traceId,
      attributes,
      this.rootSpan.spanId
    );
  }

  endSpan(handle: SpanHandle, end?: SpanEnd): void {
    this.sink.endSpan(handle, end);
  }

  /**
   * Run `work` inside a child span of the run
   */
  async span<T>(
    name: string,
    attributes: SpanAttributes,
    work: () => Promise<T>
  ): Promise<T> {
    const handle = this.startSpan(name, attributes);
    try {
      const result = await work();
      this.endSpan(handle);
      return result;
    } catch (error) {
      this.endSpan(handle, { error });
      throw error;
    }
  }

  /**
   * End the run's root span. Later calls are ignored.
   */
  finish(end?: SpanEnd): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.sink.endSpan(this.rootSpan, end);
  }
}
