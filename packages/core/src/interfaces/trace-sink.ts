/**
 * Trace Sink Interface
 *
 * Receives the spans of a run. Every span carries the run's trace id so an
 * external system can correlate all calls belonging to one run.
 */

export type SpanAttributes = Record<string, string | number | boolean>;

export interface SpanHandle {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly name: string;
  readonly startedAt: number;
  readonly attributes: SpanAttributes;
}

export interface SpanEnd {
  error?: unknown;
}

export interface TraceSink {
  startSpan(
    name: string,
    traceId: string,
    attributes?: SpanAttributes,
    parentSpanId?: string
  ): SpanHandle;
  endSpan(handle: SpanHandle, end?: SpanEnd): void;
}
