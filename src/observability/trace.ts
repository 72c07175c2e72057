import { v4 as uuidv4 } from 'uuid';

export type SpanAttributes = Record<string, string | number | boolean>;

export interface SpanRecord {
  name: string;
  startedAt: number;
  endedAt?: number;
  attributes: SpanAttributes;
  status: 'ok' | 'error';
}

/** Per unit of work: a correlation id for log lines plus timed spans. */
export interface TraceContext {
  requestId: string;
  channel?: string;
  spans: SpanRecord[];
  clock: () => number;
}

export function createTraceContext(init: { requestId?: string; channel?: string; clock?: () => number } = {}): TraceContext {
  return {
    requestId: init.requestId ?? uuidv4(),
    channel: init.channel,
    spans: [],
    clock: init.clock ?? Date.now,
  };
}

export function startSpan(trace: TraceContext, name: string, attributes: SpanAttributes = {}): SpanRecord {
  const span: SpanRecord = { name, startedAt: trace.clock(), attributes, status: 'ok' };
  trace.spans.push(span);
  return span;
}

export function endSpan(trace: TraceContext, span: SpanRecord, status: SpanRecord['status'] = 'ok'): void {
  span.endedAt = trace.clock();
  span.status = status;
}

/** Wall time from the first span's start to the latest span end. */
export function traceDurationMs(trace: TraceContext): number {
  if (trace.spans.length === 0) return 0;
  const start = trace.spans[0].startedAt;
  const end = Math.max(...trace.spans.map((s) => s.endedAt ?? trace.clock()));
  return end - start;
}
