import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  requestId: string;
  sessionId?: string;
  userId?: string;
  spans: SpanRecord[];
}

export type SpanAttributes = Record<string, string | number | boolean>;

export interface SpanRecord {
  name: string;
  startTime: number;
  endTime?: number;
  attributes: SpanAttributes;
  status: 'ok' | 'error';
}

export function createTraceContext(overrides?: Partial<Omit<TraceContext, 'spans'>>): TraceContext {
  return {
    requestId: overrides?.requestId ?? uuidv4(),
    sessionId: overrides?.sessionId,
    userId: overrides?.userId,
    spans: [],
  };
}

export function startSpan(ctx: TraceContext, name: string, attrs?: SpanAttributes): SpanRecord {
  const span: SpanRecord = {
    name,
    startTime: Date.now(),
    attributes: attrs ?? {},
    status: 'ok',
  };
  ctx.spans.push(span);
  return span;
}

export function endSpan(span: SpanRecord, status: 'ok' | 'error' = 'ok'): void {
  span.endTime = Date.now();
  span.status = status;
}

/** Run a synchronous pipeline step inside a span. */
export function traced<T>(ctx: TraceContext, name: string, fn: () => T, attrs?: SpanAttributes): T {
  const span = startSpan(ctx, name, attrs);
  try {
    const result = fn();
    endSpan(span);
    return result;
  } catch (err) {
    endSpan(span, 'error');
    throw err;
  }
}

/** Span names and durations, for the per-turn debug log. */
export function summarizeSpans(ctx: TraceContext): Record<string, number> {
  const summary: Record<string, number> = {};
  for (const span of ctx.spans) {
    if (span.endTime !== undefined) summary[span.name] = span.endTime - span.startTime;
  }
  return summary;
}

export async function tracedAsync<T>(
  ctx: TraceContext,
  name: string,
  fn: () => Promise<T>,
  attrs?: SpanAttributes,
): Promise<T> {
  const span = startSpan(ctx, name, attrs);
  try {
    const result = await fn();
    endSpan(span);
    return result;
  } catch (err) {
    endSpan(span, 'error');
    throw err;
  }
}
