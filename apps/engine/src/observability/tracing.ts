import { ROOT_CONTEXT, SpanKind, SpanStatusCode, trace, type Context, type Span, type Tracer } from '@opentelemetry/api';

/**
 * Tracer plus the parent context for the next span. Passed explicitly down
 * every call chain instead of relying on the ambient active context.
 */
export interface TraceContext {
    readonly tracer: Tracer;
    readonly context: Context;
}

export function rootTrace(tracer: Tracer): TraceContext {
    return { tracer, context: ROOT_CONTEXT };
}

export function startSpan(
    parent: TraceContext,
    name: string,
    attributes?: Record<string, unknown>,
    kind: SpanKind = SpanKind.INTERNAL,
): { span: Span; trace: TraceContext } {
    const span = parent.tracer.startSpan(name, { kind }, parent.context);
    if (attributes) setAttributes(span, attributes);
    return { span, trace: { tracer: parent.tracer, context: trace.setSpan(parent.context, span) } };
}

export function endSpan(span: Span, error?: unknown): void {
    if (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
    } else {
        span.setStatus({ code: SpanStatusCode.OK });
    }
    span.end();
}

export async function withSpan<T>(
    parent: TraceContext,
    name: string,
    fn: (span: Span, trace: TraceContext) => Promise<T>,
    attributes?: Record<string, unknown>,
    kind?: SpanKind,
): Promise<T> {
    const { span, trace: child } = startSpan(parent, name, attributes, kind);
    try {
        const result = await fn(span, child);
        endSpan(span);
        return result;
    } catch (error) {
        endSpan(span, error);
        throw error;
    }
}

export function setAttributes(span: Span, attributes: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(attributes)) {
        span.setAttribute(key, normalizeAttribute(value));
    }
}

export function normalizeAttribute(value: unknown): string | number | boolean {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (value && typeof value === 'object') {
        try {
            return JSON.stringify(value);
        } catch {
            return '[unserializable]';
        }
    }
    if (value === undefined || value === null) {
        return 'null';
    }
    return String(value);
}
