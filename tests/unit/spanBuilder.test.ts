import { SpanLifecycleError } from '../../src/middleware/errorHandler';
import { SpanBuilder } from '../../src/tracing/spanBuilder';
import { Span, Trace, TraceContext } from '../../src/types/telemetry';

const TRACE_ID = 'a'.repeat(32);

const setup = (context: TraceContext = { traceId: TRACE_ID, parentSpanId: null }) => {
    let now = 1000;
    const completed: Trace[] = [];
    const ended: Span[] = [];
    const builder = new SpanBuilder(context, {
        clock: () => now++,
        onComplete: trace => completed.push(trace),
        onSpanEnd: span => ended.push(span)
    });
    return { builder, completed, ended };
};

describe('SpanBuilder', () => {
    it('builds a nested chain and emits the sealed trace once', () => {
        const { builder, completed, ended } = setup();

        const root = builder.beginSpan('http.request', null, { 'http.method': 'POST' });
        const check = builder.beginSpan('fraud.check', root);
        const call = builder.beginSpan('mastercard.client.call', check);
        const response = builder.beginSpan('response.generation', call);

        builder.endSpan(response);
        builder.endSpan(call);
        builder.endSpan(check, { 'fraud.status': 'approved' });
        expect(completed).toHaveLength(0);

        builder.endSpan(root, { 'http.status_code': 200 });

        expect(completed).toHaveLength(1);
        expect(ended.map(span => span.name)).toEqual([
            'response.generation',
            'mastercard.client.call',
            'fraud.check',
            'http.request'
        ]);

        const spans = completed[0].spans;
        expect(completed[0].traceId).toBe(TRACE_ID);
        expect(spans.map(span => span.name)).toEqual([
            'http.request',
            'fraud.check',
            'mastercard.client.call',
            'response.generation'
        ]);
        expect(spans[0].parentSpanId).toBeNull();
        for (let i = 1; i < spans.length; i++) {
            expect(spans[i].parentSpanId).toBe(spans[i - 1].spanId);
            expect(spans[i].startTime).toBeGreaterThan(spans[i - 1].startTime);
        }
        for (const span of spans) {
            expect(span.traceId).toBe(TRACE_ID);
            expect(span.endTime).not.toBeNull();
            expect(span.status).toBe('ok');
        }
        expect(spans[0].attributes).toEqual({ 'http.method': 'POST', 'http.status_code': 200 });
        expect(spans[1].attributes).toEqual({ 'fraud.status': 'approved' });
        expect(Object.isFrozen(completed[0].spans)).toBe(true);
        expect(builder.isOpen).toBe(false);
    });

    it('parents the root span on an attached remote span', () => {
        const { builder, completed } = setup({ traceId: TRACE_ID, parentSpanId: 'b'.repeat(16) });

        builder.endSpan(builder.beginSpan('http.request', null));

        expect(completed[0].spans[0].parentSpanId).toBe('b'.repeat(16));
    });

    it('refuses to end a span before its children', () => {
        const { builder } = setup();
        const root = builder.beginSpan('http.request', null);
        builder.beginSpan('fraud.check', root);

        expect(() => builder.endSpan(root)).toThrow(SpanLifecycleError);
        expect(() => builder.endSpan(root)).toThrow('Cannot end span "http.request" before its 1 open child span(s)');
        expect(builder.openSpans().map(span => span.name)).toEqual(['http.request', 'fraud.check']);
    });

    it('refuses to end a span twice', () => {
        const { builder } = setup();
        const root = builder.beginSpan('http.request', null);
        const child = builder.beginSpan('fraud.check', root);
        builder.endSpan(child);

        expect(() => builder.endSpan(child)).toThrow('Span "fraud.check" has already ended');
    });

    it('refuses a second root span', () => {
        const { builder } = setup();
        builder.beginSpan('http.request', null);

        expect(() => builder.beginSpan('other.root', null)).toThrow(SpanLifecycleError);
    });

    it('refuses children of ended spans', () => {
        const { builder } = setup();
        const root = builder.beginSpan('http.request', null);
        const child = builder.beginSpan('fraud.check', root);
        builder.endSpan(child);

        expect(() => builder.beginSpan('late.child', child)).toThrow(SpanLifecycleError);
    });

    it('refuses spans from another trace', () => {
        const first = setup();
        const second = setup({ traceId: 'c'.repeat(32), parentSpanId: null });
        const foreign = second.builder.beginSpan('http.request', null);
        first.builder.beginSpan('http.request', null);

        expect(() => first.builder.endSpan(foreign)).toThrow(SpanLifecycleError);
        expect(() => first.builder.beginSpan('fraud.check', foreign)).toThrow(SpanLifecycleError);
    });

    it('refuses any change once the trace is sealed', () => {
        const { builder, completed } = setup();
        const root = builder.beginSpan('http.request', null);
        builder.endSpan(root);

        expect(() => builder.beginSpan('fraud.check', root)).toThrow(SpanLifecycleError);
        expect(() => builder.endSpan(root)).toThrow(SpanLifecycleError);
        expect(completed).toHaveLength(1);
    });

    it('closes every open span on abort and emits nothing', () => {
        const { builder, completed } = setup();
        const root = builder.beginSpan('http.request', null);
        const check = builder.beginSpan('fraud.check', root);
        builder.beginSpan('mastercard.client.call', check);

        const closed = builder.abort();

        expect(closed.map(span => span.name)).toEqual(['mastercard.client.call', 'fraud.check', 'http.request']);
        for (const span of closed) {
            expect(span.status).toBe('error');
            expect(span.attributes['error.reason']).toBe('aborted');
            expect(span.endTime).not.toBeNull();
        }
        expect(builder.openSpans()).toEqual([]);
        expect(completed).toHaveLength(0);
        expect(builder.isOpen).toBe(false);
        expect(() => builder.beginSpan('retry', null)).toThrow(SpanLifecycleError);
        expect(builder.abort()).toEqual([]);
    });

    it('closes open spans with the error and emits the trace on failure', () => {
        const { builder, completed } = setup();
        const root = builder.beginSpan('http.request', null);
        const check = builder.beginSpan('fraud.check', root);
        builder.endSpan(builder.beginSpan('mastercard.client.call', check));

        builder.fail(new Error('upstream unavailable'));

        expect(completed).toHaveLength(1);
        const [rootSpan, checkSpan, callSpan] = completed[0].spans;
        expect(rootSpan.status).toBe('error');
        expect(rootSpan.attributes['http.status_code']).toBe(500);
        expect(rootSpan.attributes['error.message']).toBe('upstream unavailable');
        expect(checkSpan.status).toBe('error');
        expect(callSpan.status).toBe('ok');
    });
});
