import { SpanLifecycleError } from '../middleware/errorHandler';
import { Attributes, Span, SpanStatus, Trace, TraceContext } from '../types/telemetry';
import { generateSpanId } from './traceContext';

export type Clock = () => number;

/** Epoch milliseconds with sub-millisecond resolution. */
export const highResolutionClock: Clock = () => performance.timeOrigin + performance.now();

export interface SpanBuilderOptions {
    clock?: Clock;
    /** Called once with the sealed trace when the root span ends. */
    onComplete?: (trace: Trace) => void;
    /** Called after every span that ends normally through endSpan. */
    onSpanEnd?: (span: Span) => void;
}

export type SpanBuilderFactory = (context: TraceContext, options: SpanBuilderOptions) => SpanBuilder;

interface SpanRecord {
    spanId: string;
    parentSpanId: string | null;
    traceId: string;
    name: string;
    startTime: number;
    endTime: number | null;
    attributes: Attributes;
    status: SpanStatus;
    openChildren: number;
}

type BuilderState = 'open' | 'sealed' | 'discarded';

/**
 * Builds the span tree of a single request. Spans nest strictly: a span can
 * only be ended once all of its children have ended, and ending the root seals
 * the trace. One builder is created per request and is never shared.
 */
export class SpanBuilder {
    private readonly records = new Map<string, SpanRecord>();
    private readonly order: SpanRecord[] = [];
    private readonly clock: Clock;
    private root: SpanRecord | null = null;
    private state: BuilderState = 'open';

    constructor(private readonly context: TraceContext, private readonly options: SpanBuilderOptions = {}) {
        this.clock = options.clock ?? highResolutionClock;
    }

    get traceId(): string {
        return this.context.traceId;
    }

    get isOpen(): boolean {
        return this.state === 'open';
    }

    beginSpan(name: string, parent: Span | null, attributes: Attributes = {}): Span {
        this.assertOpen(`begin span "${name}"`);

        let parentSpanId: string | null;
        let parentRecord: SpanRecord | null = null;

        if (parent === null) {
            if (this.root) {
                throw new SpanLifecycleError(`Trace ${this.traceId} already has a root span "${this.root.name}"`);
            }
            parentSpanId = this.context.parentSpanId;
        } else {
            parentRecord = this.lookup(parent);
            if (parentRecord.endTime !== null) {
                throw new SpanLifecycleError(`Cannot begin span "${name}" under ended span "${parentRecord.name}"`);
            }
            parentSpanId = parentRecord.spanId;
        }

        let spanId = generateSpanId();
        while (this.records.has(spanId) || spanId === this.context.parentSpanId) {
            spanId = generateSpanId();
        }

        const record: SpanRecord = {
            spanId,
            parentSpanId,
            traceId: this.context.traceId,
            name,
            startTime: this.clock(),
            endTime: null,
            attributes: { ...attributes },
            status: 'ok',
            openChildren: 0
        };

        if (parentRecord) {
            parentRecord.openChildren++;
        } else {
            this.root = record;
        }

        this.records.set(spanId, record);
        this.order.push(record);

        return toSpan(record);
    }

    endSpan(span: Span, attributes: Attributes = {}, status: SpanStatus = 'ok'): void {
        this.assertOpen(`end span "${span.name}"`);

        const record = this.lookup(span);
        if (record.endTime !== null) {
            throw new SpanLifecycleError(`Span "${record.name}" has already ended`);
        }
        if (record.openChildren > 0) {
            throw new SpanLifecycleError(
                `Cannot end span "${record.name}" before its ${record.openChildren} open child span(s)`
            );
        }

        this.close(record, attributes, status);
        this.options.onSpanEnd?.(toSpan(record));

        if (record === this.root) {
            this.seal();
        }
    }

    /** Spans begun but not yet ended, in creation order. */
    openSpans(): Span[] {
        return this.order.filter(record => record.endTime === null).map(toSpan);
    }

    /**
     * Closes every open span with an error status, deepest first, and throws
     * the trace away. Nothing is emitted. Returns the spans it closed.
     */
    abort(reason: string = 'aborted'): Span[] {
        if (this.state !== 'open') {
            return [];
        }

        const closed = this.closeOpenSpans({ 'error.reason': reason });
        this.state = 'discarded';
        return closed;
    }

    /**
     * Closes every open span with an error status and the error message, then
     * seals and emits the trace so the failure remains observable.
     */
    fail(error: Error): void {
        if (this.state !== 'open') {
            return;
        }

        if (this.root && this.root.endTime === null) {
            this.root.attributes['http.status_code'] = 500;
        }

        this.closeOpenSpans({ 'error.message': error.message, 'error.type': error.name });

        if (this.root) {
            this.seal();
        } else {
            this.state = 'discarded';
        }
    }

    private closeOpenSpans(attributes: Attributes): Span[] {
        const closed: Span[] = [];

        for (let i = this.order.length - 1; i >= 0; i--) {
            const record = this.order[i];
            if (record.endTime === null) {
                this.close(record, attributes, 'error');
                closed.push(toSpan(record));
            }
        }

        return closed;
    }

    private close(record: SpanRecord, attributes: Attributes, status: SpanStatus): void {
        Object.assign(record.attributes, attributes);
        record.status = status;
        record.endTime = Math.max(this.clock(), record.startTime);

        if (record.parentSpanId !== null) {
            const parent = this.records.get(record.parentSpanId);
            if (parent) {
                parent.openChildren--;
            }
        }
    }

    private seal(): void {
        this.state = 'sealed';

        const trace: Trace = Object.freeze({
            traceId: this.context.traceId,
            spans: Object.freeze(this.order.map(record => toSpan(record)))
        });

        this.options.onComplete?.(trace);
    }

    private lookup(span: Span): SpanRecord {
        const record = this.records.get(span.spanId);
        if (!record || span.traceId !== this.context.traceId) {
            throw new SpanLifecycleError(`Span "${span.name}" does not belong to trace ${this.traceId}`);
        }
        return record;
    }

    private assertOpen(action: string): void {
        if (this.state !== 'open') {
            throw new SpanLifecycleError(`Cannot ${action}: trace ${this.traceId} is ${this.state}`);
        }
    }
}

const toSpan = (record: SpanRecord): Span => Object.freeze({
    spanId: record.spanId,
    parentSpanId: record.parentSpanId,
    traceId: record.traceId,
    name: record.name,
    startTime: record.startTime,
    endTime: record.endTime,
    attributes: Object.freeze({ ...record.attributes }),
    status: record.status
});

export const createSpanBuilder: SpanBuilderFactory = (context, options) => new SpanBuilder(context, options);
