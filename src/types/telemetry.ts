export type AttributeValue = string | number | boolean | string[];

export type Attributes = Record<string, AttributeValue>;

export type SpanStatus = 'ok' | 'error';

export interface Span {
    readonly spanId: string;
    readonly parentSpanId: string | null;
    readonly traceId: string;
    readonly name: string;
    readonly startTime: number;
    readonly endTime: number | null;
    readonly attributes: Readonly<Attributes>;
    readonly status: SpanStatus;
}

export interface Trace {
    readonly traceId: string;
    readonly spans: readonly Span[];
}

export interface TraceContext {
    traceId: string;
    parentSpanId: string | null;
}

export interface MetricSample {
    name: string;
    value: number;
    tags: Record<string, string>;
}

export interface HistogramBucket {
    le: number | '+Inf';
    count: number;
}

export interface HistogramSnapshot {
    count: number;
    sum: number;
    min: number;
    max: number;
    buckets: HistogramBucket[];
}

export interface RequestMetricSnapshot {
    method: string;
    route: string;
    statusCode: number;
    duration: HistogramSnapshot;
}

export interface MetricSnapshot {
    timestamp: number;
    operations: Record<string, HistogramSnapshot>;
    requests: RequestMetricSnapshot[];
    outcomes: {
        approved: number;
        flagged: number;
    };
    counters: Record<string, number>;
}

// Wire shapes handed to the external collector
export interface SpanRecord {
    span_id: string;
    parent_span_id: string | null;
    name: string;
    start_time: number;
    end_time: number;
    attributes: Attributes;
    status: SpanStatus;
}

export interface TraceRecord {
    trace_id: string;
    spans: SpanRecord[];
}

export interface MetricRecord {
    name: string;
    value: number;
    tags: Record<string, string>;
    timestamp: number;
}
