import { logger } from '../config/logger';
import { EmissionError } from '../middleware/errorHandler';
import { EmissionStats } from '../types/api';
import { MetricRecord, MetricSnapshot, Trace, TraceRecord } from '../types/telemetry';
import { TelemetryCollector } from './collectors';
import { MetricsAggregator } from './metricsAggregator';

export const METRIC_TELEMETRY_DROPPED = 'telemetry.dropped';
export const METRIC_TELEMETRY_FAILED = 'telemetry.failed';

type QueueItem =
    | { kind: 'trace'; record: TraceRecord }
    | { kind: 'metrics'; records: MetricRecord[] };

export interface EmissionSinkOptions {
    capacity?: number;
    batchSize?: number;
    metrics?: MetricsAggregator;
}

export const toTraceRecord = (trace: Trace): TraceRecord => ({
    trace_id: trace.traceId,
    spans: trace.spans.map(span => {
        if (span.endTime === null) {
            throw new EmissionError(`Span "${span.name}" of trace ${trace.traceId} has no end time`);
        }
        return {
            span_id: span.spanId,
            parent_span_id: span.parentSpanId,
            name: span.name,
            start_time: span.startTime,
            end_time: span.endTime,
            attributes: { ...span.attributes },
            status: span.status
        };
    })
});

export const toMetricRecords = (snapshot: MetricSnapshot): MetricRecord[] => {
    const timestamp = snapshot.timestamp;
    const records: MetricRecord[] = [];

    for (const [operation, histogram] of Object.entries(snapshot.operations)) {
        records.push(
            { name: 'span.duration.count', value: histogram.count, tags: { operation }, timestamp },
            { name: 'span.duration.sum', value: histogram.sum, tags: { operation }, timestamp },
            { name: 'span.duration.min', value: histogram.min, tags: { operation }, timestamp },
            { name: 'span.duration.max', value: histogram.max, tags: { operation }, timestamp }
        );
        for (const bucket of histogram.buckets) {
            records.push({
                name: 'span.duration.bucket',
                value: bucket.count,
                tags: { operation, le: String(bucket.le) },
                timestamp
            });
        }
    }

    for (const request of snapshot.requests) {
        const tags = { method: request.method, route: request.route, status_code: String(request.statusCode) };
        records.push(
            { name: 'http.server.requests', value: request.duration.count, tags, timestamp },
            { name: 'http.server.duration.sum', value: request.duration.sum, tags, timestamp },
            { name: 'http.server.duration.max', value: request.duration.max, tags, timestamp }
        );
    }

    records.push(
        { name: 'fraud.checks', value: snapshot.outcomes.approved, tags: { status: 'approved' }, timestamp },
        { name: 'fraud.checks', value: snapshot.outcomes.flagged, tags: { status: 'flagged' }, timestamp }
    );

    for (const [name, value] of Object.entries(snapshot.counters)) {
        records.push({ name, value, tags: {}, timestamp });
    }

    return records;
};

const isTrace = (item: Trace | MetricSnapshot): item is Trace => 'spans' in item;

/**
 * Hands completed traces and metric snapshots to the external collector
 * without ever blocking or failing the caller. Records wait in a bounded queue
 * that drops its oldest entry when full; a background drain exports them in
 * batches.
 */
export class EmissionSink {
    private readonly queue: QueueItem[] = [];
    private readonly capacity: number;
    private readonly batchSize: number;
    private readonly metrics?: MetricsAggregator;
    private drainTimer: NodeJS.Immediate | null = null;
    private inFlight: Promise<void> | null = null;
    private exported = 0;
    private dropped = 0;
    private failed = 0;

    constructor(private readonly collector: TelemetryCollector, options: EmissionSinkOptions = {}) {
        this.capacity = options.capacity ?? 1000;
        this.batchSize = options.batchSize ?? 50;
        this.metrics = options.metrics;
    }

    emit(trace: Trace): void;
    emit(snapshot: MetricSnapshot): void;
    emit(item: Trace | MetricSnapshot): void {
        try {
            if (isTrace(item)) {
                this.enqueue({ kind: 'trace', record: toTraceRecord(item) });
            } else {
                this.enqueue({ kind: 'metrics', records: toMetricRecords(item) });
            }
        } catch (error) {
            this.recordFailure(1, error);
        }
    }

    stats(): EmissionStats {
        return {
            queued: this.queue.length,
            exported: this.exported,
            dropped: this.dropped,
            failed: this.failed
        };
    }

    /** Exports everything queued so far. Never rejects. */
    async flush(): Promise<void> {
        if (this.drainTimer) {
            clearImmediate(this.drainTimer);
            this.drainTimer = null;
        }
        while (this.queue.length > 0 || this.inFlight) {
            await this.startDrain();
        }
    }

    async shutdown(): Promise<void> {
        await this.flush();
        try {
            await this.collector.shutdown?.();
        } catch (error) {
            logger.warn('Telemetry collector shutdown failed', {
                error: error instanceof Error ? error.message : String(error)
            });
        }
    }

    private enqueue(item: QueueItem): void {
        if (this.queue.length >= this.capacity) {
            this.queue.shift();
            this.dropped++;
            this.metrics?.increment(METRIC_TELEMETRY_DROPPED);
            logger.warn('Telemetry queue full, dropped oldest record', { capacity: this.capacity, dropped: this.dropped });
        }
        this.queue.push(item);
        this.scheduleDrain();
    }

    private scheduleDrain(): void {
        if (this.drainTimer || this.inFlight) {
            return;
        }
        this.drainTimer = setImmediate(() => {
            this.drainTimer = null;
            this.startDrain().catch(error => {
                logger.error('Telemetry drain stopped unexpectedly', {
                    error: error instanceof Error ? error.message : String(error)
                });
            });
        });
    }

    private startDrain(): Promise<void> {
        if (!this.inFlight) {
            this.inFlight = this.drain().finally(() => {
                this.inFlight = null;
            });
        }
        return this.inFlight;
    }

    private async drain(): Promise<void> {
        while (this.queue.length > 0) {
            const batch = this.queue.splice(0, this.batchSize);
            const traces: TraceRecord[] = [];
            const metrics: MetricRecord[] = [];

            for (const item of batch) {
                if (item.kind === 'trace') {
                    traces.push(item.record);
                } else {
                    metrics.push(...item.records);
                }
            }

            const metricItems = batch.length - traces.length;

            if (traces.length > 0) {
                await this.export(traces.length, () => this.collector.exportTraces(traces));
            }
            if (metrics.length > 0) {
                await this.export(metricItems, () => this.collector.exportMetrics(metrics));
            }
        }
    }

    private async export(items: number, send: () => Promise<void>): Promise<void> {
        try {
            await send();
            this.exported += items;
        } catch (error) {
            this.recordFailure(items, error);
        }
    }

    private recordFailure(items: number, error: unknown): void {
        const emissionError = error instanceof EmissionError
            ? error
            : new EmissionError(error instanceof Error ? error.message : String(error), error);

        this.failed += items;
        this.metrics?.increment(METRIC_TELEMETRY_FAILED, items);
        logger.warn('Telemetry emission failed', { error: emissionError.message, items, failed: this.failed });
    }
}
