import { logger } from '../config/logger';
import { FraudStatus } from '../types/transaction';
import { HistogramSnapshot, MetricSample, MetricSnapshot, RequestMetricSnapshot } from '../types/telemetry';

export const METRIC_SPAN_DURATION = 'span.duration';
export const METRIC_FRAUD_CHECKS = 'fraud.checks';
export const METRIC_HTTP_DURATION = 'http.server.duration';

export const DEFAULT_DURATION_BUCKETS_MS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500];

interface Histogram {
    count: number;
    sum: number;
    min: number;
    max: number;
    // bucketCounts[i] counts samples <= bounds[i]; the last slot is the overflow bucket
    bucketCounts: number[];
}

interface RequestHistogram extends Histogram {
    method: string;
    route: string;
    statusCode: number;
}

/**
 * Process-wide aggregate of metric samples.
 *
 * Every mutation happens synchronously inside record(), so interleaved async
 * callers can never lose an update, and snapshot() hands out a deep copy taken
 * between two records.
 */
export class MetricsAggregator {
    private readonly bounds: number[];
    private operations = new Map<string, Histogram>();
    private requests = new Map<string, RequestHistogram>();
    private outcomes = { approved: 0, flagged: 0 };
    private counters = new Map<string, number>();

    constructor(bucketBoundsMs: number[] = DEFAULT_DURATION_BUCKETS_MS) {
        this.bounds = [...bucketBoundsMs].sort((a, b) => a - b);
    }

    record(sample: MetricSample): void {
        if (!Number.isFinite(sample.value)) {
            logger.warn('Ignoring non-finite metric sample', { name: sample.name, value: sample.value });
            return;
        }

        switch (sample.name) {
            case METRIC_SPAN_DURATION:
                this.observe(sample.tags.operation ?? 'unknown', sample.value);
                break;
            case METRIC_HTTP_DURATION:
                this.observeRequest(sample.tags, sample.value);
                break;
            case METRIC_FRAUD_CHECKS: {
                const status = sample.tags.status;
                if (status === 'approved' || status === 'flagged') {
                    this.outcomes[status] += sample.value;
                } else {
                    logger.warn('Ignoring fraud outcome with unknown status', { status });
                }
                break;
            }
            default:
                this.counters.set(sample.name, (this.counters.get(sample.name) ?? 0) + sample.value);
        }
    }

    recordDuration(operation: string, durationMs: number): void {
        this.record({ name: METRIC_SPAN_DURATION, value: durationMs, tags: { operation } });
    }

    recordOutcome(status: FraudStatus): void {
        this.record({ name: METRIC_FRAUD_CHECKS, value: 1, tags: { status } });
    }

    recordRequest(method: string, route: string, statusCode: number, durationMs: number): void {
        this.record({
            name: METRIC_HTTP_DURATION,
            value: durationMs,
            tags: { method, route, status_code: String(statusCode) }
        });
    }

    increment(name: string, by: number = 1): void {
        this.record({ name, value: by, tags: {} });
    }

    snapshot(): MetricSnapshot {
        const operations: Record<string, HistogramSnapshot> = {};

        for (const [name, histogram] of this.operations) {
            operations[name] = this.toSnapshot(histogram);
        }

        const requests: RequestMetricSnapshot[] = [...this.requests.values()].map(histogram => ({
            method: histogram.method,
            route: histogram.route,
            statusCode: histogram.statusCode,
            duration: this.toSnapshot(histogram)
        }));

        return {
            timestamp: Date.now(),
            operations,
            requests,
            outcomes: { ...this.outcomes },
            counters: Object.fromEntries(this.counters)
        };
    }

    // Test helper; production state lives until the process exits.
    reset(): void {
        this.operations = new Map();
        this.requests = new Map();
        this.outcomes = { approved: 0, flagged: 0 };
        this.counters = new Map();
    }

    private observe(operation: string, value: number): void {
        let histogram = this.operations.get(operation);
        if (!histogram) {
            histogram = this.emptyHistogram(value);
            this.operations.set(operation, histogram);
        }
        this.add(histogram, value);
    }

    private observeRequest(tags: Record<string, string>, value: number): void {
        const method = tags.method ?? 'UNKNOWN';
        const route = tags.route ?? 'unknown';
        const statusCode = Number(tags.status_code ?? 0);
        const key = `${method} ${route} ${statusCode}`;

        let histogram = this.requests.get(key);
        if (!histogram) {
            histogram = { ...this.emptyHistogram(value), method, route, statusCode };
            this.requests.set(key, histogram);
        }
        this.add(histogram, value);
    }

    private emptyHistogram(first: number): Histogram {
        return {
            count: 0,
            sum: 0,
            min: first,
            max: first,
            bucketCounts: new Array<number>(this.bounds.length + 1).fill(0)
        };
    }

    private add(histogram: Histogram, value: number): void {
        histogram.count++;
        histogram.sum += value;
        histogram.min = Math.min(histogram.min, value);
        histogram.max = Math.max(histogram.max, value);

        const slot = this.bounds.findIndex(bound => value <= bound);
        histogram.bucketCounts[slot === -1 ? this.bounds.length : slot]++;
    }

    private toSnapshot(histogram: Histogram): HistogramSnapshot {
        let cumulative = 0;
        return {
            count: histogram.count,
            sum: histogram.sum,
            min: histogram.min,
            max: histogram.max,
            buckets: histogram.bucketCounts.map((count, i) => {
                cumulative += count;
                return { le: i < this.bounds.length ? this.bounds[i] : '+Inf', count: cumulative };
            })
        };
    }
}
