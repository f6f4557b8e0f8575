import { MetricsAggregator } from '../../src/services/metricsAggregator';
import { tick } from '../helpers/recordingCollector';

describe('MetricsAggregator', () => {
    let metrics: MetricsAggregator;

    beforeEach(() => {
        metrics = new MetricsAggregator();
    });

    it('keeps a duration histogram per operation', () => {
        metrics.recordDuration('fraud.check', 12);
        metrics.recordDuration('fraud.check', 300);
        metrics.recordDuration('http.request', 4000);

        const { operations } = metrics.snapshot();

        expect(operations['fraud.check']).toEqual({
            count: 2,
            sum: 312,
            min: 12,
            max: 300,
            buckets: [
                { le: 5, count: 0 },
                { le: 10, count: 0 },
                { le: 25, count: 1 },
                { le: 50, count: 1 },
                { le: 100, count: 1 },
                { le: 250, count: 1 },
                { le: 500, count: 2 },
                { le: 1000, count: 2 },
                { le: 2500, count: 2 },
                { le: '+Inf', count: 2 }
            ]
        });
        expect(operations['http.request'].buckets[9]).toEqual({ le: '+Inf', count: 1 });
        expect(operations['http.request'].buckets[8]).toEqual({ le: 2500, count: 0 });
    });

    it('counts approved and flagged outcomes', () => {
        metrics.recordOutcome('approved');
        metrics.recordOutcome('approved');
        metrics.recordOutcome('flagged');

        expect(metrics.snapshot().outcomes).toEqual({ approved: 2, flagged: 1 });
    });

    it('sums any other sample into a named counter', () => {
        metrics.increment('telemetry.dropped');
        metrics.increment('telemetry.dropped', 3);
        metrics.record({ name: 'fraud.checks.aborted', value: 1, tags: {} });

        expect(metrics.snapshot().counters).toEqual({ 'telemetry.dropped': 4, 'fraud.checks.aborted': 1 });
    });

    it('ignores unknown outcome statuses and non-finite values', () => {
        metrics.record({ name: 'fraud.checks', value: 1, tags: { status: 'pending' } });
        metrics.record({ name: 'span.duration', value: Number.NaN, tags: { operation: 'fraud.check' } });

        const snapshot = metrics.snapshot();
        expect(snapshot.outcomes).toEqual({ approved: 0, flagged: 0 });
        expect(snapshot.operations).toEqual({});
    });

    it('loses no updates from many interleaved callers', async () => {
        const callers = Array.from({ length: 20 }, async () => {
            for (let i = 0; i < 50; i++) {
                metrics.recordDuration('fraud.check', i);
                metrics.recordOutcome(i % 2 === 0 ? 'approved' : 'flagged');
                await tick();
            }
        });

        await Promise.all(callers);

        const snapshot = metrics.snapshot();
        expect(snapshot.operations['fraud.check'].count).toBe(1000);
        expect(snapshot.outcomes).toEqual({ approved: 500, flagged: 500 });
    });

    it('hands out snapshots that later records do not change', () => {
        metrics.recordDuration('fraud.check', 10);
        const before = metrics.snapshot();

        metrics.recordDuration('fraud.check', 20);
        before.operations['fraud.check'].count = 99;

        expect(metrics.snapshot().operations['fraud.check'].count).toBe(2);
    });

    it('keeps a response time histogram per method, route and status', () => {
        metrics.recordRequest('GET', '/health', 200, 4);
        metrics.recordRequest('GET', '/health', 200, 30);
        metrics.recordRequest('GET', '/health', 503, 2);
        metrics.recordRequest('POST', '/api/fraud/check', 200, 260);

        const requests = metrics.snapshot().requests;

        expect(requests.map(request => [request.method, request.route, request.statusCode, request.duration.count])).toEqual([
            ['GET', '/health', 200, 2],
            ['GET', '/health', 503, 1],
            ['POST', '/api/fraud/check', 200, 1]
        ]);
        expect(requests[0].duration).toMatchObject({ sum: 34, min: 4, max: 30 });
        expect(requests[2].duration.buckets[6]).toEqual({ le: 500, count: 1 });
        expect(metrics.snapshot().operations).toEqual({});
    });

    it('starts over after reset', () => {
        metrics.recordOutcome('flagged');
        metrics.recordRequest('GET', '/health', 200, 4);
        metrics.reset();

        expect(metrics.snapshot().outcomes).toEqual({ approved: 0, flagged: 0 });
        expect(metrics.snapshot().requests).toEqual([]);
    });
});
