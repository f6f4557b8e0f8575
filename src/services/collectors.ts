import axios, { AxiosInstance } from 'axios';
import { logger } from '../config/logger';
import { createRedisClient } from '../config/redis';
import { Settings } from '../config/settings';
import { MetricRecord, TraceRecord } from '../types/telemetry';

/**
 * The external collector boundary. Transport, batching on the far side and
 * retry policy belong to the implementation behind it.
 */
export interface TelemetryCollector {
    exportTraces(records: TraceRecord[]): Promise<void>;
    exportMetrics(records: MetricRecord[]): Promise<void>;
    shutdown?(): Promise<void>;
}

export interface ResourceAttributes {
    'service.name': string;
    'service.version': string;
    'deployment.environment': string;
}

export class LoggerCollector implements TelemetryCollector {
    async exportTraces(records: TraceRecord[]): Promise<void> {
        for (const record of records) {
            logger.info('Trace exported', {
                traceId: record.trace_id,
                spans: record.spans.map(span => `${span.name}:${span.status}`)
            });
        }
    }

    async exportMetrics(records: MetricRecord[]): Promise<void> {
        logger.info('Metrics exported', { count: records.length });
        logger.debug('Metric records', { records });
    }
}

type HttpPoster = Pick<AxiosInstance, 'post'>;

export class HttpCollector implements TelemetryCollector {
    private client: HttpPoster;

    constructor(
        endpoint: string,
        apiKey: string,
        private readonly resource: ResourceAttributes,
        client?: HttpPoster
    ) {
        this.client = client ?? axios.create({
            baseURL: endpoint.replace(/\/+$/, ''),
            timeout: 5000,
            headers: {
                'Content-Type': 'application/json',
                ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {})
            }
        });
    }

    async exportTraces(records: TraceRecord[]): Promise<void> {
        await this.client.post('/v1/traces', { resource: this.resource, traces: records });
    }

    async exportMetrics(records: MetricRecord[]): Promise<void> {
        await this.client.post('/v1/metrics', { resource: this.resource, metrics: records });
    }
}

export interface RedisListWriter {
    rpush(key: string, ...values: string[]): Promise<number>;
    quit?(): Promise<unknown>;
}

export class RedisStreamCollector implements TelemetryCollector {
    constructor(private readonly redis: RedisListWriter, private readonly prefix: string) {}

    async exportTraces(records: TraceRecord[]): Promise<void> {
        if (records.length === 0) {
            return;
        }
        await this.redis.rpush(`${this.prefix}:traces`, ...records.map(record => JSON.stringify(record)));
    }

    async exportMetrics(records: MetricRecord[]): Promise<void> {
        if (records.length === 0) {
            return;
        }
        await this.redis.rpush(`${this.prefix}:metrics`, ...records.map(record => JSON.stringify(record)));
    }

    async shutdown(): Promise<void> {
        await this.redis.quit?.();
    }
}

export const createCollector = (settings: Settings): TelemetryCollector => {
    switch (settings.telemetry.exporter) {
        case 'http':
            return new HttpCollector(settings.telemetry.otlpEndpoint, settings.telemetry.otlpApiKey, {
                'service.name': settings.serviceName,
                'service.version': settings.serviceVersion,
                'deployment.environment': settings.nodeEnv
            });
        case 'redis':
            return new RedisStreamCollector(createRedisClient(settings.redis), settings.telemetry.streamPrefix);
        case 'log':
        default:
            return new LoggerCollector();
    }
};
