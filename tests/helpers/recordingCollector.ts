import { TelemetryCollector } from '../../src/services/collectors';
import { MetricRecord, TraceRecord } from '../../src/types/telemetry';

export class RecordingCollector implements TelemetryCollector {
    traces: TraceRecord[] = [];
    metrics: MetricRecord[] = [];

    async exportTraces(records: TraceRecord[]): Promise<void> {
        this.traces.push(...records);
    }

    async exportMetrics(records: MetricRecord[]): Promise<void> {
        this.metrics.push(...records);
    }
}

export const tick = (): Promise<void> => new Promise(resolve => setImmediate(resolve));
