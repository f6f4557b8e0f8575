import { logger } from '../config/logger';
import { EmissionSink } from './emissionSink';
import { MetricsAggregator } from './metricsAggregator';

// Periodically hands an aggregate snapshot to the sink, like an exporting metric reader.
export class MetricsReporter {
    private timer: NodeJS.Timeout | null = null;

    constructor(
        private readonly metrics: MetricsAggregator,
        private readonly sink: EmissionSink,
        private readonly intervalMs: number
    ) {}

    start(): void {
        if (this.timer) {
            return;
        }
        this.timer = setInterval(() => this.report(), this.intervalMs);
        this.timer.unref();
        logger.info('Metrics reporter started', { intervalMs: this.intervalMs });
    }

    report(): void {
        this.sink.emit(this.metrics.snapshot());
    }

    stop(): void {
        if (!this.timer) {
            return;
        }
        clearInterval(this.timer);
        this.timer = null;
        this.report();
    }
}
