import { Settings } from '../config/settings';
import { TelemetryCollector, createCollector } from './collectors';
import { EmissionSink } from './emissionSink';
import { FraudCheckService } from './fraudCheckService';
import { MastercardClient } from './mastercardClient';
import { MetricsAggregator } from './metricsAggregator';
import { MetricsReporter } from './metricsReporter';
import { RiskModel } from './riskModel';
import { TrafficGenerator } from './trafficGenerator';

export interface AppServices {
    settings: Settings;
    riskModel: RiskModel;
    metrics: MetricsAggregator;
    sink: EmissionSink;
    reporter: MetricsReporter;
    fraudCheckService: FraudCheckService;
    trafficGenerator: TrafficGenerator;
}

export const buildServices = (settings: Settings, collector: TelemetryCollector = createCollector(settings)): AppServices => {
    const riskModel = new RiskModel(settings.risk);
    const metrics = new MetricsAggregator();
    const sink = new EmissionSink(collector, {
        capacity: settings.telemetry.queueCapacity,
        batchSize: settings.telemetry.batchSize,
        metrics
    });
    const client = new MastercardClient(riskModel, {
        minLatencyMs: settings.mockLatencyMinMs,
        maxLatencyMs: settings.mockLatencyMaxMs
    });
    const fraudCheckService = new FraudCheckService({
        client,
        metrics,
        sink,
        strictSpanLifecycle: settings.strictSpanLifecycle
    });

    return {
        settings,
        riskModel,
        metrics,
        sink,
        reporter: new MetricsReporter(metrics, sink, settings.telemetry.metricsExportIntervalMs),
        fraudCheckService,
        trafficGenerator: new TrafficGenerator(fraudCheckService)
    };
};
