import { Router } from 'express';
import { AppServices } from '../services';
import { ApiResponse, MetricsResponse } from '../types/api';
import { createDemoRouter } from './demo';
import { createFraudRouter } from './fraud';

export const createRoutes = (services: AppServices): Router => {
    const router = Router();
    const { settings } = services;

    router.use('/fraud', createFraudRouter(services.fraudCheckService));
    router.use('/demo', createDemoRouter(services.trafficGenerator, settings.nodeEnv));

    router.get('/', (req, res) => {
        res.json({
            name: 'Fraud Trace API',
            version: settings.serviceVersion,
            description: 'Fraud risk scoring with correlated trace, metric and log emission',
            status: 'Active',
            endpoints: {
                'POST /api/fraud/check': 'Score a transaction for fraud risk and emit its trace',
                'GET /api/metrics': 'Aggregated request, duration and outcome metrics',
                'POST /api/demo/generate-traffic': 'Generate concurrent demo fraud checks (non-production)',
                'GET /api/status': 'Service status',
                'GET /health': 'System health check',
                'GET /api': 'This API information'
            },
            telemetry: {
                exporter: settings.telemetry.exporter,
                riskThreshold: settings.risk.riskThreshold
            },
            timestamp: new Date().toISOString(),
            environment: settings.nodeEnv
        });
    });

    router.get('/status', (req, res) => {
        res.json({
            status: 'OK',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            version: settings.serviceVersion
        });
    });

    router.get('/metrics', (req, res) => {
        const memoryUsage = process.memoryUsage();

        const response: ApiResponse<MetricsResponse> = {
            success: true,
            data: {
                system: {
                    uptime: process.uptime(),
                    memory: {
                        used: Math.round(memoryUsage.heapUsed / 1024 / 1024),
                        total: Math.round(memoryUsage.heapTotal / 1024 / 1024),
                        external: Math.round(memoryUsage.external / 1024 / 1024),
                        rss: Math.round(memoryUsage.rss / 1024 / 1024)
                    },
                    platform: process.platform,
                    nodeVersion: process.version
                },
                telemetry: {
                    aggregates: services.metrics.snapshot(),
                    emission: services.sink.stats()
                },
                api: {
                    environment: settings.nodeEnv,
                    timestamp: new Date().toISOString()
                }
            },
            timestamp: new Date().toISOString()
        };

        res.json(response);
    });

    return router;
};
