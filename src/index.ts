import 'dotenv/config';
import { createApp } from './app';
import { logger } from './config/logger';
import { loadSettings } from './config/settings';
import { buildServices } from './services';

const settings = loadSettings();
const services = buildServices(settings);
const app = createApp(services);

const server = app.listen(settings.port, () => {
    logger.info(`Starting ${settings.serviceName} v${settings.serviceVersion}`);
    logger.info(`Fraud Trace API running on port ${settings.port}`);
    logger.info(`Health check: http://localhost:${settings.port}/health`);
    logger.info(`Telemetry exporter: ${settings.telemetry.exporter}`);
});

services.reporter.start();

const shutdown = (signal: string) => {
    logger.info(`${signal} signal received: closing HTTP server`);
    server.close(() => {
        logger.info('HTTP server closed');
        services.reporter.stop();
        services.sink.shutdown()
            .then(() => {
                logger.info('Telemetry flushed');
                process.exit(0);
            })
            .catch((error: unknown) => {
                logger.error('Telemetry flush failed', { error: error instanceof Error ? error.message : String(error) });
                process.exit(1);
            });
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
