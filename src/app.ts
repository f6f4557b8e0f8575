import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { logger } from './config/logger';
import { errorHandler } from './middleware/errorHandler';
import { requestMetrics } from './middleware/requestMetrics';
import { createRoutes } from './routes';
import { AppServices } from './services';
import { HealthCheckResponse } from './types/api';

export const createApp = (services: AppServices): Express => {
    const app = express();
    const { settings } = services;

    app.use(helmet({
        contentSecurityPolicy: false
    }));

    app.use(cors({
        origin: settings.nodeEnv === 'production' ? false : true,
        credentials: true,
        exposedHeaders: ['traceparent']
    }));

    app.use(requestMetrics(services.metrics));

    app.use(express.json({ limit: '1mb' }));
    app.use(express.urlencoded({ extended: true }));

    app.use((req, res, next) => {
        logger.http(`${req.method} ${req.path}`, {
            ip: req.ip,
            userAgent: req.get('User-Agent'),
            traceparent: req.get('traceparent')
        });
        next();
    });

    app.use('/api', createRoutes(services));

    app.get('/health', (req, res) => {
        const health: HealthCheckResponse = {
            status: 'OK',
            service: settings.serviceName,
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            memory: process.memoryUsage(),
            version: settings.serviceVersion
        };
        res.json(health);
    });

    app.use((req, res) => {
        res.status(404).json({
            success: false,
            error: 'Endpoint not found',
            path: req.originalUrl,
            method: req.method
        });
    });

    app.use(errorHandler);

    return app;
};
