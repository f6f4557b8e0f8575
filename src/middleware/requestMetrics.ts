import { Request, Response, NextFunction, RequestHandler } from 'express';
import { MetricsAggregator } from '../services/metricsAggregator';

// Counts every request and records its response time by method, path and status.
export const requestMetrics = (metrics: MetricsAggregator): RequestHandler => {
    return (req: Request, res: Response, next: NextFunction) => {
        const start = performance.now();
        // Routers rewrite req.path while dispatching; keep the path as received.
        const route = req.path;

        res.on('finish', () => {
            metrics.recordRequest(req.method, route, res.statusCode, performance.now() - start);
        });

        next();
    };
};
