import { Router, Request, Response } from 'express';
import Joi from 'joi';
import { InvalidInputError, asyncHandler } from '../middleware/errorHandler';
import { TrafficGenerator, TrafficReport } from '../services/trafficGenerator';
import { ApiResponse } from '../types/api';

interface GenerateTrafficRequest {
    requests: number;
    concurrency: number;
}

const generateTrafficSchema = Joi.object<GenerateTrafficRequest>({
    requests: Joi.number().integer().min(1).max(100).default(10),
    concurrency: Joi.number().integer().min(1).max(50).default(10)
});

export const createDemoRouter = (trafficGenerator: TrafficGenerator, environment: string): Router => {
    const router = Router();

    router.post('/generate-traffic', asyncHandler(async (req: Request, res: Response) => {
        if (environment === 'production') {
            throw new InvalidInputError('Traffic generation is only available outside production');
        }

        const result = generateTrafficSchema.validate(req.body ?? {});
        if (result.error !== undefined) {
            throw new InvalidInputError(`Invalid request data: ${result.error.message}`);
        }
        const { requests, concurrency } = result.value;

        const report = await trafficGenerator.generate(requests, concurrency);

        const response: ApiResponse<TrafficReport> = {
            success: true,
            data: report,
            message: `Generated ${report.generated} fraud checks`,
            timestamp: new Date().toISOString()
        };

        res.json(response);
    }));

    return router;
};
