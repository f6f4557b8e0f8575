import { Router, Request, Response } from 'express';
import Joi from 'joi';
import { InvalidInputError, asyncHandler } from '../middleware/errorHandler';
import { FraudCheckService } from '../services/fraudCheckService';
import { attachTraceContext, formatTraceparent } from '../tracing/traceContext';
import { ApiResponse } from '../types/api';
import { FraudCheckRequest, FraudCheckResponse, Transaction } from '../types/transaction';
import { createSeededRandom } from '../utils/random';

const fraudCheckSchema = Joi.object<FraudCheckRequest>({
    transactionId: Joi.string().trim().min(1).max(128).required(),
    amount: Joi.number().positive().max(1000000).required(),
    merchantId: Joi.string().trim().min(1).max(128).required(),
    currency: Joi.string().length(3).uppercase().default('USD'),
    timestamp: Joi.date().iso().optional(),
    seed: Joi.number().integer().min(0).max(4294967295).optional()
})
    .rename('transaction_id', 'transactionId', { ignoreUndefined: true })
    .rename('merchant_id', 'merchantId', { ignoreUndefined: true });

export const createFraudRouter = (fraudCheckService: FraudCheckService): Router => {
    const router = Router();

    router.post('/check', asyncHandler(async (req: Request, res: Response) => {
        const result = fraudCheckSchema.validate(req.body);
        if (result.error !== undefined) {
            throw new InvalidInputError(`Invalid request data: ${result.error.message}`);
        }
        const body = result.value;

        const transaction: Transaction = {
            transactionId: body.transactionId,
            amount: body.amount,
            merchantId: body.merchantId,
            currency: body.currency ?? 'USD',
            timestamp: body.timestamp ?? new Date()
        };

        // A client that hangs up mid-check aborts the trace.
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableEnded) {
                controller.abort();
            }
        });

        const outcome = await fraudCheckService.checkFraud(transaction, {
            traceContext: attachTraceContext(req.headers.traceparent),
            random: body.seed !== undefined ? createSeededRandom(body.seed) : undefined,
            signal: controller.signal,
            http: { method: req.method, route: `${req.baseUrl}/check` }
        });

        const { assessment } = outcome;
        const response: ApiResponse<FraudCheckResponse> = {
            success: true,
            data: {
                transactionId: transaction.transactionId,
                amount: transaction.amount,
                currency: transaction.currency,
                merchantId: transaction.merchantId,
                riskScore: assessment.riskScore,
                status: assessment.status,
                riskFactors: assessment.riskFactors,
                band: assessment.band,
                recommendation: outcome.recommendation,
                traceId: outcome.traceId,
                timestamp: new Date().toISOString()
            },
            timestamp: new Date().toISOString()
        };

        res.setHeader('traceparent', formatTraceparent(outcome.traceId, outcome.rootSpanId));
        res.json(response);
    }));

    return router;
};
