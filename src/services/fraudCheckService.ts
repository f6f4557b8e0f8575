import { logger } from '../config/logger';
import { CheckAbortedError, SpanLifecycleError } from '../middleware/errorHandler';
import { Clock, SpanBuilder, SpanBuilderFactory, createSpanBuilder } from '../tracing/spanBuilder';
import { createTraceContext } from '../tracing/traceContext';
import { Transaction, RiskAssessment, Recommendation } from '../types/transaction';
import { TraceContext } from '../types/telemetry';
import { RandomSource } from '../utils/random';
import { EmissionSink } from './emissionSink';
import { FraudDecisionClient } from './mastercardClient';
import { MetricsAggregator } from './metricsAggregator';
import { validateTransaction } from './riskModel';

export const SPAN_HTTP_REQUEST = 'http.request';
export const SPAN_FRAUD_CHECK = 'fraud.check';
export const SPAN_CLIENT_CALL = 'mastercard.client.call';
export const SPAN_RESPONSE_GENERATION = 'response.generation';

export const METRIC_CHECKS_ABORTED = 'fraud.checks.aborted';
export const METRIC_CHECKS_FAILED = 'fraud.checks.failed';
export const METRIC_LIFECYCLE_ERRORS = 'spans.lifecycle_errors';

export interface FraudCheckOptions {
    /** Context of the caller's trace; a fresh trace is started when omitted. */
    traceContext?: TraceContext;
    random?: RandomSource;
    signal?: AbortSignal;
    http?: {
        method: string;
        route: string;
    };
}

export interface FraudCheckOutcome {
    assessment: RiskAssessment;
    recommendation: Recommendation;
    traceId: string;
    rootSpanId: string;
}

export interface FraudCheckServiceDeps {
    client: FraudDecisionClient;
    metrics: MetricsAggregator;
    sink: EmissionSink;
    clock?: Clock;
    spanBuilderFactory?: SpanBuilderFactory;
    /** Rethrow span nesting violations instead of dropping the trace. */
    strictSpanLifecycle?: boolean;
}

export class FraudCheckService {
    private readonly client: FraudDecisionClient;
    private readonly metrics: MetricsAggregator;
    private readonly sink: EmissionSink;
    private readonly clock?: Clock;
    private readonly createBuilder: SpanBuilderFactory;
    private readonly strictSpanLifecycle: boolean;

    constructor(deps: FraudCheckServiceDeps) {
        this.client = deps.client;
        this.metrics = deps.metrics;
        this.sink = deps.sink;
        this.clock = deps.clock;
        this.createBuilder = deps.spanBuilderFactory ?? createSpanBuilder;
        this.strictSpanLifecycle = deps.strictSpanLifecycle ?? true;
    }

    async checkFraud(transaction: Transaction, options: FraudCheckOptions = {}): Promise<FraudCheckOutcome> {
        // Rejected before a single span exists.
        validateTransaction(transaction);

        const context = options.traceContext ?? createTraceContext();
        const random = options.random ?? Math.random;
        const http = options.http ?? { method: 'POST', route: '/api/fraud/check' };

        const builder = this.createBuilder(context, {
            clock: this.clock,
            onSpanEnd: span => {
                if (span.endTime !== null) {
                    this.metrics.recordDuration(span.name, span.endTime - span.startTime);
                }
            },
            onComplete: trace => this.sink.emit(trace)
        });

        let assessment: RiskAssessment | null = null;
        let recommendation: Recommendation = 'approve';
        let rootSpanId = '';

        try {
            const root = builder.beginSpan(SPAN_HTTP_REQUEST, null, {
                'http.method': http.method,
                'http.route': http.route
            });
            rootSpanId = root.spanId;

            const check = builder.beginSpan(SPAN_FRAUD_CHECK, root, {
                'transaction.id': transaction.transactionId,
                'transaction.amount': transaction.amount,
                'transaction.currency': transaction.currency,
                'merchant.id': transaction.merchantId
            });

            const call = builder.beginSpan(SPAN_CLIENT_CALL, check, {
                'client.operation': 'fraud.check',
                'client.mock_mode': this.client.mockMode
            });

            const result = await this.client.checkFraud(transaction, { random, signal: options.signal });
            if (options.signal?.aborted) {
                throw new CheckAbortedError();
            }
            const scored = result.assessment;
            assessment = scored;

            const response = builder.beginSpan(SPAN_RESPONSE_GENERATION, call);
            recommendation = scored.status === 'flagged' ? 'review' : 'approve';
            builder.endSpan(response, { 'response.recommendation': recommendation });

            builder.endSpan(call, { 'client.latency_ms': result.latencyMs });

            // Span attributes and the returned assessment come from the same object.
            builder.endSpan(check, {
                'fraud.risk_score': scored.riskScore,
                'fraud.status': scored.status,
                'fraud.band': scored.band,
                'fraud.risk_factors': scored.riskFactors.map(factor => factor.name)
            });

            builder.endSpan(root, { 'http.status_code': 200 });

            this.metrics.recordOutcome(scored.status);
            this.logDecision(transaction, scored, builder.traceId);

            return { assessment: scored, recommendation, traceId: builder.traceId, rootSpanId };
        } catch (error) {
            return this.handleFailure(error, builder, transaction, assessment, recommendation, rootSpanId);
        }
    }

    private handleFailure(
        error: unknown,
        builder: SpanBuilder,
        transaction: Transaction,
        assessment: RiskAssessment | null,
        recommendation: Recommendation,
        rootSpanId: string
    ): FraudCheckOutcome {
        if (error instanceof CheckAbortedError) {
            const closed = builder.abort('aborted');
            this.metrics.increment(METRIC_CHECKS_ABORTED);
            logger.warn('Fraud check aborted', {
                transactionId: transaction.transactionId,
                traceId: builder.traceId,
                closedSpans: closed.length
            });
            throw error;
        }

        if (error instanceof SpanLifecycleError) {
            builder.abort('lifecycle_error');
            this.metrics.increment(METRIC_LIFECYCLE_ERRORS);
            logger.error('Span lifecycle violation, trace dropped', {
                transactionId: transaction.transactionId,
                traceId: builder.traceId,
                error: error.message
            });

            if (this.strictSpanLifecycle || assessment === null) {
                throw error;
            }

            this.metrics.recordOutcome(assessment.status);
            this.logDecision(transaction, assessment, builder.traceId);
            return { assessment, recommendation, traceId: builder.traceId, rootSpanId };
        }

        const failure = error instanceof Error ? error : new Error(String(error));
        builder.fail(failure);
        this.metrics.increment(METRIC_CHECKS_FAILED);
        logger.error('Error checking fraud', {
            transactionId: transaction.transactionId,
            traceId: builder.traceId,
            error: failure.message
        });
        throw failure;
    }

    private logDecision(transaction: Transaction, assessment: RiskAssessment, traceId: string): void {
        const meta = {
            transactionId: transaction.transactionId,
            merchantId: transaction.merchantId,
            amount: transaction.amount,
            riskScore: assessment.riskScore,
            status: assessment.status,
            traceId
        };

        if (assessment.status === 'flagged') {
            logger.warn(`Suspicious transaction detected: ${transaction.transactionId}`, meta);
        } else {
            logger.info('Transaction scored', meta);
        }
    }
}
