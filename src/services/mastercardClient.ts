import { logger } from '../config/logger';
import { Transaction, RiskAssessment } from '../types/transaction';
import { RandomSource, uniformBetween } from '../utils/random';
import { sleep } from '../utils/sleep';
import { RiskModel } from './riskModel';

export interface ClientCallOptions {
    random: RandomSource;
    signal?: AbortSignal;
}

export interface ClientCallResult {
    assessment: RiskAssessment;
    latencyMs: number;
}

export interface FraudDecisionClient {
    readonly mockMode: boolean;
    checkFraud(transaction: Transaction, options: ClientCallOptions): Promise<ClientCallResult>;
}

export interface MastercardClientOptions {
    minLatencyMs?: number;
    maxLatencyMs?: number;
    // Drives simulated latency only, so scoring draws stay reproducible.
    latencySource?: RandomSource;
}

/**
 * Stand-in for the Decision Intelligence fraud API. Waits a simulated network
 * latency, then scores the transaction locally.
 */
export class MastercardClient implements FraudDecisionClient {
    readonly mockMode = true;
    private readonly minLatencyMs: number;
    private readonly maxLatencyMs: number;
    private readonly latencySource: RandomSource;

    constructor(private readonly riskModel: RiskModel, options: MastercardClientOptions = {}) {
        this.minLatencyMs = options.minLatencyMs ?? 200;
        this.maxLatencyMs = Math.max(this.minLatencyMs, options.maxLatencyMs ?? 500);
        this.latencySource = options.latencySource ?? Math.random;

        logger.info('MastercardClient initialized', {
            mockMode: this.mockMode,
            latencyMs: [this.minLatencyMs, this.maxLatencyMs]
        });
    }

    async checkFraud(transaction: Transaction, options: ClientCallOptions): Promise<ClientCallResult> {
        const latencyMs = Math.round(uniformBetween(this.latencySource, this.minLatencyMs, this.maxLatencyMs));

        await sleep(latencyMs, options.signal);

        const assessment = this.riskModel.assess(transaction, options.random);

        logger.debug('Decision Intelligence response', {
            transactionId: transaction.transactionId,
            riskScore: assessment.riskScore,
            latencyMs
        });

        return { assessment, latencyMs };
    }
}
