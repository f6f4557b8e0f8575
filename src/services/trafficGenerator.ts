import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import { Transaction } from '../types/transaction';
import { RandomSource, uniformBetween } from '../utils/random';
import { FraudCheckService } from './fraudCheckService';

export interface GeneratedOperation {
    index: number;
    transactionId: string;
    amount: number;
    status: 'approved' | 'flagged' | 'error';
    riskScore?: number;
    error?: string;
}

export interface TrafficReport {
    generated: number;
    approved: number;
    flagged: number;
    errors: number;
    timestamp: string;
    operations: GeneratedOperation[];
}

const MERCHANT_CATEGORIES = ['coffee', 'restaurant', 'gas', 'grocery', 'pharmacy', 'travel'];

/**
 * Issues randomly generated fraud checks through a fixed pool of concurrent
 * workers to populate observability dashboards.
 */
export class TrafficGenerator {
    constructor(
        private readonly fraudCheckService: FraudCheckService,
        private readonly random: RandomSource = Math.random
    ) {}

    generateTransaction(): Transaction {
        const category = MERCHANT_CATEGORIES[Math.floor(this.random() * MERCHANT_CATEGORIES.length)];

        return {
            transactionId: `txn_${uuidv4()}`,
            amount: Math.round(uniformBetween(this.random, 10, 5000) * 100) / 100,
            merchantId: `mch_${category}_${Math.floor(uniformBetween(this.random, 1000, 10000))}`,
            currency: 'USD',
            timestamp: new Date()
        };
    }

    async generate(count: number, concurrency: number = 10): Promise<TrafficReport> {
        const transactions = Array.from({ length: count }, () => this.generateTransaction());
        const operations: GeneratedOperation[] = new Array(count);
        let next = 0;

        const worker = async (): Promise<void> => {
            while (next < transactions.length) {
                const index = next++;
                const transaction = transactions[index];

                try {
                    const outcome = await this.fraudCheckService.checkFraud(transaction, {
                        http: { method: 'POST', route: '/api/demo/generate-traffic' }
                    });
                    operations[index] = {
                        index: index + 1,
                        transactionId: transaction.transactionId,
                        amount: transaction.amount,
                        status: outcome.assessment.status,
                        riskScore: outcome.assessment.riskScore
                    };
                } catch (error) {
                    operations[index] = {
                        index: index + 1,
                        transactionId: transaction.transactionId,
                        amount: transaction.amount,
                        status: 'error',
                        error: error instanceof Error ? error.message : String(error)
                    };
                }
            }
        };

        const workers = Math.max(1, Math.min(concurrency, count));
        await Promise.all(Array.from({ length: workers }, () => worker()));

        const report: TrafficReport = {
            generated: count,
            approved: operations.filter(op => op.status === 'approved').length,
            flagged: operations.filter(op => op.status === 'flagged').length,
            errors: operations.filter(op => op.status === 'error').length,
            timestamp: new Date().toISOString(),
            operations
        };

        logger.info(`Generated ${count} demo fraud checks`, {
            concurrency: workers,
            approved: report.approved,
            flagged: report.flagged,
            errors: report.errors
        });

        return report;
    }
}
