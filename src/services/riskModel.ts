import { RiskModelConfig, DEFAULT_RISK_CONFIG, validateRiskConfig } from '../config/settings';
import { InvalidInputError } from '../middleware/errorHandler';
import { Transaction, RiskAssessment, RiskFactor, FraudStatus } from '../types/transaction';
import { RandomSource } from '../utils/random';

export const AMOUNT_BAND_FACTOR = 'amount_band';

const round2 = (value: number): number => Math.round(value * 100) / 100;

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

export const validateTransaction = (transaction: Pick<Transaction, 'transactionId' | 'amount'>): void => {
    if (typeof transaction.transactionId !== 'string' || transaction.transactionId.trim() === '') {
        throw new InvalidInputError('transactionId must be a non-empty string');
    }

    if (typeof transaction.amount !== 'number' || !Number.isFinite(transaction.amount) || transaction.amount <= 0) {
        throw new InvalidInputError(`amount must be a positive number, received ${transaction.amount}`);
    }
};

export class RiskModel {
    private readonly config: RiskModelConfig;

    constructor(config: RiskModelConfig = DEFAULT_RISK_CONFIG) {
        this.config = validateRiskConfig(config);
    }

    get riskThreshold(): number {
        return this.config.riskThreshold;
    }

    assess(transaction: Transaction, random: RandomSource): RiskAssessment {
        validateTransaction(transaction);

        const bandIndex = this.bandIndexFor(transaction.amount);
        const baseScore = this.config.bandScores[bandIndex];

        const riskFactors: RiskFactor[] = [{ name: AMOUNT_BAND_FACTOR, contribution: baseScore }];
        let total = baseScore;

        for (const [name, weight] of Object.entries(this.config.riskFactorWeights)) {
            const contribution = round2(weight * this.signal(random));
            riskFactors.push({ name, contribution });
            total += contribution;
        }

        const riskScore = round2(clamp(total, 0, 100));

        return {
            riskScore,
            status: this.classify(riskScore),
            riskFactors,
            band: this.config.bandLabels[bandIndex]
        };
    }

    classify(riskScore: number): FraudStatus {
        return riskScore > this.config.riskThreshold ? 'flagged' : 'approved';
    }

    // Below the first boundary is band 0; band i >= 1 runs from boundary[i-1] up to and
    // including boundary[i], so with [50, 1000] $50 and $1000 are both medium.
    private bandIndexFor(amount: number): number {
        const boundaries = this.config.bandBoundaries;
        if (boundaries.length === 0 || amount < boundaries[0]) {
            return 0;
        }

        let index = 1;
        while (index < boundaries.length && amount > boundaries[index]) {
            index++;
        }
        return index;
    }

    // Maps a draw onto [0.5, 1] so every configured factor contributes at least half its weight.
    private signal(random: RandomSource): number {
        const draw = random();
        const bounded = Number.isFinite(draw) ? clamp(draw, 0, 1) : 0;
        return 0.5 + 0.5 * bounded;
    }
}
