export interface Transaction {
    transactionId: string;
    amount: number;
    merchantId: string;
    currency: string;
    timestamp: Date;
}

export type FraudStatus = 'approved' | 'flagged';

export type Recommendation = 'approve' | 'review';

export interface RiskFactor {
    name: string;
    contribution: number;
}

export interface RiskAssessment {
    riskScore: number;
    status: FraudStatus;
    riskFactors: RiskFactor[];
    band: string;
}

export interface FraudCheckRequest {
    transactionId: string;
    amount: number;
    merchantId: string;
    currency?: string;
    timestamp?: Date;
    seed?: number;
}

export interface FraudCheckResponse {
    transactionId: string;
    amount: number;
    currency: string;
    merchantId: string;
    riskScore: number;
    status: FraudStatus;
    riskFactors: RiskFactor[];
    band: string;
    recommendation: Recommendation;
    traceId: string;
    timestamp: string;
}
