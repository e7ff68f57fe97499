export const RISK_FACTORS = [
    'HIGH_RISK_JURISDICTION',
    'SANCTIONS_CONCERN',
    'UNUSUAL_AMOUNT',
    'SUSPICIOUS_PATTERN',
    'FREQUENCY_ANOMALY',
    'PREVIOUS_FRAUD_HISTORY',
    'NEW_ACCOUNT_RISK',
    'LOW_DEVICE_TRUST',
    'CROSS_BORDER',
    'REGULATORY_COMPLIANCE_VIOLATION'
] as const;

export type RiskFactor = typeof RISK_FACTORS[number];

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export type Recommendation = 'APPROVE' | 'INVESTIGATE' | 'BLOCK';

export type ScoreSource = 'RULES' | 'NARRATIVE';

export type DegradationReason = 'TIMEOUT' | 'SERVICE_ERROR';

export interface RiskAssessment {
    readonly transactionId: string;
    readonly score: number;
    readonly level: RiskLevel;
    readonly factors: ReadonlyArray<RiskFactor>;
    readonly narrative: string;
    readonly recommendation: Recommendation;
    readonly baseScore: number;
    readonly scoreSource: ScoreSource;
    readonly degraded: boolean;
    readonly degradationReason?: DegradationReason;
    readonly assessedAt: string;
}

/** Collapses any number of factor lists into the canonical sorted set. */
export const mergeFactors = (...lists: ReadonlyArray<Iterable<RiskFactor>>): RiskFactor[] => {
    const merged = new Set<RiskFactor>();
    for (const list of lists) {
        for (const factor of list) {
            merged.add(factor);
        }
    }
    return RISK_FACTORS.filter(factor => merged.has(factor));
};
