import type { RiskLevel, Recommendation } from '../types/risk';

/**
 * Score boundaries shared by level and recommendation derivation. Both
 * `levelForScore` and `recommendationForScore` read these and nothing else,
 * so a score can never be HIGH and APPROVE at the same time.
 */
export const RISK_THRESHOLDS = {
    high: 75,
    medium: 45
} as const;

export const levelForScore = (score: number): RiskLevel => {
    if (score >= RISK_THRESHOLDS.high) return 'HIGH';
    if (score >= RISK_THRESHOLDS.medium) return 'MEDIUM';
    return 'LOW';
};

export const recommendationForScore = (score: number): Recommendation => {
    if (score >= RISK_THRESHOLDS.high) return 'BLOCK';
    if (score >= RISK_THRESHOLDS.medium) return 'INVESTIGATE';
    return 'APPROVE';
};

export const MIN_RISK_SCORE = 0;
export const MAX_RISK_SCORE = 100;

export const clampScore = (score: number): number =>
    Math.max(MIN_RISK_SCORE, Math.min(MAX_RISK_SCORE, score));

export interface RiskWeights {
    highRiskCountry: number;
    sanctionedCountry: number;
    crossBorder: number;
    highAmount: number;
    amountSpike: number;
    newAccount: number;
    lowDeviceTrust: number;
    pastFraud: number;
}

export interface ScoringConfig {
    weights: RiskWeights;
    highAmountThreshold: number;
    amountSpikeMultiple: number;
    newAccountDays: number;
    lowDeviceTrustThreshold: number;
    highRiskCountries: ReadonlyArray<string>;
    sanctionedCountries: ReadonlyArray<string>;
}

export const DEFAULT_RISK_WEIGHTS: RiskWeights = {
    highRiskCountry: 30,
    sanctionedCountry: 40,
    crossBorder: 10,
    highAmount: 20,
    amountSpike: 25,
    newAccount: 15,
    lowDeviceTrust: 20,
    pastFraud: 30
};

// Sanctioned destinations are a strict subset of the high-risk list.
export const SANCTIONED_COUNTRIES = ['IR', 'KP', 'SY', 'CU', 'RU'] as const;

export const HIGH_RISK_COUNTRIES = [
    ...SANCTIONED_COUNTRIES,
    'NG', 'YE', 'AF', 'SO', 'LY', 'IQ', 'MM', 'BY', 'VE'
] as const;

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
    weights: DEFAULT_RISK_WEIGHTS,
    highAmountThreshold: 10000,
    amountSpikeMultiple: 5,
    newAccountDays: 30,
    lowDeviceTrustThreshold: 0.5,
    highRiskCountries: HIGH_RISK_COUNTRIES,
    sanctionedCountries: SANCTIONED_COUNTRIES
};

export const createScoringConfig = (
    overrides: Partial<Omit<ScoringConfig, 'weights'>> & { weights?: Partial<RiskWeights> } = {}
): ScoringConfig => ({
    ...DEFAULT_SCORING_CONFIG,
    ...overrides,
    weights: { ...DEFAULT_RISK_WEIGHTS, ...overrides.weights }
});
