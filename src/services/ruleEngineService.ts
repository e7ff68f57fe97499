import { DEFAULT_SCORING_CONFIG, clampScore, type ScoringConfig } from '../config/scoring';
import { logger } from '../config/logger';
import { mergeFactors, type RiskFactor } from '../types/risk';
import type { EnrichedContext } from '../types/transaction';

export interface RuleResult {
    ruleId: string;
    ruleName: string;
    triggered: boolean;
    score: number;
    factor: RiskFactor;
    reason: string;
}

export interface RuleEvaluation {
    baseScore: number;
    baseFactors: RiskFactor[];
    ruleResults: RuleResult[];
}

export class RuleEngineService {

    constructor(private readonly config: ScoringConfig = DEFAULT_SCORING_CONFIG) {}

    evaluate(context: EnrichedContext): RuleEvaluation {
        const results: RuleResult[] = [
            this.checkHighRiskCountryRule(context),
            this.checkSanctionsRule(context),
            this.checkCrossBorderRule(context),
            this.checkHighAmountRule(context),
            this.checkAmountSpikeRule(context),
            this.checkNewAccountRule(context),
            this.checkDeviceTrustRule(context),
            this.checkPastFraudRule(context)
        ];

        const triggered = results
            .filter(rule => rule.triggered)
            .sort((a, b) => b.score - a.score);

        const rawScore = triggered.reduce((sum, rule) => sum + rule.score, 0);
        const evaluation: RuleEvaluation = {
            baseScore: clampScore(rawScore),
            baseFactors: mergeFactors(triggered.map(rule => rule.factor)),
            ruleResults: triggered
        };

        logger.debug('Rules evaluated', {
            transactionId: context.transaction.id,
            baseScore: evaluation.baseScore,
            triggered: triggered.map(rule => rule.ruleId)
        });

        return evaluation;
    }

    private checkHighRiskCountryRule(context: EnrichedContext): RuleResult {
        const { highRiskCountry } = context.derivedFlags;
        return {
            ruleId: 'high_risk_country',
            ruleName: 'High-Risk Destination',
            triggered: highRiskCountry,
            score: highRiskCountry ? this.config.weights.highRiskCountry : 0,
            factor: 'HIGH_RISK_JURISDICTION',
            reason: `Destination ${context.transaction.destinationCountry} is on the high-risk country list`
        };
    }

    private checkSanctionsRule(context: EnrichedContext): RuleResult {
        const { sanctionedCountry } = context.derivedFlags;
        return {
            ruleId: 'sanctioned_country',
            ruleName: 'Sanctioned Destination',
            triggered: sanctionedCountry,
            score: sanctionedCountry ? this.config.weights.sanctionedCountry : 0,
            factor: 'SANCTIONS_CONCERN',
            reason: `Destination ${context.transaction.destinationCountry} is subject to sanctions`
        };
    }

    private checkCrossBorderRule(context: EnrichedContext): RuleResult {
        const { crossBorder } = context.derivedFlags;
        return {
            ruleId: 'cross_border',
            ruleName: 'Cross-Border Transfer',
            triggered: crossBorder,
            score: crossBorder ? this.config.weights.crossBorder : 0,
            factor: 'CROSS_BORDER',
            reason: `Customer country ${context.customer.country} differs from destination ${context.transaction.destinationCountry}`
        };
    }

    private checkHighAmountRule(context: EnrichedContext): RuleResult {
        const { highAmount } = context.derivedFlags;
        return {
            ruleId: 'high_amount',
            ruleName: 'High Amount Transaction',
            triggered: highAmount,
            score: highAmount ? this.config.weights.highAmount : 0,
            factor: 'UNUSUAL_AMOUNT',
            reason: `Transaction amount ${context.transaction.amount} exceeds ${this.config.highAmountThreshold} threshold`
        };
    }

    private checkAmountSpikeRule(context: EnrichedContext): RuleResult {
        const ratio = context.derivedFlags.amountVsAverage;
        const isSpike = ratio > this.config.amountSpikeMultiple;
        return {
            ruleId: 'amount_spike',
            ruleName: 'Amount Spike vs History',
            triggered: isSpike,
            score: isSpike ? this.config.weights.amountSpike : 0,
            factor: 'UNUSUAL_AMOUNT',
            reason: `Amount is ${ratio.toFixed(1)}x the customer average (limit: ${this.config.amountSpikeMultiple}x)`
        };
    }

    private checkNewAccountRule(context: EnrichedContext): RuleResult {
        const { newAccount } = context.derivedFlags;
        return {
            ruleId: 'new_account',
            ruleName: 'New Account',
            triggered: newAccount,
            score: newAccount ? this.config.weights.newAccount : 0,
            factor: 'NEW_ACCOUNT_RISK',
            reason: `Account age ${context.customer.accountAgeDays ?? 'unknown'} days is under ${this.config.newAccountDays}`
        };
    }

    private checkDeviceTrustRule(context: EnrichedContext): RuleResult {
        const { lowDeviceTrust } = context.derivedFlags;
        return {
            ruleId: 'low_device_trust',
            ruleName: 'Low Device Trust',
            triggered: lowDeviceTrust,
            score: lowDeviceTrust ? this.config.weights.lowDeviceTrust : 0,
            factor: 'LOW_DEVICE_TRUST',
            reason: `Device trust ${context.customer.deviceTrustScore ?? 'unknown'} is below ${this.config.lowDeviceTrustThreshold}`
        };
    }

    private checkPastFraudRule(context: EnrichedContext): RuleResult {
        const { pastFraud } = context.derivedFlags;
        return {
            ruleId: 'past_fraud',
            ruleName: 'Previous Fraud',
            triggered: pastFraud,
            score: pastFraud ? this.config.weights.pastFraud : 0,
            factor: 'PREVIOUS_FRAUD_HISTORY',
            reason: 'Customer has a recorded fraud history'
        };
    }
}
