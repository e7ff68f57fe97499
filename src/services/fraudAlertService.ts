import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import { errorMessage } from '../middleware/errorHandler';
import type { AlertDispatcher } from '../types/collaborators';
import type { AlertOutcome, AlertRecord, AlertSeverity, DecisionAction } from '../types/report';
import type { Recommendation, RiskAssessment, RiskFactor } from '../types/risk';
import { withTimeout } from '../utils/timeout';

export const ALERT_SCORE_THRESHOLD = 75;

export const ALERT_TRIGGER_FACTORS: ReadonlyArray<RiskFactor> = [
    'SANCTIONS_CONCERN',
    'HIGH_RISK_JURISDICTION',
    'SUSPICIOUS_PATTERN',
    'REGULATORY_COMPLIANCE_VIOLATION'
];

const DECISION_BY_RECOMMENDATION: Record<Recommendation, DecisionAction> = {
    BLOCK: 'BLOCK',
    INVESTIGATE: 'INVESTIGATE',
    APPROVE: 'MONITOR'
};

export const isAlertEligible = (assessment: RiskAssessment): boolean =>
    assessment.score >= ALERT_SCORE_THRESHOLD
    || assessment.factors.some(factor => ALERT_TRIGGER_FACTORS.includes(factor));

export const severityForScore = (score: number): AlertSeverity => {
    if (score >= 90) return 'CRITICAL';
    if (score >= 75) return 'HIGH';
    if (score >= 50) return 'MEDIUM';
    return 'LOW';
};

export const assigneeForSeverity = (severity: AlertSeverity): string =>
    severity === 'HIGH' || severity === 'CRITICAL' ? 'fraud_investigation_team' : 'compliance_monitoring_team';

export const buildAlertRecord = (assessment: RiskAssessment): AlertRecord => {
    const severity = severityForScore(assessment.score);
    const factors = assessment.factors.length > 0 ? assessment.factors.join(', ') : 'none';

    return {
        alertId: `ALERT-${uuidv4()}`,
        transactionId: assessment.transactionId,
        severity,
        status: 'OPEN',
        decisionAction: DECISION_BY_RECOMMENDATION[assessment.recommendation],
        riskScore: assessment.score,
        riskFactors: [...assessment.factors],
        reasoning: `Risk score ${assessment.score} (${assessment.level}), recommendation ${assessment.recommendation}. `
            + `Risk factors: ${factors}.${assessment.degraded ? ' Assessment was rule-based only.' : ''}`,
        assignedTo: assigneeForSeverity(severity),
        createdAt: new Date().toISOString()
    };
};

export interface FraudAlertOptions {
    dispatchTimeoutMs: number;
}

export class FraudAlertService {

    constructor(
        private readonly dispatcher: AlertDispatcher,
        private readonly options: FraudAlertOptions
    ) {}

    async process(assessment: RiskAssessment): Promise<AlertOutcome> {
        const { transactionId } = assessment;

        if (!isAlertEligible(assessment)) {
            logger.info('No alert required', { transactionId, score: assessment.score });
            return {
                outcome: 'NO_ACTION',
                transactionId,
                decisionAction: 'ALLOW',
                reason: `Risk score ${assessment.score} is below ${ALERT_SCORE_THRESHOLD} and no alert-triggering factor is present`
            };
        }

        const alert = buildAlertRecord(assessment);

        try {
            const ack = await withTimeout(
                'alert dispatch',
                this.options.dispatchTimeoutMs,
                signal => this.dispatcher.sendAlert(alert, { signal })
            );
            logger.info('Fraud alert dispatched', {
                transactionId,
                alertId: alert.alertId,
                severity: alert.severity,
                accepted: ack.accepted
            });
            return { outcome: 'ALERT_CREATED', transactionId, alert, ack };
        } catch (error) {
            logger.error('Fraud alert dispatch failed', {
                transactionId,
                alertId: alert.alertId,
                error: errorMessage(error)
            });
            return { outcome: 'DISPATCH_FAILED', transactionId, alert, error: errorMessage(error) };
        }
    }
}
