import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import { errorMessage } from '../middleware/errorHandler';
import type { ReasoningService } from '../types/collaborators';
import type { AuditReport, ComplianceStatus } from '../types/report';
import { mergeFactors, type RiskAssessment, type RiskFactor } from '../types/risk';
import { withTimeout } from '../utils/timeout';
import { DEFAULT_LEXICON, parseNarrative, type NarrativeLexicon } from './narrativeParser';
import { buildAuditPrompt } from './promptBuilder';

export const COMPLIANCE_THRESHOLDS = {
    nonCompliant: 75,
    conditional: 50
} as const;

const FILING_FACTORS: ReadonlyArray<RiskFactor> = ['HIGH_RISK_JURISDICTION', 'SANCTIONS_CONCERN'];

export const AUDIT_RECOMMENDATIONS = {
    immediateAction: [
        'Freeze transaction pending investigation',
        'Conduct enhanced customer due diligence',
        'Escalate to compliance officer for immediate review'
    ],
    enhancedMonitoring: [
        'Place customer on enhanced monitoring list',
        'Review transaction against internal risk policies'
    ],
    regulatoryFiling: [
        'File Suspicious Activity Report (SAR)',
        'Notify relevant regulatory authorities',
        'Maintain detailed transaction records'
    ],
    reviewRequired: [
        'Schedule compliance review once full risk analysis is available'
    ],
    standard: [
        'Continue standard monitoring procedures'
    ]
} as const;

const FACTOR_CONCERNS: Record<RiskFactor, string> = {
    HIGH_RISK_JURISDICTION: 'Transaction involves a high-risk jurisdiction',
    SANCTIONS_CONCERN: 'Potential sanctions exposure requires screening',
    UNUSUAL_AMOUNT: 'Transaction amount is unusual for this customer',
    SUSPICIOUS_PATTERN: 'Suspicious transaction pattern identified',
    FREQUENCY_ANOMALY: 'Transaction frequency deviates from the customer baseline',
    PREVIOUS_FRAUD_HISTORY: 'Customer has a previous fraud history',
    NEW_ACCOUNT_RISK: 'Account was opened recently',
    LOW_DEVICE_TRUST: 'Transaction originated from a low-trust device',
    CROSS_BORDER: 'Cross-border transfer subject to additional reporting rules',
    REGULATORY_COMPLIANCE_VIOLATION: 'Possible regulatory compliance violation'
};

export interface ComplianceAuditOptions {
    advisoryEnabled: boolean;
    reasoningTimeoutMs: number;
    lexicon?: NarrativeLexicon;
}

/** Factors the audit works from: the assessment's own set plus whatever its narrative states. */
export const auditFactors = (
    assessment: RiskAssessment,
    lexicon: NarrativeLexicon = DEFAULT_LEXICON
): RiskFactor[] => mergeFactors(assessment.factors, parseNarrative(assessment.narrative, lexicon).factors);

export const deriveComplianceStatus = (
    assessment: RiskAssessment,
    factors: ReadonlyArray<RiskFactor> = auditFactors(assessment)
): ComplianceStatus => {
    const requiresRegulatoryFiling = FILING_FACTORS.some(factor => factors.includes(factor));

    if (assessment.score >= COMPLIANCE_THRESHOLDS.nonCompliant) {
        return {
            complianceRating: 'NON_COMPLIANT',
            requiresImmediateAction: true,
            requiresEnhancedMonitoring: false,
            requiresRegulatoryFiling
        };
    }

    if (assessment.score >= COMPLIANCE_THRESHOLDS.conditional) {
        return {
            complianceRating: 'CONDITIONAL_COMPLIANCE',
            requiresImmediateAction: false,
            requiresEnhancedMonitoring: true,
            requiresRegulatoryFiling
        };
    }

    return {
        complianceRating: assessment.degraded ? 'REVIEW_REQUIRED' : 'COMPLIANT',
        requiresImmediateAction: false,
        requiresEnhancedMonitoring: false,
        requiresRegulatoryFiling
    };
};

export const buildRecommendations = (status: ComplianceStatus): string[] => {
    const recommendations: string[] = [];
    if (status.requiresImmediateAction) {
        recommendations.push(...AUDIT_RECOMMENDATIONS.immediateAction);
    }
    if (status.requiresEnhancedMonitoring) {
        recommendations.push(...AUDIT_RECOMMENDATIONS.enhancedMonitoring);
    }
    if (status.requiresRegulatoryFiling) {
        recommendations.push(...AUDIT_RECOMMENDATIONS.regulatoryFiling);
    }
    if (status.complianceRating === 'REVIEW_REQUIRED') {
        recommendations.push(...AUDIT_RECOMMENDATIONS.reviewRequired);
    }
    if (recommendations.length === 0) {
        recommendations.push(...AUDIT_RECOMMENDATIONS.standard);
    }
    return recommendations;
};

const buildConclusion = (assessment: RiskAssessment, status: ComplianceStatus): string => {
    const filing = status.requiresRegulatoryFiling ? ' Regulatory filing is required.' : '';
    switch (status.complianceRating) {
        case 'NON_COMPLIANT':
            return `Transaction ${assessment.transactionId} is non-compliant (risk score ${assessment.score}) and requires immediate action.${filing}`;
        case 'CONDITIONAL_COMPLIANCE':
            return `Transaction ${assessment.transactionId} is conditionally compliant (risk score ${assessment.score}) subject to enhanced monitoring.${filing}`;
        case 'REVIEW_REQUIRED':
            return `Transaction ${assessment.transactionId} was assessed on rules only (risk score ${assessment.score}); compliance cannot be confirmed until a full review.${filing}`;
        case 'COMPLIANT':
            return `Transaction ${assessment.transactionId} is compliant (risk score ${assessment.score}).${filing}`;
    }
};

export class ComplianceAuditService {
    private readonly lexicon: NarrativeLexicon;

    constructor(
        private readonly reasoning: ReasoningService,
        private readonly options: ComplianceAuditOptions
    ) {
        this.lexicon = options.lexicon ?? DEFAULT_LEXICON;
    }

    async audit(assessment: RiskAssessment): Promise<AuditReport> {
        const factors = auditFactors(assessment, this.lexicon);
        const status = deriveComplianceStatus(assessment, factors);
        const advisoryNotes = await this.fetchAdvisoryNotes(assessment);

        const report: AuditReport = {
            reportId: `AUDIT-${uuidv4()}`,
            transactionId: assessment.transactionId,
            ...status,
            riskScore: assessment.score,
            riskLevel: assessment.level,
            riskFactorsIdentified: factors,
            complianceConcerns: factors.map(factor => FACTOR_CONCERNS[factor]),
            recommendations: buildRecommendations(status),
            auditConclusion: buildConclusion(assessment, status),
            ...(advisoryNotes ? { advisoryNotes } : {}),
            generatedAt: new Date().toISOString()
        };

        logger.info('Compliance audit completed', {
            transactionId: assessment.transactionId,
            reportId: report.reportId,
            complianceRating: report.complianceRating,
            requiresRegulatoryFiling: report.requiresRegulatoryFiling
        });

        return report;
    }

    private async fetchAdvisoryNotes(assessment: RiskAssessment): Promise<string | undefined> {
        if (!this.options.advisoryEnabled) {
            return undefined;
        }

        try {
            const notes = await withTimeout(
                'audit advisory',
                this.options.reasoningTimeoutMs,
                signal => this.reasoning.run(buildAuditPrompt(assessment), { signal })
            );
            return notes.trim() || undefined;
        } catch (error) {
            logger.warn('Audit advisory notes unavailable', {
                transactionId: assessment.transactionId,
                error: errorMessage(error)
            });
            return undefined;
        }
    }
}
