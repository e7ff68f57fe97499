import type { RiskFactor, RiskLevel } from './risk';

export type ComplianceRating =
    | 'COMPLIANT'
    | 'CONDITIONAL_COMPLIANCE'
    | 'NON_COMPLIANT'
    | 'REVIEW_REQUIRED';

export interface ComplianceStatus {
    complianceRating: ComplianceRating;
    requiresImmediateAction: boolean;
    requiresEnhancedMonitoring: boolean;
    requiresRegulatoryFiling: boolean;
}

export interface AuditReport extends ComplianceStatus {
    reportId: string;
    transactionId: string;
    riskScore: number;
    riskLevel: RiskLevel;
    riskFactorsIdentified: RiskFactor[];
    complianceConcerns: string[];
    recommendations: string[];
    auditConclusion: string;
    advisoryNotes?: string;
    generatedAt: string;
}

export type AlertSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export type AlertStatus = 'OPEN' | 'INVESTIGATING' | 'RESOLVED' | 'FALSE_POSITIVE';

export type DecisionAction = 'ALLOW' | 'BLOCK' | 'MONITOR' | 'INVESTIGATE';

export interface AlertRecord {
    alertId: string;
    transactionId: string;
    severity: AlertSeverity;
    status: AlertStatus;
    decisionAction: DecisionAction;
    riskScore: number;
    riskFactors: RiskFactor[];
    reasoning: string;
    assignedTo: string;
    createdAt: string;
}

export interface AlertAck {
    alertId: string;
    accepted: boolean;
    reference?: string;
}

export type AlertOutcome =
    | {
        outcome: 'NO_ACTION';
        transactionId: string;
        decisionAction: 'ALLOW';
        reason: string;
    }
    | {
        outcome: 'ALERT_CREATED';
        transactionId: string;
        alert: AlertRecord;
        ack: AlertAck;
    }
    | {
        outcome: 'DISPATCH_FAILED';
        transactionId: string;
        alert: AlertRecord;
        error: string;
    };
