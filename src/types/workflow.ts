import type { RiskAssessment, Recommendation } from './risk';
import type { AlertOutcome, AuditReport } from './report';

export interface BranchError {
    stage: string;
    name: string;
    message: string;
}

export type BranchResult<T> =
    | { status: 'fulfilled'; value: T }
    | { status: 'rejected'; error: BranchError };

export type SpanStatus = 'ok' | 'error';

export type SpanAttributes = Record<string, string | number | boolean>;

export interface StageSpan {
    name: string;
    status: SpanStatus;
    startedAt: string;
    endedAt: string;
    durationMs: number;
    attributes: SpanAttributes;
    error?: string;
}

export interface WorkflowResult {
    transactionId: string;
    assessment: RiskAssessment;
    audit: BranchResult<AuditReport>;
    alert: BranchResult<AlertOutcome>;
    spans: StageSpan[];
    durationMs: number;
}

export type BatchItem =
    | {
        transactionId: string;
        status: 'COMPLETED';
        score: number;
        recommendation: Recommendation;
        complianceRating: string | null;
        alertOutcome: AlertOutcome['outcome'] | null;
    }
    | {
        transactionId: string;
        status: 'FAILED';
        stage: string;
        error: string;
    };

export interface BatchSummary {
    total: number;
    completed: number;
    failed: number;
    recommendations: Record<Recommendation, number>;
    alerts: Record<AlertOutcome['outcome'] | 'BRANCH_ERROR', number>;
    items: BatchItem[];
    durationMs: number;
}
