import { logger } from '../config/logger';
import { StageFailureError, errorMessage } from '../middleware/errorHandler';
import type { ComplianceAuditService } from '../services/complianceAuditService';
import type { EnrichmentService } from '../services/enrichmentService';
import type { FraudAlertService } from '../services/fraudAlertService';
import type { RiskScoringService } from '../services/riskScoringService';
import { METRIC_NAMES, Tracer, type MetricsRegistry } from '../services/telemetry';
import type { AlertOutcome, AuditReport } from '../types/report';
import type { Recommendation, RiskAssessment } from '../types/risk';
import type { EnrichedContext } from '../types/transaction';
import type { BatchItem, BatchSummary, WorkflowResult } from '../types/workflow';
import { defineExecutor } from './executor';
import { WorkflowGraph } from './graph';

export const STAGE_IDS = {
    enrichment: 'enrichment',
    riskScoring: 'risk_scoring',
    complianceAudit: 'compliance_audit',
    fraudAlert: 'fraud_alert'
} as const;

export interface FraudWorkflowDeps {
    enrichment: EnrichmentService;
    scoring: RiskScoringService;
    audit: ComplianceAuditService;
    alerts: FraudAlertService;
    metrics: MetricsRegistry;
}

export class FraudWorkflow {
    private readonly graph: WorkflowGraph<string, EnrichedContext, RiskAssessment, AuditReport, AlertOutcome>;
    private readonly metrics: MetricsRegistry;

    constructor(deps: FraudWorkflowDeps) {
        this.metrics = deps.metrics;
        this.graph = new WorkflowGraph({
            source: defineExecutor<string, EnrichedContext>(STAGE_IDS.enrichment, async (transactionId, { span }) => {
                const context = await deps.enrichment.enrich(transactionId);
                span.setAttribute('transactionId', transactionId);
                span.setAttribute('customerFound', context.customerFound);
                span.setAttribute('warnings', context.warnings.length);
                return context;
            }),
            relay: defineExecutor<EnrichedContext, RiskAssessment>(STAGE_IDS.riskScoring, async (context, { span }) => {
                const assessment = await deps.scoring.assess(context);
                span.setAttribute('risk.score', assessment.score);
                span.setAttribute('risk.recommendation', assessment.recommendation);
                span.setAttribute('risk.degraded', assessment.degraded);
                this.metrics.observe(METRIC_NAMES.riskScore, assessment.score);
                this.metrics.increment(METRIC_NAMES.riskRecommendations, { recommendation: assessment.recommendation });
                return assessment;
            }),
            sinks: [
                defineExecutor<RiskAssessment, AuditReport>(STAGE_IDS.complianceAudit, async (assessment, { span }) => {
                    const report = await deps.audit.audit(assessment);
                    span.setAttribute('audit.rating', report.complianceRating);
                    this.metrics.increment(METRIC_NAMES.auditRatings, { rating: report.complianceRating });
                    return report;
                }),
                defineExecutor<RiskAssessment, AlertOutcome>(STAGE_IDS.fraudAlert, async (assessment, { span }) => {
                    const outcome = await deps.alerts.process(assessment);
                    span.setAttribute('alert.outcome', outcome.outcome);
                    this.metrics.increment(METRIC_NAMES.alertOutcomes, { outcome: outcome.outcome });
                    return outcome;
                })
            ]
        });
    }

    async runWorkflow(transactionId: string): Promise<WorkflowResult> {
        const startTime = Date.now();
        const tracer = new Tracer(this.metrics);

        logger.info('Workflow started', { transactionId });

        try {
            const { relayOutput, branches } = await this.graph.run(transactionId, tracer);
            const [audit, alert] = branches;
            const durationMs = Date.now() - startTime;

            this.metrics.increment(METRIC_NAMES.workflowRuns, { status: 'completed' });
            logger.info('Workflow completed', {
                transactionId,
                score: relayOutput.score,
                recommendation: relayOutput.recommendation,
                audit: audit.status,
                alert: alert.status,
                durationMs
            });

            return {
                transactionId,
                assessment: relayOutput,
                audit,
                alert,
                spans: tracer.spans,
                durationMs
            };
        } catch (error) {
            const stage = error instanceof StageFailureError ? error.stage : 'workflow';
            this.metrics.increment(METRIC_NAMES.workflowRuns, { status: 'failed' });
            this.metrics.increment(METRIC_NAMES.workflowFailures, { stage });
            logger.error('Workflow failed', { transactionId, stage, error: errorMessage(error) });
            throw error;
        }
    }

    /** Runs each transaction in turn; a fatal failure is recorded and the batch moves on. */
    async runBatch(transactionIds: ReadonlyArray<string>): Promise<BatchSummary> {
        const startTime = Date.now();
        const items: BatchItem[] = [];
        const recommendations: Record<Recommendation, number> = { APPROVE: 0, INVESTIGATE: 0, BLOCK: 0 };
        const alerts: BatchSummary['alerts'] = { NO_ACTION: 0, ALERT_CREATED: 0, DISPATCH_FAILED: 0, BRANCH_ERROR: 0 };

        for (const transactionId of transactionIds) {
            try {
                const result = await this.runWorkflow(transactionId);
                recommendations[result.assessment.recommendation] += 1;
                alerts[result.alert.status === 'fulfilled' ? result.alert.value.outcome : 'BRANCH_ERROR'] += 1;
                items.push({
                    transactionId,
                    status: 'COMPLETED',
                    score: result.assessment.score,
                    recommendation: result.assessment.recommendation,
                    complianceRating: result.audit.status === 'fulfilled' ? result.audit.value.complianceRating : null,
                    alertOutcome: result.alert.status === 'fulfilled' ? result.alert.value.outcome : null
                });
            } catch (error) {
                items.push({
                    transactionId,
                    status: 'FAILED',
                    stage: error instanceof StageFailureError ? error.stage : 'workflow',
                    error: errorMessage(error)
                });
            }
        }

        const completed = items.filter(item => item.status === 'COMPLETED').length;
        const summary: BatchSummary = {
            total: transactionIds.length,
            completed,
            failed: items.length - completed,
            recommendations,
            alerts,
            items,
            durationMs: Date.now() - startTime
        };

        logger.info('Batch completed', {
            total: summary.total,
            completed: summary.completed,
            failed: summary.failed,
            durationMs: summary.durationMs
        });

        return summary;
    }
}
