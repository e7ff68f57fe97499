import { Router } from 'express';
import type { MetricsRegistry, MetricsSnapshot } from '../services/telemetry';
import type { ApiResponse } from '../types/api';
import type { FraudWorkflow } from '../workflow/fraudWorkflow';
import { createWorkflowRouter } from './workflow';

export interface RouteDeps {
    workflow: FraudWorkflow;
    metrics: MetricsRegistry;
}

export const createRoutes = ({ workflow, metrics }: RouteDeps): Router => {
    const router = Router();

    router.use('/workflow', createWorkflowRouter(workflow));

    router.get('/', (req, res) => {
        res.json({
            name: 'Transaction Risk Workflow API',
            version: '1.0.0',
            description: 'Fraud and compliance screening workflow for financial transactions',
            status: 'Active',
            endpoints: {
                'POST /api/workflow/run': 'Run the screening workflow for one transaction',
                'POST /api/workflow/batch': 'Run the workflow for up to 100 transactions in sequence',
                'GET /api/metrics': 'Workflow counters and histograms',
                'GET /health': 'System health check',
                'GET /api': 'This API information'
            },
            timestamp: new Date().toISOString(),
            environment: process.env.NODE_ENV || 'development'
        });
    });

    router.get('/metrics', (req, res) => {
        const response: ApiResponse<MetricsSnapshot> = {
            success: true,
            data: metrics.snapshot(),
            timestamp: new Date().toISOString()
        };
        res.json(response);
    });

    return router;
};
