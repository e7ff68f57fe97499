import type { Server } from 'http';
import axios, { type AxiosInstance } from 'axios';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app';
import { ComplianceAuditService } from '../src/services/complianceAuditService';
import { EnrichmentService } from '../src/services/enrichmentService';
import { FraudAlertService } from '../src/services/fraudAlertService';
import { RiskScoringService } from '../src/services/riskScoringService';
import { RuleEngineService } from '../src/services/ruleEngineService';
import { createMetricsRegistry } from '../src/services/telemetry';
import { FraudWorkflow } from '../src/workflow/fraudWorkflow';
import {
    FakeReasoningService,
    InMemoryTransactionStore,
    RecordingAlertDispatcher,
    makeCustomer,
    makeTransaction
} from './helpers/fakes';
import { close, listen } from './helpers/http';

describe('HTTP API', () => {
    let server: Server;
    let client: AxiosInstance;

    beforeEach(async () => {
        const reasoning = FakeReasoningService.replying('Risk Score: 95\nRisk Level: HIGH');
        const metrics = createMetricsRegistry();
        const workflow = new FraudWorkflow({
            enrichment: new EnrichmentService(new InMemoryTransactionStore([makeTransaction()], [makeCustomer()])),
            scoring: new RiskScoringService(new RuleEngineService(), reasoning, { reasoningTimeoutMs: 1000 }),
            audit: new ComplianceAuditService(reasoning, { advisoryEnabled: false, reasoningTimeoutMs: 1000 }),
            alerts: new FraudAlertService(new RecordingAlertDispatcher(), { dispatchTimeoutMs: 1000 }),
            metrics
        });

        const running = await listen(createApp({ workflow, metrics }));
        server = running.server;
        client = axios.create({ baseURL: running.url, validateStatus: () => true });
    });

    afterEach(() => close(server));

    it('runs the workflow for one transaction', async () => {
        const response = await client.post('/api/workflow/run', { transactionId: ' TX1001 ' });

        expect(response.status).toBe(200);
        expect(response.data.success).toBe(true);
        expect(response.data.data.transactionId).toBe('TX1001');
        expect(response.data.data.assessment.score).toBe(95);
        expect(response.data.data.alert.value.outcome).toBe('ALERT_CREATED');
    });

    it('rejects a request without a transaction id', async () => {
        const response = await client.post('/api/workflow/run', {});

        expect(response.status).toBe(400);
        expect(response.data.success).toBe(false);
        expect(response.data.error).toBe('ValidationError');
        expect(response.data.message).toBe('Invalid request data: "transactionId" is required');
    });

    it('maps an unknown transaction to 404', async () => {
        const response = await client.post('/api/workflow/run', { transactionId: 'TX404' });

        expect(response.status).toBe(404);
        expect(response.data.error).toBe('StageFailureError');
        expect(response.data.message).toBe("Stage 'enrichment' failed: Transaction TX404 not found");
    });

    it('runs a batch', async () => {
        const response = await client.post('/api/workflow/batch', { transactionIds: ['TX1001', 'TX404'] });

        expect(response.status).toBe(200);
        expect(response.data.message).toBe('Processed 2 transactions: 1 completed, 1 failed');
        expect(response.data.data.items.map((item: { status: string }) => item.status)).toEqual(['COMPLETED', 'FAILED']);
    });

    it('rejects an empty batch', async () => {
        const response = await client.post('/api/workflow/batch', { transactionIds: [] });

        expect(response.status).toBe(400);
        expect(response.data.message).toBe('Invalid request data: "transactionIds" must contain at least 1 items');
    });

    it('exposes metrics', async () => {
        await client.post('/api/workflow/run', { transactionId: 'TX1001' });

        const response = await client.get('/api/metrics');

        expect(response.status).toBe(200);
        expect(response.data.data.counters['workflow.runs']).toEqual([{ labels: { status: 'completed' }, value: 1 }]);
        expect(response.data.data.histograms['risk.score'][0].count).toBe(1);
    });

    it('reports health', async () => {
        const response = await client.get('/health');

        expect(response.status).toBe(200);
        expect(response.data.status).toBe('OK');
    });

    it('answers unknown paths with 404', async () => {
        const response = await client.get('/api/unknown');

        expect(response.status).toBe(404);
        expect(response.data).toEqual({
            success: false,
            error: 'Endpoint not found',
            path: '/api/unknown',
            method: 'GET'
        });
    });
});
