import { describe, it, expect } from 'vitest';
import { METRIC_NAMES, MetricsRegistry, Tracer, createMetricsRegistry } from '../src/services/telemetry';

describe('MetricsRegistry', () => {
    it('counts per label set regardless of label order', () => {
        const metrics = new MetricsRegistry();

        metrics.increment('workflow.runs', { status: 'completed', source: 'api' });
        metrics.increment('workflow.runs', { source: 'api', status: 'completed' });
        metrics.increment('workflow.runs', { source: 'api', status: 'failed' }, 3);

        expect(metrics.counterValue('workflow.runs', { status: 'completed', source: 'api' })).toBe(2);
        expect(metrics.counterValue('workflow.runs', { status: 'failed', source: 'api' })).toBe(3);
        expect(metrics.counterValue('workflow.runs', { status: 'unknown' })).toBe(0);
    });

    it('keeps cumulative histogram buckets', () => {
        const metrics = createMetricsRegistry();

        metrics.observe(METRIC_NAMES.riskScore, 20);
        metrics.observe(METRIC_NAMES.riskScore, 80);

        expect(metrics.snapshot().histograms[METRIC_NAMES.riskScore]).toEqual([{
            labels: {},
            count: 2,
            sum: 100,
            min: 20,
            max: 80,
            buckets: [
                { le: 10, count: 0 },
                { le: 25, count: 1 },
                { le: 45, count: 1 },
                { le: 50, count: 1 },
                { le: 75, count: 1 },
                { le: 90, count: 2 },
                { le: 100, count: 2 }
            ]
        }]);
    });

    it('clears all series on reset', () => {
        const metrics = createMetricsRegistry();
        metrics.increment(METRIC_NAMES.alertOutcomes, { outcome: 'NO_ACTION' });
        metrics.observe(METRIC_NAMES.riskScore, 40);

        metrics.reset();

        expect(metrics.snapshot()).toEqual({
            counters: {},
            histograms: { [METRIC_NAMES.riskScore]: [], [METRIC_NAMES.stageDuration]: [] }
        });
    });
});

describe('Tracer', () => {
    it('records a finished span with its attributes', async () => {
        const tracer = new Tracer();

        const result = await tracer.span('enrichment', { kind: 'source' }, async span => {
            span.setAttribute('warnings', 0);
            return 'ok';
        });

        expect(result).toBe('ok');
        expect(tracer.spans).toHaveLength(1);
        expect(tracer.spans[0].name).toBe('enrichment');
        expect(tracer.spans[0].status).toBe('ok');
        expect(tracer.spans[0].attributes).toEqual({ kind: 'source', warnings: 0 });
        expect(tracer.spans[0].error).toBeUndefined();
    });

    it('records a failed span and rethrows', async () => {
        const tracer = new Tracer();

        await expect(tracer.span('risk_scoring', {}, async () => {
            throw new Error('scoring broke');
        })).rejects.toThrow('scoring broke');

        expect(tracer.spans[0].status).toBe('error');
        expect(tracer.spans[0].error).toBe('scoring broke');
    });

    it('times each stage into the registry', async () => {
        const metrics = createMetricsRegistry();
        const tracer = new Tracer(metrics);

        await tracer.span('compliance_audit', {}, async () => undefined);
        await tracer.span('fraud_alert', {}, async () => undefined);

        const series = metrics.snapshot().histograms[METRIC_NAMES.stageDuration];
        expect(series.map(sample => [sample.labels.stage, sample.count])).toEqual([
            ['compliance_audit', 1],
            ['fraud_alert', 1]
        ]);
    });

    it('hands out copies of its spans', async () => {
        const tracer = new Tracer();
        await tracer.span('enrichment', { kind: 'source' }, async () => undefined);

        tracer.spans[0].attributes.kind = 'changed';

        expect(tracer.spans[0].attributes.kind).toBe('source');
    });
});
