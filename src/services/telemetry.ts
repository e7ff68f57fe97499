import { logger } from '../config/logger';
import { errorMessage } from '../middleware/errorHandler';
import type { SpanAttributes, StageSpan } from '../types/workflow';

export type MetricLabels = Record<string, string>;

export interface CounterSample {
    labels: MetricLabels;
    value: number;
}

export interface HistogramSample {
    labels: MetricLabels;
    count: number;
    sum: number;
    min: number;
    max: number;
    /** Cumulative: each entry counts observations less than or equal to `le`. */
    buckets: Array<{ le: number; count: number }>;
}

export interface MetricsSnapshot {
    counters: Record<string, CounterSample[]>;
    histograms: Record<string, HistogramSample[]>;
}

export const METRIC_NAMES = {
    workflowRuns: 'workflow.runs',
    workflowFailures: 'workflow.failures',
    riskScore: 'risk.score',
    riskRecommendations: 'risk.recommendations',
    auditRatings: 'audit.ratings',
    alertOutcomes: 'alert.outcomes',
    stageDuration: 'stage.duration_ms'
} as const;

export const SCORE_BUCKETS = [10, 25, 45, 50, 75, 90, 100];
export const DURATION_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

const labelKey = (labels: MetricLabels): string =>
    Object.keys(labels)
        .sort()
        .map(key => `${key}=${labels[key]}`)
        .join(',');

interface HistogramState {
    labels: MetricLabels;
    count: number;
    sum: number;
    min: number;
    max: number;
    bucketCounts: number[];
}

/**
 * In-process counters and histograms. Updates are synchronous, so concurrent
 * sinks on the event loop never interleave inside a single increment.
 */
export class MetricsRegistry {
    private counters = new Map<string, Map<string, CounterSample>>();
    private histograms = new Map<string, { bounds: number[]; series: Map<string, HistogramState> }>();

    increment(name: string, labels: MetricLabels = {}, by: number = 1): void {
        let series = this.counters.get(name);
        if (!series) {
            series = new Map();
            this.counters.set(name, series);
        }

        const key = labelKey(labels);
        const sample = series.get(key);
        if (sample) {
            sample.value += by;
        } else {
            series.set(key, { labels: { ...labels }, value: by });
        }
    }

    registerHistogram(name: string, bounds: number[]): void {
        if (!this.histograms.has(name)) {
            this.histograms.set(name, { bounds: [...bounds].sort((a, b) => a - b), series: new Map() });
        }
    }

    observe(name: string, value: number, labels: MetricLabels = {}): void {
        this.registerHistogram(name, DURATION_BUCKETS);
        const histogram = this.histograms.get(name);
        if (!histogram) {
            return;
        }

        const key = labelKey(labels);
        let existing = histogram.series.get(key);
        if (!existing) {
            existing = {
                labels: { ...labels },
                count: 0,
                sum: 0,
                min: value,
                max: value,
                bucketCounts: histogram.bounds.map(() => 0)
            };
            histogram.series.set(key, existing);
        }
        const state = existing;

        state.count += 1;
        state.sum += value;
        state.min = Math.min(state.min, value);
        state.max = Math.max(state.max, value);
        histogram.bounds.forEach((bound, index) => {
            if (value <= bound) {
                state.bucketCounts[index] += 1;
            }
        });
    }

    counterValue(name: string, labels: MetricLabels = {}): number {
        return this.counters.get(name)?.get(labelKey(labels))?.value ?? 0;
    }

    snapshot(): MetricsSnapshot {
        const counters: Record<string, CounterSample[]> = {};
        for (const [name, series] of this.counters) {
            counters[name] = [...series.values()].map(sample => ({
                labels: { ...sample.labels },
                value: sample.value
            }));
        }

        const histograms: Record<string, HistogramSample[]> = {};
        for (const [name, { bounds, series }] of this.histograms) {
            histograms[name] = [...series.values()].map(state => ({
                labels: { ...state.labels },
                count: state.count,
                sum: state.sum,
                min: state.min,
                max: state.max,
                buckets: bounds.map((le, index) => ({ le, count: state.bucketCounts[index] }))
            }));
        }

        return { counters, histograms };
    }

    reset(): void {
        this.counters.clear();
        for (const histogram of this.histograms.values()) {
            histogram.series.clear();
        }
    }
}

export const createMetricsRegistry = (): MetricsRegistry => {
    const registry = new MetricsRegistry();
    registry.registerHistogram(METRIC_NAMES.riskScore, SCORE_BUCKETS);
    registry.registerHistogram(METRIC_NAMES.stageDuration, DURATION_BUCKETS);
    return registry;
};

export interface SpanHandle {
    setAttribute(key: string, value: string | number | boolean): void;
}

/**
 * Collects the spans of one workflow run. Each finished span is also timed
 * into the shared `stage.duration_ms` histogram when a registry is attached.
 */
export class Tracer {
    private finished: StageSpan[] = [];

    constructor(private readonly metrics?: MetricsRegistry) {}

    async span<T>(
        name: string,
        attributes: SpanAttributes,
        fn: (span: SpanHandle) => Promise<T>
    ): Promise<T> {
        const started = new Date();
        const startMs = Date.now();
        const spanAttributes: SpanAttributes = { ...attributes };
        const handle: SpanHandle = {
            setAttribute: (key, value) => {
                spanAttributes[key] = value;
            }
        };

        const finish = (failed: boolean, error?: unknown): StageSpan => {
            const durationMs = Date.now() - startMs;
            const span: StageSpan = {
                name,
                status: failed ? 'error' : 'ok',
                startedAt: started.toISOString(),
                endedAt: new Date().toISOString(),
                durationMs,
                attributes: spanAttributes
            };
            if (failed) {
                span.error = errorMessage(error);
            }
            this.finished.push(span);
            this.metrics?.observe(METRIC_NAMES.stageDuration, durationMs, { stage: name });
            return span;
        };

        try {
            const result = await fn(handle);
            const span = finish(false);
            logger.debug(`Span ${name} completed`, { durationMs: span.durationMs, attributes: span.attributes });
            return result;
        } catch (error) {
            const span = finish(true, error);
            logger.warn(`Span ${name} failed`, { durationMs: span.durationMs, error: span.error });
            throw error;
        }
    }

    get spans(): StageSpan[] {
        return this.finished.map(span => ({ ...span, attributes: { ...span.attributes } }));
    }
}
