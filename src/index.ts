import type { Server } from 'http';
import { createApp } from './app';
import { loadConfig } from './config';
import { createPool, createQueryRunner, testConnection } from './config/database';
import { configureLogger, logger } from './config/logger';
import { createCacheClient, createRedisClient, testRedisConnection } from './config/redis';
import { createScoringConfig } from './config/scoring';
import { HttpAlertDispatcher } from './services/alertDispatcher';
import { ComplianceAuditService } from './services/complianceAuditService';
import { EnrichmentService } from './services/enrichmentService';
import { FraudAlertService } from './services/fraudAlertService';
import { HttpReasoningService } from './services/reasoningService';
import { RiskScoringService } from './services/riskScoringService';
import { RuleEngineService } from './services/ruleEngineService';
import { createMetricsRegistry } from './services/telemetry';
import { CachedTransactionStore, PostgresTransactionStore } from './services/transactionStore';
import { FraudWorkflow } from './workflow/fraudWorkflow';

const config = loadConfig();
configureLogger(config);

const pool = createPool(config.database);
const redis = createRedisClient(config.redis);

const scoringConfig = createScoringConfig({ weights: config.riskWeights });
const store = new CachedTransactionStore(
    new PostgresTransactionStore(createQueryRunner(pool)),
    createCacheClient(redis),
    config.redis.cacheTtlSeconds
);
const reasoning = new HttpReasoningService(config.reasoning);
const metrics = createMetricsRegistry();

const workflow = new FraudWorkflow({
    enrichment: new EnrichmentService(store, scoringConfig),
    scoring: new RiskScoringService(new RuleEngineService(scoringConfig), reasoning, {
        reasoningTimeoutMs: config.reasoning.timeoutMs
    }),
    audit: new ComplianceAuditService(reasoning, {
        advisoryEnabled: config.auditAdvisoryEnabled,
        reasoningTimeoutMs: config.reasoning.timeoutMs
    }),
    alerts: new FraudAlertService(new HttpAlertDispatcher(config.alerts), {
        dispatchTimeoutMs: config.alerts.timeoutMs
    }),
    metrics
});

const app = createApp({ workflow, metrics });

const start = async (): Promise<Server> => {
    const [databaseReady, cacheReady, reasoningReady] = await Promise.all([
        testConnection(pool),
        testRedisConnection(redis),
        reasoning.healthCheck()
    ]);
    if (!databaseReady) {
        logger.warn('Database is unreachable; workflow runs will fail at enrichment until it recovers');
    }
    if (!cacheReady) {
        logger.warn('Redis is unreachable; lookups will bypass the cache');
    }
    if (!reasoningReady) {
        logger.warn('Reasoning service is unreachable; assessments will fall back to rule-based scoring');
    }

    return app.listen(config.port, () => {
        logger.info(`Transaction Risk Workflow API running on port ${config.port}`);
        logger.info(`Health check: http://localhost:${config.port}/health`);
        logger.info(`API Base URL: http://localhost:${config.port}/api`);
    });
};

start()
    .then(server => {
        const shutdown = (signal: NodeJS.Signals): void => {
            logger.info(`${signal} signal received: closing HTTP server`);
            server.close(() => {
                logger.info('HTTP server closed');
                Promise.allSettled([pool.end(), redis.quit()])
                    .then(results => {
                        for (const result of results) {
                            if (result.status === 'rejected') {
                                logger.error('Error closing connection', { error: String(result.reason) });
                            }
                        }
                        process.exit(0);
                    })
                    .catch(error => {
                        logger.error('Shutdown failed', { error: String(error) });
                        process.exit(1);
                    });
            });
        };

        process.on('SIGTERM', shutdown);
        process.on('SIGINT', shutdown);
    })
    .catch(error => {
        logger.error('Failed to start server', { error: String(error) });
        process.exit(1);
    });
