import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';
import { configureLogger, logger } from '../src/config/logger';

describe('loadConfig', () => {
    it('applies defaults for an empty environment', () => {
        const config = loadConfig({});

        expect(config.port).toBe(3000);
        expect(config.env).toBe('development');
        expect(config.database).toEqual({
            host: 'localhost',
            port: 5432,
            database: 'risk_screening',
            user: 'risk_user',
            password: ''
        });
        expect(config.redis).toEqual({ host: 'localhost', port: 6379, password: undefined, cacheTtlSeconds: 300 });
        expect(config.reasoning).toEqual({ url: 'http://localhost:5000', apiKey: undefined, timeoutMs: 15000 });
        expect(config.alerts).toEqual({ url: 'http://localhost:7071', apiKey: undefined, timeoutMs: 10000 });
        expect(config.auditAdvisoryEnabled).toBe(false);
        expect(config.riskWeights).toEqual({});
    });

    it('converts string values from the environment', () => {
        const config = loadConfig({
            PORT: '8080',
            NODE_ENV: 'production',
            AUDIT_ADVISORY_ENABLED: 'true',
            REASONING_TIMEOUT_MS: '2500',
            ALERT_API_KEY: 'test-secret',
            REDIS_PASSWORD: ''
        });

        expect(config.port).toBe(8080);
        expect(config.env).toBe('production');
        expect(config.auditAdvisoryEnabled).toBe(true);
        expect(config.reasoning.timeoutMs).toBe(2500);
        expect(config.alerts.apiKey).toBe('test-secret');
        expect(config.redis.password).toBeUndefined();
    });

    it('parses risk weight overrides from JSON', () => {
        const config = loadConfig({ RISK_WEIGHTS: '{"pastFraud":50,"crossBorder":5}' });
        expect(config.riskWeights).toEqual({ pastFraud: 50, crossBorder: 5 });
    });

    it('rejects malformed risk weights', () => {
        expect(() => loadConfig({ RISK_WEIGHTS: '{pastFraud' })).toThrow(/RISK_WEIGHTS is not valid JSON/);
        expect(() => loadConfig({ RISK_WEIGHTS: '{"pastFraud":-1}' })).toThrow(/Invalid RISK_WEIGHTS/);
        expect(() => loadConfig({ RISK_WEIGHTS: '{"velocity":10}' })).toThrow(/Invalid RISK_WEIGHTS/);
    });

    it('rejects invalid values', () => {
        expect(() => loadConfig({ PORT: 'not-a-port' })).toThrow(/Invalid environment configuration/);
        expect(() => loadConfig({ NODE_ENV: 'staging' })).toThrow(/Invalid environment configuration/);
    });
});

describe('configureLogger', () => {
    it('takes its level from the loaded config', () => {
        const previous = logger.level;
        const transports = logger.transports.length;

        configureLogger(loadConfig({ LOG_LEVEL: 'debug' }));

        expect(logger.level).toBe('debug');
        expect(logger.transports).toHaveLength(transports);
        logger.level = previous;
    });
});
