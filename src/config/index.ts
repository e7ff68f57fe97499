import Joi from 'joi';
import type { RiskWeights } from './scoring';

export interface AppConfig {
    port: number;
    env: 'development' | 'production' | 'test';
    logLevel: string;
    database: {
        host: string;
        port: number;
        database: string;
        user: string;
        password: string;
    };
    redis: {
        host: string;
        port: number;
        password?: string;
        cacheTtlSeconds: number;
    };
    reasoning: {
        url: string;
        apiKey?: string;
        timeoutMs: number;
    };
    alerts: {
        url: string;
        apiKey?: string;
        timeoutMs: number;
    };
    auditAdvisoryEnabled: boolean;
    riskWeights: Partial<RiskWeights>;
}

interface EnvVars {
    PORT: number;
    NODE_ENV: 'development' | 'production' | 'test';
    LOG_LEVEL: string;
    DB_HOST: string;
    DB_PORT: number;
    DB_NAME: string;
    DB_USER: string;
    DB_PASSWORD: string;
    REDIS_HOST: string;
    REDIS_PORT: number;
    REDIS_PASSWORD?: string;
    CACHE_TTL_SECONDS: number;
    REASONING_API_URL: string;
    REASONING_API_KEY?: string;
    REASONING_TIMEOUT_MS: number;
    ALERT_API_URL: string;
    ALERT_API_KEY?: string;
    ALERT_TIMEOUT_MS: number;
    AUDIT_ADVISORY_ENABLED: boolean;
    RISK_WEIGHTS?: string;
}

const envSchema = Joi.object<EnvVars>({
    PORT: Joi.number().port().default(3000),
    NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
    LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly').default('info'),
    DB_HOST: Joi.string().default('localhost'),
    DB_PORT: Joi.number().port().default(5432),
    DB_NAME: Joi.string().default('risk_screening'),
    DB_USER: Joi.string().default('risk_user'),
    DB_PASSWORD: Joi.string().allow('').default(''),
    REDIS_HOST: Joi.string().default('localhost'),
    REDIS_PORT: Joi.number().port().default(6379),
    REDIS_PASSWORD: Joi.string().allow('').optional(),
    CACHE_TTL_SECONDS: Joi.number().integer().min(0).default(300),
    REASONING_API_URL: Joi.string().uri().default('http://localhost:5000'),
    REASONING_API_KEY: Joi.string().allow('').optional(),
    REASONING_TIMEOUT_MS: Joi.number().integer().min(1).default(15000),
    ALERT_API_URL: Joi.string().uri().default('http://localhost:7071'),
    ALERT_API_KEY: Joi.string().allow('').optional(),
    ALERT_TIMEOUT_MS: Joi.number().integer().min(1).default(10000),
    AUDIT_ADVISORY_ENABLED: Joi.boolean().default(false),
    RISK_WEIGHTS: Joi.string().optional()
}).unknown(true);

const weightsSchema = Joi.object<Partial<RiskWeights>>({
    highRiskCountry: Joi.number().min(0),
    sanctionedCountry: Joi.number().min(0),
    crossBorder: Joi.number().min(0),
    highAmount: Joi.number().min(0),
    amountSpike: Joi.number().min(0),
    newAccount: Joi.number().min(0),
    lowDeviceTrust: Joi.number().min(0),
    pastFraud: Joi.number().min(0)
});

const parseRiskWeights = (raw: string | undefined): Partial<RiskWeights> => {
    if (!raw) {
        return {};
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new Error(`RISK_WEIGHTS is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const validation = weightsSchema.validate(parsed);
    if (validation.error) {
        throw new Error(`Invalid RISK_WEIGHTS: ${validation.error.message}`);
    }
    return validation.value;
};

const blankToUndefined = (value: string | undefined): string | undefined =>
    value ? value : undefined;

export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
    const validation = envSchema.validate(source, { abortEarly: false });

    if (validation.error) {
        throw new Error(`Invalid environment configuration: ${validation.error.message}`);
    }

    return {
        port: validation.value.PORT,
        env: validation.value.NODE_ENV,
        logLevel: validation.value.LOG_LEVEL,
        database: {
            host: validation.value.DB_HOST,
            port: validation.value.DB_PORT,
            database: validation.value.DB_NAME,
            user: validation.value.DB_USER,
            password: validation.value.DB_PASSWORD
        },
        redis: {
            host: validation.value.REDIS_HOST,
            port: validation.value.REDIS_PORT,
            password: blankToUndefined(validation.value.REDIS_PASSWORD),
            cacheTtlSeconds: validation.value.CACHE_TTL_SECONDS
        },
        reasoning: {
            url: validation.value.REASONING_API_URL,
            apiKey: blankToUndefined(validation.value.REASONING_API_KEY),
            timeoutMs: validation.value.REASONING_TIMEOUT_MS
        },
        alerts: {
            url: validation.value.ALERT_API_URL,
            apiKey: blankToUndefined(validation.value.ALERT_API_KEY),
            timeoutMs: validation.value.ALERT_TIMEOUT_MS
        },
        auditAdvisoryEnabled: validation.value.AUDIT_ADVISORY_ENABLED,
        riskWeights: parseRiskWeights(validation.value.RISK_WEIGHTS)
    };
};
