import Redis from 'ioredis';
import { logger } from './logger';
import type { AppConfig } from './index';

/** Minimal key/value surface used by the cached store; ioredis satisfies it through `createCacheClient`. */
export interface CacheClient {
    get(key: string): Promise<string | null>;
    setex(key: string, ttlSeconds: number, value: string): Promise<unknown>;
}

export const createRedisClient = (config: AppConfig['redis']): Redis => {
    const redis = new Redis({
        host: config.host,
        port: config.port,
        password: config.password,
        maxRetriesPerRequest: 3,
        lazyConnect: true
    });

    redis.on('connect', () => {
        logger.info('Redis connected successfully');
    });

    redis.on('error', (error: Error) => {
        logger.error('Redis connection error', { error: error.message });
    });

    redis.on('ready', () => {
        logger.info('Redis ready for commands');
    });

    return redis;
};

export const createCacheClient = (redis: Redis): CacheClient => ({
    get: (key) => redis.get(key),
    setex: (key, ttlSeconds, value) => redis.setex(key, ttlSeconds, value)
});

export const setCache = async (cache: CacheClient, key: string, value: unknown, ttlSeconds: number = 300): Promise<void> => {
    try {
        await cache.setex(key, ttlSeconds, JSON.stringify(value));
    } catch (error) {
        logger.error('Error setting cache', { error: error instanceof Error ? error.message : String(error), key });
    }
};

export const getCache = async (cache: CacheClient, key: string): Promise<unknown> => {
    try {
        const result = await cache.get(key);
        return result ? JSON.parse(result) : null;
    } catch (error) {
        logger.error('Error getting cache', { error: error instanceof Error ? error.message : String(error), key });
        return null;
    }
};

export const testRedisConnection = async (redis: Redis): Promise<boolean> => {
    try {
        await redis.ping();
        logger.info('Redis connection test successful');
        return true;
    } catch (error) {
        logger.error('Redis connection test failed', { error: error instanceof Error ? error.message : String(error) });
        return false;
    }
};
