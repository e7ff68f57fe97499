import { Pool, type PoolConfig, type QueryResult } from 'pg';
import { logger } from './logger';
import type { AppConfig } from './index';

/** The slice of a pg pool the models depend on. */
export interface QueryRunner {
    query(text: string, values?: unknown[]): Promise<QueryResult>;
}

export const createPool = (config: AppConfig['database']): Pool => {
    const dbConfig: PoolConfig = {
        ...config,

        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
    };

    const pool = new Pool(dbConfig);

    pool.on('connect', () => {
        logger.info('New PostgreSQL client connected');
    });

    pool.on('error', (err) => {
        logger.error('PostgreSQL client error', { error: err.message });
    });

    return pool;
};

export const createQueryRunner = (pool: Pool): QueryRunner => ({
    query: (text, values) => pool.query(text, values)
});

export const testConnection = async (pool: Pool): Promise<boolean> => {
    try {
        const client = await pool.connect();
        const result = await client.query('SELECT NOW()');

        client.release();

        logger.info('Database connection successful', result.rows[0]);
        return true;
    } catch (error) {
        logger.error('Database connection failed', { error: error instanceof Error ? error.message : String(error) });
        return false;
    }
};
