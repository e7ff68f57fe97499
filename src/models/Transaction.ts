import type { QueryResultRow } from 'pg';
import type { QueryRunner } from '../config/database';
import { logger } from '../config/logger';
import { DatabaseError, errorMessage } from '../middleware/errorHandler';
import type { Transaction } from '../types/transaction';

const toIsoTimestamp = (value: unknown): string =>
    value instanceof Date ? value.toISOString() : String(value);

export const mapTransactionRow = (row: QueryResultRow): Transaction => ({
    id: String(row.id),
    customerId: String(row.customer_id),
    // NUMERIC columns arrive as strings from pg
    amount: Number(row.amount),
    currency: String(row.currency),
    destinationCountry: String(row.destination_country).toUpperCase(),
    timestamp: toIsoTimestamp(row.timestamp)
});

const COLUMNS = 'id, customer_id, amount, currency, destination_country, timestamp';

export class TransactionModel {
    constructor(private readonly db: QueryRunner) {}

    async findById(id: string): Promise<Transaction | null> {
        try {
            const query = `SELECT ${COLUMNS} FROM transactions WHERE id = $1`;
            const result = await this.db.query(query, [id]);
            return result.rows.length > 0 ? mapTransactionRow(result.rows[0]) : null;
        } catch (error) {
            logger.error('Error finding transaction by ID', { id, error: errorMessage(error) });
            throw new DatabaseError(`Failed to load transaction ${id}: ${errorMessage(error)}`);
        }
    }

    /** Full history, newest first; pass `limit` to cap it. */
    async findByCustomerId(customerId: string, limit?: number): Promise<Transaction[]> {
        try {
            const query = `
            SELECT ${COLUMNS} FROM transactions
            WHERE customer_id = $1
            ORDER BY timestamp DESC${limit === undefined ? '' : '\n            LIMIT $2'}`;
            const values: unknown[] = limit === undefined ? [customerId] : [customerId, limit];
            const result = await this.db.query(query, values);
            return result.rows.map(mapTransactionRow);
        } catch (error) {
            logger.error('Error finding transactions by customer ID', { customerId, error: errorMessage(error) });
            throw new DatabaseError(`Failed to load transactions for customer ${customerId}: ${errorMessage(error)}`);
        }
    }

    async findByDestination(country: string, limit: number = 100): Promise<Transaction[]> {
        try {
            const query = `
            SELECT ${COLUMNS} FROM transactions
            WHERE UPPER(destination_country) = $1
            ORDER BY timestamp DESC
            LIMIT $2`;
            const result = await this.db.query(query, [country.toUpperCase(), limit]);
            return result.rows.map(mapTransactionRow);
        } catch (error) {
            logger.error('Error finding transactions by destination', { country, error: errorMessage(error) });
            throw new DatabaseError(`Failed to load transactions to ${country}: ${errorMessage(error)}`);
        }
    }
}
