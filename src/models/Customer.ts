import type { QueryResultRow } from 'pg';
import type { QueryRunner } from '../config/database';
import { logger } from '../config/logger';
import { DatabaseError, errorMessage } from '../middleware/errorHandler';
import type { CustomerProfile } from '../types/transaction';

const nullableNumber = (value: unknown): number | null =>
    value === null || value === undefined ? null : Number(value);

export const mapCustomerRow = (row: QueryResultRow): CustomerProfile => ({
    customerId: String(row.customer_id),
    name: row.name ? String(row.name) : '',
    country: row.country ? String(row.country).toUpperCase() : '',
    accountAgeDays: nullableNumber(row.account_age_days),
    deviceTrustScore: nullableNumber(row.device_trust_score),
    pastFraud: row.past_fraud === true
});

export class CustomerModel {
    constructor(private readonly db: QueryRunner) {}

    async findById(customerId: string): Promise<CustomerProfile | null> {
        try {
            const query = `
            SELECT customer_id, name, country, account_age_days, device_trust_score, past_fraud
            FROM customers
            WHERE customer_id = $1`;
            const result = await this.db.query(query, [customerId]);
            return result.rows.length > 0 ? mapCustomerRow(result.rows[0]) : null;
        } catch (error) {
            logger.error('Error finding customer by ID', { customerId, error: errorMessage(error) });
            throw new DatabaseError(`Failed to load customer ${customerId}: ${errorMessage(error)}`);
        }
    }
}
