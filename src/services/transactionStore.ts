import Joi from 'joi';
import type { QueryRunner } from '../config/database';
import { logger } from '../config/logger';
import { getCache, setCache, type CacheClient } from '../config/redis';
import { CustomerModel } from '../models/Customer';
import { TransactionModel } from '../models/Transaction';
import type { TransactionStore } from '../types/collaborators';
import type { CustomerProfile, Transaction } from '../types/transaction';

export interface HistoryLimits {
    /** Unset reads the customer's whole history, which the amount baseline needs. */
    customer?: number;
    destination: number;
}

export class PostgresTransactionStore implements TransactionStore {
    private readonly transactions: TransactionModel;
    private readonly customers: CustomerModel;

    constructor(db: QueryRunner, private readonly limits: HistoryLimits = { destination: 100 }) {
        this.transactions = new TransactionModel(db);
        this.customers = new CustomerModel(db);
    }

    getTransaction(id: string): Promise<Transaction | null> {
        return this.transactions.findById(id);
    }

    getCustomer(customerId: string): Promise<CustomerProfile | null> {
        return this.customers.findById(customerId);
    }

    getTransactionsByCustomer(customerId: string): Promise<Transaction[]> {
        return this.transactions.findByCustomerId(customerId, this.limits.customer);
    }

    getTransactionsByDestination(country: string): Promise<Transaction[]> {
        return this.transactions.findByDestination(country, this.limits.destination);
    }
}

const transactionSchema = Joi.object<Transaction>({
    id: Joi.string().required(),
    customerId: Joi.string().required(),
    amount: Joi.number().required(),
    currency: Joi.string().required(),
    destinationCountry: Joi.string().required(),
    timestamp: Joi.string().required()
});

const historySchema = Joi.array<Transaction[]>().items(transactionSchema);

const customerSchema = Joi.object<CustomerProfile>({
    customerId: Joi.string().required(),
    name: Joi.string().allow('').required(),
    country: Joi.string().allow('').required(),
    accountAgeDays: Joi.number().allow(null).required(),
    deviceTrustScore: Joi.number().allow(null).required(),
    pastFraud: Joi.boolean().required()
});

export const cacheKeys = {
    customer: (customerId: string) => `customer:${customerId}`,
    customerHistory: (customerId: string) => `history:customer:${customerId}`,
    destinationHistory: (country: string) => `history:destination:${country.toUpperCase()}`
};

/**
 * Read-through Redis cache in front of another store. Transactions themselves
 * are never cached; profiles and histories are, for `ttlSeconds`. A cache
 * failure or a malformed entry falls through to the inner store.
 */
export class CachedTransactionStore implements TransactionStore {
    constructor(
        private readonly inner: TransactionStore,
        private readonly cache: CacheClient,
        private readonly ttlSeconds: number = 300
    ) {}

    getTransaction(id: string): Promise<Transaction | null> {
        return this.inner.getTransaction(id);
    }

    async getCustomer(customerId: string): Promise<CustomerProfile | null> {
        const key = cacheKeys.customer(customerId);
        const cached = await this.readCached(key, customerSchema);
        if (cached) {
            return cached;
        }

        const customer = await this.inner.getCustomer(customerId);
        if (customer) {
            await setCache(this.cache, key, customer, this.ttlSeconds);
        }
        return customer;
    }

    getTransactionsByCustomer(customerId: string): Promise<Transaction[]> {
        return this.readThroughHistory(
            cacheKeys.customerHistory(customerId),
            () => this.inner.getTransactionsByCustomer(customerId)
        );
    }

    getTransactionsByDestination(country: string): Promise<Transaction[]> {
        return this.readThroughHistory(
            cacheKeys.destinationHistory(country),
            () => this.inner.getTransactionsByDestination(country)
        );
    }

    private async readThroughHistory(key: string, load: () => Promise<Transaction[]>): Promise<Transaction[]> {
        const cached = await this.readCached<Transaction[]>(key, historySchema);
        if (cached) {
            return cached;
        }

        const history = await load();
        await setCache(this.cache, key, history, this.ttlSeconds);
        return history;
    }

    private async readCached<T>(key: string, schema: Joi.AnySchema<T>): Promise<T | null> {
        const raw = await getCache(this.cache, key);
        if (raw === null) {
            return null;
        }

        const validation = schema.validate(raw);
        if (validation.error) {
            logger.warn('Discarding malformed cache entry', { key, error: validation.error.message });
            return null;
        }
        logger.debug('Cache hit', { key });
        return validation.value;
    }
}
