import { vi } from 'vitest';
import type { CacheClient } from '../../src/config/redis';
import {
    DEFAULT_SCORING_CONFIG,
    levelForScore,
    recommendationForScore,
    type ScoringConfig
} from '../../src/config/scoring';
import { deriveFlags } from '../../src/services/enrichmentService';
import type { AlertDispatcher, CallOptions, ReasoningService, TransactionStore } from '../../src/types/collaborators';
import type { AlertAck, AlertRecord } from '../../src/types/report';
import type { RiskAssessment, RiskFactor } from '../../src/types/risk';
import type { CustomerProfile, EnrichedContext, Transaction } from '../../src/types/transaction';

export const makeTransaction = (overrides: Partial<Transaction> = {}): Transaction => ({
    id: 'TX1001',
    customerId: 'CUST1001',
    amount: 500,
    currency: 'USD',
    destinationCountry: 'DE',
    timestamp: '2025-03-01T10:00:00.000Z',
    ...overrides
});

export const makeCustomer = (overrides: Partial<CustomerProfile> = {}): CustomerProfile => ({
    customerId: 'CUST1001',
    name: 'Test Customer',
    country: 'DE',
    accountAgeDays: 400,
    deviceTrustScore: 0.9,
    pastFraud: false,
    ...overrides
});

/** Builds an enriched context directly, bypassing the store. */
export const makeContext = (
    transaction: Transaction = makeTransaction(),
    customer: CustomerProfile = makeCustomer(),
    history: Transaction[] = [],
    config: ScoringConfig = DEFAULT_SCORING_CONFIG
): EnrichedContext => ({
    transaction,
    customer,
    customerFound: true,
    transactionHistory: history,
    destinationHistory: [],
    derivedFlags: deriveFlags(transaction, customer, history, config),
    warnings: []
});

/** Every customer and transaction flag raised: sanctioned destination, large amount, risky account. */
export const highRiskContext = (): EnrichedContext => makeContext(
    makeTransaction({ amount: 15000, destinationCountry: 'IR' }),
    makeCustomer({ accountAgeDays: 10, deviceTrustScore: 0.2, pastFraud: true })
);

export const makeAssessment = (
    score: number,
    factors: RiskFactor[] = [],
    overrides: Partial<RiskAssessment> = {}
): RiskAssessment => ({
    transactionId: 'TX1001',
    score,
    level: levelForScore(score),
    factors,
    narrative: '',
    recommendation: recommendationForScore(score),
    baseScore: score,
    scoreSource: 'RULES',
    degraded: false,
    assessedAt: '2025-03-01T10:00:01.000Z',
    ...overrides
});

export class InMemoryTransactionStore implements TransactionStore {
    transactions = new Map<string, Transaction>();
    customers = new Map<string, CustomerProfile>();
    failures: Partial<Record<keyof TransactionStore, Error>> = {};

    constructor(transactions: Transaction[] = [], customers: CustomerProfile[] = []) {
        transactions.forEach(tx => this.transactions.set(tx.id, tx));
        customers.forEach(customer => this.customers.set(customer.customerId, customer));
    }

    getTransaction = vi.fn(async (id: string): Promise<Transaction | null> => {
        this.throwIfFailing('getTransaction');
        return this.transactions.get(id) ?? null;
    });

    getCustomer = vi.fn(async (customerId: string): Promise<CustomerProfile | null> => {
        this.throwIfFailing('getCustomer');
        return this.customers.get(customerId) ?? null;
    });

    getTransactionsByCustomer = vi.fn(async (customerId: string): Promise<Transaction[]> => {
        this.throwIfFailing('getTransactionsByCustomer');
        return [...this.transactions.values()].filter(tx => tx.customerId === customerId);
    });

    getTransactionsByDestination = vi.fn(async (country: string): Promise<Transaction[]> => {
        this.throwIfFailing('getTransactionsByDestination');
        return [...this.transactions.values()].filter(tx => tx.destinationCountry === country);
    });

    private throwIfFailing(method: keyof TransactionStore): void {
        const failure = this.failures[method];
        if (failure) {
            throw failure;
        }
    }
}

type ReasoningBehaviour =
    | { kind: 'reply'; text: string }
    | { kind: 'fail'; error: Error }
    | { kind: 'hang' };

/** Scripted reasoning backend. `hang` never resolves on its own but honours the abort signal. */
export class FakeReasoningService implements ReasoningService {
    prompts: string[] = [];
    aborted = 0;

    constructor(private behaviour: ReasoningBehaviour = { kind: 'reply', text: '' }) {}

    static replying(text: string): FakeReasoningService {
        return new FakeReasoningService({ kind: 'reply', text });
    }

    static failing(message: string = 'reasoning backend unavailable'): FakeReasoningService {
        return new FakeReasoningService({ kind: 'fail', error: new Error(message) });
    }

    static hanging(): FakeReasoningService {
        return new FakeReasoningService({ kind: 'hang' });
    }

    async run(prompt: string, options: CallOptions = {}): Promise<string> {
        this.prompts.push(prompt);
        const behaviour = this.behaviour;
        if (behaviour.kind === 'reply') {
            return behaviour.text;
        }
        if (behaviour.kind === 'fail') {
            throw behaviour.error;
        }
        return new Promise<string>((_resolve, reject) => {
            options.signal?.addEventListener('abort', () => {
                this.aborted += 1;
                reject(new Error('aborted'));
            });
        });
    }
}

export class RecordingAlertDispatcher implements AlertDispatcher {
    sent: AlertRecord[] = [];

    constructor(private readonly failWith?: Error) {}

    async sendAlert(alert: AlertRecord): Promise<AlertAck> {
        this.sent.push(alert);
        if (this.failWith) {
            throw this.failWith;
        }
        return { alertId: alert.alertId, accepted: true, reference: `REF-${this.sent.length}` };
    }
}

export class FakeCache implements CacheClient {
    entries = new Map<string, { value: string; ttlSeconds: number }>();
    failing = false;

    async get(key: string): Promise<string | null> {
        if (this.failing) {
            throw new Error('cache offline');
        }
        return this.entries.get(key)?.value ?? null;
    }

    async setex(key: string, ttlSeconds: number, value: string): Promise<unknown> {
        if (this.failing) {
            throw new Error('cache offline');
        }
        this.entries.set(key, { value, ttlSeconds });
        return 'OK';
    }
}
