import { describe, it, expect } from 'vitest';
import { NotFoundError } from '../src/middleware/errorHandler';
import { EnrichmentService, deriveFlags } from '../src/services/enrichmentService';
import { InMemoryTransactionStore, makeCustomer, makeTransaction } from './helpers/fakes';

const current = makeTransaction({ id: 'TX9', amount: 15000, destinationCountry: 'ir' });
const earlier = [
    makeTransaction({ id: 'TX1', amount: 1000 }),
    makeTransaction({ id: 'TX2', amount: 2000 })
];
const otherCustomerToIran = makeTransaction({ id: 'TX3', customerId: 'CUST2002', destinationCountry: 'IR' });
const riskyCustomer = makeCustomer({ accountAgeDays: 10, deviceTrustScore: 0.3, pastFraud: true });

const createStore = () => new InMemoryTransactionStore(
    [current, ...earlier, otherCustomerToIran],
    [riskyCustomer]
);

describe('EnrichmentService', () => {
    it('derives every flag from the transaction, profile and history', async () => {
        const context = await new EnrichmentService(createStore()).enrich('TX9');

        expect(context.customerFound).toBe(true);
        expect(context.warnings).toEqual([]);
        expect(context.derivedFlags).toEqual({
            highAmount: true,
            highRiskCountry: true,
            sanctionedCountry: true,
            newAccount: true,
            lowDeviceTrust: true,
            pastFraud: true,
            crossBorder: true,
            amountVsAverage: 10
        });
    });

    it('excludes the transaction itself from both histories', async () => {
        const store = createStore();
        const context = await new EnrichmentService(store).enrich('TX9');

        expect(context.transactionHistory.map(tx => tx.id)).toEqual(['TX1', 'TX2']);
        expect(context.destinationHistory.map(tx => tx.id)).toEqual(['TX3']);
        expect(store.getTransactionsByDestination).toHaveBeenCalledWith('IR');
    });

    it('fails only when the transaction is missing', async () => {
        const enrichment = new EnrichmentService(createStore());

        await expect(enrichment.enrich('TX404')).rejects.toBeInstanceOf(NotFoundError);
        await expect(enrichment.enrich('TX404')).rejects.toThrow('Transaction TX404 not found');
    });

    it('continues with an empty profile when the customer is unknown', async () => {
        const store = new InMemoryTransactionStore([makeTransaction()], []);
        const context = await new EnrichmentService(store).enrich('TX1001');

        expect(context.customerFound).toBe(false);
        expect(context.customer.accountAgeDays).toBeNull();
        expect(context.derivedFlags.crossBorder).toBe(false);
        expect(context.derivedFlags.newAccount).toBe(false);
        expect(context.warnings).toEqual(['Customer CUST1001 not found; using empty profile']);
    });

    it('records a warning for each failed lookup', async () => {
        const store = createStore();
        store.failures.getCustomer = new Error('db down');
        store.failures.getTransactionsByCustomer = new Error('timeout');
        store.failures.getTransactionsByDestination = new Error('boom');

        const context = await new EnrichmentService(store).enrich('TX9');

        expect(context.customerFound).toBe(false);
        expect(context.transactionHistory).toEqual([]);
        expect(context.destinationHistory).toEqual([]);
        expect(context.warnings).toEqual([
            'Customer CUST1001 lookup failed: db down',
            'Failed to load transaction history for customer CUST1001: timeout',
            'Failed to load destination history for IR: boom'
        ]);
    });

    it('skips the destination lookup when disabled', async () => {
        const store = createStore();
        const context = await new EnrichmentService(store, undefined, { includeDestinationHistory: false })
            .enrich('TX9');

        expect(store.getTransactionsByDestination).not.toHaveBeenCalled();
        expect(context.destinationHistory).toEqual([]);
    });

    it('returns a frozen context', async () => {
        const context = await new EnrichmentService(createStore()).enrich('TX9');

        expect(Object.isFrozen(context)).toBe(true);
        expect(Object.isFrozen(context.derivedFlags)).toBe(true);
        expect(Object.isFrozen(context.transactionHistory[0])).toBe(true);
    });
});

describe('deriveFlags', () => {
    it('reports no amount ratio without history', () => {
        const flags = deriveFlags(makeTransaction(), makeCustomer(), []);

        expect(flags.amountVsAverage).toBe(0);
        expect(flags.crossBorder).toBe(false);
        expect(flags.highAmount).toBe(false);
    });

    it('treats the amount threshold as exclusive', () => {
        expect(deriveFlags(makeTransaction({ amount: 10000 }), makeCustomer(), []).highAmount).toBe(false);
        expect(deriveFlags(makeTransaction({ amount: 10000.01 }), makeCustomer(), []).highAmount).toBe(true);
    });
});
