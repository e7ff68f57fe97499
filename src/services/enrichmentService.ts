import { logger } from '../config/logger';
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../config/scoring';
import { NotFoundError, errorMessage } from '../middleware/errorHandler';
import type { TransactionStore } from '../types/collaborators';
import {
    emptyCustomerProfile,
    type CustomerProfile,
    type DerivedFlags,
    type EnrichedContext,
    type Transaction
} from '../types/transaction';

export interface EnrichmentOptions {
    includeDestinationHistory?: boolean;
}

const normalizeCountry = (country: string): string => country.trim().toUpperCase();

const averageAmount = (history: ReadonlyArray<Transaction>): number => {
    if (history.length === 0) {
        return 0;
    }
    return history.reduce((sum, tx) => sum + tx.amount, 0) / history.length;
};

export const deriveFlags = (
    transaction: Transaction,
    customer: CustomerProfile,
    history: ReadonlyArray<Transaction>,
    config: ScoringConfig = DEFAULT_SCORING_CONFIG
): DerivedFlags => {
    const destination = normalizeCountry(transaction.destinationCountry);
    const home = normalizeCountry(customer.country);
    const average = averageAmount(history);

    return {
        highAmount: transaction.amount > config.highAmountThreshold,
        highRiskCountry: config.highRiskCountries.includes(destination),
        sanctionedCountry: config.sanctionedCountries.includes(destination),
        newAccount: customer.accountAgeDays !== null && customer.accountAgeDays < config.newAccountDays,
        lowDeviceTrust: customer.deviceTrustScore !== null
            && customer.deviceTrustScore < config.lowDeviceTrustThreshold,
        pastFraud: customer.pastFraud,
        crossBorder: home !== '' && home !== destination,
        amountVsAverage: average > 0 ? transaction.amount / average : 0
    };
};

const freezeTransactions = (items: Transaction[]): ReadonlyArray<Readonly<Transaction>> =>
    Object.freeze(items.map(item => Object.freeze({ ...item })));

/**
 * First stage of the workflow. Only a missing transaction is fatal; every
 * other lookup degrades to an empty value and a recorded warning.
 */
export class EnrichmentService {
    private readonly includeDestinationHistory: boolean;

    constructor(
        private readonly store: TransactionStore,
        private readonly config: ScoringConfig = DEFAULT_SCORING_CONFIG,
        options: EnrichmentOptions = {}
    ) {
        this.includeDestinationHistory = options.includeDestinationHistory ?? true;
    }

    async enrich(transactionId: string): Promise<EnrichedContext> {
        const transaction = await this.store.getTransaction(transactionId);
        if (!transaction) {
            throw new NotFoundError(`Transaction ${transactionId} not found`);
        }

        const warnings: string[] = [];
        const destination = normalizeCountry(transaction.destinationCountry);

        const [customer, customerHistory, destinationHistory] = await Promise.all([
            this.loadCustomer(transaction.customerId, warnings),
            this.loadHistory(
                `transaction history for customer ${transaction.customerId}`,
                () => this.store.getTransactionsByCustomer(transaction.customerId),
                warnings
            ),
            this.includeDestinationHistory
                ? this.loadHistory(
                    `destination history for ${destination}`,
                    () => this.store.getTransactionsByDestination(destination),
                    warnings
                )
                : Promise.resolve([])
        ]);

        const transactionHistory = customerHistory.filter(tx => tx.id !== transaction.id);
        const profile = customer ?? emptyCustomerProfile(transaction.customerId);
        const derivedFlags = deriveFlags(transaction, profile, transactionHistory, this.config);

        logger.debug('Transaction enriched', {
            transactionId,
            customerFound: customer !== null,
            historySize: transactionHistory.length,
            warnings: warnings.length
        });

        return Object.freeze({
            transaction: Object.freeze({ ...transaction }),
            customer: Object.freeze({ ...profile }),
            customerFound: customer !== null,
            transactionHistory: freezeTransactions(transactionHistory),
            destinationHistory: freezeTransactions(destinationHistory.filter(tx => tx.id !== transaction.id)),
            derivedFlags: Object.freeze(derivedFlags),
            warnings: Object.freeze([...warnings])
        });
    }

    private async loadCustomer(customerId: string, warnings: string[]): Promise<CustomerProfile | null> {
        try {
            const customer = await this.store.getCustomer(customerId);
            if (!customer) {
                warnings.push(`Customer ${customerId} not found; using empty profile`);
                logger.warn('Customer profile not found, continuing with empty profile', { customerId });
            }
            return customer;
        } catch (error) {
            warnings.push(`Customer ${customerId} lookup failed: ${errorMessage(error)}`);
            logger.warn('Customer lookup failed, continuing with empty profile', {
                customerId,
                error: errorMessage(error)
            });
            return null;
        }
    }

    private async loadHistory(
        label: string,
        load: () => Promise<Transaction[]>,
        warnings: string[]
    ): Promise<Transaction[]> {
        try {
            return await load();
        } catch (error) {
            warnings.push(`Failed to load ${label}: ${errorMessage(error)}`);
            logger.warn(`Failed to load ${label}`, { error: errorMessage(error) });
            return [];
        }
    }
}
