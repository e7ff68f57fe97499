import type { CustomerProfile, Transaction } from './transaction';
import type { AlertAck, AlertRecord } from './report';

export interface CallOptions {
    signal?: AbortSignal;
}

/** Read side of the transaction/customer store. Lookups resolve to null when the record does not exist. */
export interface TransactionStore {
    getTransaction(id: string): Promise<Transaction | null>;
    getCustomer(customerId: string): Promise<CustomerProfile | null>;
    getTransactionsByCustomer(customerId: string): Promise<Transaction[]>;
    getTransactionsByDestination(country: string): Promise<Transaction[]>;
}

/** Opaque reasoning service: prompt in, free text out. */
export interface ReasoningService {
    run(prompt: string, options?: CallOptions): Promise<string>;
}

export interface AlertDispatcher {
    sendAlert(alert: AlertRecord, options?: CallOptions): Promise<AlertAck>;
}
