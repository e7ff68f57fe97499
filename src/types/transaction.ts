export interface Transaction {
    id: string;
    customerId: string;
    amount: number;
    currency: string;
    destinationCountry: string;
    timestamp: string;
}

export interface CustomerProfile {
    customerId: string;
    name: string;
    country: string;
    accountAgeDays: number | null;
    deviceTrustScore: number | null;
    pastFraud: boolean;
}

export interface DerivedFlags {
    highAmount: boolean;
    highRiskCountry: boolean;
    sanctionedCountry: boolean;
    newAccount: boolean;
    lowDeviceTrust: boolean;
    pastFraud: boolean;
    crossBorder: boolean;
    amountVsAverage: number;
}

export interface EnrichedContext {
    readonly transaction: Readonly<Transaction>;
    readonly customer: Readonly<CustomerProfile>;
    readonly customerFound: boolean;
    readonly transactionHistory: ReadonlyArray<Readonly<Transaction>>;
    readonly destinationHistory: ReadonlyArray<Readonly<Transaction>>;
    readonly derivedFlags: Readonly<DerivedFlags>;
    readonly warnings: ReadonlyArray<string>;
}

/**
 * Stand-in profile used when the customer record cannot be loaded. Unknown
 * values are null so that no customer-based flag fires on missing data.
 */
export const emptyCustomerProfile = (customerId: string): CustomerProfile => ({
    customerId,
    name: '',
    country: '',
    accountAgeDays: null,
    deviceTrustScore: null,
    pastFraud: false
});
