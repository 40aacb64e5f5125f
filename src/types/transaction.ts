export const TRANSACTION_TYPES = [
    'credit_card',
    'wire_transfer',
    'ach',
    'crypto',
    'cash_withdrawal'
] as const;

export type TransactionType = typeof TRANSACTION_TYPES[number];

export const FRAUD_TYPES = [
    'identity_theft',
    'card_fraud',
    'money_laundering',
    'account_takeover',
    'synthetic_identity',
    'phishing',
    'document_fraud',
    'unknown'
] as const;

export type FraudType = typeof FRAUD_TYPES[number];

export const isFraudType = (value: unknown): value is FraudType =>
    typeof value === 'string' && (FRAUD_TYPES as readonly string[]).includes(value);

export interface Transaction {
    readonly transactionId: string;
    readonly userId: string;
    readonly amount: number;
    readonly currency: string;
    readonly transactionType: TransactionType;
    readonly merchantName?: string;
    readonly merchantCategory?: string;
    readonly location?: string;
    readonly ipAddress?: string;
    readonly deviceId?: string;
    readonly timestamp: Date;
    readonly metadata?: Readonly<Record<string, unknown>>;
}

// Compact shape handed to the pattern analyzer as the user's recent activity.
export interface HistoricalTransaction {
    transactionId: string;
    amount: number;
    currency: string;
    merchant: string;
    location?: string;
    time: string;
}
