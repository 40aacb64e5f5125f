import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import { Transaction } from '../types/transaction';

export const SAMPLE_PROFILES = ['normal', 'suspicious', 'fraud'] as const;

export type SampleProfile = typeof SAMPLE_PROFILES[number];

export const DEMO_USER_ID = 'USER-12345';

export interface SimulatorOptions {
    now?: () => Date;
}

export class TransactionSimulator {
    private readonly now: () => Date;

    constructor(options: SimulatorOptions = {}) {
        this.now = options.now ?? (() => new Date());
    }

    sample(profile: SampleProfile, userId: string = DEMO_USER_ID): Transaction {
        const transaction = profile === 'fraud'
            ? this.generateFraudTransaction(userId)
            : profile === 'suspicious'
                ? this.generateSuspiciousTransaction(userId)
                : this.generateNormalTransaction(userId);

        logger.debug('Generated sample transaction', { profile, transactionId: transaction.transactionId });
        return transaction;
    }

    private generateNormalTransaction(userId: string): Transaction {
        return {
            transactionId: this.transactionId(),
            userId,
            amount: 45.99,
            currency: 'USD',
            transactionType: 'credit_card',
            merchantName: 'Coffee Shop',
            merchantCategory: 'Food & Beverage',
            location: 'New York, USA',
            ipAddress: '192.0.2.1',
            deviceId: 'regular-device-123',
            timestamp: this.now()
        };
    }

    private generateSuspiciousTransaction(userId: string): Transaction {
        return {
            transactionId: this.transactionId(),
            userId,
            amount: 2500,
            currency: 'USD',
            transactionType: 'wire_transfer',
            merchantName: 'Unknown Recipient',
            merchantCategory: 'Transfer',
            location: 'Unknown',
            ipAddress: '198.51.100.123',
            timestamp: this.now()
        };
    }

    // Unusual amount, location, device and hour all at once.
    private generateFraudTransaction(userId: string): Transaction {
        const timestamp = this.now();
        timestamp.setUTCHours(3, 30, 0, 0);

        return {
            transactionId: this.transactionId(),
            userId,
            amount: 15000,
            currency: 'USD',
            transactionType: 'credit_card',
            merchantName: 'Electronics Store',
            merchantCategory: 'Electronics',
            location: 'Tokyo, Japan',
            ipAddress: '203.0.113.42',
            deviceId: 'new-device-unknown',
            timestamp
        };
    }

    private transactionId(): string {
        return `TXN-${uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
    }
}
