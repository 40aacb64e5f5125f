import { describe, it, expect } from 'vitest';
import { DEMO_USER_ID, TransactionSimulator } from '../services/transactionSimulator';

const now = () => new Date('2024-05-01T15:45:00.000Z');

describe('TransactionSimulator', () => {
    it('generates an ordinary coffee purchase', () => {
        const transaction = new TransactionSimulator({ now }).sample('normal');

        expect(transaction.transactionId).toMatch(/^TXN-[0-9A-F]{8}$/);
        expect(transaction).toMatchObject({
            userId: DEMO_USER_ID,
            amount: 45.99,
            currency: 'USD',
            transactionType: 'credit_card',
            merchantName: 'Coffee Shop',
            location: 'New York, USA'
        });
        expect(transaction.timestamp.toISOString()).toBe('2024-05-01T15:45:00.000Z');
    });

    it('generates a wire transfer to an unknown recipient', () => {
        const transaction = new TransactionSimulator({ now }).sample('suspicious', 'USER-7');

        expect(transaction).toMatchObject({
            userId: 'USER-7',
            amount: 2500,
            transactionType: 'wire_transfer',
            merchantName: 'Unknown Recipient'
        });
        expect(transaction.deviceId).toBeUndefined();
    });

    it('moves the fraudulent purchase to the small hours', () => {
        const transaction = new TransactionSimulator({ now }).sample('fraud');

        expect(transaction).toMatchObject({
            amount: 15000,
            location: 'Tokyo, Japan',
            deviceId: 'new-device-unknown'
        });
        expect(transaction.timestamp.toISOString()).toBe('2024-05-01T03:30:00.000Z');
    });
});
