import { describe, it, expect } from 'vitest';
import { InMemoryTransactionHistory } from '../models/Transaction';
import { MemoryResultCache } from '../services/resultCache';
import { decide } from '../services/fusionEngine';
import { FraudAnalysisResult } from '../types/analysis';
import { Transaction } from '../types/transaction';

const transaction = (transactionId: string, minute: number, userId: string = 'USER-1'): Transaction => ({
    transactionId,
    userId,
    amount: 20 + minute,
    currency: 'USD',
    transactionType: 'credit_card',
    merchantName: minute % 2 === 0 ? 'Coffee Shop' : undefined,
    timestamp: new Date(Date.UTC(2024, 4, 1, 9, minute))
});

const result = (caseId: string): FraudAnalysisResult => ({
    ...decide(
        { fraudProbability: 0.1, confidence: 0.6, riskFactors: [] },
        { isSuspicious: false, confidence: 0.9, anomalies: [] },
        []
    ),
    caseId,
    similarCases: [],
    similarityMode: 'live',
    processingTimeMs: 12,
    analysisDetails: {}
});

describe('InMemoryTransactionHistory', () => {
    it('returns the most recent transactions first', async () => {
        const history = new InMemoryTransactionHistory();
        await history.record(transaction('TXN-1', 1));
        await history.record(transaction('TXN-3', 3));
        await history.record(transaction('TXN-2', 2));
        await history.record(transaction('TXN-OTHER', 4, 'USER-2'));

        const recent = await history.findRecentByUser('USER-1', 2);

        expect(recent).toEqual([
            { transactionId: 'TXN-3', amount: 23, currency: 'USD', merchant: 'Unknown', time: '2024-05-01T09:03:00.000Z' },
            { transactionId: 'TXN-2', amount: 22, currency: 'USD', merchant: 'Coffee Shop', time: '2024-05-01T09:02:00.000Z' }
        ]);
    });

    it('skips the excluded transaction and ignores duplicates', async () => {
        const history = new InMemoryTransactionHistory();
        await history.record(transaction('TXN-1', 1));
        await history.record(transaction('TXN-1', 1));
        await history.record(transaction('TXN-2', 2));

        const recent = await history.findRecentByUser('USER-1', 10, 'TXN-2');

        expect(recent.map(t => t.transactionId)).toEqual(['TXN-1']);
    });

    it('keeps a bounded number of transactions per user', async () => {
        const history = new InMemoryTransactionHistory(2);
        for (let minute = 0; minute < 5; minute++) {
            await history.record(transaction(`TXN-${minute}`, minute));
        }

        const recent = await history.findRecentByUser('USER-1');
        expect(recent.map(t => t.transactionId)).toEqual(['TXN-4', 'TXN-3']);
    });

    it('forgets the least recently active users beyond capacity', async () => {
        const history = new InMemoryTransactionHistory(100, 2);
        await history.record(transaction('TXN-A1', 1, 'USER-A'));
        await history.record(transaction('TXN-B1', 2, 'USER-B'));
        await history.record(transaction('TXN-A2', 3, 'USER-A'));
        await history.record(transaction('TXN-C1', 4, 'USER-C'));

        expect(history.userCount).toBe(2);
        await expect(history.findRecentByUser('USER-B')).resolves.toEqual([]);
        expect((await history.findRecentByUser('USER-A')).map(t => t.transactionId)).toEqual(['TXN-A2', 'TXN-A1']);
        expect((await history.findRecentByUser('USER-C')).map(t => t.transactionId)).toEqual(['TXN-C1']);
    });

    it('holds a fixed number of users however many it sees', async () => {
        const history = new InMemoryTransactionHistory(100, 50);
        for (let i = 0; i < 500; i++) {
            await history.record(transaction(`TXN-${i}`, i % 60, `USER-${i}`));
        }

        expect(history.userCount).toBe(50);
        await expect(history.findRecentByUser('USER-449')).resolves.toEqual([]);
        expect((await history.findRecentByUser('USER-450')).map(t => t.transactionId)).toEqual(['TXN-450']);
    });
});

describe('MemoryResultCache', () => {
    it('expires entries after the ttl', async () => {
        let clock = 1_000;
        const cache = new MemoryResultCache(60, 10, () => clock);
        await cache.save(result('CASE-00000001'));

        clock += 59_999;
        await expect(cache.load('CASE-00000001')).resolves.toMatchObject({ caseId: 'CASE-00000001' });

        clock += 1;
        await expect(cache.load('CASE-00000001')).resolves.toBeNull();
    });

    it('evicts the oldest entry beyond capacity', async () => {
        const cache = new MemoryResultCache(60, 2);
        await cache.save(result('CASE-A'));
        await cache.save(result('CASE-B'));
        await cache.save(result('CASE-C'));

        await expect(cache.load('CASE-A')).resolves.toBeNull();
        await expect(cache.load('CASE-B')).resolves.toMatchObject({ caseId: 'CASE-B' });
        await expect(cache.load('CASE-C')).resolves.toMatchObject({ caseId: 'CASE-C' });
    });
});
