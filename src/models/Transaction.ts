import { Pool } from 'pg';
import { logger, describeError } from '../config/logger';
import { HistoricalTransaction, Transaction } from '../types/transaction';

/** Recent activity per user, read by the pattern analyzer. */
export interface TransactionHistory {
    readonly mode: 'postgres' | 'memory';
    record(transaction: Transaction): Promise<void>;
    findRecentByUser(userId: string, limit?: number, excludeTransactionId?: string): Promise<HistoricalTransaction[]>;
}

type HistoryRow = {
    id: string;
    amount: string | number;
    currency: string;
    merchant_name: string | null;
    location: string | null;
    created_at: Date;
};

const toHistorical = (row: HistoryRow): HistoricalTransaction => ({
    transactionId: row.id,
    amount: Number(row.amount),
    currency: row.currency.trim(),
    merchant: row.merchant_name ?? 'Unknown',
    ...(row.location ? { location: row.location } : {}),
    time: new Date(row.created_at).toISOString()
});

export class TransactionModel implements TransactionHistory {
    readonly mode = 'postgres' as const;

    constructor(private readonly pool: Pool) {}

    async record(transaction: Transaction): Promise<void> {
        try {
            const query = `
            INSERT INTO transactions (
                id, user_id, amount, currency, transaction_type, merchant_name,
                merchant_category, location, ip_address, device_id, metadata, created_at
            )
            VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
            ON CONFLICT (id) DO NOTHING
            `;
            await this.pool.query(query, [
                transaction.transactionId,
                transaction.userId,
                transaction.amount,
                transaction.currency,
                transaction.transactionType,
                transaction.merchantName ?? null,
                transaction.merchantCategory ?? null,
                transaction.location ?? null,
                transaction.ipAddress ?? null,
                transaction.deviceId ?? null,
                transaction.metadata ? JSON.stringify(transaction.metadata) : null,
                transaction.timestamp
            ]);
        } catch (error) {
            logger.error('Error recording transaction', { error: describeError(error), transactionId: transaction.transactionId });
            throw error;
        }
    }

    async findRecentByUser(userId: string, limit: number = 10, excludeTransactionId?: string): Promise<HistoricalTransaction[]> {
        try {
            const query = `
            SELECT id, amount, currency, merchant_name, location, created_at
            FROM transactions
            WHERE user_id = $1 AND id <> $2
            ORDER BY created_at DESC
            LIMIT $3`;
            const result = await this.pool.query<HistoryRow>(query, [userId, excludeTransactionId ?? '', limit]);
            return result.rows.map(toHistorical);
        } catch (error) {
            logger.error('Error finding transactions by user ID', { error: describeError(error), userId });
            throw error;
        }
    }
}

/** Keeps the latest transactions of the most recently active users. */
export class InMemoryTransactionHistory implements TransactionHistory {
    readonly mode = 'memory' as const;
    private readonly byUser = new Map<string, Transaction[]>();

    constructor(
        private readonly maxPerUser: number = 100,
        private readonly maxUsers: number = 10000
    ) {}

    get userCount(): number {
        return this.byUser.size;
    }

    async record(transaction: Transaction): Promise<void> {
        const existing = this.byUser.get(transaction.userId) ?? [];
        if (existing.some(t => t.transactionId === transaction.transactionId)) {
            return;
        }

        const updated = [...existing, transaction]
            .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
            .slice(0, this.maxPerUser);

        // Re-inserting moves the user to the back of the eviction order.
        this.byUser.delete(transaction.userId);
        this.byUser.set(transaction.userId, updated);

        while (this.byUser.size > this.maxUsers) {
            const stalest = this.byUser.keys().next().value;
            if (stalest === undefined) {
                break;
            }
            this.byUser.delete(stalest);
        }
    }

    async findRecentByUser(userId: string, limit: number = 10, excludeTransactionId?: string): Promise<HistoricalTransaction[]> {
        return (this.byUser.get(userId) ?? [])
            .filter(t => t.transactionId !== excludeTransactionId)
            .slice(0, limit)
            .map(t => ({
                transactionId: t.transactionId,
                amount: t.amount,
                currency: t.currency,
                merchant: t.merchantName ?? 'Unknown',
                ...(t.location ? { location: t.location } : {}),
                time: t.timestamp.toISOString()
            }));
    }
}
