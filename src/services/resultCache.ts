import Redis from 'ioredis';
import { getCache, setCache } from '../config/redis';
import { FraudAnalysisResult } from '../types/analysis';
import { isRecord } from './structuredResponse';

const KEY_PREFIX = 'fraud:analysis:';

export interface ResultCache {
    readonly mode: 'redis' | 'memory';
    save(result: FraudAnalysisResult): Promise<void>;
    load(caseId: string): Promise<FraudAnalysisResult | null>;
}

const looksLikeResult = (value: unknown): value is FraudAnalysisResult =>
    isRecord(value) &&
    typeof value.caseId === 'string' &&
    typeof value.isFraudulent === 'boolean' &&
    typeof value.riskLevel === 'string';

export class RedisResultCache implements ResultCache {
    readonly mode = 'redis' as const;

    constructor(private readonly redis: Redis, private readonly ttlSeconds: number) {}

    async save(result: FraudAnalysisResult): Promise<void> {
        await setCache(this.redis, `${KEY_PREFIX}${result.caseId}`, result, this.ttlSeconds);
    }

    async load(caseId: string): Promise<FraudAnalysisResult | null> {
        const cached = await getCache(this.redis, `${KEY_PREFIX}${caseId}`);
        return looksLikeResult(cached) ? cached : null;
    }
}

export class MemoryResultCache implements ResultCache {
    readonly mode = 'memory' as const;
    private readonly entries = new Map<string, { result: FraudAnalysisResult; expiresAt: number }>();

    constructor(
        private readonly ttlSeconds: number,
        private readonly maxEntries: number = 1000,
        private readonly now: () => number = Date.now
    ) {}

    async save(result: FraudAnalysisResult): Promise<void> {
        this.entries.delete(result.caseId);
        this.entries.set(result.caseId, { result, expiresAt: this.now() + this.ttlSeconds * 1000 });

        while (this.entries.size > this.maxEntries) {
            const oldest = this.entries.keys().next().value;
            if (oldest === undefined) {
                break;
            }
            this.entries.delete(oldest);
        }
    }

    async load(caseId: string): Promise<FraudAnalysisResult | null> {
        const entry = this.entries.get(caseId);
        if (!entry) {
            return null;
        }
        if (entry.expiresAt <= this.now()) {
            this.entries.delete(caseId);
            return null;
        }
        return entry.result;
    }
}
