import { createHash } from 'node:crypto';
import { logger, describeError } from '../config/logger';
import {
    CollaboratorMode,
    PatternStatistics,
    SimilarCase,
    SimilaritySearchResult,
    StoredFraudCase
} from '../types/analysis';
import { FraudType, isFraudType } from '../types/transaction';
import { EMBEDDING_DIMENSION, EmbeddingProvider } from './embeddingService';
import { clamp01 } from './structuredResponse';
import { DistanceMetric, VectorHit, VectorStoreBackend } from './vectorBackends';

export interface SeedPattern {
    patternId: string;
    fraudType: FraudType;
    description: string;
    severity: string;
}

export const SEED_PATTERNS: readonly SeedPattern[] = [
    {
        patternId: 'fraud_001',
        fraudType: 'card_fraud',
        description: 'Multiple transactions from different countries within 1 hour',
        severity: 'critical'
    },
    {
        patternId: 'fraud_002',
        fraudType: 'money_laundering',
        description: 'Large transfers followed by immediate withdrawals in different currency',
        severity: 'high'
    },
    {
        patternId: 'fraud_003',
        fraudType: 'identity_theft',
        description: 'Sudden change in spending patterns and new device login',
        severity: 'high'
    },
    {
        patternId: 'fraud_004',
        fraudType: 'synthetic_identity',
        description: 'New account with high credit limit, rapid maxing out',
        severity: 'critical'
    },
    {
        patternId: 'fraud_005',
        fraudType: 'card_fraud',
        description: 'Small test transactions followed by large purchase',
        severity: 'medium'
    }
];

/** Served by `search` while the backing store is unreachable. */
export const FALLBACK_SIMILAR_CASES: readonly SimilarCase[] = [
    {
        patternId: 'fraud_001',
        fraudType: 'card_fraud',
        description: 'Multiple transactions from different countries within 1 hour',
        severity: 'critical',
        similarityScore: 0.89
    },
    {
        patternId: 'fraud_005',
        fraudType: 'card_fraud',
        description: 'Small test transactions followed by large purchase',
        severity: 'medium',
        similarityScore: 0.76
    }
];

/**
 * Stable numeric point id for a case id: the leading 52 bits of its SHA-256.
 * Two distinct ids may collide; the later upsert then replaces the earlier case.
 */
export const pointIdFor = (caseId: string): number =>
    parseInt(createHash('sha256').update(caseId).digest('hex').slice(0, 13), 16);

const stringField = (payload: Record<string, unknown>, key: string): string | undefined => {
    const value = payload[key];
    return typeof value === 'string' ? value : undefined;
};

const toSimilarCase = (hit: VectorHit): SimilarCase => {
    const rawType = hit.payload.fraudType;
    const fraudType: FraudType = isFraudType(rawType) ? rawType : 'unknown';

    return {
        patternId: stringField(hit.payload, 'patternId') ?? stringField(hit.payload, 'caseId') ?? String(hit.id),
        fraudType,
        description: stringField(hit.payload, 'description') ?? `Confirmed ${fraudType} case`,
        severity: stringField(hit.payload, 'severity') ?? stringField(hit.payload, 'riskLevel') ?? 'high',
        similarityScore: clamp01(hit.score)
    };
};

export interface SimilarityStoreOptions {
    dimension?: number;
    distanceMetric?: DistanceMetric;
}

export class SimilarityStore {
    readonly dimension: number;
    readonly distanceMetric: DistanceMetric;
    private ready: Promise<void> | null = null;

    constructor(
        private readonly backend: VectorStoreBackend,
        private readonly embeddings: EmbeddingProvider,
        options: SimilarityStoreOptions = {}
    ) {
        this.dimension = options.dimension ?? EMBEDDING_DIMENSION;
        this.distanceMetric = options.distanceMetric ?? 'cosine';

        if (embeddings.dimension !== this.dimension) {
            throw new Error(
                `Embedding dimension ${embeddings.dimension} does not match store dimension ${this.dimension}`
            );
        }
    }

    get mode(): CollaboratorMode {
        return this.backend.mode;
    }

    get backendName(): string {
        return this.backend.name;
    }

    /**
     * Creates and seeds the collection on first use. Concurrent callers share one
     * initialisation; a failed attempt is retried by the next call.
     */
    ensureReady(): Promise<void> {
        if (!this.ready) {
            this.ready = this.initialize().catch((error: unknown) => {
                this.ready = null;
                throw error;
            });
        }
        return this.ready;
    }

    async search(
        vector: number[],
        limit: number = 5,
        scoreThreshold: number = 0.7,
        signal?: AbortSignal
    ): Promise<SimilaritySearchResult> {
        if (vector.length !== this.dimension) {
            logger.error('Similarity search vector has the wrong dimension', {
                expected: this.dimension,
                received: vector.length
            });
            return this.fallback(limit);
        }

        try {
            await this.ensureReady();
            const hits = await this.backend.search(vector, limit, scoreThreshold, signal);

            const cases = hits
                .map(toSimilarCase)
                .filter(c => c.similarityScore >= scoreThreshold)
                .sort((a, b) => b.similarityScore - a.similarityScore)
                .slice(0, limit);

            return { cases, mode: 'live' };
        } catch (error) {
            logger.error('Similarity search error, serving fallback patterns', {
                backend: this.backend.name,
                error: describeError(error)
            });
            return this.fallback(limit);
        }
    }

    async upsert(
        caseId: string,
        fraudType: FraudType,
        vector: number[],
        metadata: Record<string, unknown> = {},
        signal?: AbortSignal
    ): Promise<boolean> {
        if (vector.length !== this.dimension) {
            logger.error('Refusing to store fraud case with wrong vector dimension', {
                caseId,
                expected: this.dimension,
                received: vector.length
            });
            return false;
        }

        try {
            await this.ensureReady();
            await this.backend.upsert([{
                id: pointIdFor(caseId),
                vector,
                payload: { ...metadata, caseId, fraudType }
            }], signal);

            logger.info('Stored fraud case', { caseId, fraudType });
            return true;
        } catch (error) {
            logger.error('Fraud case storage error', { caseId, error: describeError(error) });
            return false;
        }
    }

    async getCase(caseId: string): Promise<StoredFraudCase | null> {
        try {
            await this.ensureReady();
            const point = await this.backend.retrieve(pointIdFor(caseId));
            if (!point) {
                return null;
            }

            const { caseId: storedId, fraudType, ...metadata } = point.payload;
            return {
                caseId: typeof storedId === 'string' ? storedId : caseId,
                fraudType: isFraudType(fraudType) ? fraudType : 'unknown',
                vector: point.vector,
                metadata
            };
        } catch (error) {
            logger.error('Fraud case lookup error', { caseId, error: describeError(error) });
            return null;
        }
    }

    async statistics(): Promise<PatternStatistics> {
        try {
            await this.ensureReady();
            const stats = await this.backend.collectionStats();
            return {
                totalCount: stats.pointsCount,
                dimension: stats.dimension,
                distanceMetric: stats.distanceMetric,
                mode: 'live'
            };
        } catch (error) {
            logger.error('Pattern statistics error', { backend: this.backend.name, error: describeError(error) });
            return {
                totalCount: 0,
                dimension: this.dimension,
                distanceMetric: this.distanceMetric,
                mode: 'fallback'
            };
        }
    }

    private fallback(limit: number): SimilaritySearchResult {
        return {
            cases: FALLBACK_SIMILAR_CASES.slice(0, limit).map(c => ({ ...c })),
            mode: 'fallback'
        };
    }

    private async initialize(): Promise<void> {
        if (await this.backend.collectionExists()) {
            const stats = await this.backend.collectionStats();
            if (stats.pointsCount >= SEED_PATTERNS.length) {
                return;
            }
        } else {
            await this.backend.createCollection(this.dimension, this.distanceMetric);
            logger.info('Created fraud pattern collection', {
                backend: this.backend.name,
                dimension: this.dimension,
                distanceMetric: this.distanceMetric
            });
        }

        // Seed point ids are stable, so seeding again after a failed attempt only overwrites.
        const points = await Promise.all(SEED_PATTERNS.map(async pattern => ({
            id: pointIdFor(pattern.patternId),
            vector: await this.embeddings.embed(pattern.description),
            payload: {
                patternId: pattern.patternId,
                fraudType: pattern.fraudType,
                description: pattern.description,
                severity: pattern.severity
            }
        })));

        await this.backend.upsert(points);
        logger.info(`Seeded ${points.length} fraud patterns`);
    }
}
