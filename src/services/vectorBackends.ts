import axios, { AxiosInstance } from 'axios';
import { CollaboratorMode } from '../types/analysis';
import { CollaboratorUnavailableError } from '../middleware/errorHandler';
import { describeError } from '../config/logger';

export type DistanceMetric = 'cosine';

export interface VectorPoint {
    id: number;
    vector: number[];
    payload: Record<string, unknown>;
}

export interface VectorHit {
    id: number;
    score: number;
    payload: Record<string, unknown>;
}

export interface CollectionStats {
    pointsCount: number;
    dimension: number;
    distanceMetric: string;
}

export interface VectorStoreBackend {
    readonly name: string;
    readonly mode: CollaboratorMode;
    collectionExists(): Promise<boolean>;
    createCollection(dimension: number, metric: DistanceMetric): Promise<void>;
    upsert(points: VectorPoint[], signal?: AbortSignal): Promise<void>;
    retrieve(id: number): Promise<VectorPoint | null>;
    search(vector: number[], limit: number, scoreThreshold: number, signal?: AbortSignal): Promise<VectorHit[]>;
    collectionStats(): Promise<CollectionStats>;
}

export const cosineSimilarity = (a: readonly number[], b: readonly number[]): number => {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    const length = Math.min(a.length, b.length);

    for (let i = 0; i < length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

/**
 * Process-local index. Points are replaced whole on upsert, and a search scores a
 * snapshot of the points present when it starts.
 */
export class InMemoryVectorBackend implements VectorStoreBackend {
    readonly name = 'memory';
    readonly mode: CollaboratorMode = 'live';

    private points = new Map<number, VectorPoint>();
    private config: { dimension: number; metric: DistanceMetric } | null = null;

    async collectionExists(): Promise<boolean> {
        return this.config !== null;
    }

    async createCollection(dimension: number, metric: DistanceMetric): Promise<void> {
        if (this.config) {
            throw new Error('Collection already exists');
        }
        this.config = { dimension, metric };
    }

    async upsert(points: VectorPoint[]): Promise<void> {
        const config = this.requireCollection();

        for (const point of points) {
            if (point.vector.length !== config.dimension) {
                throw new Error(`Vector dimension ${point.vector.length} does not match ${config.dimension}`);
            }
        }
        for (const point of points) {
            this.points.set(point.id, {
                id: point.id,
                vector: [...point.vector],
                payload: { ...point.payload }
            });
        }
    }

    async retrieve(id: number): Promise<VectorPoint | null> {
        this.requireCollection();
        const point = this.points.get(id);
        return point ? { id: point.id, vector: [...point.vector], payload: { ...point.payload } } : null;
    }

    async search(vector: number[], limit: number, scoreThreshold: number): Promise<VectorHit[]> {
        this.requireCollection();
        const snapshot = [...this.points.values()];

        return snapshot
            .map(point => ({ id: point.id, score: cosineSimilarity(vector, point.vector), payload: { ...point.payload } }))
            .filter(hit => hit.score >= scoreThreshold)
            .sort((a, b) => b.score - a.score)
            .slice(0, limit);
    }

    async collectionStats(): Promise<CollectionStats> {
        const config = this.requireCollection();
        return {
            pointsCount: this.points.size,
            dimension: config.dimension,
            distanceMetric: config.metric
        };
    }

    private requireCollection(): { dimension: number; metric: DistanceMetric } {
        if (!this.config) {
            throw new Error('Collection does not exist');
        }
        return this.config;
    }
}

interface QdrantEnvelope<T> {
    result: T;
    status?: string;
}

interface QdrantCollectionInfo {
    points_count?: number | null;
    config: {
        params: {
            vectors: {
                size: number;
                distance: string;
            };
        };
    };
}

interface QdrantScoredPoint {
    id: number | string;
    score: number;
    payload?: Record<string, unknown> | null;
}

interface QdrantRecord {
    id: number | string;
    vector?: number[] | null;
    payload?: Record<string, unknown> | null;
}

export interface QdrantBackendOptions {
    url: string;
    apiKey?: string;
    collection: string;
    timeoutMs: number;
}

const QDRANT_DISTANCE: Record<DistanceMetric, string> = {
    cosine: 'Cosine'
};

/** Qdrant over its REST API. */
export class QdrantVectorBackend implements VectorStoreBackend {
    readonly name = 'qdrant';
    readonly mode: CollaboratorMode = 'live';
    private readonly http: AxiosInstance;
    private readonly collectionPath: string;

    constructor(options: QdrantBackendOptions, http?: AxiosInstance) {
        this.http = http ?? axios.create({
            baseURL: options.url,
            timeout: options.timeoutMs,
            headers: {
                'Content-Type': 'application/json',
                ...(options.apiKey ? { 'api-key': options.apiKey } : {})
            }
        });
        this.collectionPath = `/collections/${encodeURIComponent(options.collection)}`;
    }

    async collectionExists(): Promise<boolean> {
        try {
            await this.http.get<QdrantEnvelope<QdrantCollectionInfo>>(this.collectionPath);
            return true;
        } catch (error) {
            if (axios.isAxiosError(error) && error.response?.status === 404) {
                return false;
            }
            throw this.unavailable(error);
        }
    }

    async createCollection(dimension: number, metric: DistanceMetric): Promise<void> {
        await this.call(() => this.http.put(this.collectionPath, {
            vectors: { size: dimension, distance: QDRANT_DISTANCE[metric] }
        }));
    }

    async upsert(points: VectorPoint[], signal?: AbortSignal): Promise<void> {
        await this.call(() => this.http.put(
            `${this.collectionPath}/points`,
            { points },
            { params: { wait: true }, signal }
        ));
    }

    async retrieve(id: number): Promise<VectorPoint | null> {
        try {
            const response = await this.http.get<QdrantEnvelope<QdrantRecord>>(`${this.collectionPath}/points/${id}`);
            const record = response.data.result;
            return {
                id,
                vector: record.vector ?? [],
                payload: record.payload ?? {}
            };
        } catch (error) {
            if (axios.isAxiosError(error) && error.response?.status === 404) {
                return null;
            }
            throw this.unavailable(error);
        }
    }

    async search(vector: number[], limit: number, scoreThreshold: number, signal?: AbortSignal): Promise<VectorHit[]> {
        const response = await this.call(() => this.http.post<QdrantEnvelope<QdrantScoredPoint[]>>(
            `${this.collectionPath}/points/search`,
            {
                vector,
                limit,
                score_threshold: scoreThreshold,
                with_payload: true
            },
            { signal }
        ));

        return response.data.result.map(hit => ({
            id: Number(hit.id),
            score: hit.score,
            payload: hit.payload ?? {}
        }));
    }

    async collectionStats(): Promise<CollectionStats> {
        const response = await this.call(() => this.http.get<QdrantEnvelope<QdrantCollectionInfo>>(this.collectionPath));
        const info = response.data.result;

        return {
            pointsCount: info.points_count ?? 0,
            dimension: info.config.params.vectors.size,
            distanceMetric: info.config.params.vectors.distance.toLowerCase()
        };
    }

    private async call<T>(request: () => Promise<T>): Promise<T> {
        try {
            return await request();
        } catch (error) {
            throw this.unavailable(error);
        }
    }

    private unavailable(error: unknown): CollaboratorUnavailableError {
        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
        return new CollaboratorUnavailableError(this.name, status ? `HTTP ${status}` : describeError(error));
    }
}
