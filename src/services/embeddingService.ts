import { createHash } from 'node:crypto';
import OpenAI from 'openai';
import { logger, describeError } from '../config/logger';
import { CollaboratorMode } from '../types/analysis';

export const EMBEDDING_DIMENSION = 384;

export interface EmbeddingProvider {
    readonly mode: CollaboratorMode;
    readonly dimension: number;
    embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

const tokenize = (text: string): string[] => text.toLowerCase().match(/[a-z0-9]+/g) ?? [];

/**
 * Signed feature hashing over word tokens, L2-normalised. Texts sharing vocabulary
 * land close together under cosine distance, and the same text always yields the
 * same vector.
 */
export const hashEmbedding = (text: string, dimension: number = EMBEDDING_DIMENSION): number[] => {
    const vector = new Array<number>(dimension).fill(0);

    for (const token of tokenize(text)) {
        const digest = createHash('sha256').update(token).digest();
        const index = digest.readUInt32BE(0) % dimension;
        const sign = (digest[4] & 1) === 0 ? 1 : -1;
        vector[index] += sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map(v => v / norm);
};

export class HashingEmbeddingProvider implements EmbeddingProvider {
    readonly mode: CollaboratorMode = 'degraded';

    constructor(readonly dimension: number = EMBEDDING_DIMENSION) {}

    async embed(text: string): Promise<number[]> {
        return hashEmbedding(text, this.dimension);
    }
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    readonly mode: CollaboratorMode = 'live';

    constructor(
        private readonly client: OpenAI,
        private readonly model: string,
        readonly dimension: number = EMBEDDING_DIMENSION
    ) {}

    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
        try {
            const response = await this.client.embeddings.create(
                { model: this.model, input: text, dimensions: this.dimension },
                { signal }
            );

            const embedding = response.data[0]?.embedding;
            if (embedding && embedding.length === this.dimension) {
                return embedding;
            }

            logger.warn('Embedding backend returned an unexpected vector, using hashed embedding', {
                model: this.model,
                length: embedding?.length ?? 0
            });
        } catch (error) {
            logger.error('Embedding generation error', { error: describeError(error), model: this.model });
        }

        return hashEmbedding(text, this.dimension);
    }
}
