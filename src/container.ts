import OpenAI from 'openai';
import { Pool } from 'pg';
import Redis from 'ioredis';
import { createPool, testConnection } from './config/database';
import { logger, describeError } from './config/logger';
import { createRedis, testRedisConnection } from './config/redis';
import { Settings } from './config/settings';
import { InMemoryTransactionHistory, TransactionHistory, TransactionModel } from './models/Transaction';
import { EmbeddingProvider, HashingEmbeddingProvider, OpenAIEmbeddingProvider } from './services/embeddingService';
import { EnsembleAnalyzer } from './services/ensembleService';
import { FraudDetectionService } from './services/fraudDetectionService';
import { GeminiVisionBackend, GenerativeBackend, OpenAIChatBackend, UnconfiguredBackend } from './services/llmBackends';
import { PatternAnalyzer } from './services/patternService';
import { MemoryResultCache, RedisResultCache, ResultCache } from './services/resultCache';
import { SimilarityStore } from './services/similarityStore';
import { TransactionSimulator } from './services/transactionSimulator';
import { InMemoryVectorBackend, QdrantVectorBackend, VectorStoreBackend } from './services/vectorBackends';
import {
    CaseWorkflowDispatcher,
    OpusWorkflowBackend,
    UnconfiguredWorkflowBackend,
    WorkflowBackend
} from './services/workflowService';

export interface AppContainer {
    settings: Settings;
    fraudDetection: FraudDetectionService;
    workflows: CaseWorkflowDispatcher;
    simulator: TransactionSimulator;
    /** Pings the database and Redis when they are enabled; false when any is unreachable. */
    checkConnections(): Promise<boolean>;
    shutdown(): Promise<void>;
}

/** Collaborators a caller may supply instead of the ones settings would pick. */
export interface ContainerOverrides {
    textBackend?: GenerativeBackend;
    visionBackend?: GenerativeBackend;
    embeddings?: EmbeddingProvider;
    vectorBackend?: VectorStoreBackend;
    workflowBackend?: WorkflowBackend;
    history?: TransactionHistory;
    cache?: ResultCache;
}

export const createContainer = (settings: Settings, overrides: ContainerOverrides = {}): AppContainer => {
    const openai = settings.ensemble.apiKey
        ? new OpenAI({
            apiKey: settings.ensemble.apiKey,
            baseURL: settings.ensemble.baseUrl,
            timeout: settings.timeoutMs,
            maxRetries: 0
        })
        : null;

    const textBackend = overrides.textBackend
        ?? (openai ? new OpenAIChatBackend(openai, settings.ensemble.models[0]) : new UnconfiguredBackend('aiml_api'));

    const visionBackend = overrides.visionBackend
        ?? (settings.vision.apiKey
            ? new GeminiVisionBackend({
                apiKey: settings.vision.apiKey,
                baseUrl: settings.vision.baseUrl,
                model: settings.vision.model,
                timeoutMs: settings.timeoutMs
            })
            : new UnconfiguredBackend('gemini'));

    const embeddings = overrides.embeddings
        ?? (openai ? new OpenAIEmbeddingProvider(openai, settings.ensemble.embeddingModel) : new HashingEmbeddingProvider());

    const vectorBackend = overrides.vectorBackend
        ?? (settings.similarity.url
            ? new QdrantVectorBackend({
                url: settings.similarity.url,
                apiKey: settings.similarity.apiKey,
                collection: settings.similarity.collection,
                timeoutMs: settings.timeoutMs
            })
            : new InMemoryVectorBackend());

    const workflowBackend = overrides.workflowBackend
        ?? (settings.workflow.apiKey
            ? new OpusWorkflowBackend({
                apiKey: settings.workflow.apiKey,
                baseUrl: settings.workflow.baseUrl,
                timeoutMs: settings.timeoutMs
            })
            : new UnconfiguredWorkflowBackend());

    let pool: Pool | null = null;
    let history = overrides.history;
    if (!history) {
        if (settings.database.enabled) {
            pool = createPool(settings.database);
            history = new TransactionModel(pool);
        } else {
            history = new InMemoryTransactionHistory();
        }
    }

    let redis: Redis | null = null;
    let cache = overrides.cache;
    if (!cache) {
        if (settings.redis.enabled) {
            redis = createRedis(settings.redis);
            cache = new RedisResultCache(redis, settings.redis.resultTtlSeconds);
        } else {
            cache = new MemoryResultCache(settings.redis.resultTtlSeconds);
        }
    }

    const workflows = new CaseWorkflowDispatcher(workflowBackend);
    const similarity = new SimilarityStore(vectorBackend, embeddings);

    const fraudDetection = new FraudDetectionService(
        {
            ensemble: new EnsembleAnalyzer(textBackend, settings.ensemble.models),
            pattern: new PatternAnalyzer(visionBackend),
            embeddings,
            similarity,
            workflows,
            history,
            cache
        },
        {
            similarityLimit: settings.similarity.limit,
            similarityThreshold: settings.similarity.scoreThreshold
        }
    );

    logger.info('Collaborators configured', fraudDetection.collaboratorModes());

    const checkConnections = async (): Promise<boolean> => {
        const checks: Promise<boolean>[] = [];
        if (pool) {
            checks.push(testConnection(pool));
        }
        if (redis) {
            checks.push(testRedisConnection(redis));
        }
        const results = await Promise.all(checks);
        return results.every(Boolean);
    };

    const shutdown = async (): Promise<void> => {
        const closing: Promise<unknown>[] = [];
        if (pool) {
            closing.push(pool.end());
        }
        if (redis) {
            closing.push(redis.quit());
        }

        const outcomes = await Promise.allSettled(closing);
        for (const outcome of outcomes) {
            if (outcome.status === 'rejected') {
                logger.error('Error closing connection', { error: describeError(outcome.reason) });
            }
        }
    };

    return {
        settings,
        fraudDetection,
        workflows,
        simulator: new TransactionSimulator(),
        checkConnections,
        shutdown
    };
};
