import { logger, describeError } from '../config/logger';
import { AllModelsUnavailableError, RequestCancelledError } from '../middleware/errorHandler';
import { TransactionHistory } from '../models/Transaction';
import {
    CollaboratorMode,
    DocumentOpinion,
    EnsembleOpinion,
    FraudAnalysisResult,
    PatternStatistics,
    SimilaritySearchResult,
    WorkflowDescriptor
} from '../types/analysis';
import { HistoricalTransaction, Transaction } from '../types/transaction';
import { EmbeddingProvider } from './embeddingService';
import { EnsembleAnalyzer, neutralEnsembleOpinion } from './ensembleService';
import { decide, recommendActions, riskLevelFor, SIMILARITY_BONUS, MAX_REASONS } from './fusionEngine';
import { MAX_HISTORY_ITEMS, PatternAnalyzer } from './patternService';
import { ResultCache } from './resultCache';
import { SimilarityStore } from './similarityStore';
import { dedupe } from './structuredResponse';
import { CaseWorkflowDispatcher, newCaseId } from './workflowService';

export interface FraudDetectionDependencies {
    ensemble: EnsembleAnalyzer;
    pattern: PatternAnalyzer;
    embeddings: EmbeddingProvider;
    similarity: SimilarityStore;
    workflows: CaseWorkflowDispatcher;
    history: TransactionHistory;
    cache: ResultCache;
}

export interface FraudDetectionOptions {
    similarityLimit?: number;
    similarityThreshold?: number;
}

export interface AnalyzeTransactionOptions {
    signal?: AbortSignal;
    history?: HistoricalTransaction[];
}

export interface AnalyzeDocumentOptions {
    mimeType?: string;
    signal?: AbortSignal;
}

const DOCUMENT_SIMILARITY_LIMIT = 3;
const DOCUMENT_WORKFLOW_CONFIDENCE = 0.7;

export const transactionFeatures = (transaction: Transaction): Record<string, unknown> => ({
    ...transaction,
    timestamp: transaction.timestamp.toISOString()
});

export const transactionToText = (transaction: Transaction): string => [
    `Transaction: ${transaction.transactionType}`,
    `Amount: ${transaction.amount} ${transaction.currency}`,
    `Merchant: ${transaction.merchantName ?? 'Unknown'}`,
    `Category: ${transaction.merchantCategory ?? 'Unknown'}`,
    `Location: ${transaction.location ?? 'Unknown'}`,
    `Time: ${transaction.timestamp.toISOString()}`
].join('\n');

const throwIfAborted = (signal?: AbortSignal): void => {
    if (signal?.aborted) {
        throw new RequestCancelledError();
    }
};

export class FraudDetectionService {
    private readonly similarityLimit: number;
    private readonly similarityThreshold: number;

    constructor(
        private readonly deps: FraudDetectionDependencies,
        options: FraudDetectionOptions = {}
    ) {
        this.similarityLimit = options.similarityLimit ?? 5;
        this.similarityThreshold = options.similarityThreshold ?? 0.7;
    }

    async analyzeTransaction(
        transaction: Transaction,
        options: AnalyzeTransactionOptions = {}
    ): Promise<FraudAnalysisResult> {
        const startTime = Date.now();
        const { signal } = options;
        const caseId = newCaseId();

        logger.info('Analyzing transaction', { transactionId: transaction.transactionId, caseId });
        throwIfAborted(signal);

        const features = transactionFeatures(transaction);
        const transactionText = transactionToText(transaction);

        const [ensemble, pattern, similarity] = await Promise.all([
            this.runEnsemble(features, signal),
            this.runPatternAnalysis(transaction, features, options.history, signal),
            this.runSimilaritySearch(transactionText, this.similarityLimit, signal)
        ]);

        throwIfAborted(signal);

        const verdict = decide(ensemble, pattern, similarity.search.cases);

        let workflow: WorkflowDescriptor | null = null;
        let caseStored = false;

        if (verdict.isFraudulent) {
            [workflow, caseStored] = await Promise.all([
                this.deps.workflows.createInvestigation(
                    {
                        caseId,
                        transactionId: transaction.transactionId,
                        userId: transaction.userId,
                        fraudType: verdict.fraudType,
                        riskLevel: verdict.riskLevel,
                        confidence: verdict.confidenceScore
                    },
                    verdict.riskLevel === 'critical' ? 'high' : 'medium',
                    signal
                ),
                this.deps.similarity.upsert(caseId, verdict.fraudType, similarity.embedding, {
                    transactionId: transaction.transactionId,
                    userId: transaction.userId,
                    amount: transaction.amount,
                    currency: transaction.currency,
                    timestamp: transaction.timestamp.toISOString(),
                    riskLevel: verdict.riskLevel,
                    description: transactionText.replace(/\n/g, '; ')
                }, signal)
            ]);
        }

        const explanation = await this.deps.pattern.explain({
            caseId,
            transaction: features,
            analysis: verdict,
            similarCases: similarity.search.cases
        }, signal);

        throwIfAborted(signal);
        await this.recordHistory(transaction);

        const result: FraudAnalysisResult = {
            ...verdict,
            caseId,
            transactionId: transaction.transactionId,
            similarCases: similarity.search.cases,
            similarityMode: similarity.search.mode,
            processingTimeMs: Date.now() - startTime,
            analysisDetails: {
                ensemble,
                pattern,
                similarCasesCount: similarity.search.cases.length,
                caseStored,
                workflow,
                explanation,
                collaborators: this.collaboratorModes()
            }
        };

        await this.cacheResult(result);

        logger.info('Transaction scored', {
            transactionId: transaction.transactionId,
            caseId,
            userId: transaction.userId,
            amount: transaction.amount,
            finalScore: verdict.componentScores.final,
            riskLevel: verdict.riskLevel,
            isFraudulent: verdict.isFraudulent,
            processingTime: result.processingTimeMs
        });

        return result;
    }

    async analyzeDocument(
        documentBase64: string,
        documentType: string,
        userId: string,
        options: AnalyzeDocumentOptions = {}
    ): Promise<FraudAnalysisResult> {
        const startTime = Date.now();
        const { signal } = options;
        const caseId = newCaseId('DOC');

        logger.info('Analyzing document', { documentType, userId, caseId });
        throwIfAborted(signal);

        const opinion = await this.deps.pattern.analyzeDocument(documentBase64, documentType, options.mimeType, signal);
        throwIfAborted(signal);

        const description = `${documentType} fraud analysis: ${opinion.fraudIndicators.join(', ') || 'no indicators'}`;
        const similarity = await this.runSimilaritySearch(description, DOCUMENT_SIMILARITY_LIMIT, signal);

        let workflow: WorkflowDescriptor | null = null;
        if (opinion.isFraudulent && opinion.confidence > DOCUMENT_WORKFLOW_CONFIDENCE) {
            workflow = await this.deps.workflows.createInvestigation(
                {
                    caseId,
                    userId,
                    fraudType: 'document_fraud',
                    documentType,
                    confidence: opinion.confidence
                },
                'high',
                signal
            );
        }

        throwIfAborted(signal);

        const result = this.documentResult(caseId, opinion, similarity.search, workflow, documentType, Date.now() - startTime);
        await this.cacheResult(result);

        logger.info('Document scored', {
            caseId,
            documentType,
            userId,
            isFraudulent: result.isFraudulent,
            riskLevel: result.riskLevel
        });

        return result;
    }

    async findSimilarPatterns(text: string, limit: number = this.similarityLimit, signal?: AbortSignal): Promise<SimilaritySearchResult> {
        const { search } = await this.runSimilaritySearch(text, limit, signal);
        return search;
    }

    async patternStatistics(): Promise<PatternStatistics> {
        return this.deps.similarity.statistics();
    }

    async getResult(caseId: string): Promise<FraudAnalysisResult | null> {
        return this.deps.cache.load(caseId);
    }

    collaboratorModes(): Record<string, CollaboratorMode> {
        return {
            ensemble: this.deps.ensemble.mode,
            pattern: this.deps.pattern.mode,
            embeddings: this.deps.embeddings.mode,
            similarity: this.deps.similarity.mode,
            workflows: this.deps.workflows.mode,
            history: this.deps.history.mode === 'postgres' ? 'live' : 'degraded',
            cache: this.deps.cache.mode === 'redis' ? 'live' : 'degraded'
        };
    }

    private async runEnsemble(features: Record<string, unknown>, signal?: AbortSignal): Promise<EnsembleOpinion> {
        const models = this.deps.ensemble.models;

        try {
            return await this.deps.ensemble.analyze(features, models, signal);
        } catch (error) {
            if (error instanceof AllModelsUnavailableError) {
                logger.warn('All ensemble models failed, substituting neutral opinion', {
                    failures: error.failures
                });
                return neutralEnsembleOpinion(models, error.failures);
            }

            logger.error('Ensemble analysis error, substituting neutral opinion', { error: describeError(error) });
            return neutralEnsembleOpinion(models);
        }
    }

    private async runPatternAnalysis(
        transaction: Transaction,
        features: Record<string, unknown>,
        suppliedHistory: HistoricalTransaction[] | undefined,
        signal?: AbortSignal
    ) {
        const history = suppliedHistory ?? await this.loadHistory(transaction);
        return this.deps.pattern.analyzeTransactionPattern(features, history.slice(0, MAX_HISTORY_ITEMS), signal);
    }

    private async runSimilaritySearch(
        text: string,
        limit: number,
        signal?: AbortSignal
    ): Promise<{ embedding: number[]; search: SimilaritySearchResult }> {
        const embedding = await this.deps.embeddings.embed(text, signal);
        const search = await this.deps.similarity.search(embedding, limit, this.similarityThreshold, signal);

        if (search.mode === 'fallback') {
            logger.warn('Similarity store degraded, fallback patterns in use');
        }

        return { embedding, search };
    }

    private async loadHistory(transaction: Transaction): Promise<HistoricalTransaction[]> {
        try {
            return await this.deps.history.findRecentByUser(transaction.userId, MAX_HISTORY_ITEMS, transaction.transactionId);
        } catch (error) {
            logger.warn('Transaction history unavailable, analyzing without history', {
                userId: transaction.userId,
                error: describeError(error)
            });
            return [];
        }
    }

    private async recordHistory(transaction: Transaction): Promise<void> {
        try {
            await this.deps.history.record(transaction);
        } catch (error) {
            logger.warn('Could not record transaction history', {
                transactionId: transaction.transactionId,
                error: describeError(error)
            });
        }
    }

    private async cacheResult(result: FraudAnalysisResult): Promise<void> {
        try {
            await this.deps.cache.save(result);
        } catch (error) {
            logger.warn('Could not cache analysis result', { caseId: result.caseId, error: describeError(error) });
        }
    }

    private documentResult(
        caseId: string,
        opinion: DocumentOpinion,
        search: SimilaritySearchResult,
        workflow: WorkflowDescriptor | null,
        documentType: string,
        processingTimeMs: number
    ): FraudAnalysisResult {
        // Fraud likelihood: a confident "authentic" verdict is low risk.
        const score = opinion.isFraudulent ? opinion.confidence : 1 - opinion.confidence;
        const riskLevel = riskLevelFor(score);
        const fraudType = opinion.isFraudulent ? 'identity_theft' : 'unknown';
        const recommendations = opinion.recommendations.length > 0
            ? opinion.recommendations
            : recommendActions(opinion.isFraudulent, riskLevel, fraudType);

        return {
            isFraudulent: opinion.isFraudulent,
            confidenceScore: opinion.confidence,
            fraudType,
            riskLevel,
            reasons: dedupe(opinion.fraudIndicators).slice(0, MAX_REASONS),
            recommendedActions: recommendations,
            componentScores: {
                ensemble: 0,
                pattern: score,
                similarity: search.cases.length > 0 ? SIMILARITY_BONUS : 0,
                final: score
            },
            caseId,
            similarCases: search.cases,
            similarityMode: search.mode,
            processingTimeMs,
            analysisDetails: {
                documentType,
                document: opinion,
                authenticityScore: opinion.authenticityScore,
                workflow,
                collaborators: this.collaboratorModes()
            }
        };
    }
}
