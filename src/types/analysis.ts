import { FraudType } from './transaction';

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

export type AgreementLevel = 'high' | 'medium' | 'low' | 'unknown';

export type CollaboratorMode = 'live' | 'degraded';

export interface ModelOpinion {
    model: string;
    fraudProbability: number;
    confidence: number;
    riskFactors: string[];
}

export interface ModelFailure {
    model: string;
    error: string;
}

export type ModelResult = ModelOpinion | ModelFailure;

export interface EnsembleOpinion {
    fraudProbability: number;
    confidence: number;
    isFraudulent: boolean;
    riskFactors: string[];
    agreementLevel: AgreementLevel;
    modelsUsed: string[];
    individualModels: Record<string, ModelResult>;
    degraded: boolean;
}

export interface PatternOpinion {
    isSuspicious: boolean;
    confidence: number;
    anomalies: string[];
    riskFactors: string[];
    explanation: string;
    parsed: boolean;
    rawResponse?: string;
    degraded: boolean;
}

export interface DocumentOpinion {
    isFraudulent: boolean;
    confidence: number;
    fraudIndicators: string[];
    authenticityScore: number;
    recommendations: string[];
    parsed: boolean;
    rawResponse?: string;
    degraded: boolean;
}

export type PatternSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface SimilarCase {
    patternId: string;
    fraudType: FraudType;
    description: string;
    severity: PatternSeverity | string;
    similarityScore: number;
}

export interface SimilaritySearchResult {
    cases: SimilarCase[];
    mode: 'live' | 'fallback';
}

export interface PatternStatistics {
    totalCount: number;
    dimension: number;
    distanceMetric: string;
    mode: 'live' | 'fallback';
}

export interface ComponentScores {
    ensemble: number;
    pattern: number;
    similarity: number;
    final: number;
}

export interface FraudVerdict {
    readonly isFraudulent: boolean;
    readonly confidenceScore: number;
    readonly fraudType: FraudType;
    readonly riskLevel: RiskLevel;
    readonly reasons: readonly string[];
    readonly recommendedActions: readonly string[];
    readonly componentScores: Readonly<ComponentScores>;
}

export type WorkflowPriority = 'low' | 'medium' | 'high' | 'urgent';

export interface WorkflowDescriptor {
    workflowId: string;
    status: string;
    priority: WorkflowPriority;
    caseId: string;
    createdAt: string;
    stepsCompleted: string[];
    currentStep: string;
    nextSteps: string[];
    estimatedCompletion: string;
    complianceFrameworks: string[];
    assignedTo: string;
    degraded: boolean;
}

export interface WorkflowStatus {
    workflowId: string;
    status: string;
    progressPercentage: number;
    stepsCompleted: string[];
    currentStep: string;
    pendingSteps: string[];
    results: Record<string, unknown>;
    updatedAt: string;
    degraded: boolean;
}

export interface ComplianceCheckResult {
    complianceStatus: string;
    checksPerformed: Record<string, unknown>;
    riskLevel: string;
    requiresSarFiling: boolean;
    recommendations: string[];
    checkedAt: string;
    degraded: boolean;
}

export interface FraudAnalysisResult extends FraudVerdict {
    caseId: string;
    transactionId?: string;
    similarCases: SimilarCase[];
    similarityMode: SimilaritySearchResult['mode'];
    processingTimeMs: number;
    analysisDetails: Record<string, unknown>;
}

export interface StoredFraudCase {
    caseId: string;
    fraudType: FraudType;
    vector: number[];
    metadata: Record<string, unknown>;
}
