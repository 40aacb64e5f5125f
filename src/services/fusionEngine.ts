import {
    ComponentScores,
    EnsembleOpinion,
    FraudVerdict,
    PatternOpinion,
    RiskLevel,
    SimilarCase
} from '../types/analysis';
import { FraudType } from '../types/transaction';
import { clamp01 } from './structuredResponse';

/**
 * Fusion weights and decision thresholds. These are hand-picked rather than
 * calibrated against labelled outcomes; treat them as tunable.
 */
export const FUSION_WEIGHTS = {
    ensemble: 0.5,
    pattern: 0.35,
    similarity: 0.15
} as const;

export const SIMILARITY_BONUS = 0.15;
export const FRAUD_THRESHOLD = 0.7;

export const RISK_THRESHOLDS: ReadonlyArray<readonly [number, RiskLevel]> = [
    [0.9, 'critical'],
    [0.75, 'high'],
    [0.5, 'medium']
];

export const MAX_REASONS = 5;
export const DEFAULT_FRAUD_TYPE: FraudType = 'card_fraud';

export const APPROVED_ACTIONS = ['Transaction approved', 'Continue monitoring'] as const;

export const IMMEDIATE_ACTIONS = [
    'Block transaction',
    'Freeze account pending investigation',
    'Contact customer via verified phone number'
] as const;

export const STANDARD_CHECKLIST = [
    'Create fraud investigation case',
    'Review recent transaction history',
    'Verify customer identity',
    'Check for similar patterns in other accounts'
] as const;

export const SAR_FILING_ACTION = 'File Suspicious Activity Report (SAR)';

export const patternTermFor = (pattern: Pick<PatternOpinion, 'isSuspicious' | 'confidence'>): number => {
    const confidence = clamp01(pattern.confidence);
    return pattern.isSuspicious ? confidence : 1 - confidence;
};

export const fuseScore = (ensembleTerm: number, patternTerm: number, similarityTerm: number): number =>
    clamp01(
        FUSION_WEIGHTS.ensemble * clamp01(ensembleTerm) +
        FUSION_WEIGHTS.pattern * clamp01(patternTerm) +
        FUSION_WEIGHTS.similarity * clamp01(similarityTerm)
    );

export const isFraudScore = (score: number): boolean => score > FRAUD_THRESHOLD;

export const riskLevelFor = (score: number): RiskLevel => {
    for (const [threshold, level] of RISK_THRESHOLDS) {
        if (score >= threshold) {
            return level;
        }
    }
    return 'low';
};

/** Most frequent fraud type among the cases; on equal counts the type seen first wins. */
export const dominantFraudType = (cases: readonly SimilarCase[]): FraudType => {
    if (cases.length === 0) {
        return DEFAULT_FRAUD_TYPE;
    }

    const counts = new Map<FraudType, number>();
    for (const c of cases) {
        counts.set(c.fraudType, (counts.get(c.fraudType) ?? 0) + 1);
    }

    // Map iteration follows insertion order, i.e. first occurrence.
    let best: FraudType = cases[0].fraudType;
    let bestCount = 0;
    for (const [type, count] of counts) {
        if (count > bestCount) {
            best = type;
            bestCount = count;
        }
    }
    return best;
};

export const collectReasons = (
    riskFactors: readonly string[],
    anomalies: readonly string[],
    similarCaseCount: number
): string[] => {
    const reasons = new Set<string>();
    const candidates = [...riskFactors, ...anomalies];

    if (similarCaseCount > 0) {
        candidates.push(`Similar to ${similarCaseCount} known fraud patterns`);
    }

    for (const candidate of candidates) {
        if (reasons.size >= MAX_REASONS) {
            break;
        }
        reasons.add(candidate);
    }

    return [...reasons];
};

export const recommendActions = (isFraudulent: boolean, riskLevel: RiskLevel, fraudType: FraudType): string[] => {
    if (!isFraudulent) {
        return [...APPROVED_ACTIONS];
    }

    const actions: string[] = [];

    if (riskLevel === 'critical' || riskLevel === 'high') {
        actions.push(...IMMEDIATE_ACTIONS);
    }

    actions.push(...STANDARD_CHECKLIST);

    if (fraudType === 'money_laundering') {
        actions.push(SAR_FILING_ACTION);
    }

    return actions;
};

/**
 * Fuses the ensemble opinion, the pattern opinion and the similarity search into
 * one verdict. Pure and total: callers substitute neutral opinions for missing
 * sources before calling.
 */
export const decide = (
    ensemble: Pick<EnsembleOpinion, 'fraudProbability' | 'confidence' | 'riskFactors'>,
    pattern: Pick<PatternOpinion, 'isSuspicious' | 'confidence' | 'anomalies'>,
    similarCases: readonly SimilarCase[]
): FraudVerdict => {
    const ensembleTerm = clamp01(ensemble.fraudProbability);
    const patternTerm = patternTermFor(pattern);
    const similarityTerm = similarCases.length > 0 ? SIMILARITY_BONUS : 0;

    const finalScore = fuseScore(ensembleTerm, patternTerm, similarityTerm);
    const isFraudulent = isFraudScore(finalScore);
    const riskLevel = riskLevelFor(finalScore);
    const fraudType = dominantFraudType(similarCases);

    const componentScores: ComponentScores = {
        ensemble: ensembleTerm,
        pattern: patternTerm,
        similarity: similarityTerm,
        final: finalScore
    };

    return Object.freeze({
        isFraudulent,
        confidenceScore: clamp01((clamp01(ensemble.confidence) + clamp01(pattern.confidence)) / 2),
        fraudType,
        riskLevel,
        reasons: Object.freeze(collectReasons(ensemble.riskFactors, pattern.anomalies, similarCases.length)),
        recommendedActions: Object.freeze(recommendActions(isFraudulent, riskLevel, fraudType)),
        componentScores: Object.freeze(componentScores)
    });
};
