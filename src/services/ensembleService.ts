import { logger, describeError } from '../config/logger';
import { AllModelsUnavailableError } from '../middleware/errorHandler';
import {
    AgreementLevel,
    CollaboratorMode,
    EnsembleOpinion,
    ModelFailure,
    ModelOpinion,
    ModelResult
} from '../types/analysis';
import { GenerativeBackend } from './llmBackends';
import { dedupe, parseStructuredBlock, readNumber, readStringList } from './structuredResponse';

export const DEFAULT_ENSEMBLE_MODELS = ['gpt-4', 'claude-3-opus', 'llama-3'];

const DEFAULT_MODEL_PROBABILITY = 0.5;
const DEFAULT_MODEL_CONFIDENCE = 0.7;
const ENSEMBLE_FRAUD_THRESHOLD = 0.7;

const SYSTEM_INSTRUCTION = 'You are an expert fraud detection AI.';

export const buildEnsemblePrompt = (features: Record<string, unknown>): string => `
Analyze this financial transaction for fraud:

${JSON.stringify(features, null, 2)}

Provide:
1. fraud_probability (0-1)
2. risk_factors (list of short phrases)
3. confidence (0-1)

Respond in JSON format with the keys fraud_probability, risk_factors and confidence.
`;

export const isModelFailure = (result: ModelResult): result is ModelFailure => 'error' in result;

export const parseModelResponse = (model: string, text: string): ModelResult => {
    const outcome = parseStructuredBlock(text);

    if (outcome.kind === 'unparsed') {
        return { model, error: 'Unparsable response' };
    }

    return {
        model,
        fraudProbability: readNumber(outcome.value, ['fraud_probability', 'fraudProbability'], DEFAULT_MODEL_PROBABILITY),
        confidence: readNumber(outcome.value, ['confidence', 'confidence_level', 'confidenceLevel'], DEFAULT_MODEL_CONFIDENCE),
        riskFactors: readStringList(outcome.value, ['risk_factors', 'riskFactors', 'key_risk_factors'])
    };
};

export const agreementLevelFor = (probabilities: number[]): AgreementLevel => {
    if (probabilities.length === 0) {
        return 'unknown';
    }

    const mean = probabilities.reduce((sum, p) => sum + p, 0) / probabilities.length;
    const variance = probabilities.reduce((sum, p) => sum + (p - mean) ** 2, 0) / probabilities.length;

    if (variance < 0.01) {
        return 'high';
    }
    if (variance < 0.05) {
        return 'medium';
    }
    return 'low';
};

/**
 * Reduces per-model results to one opinion. Failed models are kept in
 * `individualModels` with their error but take no part in the averages.
 *
 * @throws AllModelsUnavailableError when no model produced a usable opinion
 */
export const reduceEnsemble = (results: ModelResult[]): EnsembleOpinion => {
    const survivors: ModelOpinion[] = [];
    const failures: ModelFailure[] = [];

    for (const result of results) {
        if (isModelFailure(result)) {
            failures.push(result);
        } else {
            survivors.push(result);
        }
    }

    if (survivors.length === 0) {
        throw new AllModelsUnavailableError(failures);
    }

    const probabilities = survivors.map(s => s.fraudProbability);
    const fraudProbability = probabilities.reduce((sum, p) => sum + p, 0) / survivors.length;
    const confidence = survivors.reduce((sum, s) => sum + s.confidence, 0) / survivors.length;

    const individualModels: Record<string, ModelResult> = {};
    for (const result of results) {
        individualModels[result.model] = result;
    }

    return {
        fraudProbability,
        confidence,
        isFraudulent: fraudProbability > ENSEMBLE_FRAUD_THRESHOLD,
        riskFactors: dedupe(survivors.flatMap(s => s.riskFactors)),
        agreementLevel: agreementLevelFor(probabilities),
        modelsUsed: results.map(r => r.model),
        individualModels,
        degraded: false
    };
};

/** Opinion fed to fusion when the whole ensemble is unavailable. */
export const neutralEnsembleOpinion = (models: string[], failures: ModelFailure[] = []): EnsembleOpinion => ({
    fraudProbability: DEFAULT_MODEL_PROBABILITY,
    confidence: DEFAULT_MODEL_CONFIDENCE,
    isFraudulent: false,
    riskFactors: [],
    agreementLevel: 'unknown',
    modelsUsed: models,
    individualModels: Object.fromEntries(failures.map(f => [f.model, f])),
    degraded: true
});

export class EnsembleAnalyzer {
    constructor(
        private readonly backend: GenerativeBackend,
        private readonly defaultModels: string[] = DEFAULT_ENSEMBLE_MODELS
    ) {}

    get mode(): CollaboratorMode {
        return this.backend.mode;
    }

    get models(): string[] {
        return [...this.defaultModels];
    }

    async analyze(
        features: Record<string, unknown>,
        models: string[] = this.defaultModels,
        signal?: AbortSignal
    ): Promise<EnsembleOpinion> {
        const prompt = buildEnsemblePrompt(features);

        const results = await Promise.all(models.map(model => this.queryModel(model, prompt, signal)));

        const opinion = reduceEnsemble(results);

        logger.debug('Ensemble analysis complete', {
            fraudProbability: opinion.fraudProbability,
            agreementLevel: opinion.agreementLevel,
            modelsUsed: opinion.modelsUsed,
            failedModels: results.filter(isModelFailure).map(r => r.model)
        });

        return opinion;
    }

    private async queryModel(model: string, prompt: string, signal?: AbortSignal): Promise<ModelResult> {
        try {
            const text = await this.backend.generate({
                model,
                system: SYSTEM_INSTRUCTION,
                prompt,
                signal
            });

            const result = parseModelResponse(model, text);
            if (isModelFailure(result)) {
                logger.warn('Model returned an unparsable response', { model });
            }
            return result;
        } catch (error) {
            logger.warn('Model dropped from ensemble', { model, error: describeError(error) });
            return { model, error: describeError(error) };
        }
    }
}
