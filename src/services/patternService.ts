import { logger, describeError } from '../config/logger';
import { CollaboratorMode, DocumentOpinion, PatternOpinion } from '../types/analysis';
import { HistoricalTransaction } from '../types/transaction';
import { GenerativeBackend } from './llmBackends';
import {
    dedupe,
    parseStructuredBlock,
    readBoolean,
    readNumber,
    readString,
    readStringList
} from './structuredResponse';

export const MAX_HISTORY_ITEMS = 10;

const ANALYST_INSTRUCTION = 'You are an expert fraud detection analyst.';
const DOCUMENT_INSTRUCTION = 'You are a document fraud detection expert.';
const EXPLAINER_INSTRUCTION = 'You write concise fraud case summaries for compliance officers.';

export const cannedPatternOpinion = (): PatternOpinion => ({
    isSuspicious: true,
    confidence: 0.82,
    anomalies: [
        'Transaction amount 3x higher than average',
        'New geographic location detected',
        'Transaction outside normal hours'
    ],
    riskFactors: [
        'Unusual spending pattern',
        'High-risk merchant category'
    ],
    explanation: 'Transaction shows multiple red flags requiring investigation',
    parsed: true,
    degraded: true
});

export const cannedDocumentOpinion = (): DocumentOpinion => ({
    isFraudulent: false,
    confidence: 0.91,
    fraudIndicators: [],
    authenticityScore: 0.94,
    recommendations: ['Document appears authentic', 'No further action required'],
    parsed: true,
    degraded: true
});

export const UNAVAILABLE_EXPLANATION =
    'Fraud detection analysis completed. Detailed explanation unavailable while the analysis backend is offline.';

const transactionPatternPrompt = (
    transaction: Record<string, unknown>,
    history: HistoricalTransaction[]
): string => `
Analyze this transaction for potential fraud.

Current Transaction:
${JSON.stringify(transaction, null, 2)}

User's Historical Transactions (last ${MAX_HISTORY_ITEMS}):
${JSON.stringify(history, null, 2)}

Analyze for:
1. Unusual spending patterns
2. Geographic anomalies
3. Time-based anomalies
4. Amount anomalies
5. Merchant type changes

Respond in JSON format with:
{
    "is_suspicious": boolean,
    "confidence": float (0-1),
    "anomalies": [list of detected anomalies],
    "risk_factors": [list of risk factors],
    "explanation": "detailed explanation"
}
`;

const documentPrompt = (documentType: string): string => `
Analyze this ${documentType} for signs of fraud.

Look for:
1. Document tampering or alterations
2. Inconsistent fonts or formatting
3. Suspicious amounts or dates
4. Missing security features
5. Forged signatures or stamps

Respond in JSON format with:
{
    "is_fraudulent": boolean,
    "confidence": float (0-1),
    "fraud_indicators": [list of indicators],
    "authenticity_score": float (0-1),
    "recommendations": [list of recommendations]
}
`;

const explanationPrompt = (caseSummary: Record<string, unknown>): string => `
Generate a clear, professional explanation of this fraud analysis for a compliance officer:

Analysis Data:
${JSON.stringify(caseSummary, null, 2)}

Include:
1. Summary of findings
2. Key risk factors
3. Recommended actions
4. Regulatory considerations

Keep it concise and actionable.
`;

export class PatternAnalyzer {
    constructor(private readonly backend: GenerativeBackend) {}

    get mode(): CollaboratorMode {
        return this.backend.mode;
    }

    async analyzeTransactionPattern(
        transaction: Record<string, unknown>,
        history: HistoricalTransaction[],
        signal?: AbortSignal
    ): Promise<PatternOpinion> {
        let text: string;
        try {
            text = await this.backend.generate({
                system: ANALYST_INSTRUCTION,
                prompt: transactionPatternPrompt(transaction, history.slice(0, MAX_HISTORY_ITEMS)),
                signal
            });
        } catch (error) {
            logger.warn('Pattern analysis unavailable, using canned opinion', { error: describeError(error) });
            return cannedPatternOpinion();
        }

        const outcome = parseStructuredBlock(text);
        if (outcome.kind === 'unparsed') {
            logger.warn('Pattern analysis response could not be parsed');
            return {
                isSuspicious: false,
                confidence: 0.5,
                anomalies: [],
                riskFactors: [],
                explanation: '',
                parsed: false,
                rawResponse: outcome.rawText,
                degraded: false
            };
        }

        const block = outcome.value;
        return {
            isSuspicious: readBoolean(block, ['is_suspicious', 'isSuspicious'], false),
            confidence: readNumber(block, ['confidence'], 0.5),
            anomalies: dedupe(readStringList(block, ['anomalies'])),
            riskFactors: dedupe(readStringList(block, ['risk_factors', 'riskFactors'])),
            explanation: readString(block, ['explanation'], ''),
            parsed: true,
            degraded: false
        };
    }

    async analyzeDocument(
        documentBase64: string,
        documentType: string,
        mimeType: string = 'image/jpeg',
        signal?: AbortSignal
    ): Promise<DocumentOpinion> {
        let text: string;
        try {
            text = await this.backend.generate({
                system: DOCUMENT_INSTRUCTION,
                prompt: documentPrompt(documentType),
                image: { mimeType, base64: documentBase64 },
                signal
            });
        } catch (error) {
            logger.warn('Document analysis unavailable, using canned opinion', {
                documentType,
                error: describeError(error)
            });
            return cannedDocumentOpinion();
        }

        const outcome = parseStructuredBlock(text);
        if (outcome.kind === 'unparsed') {
            logger.warn('Document analysis response could not be parsed', { documentType });
            return {
                isFraudulent: false,
                confidence: 0.5,
                fraudIndicators: [],
                authenticityScore: 0,
                recommendations: ['Manual document review required'],
                parsed: false,
                rawResponse: outcome.rawText,
                degraded: false
            };
        }

        const block = outcome.value;
        return {
            isFraudulent: readBoolean(block, ['is_fraudulent', 'isFraudulent'], false),
            confidence: readNumber(block, ['confidence'], 0.5),
            fraudIndicators: dedupe(readStringList(block, ['fraud_indicators', 'fraudIndicators'])),
            authenticityScore: readNumber(block, ['authenticity_score', 'authenticityScore'], 0),
            recommendations: readStringList(block, ['recommendations']),
            parsed: true,
            degraded: false
        };
    }

    async explain(caseSummary: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
        try {
            return await this.backend.generate({
                system: EXPLAINER_INSTRUCTION,
                prompt: explanationPrompt(caseSummary),
                signal
            });
        } catch (error) {
            logger.warn('Explanation generation unavailable', { error: describeError(error) });
            return UNAVAILABLE_EXPLANATION;
        }
    }
}
