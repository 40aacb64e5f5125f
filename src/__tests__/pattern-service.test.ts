import { describe, it, expect } from 'vitest';
import {
    PatternAnalyzer,
    UNAVAILABLE_EXPLANATION,
    cannedDocumentOpinion,
    cannedPatternOpinion
} from '../services/patternService';
import { UnconfiguredBackend } from '../services/llmBackends';
import { HistoricalTransaction } from '../types/transaction';
import { ScriptedBackend } from './fakes';

const transaction = { transactionId: 'TXN-1', amount: 2500, currency: 'USD' };

const history = (count: number): HistoricalTransaction[] =>
    Array.from({ length: count }, (_, i) => ({
        transactionId: `HIST-${i}`,
        amount: 40 + i,
        currency: 'USD',
        merchant: 'Coffee Shop',
        time: '2024-01-01T10:00:00.000Z'
    }));

describe('PatternAnalyzer.analyzeTransactionPattern', () => {
    it('parses the structured judgment', async () => {
        const backend = new ScriptedBackend({}, [
            'Assessment follows.',
            '```json',
            '{"is_suspicious": true, "confidence": 1.4, "anomalies": ["Night time", "Night time", "New city"],',
            ' "risk_factors": ["Velocity"], "explanation": "Several anomalies"}',
            '```'
        ].join('\n'));

        const opinion = await new PatternAnalyzer(backend).analyzeTransactionPattern(transaction, []);

        expect(opinion).toEqual({
            isSuspicious: true,
            confidence: 1,
            anomalies: ['Night time', 'New city'],
            riskFactors: ['Velocity'],
            explanation: 'Several anomalies',
            parsed: true,
            degraded: false
        });
    });

    it('sends at most ten historical transactions', async () => {
        const backend = new ScriptedBackend({}, '{}');

        await new PatternAnalyzer(backend).analyzeTransactionPattern(transaction, history(12));

        expect(backend.calls[0].prompt).toContain('"HIST-9"');
        expect(backend.calls[0].prompt).not.toContain('"HIST-10"');
    });

    it('keeps the raw text when the answer cannot be parsed', async () => {
        const backend = new ScriptedBackend({}, 'Nothing unusual here.');

        const opinion = await new PatternAnalyzer(backend).analyzeTransactionPattern(transaction, []);

        expect(opinion.parsed).toBe(false);
        expect(opinion.rawResponse).toBe('Nothing unusual here.');
        expect(opinion.isSuspicious).toBe(false);
        expect(opinion.confidence).toBe(0.5);
        expect(opinion.degraded).toBe(false);
    });

    it('returns the canned opinion when the backend is unavailable', async () => {
        const opinion = await new PatternAnalyzer(new UnconfiguredBackend('gemini'))
            .analyzeTransactionPattern(transaction, history(3));

        expect(opinion).toEqual(cannedPatternOpinion());
        expect(opinion.degraded).toBe(true);
    });
});

describe('PatternAnalyzer.analyzeDocument', () => {
    it('attaches the document as an inline image', async () => {
        const backend = new ScriptedBackend({}, JSON.stringify({
            is_fraudulent: true,
            confidence: 0.88,
            fraud_indicators: ['Altered date'],
            authenticity_score: 0.2,
            recommendations: ['Request original']
        }));

        const opinion = await new PatternAnalyzer(backend).analyzeDocument('aGVsbG8=', 'invoice', 'image/png');

        expect(backend.calls[0].image).toEqual({ mimeType: 'image/png', base64: 'aGVsbG8=' });
        expect(backend.calls[0].prompt).toContain('Analyze this invoice for signs of fraud.');
        expect(opinion).toEqual({
            isFraudulent: true,
            confidence: 0.88,
            fraudIndicators: ['Altered date'],
            authenticityScore: 0.2,
            recommendations: ['Request original'],
            parsed: true,
            degraded: false
        });
    });

    it('asks for manual review when the answer cannot be parsed', async () => {
        const backend = new ScriptedBackend({}, 'The image is blurry.');

        const opinion = await new PatternAnalyzer(backend).analyzeDocument('aGVsbG8=', 'id_card');

        expect(backend.calls[0].image?.mimeType).toBe('image/jpeg');
        expect(opinion.parsed).toBe(false);
        expect(opinion.recommendations).toEqual(['Manual document review required']);
        expect(opinion.authenticityScore).toBe(0);
    });

    it('returns the canned opinion when the backend is unavailable', async () => {
        const opinion = await new PatternAnalyzer(new UnconfiguredBackend('gemini')).analyzeDocument('aGVsbG8=', 'receipt');
        expect(opinion).toEqual(cannedDocumentOpinion());
    });
});

describe('PatternAnalyzer.explain', () => {
    it('returns the backend text', async () => {
        const backend = new ScriptedBackend({}, 'Case CASE-1 shows card testing.');
        await expect(new PatternAnalyzer(backend).explain({ caseId: 'CASE-1' })).resolves.toBe('Case CASE-1 shows card testing.');
    });

    it('returns a fixed note when the backend is unavailable', async () => {
        await expect(new PatternAnalyzer(new UnconfiguredBackend('gemini')).explain({ caseId: 'CASE-1' }))
            .resolves.toBe(UNAVAILABLE_EXPLANATION);
    });
});
