import { Router, Request, Response } from 'express';
import { logger } from '../config/logger';
import { NotFoundError, asyncHandler } from '../middleware/errorHandler';
import { requestSignal, validateInput } from '../middleware/requestContext';
import { FraudDetectionService } from '../services/fraudDetectionService';
import { FraudAnalysisResult } from '../types/analysis';
import { ApiResponse } from '../types/api';
import { documentSchema, transactionSchema } from './schemas';

export const createAnalysisRoutes = (fraudDetection: FraudDetectionService): Router => {
    const router = Router();

    router.post('/transaction', asyncHandler(async (req: Request, res: Response) => {
        const transaction = validateInput(transactionSchema, req.body);
        const signal = requestSignal(req, res);

        const result = await fraudDetection.analyzeTransaction(transaction, { signal });

        if (result.isFraudulent) {
            logger.warn('Fraud detected', {
                caseId: result.caseId,
                transactionId: transaction.transactionId,
                riskLevel: result.riskLevel,
                fraudType: result.fraudType
            });
        }

        const response: ApiResponse<FraudAnalysisResult> = {
            success: true,
            data: result,
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    router.post('/document', asyncHandler(async (req: Request, res: Response) => {
        const request = validateInput(documentSchema, req.body);
        const signal = requestSignal(req, res);

        const result = await fraudDetection.analyzeDocument(
            request.documentBase64,
            request.documentType,
            request.userId,
            { mimeType: request.mimeType, signal }
        );

        const response: ApiResponse<FraudAnalysisResult> = {
            success: true,
            data: result,
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    router.get('/results/:caseId', asyncHandler(async (req: Request, res: Response) => {
        const result = await fraudDetection.getResult(req.params.caseId);

        if (!result) {
            throw new NotFoundError(`Analysis result for case ${req.params.caseId} not found`);
        }

        const response: ApiResponse<FraudAnalysisResult> = {
            success: true,
            data: result,
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    return router;
};
