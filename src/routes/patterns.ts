import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { requestSignal, validateInput } from '../middleware/requestContext';
import { FraudDetectionService } from '../services/fraudDetectionService';
import { PatternStatistics, SimilaritySearchResult } from '../types/analysis';
import { ApiResponse } from '../types/api';
import { similarPatternsSchema } from './schemas';

export const createPatternRoutes = (fraudDetection: FraudDetectionService): Router => {
    const router = Router();

    router.get('/similar', asyncHandler(async (req: Request, res: Response) => {
        const query = validateInput(similarPatternsSchema, req.query);

        const result = await fraudDetection.findSimilarPatterns(query.text, query.limit, requestSignal(req, res));

        const response: ApiResponse<SimilaritySearchResult> = {
            success: true,
            data: result,
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    router.get('/statistics', asyncHandler(async (req: Request, res: Response) => {
        const stats = await fraudDetection.patternStatistics();

        const response: ApiResponse<PatternStatistics> = {
            success: true,
            data: stats,
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    return router;
};
