import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { validateInput } from '../middleware/requestContext';
import { TransactionSimulator } from '../services/transactionSimulator';
import { Transaction } from '../types/transaction';
import { ApiResponse } from '../types/api';
import { sampleSchema } from './schemas';

export const createDemoRoutes = (simulator: TransactionSimulator): Router => {
    const router = Router();

    router.post('/sample-transaction', asyncHandler(async (req: Request, res: Response) => {
        const request = validateInput(sampleSchema, { ...req.query, ...req.body });
        const transaction = simulator.sample(request.profile, request.userId);

        const response: ApiResponse<Transaction> = {
            success: true,
            data: transaction,
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    return router;
};
