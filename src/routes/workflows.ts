import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { requestSignal, validateInput } from '../middleware/requestContext';
import { transactionFeatures } from '../services/fraudDetectionService';
import { CaseWorkflowDispatcher } from '../services/workflowService';
import { ComplianceCheckResult, WorkflowDescriptor, WorkflowStatus } from '../types/analysis';
import { ApiResponse } from '../types/api';
import { accountReviewSchema, transactionSchema, workflowSchema } from './schemas';

export const createWorkflowRoutes = (workflows: CaseWorkflowDispatcher): Router => {
    const router = Router();

    router.post('/', asyncHandler(async (req: Request, res: Response) => {
        const request = validateInput(workflowSchema, req.body);
        const signal = requestSignal(req, res);

        const workflow = await workflows.createInvestigation(
            {
                caseId: request.caseId,
                assignedTo: request.assignedTo,
                workflowType: request.workflowType,
                transactionId: request.transactionId,
                additionalContext: request.additionalContext
            },
            request.priority,
            signal
        );

        const response: ApiResponse<WorkflowDescriptor> = {
            success: true,
            data: workflow,
            timestamp: new Date().toISOString()
        };
        res.status(201).json(response);
    }));

    router.post('/account-review', asyncHandler(async (req: Request, res: Response) => {
        const request = validateInput(accountReviewSchema, req.body);
        const signal = requestSignal(req, res);

        const workflow = await workflows.createAccountReview(request.userId, request.reason, request.priority, signal);

        const response: ApiResponse<WorkflowDescriptor> = {
            success: true,
            data: workflow,
            timestamp: new Date().toISOString()
        };
        res.status(201).json(response);
    }));

    router.post('/compliance-check', asyncHandler(async (req: Request, res: Response) => {
        const transaction = validateInput(transactionSchema, req.body);
        const signal = requestSignal(req, res);

        const result = await workflows.complianceCheck(transactionFeatures(transaction), signal);

        const response: ApiResponse<ComplianceCheckResult> = {
            success: true,
            data: result,
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    router.get('/:workflowId', asyncHandler(async (req: Request, res: Response) => {
        const status = await workflows.getStatus(req.params.workflowId, requestSignal(req, res));

        const response: ApiResponse<WorkflowStatus> = {
            success: true,
            data: status,
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    return router;
};
