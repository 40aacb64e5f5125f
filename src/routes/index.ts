import { Router } from 'express';
import { AppContainer } from '../container';
import { createAnalysisRoutes } from './analysis';
import { createDemoRoutes } from './demo';
import { createPatternRoutes } from './patterns';
import { createWorkflowRoutes } from './workflows';

export const createRoutes = (container: AppContainer): Router => {
    const router = Router();

    router.use('/analyze', createAnalysisRoutes(container.fraudDetection));
    router.use('/workflows', createWorkflowRoutes(container.workflows));
    router.use('/fraud-patterns', createPatternRoutes(container.fraudDetection));
    router.use('/demo', createDemoRoutes(container.simulator));

    router.get('/', (req, res) => {
        res.json({
            name: 'Fraud Fusion Service',
            version: container.settings.version,
            description: 'Fraud scoring that fuses a model ensemble, pattern analysis and similar known cases',
            status: 'Active',
            endpoints: {
                'POST /api/analyze/transaction': 'Score a transaction for fraud',
                'POST /api/analyze/document': 'Score a base64 document for fraud',
                'GET /api/analyze/results/:caseId': 'Fetch a cached analysis result',

                'POST /api/workflows': 'Create an investigation workflow',
                'POST /api/workflows/account-review': 'Create an account review workflow',
                'POST /api/workflows/compliance-check': 'Run AML/KYC/OFAC/BSA checks on a transaction',
                'GET /api/workflows/:workflowId': 'Get workflow status',

                'GET /api/fraud-patterns/similar': 'Find known fraud patterns similar to a text',
                'GET /api/fraud-patterns/statistics': 'Get fraud pattern store statistics',

                'POST /api/demo/sample-transaction': 'Generate a sample transaction (normal, suspicious, fraud)',

                'GET /health': 'System health check',
                'GET /api': 'This API information'
            },
            services: container.fraudDetection.collaboratorModes(),
            timestamp: new Date().toISOString(),
            environment: container.settings.nodeEnv
        });
    });

    return router;
};
