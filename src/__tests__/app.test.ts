import { Server } from 'http';
import axios, { AxiosInstance } from 'axios';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { createApp } from '../app';
import { loadSettings } from '../config/settings';
import { AppContainer, createContainer } from '../container';
import { FraudAnalysisResult, WorkflowDescriptor } from '../types/analysis';
import { ApiResponse, ErrorResponse, HealthCheckResponse } from '../types/api';
import { Transaction } from '../types/transaction';

describe('HTTP API', () => {
    let container: AppContainer;
    let server: Server;
    let http: AxiosInstance;

    beforeAll(async () => {
        container = createContainer(loadSettings({ NODE_ENV: 'test', APP_VERSION: '9.9.9' }));
        server = createApp(container).listen(0);
        await new Promise<void>(resolve => server.once('listening', () => resolve()));

        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('server is not listening on a TCP port');
        }
        http = axios.create({
            baseURL: `http://127.0.0.1:${address.port}`,
            validateStatus: () => true
        });
    });

    afterAll(async () => {
        await new Promise<void>((resolve, reject) => {
            server.close(error => (error ? reject(error) : resolve()));
            server.closeAllConnections();
        });
        await container.shutdown();
    });

    it('reports degraded health without credentials', async () => {
        const response = await http.get<HealthCheckResponse>('/health');

        expect(response.status).toBe(200);
        expect(response.data.status).toBe('DEGRADED');
        expect(response.data.version).toBe('9.9.9');
        expect(response.data.services).toEqual({
            ensemble: 'degraded',
            pattern: 'degraded',
            embeddings: 'degraded',
            similarity: 'live',
            workflows: 'degraded',
            history: 'degraded',
            cache: 'degraded'
        });
    });

    it('has no backing stores to check when they are disabled', async () => {
        await expect(container.checkConnections()).resolves.toBe(true);
    });

    it('rejects an invalid transaction', async () => {
        const response = await http.post<ErrorResponse>('/api/analyze/transaction', { amount: 10 });

        expect(response.status).toBe(400);
        expect(response.data).toMatchObject({
            success: false,
            status: 'fail',
            message: 'Invalid request data: "transactionId" is required'
        });
    });

    it('scores a transaction and serves the cached result', async () => {
        const scored = await http.post<ApiResponse<FraudAnalysisResult>>('/api/analyze/transaction', {
            transactionId: 'TXN-HTTP-1',
            userId: 'USER-HTTP',
            amount: 120,
            transactionType: 'credit_card',
            merchantName: 'Book Shop'
        });
        const result = scored.data.data;

        expect(scored.status).toBe(200);
        expect(scored.data.success).toBe(true);
        expect(result?.caseId).toMatch(/^CASE-[0-9A-F]{8}$/);
        expect(result?.transactionId).toBe('TXN-HTTP-1');

        const cached = await http.get<ApiResponse<FraudAnalysisResult>>(`/api/analyze/results/${result?.caseId}`);

        expect(cached.status).toBe(200);
        expect(cached.data.data?.caseId).toBe(result?.caseId);
        expect(cached.data.data?.componentScores).toEqual(result?.componentScores);
    });

    it('answers 404 for an unknown case', async () => {
        const response = await http.get<ErrorResponse>('/api/analyze/results/CASE-00000000');

        expect(response.status).toBe(404);
        expect(response.data.message).toBe('Analysis result for case CASE-00000000 not found');
    });

    it('creates a canned workflow while the engine is unavailable', async () => {
        const response = await http.post<ApiResponse<WorkflowDescriptor>>('/api/workflows', {
            caseId: 'CASE-HTTP0001',
            priority: 'urgent'
        });

        expect(response.status).toBe(201);
        expect(response.data.data).toMatchObject({
            caseId: 'CASE-HTTP0001',
            priority: 'urgent',
            status: 'initiated',
            degraded: true
        });
    });

    it('generates demo transactions by profile', async () => {
        const response = await http.post<ApiResponse<Transaction>>('/api/demo/sample-transaction?profile=fraud', {});

        expect(response.status).toBe(200);
        expect(response.data.data?.amount).toBe(15000);
        expect(response.data.data?.userId).toBe('USER-12345');
    });

    it('answers 404 for unknown endpoints', async () => {
        const response = await http.get('/api/nowhere');

        expect(response.status).toBe(404);
        expect(response.data).toEqual({
            success: false,
            error: 'Endpoint not found',
            path: '/api/nowhere',
            method: 'GET'
        });
    });
});
