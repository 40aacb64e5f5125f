import { describe, it, expect } from 'vitest';
import {
    CaseWorkflowDispatcher,
    INVESTIGATION_STEPS,
    UnconfiguredWorkflowBackend,
    buildWorkflowSpec,
    newCaseId
} from '../services/workflowService';
import { RecordingWorkflowBackend } from './fakes';

const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');
const now = () => new Date(FIXED_NOW.getTime());

describe('buildWorkflowSpec', () => {
    it('always lists the six investigation steps in order', () => {
        const spec = buildWorkflowSpec({ transactionId: 'TXN-1' }, 'CASE-00000001', 'high');

        expect(spec.workflow_type).toBe('fraud_investigation');
        expect(spec.case_id).toBe('CASE-00000001');
        expect(spec.priority).toBe('high');
        expect(spec.steps.map(step => step.name)).toEqual([
            'initial_risk_assessment',
            'transaction_analysis',
            'customer_verification',
            'compliance_check',
            'decision_recommendation',
            'case_closure'
        ]);
        expect(spec.steps.filter(step => step.requires_approval).map(step => step.name))
            .toEqual(['customer_verification', 'case_closure']);
        expect(spec.steps[3].regulatory_frameworks).toEqual(['AML', 'KYC', 'BSA']);
        expect(spec.metadata).toEqual({ transactionId: 'TXN-1', caseId: 'CASE-00000001' });
    });
});

describe('newCaseId', () => {
    it('uses the prefix and eight hex digits', () => {
        expect(newCaseId()).toMatch(/^CASE-[0-9A-F]{8}$/);
        expect(newCaseId('DOC')).toMatch(/^DOC-[0-9A-F]{8}$/);
    });
});

describe('CaseWorkflowDispatcher', () => {
    it('maps the backend descriptor', async () => {
        const backend = new RecordingWorkflowBackend({
            create: {
                workflow_id: 'WF-REMOTE-1',
                status: 'created',
                steps_completed: ['initial_risk_assessment'],
                current_step: 'transaction_analysis',
                next_steps: ['customer_verification'],
                estimated_completion: '2024-05-01T16:00:00Z',
                assigned_to: 'team_beta'
            }
        });
        const dispatcher = new CaseWorkflowDispatcher(backend, { now });

        const workflow = await dispatcher.createInvestigation({ caseId: 'CASE-ABCDEF01', fraudType: 'card_fraud' }, 'medium');

        expect(workflow).toMatchObject({
            workflowId: 'WF-REMOTE-1',
            status: 'created',
            priority: 'medium',
            caseId: 'CASE-ABCDEF01',
            stepsCompleted: ['initial_risk_assessment'],
            currentStep: 'transaction_analysis',
            nextSteps: ['customer_verification'],
            estimatedCompletion: '2024-05-01T16:00:00Z',
            assignedTo: 'team_beta',
            degraded: false
        });
        expect(backend.created).toHaveLength(1);
        expect(backend.created[0].metadata).toEqual({ caseId: 'CASE-ABCDEF01', fraudType: 'card_fraud' });
    });

    it('returns a canned descriptor when the backend is unavailable', async () => {
        const dispatcher = new CaseWorkflowDispatcher(new UnconfiguredWorkflowBackend(), { now });

        const workflow = await dispatcher.createInvestigation({ caseId: 'CASE-ABCDEF02' }, 'high');

        expect(workflow.workflowId).toMatch(/^WF-[0-9A-F]{12}$/);
        expect(workflow).toMatchObject({
            status: 'initiated',
            priority: 'high',
            caseId: 'CASE-ABCDEF02',
            createdAt: '2024-05-01T12:00:00.000Z',
            stepsCompleted: ['initial_risk_assessment'],
            currentStep: 'transaction_analysis',
            nextSteps: ['customer_verification', 'compliance_check', 'decision_recommendation', 'case_closure'],
            estimatedCompletion: '2024-05-01T14:00:00.000Z',
            complianceFrameworks: ['AML', 'KYC', 'BSA'],
            assignedTo: 'fraud_team_alpha',
            degraded: true
        });
    });

    it.each([
        ['urgent', '2024-05-01T13:00:00.000Z'],
        ['medium', '2024-05-01T16:00:00.000Z'],
        ['low', '2024-05-01T20:00:00.000Z']
    ] as const)('estimates %s completion', async (priority, expected) => {
        const dispatcher = new CaseWorkflowDispatcher(new UnconfiguredWorkflowBackend(), { now });
        const workflow = await dispatcher.createInvestigation({}, priority);

        expect(workflow.estimatedCompletion).toBe(expected);
        expect(workflow.caseId).toMatch(/^CASE-[0-9A-F]{8}$/);
    });

    it('routes the case to the requested team', async () => {
        const dispatcher = new CaseWorkflowDispatcher(new UnconfiguredWorkflowBackend(), { now });
        const workflow = await dispatcher.createInvestigation({ assignedTo: 'aml_desk' });

        expect(workflow.assignedTo).toBe('aml_desk');
        expect(workflow.priority).toBe('medium');
    });

    it('creates account reviews under an AR case id', async () => {
        const backend = new RecordingWorkflowBackend();
        const dispatcher = new CaseWorkflowDispatcher(backend, { now });

        const workflow = await dispatcher.createAccountReview('USER-1', 'Chargeback spike', 'urgent');

        expect(workflow.caseId).toMatch(/^AR-[0-9A-F]{8}$/);
        expect(backend.created[0].metadata).toMatchObject({
            userId: 'USER-1',
            reviewReason: 'Chargeback spike',
            reviewType: 'fraud_suspicion'
        });
        expect(backend.created[0].steps).toHaveLength(INVESTIGATION_STEPS.length);
    });

    it('reads workflow status and bounds the progress', async () => {
        const backend = new RecordingWorkflowBackend({
            status: {
                status: 'completed',
                progress_percentage: 140,
                steps_completed: ['case_closure'],
                results: { decision: 'confirmed_fraud' }
            }
        });
        const status = await new CaseWorkflowDispatcher(backend, { now }).getStatus('WF-1');

        expect(status).toEqual({
            workflowId: 'WF-1',
            status: 'completed',
            progressPercentage: 100,
            stepsCompleted: ['case_closure'],
            currentStep: 'compliance_check',
            pendingSteps: [],
            results: { decision: 'confirmed_fraud' },
            updatedAt: '2024-05-01T12:00:00.000Z',
            degraded: false
        });
    });

    it('returns a canned status when the backend is unavailable', async () => {
        const status = await new CaseWorkflowDispatcher(new UnconfiguredWorkflowBackend(), { now }).getStatus('WF-2');

        expect(status).toMatchObject({
            workflowId: 'WF-2',
            status: 'in_progress',
            progressPercentage: 50,
            stepsCompleted: ['initial_risk_assessment', 'transaction_analysis', 'customer_verification'],
            currentStep: 'compliance_check',
            pendingSteps: ['decision_recommendation', 'case_closure'],
            degraded: true
        });
    });

    it('maps compliance results', async () => {
        const backend = new RecordingWorkflowBackend({
            compliance: {
                compliance_status: 'flagged',
                risk_level: 'high',
                requires_sar_filing: true,
                recommendations: ['File SAR']
            }
        });
        const result = await new CaseWorkflowDispatcher(backend, { now }).complianceCheck({ amount: 9500 });

        expect(result).toEqual({
            complianceStatus: 'flagged',
            checksPerformed: {},
            riskLevel: 'high',
            requiresSarFiling: true,
            recommendations: ['File SAR'],
            checkedAt: '2024-05-01T12:00:00.000Z',
            degraded: false
        });
    });

    it('returns a passing canned compliance result when the backend is unavailable', async () => {
        const result = await new CaseWorkflowDispatcher(new UnconfiguredWorkflowBackend(), { now })
            .complianceCheck({ amount: 10 });

        expect(result.complianceStatus).toBe('passed');
        expect(result.requiresSarFiling).toBe(false);
        expect(result.degraded).toBe(true);
    });
});
