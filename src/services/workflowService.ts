import axios, { AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { logger, describeError } from '../config/logger';
import { CollaboratorUnavailableError } from '../middleware/errorHandler';
import {
    CollaboratorMode,
    ComplianceCheckResult,
    WorkflowDescriptor,
    WorkflowPriority,
    WorkflowStatus
} from '../types/analysis';
import { isRecord, readBoolean, readString, readStringList, StructuredBlock } from './structuredResponse';

export type StepType = 'automated' | 'manual_review';

export interface InvestigationStep {
    name: string;
    type: StepType;
    requiresApproval: boolean;
}

export const INVESTIGATION_STEPS: readonly InvestigationStep[] = [
    { name: 'initial_risk_assessment', type: 'automated', requiresApproval: false },
    { name: 'transaction_analysis', type: 'automated', requiresApproval: false },
    { name: 'customer_verification', type: 'manual_review', requiresApproval: true },
    { name: 'compliance_check', type: 'automated', requiresApproval: false },
    { name: 'decision_recommendation', type: 'automated', requiresApproval: false },
    { name: 'case_closure', type: 'manual_review', requiresApproval: true }
];

export const COMPLIANCE_FRAMEWORKS = ['AML', 'KYC', 'BSA'];
export const DEFAULT_ASSIGNEE = 'fraud_team_alpha';

const COMPLETION_HOURS: Record<WorkflowPriority, number> = {
    urgent: 1,
    high: 2,
    medium: 4,
    low: 8
};

export interface CaseData {
    caseId?: string;
    assignedTo?: string;
    [key: string]: unknown;
}

export interface WorkflowSpec {
    workflow_type: string;
    case_id: string;
    priority: WorkflowPriority;
    steps: {
        name: string;
        type: StepType;
        requires_approval: boolean;
        regulatory_frameworks?: string[];
    }[];
    metadata: CaseData;
}

export interface WorkflowBackend {
    readonly name: string;
    readonly mode: CollaboratorMode;
    createWorkflow(spec: WorkflowSpec, signal?: AbortSignal): Promise<StructuredBlock>;
    getWorkflow(workflowId: string, signal?: AbortSignal): Promise<StructuredBlock>;
    complianceCheck(payload: Record<string, unknown>, signal?: AbortSignal): Promise<StructuredBlock>;
}

export class UnconfiguredWorkflowBackend implements WorkflowBackend {
    readonly name = 'opus';
    readonly mode: CollaboratorMode = 'degraded';

    async createWorkflow(): Promise<StructuredBlock> {
        throw new CollaboratorUnavailableError(this.name, 'no credential configured');
    }

    async getWorkflow(): Promise<StructuredBlock> {
        throw new CollaboratorUnavailableError(this.name, 'no credential configured');
    }

    async complianceCheck(): Promise<StructuredBlock> {
        throw new CollaboratorUnavailableError(this.name, 'no credential configured');
    }
}

export interface OpusBackendOptions {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
}

export class OpusWorkflowBackend implements WorkflowBackend {
    readonly name = 'opus';
    readonly mode: CollaboratorMode = 'live';
    private readonly http: AxiosInstance;

    constructor(options: OpusBackendOptions, http?: AxiosInstance) {
        this.http = http ?? axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            headers: {
                Authorization: `Bearer ${options.apiKey}`,
                'Content-Type': 'application/json'
            }
        });
    }

    async createWorkflow(spec: WorkflowSpec, signal?: AbortSignal): Promise<StructuredBlock> {
        return this.call(() => this.http.post<StructuredBlock>('/workflows', spec, { signal }));
    }

    async getWorkflow(workflowId: string, signal?: AbortSignal): Promise<StructuredBlock> {
        return this.call(() => this.http.get<StructuredBlock>(`/workflows/${encodeURIComponent(workflowId)}`, { signal }));
    }

    async complianceCheck(payload: Record<string, unknown>, signal?: AbortSignal): Promise<StructuredBlock> {
        return this.call(() => this.http.post<StructuredBlock>('/compliance/check', payload, { signal }));
    }

    private async call(request: () => Promise<{ data: StructuredBlock }>): Promise<StructuredBlock> {
        try {
            const response = await request();
            return response.data;
        } catch (error) {
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            throw new CollaboratorUnavailableError(this.name, status ? `HTTP ${status}` : describeError(error));
        }
    }
}

const newWorkflowId = (prefix: string): string =>
    `${prefix}-${uuidv4().replace(/-/g, '').slice(0, 12).toUpperCase()}`;

export const newCaseId = (prefix: string = 'CASE'): string =>
    `${prefix}-${uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase()}`;

export const buildWorkflowSpec = (caseData: CaseData, caseId: string, priority: WorkflowPriority): WorkflowSpec => ({
    workflow_type: 'fraud_investigation',
    case_id: caseId,
    priority,
    steps: INVESTIGATION_STEPS.map(step => ({
        name: step.name,
        type: step.type,
        requires_approval: step.requiresApproval,
        ...(step.name === 'compliance_check' ? { regulatory_frameworks: [...COMPLIANCE_FRAMEWORKS] } : {})
    })),
    metadata: { ...caseData, caseId }
});

export interface WorkflowDispatcherOptions {
    now?: () => Date;
}

export class CaseWorkflowDispatcher {
    private readonly now: () => Date;

    constructor(private readonly backend: WorkflowBackend, options: WorkflowDispatcherOptions = {}) {
        this.now = options.now ?? (() => new Date());
    }

    get mode(): CollaboratorMode {
        return this.backend.mode;
    }

    async createInvestigation(
        caseData: CaseData,
        priority: WorkflowPriority = 'medium',
        signal?: AbortSignal
    ): Promise<WorkflowDescriptor> {
        const caseId = caseData.caseId ?? newCaseId();
        const assignedTo = caseData.assignedTo ?? DEFAULT_ASSIGNEE;
        const canned = this.cannedDescriptor(caseId, priority, assignedTo);

        try {
            const raw = await this.backend.createWorkflow(buildWorkflowSpec(caseData, caseId, priority), signal);
            const descriptor: WorkflowDescriptor = {
                ...canned,
                workflowId: readString(raw, ['workflow_id', 'workflowId', 'id'], canned.workflowId),
                status: readString(raw, ['status'], canned.status),
                createdAt: readString(raw, ['created_at', 'createdAt'], canned.createdAt),
                stepsCompleted: readStringList(raw, ['steps_completed', 'stepsCompleted']),
                currentStep: readString(raw, ['current_step', 'currentStep'], canned.currentStep),
                nextSteps: readStringList(raw, ['next_steps', 'nextSteps']),
                estimatedCompletion: readString(raw, ['estimated_completion', 'estimatedCompletion'], canned.estimatedCompletion),
                assignedTo: readString(raw, ['assigned_to', 'assignedTo'], assignedTo),
                degraded: false
            };

            logger.info('Investigation workflow created', { workflowId: descriptor.workflowId, caseId, priority });
            return descriptor;
        } catch (error) {
            logger.warn('Workflow backend unavailable, returning canned workflow', {
                caseId,
                error: describeError(error)
            });
            return canned;
        }
    }

    async getStatus(workflowId: string, signal?: AbortSignal): Promise<WorkflowStatus> {
        const canned = this.cannedStatus(workflowId);

        try {
            const raw = await this.backend.getWorkflow(workflowId, signal);
            const progress = raw.progress_percentage ?? raw.progressPercentage;

            return {
                workflowId,
                status: readString(raw, ['status'], canned.status),
                progressPercentage: typeof progress === 'number' ? Math.min(100, Math.max(0, progress)) : 0,
                stepsCompleted: readStringList(raw, ['steps_completed', 'stepsCompleted']),
                currentStep: readString(raw, ['current_step', 'currentStep'], canned.currentStep),
                pendingSteps: readStringList(raw, ['pending_steps', 'pendingSteps']),
                results: isRecord(raw.results) ? raw.results : {},
                updatedAt: readString(raw, ['updated_at', 'updatedAt'], canned.updatedAt),
                degraded: false
            };
        } catch (error) {
            logger.warn('Workflow status unavailable, returning canned status', {
                workflowId,
                error: describeError(error)
            });
            return canned;
        }
    }

    async createAccountReview(
        userId: string,
        reason: string,
        priority: WorkflowPriority = 'medium',
        signal?: AbortSignal
    ): Promise<WorkflowDescriptor> {
        return this.createInvestigation(
            {
                caseId: newCaseId('AR'),
                userId,
                reviewReason: reason,
                reviewType: 'fraud_suspicion'
            },
            priority,
            signal
        );
    }

    async complianceCheck(transaction: Record<string, unknown>, signal?: AbortSignal): Promise<ComplianceCheckResult> {
        try {
            const raw = await this.backend.complianceCheck({
                check_type: 'comprehensive_compliance',
                transaction,
                frameworks: ['AML', 'KYC', 'OFAC', 'BSA'],
                risk_tolerance: 'low'
            }, signal);

            return {
                complianceStatus: readString(raw, ['compliance_status', 'complianceStatus'], 'under_review'),
                checksPerformed: isRecord(raw.checks_performed) ? raw.checks_performed : {},
                riskLevel: readString(raw, ['risk_level', 'riskLevel'], 'unknown'),
                requiresSarFiling: readBoolean(raw, ['requires_sar_filing', 'requiresSarFiling'], false),
                recommendations: readStringList(raw, ['recommendations']),
                checkedAt: readString(raw, ['checked_at', 'checkedAt'], this.now().toISOString()),
                degraded: false
            };
        } catch (error) {
            logger.warn('Compliance backend unavailable, returning canned result', { error: describeError(error) });
            return this.cannedCompliance();
        }
    }

    private cannedDescriptor(caseId: string, priority: WorkflowPriority, assignedTo: string): WorkflowDescriptor {
        const createdAt = this.now();
        const completion = new Date(createdAt.getTime() + COMPLETION_HOURS[priority] * 60 * 60 * 1000);
        const [first, current, ...rest] = INVESTIGATION_STEPS.map(step => step.name);

        return {
            workflowId: newWorkflowId('WF'),
            status: 'initiated',
            priority,
            caseId,
            createdAt: createdAt.toISOString(),
            stepsCompleted: [first],
            currentStep: current,
            nextSteps: rest,
            estimatedCompletion: completion.toISOString(),
            complianceFrameworks: [...COMPLIANCE_FRAMEWORKS],
            assignedTo,
            degraded: true
        };
    }

    private cannedStatus(workflowId: string): WorkflowStatus {
        const names = INVESTIGATION_STEPS.map(step => step.name);
        const completed = names.slice(0, 3);

        return {
            workflowId,
            status: 'in_progress',
            progressPercentage: Math.round((completed.length / names.length) * 100),
            stepsCompleted: completed,
            currentStep: names[3],
            pendingSteps: names.slice(4),
            results: {
                riskScore: 0.78,
                complianceStatus: 'under_review',
                verificationStatus: 'pending_documents'
            },
            updatedAt: this.now().toISOString(),
            degraded: true
        };
    }

    private cannedCompliance(): ComplianceCheckResult {
        return {
            complianceStatus: 'passed',
            checksPerformed: {
                AML: { status: 'passed', score: 0.95 },
                KYC: { status: 'passed', score: 0.92 },
                OFAC: { status: 'passed', noMatches: true },
                BSA: { status: 'passed', thresholdCheck: 'below_limit' }
            },
            riskLevel: 'low',
            requiresSarFiling: false,
            recommendations: ['Standard monitoring', 'No additional action required'],
            checkedAt: this.now().toISOString(),
            degraded: true
        };
    }
}
