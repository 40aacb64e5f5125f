import Joi from 'joi';
import { WorkflowPriority } from '../types/analysis';
import { Transaction, TRANSACTION_TYPES } from '../types/transaction';
import { SAMPLE_PROFILES, SampleProfile } from '../services/transactionSimulator';

const PRIORITIES: WorkflowPriority[] = ['low', 'medium', 'high', 'urgent'];

export const DOCUMENT_MIME_TYPES = ['image/jpeg', 'image/png', 'image/webp', 'application/pdf'];

export const transactionSchema = Joi.object<Transaction>({
    transactionId: Joi.string().max(100).required(),
    userId: Joi.string().max(100).required(),
    amount: Joi.number().min(0).max(1000000000).required(),
    currency: Joi.string().length(3).uppercase().default('USD'),
    transactionType: Joi.string().valid(...TRANSACTION_TYPES).required(),
    merchantName: Joi.string().max(255).optional(),
    merchantCategory: Joi.string().max(100).optional(),
    location: Joi.string().max(255).optional(),
    ipAddress: Joi.string().ip().optional(),
    deviceId: Joi.string().max(255).optional(),
    timestamp: Joi.date().iso().default(() => new Date()),
    metadata: Joi.object().unknown(true).default({})
});

export interface DocumentRequest {
    documentBase64: string;
    documentType: string;
    userId: string;
    mimeType: string;
}

export const documentSchema = Joi.object<DocumentRequest>({
    documentBase64: Joi.string().base64().required(),
    documentType: Joi.string().max(50).required(),
    userId: Joi.string().max(100).required(),
    mimeType: Joi.string().valid(...DOCUMENT_MIME_TYPES).default('image/jpeg')
});

export interface WorkflowRequest {
    workflowType: string;
    caseId?: string;
    transactionId?: string;
    priority: WorkflowPriority;
    assignedTo?: string;
    additionalContext: Record<string, unknown>;
}

export const workflowSchema = Joi.object<WorkflowRequest>({
    workflowType: Joi.string()
        .valid('fraud_investigation', 'account_review', 'transaction_verification')
        .default('fraud_investigation'),
    caseId: Joi.string().max(100).optional(),
    transactionId: Joi.string().max(100).optional(),
    priority: Joi.string().valid(...PRIORITIES).default('medium'),
    assignedTo: Joi.string().max(100).optional(),
    additionalContext: Joi.object().unknown(true).default({})
});

export interface AccountReviewRequest {
    userId: string;
    reason: string;
    priority: WorkflowPriority;
}

export const accountReviewSchema = Joi.object<AccountReviewRequest>({
    userId: Joi.string().max(100).required(),
    reason: Joi.string().max(1000).required(),
    priority: Joi.string().valid(...PRIORITIES).default('medium')
});

export interface SimilarPatternsQuery {
    text: string;
    limit: number;
}

export const similarPatternsSchema = Joi.object<SimilarPatternsQuery>({
    text: Joi.string().min(1).max(5000).required(),
    limit: Joi.number().integer().min(1).max(20).default(5)
});

export interface SampleRequest {
    profile: SampleProfile;
    userId?: string;
}

export const sampleSchema = Joi.object<SampleRequest>({
    profile: Joi.string().valid(...SAMPLE_PROFILES).default('normal'),
    userId: Joi.string().max(100).optional()
});
