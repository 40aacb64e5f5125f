import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { CollaboratorMode } from '../types/analysis';
import { GenerationRequest, GenerativeBackend } from '../services/llmBackends';
import { WorkflowBackend, WorkflowSpec } from '../services/workflowService';
import { StructuredBlock } from '../services/structuredResponse';
import { CollaboratorUnavailableError } from '../middleware/errorHandler';

type Reply = string | Error | ((request: GenerationRequest) => string | Promise<string>);

/** Answers by model name, or with `fallback` for requests that name no model. */
export class ScriptedBackend implements GenerativeBackend {
    readonly mode: CollaboratorMode = 'live';
    readonly calls: GenerationRequest[] = [];

    constructor(
        private readonly replies: Record<string, Reply>,
        private readonly fallback?: Reply,
        readonly name: string = 'scripted'
    ) {}

    async generate(request: GenerationRequest): Promise<string> {
        this.calls.push(request);
        const reply = (request.model !== undefined ? this.replies[request.model] : undefined) ?? this.fallback;

        if (reply === undefined) {
            throw new CollaboratorUnavailableError(this.name, `no reply scripted for ${request.model ?? 'default'}`);
        }
        if (reply instanceof Error) {
            throw reply;
        }
        if (typeof reply === 'function') {
            return reply(request);
        }
        return reply;
    }
}

export class RecordingWorkflowBackend implements WorkflowBackend {
    readonly name = 'recording';
    readonly mode: CollaboratorMode = 'live';
    readonly created: WorkflowSpec[] = [];

    constructor(private readonly responses: {
        create?: StructuredBlock;
        status?: StructuredBlock;
        compliance?: StructuredBlock;
    } = {}) {}

    async createWorkflow(spec: WorkflowSpec): Promise<StructuredBlock> {
        this.created.push(spec);
        return this.responses.create ?? {};
    }

    async getWorkflow(): Promise<StructuredBlock> {
        return this.responses.status ?? {};
    }

    async complianceCheck(): Promise<StructuredBlock> {
        return this.responses.compliance ?? {};
    }
}

export interface RecordedRequest {
    method: string;
    url: string;
    params: unknown;
    body: unknown;
    headers: Record<string, unknown>;
    signal: unknown;
}

export interface ScriptedReply {
    status: number;
    data: unknown;
}

/**
 * An axios instance whose adapter answers in process. Non-2xx replies reject
 * with an AxiosError carrying the response, as the http adapter does.
 */
export const scriptedHttp = (
    reply: (request: RecordedRequest) => ScriptedReply,
    baseURL: string = 'http://collaborator.test'
): { http: AxiosInstance; requests: RecordedRequest[] } => {
    const requests: RecordedRequest[] = [];

    const http = axios.create({
        baseURL,
        adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
            const request: RecordedRequest = {
                method: (config.method ?? 'get').toUpperCase(),
                url: config.url ?? '',
                params: config.params,
                body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
                headers: config.headers.toJSON(),
                signal: config.signal
            };
            requests.push(request);

            const { status, data } = reply(request);
            const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };

            if (status >= 400) {
                throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
            }
            return response;
        }
    });

    return { http, requests };
};
