import axios, { AxiosInstance } from 'axios';
import OpenAI from 'openai';
import { logger, describeError } from '../config/logger';
import { CollaboratorMode } from '../types/analysis';
import { CollaboratorUnavailableError } from '../middleware/errorHandler';

export interface InlineImage {
    mimeType: string;
    base64: string;
}

export interface GenerationRequest {
    system: string;
    prompt: string;
    model?: string;
    image?: InlineImage;
    signal?: AbortSignal;
}

/** A text or multimodal model that answers one prompt with free text. */
export interface GenerativeBackend {
    readonly name: string;
    readonly mode: CollaboratorMode;
    generate(request: GenerationRequest): Promise<string>;
}

/** Stand-in used when no credential is configured; every call reports the backend unavailable. */
export class UnconfiguredBackend implements GenerativeBackend {
    readonly mode: CollaboratorMode = 'degraded';

    constructor(readonly name: string) {}

    async generate(): Promise<string> {
        throw new CollaboratorUnavailableError(this.name, 'no credential configured');
    }
}

/** Chat completions against an OpenAI-compatible endpoint (AI/ML API hosts many vendors' models). */
export class OpenAIChatBackend implements GenerativeBackend {
    readonly name = 'aiml_api';
    readonly mode: CollaboratorMode = 'live';

    constructor(
        private readonly client: OpenAI,
        private readonly defaultModel: string = 'gpt-4'
    ) {}

    async generate(request: GenerationRequest): Promise<string> {
        const model = request.model ?? this.defaultModel;

        try {
            const completion = await this.client.chat.completions.create(
                {
                    model,
                    messages: [
                        { role: 'system', content: request.system },
                        { role: 'user', content: request.prompt }
                    ],
                    temperature: 0.3,
                    max_tokens: 500
                },
                { signal: request.signal }
            );

            const content = completion.choices[0]?.message?.content;
            if (!content) {
                throw new CollaboratorUnavailableError(this.name, `model ${model} returned an empty completion`);
            }

            return content;
        } catch (error) {
            if (error instanceof CollaboratorUnavailableError) {
                throw error;
            }
            logger.error('Model call failed', { model, error: describeError(error) });
            throw new CollaboratorUnavailableError(this.name, `model ${model}: ${describeError(error)}`);
        }
    }
}

interface GeminiPart {
    text?: string;
}

interface GeminiResponse {
    candidates?: {
        content?: {
            parts?: GeminiPart[];
        };
    }[];
}

export interface GeminiBackendOptions {
    apiKey: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
}

/** Gemini `generateContent` over REST; accepts an inline image for document analysis. */
export class GeminiVisionBackend implements GenerativeBackend {
    readonly name = 'gemini';
    readonly mode: CollaboratorMode = 'live';
    private readonly http: AxiosInstance;

    constructor(private readonly options: GeminiBackendOptions, http?: AxiosInstance) {
        this.http = http ?? axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            headers: { 'Content-Type': 'application/json' }
        });
    }

    async generate(request: GenerationRequest): Promise<string> {
        const model = request.model ?? this.options.model;
        const parts: Record<string, unknown>[] = [{ text: request.prompt }];

        if (request.image) {
            parts.push({
                inline_data: {
                    mime_type: request.image.mimeType,
                    data: request.image.base64
                }
            });
        }

        try {
            const response = await this.http.post<GeminiResponse>(
                `/models/${model}:generateContent`,
                {
                    systemInstruction: { parts: [{ text: request.system }] },
                    contents: [{ role: 'user', parts }],
                    generationConfig: { temperature: 0.2 }
                },
                {
                    params: { key: this.options.apiKey },
                    signal: request.signal
                }
            );

            const text = (response.data.candidates?.[0]?.content?.parts ?? [])
                .map(part => part.text ?? '')
                .join('')
                .trim();

            if (!text) {
                throw new CollaboratorUnavailableError(this.name, 'empty candidate list');
            }

            return text;
        } catch (error) {
            if (error instanceof CollaboratorUnavailableError) {
                throw error;
            }
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            throw new CollaboratorUnavailableError(
                this.name,
                status ? `HTTP ${status}` : describeError(error)
            );
        }
    }
}
