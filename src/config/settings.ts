import Joi from 'joi';

interface EnvShape {
    PORT: number;
    NODE_ENV: string;
    APP_VERSION: string;
    AIML_API_KEY: string;
    AIML_BASE_URL: string;
    ENSEMBLE_MODELS: string;
    EMBEDDING_MODEL: string;
    GOOGLE_API_KEY: string;
    GEMINI_BASE_URL: string;
    GEMINI_MODEL: string;
    OPUS_API_KEY: string;
    OPUS_BASE_URL: string;
    QDRANT_URL: string;
    QDRANT_API_KEY: string;
    QDRANT_COLLECTION: string;
    SIMILARITY_THRESHOLD: number;
    SIMILARITY_LIMIT: number;
    DB_ENABLED: boolean;
    DATABASE_URL: string;
    DB_HOST: string;
    DB_PORT: number;
    DB_NAME: string;
    DB_USER: string;
    DB_PASSWORD: string;
    REDIS_ENABLED: boolean;
    REDIS_URL: string;
    REDIS_HOST: string;
    REDIS_PORT: number;
    REDIS_PASSWORD: string;
    RESULT_CACHE_TTL_SECONDS: number;
    COLLABORATOR_TIMEOUT_MS: number;
}

const optionalString = Joi.string().allow('').default('');

const envSchema = Joi.object<EnvShape>({
    PORT: Joi.number().port().default(3000),
    NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
    APP_VERSION: Joi.string().default('1.0.0'),

    AIML_API_KEY: optionalString,
    AIML_BASE_URL: Joi.string().uri().default('https://api.aimlapi.com/v1'),
    ENSEMBLE_MODELS: Joi.string().default('gpt-4,claude-3-opus,llama-3'),
    EMBEDDING_MODEL: Joi.string().default('text-embedding-3-large'),

    GOOGLE_API_KEY: optionalString,
    GEMINI_BASE_URL: Joi.string().uri().default('https://generativelanguage.googleapis.com/v1beta'),
    GEMINI_MODEL: Joi.string().default('gemini-1.5-flash'),

    OPUS_API_KEY: optionalString,
    OPUS_BASE_URL: Joi.string().uri().default('https://api.opus.ai/v1'),

    QDRANT_URL: Joi.string().uri().allow('').default(''),
    QDRANT_API_KEY: optionalString,
    QDRANT_COLLECTION: Joi.string().default('fraud_patterns'),
    SIMILARITY_THRESHOLD: Joi.number().min(0).max(1).default(0.7),
    SIMILARITY_LIMIT: Joi.number().integer().min(1).max(50).default(5),

    DB_ENABLED: Joi.boolean().default(false),
    DATABASE_URL: optionalString,
    DB_HOST: Joi.string().default('localhost'),
    DB_PORT: Joi.number().port().default(5432),
    DB_NAME: Joi.string().default('fraud_detection'),
    DB_USER: Joi.string().default('fraud_user'),
    DB_PASSWORD: Joi.string().allow('').default('fraud_pass'),

    REDIS_ENABLED: Joi.boolean().default(false),
    REDIS_URL: optionalString,
    REDIS_HOST: Joi.string().default('localhost'),
    REDIS_PORT: Joi.number().port().default(6379),
    REDIS_PASSWORD: optionalString,
    RESULT_CACHE_TTL_SECONDS: Joi.number().integer().min(1).default(86400),

    COLLABORATOR_TIMEOUT_MS: Joi.number().integer().min(100).max(120000).default(30000)
}).unknown(true);

export interface Settings {
    port: number;
    nodeEnv: string;
    version: string;
    timeoutMs: number;
    ensemble: {
        apiKey?: string;
        baseUrl: string;
        models: string[];
        embeddingModel: string;
    };
    vision: {
        apiKey?: string;
        baseUrl: string;
        model: string;
    };
    workflow: {
        apiKey?: string;
        baseUrl: string;
    };
    similarity: {
        url?: string;
        apiKey?: string;
        collection: string;
        scoreThreshold: number;
        limit: number;
    };
    database: {
        enabled: boolean;
        connectionString?: string;
        host: string;
        port: number;
        database: string;
        user: string;
        password: string;
    };
    redis: {
        enabled: boolean;
        url?: string;
        host: string;
        port: number;
        password?: string;
        resultTtlSeconds: number;
    };
}

const orUndefined = (value: string): string | undefined => (value === '' ? undefined : value);

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
    const { error, value } = envSchema.validate(env, { abortEarly: false, convert: true });

    if (error) {
        throw new Error(`Invalid configuration: ${error.details.map(d => d.message).join('; ')}`);
    }

    const models = value.ENSEMBLE_MODELS
        .split(',')
        .map(model => model.trim())
        .filter(model => model.length > 0);

    return {
        port: value.PORT,
        nodeEnv: value.NODE_ENV,
        version: value.APP_VERSION,
        timeoutMs: value.COLLABORATOR_TIMEOUT_MS,
        ensemble: {
            apiKey: orUndefined(value.AIML_API_KEY),
            baseUrl: value.AIML_BASE_URL,
            models,
            embeddingModel: value.EMBEDDING_MODEL
        },
        vision: {
            apiKey: orUndefined(value.GOOGLE_API_KEY),
            baseUrl: value.GEMINI_BASE_URL,
            model: value.GEMINI_MODEL
        },
        workflow: {
            apiKey: orUndefined(value.OPUS_API_KEY),
            baseUrl: value.OPUS_BASE_URL
        },
        similarity: {
            url: orUndefined(value.QDRANT_URL),
            apiKey: orUndefined(value.QDRANT_API_KEY),
            collection: value.QDRANT_COLLECTION,
            scoreThreshold: value.SIMILARITY_THRESHOLD,
            limit: value.SIMILARITY_LIMIT
        },
        database: {
            enabled: value.DB_ENABLED,
            connectionString: orUndefined(value.DATABASE_URL),
            host: value.DB_HOST,
            port: value.DB_PORT,
            database: value.DB_NAME,
            user: value.DB_USER,
            password: value.DB_PASSWORD
        },
        redis: {
            enabled: value.REDIS_ENABLED,
            url: orUndefined(value.REDIS_URL),
            host: value.REDIS_HOST,
            port: value.REDIS_PORT,
            password: orUndefined(value.REDIS_PASSWORD),
            resultTtlSeconds: value.RESULT_CACHE_TTL_SECONDS
        }
    };
};
