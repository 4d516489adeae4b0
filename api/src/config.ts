import { z } from 'zod';
import { ConfigurationError } from './lib/errors.js';
import { LOG_LEVELS, type LogLevel } from './lib/logger.js';

const EnvSchema = z
    .object({
        PORT: z.coerce.number().int().positive().default(3001),
        SUPABASE_URL: z.string().url(),
        SUPABASE_SERVICE_KEY: z.string().min(1),
        LLM_PROVIDER: z.enum(['gemini', 'mock']).default('gemini'),
        API_KEY: z.string().min(1).optional(),
        LLM_MODEL: z.string().min(1).default('gemini-2.5-flash'),
        LLM_MAX_TOKENS: z.coerce.number().int().positive().default(8000),
        LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
        ASSISTANT_NAME: z.string().min(1).default('BOT GPT'),
        CHUNK_SIZE: z.coerce.number().int().positive().default(500),
        CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
        RAG_TOP_K: z.coerce.number().int().positive().default(3),
        LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
        JSON_BODY_LIMIT: z.string().min(1).default('10mb'),
    })
    .refine(env => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
        message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
        path: ['CHUNK_OVERLAP'],
    });

export type LLMProviderName = 'gemini' | 'mock';

export interface AppConfig {
    port: number;
    supabaseUrl: string;
    supabaseServiceKey: string;
    llm: {
        provider: LLMProviderName;
        apiKey?: string;
        model: string;
        maxTokens: number;
        timeoutMs: number;
        assistantName: string;
    };
    chunking: {
        maxChunkSize: number;
        overlap: number;
    };
    ragTopK: number;
    logLevel: LogLevel;
    jsonBodyLimit: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid environment configuration: ${problems}`);
    }
    const e = parsed.data;

    return {
        port: e.PORT,
        supabaseUrl: e.SUPABASE_URL,
        supabaseServiceKey: e.SUPABASE_SERVICE_KEY,
        llm: {
            provider: e.LLM_PROVIDER,
            apiKey: e.API_KEY,
            model: e.LLM_MODEL,
            maxTokens: e.LLM_MAX_TOKENS,
            timeoutMs: e.LLM_TIMEOUT_MS,
            assistantName: e.ASSISTANT_NAME,
        },
        chunking: {
            maxChunkSize: e.CHUNK_SIZE,
            overlap: e.CHUNK_OVERLAP,
        },
        ragTopK: e.RAG_TOP_K,
        logLevel: e.LOG_LEVEL,
        jsonBodyLimit: e.JSON_BODY_LIMIT,
    };
}
