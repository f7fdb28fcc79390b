import { z } from 'zod';
import { ConfigurationError, ProviderName } from '../ai-inspection-engine/types';
import { DEFAULT_OPENAI_BASE_URL, DEFAULT_OPENAI_MODEL } from '../ai-inspection-engine/providers/openai';
import { DEFAULT_GEMINI_MODEL } from '../ai-inspection-engine/providers/gemini';

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
    INFERENCE_PROVIDER: z.preprocess(blankToUndefined, z.enum(['openai', 'gemini']).default('openai')),
    OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
    OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_OPENAI_BASE_URL)),
    GOOGLE_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
    INFERENCE_MODEL: z.preprocess(blankToUndefined, z.string().trim().optional()),
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(3000)),
    ALLOWED_ORIGINS: z.preprocess(blankToUndefined, z.string().optional()),
});

export interface AppConfig {
    provider: ProviderName;
    apiKey: string;
    model: string;
    baseUrl: string;
    port: number;
    allowedOrigins: string[];
}

const API_KEY_VARIABLE: Record<ProviderName, 'OPENAI_API_KEY' | 'GOOGLE_API_KEY'> = {
    openai: 'OPENAI_API_KEY',
    gemini: 'GOOGLE_API_KEY',
};

/**
 * Read and validate configuration once at startup.
 * Throws ConfigurationError listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }

    const values = parsed.data;
    const provider = values.INFERENCE_PROVIDER;
    const keyVariable = API_KEY_VARIABLE[provider];
    const apiKey = values[keyVariable];
    if (!apiKey) {
        const issue = `${keyVariable} is not set in environment`;
        throw new ConfigurationError(`Invalid configuration: ${issue}`, [issue]);
    }

    return {
        provider,
        apiKey,
        model: values.INFERENCE_MODEL ?? (provider === 'openai' ? DEFAULT_OPENAI_MODEL : DEFAULT_GEMINI_MODEL),
        baseUrl: values.OPENAI_BASE_URL,
        port: values.PORT,
        allowedOrigins: (values.ALLOWED_ORIGINS ?? '')
            .split(',')
            .map((origin) => origin.trim())
            .filter(Boolean),
    };
}
