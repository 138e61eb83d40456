import { z } from 'zod';

// 缺失或非正整数的取值回落到默认值
const positiveInt = (fallback: number) => z.coerce.number().int().positive().catch(fallback);

const ollamaLimits = z.object({
    OLLAMA_CONTEXT_WINDOW: positiveInt(4096),
    OLLAMA_MAX_OUTPUT_TOKENS: positiveInt(1024),
    OLLAMA_TIMEOUT_MS: positiveInt(120000),
});

export function loadOllamaConfig(env: NodeJS.ProcessEnv = process.env) {
    const limits = ollamaLimits.parse(env);
    return {
        host: env.OLLAMA_HOST || 'http://127.0.0.1:11434',
        chatModel: env.OLLAMA_CHAT_MODEL || 'mistral:7b',
        cleanModel: env.OLLAMA_CLEAN_MODEL || 'mistral:7b',
        contextWindow: limits.OLLAMA_CONTEXT_WINDOW,
        maxOutputTokens: limits.OLLAMA_MAX_OUTPUT_TOKENS,
        timeoutMs: limits.OLLAMA_TIMEOUT_MS,
    };
}

export const ollamaConfig = loadOllamaConfig();

export type OllamaProviderConfig = typeof ollamaConfig;
