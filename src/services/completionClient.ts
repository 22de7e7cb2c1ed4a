/**
 * src/services/completionClient.ts
 *
 * The one boundary to the language-model service:
 *
 *   complete(prompt, temperature) → completion text
 *
 * Implemented against OpenAI-compatible chat-completion endpoints, which
 * covers Groq (default), OpenAI, OpenRouter, Cerebras and local servers such
 * as Ollama and LM Studio. Every network or HTTP failure surfaces as a
 * TransportError; retrying is the caller's job.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { resolveApiKey, type Env } from '../config/env.js';
import { ConfigurationError, TransportError, errorMessage } from '../utils/errors.js';

export interface CompletionClient {
    readonly modelId: string;
    complete(prompt: string, temperature: number): Promise<string>;
}

export interface CompletionClientConfig {
    provider: string;
    baseUrl: string;
    modelName: string;
    apiKey: string | null;
    timeoutMs: number;
    maxTokens: number;
}

interface ProviderDefaults {
    baseUrl: string;
    requiresKey: boolean;
    extraHeaders: Record<string, string>;
}

const PROVIDER_MAP: Record<string, ProviderDefaults> = {
    groq: { baseUrl: 'https://api.groq.com/openai/v1', requiresKey: true, extraHeaders: {} },
    openai: { baseUrl: 'https://api.openai.com/v1', requiresKey: true, extraHeaders: {} },
    cerebras: { baseUrl: 'https://api.cerebras.ai/v1', requiresKey: true, extraHeaders: {} },
    openrouter: {
        baseUrl: 'https://openrouter.ai/api/v1',
        requiresKey: true,
        extraHeaders: { 'X-Title': 'hiring-radar' },
    },
    ollama: { baseUrl: 'http://localhost:11434/v1', requiresKey: false, extraHeaders: {} },
    lmstudio: { baseUrl: 'http://localhost:1234/v1', requiresKey: false, extraHeaders: {} },
};

function trimTrailingSlash(value: string): string {
    return value.replace(/\/+$/, '');
}

const completionResponseSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullish() }).nullish(),
    })).nullish(),
    usage: z.object({
        prompt_tokens: z.number().nullish(),
        completion_tokens: z.number().nullish(),
        total_tokens: z.number().nullish(),
    }).nullish(),
});

/** Pulls `choices[0].message.content` out of a chat-completion response. */
export function parseCompletionContent(data: unknown): string {
    const parsed = completionResponseSchema.safeParse(data);
    if (!parsed.success) return '';
    return parsed.data.choices?.[0]?.message?.content ?? '';
}

function logTokenUsage(provider: string, data: unknown): void {
    const parsed = completionResponseSchema.safeParse(data);
    const usage = parsed.success ? parsed.data.usage : null;
    if (usage && typeof usage.total_tokens === 'number') {
        log.debug(
            `[LLMUsage] ${provider} — prompt: ${usage.prompt_tokens ?? '?'} ` +
            `completion: ${usage.completion_tokens ?? '?'} total: ${usage.total_tokens} tokens`
        );
    }
}

export class OpenAICompatibleClient implements CompletionClient {
    readonly modelId: string;
    private readonly extraHeaders: Record<string, string>;

    constructor(private readonly config: CompletionClientConfig) {
        const defaults = PROVIDER_MAP[config.provider];
        if ((defaults?.requiresKey ?? true) && !config.apiKey) {
            throw new ConfigurationError(
                `No API key for provider "${config.provider}". Set LLM_API_KEY (or GROQ_API_KEY) in .env.`
            );
        }

        this.modelId = `${config.provider}/${config.modelName}`;
        this.extraHeaders = defaults?.extraHeaders ?? {};
    }

    async complete(prompt: string, temperature: number): Promise<string> {
        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            ...this.extraHeaders,
        };
        if (this.config.apiKey) {
            headers.Authorization = `Bearer ${this.config.apiKey}`;
        }

        let res: Response;
        try {
            res = await fetch(`${trimTrailingSlash(this.config.baseUrl)}/chat/completions`, {
                method: 'POST',
                headers,
                body: JSON.stringify({
                    model: this.config.modelName,
                    messages: [{ role: 'user', content: prompt }],
                    temperature,
                    max_tokens: this.config.maxTokens,
                    stream: false,
                }),
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
        } catch (err) {
            throw new TransportError(`LLM request failed: ${errorMessage(err)}`, null, { cause: err });
        }

        if (!res.ok) {
            throw new TransportError(`LLM error: ${res.status} ${res.statusText}`, res.status);
        }

        let data: unknown;
        try {
            data = await res.json();
        } catch (err) {
            throw new TransportError(`LLM returned a non-JSON body: ${errorMessage(err)}`, res.status, { cause: err });
        }

        logTokenUsage(this.config.provider, data);
        return parseCompletionContent(data);
    }
}

export function completionConfigFromEnv(env: Env): CompletionClientConfig {
    const defaults = PROVIDER_MAP[env.LLM_PROVIDER];
    const baseUrl = env.LLM_BASE_URL ?? defaults?.baseUrl;
    if (!baseUrl) {
        throw new ConfigurationError(
            `Unknown LLM provider "${env.LLM_PROVIDER}". Set LLM_BASE_URL or use one of: ` +
            Object.keys(PROVIDER_MAP).join(', ')
        );
    }

    return {
        provider: env.LLM_PROVIDER,
        baseUrl,
        modelName: env.LLM_MODEL,
        apiKey: resolveApiKey(env),
        timeoutMs: env.LLM_TIMEOUT_MS,
        maxTokens: env.LLM_MAX_TOKENS,
    };
}

export function createCompletionClient(env: Env): CompletionClient {
    return new OpenAICompatibleClient(completionConfigFromEnv(env));
}

/** Startup check: a missing key is only a warning until a client is built. */
export function warnIfCredentialsMissing(env: Env): boolean {
    const requiresKey = PROVIDER_MAP[env.LLM_PROVIDER]?.requiresKey ?? true;
    if (requiresKey && !resolveApiKey(env)) {
        log.warning('[LLMSetup] ⚠  No API key found. Add LLM_API_KEY=your_key_here (or GROQ_API_KEY) to .env');
        return false;
    }
    return true;
}
