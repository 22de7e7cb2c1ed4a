import 'dotenv/config';
import { ZodError } from 'zod';
import { envSchema, type Env } from './envSchema.js';
import { ConfigurationError } from '../utils/errors.js';

/** LLM_API_KEY wins; GROQ_API_KEY is accepted for the default provider. */
export function resolveApiKey(env: Env): string | null {
    return env.LLM_API_KEY ?? env.GROQ_API_KEY ?? null;
}

/** `KEY=` in a .env file means "not set", not "set to empty". */
function withoutBlanks(raw: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    const next: NodeJS.ProcessEnv = {};
    for (const [key, value] of Object.entries(raw)) {
        if (value !== undefined && value.trim() !== '') next[key] = value;
    }
    return next;
}

export function parseEnv(raw: NodeJS.ProcessEnv): Env {
    try {
        return envSchema.parse(withoutBlanks(raw));
    } catch (err) {
        if (err instanceof ZodError) {
            const lines = err.issues.map((i) => {
                const key = i.path.join('.') || '(root)';
                return `- ${key}: ${i.message}`;
            });
            throw new ConfigurationError('Invalid environment variables:\n' + lines.join('\n'));
        }
        throw err;
    }
}

let cached: Env | null = null;

export function loadEnv(): Env {
    if (!cached) {
        cached = parseEnv(process.env);
    }
    return cached;
}

export type { Env };
