import { z } from 'zod';
import * as path from 'path';

const numFromEnv = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const optionalString = z.string().optional();

export const envSchema = z.object({
    LLM_PROVIDER: z.string().default('groq'),
    LLM_BASE_URL: optionalString,
    LLM_MODEL: z.string().default('llama-3.1-8b-instant'),
    LLM_API_KEY: optionalString,
    GROQ_API_KEY: optionalString,
    LLM_TEMPERATURE: numFromEnv.pipe(z.number().min(0).max(2)).default(0.1),
    LLM_TIMEOUT_MS: numFromEnv.pipe(z.number().int().positive()).default(60_000),
    LLM_MAX_TOKENS: numFromEnv.pipe(z.number().int().positive()).default(1024),

    EXTRACT_MAX_CHARS: numFromEnv.pipe(z.number().int().positive()).default(3500),
    PACING_DELAY_MS: numFromEnv.pipe(z.number().int().min(0)).default(10_000),
    DAILY_TOKEN_CEILING: numFromEnv.pipe(z.number().int().min(0)).default(500_000),
    TOKENS_PER_CALL: numFromEnv.pipe(z.number().int().positive()).default(1500),
    CHECKPOINT_INTERVAL: numFromEnv.pipe(z.number().int().positive()).default(10),

    DATA_DIR: z.string().default(path.join(process.cwd(), 'data')),
    HN_LOOKBACK_DAYS: numFromEnv.pipe(z.number().int().positive()).default(365),
    HN_REQUEST_TIMEOUT_MS: numFromEnv.pipe(z.number().int().positive()).default(10_000),

    CRAWLEE_LOG_LEVEL: z.string().default(''),
}).passthrough();

export type Env = z.infer<typeof envSchema>;
