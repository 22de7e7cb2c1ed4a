/**
 * src/services/jobAnalyzer.ts
 *
 * Extraction client: one job comment in, one validated extraction out.
 *
 *   HTML → markdown → truncate → prompt → complete() (with retry)
 *        → sanitizeCompletion → extractionSchema
 *
 * Truncation keeps the per-call token cost predictable: ~3500 chars is
 * roughly 900 input tokens, which is what the pacing delay and the
 * TOKENS_PER_CALL estimate are sized for.
 */

import TurndownService from 'turndown';
import { log } from 'crawlee';
import type { CompletionClient } from './completionClient.js';
import { extractionSchema, type RawExtraction } from './extractionSchema.js';
import { sanitizeCompletion } from './responseSanitizer.js';
import { ParseError, TransportError } from '../utils/errors.js';
import { exponentialBackoff, withRetry, type RetryPolicy } from '../utils/retry.js';

export interface JobAnalyzerOptions {
    maxChars?: number;
    temperature?: number;
    retry?: Partial<RetryPolicy>;
}

export const DEFAULT_MAX_CHARS = 3500;
export const DEFAULT_TEMPERATURE = 0.1;

const PROMPT_TEMPLATE = (jobText: string): string => `
You are a strict data extraction engine. Output ONLY valid JSON: one object, no commentary.
Extract these fields from the job post:
- company: string | null
- tech_stack: string[] (e.g. ["Python", "React"])
- remote_type: "GLOBAL" | "US_ONLY" | "EU_ONLY" | "ONSITE" | "UNKNOWN"
- salary_year_usd: integer | null (annual, USD)
- visa_sponsorship: boolean
- experience_level: "Senior" | "Staff" | "Lead" | "Junior" | "Intern" | "Mid" | "Unknown"
- job_role: "Backend" | "Frontend" | "Fullstack" | "DevOps" | "Mobile" | "Data" | "ML/AI" | "Product" | "Other"
- company_industry: string | null (infer from context, e.g. "Fintech", "Healthtech", "Crypto", "SaaS")
- application_url: string | null (only a direct apply link present in the post)

Rules:
- "Remote" with no region → "UNKNOWN".
- "Remote anywhere", "World", "APAC", "EU/US timezones" → "GLOBAL".
- Normalize tech names: "React.js" → "React", "NodeJS" → "Node.js".
- tech_stack must not contain generic terms like "Frontend", "Backend", "Fullstack", "DevOps".
- experience_level: if not explicit, "Senior" for >5 years, "Junior" for <2 years, otherwise "Mid".
- job_role: infer from the stack when the title is vague (Python + Django → "Backend").

Input: ${jobText}
JSON Output:
`.trim();

const turndown = new TurndownService({ headingStyle: 'atx' });

/** HN comment bodies are HTML (<p>, <a>, entities); the model reads markdown. */
export function htmlToMarkdown(html: string): string {
    return turndown.turndown(html);
}

export function truncate(text: string, maxChars: number): string {
    return text.length > maxChars ? text.slice(0, maxChars) : text;
}

/** Every transport or service failure gets another attempt; a bad completion does not. */
function isTransportFailure(err: unknown): boolean {
    return err instanceof TransportError;
}

export class JobAnalyzer {
    private readonly maxChars: number;
    private readonly temperature: number;
    private readonly retryPolicy: RetryPolicy;

    constructor(private readonly client: CompletionClient, options: JobAnalyzerOptions = {}) {
        this.maxChars = options.maxChars ?? DEFAULT_MAX_CHARS;
        this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
        this.retryPolicy = {
            maxAttempts: 3,
            backoff: exponentialBackoff(1000, 10_000),
            shouldRetry: isTransportFailure,
            label: 'LLMExtractor',
            ...options.retry,
        };
    }

    buildPrompt(text: string): string {
        return PROMPT_TEMPLATE(truncate(htmlToMarkdown(text), this.maxChars));
    }

    /**
     * Throws TransportError once retries are exhausted and ParseError when the
     * completion is not a recoverable JSON object. Never returns a partial record.
     */
    async analyze(text: string): Promise<RawExtraction> {
        const prompt = this.buildPrompt(text);
        const completion = await withRetry(
            () => this.client.complete(prompt, this.temperature),
            this.retryPolicy,
        );

        const parsed = extractionSchema.safeParse(sanitizeCompletion(completion));
        if (!parsed.success) {
            throw new ParseError(`Completion failed validation: ${parsed.error.message}`, completion);
        }

        log.debug(`[LLMExtractor] Extracted ${parsed.data.company ?? 'unknown company'} via ${this.client.modelId}`);
        return parsed.data;
    }
}
