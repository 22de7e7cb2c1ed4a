/**
 * src/utils/errors.ts
 *
 * Error taxonomy for the extraction pipeline.
 *
 *   TransportError     → network / HTTP failure talking to HN or the LLM.
 *                        Retried by the retry policy, then surfaced.
 *   ParseError         → the completion could not be turned into JSON.
 *                        Carries the raw completion for diagnosis.
 *   BudgetExceeded     → soft stop: the token ceiling would be crossed.
 *   ConfigurationError → bad environment or a missing credential.
 */

export class TransportError extends Error {
    readonly status: number | null;

    constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TransportError';
        this.status = status;
    }

    /** 429 and 5xx are worth another attempt; other HTTP errors are not. */
    get retryable(): boolean {
        return this.status === null || this.status === 429 || this.status >= 500;
    }
}

export class ParseError extends Error {
    readonly rawText: string;

    constructor(message: string, rawText: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ParseError';
        this.rawText = rawText;
    }
}

export class BudgetExceeded extends Error {
    readonly tokensUsed: number;
    readonly ceiling: number;

    constructor(tokensUsed: number, ceiling: number) {
        super(`Token ceiling reached: ${tokensUsed} used of ${ceiling}`);
        this.name = 'BudgetExceeded';
        this.tokensUsed = tokensUsed;
        this.ceiling = ceiling;
    }
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
