/**
 * src/pipeline.ts
 *
 * The two pipeline stages the CLI exposes:
 *
 *   scrape   → latest "Who is hiring" thread → data/raw/comments_<id>.json
 *   analyze  → snapshot → BatchOrchestrator → data/processed/jobs.csv
 */

import path from 'path';
import { log } from 'crawlee';
import type { Env } from './config/env.js';
import { BatchOrchestrator, type BatchRunResult } from './orchestrator.js';
import { createCompletionClient, type CompletionClient } from './services/completionClient.js';
import { JobAnalyzer } from './services/jobAnalyzer.js';
import { fetchHiringComments } from './sources/hnHiring.js';
import { findLatestSnapshot, loadComments, saveComments } from './sources/rawStore.js';
import { JobTableWriter } from './utils/jobTable.js';

export function outputTablePath(env: Env): string {
    return path.join(env.DATA_DIR, 'processed', 'jobs.csv');
}

/** Returns the snapshot path, or null when no thread or no comments were found. */
export async function scrapeStage(env: Env): Promise<string | null> {
    const result = await fetchHiringComments({
        lookbackDays: env.HN_LOOKBACK_DAYS,
        timeoutMs: env.HN_REQUEST_TIMEOUT_MS,
    });

    if (!result.thread) {
        log.warning('[Pipeline] Could not find a valid thread.');
        return null;
    }
    if (result.items.length === 0) {
        log.warning('[Pipeline] No comments found or error fetching comments.');
        return null;
    }

    return saveComments(env.DATA_DIR, result.thread.id, result.items);
}

export interface AnalyzeOptions {
    input?: string;
    limit?: number;
    ceiling?: number;
    /** Injected for tests and the smoke script; built from env otherwise. */
    client?: CompletionClient;
}

export async function analyzeStage(env: Env, options: AnalyzeOptions = {}): Promise<BatchRunResult | null> {
    const input = options.input ?? await findLatestSnapshot(env.DATA_DIR);
    if (!input) {
        log.warning(`[Pipeline] No comment snapshots under ${env.DATA_DIR}. Run "scrape" first.`);
        return null;
    }

    log.info(`[Pipeline] Loading data from ${input}...`);
    const items = await loadComments(input);

    const analyzer = new JobAnalyzer(options.client ?? createCompletionClient(env), {
        maxChars: env.EXTRACT_MAX_CHARS,
        temperature: env.LLM_TEMPERATURE,
    });

    const orchestrator = new BatchOrchestrator({
        analyzer,
        checkpoint: new JobTableWriter(outputTablePath(env)),
        tokensPerCall: env.TOKENS_PER_CALL,
        pacingDelayMs: env.PACING_DELAY_MS,
        checkpointInterval: env.CHECKPOINT_INTERVAL,
        limit: options.limit,
    });

    return orchestrator.run(items, options.ceiling ?? env.DAILY_TOKEN_CEILING);
}
