/**
 * src/sources/hnHiring.ts
 *
 * Upstream source: top-level comments of the latest "Ask HN: Who is hiring?"
 * thread.
 *
 *   1. HN Algolia search (stories by the `whoishiring` account, last year)
 *      → newest story whose title contains "Who is hiring".
 *   2. HN Firebase item API → the story's `kids`, then each kid in turn.
 *
 * A kid that fails to load is logged and skipped; the rest of the thread is
 * still returned.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import type { HiringThread, RawItem, SourceResult } from './types.js';
import { TransportError, errorMessage } from '../utils/errors.js';
import { exponentialBackoff, withRetry, type RetryPolicy } from '../utils/retry.js';

const ALGOLIA_API_URL = 'https://hn.algolia.com/api/v1/search_by_date';
const FIREBASE_ITEM_URL = (id: string | number): string =>
    `https://hacker-news.firebaseio.com/v0/item/${id}.json`;

const PROGRESS_EVERY = 50;

export interface HnSourceOptions {
    lookbackDays?: number;
    timeoutMs?: number;
    /** Injected for tests; Unix seconds. */
    now?: () => number;
    retry?: Partial<RetryPolicy>;
}

const searchResponseSchema = z.object({
    hits: z.array(z.object({
        objectID: z.string(),
        title: z.string().nullable().optional(),
        created_at_i: z.number(),
    }).passthrough()).default([]),
});

const storySchema = z.object({
    id: z.number(),
    kids: z.array(z.number()).default([]),
}).passthrough();

const commentSchema = z.object({
    id: z.number(),
    text: z.string().optional(),
    time: z.number(),
    deleted: z.boolean().optional(),
}).passthrough();

async function getJson(url: string, timeoutMs: number): Promise<unknown> {
    let res: Response;
    try {
        res = await fetch(url, {
            headers: { Accept: 'application/json' },
            signal: AbortSignal.timeout(timeoutMs),
        });
    } catch (err) {
        throw new TransportError(`GET ${url} failed: ${errorMessage(err)}`, null, { cause: err });
    }

    if (!res.ok) {
        throw new TransportError(`GET ${url} → HTTP ${res.status}`, res.status);
    }

    return res.json();
}

function retryPolicy(options: HnSourceOptions): RetryPolicy {
    return {
        maxAttempts: 3,
        backoff: exponentialBackoff(1000, 10_000),
        shouldRetry: (err) => err instanceof TransportError && err.retryable,
        label: 'HNSource',
        ...options.retry,
    };
}

export async function findLatestHiringThread(options: HnSourceOptions = {}): Promise<HiringThread | null> {
    const now = options.now ?? (() => Math.floor(Date.now() / 1000));
    const since = now() - (options.lookbackDays ?? 365) * 86_400;
    const params = new URLSearchParams({
        tags: 'story,author_whoishiring',
        numericFilters: `created_at_i>${since}`,
        hitsPerPage: '50',
    });

    const data = await withRetry(
        () => getJson(`${ALGOLIA_API_URL}?${params.toString()}`, options.timeoutMs ?? 10_000),
        retryPolicy(options),
    );
    const { hits } = searchResponseSchema.parse(data);

    const hit = hits.find((h) => /who is hiring/i.test(h.title ?? ''));
    if (!hit) {
        log.warning('[HNSource] No "Who is hiring" thread found in recent posts.');
        return null;
    }

    log.info(`[HNSource] Found thread: ${hit.title ?? ''} (ID: ${hit.objectID})`);
    return { id: hit.objectID, title: hit.title ?? '', createdAt: hit.created_at_i };
}

/** Returns the usable top-level comments and how many kids could not be loaded. */
export async function fetchThreadComments(
    threadId: string,
    options: HnSourceOptions = {},
): Promise<{ items: RawItem[]; failed: number }> {
    const timeoutMs = options.timeoutMs ?? 10_000;
    const story = storySchema.parse(
        await withRetry(() => getJson(FIREBASE_ITEM_URL(threadId), timeoutMs), retryPolicy(options)),
    );

    log.info(`[HNSource] Found ${story.kids.length} top-level comments. Fetching...`);

    const items: RawItem[] = [];
    let failed = 0;

    for (const [i, kidId] of story.kids.entries()) {
        try {
            const data = await getJson(FIREBASE_ITEM_URL(kidId), timeoutMs);
            const comment = commentSchema.safeParse(data);
            if (comment.success && !comment.data.deleted && comment.data.text !== undefined) {
                items.push({ id: comment.data.id, text: comment.data.text, time: comment.data.time });
            }
        } catch (err) {
            failed++;
            log.warning(`[HNSource] Error fetching comment ${kidId}: ${errorMessage(err)}`);
        }

        if ((i + 1) % PROGRESS_EVERY === 0) {
            log.info(`[HNSource] Fetched ${i + 1}/${story.kids.length} comments...`);
        }
    }

    return { items, failed };
}

export async function fetchHiringComments(options: HnSourceOptions = {}): Promise<SourceResult> {
    const start = Date.now();

    try {
        const thread = await findLatestHiringThread(options);
        if (!thread) {
            return { thread: null, items: [], failed: 0, durationMs: Date.now() - start };
        }

        const { items, failed } = await fetchThreadComments(thread.id, options);
        log.info(`[HNSource] ✓ Complete: ${items.length} comments (${failed} failed)`);
        return { thread, items, failed, durationMs: Date.now() - start };
    } catch (err) {
        log.error(`[HNSource] ✗ Failed: ${errorMessage(err)}`);
        return { thread: null, items: [], failed: 0, durationMs: Date.now() - start, error: errorMessage(err) };
    }
}
