/**
 * src/sources/rawStore.ts
 *
 * JSON snapshots of fetched comments under <DATA_DIR>/raw/comments_<thread>.json,
 * so extraction can be re-run without hitting HN again.
 */

import { existsSync } from 'fs';
import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises';
import path from 'path';
import { log } from 'crawlee';
import { z } from 'zod';
import type { RawItem } from './types.js';

const SNAPSHOT_PATTERN = /^comments_.+\.json$/;

const rawItemsSchema = z.array(z.object({
    id: z.number(),
    text: z.string(),
    time: z.number(),
}));

export function rawDir(dataDir: string): string {
    return path.join(dataDir, 'raw');
}

export function snapshotPath(dataDir: string, threadId: string): string {
    return path.join(rawDir(dataDir), `comments_${threadId}.json`);
}

export async function saveComments(dataDir: string, threadId: string, items: readonly RawItem[]): Promise<string> {
    const filepath = snapshotPath(dataDir, threadId);
    await mkdir(path.dirname(filepath), { recursive: true });
    await writeFile(filepath, JSON.stringify(items, null, 2), 'utf-8');
    log.info(`[RawStore] Saved ${items.length} comments to ${filepath}`);
    return filepath;
}

export async function loadComments(filepath: string): Promise<RawItem[]> {
    const data: unknown = JSON.parse(await readFile(filepath, 'utf-8'));
    return rawItemsSchema.parse(data);
}

/** Most recently modified snapshot, or null when nothing has been scraped yet. */
export async function findLatestSnapshot(dataDir: string): Promise<string | null> {
    const dir = rawDir(dataDir);
    if (!existsSync(dir)) {
        return null;
    }

    let latest: { file: string; mtimeMs: number } | null = null;
    for (const name of await readdir(dir)) {
        if (!SNAPSHOT_PATTERN.test(name)) continue;
        const file = path.join(dir, name);
        const { mtimeMs } = await stat(file);
        if (!latest || mtimeMs > latest.mtimeMs) {
            latest = { file, mtimeMs };
        }
    }

    return latest?.file ?? null;
}
