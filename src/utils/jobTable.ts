/**
 * src/utils/jobTable.ts
 *
 * Reads and writes the output table (data/processed/jobs.csv).
 *
 * One row per ExtractionResult, columns named exactly like its fields.
 * `tech_stack` is stored as a JSON list (`["Python","React"]`) and `null`
 * as an empty cell. Every write replaces the whole file; there is no
 * locking, so only one writer may target a file at a time.
 */

import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { log } from 'crawlee';
import { z } from 'zod';
import { parseCsv, toCsv } from './csvTable.js';
import { extractionSchema, RESULT_COLUMNS, type ExtractionResult } from '../services/extractionSchema.js';

export interface CheckpointSink {
    write(results: readonly ExtractionResult[]): Promise<void>;
}

function toCell(value: ExtractionResult[keyof ExtractionResult]): string {
    if (value === null) return '';
    if (Array.isArray(value)) return JSON.stringify(value);
    return String(value);
}

export function serializeResults(results: readonly ExtractionResult[]): string {
    const rows = results.map((result) => RESULT_COLUMNS.map((column) => toCell(result[column])));
    return toCsv(RESULT_COLUMNS, rows);
}

/** Parses a `tech_stack` cell back into a list; anything unreadable is an empty list. */
export function parseTechStackCell(cell: string): string[] {
    if (!cell.trim()) {
        return [];
    }

    try {
        const parsed: unknown = JSON.parse(cell);
        return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === 'string') : [];
    } catch {
        return [];
    }
}

const rowSchema = extractionSchema.extend({
    hn_id: z.string(),
    timestamp: z.coerce.number().int(),
});

export function deserializeResults(content: string): ExtractionResult[] {
    const [header, ...rows] = parseCsv(content);
    if (!header) {
        return [];
    }

    const results: ExtractionResult[] = [];
    for (const cells of rows) {
        const record: Record<string, unknown> = {};
        header.forEach((column, i) => {
            record[column] = cells[i] ?? '';
        });
        record.tech_stack = parseTechStackCell(typeof record.tech_stack === 'string' ? record.tech_stack : '');

        const parsed = rowSchema.safeParse(record);
        if (parsed.success) {
            results.push(parsed.data);
        } else {
            log.warning(`[JobTable] Skipping unreadable row for hn_id=${String(record.hn_id)}`);
        }
    }

    return results;
}

export class JobTableWriter implements CheckpointSink {
    constructor(readonly filePath: string) {}

    async write(results: readonly ExtractionResult[]): Promise<void> {
        await mkdir(path.dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, serializeResults(results), 'utf-8');
        log.info(`[JobTable] Saved ${results.length} jobs to ${this.filePath}`);
    }
}

export async function readJobTable(filePath: string): Promise<ExtractionResult[]> {
    if (!existsSync(filePath)) {
        return [];
    }

    return deserializeResults(await readFile(filePath, 'utf-8'));
}
