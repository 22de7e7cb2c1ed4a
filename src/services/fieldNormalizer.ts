/**
 * src/services/fieldNormalizer.ts
 *
 * Post-extraction rules. Every function here is total and idempotent:
 * running a normalized record through again returns the same record.
 */

import { GLOBAL_REMOTE_MARKERS, TECH_STACK_BLACKLIST } from '../config/vocabulary.js';
import type { RawItem } from '../sources/types.js';
import type { ExtractionResult, RawExtraction, RemoteType } from './extractionSchema.js';

/** Annual salaries below this are treated as misreads (monthly, hourly, INR…). */
export const SALARY_FLOOR_USD = 20_000;

/**
 * "150" → 150000 (the model dropped the k), 15000 → null (below the floor),
 * 95000 → 95000.
 */
export function normalizeSalary(value: number | null): number | null {
    if (value === null || !Number.isFinite(value)) {
        return null;
    }

    let salary = Math.round(value);
    if (salary < 1000) {
        salary *= 1000;
    }

    return salary < SALARY_FLOOR_USD ? null : salary;
}

export function cleanTechStack(stack: readonly string[]): string[] {
    return stack.filter((tech) => !TECH_STACK_BLACKLIST.has(tech.toLowerCase()));
}

/** The model under-reports worldwide remote; region markers in the post force GLOBAL. */
export function applyRemoteOverride(remoteType: RemoteType, sourceText: string): RemoteType {
    if (remoteType === 'GLOBAL') {
        return remoteType;
    }

    const lower = sourceText.toLowerCase();
    return GLOBAL_REMOTE_MARKERS.some((marker) => lower.includes(marker)) ? 'GLOBAL' : remoteType;
}

export function normalizeExtraction(raw: RawExtraction, item: RawItem): ExtractionResult {
    return {
        ...raw,
        tech_stack: cleanTechStack(raw.tech_stack),
        remote_type: applyRemoteOverride(raw.remote_type, item.text),
        salary_year_usd: normalizeSalary(raw.salary_year_usd),
        hn_id: String(item.id),
        timestamp: item.time,
    };
}
