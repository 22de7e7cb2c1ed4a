import type { ExtractionResult } from '../services/extractionSchema.js';

const REMOTE_POLICIES = new Set(['GLOBAL', 'US_ONLY', 'EU_ONLY']);

export interface DashboardMetrics {
    total: number;
    remote: number;
    /** Mean of known salaries, rounded; null when no job lists one. */
    averageSalary: number | null;
    topTech: Array<[string, number]>;
    remotePolicy: Array<[string, number]>;
}

/** Counts values, most frequent first; ties keep first-seen order. */
export function countBy(values: readonly string[]): Array<[string, number]> {
    const counts = new Map<string, number>();
    for (const value of values) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

export function computeMetrics(jobs: readonly ExtractionResult[], topN: number = 20): DashboardMetrics {
    const salaries = jobs
        .map((j) => j.salary_year_usd)
        .filter((s): s is number => s !== null);

    return {
        total: jobs.length,
        remote: jobs.filter((j) => REMOTE_POLICIES.has(j.remote_type)).length,
        averageSalary: salaries.length
            ? Math.round(salaries.reduce((sum, s) => sum + s, 0) / salaries.length)
            : null,
        topTech: countBy(jobs.flatMap((j) => j.tech_stack)).slice(0, topN),
        remotePolicy: countBy(jobs.map((j) => j.remote_type)),
    };
}
