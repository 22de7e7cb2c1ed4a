/**
 * src/services/extractionSchema.ts
 *
 * Zod schema for the record the model is asked to produce.
 *
 * Any input shape is accepted; the parsed value always has the declared type.
 * Unknown enum values fall back to UNKNOWN / Unknown / Other, string salaries
 * like "$150k" become numbers, and unknown keys (including any attempt to set
 * hn_id or timestamp) are stripped.
 */

import { z } from 'zod';

export const REMOTE_TYPES = ['GLOBAL', 'US_ONLY', 'EU_ONLY', 'ONSITE', 'UNKNOWN'] as const;
export const EXPERIENCE_LEVELS = ['Senior', 'Staff', 'Lead', 'Junior', 'Intern', 'Mid', 'Unknown'] as const;
export const JOB_ROLES = [
    'Backend', 'Frontend', 'Fullstack', 'DevOps', 'Mobile', 'Data', 'ML/AI', 'Product', 'Other',
] as const;

export type RemoteType = (typeof REMOTE_TYPES)[number];
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];
export type JobRole = (typeof JOB_ROLES)[number];

function lenientEnum<T extends readonly string[]>(values: T, fallback: T[number]) {
    const lookup = new Map<string, T[number]>(values.map((v): [string, T[number]] => [v.toLowerCase(), v]));
    return z.unknown().transform((v): T[number] => {
        if (typeof v !== 'string') return fallback;
        return lookup.get(v.trim().toLowerCase()) ?? fallback;
    });
}

const nullableText = z.unknown().transform((v): string | null => {
    if (typeof v !== 'string') return null;
    const trimmed = v.trim();
    return trimmed && trimmed.toLowerCase() !== 'null' ? trimmed : null;
});

const techList = z.unknown().transform((v): string[] => {
    const entries = Array.isArray(v) ? v : typeof v === 'string' ? v.split(',') : [];
    return entries
        .filter((e): e is string => typeof e === 'string')
        .map((e) => e.trim())
        .filter((e) => e.length > 0);
});

/** "$150k" → 150000, "120,000" → 120000, "150" → 150. Ranges keep the lower bound. */
export function parseSalaryValue(v: unknown): number | null {
    if (typeof v === 'number') {
        return Number.isFinite(v) ? v : null;
    }
    if (typeof v !== 'string') {
        return null;
    }

    const match = v.replace(/,/g, '').match(/(\d+(?:\.\d+)?)\s*(k)?/i);
    if (!match) {
        return null;
    }

    const value = Number(match[1]);
    return match[2] ? value * 1000 : value;
}

const salaryValue = z.unknown().transform(parseSalaryValue);

const boolish = z.unknown().transform((v): boolean => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'string') return ['true', 'yes', 'y'].includes(v.trim().toLowerCase());
    return false;
});

export const extractionSchema = z.object({
    company: nullableText,
    tech_stack: techList,
    remote_type: lenientEnum(REMOTE_TYPES, 'UNKNOWN'),
    salary_year_usd: salaryValue,
    visa_sponsorship: boolish,
    experience_level: lenientEnum(EXPERIENCE_LEVELS, 'Unknown'),
    job_role: lenientEnum(JOB_ROLES, 'Other'),
    company_industry: nullableText,
    application_url: nullableText,
});

/** Model-derived fields only, after schema coercion. */
export type RawExtraction = z.infer<typeof extractionSchema>;

/** One row of the output table. */
export interface ExtractionResult extends RawExtraction {
    hn_id: string;
    timestamp: number;
}

/** Column order of the output table. */
export const RESULT_COLUMNS = [
    'company',
    'tech_stack',
    'remote_type',
    'salary_year_usd',
    'visa_sponsorship',
    'experience_level',
    'job_role',
    'company_industry',
    'application_url',
    'hn_id',
    'timestamp',
] as const satisfies readonly (keyof ExtractionResult)[];
