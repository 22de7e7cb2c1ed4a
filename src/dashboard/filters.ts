import type { ExtractionResult } from '../services/extractionSchema.js';

export interface JobFilters {
    remoteType?: string;
    experienceLevel?: string;
    jobRole?: string;
    industry?: string;
    tech?: string;
    visa?: boolean;
}

function contains(value: string | null, needle: string | undefined): boolean {
    if (!needle) return true;
    return (value ?? '').toLowerCase().includes(needle.toLowerCase());
}

export function matchesFilters(job: ExtractionResult, filters: JobFilters): boolean {
    if (!contains(job.remote_type, filters.remoteType)) return false;
    if (!contains(job.experience_level, filters.experienceLevel)) return false;
    if (!contains(job.job_role, filters.jobRole)) return false;
    if (!contains(job.company_industry, filters.industry)) return false;

    if (filters.tech) {
        const wanted = filters.tech.toLowerCase();
        if (!job.tech_stack.some((t) => t.toLowerCase() === wanted)) return false;
    }

    if (filters.visa !== undefined && job.visa_sponsorship !== filters.visa) return false;

    return true;
}

export function filterJobs(jobs: readonly ExtractionResult[], filters: JobFilters): ExtractionResult[] {
    return jobs.filter((job) => matchesFilters(job, filters));
}
