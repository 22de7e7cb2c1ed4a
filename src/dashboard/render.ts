/**
 * src/dashboard/render.ts
 *
 * Terminal rendering of the job table: headline metrics, top technologies,
 * remote-policy breakdown, then one row per job.
 */

import chalk from 'chalk';
import type { ExtractionResult } from '../services/extractionSchema.js';
import { filterJobs, type JobFilters } from './filters.js';
import { computeMetrics, type DashboardMetrics } from './metrics.js';

const BAR_WIDTH = 30;

interface Column {
    header: string;
    width: number;
    value: (job: ExtractionResult) => string;
}

const COLUMNS: Column[] = [
    { header: 'Company', width: 22, value: (j) => j.company ?? '—' },
    { header: 'Role', width: 10, value: (j) => j.job_role },
    { header: 'Level', width: 8, value: (j) => j.experience_level },
    { header: 'Remote', width: 8, value: (j) => j.remote_type },
    { header: 'Salary', width: 9, value: (j) => formatSalary(j.salary_year_usd) },
    { header: 'Visa', width: 4, value: (j) => (j.visa_sponsorship ? 'yes' : 'no') },
    { header: 'Industry', width: 14, value: (j) => j.company_industry ?? '—' },
    { header: 'Stack', width: 36, value: (j) => j.tech_stack.join(', ') },
    { header: 'Posted (UTC)', width: 20, value: (j) => formatPosted(j.timestamp) },
    { header: 'HN Link', width: 46, value: (j) => hnItemUrl(j.hn_id) },
];

export function hnItemUrl(hnId: string): string {
    return `https://news.ycombinator.com/item?id=${hnId}`;
}

/** Unix seconds → `2023-11-14 22:13 UTC`. */
export function formatPosted(timestamp: number): string {
    return `${new Date(timestamp * 1000).toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function formatSalary(salary: number | null): string {
    return salary === null ? 'N/A' : `$${salary.toLocaleString('en-US')}`;
}

function fit(text: string, width: number): string {
    return text.length > width ? `${text.slice(0, width - 1)}…` : text.padEnd(width);
}

function renderBars(title: string, rows: Array<[string, number]>): string[] {
    if (rows.length === 0) {
        return [chalk.bold(title), chalk.dim('  No data.')];
    }

    const max = rows[0][1];
    const labelWidth = Math.max(...rows.map(([label]) => label.length));
    return [
        chalk.bold(title),
        ...rows.map(([label, count]) => {
            const bar = '█'.repeat(Math.max(1, Math.round((count / max) * BAR_WIDTH)));
            return `  ${label.padEnd(labelWidth)} ${chalk.cyan(bar)} ${count}`;
        }),
    ];
}

export function renderJobTable(jobs: readonly ExtractionResult[]): string[] {
    const header = COLUMNS.map((c) => fit(c.header, c.width)).join(' │ ');
    const rule = COLUMNS.map((c) => '─'.repeat(c.width)).join('─┼─');
    const body = jobs.map((job) => COLUMNS.map((c) => fit(c.value(job), c.width)).join(' │ '));
    return [chalk.bold(header), chalk.dim(rule), ...body];
}

/** Metrics describe the whole table; `listing` is the filtered subset shown below them. */
export function renderDashboard(listing: readonly ExtractionResult[], metrics: DashboardMetrics): string {
    const lines = [
        chalk.cyan.bold('🌍 Hiring Radar'),
        '',
        `Total Jobs: ${chalk.bold(String(metrics.total))}   ` +
            `Remote Opportunities: ${chalk.bold(String(metrics.remote))}   ` +
            `Avg Salary (USD): ${chalk.bold(formatSalary(metrics.averageSalary))}`,
        '',
        ...renderBars(`Top ${metrics.topTech.length} Most Requested Technologies`, metrics.topTech),
        '',
        ...renderBars('Remote Policy Distribution', metrics.remotePolicy),
        '',
        chalk.bold(`Showing ${listing.length} of ${metrics.total} jobs`),
        ...renderJobTable(listing),
    ];

    return lines.join('\n');
}

/** Headline metrics and charts cover every job; only the listing is filtered. */
export function buildDashboard(jobs: readonly ExtractionResult[], filters: JobFilters): string {
    return renderDashboard(filterJobs(jobs, filters), computeMetrics(jobs));
}
