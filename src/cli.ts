#!/usr/bin/env node

import chalk from 'chalk';
import { Command } from 'commander';
import { log } from 'crawlee';
import { loadEnv, type Env } from './config/env.js';
import type { JobFilters } from './dashboard/filters.js';
import { buildDashboard } from './dashboard/render.js';
import { analyzeStage, outputTablePath, scrapeStage } from './pipeline.js';
import { warnIfCredentialsMissing } from './services/completionClient.js';
import { errorMessage } from './utils/errors.js';
import { readJobTable } from './utils/jobTable.js';
import { parseNonNegativeInt } from './utils/cliArgs.js';
import { createRunContext } from './utils/runContext.js';

const LOG_LEVELS: Record<string, number> = {
    OFF: log.LEVELS.OFF,
    ERROR: log.LEVELS.ERROR,
    WARNING: log.LEVELS.WARNING,
    INFO: log.LEVELS.INFO,
    DEBUG: log.LEVELS.DEBUG,
};

function configureLogging(env: Env, verbose: boolean): void {
    const name = verbose ? 'DEBUG' : env.CRAWLEE_LOG_LEVEL.toUpperCase();
    log.setLevel(LOG_LEVELS[name] ?? log.LEVELS.INFO);
}

interface AnalyzeCliOptions {
    input?: string;
    limit?: number;
    ceiling?: number;
}

interface DashboardCliOptions extends Omit<JobFilters, 'visa'> {
    file?: string;
    visa?: boolean;
}

async function runAnalyze(env: Env, options: AnalyzeCliOptions): Promise<void> {
    warnIfCredentialsMissing(env);
    const run = await analyzeStage(env, options);
    if (run && run.results.length > 0) {
        log.info(`[Pipeline] Saved ${run.results.length} jobs to ${outputTablePath(env)}`);
    }
}

async function runDashboard(env: Env, options: DashboardCliOptions): Promise<void> {
    const file = options.file ?? outputTablePath(env);
    const jobs = await readJobTable(file);
    if (jobs.length === 0) {
        console.log(chalk.yellow(`No data found at ${file}. Please run the pipeline first.`));
        return;
    }

    console.log(buildDashboard(jobs, options));
}

async function main(): Promise<void> {
    try {
        const env = loadEnv();
        const program = new Command();

        program
            .name('hiring-radar')
            .description('Extract structured job data from HN "Who is hiring?" threads')
            .option('-v, --verbose', 'Debug logging', false)
            .hook('preAction', (root, action) => {
                configureLogging(env, root.opts<{ verbose: boolean }>().verbose);
                const ctx = createRunContext(action.name());
                log.debug(`[CLI] Run ${ctx.runId} started at ${ctx.startedAt}`);
            });

        program
            .command('scrape')
            .description('Fetch the latest "Who is hiring?" thread and save its comments')
            .action(async () => {
                await scrapeStage(env);
            });

        program
            .command('analyze')
            .description('Extract structured jobs from the latest comment snapshot')
            .option('-i, --input <file>', 'Comment snapshot to analyze (defaults to the newest)')
            .option('-l, --limit <n>', 'Only consider the first n comments', parseNonNegativeInt)
            .option('-c, --ceiling <tokens>', 'Token ceiling for this run', parseNonNegativeInt)
            .action((options: AnalyzeCliOptions) => runAnalyze(env, options));

        program
            .command('run', { isDefault: true })
            .description('Scrape, then analyze')
            .option('-l, --limit <n>', 'Only consider the first n comments', parseNonNegativeInt)
            .option('-c, --ceiling <tokens>', 'Token ceiling for this run', parseNonNegativeInt)
            .action(async (options: AnalyzeCliOptions) => {
                const snapshot = await scrapeStage(env);
                if (snapshot) {
                    await runAnalyze(env, { ...options, input: snapshot });
                }
            });

        program
            .command('dashboard')
            .description('Show the extracted jobs with optional filters')
            .option('-f, --file <csv>', 'Job table to read')
            .option('--remote-type <type>', 'GLOBAL, US_ONLY, EU_ONLY, ONSITE or UNKNOWN (substring)')
            .option('--experience-level <level>', 'Senior, Staff, Lead, Junior, Intern, Mid (substring)')
            .option('--job-role <role>', 'Backend, Frontend, ML/AI, ... (substring)')
            .option('--industry <industry>', 'Company industry (substring)')
            .option('--tech <name>', 'Jobs whose stack includes this technology')
            .option('--visa', 'Only jobs offering visa sponsorship')
            .option('--no-visa', 'Only jobs without visa sponsorship')
            .action((options: DashboardCliOptions) => runDashboard(env, options));

        await program.parseAsync(process.argv);
    } catch (error) {
        console.error(chalk.red(`CLI failed: ${errorMessage(error)}`));
        process.exitCode = 1;
    }
}

void main();
