/**
 * src/orchestrator.ts
 *
 * BATCH EXTRACTION ORCHESTRATOR
 *
 * Walks the comments strictly in order, one at a time:
 *
 *   budget check → gatekeeper → LLM extraction → normalize → append
 *
 * Per-item outcome:
 *   skipped        gatekeeper rejected it; no budget, no pacing delay
 *   extracted      appended to the results; budget charged
 *   failed         transport / parse error after retries; logged, run continues
 *   budget_halted  one more call would cross the token ceiling; the run stops
 *                  and the remaining items are left untouched
 *
 * Every attempted extraction is followed by the pacing delay, which keeps the
 * run under the provider's requests-per-minute and tokens-per-minute limits.
 * Every `checkpointInterval` successes the full result set is written out, so
 * the dashboard can read partial progress. A final write happens when the
 * loop ends for any reason.
 */

import { log } from 'crawlee';
import type { RawItem } from './sources/types.js';
import type { ExtractionResult, RawExtraction } from './services/extractionSchema.js';
import { normalizeExtraction } from './services/fieldNormalizer.js';
import { isJunk } from './services/gatekeeper.js';
import type { CheckpointSink } from './utils/jobTable.js';
import { BudgetExceeded, ParseError, errorMessage } from './utils/errors.js';
import { sleep } from './utils/retry.js';
import { RunBudget } from './utils/runBudget.js';

export type ItemOutcome = 'skipped' | 'extracted' | 'failed' | 'budget_halted';

export interface Extractor {
    analyze(text: string): Promise<RawExtraction>;
}

export interface OrchestratorOptions {
    analyzer: Extractor;
    checkpoint?: CheckpointSink;
    tokensPerCall: number;
    pacingDelayMs: number;
    checkpointInterval: number;
    /** Optional cap on how many items are considered. */
    limit?: number;
    isJunk?: (text: string) => boolean;
    sleep?: (ms: number) => Promise<void>;
}

export interface BatchRunResult {
    results: ExtractionResult[];
    outcomes: Record<Exclude<ItemOutcome, 'budget_halted'>, number>;
    halted: boolean;
    tokensUsed: number;
    durationMs: number;
}

export class BatchOrchestrator {
    private readonly rejects: (text: string) => boolean;
    private readonly wait: (ms: number) => Promise<void>;

    constructor(private readonly options: OrchestratorOptions) {
        this.rejects = options.isJunk ?? ((text) => isJunk(text));
        this.wait = options.sleep ?? sleep;
    }

    async run(items: readonly RawItem[], dailyTokenCeiling: number): Promise<BatchRunResult> {
        const startedAt = Date.now();
        const budget = new RunBudget(dailyTokenCeiling, this.options.tokensPerCall);
        const queue = this.options.limit !== undefined ? items.slice(0, this.options.limit) : items;
        const results: ExtractionResult[] = [];
        const outcomes = { skipped: 0, extracted: 0, failed: 0 };
        let checkpointed = 0;
        let halted = false;

        log.info(`[Orchestrator] Starting analysis of ${queue.length} comments (ceiling: ${dailyTokenCeiling} tokens)`);

        for (const item of queue) {
            budget.advance();
            const position = `[${budget.snapshot().itemIndex}/${queue.length}]`;

            try {
                budget.assertAffordable();
            } catch (err) {
                if (!(err instanceof BudgetExceeded)) throw err;
                log.warning(`[Orchestrator] 🚫 ${err.message}. Stopping before item ${item.id}.`);
                halted = true;
                break;
            }

            if (this.rejects(item.text)) {
                outcomes.skipped++;
                log.debug(`[Orchestrator] ${position} Skipped ${item.id}: not a job post`);
                continue;
            }

            const outcome = await this.processItem(item, results);
            outcomes[outcome]++;
            if (outcome === 'extracted') {
                budget.recordCall();
            }

            log.info(`[Orchestrator] ${position} ${outcome === 'extracted' ? '✓' : '✗'} ${item.id}. Sleeping ${this.options.pacingDelayMs / 1000}s...`);
            await this.wait(this.options.pacingDelayMs);

            if (outcome === 'extracted' && results.length % this.options.checkpointInterval === 0) {
                log.info(`[Orchestrator] ${position} Saving intermediate results...`);
                checkpointed = await this.flush(results, checkpointed);
            }
        }

        if (results.length > checkpointed) {
            await this.flush(results, checkpointed);
        }

        const { tokensUsed } = budget.snapshot();
        log.info(
            `[Orchestrator] Done: ${outcomes.extracted} extracted, ${outcomes.failed} failed, ` +
            `${outcomes.skipped} skipped${halted ? ' (budget halted)' : ''}. ~${tokensUsed} tokens.`
        );

        return { results, outcomes, halted, tokensUsed, durationMs: Date.now() - startedAt };
    }

    private async processItem(item: RawItem, results: ExtractionResult[]): Promise<'extracted' | 'failed'> {
        try {
            const raw = await this.options.analyzer.analyze(item.text);
            results.push(normalizeExtraction(raw, item));
            return 'extracted';
        } catch (err) {
            if (err instanceof ParseError) {
                log.error(`[Orchestrator] Unparseable completion for item ${item.id}. Raw response:\n${err.rawText}`);
            } else {
                log.error(`[Orchestrator] Extraction failed for item ${item.id}: ${errorMessage(err)}`);
            }
            return 'failed';
        }
    }

    /** Returns how many results are now on disk. A failed write keeps the old count. */
    private async flush(results: readonly ExtractionResult[], checkpointed: number): Promise<number> {
        if (!this.options.checkpoint) {
            return results.length;
        }

        try {
            await this.options.checkpoint.write(results);
            return results.length;
        } catch (err) {
            log.error(`[Orchestrator] Checkpoint write failed: ${errorMessage(err)}`);
            return checkpointed;
        }
    }
}
