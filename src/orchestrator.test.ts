import { describe, it, expect, vi } from 'vitest';
import { BatchOrchestrator, type Extractor, type OrchestratorOptions } from './orchestrator.js';
import type { ExtractionResult, RawExtraction } from './services/extractionSchema.js';
import type { RawItem } from './sources/types.js';
import { ParseError, TransportError } from './utils/errors.js';

const RAW: RawExtraction = {
    company: 'Acme',
    tech_stack: ['Python', 'backend'],
    remote_type: 'US_ONLY',
    salary_year_usd: 140,
    visa_sponsorship: false,
    experience_level: 'Mid',
    job_role: 'Backend',
    company_industry: null,
    application_url: null,
};

function post(id: number): RawItem {
    return { id, text: `Company ${id} | Backend Engineer | Remote (US) | Python and Postgres`, time: 1000 + id };
}

const JUNK: RawItem = { id: 99, text: 'Great thread, thanks!', time: 1099 };

function setup(overrides: Partial<OrchestratorOptions> = {}, analyze?: Extractor['analyze']) {
    const impl: Extractor['analyze'] = analyze ?? (async () => RAW);
    const analyzer = { analyze: vi.fn(impl) };
    const sleep = vi.fn(async (_ms: number) => {});
    const checkpointSizes: number[] = [];
    const checkpoint = {
        write: vi.fn(async (results: readonly ExtractionResult[]) => {
            checkpointSizes.push(results.length);
        }),
    };
    const orchestrator = new BatchOrchestrator({
        analyzer,
        checkpoint,
        tokensPerCall: 1500,
        pacingDelayMs: 10_000,
        checkpointInterval: 10,
        sleep,
        ...overrides,
    });
    return { orchestrator, analyzer, sleep, checkpoint, checkpointSizes };
}

describe('BatchOrchestrator', () => {
    it('extracts and normalizes every accepted item in order', async () => {
        const { orchestrator } = setup();
        const run = await orchestrator.run([post(1), post(2)], 1_000_000);

        expect(run.results.map((r) => r.hn_id)).toEqual(['1', '2']);
        expect(run.results[0]).toMatchObject({
            tech_stack: ['Python'],
            salary_year_usd: 140_000,
            timestamp: 1001,
        });
        expect(run.outcomes).toEqual({ skipped: 0, extracted: 2, failed: 0 });
        expect(run.tokensUsed).toBe(3000);
        expect(run.halted).toBe(false);
    });

    it('halts before the first call when the ceiling is below one call', async () => {
        const { orchestrator, analyzer, checkpoint } = setup();
        const run = await orchestrator.run([post(1), post(2)], 1000);

        expect(run.results).toEqual([]);
        expect(run.halted).toBe(true);
        expect(analyzer.analyze).not.toHaveBeenCalled();
        expect(checkpoint.write).not.toHaveBeenCalled();
    });

    it('stops once the next call would cross the ceiling and keeps earlier results', async () => {
        const { orchestrator, analyzer, checkpointSizes } = setup();
        const run = await orchestrator.run([post(1), post(2), post(3), post(4)], 3000);

        expect(run.results).toHaveLength(2);
        expect(run.halted).toBe(true);
        expect(analyzer.analyze).toHaveBeenCalledTimes(2);
        expect(checkpointSizes).toEqual([2]);
    });

    it('skips gatekept items without calling the LLM, charging budget or sleeping', async () => {
        const { orchestrator, analyzer, sleep } = setup();
        const run = await orchestrator.run([JUNK, post(1)], 1_000_000);

        expect(analyzer.analyze).toHaveBeenCalledTimes(1);
        expect(analyzer.analyze).toHaveBeenCalledWith(post(1).text);
        expect(run.outcomes).toEqual({ skipped: 1, extracted: 1, failed: 0 });
        expect(run.tokensUsed).toBe(1500);
        expect(sleep).toHaveBeenCalledTimes(1);
        expect(sleep).toHaveBeenCalledWith(10_000);
    });

    it('continues past a failed item and still paces after it', async () => {
        const { orchestrator, sleep } = setup({}, async (text) => {
            if (text.startsWith('Company 2 ')) throw new TransportError('LLM error: 503 Service Unavailable', 503);
            if (text.startsWith('Company 3 ')) throw new ParseError('bad', 'not json');
            return RAW;
        });

        const run = await orchestrator.run([post(1), post(2), post(3), post(4)], 1_000_000);

        expect(run.results.map((r) => r.hn_id)).toEqual(['1', '4']);
        expect(run.outcomes).toEqual({ skipped: 0, extracted: 2, failed: 2 });
        expect(run.tokensUsed).toBe(3000);
        expect(sleep).toHaveBeenCalledTimes(4);
    });

    it('checkpoints every N successes and once more at the end', async () => {
        const { orchestrator, checkpointSizes } = setup({ checkpointInterval: 2 });
        await orchestrator.run([1, 2, 3, 4, 5].map(post), 1_000_000);

        expect(checkpointSizes).toEqual([2, 4, 5]);
    });

    it('does not rewrite the output when the last checkpoint is current', async () => {
        const { orchestrator, checkpointSizes } = setup({ checkpointInterval: 2 });
        await orchestrator.run([1, 2, 3, 4].map(post), 1_000_000);

        expect(checkpointSizes).toEqual([2, 4]);
    });

    it('keeps running when a checkpoint write fails', async () => {
        const { orchestrator, checkpoint } = setup({ checkpointInterval: 1 });
        checkpoint.write.mockRejectedValueOnce(new Error('disk full'));

        const run = await orchestrator.run([post(1), post(2)], 1_000_000);

        expect(run.results).toHaveLength(2);
        expect(checkpoint.write).toHaveBeenCalledTimes(2);
    });

    it('honours an item limit', async () => {
        const { orchestrator, analyzer } = setup({ limit: 1 });
        const run = await orchestrator.run([post(1), post(2)], 1_000_000);

        expect(run.results).toHaveLength(1);
        expect(analyzer.analyze).toHaveBeenCalledTimes(1);
    });
});
