import { describe, it, expect } from 'vitest';
import {
    applyRemoteOverride,
    cleanTechStack,
    normalizeExtraction,
    normalizeSalary,
} from './fieldNormalizer.js';
import type { RawExtraction } from './extractionSchema.js';

function makeRaw(overrides: Partial<RawExtraction> = {}): RawExtraction {
    return {
        company: 'Acme',
        tech_stack: ['Python', 'Backend', 'React', 'cloud'],
        remote_type: 'UNKNOWN',
        salary_year_usd: 150,
        visa_sponsorship: false,
        experience_level: 'Senior',
        job_role: 'Backend',
        company_industry: 'SaaS',
        application_url: null,
        ...overrides,
    };
}

const item = { id: 4242, text: 'Acme | Backend Engineer | Remote anywhere | Python', time: 1_700_000_000 };

describe('normalizeSalary', () => {
    it('scales values the model reported in thousands', () => {
        expect(normalizeSalary(150)).toBe(150_000);
    });

    it('drops values below the plausibility floor', () => {
        expect(normalizeSalary(15_000)).toBeNull();
    });

    it('keeps plausible annual salaries unchanged', () => {
        expect(normalizeSalary(95_000)).toBe(95_000);
    });

    it('keeps null as null', () => {
        expect(normalizeSalary(null)).toBeNull();
    });

    it('drops a scaled value that is still below the floor', () => {
        expect(normalizeSalary(12)).toBeNull();
    });

    it('drops negative values', () => {
        expect(normalizeSalary(-5)).toBeNull();
    });

    it('accepts exactly the floor', () => {
        expect(normalizeSalary(20)).toBe(20_000);
    });
});

describe('cleanTechStack', () => {
    it('drops generic terms case-insensitively and keeps order', () => {
        expect(cleanTechStack(['Python', 'Backend', 'React', 'cloud', 'UI', 'Go'])).toEqual(['Python', 'React', 'Go']);
    });

    it('keeps duplicates', () => {
        expect(cleanTechStack(['Go', 'Go'])).toEqual(['Go', 'Go']);
    });
});

describe('applyRemoteOverride', () => {
    it('forces GLOBAL when the post says anywhere', () => {
        expect(applyRemoteOverride('UNKNOWN', 'Remote, work from ANYWHERE')).toBe('GLOBAL');
    });

    it('overrides a regional classification too', () => {
        expect(applyRemoteOverride('US_ONLY', 'Remote (US or APAC)')).toBe('GLOBAL');
    });

    it('leaves the classification alone without markers', () => {
        expect(applyRemoteOverride('US_ONLY', 'Remote (US only)')).toBe('US_ONLY');
    });
});

describe('normalizeExtraction', () => {
    it('applies every rule and stamps metadata from the item', () => {
        expect(normalizeExtraction(makeRaw(), item)).toEqual({
            company: 'Acme',
            tech_stack: ['Python', 'React'],
            remote_type: 'GLOBAL',
            salary_year_usd: 150_000,
            visa_sponsorship: false,
            experience_level: 'Senior',
            job_role: 'Backend',
            company_industry: 'SaaS',
            application_url: null,
            hn_id: '4242',
            timestamp: 1_700_000_000,
        });
    });

    it('is idempotent', () => {
        const once = normalizeExtraction(makeRaw({ salary_year_usd: 15_000 }), item);
        expect(normalizeExtraction(once, item)).toEqual(once);
    });

    it('never lets a stale hn_id survive', () => {
        const other = normalizeExtraction(makeRaw(), { ...item, id: 1 });
        expect(normalizeExtraction(other, item).hn_id).toBe('4242');
    });
});
