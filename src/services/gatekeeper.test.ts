import { describe, it, expect } from 'vitest';
import { isJunk } from './gatekeeper.js';
import { GATEKEEPER_KEYWORDS, MIN_POST_LENGTH } from '../config/vocabulary.js';

const JOB_POST = 'Acme Robotics | Senior Backend Engineer | Remote (US) | Python, Postgres | $150k';

describe('isJunk', () => {
    it('accepts a job post', () => {
        expect(isJunk(JOB_POST)).toBe(false);
    });

    it('rejects text shorter than the minimum', () => {
        expect(isJunk('Hiring Python engineer!')).toBe(true);
    });

    it('rejects long text without any job vocabulary', () => {
        const chatter = 'Thanks for putting this thread together every month, it is always a great read for me.';
        expect(chatter.length).toBeGreaterThanOrEqual(MIN_POST_LENGTH);
        expect(isJunk(chatter)).toBe(true);
    });

    it('matches keywords case-insensitively', () => {
        const text = 'We are looking for a TYPESCRIPT person to join a small team in Lisbon, Portugal.';
        expect(isJunk(text)).toBe(false);
    });

    it('accepts a custom keyword list', () => {
        const text = 'Thanks for putting this thread together every month, it is always a great read for me.';
        expect(isJunk(text, ['thread'])).toBe(false);
    });
});

describe('GATEKEEPER_KEYWORDS', () => {
    it('is all lowercase', () => {
        for (const keyword of GATEKEEPER_KEYWORDS) {
            expect(keyword).toBe(keyword.toLowerCase());
        }
    });
});
