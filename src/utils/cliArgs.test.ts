import { InvalidArgumentError } from 'commander';
import { describe, it, expect } from 'vitest';
import { parseNonNegativeInt } from './cliArgs.js';

describe('parseNonNegativeInt', () => {
    it('accepts zero and positive integers', () => {
        expect(parseNonNegativeInt('0')).toBe(0);
        expect(parseNonNegativeInt('250')).toBe(250);
    });

    it('rejects negative, fractional and partly numeric values', () => {
        for (const value of ['-1', '1.5', '12abc', '']) {
            expect(() => parseNonNegativeInt(value)).toThrow(InvalidArgumentError);
        }
    });
});
