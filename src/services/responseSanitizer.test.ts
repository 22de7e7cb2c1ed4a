import { describe, it, expect } from 'vitest';
import { keepFirstObject, sanitizeCompletion, stripCodeFence } from './responseSanitizer.js';
import { ParseError } from '../utils/errors.js';

describe('sanitizeCompletion', () => {
    it('keeps only the first of two concatenated objects', () => {
        expect(sanitizeCompletion('{"a": 1}{"a": 2}')).toEqual({ a: 1 });
    });

    it('strips a json code fence', () => {
        expect(sanitizeCompletion('```json\n{"a":1}\n```')).toEqual({ a: 1 });
    });

    it('strips a bare fence and surrounding whitespace', () => {
        expect(sanitizeCompletion('  \n```\n{"company": "Acme"}\n```\n')).toEqual({ company: 'Acme' });
    });

    it('handles an opening fence with no closing fence', () => {
        expect(sanitizeCompletion('```json\n{"a":1}')).toEqual({ a: 1 });
    });

    it('falls back to the first-brace/last-brace substring around prose', () => {
        expect(sanitizeCompletion('Here is the JSON:\n{"a": 1}\nHope this helps')).toEqual({ a: 1 });
    });

    it('applies the double-object fix to the fallback substring', () => {
        expect(sanitizeCompletion('Sure! {"a": 1}\n{"a": 2} done')).toEqual({ a: 1 });
    });

    it('does not split a valid object at a brace pair inside a string', () => {
        expect(sanitizeCompletion('{"company": "a}{b", "job_role": "Backend"}'))
            .toEqual({ company: 'a}{b', job_role: 'Backend' });
        expect(sanitizeCompletion('Result: {"company": "x} {y"} end')).toEqual({ company: 'x} {y' });
    });

    it('leaves nested objects intact', () => {
        expect(sanitizeCompletion('{"a": {"b": 1}, "c": [{"d": 2}]}')).toEqual({ a: { b: 1 }, c: [{ d: 2 }] });
    });

    it('throws ParseError carrying the raw text when nothing is recoverable', () => {
        const raw = 'I could not find a job post in this text.';
        let caught: unknown;
        try {
            sanitizeCompletion(raw);
        } catch (err) {
            caught = err;
        }

        if (!(caught instanceof ParseError)) throw new Error('expected a ParseError');
        expect(caught.rawText).toBe(raw);
    });

    it('rejects JSON that is not an object', () => {
        expect(() => sanitizeCompletion('[1, 2, 3]')).toThrow(ParseError);
    });

    it('rejects a truncated object', () => {
        expect(() => sanitizeCompletion('{"company": "Acme", "tech_stack": ["Py')).toThrow(ParseError);
    });
});

describe('stripCodeFence', () => {
    it('returns unfenced text unchanged', () => {
        expect(stripCodeFence('{"a":1}')).toBe('{"a":1}');
    });
});

describe('keepFirstObject', () => {
    it('splits at whitespace between objects', () => {
        expect(keepFirstObject('{"a":1}\n  {"a":2}')).toBe('{"a":1}');
    });

    it('does not treat array separators as a boundary', () => {
        expect(keepFirstObject('[{"a":1},{"a":2}]')).toBe('[{"a":1},{"a":2}]');
    });
});
