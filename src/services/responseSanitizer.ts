/**
 * src/services/responseSanitizer.ts
 *
 * Turns a raw model completion into a JSON object.
 *
 * Recovers the two failure modes seen in practice:
 *   1. Markdown fences around the JSON (```json ... ```).
 *   2. Double emission: the model prints one object and immediately starts a
 *      second one (`{...}{...}`). Only the first object is kept.
 *
 * Anything still unparseable after the brace-substring fallback is a
 * ParseError. There is no default record.
 */

import { ParseError } from '../utils/errors.js';

const FENCED_BLOCK = /^```[\w-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```$/;
const OPEN_FENCE = /^```[\w-]*[ \t]*\r?\n?/;
const OBJECT_BOUNDARY = /\}\s*\{/;

export type JsonObject = Record<string, unknown>;

export function stripCodeFence(text: string): string {
    if (!text.startsWith('```')) {
        return text;
    }

    const fenced = text.match(FENCED_BLOCK);
    if (fenced) {
        return fenced[1].trim();
    }

    // Opening fence without a closing one (completion cut off by max_tokens)
    return text.replace(OPEN_FENCE, '').trim();
}

/**
 * Keeps only the first of two concatenated objects: `{"a":1}{"a":2}` → `{"a":1}`.
 * Text without a `}{` boundary is returned unchanged.
 */
export function keepFirstObject(text: string): string {
    const boundary = text.match(OBJECT_BOUNDARY);
    if (!boundary || boundary.index === undefined) {
        return text;
    }

    return `${text.slice(0, boundary.index)}}`;
}

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | null {
    try {
        const parsed: unknown = JSON.parse(text);
        return isJsonObject(parsed) ? parsed : null;
    } catch {
        return null;
    }
}

export function sanitizeCompletion(rawText: string): JsonObject {
    const unfenced = stripCodeFence(rawText.trim());

    // `}{` inside a string value is not a boundary, so a valid object is taken as-is
    const strict = tryParseObject(unfenced) ?? tryParseObject(keepFirstObject(unfenced));
    if (strict) {
        return strict;
    }

    const start = rawText.indexOf('{');
    const end = rawText.lastIndexOf('}');
    if (start !== -1 && end > start) {
        const span = rawText.slice(start, end + 1);
        const recovered = tryParseObject(span) ?? tryParseObject(keepFirstObject(span));
        if (recovered) {
            return recovered;
        }
    }

    throw new ParseError('Completion is not a recoverable JSON object', rawText);
}
