import { GATEKEEPER_KEYWORDS, MIN_POST_LENGTH } from '../config/vocabulary.js';

/**
 * Cheap pre-filter run before any paid LLM call.
 * Returns true for comments that are too short or mention no job vocabulary.
 */
export function isJunk(text: string, keywords: readonly string[] = GATEKEEPER_KEYWORDS): boolean {
    if (text.length < MIN_POST_LENGTH) {
        return true;
    }

    const lower = text.toLowerCase();
    return !keywords.some((keyword) => lower.includes(keyword));
}
