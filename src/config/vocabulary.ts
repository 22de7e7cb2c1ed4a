/**
 * src/config/vocabulary.ts
 *
 * Fixed word sets used by the gatekeeper and the field normalizer.
 * All entries are lowercase; callers lowercase the text they compare.
 */

/** Comments shorter than this are never job posts. */
export const MIN_POST_LENGTH = 60;

/**
 * A comment must mention at least one of these to be worth an LLM call.
 * Matched as substrings, so "engineer" also covers "engineering".
 */
export const GATEKEEPER_KEYWORDS: readonly string[] = [
    // Role titles
    'engineer', 'developer', 'designer', 'scientist', 'architect', 'analyst',
    'manager', 'devops', 'sre', 'frontend', 'backend', 'full stack', 'fullstack',
    // Technologies
    'python', 'javascript', 'typescript', 'react', 'node', 'golang', 'rust',
    'java', 'kubernetes', 'aws', 'sql', 'machine learning',
    // Employment terms
    'hiring', 'remote', 'onsite', 'full-time', 'full time', 'part-time',
    'contract', 'salary', 'equity', 'visa', 'intern',
];

/** Generic terms the model tends to put in tech_stack that name no technology. */
export const TECH_STACK_BLACKLIST: ReadonlySet<string> = new Set([
    'frontend', 'backend', 'fullstack', 'devops', 'engineer', 'developer',
    'software', 'web', 'mobile', 'ios', 'android', 'cloud', 'systems',
    'ui', 'ux', 'data', 'science', 'analysis',
]);

/** Region-inclusive markers that mean a post is open worldwide. */
export const GLOBAL_REMOTE_MARKERS: readonly string[] = [
    'asia', 'apac', 'vietnam', 'world', 'anywhere',
];
