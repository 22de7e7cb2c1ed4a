/**
 * src/sources/types.ts
 *
 * Shared types for the upstream comment source.
 */

// ─── Raw Item ─────────────────────────────────────────────────────────────────

/** One top-level comment from a "Who is hiring?" thread. */
export interface RawItem {
    readonly id: number;
    /** Comment body as returned by the HN API (HTML). */
    readonly text: string;
    /** Unix seconds. */
    readonly time: number;
}

// ─── Thread ───────────────────────────────────────────────────────────────────

export interface HiringThread {
    id: string;
    title: string;
    createdAt: number;
}

// ─── Source Result ────────────────────────────────────────────────────────────

export interface SourceResult {
    thread: HiringThread | null;
    items: RawItem[];
    /** Kids that could not be fetched; they are skipped, not retried. */
    failed: number;
    durationMs: number;
    error?: string;
}
