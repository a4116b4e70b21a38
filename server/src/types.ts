import type { WishlistItem } from './db/db.js';

/**
 * Shared domain types for the catalog.
 * Category and Source are closed enumerations; anything else is rejected before it reaches the matcher.
 */

export const CATEGORIES = ['music', 'game', 'book', 'movie', 'tv', 'podcast', 'paper'] as const;
export type Category = (typeof CATEGORIES)[number];

export const SOURCES = [
    // Music
    'apple-music', 'spotify', 'qobuz',
    // Games
    'steam',
    // Books
    'goodreads', 'kindle',
    // Video
    'netflix', 'apple-tv', 'amazon-prime', 'disney-plus', 'bbc-iplayer',
    // Podcasts
    'apple-podcasts',
    // Academic
    'arxiv',
    'manual',
] as const;
export type Source = (typeof SOURCES)[number];

/** Who set a rating's sentiment. User actions always win over import-derived state. */
export type RatingOrigin = 'user' | 'import';

/** A record as handed over by an importer, after schema validation. */
export interface IncomingRecord {
    category: Category;
    title: string;
    creator: string | null;
    source: Source;
    sourceExternalId: string | null;
    loved: boolean;
    disliked: boolean;
    rating: number | null;
    notes: string | null;
}

/** A title/creator pair an item is known by (its own, or one source's raw text). */
export interface TitleVariant {
    title: string;
    creator: string | null;
}

export type MergeAction = 'created' | 'updated' | 'unchanged';

export type MatchMode = 'strict' | 'loose';

export interface SkippedRecord {
    index: number;
    title: string | null;
    reason: string;
}

export interface RecordFailure {
    index: number;
    title: string;
    message: string;
}

/** Outcome of one import run. Counts always add up to the number of records seen. */
export interface ImportReport {
    category: Category;
    source: Source | null;
    created: number;
    updated: number;
    unchanged: number;
    skipped: number;
    failed: number;
    skippedRecords: SkippedRecord[];
    failures: RecordFailure[];
    /** Wishlist entries removed because the catalog now holds them */
    pruned: WishlistItem[];
}
