import type { CatalogRepository, Item, ItemSource, Rating } from '../db/db.js';
import { sourceKeyOf } from '../db/db.js';
import type { IncomingRecord, MergeAction, RatingOrigin } from '../types.js';
import { fingerprint } from './normalize.js';

export interface MergeOutcome {
    itemId: string;
    action: MergeAction;
}

export interface MergeOptions {
    /** Timestamp written to anything this merge touches */
    now: string;
    newId: () => string;
    /** 'user' when the record is an explicit user action (manual add), 'import' otherwise */
    origin: RatingOrigin;
}

/** true = loved, false = disliked, null = no opinion */
export function sentimentOf(record: Pick<IncomingRecord, 'loved' | 'disliked'>): boolean | null {
    if (record.loved) return true;
    if (record.disliked) return false;
    return null;
}

export function edgeFor(itemId: string, record: IncomingRecord, now: string): ItemSource {
    return {
        itemId,
        source: record.source,
        sourceExternalId: record.sourceExternalId,
        fingerprint: fingerprint(record.title, record.creator),
        rawTitle: record.title,
        rawCreator: record.creator,
        sourceLoved: sentimentOf(record),
        importedAt: now,
    };
}

function sameEdge(a: ItemSource, b: ItemSource): boolean {
    return (
        a.rawTitle === b.rawTitle &&
        a.rawCreator === b.rawCreator &&
        a.sourceLoved === b.sourceLoved &&
        a.sourceExternalId === b.sourceExternalId &&
        a.fingerprint === b.fingerprint
    );
}

function sameRating(a: Rating | null, b: Rating | null): boolean {
    if (a === null || b === null) return a === b;
    return a.loved === b.loved && a.rating === b.rating && a.notes === b.notes && a.origin === b.origin;
}

/**
 * Sentiment after an incoming record is applied.
 * Import-derived state never overrides a user's choice and never downgrades loved;
 * a dislike only lands on a neutral item.
 */
function nextSentiment(current: Rating | null, incoming: boolean | null, origin: RatingOrigin): { loved: boolean | null; origin: RatingOrigin } {
    const loved = current?.loved ?? null;
    const currentOrigin = current?.origin ?? 'import';

    if (origin === 'user') {
        return incoming === null ? { loved, origin: currentOrigin } : { loved: incoming, origin: 'user' };
    }
    if (currentOrigin === 'user') return { loved, origin: currentOrigin };
    if (incoming === true) return { loved: true, origin: 'import' };
    if (incoming === false && loved === null) return { loved: false, origin: 'import' };
    return { loved, origin: currentOrigin };
}

function nextRating(itemId: string, current: Rating | null, record: IncomingRecord, options: MergeOptions): Rating | null {
    const sentiment = nextSentiment(current, sentimentOf(record), options.origin);
    // User input replaces values; imports only fill what is missing.
    const rating = options.origin === 'user'
        ? record.rating ?? current?.rating ?? null
        : current?.rating ?? record.rating;
    const notes = options.origin === 'user'
        ? record.notes ?? current?.notes ?? null
        : current?.notes ?? record.notes;

    if (!current && sentiment.loved === null && rating === null && notes === null) return null;

    return {
        itemId,
        loved: sentiment.loved,
        rating,
        notes,
        origin: sentiment.origin,
        ratedAt: options.now,
    };
}

/**
 * Combines an incoming record into the catalog: creates a new item,
 * or folds the record into a matched one.
 */
export class Merger {
    constructor(private readonly repo: CatalogRepository) {}

    merge(existing: Item | null, record: IncomingRecord, options: MergeOptions): MergeOutcome {
        return existing ? this.update(existing, record, options) : this.create(record, options);
    }

    private create(record: IncomingRecord, options: MergeOptions): MergeOutcome {
        const item: Item = {
            id: options.newId(),
            category: record.category,
            title: record.title,
            creator: record.creator,
            createdAt: options.now,
            updatedAt: options.now,
        };
        this.repo.insertItem(item);

        const rating = nextRating(item.id, null, record, options);
        if (rating) this.repo.upsertRating(rating);

        this.repo.upsertItemSource(edgeFor(item.id, record, options.now));
        return { itemId: item.id, action: 'created' };
    }

    private update(existing: Item, record: IncomingRecord, options: MergeOptions): MergeOutcome {
        let changed = false;

        // Display fields: first writer wins, imports only fill gaps.
        const fields: Partial<Pick<Item, 'creator' | 'updatedAt'>> = {};
        if (existing.creator === null && record.creator !== null) {
            fields.creator = record.creator;
            changed = true;
        }

        const current = this.repo.getRating(existing.id);
        const next = nextRating(existing.id, current, record, options);
        if (next && !sameRating(current, next)) {
            this.repo.upsertRating(next);
            changed = true;
        }

        const edge = edgeFor(existing.id, record, options.now);
        const key = sourceKeyOf(edge);
        const stored = this.repo
            .getItemSources(existing.id)
            .find((e) => e.source === edge.source && sourceKeyOf(e) === key);
        if (!stored || !sameEdge(stored, edge)) {
            this.repo.upsertItemSource(edge);
            changed = true;
        }

        if (!changed) return { itemId: existing.id, action: 'unchanged' };

        this.repo.updateItem(existing.id, { ...fields, updatedAt: options.now });
        return { itemId: existing.id, action: 'updated' };
    }
}
