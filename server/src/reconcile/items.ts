import type { MatchConfig } from '../config.js';
import type { CatalogRepository, ItemFilters, ItemView, Rating, WishlistItem } from '../db/db.js';
import { NotFoundError } from '../errors.js';
import type { ItemUpdateInput, ManualItemInput, RatingUpdateInput } from '../records.js';
import type { Category, IncomingRecord, MatchMode } from '../types.js';
import { Matcher, type MatchResult } from './matcher.js';
import { Merger } from './merger.js';
import { systemRuntime, type Runtime } from './runtime.js';
import type { ScoreBreakdown } from './score.js';
import { Wishlist } from './wishlist.js';

export type ManualAddResult =
    | { status: 'created' | 'merged'; item: ItemView; pruned: WishlistItem[] }
    | {
        status: 'duplicate';
        /** 'same-title': the catalog already holds this title; 'similar': a loose match */
        reason: 'same-title' | 'similar';
        candidate: ItemView;
        score: number;
        breakdown: ScoreBreakdown;
    };

/**
 * User-facing catalog operations: manual adds with the duplicate prompt,
 * edits, ratings and removal. Everything here is an explicit user action.
 */
export class CatalogService {
    private readonly matcher: Matcher;
    private readonly merger: Merger;
    private readonly wishlist: Wishlist;

    constructor(
        private readonly repo: CatalogRepository,
        config: MatchConfig,
        private readonly runtime: Runtime = systemRuntime
    ) {
        this.matcher = new Matcher(repo, config);
        this.merger = new Merger(repo);
        this.wishlist = new Wishlist(repo, runtime);
    }

    findMatch(category: Category, title: string, creator: string | null, mode: MatchMode): MatchResult | null {
        return this.matcher.findMatch(category, title, creator, mode);
    }

    get(id: string): ItemView {
        const item = this.repo.getItemView(id);
        if (!item) throw new NotFoundError('Item', id);
        return item;
    }

    list(filters?: ItemFilters): ItemView[] {
        return this.repo.listItems(filters);
    }

    /**
     * Add an item by hand. An item with the same title (and the same creator, when
     * one is given) or a loose match is offered back as a duplicate unless the
     * caller already chose: 'existing' folds the input into the candidate,
     * 'new' adds it regardless.
     */
    addManual(input: ManualItemInput): ManualAddResult {
        const candidates = this.matcher.load(input.category);
        const sameTitle = this.matcher.sameTitle(input.category, input.title, input.creator, candidates);
        const match = sameTitle ?? this.matcher.findMatch(input.category, input.title, input.creator, 'loose', candidates);

        if (match && input.resolution === undefined) {
            return {
                status: 'duplicate',
                reason: sameTitle ? 'same-title' : 'similar',
                candidate: this.get(match.item.id),
                score: match.score,
                breakdown: match.breakdown,
            };
        }

        const record: IncomingRecord = {
            category: input.category,
            title: input.title,
            creator: input.creator,
            source: 'manual',
            sourceExternalId: null,
            loved: input.loved,
            disliked: input.disliked,
            rating: input.rating,
            notes: input.notes,
        };
        const existing = input.resolution === 'existing' && match ? match.item : null;

        const outcome = this.repo.transaction(() =>
            this.merger.merge(existing, record, {
                now: this.runtime.now(),
                newId: this.runtime.newId,
                origin: 'user',
            })
        );
        const pruned = this.wishlist.prune(input.category);

        return {
            status: outcome.action === 'created' ? 'created' : 'merged',
            item: this.get(outcome.itemId),
            pruned,
        };
    }

    /** Explicit edit of display fields; overrides whatever the importers wrote. */
    update(id: string, input: ItemUpdateInput): ItemView {
        this.get(id);
        const creator = input.creator === undefined ? undefined : input.creator === '' ? null : input.creator;
        this.repo.updateItem(id, { title: input.title, creator, updatedAt: this.runtime.now() });
        return this.get(id);
    }

    /** Love, dislike, clear, rate or annotate. User sentiment always wins, including disliking a loved item. */
    rate(id: string, input: RatingUpdateInput): ItemView {
        const now = this.runtime.now();
        this.repo.transaction(() => {
            this.get(id);
            const current = this.repo.getRating(id);

            let loved = current?.loved ?? null;
            let origin = current?.origin ?? 'import';
            if (input.loved || input.disliked || input.neutral) {
                loved = input.loved ? true : input.disliked ? false : null;
                origin = 'user';
            }

            const next: Rating = {
                itemId: id,
                loved,
                rating: input.rating === undefined ? current?.rating ?? null : input.rating,
                notes: input.notes === undefined ? current?.notes ?? null : input.notes || null,
                origin,
                ratedAt: now,
            };
            this.repo.upsertRating(next);
            this.repo.updateItem(id, { updatedAt: now });
        });
        return this.get(id);
    }

    remove(id: string): void {
        if (!this.repo.removeItem(id)) throw new NotFoundError('Item', id);
    }
}
