import type { CatalogRepository, WishlistItem } from '../db/db.js';
import type { WishlistInput } from '../records.js';
import { CATEGORIES } from '../types.js';
import type { Category } from '../types.js';
import { normalize } from './normalize.js';
import { systemRuntime, type Runtime } from './runtime.js';

function keyOf(title: string, creator: string | null): string {
    return `${normalize(title)}\u0000${normalize(creator)}`;
}

interface CatalogKeys {
    /** normalized title + creator of every variant */
    pairs: Set<string>;
    titles: Set<string>;
}

/** Normalized (title, creator) pairs known for a category, across every item variant. */
function catalogKeys(repo: CatalogRepository, category: Category): CatalogKeys {
    const keys: CatalogKeys = { pairs: new Set(), titles: new Set() };
    for (const candidate of repo.getCandidates(category)) {
        for (const variant of candidate.variants) {
            keys.pairs.add(keyOf(variant.title, variant.creator));
            keys.titles.add(normalize(variant.title));
        }
    }
    return keys;
}

/** An entry without a creator is held by any variant with its title. */
function holds(keys: CatalogKeys, normTitle: string, normCreator: string): boolean {
    if (normTitle === '') return false;
    if (normCreator === '') return keys.titles.has(normTitle);
    return keys.pairs.has(`${normTitle}\u0000${normCreator}`);
}

/**
 * Prune predicate: does the catalog already hold this work?
 * Takes already-normalized title and creator; an empty creator matches any.
 */
export function isInCatalog(repo: CatalogRepository, category: Category, normTitle: string, normCreator: string): boolean {
    return holds(catalogKeys(repo, category), normTitle, normCreator);
}

export class Wishlist {
    constructor(
        private readonly repo: CatalogRepository,
        private readonly runtime: Runtime = systemRuntime
    ) {}

    /** Add an entry unless the same (title, creator) is already wished for in that category. */
    add(input: WishlistInput): { item: WishlistItem; created: boolean } {
        const key = keyOf(input.title, input.creator);
        const existing = this.repo
            .getWishlistItems(input.category)
            .find((w) => keyOf(w.title, w.creator) === key);
        if (existing) return { item: existing, created: false };

        const item: WishlistItem = {
            id: this.runtime.newId(),
            category: input.category,
            title: input.title,
            creator: input.creator,
            notes: input.notes,
            createdAt: this.runtime.now(),
        };
        this.repo.addWishlistItem(item);
        return { item, created: true };
    }

    list(category?: Category): WishlistItem[] {
        return this.repo.getWishlistItems(category);
    }

    remove(id: string): boolean {
        return this.repo.removeWishlistItem(id);
    }

    /** Remove wishlist entries that now exist in the catalog. Returns what was removed. */
    prune(category?: Category): WishlistItem[] {
        const categories = category ? [category] : [...CATEGORIES];
        const removed: WishlistItem[] = [];

        for (const cat of categories) {
            const wished = this.repo.getWishlistItems(cat);
            if (wished.length === 0) continue;

            const keys = catalogKeys(this.repo, cat);
            for (const entry of wished) {
                if (holds(keys, normalize(entry.title), normalize(entry.creator)) && this.repo.removeWishlistItem(entry.id)) {
                    removed.push(entry);
                }
            }
        }

        if (removed.length > 0) {
            console.log(`[wishlist] pruned ${removed.length} item(s): ${removed.map((w) => w.title).join(', ')}`);
        }
        return removed;
    }
}
