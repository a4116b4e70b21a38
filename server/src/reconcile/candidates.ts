import type { CatalogRepository, Item, MatchCandidate } from '../db/db.js';
import type { Category } from '../types.js';
import { containsNormalized } from './normalize.js';
import { prepare, type PreparedTitle } from './score.js';

export interface IndexedCandidate {
    item: Item;
    variants: PreparedTitle[];
    sourceCount: number;
    /** Position in creation order; later items get higher numbers */
    order: number;
}

function addTo(map: Map<string, Set<IndexedCandidate>>, key: string, candidate: IndexedCandidate): void {
    if (key === '') return;
    const set = map.get(key) ?? new Set<IndexedCandidate>();
    set.add(candidate);
    map.set(key, set);
}

function removeFrom(map: Map<string, Set<IndexedCandidate>>, key: string, candidate: IndexedCandidate): void {
    const set = map.get(key);
    if (!set) return;
    set.delete(candidate);
    if (set.size === 0) map.delete(key);
}

/**
 * Pre-normalized view of one category's items, loaded once and kept current
 * by the caller after each write. Candidates are looked up by normalized
 * creator (creator evidence is mandatory for a score) or by exact normalized title.
 */
export class CandidateIndex {
    private readonly candidates = new Map<string, IndexedCandidate>();
    private readonly byCreator = new Map<string, Set<IndexedCandidate>>();
    private readonly byTitle = new Map<string, Set<IndexedCandidate>>();
    private nextOrder = 0;

    constructor(
        readonly category: Category,
        private readonly stopWords: ReadonlySet<string>
    ) {}

    static load(repo: CatalogRepository, category: Category, stopWords: ReadonlySet<string>): CandidateIndex {
        const index = new CandidateIndex(category, stopWords);
        for (const candidate of repo.getCandidates(category)) index.put(candidate);
        return index;
    }

    get size(): number {
        return this.candidates.size;
    }

    /** Add or replace a candidate. A replaced candidate keeps its place in creation order. */
    put(candidate: MatchCandidate): void {
        if (candidate.item.category !== this.category) return;

        const previous = this.candidates.get(candidate.item.id);
        if (previous) this.unlink(previous);

        const indexed: IndexedCandidate = {
            item: candidate.item,
            variants: candidate.variants.map((v) => prepare(v.title, v.creator, this.stopWords)),
            sourceCount: candidate.sourceCount,
            order: previous ? previous.order : this.nextOrder++,
        };
        this.candidates.set(indexed.item.id, indexed);
        for (const variant of indexed.variants) {
            addTo(this.byCreator, variant.creator, indexed);
            addTo(this.byTitle, variant.title, indexed);
        }
    }

    remove(id: string): void {
        const previous = this.candidates.get(id);
        if (!previous) return;
        this.unlink(previous);
        this.candidates.delete(id);
    }

    /** Candidates with a variant whose creator equals or contains (or is contained in) the normalized creator. */
    byCreatorEvidence(normCreator: string): IndexedCandidate[] {
        if (normCreator === '') return [];
        const found = new Set<IndexedCandidate>();
        for (const [creator, set] of this.byCreator) {
            if (!containsNormalized(creator, normCreator)) continue;
            for (const candidate of set) found.add(candidate);
        }
        return [...found];
    }

    /** Candidates with a variant whose normalized title equals the given one. */
    byExactTitle(normTitle: string): IndexedCandidate[] {
        return [...(this.byTitle.get(normTitle) ?? [])];
    }

    private unlink(candidate: IndexedCandidate): void {
        for (const variant of candidate.variants) {
            removeFrom(this.byCreator, variant.creator, candidate);
            removeFrom(this.byTitle, variant.title, candidate);
        }
    }
}
