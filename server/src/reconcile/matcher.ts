import type { MatchConfig } from '../config.js';
import type { CatalogRepository, Item } from '../db/db.js';
import type { Category, MatchMode } from '../types.js';
import { CandidateIndex, type IndexedCandidate } from './candidates.js';
import { prepare, scorePrepared, type PreparedTitle, type ScoreBreakdown } from './score.js';

export interface MatchResult {
    item: Item;
    score: number;
    breakdown: ScoreBreakdown;
    sourceCount: number;
}

interface Scored extends MatchResult {
    order: number;
}

/** Score a candidate against every title variant it is known by and keep its best. */
function bestVariantScore(candidate: IndexedCandidate, query: PreparedTitle, config: MatchConfig): ScoreBreakdown {
    let best: ScoreBreakdown | null = null;
    for (const variant of candidate.variants) {
        const result = scorePrepared(variant, query, config);
        if (!best || result.score > best.score) best = result;
    }
    return best ?? { score: 0, creator: 'none', title: 'none', sharedTokens: [], penalized: false };
}

/** a ranks before b: higher score, then more sources, then created earlier, then inserted earlier. */
function outranks(a: Scored, b: Scored): boolean {
    if (a.score !== b.score) return a.score > b.score;
    if (a.sourceCount !== b.sourceCount) return a.sourceCount > b.sourceCount;
    if (a.item.createdAt !== b.item.createdAt) return a.item.createdAt < b.item.createdAt;
    return a.order < b.order;
}

function pickBest(candidates: IndexedCandidate[], query: PreparedTitle, config: MatchConfig, minScore: number): MatchResult | null {
    let best: Scored | null = null;
    for (const candidate of candidates) {
        const breakdown = bestVariantScore(candidate, query, config);
        if (breakdown.score < minScore) continue;

        const scored: Scored = {
            item: candidate.item,
            score: breakdown.score,
            breakdown,
            sourceCount: candidate.sourceCount,
            order: candidate.order,
        };
        if (!best || outranks(scored, best)) best = scored;
    }

    if (!best) return null;
    return { item: best.item, score: best.score, breakdown: best.breakdown, sourceCount: best.sourceCount };
}

/**
 * Finds the existing item an incoming (title, creator) refers to.
 * Candidates never leave the given category. Callers matching many records
 * load one CandidateIndex and keep it current; without one, each call loads its own.
 */
export class Matcher {
    constructor(
        private readonly repo: CatalogRepository,
        private readonly config: MatchConfig
    ) {}

    threshold(mode: MatchMode): number {
        return mode === 'strict' ? this.config.strictThreshold : this.config.looseThreshold;
    }

    load(category: Category): CandidateIndex {
        return CandidateIndex.load(this.repo, category, this.config.stopWords);
    }

    /** Best-scoring candidate regardless of threshold, or null when nothing scores above zero. */
    best(category: Category, title: string, creator: string | null, index: CandidateIndex = this.load(category)): MatchResult | null {
        if (index.category !== category) return null;
        const query = prepare(title, creator, this.config.stopWords);
        // Creator evidence is mandatory, so only candidates sharing it can score above zero.
        return pickBest(index.byCreatorEvidence(query.creator), query, this.config, 1);
    }

    /** Best candidate at or above the mode's threshold, or null (the caller creates a new item). */
    findMatch(
        category: Category,
        title: string,
        creator: string | null,
        mode: MatchMode = 'strict',
        index?: CandidateIndex
    ): MatchResult | null {
        const result = this.best(category, title, creator, index);
        if (!result || result.score < this.threshold(mode)) return null;
        return result;
    }

    /**
     * An item already known by this exact (loosely equal) title, whatever the score says:
     * any creator when none is given, otherwise a loosely equal one.
     */
    sameTitle(category: Category, title: string, creator: string | null, index: CandidateIndex = this.load(category)): MatchResult | null {
        if (index.category !== category) return null;
        const query = prepare(title, creator, this.config.stopWords);
        if (query.title === '') return null;

        const candidates = index
            .byExactTitle(query.title)
            .filter((c) => query.creator === '' || c.variants.some((v) => v.title === query.title && v.creator === query.creator));
        return pickBest(candidates, query, this.config, 0);
    }
}
