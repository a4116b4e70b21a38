import type { MatchConfig } from '../config.js';
import { containsNormalized, normalize, sameNormalized, tokensOf } from './normalize.js';

export type CreatorEvidence = 'exact' | 'partial' | 'none';
export type TitleEvidence = 'exact' | 'partial' | 'tokens' | 'none';

export interface ScoreBreakdown {
    score: number;
    creator: CreatorEvidence;
    title: TitleEvidence;
    sharedTokens: string[];
    penalized: boolean;
}

/** A (title, creator) pair normalized and tokenized once, ready to be scored many times. */
export interface PreparedTitle {
    /** Length of the trimmed raw title */
    length: number;
    title: string;
    creator: string;
    tokens: string[];
    tokenSet: ReadonlySet<string>;
}

export function prepare(title: string, creator: string | null, stopWords: ReadonlySet<string>): PreparedTitle {
    const normTitle = normalize(title);
    const tokens = tokensOf(normTitle, stopWords);
    return {
        length: title.trim().length,
        title: normTitle,
        creator: normalize(creator),
        tokens,
        tokenSet: new Set(tokens),
    };
}

const NO_MATCH = (creator: CreatorEvidence, title: TitleEvidence, sharedTokens: string[]): ScoreBreakdown => ({
    score: 0,
    creator,
    title,
    sharedTokens,
    penalized: false,
});

/** Creator evidence between two normalized creators. */
export function creatorEvidence(candidate: string, query: string): CreatorEvidence {
    if (sameNormalized(candidate, query)) return 'exact';
    if (containsNormalized(candidate, query)) return 'partial';
    return 'none';
}

/**
 * Score a prepared candidate against a prepared query.
 *
 * Rule-based and asymmetric: creator evidence is mandatory, title evidence is
 * mandatory, and a short candidate that merely appears inside a long query
 * title is penalized. The result is not a percentage; an exact double match
 * scores creatorExact + titleExact.
 */
export function scorePrepared(candidate: PreparedTitle, query: PreparedTitle, config: MatchConfig): ScoreBreakdown {
    const sharedTokens = query.tokens.filter((t) => candidate.tokenSet.has(t));

    const creator = creatorEvidence(candidate.creator, query.creator);
    let title: TitleEvidence = 'none';
    if (sameNormalized(candidate.title, query.title)) title = 'exact';
    else if (containsNormalized(candidate.title, query.title)) title = 'partial';
    else if (sharedTokens.length > 0) title = 'tokens';

    if (creator === 'none' || title === 'none') {
        return NO_MATCH(creator, title, sharedTokens);
    }

    let score = creator === 'exact' ? config.creatorExact : config.creatorPartial;

    if (title === 'exact') {
        score += config.titleExact;
    } else {
        if (title === 'partial') score += config.titlePartial;
        score += sharedTokens.length * config.tokenBonus;
    }

    let penalized = false;
    if (title === 'partial' && candidate.length < query.length * config.shortCandidateRatio) {
        score -= config.shortCandidatePenalty;
        penalized = true;
    }

    return { score: Math.max(0, score), creator, title, sharedTokens, penalized };
}

/** Score how well an existing (title, creator) matches an incoming one. */
export function scoreBreakdown(
    candidateTitle: string,
    candidateCreator: string | null,
    queryTitle: string,
    queryCreator: string | null,
    config: MatchConfig
): ScoreBreakdown {
    return scorePrepared(
        prepare(candidateTitle, candidateCreator, config.stopWords),
        prepare(queryTitle, queryCreator, config.stopWords),
        config
    );
}

export function score(
    candidateTitle: string,
    candidateCreator: string | null,
    queryTitle: string,
    queryCreator: string | null,
    config: MatchConfig
): number {
    return scoreBreakdown(candidateTitle, candidateCreator, queryTitle, queryCreator, config).score;
}
