import { createHash } from 'crypto';

/**
 * Canonical form for comparison: lower-case, no diacritics,
 * punctuation and hyphens turned into single spaces, trimmed.
 */
export function normalize(text: string | null | undefined): string {
    if (!text) return '';
    return text
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '') // Remove diacritics
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]+/gu, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/** Equality of two already-normalized strings; empty never matches. */
export function sameNormalized(na: string, nb: string): boolean {
    return na !== '' && na === nb;
}

/** Containment either way between two already-normalized strings; empty never matches. */
export function containsNormalized(na: string, nb: string): boolean {
    if (na === '' || nb === '') return false;
    return na.includes(nb) || nb.includes(na);
}

/** Normalized forms are identical (and non-empty). */
export function looselyEqual(a: string | null | undefined, b: string | null | undefined): boolean {
    return sameNormalized(normalize(a), normalize(b));
}

/** One normalized form is a substring of the other (both non-empty). */
export function looselyContains(a: string | null | undefined, b: string | null | undefined): boolean {
    return containsNormalized(normalize(a), normalize(b));
}

/**
 * Significant tokens of a title: longer than two characters, not a stop word.
 * Order of first appearance is kept so diagnostics are reproducible.
 */
export function tokenize(text: string | null | undefined, stopWords: ReadonlySet<string>): string[] {
    return tokensOf(normalize(text), stopWords);
}

/** tokenize() for text that is already normalized. */
export function tokensOf(normalized: string, stopWords: ReadonlySet<string>): string[] {
    const seen = new Set<string>();
    for (const token of normalized.split(' ')) {
        if (token.length <= 2 || stopWords.has(token)) continue;
        seen.add(token);
    }
    return [...seen];
}

/** Content fingerprint used to key source edges that carry no external id. */
export function fingerprint(title: string, creator: string | null): string {
    return createHash('sha1')
        .update(`${normalize(title)}\u0000${normalize(creator)}`)
        .digest('hex');
}
