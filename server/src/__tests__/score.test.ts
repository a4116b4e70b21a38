/**
 * Similarity scorer tests.
 * Weights come from the default match config: creator 90/50, title 90/55, +4 per shared token,
 * -60 for a short candidate under 60% of the query's length.
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_MATCH_CONFIG } from '../config.js';
import { score, scoreBreakdown } from '../reconcile/score.js';

const config = DEFAULT_MATCH_CONFIG;
const LONG_TITLE = 'A Very Long Specific Song Title Indeed';

describe('score', () => {
    it('gives an exact double match both exact weights', () => {
        const result = score('Random Access Memories', 'Daft Punk', 'random access memories', 'daft punk', config);
        expect(result).toBe(config.creatorExact + config.titleExact);
        expect(result).toBe(180);
        expect(result).toBeGreaterThanOrEqual(config.strictThreshold);
    });

    it('scores zero when only the creator matches', () => {
        expect(score('Discovery', 'Daft Punk', 'Random Access Memories', 'Daft Punk', config)).toBe(0);
    });

    it('scores zero when only the title matches', () => {
        expect(score('Random Access Memories', 'Someone Else', 'Random Access Memories', 'Daft Punk', config)).toBe(0);
        expect(score('Dune', null, 'Dune', 'Frank Herbert', config)).toBe(0);
        expect(score('Dune', null, 'Dune', null, config)).toBe(0);
    });

    it('gives partial creator credit for containment', () => {
        const result = scoreBreakdown('Dune', 'Frank Herbert', 'Dune', 'Herbert', config);
        expect(result.creator).toBe('partial');
        expect(result.score).toBe(140);
    });

    it('adds token bonuses to title containment', () => {
        const result = scoreBreakdown(
            'Random Access Memories (Deluxe Edition)', 'Daft Punk',
            'Random Access Memories', 'Daft Punk',
            config
        );
        expect(result.title).toBe('partial');
        expect(result.sharedTokens).toEqual(['random', 'access', 'memories']);
        expect(result.penalized).toBe(false);
        expect(result.score).toBe(90 + 55 + 3 * 4);
    });

    it('accepts shared tokens as title evidence', () => {
        const result = scoreBreakdown('Blue Monday 88', 'New Order', 'Monday Blue', 'New Order', config);
        expect(result.title).toBe('tokens');
        expect(result.sharedTokens).toEqual(['monday', 'blue']);
        expect(result.score).toBe(98);
    });

    describe('short-candidate penalty', () => {
        it('penalizes a short candidate contained in a long query', () => {
            const result = scoreBreakdown('Indeed', 'Band', LONG_TITLE, 'Band', config);
            expect(result.penalized).toBe(true);
            expect(result.score).toBe(90 + 55 + 4 - 60);
            expect(result.score).toBeLessThan(config.strictThreshold);
        });

        it('lowers the score compared to the unpenalized containment score', () => {
            const unpenalized = score('Indeed', 'Band', LONG_TITLE, 'Band', { ...config, shortCandidatePenalty: 0 });
            expect(unpenalized).toBe(149);
            expect(score('Indeed', 'Band', LONG_TITLE, 'Band', config)).toBeLessThan(unpenalized);
        });

        it('does not penalize a long candidate containing a short query', () => {
            expect(score(LONG_TITLE, 'Band', 'Indeed', 'Band', config)).toBe(149);
        });

        it('clamps at zero', () => {
            expect(score('Indeed', 'Band', LONG_TITLE, 'Band', { ...config, shortCandidatePenalty: 500 })).toBe(0);
        });

        it('follows the configured ratio', () => {
            expect(score('Indeed', 'Band', LONG_TITLE, 'Band', { ...config, shortCandidateRatio: 0.1 })).toBe(149);
        });
    });
});
