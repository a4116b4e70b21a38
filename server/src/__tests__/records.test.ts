/**
 * Boundary schema tests.
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors.js';
import {
    itemQuerySchema,
    itemUpdateSchema,
    manualItemSchema,
    matchQuerySchema,
    parseIncomingRecord,
    parseWith,
    ratingUpdateSchema,
    rawTitleOf,
} from '../records.js';

describe('parseIncomingRecord', () => {
    it('trims text and fills defaults', () => {
        expect(parseIncomingRecord({
            category: 'music',
            title: '  Discovery ',
            creator: ' Daft Punk ',
            source: 'spotify',
            notes: '   ',
        })).toEqual({
            category: 'music',
            title: 'Discovery',
            creator: 'Daft Punk',
            source: 'spotify',
            sourceExternalId: null,
            loved: false,
            disliked: false,
            rating: null,
            notes: null,
        });
    });

    it('turns a blank creator into null', () => {
        expect(parseIncomingRecord({ category: 'book', title: 'Beowulf', creator: '', source: 'kindle' }).creator).toBeNull();
    });

    it('stringifies numeric external ids', () => {
        expect(parseIncomingRecord({ category: 'game', title: 'Celeste', source: 'steam', sourceExternalId: 504230 }).sourceExternalId).toBe('504230');
    });

    it('rejects loved and disliked together', () => {
        expect(() => parseIncomingRecord({ category: 'music', title: 'Discovery', source: 'spotify', loved: true, disliked: true }))
            .toThrow('disliked: loved and disliked are mutually exclusive');
    });

    it('rejects ratings outside 1..5', () => {
        expect(() => parseIncomingRecord({ category: 'music', title: 'Discovery', source: 'spotify', rating: 6 }))
            .toThrow(ValidationError);
        expect(() => parseIncomingRecord({ category: 'music', title: 'Discovery', source: 'spotify', rating: 3.5 }))
            .toThrow(ValidationError);
    });

    it('rejects unknown categories and sources', () => {
        expect(() => parseIncomingRecord({ category: 'comic', title: 'Saga', source: 'manual' })).toThrow(/^category: /);
        expect(() => parseIncomingRecord({ category: 'book', title: 'Saga', source: 'comixology' })).toThrow(/^source: /);
    });

    it('joins several issues', () => {
        expect(() => parseIncomingRecord({ category: 'book', title: '', source: 'kindle', rating: 0 }))
            .toThrow('title: title is empty; rating: Number must be greater than or equal to 1');
    });
});

describe('request schemas', () => {
    it('accepts a manual item with a resolution', () => {
        const input = parseWith(manualItemSchema, { category: 'book', title: 'Dune', creator: 'Frank Herbert', resolution: 'existing' });
        expect(input.resolution).toBe('existing');
        expect(input.loved).toBe(false);
    });

    it('requires something to update', () => {
        expect(() => parseWith(itemUpdateSchema, {})).toThrow('record: nothing to update');
    });

    it('allows only one sentiment change at a time', () => {
        expect(() => parseWith(ratingUpdateSchema, { loved: true, neutral: true })).toThrow(
            'record: choose one of loved, disliked or neutral'
        );
        expect(parseWith(ratingUpdateSchema, { loved: true, rating: 4 })).toEqual({ loved: true, rating: 4 });
    });

    it('parses query strings', () => {
        expect(parseWith(itemQuerySchema, { category: 'music', loved: 'true', minRating: '3' })).toEqual({
            category: 'music',
            loved: true,
            disliked: undefined,
            minRating: 3,
        });
        expect(parseWith(matchQuerySchema, { category: 'music', title: 'Discovery' })).toEqual({
            category: 'music',
            title: 'Discovery',
            creator: null,
            mode: 'loose',
        });
    });
});

describe('rawTitleOf', () => {
    it('reads a string title when there is one', () => {
        expect(rawTitleOf({ title: 'Discovery' })).toBe('Discovery');
        expect(rawTitleOf({ title: 7 })).toBeNull();
        expect(rawTitleOf('Discovery')).toBeNull();
        expect(rawTitleOf(null)).toBeNull();
    });
});
