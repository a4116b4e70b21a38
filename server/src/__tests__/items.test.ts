/**
 * Catalog service tests: manual adds with the duplicate prompt, edits, ratings and removal.
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_MATCH_CONFIG } from '../config.js';
import { NotFoundError } from '../errors.js';
import type { ManualItemInput } from '../records.js';
import { CatalogService } from '../reconcile/items.js';
import { ImportSession } from '../reconcile/session.js';
import { Wishlist } from '../reconcile/wishlist.js';
import { fakeRuntime, memoryRepo, seedItem } from './helpers/catalog.js';

const config = DEFAULT_MATCH_CONFIG;

function manual(overrides: Partial<ManualItemInput> = {}): ManualItemInput {
    return {
        category: 'music',
        title: 'Random Access',
        creator: 'Daft Punk & Friends',
        loved: false,
        disliked: false,
        rating: null,
        notes: null,
        ...overrides,
    };
}

function setup() {
    const repo = memoryRepo();
    const runtime = fakeRuntime();
    seedItem(repo, {
        id: 'ram',
        category: 'music',
        title: 'Random Access Memories',
        creator: 'Daft Punk',
        sources: [{ source: 'apple-music', externalId: 'a1' }],
    });
    return { repo, runtime, catalog: new CatalogService(repo, config, runtime) };
}

describe('CatalogService.addManual', () => {
    it('creates an item with a manual edge when nothing matches', () => {
        const { catalog } = setup();
        const result = catalog.addManual(manual({ title: 'Cracker Island', creator: 'Gorillaz', loved: true, rating: 4 }));

        expect(result.status).toBe('created');
        if (result.status === 'duplicate') return;
        expect(result.item).toMatchObject({ id: 'id-1', title: 'Cracker Island', loved: true, rating: 4 });
        expect(result.item.sources.map((s) => s.source)).toEqual(['manual']);
        expect(result.pruned).toEqual([]);
    });

    it('offers a loose match back as a duplicate', () => {
        const { catalog, repo } = setup();
        const result = catalog.addManual(manual());

        expect(result.status).toBe('duplicate');
        if (result.status !== 'duplicate') return;
        expect(result.reason).toBe('similar');
        expect(result.candidate.id).toBe('ram');
        expect(result.score).toBe(113);
        expect(repo.listItems()).toHaveLength(1);
    });

    it('folds into the candidate on resolution "existing"', () => {
        const { catalog, repo } = setup();
        const result = catalog.addManual(manual({ resolution: 'existing', loved: true }));

        expect(result.status).toBe('merged');
        if (result.status === 'duplicate') return;
        expect(result.item).toMatchObject({ id: 'ram', title: 'Random Access Memories', creator: 'Daft Punk', loved: true });
        expect(result.item.sources.map((s) => s.source)).toEqual(['apple-music', 'manual']);
        expect(repo.getRating('ram')?.origin).toBe('user');
    });

    it('adds a separate item on resolution "new"', () => {
        const { catalog, repo } = setup();
        const result = catalog.addManual(manual({ resolution: 'new' }));

        expect(result.status).toBe('created');
        expect(repo.listItems().map((i) => i.title)).toEqual(['Random Access', 'Random Access Memories']);
    });

    describe('same title', () => {
        const movie = (title: string, creator: string | null): ManualItemInput =>
            manual({ category: 'movie', title, creator });

        it('offers an existing title back when no creator is given', () => {
            const { catalog, repo } = setup();
            const first = catalog.addManual(movie('The Matrix', null));
            const second = catalog.addManual(movie('THE MATRIX', null));

            expect(first.status).toBe('created');
            expect(second.status).toBe('duplicate');
            if (second.status !== 'duplicate') return;
            expect(second.reason).toBe('same-title');
            expect(second.candidate.title).toBe('The Matrix');
            expect(repo.listItems({ category: 'movie' })).toHaveLength(1);
        });

        it('offers it back when the catalog item has a creator and the input has none', () => {
            const { catalog } = setup();
            catalog.addManual(movie('The Matrix', 'Lana Wachowski'));

            const result = catalog.addManual(movie('the matrix!', null));
            expect(result.status).toBe('duplicate');
            if (result.status !== 'duplicate') return;
            expect(result.reason).toBe('same-title');
            expect(result.score).toBe(0);
        });

        it('matches a raw source title too', () => {
            const { catalog } = setup();
            const result = catalog.addManual(manual({ title: 'random access memories', creator: null }));

            expect(result.status).toBe('duplicate');
            if (result.status !== 'duplicate') return;
            expect(result.candidate.id).toBe('ram');
        });

        it('adds the title again under a different creator', () => {
            const { catalog, repo } = setup();
            catalog.addManual(movie('Dune', 'Denis Villeneuve'));
            const result = catalog.addManual(movie('Dune', 'David Lynch'));

            expect(result.status).toBe('created');
            expect(repo.listItems({ category: 'movie' })).toHaveLength(2);
        });

        it('follows the resolution', () => {
            const { catalog, repo } = setup();
            catalog.addManual(movie('The Matrix', null));

            const merged = catalog.addManual({ ...movie('THE MATRIX', null), resolution: 'existing', rating: 5 });
            expect(merged.status).toBe('merged');
            if (merged.status === 'duplicate') return;
            expect(merged.item).toMatchObject({ title: 'The Matrix', rating: 5 });

            expect(catalog.addManual({ ...movie('THE MATRIX', null), resolution: 'new' }).status).toBe('created');
            expect(repo.listItems({ category: 'movie' })).toHaveLength(2);
        });
    });

    it('prunes the wishlist after adding', () => {
        const { catalog, repo, runtime } = setup();
        new Wishlist(repo, runtime).add({ category: 'music', title: 'Cracker Island', creator: 'Gorillaz', notes: null });

        const result = catalog.addManual(manual({ title: 'Cracker Island', creator: 'Gorillaz' }));

        if (result.status === 'duplicate') throw new Error('unexpected duplicate');
        expect(result.pruned.map((w) => w.title)).toEqual(['Cracker Island']);
    });
});

describe('CatalogService.rate', () => {
    it('lets the user dislike a loved item and keeps that against imports', () => {
        const repo = memoryRepo();
        const runtime = fakeRuntime();
        const session = new ImportSession(repo, config, runtime);
        const catalog = new CatalogService(repo, config, runtime);

        session.run('movie', [{ title: 'Arrival', creator: 'Denis Villeneuve', loved: true }], { source: 'netflix' });
        const [imported] = repo.listItems();

        const rated = catalog.rate(imported.id, { disliked: true });
        expect(rated).toMatchObject({ loved: false, disliked: true });

        session.run('movie', [{ title: 'Arrival', creator: 'Denis Villeneuve', loved: true }], { source: 'apple-tv' });
        expect(catalog.get(imported.id)).toMatchObject({ loved: false, disliked: true });
    });

    it('clears sentiment on neutral and keeps rating and notes unless given', () => {
        const { catalog, repo } = setup();
        catalog.rate('ram', { loved: true, rating: 5, notes: 'summer record' });
        const cleared = catalog.rate('ram', { neutral: true });

        expect(cleared).toMatchObject({ loved: false, disliked: false, rating: 5, notes: 'summer record' });
        expect(repo.getRating('ram')).toMatchObject({ loved: null, origin: 'user' });
    });

    it('clears notes given as an empty string and rating given as null', () => {
        const { catalog } = setup();
        catalog.rate('ram', { rating: 3, notes: 'ok' });

        expect(catalog.rate('ram', { rating: null, notes: '' })).toMatchObject({ rating: null, notes: null });
    });

    it('bumps updatedAt', () => {
        const { catalog } = setup();
        expect(catalog.rate('ram', { rating: 4 }).updatedAt).toBe('2024-01-01T00:00:00.000Z');
    });

    it('throws NotFoundError for an unknown item', () => {
        const { catalog } = setup();
        expect(() => catalog.rate('missing', { loved: true })).toThrow(NotFoundError);
    });
});

describe('CatalogService.update', () => {
    it('overrides display fields', () => {
        const { catalog } = setup();
        const updated = catalog.update('ram', { title: 'Random Access Memories (10th Anniversary)' });

        expect(updated).toMatchObject({ title: 'Random Access Memories (10th Anniversary)', creator: 'Daft Punk' });
    });

    it('clears the creator with an empty string', () => {
        const { catalog } = setup();
        expect(catalog.update('ram', { creator: '' }).creator).toBeNull();
    });

    it('throws NotFoundError for an unknown item', () => {
        const { catalog } = setup();
        expect(() => catalog.update('missing', { title: 'x' })).toThrow('Item not found: missing');
    });
});

describe('CatalogService.remove', () => {
    it('removes the item with its edges and rating', () => {
        const { catalog, repo } = setup();
        catalog.rate('ram', { loved: true });

        catalog.remove('ram');

        expect(repo.getItem('ram')).toBeNull();
        expect(repo.getItemSources('ram')).toEqual([]);
        expect(repo.getRating('ram')).toBeNull();
        expect(() => catalog.get('ram')).toThrow(NotFoundError);
        expect(() => catalog.remove('ram')).toThrow(NotFoundError);
    });
});
