import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { MatchConfig } from './config.js';
import type { CatalogRepository } from './db/db.js';
import { ImportAbortedError, NotFoundError, StorageUnavailableError, ValidationError, errorMessage } from './errors.js';
import {
    categoryFilterSchema,
    categorySchema,
    importBodySchema,
    itemQuerySchema,
    itemUpdateSchema,
    manualItemSchema,
    matchQuerySchema,
    parseWith,
    ratingUpdateSchema,
    wishlistBodySchema,
} from './records.js';
import { CatalogService } from './reconcile/items.js';
import { systemRuntime, type Runtime } from './reconcile/runtime.js';
import { ImportSession } from './reconcile/session.js';
import { Wishlist } from './reconcile/wishlist.js';
import { getAvailableFormats, getTransformer } from './transformers/index.js';

export interface AppDeps {
    repo: CatalogRepository;
    match: MatchConfig;
    runtime?: Runtime;
}

export function createApp({ repo, match, runtime = systemRuntime }: AppDeps): express.Express {
    const app = express();
    app.use(cors());
    app.use(express.json({ limit: '20mb' }));

    const catalog = new CatalogService(repo, match, runtime);
    const wishlist = new Wishlist(repo, runtime);

    // ---------- import ----------

    app.post('/api/import/:category', (req, res) => {
        const category = parseWith(categorySchema, req.params.category);
        const body = parseWith(importBodySchema, req.body);
        // One session per request; imports are single-writer by contract.
        const session = new ImportSession(repo, match, runtime);
        const report = session.run(category, body.records, { source: body.source });
        res.json(report);
    });

    // ---------- matching ----------

    app.get('/api/match', (req, res) => {
        const query = parseWith(matchQuerySchema, req.query);
        const result = catalog.findMatch(query.category, query.title, query.creator, query.mode);
        if (!result) {
            res.json({ match: null });
            return;
        }
        res.json({
            match: {
                item: catalog.get(result.item.id),
                score: result.score,
                breakdown: result.breakdown,
            },
        });
    });

    // ---------- items ----------

    app.get('/api/items', (req, res) => {
        const filters = parseWith(itemQuerySchema, req.query);
        res.json(catalog.list(filters));
    });

    app.get('/api/items/:id', (req, res) => {
        res.json(catalog.get(req.params.id));
    });

    app.post('/api/items', (req, res) => {
        const input = parseWith(manualItemSchema, req.body);
        const result = catalog.addManual(input);
        if (result.status === 'duplicate') {
            res.status(409).json(result);
            return;
        }
        res.status(result.status === 'created' ? 201 : 200).json(result);
    });

    app.patch('/api/items/:id', (req, res) => {
        const input = parseWith(itemUpdateSchema, req.body);
        res.json(catalog.update(req.params.id, input));
    });

    app.post('/api/items/:id/rating', (req, res) => {
        const input = parseWith(ratingUpdateSchema, req.body);
        res.json(catalog.rate(req.params.id, input));
    });

    app.delete('/api/items/:id', (req, res) => {
        catalog.remove(req.params.id);
        res.status(204).end();
    });

    // ---------- wishlist ----------

    app.get('/api/wishlist', (req, res) => {
        const { category } = parseWith(categoryFilterSchema, req.query);
        res.json(wishlist.list(category));
    });

    app.post('/api/wishlist', (req, res) => {
        const input = parseWith(wishlistBodySchema, req.body);
        const { item, created } = wishlist.add(input);
        res.status(created ? 201 : 200).json(item);
    });

    app.post('/api/wishlist/prune', (req, res) => {
        const { category } = parseWith(categoryFilterSchema, req.body ?? {});
        res.json({ removed: wishlist.prune(category) });
    });

    app.delete('/api/wishlist/:id', (req, res) => {
        if (!wishlist.remove(req.params.id)) throw new NotFoundError('Wishlist item', req.params.id);
        res.status(204).end();
    });

    // ---------- stats & export ----------

    app.get('/api/stats', (_req, res) => {
        res.json(repo.getStats());
    });

    app.get('/api/export', (req, res) => {
        const format = typeof req.query.format === 'string' ? req.query.format : 'csv';
        const transformer = getTransformer(format);
        if (!transformer) {
            res.status(400).json({ error: `Unknown format: ${format}` });
            return;
        }
        const { category } = parseWith(categoryFilterSchema, req.query);
        const result = transformer(catalog.list({ category }));

        res.setHeader('Content-Type', result.contentType);
        res.setHeader('Content-Disposition', `attachment; filename="${result.filename}"`);
        res.send(result.body);
    });

    app.get('/api/formats', (_req, res) => {
        res.json(getAvailableFormats());
    });

    app.use((_req, res) => {
        res.status(404).json({ error: 'Not found' });
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof ValidationError || err instanceof SyntaxError) {
            res.status(400).json({ error: err.message });
            return;
        }
        if (err instanceof NotFoundError) {
            res.status(404).json({ error: err.message });
            return;
        }
        if (err instanceof ImportAbortedError) {
            console.error(`${req.method} ${req.path}:`, err.message);
            res.status(503).json({ error: err.message, report: err.report });
            return;
        }
        if (err instanceof StorageUnavailableError) {
            console.error(`${req.method} ${req.path}:`, err.message);
            res.status(503).json({ error: err.message });
            return;
        }
        console.error(`${req.method} ${req.path} error:`, err);
        res.status(500).json({ error: errorMessage(err) });
    });

    return app;
}
