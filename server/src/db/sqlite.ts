import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type {
    CatalogRepository,
    CatalogStats,
    Item,
    ItemFilters,
    ItemSource,
    ItemView,
    MatchCandidate,
    Rating,
    WishlistItem,
} from './db.js';
import { sourceKeyOf } from './db.js';
import { SCHEMA_SQL } from './schema.js';
import { StorageError, StorageUnavailableError } from '../errors.js';
import type { Category, RatingOrigin, Source, TitleVariant } from '../types.js';

interface ItemRow {
    id: string;
    category: Category;
    title: string;
    creator: string | null;
    created_at: string;
    updated_at: string;
}

interface ItemViewRow extends ItemRow {
    loved: number | null;
    rating: number | null;
    notes: string | null;
}

interface SourceRow {
    item_id: string;
    source: Source;
    source_key: string;
    external_id: string | null;
    fingerprint: string;
    raw_title: string;
    raw_creator: string | null;
    source_loved: number | null;
    imported_at: string;
}

interface RatingRow {
    item_id: string;
    loved: number | null;
    rating: number | null;
    notes: string | null;
    origin: RatingOrigin;
    rated_at: string;
}

interface WishlistRow {
    id: string;
    category: Category;
    title: string;
    creator: string | null;
    notes: string | null;
    created_at: string;
}

/** Codes after which the store cannot be used at all. */
const FATAL_CODES = ['SQLITE_CANTOPEN', 'SQLITE_NOTADB', 'SQLITE_CORRUPT', 'SQLITE_FULL', 'SQLITE_READONLY', 'SQLITE_IOERR'];

function isFatalCode(code: string): boolean {
    return FATAL_CODES.some((fatal) => code === fatal || code.startsWith(`${fatal}_`));
}

/**
 * SQLite implementation of CatalogRepository.
 * Uses better-sqlite3 for synchronous, zero-config persistence.
 */
export class SQLiteRepository implements CatalogRepository {
    private db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            const dir = path.dirname(dbPath);
            if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
        }

        try {
            this.db = new Database(dbPath);
        } catch (err) {
            throw this.translate(err);
        }
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');
    }

    init(): void {
        this.guard(() => this.db.exec(SCHEMA_SQL));
        console.log(`SQLite database initialized at ${this.db.name}`);
    }

    close(): void {
        this.db.close();
    }

    transaction<T>(fn: () => T): T {
        return this.guard(() => this.db.transaction(fn)());
    }

    // ---------- items ----------

    getCandidates(category: Category): MatchCandidate[] {
        return this.guard(() => {
            const items = this.db
                .prepare<[Category], ItemRow>('SELECT * FROM items WHERE category = ? ORDER BY created_at, rowid')
                .all(category);
            const edges = this.db
                .prepare<[Category], SourceRow>(`
                    SELECT s.* FROM item_sources s
                    JOIN items i ON i.id = s.item_id
                    WHERE i.category = ?
                    ORDER BY s.imported_at, s.rowid
                `)
                .all(category);

            const byItem = new Map<string, SourceRow[]>();
            for (const edge of edges) {
                const list = byItem.get(edge.item_id) ?? [];
                list.push(edge);
                byItem.set(edge.item_id, list);
            }

            return items.map((row) => rowToCandidate(row, byItem.get(row.id) ?? []));
        });
    }

    getCandidate(id: string): MatchCandidate | null {
        return this.guard(() => {
            const row = this.db.prepare<[string], ItemRow>('SELECT * FROM items WHERE id = ?').get(id);
            if (!row) return null;
            const edges = this.db
                .prepare<[string], SourceRow>('SELECT * FROM item_sources WHERE item_id = ? ORDER BY imported_at, rowid')
                .all(id);
            return rowToCandidate(row, edges);
        });
    }

    getItem(id: string): Item | null {
        return this.guard(() => {
            const row = this.db.prepare<[string], ItemRow>('SELECT * FROM items WHERE id = ?').get(id);
            return row ? rowToItem(row) : null;
        });
    }

    getItemView(id: string): ItemView | null {
        return this.guard(() => {
            const row = this.db
                .prepare<[string], ItemViewRow>(`
                    SELECT i.*, r.loved, r.rating, r.notes
                    FROM items i LEFT JOIN ratings r ON r.item_id = i.id
                    WHERE i.id = ?
                `)
                .get(id);
            return row ? rowToItemView(row, this.getItemSources(row.id)) : null;
        });
    }

    listItems(filters?: ItemFilters): ItemView[] {
        return this.guard(() => {
            let sql = `
                SELECT i.*, r.loved, r.rating, r.notes
                FROM items i LEFT JOIN ratings r ON r.item_id = i.id
                WHERE 1=1`;
            const params: (string | number)[] = [];

            if (filters?.category) {
                sql += ' AND i.category = ?';
                params.push(filters.category);
            }
            if (filters?.loved !== undefined) {
                sql += filters.loved ? ' AND r.loved = 1' : ' AND (r.loved IS NULL OR r.loved = 0)';
            }
            if (filters?.disliked !== undefined) {
                sql += filters.disliked ? ' AND r.loved = 0' : ' AND (r.loved IS NULL OR r.loved = 1)';
            }
            if (filters?.minRating !== undefined) {
                sql += ' AND r.rating >= ?';
                params.push(filters.minRating);
            }
            if (filters?.search) {
                sql += ' AND (i.title LIKE ? OR i.creator LIKE ?)';
                params.push(`%${filters.search}%`, `%${filters.search}%`);
            }

            sql += ' ORDER BY i.title COLLATE NOCASE, i.rowid';

            const rows = this.db.prepare<(string | number)[], ItemViewRow>(sql).all(...params);
            return rows.map((row) => rowToItemView(row, this.getItemSources(row.id)));
        });
    }

    insertItem(item: Item): void {
        this.guard(() =>
            this.db
                .prepare(`
                    INSERT INTO items (id, category, title, creator, created_at, updated_at)
                    VALUES (?, ?, ?, ?, ?, ?)
                `)
                .run(item.id, item.category, item.title, item.creator, item.createdAt, item.updatedAt)
        );
    }

    updateItem(id: string, fields: Partial<Pick<Item, 'title' | 'creator' | 'updatedAt'>>): Item | null {
        return this.guard(() => {
            const updates: string[] = [];
            const params: (string | null)[] = [];

            if (fields.title !== undefined) {
                updates.push('title = ?');
                params.push(fields.title);
            }
            if (fields.creator !== undefined) {
                updates.push('creator = ?');
                params.push(fields.creator);
            }
            if (fields.updatedAt !== undefined) {
                updates.push('updated_at = ?');
                params.push(fields.updatedAt);
            }

            if (updates.length > 0) {
                this.db.prepare(`UPDATE items SET ${updates.join(', ')} WHERE id = ?`).run(...params, id);
            }
            return this.getItem(id);
        });
    }

    removeItem(id: string): boolean {
        return this.guard(() => this.db.prepare('DELETE FROM items WHERE id = ?').run(id).changes > 0);
    }

    // ---------- sources ----------

    findItemIdBySourceKey(category: Category, source: Source, sourceKey: string): string | null {
        return this.guard(() => {
            const row = this.db
                .prepare<[string, string, Category], { id: string }>(`
                    SELECT i.id FROM item_sources s
                    JOIN items i ON i.id = s.item_id
                    WHERE s.source = ? AND s.source_key = ? AND i.category = ?
                    ORDER BY i.created_at, i.rowid
                    LIMIT 1
                `)
                .get(source, sourceKey, category);
            return row ? row.id : null;
        });
    }

    getItemSources(itemId: string): ItemSource[] {
        return this.guard(() =>
            this.db
                .prepare<[string], SourceRow>('SELECT * FROM item_sources WHERE item_id = ? ORDER BY imported_at, rowid')
                .all(itemId)
                .map(rowToItemSource)
        );
    }

    upsertItemSource(edge: ItemSource): void {
        this.guard(() =>
            this.db
                .prepare(`
                    INSERT INTO item_sources (
                        item_id, source, source_key, external_id, fingerprint,
                        raw_title, raw_creator, source_loved, imported_at
                    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
                    ON CONFLICT(item_id, source, source_key) DO UPDATE SET
                        external_id = excluded.external_id,
                        fingerprint = excluded.fingerprint,
                        raw_title = excluded.raw_title,
                        raw_creator = excluded.raw_creator,
                        source_loved = excluded.source_loved,
                        imported_at = excluded.imported_at
                `)
                .run(
                    edge.itemId, edge.source, sourceKeyOf(edge), edge.sourceExternalId, edge.fingerprint,
                    edge.rawTitle, edge.rawCreator, toFlag(edge.sourceLoved), edge.importedAt
                )
        );
    }

    // ---------- ratings ----------

    getRating(itemId: string): Rating | null {
        return this.guard(() => {
            const row = this.db.prepare<[string], RatingRow>('SELECT * FROM ratings WHERE item_id = ?').get(itemId);
            return row ? rowToRating(row) : null;
        });
    }

    upsertRating(rating: Rating): void {
        this.guard(() =>
            this.db
                .prepare(`
                    INSERT INTO ratings (item_id, loved, rating, notes, origin, rated_at)
                    VALUES (?, ?, ?, ?, ?, ?)
                    ON CONFLICT(item_id) DO UPDATE SET
                        loved = excluded.loved,
                        rating = excluded.rating,
                        notes = excluded.notes,
                        origin = excluded.origin,
                        rated_at = excluded.rated_at
                `)
                .run(rating.itemId, toFlag(rating.loved), rating.rating, rating.notes, rating.origin, rating.ratedAt)
        );
    }

    // ---------- wishlist ----------

    addWishlistItem(item: WishlistItem): void {
        this.guard(() =>
            this.db
                .prepare(`
                    INSERT INTO wishlist_items (id, category, title, creator, notes, created_at)
                    VALUES (?, ?, ?, ?, ?, ?)
                `)
                .run(item.id, item.category, item.title, item.creator, item.notes, item.createdAt)
        );
    }

    getWishlistItems(category?: Category): WishlistItem[] {
        return this.guard(() => {
            const rows = category
                ? this.db
                    .prepare<[Category], WishlistRow>('SELECT * FROM wishlist_items WHERE category = ? ORDER BY title COLLATE NOCASE, rowid')
                    .all(category)
                : this.db
                    .prepare<[], WishlistRow>('SELECT * FROM wishlist_items ORDER BY title COLLATE NOCASE, rowid')
                    .all();
            return rows.map(rowToWishlistItem);
        });
    }

    removeWishlistItem(id: string): boolean {
        return this.guard(() => this.db.prepare('DELETE FROM wishlist_items WHERE id = ?').run(id).changes > 0);
    }

    // ---------- stats ----------

    getStats(): CatalogStats {
        return this.guard(() => {
            const categoryRows = this.db
                .prepare<[], { category: Category; total: number; loved: number; disliked: number }>(`
                    SELECT i.category,
                           COUNT(*) AS total,
                           COALESCE(SUM(CASE WHEN r.loved = 1 THEN 1 ELSE 0 END), 0) AS loved,
                           COALESCE(SUM(CASE WHEN r.loved = 0 THEN 1 ELSE 0 END), 0) AS disliked
                    FROM items i LEFT JOIN ratings r ON r.item_id = i.id
                    GROUP BY i.category
                    ORDER BY i.category
                `)
                .all();
            const sourceRows = this.db
                .prepare<[], { source: Source; count: number }>(`
                    SELECT source, COUNT(DISTINCT item_id) AS count
                    FROM item_sources
                    GROUP BY source
                    ORDER BY source
                `)
                .all();

            const stats: CatalogStats = { total: 0, categories: {}, sources: {} };
            for (const row of categoryRows) {
                stats.total += row.total;
                stats.categories[row.category] = { total: row.total, loved: row.loved, disliked: row.disliked };
            }
            for (const row of sourceRows) stats.sources[row.source] = row.count;
            return stats;
        });
    }

    // ---------- errors ----------

    private guard<T>(fn: () => T): T {
        try {
            return fn();
        } catch (err) {
            throw this.translate(err);
        }
    }

    /** Map driver errors onto the storage taxonomy; domain errors pass through untouched. */
    private translate(err: unknown): unknown {
        if (err instanceof StorageError) return err;
        if (err instanceof Database.SqliteError) {
            return isFatalCode(err.code)
                ? new StorageUnavailableError(`Catalog store unavailable: ${err.message}`, err.code, { cause: err })
                : new StorageError(err.message, err.code, { cause: err });
        }
        if (this.db !== undefined && !this.db.open) {
            return new StorageUnavailableError('Catalog store is closed', null, { cause: err });
        }
        return err;
    }
}

function toFlag(value: boolean | null): number | null {
    return value === null ? null : value ? 1 : 0;
}

function fromFlag(value: number | null): boolean | null {
    return value === null ? null : value === 1;
}

function uniqueVariants(variants: TitleVariant[]): TitleVariant[] {
    const seen = new Set<string>();
    return variants.filter((v) => {
        const key = `${v.title}\u0000${v.creator ?? ''}`;
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

function rowToCandidate(row: ItemRow, edges: SourceRow[]): MatchCandidate {
    const item = rowToItem(row);
    return {
        item,
        variants: uniqueVariants([
            { title: item.title, creator: item.creator },
            ...edges.map((e) => ({ title: e.raw_title, creator: e.raw_creator })),
        ]),
        sourceCount: edges.length,
    };
}

/** Convert a DB row to an Item */
function rowToItem(row: ItemRow): Item {
    return {
        id: row.id,
        category: row.category,
        title: row.title,
        creator: row.creator,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

function rowToItemView(row: ItemViewRow, sources: ItemSource[]): ItemView {
    const loved = fromFlag(row.loved);
    return {
        ...rowToItem(row),
        loved: loved === true,
        disliked: loved === false,
        rating: row.rating,
        notes: row.notes,
        sources,
    };
}

function rowToItemSource(row: SourceRow): ItemSource {
    return {
        itemId: row.item_id,
        source: row.source,
        sourceExternalId: row.external_id,
        fingerprint: row.fingerprint,
        rawTitle: row.raw_title,
        rawCreator: row.raw_creator,
        sourceLoved: fromFlag(row.source_loved),
        importedAt: row.imported_at,
    };
}

function rowToRating(row: RatingRow): Rating {
    return {
        itemId: row.item_id,
        loved: fromFlag(row.loved),
        rating: row.rating,
        notes: row.notes,
        origin: row.origin,
        ratedAt: row.rated_at,
    };
}

function rowToWishlistItem(row: WishlistRow): WishlistItem {
    return {
        id: row.id,
        category: row.category,
        title: row.title,
        creator: row.creator,
        notes: row.notes,
        createdAt: row.created_at,
    };
}
