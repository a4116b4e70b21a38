import type { Category, RatingOrigin, Source, TitleVariant } from '../types.js';

/**
 * Item: one deduplicated catalog entry representing a single work.
 * Title and creator are display strings, kept verbatim as first received.
 */
export interface Item {
  id: string;
  category: Category;
  title: string;
  creator: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * ItemSource: provenance edge linking an item to one source's version of it.
 * Keyed by (itemId, source, sourceKey); see sourceKeyOf().
 */
export interface ItemSource {
  itemId: string;
  source: Source;
  sourceExternalId: string | null;
  fingerprint: string;
  rawTitle: string;
  rawCreator: string | null;
  /** The source's own loved (true) / disliked (false) flag, if it tracks one */
  sourceLoved: boolean | null;
  importedAt: string;
}

/** Rating: one per item. loved: true = loved, false = disliked, null = neutral. */
export interface Rating {
  itemId: string;
  loved: boolean | null;
  rating: number | null;
  notes: string | null;
  origin: RatingOrigin;
  ratedAt: string;
}

export interface WishlistItem {
  id: string;
  category: Category;
  title: string;
  creator: string | null;
  notes: string | null;
  createdAt: string;
}

/** Item plus its rating and provenance, as returned by listings and the API. */
export interface ItemView extends Item {
  loved: boolean;
  disliked: boolean;
  rating: number | null;
  notes: string | null;
  sources: ItemSource[];
}

/** An existing item as seen by the matcher. */
export interface MatchCandidate {
  item: Item;
  /** The item's own title/creator first, then each edge's raw text */
  variants: TitleVariant[];
  sourceCount: number;
}

export interface ItemFilters {
  category?: Category;
  loved?: boolean;
  disliked?: boolean;
  minRating?: number;
  search?: string;
}

export interface CatalogStats {
  total: number;
  categories: Record<string, { total: number; loved: number; disliked: number }>;
  sources: Record<string, number>;
}

/** Key an edge is upserted by: the external id when the source has one, else the content fingerprint. */
export function sourceKeyOf(edge: Pick<ItemSource, 'sourceExternalId' | 'fingerprint'>): string {
  return edge.sourceExternalId !== null ? `id:${edge.sourceExternalId}` : `fp:${edge.fingerprint}`;
}

/**
 * CatalogRepository: abstract interface for persistence.
 * Calls are synchronous; a single writer at a time is assumed.
 */
export interface CatalogRepository {
  /** Initialize the database (create tables, etc.) */
  init(): void;

  /** Run fn inside one transaction; a throw rolls back only this unit. */
  transaction<T>(fn: () => T): T;

  /** Items of one category with their title variants, in creation order. */
  getCandidates(category: Category): MatchCandidate[];

  /** One item as a match candidate, or null if missing. */
  getCandidate(id: string): MatchCandidate | null;

  getItem(id: string): Item | null;

  getItemView(id: string): ItemView | null;

  listItems(filters?: ItemFilters): ItemView[];

  insertItem(item: Item): void;

  /** Update display fields. Returns the updated item, or null if missing. */
  updateItem(id: string, fields: Partial<Pick<Item, 'title' | 'creator' | 'updatedAt'>>): Item | null;

  /** Remove an item together with its sources and rating. Returns false if missing. */
  removeItem(id: string): boolean;

  /** Find the item already linked to this source record, if any. */
  findItemIdBySourceKey(category: Category, source: Source, sourceKey: string): string | null;

  getItemSources(itemId: string): ItemSource[];

  /** Insert or replace the edge with the same (itemId, source, sourceKey). */
  upsertItemSource(edge: ItemSource): void;

  getRating(itemId: string): Rating | null;

  upsertRating(rating: Rating): void;

  addWishlistItem(item: WishlistItem): void;

  getWishlistItems(category?: Category): WishlistItem[];

  removeWishlistItem(id: string): boolean;

  getStats(): CatalogStats;
}
