/**
 * CSV transformer.
 * One row per item; sources are listed as source:external-id pairs.
 */

import type { ItemView } from '../db/db.js';
import type { TransformedResult } from './index.js';

export const CSV_HEADERS = [
    'id', 'category', 'title', 'creator', 'loved', 'disliked', 'rating', 'notes',
    'sources', 'created_at', 'updated_at',
];

export function escapeCSV(value: string): string {
    if (!value) return '';
    if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

function sourceList(item: ItemView): string {
    return item.sources
        .map((s) => (s.sourceExternalId ? `${s.source}:${s.sourceExternalId}` : s.source))
        .join(' ');
}

export function csvTransformer(items: ItemView[]): TransformedResult {
    const lines = [CSV_HEADERS.join(',')];
    for (const item of items) {
        const row = [
            item.id,
            item.category,
            item.title,
            item.creator ?? '',
            item.loved ? 'true' : 'false',
            item.disliked ? 'true' : 'false',
            item.rating === null ? '' : String(item.rating),
            item.notes ?? '',
            sourceList(item),
            item.createdAt,
            item.updatedAt,
        ];
        lines.push(row.map(escapeCSV).join(','));
    }

    return {
        body: lines.join('\n'),
        contentType: 'text/csv',
        filename: 'catalog_export.csv',
    };
}
