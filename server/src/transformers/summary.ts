/**
 * Summary transformer.
 * Markdown overview of what the user loves and dislikes, grouped by category;
 * the read-only input of the recommendation workflow.
 */

import type { ItemView } from '../db/db.js';
import { CATEGORIES } from '../types.js';
import type { Category } from '../types.js';
import type { TransformedResult } from './index.js';

const PER_CATEGORY_LIMIT = 100;

function line(item: ItemView): string {
    const creator = item.creator ? ` by ${item.creator}` : '';
    const rating = item.rating !== null ? ` (${item.rating}/5)` : '';
    return `- ${item.title}${creator}${rating}`;
}

function section(heading: string, groups: Map<Category, ItemView[]>): string[] {
    if (groups.size === 0) return [];
    const lines = [`## ${heading}`, ''];
    for (const [category, items] of groups) {
        lines.push(`### ${category.toUpperCase()}`, '');
        for (const item of items.slice(0, PER_CATEGORY_LIMIT)) lines.push(line(item));
        if (items.length > PER_CATEGORY_LIMIT) {
            lines.push(`- ... and ${items.length - PER_CATEGORY_LIMIT} more`);
        }
        lines.push('');
    }
    return lines;
}

function groupBy(items: ItemView[], keep: (item: ItemView) => boolean): Map<Category, ItemView[]> {
    const groups = new Map<Category, ItemView[]>();
    for (const category of CATEGORIES) {
        const matching = items.filter((item) => item.category === category && keep(item));
        if (matching.length > 0) groups.set(category, matching);
    }
    return groups;
}

export function summaryTransformer(items: ItemView[]): TransformedResult {
    const loved = items.filter((i) => i.loved).length;
    const disliked = items.filter((i) => i.disliked).length;

    const lines = [
        '# Library Export',
        '',
        '## Overview',
        '',
        `- Total items: ${items.length}`,
        `- Total loved: ${loved}`,
        `- Total disliked: ${disliked}`,
        '',
    ];

    for (const [category, all] of groupBy(items, () => true)) {
        const lovedCount = all.filter((i) => i.loved).length;
        lines.push(`- ${category}: ${all.length} items (${lovedCount} loved)`);
    }
    lines.push('');

    lines.push(...section('Loved Items', groupBy(items, (i) => i.loved)));
    lines.push(...section('Disliked Items', groupBy(items, (i) => i.disliked)));

    return {
        body: lines.join('\n').trimEnd() + '\n',
        contentType: 'text/markdown',
        filename: 'catalog_summary.md',
    };
}
