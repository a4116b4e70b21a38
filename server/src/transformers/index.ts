/**
 * Export registry.
 * Each transformer turns catalog items into one downloadable document.
 * To add a format, create a new file and register it here.
 */

import type { ItemView } from '../db/db.js';
import { csvTransformer } from './csv.js';
import { summaryTransformer } from './summary.js';

export interface TransformedResult {
    body: string;
    contentType: string;
    filename: string;
}

export type Transformer = (items: ItemView[]) => TransformedResult;

/** Registry of all available transformers */
const transformers: Record<string, Transformer> = {
    csv: csvTransformer,
    summary: summaryTransformer,
};

export function getTransformer(format: string): Transformer | undefined {
    return Object.hasOwn(transformers, format) ? transformers[format] : undefined;
}

export function getAvailableFormats(): { id: string; label: string }[] {
    return [
        { id: 'csv', label: 'CSV (All Fields)' },
        { id: 'summary', label: 'Library Summary (Markdown)' },
    ];
}
