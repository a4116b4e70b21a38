/**
 * Boundary schemas.
 * Everything arriving from importers or HTTP bodies is validated here, so the
 * reconciliation engine only ever sees closed Category/Source values.
 */

import { z } from 'zod';
import { CATEGORIES, SOURCES } from './types.js';
import type { IncomingRecord } from './types.js';
import { ValidationError } from './errors.js';

const optionalText = z
    .string()
    .nullish()
    .transform((v) => (v && v.trim() !== '' ? v.trim() : null));

const optionalRating = z
    .number()
    .int()
    .min(1)
    .max(5)
    .nullish()
    .transform((v) => v ?? null);

export const categorySchema = z.enum(CATEGORIES);
export const sourceSchema = z.enum(SOURCES);

const sentimentFields = {
    loved: z.boolean().default(false),
    disliked: z.boolean().default(false),
};

const exclusiveSentiment = <T extends { loved: boolean; disliked: boolean }>(r: T) => !(r.loved && r.disliked);
const exclusiveSentimentMessage = { message: 'loved and disliked are mutually exclusive', path: ['disliked'] };

export const incomingRecordSchema = z
    .object({
        category: categorySchema,
        title: z.string().trim().min(1, 'title is empty'),
        creator: optionalText,
        source: sourceSchema,
        sourceExternalId: z
            .union([z.string(), z.number()])
            .nullish()
            .transform((v) => (v === null || v === undefined || String(v).trim() === '' ? null : String(v).trim())),
        ...sentimentFields,
        rating: optionalRating,
        notes: optionalText,
    })
    .refine(exclusiveSentiment, exclusiveSentimentMessage);

export const importBodySchema = z.object({
    source: sourceSchema.optional(),
    records: z.array(z.unknown()),
});

export const manualItemSchema = z
    .object({
        category: categorySchema,
        title: z.string().trim().min(1, 'title is empty'),
        creator: optionalText,
        ...sentimentFields,
        rating: optionalRating,
        notes: optionalText,
        /** How to resolve a duplicate prompt: fold into the candidate, or add anyway */
        resolution: z.enum(['existing', 'new']).optional(),
    })
    .refine(exclusiveSentiment, exclusiveSentimentMessage);

export const itemUpdateSchema = z
    .object({
        title: z.string().trim().min(1, 'title is empty').optional(),
        creator: z.string().trim().nullable().optional(),
    })
    .refine((r) => r.title !== undefined || r.creator !== undefined, { message: 'nothing to update' });

export const ratingUpdateSchema = z
    .object({
        loved: z.boolean().optional(),
        disliked: z.boolean().optional(),
        /** Clear loved/disliked */
        neutral: z.boolean().optional(),
        rating: z.number().int().min(1).max(5).nullable().optional(),
        notes: z.string().nullable().optional(),
    })
    .refine((r) => [r.loved, r.disliked, r.neutral].filter(Boolean).length <= 1, {
        message: 'choose one of loved, disliked or neutral',
    });

export const wishlistBodySchema = z.object({
    category: categorySchema,
    title: z.string().trim().min(1, 'title is empty'),
    creator: optionalText,
    notes: optionalText,
});

/** Optional category filter, from a query string or a body. */
export const categoryFilterSchema = z.object({
    category: categorySchema.optional(),
});

const queryFlag = z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => (v === undefined ? undefined : v === 'true'));

export const itemQuerySchema = z.object({
    category: categorySchema.optional(),
    loved: queryFlag,
    disliked: queryFlag,
    minRating: z.coerce.number().int().min(1).max(5).optional(),
    search: z.string().trim().min(1).optional(),
});

export const matchQuerySchema = z.object({
    category: categorySchema,
    title: z.string().trim().min(1, 'title is empty'),
    creator: optionalText,
    mode: z.enum(['strict', 'loose']).default('loose'),
});

export type ManualItemInput = z.infer<typeof manualItemSchema>;
export type ItemUpdateInput = z.infer<typeof itemUpdateSchema>;
export type RatingUpdateInput = z.infer<typeof ratingUpdateSchema>;
export type WishlistInput = z.infer<typeof wishlistBodySchema>;

export function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'record'}: ${issue.message}`)
        .join('; ');
}

/** Parse with a schema, raising ValidationError with a readable message. */
export function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
    const result = schema.safeParse(raw);
    if (!result.success) throw new ValidationError(describeIssues(result.error));
    return result.data;
}

export function parseIncomingRecord(raw: unknown): IncomingRecord {
    return parseWith(incomingRecordSchema, raw);
}

/** Best-effort title of a raw record, for reports about records that failed validation. */
export function rawTitleOf(raw: unknown): string | null {
    if (typeof raw === 'object' && raw !== null && 'title' in raw && typeof raw.title === 'string') {
        return raw.title;
    }
    return null;
}
