/**
 * @file Catalog Document Schemas
 *
 * Zod runtime schemas for the persisted catalog document.
 *
 * Only the root must be an object. Below it every field is repaired in
 * place instead of failing the document: a `name` or `category` that is a
 * number or boolean becomes its string form and anything else non-string
 * becomes ''; an `objects` or `containers` value that is not an array
 * becomes []; list entries that are not objects are dropped. Keys outside
 * the document format are dropped too.
 *
 * @module
 */

import { z } from 'zod';
import type { CatalogObject, Container } from './types.js';

// ─── Leaf fields ────────────────────────────────────────────────

const TextFieldSchema = z.unknown().transform((value: unknown): string => {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    return '';
});

function record_check(value: unknown): boolean {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function list_tolerate(value: unknown): unknown[] {
    return Array.isArray(value) ? value.filter(record_check) : [];
}

// ─── Object ─────────────────────────────────────────────────────

export const CatalogObjectSchema: z.ZodType<CatalogObject, z.ZodTypeDef, unknown> = z.object({
    name:     TextFieldSchema,
    category: TextFieldSchema
});

// ─── Container (recursive) ──────────────────────────────────────

export const ContainerSchema: z.ZodType<Container, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object({
        name:       TextFieldSchema,
        objects:    z.preprocess(list_tolerate, z.array(CatalogObjectSchema)),
        containers: z.preprocess(list_tolerate, z.array(ContainerSchema))
    })
);
