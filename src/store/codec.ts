/**
 * @file Catalog Document Codec
 *
 * Shared decode path for every store backend: JSON text → tolerant tree.
 *
 * @module
 */

import type { CatalogParseResult } from '../catalog/types.js';
import { catalog_fromRaw } from '../catalog/model.js';
import { errorMessage_get } from '../log/diagnostics.js';

/**
 * Decodes document text into a catalog tree.
 *
 * @param text - Raw document contents.
 * @returns Parsed tree, or an error naming the JSON or shape failure.
 */
export function catalogDocument_decode(text: string): CatalogParseResult {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error: unknown) {
        return { ok: false, error: `JSON decode error: ${errorMessage_get(error)}` };
    }

    const result: CatalogParseResult = catalog_fromRaw(raw);
    if (!result.ok) {
        return { ok: false, error: `malformed catalog document: ${result.error}` };
    }
    return result;
}
