/**
 * @file Catalog Tree Model
 *
 * Construction of catalog nodes and conversion between the in-memory tree
 * and the plain document shape that gets persisted.
 *
 * @module
 */

import type { CatalogObject, CatalogParseResult, Container } from './types.js';
import { ContainerSchema } from './schemas.js';

/**
 * Creates an empty container (no objects, no children).
 *
 * @param name - Container name, already normalized by the caller.
 * @returns A new Container.
 */
export function container_create(name: string): Container {
    return { name, objects: [], containers: [] };
}

/**
 * Creates a catalog object.
 *
 * @param name - Object name, already normalized by the caller.
 * @param category - Free-form category label.
 * @returns A new CatalogObject.
 */
export function object_create(name: string, category: string): CatalogObject {
    return { name, category };
}

/**
 * Builds a tree from raw nested data (usually freshly decoded JSON).
 *
 * Missing or wrong-typed fields below the root are repaired (see
 * `schemas.ts`); only a root that is not a JSON object fails.
 */
export function catalog_fromRaw(raw: unknown): CatalogParseResult {
    const parsed = ContainerSchema.safeParse(raw);
    if (parsed.success) {
        return { ok: true, tree: parsed.data };
    }

    const issues: string = parsed.error.issues
        .map((issue): string => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
    return { ok: false, error: issues };
}

/**
 * Converts a tree to its document form with a stable key order:
 * `name, objects, containers` for containers and `name, category` for objects.
 */
export function catalog_toDocument(tree: Container): Container {
    return {
        name: tree.name,
        objects: tree.objects.map((obj: CatalogObject): CatalogObject => ({ name: obj.name, category: obj.category })),
        containers: tree.containers.map((child: Container): Container => catalog_toDocument(child))
    };
}

/**
 * Serializes a tree to pretty-printed JSON with a trailing newline.
 *
 * @param tree - Root container.
 * @param indent - Spaces per indentation level.
 */
export function catalog_serialize(tree: Container, indent: number = 4): string {
    return JSON.stringify(catalog_toDocument(tree), null, indent) + '\n';
}
