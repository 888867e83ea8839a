/**
 * @file Catalog Type Definitions
 *
 * Core interfaces for the household catalog tree: containers that hold
 * objects and child containers, plus the result shapes returned by the
 * query engine.
 *
 * @module
 */

// ─── Tree Nodes ─────────────────────────────────────────────────

/**
 * A leaf item stored inside exactly one container's `objects` list.
 */
export interface CatalogObject {
    name: string;
    category: string;
}

/**
 * A named node of the catalog tree.
 *
 * `objects` and `containers` keep insertion order; that order is the
 * search order used by every traversal.
 */
export interface Container {
    name: string;
    objects: CatalogObject[];
    containers: Container[];
}

// ─── Query Results ──────────────────────────────────────────────

/**
 * An object located by `objectWithPath_find`.
 *
 * @property object - Live reference to the matched object.
 * @property path - Container names from the immediate parent out to the root.
 */
export interface ObjectMatch {
    object: CatalogObject;
    path: string[];
}

/**
 * One row of the full catalog listing.
 *
 * @property location - Container names from the root down to the owning container.
 */
export interface ObjectListing {
    object: CatalogObject;
    location: string[];
}

/**
 * Outcome of reading an untrusted document into a tree.
 */
export type CatalogParseResult =
    | { ok: true; tree: Container }
    | { ok: false; error: string };
