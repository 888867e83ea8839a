/**
 * @file Catalog Query Engine
 *
 * Recursive lookups over the catalog tree. Every search is depth-first:
 * a node's objects are checked in list order before its child containers
 * are descended, also in list order. The first match wins.
 *
 * Matching is exact. Callers normalize names (trim + lowercase) before
 * calling in; a mixed-case name will not match a lowercase entry.
 *
 * @module
 */

import type { CatalogObject, Container, ObjectListing, ObjectMatch } from './types.js';

/**
 * Finds the first object named `name` and the containers that lead to it.
 *
 * The path is accumulated as the recursion unwinds: the owning container
 * records its name first, then each ancestor appends its own on the way
 * out. The result is therefore ordered child → root.
 *
 * @param root - Container to search from.
 * @param name - Exact object name.
 * @returns The match with its child-to-root path, or null.
 */
export function objectWithPath_find(root: Container, name: string): ObjectMatch | null {
    for (const obj of root.objects) {
        if (obj.name === name) {
            return { object: obj, path: [root.name] };
        }
    }

    for (const child of root.containers) {
        const match: ObjectMatch | null = objectWithPath_find(child, name);
        if (match) {
            match.path.push(root.name);
            return match;
        }
    }

    return null;
}

/**
 * Finds the first object named `name`.
 *
 * @returns A live reference (edits apply to the tree), or null.
 */
export function object_find(root: Container, name: string): CatalogObject | null {
    for (const obj of root.objects) {
        if (obj.name === name) return obj;
    }

    for (const child of root.containers) {
        const found: CatalogObject | null = object_find(child, name);
        if (found) return found;
    }

    return null;
}

/**
 * Finds the first container named `name`, the root included.
 *
 * @returns A live reference usable as an insertion point, or null.
 */
export function container_findByName(root: Container, name: string): Container | null {
    if (root.name === name) return root;

    for (const child of root.containers) {
        const found: Container | null = container_findByName(child, name);
        if (found) return found;
    }

    return null;
}

/**
 * Lists every object in search order with its root → leaf location.
 *
 * @param root - Container to list from.
 * @param rootLabel - Label used for the root when its name is empty.
 */
export function objects_collect(root: Container, rootLabel: string = 'house'): ObjectListing[] {
    const listings: ObjectListing[] = [];

    const subtree_walk = (node: Container, location: string[]): void => {
        for (const obj of node.objects) {
            listings.push({ object: obj, location });
        }
        for (const child of node.containers) {
            subtree_walk(child, [...location, child.name]);
        }
    };

    subtree_walk(root, [root.name || rootLabel]);
    return listings;
}
