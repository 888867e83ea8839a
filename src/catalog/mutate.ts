/**
 * @file Catalog Mutation Engine
 *
 * In-place edits of the catalog tree. Lookups follow the same depth-first,
 * objects-before-containers, first-match order as the query engine, so an
 * edit always lands on the object a search would have shown.
 *
 * Nothing here throws for a missing name; results are booleans.
 *
 * @module
 */

import type { CatalogObject, Container } from './types.js';
import { container_create } from './model.js';
import { object_find } from './query.js';

/**
 * Removes the first object named `name`.
 *
 * Exactly one occurrence is removed even when the name repeats elsewhere.
 *
 * @returns True if an object was removed.
 */
export function object_delete(root: Container, name: string): boolean {
    const index: number = root.objects.findIndex((obj: CatalogObject): boolean => obj.name === name);
    if (index !== -1) {
        root.objects.splice(index, 1);
        return true;
    }

    for (const child of root.containers) {
        if (object_delete(child, name)) return true;
    }

    return false;
}

/**
 * Renames and/or recategorizes the first object named `name`.
 *
 * An empty or omitted `newName` keeps the current name; the same holds
 * for `newCategory`. Calling with both blank is a successful no-op.
 *
 * @returns True if the object was found.
 */
export function object_modify(root: Container, name: string, newName: string = '', newCategory: string = ''): boolean {
    const target: CatalogObject | null = object_find(root, name);
    if (!target) return false;

    if (newName) target.name = newName;
    if (newCategory) target.category = newCategory;
    return true;
}

/**
 * Appends an object to the end of a container's object list.
 */
export function object_append(container: Container, obj: CatalogObject): void {
    container.objects.push(obj);
}

/**
 * Creates an empty child container and appends it to `parent`.
 *
 * @returns The new container, already attached.
 */
export function container_append(parent: Container, name: string): Container {
    const child: Container = container_create(name);
    parent.containers.push(child);
    return child;
}
