/**
 * @file Catalog Session
 *
 * The explicit context object for one run of the catalog: it owns the
 * in-memory tree and the document path, and saves the whole tree after
 * every successful mutation.
 *
 * A failed save does not roll back the in-memory change. Results carry
 * `saved: false` so the caller can warn that memory and disk now differ.
 *
 * @module
 */

import type { CatalogObject, Container, ObjectListing, ObjectMatch } from '../catalog/types.js';
import type { CatalogStore } from '../store/types.js';
import { objectWithPath_find, object_find, container_findByName, objects_collect } from '../catalog/query.js';
import { object_delete, object_modify, object_append, container_append } from '../catalog/mutate.js';
import { path_toRootFirst } from '../catalog/path.js';

// ─── Result Types ───────────────────────────────────────────────

/**
 * Outcome of a mutation that needed to locate its target first.
 */
export type MutationResult =
    | { found: false }
    | { found: true; saved: boolean };

/**
 * Outcome of a mutation against an already-located container.
 */
export interface SaveResult {
    saved: boolean;
}

/**
 * A search hit ready for display.
 *
 * @property location - Container names root → leaf.
 */
export interface SearchHit {
    object: CatalogObject;
    location: string[];
}

// ─── Session ────────────────────────────────────────────────────

export class CatalogSession {
    private constructor(
        private readonly store: CatalogStore,
        private readonly filePath: string,
        private readonly tree: Container,
        private readonly rootLabel: string
    ) {}

    /**
     * Loads the document at `filePath` and opens a session on it.
     *
     * @param store - Persistence backend.
     * @param filePath - Document path, used for every later save.
     * @param rootLabel - Display label for an unnamed root.
     */
    public static async open(store: CatalogStore, filePath: string, rootLabel: string = 'house'): Promise<CatalogSession> {
        const tree: Container = await store.catalog_load(filePath);
        return new CatalogSession(store, filePath, tree, rootLabel);
    }

    /** Path of the persisted document. */
    public path_get(): string {
        return this.filePath;
    }

    /** The live root container. */
    public root_get(): Container {
        return this.tree;
    }

    // ─── Queries ────────────────────────────────────────────────

    /**
     * Every object with its root → leaf location, in search order.
     */
    public objects_list(): ObjectListing[] {
        return objects_collect(this.tree, this.rootLabel);
    }

    /**
     * Finds the first object named `name` and its root → leaf location.
     */
    public object_search(name: string): SearchHit | null {
        const match: ObjectMatch | null = objectWithPath_find(this.tree, name);
        if (!match) return null;
        return { object: match.object, location: path_toRootFirst(match.path) };
    }

    /**
     * Finds the first object named `name` (live reference).
     */
    public object_get(name: string): CatalogObject | null {
        return object_find(this.tree, name);
    }

    /**
     * Finds the first container named `name`, root included.
     */
    public container_find(name: string): Container | null {
        return container_findByName(this.tree, name);
    }

    // ─── Mutations ──────────────────────────────────────────────

    /**
     * Appends `obj` to a container located earlier with `container_find`.
     */
    public async object_add(container: Container, obj: CatalogObject): Promise<SaveResult> {
        object_append(container, obj);
        return { saved: await this.tree_save() };
    }

    /**
     * Creates a new container under `parent` holding `obj`.
     */
    public async containerWithObject_add(parent: Container, containerName: string, obj: CatalogObject): Promise<SaveResult> {
        const created: Container = container_append(parent, containerName);
        object_append(created, obj);
        return { saved: await this.tree_save() };
    }

    /**
     * Deletes the first object named `name`.
     */
    public async object_remove(name: string): Promise<MutationResult> {
        if (!object_delete(this.tree, name)) {
            return { found: false };
        }
        return { found: true, saved: await this.tree_save() };
    }

    /**
     * Renames and/or recategorizes the first object named `name`.
     * Blank fields are left unchanged.
     */
    public async object_update(name: string, newName: string, newCategory: string): Promise<MutationResult> {
        if (!object_modify(this.tree, name, newName, newCategory)) {
            return { found: false };
        }
        return { found: true, saved: await this.tree_save() };
    }

    private tree_save(): Promise<boolean> {
        return this.store.catalog_save(this.tree, this.filePath);
    }
}
