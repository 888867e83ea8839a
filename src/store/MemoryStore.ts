/**
 * @file Memory Store
 *
 * In-memory CatalogStore keyed by path. Documents are held as serialized
 * text so loads go through the same decode path as the file store and a
 * loaded tree never aliases a saved one.
 *
 * @module
 */

import type { CatalogParseResult, Container } from '../catalog/types.js';
import type { CatalogStore, CatalogStoreOptions } from './types.js';
import type { DiagnosticSink } from '../log/diagnostics.js';
import { container_create, catalog_serialize } from '../catalog/model.js';
import { diagnostic_emit } from '../log/diagnostics.js';
import { catalogDocument_decode } from './codec.js';

export class MemoryStore implements CatalogStore {
    private readonly documents: Map<string, string> = new Map();
    private readonly rootName: string;
    private readonly indent: number;
    private readonly diagnostics: DiagnosticSink;
    /** When set, every save fails. */
    private saveFailure: string | null = null;

    constructor(options: CatalogStoreOptions = {}) {
        this.rootName = options.rootName ?? 'house';
        this.indent = options.indent ?? 4;
        this.diagnostics = options.diagnostics ?? diagnostic_emit;
    }

    /**
     * Stores raw document text at a path, bypassing serialization.
     */
    public document_put(path: string, text: string): void {
        this.documents.set(path, text);
    }

    /**
     * Returns the raw document text at a path, or null.
     */
    public document_get(path: string): string | null {
        return this.documents.get(path) ?? null;
    }

    /**
     * Makes subsequent saves fail with `reason` (null restores them).
     */
    public saveFailure_set(reason: string | null): void {
        this.saveFailure = reason;
    }

    async catalog_load(path: string): Promise<Container> {
        const text: string | undefined = this.documents.get(path);
        if (text === undefined) {
            this.diagnostics('warn', `Catalog file '${path}' not found; starting with an empty catalog.`);
            return container_create(this.rootName);
        }

        const decoded: CatalogParseResult = catalogDocument_decode(text);
        if (!decoded.ok) {
            this.diagnostics('error', `Could not load catalog file '${path}': ${decoded.error}`);
            return container_create(this.rootName);
        }
        return decoded.tree;
    }

    async catalog_save(tree: Container, path: string): Promise<boolean> {
        if (this.saveFailure !== null) {
            this.diagnostics('error', `Could not save catalog file '${path}': ${this.saveFailure}`);
            return false;
        }
        this.documents.set(path, catalog_serialize(tree, this.indent));
        return true;
    }
}
