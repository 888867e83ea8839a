/**
 * @file JSON File Store
 *
 * Implements CatalogStore against the local filesystem. The whole document
 * is rewritten on every save; there is no partial-write protection.
 *
 * @module
 */

import fs from 'fs/promises';
import path from 'path';
import type { CatalogParseResult, Container } from '../catalog/types.js';
import type { CatalogStore, CatalogStoreOptions } from './types.js';
import type { DiagnosticSink } from '../log/diagnostics.js';
import { container_create, catalog_serialize } from '../catalog/model.js';
import { diagnostic_emit, errorMessage_get } from '../log/diagnostics.js';
import { catalogDocument_decode } from './codec.js';

/**
 * Filesystem-backed CatalogStore.
 *
 * @example
 * ```typescript
 * const store = new JsonFileStore({ rootName: 'house' });
 * const tree = await store.catalog_load('data/house_catalog.json');
 * ```
 */
export class JsonFileStore implements CatalogStore {
    private readonly rootName: string;
    private readonly indent: number;
    private readonly diagnostics: DiagnosticSink;

    constructor(options: CatalogStoreOptions = {}) {
        this.rootName = options.rootName ?? 'house';
        this.indent = options.indent ?? 4;
        this.diagnostics = options.diagnostics ?? diagnostic_emit;
    }

    async catalog_load(filePath: string): Promise<Container> {
        let text: string;
        try {
            text = await fs.readFile(filePath, 'utf-8');
        } catch (error: unknown) {
            if (errorCode_get(error) === 'ENOENT') {
                this.diagnostics('warn', `Catalog file '${filePath}' not found; starting with an empty catalog.`);
            } else {
                this.diagnostics('error', `Could not read catalog file '${filePath}': ${errorMessage_get(error)}`);
            }
            return container_create(this.rootName);
        }

        const decoded: CatalogParseResult = catalogDocument_decode(text);
        if (!decoded.ok) {
            this.diagnostics('error', `Could not load catalog file '${filePath}': ${decoded.error}`);
            return container_create(this.rootName);
        }
        return decoded.tree;
    }

    async catalog_save(tree: Container, filePath: string): Promise<boolean> {
        try {
            const text: string = catalog_serialize(tree, this.indent);
            await fs.mkdir(path.dirname(filePath), { recursive: true });
            await fs.writeFile(filePath, text, 'utf-8');
            return true;
        } catch (error: unknown) {
            this.diagnostics('error', `Could not save catalog file '${filePath}': ${errorMessage_get(error)}`);
            return false;
        }
    }
}

/**
 * Extracts a Node system error code (e.g. 'ENOENT') from an unknown error.
 */
function errorCode_get(error: unknown): string | null {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}
