/**
 * @file Catalog Store Type Definitions
 *
 * Backend-agnostic persistence boundary for the catalog document. The
 * session never touches I/O directly; every load and save goes through
 * this interface.
 *
 * Neither method rejects. Failures become a diagnostic plus a safe
 * default: an empty tree on load, `false` on save.
 *
 * @module
 */

import type { Container } from '../catalog/types.js';
import type { DiagnosticSink } from '../log/diagnostics.js';

// ─── Storage Backend Interface ──────────────────────────────────

export interface CatalogStore {
    /**
     * Read the document at `path` into a tree. Resolves an empty root
     * container if the document is missing, undecodable or malformed.
     */
    catalog_load(path: string): Promise<Container>;

    /** Write the full tree to `path`. Resolves false if the write failed. */
    catalog_save(tree: Container, path: string): Promise<boolean>;
}

// ─── Store Options ──────────────────────────────────────────────

/**
 * @property rootName - Name given to the empty tree returned on load failure.
 * @property indent - JSON indentation width for saved documents.
 * @property diagnostics - Where failure messages go.
 */
export interface CatalogStoreOptions {
    rootName?: string;
    indent?: number;
    diagnostics?: DiagnosticSink;
}
