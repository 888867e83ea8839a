/**
 * @file CatalogSession Tests
 *
 * Covers query pass-through, save-after-mutation and the in-memory
 * divergence reported when a save fails.
 *
 * @module
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Container } from '../catalog/types.js';
import type { MutationResult } from './CatalogSession.js';
import { CatalogSession } from './CatalogSession.js';
import { MemoryStore } from '../store/MemoryStore.js';
import { catalog_serialize, object_create } from '../catalog/model.js';
import { catalogDocument_decode } from '../store/codec.js';
import { houseTree_build } from '../testing/fixtures.js';

const FILE: string = 'data/house_catalog.json';

/**
 * Helper: decodes the document the store currently holds for FILE.
 */
function storedTree_get(store: MemoryStore): Container | null {
    const text: string | null = store.document_get(FILE);
    if (text === null) return null;
    const decoded = catalogDocument_decode(text);
    return decoded.ok ? decoded.tree : null;
}

describe('CatalogSession', () => {
    let store: MemoryStore;
    let session: CatalogSession;

    beforeEach(async () => {
        store = new MemoryStore({ diagnostics: (): void => undefined });
        store.document_put(FILE, catalog_serialize(houseTree_build()));
        session = await CatalogSession.open(store, FILE);
    });

    describe('open', () => {
        it('should load the tree from the store', () => {
            expect(session.root_get()).toEqual(houseTree_build());
            expect(session.path_get()).toBe(FILE);
        });

        it('should open an empty catalog when the document is missing', async () => {
            const empty: CatalogSession = await CatalogSession.open(new MemoryStore({ diagnostics: (): void => undefined }), 'none.json');
            expect(empty.root_get()).toEqual({ name: 'house', objects: [], containers: [] });
            expect(empty.objects_list()).toEqual([]);
        });
    });

    describe('queries', () => {
        it('should return search hits with a root-first location', () => {
            expect(session.object_search('hammer')).toEqual({
                object: { name: 'hammer', category: 'tool' },
                location: ['house', 'garage', 'shelf']
            });
        });

        it('should return null for an unknown object', () => {
            expect(session.object_search('piano')).toBeNull();
            expect(session.object_get('piano')).toBeNull();
        });

        it('should find containers including the root', () => {
            expect(session.container_find('house')).toBe(session.root_get());
            expect(session.container_find('shelf')!.objects[0].name).toBe('hammer');
        });
    });

    describe('mutations', () => {
        it('should save after a successful delete', async () => {
            const result: MutationResult = await session.object_remove('bulb');

            expect(result).toEqual({ found: true, saved: true });
            expect(storedTree_get(store)!.containers[0].containers[0].objects).toEqual([
                { name: 'corkscrew', category: 'utensil' }
            ]);
        });

        it('should not save when the object to delete is missing', async () => {
            store.document_put(FILE, 'sentinel');

            expect(await session.object_remove('piano')).toEqual({ found: false });
            expect(store.document_get(FILE)).toBe('sentinel');
        });

        it('should save a partial update', async () => {
            expect(await session.object_update('kettle', '', 'electric')).toEqual({ found: true, saved: true });
            expect(storedTree_get(store)!.containers[0].objects[0]).toEqual({ name: 'kettle', category: 'electric' });
        });

        it('should report an update of a missing object', async () => {
            expect(await session.object_update('piano', 'organ', '')).toEqual({ found: false });
        });

        it('should add an object to a located container and save', async () => {
            const garage: Container = session.container_find('garage')!;
            expect(await session.object_add(garage, object_create('ladder', 'tool'))).toEqual({ saved: true });

            expect(storedTree_get(store)!.containers[1].objects).toEqual([{ name: 'ladder', category: 'tool' }]);
        });

        it('should add a new container holding one object', async () => {
            const shelf: Container = session.container_find('shelf')!;
            await session.containerWithObject_add(shelf, 'toolbox', object_create('screwdriver', 'tool'));

            expect(storedTree_get(store)!.containers[1].containers[0].containers).toEqual([
                { name: 'toolbox', objects: [{ name: 'screwdriver', category: 'tool' }], containers: [] }
            ]);
            expect(session.object_search('screwdriver')!.location).toEqual(['house', 'garage', 'shelf', 'toolbox']);
        });

        it('should keep the change in memory when the save fails', async () => {
            store.saveFailure_set('disk full');

            expect(await session.object_remove('hammer')).toEqual({ found: true, saved: false });
            expect(session.object_get('hammer')).toBeNull();
            expect(storedTree_get(store)!.containers[1].containers[0].objects[0].name).toBe('hammer');
        });
    });

    describe('partly malformed document', () => {
        const DOCUMENT: string = JSON.stringify({
            name: 'house',
            objects: [{ name: 'umbrella', category: 'rain gear' }],
            containers: [
                { name: 'kitchen', objects: [{ name: 'kettle', category: 7 }], containers: null }
            ]
        });

        it('should keep every good node through load, add and save', async () => {
            store.document_put(FILE, DOCUMENT);
            session = await CatalogSession.open(store, FILE);

            expect(await session.object_add(session.root_get(), object_create('lamp', 'lighting'))).toEqual({ saved: true });

            expect(storedTree_get(store)).toEqual({
                name: 'house',
                objects: [
                    { name: 'umbrella', category: 'rain gear' },
                    { name: 'lamp', category: 'lighting' }
                ],
                containers: [
                    { name: 'kitchen', objects: [{ name: 'kettle', category: '7' }], containers: [] }
                ]
            });
        });

        it('should keep sibling objects through a delete', async () => {
            store.document_put(FILE, DOCUMENT);
            session = await CatalogSession.open(store, FILE);

            expect(await session.object_remove('kettle')).toEqual({ found: true, saved: true });
            expect(storedTree_get(store)!.objects).toEqual([{ name: 'umbrella', category: 'rain gear' }]);
            expect(session.object_search('umbrella')!.location).toEqual(['house']);
        });
    });
});
