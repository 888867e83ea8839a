/**
 * @file Catalog Tree Model Tests
 *
 * Covers tolerant reads of raw documents and the stable document shape.
 *
 * @module
 */

import { describe, it, expect } from 'vitest';
import type { CatalogParseResult } from './types.js';
import { catalog_fromRaw, catalog_serialize, catalog_toDocument, container_create, object_create } from './model.js';
import { houseTree_build } from '../testing/fixtures.js';

describe('catalog model', () => {
    describe('constructors', () => {
        it('should create an empty container', () => {
            expect(container_create('shed')).toEqual({ name: 'shed', objects: [], containers: [] });
        });

        it('should create an object', () => {
            expect(object_create('rake', 'garden')).toEqual({ name: 'rake', category: 'garden' });
        });
    });

    describe('catalog_fromRaw', () => {
        it('should treat a nested node without containers as a leaf', () => {
            const result: CatalogParseResult = catalog_fromRaw({
                name: 'house',
                containers: [{ name: 'kitchen', objects: [{ name: 'cup', category: 'dish' }] }]
            });

            expect(result).toEqual({
                ok: true,
                tree: {
                    name: 'house',
                    objects: [],
                    containers: [
                        { name: 'kitchen', objects: [{ name: 'cup', category: 'dish' }], containers: [] }
                    ]
                }
            });
        });

        it('should default a missing name and category to empty strings', () => {
            const result: CatalogParseResult = catalog_fromRaw({ objects: [{ name: 'cup' }] });
            expect(result).toEqual({
                ok: true,
                tree: { name: '', objects: [{ name: 'cup', category: '' }], containers: [] }
            });
        });

        it('should read an empty object as an empty root', () => {
            expect(catalog_fromRaw({})).toEqual({ ok: true, tree: { name: '', objects: [], containers: [] } });
        });

        it('should drop keys outside the document format', () => {
            const result: CatalogParseResult = catalog_fromRaw({
                name: 'house',
                colour: 'red',
                objects: [{ name: 'cup', category: 'dish', price: 3 }]
            });
            expect(result).toEqual({
                ok: true,
                tree: { name: 'house', objects: [{ name: 'cup', category: 'dish' }], containers: [] }
            });
        });

        it('should read null and wrong-typed lists as empty', () => {
            const result: CatalogParseResult = catalog_fromRaw({
                name: 'house',
                objects: 'nothing',
                containers: [{ name: 'kitchen', objects: null, containers: null }]
            });
            expect(result).toEqual({
                ok: true,
                tree: {
                    name: 'house',
                    objects: [],
                    containers: [{ name: 'kitchen', objects: [], containers: [] }]
                }
            });
        });

        it('should turn numeric and boolean text fields into strings', () => {
            const result: CatalogParseResult = catalog_fromRaw({
                name: 42,
                objects: [{ name: 'kettle', category: 7 }, { name: true, category: 'flag' }]
            });
            expect(result).toEqual({
                ok: true,
                tree: {
                    name: '42',
                    objects: [{ name: 'kettle', category: '7' }, { name: 'true', category: 'flag' }],
                    containers: []
                }
            });
        });

        it('should read other non-string text fields as empty strings', () => {
            const result: CatalogParseResult = catalog_fromRaw({
                name: null,
                objects: [{ name: ['cup'], category: { kind: 'dish' } }]
            });
            expect(result).toEqual({
                ok: true,
                tree: { name: '', objects: [{ name: '', category: '' }], containers: [] }
            });
        });

        it('should drop list entries that are not objects and keep their siblings', () => {
            const result: CatalogParseResult = catalog_fromRaw({
                name: 'house',
                containers: [
                    'cellar',
                    { name: 'kitchen', objects: [{ name: 'cup', category: 'dish' }, 5, null, [], { name: 'mug', category: 'dish' }] }
                ]
            });
            expect(result).toEqual({
                ok: true,
                tree: {
                    name: 'house',
                    objects: [],
                    containers: [
                        {
                            name: 'kitchen',
                            objects: [{ name: 'cup', category: 'dish' }, { name: 'mug', category: 'dish' }],
                            containers: []
                        }
                    ]
                }
            });
        });

        it('should reject a root that is not an object', () => {
            const result: CatalogParseResult = catalog_fromRaw([]);
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error).toBe('(root): Expected object, received array');
            }
        });
    });

    describe('catalog_toDocument', () => {
        it('should copy the tree without sharing nodes', () => {
            const tree = houseTree_build();
            const doc = catalog_toDocument(tree);

            expect(doc).toEqual(tree);
            expect(doc.containers[0]).not.toBe(tree.containers[0]);
            expect(doc.objects[0]).not.toBe(tree.objects[0]);
        });
    });

    describe('catalog_serialize', () => {
        it('should write name, objects, containers in a fixed order', () => {
            const text: string = catalog_serialize(
                { containers: [], objects: [{ category: 'tool', name: 'saw' }], name: 'shed' },
                2
            );
            expect(text).toBe(
                '{\n' +
                '  "name": "shed",\n' +
                '  "objects": [\n' +
                '    {\n' +
                '      "name": "saw",\n' +
                '      "category": "tool"\n' +
                '    }\n' +
                '  ],\n' +
                '  "containers": []\n' +
                '}\n'
            );
        });

        it('should indent with four spaces by default', () => {
            expect(catalog_serialize(container_create('shed'))).toBe(
                '{\n    "name": "shed",\n    "objects": [],\n    "containers": []\n}\n'
            );
        });
    });
});
