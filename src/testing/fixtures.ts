/**
 * @file Shared Test Fixtures
 *
 * Catalog trees used across the test suites.
 *
 * @module
 */

import type { Container } from '../catalog/types.js';

/**
 * A small house with two objects named 'bulb':
 *
 * ```
 * house            umbrella
 * ├── kitchen      kettle
 * │   └── drawer   corkscrew, bulb (spare part)
 * ├── garage
 * │   └── shelf    hammer
 * └── attic        bulb (lighting)
 * ```
 */
export function houseTree_build(): Container {
    return {
        name: 'house',
        objects: [{ name: 'umbrella', category: 'outdoor' }],
        containers: [
            {
                name: 'kitchen',
                objects: [{ name: 'kettle', category: 'appliance' }],
                containers: [
                    {
                        name: 'drawer',
                        objects: [
                            { name: 'corkscrew', category: 'utensil' },
                            { name: 'bulb', category: 'spare part' }
                        ],
                        containers: []
                    }
                ]
            },
            {
                name: 'garage',
                objects: [],
                containers: [
                    {
                        name: 'shelf',
                        objects: [{ name: 'hammer', category: 'tool' }],
                        containers: []
                    }
                ]
            },
            {
                name: 'attic',
                objects: [{ name: 'bulb', category: 'lighting' }],
                containers: []
            }
        ]
    };
}
