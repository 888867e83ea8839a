/**
 * @file Location Path Helpers
 *
 * The query engine builds object paths child → root. Display wants
 * root → leaf, joined with ' > '.
 *
 * @module
 */

/** Separator between container names in a displayed location. */
export const LOCATION_SEPARATOR: string = ' > ';

/**
 * Returns a reversed copy of a child → root path.
 */
export function path_toRootFirst(path: readonly string[]): string[] {
    return [...path].reverse();
}

/**
 * Joins a root → leaf path for display (e.g. 'house > garage > shelf').
 */
export function location_format(rootFirst: readonly string[]): string {
    return rootFirst.join(LOCATION_SEPARATOR);
}
