/**
 * @file Catalog Terminal Renderer
 *
 * Text formatting for the interactive menu: catalog listings, search
 * hits, the menu itself and coloured status lines.
 *
 * @module
 */

import chalk from 'chalk';
import type { ObjectListing } from '../catalog/types.js';
import type { SearchHit } from '../session/CatalogSession.js';
import { location_format } from '../catalog/path.js';

/** Rule printed under each listed object. */
export const LISTING_RULE: string = '-'.repeat(50);

/** Strip ANSI codes from a string. */
export function ansi_strip(str: string): string {
    return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Render name, category and location lines for one object.
 */
export function objectDetail_render(name: string, category: string, location: string[]): string[] {
    return [
        `${chalk.bold('Name:')} ${name}`,
        `${chalk.bold('Category:')} ${category}`,
        `${chalk.bold('Location:')} ${chalk.magenta(location_format(location))}`
    ];
}

/**
 * Render the full catalog listing, one block per object.
 */
export function listing_render(listings: ObjectListing[]): string[] {
    if (listings.length === 0) {
        return [chalk.dim('The catalog is empty.')];
    }

    const lines: string[] = [];
    for (const entry of listings) {
        lines.push(...objectDetail_render(entry.object.name, entry.object.category, entry.location));
        lines.push(chalk.dim(LISTING_RULE));
    }
    return lines;
}

/**
 * Render a search hit.
 */
export function searchHit_render(hit: SearchHit): string[] {
    return objectDetail_render(hit.object.name, hit.object.category, hit.location);
}

/**
 * Render numbered menu entries as `Press [n] to <label>`.
 */
export function menu_render(options: ReadonlyArray<readonly [string, string]>): string[] {
    return options.map(([key, label]): string => `Press [${chalk.cyan(key)}] to ${label}`);
}

export function success_style(text: string): string {
    return chalk.green(text);
}

export function error_style(text: string): string {
    return chalk.red(text);
}

export function warning_style(text: string): string {
    return chalk.yellow(text);
}
