/**
 * @file CLI Argument Parsing
 *
 * @module
 */

import type { SettingsFileResult, SettingsOverrides } from '../config/settings.js';
import { DEFAULT_CONFIG_FILE, settings_validate } from '../config/settings.js';

export const USAGE: string = 'usage: household-catalog [--file PATH] [--config PATH] [--root NAME] [--help]';

export interface CliOptions {
    configFile: string;
    overrides: SettingsOverrides;
}

export type CliParseResult =
    | { ok: true; options: CliOptions }
    | { ok: false; message: string; exitCode: number };

/**
 * Parse command-line arguments (without the node/script prefix).
 */
export function cliArgs_parse(args: string[]): CliParseResult {
    const overrides: SettingsOverrides = {};
    let configFile: string = DEFAULT_CONFIG_FILE;

    for (let i = 0; i < args.length; i++) {
        const arg: string = args[i];
        if (arg === '--help' || arg === '-h') {
            return { ok: false, message: USAGE, exitCode: 0 };
        }

        if (arg === '--file' || arg === '--config' || arg === '--root') {
            const value: string | undefined = args[i + 1];
            if (value === undefined || value.startsWith('--')) {
                return { ok: false, message: `option ${arg} requires a value\n${USAGE}`, exitCode: 1 };
            }
            i++;
            if (arg === '--file') overrides.catalog_file = value;
            else if (arg === '--root') overrides.root_name = value;
            else configFile = value;
            continue;
        }

        return { ok: false, message: `unrecognized argument '${arg}'\n${USAGE}`, exitCode: 1 };
    }

    const checked: SettingsFileResult = settings_validate(overrides);
    if (!checked.ok) {
        return { ok: false, message: `${checked.error}\n${USAGE}`, exitCode: 1 };
    }
    return { ok: true, options: { configFile, overrides: checked.settings } };
}
