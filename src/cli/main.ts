#!/usr/bin/env node
/**
 * @file Household Catalog CLI Entry Point
 *
 * Resolves settings, loads the catalog once and runs the interactive menu.
 *
 * Usage:
 *   npx tsx src/cli/main.ts
 *   npx tsx src/cli/main.ts --file data/house_catalog.json
 *   npx tsx src/cli/main.ts --config ./catalog.config.yaml --root house
 *
 * @module
 */

import type { CliParseResult } from './args.js';
import type { ResolvedCatalogSettings, SettingsFileResult } from '../config/settings.js';
import { cliArgs_parse } from './args.js';
import { SettingsService, settingsFile_load } from '../config/settings.js';
import { JsonFileStore } from '../store/JsonFileStore.js';
import { CatalogSession } from '../session/CatalogSession.js';
import { CatalogMenu } from './Menu.js';
import { ReadlineChannel } from './LineChannel.js';
import { diagnostic_emit, errorMessage_get } from '../log/diagnostics.js';

async function main(): Promise<number> {
    const parsed: CliParseResult = cliArgs_parse(process.argv.slice(2));
    if (!parsed.ok) {
        if (parsed.exitCode === 0) console.log(parsed.message);
        else console.error(parsed.message);
        return parsed.exitCode;
    }

    const fileResult: SettingsFileResult = await settingsFile_load(parsed.options.configFile);
    if (!fileResult.ok) {
        diagnostic_emit('error', `Invalid configuration: ${fileResult.error}`);
        return 1;
    }

    const settings: ResolvedCatalogSettings = new SettingsService(fileResult.settings).snapshot(parsed.options.overrides);
    const store: JsonFileStore = new JsonFileStore({ rootName: settings.root_name, indent: settings.indent });
    const session: CatalogSession = await CatalogSession.open(store, settings.catalog_file, settings.root_name);

    const channel: ReadlineChannel = new ReadlineChannel();
    try {
        await new CatalogMenu(session, channel).run();
    } finally {
        channel.close();
    }
    return 0;
}

main()
    .then((code: number): void => {
        process.exitCode = code;
    })
    .catch((e: unknown): void => {
        console.error(`Fatal error: ${errorMessage_get(e)}`);
        process.exitCode = 1;
    });
