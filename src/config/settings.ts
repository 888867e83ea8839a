/**
 * @file Runtime Settings Service
 *
 * Catalog settings with central validation and deterministic precedence
 * (CLI override > env > config file > defaults).
 *
 * The config file is optional YAML:
 *
 * ```yaml
 * catalog_file: data/house_catalog.json
 * root_name: house
 * indent: 4
 * ```
 *
 * @module
 */

import fs from 'fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { errorMessage_get } from '../log/diagnostics.js';

export const DEFAULT_CONFIG_FILE: string = 'catalog.config.yaml';

// ─── Types ──────────────────────────────────────────────────────

export const CatalogSettingsFileSchema = z.object({
    catalog_file: z.string().trim().min(1, 'catalog_file must not be empty').optional(),
    root_name:    z.string().trim().min(1, 'root_name must not be empty').optional(),
    indent:       z.number().int('indent must be an integer').optional()
}).strict();

export type CatalogSettingsFile = z.infer<typeof CatalogSettingsFileSchema>;

/** Values given on the command line. */
export type SettingsOverrides = CatalogSettingsFile;

export interface ResolvedCatalogSettings {
    catalog_file: string;
    root_name: string;
    indent: number;
}

export type SettingsKey = keyof ResolvedCatalogSettings;

export type SettingsFileResult =
    | { ok: true; settings: CatalogSettingsFile }
    | { ok: false; error: string };

type EnvMap = Record<string, string | undefined>;

interface NumericBounds {
    min: number;
    max: number;
}

const ENV_KEYS: Record<SettingsKey, string> = {
    catalog_file: 'CATALOG_FILE',
    root_name:    'CATALOG_ROOT_NAME',
    indent:       'CATALOG_INDENT'
};

// ─── Validation ─────────────────────────────────────────────────

/**
 * Flatten zod issues into `path: message` pairs joined by '; '.
 */
function settingsIssues_format(error: z.ZodError): string {
    return error.issues
        .map((issue): string => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validate raw settings (a parsed config file or CLI overrides).
 */
export function settings_validate(raw: unknown): SettingsFileResult {
    const parsed = CatalogSettingsFileSchema.safeParse(raw);
    if (!parsed.success) {
        return { ok: false, error: settingsIssues_format(parsed.error) };
    }
    return { ok: true, settings: parsed.data };
}

// ─── Config File ────────────────────────────────────────────────

/**
 * Parse YAML config text. Empty text is an empty config.
 */
export function settingsYaml_parse(text: string): SettingsFileResult {
    let raw: unknown;
    try {
        raw = yaml.load(text);
    } catch (error: unknown) {
        return { ok: false, error: `invalid YAML: ${errorMessage_get(error)}` };
    }
    if (raw === undefined || raw === null) {
        return { ok: true, settings: {} };
    }

    return settings_validate(raw);
}

/**
 * Read and validate a config file. A missing file is an empty config.
 */
export async function settingsFile_load(filePath: string): Promise<SettingsFileResult> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
        if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
            return { ok: true, settings: {} };
        }
        return { ok: false, error: `${filePath}: ${errorMessage_get(error)}` };
    }

    const result: SettingsFileResult = settingsYaml_parse(text);
    if (!result.ok) {
        return { ok: false, error: `${filePath}: ${result.error}` };
    }
    return result;
}

// ─── Service ────────────────────────────────────────────────────

export class SettingsService {
    private readonly defaults: ResolvedCatalogSettings = {
        catalog_file: 'data/house_catalog.json',
        root_name: 'house',
        indent: 4,
    };
    private readonly bounds: Record<'indent', NumericBounds> = {
        indent: { min: 0, max: 8 },
    };

    constructor(
        private readonly fileSettings: CatalogSettingsFile = {},
        private readonly env: EnvMap = process.env
    ) {}

    /**
     * Return effective settings for the given CLI overrides.
     */
    public snapshot(overrides: SettingsOverrides = {}): ResolvedCatalogSettings {
        return {
            catalog_file: this.string_resolve('catalog_file', overrides),
            root_name: this.string_resolve('root_name', overrides).trim().toLowerCase(),
            indent: this.indent_resolve(overrides),
        };
    }

    private string_resolve(key: 'catalog_file' | 'root_name', overrides: SettingsOverrides): string {
        return overrides[key]
            ?? this.envString_resolve(ENV_KEYS[key])
            ?? this.fileSettings[key]
            ?? this.defaults[key];
    }

    private indent_resolve(overrides: SettingsOverrides): number {
        const value: number = overrides.indent
            ?? this.envNumeric_resolve(ENV_KEYS.indent)
            ?? this.fileSettings.indent
            ?? this.defaults.indent;
        return this.value_clamp(value);
    }

    private envString_resolve(key: string): string | undefined {
        const envRaw: string | undefined = this.env[key]?.trim();
        return envRaw ? envRaw : undefined;
    }

    private envNumeric_resolve(key: string): number | undefined {
        const envRaw: string | undefined = this.env[key];
        if (!envRaw) return undefined;

        const parsed: number = Number.parseInt(envRaw, 10);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private value_clamp(value: number): number {
        const bounds: NumericBounds = this.bounds.indent;
        return Math.max(bounds.min, Math.min(bounds.max, Math.round(value)));
    }
}
