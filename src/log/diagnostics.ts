/**
 * @file Diagnostics
 *
 * Console-backed diagnostic messages for the catalog. Persistence and
 * session code report through a `DiagnosticSink` so tests can capture
 * what would otherwise go to the terminal.
 *
 * @module
 */

import chalk from 'chalk';

export type DiagnosticLevel = 'info' | 'warn' | 'error';

/**
 * Receiver for diagnostic messages.
 */
export type DiagnosticSink = (level: DiagnosticLevel, message: string) => void;

const LEVEL_TAGS: Record<DiagnosticLevel, string> = {
    info:  '[INFO]',
    warn:  '[WARN]',
    error: '[ERROR]'
};

/**
 * Formats a diagnostic line with a coloured level tag.
 */
export function diagnostic_format(level: DiagnosticLevel, message: string): string {
    const tag: string = LEVEL_TAGS[level];
    switch (level) {
        case 'info':  return `${chalk.cyan(tag)} ${message}`;
        case 'warn':  return `${chalk.yellow(tag)} ${message}`;
        case 'error': return `${chalk.red(tag)} ${message}`;
    }
}

/**
 * Default sink: info to stdout, warnings and errors to stderr.
 */
export const diagnostic_emit: DiagnosticSink = (level: DiagnosticLevel, message: string): void => {
    const line: string = diagnostic_format(level, message);
    if (level === 'info') {
        console.log(line);
    } else {
        console.error(line);
    }
};

/**
 * Convert unknown thrown values into display-safe messages.
 */
export function errorMessage_get(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
