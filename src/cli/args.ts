/**
 * @file CLI Arguments
 *
 * Parses command-line flags into setting overrides. Values are kept as
 * raw strings; `SettingsService.set` validates and clamps them.
 *
 * @module cli/args
 */

import type { NumericSettingKey } from '../config/settings.js';

export interface SettingOverride {
    key: NumericSettingKey;
    value: string;
}

export interface CliOptions {
    /** In command-line order; a repeated flag's last value wins. */
    overrides: SettingOverride[];
    trace: boolean;
    help: boolean;
}

export type ArgsResult = { ok: true; value: CliOptions } | { ok: false; error: string };

const VALUE_FLAGS: ReadonlyMap<string, NumericSettingKey> = new Map<string, NumericSettingKey>([
    ['--threshold', 'kb_threshold'],
    ['--memory', 'memory_limit'],
    ['--timeout', 'llm_timeout_ms'],
]);

export const USAGE: string = [
    'Usage: brainframe [options]',
    '',
    'Options:',
    '  --threshold <n>  knowledge confidence threshold, 0 to 1',
    '  --memory <n>     short-term memory entries to keep',
    '  --timeout <ms>   language model request timeout',
    '  --trace          print routing telemetry',
    '  --help           show this message',
].join('\n');

export function args_parse(argv: readonly string[]): ArgsResult {
    const options: CliOptions = { overrides: [], trace: false, help: false };

    for (let i = 0; i < argv.length; i++) {
        const arg: string = argv[i];
        if (arg === '--trace') {
            options.trace = true;
            continue;
        }
        if (arg === '--help' || arg === '-h') {
            options.help = true;
            continue;
        }

        const key: NumericSettingKey | undefined = VALUE_FLAGS.get(arg);
        if (key === undefined) {
            return { ok: false, error: `Unknown option: ${arg}` };
        }

        const value: string | undefined = argv[i + 1];
        if (value === undefined || value.startsWith('--')) {
            return { ok: false, error: `Missing value for ${arg}` };
        }
        options.overrides.push({ key, value });
        i++;
    }

    return { ok: true, value: options };
}
