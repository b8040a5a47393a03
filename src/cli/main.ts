#!/usr/bin/env node
/**
 * @file CLI Entry Point
 *
 * Resolves settings from flags and environment, assembles the router and
 * runs the interactive REPL.
 *
 * Usage:
 *   npx tsx src/cli/main.ts
 *   npx tsx src/cli/main.ts --threshold 0.6 --trace
 *
 * @module
 */

import { args_parse, USAGE, type ArgsResult } from './args.js';
import { Presenter } from './Presenter.js';
import { Repl } from './Repl.js';
import { SettingsService, type ResolvedSettings } from '../config/settings.js';
import { router_assemble, session_create, type RouterAssembly } from '../kernel/factory.js';
import { error_message } from '../kernel/types.js';

async function main(argv: readonly string[]): Promise<number> {
    const presenter: Presenter = new Presenter(Boolean(process.stdout.isTTY));

    const parsed: ArgsResult = args_parse(argv);
    if (!parsed.ok) {
        console.error(presenter.error_format(parsed.error));
        console.error(USAGE);
        return 1;
    }
    if (parsed.value.help) {
        console.log(USAGE);
        return 0;
    }

    const settingsService: SettingsService = new SettingsService();
    for (const override of parsed.value.overrides) {
        const result = settingsService.set(override.key, override.value);
        if (!result.ok) {
            console.error(presenter.error_format(result.error));
            return 1;
        }
    }
    for (const warning of settingsService.warnings_list()) {
        console.error(presenter.warning_format(warning));
    }

    const settings: ResolvedSettings = settingsService.snapshot();
    const { router, telemetry }: RouterAssembly = router_assemble(settings);

    await new Repl({
        router,
        telemetry,
        state: session_create(settings),
        presenter,
        trace: parsed.value.trace,
    }).start();
    return 0;
}

main(process.argv.slice(2))
    .then((code: number): void => {
        process.exitCode = code;
    })
    .catch((e: unknown): void => {
        console.error(`Fatal error: ${error_message(e)}`);
        process.exit(1);
    });
