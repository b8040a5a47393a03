/**
 * @file Turn Presenter
 *
 * Text rendering for the REPL: turn results, the banner and trace lines.
 *
 * @module cli/Presenter
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type { TurnMetadata, TurnResult } from '../kernel/types.js';
import { telemetryEvent_format, type TelemetryEvent } from '../telemetry/TelemetryBus.js';

export const BANNER: string[] = [
    'brainframe conversational shell',
    'Commands: status, mode:<name>, kb:search <query>, memory:show. Type quit to leave.',
];

/**
 * JSON with keys in code-point order, so equal metadata prints identically.
 */
export function metadata_format(metadata: TurnMetadata): string {
    const keys: string[] = Object.keys(metadata).sort((a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0));
    return JSON.stringify(metadata, keys);
}

export class Presenter {
    private readonly paint: ChalkInstance;

    constructor(color: boolean) {
        this.paint = new Chalk({ level: color ? 1 : 0 });
    }

    public turn_format(result: TurnResult): string[] {
        return [
            `${this.paint.cyan('response:')} ${result.response}`,
            `${this.paint.dim('metadata:')} ${metadata_format(result.metadata)}`,
        ];
    }

    public trace_format(event: TelemetryEvent): string {
        return this.paint.dim(telemetryEvent_format(event));
    }

    public warning_format(message: string): string {
        return this.paint.yellow(`>> WARNING: ${message}`);
    }

    public error_format(message: string): string {
        return this.paint.red(`>> ERROR: ${message}`);
    }

    public banner_format(): string[] {
        return [this.paint.cyan(BANNER[0]), this.paint.dim(BANNER[1])];
    }
}
