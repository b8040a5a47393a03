/**
 * @file REPL
 *
 * Interactive readline loop around the router. One routed turn per
 * non-blank line; `quit`, `exit` or end of input close the session.
 *
 * @module cli/Repl
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import type { SessionState } from '../core/state/SessionState.js';
import type { Router } from '../kernel/Router.js';
import { error_message, type TurnResult } from '../kernel/types.js';
import type { TelemetryBus, TelemetryEvent } from '../telemetry/TelemetryBus.js';
import type { Presenter } from './Presenter.js';

export type LineAction =
    | { kind: 'exit' }
    | { kind: 'skip' }
    | { kind: 'turn'; input: string };

const EXIT_WORDS: ReadonlySet<string> = new Set(['quit', 'exit']);

export function line_classify(line: string): LineAction {
    const input: string = line.trim();
    if (!input) return { kind: 'skip' };
    if (EXIT_WORDS.has(input.toLowerCase())) return { kind: 'exit' };
    return { kind: 'turn', input };
}

export interface ReplOptions {
    router: Router;
    state: SessionState;
    telemetry: TelemetryBus;
    presenter: Presenter;
    /** Print telemetry events as they happen. */
    trace: boolean;
    input?: Readable;
    output?: Writable;
    prompt?: string;
}

export class Repl {
    private readonly input: Readable;
    private readonly output: Writable;
    private readonly prompt: string;

    constructor(private readonly options: ReplOptions) {
        this.input = options.input ?? process.stdin;
        this.output = options.output ?? process.stdout;
        this.prompt = options.prompt ?? '> ';
    }

    /**
     * Run until the user leaves. Resolves after the goodbye line.
     */
    public async start(): Promise<void> {
        const { presenter, telemetry } = this.options;
        const unsubscribe: () => void = this.options.trace
            ? telemetry.subscribe((event: TelemetryEvent): void => this.line_write(presenter.trace_format(event)))
            : (): void => {};

        const rl: readline.Interface = readline.createInterface({
            input: this.input,
            output: this.output,
            prompt: this.prompt,
            terminal: false,
        });

        try {
            presenter.banner_format().forEach((line: string): void => this.line_write(line));
            rl.prompt();

            for await (const line of rl) {
                const action: LineAction = line_classify(line);
                if (action.kind === 'exit') break;
                if (action.kind === 'turn') {
                    await this.turn_execute(action.input);
                }
                rl.prompt();
            }
        } finally {
            rl.close();
            unsubscribe();
        }

        this.line_write('Goodbye.');
    }

    private async turn_execute(input: string): Promise<void> {
        const { router, state, presenter } = this.options;
        try {
            const result: TurnResult = await router.route(input, state);
            presenter.turn_format(result).forEach((line: string): void => this.line_write(line));
        } catch (error: unknown) {
            this.line_write(presenter.error_format(error_message(error)));
        }
    }

    private line_write(text: string): void {
        this.output.write(`${text}\n`);
    }
}
