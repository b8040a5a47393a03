import { describe, expect, it } from 'vitest';
import { Readable, Writable } from 'stream';
import { Repl, line_classify } from './Repl.js';
import { Presenter } from './Presenter.js';
import { SettingsService, type ResolvedSettings } from '../config/settings.js';
import { router_assemble, session_create } from '../kernel/factory.js';
import { OFFLINE_RESPONSE } from '../kernel/stages/GenerationStage.js';

const SETTINGS: ResolvedSettings = new SettingsService({}).snapshot();

interface Sink {
    stream: Writable;
    lines: () => string[];
}

function sink_create(): Sink {
    const chunks: string[] = [];
    const stream: Writable = new Writable({
        write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
            chunks.push(chunk.toString());
            callback();
        },
    });
    return {
        stream,
        lines: (): string[] => chunks.join('').split('\n').filter((line: string): boolean => line.length > 0),
    };
}

async function repl_run(inputLines: string[], trace: boolean = false): Promise<string[]> {
    const { router, telemetry } = router_assemble(SETTINGS, { llm: null });
    const sink: Sink = sink_create();
    const repl: Repl = new Repl({
        router,
        telemetry,
        state: session_create(SETTINGS),
        presenter: new Presenter(false),
        trace,
        input: Readable.from(inputLines.map((line: string): string => `${line}\n`)),
        output: sink.stream,
        prompt: '',
    });
    await repl.start();
    return sink.lines();
}

describe('line_classify', (): void => {
    it('skips blank lines', (): void => {
        expect(line_classify('   ')).toEqual({ kind: 'skip' });
    });

    it('treats quit and exit in any case as exit', (): void => {
        expect(line_classify('quit')).toEqual({ kind: 'exit' });
        expect(line_classify(' EXIT ')).toEqual({ kind: 'exit' });
    });

    it('routes everything else trimmed', (): void => {
        expect(line_classify('  hello there ')).toEqual({ kind: 'turn', input: 'hello there' });
        expect(line_classify('quit now')).toEqual({ kind: 'turn', input: 'quit now' });
    });
});

describe('Repl', (): void => {
    it('prints one response and metadata line per turn and stops at quit', async (): Promise<void> => {
        const lines: string[] = await repl_run(['mode:tutor', '', 'status', 'QUIT', 'hello']);

        expect(lines.slice(2)).toEqual([
            'response: Mode set to tutor.',
            'metadata: {"command":"mode","mode":"tutor","source":"command","stage":"command","success":true}',
            'response: mode=tutor; memory=0/20; capabilities: camera_available=off, cloud_llm=off, commands=on, knowledge=on, safety=on',
            'metadata: {"capabilities":["commands","knowledge","safety"],"command":"status","memory_count":0,"memory_limit":20,"mode":"tutor","source":"command","stage":"command","success":true}',
            'Goodbye.',
        ]);
    });

    it('says goodbye at end of input', async (): Promise<void> => {
        const lines: string[] = await repl_run(['hello']);

        expect(lines.slice(2)).toEqual([
            `response: ${OFFLINE_RESPONSE}`,
            'metadata: {"error":"missing_api_key","mode":"general","source":"offline","stage":"generation"}',
            'Goodbye.',
        ]);
    });

    it('prints telemetry when tracing', async (): Promise<void> => {
        const lines: string[] = await repl_run(['status'], true);

        expect(lines[2]).toBe('● command: claimed (source=command)');
        expect(lines[3].startsWith('response: mode=general;')).toBe(true);
    });
});
