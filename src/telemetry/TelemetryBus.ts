/**
 * @file Telemetry Bus
 *
 * Typed facade over Node's EventEmitter carrying routing trace events:
 * one event per stage decision, stage failures, safety advisories and
 * generation outcomes. Silent unless something subscribes.
 *
 * @module telemetry/TelemetryBus
 */

import { EventEmitter } from 'events';

export type StageName = 'command' | 'safety' | 'knowledge' | 'generation';

export type TelemetryEvent =
    | { type: 'stage_pass'; stage: StageName }
    | { type: 'stage_claim'; stage: StageName; source: string }
    | { type: 'stage_error'; stage: StageName; message: string }
    | { type: 'advisory'; category: string }
    | { type: 'llm_result'; ok: boolean; detail: string; elapsedMs: number };

export type TelemetryObserver = (event: TelemetryEvent) => void;

const CHANNEL = 'telemetry' as const;

export class TelemetryBus {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to telemetry events.
     *
     * @returns Unsubscribe function.
     */
    subscribe(observer: TelemetryObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return () => this.emitter.off(CHANNEL, observer);
    }

    emit(event: TelemetryEvent): void {
        this.emitter.emit(CHANNEL, event);
    }
}

/**
 * One-line human rendering of an event, used by the REPL trace output.
 */
export function telemetryEvent_format(event: TelemetryEvent): string {
    switch (event.type) {
        case 'stage_pass':  return `○ ${event.stage}: pass`;
        case 'stage_claim': return `● ${event.stage}: claimed (source=${event.source})`;
        case 'stage_error': return `>> ${event.stage}: error: ${event.message}`;
        case 'advisory':    return `○ safety advisory: ${event.category}`;
        case 'llm_result':  return `○ llm: ${event.ok ? 'ok' : 'failed'} (${event.detail}, ${event.elapsedMs}ms)`;
    }
}
