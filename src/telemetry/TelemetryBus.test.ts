import { describe, it, expect } from 'vitest';
import { TelemetryBus, telemetryEvent_format, type TelemetryEvent } from './TelemetryBus.js';

describe('TelemetryBus', (): void => {
    it('delivers events to subscribers until they unsubscribe', (): void => {
        const bus: TelemetryBus = new TelemetryBus();
        const received: TelemetryEvent[] = [];
        const unsubscribe = bus.subscribe((event: TelemetryEvent): void => {
            received.push(event);
        });

        bus.emit({ type: 'stage_pass', stage: 'command' });
        unsubscribe();
        bus.emit({ type: 'stage_pass', stage: 'safety' });

        expect(received).toEqual([{ type: 'stage_pass', stage: 'command' }]);
    });

    it('emits without subscribers', (): void => {
        const bus: TelemetryBus = new TelemetryBus();
        expect((): void => bus.emit({ type: 'advisory', category: 'health_disclaimer' })).not.toThrow();
    });
});

describe('telemetryEvent_format', (): void => {
    it('renders each event kind on one line', (): void => {
        expect(telemetryEvent_format({ type: 'stage_pass', stage: 'knowledge' })).toBe('○ knowledge: pass');
        expect(telemetryEvent_format({ type: 'stage_claim', stage: 'generation', source: 'offline' }))
            .toBe('● generation: claimed (source=offline)');
        expect(telemetryEvent_format({ type: 'stage_error', stage: 'knowledge', message: 'index offline' }))
            .toBe('>> knowledge: error: index offline');
        expect(telemetryEvent_format({ type: 'llm_result', ok: false, detail: 'timeout', elapsedMs: 12 }))
            .toBe('○ llm: failed (timeout, 12ms)');
    });
});
