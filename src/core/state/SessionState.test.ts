import { describe, it, expect } from 'vitest';
import { SessionState, type MemoryEntry } from './SessionState.js';
import { Mode } from '../modes.js';

describe('SessionState', (): void => {
    it('starts in general mode with empty memory', (): void => {
        const state: SessionState = new SessionState({ memoryLimit: 5 });
        expect(state.mode_get()).toBe(Mode.GENERAL);
        expect(state.memory_show()).toEqual([]);
    });

    it('reflects the latest mode_set', (): void => {
        const state: SessionState = new SessionState({ memoryLimit: 5 });
        state.mode_set(Mode.TUTOR);
        state.mode_set(Mode.MOOD);
        expect(state.mode_get()).toBe(Mode.MOOD);
        expect(state.status().mode).toBe(Mode.MOOD);
    });

    it('evicts oldest entries first once the limit is exceeded', (): void => {
        const state: SessionState = new SessionState({ memoryLimit: 3 });
        for (let i: number = 1; i <= 5; i++) {
            state.memory_append({ role: 'user', content: `turn ${i}` });
        }

        const contents: string[] = state.memory_show().map((e: MemoryEntry): string => e.content);
        expect(contents).toEqual(['turn 3', 'turn 4', 'turn 5']);
        expect(state.status().memoryCount).toBe(3);
    });

    it('returns copies that do not alias internal memory', (): void => {
        const state: SessionState = new SessionState({ memoryLimit: 3 });
        state.memory_append({ role: 'user', content: 'hello' });

        const shown: MemoryEntry[] = state.memory_show();
        shown[0].content = 'tampered';
        shown.push({ role: 'assistant', content: 'extra' });

        expect(state.memory_show()).toEqual([{ role: 'user', content: 'hello' }]);
    });

    it('returns the most recent entries in order', (): void => {
        const state: SessionState = new SessionState({ memoryLimit: 10 });
        state.memory_append({ role: 'user', content: 'a' });
        state.memory_append({ role: 'assistant', content: 'b' });
        state.memory_append({ role: 'user', content: 'c' });

        expect(state.memory_recent(2).map((e: MemoryEntry): string => e.content)).toEqual(['b', 'c']);
        expect(state.memory_recent(0)).toEqual([]);
    });

    it('merges capability overrides over defaults', (): void => {
        const state: SessionState = new SessionState({ memoryLimit: 2, capabilities: { cloud_llm: true } });
        expect(state.status().capabilities).toEqual({
            camera_available: false,
            cloud_llm: true,
            commands: true,
            knowledge: true,
            safety: true,
        });
    });

    it('rejects a non-positive memory limit', (): void => {
        expect((): SessionState => new SessionState({ memoryLimit: 0 })).toThrow(RangeError);
    });
});
