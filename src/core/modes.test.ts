import { describe, it, expect } from 'vitest';
import { Mode, MODES_ALL, mode_parse, modeHint_render } from './modes.js';

describe('mode_parse', (): void => {
    it('accepts every declared mode name', (): void => {
        for (const mode of MODES_ALL) {
            expect(mode_parse(mode)).toBe(mode);
        }
    });

    it('ignores case and surrounding whitespace', (): void => {
        expect(mode_parse('  TuToR ')).toBe(Mode.TUTOR);
    });

    it('returns null for unknown or empty names', (): void => {
        expect(mode_parse('sleep')).toBeNull();
        expect(mode_parse('')).toBeNull();
    });
});

describe('modeHint_render', (): void => {
    it('renders tone and verbosity for the mode', (): void => {
        expect(modeHint_render(Mode.FOCUS)).toBe('tone=direct and concise; verbosity=brief');
    });
});
