/**
 * @file Conversation Modes
 *
 * The closed set of assistant modes and the tone/verbosity hint each one
 * contributes to generation prompts.
 *
 * @module core/modes
 */

/**
 * Assistant operating modes. `GENERAL` is the session default.
 */
export enum Mode {
    GENERAL = 'general',
    TUTOR = 'tutor',
    FOCUS = 'focus',
    HEALTH = 'health',
    MOOD = 'mood'
}

export interface ModeHint {
    tone: string;
    verbosity: 'brief' | 'balanced' | 'detailed';
}

export const MODE_HINTS: Readonly<Record<Mode, ModeHint>> = {
    [Mode.GENERAL]: { tone: 'neutral', verbosity: 'balanced' },
    [Mode.TUTOR]:   { tone: 'patient and educational', verbosity: 'detailed' },
    [Mode.FOCUS]:   { tone: 'direct and concise', verbosity: 'brief' },
    [Mode.HEALTH]:  { tone: 'careful and non-diagnostic', verbosity: 'balanced' },
    [Mode.MOOD]:    { tone: 'supportive and warm', verbosity: 'balanced' },
};

/** Declaration order; used for listings and error messages. */
export const MODES_ALL: readonly Mode[] = Object.values(Mode);

/**
 * Parse a user-supplied mode name (case-insensitive, surrounding space ignored).
 *
 * @returns The matching mode, or null when the name is not recognized.
 */
export function mode_parse(value: string): Mode | null {
    const normalized: string = value.trim().toLowerCase();
    return MODES_ALL.find((mode: Mode): boolean => mode === normalized) ?? null;
}

/**
 * Render a mode hint as a single prompt line.
 */
export function modeHint_render(mode: Mode): string {
    const hint: ModeHint = MODE_HINTS[mode];
    return `tone=${hint.tone}; verbosity=${hint.verbosity}`;
}
