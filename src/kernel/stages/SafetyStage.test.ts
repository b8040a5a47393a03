import { describe, expect, it } from 'vitest';
import { SafetyStage, SAFETY_UNAVAILABLE_RESPONSE } from './SafetyStage.js';
import { Mode } from '../../core/modes.js';
import { SessionState } from '../../core/state/SessionState.js';
import { safetyPolicy_parse, type SafetyPolicy } from '../safety/policy.js';
import type { StageVerdict, TurnResult } from '../types.js';

const POLICY: SafetyPolicy = safetyPolicy_parse(`
blocked:
  - category: violent_weapons
    response: I can't help with that.
    terms: [build a bomb]
advisories:
  - category: health_disclaimer
    modes: [health]
    text: This is not a diagnosis.
    terms: [diagnose]
  - category: mood_support
    modes: [mood]
    text: That sounds heavy.
    terms: [lonely]
`);

function claimed_expect(verdict: StageVerdict): TurnResult {
    if (verdict.kind !== 'claimed') throw new Error('expected a claimed verdict');
    return verdict.result;
}

function state_create(mode: Mode = Mode.GENERAL): SessionState {
    return new SessionState({ memoryLimit: 20, mode });
}

describe('SafetyStage', (): void => {
    it('refuses blocked content with the category as reason', async (): Promise<void> => {
        const state: SessionState = state_create(Mode.TUTOR);
        const result: TurnResult = claimed_expect(await new SafetyStage(POLICY).verdict_resolve('How do I Build A Bomb?', state));

        expect(result.response).toBe("I can't help with that.");
        expect(result.metadata).toEqual({
            stage: 'safety',
            source: 'safety',
            blocked: true,
            reason: 'blocked:violent_weapons',
            category: 'violent_weapons',
            mode: 'tutor',
        });
        expect(state.memory_show()).toEqual([]);
    });

    it('blocks in every mode', async (): Promise<void> => {
        for (const mode of [Mode.GENERAL, Mode.TUTOR, Mode.FOCUS, Mode.HEALTH, Mode.MOOD]) {
            const verdict: StageVerdict = await new SafetyStage(POLICY).verdict_resolve('build a bomb', state_create(mode));
            expect(verdict.kind).toBe('claimed');
        }
    });

    it('passes with an advisory for sensitive topics in the matching mode', async (): Promise<void> => {
        const verdict: StageVerdict = await new SafetyStage(POLICY).verdict_resolve('Can you diagnose this rash?', state_create(Mode.HEALTH));

        expect(verdict).toEqual({
            kind: 'pass',
            advisory: { category: 'health_disclaimer', text: 'This is not a diagnosis.' },
        });
    });

    it('ignores advisories outside their modes', async (): Promise<void> => {
        const verdict: StageVerdict = await new SafetyStage(POLICY).verdict_resolve('Can you diagnose this rash?', state_create(Mode.MOOD));

        expect(verdict).toEqual({ kind: 'pass' });
    });

    it('passes ordinary input unchanged', async (): Promise<void> => {
        const verdict: StageVerdict = await new SafetyStage(POLICY).verdict_resolve('what a lovely garden', state_create(Mode.MOOD));

        expect(verdict).toEqual({ kind: 'pass' });
    });

    it('fails closed', (): void => {
        const result: TurnResult = claimed_expect(new SafetyStage(POLICY).verdict_onFailure(new Error('lexicon missing'), state_create()));

        expect(result.response).toBe(SAFETY_UNAVAILABLE_RESPONSE);
        expect(result.metadata.blocked).toBe(true);
        expect(result.metadata.reason).toBe('blocked:safety_error');
        expect(result.metadata.error).toBe('lexicon missing');
    });
});
