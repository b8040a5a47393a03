/**
 * @file Safety Stage
 *
 * Screens input against the disallowed-content policy. Blocked input is
 * claimed with a refusal in every mode; mode-specific advisories pass the
 * turn on with a note for the claiming stage.
 *
 * @module kernel/stages/SafetyStage
 */

import type { SessionState } from '../../core/state/SessionState.js';
import { advisoryRule_match, blockRule_match, type AdvisoryRule, type BlockRule, type SafetyPolicy } from '../safety/policy.js';
import { error_message, verdict_claim, verdict_pass, type GateStage, type StageVerdict } from '../types.js';

/** Refusal used when the check itself cannot run. */
export const SAFETY_UNAVAILABLE_RESPONSE: string =
    "I can't process that request right now because the safety check is unavailable.";

export class SafetyStage implements GateStage<'safety'> {
    public readonly name = 'safety' as const;

    constructor(private readonly policy: SafetyPolicy) {}

    public async verdict_resolve(input: string, state: SessionState): Promise<StageVerdict> {
        const blocked: BlockRule | null = blockRule_match(this.policy, input);
        if (blocked) {
            return verdict_claim(blocked.response, {
                stage: this.name,
                source: 'safety',
                blocked: true,
                reason: `blocked:${blocked.category}`,
                category: blocked.category,
                mode: state.mode_get(),
            });
        }

        const advisory: AdvisoryRule | null = advisoryRule_match(this.policy, input, state.mode_get());
        if (advisory) {
            return verdict_pass({ category: advisory.category, text: advisory.text });
        }

        return verdict_pass();
    }

    /**
     * Fail closed: an input that could not be screened is refused.
     */
    public verdict_onFailure(error: unknown, state: SessionState): StageVerdict {
        return verdict_claim(SAFETY_UNAVAILABLE_RESPONSE, {
            stage: this.name,
            source: 'safety',
            blocked: true,
            reason: 'blocked:safety_error',
            error: error_message(error),
            mode: state.mode_get(),
        });
    }
}
