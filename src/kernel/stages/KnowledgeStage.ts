/**
 * @file Knowledge Stage
 *
 * Answers from the knowledge base when its best hit reaches the
 * confidence threshold. Weaker hits, no hits and lookup failures all
 * pass the turn on to generation.
 *
 * @module kernel/stages/KnowledgeStage
 */

import type { SessionState } from '../../core/state/SessionState.js';
import { hit_top, type KnowledgeHit, type KnowledgeSource } from '../../knowledge/KnowledgeBase.js';
import { verdict_claim, verdict_pass, type GateStage, type StageVerdict } from '../types.js';

export class KnowledgeStage implements GateStage<'knowledge'> {
    public readonly name = 'knowledge' as const;

    /**
     * @param threshold - Minimum confidence for a claim, inclusive.
     */
    constructor(
        private readonly knowledge: KnowledgeSource,
        private readonly threshold: number
    ) {}

    public async verdict_resolve(input: string, state: SessionState): Promise<StageVerdict> {
        const hits: readonly KnowledgeHit[] = await this.knowledge.search(input.trim());
        const top: KnowledgeHit | null = hit_top(hits);
        if (top === null || top.confidence < this.threshold) {
            return verdict_pass();
        }

        state.memory_append({ role: 'user', content: input });
        state.memory_append({ role: 'assistant', content: top.fact });
        return verdict_claim(top.fact, {
            stage: this.name,
            source: 'kb',
            confidence: top.confidence,
        });
    }

    /** Knowledge is optional; a failed lookup defers to generation. */
    public verdict_onFailure(): StageVerdict {
        return verdict_pass();
    }
}
