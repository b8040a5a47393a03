/**
 * @file Knowledge Collaborator
 *
 * The call shape the router needs from a knowledge base, the empty
 * default implementation, and the strong-match selection helper.
 *
 * @module knowledge/KnowledgeBase
 */

export interface KnowledgeHit {
    fact: string;
    /** In [0, 1]. */
    confidence: number;
}

/**
 * Anything that can answer `search`. Implementations return hits in
 * ranked order, or `NO_HITS` when nothing matched.
 */
export interface KnowledgeSource {
    search(query: string): Promise<readonly KnowledgeHit[]>;
}

/** The "no result" answer. */
export const NO_HITS: readonly KnowledgeHit[] = Object.freeze([]);

/**
 * Knowledge base with no content. Every search yields `NO_HITS`.
 */
export class EmptyKnowledgeBase implements KnowledgeSource {
    async search(_query: string): Promise<readonly KnowledgeHit[]> {
        return NO_HITS;
    }
}

/**
 * Highest-confidence usable hit, or null when there is none.
 *
 * Hits with a non-finite confidence or an empty fact are ignored; ties
 * keep the earlier (higher-ranked) hit.
 */
export function hit_top(hits: readonly KnowledgeHit[]): KnowledgeHit | null {
    let best: KnowledgeHit | null = null;
    for (const hit of hits) {
        if (!Number.isFinite(hit.confidence) || hit.fact.trim().length === 0) continue;
        if (best === null || hit.confidence > best.confidence) {
            best = hit;
        }
    }
    return best;
}
