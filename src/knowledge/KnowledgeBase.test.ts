import { describe, it, expect } from 'vitest';
import { EmptyKnowledgeBase, NO_HITS, hit_top, type KnowledgeHit } from './KnowledgeBase.js';

describe('EmptyKnowledgeBase', (): void => {
    it('answers every query with the no-result sentinel', async (): Promise<void> => {
        const kb: EmptyKnowledgeBase = new EmptyKnowledgeBase();
        expect(await kb.search('mitochondria')).toBe(NO_HITS);
        expect(await kb.search('')).toHaveLength(0);
    });
});

describe('hit_top', (): void => {
    it('returns null for no hits', (): void => {
        expect(hit_top(NO_HITS)).toBeNull();
    });

    it('picks the highest confidence regardless of position', (): void => {
        const hits: KnowledgeHit[] = [
            { fact: 'low', confidence: 0.3 },
            { fact: 'high', confidence: 0.9 },
            { fact: 'mid', confidence: 0.6 },
        ];
        expect(hit_top(hits)?.fact).toBe('high');
    });

    it('keeps the earlier hit on ties', (): void => {
        const hits: KnowledgeHit[] = [
            { fact: 'first', confidence: 0.7 },
            { fact: 'second', confidence: 0.7 },
        ];
        expect(hit_top(hits)?.fact).toBe('first');
    });

    it('skips hits with unusable confidence or blank facts', (): void => {
        const hits: KnowledgeHit[] = [
            { fact: 'nan', confidence: Number.NaN },
            { fact: '   ', confidence: 0.99 },
            { fact: 'usable', confidence: 0.2 },
        ];
        expect(hit_top(hits)?.fact).toBe('usable');
    });
});
