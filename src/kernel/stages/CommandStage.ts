/**
 * @file Command Stage
 *
 * First stage. Recognizes control syntax on the trimmed input and fully
 * handles it:
 *
 *   mode:<name>        switch assistant mode
 *   status             session summary
 *   kb:search <query>  raw knowledge search, no confidence gate
 *   memory:show        short-term memory listing
 *
 * A recognized command with a bad argument still claims the turn with an
 * error response. Anything else passes.
 *
 * @module kernel/stages/CommandStage
 */

import { MODES_ALL, mode_parse, type Mode } from '../../core/modes.js';
import {
    CAPABILITY_FLAGS,
    type CapabilityFlag,
    type MemoryEntry,
    type SessionState,
    type SessionStatus,
} from '../../core/state/SessionState.js';
import type { KnowledgeHit, KnowledgeSource } from '../../knowledge/KnowledgeBase.js';
import {
    error_message,
    verdict_claim,
    verdict_pass,
    type GateStage,
    type MetadataValue,
    type StageVerdict,
} from '../types.js';

const KB_SEARCH_PATTERN: RegExp = /^kb:search(?:\s+([\s\S]*))?$/i;

export class CommandStage implements GateStage<'command'> {
    public readonly name = 'command' as const;

    constructor(private readonly knowledge: KnowledgeSource) {}

    public async verdict_resolve(input: string, state: SessionState): Promise<StageVerdict> {
        const trimmed: string = input.trim();
        const lowered: string = trimmed.toLowerCase();

        if (lowered.startsWith('mode:')) {
            return this.mode_handle(trimmed.slice('mode:'.length), state);
        }

        if (lowered === 'status') {
            return this.status_handle(state);
        }

        const kbMatch: RegExpMatchArray | null = trimmed.match(KB_SEARCH_PATTERN);
        if (kbMatch) {
            return this.kbSearch_handle((kbMatch[1] ?? '').trim());
        }

        if (lowered === 'memory:show') {
            return this.memory_handle(state);
        }

        return verdict_pass();
    }

    public verdict_onFailure(error: unknown): StageVerdict {
        return verdict_claim(`Command failed: ${error_message(error)}`, this.metadata_create('unknown', 'command', false, {
            error: error_message(error),
        }));
    }

    private mode_handle(rawName: string, state: SessionState): StageVerdict {
        const name: string = rawName.trim();
        const mode: Mode | null = mode_parse(name);
        if (mode === null) {
            return verdict_claim(
                `Unknown mode '${name}'. Allowed: ${MODES_ALL.join(', ')}.`,
                this.metadata_create('mode', 'command', false, { mode: state.mode_get() })
            );
        }

        state.mode_set(mode);
        return verdict_claim(`Mode set to ${mode}.`, this.metadata_create('mode', 'command', true, { mode }));
    }

    private status_handle(state: SessionState): StageVerdict {
        const status: SessionStatus = state.status();
        const rendered: string = CAPABILITY_FLAGS
            .map((flag: CapabilityFlag): string => `${flag}=${status.capabilities[flag] ? 'on' : 'off'}`)
            .join(', ');

        return verdict_claim(
            `mode=${status.mode}; memory=${status.memoryCount}/${status.memoryLimit}; capabilities: ${rendered}`,
            this.metadata_create('status', 'command', true, {
                mode: status.mode,
                memory_count: status.memoryCount,
                memory_limit: status.memoryLimit,
                capabilities: CAPABILITY_FLAGS.filter((flag: CapabilityFlag): boolean => status.capabilities[flag]),
            })
        );
    }

    private async kbSearch_handle(query: string): Promise<StageVerdict> {
        if (!query) {
            return verdict_claim('Usage: kb:search <query>', this.metadata_create('kb_search', 'kb_command', false, { count: 0 }));
        }

        let hits: readonly KnowledgeHit[];
        try {
            hits = await this.knowledge.search(query);
        } catch (error: unknown) {
            return verdict_claim(
                `Knowledge search failed: ${error_message(error)}`,
                this.metadata_create('kb_search', 'kb_command', false, { query, count: 0, error: error_message(error) })
            );
        }

        const response: string = hits.length === 0
            ? `No knowledge entries matched "${query}".`
            : hits.map((hit: KnowledgeHit): string => `${hit.confidence.toFixed(2)}  ${hit.fact}`).join('\n');

        return verdict_claim(response, this.metadata_create('kb_search', 'kb_command', true, { query, count: hits.length }));
    }

    private memory_handle(state: SessionState): StageVerdict {
        const entries: MemoryEntry[] = state.memory_show();
        const response: string = entries.length === 0
            ? 'Memory is empty.'
            : entries.map((entry: MemoryEntry, index: number): string => `${index + 1}. ${entry.role}: ${entry.content}`).join('\n');

        return verdict_claim(response, this.metadata_create('memory_show', 'command', true, { count: entries.length }));
    }

    private metadata_create(
        command: string,
        source: 'command' | 'kb_command',
        success: boolean,
        extra: Record<string, MetadataValue>
    ): Record<string, MetadataValue> {
        return { stage: this.name, source, command, success, ...extra };
    }
}
