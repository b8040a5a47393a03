/**
 * @file Generation Stage
 *
 * Terminal stage. Asks the language model for a reply shaped by the mode
 * hint and recent memory; when no model is configured or the call fails,
 * answers with the fixed offline template instead. Always claims.
 *
 * @module kernel/stages/GenerationStage
 */

import { modeHint_render, type Mode } from '../../core/modes.js';
import type { MemoryEntry, SessionState } from '../../core/state/SessionState.js';
import type { ChatMessage, CompletionResult, LLMClient } from '../../llm/types.js';
import type { TelemetryBus } from '../../telemetry/TelemetryBus.js';
import { error_message, verdict_claim, type ClaimedVerdict, type TerminalStage } from '../types.js';

export const OFFLINE_RESPONSE: string =
    "I'm running offline right now, so I can't give a full answer. " +
    'Commands still work: status, mode:<name>, kb:search <query>, memory:show.';

export interface GenerationStageOptions {
    /** Null runs the stage permanently offline. */
    client: LLMClient | null;
    /** Memory entries sent as conversation context. */
    contextTurns: number;
    telemetry?: TelemetryBus;
}

export class GenerationStage implements TerminalStage {
    public readonly name = 'generation' as const;
    private readonly client: LLMClient | null;
    private readonly contextTurns: number;
    private readonly telemetry: TelemetryBus | undefined;

    constructor(options: GenerationStageOptions) {
        this.client = options.client;
        this.contextTurns = options.contextTurns;
        this.telemetry = options.telemetry;
    }

    public async verdict_resolve(input: string, state: SessionState): Promise<ClaimedVerdict> {
        const mode: Mode = state.mode_get();
        if (this.client === null) {
            return this.offline_claim(input, state, 'missing_api_key');
        }

        const started: number = Date.now();
        const result: CompletionResult = await this.client.complete(messages_build(input, state, this.contextTurns));
        this.telemetry?.emit({
            type: 'llm_result',
            ok: result.ok,
            detail: result.ok ? result.value.model : result.error,
            elapsedMs: Date.now() - started,
        });

        if (!result.ok) {
            return this.offline_claim(input, state, result.error);
        }

        this.exchange_remember(state, input, result.value.text);
        return verdict_claim(result.value.text, {
            stage: this.name,
            source: 'llm',
            model: result.value.model,
            mode,
        });
    }

    /**
     * Offline answer for a turn whose generation threw. Memory is left as is.
     */
    public verdict_onFailure(error: unknown, state: SessionState): ClaimedVerdict {
        return verdict_claim(OFFLINE_RESPONSE, {
            stage: this.name,
            source: 'offline',
            error: `internal_error: ${error_message(error)}`,
            mode: state.mode_get(),
        });
    }

    private offline_claim(input: string, state: SessionState, reason: string): ClaimedVerdict {
        this.exchange_remember(state, input, OFFLINE_RESPONSE);
        return verdict_claim(OFFLINE_RESPONSE, {
            stage: this.name,
            source: 'offline',
            error: reason,
            mode: state.mode_get(),
        });
    }

    private exchange_remember(state: SessionState, input: string, reply: string): void {
        state.memory_append({ role: 'user', content: input });
        state.memory_append({ role: 'assistant', content: reply });
    }
}

/**
 * Prompt for one turn: system line with the mode hint, the most recent
 * memory entries, then the new user message.
 */
export function messages_build(input: string, state: SessionState, contextTurns: number): ChatMessage[] {
    const mode: Mode = state.mode_get();
    const system: ChatMessage = {
        role: 'system',
        content: `You are a helpful conversational assistant. Current mode: ${mode} (${modeHint_render(mode)}).`,
    };
    const history: ChatMessage[] = state
        .memory_recent(contextTurns)
        .map((entry: MemoryEntry): ChatMessage => ({ role: entry.role, content: entry.content }));
    return [system, ...history, { role: 'user', content: input }];
}
