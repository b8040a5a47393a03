/**
 * @file OpenAI Chat Client
 *
 * Chat-completions client for OpenAI and compatible endpoints, over the
 * global fetch. Every request carries a timeout; transport, HTTP and
 * payload problems come back as typed failure results.
 *
 * @module llm/OpenAIClient
 */

import { z } from 'zod';
import type { ChatMessage, CompletionResult, LLMClient } from './types.js';

export interface OpenAIClientConfig {
    apiKey: string;
    model: string;
    /** Base URL without trailing slash, e.g. https://api.openai.com/v1 */
    baseUrl: string;
    timeoutMs: number;
}

const ChatCompletionSchema = z.object({
    model: z.string().optional(),
    choices: z.array(z.object({
        message: z.object({
            content: z.string().nullable(),
        }),
    })).min(1),
});

export class OpenAIClient implements LLMClient {
    constructor(private readonly config: OpenAIClientConfig) {}

    public async complete(messages: readonly ChatMessage[]): Promise<CompletionResult> {
        let response: Response;
        try {
            response = await fetch(`${this.config.baseUrl}/chat/completions`, {
                method: 'POST',
                headers: {
                    'Authorization': `Bearer ${this.config.apiKey}`,
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify({
                    model: this.config.model,
                    messages: messages.map((m: ChatMessage): ChatMessage => ({ role: m.role, content: m.content })),
                }),
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
        } catch (error: unknown) {
            if (abortError_is(error)) {
                return { ok: false, error: 'timeout', detail: `no response within ${this.config.timeoutMs}ms` };
            }
            return { ok: false, error: 'network_error', detail: error instanceof Error ? error.message : String(error) };
        }

        if (!response.ok) {
            return { ok: false, error: `http_${response.status}`, detail: response.statusText || `HTTP ${response.status}` };
        }

        let payload: unknown;
        try {
            payload = await response.json();
        } catch (error: unknown) {
            if (abortError_is(error)) {
                return { ok: false, error: 'timeout', detail: `no response within ${this.config.timeoutMs}ms` };
            }
            return { ok: false, error: 'invalid_response', detail: 'response body is not JSON' };
        }

        const parsed = ChatCompletionSchema.safeParse(payload);
        if (!parsed.success) {
            return { ok: false, error: 'invalid_response', detail: parsed.error.issues[0].message };
        }

        const text: string = (parsed.data.choices[0].message.content ?? '').trim();
        if (!text) {
            return { ok: false, error: 'empty_output', detail: 'model returned no text' };
        }

        return { ok: true, value: { text, model: parsed.data.model ?? this.config.model } };
    }
}

function abortError_is(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('name' in error)) return false;
    return error.name === 'TimeoutError' || error.name === 'AbortError';
}
