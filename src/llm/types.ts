/**
 * @file LLM Types
 *
 * Chat message shapes and the completion contract the generation stage
 * depends on. Any chat-completion backend can sit behind `LLMClient`.
 *
 * @module llm/types
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
    role: ChatRole;
    content: string;
}

/**
 * Why a completion produced no usable text.
 */
export type CompletionFailureReason =
    | 'timeout'
    | 'network_error'
    | `http_${number}`
    | 'invalid_response'
    | 'empty_output';

export interface Completion {
    text: string;
    model: string;
}

export type CompletionResult =
    | { ok: true; value: Completion }
    | { ok: false; error: CompletionFailureReason; detail: string };

export interface LLMClient {
    /**
     * Request one completion. Resolves with a failure result rather than
     * rejecting when the backend cannot answer.
     */
    complete(messages: readonly ChatMessage[]): Promise<CompletionResult>;
}
