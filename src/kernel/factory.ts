/**
 * @file Router Factory
 *
 * Wires settings, collaborators and stages into a ready router plus the
 * session state it routes against.
 *
 * @module kernel/factory
 */

import { SessionState } from '../core/state/SessionState.js';
import type { ResolvedSettings } from '../config/settings.js';
import { EmptyKnowledgeBase, type KnowledgeSource } from '../knowledge/KnowledgeBase.js';
import { OpenAIClient } from '../llm/OpenAIClient.js';
import type { LLMClient } from '../llm/types.js';
import { TelemetryBus } from '../telemetry/TelemetryBus.js';
import { Router } from './Router.js';
import { safetyPolicy_load, type SafetyPolicy } from './safety/policy.js';
import { CommandStage } from './stages/CommandStage.js';
import { GenerationStage } from './stages/GenerationStage.js';
import { KnowledgeStage } from './stages/KnowledgeStage.js';
import { SafetyStage } from './stages/SafetyStage.js';

/**
 * Optional replacements for the default collaborators.
 */
export interface RouterCollaborators {
    knowledge?: KnowledgeSource;
    /** Null forces offline generation even when an API key is set. */
    llm?: LLMClient | null;
    policy?: SafetyPolicy;
    telemetry?: TelemetryBus;
}

export interface RouterAssembly {
    router: Router;
    telemetry: TelemetryBus;
}

export function router_assemble(settings: ResolvedSettings, collaborators: RouterCollaborators = {}): RouterAssembly {
    const telemetry: TelemetryBus = collaborators.telemetry ?? new TelemetryBus();
    const knowledge: KnowledgeSource = collaborators.knowledge ?? new EmptyKnowledgeBase();
    const policy: SafetyPolicy = collaborators.policy ?? safetyPolicy_load();
    const llm: LLMClient | null = collaborators.llm !== undefined ? collaborators.llm : llmClient_create(settings);

    const router: Router = new Router({
        command: new CommandStage(knowledge),
        safety: new SafetyStage(policy),
        knowledge: new KnowledgeStage(knowledge, settings.kb_threshold),
        generation: new GenerationStage({ client: llm, contextTurns: settings.context_turns, telemetry }),
    }, telemetry);

    return { router, telemetry };
}

/**
 * Fresh session state sized and flagged from settings.
 */
export function session_create(settings: ResolvedSettings): SessionState {
    return new SessionState({
        memoryLimit: settings.memory_limit,
        capabilities: { cloud_llm: settings.llm_api_key !== null },
    });
}

function llmClient_create(settings: ResolvedSettings): LLMClient | null {
    if (settings.llm_api_key === null) return null;
    return new OpenAIClient({
        apiKey: settings.llm_api_key,
        model: settings.llm_model,
        baseUrl: settings.llm_base_url,
        timeoutMs: settings.llm_timeout_ms,
    });
}
