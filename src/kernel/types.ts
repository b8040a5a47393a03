/**
 * @file Kernel Types
 *
 * The routing contract: turn results, the claim/pass verdict every stage
 * returns, and the stage interfaces the router drives.
 *
 * @module kernel/types
 */

import type { SessionState } from '../core/state/SessionState.js';
import type { StageName } from '../telemetry/TelemetryBus.js';

export type { StageName };

export type MetadataValue = string | number | boolean | readonly string[];

export type TurnMetadata = Readonly<Record<string, MetadataValue>>;

/**
 * Final output of one routed turn. Frozen on construction.
 */
export interface TurnResult {
    readonly response: string;
    readonly metadata: TurnMetadata;
}

/**
 * Allowed-but-noteworthy finding raised by a stage that passes.
 * The router attaches it to whichever later stage claims the turn.
 */
export interface TurnAdvisory {
    readonly category: string;
    readonly text: string;
}

export interface ClaimedVerdict {
    readonly kind: 'claimed';
    readonly result: TurnResult;
}

export interface PassVerdict {
    readonly kind: 'pass';
    readonly advisory?: TurnAdvisory;
}

export type StageVerdict = ClaimedVerdict | PassVerdict;

/**
 * A stage that may claim the turn or pass it on.
 *
 * A pass must leave the session state untouched; state changes belong to
 * the claiming stage only.
 */
export interface GateStage<N extends Exclude<StageName, 'generation'> = Exclude<StageName, 'generation'>> {
    readonly name: N;
    verdict_resolve(input: string, state: SessionState): Promise<StageVerdict>;
    /** Verdict to use when `verdict_resolve` rejects. */
    verdict_onFailure(error: unknown, state: SessionState): StageVerdict;
}

/**
 * The last stage. Always claims.
 */
export interface TerminalStage {
    readonly name: 'generation';
    verdict_resolve(input: string, state: SessionState): Promise<ClaimedVerdict>;
    verdict_onFailure(error: unknown, state: SessionState): ClaimedVerdict;
}

/**
 * Frozen result. List values are copied and frozen too.
 */
export function turnResult_create(response: string, metadata: Record<string, MetadataValue>): TurnResult {
    const frozen: Record<string, MetadataValue> = {};
    for (const [key, value] of Object.entries(metadata)) {
        frozen[key] = typeof value === 'object' ? Object.freeze([...value]) : value;
    }
    return Object.freeze({
        response,
        metadata: Object.freeze(frozen),
    });
}

export function verdict_claim(response: string, metadata: Record<string, MetadataValue>): ClaimedVerdict {
    return { kind: 'claimed', result: turnResult_create(response, metadata) };
}

export function verdict_pass(advisory?: TurnAdvisory): PassVerdict {
    return advisory ? { kind: 'pass', advisory } : { kind: 'pass' };
}

export function error_message(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
