/**
 * @file Router
 *
 * Strict-precedence dispatch for one turn of input:
 *
 *   Command → Safety → Knowledge → Generation
 *
 * The first stage to claim answers the turn. Generation is terminal and
 * always claims. Order is fixed by the constructor's named slots and is
 * never changed after construction. A stage that throws is replaced by
 * its own failure verdict, so `route()` always resolves.
 *
 * @module kernel/Router
 */

import type { SessionState } from '../core/state/SessionState.js';
import { TelemetryBus } from '../telemetry/TelemetryBus.js';
import {
    error_message,
    turnResult_create,
    type ClaimedVerdict,
    type GateStage,
    type MetadataValue,
    type StageVerdict,
    type TerminalStage,
    type TurnAdvisory,
    type TurnResult,
} from './types.js';

export interface RouterStages {
    command: GateStage<'command'>;
    safety: GateStage<'safety'>;
    knowledge: GateStage<'knowledge'>;
    generation: TerminalStage;
}

export class Router {
    private readonly gates: readonly GateStage[];
    private readonly terminal: TerminalStage;

    constructor(
        stages: RouterStages,
        private readonly telemetry: TelemetryBus = new TelemetryBus()
    ) {
        this.gates = Object.freeze([stages.command, stages.safety, stages.knowledge]);
        this.terminal = stages.generation;
    }

    /**
     * Route one utterance and return the result of the claiming stage.
     */
    public async route(input: string, state: SessionState): Promise<TurnResult> {
        let advisory: TurnAdvisory | undefined;

        for (const stage of this.gates) {
            const verdict: StageVerdict = await this.gate_run(stage, input, state);
            if (verdict.kind === 'claimed') {
                return this.claim_finish(stage.name, verdict, advisory);
            }

            this.telemetry.emit({ type: 'stage_pass', stage: stage.name });
            if (verdict.advisory && !advisory) {
                advisory = verdict.advisory;
                this.telemetry.emit({ type: 'advisory', category: advisory.category });
            }
        }

        const verdict: ClaimedVerdict = await this.terminal_run(input, state);
        return this.claim_finish(this.terminal.name, verdict, advisory);
    }

    private async gate_run(stage: GateStage, input: string, state: SessionState): Promise<StageVerdict> {
        try {
            return await stage.verdict_resolve(input, state);
        } catch (error: unknown) {
            this.telemetry.emit({ type: 'stage_error', stage: stage.name, message: error_message(error) });
            return stage.verdict_onFailure(error, state);
        }
    }

    private async terminal_run(input: string, state: SessionState): Promise<ClaimedVerdict> {
        try {
            return await this.terminal.verdict_resolve(input, state);
        } catch (error: unknown) {
            this.telemetry.emit({ type: 'stage_error', stage: this.terminal.name, message: error_message(error) });
            return this.terminal.verdict_onFailure(error, state);
        }
    }

    private claim_finish(stage: GateStage['name'] | TerminalStage['name'], verdict: ClaimedVerdict, advisory: TurnAdvisory | undefined): TurnResult {
        const result: TurnResult = advisory ? result_annotate(verdict.result, advisory) : verdict.result;
        const source: MetadataValue | undefined = result.metadata['source'];
        this.telemetry.emit({ type: 'stage_claim', stage, source: typeof source === 'string' ? source : 'unknown' });
        return result;
    }
}

/**
 * Prefix the advisory text and record its category.
 */
export function result_annotate(result: TurnResult, advisory: TurnAdvisory): TurnResult {
    return turnResult_create(`${advisory.text} ${result.response}`, {
        ...result.metadata,
        advisory: advisory.category,
    });
}
