/**
 * @file Session State
 *
 * Per-conversation state: current mode, bounded short-term memory and
 * capability flags. One instance per session; it is handed explicitly to
 * the router on every turn and is never shared between sessions.
 *
 * @module core/state/SessionState
 */

import { Mode } from '../modes.js';

export type MemoryRole = 'user' | 'assistant';

export interface MemoryEntry {
    role: MemoryRole;
    content: string;
}

/** Capability flags reported by `status`. Routing does not consult them. */
export type CapabilityFlag =
    | 'camera_available'
    | 'cloud_llm'
    | 'commands'
    | 'knowledge'
    | 'safety';

/** Every capability flag, in name order. */
export const CAPABILITY_FLAGS: readonly CapabilityFlag[] = ['camera_available', 'cloud_llm', 'commands', 'knowledge', 'safety'];

export type Capabilities = Readonly<Record<CapabilityFlag, boolean>>;

export interface SessionStatus {
    mode: Mode;
    memoryCount: number;
    memoryLimit: number;
    capabilities: Capabilities;
}

export interface SessionStateOptions {
    memoryLimit: number;
    mode?: Mode;
    capabilities?: Partial<Capabilities>;
}

const CAPABILITIES_DEFAULT: Capabilities = {
    camera_available: false,
    cloud_llm: false,
    commands: true,
    knowledge: true,
    safety: true,
};

export class SessionState {
    private mode: Mode;
    private memory: MemoryEntry[] = [];
    private readonly memoryLimit: number;
    private readonly capabilities: Capabilities;

    constructor(options: SessionStateOptions) {
        if (!Number.isInteger(options.memoryLimit) || options.memoryLimit < 1) {
            throw new RangeError(`memoryLimit must be a positive integer, got ${options.memoryLimit}`);
        }
        this.mode = options.mode ?? Mode.GENERAL;
        this.memoryLimit = options.memoryLimit;
        this.capabilities = { ...CAPABILITIES_DEFAULT, ...options.capabilities };
    }

    public mode_get(): Mode {
        return this.mode;
    }

    public mode_set(mode: Mode): void {
        this.mode = mode;
    }

    /**
     * Append one entry, evicting the oldest entries beyond the limit.
     */
    public memory_append(entry: MemoryEntry): void {
        this.memory.push({ ...entry });
        const overflow: number = this.memory.length - this.memoryLimit;
        if (overflow > 0) {
            this.memory.splice(0, overflow);
        }
    }

    /**
     * Oldest-first copy of the remembered entries.
     */
    public memory_show(): MemoryEntry[] {
        return this.memory.map((entry: MemoryEntry): MemoryEntry => ({ ...entry }));
    }

    /**
     * The most recent `count` entries, oldest first.
     */
    public memory_recent(count: number): MemoryEntry[] {
        if (count <= 0) return [];
        return this.memory_show().slice(-count);
    }

    public status(): SessionStatus {
        return {
            mode: this.mode,
            memoryCount: this.memory.length,
            memoryLimit: this.memoryLimit,
            capabilities: { ...this.capabilities },
        };
    }
}
