/**
 * @file Runtime Settings Service
 *
 * Session-level runtime settings with central validation and
 * deterministic precedence (explicit override > env > defaults).
 *
 * @module config/settings
 */

import { z } from 'zod';

export interface NumericSettings {
    kb_threshold: number;
    memory_limit: number;
    llm_timeout_ms: number;
    context_turns: number;
}

export type NumericSettingKey = keyof NumericSettings;

export interface ResolvedSettings extends NumericSettings {
    llm_model: string;
    llm_base_url: string;
    llm_api_key: string | null;
}

export type SettingSource = 'override' | 'env' | 'default';

export type EnvRecord = Readonly<Record<string, string | undefined>>;

interface NumericDefinition {
    env: string;
    fallback: number;
    min: number;
    max: number;
    integer: boolean;
}

const NUMERIC_DEFINITIONS: Readonly<Record<NumericSettingKey, NumericDefinition>> = {
    kb_threshold:   { env: 'BRAINFRAME_KB_THRESHOLD',   fallback: 0.8,    min: 0,    max: 1,      integer: false },
    memory_limit:   { env: 'BRAINFRAME_MEMORY_LIMIT',   fallback: 20,     min: 1,    max: 500,    integer: true },
    llm_timeout_ms: { env: 'BRAINFRAME_LLM_TIMEOUT_MS', fallback: 20_000, min: 1000, max: 120_000, integer: true },
    context_turns:  { env: 'BRAINFRAME_CONTEXT_TURNS',  fallback: 6,      min: 0,    max: 50,     integer: true },
};

const NUMERIC_KEYS: readonly NumericSettingKey[] = ['kb_threshold', 'memory_limit', 'llm_timeout_ms', 'context_turns'];

const DEFAULT_MODEL: string = 'gpt-4o-mini';
const DEFAULT_BASE_URL: string = 'https://api.openai.com/v1';

const BaseUrlSchema = z.string().url();

export class SettingsService {
    private readonly overrides: Partial<NumericSettings> = {};

    constructor(private readonly env: EnvRecord = process.env) {}

    /**
     * Effective settings after override/env/default resolution.
     */
    public snapshot(): ResolvedSettings {
        return {
            kb_threshold: this.value_resolve('kb_threshold'),
            memory_limit: this.value_resolve('memory_limit'),
            llm_timeout_ms: this.value_resolve('llm_timeout_ms'),
            context_turns: this.value_resolve('context_turns'),
            llm_model: this.model_resolve(),
            llm_base_url: this.baseUrl_resolve(),
            llm_api_key: this.apiKey_resolve(),
        };
    }

    /**
     * Set one explicit override with validation.
     */
    public set(key: NumericSettingKey, value: unknown): { ok: true; value: number } | { ok: false; error: string } {
        const definition: NumericDefinition | undefined = NUMERIC_DEFINITIONS[key];
        if (!definition) {
            return { ok: false, error: `Unknown setting key: ${String(key)}` };
        }

        const parsed: number | undefined = typeof value === 'number' ? value : this.numeric_parse(String(value));
        if (parsed === undefined || !Number.isFinite(parsed)) {
            return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
        }

        const clamped: number = this.value_normalize(key, parsed);
        this.overrides[key] = clamped;
        return { ok: true, value: clamped };
    }

    public unset(key: NumericSettingKey): void {
        delete this.overrides[key];
    }

    public value_resolve(key: NumericSettingKey): number {
        const override: number | undefined = this.overrides[key];
        if (typeof override === 'number') return override;

        const envValue: number | undefined = this.envNumeric_resolve(key);
        if (typeof envValue === 'number') return this.value_normalize(key, envValue);

        return NUMERIC_DEFINITIONS[key].fallback;
    }

    public source_resolve(key: NumericSettingKey): SettingSource {
        if (typeof this.overrides[key] === 'number') return 'override';
        if (typeof this.envNumeric_resolve(key) === 'number') return 'env';
        return 'default';
    }

    /**
     * Environment values that were present but ignored.
     */
    public warnings_list(): string[] {
        const warnings: string[] = [];
        for (const key of NUMERIC_KEYS) {
            const definition: NumericDefinition = NUMERIC_DEFINITIONS[key];
            const raw: string | undefined = this.envRaw_get(definition.env);
            if (raw !== undefined && this.envNumeric_resolve(key) === undefined) {
                warnings.push(`Ignoring ${definition.env}=${JSON.stringify(raw)}: not a number; using ${definition.fallback}`);
            }
        }

        const rawUrl: string | undefined = this.envRaw_get('OPENAI_BASE_URL');
        if (rawUrl !== undefined && !BaseUrlSchema.safeParse(rawUrl).success) {
            warnings.push(`Ignoring OPENAI_BASE_URL=${JSON.stringify(rawUrl)}: not a URL; using ${DEFAULT_BASE_URL}`);
        }
        return warnings;
    }

    private model_resolve(): string {
        return this.envRaw_get('OPENAI_MODEL') ?? DEFAULT_MODEL;
    }

    private baseUrl_resolve(): string {
        const raw: string | undefined = this.envRaw_get('OPENAI_BASE_URL');
        if (raw === undefined || !BaseUrlSchema.safeParse(raw).success) return DEFAULT_BASE_URL;
        return raw.replace(/\/+$/, '');
    }

    private apiKey_resolve(): string | null {
        return this.envRaw_get('OPENAI_API_KEY') ?? null;
    }

    private envNumeric_resolve(key: NumericSettingKey): number | undefined {
        const raw: string | undefined = this.envRaw_get(NUMERIC_DEFINITIONS[key].env);
        return raw === undefined ? undefined : this.numeric_parse(raw);
    }

    /** Blank values count as unset. */
    private envRaw_get(name: string): string | undefined {
        const raw: string | undefined = this.env[name];
        if (raw === undefined) return undefined;
        const trimmed: string = raw.trim();
        return trimmed.length > 0 ? trimmed : undefined;
    }

    private numeric_parse(raw: string): number | undefined {
        const trimmed: string = raw.trim();
        if (trimmed.length === 0) return undefined;
        const parsed: number = Number(trimmed);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private value_normalize(key: NumericSettingKey, value: number): number {
        const definition: NumericDefinition = NUMERIC_DEFINITIONS[key];
        const rounded: number = definition.integer ? Math.round(value) : value;
        return Math.max(definition.min, Math.min(definition.max, rounded));
    }
}
