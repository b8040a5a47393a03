/**
 * @file Safety Policy
 *
 * Loads the disallowed-content lexicon from YAML and matches input
 * against it, term by term on word boundaries. Blocks apply in every mode; advisories only in the modes
 * they list.
 *
 * @module kernel/safety/policy
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import { z } from 'zod';
import { Mode } from '../../core/modes.js';

const TermsSchema = z.array(z.string().trim().min(1).transform((term: string): string => term.toLowerCase())).min(1);

/**
 * Whole-word matcher for one term: "want to die" does not match inside
 * "want to diet".
 */
function term_compile(term: string): RegExp {
    const escaped: string = term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`(?<![\\w])${escaped}(?![\\w])`, 'i');
}

function patterns_attach<T extends { terms: string[] }>(rule: T): T & { patterns: RegExp[] } {
    return { ...rule, patterns: rule.terms.map(term_compile) };
}

const BlockRuleSchema = z.object({
    category: z.string().min(1),
    response: z.string().min(1),
    terms: TermsSchema,
}).transform(patterns_attach);

const AdvisoryRuleSchema = z.object({
    category: z.string().min(1),
    modes: z.array(z.nativeEnum(Mode)).min(1),
    text: z.string().min(1),
    terms: TermsSchema,
}).transform(patterns_attach);

export const SafetyPolicySchema = z.object({
    blocked: z.array(BlockRuleSchema),
    advisories: z.array(AdvisoryRuleSchema).default([]),
});

export type SafetyPolicy = z.infer<typeof SafetyPolicySchema>;
export type BlockRule = z.infer<typeof BlockRuleSchema>;
export type AdvisoryRule = z.infer<typeof AdvisoryRuleSchema>;

/** Location of the lexicon shipped with the project. */
export const SAFETY_POLICY_PATH: string = fileURLToPath(new URL('../../../data/safety-policy.yaml', import.meta.url));

/**
 * Parse and validate policy YAML.
 *
 * @throws Error naming the first invalid field.
 */
export function safetyPolicy_parse(source: string): SafetyPolicy {
    const raw: unknown = yaml.load(source);
    const result = SafetyPolicySchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new Error(`Invalid safety policy at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
    }
    return result.data;
}

export function safetyPolicy_load(filePath: string = SAFETY_POLICY_PATH): SafetyPolicy {
    return safetyPolicy_parse(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * First block rule with a term appearing as whole words in the input.
 */
export function blockRule_match(policy: SafetyPolicy, input: string): BlockRule | null {
    return policy.blocked.find((rule: BlockRule): boolean => patterns_matchAny(input, rule.patterns)) ?? null;
}

/**
 * First advisory that applies to the mode and matches the input.
 */
export function advisoryRule_match(policy: SafetyPolicy, input: string, mode: Mode): AdvisoryRule | null {
    return policy.advisories.find((rule: AdvisoryRule): boolean =>
        rule.modes.includes(mode) && patterns_matchAny(input, rule.patterns)
    ) ?? null;
}

function patterns_matchAny(input: string, patterns: readonly RegExp[]): boolean {
    return patterns.some((pattern: RegExp): boolean => pattern.test(input));
}
