/**
 * Built-in guardrail checks.
 *
 * A check inspects the program source (phase `code`, before execution) or the
 * program source together with its outcome (phase `outcome`, after
 * execution) and returns a violation or null.
 */

import { isPlainObject, readKeyVariant } from './json_value';
import { Outcome } from './outcome';
import { ERROR_TYPES, GuardrailClass } from './structured_error';
import { findExecutableMetadata } from './tool_registry';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type GuardrailPhase = 'code' | 'outcome';

export interface GuardrailInput {
    role: string;
    method: string;
    code: string;
    /** Metadata view exposed to programs as `context.tools`. */
    tools: unknown;
    /** Present for the outcome phase only. */
    outcome?: Outcome;
}

export interface GuardrailViolation {
    type: string;
    subtype: string;
    message: string;
    requiredCorrection: string;
    location: string | null;
    guardrailClass: GuardrailClass;
}

export interface GuardrailCheck {
    id: string;
    phase: GuardrailPhase;
    evaluate(input: GuardrailInput): GuardrailViolation | null;
}

/* -------------------------------------------------------------------------- */
/* Classification                                                             */
/* -------------------------------------------------------------------------- */

export const TERMINAL_GUARDRAIL_PATTERNS: readonly RegExp[] = [
    /missing credential/i,
    /api key/i,
    /unsupported runtime capability/i,
    /external service unavailable/i,
];

export function guardrailClassFor(message: string): GuardrailClass {
    return TERMINAL_GUARDRAIL_PATTERNS.some(p => p.test(message)) ? 'terminal_guardrail' : 'recoverable_guardrail';
}

export function violation(params: {
    subtype: string;
    message: string;
    requiredCorrection: string;
    location?: string | null;
}): GuardrailViolation {
    return {
        type: ERROR_TYPES.TOOL_REGISTRY_VIOLATION,
        subtype: params.subtype,
        message: params.message,
        requiredCorrection: params.requiredCorrection,
        location: params.location ?? null,
        guardrailClass: guardrailClassFor(params.message),
    };
}

/* -------------------------------------------------------------------------- */
/* Source helpers                                                             */
/* -------------------------------------------------------------------------- */

/** Drops block comments and `//` line comments that start a line or follow whitespace. */
export function stripComments(source: string): string {
    return source
        .replace(/\/\*[\s\S]*?\*\//g, '')
        .replace(/(^|\s)\/\/.*$/gm, '$1');
}

function lineOf(source: string, index: number): string {
    return `generated_program.js:${source.slice(0, index).split('\n').length}`;
}

function firstMatch(source: string, pattern: RegExp): { index: number; text: string } | null {
    const m = pattern.exec(source);
    return m ? { index: m.index, text: m[0] } : null;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/* -------------------------------------------------------------------------- */
/* method_redefinition                                                        */
/* -------------------------------------------------------------------------- */

const REDEFINITION_PATTERN = /\bObject\s*\.\s*(defineProperty|defineProperties|setPrototypeOf)\s*\(|\b__proto__\b/;

export const methodRedefinitionCheck: GuardrailCheck = {
    id: 'method_redefinition',
    phase: 'code',
    evaluate({ code }) {
        const source = stripComments(code);
        const hit = firstMatch(source, REDEFINITION_PATTERN);
        if (!hit) return null;
        return violation({
            subtype: 'singleton_method_mutation',
            message: `Defining methods on delegated handles is not supported; use delegate()/tool() call paths (found \`${hit.text.trim()}\`).`,
            requiredCorrection:
                'Obtain handles with tool("name") or delegate("name", {...}) and invoke them with handle.call("method", args, kwargs); do not define properties or prototypes.',
            location: lineOf(source, hit.index),
        });
    },
};

/* -------------------------------------------------------------------------- */
/* context_tools_shape_misuse                                                 */
/* -------------------------------------------------------------------------- */

const TOOLS_AS_ARRAY_PATTERNS: readonly RegExp[] = [
    /\b(?:context|memory)\s*\.\s*tools\s*\.\s*(?:find|filter|map|forEach|some|every|length|reduce|findIndex|includes)\b/,
    /\b(?:context|memory)\s*\.\s*tools\s*\[\s*\d+\s*\]/,
    /\bfor\s*\(\s*(?:const|let|var)\s+[\w$[\]{},\s]+\s+of\s+(?:context|memory)\s*\.\s*tools\s*\)/,
];

export const contextToolsShapeCheck: GuardrailCheck = {
    id: 'context_tools_shape_misuse',
    phase: 'code',
    evaluate({ code }) {
        const source = stripComments(code);
        for (const pattern of TOOLS_AS_ARRAY_PATTERNS) {
            const hit = firstMatch(source, pattern);
            if (!hit) continue;
            return violation({
                subtype: 'context_tools_shape_misuse',
                message: 'context.tools is an object keyed by tool name; it is not an array.',
                requiredCorrection:
                    'Check existence with `"tool_name" in context.tools`, or iterate `Object.entries(context.tools)` as [toolName, metadata] pairs.',
                location: lineOf(source, hit.index),
            });
        }
        return null;
    },
};

/* -------------------------------------------------------------------------- */
/* hardcoded_external_fallback_success                                        */
/* -------------------------------------------------------------------------- */

const FETCH_LIKE = /\bfetch\s*\(|tool\(\s*['"]web_fetcher['"]\s*\)|\bfetch_?result\b|\bhttps?\s*\.\s*(?:get|request)\s*\(/i;

export const hardcodedFallbackCheck: GuardrailCheck = {
    id: 'hardcoded_external_fallback_success',
    phase: 'code',
    evaluate({ code }) {
        const source = stripComments(code);
        if (!FETCH_LIKE.test(source)) return null;
        const decl = /\b(fallback[A-Z_][\w$]*)\s*=\s*\[/.exec(source);
        if (!decl) return null;
        const hit = firstMatch(source, new RegExp(`\\bOutcome\\s*\\.\\s*ok\\(\\s*${escapeRegExp(decl[1])}\\s*\\)`));
        if (!hit) return null;
        return violation({
            subtype: 'hardcoded_external_fallback_success',
            message: 'Hardcoded fallback payloads for external-fetch flows must not return Outcome.ok; emit low_utility or unsupported_capability instead.',
            requiredCorrection:
                'Do not return hardcoded fallback lists as Outcome.ok. Return a typed low_utility (or unsupported_capability) error unless the output is derived from actual fetched results.',
            location: lineOf(source, hit.index),
        });
    },
};

/* -------------------------------------------------------------------------- */
/* missing_external_provenance                                                */
/* -------------------------------------------------------------------------- */

export const RETRIEVAL_MODES: readonly string[] = ['live', 'cached', 'fixture'];

const EXTERNAL_DATA_FLOW = /tool\(\s*['"][\w-]*fetch[\w-]*['"]\s*\)|delegate\(\s*['"][\w-]*fetch[\w-]*['"]\s*[,)]|\bfetch\s*\(|require\(\s*['"](?:node:)?https?['"]\s*\)/i;

function isBlank(value: unknown): boolean {
    return value === undefined || value === null || String(value).trim() === '';
}

function validSourceEntry(entry: unknown): boolean {
    if (!isPlainObject(entry)) return false;
    for (const field of ['uri', 'fetched_at', 'retrieval_tool']) {
        if (isBlank(readKeyVariant(entry, field))) return false;
    }
    const mode = readKeyVariant(entry, 'retrieval_mode');
    return typeof mode === 'string' && RETRIEVAL_MODES.includes(mode.trim().toLowerCase());
}

export function hasExternalProvenance(value: unknown): boolean {
    if (!isPlainObject(value)) return false;
    const provenance = readKeyVariant(value, 'provenance');
    if (!isPlainObject(provenance)) return false;
    const sources = readKeyVariant(provenance, 'sources');
    return Array.isArray(sources) && sources.length > 0 && sources.every(validSourceEntry);
}

export const externalProvenanceCheck: GuardrailCheck = {
    id: 'missing_external_provenance',
    phase: 'outcome',
    evaluate({ code, outcome }) {
        if (!outcome || outcome.status !== 'ok') return null;
        if (!EXTERNAL_DATA_FLOW.test(stripComments(code))) return null;
        if (hasExternalProvenance(outcome.value)) return null;
        return violation({
            subtype: 'missing_external_provenance',
            message: 'External-data success must include `provenance.sources[]` with `uri`, `fetched_at`, `retrieval_tool`, and `retrieval_mode` (`live|cached|fixture`).',
            requiredCorrection:
                'For external-data success, return a value with `provenance: { sources: [...] }` and give each source `uri`, `fetched_at`, `retrieval_tool` and `retrieval_mode` (`live|cached|fixture`).',
        });
    },
};

/* -------------------------------------------------------------------------- */
/* Tool registry integrity                                                    */
/* -------------------------------------------------------------------------- */

function registryIntegrity(phase: GuardrailPhase): GuardrailCheck {
    return {
        id: `tool_registry_integrity_${phase}`,
        phase,
        evaluate({ tools }) {
            const path = findExecutableMetadata(tools);
            if (path === null) return null;
            return violation({
                subtype: 'executable_tool_metadata',
                message: `context.tools metadata must be plain data; found an executable value at ${path} ${phase === 'code' ? 'before' : 'after'} execution.`,
                requiredCorrection:
                    'Store only plain data in context.tools entries; invoke tools through tool("name").call(...) instead of attaching functions.',
            });
        },
    };
}

export const DEFAULT_GUARDRAIL_CHECKS: readonly GuardrailCheck[] = [
    methodRedefinitionCheck,
    contextToolsShapeCheck,
    hardcodedFallbackCheck,
    registryIntegrity('code'),
    externalProvenanceCheck,
    registryIntegrity('outcome'),
];
