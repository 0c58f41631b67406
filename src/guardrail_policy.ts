/**
 * Guardrail Policy
 *
 * Runs the pluggable check list for a phase, classifies violations (checks
 * and runtime-raised ones alike), builds the retry feedback blocks appended to
 * the generation prompt, and normalizes exhausted-guardrail errors at the
 * top-level call boundary.
 */

import {
    DEFAULT_GUARDRAIL_CHECKS,
    GuardrailCheck,
    GuardrailInput,
    GuardrailPhase,
    GuardrailViolation,
    guardrailClassFor,
} from './guardrail_checks';
import { createLogger } from './logger';
import { ErrorOutcome, Outcome, errorOutcome } from './outcome';
import { ERROR_TYPES, GuardrailViolationError, StructuredError, describeError, errorTypeFor } from './structured_error';

const log = createLogger('guardrail');

export const NORMALIZATION_POLICY = 'guardrail_exhaustion_boundary_v1';
export const BOUNDARY_USER_MESSAGE = "This request couldn't be completed after multiple attempts.";

/* -------------------------------------------------------------------------- */
/* Policy                                                                     */
/* -------------------------------------------------------------------------- */

export class GuardrailPolicy {
    private readonly checks: GuardrailCheck[];

    constructor(checks: readonly GuardrailCheck[] = DEFAULT_GUARDRAIL_CHECKS) {
        this.checks = [...checks];
    }

    get checkIds(): string[] {
        return this.checks.map(c => c.id);
    }

    /** Returns the first violation raised by a check of this phase. */
    evaluate(phase: GuardrailPhase, input: GuardrailInput): GuardrailViolation | null {
        for (const check of this.checks) {
            if (check.phase !== phase) continue;
            const found = check.evaluate(input);
            if (found) {
                log.debug('guardrail violation', { check: check.id, subtype: found.subtype, role: input.role, method: input.method });
                return found;
            }
        }
        return null;
    }

    /** Throws a GuardrailViolationError for the first violation of this phase. */
    enforce(phase: GuardrailPhase, input: GuardrailInput): void {
        const found = this.evaluate(phase, input);
        if (found) throw toViolationError(found);
    }
}

export function toViolationError(v: GuardrailViolation): GuardrailViolationError {
    return new GuardrailViolationError(v.message, {
        subtype: v.subtype,
        requiredCorrection: v.requiredCorrection,
        location: v.location,
        metadata: { guardrail_class: v.guardrailClass },
    });
}

/** Classifies a violation raised at run time or by a check. */
export function classifyViolation(err: GuardrailViolationError): GuardrailViolation {
    return {
        type: errorTypeFor(err),
        subtype: err.subtype,
        message: err.message,
        requiredCorrection: err.requiredCorrection,
        location: err.location ?? describeError(err).location,
        guardrailClass: guardrailClassFor(err.message),
    };
}

/* -------------------------------------------------------------------------- */
/* Retry feedback                                                             */
/* -------------------------------------------------------------------------- */

export interface FeedbackProgress {
    attemptNumber: number;
    remainingBudget: number;
}

export function guardrailFeedback(v: GuardrailViolation, progress: FeedbackProgress): string {
    return [
        '<guardrail_feedback>',
        `<guardrail_class>${v.guardrailClass}</guardrail_class>`,
        `<violation_type>${v.type}</violation_type>`,
        `<violation_subtype>${v.subtype}</violation_subtype>`,
        `<violation_message>${v.message}</violation_message>`,
        `<violation_location>${v.location ?? 'unknown'}</violation_location>`,
        `<required_correction>${v.requiredCorrection}</required_correction>`,
        `<attempt_number>${progress.attemptNumber}</attempt_number>`,
        `<remaining_guardrail_budget>${progress.remainingBudget}</remaining_guardrail_budget>`,
        '</guardrail_feedback>',
        '',
        'IMPORTANT: Previous attempt violated runtime guardrails.',
        'Regenerate code that satisfies the required correction exactly.',
        'Do not repeat the prohibited mechanism.',
    ].join('\n');
}

function executionCorrection(message: string): string {
    if (/is not a function/i.test(message)) {
        return 'Check that a value is callable before invoking it; branch on `outcome.status === "ok"` and read `outcome.value` instead of calling methods on an Outcome.';
    }
    if (/Cannot read properties of (?:undefined|null)/i.test(message)) {
        return 'Initialize values before use and guard against null or undefined before property access.';
    }
    if (/is not defined/i.test(message)) {
        return 'Only use the names the runtime provides (context, args, kwargs, tool, delegate, remember, Outcome) or declare variables before use.';
    }
    return 'Fix the runtime exception path and regenerate code with explicit null and shape checks before property access.';
}

export function executionFeedback(failure: StructuredError, progress: FeedbackProgress): string {
    return [
        '<execution_failure_feedback>',
        `<failure_type>${failure.errorType}</failure_type>`,
        `<failure_message>${failure.message}</failure_message>`,
        `<root_error_class>${failure.rootErrorClass}</root_error_class>`,
        `<root_error_message>${failure.rootErrorMessage}</root_error_message>`,
        `<failure_location>${failure.location ?? 'unknown'}</failure_location>`,
        `<required_correction>${executionCorrection(failure.rootErrorMessage)}</required_correction>`,
        `<attempt_number>${progress.attemptNumber}</attempt_number>`,
        `<remaining_execution_repair_budget>${progress.remainingBudget}</remaining_execution_repair_budget>`,
        '</execution_failure_feedback>',
        '',
        'IMPORTANT: Previous attempt failed during execution.',
        'Regenerate code that avoids this runtime failure while preserving intended behavior.',
    ].join('\n');
}

function outcomeRootErrorClass(message: string): string {
    if (/TypeError/.test(message)) return 'TypeError';
    if (/ReferenceError/.test(message)) return 'ReferenceError';
    return 'OutcomeError';
}

export function outcomeFeedback(outcome: ErrorOutcome, progress: FeedbackProgress): string {
    const message = outcome.errorMessage;
    return [
        '<outcome_failure_feedback>',
        `<failure_type>${outcome.errorType || ERROR_TYPES.EXECUTION}</failure_type>`,
        `<failure_message>${message}</failure_message>`,
        `<root_error_class>${outcomeRootErrorClass(message)}</root_error_class>`,
        `<root_error_message>${message}</root_error_message>`,
        `<required_correction>${executionCorrection(message)}</required_correction>`,
        `<attempt_number>${progress.attemptNumber}</attempt_number>`,
        `<remaining_outcome_repair_budget>${progress.remainingBudget}</remaining_outcome_repair_budget>`,
        '</outcome_failure_feedback>',
        '',
        'IMPORTANT: Previous attempt returned a retriable error outcome.',
        'Regenerate code that preserves intended behavior and avoids this outcome failure path.',
    ].join('\n');
}

export interface RetryFeedback {
    guardrail?: string | null;
    execution?: string | null;
    outcome?: string | null;
}

/** Appends whichever feedback blocks are present, guardrail first. */
export function retryUserPrompt(base: string, feedback: RetryFeedback): string {
    const blocks = [feedback.guardrail, feedback.execution, feedback.outcome].filter(
        (b): b is string => typeof b === 'string' && b.length > 0
    );
    if (blocks.length === 0) return base;
    return [base, ...blocks].join('\n\n');
}

/* -------------------------------------------------------------------------- */
/* Boundary normalization                                                     */
/* -------------------------------------------------------------------------- */

/**
 * At depth 0 an exhausted-guardrail error is replaced by a fixed user-facing
 * message; the raw detail moves into metadata. Nested calls keep full detail.
 */
export function normalizeBoundaryOutcome(outcome: Outcome, depth: number): Outcome {
    if (outcome.status !== 'error' || outcome.errorType !== ERROR_TYPES.GUARDRAIL_RETRY_EXHAUSTED) return outcome;
    if (depth !== 0) return outcome;

    const metadata: Record<string, unknown> = { ...outcome.metadata };
    metadata.normalized = true;
    metadata.normalization_policy = NORMALIZATION_POLICY;
    if (metadata.guardrail_class === undefined) metadata.guardrail_class = 'recoverable_guardrail';
    const subtype = metadata.last_violation_subtype;
    metadata.guardrail_subtype = typeof subtype === 'string' ? subtype : 'unknown_guardrail_violation';
    if (metadata.raw_error_message === undefined) metadata.raw_error_message = outcome.errorMessage;

    return errorOutcome({
        errorType: outcome.errorType,
        errorMessage: BOUNDARY_USER_MESSAGE,
        retriable: outcome.retriable,
        metadata,
        toolRole: outcome.toolRole,
        methodName: outcome.methodName,
    });
}
