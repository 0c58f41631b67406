/**
 * Recovery Policy - failure classification and repair-vs-regenerate decisions.
 *
 * Every failed call is put in one of three classes:
 *   adaptive   the program can be fixed by rewriting it (contract, parse, utility)
 *   extrinsic  the world failed (timeouts, providers, environments, workers)
 *   intrinsic  everything else
 *
 * A persisted program that fails adaptively, or with a raised execution fault,
 * is repaired in place until MAX_REPAIRS_BEFORE_REGEN repairs have happened
 * since the last full regeneration; after that it is regenerated.
 */

import { BUDGETS } from './config';
import { ArtifactRecord, FailureClass } from './artifact_store';
import { ERROR_TYPES } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Classification                                                             */
/* -------------------------------------------------------------------------- */

export const EXTRINSIC_FAILURE_TYPES: ReadonlySet<string> = new Set([
    ERROR_TYPES.TIMEOUT,
    ERROR_TYPES.PROVIDER,
    'network_error',
    'rate_limit',
    'rate_limited',
    ERROR_TYPES.ENVIRONMENT_PREPARING,
    ERROR_TYPES.WORKER_CRASH,
    ERROR_TYPES.DEPENDENCY_RESOLUTION_FAILED,
    ERROR_TYPES.DEPENDENCY_INSTALL_FAILED,
    ERROR_TYPES.DEPENDENCY_ACTIVATION_FAILED,
]);

export const ADAPTIVE_FAILURE_TYPES: ReadonlySet<string> = new Set([
    'parse_error',
    'parse_failed',
    ERROR_TYPES.LOW_UTILITY,
    'wrong_tool_boundary',
    'missing_input',
    'invalid_format',
    'schema_mismatch',
    ERROR_TYPES.CONTRACT_VIOLATION,
    ERROR_TYPES.GUARDRAIL_RETRY_EXHAUSTED,
    ERROR_TYPES.OUTCOME_REPAIR_RETRY_EXHAUSTED,
]);

/** Raised program faults; intrinsic for accounting, but a rewrite can fix them. */
export const REPAIRABLE_FAULT_TYPES: ReadonlySet<string> = new Set([
    ERROR_TYPES.EXECUTION,
    ERROR_TYPES.NON_SERIALIZABLE_RESULT,
    ERROR_TYPES.TOOL_REGISTRY_VIOLATION,
]);

export function failureClassFor(errorType: string): FailureClass {
    if (EXTRINSIC_FAILURE_TYPES.has(errorType)) return 'extrinsic';
    if (ADAPTIVE_FAILURE_TYPES.has(errorType)) return 'adaptive';
    return 'intrinsic';
}

/* -------------------------------------------------------------------------- */
/* Decisions                                                                  */
/* -------------------------------------------------------------------------- */

export type RecoveryTrigger = 'initial_forge' | 'regenerate' | 'repair:adaptive_failure' | 'repair:intrinsic_failure';

export type RecoveryDecision =
    | { action: 'passthrough'; failureClass: FailureClass }
    | { action: 'repair'; failureClass: FailureClass; trigger: Extract<RecoveryTrigger, `repair:${string}`> }
    | { action: 'regenerate'; failureClass: FailureClass; trigger: 'regenerate' };

export function repairBudgetAvailable(record: Pick<ArtifactRecord, 'repair_count_since_regen'>, maxRepairs = BUDGETS.MAX_REPAIRS_BEFORE_REGEN): boolean {
    return record.repair_count_since_regen < maxRepairs;
}

/** What to do after a persisted program failed with `errorType`. */
export function decidePersistedRecovery(
    record: Pick<ArtifactRecord, 'repair_count_since_regen'>,
    errorType: string,
    maxRepairs = BUDGETS.MAX_REPAIRS_BEFORE_REGEN
): RecoveryDecision {
    const failureClass = failureClassFor(errorType);
    if (failureClass === 'extrinsic') return { action: 'passthrough', failureClass };

    let trigger: Extract<RecoveryTrigger, `repair:${string}`>;
    if (failureClass === 'adaptive') {
        trigger = 'repair:adaptive_failure';
    } else if (REPAIRABLE_FAULT_TYPES.has(errorType)) {
        trigger = 'repair:intrinsic_failure';
    } else {
        return { action: 'passthrough', failureClass };
    }

    if (repairBudgetAvailable(record, maxRepairs)) return { action: 'repair', failureClass, trigger };
    return { action: 'regenerate', failureClass, trigger: 'regenerate' };
}

/**
 * Whether a retriable error outcome returned by a freshly generated program
 * should be sent back for an outcome repair. Extrinsic failures are the
 * caller's to retry.
 */
export function outcomeRepairEligible(errorType: string, retriable: boolean): boolean {
    return retriable && failureClassFor(errorType) !== 'extrinsic';
}
