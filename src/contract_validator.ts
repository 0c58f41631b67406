/**
 * Outcome Contract Validator - shape checks for successful deliverables.
 *
 * Contracts are deliberately small: a top-level type, required keys, and
 * item-count / per-property constraints. Key lookups accept snake_case and
 * camelCase spellings of the same field.
 */

import { camelCase, isPlainObject, keyVariants, readKeyVariant, snakeCase } from './json_value';
import { ErrorOutcome, Outcome, errorOutcome, okOutcome } from './outcome';
import { ERROR_TYPES } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ContractShape = 'object' | 'array';

export interface PropertyConstraint {
    type?: string;
    min_items?: number;
    minItems?: number;
}

export interface DeliverableContract {
    type?: ContractShape;
    required?: string[];
    min_items?: number;
    minItems?: number;
    constraints?: {
        min_items?: number;
        minItems?: number;
        properties?: Record<string, PropertyConstraint>;
    };
}

export type MismatchKind =
    | 'missing_required_key'
    | 'type_mismatch'
    | 'min_items_violation'
    | 'nil_required_input'
    | 'property_type_mismatch';

export interface ContractMismatch {
    kind: MismatchKind;
    message: string;
    details: Record<string, unknown>;
}

export interface ContractInput {
    args: unknown[];
    kwargs: Record<string, unknown>;
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

export function shapeOf(value: unknown): string {
    if (value === null || value === undefined) return 'null';
    if (Array.isArray(value)) return 'array';
    if (isPlainObject(value)) return 'object';
    return typeof value;
}

function minItemsOf(source: { min_items?: number; minItems?: number } | undefined): number | null {
    if (!source) return null;
    const n = source.min_items ?? source.minItems;
    return typeof n === 'number' && Number.isFinite(n) ? n : null;
}

/** Declared shape; a contract that only lists required keys describes an object. */
export function expectedShapeOf(contract: DeliverableContract): ContractShape | null {
    if (contract.type) return contract.type;
    return (contract.required ?? []).length > 0 ? 'object' : null;
}

function typeMatches(expected: string, value: unknown): boolean {
    const actual = shapeOf(value);
    if (expected === actual) return true;
    if (expected === 'integer') return typeof value === 'number' && Number.isInteger(value);
    if (expected === 'hash') return actual === 'object';
    return false;
}

function isEmptyCollection(value: unknown): boolean {
    if (Array.isArray(value)) return value.length === 0;
    if (isPlainObject(value)) return Object.keys(value).length === 0;
    return false;
}

function count(value: unknown): number | undefined {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : undefined;
}

function parsePropertyConstraints(value: unknown): Record<string, PropertyConstraint> | undefined {
    if (!isPlainObject(value)) return undefined;
    const out: Record<string, PropertyConstraint> = {};
    for (const [key, raw] of Object.entries(value)) {
        if (!isPlainObject(raw)) continue;
        const constraint: PropertyConstraint = {};
        if (typeof raw.type === 'string') constraint.type = raw.type;
        const min = count(raw.min_items) ?? count(raw.minItems);
        if (min !== undefined) constraint.min_items = min;
        out[key] = constraint;
    }
    return out;
}

/** Reads a contract supplied as untyped data (for example by a program's delegate() call). */
export function parseDeliverableContract(value: unknown): DeliverableContract | null {
    if (!isPlainObject(value)) return null;
    const contract: DeliverableContract = {};
    if (value.type === 'object' || value.type === 'array') contract.type = value.type;
    if (Array.isArray(value.required)) {
        contract.required = value.required.filter((k): k is string => typeof k === 'string');
    }
    const min = count(value.min_items) ?? count(value.minItems);
    if (min !== undefined) contract.min_items = min;
    if (isPlainObject(value.constraints)) {
        const c = value.constraints;
        const nested: NonNullable<DeliverableContract['constraints']> = {};
        const nestedMin = count(c.min_items) ?? count(c.minItems);
        if (nestedMin !== undefined) nested.min_items = nestedMin;
        const properties = parsePropertyConstraints(c.properties);
        if (properties) nested.properties = properties;
        contract.constraints = nested;
    }
    return contract;
}

/* -------------------------------------------------------------------------- */
/* Validation                                                                 */
/* -------------------------------------------------------------------------- */

/** Returns the first mismatch, or null when the value satisfies the contract. */
export function findContractMismatch(
    contract: DeliverableContract,
    value: unknown,
    input: ContractInput = { args: [], kwargs: {} }
): ContractMismatch | null {
    const actual = shapeOf(value);

    const firstArg = input.args.length > 0 ? input.args[0] : undefined;
    if (input.args.length > 0 && (firstArg === null || firstArg === undefined)
        && Object.keys(input.kwargs).length === 0 && isEmptyCollection(value)) {
        return {
            kind: 'nil_required_input',
            message: 'required input was nil and the result is empty',
            details: {},
        };
    }

    const expected = expectedShapeOf(contract);
    if (expected !== null && actual !== expected) {
        return {
            kind: 'type_mismatch',
            message: `expected ${expected}, got ${actual}`,
            details: {},
        };
    }

    const topMin = minItemsOf(contract) ?? minItemsOf(contract.constraints);
    if (Array.isArray(value) && topMin !== null && value.length < topMin) {
        return {
            kind: 'min_items_violation',
            message: `expected at least ${topMin} items, got ${value.length}`,
            details: { constraint_path: '$', expected_min_items: topMin, actual_items: value.length },
        };
    }

    if (!isPlainObject(value)) return null;

    for (const key of contract.required ?? []) {
        if (readKeyVariant(value, key) === undefined) {
            return {
                kind: 'missing_required_key',
                message: `missing required key "${key}"`,
                details: { missing_key: key, accepted_keys: keyVariants(key) },
            };
        }
    }

    for (const [key, prop] of Object.entries(contract.constraints?.properties ?? {})) {
        const field = readKeyVariant(value, key);
        if (field === undefined) continue;
        if (prop.type && !typeMatches(prop.type, field)) {
            return {
                kind: 'property_type_mismatch',
                message: `property "${key}" expected ${prop.type}, got ${shapeOf(field)}`,
                details: { constraint_path: key, expected_type: prop.type, actual_type: shapeOf(field) },
            };
        }
        const min = minItemsOf(prop);
        if (min !== null && Array.isArray(field) && field.length < min) {
            return {
                kind: 'min_items_violation',
                message: `property "${key}" expected at least ${min} items, got ${field.length}`,
                details: { constraint_path: key, expected_min_items: min, actual_items: field.length },
            };
        }
    }

    return null;
}

/** Adds the snake_case and camelCase spelling of every top-level key. */
export function withKeyVariants(value: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = { ...value };
    for (const [key, v] of Object.entries(value)) {
        for (const variant of [snakeCase(key), camelCase(key)]) {
            if (!Object.prototype.hasOwnProperty.call(out, variant)) out[variant] = v;
        }
    }
    return out;
}

/**
 * Applies a contract to an outcome. Error outcomes pass through; a success
 * either becomes a contract_violation or is returned with its object keys
 * normalized.
 */
export function validateOutcomeContract(
    outcome: Outcome,
    contract: DeliverableContract | null | undefined,
    input?: ContractInput
): Outcome {
    if (!contract || outcome.status !== 'ok') return outcome;
    const origin = { toolRole: outcome.toolRole, methodName: outcome.methodName };
    const value = outcome.value;
    const mismatch = findContractMismatch(contract, value, input);

    if (mismatch) {
        return contractViolation(contract, value, mismatch, origin);
    }
    if (isPlainObject(value)) return okOutcome(withKeyVariants(value), origin);
    return outcome;
}

function contractViolation(
    contract: DeliverableContract,
    value: unknown,
    mismatch: ContractMismatch,
    origin: { toolRole: string | null; methodName: string | null }
): ErrorOutcome {
    return errorOutcome({
        errorType: ERROR_TYPES.CONTRACT_VIOLATION,
        errorMessage: `deliverable contract violated: ${mismatch.message}`,
        retriable: false,
        metadata: {
            expected_shape: expectedShapeOf(contract),
            actual_shape: shapeOf(value),
            expected_keys: contract.required ?? [],
            actual_keys: isPlainObject(value) ? Object.keys(value) : [],
            mismatch: mismatch.kind,
            ...mismatch.details,
        },
        ...origin,
    });
}

/* -------------------------------------------------------------------------- */
/* Low-utility success signals                                                */
/* -------------------------------------------------------------------------- */

export const LOW_UTILITY_STATUSES: ReadonlySet<string> = new Set([
    'success_no_parse',
    'success_but_unusable',
    'partial_success_unusable',
    'empty_result',
    'no_useful_result',
    'low_utility',
]);

/** A success whose payload admits it has nothing useful becomes a low_utility error. */
export function coerceLowUtility(outcome: Outcome): Outcome {
    if (outcome.status !== 'ok' || !isPlainObject(outcome.value)) return outcome;
    const status = outcome.value.status;
    if (typeof status !== 'string') return outcome;
    const signaled = status.trim().toLowerCase();
    if (!LOW_UTILITY_STATUSES.has(signaled)) return outcome;

    const message = readKeyVariant(outcome.value, 'message');
    const metadata: Record<string, unknown> = {
        mismatch: 'low_utility_success_signal',
        signaled_status: signaled,
    };
    if (typeof message === 'string') metadata.signaled_message = message;

    return errorOutcome({
        errorType: ERROR_TYPES.LOW_UTILITY,
        errorMessage: typeof message === 'string' && message.trim() !== ''
            ? `result signaled low utility (${signaled}): ${message}`
            : `result signaled low utility (${signaled})`,
        retriable: false,
        metadata,
        toolRole: outcome.toolRole,
        methodName: outcome.methodName,
    });
}
