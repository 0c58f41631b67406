/**
 * Outcome: the two-variant result every invocation resolves to.
 *
 * Programs may return an explicit Outcome, a bare value, or an error-shaped
 * mapping; coerceOutcome() is the single normalization point for all three.
 */

import { isPlainObject, readKeyVariant } from './json_value';

export interface OutcomeOrigin {
    toolRole: string | null;
    methodName: string | null;
}

export interface OkOutcome extends OutcomeOrigin {
    readonly status: 'ok';
    readonly value: unknown;
}

export interface ErrorOutcome extends OutcomeOrigin {
    readonly status: 'error';
    readonly errorType: string;
    readonly errorMessage: string;
    readonly retriable: boolean;
    readonly metadata: Record<string, unknown>;
}

export type Outcome = OkOutcome | ErrorOutcome;

const issued = new WeakSet<object>();

export function okOutcome(value: unknown, origin: Partial<OutcomeOrigin> = {}): OkOutcome {
    const outcome: OkOutcome = Object.freeze({
        status: 'ok' as const,
        value,
        toolRole: origin.toolRole ?? null,
        methodName: origin.methodName ?? null,
    });
    issued.add(outcome);
    return outcome;
}

export function errorOutcome(params: {
    errorType: string;
    errorMessage: string;
    retriable?: boolean;
    metadata?: Record<string, unknown>;
} & Partial<OutcomeOrigin>): ErrorOutcome {
    const outcome: ErrorOutcome = Object.freeze({
        status: 'error' as const,
        errorType: params.errorType,
        errorMessage: params.errorMessage,
        retriable: params.retriable ?? false,
        metadata: params.metadata ?? {},
        toolRole: params.toolRole ?? null,
        methodName: params.methodName ?? null,
    });
    issued.add(outcome);
    return outcome;
}

/** True only for values built by okOutcome/errorOutcome. */
export function isOutcome(value: unknown): value is Outcome {
    return typeof value === 'object' && value !== null && issued.has(value);
}

export function withOrigin(outcome: Outcome, origin: OutcomeOrigin): Outcome {
    if (outcome.toolRole === origin.toolRole && outcome.methodName === origin.methodName) return outcome;
    if (outcome.status === 'ok') return okOutcome(outcome.value, origin);
    return errorOutcome({ ...outcome, ...origin });
}

/* -------------------------------------------------------------------------- */
/* Coercion                                                                   */
/* -------------------------------------------------------------------------- */

function metadataOf(value: unknown): Record<string, unknown> {
    return isPlainObject(value) ? { ...value } : {};
}

/**
 * An error-shaped mapping names its error type and either a message or an
 * explicit `status: "error"`. A result that merely has an `error` field is
 * domain data and stays a success.
 */
function errorShapedOutcome(raw: Record<string, unknown>, origin: OutcomeOrigin): ErrorOutcome | null {
    const errorType = readKeyVariant(raw, 'error_type');
    if (typeof errorType !== 'string' || errorType.trim() === '') return null;
    const message = readKeyVariant(raw, 'error_message');
    const status = raw.status;
    if (typeof message !== 'string' && status !== 'error') return null;

    const retriable = raw.retriable;
    return errorOutcome({
        errorType: errorType.trim(),
        errorMessage: typeof message === 'string' ? message : errorType.trim(),
        retriable: retriable === true,
        metadata: metadataOf(raw.metadata),
        ...origin,
    });
}

export function coerceOutcome(raw: unknown, origin: OutcomeOrigin): Outcome {
    if (isOutcome(raw)) return withOrigin(raw, origin);
    if (raw === undefined) return okOutcome(null, origin);
    if (isPlainObject(raw)) {
        const shaped = errorShapedOutcome(raw, origin);
        if (shaped) return shaped;
    }
    return okOutcome(raw, origin);
}

/* -------------------------------------------------------------------------- */
/* Worker boundary encoding                                                   */
/* -------------------------------------------------------------------------- */

export const OUTCOME_WIRE_KEY = '__outcome__';

export function encodeOutcome(outcome: Outcome): Record<string, unknown> {
    if (outcome.status === 'ok') {
        return { [OUTCOME_WIRE_KEY]: { status: 'ok', value: outcome.value } };
    }
    return {
        [OUTCOME_WIRE_KEY]: {
            status: 'error',
            error_type: outcome.errorType,
            error_message: outcome.errorMessage,
            retriable: outcome.retriable,
            metadata: outcome.metadata,
        },
    };
}

/** Restores an Outcome sent across the worker boundary; other values are returned unchanged. */
export function decodeOutcome(value: unknown, origin: OutcomeOrigin): unknown {
    if (!isPlainObject(value)) return value;
    const keys = Object.keys(value);
    if (keys.length !== 1 || keys[0] !== OUTCOME_WIRE_KEY) return value;
    const wire = value[OUTCOME_WIRE_KEY];
    if (!isPlainObject(wire)) return value;
    if (wire.status === 'ok') return okOutcome(wire.value, origin);
    return errorOutcome({
        errorType: typeof wire.error_type === 'string' ? wire.error_type : 'execution',
        errorMessage: typeof wire.error_message === 'string' ? wire.error_message : '',
        retriable: wire.retriable === true,
        metadata: metadataOf(wire.metadata),
        ...origin,
    });
}

/**
 * The constructor surface programs see as `Outcome`.
 * `Outcome.error(type, message, { retriable, metadata })`.
 */
export function sandboxOutcomeApi(origin: OutcomeOrigin) {
    return Object.freeze({
        ok: (value?: unknown) => okOutcome(value === undefined ? null : value, origin),
        error: (errorType: unknown, errorMessage?: unknown, opts?: unknown) => {
            const options = isPlainObject(opts) ? opts : {};
            return errorOutcome({
                errorType: String(errorType),
                errorMessage: errorMessage === undefined ? String(errorType) : String(errorMessage),
                retriable: options.retriable === true,
                metadata: metadataOf(options.metadata),
                ...origin,
            });
        },
    });
}
