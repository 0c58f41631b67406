/**
 * Structured error taxonomy for the call engine.
 *
 * Every failure that can reach a caller maps to one ErrorType. Errors raised
 * inside the engine are CallError subclasses; describeError() turns any
 * thrown value into the machine-readable record used by outcomes, telemetry
 * and retry feedback.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export const ERROR_TYPES = {
    BUDGET_EXCEEDED: 'budget_exceeded',
    TIMEOUT: 'timeout',
    PROVIDER: 'provider',
    INVALID_CODE: 'invalid_code',
    INVALID_DEPENDENCY_MANIFEST: 'invalid_dependency_manifest',
    DEPENDENCY_MANIFEST_INCOMPATIBLE: 'dependency_manifest_incompatible',
    DEPENDENCY_POLICY_VIOLATION: 'dependency_policy_violation',
    DEPENDENCY_RESOLUTION_FAILED: 'dependency_resolution_failed',
    DEPENDENCY_INSTALL_FAILED: 'dependency_install_failed',
    DEPENDENCY_ACTIVATION_FAILED: 'dependency_activation_failed',
    ENVIRONMENT_PREPARING: 'environment_preparing',
    TOOL_REGISTRY_VIOLATION: 'tool_registry_violation',
    GUARDRAIL_RETRY_EXHAUSTED: 'guardrail_retry_exhausted',
    OUTCOME_REPAIR_RETRY_EXHAUSTED: 'outcome_repair_retry_exhausted',
    WORKER_CRASH: 'worker_crash',
    NON_SERIALIZABLE_RESULT: 'non_serializable_result',
    CONTRACT_VIOLATION: 'contract_violation',
    LOW_UTILITY: 'low_utility',
    EXECUTION: 'execution',
} as const;

export type ErrorType = typeof ERROR_TYPES[keyof typeof ERROR_TYPES];

export const RETRIABLE_ERROR_TYPES: ReadonlySet<string> = new Set<string>([
    ERROR_TYPES.TIMEOUT,
    ERROR_TYPES.PROVIDER,
    ERROR_TYPES.INVALID_CODE,
    ERROR_TYPES.DEPENDENCY_INSTALL_FAILED,
    ERROR_TYPES.DEPENDENCY_ACTIVATION_FAILED,
    ERROR_TYPES.ENVIRONMENT_PREPARING,
    ERROR_TYPES.WORKER_CRASH,
]);

export type ErrorMetadata = Record<string, unknown>;

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class CallError extends Error {
    readonly errorType: ErrorType;
    readonly metadata: ErrorMetadata;

    constructor(message: string, errorType: ErrorType, opts: { cause?: unknown; metadata?: ErrorMetadata } = {}) {
        super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
        this.name = 'CallError';
        this.errorType = errorType;
        this.metadata = opts.metadata ?? {};
    }

    get retriable(): boolean {
        return RETRIABLE_ERROR_TYPES.has(this.errorType);
    }
}

type CallErrorOptions = { cause?: unknown; metadata?: ErrorMetadata };

export class BudgetExceededError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.BUDGET_EXCEEDED, opts); this.name = 'BudgetExceededError'; }
}

export class ExecutionTimeoutError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.TIMEOUT, opts); this.name = 'ExecutionTimeoutError'; }
}

export class ProviderError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.PROVIDER, opts); this.name = 'ProviderError'; }
}

export class InvalidCodeError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.INVALID_CODE, opts); this.name = 'InvalidCodeError'; }
}

export class InvalidDependencyManifestError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.INVALID_DEPENDENCY_MANIFEST, opts); this.name = 'InvalidDependencyManifestError'; }
}

export class DependencyManifestIncompatibleError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.DEPENDENCY_MANIFEST_INCOMPATIBLE, opts); this.name = 'DependencyManifestIncompatibleError'; }
}

export class DependencyPolicyViolationError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.DEPENDENCY_POLICY_VIOLATION, opts); this.name = 'DependencyPolicyViolationError'; }
}

export class DependencyResolutionError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.DEPENDENCY_RESOLUTION_FAILED, opts); this.name = 'DependencyResolutionError'; }
}

export class DependencyInstallError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.DEPENDENCY_INSTALL_FAILED, opts); this.name = 'DependencyInstallError'; }
}

export class DependencyActivationError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.DEPENDENCY_ACTIVATION_FAILED, opts); this.name = 'DependencyActivationError'; }
}

export class EnvironmentPreparingError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.ENVIRONMENT_PREPARING, opts); this.name = 'EnvironmentPreparingError'; }
}

export class WorkerCrashError extends CallError {
    /** Set once the supervisor's restart budget is spent; the failure is then terminal. */
    readonly terminal: boolean;

    constructor(message: string, opts: CallErrorOptions & { terminal?: boolean } = {}) {
        super(message, ERROR_TYPES.WORKER_CRASH, opts);
        this.name = 'WorkerCrashError';
        this.terminal = opts.terminal ?? false;
    }

    override get retriable(): boolean {
        return !this.terminal;
    }
}

export class NonSerializableResultError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.NON_SERIALIZABLE_RESULT, opts); this.name = 'NonSerializableResultError'; }
}

export class ExecutionError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.EXECUTION, opts); this.name = 'ExecutionError'; }
}

export type GuardrailClass = 'recoverable_guardrail' | 'terminal_guardrail';

/**
 * Raised by a guardrail check, or by the runtime when a program performs a
 * prohibited mutation.
 */
export class GuardrailViolationError extends CallError {
    readonly subtype: string;
    readonly requiredCorrection: string;
    readonly location: string | null;

    constructor(message: string, opts: CallErrorOptions & { subtype: string; requiredCorrection: string; location?: string | null }) {
        super(message, ERROR_TYPES.TOOL_REGISTRY_VIOLATION, opts);
        this.name = 'GuardrailViolationError';
        this.subtype = opts.subtype;
        this.requiredCorrection = opts.requiredCorrection;
        this.location = opts.location ?? null;
    }
}

export class GuardrailRetryExhaustedError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.GUARDRAIL_RETRY_EXHAUSTED, opts); this.name = 'GuardrailRetryExhaustedError'; }
}

export class OutcomeRepairRetryExhaustedError extends CallError {
    constructor(message: string, opts?: CallErrorOptions) { super(message, ERROR_TYPES.OUTCOME_REPAIR_RETRY_EXHAUSTED, opts); this.name = 'OutcomeRepairRetryExhaustedError'; }
}

/* -------------------------------------------------------------------------- */
/* Store errors                                                               */
/* -------------------------------------------------------------------------- */

export class StoreError extends Error {
    constructor(message: string, public readonly code: string, public readonly cause?: unknown) {
        super(message);
        this.name = 'StoreError';
    }
}

export const ERRORS = {
    INFRA_ERROR: 'INFRA_ERROR',
    SCHEMA_MISMATCH: 'SCHEMA_MISMATCH',
} as const;

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export interface StructuredError {
    errorType: ErrorType;
    message: string;
    retriable: boolean;
    errorClass: string;
    metadata: ErrorMetadata;
    rootErrorClass: string;
    rootErrorMessage: string;
    location: string | null;
}

export function errorTypeFor(err: unknown): ErrorType {
    if (err instanceof CallError) return err.errorType;
    return ERROR_TYPES.EXECUTION;
}

interface ErrorLike {
    name: string;
    message: string;
    stack?: string;
    cause?: unknown;
}

/** Errors thrown inside a vm context fail `instanceof Error` in the host realm. */
export function isErrorLike(value: unknown): value is ErrorLike {
    if (value instanceof Error) return true;
    if (typeof value !== 'object' || value === null) return false;
    return typeof Reflect.get(value, 'message') === 'string' && typeof Reflect.get(value, 'name') === 'string';
}

export function errorMessage(err: unknown): string {
    if (isErrorLike(err)) return err.message;
    return String(err);
}

/** First stack frame below the message line, if any. */
export function errorLocation(err: unknown): string | null {
    if (!isErrorLike(err) || typeof err.stack !== 'string') return null;
    const frame = err.stack.split('\n').slice(1).find(line => line.trim().startsWith('at '));
    return frame ? frame.trim() : null;
}

function rootError(err: unknown): unknown {
    if (isErrorLike(err) && err.cause !== undefined) return err.cause;
    return err;
}

export function describeError(err: unknown): StructuredError {
    const root = rootError(err);
    return {
        errorType: errorTypeFor(err),
        message: errorMessage(err),
        retriable: err instanceof CallError ? err.retriable : false,
        errorClass: isErrorLike(err) ? err.name : typeof err,
        metadata: err instanceof CallError ? err.metadata : {},
        rootErrorClass: isErrorLike(root) ? root.name : typeof root,
        rootErrorMessage: errorMessage(root),
        location: errorLocation(root),
    };
}
