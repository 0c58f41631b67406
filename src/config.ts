/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the call engine.
 * Values can be overridden via environment variables; per-agent overrides go
 * through resolveRuntimeConfig().
 */

import * as os from 'os';
import * as path from 'path';

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

function envList(name: string): string[] | null {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return null;
    return raw.split(',').map(s => s.trim().toLowerCase()).filter(s => s.length > 0);
}

export const DEFAULT_MODEL_ID = process.env.CALLFORGE_MODEL || 'default';

// Retry budgets per invocation
export const BUDGETS = {
    GENERATION_ATTEMPTS: envInt('CALLFORGE_GENERATION_ATTEMPTS', 2),
    GUARDRAIL_RECOVERY: envInt('CALLFORGE_GUARDRAIL_RECOVERY_BUDGET', 1),
    OUTCOME_REPAIR: envInt('CALLFORGE_OUTCOME_REPAIR_BUDGET', 1),
    EXECUTION_REPAIR: 1,
    MAX_REPAIRS_BEFORE_REGEN: 3,
};

// Timeouts (milliseconds)
export const TIMEOUTS = {
    GENERATION_MS: envInt('CALLFORGE_GENERATION_TIMEOUT', 120000),
    EXECUTION_MS: envInt('CALLFORGE_EXECUTION_TIMEOUT', 60000),
    SANDBOX_SYNC_MS: envInt('CALLFORGE_SANDBOX_SYNC_TIMEOUT', 5000),
    WORKER_MS: envInt('CALLFORGE_WORKER_TIMEOUT', 60000),
    WORKER_SHUTDOWN_GRACE_MS: 1000,
};

export const WORKER = {
    MAX_RESTARTS: envInt('CALLFORGE_WORKER_MAX_RESTARTS', 2),
    IPC_VERSION: 1,
};

// Attempt failure telemetry bounds
export const TELEMETRY = {
    MAX_ATTEMPT_FAILURES: 8,
    MAX_FAILURE_MESSAGE_CHARS: 400,
};

const DYNAMIC_DISPATCH_METHODS: readonly string[] = ['ask', 'chat', 'discuss', 'host'];

export const ARTIFACTS = {
    SCHEMA_VERSION: 1,
    RUNTIME_VERSION: '1',
    PROMPT_VERSION: '1',
    HISTORY_LIMIT: 3,
    READ_CACHE_ENTRIES: 512,
    DYNAMIC_DISPATCH_METHODS,
};

/* -------------------------------------------------------------------------- */
/* Promotion policy                                                           */
/* -------------------------------------------------------------------------- */

export interface PromotionPolicy {
    version: string;
    minCalls: number;
    minSessions: number;
    minContractPassRate: number;
    maxGuardrailRetryExhausted: number;
    maxOutcomeRetryExhausted: number;
    maxWrongBoundaryCount: number;
    maxProvenanceViolations: number;
    minStateKeyConsistencyRatio: number;
    regressionMinCalls: number;
    regressionFailureRate: number;
}

export const PROMOTION_POLICY_V1: PromotionPolicy = {
    version: 'solver_promotion_v1',
    minCalls: 10,
    minSessions: 2,
    minContractPassRate: 0.95,
    maxGuardrailRetryExhausted: 0,
    maxOutcomeRetryExhausted: 0,
    maxWrongBoundaryCount: 0,
    maxProvenanceViolations: 0,
    minStateKeyConsistencyRatio: 0.5,
    regressionMinCalls: 3,
    regressionFailureRate: 0.6,
};

/* -------------------------------------------------------------------------- */
/* Runtime configuration                                                      */
/* -------------------------------------------------------------------------- */

export type SourceMode = 'public' | 'internal_only';

export interface RuntimeConfig {
    toolstoreRoot: string;
    model: string;
    generationAttempts: number;
    guardrailRecoveryBudget: number;
    outcomeRepairBudget: number;
    delegationBudget: number | null;
    maxWorkerRestarts: number;
    workerTimeoutMs: number;
    executionTimeoutMs: number;
    sandboxSyncTimeoutMs: number;
    generationTimeoutMs: number;
    promotionShadowMode: boolean;
    promotionEnforced: boolean;
    promotionPolicy: PromotionPolicy;
    allowedPackages: string[] | null;
    blockedPackages: string[] | null;
    sourceMode: SourceMode;
    packageRegistries: string[];
    callLogPath: string | null;
}

export function defaultToolstoreRoot(): string {
    return process.env.CALLFORGE_TOOLSTORE_ROOT || path.join(os.homedir(), '.callforge');
}

function requireBudget(name: string, value: number): number {
    if (!Number.isInteger(value) || value < 0) {
        throw new TypeError(`${name} must be an integer >= 0 (got ${value})`);
    }
    return value;
}

export function resolveRuntimeConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
    const root = overrides.toolstoreRoot ?? defaultToolstoreRoot();
    const sourceMode: SourceMode = process.env.CALLFORGE_SOURCE_MODE === 'internal_only' ? 'internal_only' : 'public';
    const envCallLog = process.env.CALLFORGE_CALL_LOG;

    const config: RuntimeConfig = {
        toolstoreRoot: root,
        model: DEFAULT_MODEL_ID,
        generationAttempts: BUDGETS.GENERATION_ATTEMPTS,
        guardrailRecoveryBudget: BUDGETS.GUARDRAIL_RECOVERY,
        outcomeRepairBudget: BUDGETS.OUTCOME_REPAIR,
        delegationBudget: null,
        maxWorkerRestarts: WORKER.MAX_RESTARTS,
        workerTimeoutMs: TIMEOUTS.WORKER_MS,
        executionTimeoutMs: TIMEOUTS.EXECUTION_MS,
        sandboxSyncTimeoutMs: TIMEOUTS.SANDBOX_SYNC_MS,
        generationTimeoutMs: TIMEOUTS.GENERATION_MS,
        promotionShadowMode: process.env.CALLFORGE_PROMOTION_SHADOW !== '0',
        promotionEnforced: process.env.CALLFORGE_PROMOTION_ENFORCED === '1',
        promotionPolicy: PROMOTION_POLICY_V1,
        allowedPackages: envList('CALLFORGE_ALLOWED_PACKAGES'),
        blockedPackages: envList('CALLFORGE_BLOCKED_PACKAGES'),
        sourceMode,
        packageRegistries: envList('CALLFORGE_PACKAGE_REGISTRIES') ?? ['https://registry.npmjs.org/'],
        callLogPath: envCallLog === undefined ? path.join(root, 'calls.db') : (envCallLog === '' ? null : envCallLog),
        ...overrides,
    };

    if (config.generationAttempts < 1) {
        throw new TypeError(`generationAttempts must be >= 1 (got ${config.generationAttempts})`);
    }
    requireBudget('generationAttempts', config.generationAttempts);
    requireBudget('guardrailRecoveryBudget', config.guardrailRecoveryBudget);
    requireBudget('outcomeRepairBudget', config.outcomeRepairBudget);
    requireBudget('maxWorkerRestarts', config.maxWorkerRestarts);
    if (config.delegationBudget !== null) requireBudget('delegationBudget', config.delegationBudget);

    return config;
}
