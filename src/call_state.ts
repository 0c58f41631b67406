// Per-invocation bookkeeping: what ran, where it came from, and how each attempt failed.

import { TELEMETRY } from './config';
import { Dependency, DependencyManifest, EMPTY_MANIFEST } from './dependency_manifest';
import { Outcome } from './outcome';
import { RecoveryTrigger } from './recovery_policy';

export type AttemptStage = 'generation' | 'guardrail' | 'execution' | 'outcome_policy' | 'validation';

export type ProgramSource = 'generated' | 'persisted' | 'repaired';

export interface AttemptFailure {
    attempt_id: number;
    stage: AttemptStage;
    error_type: string;
    error_class: string;
    message: string;
    call_id: string;
    at: string;
}

export function truncateFailureMessage(message: string, limit = TELEMETRY.MAX_FAILURE_MESSAGE_CHARS): string {
    if (message.length <= limit) return message;
    return `${message.slice(0, limit - 3)}...`;
}

export class CallState {
    attemptId = 0;
    /** Stage the current attempt has reached. */
    stage: AttemptStage = 'generation';
    code: string | null = null;
    manifest: DependencyManifest = EMPTY_MANIFEST;
    envId: string | null = null;
    envCacheHit: boolean | null = null;
    workerPid: number | null = null;
    workerRestartCount: number | null = null;
    programSource: ProgramSource = 'generated';
    artifactHit = false;
    trigger: RecoveryTrigger | null = null;
    triggerStage: string | null = null;
    triggerFailureClass: string | null = null;
    triggerErrorMessage: string | null = null;
    generationAttempts = 0;
    guardrailRecoveryAttempts = 0;
    executionRepairAttempts = 0;
    outcomeRepairAttempts = 0;
    guardrailRetryExhausted = false;
    outcomeRepairRetryExhausted = false;
    contractApplied = false;
    contractPassed: boolean | null = null;
    continuityViolation = false;
    lifecycleState: string | null = null;
    lifecycleDecision: string | null = null;
    outcome: Outcome | null = null;
    private failures: AttemptFailure[] = [];

    constructor(readonly callId: string) {}

    /** Starts the next attempt and returns its id (1-based). */
    beginAttempt(): number {
        this.attemptId += 1;
        this.stage = 'generation';
        return this.attemptId;
    }

    recordFailure(stage: AttemptStage, errorType: string, errorClass: string, message: string): AttemptFailure {
        const entry: AttemptFailure = {
            attempt_id: this.attemptId,
            stage,
            error_type: errorType,
            error_class: errorClass,
            message: truncateFailureMessage(message),
            call_id: this.callId,
            at: new Date().toISOString(),
        };
        this.failures = [...this.failures, entry].slice(-TELEMETRY.MAX_ATTEMPT_FAILURES);
        return entry;
    }

    get attemptFailures(): readonly AttemptFailure[] {
        return this.failures;
    }

    get latestFailure(): AttemptFailure | null {
        return this.failures.length > 0 ? this.failures[this.failures.length - 1] : null;
    }

    useProgram(code: string, manifest: DependencyManifest, source: ProgramSource): void {
        this.code = code;
        this.manifest = manifest;
        this.programSource = source;
        this.artifactHit = source === 'persisted';
    }

    dependencies(): Dependency[] {
        return this.manifest.map(d => ({ ...d }));
    }
}
