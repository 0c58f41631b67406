/**
 * Call Orchestrator - drives one invocation to exactly one Outcome.
 *
 * FLOW:
 *   persisted artifact (reuse gate + version selection)
 *     -> code guardrails -> sandbox | worker -> coerce -> outcome guardrails
 *     -> contract -> continuity -> low-utility
 *   on persisted failure: passthrough | in-place repair | regenerate
 *   fresh generation: retry loop bounded by the guardrail, execution-repair
 *   and outcome-repair budgets, each attempt isolated by snapshot/rollback
 *
 * Every invocation ends with one call-log record and one store flush.
 * No exception escapes invoke().
 */

import * as crypto from 'crypto';
import { BUDGETS, ARTIFACTS, RuntimeConfig } from './config';
import {
    ArtifactRecord,
    ArtifactStore,
    HistoryEntry,
    codeChecksum,
    isDynamicDispatchMethod,
    newArtifact,
    reuseVerdict,
} from './artifact_store';
import { checkStateKeyContinuity, recordArtifactCall } from './artifact_metrics';
import { MemoryCell, captureAttempt, restoreAttempt } from './attempt_isolation';
import { CallLog, CallRecord } from './call_log';
import { CallState, truncateFailureMessage } from './call_state';
import { DeliverableContract, coerceLowUtility, validateOutcomeContract } from './contract_validator';
import { DependencyManifest, enforceDependencyPolicy, resolveCallManifest } from './dependency_manifest';
import { EnvironmentManager } from './environment_manager';
import { DelegatedHandle, ExecutionSandbox, SandboxCapabilities } from './execution_sandbox';
import {
    GuardrailPolicy,
    RetryFeedback,
    classifyViolation,
    executionFeedback,
    guardrailFeedback,
    normalizeBoundaryOutcome,
    outcomeFeedback,
    retryUserPrompt,
} from './guardrail_policy';
import { JsonObject, JsonValue, cloneJson, findNonJsonPath, isJsonObject, toHostJson } from './json_value';
import { clearCorrelation, createLogger, setCorrelation } from './logger';
import { Outcome, OutcomeOrigin, coerceOutcome, decodeOutcome, errorOutcome, isOutcome, okOutcome } from './outcome';
import { CodeGenerator, generateProgramWithRetry } from './program_generator';
import { adoptVersion, applyPromotion, selectVersion } from './promotion_lifecycle';
import { getProgramSystemPrompt, getProgramUserPrompt, getRepairUserPrompt } from './prompts';
import { decidePersistedRecovery, outcomeRepairEligible } from './recovery_policy';
import {
    CallError,
    ERROR_TYPES,
    ExecutionError,
    GuardrailRetryExhaustedError,
    GuardrailViolationError,
    InvalidCodeError,
    NonSerializableResultError,
    OutcomeRepairRetryExhaustedError,
    StructuredError,
    WorkerCrashError,
    describeError,
    errorMessage,
} from './structured_error';
import { ToolRegistry } from './tool_registry';
import { WorkerResponse } from './worker_executor';
import { WorkerFactory, WorkerSupervisor } from './worker_supervisor';

const log = createLogger('orchestrator');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface Invocation {
    readonly callId: string;
    readonly traceId: string;
    readonly parent: Invocation | null;
    readonly depth: number;
    readonly role: string;
    readonly method: string;
    readonly args: JsonValue[];
    readonly kwargs: JsonObject;
}

export function newInvocation(params: {
    role: string;
    method: string;
    args: JsonValue[];
    kwargs: JsonObject;
    parent?: Invocation | null;
}): Invocation {
    const callId = crypto.randomUUID();
    const parent = params.parent ?? null;
    return Object.freeze({
        callId,
        traceId: parent ? parent.traceId : callId,
        parent,
        depth: parent ? parent.depth + 1 : 0,
        role: params.role,
        method: params.method,
        args: params.args,
        kwargs: params.kwargs,
    });
}

/** Process-wide collaborators shared by an agent and everything it delegates to. */
export interface CallServices {
    config: RuntimeConfig;
    generator: CodeGenerator;
    artifacts: ArtifactStore;
    registry: ToolRegistry;
    environments: EnvironmentManager;
    guardrails: GuardrailPolicy;
    sandbox: ExecutionSandbox;
    callLog: CallLog | null;
    workerFactory?: WorkerFactory;
}

export interface HandlerCall {
    args: JsonValue[];
    kwargs: JsonObject;
    memory: JsonObject;
    runtimeContext: Record<string, JsonValue>;
}

export type MethodHandler = (call: HandlerCall) => unknown;

/** The agent side of an invocation: identity, memory, manifest and handle factories. */
export interface CallSubject {
    readonly role: string;
    readonly purpose: string | null;
    readonly deliverable: DeliverableContract | null;
    readonly cell: MemoryCell;
    readonly manifest: DependencyManifest | null;
    readonly supervisor: WorkerSupervisor;
    handlerFor(method: string): MethodHandler | null;
    prepareDeclared(): Promise<void>;
    adoptManifest(manifest: DependencyManifest): void;
    delegateHandle(role: string, options: unknown, parent: Invocation): DelegatedHandle;
    toolHandle(name: string, parent: Invocation): DelegatedHandle;
    remember(entries: unknown): void;
}

interface GenerationMode {
    source: 'generated' | 'repaired';
    userPrompt: string;
    /** One attempt, no retry budgets; used for in-place repair. */
    singleShot: boolean;
}

interface ProgramRun {
    raw: unknown;
    /** `context.tools` as the program left it. */
    tools: unknown;
}

type ViolationStep = { retry: true; feedback: string } | { retry: false; outcome: Outcome };

const EXECUTION_FAULTS: ReadonlySet<string> = new Set([
    ERROR_TYPES.EXECUTION,
    ERROR_TYPES.WORKER_CRASH,
    ERROR_TYPES.NON_SERIALIZABLE_RESULT,
    ERROR_TYPES.TIMEOUT,
]);

function originOf(inv: Invocation): OutcomeOrigin {
    return { toolRole: inv.role, methodName: inv.method };
}

function runtimeContextOf(inv: Invocation): Record<string, JsonValue> {
    return {
        depth: inv.depth,
        trace_id: inv.traceId,
        call_id: inv.callId,
        parent_call_id: inv.parent ? inv.parent.callId : null,
        role: inv.role,
        method: inv.method,
    };
}

function outcomeFromFailure(failure: StructuredError, inv: Invocation, stage: string): Outcome {
    return errorOutcome({
        errorType: failure.errorType,
        errorMessage: failure.message,
        retriable: failure.retriable,
        metadata: { ...failure.metadata, error_class: failure.errorClass, stage },
        ...originOf(inv),
    });
}

/** A spent budget, reported with exactly the metadata it was raised with. */
function exhaustedOutcome(err: CallError, inv: Invocation): Outcome {
    return errorOutcome({
        errorType: err.errorType,
        errorMessage: err.message,
        retriable: err.retriable,
        metadata: err.metadata,
        ...originOf(inv),
    });
}

/** Worker crashes and worker timeouts stay retriable until the supervisor declares them terminal. */
function supervisorOwned(failure: StructuredError): boolean {
    return failure.errorType === ERROR_TYPES.WORKER_CRASH
        || (failure.errorType === ERROR_TYPES.TIMEOUT && 'worker_pid' in failure.metadata);
}

/** An execution fault that outlived its repair budget. */
function terminalFault(failure: StructuredError, stage: string): StructuredError {
    if (stage !== 'execution' || !EXECUTION_FAULTS.has(failure.errorType) || supervisorOwned(failure)) return failure;
    return { ...failure, retriable: false };
}

function workerFailure(response: WorkerResponse): Error {
    const message = response.error_message ?? 'worker reported an error';
    switch (response.error_type) {
        case ERROR_TYPES.NON_SERIALIZABLE_RESULT:
            return new NonSerializableResultError(message, { metadata: { stage: 'execution', boundary: 'worker_response' } });
        case ERROR_TYPES.WORKER_CRASH:
            return new WorkerCrashError(message);
        default:
            return new ExecutionError(message, {
                metadata: { stage: 'execution', error_class: response.error_class, worker_pid: response.worker_pid },
            });
    }
}

/** Raw results must be plain data, whichever runtime produced them. */
function assertPlainResult(raw: unknown): void {
    const value = isOutcome(raw) ? (raw.status === 'ok' ? raw.value : raw.metadata) : raw;
    const bad = findNonJsonPath(value === undefined ? null : value);
    if (bad) {
        throw new NonSerializableResultError(`program result is not plain data (offending value at ${bad})`, {
            metadata: { stage: 'execution', boundary: 'result', path: bad },
        });
    }
}

/** Copies a checked sandbox result out of the program's realm. */
function hostResult(raw: unknown): unknown {
    if (!isOutcome(raw)) return raw === undefined ? undefined : toHostJson(raw);
    const origin = { toolRole: raw.toolRole, methodName: raw.methodName };
    if (raw.status === 'ok') return okOutcome(toHostJson(raw.value) ?? null, origin);
    const metadata = toHostJson(raw.metadata);
    return errorOutcome({ ...raw, metadata: isJsonObject(metadata) ? metadata : {} });
}

/* -------------------------------------------------------------------------- */
/* Orchestrator                                                               */
/* -------------------------------------------------------------------------- */

export class CallOrchestrator {
    constructor(private readonly services: CallServices) {}

    async invoke(subject: CallSubject, inv: Invocation): Promise<Outcome> {
        const started = Date.now();
        const state = new CallState(inv.callId);
        setCorrelation({ traceId: inv.traceId, callId: inv.callId, role: inv.role, method: inv.method });

        let outcome: Outcome;
        try {
            outcome = await this.dispatch(subject, inv, state);
        } catch (err) {
            log.error('invocation failed unexpectedly', { error: errorMessage(err) });
            outcome = outcomeFromFailure(describeError(err), inv, state.stage);
        }

        outcome = normalizeBoundaryOutcome(outcome, inv.depth);
        state.outcome = outcome;
        this.recordToolUsage(inv, state, outcome);
        this.emitRecord(inv, state, outcome, Date.now() - started);
        this.flushStores();

        if (inv.parent) {
            setCorrelation({ traceId: inv.parent.traceId, callId: inv.parent.callId, role: inv.parent.role, method: inv.parent.method });
        } else {
            clearCorrelation();
        }
        return outcome;
    }

    /* ------------------------------------------------------------------------ */
    /* Dispatch                                                                 */
    /* ------------------------------------------------------------------------ */

    private async dispatch(subject: CallSubject, inv: Invocation, state: CallState): Promise<Outcome> {
        try {
            await subject.prepareDeclared();
        } catch (err) {
            log.warn('declared dependencies could not be prepared', { error: errorMessage(err) });
            return outcomeFromFailure(describeError(err), inv, 'dependencies');
        }
        const handler = subject.handlerFor(inv.method);
        return handler ? this.runHandler(subject, inv, handler) : this.resolve(subject, inv, state);
    }

    private async runHandler(subject: CallSubject, inv: Invocation, handler: MethodHandler): Promise<Outcome> {
        try {
            const raw = await handler({
                args: cloneJson(inv.args),
                kwargs: cloneJson(inv.kwargs),
                memory: subject.cell.memory,
                runtimeContext: runtimeContextOf(inv),
            });
            return coerceOutcome(raw, originOf(inv));
        } catch (err) {
            return outcomeFromFailure(describeError(err), inv, 'execution');
        }
    }

    private async resolve(subject: CallSubject, inv: Invocation, state: CallState): Promise<Outcome> {
        const { artifacts, config } = this.services;
        const record = artifacts.load(inv.role, inv.method);

        if (record) {
            const choice = selectVersion(record, config.promotionEnforced);
            if (choice) {
                adoptVersion(record, choice);
                const verdict = reuseVerdict(record);
                if (verdict.reusable) return this.runPersisted(subject, inv, state, record);
                log.info('persisted program not reusable; generating', { reason: verdict.reason });
            } else {
                log.info('no selectable program version; regenerating');
            }
        }

        state.trigger = record ? 'regenerate' : 'initial_forge';
        return this.runGenerated(subject, inv, state, record, {
            source: 'generated',
            userPrompt: this.basePrompt(subject, inv),
            singleShot: false,
        });
    }

    private async runPersisted(subject: CallSubject, inv: Invocation, state: CallState, record: ArtifactRecord): Promise<Outcome> {
        const { registry } = this.services;
        state.useProgram(record.code, record.dependencies, 'persisted');
        state.beginAttempt();
        const snapshot = captureAttempt(subject.cell, registry);

        let outcome: Outcome;
        try {
            outcome = await this.runProgram(subject, inv, state, record);
        } catch (err) {
            restoreAttempt(snapshot, subject.cell, registry);
            outcome = this.finalFailure(state, inv, err);
        }

        this.observe(record, inv, state, outcome, record.checksum);
        if (outcome.status === 'ok') {
            this.saveArtifact(record);
            return outcome;
        }

        const decision = decidePersistedRecovery(record, outcome.errorType);
        if (decision.action === 'passthrough') {
            this.saveArtifact(record);
            return outcome;
        }

        restoreAttempt(snapshot, subject.cell, registry);
        const latest = state.latestFailure;
        const failed = latest && latest.attempt_id === state.attemptId
            ? latest
            : state.recordFailure(state.stage === 'validation' ? 'validation' : 'outcome_policy', outcome.errorType, 'ErrorOutcome', outcome.errorMessage);
        state.trigger = decision.trigger;
        state.triggerStage = failed.stage;
        state.triggerFailureClass = decision.failureClass;
        state.triggerErrorMessage = truncateFailureMessage(outcome.errorMessage);
        this.saveArtifact(record);
        log.info('persisted program failed', { errorType: outcome.errorType, action: decision.action });

        const base = this.basePrompt(subject, inv);
        if (decision.action === 'repair') {
            const repaired = await this.runGenerated(subject, inv, state, record, {
                source: 'repaired',
                userPrompt: getRepairUserPrompt(base, {
                    code: record.code,
                    trigger: decision.trigger,
                    errorType: outcome.errorType,
                    errorMessage: outcome.errorMessage,
                }),
                singleShot: true,
            });
            if (repaired.status === 'ok') return repaired;
            log.warn('repair failed; falling through to regeneration', { errorType: repaired.errorType });
            state.trigger = 'regenerate';
        }
        return this.runGenerated(subject, inv, state, record, { source: 'generated', userPrompt: base, singleShot: false });
    }

    private async runGenerated(
        subject: CallSubject,
        inv: Invocation,
        state: CallState,
        record: ArtifactRecord | null,
        mode: GenerationMode
    ): Promise<Outcome> {
        const { config, generator, registry } = this.services;
        let feedback: RetryFeedback = {};

        for (;;) {
            const snapshot = captureAttempt(subject.cell, registry);
            state.beginAttempt();

            let outcome: Outcome;
            try {
                const program = await generateProgramWithRetry(generator, {
                    model: config.model,
                    systemPrompt: getProgramSystemPrompt(),
                    userPrompt: retryUserPrompt(mode.userPrompt, feedback),
                    timeoutMs: config.generationTimeoutMs,
                    attempts: mode.singleShot ? 1 : config.generationAttempts,
                    onAttempt: () => { state.generationAttempts += 1; },
                });
                state.useProgram(program.code, program.dependencies, mode.source);
                outcome = await this.runProgram(subject, inv, state, record);
            } catch (err) {
                restoreAttempt(snapshot, subject.cell, registry);
                if (err instanceof GuardrailViolationError) {
                    const step = this.onViolation(state, inv, err, mode.singleShot);
                    if (step.retry) {
                        feedback = { ...feedback, guardrail: step.feedback };
                        continue;
                    }
                    return this.settleGenerated(record, inv, state, step.outcome);
                }

                const failure = describeError(err);
                const stage = state.stage;
                state.recordFailure(stage, failure.errorType, failure.errorClass, failure.message);
                if (!mode.singleShot && this.executionRepairable(failure, stage, state)) {
                    state.executionRepairAttempts += 1;
                    feedback = {
                        ...feedback,
                        execution: executionFeedback(failure, {
                            attemptNumber: state.attemptId,
                            remainingBudget: BUDGETS.EXECUTION_REPAIR - state.executionRepairAttempts,
                        }),
                    };
                    continue;
                }
                return this.settleGenerated(record, inv, state, outcomeFromFailure(terminalFault(failure, stage), inv, stage));
            }

            if (outcome.status === 'error' && !mode.singleShot && outcomeRepairEligible(outcome.errorType, outcome.retriable)) {
                restoreAttempt(snapshot, subject.cell, registry);
                state.recordFailure('outcome_policy', outcome.errorType, 'ErrorOutcome', outcome.errorMessage);
                if (state.outcomeRepairAttempts >= config.outcomeRepairBudget) {
                    state.outcomeRepairRetryExhausted = true;
                    const exhausted = new OutcomeRepairRetryExhaustedError(
                        `outcome repair budget exhausted after ${state.outcomeRepairAttempts} repair(s): ${outcome.errorMessage}`,
                        {
                            metadata: {
                                outcome_repair_attempts: state.outcomeRepairAttempts,
                                last_error_type: outcome.errorType,
                                last_error_message: outcome.errorMessage,
                            },
                        }
                    );
                    return this.settleGenerated(record, inv, state, exhaustedOutcome(exhausted, inv));
                }
                state.outcomeRepairAttempts += 1;
                feedback = {
                    ...feedback,
                    outcome: outcomeFeedback(outcome, {
                        attemptNumber: state.attemptId,
                        remainingBudget: config.outcomeRepairBudget - state.outcomeRepairAttempts,
                    }),
                };
                continue;
            }

            return this.settleGenerated(record, inv, state, outcome);
        }
    }

    private executionRepairable(failure: StructuredError, stage: string, state: CallState): boolean {
        if (stage !== 'execution' || !EXECUTION_FAULTS.has(failure.errorType)) return false;
        if (failure.errorType === ERROR_TYPES.WORKER_CRASH && !failure.retriable) return false;
        return state.executionRepairAttempts < BUDGETS.EXECUTION_REPAIR;
    }

    private onViolation(state: CallState, inv: Invocation, err: GuardrailViolationError, singleShot: boolean): ViolationStep {
        const { config } = this.services;
        const v = classifyViolation(err);
        state.recordFailure('guardrail', v.type, err.name, v.message);

        if (v.guardrailClass === 'terminal_guardrail' || singleShot) {
            return {
                retry: false,
                outcome: errorOutcome({
                    errorType: v.type,
                    errorMessage: v.message,
                    retriable: false,
                    metadata: {
                        guardrail_class: v.guardrailClass,
                        guardrail_subtype: v.subtype,
                        required_correction: v.requiredCorrection,
                        location: v.location,
                    },
                    ...originOf(inv),
                }),
            };
        }

        if (state.guardrailRecoveryAttempts >= config.guardrailRecoveryBudget) {
            state.guardrailRetryExhausted = true;
            log.warn('guardrail retry budget exhausted', { subtype: v.subtype, attempts: state.guardrailRecoveryAttempts });
            const exhausted = new GuardrailRetryExhaustedError(
                `guardrail retry budget exhausted after ${state.guardrailRecoveryAttempts} recovery attempt(s): ${v.message}`,
                {
                    metadata: {
                        guardrail_class: v.guardrailClass,
                        guardrail_recovery_attempts: state.guardrailRecoveryAttempts,
                        last_violation_type: v.type,
                        last_violation_subtype: v.subtype,
                        last_violation_message: v.message,
                    },
                }
            );
            return { retry: false, outcome: exhaustedOutcome(exhausted, inv) };
        }

        state.guardrailRecoveryAttempts += 1;
        log.info('guardrail violation; regenerating', { subtype: v.subtype, attempt: state.attemptId });
        return {
            retry: true,
            feedback: guardrailFeedback(v, {
                attemptNumber: state.attemptId,
                remainingBudget: config.guardrailRecoveryBudget - state.guardrailRecoveryAttempts,
            }),
        };
    }

    /** Failure of a single (persisted) attempt, recorded and typed; never retried here. */
    private finalFailure(state: CallState, inv: Invocation, err: unknown): Outcome {
        if (err instanceof GuardrailViolationError) {
            const step = this.onViolation(state, inv, err, true);
            if (!step.retry) return step.outcome;
        }
        const failure = describeError(err);
        state.recordFailure(state.stage, failure.errorType, failure.errorClass, failure.message);
        return outcomeFromFailure(failure, inv, state.stage);
    }

    /* ------------------------------------------------------------------------ */
    /* One attempt                                                              */
    /* ------------------------------------------------------------------------ */

    private async runProgram(subject: CallSubject, inv: Invocation, state: CallState, record: ArtifactRecord | null): Promise<Outcome> {
        const { guardrails, registry, config } = this.services;
        const code = state.code;
        if (code === null) throw new InvalidCodeError('no program selected for this attempt');
        state.contractApplied = false;
        state.contractPassed = null;

        state.stage = 'guardrail';
        guardrails.enforce('code', { role: inv.role, method: inv.method, code, tools: registry.tools() });

        state.stage = 'execution';
        const manifest = resolveCallManifest(inv.role, subject.manifest, state.manifest);
        enforceDependencyPolicy(manifest, config);
        const origin = originOf(inv);
        const run = manifest.length === 0
            ? await this.runInSandbox(subject, inv, code, origin)
            : await this.runInWorker(subject, inv, state, manifest, code, origin);
        const coerced = coerceOutcome(run.raw, origin);

        state.stage = 'guardrail';
        guardrails.enforce('outcome', { role: inv.role, method: inv.method, code, tools: run.tools, outcome: coerced });
        if (coerced.status === 'error') return coerced;

        state.stage = 'validation';
        let outcome: Outcome = coerced;
        if (subject.deliverable) {
            state.contractApplied = true;
            outcome = validateOutcomeContract(outcome, subject.deliverable, { args: inv.args, kwargs: inv.kwargs });
            state.contractPassed = outcome.status === 'ok';
        }
        if (outcome.status === 'ok' && state.programSource !== 'persisted') {
            state.stage = 'guardrail';
            this.checkContinuity(record, code, state);
            state.stage = 'validation';
        }
        return coerceLowUtility(outcome);
    }

    private async runInSandbox(subject: CallSubject, inv: Invocation, code: string, origin: OutcomeOrigin): Promise<ProgramRun> {
        const { config, registry, sandbox } = this.services;
        const memory = subject.cell.memory;
        memory.tools = registry.tools();

        const caps: SandboxCapabilities = {
            memory,
            args: cloneJson(inv.args),
            kwargs: cloneJson(inv.kwargs),
            runtimeContext: runtimeContextOf(inv),
            delegate: (role, options) => subject.delegateHandle(role, options, inv),
            tool: (name) => subject.toolHandle(name, inv),
            remember: (entries) => subject.remember(entries),
        };

        let raw: unknown;
        let tools: unknown;
        try {
            raw = await sandbox.run(caps, {
                code,
                origin,
                syncTimeoutMs: config.sandboxSyncTimeoutMs,
                timeoutMs: config.executionTimeoutMs,
            });
        } finally {
            tools = memory.tools;
            delete memory.tools;
        }

        const bad = findNonJsonPath(memory);
        if (bad) {
            throw new NonSerializableResultError(`memory must stay plain data (offending value at ${bad})`, {
                metadata: { stage: 'execution', boundary: 'memory', path: bad },
            });
        }
        assertPlainResult(raw);
        subject.cell.memory = cloneJson(memory);
        return { raw: hostResult(raw), tools };
    }

    private async runInWorker(
        subject: CallSubject,
        inv: Invocation,
        state: CallState,
        manifest: DependencyManifest,
        code: string,
        origin: OutcomeOrigin
    ): Promise<ProgramRun> {
        const { environments, registry } = this.services;
        const env = await environments.ensureEnvironment(manifest);
        subject.adoptManifest(manifest);
        state.envId = env.envId;
        state.envCacheHit = env.cacheHit;

        const context: JsonObject = { ...cloneJson(subject.cell.memory), tools: registry.tools() };
        const response = await subject.supervisor.execute(env, {
            method: inv.method,
            code,
            args: inv.args,
            kwargs: inv.kwargs,
            context,
        });
        state.workerPid = response.worker_pid;
        state.workerRestartCount = response.restart_count;
        if (response.status === 'error') throw workerFailure(response);

        const returned: JsonObject = response.context ? { ...response.context } : {};
        const tools = returned.tools;
        delete returned.tools;
        subject.cell.memory = returned;
        return { raw: decodeOutcome(response.value, origin), tools };
    }

    private checkContinuity(record: ArtifactRecord | null, code: string, state: CallState): void {
        const result = checkStateKeyContinuity(record, code, codeChecksum(code));
        if (result.consistent) return;
        state.continuityViolation = true;
        const enforced = this.services.config.promotionEnforced;
        log.warn('state key continuity violation', { keys: result.keys, priorKeys: result.priorKeys, enforced });
        if (!enforced) return;
        throw new GuardrailViolationError(
            `program state keys [${result.keys.join(', ')}] share none with prior versions [${result.priorKeys.join(', ')}]`,
            {
                subtype: 'state_key_continuity',
                requiredCorrection: `Keep reading and writing the existing memory keys (${result.priorKeys.join(', ')}); do not rename state.`,
            }
        );
    }

    /* ------------------------------------------------------------------------ */
    /* Persistence and accounting                                               */
    /* ------------------------------------------------------------------------ */

    /** Persists a successful fresh program; folds a failed one into the existing artifact's counters. */
    private settleGenerated(record: ArtifactRecord | null, inv: Invocation, state: CallState, outcome: Outcome): Outcome {
        const code = state.code;
        if (code === null) return outcome;
        if (outcome.status === 'ok') {
            const saved = this.adoptProgram(record, inv, state, code);
            this.observe(saved, inv, state, outcome, saved.checksum);
            this.saveArtifact(saved);
        } else if (record) {
            this.observe(record, inv, state, outcome, codeChecksum(code));
            this.saveArtifact(record);
        }
        return outcome;
    }

    private adoptProgram(record: ArtifactRecord | null, inv: Invocation, state: CallState, code: string): ArtifactRecord {
        const { config } = this.services;
        const now = new Date().toISOString();
        const checksum = codeChecksum(code);
        const dependencies = state.dependencies();
        const trigger = state.trigger ?? 'initial_forge';

        const target = record ?? newArtifact({
            role: inv.role,
            method: inv.method,
            code,
            dependencies,
            policyVersion: config.promotionPolicy.version,
            now,
        });

        const entry: HistoryEntry = {
            checksum,
            parent_checksum: record ? record.checksum : null,
            trigger,
            created_at: now,
            code,
            dependencies,
        };
        if (state.triggerStage) entry.trigger_stage = state.triggerStage;
        if (state.triggerFailureClass) entry.trigger_failure_class = state.triggerFailureClass;
        if (state.triggerErrorMessage) entry.trigger_error_message = state.triggerErrorMessage;
        if (!target.history.some(h => h.checksum === checksum)) {
            target.history = [...target.history, entry].slice(-ARTIFACTS.HISTORY_LIMIT);
        }

        const dynamic = isDynamicDispatchMethod(inv.method);
        target.code = code;
        target.checksum = checksum;
        target.dependencies = dependencies;
        target.runtime_version = ARTIFACTS.RUNTIME_VERSION;
        target.prompt_version = ARTIFACTS.PROMPT_VERSION;
        target.cacheable = !dynamic;
        target.cacheable_reason = dynamic ? 'dynamic_dispatch_method' : 'stable_method';
        target.input_sensitive = dynamic;
        if (trigger.startsWith('repair:')) target.repair_count_since_regen += 1;
        else target.repair_count_since_regen = 0;
        target.updated_at = now;

        log.info('program persisted', { checksum: checksum.slice(0, 19), trigger, source: state.programSource });
        return target;
    }

    private observe(record: ArtifactRecord, inv: Invocation, state: CallState, outcome: Outcome, checksum: string): void {
        const { config } = this.services;
        recordArtifactCall(record, {
            outcome,
            checksum,
            code: state.code ?? record.code,
            sessionId: inv.traceId,
            contractApplied: state.contractApplied,
            contractPassed: state.contractPassed,
            guardrailRetryExhausted: state.guardrailRetryExhausted,
            outcomeRetryExhausted: state.outcomeRepairRetryExhausted,
        });
        const promotion = applyPromotion(record, checksum, outcome.status === 'ok', {
            policy: config.promotionPolicy,
            shadowMode: config.promotionShadowMode,
            enforced: config.promotionEnforced,
        });
        if (promotion) {
            state.lifecycleState = promotion.state;
            state.lifecycleDecision = promotion.decision;
        }
    }

    private saveArtifact(record: ArtifactRecord): void {
        try {
            this.services.artifacts.save(record);
        } catch (err) {
            log.error('artifact save failed; continuing with in-memory result', { error: errorMessage(err) });
        }
    }

    private recordToolUsage(inv: Invocation, state: CallState, outcome: Outcome): void {
        const { registry } = this.services;
        if (!registry.has(inv.role)) return;
        registry.recordUsage(inv.role, inv.method, outcome.status === 'ok', state.lifecycleState ?? undefined);
    }

    private emitRecord(inv: Invocation, state: CallState, outcome: Outcome, durationMs: number): void {
        const sink = this.services.callLog;
        if (!sink) return;
        const record: CallRecord = {
            trace_id: inv.traceId,
            call_id: inv.callId,
            parent_call_id: inv.parent ? inv.parent.callId : null,
            depth: inv.depth,
            role: inv.role,
            method: inv.method,
            outcome_status: outcome.status,
            error_type: outcome.status === 'error' ? outcome.errorType : null,
            error_message: outcome.status === 'error' ? outcome.errorMessage : null,
            program_source: state.code === null ? null : state.programSource,
            artifact_hit: state.artifactHit,
            attempt_id: state.attemptId,
            generation_attempts: state.generationAttempts,
            guardrail_recovery_attempts: state.guardrailRecoveryAttempts,
            execution_repair_attempts: state.executionRepairAttempts,
            outcome_repair_attempts: state.outcomeRepairAttempts,
            attempt_failures: [...state.attemptFailures],
            code: state.code,
            dependencies: state.dependencies(),
            env_id: state.envId,
            env_cache_hit: state.envCacheHit,
            worker_pid: state.workerPid,
            worker_restart_count: state.workerRestartCount,
            lifecycle_state: state.lifecycleState,
            lifecycle_decision: state.lifecycleDecision,
            contract_validation_passed: state.contractApplied ? state.contractPassed : null,
            continuity_violation: state.continuityViolation,
            duration_ms: durationMs,
            created_at: new Date().toISOString(),
        };
        try {
            sink.recordCall(record);
        } catch (err) {
            log.error('call record not written', { error: errorMessage(err) });
        }
    }

    private flushStores(): void {
        try {
            this.services.registry.flush();
        } catch (err) {
            log.error('tool registry flush failed', { error: errorMessage(err) });
        }
    }

    private basePrompt(subject: CallSubject, inv: Invocation): string {
        return getProgramUserPrompt({
            role: inv.role,
            method: inv.method,
            purpose: subject.purpose,
            args: inv.args,
            kwargs: inv.kwargs,
            deliverable: subject.deliverable,
            memoryKeys: Object.keys(subject.cell.memory).sort(),
            dependencies: subject.manifest ? subject.manifest.map(d => ({ ...d })) : [],
        });
    }
}

