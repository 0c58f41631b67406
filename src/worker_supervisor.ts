/**
 * Worker Supervisor: keeps at most one live worker, bound to one environment id.
 *
 * - A request for another environment id shuts the current worker down and
 *   starts a fresh one.
 * - A crash or timeout restarts the worker while consecutive failures stay
 *   within `maxRestarts`. Once they exceed it, no worker is started again for
 *   that environment and requests fail with a terminal worker_crash.
 * - Requests are serialized; a worker never sees two requests at once.
 */

import * as crypto from 'crypto';
import { TIMEOUTS, WORKER } from './config';
import { EnvironmentHandle } from './environment_manager';
import { JsonObject, JsonValue, cloneJson, findNonJsonPath, isJsonObject, isJsonValue } from './json_value';
import { createLogger } from './logger';
import {
    CallError,
    ExecutionTimeoutError,
    NonSerializableResultError,
    WorkerCrashError,
    errorMessage,
} from './structured_error';
import { WorkerExecutor, WorkerHandle, WorkerResponse, WorkerTarget } from './worker_executor';

const log = createLogger('worker-supervisor');

export type WorkerFactory = (target: WorkerTarget, timeoutMs: number) => WorkerHandle;

export const defaultWorkerFactory: WorkerFactory = (target, timeoutMs) =>
    new WorkerExecutor(target, { timeoutMs, shutdownGraceMs: TIMEOUTS.WORKER_SHUTDOWN_GRACE_MS }).start();

export interface WorkerCall {
    method: string;
    code: string;
    args: unknown;
    kwargs: unknown;
    context: unknown;
}

export interface SupervisedResponse extends WorkerResponse {
    restart_count: number;
}

export interface WorkerSupervisorOptions {
    maxRestarts?: number;
    timeoutMs?: number;
    factory?: WorkerFactory;
}

function assertPlainData(label: string, value: unknown): void {
    const bad = findNonJsonPath(value);
    if (bad) {
        throw new NonSerializableResultError(`${label} must be plain serializable data (offending value at ${bad})`, {
            metadata: { stage: 'execution', boundary: 'worker_request', path: bad },
        });
    }
}

export class WorkerSupervisor {
    private readonly maxRestarts: number;
    private readonly timeoutMs: number;
    private readonly factory: WorkerFactory;

    private worker: WorkerHandle | null = null;
    private target: WorkerTarget | null = null;
    private consecutiveFailures = 0;
    private restarts = 0;
    private exhausted = false;
    private queue: Promise<unknown> = Promise.resolve();

    constructor(opts: WorkerSupervisorOptions = {}) {
        this.maxRestarts = opts.maxRestarts ?? WORKER.MAX_RESTARTS;
        this.timeoutMs = opts.timeoutMs ?? TIMEOUTS.WORKER_MS;
        this.factory = opts.factory ?? defaultWorkerFactory;
    }

    get envId(): string | null {
        return this.target?.envId ?? null;
    }

    get restartCount(): number {
        return this.restarts;
    }

    get workerPid(): number | null {
        return this.worker?.pid ?? null;
    }

    /** Dispatches one call; concurrent callers are queued behind each other. */
    execute(env: EnvironmentHandle, call: WorkerCall): Promise<SupervisedResponse> {
        const run = this.queue.then(() => this.dispatch(env, call));
        // the queue only orders work; each caller observes its own result
        this.queue = run.catch((err: unknown) => log.debug('queued worker call failed', { error: errorMessage(err) }));
        return run;
    }

    shutdown(): Promise<void> {
        const run = this.queue.then(() => this.stopWorker('shutdown'));
        this.queue = run.catch((err: unknown) => log.warn('worker shutdown failed', { error: errorMessage(err) }));
        return run;
    }

    private async dispatch(env: EnvironmentHandle, call: WorkerCall): Promise<SupervisedResponse> {
        assertPlainData('args', call.args);
        assertPlainData('kwargs', call.kwargs);
        assertPlainData('context', call.context);

        if (this.target?.envId !== env.envId) {
            if (this.worker) {
                log.info('environment changed; restarting worker', { from: this.target?.envId, to: env.envId });
            }
            await this.stopWorker('environment_changed');
            this.target = { envId: env.envId, envDir: env.envDir };
            this.consecutiveFailures = 0;
            this.restarts = 0;
            this.exhausted = false;
        }

        const worker = this.ensureWorker();
        const request = {
            ipc_version: WORKER.IPC_VERSION,
            call_id: crypto.randomUUID(),
            method: call.method,
            code: call.code,
            args: toArray(call.args),
            kwargs: toObject(call.kwargs),
            context: toObject(call.context),
        };

        try {
            const response = await worker.execute(request);
            this.consecutiveFailures = 0;
            return { ...response, restart_count: this.restarts };
        } catch (err) {
            if (err instanceof WorkerCrashError || err instanceof ExecutionTimeoutError) {
                await this.recordFailure(err);
                throw err;
            }
            if (err instanceof CallError) throw err;
            await this.recordFailure(err);
            throw new WorkerCrashError(`worker failed: ${errorMessage(err)}`, { cause: err });
        }
    }

    private ensureWorker(): WorkerHandle {
        if (this.worker && this.worker.running) return this.worker;
        const target = this.target;
        if (!target) throw new WorkerCrashError('worker supervisor has no environment bound');
        if (this.exhausted) {
            throw new WorkerCrashError(
                `worker restart budget exhausted for environment ${target.envId} (${this.maxRestarts} restarts)`,
                { terminal: true, metadata: { env_id: target.envId, restart_count: this.restarts, max_restarts: this.maxRestarts } }
            );
        }
        this.worker = this.factory(target, this.timeoutMs);
        return this.worker;
    }

    private async recordFailure(err: unknown): Promise<void> {
        this.consecutiveFailures += 1;
        const failed = this.worker;
        this.worker = null;
        if (failed) await failed.shutdown();

        const target = this.target;
        if (!target) return;
        if (this.consecutiveFailures <= this.maxRestarts) {
            this.restarts += 1;
            log.warn('worker failed; restarting', {
                envId: target.envId,
                restartCount: this.restarts,
                maxRestarts: this.maxRestarts,
                error: errorMessage(err),
            });
            this.worker = this.factory(target, this.timeoutMs);
        } else {
            this.exhausted = true;
            log.error('worker restart budget exhausted', { envId: target.envId, failures: this.consecutiveFailures });
        }
    }

    private async stopWorker(reason: string): Promise<void> {
        const worker = this.worker;
        this.worker = null;
        if (!worker) return;
        log.debug('stopping worker', { envId: this.target?.envId, pid: worker.pid, reason });
        await worker.shutdown();
    }
}

function toArray(value: unknown): JsonValue[] {
    if (!isJsonValue(value) || !Array.isArray(value)) return [];
    return cloneJson(value);
}

function toObject(value: unknown): JsonObject {
    return isJsonObject(value) ? cloneJson(value) : {};
}
