// Shared in-process stand-ins for the generator, environments and workers.

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { Agent } from '../src/agent';
import { ArtifactStore } from '../src/artifact_store';
import { MemoryCallLog } from '../src/call_log';
import { RuntimeConfig } from '../src/config';
import { DeliverableContract } from '../src/contract_validator';
import { DependencyManifest } from '../src/dependency_manifest';
import { EnvironmentHandle, EnvironmentManager } from '../src/environment_manager';
import { ErrorOutcome, Outcome } from '../src/outcome';
import { CodeGenerator, GenerationRequest, GenerationResponse } from '../src/program_generator';
import { ToolRegistry } from '../src/tool_registry';
import { WorkerHandle, WorkerRequest, WorkerResponse, WorkerTarget } from '../src/worker_executor';
import { WorkerFactory } from '../src/worker_supervisor';

export async function withTmpDir<T>(prefix: string, fn: (dir: string) => Promise<T> | T): Promise<T> {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
    try {
        return await fn(dir);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

/** Replies with the scripted responses in order; an Error entry is thrown instead. */
export class ScriptedGenerator implements CodeGenerator {
    readonly requests: GenerationRequest[] = [];
    private readonly script: Array<GenerationResponse | Error>;

    constructor(script: Array<GenerationResponse | Error | string>) {
        this.script = script.map(s => (typeof s === 'string' ? { code: s, dependencies: [] } : s));
    }

    get remaining(): number {
        return this.script.length;
    }

    async generateProgram(request: GenerationRequest): Promise<GenerationResponse> {
        this.requests.push(request);
        const next = this.script.shift();
        if (next === undefined) throw new Error('generator script exhausted');
        if (next instanceof Error) throw next;
        return next;
    }
}

/** Records every manifest it prepares; queued failures are thrown first, one per call. */
export class FakeEnvironments implements EnvironmentManager {
    readonly prepared: DependencyManifest[] = [];
    readonly failures: Error[] = [];

    async ensureEnvironment(manifest: DependencyManifest): Promise<EnvironmentHandle> {
        const failure = this.failures.shift();
        if (failure) throw failure;
        const envId = `env-${manifest.map(d => `${d.name}@${d.version}`).join('+')}`;
        const cacheHit = this.prepared.some(m => JSON.stringify(m) === JSON.stringify(manifest));
        this.prepared.push(manifest);
        return { envId, envDir: path.join(os.tmpdir(), envId), manifest, cacheHit, prepareMs: 0, installMs: cacheHit ? null : 0 };
    }
}

export type FakeReply = (request: WorkerRequest) => Partial<WorkerResponse> | Error;

/** In-process worker; each reply is built from the request, or thrown when it is an Error. */
export class FakeWorker implements WorkerHandle {
    running = true;
    readonly requests: WorkerRequest[] = [];

    constructor(readonly pid: number, private readonly reply: FakeReply) {}

    async execute(request: WorkerRequest): Promise<WorkerResponse> {
        this.requests.push(request);
        const r = this.reply(request);
        if (r instanceof Error) {
            this.running = false;
            throw r;
        }
        return {
            ipc_version: request.ipc_version,
            call_id: request.call_id,
            status: 'ok',
            value: null,
            error_type: null,
            error_message: null,
            error_class: null,
            context: request.context,
            worker_pid: this.pid,
            ...r,
        };
    }

    async shutdown(): Promise<void> {
        this.running = false;
    }
}

export function fakeWorkerFactory(reply: FakeReply): { factory: (t: WorkerTarget) => FakeWorker; started: FakeWorker[] } {
    const started: FakeWorker[] = [];
    return {
        started,
        factory: () => {
            const w = new FakeWorker(1000 + started.length, reply);
            started.push(w);
            return w;
        },
    };
}

/* -------------------------------------------------------------------------- */
/* Outcomes                                                                   */
/* -------------------------------------------------------------------------- */

export function okValue(outcome: Outcome): unknown {
    if (outcome.status !== 'ok') throw new Error(`expected ok, got ${outcome.errorType}: ${outcome.errorMessage}`);
    return outcome.value;
}

export function failure(outcome: Outcome): ErrorOutcome {
    if (outcome.status !== 'error') throw new Error(`expected an error outcome, got ok: ${JSON.stringify(outcome.value)}`);
    return outcome;
}

/* -------------------------------------------------------------------------- */
/* Agent harness                                                              */
/* -------------------------------------------------------------------------- */

export interface Harness {
    root: string;
    agent: Agent;
    generator: ScriptedGenerator;
    artifacts: ArtifactStore;
    registry: ToolRegistry;
    callLog: MemoryCallLog;
    environments: FakeEnvironments;
}

export interface HarnessOptions {
    role?: string;
    deliverable?: DeliverableContract | null;
    dependencies?: unknown[];
    config?: Partial<RuntimeConfig>;
    workerFactory?: WorkerFactory;
}

/** Runs `fn` against an agent wired to in-process stand-ins and a scratch artifact store. */
export async function withAgent<T>(
    script: Array<GenerationResponse | Error | string>,
    opts: HarnessOptions,
    fn: (h: Harness) => Promise<T>
): Promise<T> {
    return withTmpDir('callforge-', async (root) => {
        const generator = new ScriptedGenerator(script);
        const artifacts = new ArtifactStore({ root });
        const registry = ToolRegistry.inMemory();
        const callLog = new MemoryCallLog();
        const environments = new FakeEnvironments();
        const agent = new Agent({
            role: opts.role ?? 'counter',
            deliverable: opts.deliverable ?? null,
            dependencies: opts.dependencies,
            generator,
            artifacts,
            registry,
            callLog,
            environments,
            workerFactory: opts.workerFactory,
            config: {
                toolstoreRoot: root,
                generationAttempts: 1,
                guardrailRecoveryBudget: 1,
                outcomeRepairBudget: 1,
                delegationBudget: null,
                promotionShadowMode: true,
                promotionEnforced: false,
                allowedPackages: null,
                blockedPackages: null,
                sourceMode: 'public',
                ...opts.config,
            },
        });
        try {
            return await fn({ root, agent, generator, artifacts, registry, callLog, environments });
        } finally {
            await agent.close();
        }
    });
}
