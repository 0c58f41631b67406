/**
 * Agent - the public face of a role.
 *
 * Any method name can be called; a method without a defined handler is
 * resolved by the orchestrator (persisted program, repair or generation).
 * call() never throws: every failure comes back as an error Outcome.
 *
 * Agents created with delegate() share their parent's services (stores,
 * registry, call log, generator), but each owns its memory, its dependency
 * manifest, its worker and its own delegation budget.
 */

import { RuntimeConfig, resolveRuntimeConfig } from './config';
import { ArtifactStore } from './artifact_store';
import { CallLog, MemoryCallLog, SqliteCallLog } from './call_log';
import {
    CallOrchestrator,
    CallServices,
    CallSubject,
    Invocation,
    MethodHandler,
    newInvocation,
} from './call_orchestrator';
import { DeliverableContract, parseDeliverableContract } from './contract_validator';
import {
    DependencyManifest,
    enforceDependencyPolicy,
    normalizeManifest,
    resolveCallManifest,
} from './dependency_manifest';
import { DirectoryEnvironmentManager, EnvironmentHandle, EnvironmentManager } from './environment_manager';
import { DelegatedHandle, ExecutionSandbox } from './execution_sandbox';
import { GuardrailPolicy } from './guardrail_policy';
import { JsonObject, JsonValue, cloneJson, findNonJsonPath, isJsonObject, isJsonValue, isPlainObject } from './json_value';
import { createLogger } from './logger';
import { Outcome, errorOutcome } from './outcome';
import { CodeGenerator } from './program_generator';
import { BudgetExceededError, ERROR_TYPES, errorMessage } from './structured_error';
import { ToolRegistry } from './tool_registry';
import { WorkerFactory, WorkerSupervisor } from './worker_supervisor';

const log = createLogger('agent');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface AgentOptions {
    role: string;
    purpose?: string | null;
    deliverable?: DeliverableContract | null;
    /** Declared up front; prepared lazily on the first call that needs them. */
    dependencies?: unknown[];
    config?: Partial<RuntimeConfig>;
    /** Required unless `services` is given. */
    generator?: CodeGenerator;
    artifacts?: ArtifactStore;
    registry?: ToolRegistry;
    environments?: EnvironmentManager;
    /** `null` disables the call log; default follows `config.callLogPath`. */
    callLog?: CallLog | null;
    guardrails?: GuardrailPolicy;
    workerFactory?: WorkerFactory;
    /** Shared services of a parent agent. */
    services?: AgentRuntime;
}

export interface DelegateOptions {
    purpose?: string | null;
    deliverable?: DeliverableContract | null;
    dependencies?: unknown[];
}

/** What delegated agents share with the agent that created them. */
export interface AgentRuntime {
    readonly services: CallServices;
    readonly orchestrator: CallOrchestrator;
}

function buildRuntime(opts: AgentOptions): AgentRuntime {
    const config = resolveRuntimeConfig(opts.config);
    if (!opts.generator) throw new TypeError('an Agent needs a code generator');

    let callLog: CallLog | null;
    if (opts.callLog !== undefined) callLog = opts.callLog;
    else if (config.callLogPath === null) callLog = null;
    else if (config.callLogPath === ':memory:') callLog = new MemoryCallLog();
    else callLog = new SqliteCallLog(config.callLogPath);

    const services: CallServices = {
        config,
        generator: opts.generator,
        artifacts: opts.artifacts ?? new ArtifactStore({ root: config.toolstoreRoot }),
        registry: opts.registry ?? ToolRegistry.load(config.toolstoreRoot),
        environments: opts.environments ?? new DirectoryEnvironmentManager({
            root: config.toolstoreRoot,
            sourceMode: config.sourceMode,
            registries: config.packageRegistries,
        }),
        guardrails: opts.guardrails ?? new GuardrailPolicy(),
        sandbox: new ExecutionSandbox(),
        callLog,
        workerFactory: opts.workerFactory,
    };
    return { services, orchestrator: new CallOrchestrator(services) };
}

function budgetOutcome(role: string, method: string, message: string): Outcome {
    return errorOutcome({
        errorType: ERROR_TYPES.BUDGET_EXCEEDED,
        errorMessage: message,
        retriable: false,
        toolRole: role,
        methodName: method,
    });
}

/* -------------------------------------------------------------------------- */
/* Agent                                                                      */
/* -------------------------------------------------------------------------- */

export class Agent implements CallSubject {
    readonly role: string;
    readonly purpose: string | null;
    readonly deliverable: DeliverableContract | null;
    readonly cell: { memory: JsonObject } = { memory: {} };
    readonly supervisor: WorkerSupervisor;

    private readonly runtime: AgentRuntime;
    private readonly ownsRuntime: boolean;
    private readonly handlers = new Map<string, MethodHandler>();
    private readonly children = new Map<string, Agent>();
    private readonly declaredDependencies: DependencyManifest;
    private currentManifest: DependencyManifest | null = null;

    constructor(opts: AgentOptions) {
        if (opts.role.trim() === '') throw new TypeError('role must be a non-empty string');
        this.role = opts.role;
        this.purpose = opts.purpose ?? null;
        this.deliverable = opts.deliverable ?? null;
        this.declaredDependencies = normalizeManifest(opts.dependencies ?? []);
        this.ownsRuntime = opts.services === undefined;
        this.runtime = opts.services ?? buildRuntime(opts);

        const { config, workerFactory } = this.runtime.services;
        this.supervisor = new WorkerSupervisor({
            maxRestarts: config.maxWorkerRestarts,
            timeoutMs: config.workerTimeoutMs,
            factory: workerFactory,
        });
    }

    get config(): RuntimeConfig {
        return this.runtime.services.config;
    }

    get registry(): ToolRegistry {
        return this.runtime.services.registry;
    }

    get callLog(): CallLog | null {
        return this.runtime.services.callLog;
    }

    /** The dependency manifest this role is bound to, once one has been prepared. */
    get manifest(): DependencyManifest | null {
        return this.currentManifest;
    }

    /** A copy of the role's memory. */
    get memory(): JsonObject {
        return cloneJson(this.cell.memory);
    }

    /* ------------------------------------------------------------------------ */
    /* Calls                                                                    */
    /* ------------------------------------------------------------------------ */

    /** Registers a hand-written implementation; it takes precedence over generated programs. */
    define(method: string, handler: MethodHandler): this {
        this.handlers.set(method, handler);
        return this;
    }

    handlerFor(method: string): MethodHandler | null {
        return this.handlers.get(method) ?? null;
    }

    /** Invokes `method` at the top level of a new trace. */
    call(method: string, args: unknown[] = [], kwargs: Record<string, unknown> = {}): Promise<Outcome> {
        return this.invokeFrom(null, method, args, kwargs);
    }

    async invokeFrom(parent: Invocation | null, method: string, args: unknown, kwargs: unknown): Promise<Outcome> {
        const argList: unknown[] = args === undefined || args === null ? [] : (Array.isArray(args) ? args : [args]);
        const kw: unknown = kwargs === undefined || kwargs === null ? {} : kwargs;

        const jsonArgs: JsonValue[] = [];
        let bad: string | null = null;
        for (let i = 0; i < argList.length; i++) {
            const a = argList[i];
            if (!isJsonValue(a)) {
                bad = findNonJsonPath(a, `args[${i}]`) ?? `args[${i}]`;
                break;
            }
            jsonArgs.push(cloneJson(a));
        }
        if (!bad && !isJsonObject(kw)) {
            bad = isPlainObject(kw) ? (findNonJsonPath(kw, 'kwargs') ?? 'kwargs') : 'kwargs';
        }
        if (bad !== null || !isJsonObject(kw)) {
            const at = bad ?? 'kwargs';
            return errorOutcome({
                errorType: ERROR_TYPES.NON_SERIALIZABLE_RESULT,
                errorMessage: `call arguments must be plain data (offending value at ${at})`,
                retriable: false,
                metadata: { stage: 'execution', boundary: 'call_arguments', path: at },
                toolRole: this.role,
                methodName: method,
            });
        }

        const inv = newInvocation({ role: this.role, method, args: jsonArgs, kwargs: cloneJson(kw), parent });
        return this.runtime.orchestrator.invoke(this, inv);
    }

    /* ------------------------------------------------------------------------ */
    /* Delegation                                                               */
    /* ------------------------------------------------------------------------ */

    /**
     * Returns the helper agent for `role`, creating it on first use. Creating
     * a helper consumes one unit of this agent's delegation budget; asking
     * for an existing one does not.
     */
    delegate(role: string, opts: DelegateOptions = {}): Agent {
        const existing = this.children.get(role);
        if (existing) return existing;

        const budget = this.runtime.services.config.delegationBudget;
        if (budget !== null && this.children.size >= budget) {
            throw new BudgetExceededError(`delegation budget of ${budget} exhausted; cannot delegate to ${role}`, {
                metadata: { delegation_budget: budget, role },
            });
        }
        return this.spawn(role, opts);
    }

    private spawn(role: string, opts: DelegateOptions): Agent {
        const child = new Agent({
            role,
            purpose: opts.purpose ?? null,
            deliverable: opts.deliverable ?? null,
            dependencies: opts.dependencies,
            services: this.runtime,
        });
        this.children.set(role, child);
        this.runtime.services.registry.registerTool(role, {
            purpose: child.purpose ?? undefined,
            deliverable: child.deliverable ? toJsonContract(child.deliverable) : undefined,
        });
        log.info('delegated', { from: this.role, to: role, delegations: this.children.size });
        return child;
    }

    /** Handle given to programs by `delegate(role, options)`. */
    delegateHandle(role: string, options: unknown, parent: Invocation): DelegatedHandle {
        const opts = isPlainObject(options) ? options : {};
        let child: Agent;
        try {
            child = this.delegate(role, {
                purpose: typeof opts.purpose === 'string' ? opts.purpose : null,
                deliverable: parseDeliverableContract(opts.deliverable),
                dependencies: Array.isArray(opts.dependencies) ? opts.dependencies : undefined,
            });
        } catch (err) {
            const message = errorMessage(err);
            return Object.freeze({
                role,
                call: async (method: string) => budgetOutcome(role, method, message),
            });
        }
        return Object.freeze({
            role,
            call: (method: string, args?: unknown, kwargs?: unknown) => child.invokeFrom(parent, method, args, kwargs),
        });
    }

    /**
     * Handle given to programs by `tool(name)`; only registered tools can be
     * called. A tool registered by an earlier process is attached on first
     * use without counting as a delegation.
     */
    toolHandle(name: string, parent: Invocation): DelegatedHandle {
        const { registry } = this.runtime.services;
        const entry = registry.get(name);
        if (!entry || name === this.role) {
            const known = registry.names();
            return Object.freeze({
                role: name,
                call: async (method: string) => errorOutcome({
                    errorType: 'wrong_tool_boundary',
                    errorMessage: `${name} is not a registered tool of ${this.role}; known tools: ${known.join(', ') || '(none)'}`,
                    retriable: false,
                    metadata: { tool: name, known_tools: known },
                    toolRole: name,
                    methodName: method,
                }),
            });
        }
        const child = this.children.get(name) ?? this.spawn(name, {
            purpose: entry.purpose === '' ? null : entry.purpose,
            deliverable: parseDeliverableContract(entry.deliverable),
        });
        return Object.freeze({
            role: name,
            call: (method: string, args?: unknown, kwargs?: unknown) => child.invokeFrom(parent, method, args, kwargs),
        });
    }

    /* ------------------------------------------------------------------------ */
    /* Memory and dependencies                                                  */
    /* ------------------------------------------------------------------------ */

    remember(entries: unknown): void {
        if (!isJsonObject(entries)) {
            throw new TypeError('remember() takes a plain object of JSON values');
        }
        for (const [key, value] of Object.entries(entries)) {
            this.cell.memory[key] = cloneJson(value);
        }
    }

    adoptManifest(manifest: DependencyManifest): void {
        this.currentManifest = manifest;
    }

    /**
     * Materializes an environment for `dependencies` and binds this role to it.
     * Later manifests must be additive.
     */
    async prepare(dependencies: unknown[]): Promise<EnvironmentHandle> {
        const { config, environments } = this.runtime.services;
        const manifest = resolveCallManifest(this.role, this.currentManifest, normalizeManifest(dependencies));
        enforceDependencyPolicy(manifest, config);
        const env = await environments.ensureEnvironment(manifest);
        this.adoptManifest(manifest);
        return env;
    }

    /** Prepares the dependencies declared at construction; a no-op once a manifest is adopted. */
    async prepareDeclared(): Promise<void> {
        if (this.currentManifest !== null || this.declaredDependencies.length === 0) return;
        await this.prepare([...this.declaredDependencies]);
    }

    /* ------------------------------------------------------------------------ */
    /* Lifecycle                                                                */
    /* ------------------------------------------------------------------------ */

    /** Stops this agent's worker and those of its helpers; the root agent also closes the stores. */
    async close(): Promise<void> {
        for (const child of this.children.values()) await child.close();
        await this.supervisor.shutdown();
        if (!this.ownsRuntime) return;
        try {
            this.runtime.services.registry.flush();
        } catch (err) {
            log.error('tool registry flush on close failed', { error: errorMessage(err) });
        }
        this.runtime.services.callLog?.close();
    }
}

function toJsonContract(contract: DeliverableContract): JsonValue | undefined {
    const plain: unknown = JSON.parse(JSON.stringify(contract));
    return isJsonValue(plain) ? plain : undefined;
}
