/**
 * Execution Sandbox: runs a dependency-free program in a fresh vm context.
 *
 * Each run builds a new context holding only the forwarded capability set
 * (delegation, tool handles, memory, call-local runtime context, args/kwargs,
 * Outcome constructors). The context is dropped when the run settles, so
 * anything a program attaches to its own global scope is gone before the
 * next invocation.
 */

import * as util from 'util';
import * as vm from 'vm';
import { Outcome, OutcomeOrigin, sandboxOutcomeApi } from './outcome';
import { JsonObject, JsonValue } from './json_value';
import { createLogger } from './logger';
import {
    CallError,
    ExecutionError,
    ExecutionTimeoutError,
    GuardrailViolationError,
    InvalidCodeError,
    errorMessage,
    isErrorLike,
} from './structured_error';

const log = createLogger('sandbox');

/** A delegated role or registered tool as programs see it. */
export interface DelegatedHandle {
    readonly role: string;
    call(method: string, args?: unknown, kwargs?: unknown): Promise<Outcome>;
}

export interface SandboxCapabilities {
    memory: JsonObject;
    args: JsonValue[];
    kwargs: JsonObject;
    runtimeContext: Record<string, JsonValue>;
    delegate(role: string, options?: unknown): DelegatedHandle;
    tool(name: string): DelegatedHandle;
    remember(entries: unknown): void;
}

export interface SandboxRunOptions {
    code: string;
    origin: OutcomeOrigin;
    syncTimeoutMs: number;
    timeoutMs: number;
}

const PROGRAM_FILENAME = 'generated_program.js';

/**
 * Wraps a program body so it may either `return` a value or assign `result`.
 * An explicit return wins.
 */
export function wrapProgramSource(code: string): string {
    return [
        '(async () => {',
        'let result;',
        'const __returned = await (async () => {',
        code,
        '})();',
        'return __returned !== undefined ? __returned : result;',
        '})()',
    ].join('\n');
}

/** Compiles without running; a SyntaxError here means the program text itself is invalid. */
export function compileProgram(code: string): vm.Script {
    return new vm.Script(wrapProgramSource(code), { filename: PROGRAM_FILENAME });
}

/* -------------------------------------------------------------------------- */
/* Delegated handle guard                                                     */
/* -------------------------------------------------------------------------- */

const HANDLE_REDEFINITION_MESSAGE =
    'Defining methods on delegated handles is not supported; use delegate()/tool() call paths.';

export const HANDLE_REDEFINITION_CORRECTION =
    'Obtain handles with tool("name") or delegate("name", {...}) and invoke them with handle.call("method", args, kwargs); do not assign or define properties on them.';

function redefinitionViolation(role: string, property: string | symbol): GuardrailViolationError {
    return new GuardrailViolationError(`${HANDLE_REDEFINITION_MESSAGE} (attempted ${role}.${String(property)})`, {
        subtype: 'singleton_method_mutation',
        requiredCorrection: HANDLE_REDEFINITION_CORRECTION,
    });
}

/** Read-only view over a handle; writes raise a guardrail violation instead of failing silently. */
export function guardHandle(handle: DelegatedHandle): DelegatedHandle {
    return new Proxy(handle, {
        set(_target, property) { throw redefinitionViolation(handle.role, property); },
        defineProperty(_target, property) { throw redefinitionViolation(handle.role, property); },
        deleteProperty(_target, property) { throw redefinitionViolation(handle.role, property); },
        setPrototypeOf() { throw redefinitionViolation(handle.role, '__proto__'); },
    });
}

/* -------------------------------------------------------------------------- */
/* Error typing                                                               */
/* -------------------------------------------------------------------------- */

function isVmTimeout(err: unknown): boolean {
    return isErrorLike(err) && Reflect.get(err, 'code') === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
}

function typedFailure(err: unknown, syncTimeoutMs: number): CallError {
    if (err instanceof CallError) return err;
    if (isVmTimeout(err)) {
        return new ExecutionTimeoutError(`program exceeded synchronous time limit of ${syncTimeoutMs}ms`, { cause: err });
    }
    const name = isErrorLike(err) ? err.name : 'Error';
    return new ExecutionError(`${name}: ${errorMessage(err)}`, { cause: err, metadata: { stage: 'execution' } });
}

/* -------------------------------------------------------------------------- */
/* Sandbox                                                                    */
/* -------------------------------------------------------------------------- */

function programConsole(origin: OutcomeOrigin) {
    const plog = log.child(`${origin.toolRole ?? 'program'}.${origin.methodName ?? '?'}`);
    const line = (parts: unknown[]) => util.format(...parts);
    return Object.freeze({
        log: (...parts: unknown[]) => plog.info(line(parts)),
        info: (...parts: unknown[]) => plog.info(line(parts)),
        debug: (...parts: unknown[]) => plog.debug(line(parts)),
        warn: (...parts: unknown[]) => plog.warn(line(parts)),
        error: (...parts: unknown[]) => plog.error(line(parts)),
    });
}

export class ExecutionSandbox {
    /**
     * Runs one attempt. Resolves with the program's raw return value; every
     * failure is rejected as a CallError subclass.
     */
    async run(caps: SandboxCapabilities, opts: SandboxRunOptions): Promise<unknown> {
        let script: vm.Script;
        try {
            script = compileProgram(opts.code);
        } catch (err) {
            throw new InvalidCodeError(`program failed to compile: ${errorMessage(err)}`, { cause: err });
        }

        // Capabilities go dead once the run settles; a program left running past
        // its deadline must not reach a rolled-back attempt's collaborators.
        let settled = false;
        const live = (capability: string): void => {
            if (settled) throw new ExecutionError(`${capability} used after the program's run settled`);
        };
        const liveHandle = (handle: DelegatedHandle): DelegatedHandle => guardHandle({
            role: handle.role,
            call: async (method, args, kwargs) => {
                live(`${handle.role}.call()`);
                return handle.call(method, args, kwargs);
            },
        });

        const receiver = vm.createContext({
            context: caps.memory,
            memory: caps.memory,
            args: caps.args,
            kwargs: caps.kwargs,
            runtimeContext: Object.freeze({ ...caps.runtimeContext }),
            delegate: (role: string, options?: unknown) => {
                live('delegate()');
                return liveHandle(caps.delegate(String(role), options));
            },
            tool: (name: string) => {
                live('tool()');
                return liveHandle(caps.tool(String(name)));
            },
            remember: (entries: unknown) => {
                live('remember()');
                caps.remember(entries);
            },
            Outcome: sandboxOutcomeApi(opts.origin),
            console: programConsole(opts.origin),
        });

        let timer: NodeJS.Timeout | undefined;
        try {
            const running: unknown = script.runInContext(receiver, { timeout: opts.syncTimeoutMs });
            const deadline = new Promise<never>((_resolve, reject) => {
                timer = setTimeout(
                    () => reject(new ExecutionTimeoutError(`program did not settle within ${opts.timeoutMs}ms`)),
                    opts.timeoutMs
                );
            });
            return await Promise.race([Promise.resolve(running), deadline]);
        } catch (err) {
            throw typedFailure(err, opts.syncTimeoutMs);
        } finally {
            settled = true;
            if (timer) clearTimeout(timer);
        }
    }
}
