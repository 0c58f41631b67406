/**
 * Worker Executor: one subprocess bound to one dependency environment.
 *
 * The child runs an eval'd bootstrap (`node -e`) with the environment
 * directory as cwd and a require() rooted there, so packages resolve from
 * that environment's node_modules only. Requests and responses are single
 * JSON lines on stdin/stdout. Hangs are handled from outside: the parent
 * kills the process when the timeout fires.
 */

import { ChildProcessWithoutNullStreams, spawn } from 'child_process';
import * as path from 'path';
import { WORKER } from './config';
import { JsonObject, JsonValue, isJsonObject, isJsonValue, isPlainObject } from './json_value';
import { createLogger } from './logger';
import { ExecutionTimeoutError, WorkerCrashError } from './structured_error';

const log = createLogger('worker-executor');

/* -------------------------------------------------------------------------- */
/* Protocol                                                                   */
/* -------------------------------------------------------------------------- */

export interface WorkerRequest {
    ipc_version: number;
    call_id: string;
    method: string;
    code: string;
    args: JsonValue[];
    kwargs: JsonObject;
    context: JsonObject;
}

export interface WorkerResponse {
    ipc_version: number;
    call_id: string;
    status: 'ok' | 'error';
    value: JsonValue;
    error_type: string | null;
    error_message: string | null;
    error_class: string | null;
    context: JsonObject | null;
    worker_pid: number | null;
}

export interface WorkerTarget {
    envId: string;
    envDir: string;
}

/** What the supervisor needs from a worker; tests substitute in-process fakes. */
export interface WorkerHandle {
    readonly pid: number | null;
    readonly running: boolean;
    execute(request: WorkerRequest): Promise<WorkerResponse>;
    shutdown(): Promise<void>;
}

function stringOrNull(value: unknown): string | null {
    return typeof value === 'string' ? value : null;
}

export function parseWorkerResponse(line: string): WorkerResponse | null {
    let raw: unknown;
    try {
        raw = JSON.parse(line);
    } catch {
        return null;
    }
    if (!isPlainObject(raw)) return null;
    if (raw.ipc_version !== WORKER.IPC_VERSION) return null;
    if (typeof raw.call_id !== 'string') return null;
    if (raw.status !== 'ok' && raw.status !== 'error') return null;

    const value = raw.value;
    const context = raw.context;
    return {
        ipc_version: WORKER.IPC_VERSION,
        call_id: raw.call_id,
        status: raw.status,
        value: isJsonValue(value) ? value : null,
        error_type: stringOrNull(raw.error_type),
        error_message: stringOrNull(raw.error_message),
        error_class: stringOrNull(raw.error_class),
        context: isJsonObject(context) ? context : null,
        worker_pid: typeof raw.worker_pid === 'number' ? raw.worker_pid : null,
    };
}

/* -------------------------------------------------------------------------- */
/* Worker bootstrap                                                           */
/* -------------------------------------------------------------------------- */

// Plain JavaScript evaluated by the child. No template literals or regexes
// inside, so the text survives being embedded here unchanged.
const WORKER_SOURCE = `
'use strict';
const readline = require('readline');
const vm = require('vm');
const path = require('path');
const util = require('util');
const { createRequire } = require('module');

const IPC_VERSION = ${WORKER.IPC_VERSION};
const writeFrame = process.stdout.write.bind(process.stdout);
for (const level of ['log', 'info', 'warn', 'error', 'debug']) {
    console[level] = (...parts) => { process.stderr.write(util.format(...parts) + '\\n'); };
}

const envRequire = createRequire(path.join(process.cwd(), 'package.json'));
const OUTCOME = Symbol('outcome');

function isPlainObject(v) {
    return typeof v === 'object' && v !== null && !Array.isArray(v) && Object.prototype.toString.call(v) === '[object Object]';
}

function nonJsonPath(v, p, depth) {
    if (depth > 100) return p;
    if (v === null) return null;
    const t = typeof v;
    if (t === 'string' || t === 'boolean') return null;
    if (t === 'number') return Number.isFinite(v) ? null : p;
    if (t !== 'object') return p;
    if (Array.isArray(v)) {
        for (let i = 0; i < v.length; i++) {
            const bad = nonJsonPath(v[i], p + '[' + i + ']', depth + 1);
            if (bad) return bad;
        }
        return null;
    }
    if (!isPlainObject(v)) return p;
    for (const k of Object.keys(v)) {
        const bad = nonJsonPath(v[k], p + '.' + k, depth + 1);
        if (bad) return bad;
    }
    return null;
}

const Outcome = Object.freeze({
    ok: (value) => ({ [OUTCOME]: true, status: 'ok', value: value === undefined ? null : value }),
    error: (errorType, errorMessage, opts) => ({
        [OUTCOME]: true,
        status: 'error',
        error_type: String(errorType),
        error_message: errorMessage === undefined ? String(errorType) : String(errorMessage),
        retriable: !!(opts && opts.retriable === true),
        metadata: opts && isPlainObject(opts.metadata) ? opts.metadata : {},
    }),
});

function encode(value) {
    if (value !== null && typeof value === 'object' && value[OUTCOME] === true) {
        if (value.status === 'ok') return { __outcome__: { status: 'ok', value: value.value } };
        return { __outcome__: {
            status: 'error',
            error_type: value.error_type,
            error_message: value.error_message,
            retriable: value.retriable,
            metadata: value.metadata,
        } };
    }
    return value === undefined ? null : value;
}

function wrap(code) {
    return [
        '(async () => {',
        'let result;',
        'const __returned = await (async () => {',
        code,
        '})();',
        'return __returned !== undefined ? __returned : result;',
        '})()',
    ].join('\\n');
}

function respond(frame) {
    writeFrame(JSON.stringify(frame) + '\\n');
}

async function handle(line) {
    let req;
    try {
        req = JSON.parse(line);
    } catch (err) {
        respond({ ipc_version: IPC_VERSION, call_id: '', status: 'error', error_type: 'worker_crash', error_message: 'malformed request line', worker_pid: process.pid });
        return;
    }
    const base = { ipc_version: IPC_VERSION, call_id: String(req.call_id), worker_pid: process.pid };
    try {
        const receiver = vm.createContext({
            context: req.context,
            memory: req.context,
            args: req.args,
            kwargs: req.kwargs,
            runtimeContext: Object.freeze({ method: req.method, call_id: req.call_id, worker_pid: process.pid }),
            Outcome,
            require: envRequire,
            console,
        });
        const script = new vm.Script(wrap(req.code), { filename: 'generated_program.js' });
        const value = encode(await script.runInContext(receiver));
        const badValue = nonJsonPath(value, '$', 0);
        if (badValue) {
            respond(Object.assign({}, base, { status: 'error', error_type: 'non_serializable_result', error_message: 'result is not plain data at ' + badValue, context: null }));
            return;
        }
        const badContext = nonJsonPath(req.context, '$', 0);
        if (badContext) {
            respond(Object.assign({}, base, { status: 'error', error_type: 'non_serializable_result', error_message: 'context is not plain data at ' + badContext, context: null }));
            return;
        }
        respond(Object.assign({}, base, { status: 'ok', value: value, context: req.context }));
    } catch (err) {
        const name = err && typeof err.name === 'string' ? err.name : 'Error';
        const message = err && err.message !== undefined ? String(err.message) : String(err);
        respond(Object.assign({}, base, { status: 'error', error_type: 'execution', error_class: name, error_message: name + ': ' + message, context: null }));
    }
}

let chain = Promise.resolve();
const rl = readline.createInterface({ input: process.stdin });
rl.on('line', (line) => { chain = chain.then(() => handle(line)); });
rl.on('close', () => { chain.then(() => process.exit(0)); });
`;

/* -------------------------------------------------------------------------- */
/* Executor                                                                   */
/* -------------------------------------------------------------------------- */

interface PendingCall {
    callId: string;
    resolve: (response: WorkerResponse) => void;
    reject: (err: Error) => void;
    timer: NodeJS.Timeout;
}

export interface WorkerExecutorOptions {
    timeoutMs: number;
    shutdownGraceMs: number;
}

export class WorkerExecutor implements WorkerHandle {
    private child: ChildProcessWithoutNullStreams | null = null;
    private exited = false;
    private buffer = '';
    private pending: PendingCall | null = null;
    private readonly exitWaiters: Array<() => void> = [];

    constructor(private readonly target: WorkerTarget, private readonly opts: WorkerExecutorOptions) {}

    get pid(): number | null {
        return this.child?.pid ?? null;
    }

    get running(): boolean {
        return this.child !== null && !this.exited;
    }

    start(): this {
        const child = spawn(process.execPath, ['-e', WORKER_SOURCE], {
            cwd: this.target.envDir,
            env: { ...process.env, NODE_PATH: path.join(this.target.envDir, 'node_modules') },
            stdio: ['pipe', 'pipe', 'pipe'],
        });
        this.child = child;
        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');
        child.stdout.on('data', (chunk: string) => this.onData(chunk));
        child.stderr.on('data', (chunk: string) => log.debug('worker stderr', { envId: this.target.envId, pid: child.pid, output: chunk.trimEnd() }));
        child.stdin.on('error', (err) => this.failPending(new WorkerCrashError(`worker stdin failed: ${err.message}`, { cause: err })));
        child.on('error', (err) => {
            this.exited = true;
            this.failPending(new WorkerCrashError(`worker process error: ${err.message}`, { cause: err }));
            this.notifyExit();
        });
        child.on('exit', (code, signal) => {
            this.exited = true;
            this.failPending(new WorkerCrashError(`worker exited with ${signal ? `signal ${signal}` : `code ${code}`}`, {
                metadata: { exit_code: code, signal },
            }));
            this.notifyExit();
        });
        log.debug('worker started', { envId: this.target.envId, pid: child.pid });
        return this;
    }

    execute(request: WorkerRequest): Promise<WorkerResponse> {
        const child = this.child;
        if (!child || this.exited) {
            return Promise.reject(new WorkerCrashError('worker is not running'));
        }
        if (this.pending) {
            return Promise.reject(new WorkerCrashError('worker is already serving a request'));
        }
        return new Promise<WorkerResponse>((resolve, reject) => {
            const timer = setTimeout(() => {
                if (!this.pending || this.pending.callId !== request.call_id) return;
                this.pending = null;
                log.error(`worker timeout after ${this.opts.timeoutMs}ms`, { envId: this.target.envId, pid: child.pid, method: request.method });
                child.kill('SIGKILL');
                reject(new ExecutionTimeoutError(`worker killed after ${this.opts.timeoutMs}ms for ${request.method}`, {
                    metadata: { env_id: this.target.envId, worker_pid: child.pid ?? null },
                }));
            }, this.opts.timeoutMs);
            this.pending = { callId: request.call_id, resolve, reject, timer };
            child.stdin.write(JSON.stringify(request) + '\n');
        });
    }

    async shutdown(): Promise<void> {
        const child = this.child;
        if (!child || this.exited) return;
        child.stdin.end();
        if (await this.waitForExit(this.opts.shutdownGraceMs)) return;
        child.kill('SIGTERM');
        if (await this.waitForExit(this.opts.shutdownGraceMs)) return;
        child.kill('SIGKILL');
        await this.waitForExit(this.opts.shutdownGraceMs);
    }

    private onData(chunk: string): void {
        this.buffer += chunk;
        let newline = this.buffer.indexOf('\n');
        while (newline >= 0) {
            const line = this.buffer.slice(0, newline).trim();
            this.buffer = this.buffer.slice(newline + 1);
            if (line.length > 0) this.onFrame(line);
            newline = this.buffer.indexOf('\n');
        }
    }

    private onFrame(line: string): void {
        const pending = this.pending;
        if (!pending) {
            log.warn('unexpected worker output with no request in flight', { envId: this.target.envId, line: line.slice(0, 200) });
            return;
        }
        const response = parseWorkerResponse(line);
        if (!response || response.call_id !== pending.callId) {
            this.failPending(new WorkerCrashError(
                response ? `worker answered call ${response.call_id} while ${pending.callId} was in flight` : 'worker produced a malformed response line'
            ));
            this.child?.kill('SIGKILL');
            return;
        }
        this.pending = null;
        clearTimeout(pending.timer);
        pending.resolve(response);
    }

    private failPending(err: Error): void {
        const pending = this.pending;
        if (!pending) return;
        this.pending = null;
        clearTimeout(pending.timer);
        pending.reject(err);
    }

    private notifyExit(): void {
        for (const waiter of this.exitWaiters.splice(0)) waiter();
    }

    private waitForExit(ms: number): Promise<boolean> {
        if (this.exited) return Promise.resolve(true);
        return new Promise<boolean>((resolve) => {
            const timer = setTimeout(() => resolve(this.exited), ms);
            this.exitWaiters.push(() => {
                clearTimeout(timer);
                resolve(true);
            });
        });
    }
}
