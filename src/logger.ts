/**
 * Structured Logger for the call engine
 *
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when CALLFORGE_LOG_JSON=1
 * - Optional file output via CALLFORGE_LOG_FILE
 * - Component name and invocation correlation (trace / call / role.method) on every line
 *
 * Environment:
 *   CALLFORGE_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   CALLFORGE_LOG_JSON   = 1 (default: text)
 *   CALLFORGE_LOG_FILE   = path (optional, appends)
 *   CALLFORGE_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

const envLevel = (process.env.CALLFORGE_LOG_LEVEL || 'info').toLowerCase();
const MIN_LEVEL: number = isLogLevel(envLevel) ? LEVEL_ORDER[envLevel] : LEVEL_ORDER.info;
const DEBUG_OVERRIDE = process.env.CALLFORGE_DEBUG === '1' || process.env.CALLFORGE_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.CALLFORGE_LOG_JSON === '1';
const LOG_FILE = process.env.CALLFORGE_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Invocation Correlation Context                                             */
/* -------------------------------------------------------------------------- */

let _traceId = '';
let _callId = '';
let _role = '';
let _method = '';

/** Set the active invocation context. The orchestrator calls this at invocation start. */
export function setCorrelation(opts: { traceId?: string; callId?: string; role?: string; method?: string }): void {
    if (opts.traceId !== undefined) _traceId = opts.traceId;
    if (opts.callId !== undefined) _callId = opts.callId;
    if (opts.role !== undefined) _role = opts.role;
    if (opts.method !== undefined) _method = opts.method;
}

export function clearCorrelation(): void {
    _traceId = '';
    _callId = '';
    _role = '';
    _method = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_traceId) entry.trace_id = _traceId;
        if (_callId) entry.call_id = _callId;
        if (_role) entry.role = _role;
        if (_method) entry.method = _method;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const target = _role ? `${_role}${_method ? '.' + _method : ''}` : '';
        const ctx = _callId ? ` [${_callId.slice(0, 8)}${target ? ':' + target : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            // A broken log file must not fail the invocation; report once per line on stderr.
            process.stderr.write(`[logger] append to ${LOG_FILE} failed: ${String(e)}\n`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
