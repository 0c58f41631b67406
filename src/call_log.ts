/**
 * Call log - one structured record per logical invocation.
 *
 * SqliteCallLog is the durable sink (better-sqlite3, WAL, versioned schema);
 * MemoryCallLog keeps records in process.
 *
 * CONTRACT: Synchronous API (better-sqlite3 blocks by design)
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { AttemptFailure, ProgramSource } from './call_state';
import { Dependency } from './dependency_manifest';
import { createLogger } from './logger';
import { ERRORS, StoreError, errorMessage } from './structured_error';

const log = createLogger('call-log');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface CallRecord {
    trace_id: string;
    call_id: string;
    parent_call_id: string | null;
    depth: number;
    role: string;
    method: string;
    outcome_status: 'ok' | 'error';
    error_type: string | null;
    error_message: string | null;
    program_source: ProgramSource | null;
    artifact_hit: boolean;
    attempt_id: number;
    generation_attempts: number;
    guardrail_recovery_attempts: number;
    execution_repair_attempts: number;
    outcome_repair_attempts: number;
    attempt_failures: AttemptFailure[];
    code: string | null;
    dependencies: Dependency[];
    env_id: string | null;
    env_cache_hit: boolean | null;
    worker_pid: number | null;
    worker_restart_count: number | null;
    lifecycle_state: string | null;
    lifecycle_decision: string | null;
    contract_validation_passed: boolean | null;
    continuity_violation: boolean;
    duration_ms: number;
    created_at: string;
}

export interface CallLog {
    recordCall(record: CallRecord): void;
    recentCalls(limit?: number): CallRecord[];
    countCalls(): number;
    close(): void;
}

/* -------------------------------------------------------------------------- */
/* In-process sink                                                            */
/* -------------------------------------------------------------------------- */

export class MemoryCallLog implements CallLog {
    private readonly records: CallRecord[] = [];

    recordCall(record: CallRecord): void {
        this.records.push(structuredClone(record));
    }

    recentCalls(limit = 50): CallRecord[] {
        return this.records.slice(-limit).reverse().map(r => structuredClone(r));
    }

    countCalls(): number {
        return this.records.length;
    }

    close(): void {
        // nothing to release
    }
}

/* -------------------------------------------------------------------------- */
/* SQLite sink                                                                */
/* -------------------------------------------------------------------------- */

const SCHEMA_VERSION = 2;

interface CallRow {
    trace_id: string;
    call_id: string;
    parent_call_id: string | null;
    depth: number;
    role: string;
    method: string;
    outcome_status: string;
    error_type: string | null;
    error_message: string | null;
    program_source: string | null;
    artifact_hit: number;
    attempt_id: number;
    generation_attempts: number;
    guardrail_recovery_attempts: number;
    execution_repair_attempts: number;
    outcome_repair_attempts: number;
    attempt_failures: string;
    code: string | null;
    dependencies: string;
    env_id: string | null;
    env_cache_hit: number | null;
    worker_pid: number | null;
    worker_restart_count: number | null;
    lifecycle_state: string | null;
    lifecycle_decision: string | null;
    contract_validation_passed: number | null;
    continuity_violation: number;
    duration_ms: number;
    created_at: string;
}

function isProgramSource(value: string | null): value is ProgramSource {
    return value === 'generated' || value === 'persisted' || value === 'repaired';
}

function parseJsonColumn<T>(raw: string, guard: (v: unknown) => v is T, fallback: T): T {
    try {
        const parsed: unknown = JSON.parse(raw);
        return guard(parsed) ? parsed : fallback;
    } catch (e) {
        log.warn('unreadable JSON column in call log', { error: errorMessage(e) });
        return fallback;
    }
}

function isFailureList(v: unknown): v is AttemptFailure[] {
    return Array.isArray(v) && v.every(e => typeof e === 'object' && e !== null && typeof Reflect.get(e, 'stage') === 'string');
}

function isDependencyList(v: unknown): v is Dependency[] {
    return Array.isArray(v) && v.every(e => typeof e === 'object' && e !== null
        && typeof Reflect.get(e, 'name') === 'string' && typeof Reflect.get(e, 'version') === 'string');
}

function fromRow(row: CallRow): CallRecord {
    return {
        trace_id: row.trace_id,
        call_id: row.call_id,
        parent_call_id: row.parent_call_id,
        depth: row.depth,
        role: row.role,
        method: row.method,
        outcome_status: row.outcome_status === 'ok' ? 'ok' : 'error',
        error_type: row.error_type,
        error_message: row.error_message,
        program_source: isProgramSource(row.program_source) ? row.program_source : null,
        artifact_hit: row.artifact_hit === 1,
        attempt_id: row.attempt_id,
        generation_attempts: row.generation_attempts,
        guardrail_recovery_attempts: row.guardrail_recovery_attempts,
        execution_repair_attempts: row.execution_repair_attempts,
        outcome_repair_attempts: row.outcome_repair_attempts,
        attempt_failures: parseJsonColumn(row.attempt_failures, isFailureList, []),
        code: row.code,
        dependencies: parseJsonColumn(row.dependencies, isDependencyList, []),
        env_id: row.env_id,
        env_cache_hit: row.env_cache_hit === null ? null : row.env_cache_hit === 1,
        worker_pid: row.worker_pid,
        worker_restart_count: row.worker_restart_count,
        lifecycle_state: row.lifecycle_state,
        lifecycle_decision: row.lifecycle_decision,
        contract_validation_passed: row.contract_validation_passed === null ? null : row.contract_validation_passed === 1,
        continuity_violation: row.continuity_violation === 1,
        duration_ms: row.duration_ms,
        created_at: row.created_at,
    };
}

function flag(value: boolean | null): number | null {
    if (value === null) return null;
    return value ? 1 : 0;
}

export class SqliteCallLog implements CallLog {
    private readonly db: Database.Database;

    constructor(dbPath: string) {
        try {
            if (dbPath !== ':memory:') fs.mkdirSync(path.dirname(dbPath), { recursive: true });
            this.db = new Database(dbPath);
        } catch (e) {
            throw new StoreError(`failed to open call log ${dbPath}: ${errorMessage(e)}`, ERRORS.INFRA_ERROR, e);
        }
        this.configureDatabase();
        this.runMigrations();
    }

    /* ------------------------------------------------------------------------ */
    /* SQLite Configuration                                                     */
    /* ------------------------------------------------------------------------ */

    private configureDatabase(): void {
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
        this.db.pragma('busy_timeout = 5000');
    }

    /* ------------------------------------------------------------------------ */
    /* Migrations                                                               */
    /* ------------------------------------------------------------------------ */

    private runMigrations(): void {
        const tx = this.db.transaction(() => {
            this.db.exec(`
                CREATE TABLE IF NOT EXISTS schema_version (
                    version INTEGER PRIMARY KEY,
                    applied_at TEXT DEFAULT CURRENT_TIMESTAMP
                ) STRICT
            `);

            const row = this.db
                .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
                .get();
            const current = row?.version ?? 0;

            if (current > SCHEMA_VERSION) {
                throw new StoreError(
                    `call log schema version ${current} is newer than supported ${SCHEMA_VERSION}`,
                    ERRORS.SCHEMA_MISMATCH
                );
            }

            if (current < 1) {
                this.db.exec(`
                    CREATE TABLE IF NOT EXISTS call_records (
                        id INTEGER PRIMARY KEY AUTOINCREMENT,
                        trace_id TEXT NOT NULL,
                        call_id TEXT NOT NULL UNIQUE,
                        parent_call_id TEXT,
                        depth INTEGER NOT NULL DEFAULT 0,
                        role TEXT NOT NULL,
                        method TEXT NOT NULL,
                        outcome_status TEXT NOT NULL,
                        error_type TEXT,
                        error_message TEXT,
                        program_source TEXT,
                        artifact_hit INTEGER NOT NULL DEFAULT 0,
                        attempt_id INTEGER NOT NULL DEFAULT 0,
                        generation_attempts INTEGER NOT NULL DEFAULT 0,
                        guardrail_recovery_attempts INTEGER NOT NULL DEFAULT 0,
                        execution_repair_attempts INTEGER NOT NULL DEFAULT 0,
                        outcome_repair_attempts INTEGER NOT NULL DEFAULT 0,
                        attempt_failures TEXT NOT NULL DEFAULT '[]',
                        code TEXT,
                        dependencies TEXT NOT NULL DEFAULT '[]',
                        env_id TEXT,
                        lifecycle_state TEXT,
                        lifecycle_decision TEXT,
                        contract_validation_passed INTEGER,
                        duration_ms INTEGER NOT NULL DEFAULT 0,
                        created_at TEXT NOT NULL,
                        CHECK(outcome_status IN ('ok','error')),
                        CHECK(depth >= 0)
                    ) STRICT;

                    CREATE INDEX IF NOT EXISTS idx_call_records_trace ON call_records(trace_id);
                    CREATE INDEX IF NOT EXISTS idx_call_records_target ON call_records(role, method);
                `);
                this.db.prepare(`INSERT INTO schema_version (version) VALUES (1)`).run();
            }

            if (current < 2) {
                this.db.exec(`
                    ALTER TABLE call_records ADD COLUMN env_cache_hit INTEGER;
                    ALTER TABLE call_records ADD COLUMN worker_pid INTEGER;
                    ALTER TABLE call_records ADD COLUMN worker_restart_count INTEGER;
                    ALTER TABLE call_records ADD COLUMN continuity_violation INTEGER NOT NULL DEFAULT 0;
                `);
                this.db.prepare(`INSERT INTO schema_version (version) VALUES (2)`).run();
            }
        });
        tx();
    }

    /* ------------------------------------------------------------------------ */
    /* Records                                                                  */
    /* ------------------------------------------------------------------------ */

    recordCall(record: CallRecord): void {
        try {
            this.db.prepare(`
                INSERT INTO call_records (
                    trace_id, call_id, parent_call_id, depth, role, method,
                    outcome_status, error_type, error_message, program_source, artifact_hit,
                    attempt_id, generation_attempts, guardrail_recovery_attempts,
                    execution_repair_attempts, outcome_repair_attempts, attempt_failures,
                    code, dependencies, env_id, env_cache_hit, worker_pid, worker_restart_count,
                    lifecycle_state, lifecycle_decision, contract_validation_passed,
                    continuity_violation, duration_ms, created_at
                ) VALUES (
                    @trace_id, @call_id, @parent_call_id, @depth, @role, @method,
                    @outcome_status, @error_type, @error_message, @program_source, @artifact_hit,
                    @attempt_id, @generation_attempts, @guardrail_recovery_attempts,
                    @execution_repair_attempts, @outcome_repair_attempts, @attempt_failures,
                    @code, @dependencies, @env_id, @env_cache_hit, @worker_pid, @worker_restart_count,
                    @lifecycle_state, @lifecycle_decision, @contract_validation_passed,
                    @continuity_violation, @duration_ms, @created_at
                )
            `).run({
                ...record,
                artifact_hit: record.artifact_hit ? 1 : 0,
                attempt_failures: JSON.stringify(record.attempt_failures),
                dependencies: JSON.stringify(record.dependencies),
                env_cache_hit: flag(record.env_cache_hit),
                contract_validation_passed: flag(record.contract_validation_passed),
                continuity_violation: record.continuity_violation ? 1 : 0,
                duration_ms: Math.round(record.duration_ms),
            });
        } catch (e) {
            throw new StoreError(`failed to record call ${record.call_id}: ${errorMessage(e)}`, ERRORS.INFRA_ERROR, e);
        }
    }

    recentCalls(limit = 50): CallRecord[] {
        const rows = this.db
            .prepare<[number], CallRow>(`SELECT * FROM call_records ORDER BY id DESC LIMIT ?`)
            .all(limit);
        return rows.map(fromRow);
    }

    callsForTrace(traceId: string): CallRecord[] {
        const rows = this.db
            .prepare<[string], CallRow>(`SELECT * FROM call_records WHERE trace_id = ? ORDER BY id ASC`)
            .all(traceId);
        return rows.map(fromRow);
    }

    countCalls(): number {
        const row = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM call_records`).get();
        return row?.n ?? 0;
    }

    close(): void {
        this.db.close();
    }
}
