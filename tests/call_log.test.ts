import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';

import { CallLog, CallRecord, MemoryCallLog, SqliteCallLog } from '../src/call_log';
import { withTmpDir } from './helpers';

function record(callId: string, overrides: Partial<CallRecord> = {}): CallRecord {
    return {
        trace_id: 'trace-1',
        call_id: callId,
        parent_call_id: null,
        depth: 0,
        role: 'counter',
        method: 'count',
        outcome_status: 'ok',
        error_type: null,
        error_message: null,
        program_source: 'generated',
        artifact_hit: false,
        attempt_id: 1,
        generation_attempts: 1,
        guardrail_recovery_attempts: 0,
        execution_repair_attempts: 0,
        outcome_repair_attempts: 0,
        attempt_failures: [],
        code: 'return 1;',
        dependencies: [],
        env_id: null,
        env_cache_hit: null,
        worker_pid: null,
        worker_restart_count: null,
        lifecycle_state: 'probation',
        lifecycle_decision: 'continue_probation',
        contract_validation_passed: null,
        continuity_violation: false,
        duration_ms: 12,
        created_at: '2026-03-01T00:00:00.000Z',
        ...overrides,
    };
}

const sinks: Array<[string, () => CallLog]> = [
    ['memory', () => new MemoryCallLog()],
    ['sqlite', () => new SqliteCallLog(':memory:')],
];

for (const [name, open] of sinks) {
    test(`${name} call log returns the newest calls first`, () => {
        const log = open();
        try {
            log.recordCall(record('a'));
            log.recordCall(record('b'));
            log.recordCall(record('c'));
            assert.equal(log.countCalls(), 3);
            assert.deepEqual(log.recentCalls().map(r => r.call_id), ['c', 'b', 'a']);
            assert.deepEqual(log.recentCalls(2).map(r => r.call_id), ['c', 'b']);
        } finally {
            log.close();
        }
    });

    test(`${name} call log keeps flags and nested fields intact`, () => {
        const log = open();
        try {
            const failed = record('x', {
                outcome_status: 'error',
                error_type: 'contract_violation',
                error_message: 'deliverable contract violated: expected array, got object',
                program_source: 'repaired',
                artifact_hit: true,
                contract_validation_passed: false,
                attempt_failures: [{
                    attempt_id: 1,
                    stage: 'validation',
                    error_type: 'contract_violation',
                    error_class: 'adaptive',
                    message: 'expected array, got object',
                    call_id: 'x',
                    at: '2026-03-01T00:00:00.000Z',
                }],
                dependencies: [{ name: 'lodash', version: '^4.17.21' }],
                env_id: 'env-1',
                env_cache_hit: true,
                worker_pid: 4242,
                worker_restart_count: 1,
                continuity_violation: true,
            });
            log.recordCall(failed);
            assert.deepEqual(log.recentCalls(1)[0], failed);
        } finally {
            log.close();
        }
    });
}

test('memory call log hands out copies', () => {
    const log = new MemoryCallLog();
    log.recordCall(record('a'));
    log.recentCalls()[0].role = 'changed';
    assert.equal(log.recentCalls()[0].role, 'counter');
});

test('sqlite call log groups calls by trace in insertion order', () => {
    const log = new SqliteCallLog(':memory:');
    try {
        log.recordCall(record('root', { trace_id: 't1' }));
        log.recordCall(record('other', { trace_id: 't2' }));
        log.recordCall(record('child', { trace_id: 't1', parent_call_id: 'root', depth: 1 }));
        const trace = log.callsForTrace('t1');
        assert.deepEqual(trace.map(r => r.call_id), ['root', 'child']);
        assert.equal(trace[1].parent_call_id, 'root');
        assert.equal(trace[1].depth, 1);
    } finally {
        log.close();
    }
});

test('sqlite call log rejects a duplicate call id', () => {
    const log = new SqliteCallLog(':memory:');
    try {
        log.recordCall(record('a'));
        assert.throws(() => log.recordCall(record('a')), /failed to record call a/);
    } finally {
        log.close();
    }
});

test('sqlite call log persists across reopen', async () => {
    await withTmpDir('call-log-', (dir) => {
        const file = path.join(dir, 'nested', 'calls.db');
        const first = new SqliteCallLog(file);
        first.recordCall(record('a'));
        first.close();

        assert.ok(fs.existsSync(file));
        const second = new SqliteCallLog(file);
        try {
            assert.equal(second.countCalls(), 1);
            assert.equal(second.recentCalls()[0].call_id, 'a');
        } finally {
            second.close();
        }
    });
});

test('sqlite call log upgrades a first-version database in place', async () => {
    await withTmpDir('call-log-v1-', (dir) => {
        const file = path.join(dir, 'calls.db');
        const legacy = new Database(file);
        legacy.exec(`
            CREATE TABLE schema_version (version INTEGER PRIMARY KEY, applied_at TEXT DEFAULT CURRENT_TIMESTAMP) STRICT;
            INSERT INTO schema_version (version) VALUES (1);
            CREATE TABLE call_records (
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
                created_at TEXT NOT NULL
            ) STRICT;
            INSERT INTO call_records (trace_id, call_id, role, method, outcome_status, created_at)
                VALUES ('t0', 'old', 'counter', 'count', 'ok', '2026-01-01T00:00:00.000Z');
        `);
        legacy.close();

        const upgraded = new SqliteCallLog(file);
        try {
            const [old] = upgraded.recentCalls();
            assert.equal(old.call_id, 'old');
            assert.equal(old.worker_pid, null);
            assert.equal(old.env_cache_hit, null);
            assert.equal(old.continuity_violation, false);

            upgraded.recordCall(record('new', { worker_pid: 99, worker_restart_count: 0 }));
            assert.equal(upgraded.recentCalls(1)[0].worker_pid, 99);
            assert.equal(upgraded.recentCalls(1)[0].worker_restart_count, 0);
        } finally {
            upgraded.close();
        }
    });
});
