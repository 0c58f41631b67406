// Cross-process lock guarding environment materialization.

import * as fs from 'fs';
import * as path from 'path';
import { EnvironmentPreparingError } from './structured_error';
import { isPlainObject } from './json_value';

export interface LockHandle {
    fd: number;
    lockPath: string;
}

function sleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

function backoff(attempt: number): number {
    // 50,100,200,400,800,... capped at 1000
    return Math.min(50 * Math.pow(2, attempt), 1000);
}

function errnoCode(e: unknown): string | undefined {
    if (typeof e !== 'object' || e === null) return undefined;
    const code = Reflect.get(e, 'code');
    return typeof code === 'string' ? code : undefined;
}

function pidAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (e) {
        // EPERM: the process exists but belongs to someone else
        return errnoCode(e) === 'EPERM';
    }
}

function lockIsStale(lockPath: string, staleMs: number): boolean {
    let data: unknown;
    try {
        data = JSON.parse(fs.readFileSync(lockPath, 'utf8'));
    } catch {
        // unreadable or half-written lock file
        return true;
    }
    if (!isPlainObject(data)) return true;
    const pid = data.pid;
    const startedMs = typeof data.started_ms === 'number' ? data.started_ms : 0;
    if (typeof pid === 'number' && !pidAlive(pid)) return true;
    return Date.now() - startedMs > staleMs;
}

/**
 * Takes the lock with O_CREAT|O_EXCL. A lock held by a live process past
 * `timeoutMs` raises environment_preparing, which callers may retry.
 */
export async function acquireEnvironmentLock(params: {
    lockPath: string;
    timeoutMs: number;
    envId: string;
    staleTtlMs?: number;
}): Promise<LockHandle> {
    const { lockPath, timeoutMs, envId } = params;
    const staleMs = params.staleTtlMs ?? 600000;
    fs.mkdirSync(path.dirname(lockPath), { recursive: true, mode: 0o755 });

    const started = Date.now();
    let attempt = 0;

    for (;;) {
        try {
            const fd = fs.openSync(lockPath, 'wx');
            fs.writeSync(fd, JSON.stringify({ env_id: envId, pid: process.pid, started_ms: Date.now() }));
            return { fd, lockPath };
        } catch (e) {
            if (errnoCode(e) !== 'EEXIST') throw e;
        }

        if (lockIsStale(lockPath, staleMs)) {
            fs.rmSync(lockPath, { force: true });
            continue;
        }

        if (Date.now() - started >= timeoutMs) {
            throw new EnvironmentPreparingError(`environment ${envId} is being prepared by another process`, {
                metadata: { env_id: envId, lock_path: lockPath },
            });
        }
        await sleep(backoff(attempt++));
    }
}

export function releaseEnvironmentLock(handle: LockHandle): void {
    fs.closeSync(handle.fd);
    fs.rmSync(handle.lockPath, { force: true });
}
