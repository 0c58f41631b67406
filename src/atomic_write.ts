// Replace-on-write persistence for the artifact store and tool registry.

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';

const log = createLogger('atomic-write');

type FsyncMode = 'BEST_EFFORT' | 'REQUIRED';

function isFatalBestEffort(code?: string): boolean {
    return code === 'ENOSPC' || code === 'EIO';
}

function errnoCode(e: unknown): string | undefined {
    if (typeof e !== 'object' || e === null) return undefined;
    const code = Reflect.get(e, 'code');
    return typeof code === 'string' ? code : undefined;
}

function fsyncPath(target: string, flags: string, fsyncMode: FsyncMode, warnings: string[]): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errnoCode(e);
        if (fsyncMode === 'REQUIRED' || isFatalBestEffort(code)) throw e;
        warnings.push(`FSYNC_WARN(${code || 'UNKNOWN'}) on ${target}`);
    }
}

/**
 * Writes to a sibling temp file, fsyncs, then renames over the target.
 * Readers see either the old or the new content, never a partial file.
 */
export function atomicWriteFileSync(params: {
    filePath: string;
    content: Buffer | string;
    mode?: number;
    fsyncMode?: FsyncMode;
    warnings?: string[];
}): void {
    const { filePath, content } = params;
    const mode = params.mode ?? 0o644;
    const fsyncMode = params.fsyncMode ?? 'BEST_EFFORT';
    const warnings = params.warnings ?? [];

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString('hex')}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        fsyncPath(tmp, 'r+', fsyncMode, warnings);
        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);
        fsyncPath(dir, 'r', fsyncMode, warnings);
    } catch (e) {
        if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
        throw e;
    }

    if (warnings.length > 0 && params.warnings === undefined) {
        log.debug('atomic write completed with warnings', { filePath, warnings });
    }
}

export function atomicWriteJsonSync(filePath: string, data: unknown, warnings?: string[]): void {
    atomicWriteFileSync({
        filePath,
        content: JSON.stringify(data, null, 2) + '\n',
        warnings,
    });
}

/* -------------------------------------------------------------------------- */
/* Quarantine                                                                 */
/* -------------------------------------------------------------------------- */

/** YYYYMMDDTHHMMSS in UTC. */
export function quarantineTimestamp(now: Date = new Date()): string {
    return now.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, '');
}

/**
 * Moves an unreadable store file aside so the next write starts clean.
 * Returns the quarantine path.
 */
export function quarantineFile(filePath: string, now: Date = new Date()): string {
    let target = `${filePath}.corrupt-${quarantineTimestamp(now)}`;
    let n = 1;
    while (fs.existsSync(target)) {
        target = `${filePath}.corrupt-${quarantineTimestamp(now)}-${n++}`;
    }
    fs.renameSync(filePath, target);
    log.warn('quarantined corrupt store file', { filePath, quarantinedAs: target });
    return target;
}

export function sha256Hex(content: Buffer | string): string {
    return crypto.createHash('sha256').update(content).digest('hex');
}
