/**
 * Environment Manager: one isolated package directory per normalized manifest.
 *
 * Layout: <root>/environments/<envId>/{package.json,node_modules/,.ready}
 * The `.ready` marker is written last, so a directory without it is treated
 * as never prepared and is installed again.
 */

import { execFile } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import { SourceMode } from './config';
import { DependencyManifest } from './dependency_manifest';
import { acquireEnvironmentLock, releaseEnvironmentLock } from './environment_lock';
import { atomicWriteJsonSync, sha256Hex } from './atomic_write';
import { stableStringify } from './json_value';
import { createLogger } from './logger';
import {
    CallError,
    DependencyActivationError,
    DependencyInstallError,
    DependencyResolutionError,
    errorMessage,
} from './structured_error';

const log = createLogger('environment');
const execFileAsync = promisify(execFile);

/** npm's codes for a package or version range the registry cannot satisfy. */
const UNRESOLVABLE = /\b(?:ETARGET|E404)\b|No matching version found/;

export interface EnvironmentHandle {
    envId: string;
    envDir: string;
    manifest: DependencyManifest;
    cacheHit: boolean;
    prepareMs: number;
    installMs: number | null;
}

export interface EnvironmentManager {
    ensureEnvironment(manifest: DependencyManifest): Promise<EnvironmentHandle>;
}

/** Installs the packages listed in `<envDir>/package.json` into `<envDir>/node_modules`. */
export type PackageInstaller = (envDir: string, manifest: DependencyManifest, registries: string[]) => Promise<void>;

export const npmInstaller: PackageInstaller = async (envDir, _manifest, registries) => {
    const args = ['install', '--no-audit', '--no-fund', '--omit=dev'];
    if (registries.length > 0) args.push(`--registry=${registries[0]}`);
    await execFileAsync(process.platform === 'win32' ? 'npm.cmd' : 'npm', args, {
        cwd: envDir,
        timeout: 10 * 60 * 1000,
        maxBuffer: 16 * 1024 * 1024,
    });
};

export interface DirectoryEnvironmentManagerOptions {
    root: string;
    sourceMode: SourceMode;
    registries: string[];
    installer?: PackageInstaller;
    lockTimeoutMs?: number;
}

export class DirectoryEnvironmentManager implements EnvironmentManager {
    private readonly root: string;
    private readonly sourceMode: SourceMode;
    private readonly registries: string[];
    private readonly installer: PackageInstaller;
    private readonly lockTimeoutMs: number;
    private readonly inflight = new Map<string, Promise<EnvironmentHandle>>();

    constructor(opts: DirectoryEnvironmentManagerOptions) {
        this.root = path.join(opts.root, 'environments');
        this.sourceMode = opts.sourceMode;
        this.registries = [...opts.registries];
        this.installer = opts.installer ?? npmInstaller;
        this.lockTimeoutMs = opts.lockTimeoutMs ?? 30000;
    }

    /** Identity of the environment: manifest plus runtime platform plus source policy. */
    computeEnvId(manifest: DependencyManifest): string {
        return sha256Hex(stableStringify({
            manifest: manifest.map(d => ({ name: d.name, version: d.version })),
            node_major: process.versions.node.split('.')[0],
            platform: process.platform,
            arch: process.arch,
            source_mode: this.sourceMode,
            registries: this.registries,
        }));
    }

    envDirFor(envId: string): string {
        return path.join(this.root, envId);
    }

    ensureEnvironment(manifest: DependencyManifest): Promise<EnvironmentHandle> {
        const envId = this.computeEnvId(manifest);
        const pending = this.inflight.get(envId);
        if (pending) return pending;

        const work = this.materialize(envId, manifest).finally(() => this.inflight.delete(envId));
        this.inflight.set(envId, work);
        return work;
    }

    private async materialize(envId: string, manifest: DependencyManifest): Promise<EnvironmentHandle> {
        const started = Date.now();
        const envDir = this.envDirFor(envId);
        const readyPath = path.join(envDir, '.ready');

        if (fs.existsSync(readyPath)) {
            return { envId, envDir, manifest, cacheHit: true, prepareMs: Date.now() - started, installMs: null };
        }

        const lock = await acquireEnvironmentLock({ lockPath: `${envDir}.lock`, timeoutMs: this.lockTimeoutMs, envId });
        try {
            // another process may have finished while we waited
            if (fs.existsSync(readyPath)) {
                return { envId, envDir, manifest, cacheHit: true, prepareMs: Date.now() - started, installMs: null };
            }

            this.writePackageJson(envDir, envId, manifest);
            const installStarted = Date.now();
            try {
                await this.installer(envDir, manifest, this.registries);
            } catch (e) {
                if (e instanceof CallError) throw e;
                const message = errorMessage(e);
                if (UNRESOLVABLE.test(message)) {
                    throw new DependencyResolutionError(`no release satisfies the manifest for environment ${envId}: ${message}`, {
                        cause: e,
                        metadata: { env_id: envId },
                    });
                }
                throw new DependencyInstallError(`package install failed for environment ${envId}: ${message}`, {
                    cause: e,
                    metadata: { env_id: envId },
                });
            }
            const installMs = Date.now() - installStarted;

            if (!fs.existsSync(path.join(envDir, 'node_modules'))) {
                throw new DependencyActivationError(`environment ${envId} has no node_modules after install`, {
                    metadata: { env_id: envId },
                });
            }

            fs.writeFileSync(readyPath, new Date().toISOString() + '\n');
            log.info('environment prepared', { envId, packages: manifest.length, installMs });
            return { envId, envDir, manifest, cacheHit: false, prepareMs: Date.now() - started, installMs };
        } finally {
            releaseEnvironmentLock(lock);
        }
    }

    private writePackageJson(envDir: string, envId: string, manifest: DependencyManifest): void {
        const dependencies: Record<string, string> = {};
        for (const dep of manifest) dependencies[dep.name] = dep.version;
        atomicWriteJsonSync(path.join(envDir, 'package.json'), {
            name: `callforge-env-${envId.slice(0, 12)}`,
            private: true,
            dependencies,
        });
    }
}
