/**
 * Dependency manifest normalization and policy.
 *
 * A manifest is the canonical, frozen form of the `dependencies` array a
 * generated program declares: lowercased npm package names, default version
 * range `>= 0`, sorted by name then version, duplicates removed.
 */

import { RuntimeConfig } from './config';
import {
    DependencyManifestIncompatibleError,
    DependencyPolicyViolationError,
    InvalidDependencyManifestError,
} from './structured_error';
import { isPlainObject } from './json_value';

export interface Dependency {
    readonly name: string;
    readonly version: string;
}

export type DependencyManifest = readonly Dependency[];

export const DEFAULT_VERSION_RANGE = '>= 0';
export const EMPTY_MANIFEST: DependencyManifest = Object.freeze([]);

const PACKAGE_NAME = /^(@[a-z0-9_.-]+\/)?[a-z0-9_-][a-z0-9_.-]*$/;
const PUBLIC_REGISTRY = 'registry.npmjs.org';

function normalizeEntry(entry: unknown, index: number): Dependency {
    if (!isPlainObject(entry)) {
        throw new InvalidDependencyManifestError(`dependencies[${index}] must be an object with a name`);
    }
    const rawName = entry.name;
    if (typeof rawName !== 'string' || rawName.trim() === '') {
        throw new InvalidDependencyManifestError(`dependencies[${index}].name must be a non-empty string`);
    }
    const name = rawName.trim().toLowerCase();
    if (!PACKAGE_NAME.test(name)) {
        throw new InvalidDependencyManifestError(`dependencies[${index}].name "${rawName}" is not a valid package name`);
    }

    const rawVersion = entry.version;
    let version = DEFAULT_VERSION_RANGE;
    if (rawVersion !== undefined && rawVersion !== null) {
        if (typeof rawVersion !== 'string') {
            throw new InvalidDependencyManifestError(`dependencies[${index}].version for ${name} must be a string`);
        }
        if (rawVersion.trim() !== '') version = rawVersion.trim();
    }
    return { name, version };
}

/**
 * Canonicalizes a declared dependency list. `null`/`undefined` mean no
 * dependencies. Two different versions for one name are fatal.
 */
export function normalizeManifest(dependencies: unknown): DependencyManifest {
    if (dependencies === undefined || dependencies === null) return EMPTY_MANIFEST;
    if (!Array.isArray(dependencies)) {
        throw new InvalidDependencyManifestError('dependencies must be an array of {name, version} objects');
    }

    const byName = new Map<string, Dependency>();
    dependencies.forEach((entry, index) => {
        const dep = normalizeEntry(entry, index);
        const existing = byName.get(dep.name);
        if (existing && existing.version !== dep.version) {
            throw new InvalidDependencyManifestError(
                `conflicting versions for ${dep.name}: "${existing.version}" and "${dep.version}"`
            );
        }
        byName.set(dep.name, dep);
    });

    const sorted = Array.from(byName.values()).sort((a, b) => {
        if (a.name !== b.name) return a.name < b.name ? -1 : 1;
        if (a.version === b.version) return 0;
        return a.version < b.version ? -1 : 1;
    });
    return Object.freeze(sorted.map(d => Object.freeze({ ...d })));
}

/* -------------------------------------------------------------------------- */
/* Additive manifest                                                          */
/* -------------------------------------------------------------------------- */

/** Every package already in `current` must appear in `incoming` with the identical version. */
export function isAdditive(current: DependencyManifest, incoming: DependencyManifest): boolean {
    const versions = new Map<string, string>(incoming.map((d): [string, string] => [d.name, d.version]));
    return current.every(d => versions.get(d.name) === d.version);
}

/**
 * Resolves the manifest an agent runs a call under. An empty incoming
 * manifest keeps the current one; otherwise it must be additive.
 */
export function resolveCallManifest(role: string, current: DependencyManifest | null, incoming: DependencyManifest): DependencyManifest {
    if (current === null) return incoming;
    if (incoming.length === 0) return current;
    if (!isAdditive(current, incoming)) {
        throw new DependencyManifestIncompatibleError(
            `dependencies for ${role} are incompatible with prior manifest (existing packages must remain with identical versions)`,
            { metadata: { current_manifest: current.map(d => ({ ...d })), incoming_manifest: incoming.map(d => ({ ...d })) } }
        );
    }
    return incoming;
}

/* -------------------------------------------------------------------------- */
/* Policy                                                                     */
/* -------------------------------------------------------------------------- */

export type DependencyPolicy = Pick<RuntimeConfig, 'allowedPackages' | 'blockedPackages' | 'sourceMode' | 'packageRegistries'>;

function enforceSourcePolicy(policy: DependencyPolicy): void {
    if (policy.sourceMode !== 'internal_only') return;
    if (policy.packageRegistries.length === 0) {
        throw new DependencyPolicyViolationError('source_mode internal_only requires at least one internal package registry');
    }
    const publicSource = policy.packageRegistries.find(r => r.includes(PUBLIC_REGISTRY));
    if (publicSource) {
        throw new DependencyPolicyViolationError(`source_mode internal_only forbids public registry ${publicSource}`);
    }
}

/** Checked before any environment is materialized. */
export function enforceDependencyPolicy(manifest: DependencyManifest, policy: DependencyPolicy): void {
    if (manifest.length === 0) return;
    enforceSourcePolicy(policy);
    for (const { name } of manifest) {
        if (policy.allowedPackages && !policy.allowedPackages.includes(name)) {
            throw new DependencyPolicyViolationError(`dependency policy violation for ${name}: not in allowed packages`);
        }
        if (policy.blockedPackages && policy.blockedPackages.includes(name)) {
            throw new DependencyPolicyViolationError(`dependency policy violation for ${name}: blocked by blocked packages`);
        }
    }
}
