import test from 'node:test';
import assert from 'node:assert/strict';

import {
    EMPTY_MANIFEST,
    enforceDependencyPolicy,
    normalizeManifest,
    resolveCallManifest,
} from '../src/dependency_manifest';
import {
    DependencyManifestIncompatibleError,
    DependencyPolicyViolationError,
    InvalidDependencyManifestError,
} from '../src/structured_error';

const openPolicy = {
    allowedPackages: null,
    blockedPackages: null,
    sourceMode: 'public' as const,
    packageRegistries: ['https://registry.npmjs.org/'],
};

test('manifests are lowercased, defaulted, deduplicated and sorted', () => {
    const manifest = normalizeManifest([
        { name: 'Lodash', version: '^4.17.0' },
        { name: 'dayjs' },
        { name: 'lodash', version: '^4.17.0' },
    ]);
    assert.deepEqual(manifest, [
        { name: 'dayjs', version: '>= 0' },
        { name: 'lodash', version: '^4.17.0' },
    ]);
    assert.ok(Object.isFrozen(manifest));
});

test('null and undefined mean no dependencies', () => {
    assert.equal(normalizeManifest(null), EMPTY_MANIFEST);
    assert.equal(normalizeManifest(undefined), EMPTY_MANIFEST);
});

test('malformed manifests are rejected', () => {
    assert.throws(() => normalizeManifest('lodash'), InvalidDependencyManifestError);
    assert.throws(() => normalizeManifest([{ version: '1.0.0' }]), InvalidDependencyManifestError);
    assert.throws(() => normalizeManifest([{ name: 'bad name!' }]), InvalidDependencyManifestError);
    assert.throws(
        () => normalizeManifest([{ name: 'dayjs', version: '1' }, { name: 'dayjs', version: '2' }]),
        /conflicting versions for dayjs/
    );
});

test('later manifests must keep existing packages at identical versions', () => {
    const current = normalizeManifest([{ name: 'dayjs', version: '^1.11.0' }]);
    const widened = normalizeManifest([{ name: 'dayjs', version: '^1.11.0' }, { name: 'ms', version: '^2.1.0' }]);

    assert.deepEqual(resolveCallManifest('clock', current, widened), widened);
    assert.equal(resolveCallManifest('clock', current, EMPTY_MANIFEST), current);
    assert.equal(resolveCallManifest('clock', null, widened), widened);
    assert.throws(
        () => resolveCallManifest('clock', current, normalizeManifest([{ name: 'dayjs', version: '^2.0.0' }])),
        DependencyManifestIncompatibleError
    );
});

test('allow and block lists are enforced before materialization', () => {
    const manifest = normalizeManifest([{ name: 'left-pad', version: '1.3.0' }]);
    assert.doesNotThrow(() => enforceDependencyPolicy(manifest, openPolicy));
    assert.throws(
        () => enforceDependencyPolicy(manifest, { ...openPolicy, allowedPackages: ['dayjs'] }),
        /not in allowed packages/
    );
    assert.throws(
        () => enforceDependencyPolicy(manifest, { ...openPolicy, blockedPackages: ['left-pad'] }),
        DependencyPolicyViolationError
    );
});

test('internal-only source mode refuses the public registry', () => {
    const manifest = normalizeManifest([{ name: 'dayjs' }]);
    assert.throws(
        () => enforceDependencyPolicy(manifest, { ...openPolicy, sourceMode: 'internal_only' }),
        /forbids public registry/
    );
    assert.throws(
        () => enforceDependencyPolicy(manifest, { ...openPolicy, sourceMode: 'internal_only', packageRegistries: [] }),
        /requires at least one internal package registry/
    );
    assert.doesNotThrow(() => enforceDependencyPolicy(manifest, {
        ...openPolicy,
        sourceMode: 'internal_only',
        packageRegistries: ['https://npm.internal.example/'],
    }));
    assert.doesNotThrow(() => enforceDependencyPolicy(EMPTY_MANIFEST, { ...openPolicy, sourceMode: 'internal_only' }));
});
