import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { ArtifactStore, codeChecksum, newArtifact, reuseVerdict } from '../src/artifact_store';
import { withTmpDir } from './helpers';

const code = 'return args.length;';

function artifact(method = 'count') {
    return newArtifact({ role: 'counter', method, code, dependencies: [], policyVersion: 'solver_promotion_v1', now: '2026-01-01T00:00:00.000Z' });
}

test('saved artifacts load back in a fresh store', async () => {
    await withTmpDir('artifacts-', (root) => {
        new ArtifactStore({ root }).save(artifact());
        const loaded = new ArtifactStore({ root }).load('counter', 'count');
        assert.ok(loaded);
        assert.equal(loaded.code, code);
        assert.equal(loaded.checksum, codeChecksum(code));
        assert.equal(loaded.created_at, '2026-01-01T00:00:00.000Z');
        assert.ok(fs.existsSync(path.join(root, 'artifacts', 'counter', 'count.json')));
    });
});

test('loads hand out private copies', async () => {
    await withTmpDir('artifacts-copy-', (root) => {
        const store = new ArtifactStore({ root });
        store.save(artifact());
        const first = store.load('counter', 'count');
        assert.ok(first);
        first.success_count = 99;
        assert.equal(store.load('counter', 'count')?.success_count, 0);
    });
});

test('role and method are reduced to safe path segments', async () => {
    await withTmpDir('artifacts-path-', (root) => {
        const store = new ArtifactStore({ root });
        assert.equal(store.pathFor('../etc', 'get data'), path.join(root, 'artifacts', 'etc', 'get_data.json'));
    });
});

test('unparseable files are quarantined and read as a miss', async () => {
    await withTmpDir('artifacts-corrupt-', (root) => {
        const store = new ArtifactStore({ root });
        const file = store.pathFor('counter', 'count');
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, '{ not json');

        assert.equal(store.load('counter', 'count'), null);
        assert.equal(fs.existsSync(file), false);
        const moved = fs.readdirSync(path.dirname(file));
        assert.equal(moved.length, 1);
        assert.match(moved[0], /^count\.json\.corrupt-\d{8}T\d{6}$/);
    });
});

test('records missing required fields are quarantined too', async () => {
    await withTmpDir('artifacts-malformed-', (root) => {
        const store = new ArtifactStore({ root });
        const file = store.pathFor('counter', 'count');
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, JSON.stringify({ role: 'counter', method: 'count' }));
        assert.equal(store.load('counter', 'count'), null);
        assert.equal(fs.existsSync(file), false);
    });
});

test('another schema version is ignored but left in place', async () => {
    await withTmpDir('artifacts-schema-', (root) => {
        const store = new ArtifactStore({ root });
        store.save({ ...artifact(), schema_version: 2 });
        store.invalidate();
        assert.equal(store.load('counter', 'count'), null);
        assert.ok(fs.existsSync(store.pathFor('counter', 'count')));
    });
});

test('only the newest history entries are kept', async () => {
    await withTmpDir('artifacts-history-', (root) => {
        const store = new ArtifactStore({ root });
        const record = artifact();
        record.history = ['a', 'b', 'c', 'd'].map((c) => ({
            checksum: codeChecksum(c),
            parent_checksum: null,
            trigger: 'regenerate',
            created_at: '2026-01-01T00:00:00.000Z',
            code: c,
            dependencies: [],
        }));
        store.save(record);
        store.invalidate('counter', 'count');
        assert.deepEqual(store.load('counter', 'count')?.history.map(h => h.code), ['b', 'c', 'd']);
    });
});

test('a tampered file fails the checksum gate', async () => {
    await withTmpDir('artifacts-tamper-', (root) => {
        const store = new ArtifactStore({ root });
        store.save(artifact());
        const file = store.pathFor('counter', 'count');
        const raw = fs.readFileSync(file, 'utf8').replace('return args.length;', 'return 0;');
        fs.writeFileSync(file, raw);

        const loaded = new ArtifactStore({ root }).load('counter', 'count');
        assert.ok(loaded);
        assert.deepEqual(reuseVerdict(loaded), { reusable: false, reason: 'checksum_mismatch' });
    });
});

test('the reuse gate checks cacheability and version compatibility', () => {
    assert.deepEqual(reuseVerdict(artifact()), { reusable: true });
    assert.deepEqual(reuseVerdict(artifact('chat')), { reusable: false, reason: 'not_cacheable' });
    assert.deepEqual(reuseVerdict({ ...artifact(), runtime_version: '0' }), { reusable: false, reason: 'runtime_incompatible' });
    assert.deepEqual(reuseVerdict({ ...artifact(), prompt_version: '2.0' }), { reusable: false, reason: 'prompt_incompatible' });
    assert.deepEqual(reuseVerdict({ ...artifact(), prompt_version: '1.4' }), { reusable: true });
    assert.deepEqual(reuseVerdict({ ...artifact(), code: '  ', checksum: codeChecksum('  ') }), { reusable: false, reason: 'empty_code' });
});
