import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { REGISTRY_SCHEMA_VERSION, ToolRegistry, findExecutableMetadata } from '../src/tool_registry';
import { withTmpDir } from './helpers';

test('registered tools start as candidates with no usage', () => {
    const registry = ToolRegistry.inMemory();
    const entry = registry.registerTool('researcher', { purpose: 'find sources', deliverable: { type: 'array' } });
    assert.equal(entry.lifecycle_state, 'candidate');
    assert.equal(entry.usage_count, 0);
    assert.deepEqual(entry.methods, []);
    assert.ok(registry.has('researcher'));
    assert.equal(registry.has('toString'), false);
    assert.deepEqual(registry.tools().researcher, {
        purpose: 'find sources',
        methods: [],
        usage_count: 0,
        success_count: 0,
        failure_count: 0,
        last_used_at: null,
        created_at: entry.created_at,
        lifecycle_state: 'candidate',
        deliverable: { type: 'array' },
    });
});

test('successful usage adds the method, failures only count', () => {
    const registry = ToolRegistry.inMemory();
    registry.registerTool('researcher');
    registry.recordUsage('researcher', 'search', true, 'probation');
    registry.recordUsage('researcher', 'summarize', false);
    registry.recordUsage('researcher', 'search', true);

    const entry = registry.get('researcher');
    assert.ok(entry);
    assert.deepEqual(entry.methods, ['search']);
    assert.equal(entry.usage_count, 3);
    assert.equal(entry.success_count, 2);
    assert.equal(entry.failure_count, 1);
    assert.equal(entry.lifecycle_state, 'probation');
});

test('re-registering merges methods and keeps counters', () => {
    const registry = ToolRegistry.inMemory();
    registry.registerTool('writer', { methods: ['draft'] });
    registry.recordUsage('writer', 'draft', true);
    const entry = registry.registerTool('writer', { methods: ['draft', 'edit'], purpose: 'write prose' });
    assert.deepEqual(entry.methods, ['draft', 'edit']);
    assert.equal(entry.usage_count, 1);
    assert.equal(entry.purpose, 'write prose');
});

test('names are sorted', () => {
    const registry = ToolRegistry.inMemory();
    registry.registerTool('writer');
    registry.registerTool('analyst');
    assert.deepEqual(registry.names(), ['analyst', 'writer']);
});

test('tools() hands out a copy', () => {
    const registry = ToolRegistry.inMemory();
    registry.registerTool('writer', { methods: ['draft'] });
    const view = registry.tools();
    const writer = view.writer;
    assert.ok(writer !== null && typeof writer === 'object' && !Array.isArray(writer));
    writer.purpose = 'changed';
    assert.equal(registry.get('writer')?.purpose, '');
});

test('restore rolls the registry back to a snapshot', () => {
    const registry = ToolRegistry.inMemory();
    registry.registerTool('writer');
    const snapshot = registry.snapshot();
    registry.registerTool('analyst');
    registry.recordUsage('writer', 'draft', true);

    registry.restore(snapshot);
    assert.deepEqual(registry.names(), ['writer']);
    assert.equal(registry.get('writer')?.usage_count, 0);
});

test('flush persists and load reads it back', async () => {
    await withTmpDir('registry-', (root) => {
        const registry = ToolRegistry.load(root);
        registry.registerTool('writer', { purpose: 'write prose', methods: ['draft'] });
        registry.flush();

        const raw: unknown = JSON.parse(fs.readFileSync(path.join(root, 'registry.json'), 'utf8'));
        assert.ok(raw !== null && typeof raw === 'object' && 'schema_version' in raw);
        assert.equal(raw.schema_version, REGISTRY_SCHEMA_VERSION);

        const reloaded = ToolRegistry.load(root);
        assert.deepEqual(reloaded.names(), ['writer']);
        assert.equal(reloaded.get('writer')?.purpose, 'write prose');
        assert.deepEqual(reloaded.get('writer')?.methods, ['draft']);
    });
});

test('an unchanged registry is not written', async () => {
    await withTmpDir('registry-clean-', (root) => {
        ToolRegistry.load(root).flush();
        assert.equal(fs.existsSync(path.join(root, 'registry.json')), false);
    });
});

test('a corrupt registry file is quarantined and the registry starts empty', async () => {
    await withTmpDir('registry-corrupt-', (root) => {
        fs.writeFileSync(path.join(root, 'registry.json'), '{ nope');
        const registry = ToolRegistry.load(root);
        assert.deepEqual(registry.names(), []);
        const files = fs.readdirSync(root);
        assert.equal(files.length, 1);
        assert.match(files[0], /^registry\.json\.corrupt-/);
    });
});

test('a registry of another schema version is ignored', async () => {
    await withTmpDir('registry-schema-', (root) => {
        fs.writeFileSync(path.join(root, 'registry.json'), JSON.stringify({ schema_version: 9, tools: { writer: {} } }));
        assert.deepEqual(ToolRegistry.load(root).names(), []);
    });
});

test('malformed entries are dropped on load', async () => {
    await withTmpDir('registry-entries-', (root) => {
        fs.writeFileSync(path.join(root, 'registry.json'), JSON.stringify({
            schema_version: 1,
            tools: { writer: { methods: ['draft', 7, ' draft ', ''], usage_count: -4 }, broken: 'x' },
        }));
        const registry = ToolRegistry.load(root);
        assert.deepEqual(registry.names(), ['writer']);
        assert.deepEqual(registry.get('writer')?.methods, ['draft']);
        assert.equal(registry.get('writer')?.usage_count, 0);
    });
});

test('executable metadata is located by path', () => {
    assert.equal(findExecutableMetadata({ writer: { methods: ['draft'] } }), null);
    assert.equal(findExecutableMetadata({ search: { run: () => 1 } }), 'context.tools["search"]["run"]');
    assert.equal(findExecutableMetadata({ list: [1, () => 2] }, 'tools'), 'tools["list"][1]');
});
