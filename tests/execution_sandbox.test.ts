import test from 'node:test';
import assert from 'node:assert/strict';

import { DelegatedHandle, ExecutionSandbox, SandboxCapabilities } from '../src/execution_sandbox';
import { JsonObject } from '../src/json_value';
import { isOutcome, okOutcome } from '../src/outcome';
import {
    ExecutionError,
    ExecutionTimeoutError,
    GuardrailViolationError,
    InvalidCodeError,
} from '../src/structured_error';

const origin = { toolRole: 'calc', methodName: 'sum' };

function handle(role: string): DelegatedHandle {
    return { role, call: async (method: string) => okOutcome(`${role}.${method}`) };
}

function caps(memory: JsonObject = {}, args: SandboxCapabilities['args'] = []): SandboxCapabilities {
    return {
        memory,
        args,
        kwargs: {},
        runtimeContext: { depth: 0, role: 'calc', method: 'sum' },
        delegate: (role) => handle(role),
        tool: (name) => handle(name),
        remember: (entries) => Object.assign(memory, entries),
    };
}

function run(code: string, c: SandboxCapabilities = caps(), timing = { syncTimeoutMs: 200, timeoutMs: 500 }): Promise<unknown> {
    return new ExecutionSandbox().run(c, { code, origin, ...timing });
}

test('a program returns a value or assigns result', async () => {
    assert.equal(await run('return args[0] + args[1];', caps({}, [2, 3])), 5);
    assert.equal(await run('result = "assigned";'), 'assigned');
    assert.equal(await run('result = 1; return 2;'), 2);
});

test('memory writes land in the role memory', async () => {
    const memory: JsonObject = { count: 1 };
    await run('context.count += 1; memory.seen = true;', caps(memory));
    assert.deepEqual(memory, { count: 2, seen: true });
});

test('delegated handles resolve to outcomes', async () => {
    const value = await run('const o = await tool("search").call("query"); return o.status === "ok" ? o.value : null;');
    assert.equal(value, 'search.query');
});

test('programs build outcomes with the Outcome constructors', async () => {
    const raw = await run('return Outcome.error("missing_input", "no query", { retriable: true });');
    assert.ok(isOutcome(raw));
    assert.equal(raw.status, 'error');
    assert.equal(raw.status === 'error' ? raw.retriable : null, true);
    assert.equal(raw.toolRole, 'calc');
});

test('syntax errors are invalid_code', async () => {
    await assert.rejects(run('return (;'), InvalidCodeError);
});

test('runtime throws become execution errors naming the original class', async () => {
    await assert.rejects(run('const x = null; return x.y;'), (err: unknown) => {
        assert.ok(err instanceof ExecutionError);
        assert.match(err.message, /^TypeError: /);
        assert.deepEqual(err.metadata, { stage: 'execution' });
        return true;
    });
});

test('a busy loop hits the synchronous time limit', async () => {
    await assert.rejects(run('while (true) {}', caps(), { syncTimeoutMs: 50, timeoutMs: 1000 }), (err: unknown) => {
        assert.ok(err instanceof ExecutionTimeoutError);
        assert.match(err.message, /synchronous time limit of 50ms/);
        return true;
    });
});

test('a program that never settles hits the execution deadline', async () => {
    await assert.rejects(run('await new Promise(() => {});', caps(), { syncTimeoutMs: 50, timeoutMs: 60 }), /did not settle within 60ms/);
});

test('assigning to a handle is a guardrail violation', async () => {
    await assert.rejects(run('const h = delegate("helper"); h.call = () => 1;'), (err: unknown) => {
        assert.ok(err instanceof GuardrailViolationError);
        assert.equal(err.subtype, 'singleton_method_mutation');
        assert.equal(err.errorType, 'tool_registry_violation');
        return true;
    });
});

test('globals defined by one run are gone in the next', async () => {
    const sandbox = new ExecutionSandbox();
    const opts = { origin, syncTimeoutMs: 200, timeoutMs: 500 };
    await sandbox.run(caps(), { code: 'globalThis.leaked = 42;', ...opts });
    assert.equal(await sandbox.run(caps(), { code: 'return typeof leaked;', ...opts }), 'undefined');
});

test('runtime context is read-only', async () => {
    assert.equal(await run('"use strict"; try { runtimeContext.depth = 9; } catch (e) { return "refused"; } return runtimeContext.depth;'), 'refused');
});

test('a program left running past its deadline loses its capabilities', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => { release = () => resolve(); });
    const calls: string[] = [];
    const remembered: unknown[] = [];
    const c: SandboxCapabilities = {
        ...caps(),
        tool: (name) => ({
            role: name,
            call: async (method: string) => {
                calls.push(method);
                if (method === 'wait') await gate;
                return okOutcome(method);
            },
        }),
        remember: (entries) => { remembered.push(entries); },
    };
    const code = [
        'const slow = tool("slow");',
        'await slow.call("wait");',
        'try { remember({ late: true }); } catch (e) { await slow.call("after-remember"); }',
        'tool("other");',
    ].join('\n');

    await assert.rejects(run(code, c, { syncTimeoutMs: 200, timeoutMs: 30 }), ExecutionTimeoutError);
    release();
    for (let i = 0; i < 5; i++) await new Promise(resolve => setImmediate(resolve));

    assert.deepEqual(calls, ['wait']);
    assert.deepEqual(remembered, []);
});
