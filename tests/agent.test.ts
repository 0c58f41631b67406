import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { Agent } from '../src/agent';
import { MemoryCallLog } from '../src/call_log';
import {
    BudgetExceededError,
    DependencyInstallError,
    DependencyManifestIncompatibleError,
    DependencyPolicyViolationError,
} from '../src/structured_error';
import { ToolRegistry } from '../src/tool_registry';
import { ScriptedGenerator, fakeWorkerFactory, failure, okValue, withAgent, withTmpDir } from './helpers';

/* -------------------------------------------------------------------------- */
/* Construction                                                               */
/* -------------------------------------------------------------------------- */

test('an agent needs a role and a generator', () => {
    assert.throws(() => new Agent({ role: ' ', generator: new ScriptedGenerator([]) }), /role must be a non-empty string/);
    assert.throws(() => new Agent({ role: 'counter', config: { callLogPath: null } }), /needs a code generator/);
});

test('the call log follows the configured path', async () => {
    await withTmpDir('agent-log-', async (root) => {
        const generator = new ScriptedGenerator([]);
        const none = new Agent({ role: 'a', generator, config: { toolstoreRoot: root, callLogPath: null } });
        const memory = new Agent({ role: 'b', generator, config: { toolstoreRoot: root, callLogPath: ':memory:' } });
        try {
            assert.equal(none.callLog, null);
            assert.ok(memory.callLog instanceof MemoryCallLog);
        } finally {
            await none.close();
            await memory.close();
        }
    });
});

/* -------------------------------------------------------------------------- */
/* Call boundary                                                              */
/* -------------------------------------------------------------------------- */

test('arguments that are not plain data are refused before anything runs', async () => {
    await withAgent([], {}, async ({ agent, callLog, generator }) => {
        const fn = failure(await agent.call('add', [1, () => 2]));
        assert.equal(fn.errorType, 'non_serializable_result');
        assert.equal(fn.errorMessage, 'call arguments must be plain data (offending value at args[1])');
        assert.deepEqual(fn.metadata, { stage: 'execution', boundary: 'call_arguments', path: 'args[1]' });
        assert.equal(fn.toolRole, 'counter');
        assert.equal(fn.methodName, 'add');

        const date = failure(await agent.call('add', [], { when: new Date(0) }));
        assert.equal(date.metadata.path, 'kwargs.when');

        assert.equal(callLog.countCalls(), 0);
        assert.equal(generator.requests.length, 0);
    });
});

test('defined handlers take precedence over generated programs', async () => {
    await withAgent([], {}, async ({ agent, callLog, generator }) => {
        agent.define('greet', ({ args, runtimeContext }) => `hello ${String(args[0])} at depth ${String(runtimeContext.depth)}`);
        assert.equal(okValue(await agent.call('greet', ['sam'])), 'hello sam at depth 0');
        assert.equal(generator.requests.length, 0);

        const rec = callLog.recentCalls(1)[0];
        assert.equal(rec.program_source, null);
        assert.equal(rec.attempt_id, 0);
        assert.equal(rec.outcome_status, 'ok');
    });
});

test('handlers share the role memory', async () => {
    await withAgent([], {}, async ({ agent }) => {
        agent.define('note', async ({ args, memory }) => {
            memory.note = args[0];
            return memory.note;
        });
        await agent.call('note', ['first']);
        assert.deepEqual(agent.memory, { note: 'first' });
    });
});

test('a throwing handler becomes an execution error', async () => {
    await withAgent([], {}, async ({ agent }) => {
        agent.define('boom', () => {
            throw new Error('nope');
        });
        const err = failure(await agent.call('boom'));
        assert.equal(err.errorType, 'execution');
        assert.equal(err.errorMessage, 'nope');
        assert.equal(err.metadata.stage, 'execution');
    });
});

test('a single non-array argument is wrapped', async () => {
    await withAgent([], {}, async ({ agent }) => {
        agent.define('echo', ({ args }) => args.length);
        assert.equal(okValue(await agent.invokeFrom(null, 'echo', 'one', null)), 1);
    });
});

test('memory hands out copies and remember() takes plain objects only', async () => {
    await withAgent([], {}, async ({ agent }) => {
        agent.remember({ topic: 'tides' });
        const view = agent.memory;
        view.topic = 'changed';
        assert.deepEqual(agent.memory, { topic: 'tides' });
        assert.throws(() => agent.remember(['not', 'an', 'object']), TypeError);
    });
});

test('programs can store memory through remember()', async () => {
    await withAgent(['remember({ last: args[0] }); return 1;'], {}, async ({ agent }) => {
        await agent.call('track', ['x']);
        assert.deepEqual(agent.memory, { last: 'x' });
    });
});

/* -------------------------------------------------------------------------- */
/* Delegation                                                                 */
/* -------------------------------------------------------------------------- */

test('delegate() reuses helpers and counts only new ones against the budget', async () => {
    await withAgent([], { config: { delegationBudget: 1 } }, async ({ agent }) => {
        const first = agent.delegate('analyst');
        assert.equal(agent.delegate('analyst'), first);
        assert.throws(() => agent.delegate('writer'), BudgetExceededError);

        // each helper has a budget of its own
        assert.equal(first.delegate('reviewer').role, 'reviewer');
    });
});

test('delegated helpers are registered as tools with their contract', async () => {
    await withAgent([], {}, async ({ agent, registry }) => {
        agent.delegate('analyst', { purpose: 'rank options', deliverable: { type: 'array', min_items: 1 } });
        const entry = registry.get('analyst');
        assert.ok(entry);
        assert.equal(entry.purpose, 'rank options');
        assert.equal(entry.lifecycle_state, 'candidate');
        assert.deepEqual(entry.deliverable, { type: 'array', min_items: 1 });
    });
});

test('a tool registered earlier is attached without using the delegation budget', async () => {
    const script = ['return await tool("writer").call("draft", ["x"]);', 'return "draft:" + args[0];'];
    await withAgent(script, { config: { delegationBudget: 0 } }, async ({ agent, registry }) => {
        registry.registerTool('writer', { purpose: 'write prose' });
        const outcome = await agent.call('compose');
        assert.equal(okValue(outcome), 'draft:x');
        assert.equal(outcome.toolRole, 'counter');
        assert.deepEqual(registry.get('writer')?.methods, ['draft']);
        assert.equal(registry.get('writer')?.usage_count, 1);
    });
});

test('an agent cannot call itself as a tool', async () => {
    await withAgent(['return await tool("counter").call("x");'], {}, async ({ agent, registry }) => {
        registry.registerTool('counter');
        const err = failure(await agent.call('loop'));
        assert.equal(err.errorType, 'wrong_tool_boundary');
        assert.equal(err.errorMessage, 'counter is not a registered tool of counter; known tools: counter');
    });
});

/* -------------------------------------------------------------------------- */
/* Dependencies                                                               */
/* -------------------------------------------------------------------------- */

test('declared dependencies are prepared on the first call and route it to a worker', async () => {
    const workers = fakeWorkerFactory(() => ({ value: 3 }));
    const opts = { dependencies: [{ name: 'lodash', version: '^4.17.21' }], workerFactory: workers.factory };
    await withAgent(['return 3;'], opts, async ({ agent, environments }) => {
        assert.equal(agent.manifest, null);
        assert.equal(okValue(await agent.call('sum')), 3);
        assert.deepEqual(agent.manifest, [{ name: 'lodash', version: '^4.17.21' }]);
        assert.equal(environments.prepared.length, 2);
        assert.equal(environments.prepared[0][0].name, 'lodash');
        assert.equal(workers.started.length, 1);
    });
});

test('a failed install of declared dependencies is the call outcome and is retried on the next call', async () => {
    const workers = fakeWorkerFactory(() => ({ value: 3 }));
    const opts = { dependencies: [{ name: 'lodash', version: '^4.17.21' }], workerFactory: workers.factory };
    await withAgent(['return 3;'], opts, async ({ agent, callLog, environments, generator }) => {
        environments.failures.push(new DependencyInstallError('package install failed: registry unreachable'));

        const err = failure(await agent.call('sum'));
        assert.equal(err.errorType, 'dependency_install_failed');
        assert.equal(err.errorMessage, 'package install failed: registry unreachable');
        assert.equal(err.retriable, true);
        assert.equal(err.metadata.stage, 'dependencies');
        assert.equal(agent.manifest, null);
        assert.equal(generator.requests.length, 0);
        assert.equal(callLog.recentCalls(1)[0].error_type, 'dependency_install_failed');

        assert.equal(okValue(await agent.call('sum')), 3);
        assert.deepEqual(agent.manifest, [{ name: 'lodash', version: '^4.17.21' }]);
    });
});

test('declared dependencies outside the allow list fail every call', async () => {
    const opts = { dependencies: [{ name: 'lodash' }], config: { allowedPackages: ['ramda'] } };
    await withAgent([], opts, async ({ agent, environments }) => {
        assert.equal(failure(await agent.call('sum')).errorType, 'dependency_policy_violation');
        assert.equal(failure(await agent.call('sum')).errorType, 'dependency_policy_violation');
        assert.equal(environments.prepared.length, 0);
    });
});

test('later manifests must keep earlier packages at the same version', async () => {
    await withAgent([], {}, async ({ agent }) => {
        await agent.prepare([{ name: 'lodash', version: '^4.17.21' }]);
        await agent.prepare([{ name: 'lodash', version: '^4.17.21' }, { name: 'ramda', version: '^0.30.1' }]);
        await assert.rejects(agent.prepare([{ name: 'lodash', version: '^3.10.1' }]), DependencyManifestIncompatibleError);
        assert.deepEqual(agent.manifest?.map(d => d.name), ['lodash', 'ramda']);
    });
});

test('the package allow list is enforced before any environment is built', async () => {
    await withAgent([], { config: { allowedPackages: ['ramda'] } }, async ({ agent, environments }) => {
        await assert.rejects(agent.prepare([{ name: 'lodash' }]), DependencyPolicyViolationError);
        assert.equal(environments.prepared.length, 0);
        assert.equal(agent.manifest, null);
    });
});

/* -------------------------------------------------------------------------- */
/* Lifecycle                                                                  */
/* -------------------------------------------------------------------------- */

test('closing the root agent flushes the tool registry', async () => {
    await withTmpDir('agent-close-', async (root) => {
        const agent = new Agent({
            role: 'counter',
            generator: new ScriptedGenerator([]),
            registry: ToolRegistry.load(root),
            callLog: null,
            config: { toolstoreRoot: root },
        });
        agent.delegate('analyst', { purpose: 'rank options' });
        await agent.close();

        const reloaded = ToolRegistry.load(root);
        assert.deepEqual(reloaded.names(), ['analyst']);
        assert.ok(fs.existsSync(path.join(root, 'registry.json')));
    });
});
