import test from 'node:test';
import assert from 'node:assert/strict';

import { normalizeManifest } from '../src/dependency_manifest';
import { EnvironmentHandle } from '../src/environment_manager';
import {
    ExecutionTimeoutError,
    NonSerializableResultError,
    WorkerCrashError,
} from '../src/structured_error';
import { WorkerSupervisor } from '../src/worker_supervisor';
import { fakeWorkerFactory, withTmpDir } from './helpers';

function env(envId: string, envDir = '/nonexistent'): EnvironmentHandle {
    return { envId, envDir, manifest: normalizeManifest([{ name: 'dayjs' }]), cacheHit: true, prepareMs: 0, installMs: null };
}

const call = { method: 'sum', code: 'return args[0] + args[1];', args: [2, 3], kwargs: {}, context: { n: 1 } };

test('a real worker process runs programs and returns memory', async () => {
    await withTmpDir('worker-real-', async (dir) => {
        const supervisor = new WorkerSupervisor({ maxRestarts: 1, timeoutMs: 10000 });
        try {
            const ok = await supervisor.execute(env('real', dir), {
                ...call,
                code: 'context.n += 1; return args[0] + args[1];',
            });
            assert.equal(ok.status, 'ok');
            assert.equal(ok.value, 5);
            assert.deepEqual(ok.context, { n: 2 });
            assert.equal(typeof ok.worker_pid, 'number');
            assert.equal(ok.restart_count, 0);

            const failed = await supervisor.execute(env('real', dir), { ...call, code: 'throw new RangeError("boom");' });
            assert.equal(failed.status, 'error');
            assert.equal(failed.error_type, 'execution');
            assert.equal(failed.error_class, 'RangeError');
            assert.equal(failed.error_message, 'RangeError: boom');
            assert.equal(failed.worker_pid, ok.worker_pid);

            const outcome = await supervisor.execute(env('real', dir), { ...call, code: 'return Outcome.error("missing_input", "need two numbers");' });
            assert.deepEqual(outcome.value, {
                __outcome__: { status: 'error', error_type: 'missing_input', error_message: 'need two numbers', retriable: false, metadata: {} },
            });
        } finally {
            await supervisor.shutdown();
        }
    });
});

test('a crashed worker is restarted within the budget', async () => {
    let crashes = 1;
    const fake = fakeWorkerFactory(() => (crashes-- > 0 ? new WorkerCrashError('worker exited with code 1') : { value: 'fine' }));
    const supervisor = new WorkerSupervisor({ maxRestarts: 1, timeoutMs: 1000, factory: fake.factory });

    await assert.rejects(supervisor.execute(env('e1'), call), WorkerCrashError);
    const response = await supervisor.execute(env('e1'), call);

    assert.equal(response.value, 'fine');
    assert.equal(response.restart_count, 1);
    assert.equal(fake.started.length, 2);
    await supervisor.shutdown();
});

test('exceeding the restart budget makes the failure terminal', async () => {
    const fake = fakeWorkerFactory(() => new WorkerCrashError('worker exited with signal SIGKILL'));
    const supervisor = new WorkerSupervisor({ maxRestarts: 1, timeoutMs: 1000, factory: fake.factory });

    await assert.rejects(supervisor.execute(env('e1'), call), WorkerCrashError);
    await assert.rejects(supervisor.execute(env('e1'), call), WorkerCrashError);
    await assert.rejects(supervisor.execute(env('e1'), call), (err: unknown) => {
        assert.ok(err instanceof WorkerCrashError);
        assert.equal(err.terminal, true);
        assert.equal(err.retriable, false);
        assert.match(err.message, /restart budget exhausted for environment e1/);
        return true;
    });
    assert.equal(fake.started.length, 2);
});

test('timeouts count against the restart budget', async () => {
    const fake = fakeWorkerFactory(() => new ExecutionTimeoutError('worker killed after 5ms for sum'));
    const supervisor = new WorkerSupervisor({ maxRestarts: 0, timeoutMs: 5, factory: fake.factory });

    await assert.rejects(supervisor.execute(env('e1'), call), ExecutionTimeoutError);
    await assert.rejects(supervisor.execute(env('e1'), call), (err: unknown) => err instanceof WorkerCrashError && err.terminal);
});

test('a request for another environment replaces the worker', async () => {
    const fake = fakeWorkerFactory((req) => ({ value: req.method }));
    const supervisor = new WorkerSupervisor({ factory: fake.factory });

    await supervisor.execute(env('e1'), call);
    await supervisor.execute(env('e1'), call);
    await supervisor.execute(env('e2'), call);

    assert.equal(fake.started.length, 2);
    assert.equal(fake.started[0].running, false);
    assert.equal(supervisor.envId, 'e2');
    await supervisor.shutdown();
    assert.equal(fake.started[1].running, false);
});

test('non-plain request data never reaches a worker', async () => {
    const fake = fakeWorkerFactory(() => ({}));
    const supervisor = new WorkerSupervisor({ factory: fake.factory });
    await assert.rejects(
        supervisor.execute(env('e1'), { ...call, context: { when: new Date(0) } }),
        (err: unknown) => err instanceof NonSerializableResultError && /context must be plain serializable data/.test(err.message)
    );
    assert.equal(fake.started.length, 0);
});

test('concurrent requests are served one at a time', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const fake = fakeWorkerFactory(() => ({ value: 1 }));
    const supervisor = new WorkerSupervisor({
        factory: (target, timeoutMs) => {
            const worker = fake.factory(target);
            const execute = worker.execute.bind(worker);
            return {
                get pid() { return worker.pid; },
                get running() { return worker.running; },
                shutdown: () => worker.shutdown(),
                execute: async (req) => {
                    inFlight += 1;
                    maxInFlight = Math.max(maxInFlight, inFlight);
                    await new Promise((r) => setTimeout(r, Math.min(timeoutMs, 5)));
                    inFlight -= 1;
                    return execute(req);
                },
            };
        },
    });
    await Promise.all([supervisor.execute(env('e1'), call), supervisor.execute(env('e1'), call), supervisor.execute(env('e1'), call)]);
    assert.equal(maxInFlight, 1);
});
