import test from 'node:test';
import assert from 'node:assert/strict';

import { ArtifactRecord, codeChecksum, newArtifact } from '../src/artifact_store';
import { recordArtifactCall, stateKeysFromCode, checkStateKeyContinuity, stateKeyConsistencyRatio } from '../src/artifact_metrics';
import { PROMOTION_POLICY_V1 } from '../src/config';
import { errorOutcome, okOutcome } from '../src/outcome';
import {
    PromotionSettings,
    adoptVersion,
    applyPromotion,
    lifecycleEntry,
    selectVersion,
} from '../src/promotion_lifecycle';

const NOW = '2026-02-01T00:00:00.000Z';
const SHADOW: PromotionSettings = { policy: PROMOTION_POLICY_V1, shadowMode: true, enforced: false };
const ENFORCED: PromotionSettings = { policy: PROMOTION_POLICY_V1, shadowMode: true, enforced: true };

function artifact(code = 'return args.length;'): ArtifactRecord {
    return newArtifact({ role: 'counter', method: 'count', code, dependencies: [], policyVersion: PROMOTION_POLICY_V1.version, now: NOW });
}

function call(record: ArtifactRecord, ok: boolean, settings: PromotionSettings, session = 'trace-1') {
    recordArtifactCall(record, {
        outcome: ok ? okOutcome(1) : errorOutcome({ errorType: 'execution', errorMessage: 'boom' }),
        checksum: record.checksum,
        code: record.code,
        sessionId: session,
        contractApplied: false,
        contractPassed: null,
        guardrailRetryExhausted: false,
        outcomeRetryExhausted: false,
        now: NOW,
    });
    return applyPromotion(record, record.checksum, ok, settings, NOW);
}

test('nothing is evaluated when shadow mode and enforcement are both off', () => {
    const record = artifact();
    assert.equal(applyPromotion(record, record.checksum, true, { ...SHADOW, shadowMode: false }, NOW), null);
    assert.deepEqual(record.lifecycle.versions, {});
});

test('shadow evaluation moves only the shadow state', () => {
    const record = artifact();
    const result = call(record, true, SHADOW);
    assert.ok(result);
    assert.equal(result.state, 'probation');
    assert.equal(result.decision, 'continue_probation');

    const entry = record.lifecycle.versions[record.checksum];
    assert.equal(entry.state, 'candidate');
    assert.equal(entry.shadow_state, 'probation');
    assert.equal(record.lifecycle.shadow_decisions.length, 1);
    assert.equal(record.lifecycle.shadow_decisions[0].enforced, false);
});

test('a candidate that keeps failing is marked degraded once regression is established', () => {
    const record = artifact();
    assert.equal(call(record, false, SHADOW)?.decision, 'hold');
    assert.equal(call(record, false, SHADOW)?.decision, 'hold');
    const third = call(record, false, SHADOW);
    assert.equal(third?.decision, 'degrade');
    assert.equal(record.lifecycle.versions[record.checksum].shadow_state, 'degraded');
});

test('enforced promotion reaches durable after enough calls across sessions', () => {
    const record = artifact();
    const states: string[] = [];
    for (let i = 0; i < 10; i++) {
        const result = call(record, true, ENFORCED, i % 2 === 0 ? 'trace-a' : 'trace-b');
        states.push(result?.state ?? 'none');
    }
    assert.equal(states[0], 'probation');
    assert.equal(states[8], 'probation');
    assert.equal(states[9], 'durable');
    assert.equal(record.lifecycle.incumbent_durable_checksum, record.checksum);
});

test('a durable version degrades only once regression is sustained', () => {
    const record = artifact();
    for (let i = 0; i < 10; i++) call(record, true, ENFORCED, i % 2 === 0 ? 'trace-a' : 'trace-b');
    assert.equal(record.lifecycle.versions[record.checksum].state, 'durable');

    const first = call(record, false, ENFORCED);
    assert.equal(first?.state, 'durable');
    assert.equal(first?.decision, 'hold');

    // 15 failures against 10 successes is a failure rate of exactly 0.6
    for (let i = 1; i < 15; i++) call(record, false, ENFORCED);
    assert.equal(record.lifecycle.versions[record.checksum].state, 'durable');
    assert.equal(record.lifecycle.incumbent_durable_checksum, record.checksum);

    const last = call(record, false, ENFORCED);
    assert.equal(last?.state, 'degraded');
    assert.equal(last?.decision, 'degrade');
    assert.equal(record.lifecycle.incumbent_durable_checksum, null);
});

test('a single session never satisfies the probation gate', () => {
    const record = artifact();
    for (let i = 0; i < 12; i++) call(record, true, ENFORCED, 'trace-only');
    assert.equal(record.lifecycle.versions[record.checksum].state, 'probation');
});

test('degraded is terminal for a checksum', () => {
    const record = artifact();
    call(record, true, ENFORCED);
    assert.equal(call(record, false, ENFORCED)?.state, 'degraded');
    const after = call(record, true, ENFORCED);
    assert.equal(after?.state, 'degraded');
    assert.equal(after?.decision, 'hold');
});

test('selection without enforcement always runs the current code', () => {
    const record = artifact();
    lifecycleEntry(record, record.checksum, NOW).state = 'degraded';
    assert.equal(selectVersion(record, false)?.checksum, record.checksum);
});

test('enforced selection skips degraded versions for an earlier one', () => {
    const first = 'return 1;';
    const second = 'return 2;';
    const record = artifact(first);
    record.history = [{
        checksum: codeChecksum(first),
        parent_checksum: null,
        trigger: 'initial_forge',
        created_at: NOW,
        code: first,
        dependencies: [],
    }];
    record.code = second;
    record.checksum = codeChecksum(second);
    lifecycleEntry(record, codeChecksum(second), NOW).state = 'degraded';
    lifecycleEntry(record, codeChecksum(first), NOW).state = 'probation';

    const choice = selectVersion(record, true);
    assert.ok(choice);
    assert.equal(choice.checksum, codeChecksum(first));
    assert.equal(choice.state, 'probation');

    adoptVersion(record, choice);
    assert.equal(record.code, first);
    assert.equal(record.checksum, codeChecksum(first));
});

test('enforced selection returns null when every version is degraded', () => {
    const record = artifact();
    lifecycleEntry(record, record.checksum, NOW).state = 'degraded';
    assert.equal(selectVersion(record, true), null);
});

test('state keys come from memory and context accesses, never tools', () => {
    assert.deepEqual(
        stateKeysFromCode("memory.seen = 1; const t = memory.tools; context['cursor'] += memory.seen;"),
        ['seen', 'cursor']
    );
});

test('consistency ratio counts agreement on the leading key', () => {
    assert.equal(stateKeyConsistencyRatio([]), 1);
    assert.equal(stateKeyConsistencyRatio([['a'], ['a', 'b'], ['c']]), 0.6667);
});

test('continuity fails only when new keys share nothing with earlier versions', () => {
    const record = artifact('memory.seen = 1; return 1;');
    record.history = [{
        checksum: record.checksum,
        parent_checksum: null,
        trigger: 'initial_forge',
        created_at: NOW,
        code: record.code,
        dependencies: [],
    }];
    const fresh = 'memory.other = 2; return 2;';
    const overlapping = 'memory.seen += 1; memory.other = 2; return 2;';
    assert.equal(checkStateKeyContinuity(record, fresh, codeChecksum(fresh)).consistent, false);
    assert.equal(checkStateKeyContinuity(record, overlapping, codeChecksum(overlapping)).consistent, true);
    assert.equal(checkStateKeyContinuity(record, 'return 3;', codeChecksum('return 3;')).consistent, true);
    assert.equal(checkStateKeyContinuity(null, fresh, codeChecksum(fresh)).consistent, true);
});
