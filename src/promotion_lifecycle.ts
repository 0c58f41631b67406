/**
 * Promotion Lifecycle - candidate -> probation -> durable, or degraded.
 *
 * Every version (code checksum) of an artifact has a lifecycle entry. Each
 * finished call evaluates the policy against that version's scorecard.
 * In shadow mode only `shadow_state` and the decision ledger move; with
 * enforcement the effective `state` and version selection follow too.
 *
 * Degraded is terminal for a checksum. New code gets a new checksum and
 * starts over as a candidate.
 */

import { PromotionPolicy } from './config';
import { ArtifactRecord, LifecycleState, ShadowDecision, VersionLifecycle } from './artifact_store';
import { ScorecardMetrics, scorecardMetrics } from './artifact_metrics';
import { Dependency } from './dependency_manifest';
import { createLogger } from './logger';

const log = createLogger('promotion');

const MAX_SHADOW_DECISIONS = 50;

export interface PromotionSettings {
    policy: PromotionPolicy;
    shadowMode: boolean;
    enforced: boolean;
}

export type PromotionDecision = 'continue_probation' | 'promote' | 'degrade' | 'hold';

export interface Transition {
    from: LifecycleState;
    to: LifecycleState;
    decision: PromotionDecision;
    gatePass: boolean;
    regressed: boolean;
}

/* -------------------------------------------------------------------------- */
/* Policy                                                                     */
/* -------------------------------------------------------------------------- */

export function probationGatePasses(m: ScorecardMetrics, policy: PromotionPolicy, incumbent: ScorecardMetrics | null): boolean {
    if (m.calls < policy.minCalls) return false;
    if (m.sessionCount < policy.minSessions) return false;
    if (m.contractPassRate < policy.minContractPassRate) return false;
    if (m.guardrailRetryExhausted > policy.maxGuardrailRetryExhausted) return false;
    if (m.outcomeRetryExhausted > policy.maxOutcomeRetryExhausted) return false;
    if (m.wrongBoundaryCount > policy.maxWrongBoundaryCount) return false;
    if (m.provenanceViolations > policy.maxProvenanceViolations) return false;
    if (m.stateKeyConsistencyRatio < policy.minStateKeyConsistencyRatio) return false;
    // a challenger must not be worse at honoring contracts than the version it would replace
    return incumbent === null || m.contractPassRate >= incumbent.contractPassRate;
}

export function hasRegressed(m: ScorecardMetrics, policy: PromotionPolicy): boolean {
    return m.calls >= policy.regressionMinCalls && m.failureRate > policy.regressionFailureRate && m.failures > m.successes;
}

export function evaluateTransition(params: {
    current: LifecycleState;
    metrics: ScorecardMetrics;
    incumbent: ScorecardMetrics | null;
    lastCallOk: boolean;
    policy: PromotionPolicy;
    enforced: boolean;
}): Transition {
    const { current, metrics, policy } = params;
    const gatePass = probationGatePasses(metrics, policy, params.incumbent);
    const regressed = hasRegressed(metrics, policy);
    const to = (next: LifecycleState, decision: PromotionDecision): Transition => ({
        from: current, to: next, decision, gatePass, regressed,
    });

    switch (current) {
        case 'degraded':
            return to('degraded', 'hold');
        case 'candidate':
            if (regressed) return to('degraded', 'degrade');
            if (params.lastCallOk) return to('probation', 'continue_probation');
            return to('candidate', 'hold');
        case 'probation':
            if (params.enforced && !params.lastCallOk) return to('degraded', 'degrade');
            if (regressed) return to('degraded', 'degrade');
            if (gatePass) return to('durable', 'promote');
            return to('probation', 'continue_probation');
        case 'durable':
            if (regressed) return to('degraded', 'degrade');
            return to('durable', 'hold');
    }
}

/* -------------------------------------------------------------------------- */
/* Applying decisions                                                         */
/* -------------------------------------------------------------------------- */

export function lifecycleEntry(record: ArtifactRecord, checksum: string, now: string): VersionLifecycle {
    const existing = record.lifecycle.versions[checksum];
    if (existing) return existing;
    const entry: VersionLifecycle = {
        state: 'candidate',
        shadow_state: 'candidate',
        first_seen_at: now,
        last_decision: 'hold',
        last_decision_at: now,
    };
    record.lifecycle.versions[checksum] = entry;
    return entry;
}

export function effectiveState(record: ArtifactRecord, checksum: string): LifecycleState {
    return record.lifecycle.versions[checksum]?.state ?? 'candidate';
}

export interface PromotionResult {
    state: LifecycleState;
    decision: PromotionDecision;
    transition: Transition;
}

/**
 * Evaluates the policy for `checksum` after a call. Returns null when neither
 * shadow evaluation nor enforcement is on.
 */
export function applyPromotion(
    record: ArtifactRecord,
    checksum: string,
    lastCallOk: boolean,
    settings: PromotionSettings,
    now: string = new Date().toISOString()
): PromotionResult | null {
    if (!settings.shadowMode && !settings.enforced) return null;

    record.lifecycle.policy_version = settings.policy.version;
    const entry = lifecycleEntry(record, checksum, now);
    const incumbentChecksum = record.lifecycle.incumbent_durable_checksum;
    const incumbent = incumbentChecksum && incumbentChecksum !== checksum
        ? scorecardMetrics(record.scorecards[incumbentChecksum])
        : null;

    const transition = evaluateTransition({
        current: settings.enforced ? entry.state : entry.shadow_state,
        metrics: scorecardMetrics(record.scorecards[checksum]),
        incumbent,
        lastCallOk,
        policy: settings.policy,
        enforced: settings.enforced,
    });

    entry.shadow_state = transition.to;
    entry.last_decision = transition.decision;
    entry.last_decision_at = now;
    if (settings.enforced) {
        entry.state = transition.to;
        if (transition.to === 'durable') record.lifecycle.incumbent_durable_checksum = checksum;
        if (transition.to === 'degraded' && incumbentChecksum === checksum) record.lifecycle.incumbent_durable_checksum = null;
    }

    const decision: ShadowDecision = {
        checksum,
        from: transition.from,
        to: transition.to,
        decision: transition.decision,
        policy_version: settings.policy.version,
        enforced: settings.enforced,
        at: now,
    };
    const ledger = [...record.lifecycle.shadow_decisions, decision];
    record.lifecycle.shadow_decisions = ledger.slice(-MAX_SHADOW_DECISIONS);

    if (transition.from !== transition.to) {
        log.info('lifecycle transition', {
            role: record.role,
            method: record.method,
            checksum: checksum.slice(0, 19),
            from: transition.from,
            to: transition.to,
            enforced: settings.enforced,
        });
    }

    return { state: settings.enforced ? entry.state : entry.shadow_state, decision: transition.decision, transition };
}

/* -------------------------------------------------------------------------- */
/* Selection                                                                  */
/* -------------------------------------------------------------------------- */

export interface VersionChoice {
    checksum: string;
    code: string;
    dependencies: Dependency[];
    state: LifecycleState;
}

function availableVersions(record: ArtifactRecord): VersionChoice[] {
    const out: VersionChoice[] = [{
        checksum: record.checksum,
        code: record.code,
        dependencies: record.dependencies,
        state: effectiveState(record, record.checksum),
    }];
    for (const entry of [...record.history].reverse()) {
        if (out.some(v => v.checksum === entry.checksum)) continue;
        out.push({ checksum: entry.checksum, code: entry.code, dependencies: entry.dependencies, state: effectiveState(record, entry.checksum) });
    }
    return out;
}

function candidateScore(record: ArtifactRecord, checksum: string): number {
    const m = scorecardMetrics(record.scorecards[checksum]);
    return m.calls === 0 ? 0.5 : m.successes / m.calls;
}

/**
 * Picks the version to run. Without enforcement this is always the current
 * code. With enforcement: the incumbent durable, another durable, a
 * probation version, then the best candidate; degraded versions never.
 */
export function selectVersion(record: ArtifactRecord, enforced: boolean): VersionChoice | null {
    const versions = availableVersions(record);
    if (!enforced) return versions[0];

    const usable = versions.filter(v => v.state !== 'degraded');
    const incumbent = record.lifecycle.incumbent_durable_checksum;
    const byState = (state: LifecycleState) => usable.find(v => v.state === state) ?? null;

    const chosen =
        usable.find(v => v.checksum === incumbent && v.state === 'durable')
        ?? byState('durable')
        ?? byState('probation')
        ?? usable
            .filter(v => v.state === 'candidate')
            .sort((a, b) => candidateScore(record, b.checksum) - candidateScore(record, a.checksum))[0]
        ?? null;
    return chosen;
}

/** Makes `choice` the artifact's current code. */
export function adoptVersion(record: ArtifactRecord, choice: VersionChoice): void {
    if (record.checksum === choice.checksum) return;
    log.info('switching artifact to selected version', {
        role: record.role,
        method: record.method,
        from: record.checksum.slice(0, 19),
        to: choice.checksum.slice(0, 19),
        state: choice.state,
    });
    record.code = choice.code;
    record.checksum = choice.checksum;
    record.dependencies = choice.dependencies.map(d => ({ ...d }));
}
