/**
 * Artifact health accounting: per-artifact counters, per-version scorecards,
 * and the state-key continuity check.
 */

import { ArtifactRecord, VersionScorecard, WindowEntry, emptyScorecard } from './artifact_store';
import { Outcome } from './outcome';
import { failureClassFor } from './recovery_policy';
import { ERROR_TYPES } from './structured_error';

const SHORT_WINDOW = 20;
const MEDIUM_WINDOW = 200;
const MAX_OBSERVATIONS = 200;
const MAX_SESSIONS = 200;

export interface CallObservation {
    outcome: Outcome;
    checksum: string;
    code: string;
    /** Trace id of the top-level call; distinct values count as sessions. */
    sessionId: string;
    contractApplied: boolean;
    contractPassed: boolean | null;
    guardrailRetryExhausted: boolean;
    outcomeRetryExhausted: boolean;
    now?: string;
}

/* -------------------------------------------------------------------------- */
/* State keys                                                                 */
/* -------------------------------------------------------------------------- */

const STATE_KEY_PATTERN = /\b(?:context|memory)\s*(?:\.\s*([A-Za-z_$][\w$]*)|\[\s*['"]([\w$-]+)['"]\s*\])/g;

/** Memory keys a program reads or writes, in first-seen order. `tools` is the registry view, not state. */
export function stateKeysFromCode(code: string): string[] {
    const keys: string[] = [];
    for (const m of code.matchAll(STATE_KEY_PATTERN)) {
        const key = m[1] ?? m[2];
        if (key && key !== 'tools' && !keys.includes(key)) keys.push(key);
    }
    return keys;
}

/** Fraction of observations agreeing on the most common leading (sorted-first) key. */
export function stateKeyConsistencyRatio(observations: string[][]): number {
    const firstKeys = observations
        .map(keys => keys.filter(k => k !== '').sort()[0])
        .filter((k): k is string => k !== undefined);
    if (firstKeys.length === 0) return 1;
    const tally = new Map<string, number>();
    for (const k of firstKeys) tally.set(k, (tally.get(k) ?? 0) + 1);
    const top = Math.max(...tally.values());
    return Math.round((top / firstKeys.length) * 10000) / 10000;
}

export interface ContinuityResult {
    consistent: boolean;
    keys: string[];
    priorKeys: string[];
}

/**
 * A program is discontinuous when it uses state keys and none of them were
 * used by any earlier version of the same artifact.
 */
export function checkStateKeyContinuity(record: ArtifactRecord | null, code: string, checksum: string): ContinuityResult {
    const keys = stateKeysFromCode(code);
    const prior = new Set<string>();
    if (record) {
        for (const entry of record.history) {
            if (entry.checksum === checksum) continue;
            for (const k of stateKeysFromCode(entry.code)) prior.add(k);
        }
        for (const [sum, card] of Object.entries(record.scorecards)) {
            if (sum === checksum) continue;
            for (const obs of card.state_key_observations) for (const k of obs) prior.add(k);
        }
    }
    const priorKeys = Array.from(prior);
    const consistent = keys.length === 0 || priorKeys.length === 0 || keys.some(k => prior.has(k));
    return { consistent, keys, priorKeys };
}

/* -------------------------------------------------------------------------- */
/* Counters                                                                   */
/* -------------------------------------------------------------------------- */

function pushBounded<T>(list: T[], entry: T, limit: number): T[] {
    const next = [...list, entry];
    return next.length > limit ? next.slice(next.length - limit) : next;
}

function isProvenanceViolation(outcome: Outcome): boolean {
    return outcome.status === 'error'
        && outcome.errorType === ERROR_TYPES.TOOL_REGISTRY_VIOLATION
        && /provenance/i.test(outcome.errorMessage);
}

export function scorecardFor(record: ArtifactRecord, checksum: string): VersionScorecard {
    const existing = record.scorecards[checksum];
    if (existing) return existing;
    const card = emptyScorecard();
    record.scorecards[checksum] = card;
    return card;
}

function recordScorecardCall(card: VersionScorecard, obs: CallObservation, at: string): void {
    const ok = obs.outcome.status === 'ok';
    const errorType = obs.outcome.status === 'error' ? obs.outcome.errorType : null;

    card.calls += 1;
    if (ok) card.successes += 1;
    else card.failures += 1;

    if (obs.contractApplied && obs.contractPassed === true) card.contract_pass_count += 1;
    if (obs.contractApplied && obs.contractPassed === false) card.contract_fail_count += 1;
    if (obs.guardrailRetryExhausted) card.guardrail_retry_exhausted_count += 1;
    if (obs.outcomeRetryExhausted) card.outcome_retry_exhausted_count += 1;
    if (errorType === 'wrong_tool_boundary') card.wrong_boundary_count += 1;
    if (isProvenanceViolation(obs.outcome)) card.provenance_violation_count += 1;

    card.state_key_observations = pushBounded(card.state_key_observations, stateKeysFromCode(obs.code), MAX_OBSERVATIONS);
    card.state_key_consistency_ratio = stateKeyConsistencyRatio(card.state_key_observations);

    const entry: WindowEntry = { status: ok ? 'ok' : 'error', error_type: errorType, at };
    card.short_window = pushBounded(card.short_window, entry, SHORT_WINDOW);
    card.medium_window = pushBounded(card.medium_window, entry, MEDIUM_WINDOW);
    if (obs.sessionId !== '' && !card.sessions.includes(obs.sessionId)) {
        card.sessions = pushBounded(card.sessions, obs.sessionId, MAX_SESSIONS);
    }

    card.last_outcome_status = ok ? 'ok' : 'error';
    card.updated_at = at;
}

/** Folds one finished call into the artifact's counters and the version's scorecard. */
export function recordArtifactCall(record: ArtifactRecord, obs: CallObservation): void {
    const at = obs.now ?? new Date().toISOString();
    recordScorecardCall(scorecardFor(record, obs.checksum), obs, at);

    if (obs.outcome.status === 'ok') {
        record.success_count += 1;
    } else {
        const failureClass = failureClassFor(obs.outcome.errorType);
        record.failure_count += 1;
        record.failure_counts[failureClass] += 1;
        record.last_failure_class = failureClass;
        record.last_failure_reason = obs.outcome.errorMessage;
    }
    record.updated_at = at;
}

export interface ScorecardMetrics {
    calls: number;
    successes: number;
    failures: number;
    failureRate: number;
    sessionCount: number;
    contractPassRate: number;
    guardrailRetryExhausted: number;
    outcomeRetryExhausted: number;
    wrongBoundaryCount: number;
    provenanceViolations: number;
    stateKeyConsistencyRatio: number;
}

export function scorecardMetrics(card: VersionScorecard | undefined): ScorecardMetrics {
    const c = card ?? emptyScorecard();
    const contractTotal = c.contract_pass_count + c.contract_fail_count;
    return {
        calls: c.calls,
        successes: c.successes,
        failures: c.failures,
        failureRate: c.calls === 0 ? 0 : Math.round((c.failures / c.calls) * 10000) / 10000,
        sessionCount: new Set(c.sessions).size,
        contractPassRate: contractTotal === 0 ? 1 : Math.round((c.contract_pass_count / contractTotal) * 10000) / 10000,
        guardrailRetryExhausted: c.guardrail_retry_exhausted_count,
        outcomeRetryExhausted: c.outcome_retry_exhausted_count,
        wrongBoundaryCount: c.wrong_boundary_count,
        provenanceViolations: c.provenance_violation_count,
        stateKeyConsistencyRatio: c.state_key_consistency_ratio,
    };
}
