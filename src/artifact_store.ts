// artifact_store.ts - persisted programs keyed by (role, method)
//
// GUARANTEES:
// - One JSON file per key: <root>/artifacts/<role>/<method>.json
// - Replace-on-write (temp + fsync + rename); readers never see a partial file
// - Unparseable files are quarantined (<file>.corrupt-YYYYMMDDTHHMMSS) and read as a miss
// - Checksum gate: code runs from the store only when sha256 over the code matches
// - Optimistic concurrency: last writer wins; a changed on-disk checksum is logged
// - Entry-bounded LRU read cache; writes go through the cache

import * as fs from 'fs';
import * as path from 'path';
import { LRUCache } from 'lru-cache';
import { ARTIFACTS, PROMOTION_POLICY_V1 } from './config';
import { atomicWriteJsonSync, quarantineFile, sha256Hex } from './atomic_write';
import { Dependency, normalizeManifest } from './dependency_manifest';
import { isPlainObject } from './json_value';
import { createLogger } from './logger';
import { ERRORS, StoreError, errorMessage } from './structured_error';

const log = createLogger('artifact-store');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type LifecycleState = 'candidate' | 'probation' | 'durable' | 'degraded';

export type FailureClass = 'adaptive' | 'extrinsic' | 'intrinsic';

export interface HistoryEntry {
    checksum: string;
    parent_checksum: string | null;
    trigger: string;
    created_at: string;
    code: string;
    dependencies: Dependency[];
    trigger_stage?: string;
    trigger_failure_class?: string;
    trigger_error_message?: string;
}

export interface WindowEntry {
    status: 'ok' | 'error';
    error_type: string | null;
    at: string;
}

export interface VersionScorecard {
    calls: number;
    successes: number;
    failures: number;
    contract_pass_count: number;
    contract_fail_count: number;
    guardrail_retry_exhausted_count: number;
    outcome_retry_exhausted_count: number;
    wrong_boundary_count: number;
    provenance_violation_count: number;
    state_key_observations: string[][];
    state_key_consistency_ratio: number;
    sessions: string[];
    short_window: WindowEntry[];
    medium_window: WindowEntry[];
    last_outcome_status: 'ok' | 'error' | null;
    updated_at: string | null;
}

export interface VersionLifecycle {
    /** Effective state; only enforced promotion moves it. */
    state: LifecycleState;
    /** State the policy would assign; advanced on every evaluation. */
    shadow_state: LifecycleState;
    first_seen_at: string;
    last_decision: string;
    last_decision_at: string;
}

export interface ShadowDecision {
    checksum: string;
    from: LifecycleState;
    to: LifecycleState;
    decision: string;
    policy_version: string;
    enforced: boolean;
    at: string;
}

export interface ArtifactLifecycle {
    policy_version: string;
    incumbent_durable_checksum: string | null;
    versions: Record<string, VersionLifecycle>;
    shadow_decisions: ShadowDecision[];
}

export interface ArtifactRecord {
    schema_version: number;
    role: string;
    method: string;
    code: string;
    checksum: string;
    dependencies: Dependency[];
    runtime_version: string;
    prompt_version: string;
    cacheable: boolean;
    cacheable_reason: string;
    input_sensitive: boolean;
    success_count: number;
    failure_count: number;
    failure_counts: Record<FailureClass, number>;
    last_failure_class: FailureClass | null;
    last_failure_reason: string | null;
    repair_count_since_regen: number;
    history: HistoryEntry[];
    lifecycle: ArtifactLifecycle;
    scorecards: Record<string, VersionScorecard>;
    created_at: string;
    updated_at: string;
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

export function codeChecksum(code: string): string {
    return `sha256:${sha256Hex(code)}`;
}

/** Path segment restricted to `[a-zA-Z0-9_-]`. */
export function safeSegment(value: string): string {
    const cleaned = value.replace(/[^a-zA-Z0-9_-]+/g, '_').replace(/^_+|_+$/g, '');
    return cleaned === '' ? 'item' : cleaned;
}

export function isDynamicDispatchMethod(method: string): boolean {
    return ARTIFACTS.DYNAMIC_DISPATCH_METHODS.includes(method);
}

export function emptyScorecard(): VersionScorecard {
    return {
        calls: 0,
        successes: 0,
        failures: 0,
        contract_pass_count: 0,
        contract_fail_count: 0,
        guardrail_retry_exhausted_count: 0,
        outcome_retry_exhausted_count: 0,
        wrong_boundary_count: 0,
        provenance_violation_count: 0,
        state_key_observations: [],
        state_key_consistency_ratio: 1,
        sessions: [],
        short_window: [],
        medium_window: [],
        last_outcome_status: null,
        updated_at: null,
    };
}

export function newArtifact(params: {
    role: string;
    method: string;
    code: string;
    dependencies: readonly Dependency[];
    policyVersion: string;
    now?: string;
}): ArtifactRecord {
    const now = params.now ?? new Date().toISOString();
    const dynamic = isDynamicDispatchMethod(params.method);
    return {
        schema_version: ARTIFACTS.SCHEMA_VERSION,
        role: params.role,
        method: params.method,
        code: params.code,
        checksum: codeChecksum(params.code),
        dependencies: params.dependencies.map(d => ({ ...d })),
        runtime_version: ARTIFACTS.RUNTIME_VERSION,
        prompt_version: ARTIFACTS.PROMPT_VERSION,
        cacheable: !dynamic,
        cacheable_reason: dynamic ? 'dynamic_dispatch_method' : 'stable_method',
        input_sensitive: dynamic,
        success_count: 0,
        failure_count: 0,
        failure_counts: { adaptive: 0, extrinsic: 0, intrinsic: 0 },
        last_failure_class: null,
        last_failure_reason: null,
        repair_count_since_regen: 0,
        history: [],
        lifecycle: {
            policy_version: params.policyVersion,
            incumbent_durable_checksum: null,
            versions: {},
            shadow_decisions: [],
        },
        scorecards: {},
        created_at: now,
        updated_at: now,
    };
}

/* -------------------------------------------------------------------------- */
/* Reuse gate                                                                 */
/* -------------------------------------------------------------------------- */

export type ReuseVerdict =
    | { reusable: true }
    | { reusable: false; reason: 'checksum_mismatch' | 'not_cacheable' | 'runtime_incompatible' | 'prompt_incompatible' | 'empty_code' };

function majorOf(version: string): string {
    return version.split('.')[0];
}

/** Checks that a persisted record may run without regeneration. */
export function reuseVerdict(record: ArtifactRecord): ReuseVerdict {
    if (record.code.trim() === '') return { reusable: false, reason: 'empty_code' };
    if (codeChecksum(record.code) !== record.checksum) {
        log.warn('artifact checksum mismatch; treating as cache miss', { role: record.role, method: record.method });
        return { reusable: false, reason: 'checksum_mismatch' };
    }
    if (!record.cacheable || isDynamicDispatchMethod(record.method)) return { reusable: false, reason: 'not_cacheable' };
    if (record.runtime_version !== ARTIFACTS.RUNTIME_VERSION) return { reusable: false, reason: 'runtime_incompatible' };
    if (majorOf(record.prompt_version) !== majorOf(ARTIFACTS.PROMPT_VERSION)) {
        return { reusable: false, reason: 'prompt_incompatible' };
    }
    return { reusable: true };
}

/* -------------------------------------------------------------------------- */
/* Parsing                                                                    */
/* -------------------------------------------------------------------------- */

function str(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback;
}

function optStr(value: unknown): string | null {
    return typeof value === 'string' ? value : null;
}

function int(value: unknown): number {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? Math.floor(value) : 0;
}

function ratio(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function isLifecycleState(value: unknown): value is LifecycleState {
    return value === 'candidate' || value === 'probation' || value === 'durable' || value === 'degraded';
}

function isFailureClass(value: unknown): value is FailureClass {
    return value === 'adaptive' || value === 'extrinsic' || value === 'intrinsic';
}

function dependencies(value: unknown): Dependency[] {
    try {
        return normalizeManifest(value).map(d => ({ ...d }));
    } catch (e) {
        log.warn('stored dependency list invalid; ignoring it', { error: errorMessage(e) });
        return [];
    }
}

function strings(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function windowEntries(value: unknown): WindowEntry[] {
    if (!Array.isArray(value)) return [];
    const out: WindowEntry[] = [];
    for (const raw of value) {
        if (!isPlainObject(raw)) continue;
        out.push({
            status: raw.status === 'ok' ? 'ok' : 'error',
            error_type: optStr(raw.error_type),
            at: str(raw.at, ''),
        });
    }
    return out;
}

function parseScorecard(raw: unknown): VersionScorecard {
    const card = emptyScorecard();
    if (!isPlainObject(raw)) return card;
    card.calls = int(raw.calls);
    card.successes = int(raw.successes);
    card.failures = int(raw.failures);
    card.contract_pass_count = int(raw.contract_pass_count);
    card.contract_fail_count = int(raw.contract_fail_count);
    card.guardrail_retry_exhausted_count = int(raw.guardrail_retry_exhausted_count);
    card.outcome_retry_exhausted_count = int(raw.outcome_retry_exhausted_count);
    card.wrong_boundary_count = int(raw.wrong_boundary_count);
    card.provenance_violation_count = int(raw.provenance_violation_count);
    card.state_key_observations = Array.isArray(raw.state_key_observations) ? raw.state_key_observations.map(strings) : [];
    card.state_key_consistency_ratio = ratio(raw.state_key_consistency_ratio, 1);
    card.sessions = strings(raw.sessions);
    card.short_window = windowEntries(raw.short_window);
    card.medium_window = windowEntries(raw.medium_window);
    card.last_outcome_status = raw.last_outcome_status === 'ok' || raw.last_outcome_status === 'error' ? raw.last_outcome_status : null;
    card.updated_at = optStr(raw.updated_at);
    return card;
}

function parseHistory(value: unknown): HistoryEntry[] {
    if (!Array.isArray(value)) return [];
    const out: HistoryEntry[] = [];
    for (const raw of value) {
        if (!isPlainObject(raw) || typeof raw.checksum !== 'string' || typeof raw.code !== 'string') continue;
        const entry: HistoryEntry = {
            checksum: raw.checksum,
            parent_checksum: optStr(raw.parent_checksum),
            trigger: str(raw.trigger, 'unknown'),
            created_at: str(raw.created_at, ''),
            code: raw.code,
            dependencies: dependencies(raw.dependencies),
        };
        if (typeof raw.trigger_stage === 'string') entry.trigger_stage = raw.trigger_stage;
        if (typeof raw.trigger_failure_class === 'string') entry.trigger_failure_class = raw.trigger_failure_class;
        if (typeof raw.trigger_error_message === 'string') entry.trigger_error_message = raw.trigger_error_message;
        out.push(entry);
    }
    return out.slice(-ARTIFACTS.HISTORY_LIMIT);
}

function parseLifecycle(raw: unknown, policyVersion: string): ArtifactLifecycle {
    const lifecycle: ArtifactLifecycle = {
        policy_version: policyVersion,
        incumbent_durable_checksum: null,
        versions: {},
        shadow_decisions: [],
    };
    if (!isPlainObject(raw)) return lifecycle;
    lifecycle.policy_version = str(raw.policy_version, policyVersion);
    lifecycle.incumbent_durable_checksum = optStr(raw.incumbent_durable_checksum);
    if (isPlainObject(raw.versions)) {
        for (const [checksum, v] of Object.entries(raw.versions)) {
            if (!isPlainObject(v) || !isLifecycleState(v.state)) continue;
            lifecycle.versions[checksum] = {
                state: v.state,
                shadow_state: isLifecycleState(v.shadow_state) ? v.shadow_state : v.state,
                first_seen_at: str(v.first_seen_at, ''),
                last_decision: str(v.last_decision, 'hold'),
                last_decision_at: str(v.last_decision_at, ''),
            };
        }
    }
    if (Array.isArray(raw.shadow_decisions)) {
        for (const d of raw.shadow_decisions) {
            if (!isPlainObject(d) || !isLifecycleState(d.from) || !isLifecycleState(d.to)) continue;
            lifecycle.shadow_decisions.push({
                checksum: str(d.checksum, ''),
                from: d.from,
                to: d.to,
                decision: str(d.decision, 'hold'),
                policy_version: str(d.policy_version, policyVersion),
                enforced: d.enforced === true,
                at: str(d.at, ''),
            });
        }
    }
    return lifecycle;
}

/**
 * Validates a decoded artifact file. Returns null when required fields are
 * missing; optional structure falls back to empty defaults.
 */
export function parseArtifact(raw: unknown): ArtifactRecord | null {
    if (!isPlainObject(raw)) return null;
    if (typeof raw.role !== 'string' || typeof raw.method !== 'string') return null;
    if (typeof raw.code !== 'string' || typeof raw.checksum !== 'string') return null;

    const now = new Date().toISOString();
    const counts = isPlainObject(raw.failure_counts) ? raw.failure_counts : {};
    const scorecards: Record<string, VersionScorecard> = {};
    if (isPlainObject(raw.scorecards)) {
        for (const [checksum, card] of Object.entries(raw.scorecards)) scorecards[checksum] = parseScorecard(card);
    }
    const policyVersion = PROMOTION_POLICY_V1.version;

    return {
        schema_version: int(raw.schema_version),
        role: raw.role,
        method: raw.method,
        code: raw.code,
        checksum: raw.checksum,
        dependencies: dependencies(raw.dependencies),
        runtime_version: str(raw.runtime_version, ''),
        prompt_version: str(raw.prompt_version, ''),
        cacheable: raw.cacheable === true,
        cacheable_reason: str(raw.cacheable_reason, 'unknown'),
        input_sensitive: raw.input_sensitive === true,
        success_count: int(raw.success_count),
        failure_count: int(raw.failure_count),
        failure_counts: { adaptive: int(counts.adaptive), extrinsic: int(counts.extrinsic), intrinsic: int(counts.intrinsic) },
        last_failure_class: isFailureClass(raw.last_failure_class) ? raw.last_failure_class : null,
        last_failure_reason: optStr(raw.last_failure_reason),
        repair_count_since_regen: int(raw.repair_count_since_regen),
        history: parseHistory(raw.history),
        lifecycle: parseLifecycle(raw.lifecycle, policyVersion),
        scorecards,
        created_at: str(raw.created_at, now),
        updated_at: str(raw.updated_at, now),
    };
}

/* -------------------------------------------------------------------------- */
/* Store                                                                      */
/* -------------------------------------------------------------------------- */

export interface ArtifactStoreOptions {
    root: string;
    cacheEntries?: number;
}

export class ArtifactStore {
    private readonly root: string;
    private readonly cache: LRUCache<string, ArtifactRecord>;
    // checksum observed on disk at load time, per file
    private readonly loadedChecksums = new Map<string, string | null>();

    constructor(opts: ArtifactStoreOptions) {
        this.root = path.join(opts.root, 'artifacts');
        this.cache = new LRUCache<string, ArtifactRecord>({ max: opts.cacheEntries ?? ARTIFACTS.READ_CACHE_ENTRIES });
    }

    pathFor(role: string, method: string): string {
        return path.join(this.root, safeSegment(role), `${safeSegment(method)}.json`);
    }

    /** Returns a private copy of the record, or null on a miss (absent, corrupt, other schema). */
    load(role: string, method: string): ArtifactRecord | null {
        const filePath = this.pathFor(role, method);
        const cached = this.cache.get(filePath);
        if (cached) return structuredClone(cached);

        if (!fs.existsSync(filePath)) {
            this.loadedChecksums.set(filePath, null);
            return null;
        }

        let decoded: unknown;
        try {
            decoded = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        } catch (e) {
            log.warn('artifact unreadable; quarantining', { filePath, error: errorMessage(e) });
            this.quarantine(filePath);
            return null;
        }

        const record = parseArtifact(decoded);
        if (!record) {
            log.warn('artifact malformed; quarantining', { filePath });
            this.quarantine(filePath);
            return null;
        }
        if (record.schema_version !== ARTIFACTS.SCHEMA_VERSION) {
            log.info('artifact schema version differs; ignoring', { filePath, schemaVersion: record.schema_version });
            this.loadedChecksums.set(filePath, record.checksum);
            return null;
        }

        this.loadedChecksums.set(filePath, record.checksum);
        this.cache.set(filePath, record);
        return structuredClone(record);
    }

    save(record: ArtifactRecord): void {
        const filePath = this.pathFor(record.role, record.method);
        this.warnOnConcurrentWrite(filePath);
        const stored = structuredClone(record);
        stored.history = stored.history.slice(-ARTIFACTS.HISTORY_LIMIT);
        try {
            atomicWriteJsonSync(filePath, stored);
        } catch (e) {
            throw new StoreError(`failed to write artifact ${filePath}: ${errorMessage(e)}`, ERRORS.INFRA_ERROR, e);
        }
        this.loadedChecksums.set(filePath, stored.checksum);
        this.cache.set(filePath, stored);
    }

    /** Drops the read cache; the next load goes to disk. */
    invalidate(role?: string, method?: string): void {
        if (role !== undefined && method !== undefined) {
            this.cache.delete(this.pathFor(role, method));
            return;
        }
        this.cache.clear();
    }

    private warnOnConcurrentWrite(filePath: string): void {
        if (!this.loadedChecksums.has(filePath) || !fs.existsSync(filePath)) return;
        const expected = this.loadedChecksums.get(filePath) ?? null;
        let onDisk: string | null = null;
        try {
            const decoded: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
            onDisk = isPlainObject(decoded) && typeof decoded.checksum === 'string' ? decoded.checksum : null;
        } catch (e) {
            log.debug('could not read artifact before write', { filePath, error: errorMessage(e) });
            return;
        }
        if (onDisk !== expected) {
            log.warn('artifact changed on disk since load; last writer wins', { filePath, expected, onDisk });
        }
    }

    private quarantine(filePath: string): void {
        try {
            quarantineFile(filePath);
        } catch (e) {
            log.error('failed to quarantine artifact', { filePath, error: errorMessage(e) });
        }
        this.cache.delete(filePath);
        this.loadedChecksums.set(filePath, null);
    }
}
