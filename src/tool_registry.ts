/**
 * Tool Registry - persisted metadata about delegated roles.
 *
 * File: <root>/registry.json  { schema_version, tools: { [name]: ToolEntry } }
 *
 * The in-memory view is what programs see as `context.tools`. It is plain
 * data only; a function found anywhere in it is a registry integrity
 * violation.
 */

import * as fs from 'fs';
import * as path from 'path';
import { atomicWriteJsonSync, quarantineFile } from './atomic_write';
import { JsonObject, JsonValue, cloneJson, isJsonObject, isPlainObject } from './json_value';
import { createLogger } from './logger';
import { ERRORS, StoreError, errorMessage } from './structured_error';

const log = createLogger('tool-registry');

export const REGISTRY_SCHEMA_VERSION = 1;

export interface ToolEntry {
    purpose: string;
    methods: string[];
    usage_count: number;
    success_count: number;
    failure_count: number;
    last_used_at: string | null;
    created_at: string;
    lifecycle_state: string;
    deliverable?: JsonValue;
}

export type ToolMap = Record<string, ToolEntry>;

export interface RegisterToolParams {
    purpose?: string;
    methods?: string[];
    deliverable?: JsonValue;
}

/* -------------------------------------------------------------------------- */
/* Integrity                                                                  */
/* -------------------------------------------------------------------------- */

/** Path of the first function (or other executable value) inside a metadata tree, else null. */
export function findExecutableMetadata(value: unknown, at = 'context.tools', depth = 0): string | null {
    if (typeof value === 'function') return at;
    if (depth > 50 || typeof value !== 'object' || value === null) return null;
    if (Array.isArray(value)) {
        for (let i = 0; i < value.length; i++) {
            const found = findExecutableMetadata(value[i], `${at}[${i}]`, depth + 1);
            if (found) return found;
        }
        return null;
    }
    for (const key of Object.keys(value)) {
        const found = findExecutableMetadata(Reflect.get(value, key), `${at}[${JSON.stringify(key)}]`, depth + 1);
        if (found) return found;
    }
    return null;
}

/* -------------------------------------------------------------------------- */
/* Parsing                                                                    */
/* -------------------------------------------------------------------------- */

function stringList(value: unknown): string[] {
    if (!Array.isArray(value)) return [];
    const out: string[] = [];
    for (const v of value) {
        if (typeof v !== 'string') continue;
        const s = v.trim();
        if (s !== '' && !out.includes(s)) out.push(s);
    }
    return out;
}

function count(value: unknown): number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : 0;
}

function parseEntry(raw: unknown, now: string): ToolEntry | null {
    if (!isPlainObject(raw)) return null;
    const entry: ToolEntry = {
        purpose: typeof raw.purpose === 'string' ? raw.purpose : '',
        methods: stringList(raw.methods),
        usage_count: count(raw.usage_count),
        success_count: count(raw.success_count),
        failure_count: count(raw.failure_count),
        last_used_at: typeof raw.last_used_at === 'string' ? raw.last_used_at : null,
        created_at: typeof raw.created_at === 'string' ? raw.created_at : now,
        lifecycle_state: typeof raw.lifecycle_state === 'string' ? raw.lifecycle_state : 'candidate',
    };
    if (raw.deliverable !== undefined && isJsonObject(raw.deliverable)) entry.deliverable = cloneJson(raw.deliverable);
    return entry;
}

function parseTools(raw: unknown): ToolMap {
    const now = new Date().toISOString();
    const tools: ToolMap = {};
    if (!isPlainObject(raw)) return tools;
    for (const [name, value] of Object.entries(raw)) {
        const entry = parseEntry(value, now);
        if (entry) tools[name] = entry;
    }
    return tools;
}

function toJson(tools: ToolMap): JsonObject {
    const out: JsonObject = {};
    for (const [name, entry] of Object.entries(tools)) {
        const json: JsonObject = {
            purpose: entry.purpose,
            methods: [...entry.methods],
            usage_count: entry.usage_count,
            success_count: entry.success_count,
            failure_count: entry.failure_count,
            last_used_at: entry.last_used_at,
            created_at: entry.created_at,
            lifecycle_state: entry.lifecycle_state,
        };
        if (entry.deliverable !== undefined) json.deliverable = cloneJson(entry.deliverable);
        out[name] = json;
    }
    return out;
}

/* -------------------------------------------------------------------------- */
/* Registry                                                                   */
/* -------------------------------------------------------------------------- */

export class ToolRegistry {
    private entries: ToolMap;
    private dirty = false;

    private constructor(readonly filePath: string | null, entries: ToolMap) {
        this.entries = entries;
    }

    /** Loads `<root>/registry.json`, or starts empty when it is missing, unreadable or of another schema. */
    static load(root: string): ToolRegistry {
        const filePath = path.join(root, 'registry.json');
        if (!fs.existsSync(filePath)) return new ToolRegistry(filePath, {});

        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        } catch (e) {
            log.warn('registry unreadable; quarantining', { filePath, error: errorMessage(e) });
            quarantineFile(filePath);
            return new ToolRegistry(filePath, {});
        }
        if (!isPlainObject(parsed) || parsed.schema_version !== REGISTRY_SCHEMA_VERSION) {
            log.warn('registry schema unsupported; starting empty', { filePath });
            return new ToolRegistry(filePath, {});
        }
        return new ToolRegistry(filePath, parseTools(parsed.tools));
    }

    /** A registry that never touches disk. */
    static inMemory(): ToolRegistry {
        return new ToolRegistry(null, {});
    }

    has(name: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.entries, name);
    }

    get(name: string): ToolEntry | undefined {
        return this.has(name) ? this.entries[name] : undefined;
    }

    names(): string[] {
        return Object.keys(this.entries).sort();
    }

    /** Fresh plain-data copy handed to programs as `context.tools`. */
    tools(): JsonObject {
        return toJson(this.entries);
    }

    registerTool(name: string, params: RegisterToolParams = {}): ToolEntry {
        const now = new Date().toISOString();
        const existing = this.get(name);
        const methods = stringList([...(existing?.methods ?? []), ...(params.methods ?? [])]);
        const entry: ToolEntry = {
            purpose: params.purpose ?? existing?.purpose ?? '',
            methods,
            usage_count: existing?.usage_count ?? 0,
            success_count: existing?.success_count ?? 0,
            failure_count: existing?.failure_count ?? 0,
            last_used_at: existing?.last_used_at ?? null,
            created_at: existing?.created_at ?? now,
            lifecycle_state: existing?.lifecycle_state ?? 'candidate',
        };
        const deliverable = params.deliverable ?? existing?.deliverable;
        if (deliverable !== undefined) entry.deliverable = deliverable;
        this.entries[name] = entry;
        this.dirty = true;
        return entry;
    }

    /** Counts one use of `name.method`; a successful method is added to the known methods. */
    recordUsage(name: string, method: string, ok: boolean, lifecycleState?: string): void {
        const entry = this.get(name) ?? this.registerTool(name);
        entry.usage_count += 1;
        if (ok) {
            entry.success_count += 1;
            const m = method.trim();
            if (m !== '' && !entry.methods.includes(m)) entry.methods.push(m);
        } else {
            entry.failure_count += 1;
        }
        entry.last_used_at = new Date().toISOString();
        if (lifecycleState) entry.lifecycle_state = lifecycleState;
        this.dirty = true;
    }

    snapshot(): JsonObject {
        return toJson(this.entries);
    }

    restore(snapshot: JsonObject): void {
        this.entries = parseTools(snapshot);
    }

    /** Writes the registry if it changed since the last flush. */
    flush(): void {
        if (!this.dirty || this.filePath === null) return;
        try {
            atomicWriteJsonSync(this.filePath, { schema_version: REGISTRY_SCHEMA_VERSION, tools: toJson(this.entries) });
            this.dirty = false;
        } catch (e) {
            throw new StoreError(`failed to write tool registry ${this.filePath}: ${errorMessage(e)}`, ERRORS.INFRA_ERROR, e);
        }
    }
}
