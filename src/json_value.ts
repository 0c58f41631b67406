// Plain-data helpers shared by the sandbox, the worker boundary and the stores.

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * True for objects created by `{}` literals or `Object.create(null)` in any
 * realm. Values built inside a vm context carry that context's
 * Object.prototype, so an `instanceof` or prototype identity check would
 * reject them.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return false;
    if (Array.isArray(value)) return false;
    return Object.prototype.toString.call(value) === '[object Object]';
}

/** Returns the dotted path of the first non-JSON value, or null when the whole tree is plain data. */
export function findNonJsonPath(value: unknown, pathKey = '$', depth = 0): string | null {
    if (depth > 100) return pathKey;
    if (value === null) return null;
    switch (typeof value) {
        case 'string':
        case 'boolean':
            return null;
        case 'number':
            return Number.isFinite(value) ? null : pathKey;
        case 'object':
            break;
        default:
            return pathKey;
    }
    if (Array.isArray(value)) {
        for (let i = 0; i < value.length; i++) {
            const bad = findNonJsonPath(value[i], `${pathKey}[${i}]`, depth + 1);
            if (bad) return bad;
        }
        return null;
    }
    if (!isPlainObject(value)) return pathKey;
    for (const key of Object.keys(value)) {
        const bad = findNonJsonPath(value[key], `${pathKey}.${key}`, depth + 1);
        if (bad) return bad;
    }
    return null;
}

export function isJsonValue(value: unknown): value is JsonValue {
    return findNonJsonPath(value) === null;
}

export function isJsonObject(value: unknown): value is JsonObject {
    return isPlainObject(value) && findNonJsonPath(value) === null;
}

/** Deep copy through JSON; the caller guarantees the input is plain data. */
export function cloneJson<T extends JsonValue>(value: T): T;
export function cloneJson(value: JsonValue): JsonValue {
    if (value === null || typeof value !== 'object') return value;
    if (Array.isArray(value)) return value.map(v => cloneJson(v));
    const out: JsonObject = {};
    for (const key of Object.keys(value)) out[key] = cloneJson(value[key]);
    return out;
}

/** Copies values produced in another realm into host-realm plain data. */
export function toHostJson(value: unknown): JsonValue | undefined {
    if (!isJsonValue(value)) return undefined;
    return cloneJson(value);
}

export function stableStringify(value: JsonValue): string {
    if (value === null) return 'null';
    if (typeof value !== 'object') return JSON.stringify(value);
    if (Array.isArray(value)) return '[' + value.map(stableStringify).join(',') + ']';
    const keys = Object.keys(value).sort();
    return '{' + keys.map(k => JSON.stringify(k) + ':' + stableStringify(value[k])).join(',') + '}';
}

/* -------------------------------------------------------------------------- */
/* Key representation variants                                                */
/* -------------------------------------------------------------------------- */

export function snakeCase(key: string): string {
    return key
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .replace(/-/g, '_')
        .toLowerCase();
}

export function camelCase(key: string): string {
    return key.replace(/[_-]+([a-zA-Z0-9])/g, (_m, c: string) => c.toUpperCase());
}

/** The spellings a field may arrive under: as written, snake_case and camelCase. */
export function keyVariants(key: string): string[] {
    return Array.from(new Set([key, snakeCase(key), camelCase(key)]));
}

export function readKeyVariant(obj: Record<string, unknown>, key: string): unknown {
    for (const k of keyVariants(key)) {
        if (Object.prototype.hasOwnProperty.call(obj, k)) return obj[k];
    }
    return undefined;
}
