/**
 * Attempt isolation: shared call state (the role's memory and the tool
 * registry view) is captured before each attempt and restored when the
 * attempt is rolled back, so a retry never sees a failed attempt's writes.
 */

import { JsonObject, cloneJson } from './json_value';
import { ToolRegistry } from './tool_registry';

export interface AttemptSnapshot {
    readonly memory: JsonObject;
    readonly tools: JsonObject;
}

/** Holder for the memory object; the orchestrator swaps its contents on rollback. */
export interface MemoryCell {
    memory: JsonObject;
}

export function captureAttempt(cell: MemoryCell, registry: ToolRegistry): AttemptSnapshot {
    return Object.freeze({
        memory: cloneJson(cell.memory),
        tools: registry.snapshot(),
    });
}

export function restoreAttempt(snapshot: AttemptSnapshot, cell: MemoryCell, registry: ToolRegistry): void {
    cell.memory = cloneJson(snapshot.memory);
    registry.restore(snapshot.tools);
}
