/**
 * Program generation prompts
 * Asks for one JavaScript function body implementing role.method
 */

export function getProgramSystemPrompt(): string {
    return `You write the body of one async JavaScript function that implements a method call for an agent role.
ONLY RETURN JSON of the form {"code": "<function body>", "dependencies": [{"name": "<npm package>", "version": "<semver range>"}]}.
No markdown, no commentary.

RUNTIME SURFACE (these names are in scope, nothing else is):
- args: array of positional arguments
- kwargs: object of keyword arguments
- context (alias memory): the role's persistent memory object; plain JSON only
- context.tools: object keyed by tool name -> { purpose, methods, usage_count, ... }; it is NOT an array
- runtimeContext: { depth, trace_id, call_id, role, method } (read-only)
- tool(name): returns a handle; await handle.call("method", args, kwargs) resolves to an Outcome
- delegate(role, { purpose, deliverable }): returns a handle to a helper role, used the same way
- remember(entries): merges an object into memory
- Outcome.ok(value) / Outcome.error(type, message, { retriable, metadata })
- console: log lines routed to the engine logger

RULES:
1. Return the result with \`return\`, or assign it to \`result\`.
2. Read an Outcome with \`outcome.status === "ok"\` and \`outcome.value\`; never call methods on it.
3. Never assign to, define properties on, or change the prototype of a handle.
4. Keep memory plain JSON (no functions, dates, class instances).
5. Declare npm packages in "dependencies" only when the code requires() them; leave the list empty otherwise.
6. Results derived from external data must carry provenance.sources[] with uri, fetched_at, retrieval_tool and retrieval_mode (live|cached|fixture).
7. Do not fabricate fallback data when a fetch fails; return Outcome.error instead.`;
}

export function getProgramUserPrompt(params: {
    role: string;
    method: string;
    purpose: string | null;
    args: unknown;
    kwargs: unknown;
    deliverable: unknown;
    memoryKeys: string[];
    dependencies: unknown;
}): string {
    const lines = [
        `ROLE: ${params.role}`,
        `METHOD: ${params.method}`,
    ];
    if (params.purpose) lines.push(`PURPOSE: ${params.purpose}`);
    lines.push(`ARGS: ${JSON.stringify(params.args)}`);
    lines.push(`KWARGS: ${JSON.stringify(params.kwargs)}`);
    lines.push(`MEMORY KEYS: ${params.memoryKeys.length > 0 ? params.memoryKeys.join(', ') : '(empty)'}`);
    if (params.deliverable !== undefined && params.deliverable !== null) {
        lines.push(`DELIVERABLE CONTRACT: ${JSON.stringify(params.deliverable)}`);
    }
    lines.push(`AVAILABLE DEPENDENCIES: ${JSON.stringify(params.dependencies)}`);
    return lines.join('\n');
}

export function getRepairUserPrompt(base: string, params: {
    code: string;
    trigger: string;
    errorType: string;
    errorMessage: string;
}): string {
    return `${base}

<repair_request>
<trigger>${params.trigger}</trigger>
<failure_type>${params.errorType}</failure_type>
<failure_message>${params.errorMessage}</failure_message>
<current_code>
${params.code}
</current_code>
</repair_request>

Fix the current code so this failure no longer happens. Keep the memory keys it already uses.`;
}

export const PROGRAM_RESPONSE_SCHEMA = {
    type: 'object',
    required: ['code'],
    properties: {
        code: { type: 'string' },
        dependencies: {
            type: 'array',
            items: {
                type: 'object',
                required: ['name'],
                properties: { name: { type: 'string' }, version: { type: 'string' } },
            },
        },
    },
} as const;
