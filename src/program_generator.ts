/**
 * Program Generator - the boundary to the code-generating service.
 *
 * The service itself is an injected CodeGenerator. This module validates what
 * it returns (non-blank code that compiles, a canonical dependency manifest)
 * and retries retriable failures within the generation-attempt budget.
 */

import { DependencyManifest, normalizeManifest } from './dependency_manifest';
import { compileProgram } from './execution_sandbox';
import { createLogger } from './logger';
import { PROGRAM_RESPONSE_SCHEMA } from './prompts';
import {
    CallError,
    InvalidCodeError,
    ProviderError,
    errorMessage,
} from './structured_error';

const log = createLogger('generator');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface GenerationRequest {
    model: string;
    systemPrompt: string;
    userPrompt: string;
    schema: unknown;
    timeoutMs: number;
}

export interface GenerationResponse {
    code?: string | null;
    dependencies?: unknown[] | null;
}

/** The generative service. Implementations reject on transport failure. */
export interface CodeGenerator {
    generateProgram(request: GenerationRequest): Promise<GenerationResponse>;
}

export interface GeneratedProgram {
    readonly code: string;
    readonly dependencies: DependencyManifest;
}

/* -------------------------------------------------------------------------- */
/* Validation                                                                 */
/* -------------------------------------------------------------------------- */

export function parseGeneratedProgram(response: GenerationResponse | null | undefined): GeneratedProgram {
    const code = response?.code;
    if (typeof code !== 'string' || code.trim() === '') {
        throw new InvalidCodeError('generator returned no program code');
    }
    try {
        compileProgram(code);
    } catch (err) {
        throw new InvalidCodeError(`generated program does not compile: ${errorMessage(err)}`, { cause: err });
    }
    return Object.freeze({ code, dependencies: normalizeManifest(response?.dependencies ?? []) });
}

/* -------------------------------------------------------------------------- */
/* Retry loop                                                                 */
/* -------------------------------------------------------------------------- */

export interface GenerateOptions {
    model: string;
    systemPrompt: string;
    userPrompt: string;
    timeoutMs: number;
    attempts: number;
    /** Called once per service request, before it is sent. */
    onAttempt?: (attempt: number) => void;
}

function asCallError(err: unknown): CallError {
    if (err instanceof CallError) return err;
    return new ProviderError(`code generation request failed: ${errorMessage(err)}`, { cause: err });
}

/**
 * Requests a program, retrying provider and invalid-code failures until
 * `attempts` requests have been made. Non-retriable failures (an invalid
 * dependency manifest) are raised at once.
 */
export async function generateProgramWithRetry(generator: CodeGenerator, opts: GenerateOptions): Promise<GeneratedProgram> {
    let lastError: CallError | null = null;
    for (let attempt = 1; attempt <= opts.attempts; attempt++) {
        opts.onAttempt?.(attempt);
        try {
            const response = await generator.generateProgram({
                model: opts.model,
                systemPrompt: opts.systemPrompt,
                userPrompt: opts.userPrompt,
                schema: PROGRAM_RESPONSE_SCHEMA,
                timeoutMs: opts.timeoutMs,
            });
            return parseGeneratedProgram(response);
        } catch (err) {
            lastError = asCallError(err);
            if (!lastError.retriable) throw lastError;
            log.warn('generation attempt failed', {
                attempt,
                maxAttempts: opts.attempts,
                errorType: lastError.errorType,
                error: lastError.message,
            });
        }
    }
    throw lastError ?? new InvalidCodeError('no generation attempts were allowed');
}
