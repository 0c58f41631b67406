/**
 * Main entry point - exports all public APIs
 */

export { Agent } from './agent';
export type { AgentOptions, DelegateOptions, AgentRuntime } from './agent';
export { CallOrchestrator, newInvocation } from './call_orchestrator';
export type { CallServices, CallSubject, HandlerCall, Invocation, MethodHandler } from './call_orchestrator';
export { resolveRuntimeConfig, BUDGETS, TIMEOUTS, PROMOTION_POLICY_V1 } from './config';
export type { RuntimeConfig, PromotionPolicy, SourceMode } from './config';
export { okOutcome, errorOutcome, isOutcome, coerceOutcome } from './outcome';
export type { Outcome, OkOutcome, ErrorOutcome, OutcomeOrigin } from './outcome';
export { generateProgramWithRetry, parseGeneratedProgram } from './program_generator';
export type { CodeGenerator, GenerationRequest, GenerationResponse, GeneratedProgram } from './program_generator';
export { ArtifactStore, codeChecksum } from './artifact_store';
export type { ArtifactRecord, HistoryEntry, LifecycleState } from './artifact_store';
export { ToolRegistry } from './tool_registry';
export type { ToolEntry } from './tool_registry';
export { MemoryCallLog, SqliteCallLog } from './call_log';
export type { CallLog, CallRecord } from './call_log';
export { DirectoryEnvironmentManager, npmInstaller } from './environment_manager';
export type { EnvironmentHandle, EnvironmentManager, PackageInstaller } from './environment_manager';
export { GuardrailPolicy } from './guardrail_policy';
export { DEFAULT_GUARDRAIL_CHECKS } from './guardrail_checks';
export type { GuardrailCheck, GuardrailInput, GuardrailViolation } from './guardrail_checks';
export { validateOutcomeContract, parseDeliverableContract } from './contract_validator';
export type { DeliverableContract } from './contract_validator';
export { WorkerSupervisor } from './worker_supervisor';
export type { WorkerFactory } from './worker_supervisor';
export {
    CallError,
    ERROR_TYPES,
    ExecutionError,
    GuardrailViolationError,
    StoreError,
    describeError,
} from './structured_error';
export type { ErrorType, StructuredError } from './structured_error';
export { createLogger } from './logger';
