/**
 * Prompts for program generation
 */

export { getProgramSystemPrompt, getProgramUserPrompt, getRepairUserPrompt, PROGRAM_RESPONSE_SCHEMA } from './program';
