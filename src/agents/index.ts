/**
 * Agent exports
 */

export { normalizeVerdict } from './capabilities';
export type { AgentCallOptions, AgentSet, Executor, PlanOptions, Planner, Verifier } from './capabilities';
export { AnthropicProvider } from './llm-provider';
export type { Completion, CompletionRequest, LlmProvider } from './llm-provider';
export { LlmPlanner } from './planner';
export type { ToolCatalog } from './planner';
export { LlmVerifier } from './verifier';
export { ToolExecutor, formatOutput } from './executor';
export type { ToolInvoker } from './executor';
export { DangerGate, DEFAULT_DENY_PATTERNS, describeIntent } from './danger-gate';
export type { ApprovalCallback, ApprovalRequest, GateDecision } from './danger-gate';
export { PromptBuilder } from './prompt-builder';
export { ResultValidator } from './result-validator';
export type { ValidationRule, ValidationResult } from './result-validator';
export { PlanSchema, SubgoalsSchema, VerdictSchema, extractJsonPayload, parseStructured } from './schemas';
