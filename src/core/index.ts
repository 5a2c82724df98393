/**
 * Core modules export
 */

export { TaskGraph } from './task-graph';
export type { GraphLimits, TransitionOptions } from './task-graph';
export { ALLOWED_TRANSITIONS, canTransition, isTerminal } from './transitions';
export { Orchestrator, AGENT_UNAVAILABLE, escalateTemperature } from './orchestrator';
export type { OrchestratorDeps } from './orchestrator';
export { RunContext } from './run-context';
export type { RunContextOptions } from './run-context';
export { SnapshotChannel, formatAuditLine } from './snapshot';
export type { SnapshotListener } from './snapshot';
