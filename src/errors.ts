/**
 * Error taxonomy for the orchestrator
 *
 * Only FatalError is surfaced to callers as unrecoverable. ToolError and
 * AgentError are converted into node-level rejects inside the run loop.
 */

import type { TaskStatus, ToolErrorKind } from './types';

/**
 * Illegal graph mutation. Fatal to the run.
 */
export class ValidationError extends Error {
  readonly code: string;

  constructor(message: string, code = 'VALIDATION_ERROR') {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
  }
}

export class InvalidTransition extends ValidationError {
  readonly nodeId: string;
  readonly from: TaskStatus;
  readonly to: TaskStatus;

  constructor(nodeId: string, from: TaskStatus, to: TaskStatus) {
    super(`Invalid transition for ${nodeId}: ${from} -> ${to}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransition';
    this.nodeId = nodeId;
    this.from = from;
    this.to = to;
  }
}

export class NotFound extends ValidationError {
  readonly nodeId: string;

  constructor(nodeId: string) {
    super(`Task node not found: ${nodeId}`, 'NOT_FOUND');
    this.name = 'NotFound';
    this.nodeId = nodeId;
  }
}

export class ToolError extends Error {
  readonly kind: ToolErrorKind;

  constructor(kind: ToolErrorKind, message: string) {
    super(message);
    this.name = 'ToolError';
    this.kind = kind;
  }
}

/**
 * Reasoning backend failure
 */
export class AgentError extends Error {
  readonly role: 'planner' | 'executor' | 'verifier';
  readonly timedOut: boolean;

  constructor(role: AgentError['role'], message: string, timedOut = false) {
    super(message);
    this.name = 'AgentError';
    this.role = role;
    this.timedOut = timedOut;
  }
}

export type FatalReason = 'graph_invariant' | 'resource_exhausted' | 'internal';

const FATAL_REASONS: readonly string[] = ['graph_invariant', 'resource_exhausted', 'internal'];

export function isFatalReason(value: string): value is FatalReason {
  return FATAL_REASONS.includes(value);
}

export class FatalError extends Error {
  readonly reason: FatalReason;
  readonly runId: string;

  constructor(reason: FatalReason, runId: string, message: string) {
    super(message);
    this.name = 'FatalError';
    this.reason = reason;
    this.runId = runId;
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
