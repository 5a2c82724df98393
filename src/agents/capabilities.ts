/**
 * Agent capability contracts
 *
 * The orchestrator depends on these interfaces only. Implementations are
 * stateless across calls; a planner may hand back an opaque continuity
 * token that the orchestrator returns on the next call for the same node.
 */

import type {
  PlanProposal,
  ResultBundle,
  StrategyRecord,
  SubgoalSpec,
  TaskConstraints,
  TokenUsage,
  Verdict,
} from '../types';

export interface AgentCallOptions {
  signal?: AbortSignal;
  /** Receives token usage of any model call made on the caller's behalf */
  onUsage?: (usage: TokenUsage) => void;
}

export interface PlanOptions extends AgentCallOptions {
  temperature: number;
  /** Rationales of earlier rejects for this node, oldest first */
  rejections: readonly string[];
  continuityToken?: string;
}

export interface Planner {
  plan(
    goal: string,
    contextStack: readonly string[],
    memoryHits: readonly StrategyRecord[],
    options: PlanOptions
  ): Promise<PlanProposal>;

  decompose(
    goal: string,
    contextStack: readonly string[],
    failures: readonly StrategyRecord[],
    rejections: readonly string[],
    options?: AgentCallOptions
  ): Promise<SubgoalSpec[]>;
}

export interface Executor {
  execute(plan: PlanProposal, constraints: TaskConstraints, signal?: AbortSignal): Promise<ResultBundle>;
}

export interface Verifier {
  verify(bundle: ResultBundle, goal: string, options?: AgentCallOptions): Promise<Verdict>;
}

export interface AgentSet {
  planner: Planner;
  executor: Executor;
  verifier: Verifier;
}

/**
 * Trim a verdict and make sure a reject always says why
 */
export function normalizeVerdict(verdict: Verdict): Verdict {
  const rationale = verdict.rationale.trim();
  const remediation = verdict.remediation?.trim() || undefined;

  if (verdict.verdict === 'reject' && rationale.length === 0) {
    return { verdict: 'reject', rationale: 'rejected without rationale', remediation };
  }
  if (verdict.verdict === 'need_more_info' && rationale.length === 0) {
    return { verdict: 'need_more_info', rationale: 'more information needed', remediation };
  }
  return { verdict: verdict.verdict, rationale, remediation };
}
