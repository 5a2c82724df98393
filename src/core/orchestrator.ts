/**
 * Orchestrator - Plan → Execute → Verify over the task graph
 *
 * One cooperative loop per run. Nodes run as they become eligible, up to
 * `nodeConcurrency` at once; a rejected node is retried with a hotter
 * temperature, then split into subgoals once its attempts run out.
 */

import type { AgentSet } from '../agents/capabilities';
import { normalizeVerdict } from '../agents/capabilities';
import type { AuditLog } from '../audit/audit-log';
import { AgentError, FatalError, ValidationError, errorMessage } from '../errors';
import type { MemoryStore } from '../memory/memory-store';
import type {
  OrchestratorConfig,
  PlanProposal,
  ResultBundle,
  RunResult,
  RunStatus,
  SubgoalSpec,
  TaskNode,
  Verdict,
} from '../types';
import { Cancelled, DeadlineExceeded, remainingBudget, untilAborted, withDeadline } from '../utils/deadline';
import type { RunContext } from './run-context';
import { isTerminal } from './transitions';

export interface OrchestratorDeps {
  agents: AgentSet;
  memory: MemoryStore;
  audit: AuditLog;
  config: OrchestratorConfig;
}

/** Result of one pass over a node */
type Outcome =
  | { kind: 'verdict'; verdict: Verdict; strategy: string }
  | { kind: 'aborted'; reason: string }
  | { kind: 'expired' }
  | { kind: 'discarded' };

export const AGENT_UNAVAILABLE = 'agent_unavailable';

/**
 * Temperature for the next attempt after `attempts` rejections
 */
export function escalateTemperature(curve: OrchestratorConfig['temperature'], attempts: number): number {
  return Math.min(curve.base + attempts * curve.step, curve.cap);
}

export class Orchestrator {
  private agents: AgentSet;
  private memory: MemoryStore;
  private audit: AuditLog;
  private config: OrchestratorConfig;

  constructor(deps: OrchestratorDeps) {
    this.agents = deps.agents;
    this.memory = deps.memory;
    this.audit = deps.audit;
    this.config = deps.config;
  }

  /**
   * Drive the run until its root is terminal. Throws FatalError only.
   */
  async run(ctx: RunContext): Promise<RunResult> {
    const logger = ctx.logger;
    const inFlight = new Map<string, Promise<void>>();
    const failures: unknown[] = [];

    logger.runEvent('started', ctx.runId, { goal: ctx.goal });

    try {
      while (true) {
        while (inFlight.size < this.config.nodeConcurrency) {
          const node = ctx.graph.nextActiveLeaf();
          if (!node) break;

          ctx.graph.transition(node.id, 'active', { reason: 'scheduled' });
          const task = this.runNode(ctx, node.id)
            .catch((error: unknown) => {
              failures.push(error);
              ctx.abortAll('run aborted');
            })
            .finally(() => {
              inFlight.delete(node.id);
            });
          inFlight.set(node.id, task);
        }

        if (inFlight.size > 0) {
          await Promise.race(inFlight.values());
          if (failures.length > 0) throw failures[0];
          continue;
        }

        if (this.settleDecomposed(ctx)) continue;
        break;
      }

      const root = ctx.graph.getRoot();
      if (root === null || !isTerminal(root)) {
        throw new ValidationError(`Run ${ctx.runId} stalled with open nodes`, 'STALLED');
      }
      const problems = ctx.graph.validate();
      if (problems.length > 0) {
        throw new ValidationError(problems.join('; '), 'INVARIANT');
      }

      const status: RunStatus = root.status === 'success' ? 'success' : root.status === 'cancelled' ? 'cancelled' : 'failed';
      ctx.graph.archive();
      ctx.metrics.stop();
      ctx.setStatus(status);
      logger.runEvent('finished', ctx.runId, { status, ...ctx.metrics.snapshot() });
      return ctx.result();
    } catch (error) {
      ctx.abortAll('run aborted');
      await Promise.allSettled(inFlight.values());
      throw this.abort(ctx, error);
    }
  }

  /**
   * Cancel a node and its open descendants, abort their in-flight calls and
   * settle ancestors that are now complete.
   */
  cancel(ctx: RunContext, nodeId: string, reason = 'cancelled by caller'): string[] {
    const cancelled = ctx.graph.cancelSubtree(nodeId, reason);
    const running = ctx.abortNodes(ctx.graph.subtreeIds(nodeId), reason);
    for (const id of cancelled) {
      ctx.logger.nodeEvent('cancelled', id, { reason });
    }
    ctx.logger.debug('Cancelled subtree', { nodeId, cancelled: cancelled.length, running });
    this.propagate(ctx, nodeId);
    return cancelled;
  }

  // ==========================================================================
  // One node
  // ==========================================================================

  private async runNode(ctx: RunContext, nodeId: string): Promise<void> {
    const signal = ctx.signalFor(nodeId);
    ctx.metrics.startNode(nodeId);

    try {
      const outcome = await this.attempt(ctx, ctx.graph.getNode(nodeId), signal);
      if (outcome.kind === 'discarded' || this.isCancelled(ctx, nodeId, signal)) {
        return;
      }

      if (outcome.kind === 'aborted') {
        this.cancel(ctx, nodeId, outcome.reason);
        return;
      }

      if (outcome.kind === 'expired') {
        ctx.metrics.increment('timeouts');
        ctx.graph.transition(nodeId, 'failed', { reason: 'deadline passed' });
        this.exhaust(ctx, ctx.graph.getNode(nodeId), 'deadline passed');
        return;
      }

      await this.settle(ctx, nodeId, outcome.verdict, outcome.strategy, signal);
    } finally {
      ctx.releaseSignal(nodeId);
      ctx.metrics.endNode(nodeId);
    }
  }

  private async attempt(ctx: RunContext, node: TaskNode, signal: AbortSignal): Promise<Outcome> {
    const logger = ctx.logger;

    const feedback = ctx.takeFeedback(node.id);
    if (feedback) {
      logger.info('Applying human feedback', { nodeId: node.id, verdict: feedback.verdict });
      return { kind: 'verdict', verdict: normalizeVerdict(feedback), strategy: node.strategy || 'human feedback' };
    }

    if (this.expired(node)) return { kind: 'expired' };

    try {
      const plan = await this.plan(ctx, node, signal);
      if (this.isCancelled(ctx, node.id, signal)) return { kind: 'discarded' };

      const bundle = await this.guard('executor', null, signal, (s) =>
        this.agents.executor.execute(plan, node.constraints, s)
      );
      if (this.isCancelled(ctx, node.id, signal)) return { kind: 'discarded' };
      this.recordExecution(ctx, node.id, bundle);

      if (bundle.aborted) {
        return { kind: 'aborted', reason: bundle.aborted.reason };
      }

      const failed = bundle.calls.find(({ result }) => !result.success);
      if (!failed && this.expired(node)) return { kind: 'expired' };
      if (failed) {
        const kind = failed.result.errorKind ?? 'remote_error';
        if (kind === 'timeout') {
          logger.warn('Tool call timed out', { nodeId: node.id, toolName: failed.result.toolName });
        }
        return { kind: 'verdict', verdict: this.synthesize(ctx, node.id, `tool_error:${kind}`), strategy: plan.strategy };
      }

      const verdict = normalizeVerdict(
        await this.guard('verifier', this.agentBudget(node), signal, (s) =>
          this.agents.verifier.verify(bundle, node.goal, {
            signal: s,
            onUsage: (usage) => ctx.metrics.recordTokens(usage),
          })
        )
      );
      if (this.isCancelled(ctx, node.id, signal)) return { kind: 'discarded' };

      ctx.metrics.increment('verifications');
      this.audit.append({
        runId: ctx.runId,
        nodeId: node.id,
        actor: 'verifier',
        action: 'verify',
        outcome: verdict.verdict,
        payload: verdict,
        detail: verdict.rationale || undefined,
      });
      return { kind: 'verdict', verdict, strategy: plan.strategy };
    } catch (error) {
      if (error instanceof Cancelled || this.isCancelled(ctx, node.id, signal)) {
        return { kind: 'discarded' };
      }
      if (error instanceof AgentError) {
        this.noteAgentFailure(ctx, node.id, error);
        return { kind: 'verdict', verdict: this.synthesize(ctx, node.id, AGENT_UNAVAILABLE), strategy: node.strategy };
      }
      throw error;
    }
  }

  private async plan(ctx: RunContext, node: TaskNode, signal: AbortSignal): Promise<PlanProposal> {
    if (node.strategy !== '') {
      return { strategy: node.strategy, toolIntents: node.toolIntents };
    }

    const hits = this.memory.recall(node.goal).map((hit) => hit.record);
    const plan = await this.guard('planner', this.agentBudget(node), signal, (s) =>
      this.agents.planner.plan(node.goal, node.contextStack, hits, {
        temperature: node.temperature,
        rejections: node.rejections,
        continuityToken: ctx.getContinuity(node.id),
        signal: s,
        onUsage: (usage) => ctx.metrics.recordTokens(usage),
      })
    );
    if (this.isCancelled(ctx, node.id, signal)) {
      throw new Cancelled(`plan ${node.id}`);
    }

    ctx.graph.setPlan(node.id, plan);
    ctx.setContinuity(node.id, plan.continuityToken);
    ctx.metrics.increment('plans');
    this.audit.append({
      runId: ctx.runId,
      nodeId: node.id,
      actor: 'planner',
      action: 'plan',
      outcome: 'ok',
      payload: plan,
      detail: `${plan.toolIntents.length} tool calls`,
    });
    ctx.logger.nodeEvent('planned', node.id, { strategy: plan.strategy, memoryHits: hits.length });
    return plan;
  }

  private recordExecution(ctx: RunContext, nodeId: string, bundle: ResultBundle): void {
    const failed = bundle.calls.filter(({ result }) => !result.success);
    const timeouts = failed.filter(({ result }) => result.errorKind === 'timeout').length;

    ctx.metrics.increment('executions');
    ctx.metrics.increment('toolCalls', bundle.calls.length);
    ctx.metrics.increment('toolFailures', failed.length);
    ctx.metrics.increment('timeouts', timeouts);

    for (const held of bundle.held) {
      this.audit.append({
        runId: ctx.runId,
        nodeId,
        actor: 'gate',
        action: 'hold',
        outcome: held.approved ? 'approved' : 'denied',
        payload: held,
        detail: held.pattern,
      });
    }

    this.audit.append({
      runId: ctx.runId,
      nodeId,
      actor: 'executor',
      action: 'execute',
      outcome: bundle.aborted ? 'aborted' : (failed[0]?.result.errorKind ?? 'ok'),
      payload: bundle.calls.map(({ intent, result }) => ({ intent, result })),
      detail: `${bundle.calls.length} calls, ${failed.length} failed`,
    });
    ctx.logger.nodeEvent('executed', nodeId, { calls: bundle.calls.length, failed: failed.length });
  }

  /**
   * Reject on the verifier's behalf
   */
  private synthesize(ctx: RunContext, nodeId: string, rationale: string): Verdict {
    const verdict: Verdict = { verdict: 'reject', rationale };
    this.audit.append({
      runId: ctx.runId,
      nodeId,
      actor: 'orchestrator',
      action: 'verify',
      outcome: 'reject',
      payload: verdict,
      detail: rationale,
    });
    return verdict;
  }

  // ==========================================================================
  // Settlement
  // ==========================================================================

  private async settle(
    ctx: RunContext,
    nodeId: string,
    verdict: Verdict,
    strategy: string,
    signal: AbortSignal
  ): Promise<void> {
    const logger = ctx.logger;
    const node = ctx.graph.getNode(nodeId);

    if (verdict.verdict === 'approve') {
      ctx.graph.transition(nodeId, 'success', { reason: verdict.rationale });
      ctx.metrics.increment('approvals');
      this.memory.record({
        goal: node.goal,
        outcome: 'success',
        narrative: verdict.rationale ? `${strategy} (${verdict.rationale})` : strategy,
      });
      logger.nodeEvent('approved', nodeId, { attempts: node.attemptCount + 1 });
      this.propagate(ctx, nodeId);
      return;
    }

    ctx.graph.transition(nodeId, 'failed', { reason: verdict.rationale });
    ctx.metrics.increment('rejects');
    const attempts = ctx.graph.recordRejection(nodeId, verdict.rationale);
    logger.nodeEvent('rejected', nodeId, { attempts, rationale: verdict.rationale });

    if (attempts < this.config.maxAttempts) {
      ctx.graph.transition(nodeId, 'suspended', { reason: 'retry' });
      ctx.graph.setTemperature(nodeId, escalateTemperature(this.config.temperature, attempts));
      ctx.graph.transition(nodeId, 'pending', { reason: 'retry' });
      logger.nodeEvent('requeued', nodeId, { attempts });
      return;
    }

    await this.decompose(ctx, nodeId, signal);
  }

  private async decompose(ctx: RunContext, nodeId: string, signal: AbortSignal): Promise<void> {
    const node = ctx.graph.getNode(nodeId);

    if (node.depth >= this.config.maxDepth) {
      this.exhaust(ctx, node, `maximum depth ${this.config.maxDepth} reached`);
      return;
    }

    const failures = this.memory.recall(node.goal, { outcome: 'failed' }).map((hit) => hit.record);
    let subgoals: SubgoalSpec[];
    try {
      subgoals = await this.guard('planner', this.agentBudget(node), signal, (s) =>
        this.agents.planner.decompose(node.goal, node.contextStack, failures, node.rejections, {
          signal: s,
          onUsage: (usage) => ctx.metrics.recordTokens(usage),
        })
      );
    } catch (error) {
      if (error instanceof Cancelled || this.isCancelled(ctx, nodeId, signal)) return;
      if (error instanceof AgentError) {
        this.noteAgentFailure(ctx, nodeId, error);
        this.exhaust(ctx, node, `decomposition unavailable: ${error.message}`);
        return;
      }
      throw error;
    }
    if (this.isCancelled(ctx, nodeId, signal)) return;

    this.audit.append({
      runId: ctx.runId,
      nodeId,
      actor: 'planner',
      action: 'propose_subgoals',
      outcome: `${subgoals.length} subgoals`,
      payload: subgoals,
    });

    if (subgoals.length < this.config.minSubgoals) {
      this.exhaust(ctx, node, `planner proposed ${subgoals.length} subgoals, need ${this.config.minSubgoals}`);
      return;
    }

    const childIds = ctx.graph.decompose(nodeId, subgoals);
    const problems = ctx.graph.validate();
    if (problems.length > 0) {
      throw new ValidationError(problems.join('; '), 'INVARIANT');
    }

    ctx.metrics.increment('decompositions');
    this.memory.record({
      goal: node.goal,
      outcome: 'failed',
      narrative: `decomposed into ${childIds.length} subgoals after ${node.rejections.length} rejections: ${node.rejections.join(' | ')}`,
    });
    ctx.logger.nodeEvent('decomposed', nodeId, { children: childIds });
  }

  private exhaust(ctx: RunContext, node: TaskNode, reason: string): void {
    ctx.graph.markExhausted(node.id, reason);
    this.memory.record({
      goal: node.goal,
      outcome: 'failed',
      narrative: `gave up: ${reason}; rejections: ${node.rejections.join(' | ')}`,
    });
    ctx.logger.nodeEvent('exhausted', node.id, { reason });
    this.propagate(ctx, node.id);
  }

  /**
   * Re-evaluate ancestors bottom-up while they settle
   */
  private propagate(ctx: RunContext, nodeId: string): void {
    let parentId = ctx.graph.getNode(nodeId).parentId;

    while (parentId !== null) {
      const status = ctx.graph.reevaluate(parentId);
      if (status === null) return;

      const parent = ctx.graph.getNode(parentId);
      if (status === 'success') {
        this.memory.record({
          goal: parent.goal,
          outcome: 'success',
          narrative: `completed through subgoals: ${parent.children.length}`,
        });
        ctx.logger.nodeEvent('approved', parentId, { via: 'children' });
      } else {
        ctx.logger.nodeEvent('exhausted', parentId, { via: 'children' });
      }
      parentId = parent.parentId;
    }
  }

  /**
   * Settle decomposed nodes whose children all finished. Deepest first.
   */
  private settleDecomposed(ctx: RunContext): boolean {
    const decomposed = ctx.graph
      .listNodes()
      .filter((node) => node.status === 'decomposed')
      .sort((a, b) => b.depth - a.depth);

    let changed = false;
    for (const node of decomposed) {
      if (ctx.graph.reevaluate(node.id) !== null) {
        changed = true;
      }
    }
    return changed;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private noteAgentFailure(ctx: RunContext, nodeId: string, error: AgentError): void {
    if (error.timedOut) {
      ctx.metrics.increment('timeouts');
      ctx.logger.warn('Agent call timed out', { nodeId, role: error.role, error: error.message });
      return;
    }
    ctx.logger.warn('Agent unavailable', { nodeId, role: error.role, error: error.message });
  }

  private expired(node: TaskNode): boolean {
    return node.constraints.deadline !== undefined && Date.now() >= node.constraints.deadline;
  }

  /**
   * Agent deadline, shortened to what is left of the node's own deadline
   */
  private agentBudget(node: TaskNode): number {
    return remainingBudget(node.constraints.deadline, this.config.agentDeadlineMs);
  }

  /**
   * Run an agent call under the node's signal and an optional deadline.
   * Either way the call gives up as soon as the signal aborts. Anything but
   * cancellation comes back as AgentError.
   */
  private async guard<T>(
    role: AgentError['role'],
    deadlineMs: number | null,
    signal: AbortSignal,
    fn: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    try {
      if (deadlineMs === null) {
        return await untilAborted(fn, signal, role);
      }
      return await withDeadline(fn, deadlineMs, role, signal);
    } catch (error) {
      if (error instanceof Cancelled || error instanceof AgentError) throw error;
      if (signal.aborted) throw new Cancelled(role);
      if (error instanceof DeadlineExceeded) throw new AgentError(role, error.message, true);
      throw new AgentError(role, errorMessage(error));
    }
  }

  private isCancelled(ctx: RunContext, nodeId: string, signal: AbortSignal): boolean {
    return signal.aborted || ctx.graph.getNode(nodeId).status === 'cancelled';
  }

  /**
   * Dump state, archive and convert the error into a FatalError
   */
  private abort(ctx: RunContext, error: unknown): FatalError {
    const fatal =
      error instanceof FatalError
        ? error
        : new FatalError(
            error instanceof ValidationError
              ? error.code === 'RESOURCE_EXHAUSTED'
                ? 'resource_exhausted'
                : 'graph_invariant'
              : 'internal',
            ctx.runId,
            errorMessage(error)
          );

    this.audit.append({
      runId: ctx.runId,
      actor: 'orchestrator',
      action: 'fatal_dump',
      outcome: fatal.reason,
      payload: { tree: ctx.graph.toTree(), problems: ctx.graph.validate(), error: fatal.message },
      detail: fatal.message,
    });
    ctx.graph.archive();
    ctx.metrics.stop();
    ctx.setFatal(fatal.reason, fatal.message);
    ctx.setStatus('aborted');
    ctx.logger.runEvent('aborted', ctx.runId, { reason: fatal.reason, error: fatal.message });
    return fatal;
  }
}
