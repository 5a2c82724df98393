/**
 * Task Graph - owns the tree of task nodes and enforces the state machine
 */

import type { AuditLog } from '../audit/audit-log';
import { InvalidTransition, NotFound, ValidationError } from '../errors';
import type {
  PlanProposal,
  SubgoalSpec,
  TaskConstraints,
  TaskNode,
  TaskStatus,
  TaskTree,
} from '../types';
import { canTransition, isTerminal } from './transitions';

export interface GraphLimits {
  maxAttempts: number;
  maxDepth: number;
  maxNodes: number;
}

export interface TransitionOptions {
  reason?: string;
  /** Only valid when moving to failed: no further recovery */
  exhausted?: boolean;
}

export class TaskGraph {
  readonly runId: string;
  private nodes: Map<string, TaskNode>;
  private rootId: string | null;
  private archived: boolean;
  private audit: AuditLog;
  private limits: GraphLimits;

  constructor(runId: string, audit: AuditLog, limits: GraphLimits) {
    this.runId = runId;
    this.nodes = new Map();
    this.rootId = null;
    this.archived = false;
    this.audit = audit;
    this.limits = limits;
  }

  // ==========================================================================
  // Mutations (each appends exactly one audit entry)
  // ==========================================================================

  /**
   * Create the single root node of the run
   */
  submitRoot(goal: string, constraints: Partial<TaskConstraints> = {}, temperature = 0): string {
    this.assertWritable();
    if (this.rootId !== null) {
      throw new ValidationError(`Run ${this.runId} already has a root`, 'DUPLICATE_ROOT');
    }
    if (goal.trim().length === 0) {
      throw new ValidationError('Goal cannot be empty', 'EMPTY_GOAL');
    }

    const node = this.createNode({
      id: '1',
      parentId: null,
      goal,
      contextStack: [],
      depth: 0,
      independent: false,
      temperature,
      constraints: { allowDangerousOps: false, ...constraints },
    });
    this.rootId = node.id;
    this.record(node.id, 'submit', 'pending', { goal, constraints: node.constraints });
    return node.id;
  }

  transition(nodeId: string, to: TaskStatus, options: TransitionOptions = {}): void {
    this.assertWritable();
    const node = this.requireNode(nodeId);
    const from = node.status;

    if (node.exhausted) {
      throw new ValidationError(`Node ${nodeId} is exhausted and cannot move to ${to}`, 'EXHAUSTED');
    }
    if (to === 'decomposed') {
      throw new ValidationError(`Node ${nodeId} can only become decomposed through decompose()`, 'DECOMPOSE_ONLY');
    }
    if (!canTransition(from, to)) {
      throw new InvalidTransition(nodeId, from, to);
    }
    if (options.exhausted && to !== 'failed') {
      throw new ValidationError(`Only failed nodes can be exhausted (${nodeId})`, 'BAD_EXHAUST');
    }
    if (to === 'success') {
      const open = node.children.filter((id) => this.requireNode(id).status !== 'success');
      if (open.length > 0) {
        throw new ValidationError(
          `Node ${nodeId} cannot succeed with unsuccessful children: ${open.join(', ')}`,
          'OPEN_CHILDREN'
        );
      }
    }

    node.status = to;
    if (options.exhausted) {
      node.exhausted = true;
    }
    node.updatedAt = new Date();
    this.record(nodeId, 'transition', `${from}->${to}`, {
      reason: options.reason,
      exhausted: options.exhausted,
    });
  }

  /**
   * Store the planner's proposal on an active node
   */
  setPlan(nodeId: string, proposal: PlanProposal): void {
    this.assertWritable();
    const node = this.requireNode(nodeId);
    if (node.status !== 'active') {
      throw new ValidationError(`Cannot plan ${nodeId} while ${node.status}`, 'PLAN_NOT_ACTIVE');
    }
    node.strategy = proposal.strategy;
    node.toolIntents = proposal.toolIntents.map((intent) => ({ ...intent }));
    node.updatedAt = new Date();
    this.record(nodeId, 'set_strategy', 'stored', proposal);
  }

  /**
   * Count a failed attempt: bumps attemptCount, keeps the rationale for the
   * next plan call and clears the strategy so the node is planned again.
   */
  recordRejection(nodeId: string, rationale: string): number {
    this.assertWritable();
    const node = this.requireNode(nodeId);
    if (node.status !== 'failed') {
      throw new ValidationError(`Cannot record rejection for ${nodeId} while ${node.status}`, 'NOT_FAILED');
    }
    if (node.attemptCount >= this.limits.maxAttempts) {
      throw new ValidationError(
        `Node ${nodeId} already used ${node.attemptCount}/${this.limits.maxAttempts} attempts`,
        'ATTEMPTS_EXCEEDED'
      );
    }

    node.attemptCount += 1;
    node.rejections.push(rationale);
    node.strategy = '';
    node.toolIntents = [];
    node.updatedAt = new Date();
    this.record(nodeId, 'attempt_failed', `attempt ${node.attemptCount}`, { rationale });
    return node.attemptCount;
  }

  setTemperature(nodeId: string, temperature: number): void {
    this.assertWritable();
    const node = this.requireNode(nodeId);
    node.temperature = temperature;
    node.updatedAt = new Date();
    this.record(nodeId, 'set_temperature', temperature.toFixed(3), { temperature });
  }

  /**
   * Give up on a failed node: it becomes terminal
   */
  markExhausted(nodeId: string, reason: string): void {
    this.assertWritable();
    const node = this.requireNode(nodeId);
    if (node.status !== 'failed') {
      throw new ValidationError(`Only failed nodes can be exhausted (${nodeId} is ${node.status})`, 'BAD_EXHAUST');
    }
    node.exhausted = true;
    node.updatedAt = new Date();
    this.record(nodeId, 'exhaust', 'exhausted', { reason });
  }

  /**
   * Replace a failed node with ordered child sub-goals
   */
  decompose(nodeId: string, subgoals: SubgoalSpec[]): string[] {
    this.assertWritable();
    const node = this.requireNode(nodeId);

    if (node.status !== 'failed' || node.exhausted) {
      throw new ValidationError(`Only recoverable failed nodes can be decomposed (${nodeId} is ${node.status})`, 'NOT_FAILED');
    }
    if (node.children.length > 0) {
      throw new ValidationError(`Node ${nodeId} was already decomposed`, 'ALREADY_DECOMPOSED');
    }
    if (subgoals.length === 0) {
      throw new ValidationError(`Decomposition of ${nodeId} needs at least one subgoal`, 'NO_SUBGOALS');
    }
    if (node.depth + 1 > this.limits.maxDepth) {
      throw new ValidationError(`Node ${nodeId} is at the maximum depth ${this.limits.maxDepth}`, 'MAX_DEPTH');
    }
    if (this.nodes.size + subgoals.length > this.limits.maxNodes) {
      throw new ValidationError(
        `Run ${this.runId} would exceed ${this.limits.maxNodes} nodes`,
        'RESOURCE_EXHAUSTED'
      );
    }

    const contextStack = [...node.contextStack, node.goal];
    const childIds = subgoals.map((subgoal, index) => {
      const child = this.createNode({
        id: `${node.id}.${index + 1}`,
        parentId: node.id,
        goal: subgoal.goal,
        contextStack,
        depth: node.depth + 1,
        independent: subgoal.independent ?? false,
        temperature: node.temperature,
        constraints: { ...node.constraints },
      });
      return child.id;
    });

    node.children = childIds;
    node.status = 'decomposed';
    node.updatedAt = new Date();
    this.record(nodeId, 'decompose', 'decomposed', { subgoals, childIds });
    return childIds;
  }

  /**
   * Force the node and every open descendant to cancelled. Terminal nodes
   * keep their status. Returns the ids that changed.
   */
  cancelSubtree(nodeId: string, reason = 'cancelled'): string[] {
    this.assertWritable();
    const cancelled: string[] = [];

    const visit = (id: string): void => {
      const node = this.requireNode(id);
      for (const childId of node.children) {
        visit(childId);
      }
      if (!isTerminal(node)) {
        this.transition(id, 'cancelled', { reason });
        cancelled.push(id);
      }
    };

    visit(nodeId);
    return cancelled;
  }

  /**
   * Settle a decomposed node once all its children are terminal.
   * Returns the new status, or null when children are still open.
   */
  reevaluate(nodeId: string): TaskStatus | null {
    const node = this.requireNode(nodeId);
    if (node.status !== 'decomposed') {
      return null;
    }
    const children = node.children.map((id) => this.requireNode(id));
    if (!children.every(isTerminal)) {
      return null;
    }

    if (children.every((child) => child.status === 'success')) {
      this.transition(nodeId, 'success', { reason: 'all children succeeded' });
      return 'success';
    }
    this.transition(nodeId, 'failed', { reason: 'a child did not succeed', exhausted: true });
    return 'failed';
  }

  /**
   * Freeze the graph once the run is terminal
   */
  archive(): void {
    if (this.archived) return;
    this.record(this.rootId ?? undefined, 'archive', 'archived', { size: this.nodes.size });
    this.archived = true;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Next node to run: left-to-right depth-first over non-terminal nodes.
   * Siblings after a busy child are only considered while both are
   * marked independent.
   */
  nextActiveLeaf(): TaskNode | null {
    if (this.rootId === null || this.archived) return null;
    const leaf = this.findLeaf(this.rootId);
    return leaf ? cloneNode(leaf) : null;
  }

  private findLeaf(nodeId: string): TaskNode | null {
    const node = this.requireNode(nodeId);
    if (isTerminal(node)) return null;
    if (node.status === 'pending' && node.children.length === 0) return node;
    if (node.status !== 'decomposed') return null;

    let onlyIndependent = false;
    for (const childId of node.children) {
      const child = this.requireNode(childId);
      if (isTerminal(child)) continue;
      if (onlyIndependent && !child.independent) return null;

      const leaf = this.findLeaf(childId);
      if (leaf) return leaf;

      if (!child.independent) return null;
      onlyIndependent = true;
    }
    return null;
  }

  getNode(nodeId: string): TaskNode {
    return cloneNode(this.requireNode(nodeId));
  }

  hasNode(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  getRootId(): string | null {
    return this.rootId;
  }

  getRoot(): TaskNode | null {
    return this.rootId === null ? null : this.getNode(this.rootId);
  }

  listNodes(): TaskNode[] {
    return Array.from(this.nodes.values(), cloneNode);
  }

  /** Ids of the node and all its descendants, parents first */
  subtreeIds(nodeId: string): string[] {
    const node = this.requireNode(nodeId);
    return [nodeId, ...node.children.flatMap((id) => this.subtreeIds(id))];
  }

  toTree(): TaskTree | null {
    if (this.rootId === null) return null;
    const build = (id: string): TaskTree => {
      const node = this.requireNode(id);
      return { node: cloneNode(node), children: node.children.map(build) };
    };
    return build(this.rootId);
  }

  getStatusCounts(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = {
      pending: 0,
      active: 0,
      success: 0,
      failed: 0,
      suspended: 0,
      decomposed: 0,
      cancelled: 0,
    };
    for (const node of this.nodes.values()) {
      counts[node.status]++;
    }
    return counts;
  }

  isArchived(): boolean {
    return this.archived;
  }

  size(): number {
    return this.nodes.size;
  }

  /**
   * Check the structural invariants. Returns a list of violations.
   */
  validate(): string[] {
    const problems: string[] = [];
    const roots = Array.from(this.nodes.values()).filter((n) => n.parentId === null);

    if (this.nodes.size > 0 && (roots.length !== 1 || roots[0].id !== this.rootId)) {
      problems.push(`expected exactly one root, found ${roots.length}`);
    }

    for (const node of this.nodes.values()) {
      if (node.parentId !== null) {
        const parent = this.nodes.get(node.parentId);
        if (!parent) {
          problems.push(`${node.id}: parent ${node.parentId} does not exist`);
        } else if (!parent.children.includes(node.id)) {
          problems.push(`${node.id}: not listed among the children of ${parent.id}`);
        }
      }

      const seen = new Set<string>([node.id]);
      let cursor = node.parentId;
      while (cursor !== null) {
        if (seen.has(cursor)) {
          problems.push(`${node.id}: cycle through ${cursor}`);
          break;
        }
        seen.add(cursor);
        cursor = this.nodes.get(cursor)?.parentId ?? null;
      }

      if (node.status === 'decomposed' && node.children.length === 0) {
        problems.push(`${node.id}: decomposed without children`);
      }
      if (node.status === 'success') {
        const open = node.children.filter((id) => this.nodes.get(id)?.status !== 'success');
        if (open.length > 0) {
          problems.push(`${node.id}: success with unsuccessful children ${open.join(', ')}`);
        }
      }
      if (node.attemptCount > this.limits.maxAttempts) {
        problems.push(`${node.id}: ${node.attemptCount} attempts exceeds ${this.limits.maxAttempts}`);
      }
    }

    return problems;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private createNode(input: {
    id: string;
    parentId: string | null;
    goal: string;
    contextStack: string[];
    depth: number;
    independent: boolean;
    temperature: number;
    constraints: TaskConstraints;
  }): TaskNode {
    if (this.nodes.has(input.id)) {
      throw new ValidationError(`Duplicate node id ${input.id}`, 'DUPLICATE_NODE');
    }
    const now = new Date();
    const node: TaskNode = {
      ...input,
      status: 'pending',
      attemptCount: 0,
      strategy: '',
      toolIntents: [],
      children: [],
      rejections: [],
      exhausted: false,
      createdAt: now,
      updatedAt: now,
    };
    this.nodes.set(node.id, node);
    return node;
  }

  private requireNode(nodeId: string): TaskNode {
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw new NotFound(nodeId);
    }
    return node;
  }

  private assertWritable(): void {
    if (this.archived) {
      throw new ValidationError(`Run ${this.runId} is archived`, 'ARCHIVED');
    }
  }

  private record(nodeId: string | undefined, action: string, outcome: string, payload: unknown): void {
    this.audit.append({ runId: this.runId, nodeId, actor: 'graph', action, outcome, payload });
  }
}

function cloneNode(node: TaskNode): TaskNode {
  return structuredClone(node);
}
