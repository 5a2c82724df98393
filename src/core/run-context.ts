/**
 * Run Context - everything one run owns, passed explicitly to the loop
 */

import type { AuditLog } from '../audit/audit-log';
import type { OrchestratorConfig, RunResult, RunSnapshot, RunStatus, TaskConstraints, Verdict } from '../types';
import { getLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { MetricsCollector } from '../utils/metrics';
import { SnapshotChannel, formatAuditLine } from './snapshot';
import type { SnapshotListener } from './snapshot';
import { TaskGraph } from './task-graph';

const LOG_TAIL = 50;

export interface RunContextOptions {
  runId: string;
  goal: string;
  constraints?: Partial<TaskConstraints>;
  audit: AuditLog;
  config: OrchestratorConfig;
}

export class RunContext {
  readonly runId: string;
  readonly goal: string;
  readonly graph: TaskGraph;
  readonly metrics: MetricsCollector;
  readonly logger: Logger;
  private status: RunStatus;
  private fatal?: { reason: string; message: string };
  private snapshots: SnapshotChannel;
  private controllers: Map<string, AbortController>;
  private feedback: Map<string, Verdict>;
  private continuity: Map<string, string>;
  private logs: string[];
  private detachAudit: () => void;

  constructor(options: RunContextOptions) {
    this.runId = options.runId;
    this.goal = options.goal;
    this.status = 'running';
    this.metrics = new MetricsCollector();
    this.logger = getLogger().child({ runId: options.runId });
    this.controllers = new Map();
    this.feedback = new Map();
    this.continuity = new Map();
    this.logs = [];
    this.snapshots = new SnapshotChannel((version) => this.buildSnapshot(version));

    // Attach before the root exists so its submit entry lands in the log tail
    this.detachAudit = options.audit.onAppend((entry) => {
      if (entry.runId !== this.runId) return;
      this.logs.push(formatAuditLine(entry));
      if (this.logs.length > LOG_TAIL) {
        this.logs.splice(0, this.logs.length - LOG_TAIL);
      }
      this.snapshots.publish();
    });

    this.graph = new TaskGraph(options.runId, options.audit, {
      maxAttempts: options.config.maxAttempts,
      maxDepth: options.config.maxDepth,
      maxNodes: options.config.maxNodes,
    });
    try {
      this.graph.submitRoot(options.goal, options.constraints, options.config.temperature.base);
    } catch (error) {
      this.detachAudit();
      throw error;
    }
  }

  getStatus(): RunStatus {
    return this.status;
  }

  setStatus(status: RunStatus): void {
    this.status = status;
    this.snapshots.publish();
  }

  setFatal(reason: string, message: string): void {
    this.fatal = { reason, message };
  }

  isFinished(): boolean {
    return this.status !== 'running';
  }

  // ==========================================================================
  // Cancellation signals
  // ==========================================================================

  signalFor(nodeId: string): AbortSignal {
    const controller = new AbortController();
    this.controllers.set(nodeId, controller);
    return controller.signal;
  }

  releaseSignal(nodeId: string): void {
    this.controllers.delete(nodeId);
  }

  /**
   * Abort in-flight work for the given nodes; returns how many were running
   */
  abortNodes(nodeIds: readonly string[], reason: string): number {
    let aborted = 0;
    for (const id of nodeIds) {
      const controller = this.controllers.get(id);
      if (controller && !controller.signal.aborted) {
        controller.abort(new Error(reason));
        aborted++;
      }
    }
    return aborted;
  }

  abortAll(reason: string): number {
    return this.abortNodes(Array.from(this.controllers.keys()), reason);
  }

  // ==========================================================================
  // Human feedback and continuity tokens
  // ==========================================================================

  queueFeedback(nodeId: string, verdict: Verdict): void {
    this.feedback.set(nodeId, verdict);
  }

  takeFeedback(nodeId: string): Verdict | undefined {
    const verdict = this.feedback.get(nodeId);
    this.feedback.delete(nodeId);
    return verdict;
  }

  getContinuity(nodeId: string): string | undefined {
    return this.continuity.get(nodeId);
  }

  setContinuity(nodeId: string, token: string | undefined): void {
    if (token === undefined) {
      this.continuity.delete(nodeId);
    } else {
      this.continuity.set(nodeId, token);
    }
  }

  // ==========================================================================
  // Snapshots and results
  // ==========================================================================

  snapshot(): RunSnapshot {
    return this.snapshots.current();
  }

  subscribe(listener: SnapshotListener): () => void {
    return this.snapshots.subscribe(listener);
  }

  result(): RunResult {
    const tree = this.graph.toTree();
    const rootId = this.graph.getRootId();
    if (tree === null || rootId === null) {
      throw new Error(`Run ${this.runId} has no root`);
    }
    return {
      runId: this.runId,
      goal: this.goal,
      status: this.status,
      rootId,
      tree,
      fatal: this.fatal,
      completedAt: new Date().toISOString(),
    };
  }

  dispose(): void {
    this.detachAudit();
  }

  private buildSnapshot(version: number): RunSnapshot {
    return {
      runId: this.runId,
      version,
      status: this.status,
      tree: this.graph.toTree(),
      activeNodeIds: this.graph
        .listNodes()
        .filter((node) => node.status === 'active')
        .map((node) => node.id),
      logs: [...this.logs],
      metrics: this.metrics.snapshot(),
    };
  }
}
