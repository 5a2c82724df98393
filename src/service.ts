/**
 * Assistant Service - the public face of the orchestrator
 *
 * Owns the shared audit log, memory store, run archive and consolidation
 * job; each submitted goal gets its own RunContext.
 */

import { randomBytes } from 'crypto';
import type { AgentSet } from './agents/capabilities';
import { normalizeVerdict } from './agents/capabilities';
import { AuditLog } from './audit/audit-log';
import { Orchestrator } from './core/orchestrator';
import { RunContext } from './core/run-context';
import { isTerminal } from './core/transitions';
import type { SnapshotListener } from './core/snapshot';
import { FatalError, ValidationError, errorMessage, isFatalReason } from './errors';
import { ConsolidationJob } from './memory/consolidation';
import type { Distiller, NodeInfo } from './memory/consolidation';
import { MemoryStore } from './memory/memory-store';
import { RunArchive } from './state/run-archive';
import type { Config, RunResult, RunSnapshot, TaskConstraints, TaskTree, Verdict } from './types';
import { getLogger } from './utils/logger';
import { MetricsCollector } from './utils/metrics';

export interface SubmitOptions {
  runId?: string;
  constraints?: Partial<TaskConstraints>;
}

export interface AssistantServiceDeps {
  config: Config;
  agents: AgentSet;
  audit?: AuditLog;
  memory?: MemoryStore;
  archive?: RunArchive;
  distiller?: Distiller;
}

interface RunHandle {
  ctx: RunContext;
  done: Promise<RunResult>;
}

function findInTree(tree: TaskTree, nodeId: string): TaskTree | undefined {
  if (tree.node.id === nodeId) return tree;
  for (const child of tree.children) {
    const found = findInTree(child, nodeId);
    if (found) return found;
  }
  return undefined;
}

export function generateRunId(): string {
  return `run_${Date.now().toString(36)}_${randomBytes(3).toString('hex')}`;
}

export class AssistantService {
  readonly audit: AuditLog;
  readonly memory: MemoryStore;
  readonly archive: RunArchive;
  private config: Config;
  private orchestrator: Orchestrator;
  private consolidation: ConsolidationJob;
  private runs: Map<string, RunHandle>;

  constructor(deps: AssistantServiceDeps) {
    this.config = deps.config;
    this.audit = deps.audit ?? new AuditLog();
    this.archive = deps.archive ?? new RunArchive(deps.config.archive.dir);
    this.runs = new Map();

    if (deps.memory) {
      this.memory = deps.memory;
    } else {
      this.memory = new MemoryStore({
        file: deps.config.memory.file,
        topK: deps.config.memory.topK,
        minSimilarity: deps.config.memory.minSimilarity,
      });
      this.memory.load();
    }

    this.orchestrator = new Orchestrator({
      agents: deps.agents,
      memory: this.memory,
      audit: this.audit,
      config: deps.config.orchestrator,
    });
    this.consolidation = new ConsolidationJob(
      this.audit,
      this.memory,
      (runId, nodeId) => this.nodeInfo(runId, nodeId),
      deps.distiller
    );
  }

  /**
   * Start background consolidation
   */
  start(): void {
    this.consolidation.start(this.config.memory.consolidationIntervalMs);
  }

  close(): void {
    this.consolidation.stop();
  }

  /**
   * Start a run for `goal` and return its id. A run id that already
   * finished is not run again; its archived result stands.
   */
  submitGoal(goal: string, options: SubmitOptions = {}): string {
    const logger = getLogger();
    const runId = options.runId ?? generateRunId();

    if (this.archive.has(runId)) {
      logger.runEvent('cached', runId);
      return runId;
    }
    if (this.runs.has(runId)) {
      return runId;
    }

    const ctx = new RunContext({
      runId,
      goal,
      constraints: options.constraints,
      audit: this.audit,
      config: this.config.orchestrator,
    });

    // once archived, the run is served from the archive and the handle goes
    const done = this.orchestrator.run(ctx).then(
      (result) => {
        this.archive.save(result);
        ctx.dispose();
        this.runs.delete(runId);
        return result;
      },
      (error: unknown) => {
        this.archive.save(ctx.result());
        ctx.dispose();
        this.runs.delete(runId);
        throw error;
      }
    );
    done.catch((error: unknown) => {
      logger.error('Run aborted', { runId, error: errorMessage(error) });
    });

    this.runs.set(runId, { ctx, done });
    return runId;
  }

  /**
   * Final result of a run. Rejects with FatalError when the run aborted.
   */
  async result(runId: string): Promise<RunResult> {
    const handle = this.runs.get(runId);
    if (handle) {
      return handle.done;
    }
    const archived = this.archive.get(runId);
    if (!archived) {
      throw new ValidationError(`Unknown run ${runId}`, 'UNKNOWN_RUN');
    }
    if (archived.fatal) {
      const { reason, message } = archived.fatal;
      throw new FatalError(isFatalReason(reason) ? reason : 'internal', runId, message);
    }
    return archived;
  }

  getSnapshot(runId: string): RunSnapshot {
    const handle = this.runs.get(runId);
    if (handle) {
      return handle.ctx.snapshot();
    }

    const archived = this.archive.get(runId);
    if (!archived) {
      throw new ValidationError(`Unknown run ${runId}`, 'UNKNOWN_RUN');
    }
    return {
      runId,
      version: 0,
      status: archived.status,
      tree: archived.tree,
      activeNodeIds: [],
      logs: [],
      metrics: new MetricsCollector().snapshot(),
    };
  }

  subscribe(runId: string, listener: SnapshotListener): () => void {
    return this.requireRun(runId).ctx.subscribe(listener);
  }

  /**
   * Cancel a node and its descendants, or the whole run when no node is
   * given. Returns the ids that became cancelled.
   */
  cancel(runId: string, nodeId?: string): string[] {
    if (!this.runs.has(runId) && this.archive.has(runId)) {
      return [];
    }
    const { ctx } = this.requireRun(runId);
    if (ctx.isFinished()) {
      return [];
    }
    const target = nodeId ?? ctx.graph.getRootId();
    if (target === null) {
      return [];
    }
    return this.orchestrator.cancel(ctx, target);
  }

  /**
   * Queue a human verdict for a pending node. It replaces the agents'
   * verdict the next time the node is picked.
   */
  injectFeedback(runId: string, nodeId: string, verdict: Verdict): void {
    const { ctx } = this.requireRun(runId);
    const node = ctx.graph.getNode(nodeId);
    if (ctx.isFinished() || node.status !== 'pending') {
      throw new ValidationError(`Feedback only applies to pending nodes (${nodeId} is ${node.status})`, 'NOT_PENDING');
    }

    const normalized = normalizeVerdict(verdict);
    ctx.queueFeedback(nodeId, normalized);
    this.audit.append({
      runId,
      nodeId,
      actor: 'human',
      action: 'verify',
      outcome: normalized.verdict,
      payload: normalized,
      detail: normalized.rationale || undefined,
    });
  }

  /**
   * Run one consolidation pass now
   */
  consolidate(): ReturnType<ConsolidationJob['runOnce']> {
    return this.consolidation.runOnce();
  }

  listRuns(): string[] {
    return Array.from(new Set([...this.runs.keys(), ...this.archive.list()])).sort();
  }

  private requireRun(runId: string): RunHandle {
    const handle = this.runs.get(runId);
    if (!handle) {
      throw new ValidationError(`Unknown or archived run ${runId}`, 'UNKNOWN_RUN');
    }
    return handle;
  }

  /**
   * Goal of a node and whether it has settled, from the live graph or the
   * archived tree
   */
  private nodeInfo(runId: string, nodeId: string): NodeInfo | undefined {
    const graph = this.runs.get(runId)?.ctx.graph;
    if (graph) {
      if (!graph.hasNode(nodeId)) return undefined;
      const node = graph.getNode(nodeId);
      return { goal: node.goal, settled: isTerminal(node) || node.status === 'decomposed' };
    }

    const archived = this.archive.get(runId);
    const found = archived ? findInTree(archived.tree, nodeId) : undefined;
    return found ? { goal: found.node.goal, settled: true } : undefined;
  }
}
