/**
 * Per-run metrics tracking
 */

import type { MetricsSnapshot, TokenUsage } from '../types';

type Counter =
  | 'plans'
  | 'executions'
  | 'verifications'
  | 'approvals'
  | 'rejects'
  | 'timeouts'
  | 'toolCalls'
  | 'toolFailures'
  | 'decompositions'
  | 'llmRequests';

interface NodeTiming {
  startTime: number;
  endTime?: number;
}

class MetricsCollector {
  private startTime: number;
  private endTime: number | null;
  private counters: Record<Counter, number>;
  private tokens: TokenUsage;
  private nodeTimings: Map<string, NodeTiming>;

  constructor() {
    this.startTime = Date.now();
    this.endTime = null;
    this.counters = MetricsCollector.emptyCounters();
    this.tokens = { input: 0, output: 0, total: 0 };
    this.nodeTimings = new Map();
  }

  private static emptyCounters(): Record<Counter, number> {
    return {
      plans: 0,
      executions: 0,
      verifications: 0,
      approvals: 0,
      rejects: 0,
      timeouts: 0,
      toolCalls: 0,
      toolFailures: 0,
      decompositions: 0,
      llmRequests: 0,
    };
  }

  increment(counter: Counter, by = 1): void {
    this.counters[counter] += by;
  }

  get(counter: Counter): number {
    return this.counters[counter];
  }

  recordTokens(usage: TokenUsage): void {
    this.counters.llmRequests++;
    this.tokens.input += usage.input;
    this.tokens.output += usage.output;
    this.tokens.total += usage.total;
  }

  /**
   * Record the start of a node attempt
   */
  startNode(nodeId: string): void {
    this.nodeTimings.set(nodeId, { startTime: Date.now() });
  }

  endNode(nodeId: string): void {
    const timing = this.nodeTimings.get(nodeId);
    if (timing) {
      timing.endTime = Date.now();
    }
  }

  /**
   * Average duration of finished node attempts
   */
  getAverageNodeDuration(): number {
    const finished = Array.from(this.nodeTimings.values()).filter(
      (t): t is Required<NodeTiming> => t.endTime !== undefined
    );
    if (finished.length === 0) {
      return 0;
    }
    const total = finished.reduce((sum, t) => sum + (t.endTime - t.startTime), 0);
    return total / finished.length;
  }

  stop(): void {
    if (this.endTime === null) {
      this.endTime = Date.now();
    }
  }

  getTotalDuration(): number {
    return (this.endTime ?? Date.now()) - this.startTime;
  }

  snapshot(): MetricsSnapshot {
    return {
      ...this.counters,
      tokensUsed: { ...this.tokens },
      durationMs: this.getTotalDuration(),
    };
  }
}

export { MetricsCollector };
export type { Counter };
