/**
 * Tool Executor - runs a plan's tool intents through the broker
 */

import type {
  HeldCall,
  PlanProposal,
  ResultBundle,
  TaskConstraints,
  ToolCall,
  ToolCallIntent,
  ToolInvocationResult,
} from '../types';
import { errorMessage } from '../errors';
import { payloadText } from '../mcp/session';
import { remainingBudget } from '../utils/deadline';
import { getLogger } from '../utils/logger';
import { independentBatches, runBounded } from '../utils/worker-pool';
import type { Executor } from './capabilities';
import type { DangerGate } from './danger-gate';

/**
 * The part of the broker the executor needs
 */
export interface ToolInvoker {
  invoke(call: ToolCall, signal?: AbortSignal): Promise<ToolInvocationResult>;
}

interface ToolExecutorOptions {
  workerPoolSize: number;
  defaultDeadlineMs: number;
}

const MAX_OUTPUT_PER_CALL = 2000;

export class ToolExecutor implements Executor {
  private broker: ToolInvoker;
  private gate: DangerGate;
  private options: ToolExecutorOptions;

  constructor(broker: ToolInvoker, gate: DangerGate, options: ToolExecutorOptions) {
    this.broker = broker;
    this.gate = gate;
    this.options = options;
  }

  /**
   * Dispatch intents in order. Adjacent independent intents share a batch
   * and run on the worker pool; a failed batch ends the bundle early, as
   * does a denied call or an aborted signal.
   */
  async execute(plan: PlanProposal, constraints: TaskConstraints, signal?: AbortSignal): Promise<ResultBundle> {
    const logger = getLogger();
    const calls: ResultBundle['calls'] = [];
    const held: HeldCall[] = [];

    for (const batch of independentBatches(plan.toolIntents, (intent) => intent.independent === true)) {
      if (signal?.aborted) break;

      for (const intent of batch) {
        const decision = await this.gate.check(intent, constraints, signal);
        if (decision.action === 'deny') {
          held.push({ intentId: intent.id, pattern: decision.pattern, approved: false });
          logger.warn('Tool call denied, aborting node', { intentId: intent.id, reason: decision.reason });
          return {
            strategy: plan.strategy,
            calls,
            held,
            aborted: { reason: decision.reason, intentId: intent.id },
            output: formatOutput(plan, calls),
          };
        }
        if (decision.held) {
          held.push({ intentId: intent.id, pattern: decision.held.pattern, approved: true });
        }
      }

      if (signal?.aborted) break;

      const settled = await runBounded(batch, this.options.workerPoolSize, (intent) =>
        this.dispatch(intent, constraints, signal)
      );
      settled.forEach((outcome, i) => {
        const intent = batch[i];
        const result: ToolInvocationResult =
          outcome.status === 'fulfilled'
            ? outcome.value
            : {
                success: false,
                errorKind: 'remote_error',
                error: errorMessage(outcome.reason),
                durationMs: 0,
                toolName: intent.toolName,
              };
        calls.push({ intent, result });
      });

      if (calls.some(({ result }) => !result.success)) break;
    }

    return { strategy: plan.strategy, calls, held, output: formatOutput(plan, calls) };
  }

  /**
   * Calls whose node deadline already passed are not sent
   */
  private dispatch(
    intent: ToolCallIntent,
    constraints: TaskConstraints,
    signal?: AbortSignal
  ): Promise<ToolInvocationResult> {
    const deadlineMs = remainingBudget(constraints.deadline, intent.deadlineMs ?? this.options.defaultDeadlineMs);
    if (deadlineMs <= 0) {
      const expired: ToolInvocationResult = {
        success: false,
        errorKind: 'timeout',
        error: `Deadline passed before ${intent.toolName} was dispatched`,
        durationMs: 0,
        toolName: intent.toolName,
      };
      return Promise.resolve(expired);
    }

    const call: ToolCall = { serverHint: intent.serverHint, toolName: intent.toolName, args: intent.args, deadlineMs };
    return this.broker.invoke(call, signal);
  }
}

/**
 * Human-readable result text handed to the verifier
 */
export function formatOutput(plan: PlanProposal, calls: ResultBundle['calls']): string {
  if (calls.length === 0) {
    return plan.strategy;
  }

  return calls
    .map(({ intent, result }) => {
      const body = result.success ? payloadText(result.payload) : `${result.errorKind}: ${result.error ?? ''}`;
      const clipped = body.length > MAX_OUTPUT_PER_CALL ? `${body.slice(0, MAX_OUTPUT_PER_CALL)}...` : body;
      return `[${intent.id} ${intent.toolName}] ${result.success ? 'ok' : 'failed'}\n${clipped}`;
    })
    .join('\n\n');
}
