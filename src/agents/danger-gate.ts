/**
 * Danger Gate - holds destructive tool calls for human approval
 *
 * Patterns are plain substrings (case-insensitive) or `/regex/flags`.
 * A call matching a deny pattern and no allow pattern is held; without an
 * approval callback a held call is denied. So is a call whose approval
 * times out or whose node is cancelled while it waits.
 */

import type { DangerConfig, TaskConstraints, ToolCallIntent } from '../types';
import { errorMessage } from '../errors';
import { Cancelled, DeadlineExceeded, untilAborted, withDeadline } from '../utils/deadline';
import { getLogger } from '../utils/logger';

export const DEFAULT_DENY_PATTERNS: readonly string[] = [
  'rm -rf /',
  'mkfs',
  'dd if=',
  ':(){:|:&};:',
  'chmod 777 /',
  'chown root:root /',
  '> /dev/sda',
  'mv / /dev/null',
];

export interface ApprovalRequest {
  intent: ToolCallIntent;
  pattern: string;
  /** Flattened text the pattern matched against */
  text: string;
}

export type ApprovalCallback = (request: ApprovalRequest) => Promise<boolean>;

export type GateDecision =
  | { action: 'allow'; held?: { pattern: string } }
  | { action: 'deny'; pattern: string; reason: string };

type Matcher = { source: string; test: (text: string) => boolean };

function compile(pattern: string): Matcher {
  const regex = /^\/(.+)\/([gimsuy]*)$/.exec(pattern);
  if (regex) {
    const compiled = new RegExp(regex[1], regex[2].replace('g', ''));
    return { source: pattern, test: (text) => compiled.test(text) };
  }
  const needle = pattern.toLowerCase();
  return { source: pattern, test: (text) => text.toLowerCase().includes(needle) };
}

function collectStrings(value: unknown, out: string[]): void {
  if (typeof value === 'string') {
    out.push(value);
  } else if (Array.isArray(value)) {
    for (const item of value) collectStrings(item, out);
  } else if (typeof value === 'object' && value !== null) {
    for (const item of Object.values(value)) collectStrings(item, out);
  }
}

/**
 * Tool name plus every string argument, space separated
 */
export function describeIntent(intent: ToolCallIntent): string {
  const parts: string[] = [intent.toolName];
  collectStrings(intent.args, parts);
  return parts.join(' ');
}

export class DangerGate {
  private deny: Matcher[];
  private allow: Matcher[];
  private approve?: ApprovalCallback;
  private approvalTimeoutMs?: number;

  constructor(config: DangerConfig, approve?: ApprovalCallback) {
    this.deny = config.deny.map(compile);
    this.allow = config.allow.map(compile);
    this.approvalTimeoutMs = config.approvalTimeoutMs;
    this.approve = approve;
  }

  /**
   * The deny pattern a call trips, or null when it may run unattended
   */
  match(intent: ToolCallIntent): string | null {
    const text = describeIntent(intent);
    if (this.allow.some((m) => m.test(text))) {
      return null;
    }
    return this.deny.find((m) => m.test(text))?.source ?? null;
  }

  async check(intent: ToolCallIntent, constraints: TaskConstraints, signal?: AbortSignal): Promise<GateDecision> {
    if (constraints.allowDangerousOps) {
      return { action: 'allow' };
    }

    const pattern = this.match(intent);
    if (pattern === null) {
      return { action: 'allow' };
    }

    const logger = getLogger();
    logger.warn('Holding dangerous tool call', { intentId: intent.id, toolName: intent.toolName, pattern });

    if (!this.approve) {
      return { action: 'deny', pattern, reason: `no approver for call matching "${pattern}"` };
    }

    let approved: boolean;
    try {
      approved = await this.ask(this.approve, { intent, pattern, text: describeIntent(intent) }, signal);
    } catch (error) {
      if (error instanceof Cancelled) {
        return { action: 'deny', pattern, reason: 'cancelled while awaiting approval' };
      }
      if (error instanceof DeadlineExceeded) {
        logger.warn('Approval timed out', { intentId: intent.id, ms: error.ms });
        return { action: 'deny', pattern, reason: `approval timed out after ${error.ms}ms` };
      }
      logger.error('Approval callback failed', { intentId: intent.id, error: errorMessage(error) });
      return { action: 'deny', pattern, reason: `approval failed: ${errorMessage(error)}` };
    }

    if (!approved) {
      return { action: 'deny', pattern, reason: `denied call matching "${pattern}"` };
    }
    logger.info('Dangerous tool call approved', { intentId: intent.id, pattern });
    return { action: 'allow', held: { pattern } };
  }

  private ask(approve: ApprovalCallback, request: ApprovalRequest, signal?: AbortSignal): Promise<boolean> {
    if (this.approvalTimeoutMs !== undefined) {
      return withDeadline(() => approve(request), this.approvalTimeoutMs, 'approval', signal);
    }
    if (signal) {
      return untilAborted(() => approve(request), signal, 'approval');
    }
    return approve(request);
  }
}
