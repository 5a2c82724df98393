import type { TaskNode, TaskStatus } from '../types';

export const ALLOWED_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  pending: ['active', 'cancelled'],
  active: ['success', 'failed', 'cancelled'],
  failed: ['suspended', 'decomposed', 'cancelled'],
  suspended: ['pending', 'cancelled'],
  decomposed: ['success', 'failed', 'cancelled'],
  success: [],
  cancelled: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Terminal nodes never change again. A failed node is terminal only once
 * it has been marked exhausted.
 */
export function isTerminal(node: Pick<TaskNode, 'status' | 'exhausted'>): boolean {
  if (node.status === 'success' || node.status === 'cancelled') return true;
  return node.status === 'failed' && node.exhausted;
}
