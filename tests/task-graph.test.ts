/**
 * Tests for TaskGraph
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { TaskGraph } from '../src/core/task-graph';
import { AuditLog } from '../src/audit/audit-log';
import { InvalidTransition, NotFound, ValidationError } from '../src/errors';

function failNode(graph: TaskGraph, nodeId: string): void {
  graph.transition(nodeId, 'active');
  graph.transition(nodeId, 'failed');
}

describe('TaskGraph', () => {
  let audit: AuditLog;
  let graph: TaskGraph;

  beforeEach(() => {
    audit = new AuditLog();
    graph = new TaskGraph('run-1', audit, { maxAttempts: 3, maxDepth: 2, maxNodes: 6 });
  });

  describe('submitRoot', () => {
    test('should create a pending root with id 1', () => {
      const id = graph.submitRoot('organise my downloads', {}, 0.1);
      const root = graph.getNode(id);

      expect(id).toBe('1');
      expect(root.status).toBe('pending');
      expect(root.parentId).toBeNull();
      expect(root.depth).toBe(0);
      expect(root.temperature).toBe(0.1);
      expect(root.constraints).toEqual({ allowDangerousOps: false });
    });

    test('should audit the submission', () => {
      graph.submitRoot('organise my downloads');

      const entries = audit.entries({ runId: 'run-1' });
      expect(entries).toHaveLength(1);
      expect(entries[0].actor).toBe('graph');
      expect(entries[0].action).toBe('submit');
      expect(entries[0].outcome).toBe('pending');
    });

    test('should reject a second root', () => {
      graph.submitRoot('first');
      expect(() => graph.submitRoot('second')).toThrow(ValidationError);
    });

    test('should reject an empty goal', () => {
      expect(() => graph.submitRoot('   ')).toThrow('Goal cannot be empty');
    });
  });

  describe('transition', () => {
    beforeEach(() => {
      graph.submitRoot('root goal');
    });

    test('should follow the state machine', () => {
      graph.transition('1', 'active');
      graph.transition('1', 'failed');
      graph.transition('1', 'suspended');
      graph.transition('1', 'pending');

      expect(graph.getNode('1').status).toBe('pending');
      const outcomes = audit.entries({ action: 'transition' }).map((e) => e.outcome);
      expect(outcomes).toEqual(['pending->active', 'active->failed', 'failed->suspended', 'suspended->pending']);
    });

    test('should refuse an illegal transition', () => {
      expect(() => graph.transition('1', 'success')).toThrow(InvalidTransition);
      expect(graph.getNode('1').status).toBe('pending');
    });

    test('should throw NotFound for unknown nodes', () => {
      expect(() => graph.transition('9', 'active')).toThrow(NotFound);
    });

    test('should only mark failed transitions as exhausted', () => {
      expect(() => graph.transition('1', 'active', { exhausted: true })).toThrow('Only failed nodes can be exhausted (1)');
    });

    test('should refuse to mark a node decomposed without children', () => {
      failNode(graph, '1');

      expect(() => graph.transition('1', 'decomposed')).toThrow('Node 1 can only become decomposed through decompose()');
      expect(graph.getNode('1').status).toBe('failed');
      expect(graph.getNode('1').children).toEqual([]);
    });

    test('should refuse to move an exhausted node', () => {
      failNode(graph, '1');
      graph.markExhausted('1', 'gave up');

      expect(() => graph.transition('1', 'suspended')).toThrow('Node 1 is exhausted and cannot move to suspended');
      expect(() => graph.transition('1', 'cancelled')).toThrow(ValidationError);
      expect(graph.getNode('1').status).toBe('failed');
    });
  });

  describe('recordRejection', () => {
    beforeEach(() => {
      graph.submitRoot('root goal');
      graph.transition('1', 'active');
      graph.setPlan('1', { strategy: 'first try', toolIntents: [{ id: 't1', toolName: 'echo', args: {} }] });
      graph.transition('1', 'failed');
    });

    test('should count attempts and clear the plan', () => {
      expect(graph.recordRejection('1', 'output was empty')).toBe(1);

      const node = graph.getNode('1');
      expect(node.attemptCount).toBe(1);
      expect(node.rejections).toEqual(['output was empty']);
      expect(node.strategy).toBe('');
      expect(node.toolIntents).toEqual([]);
    });

    test('should refuse more rejections than maxAttempts', () => {
      for (let i = 0; i < 3; i++) {
        graph.recordRejection('1', `reject ${i}`);
      }
      expect(() => graph.recordRejection('1', 'one too many')).toThrow('already used 3/3 attempts');
    });
  });

  describe('setPlan', () => {
    test('should only plan active nodes', () => {
      graph.submitRoot('root goal');
      expect(() => graph.setPlan('1', { strategy: 'x', toolIntents: [] })).toThrow('Cannot plan 1 while pending');
    });
  });

  describe('decompose', () => {
    beforeEach(() => {
      graph.submitRoot('root goal');
      failNode(graph, '1');
    });

    test('should create ordered children with the parent context', () => {
      const ids = graph.decompose('1', [{ goal: 'step a' }, { goal: 'step b', independent: true }]);

      expect(ids).toEqual(['1.1', '1.2']);
      expect(graph.getNode('1').status).toBe('decomposed');
      expect(graph.getNode('1').children).toEqual(['1.1', '1.2']);

      const child = graph.getNode('1.2');
      expect(child.parentId).toBe('1');
      expect(child.depth).toBe(1);
      expect(child.contextStack).toEqual(['root goal']);
      expect(child.independent).toBe(true);
      expect(graph.getNode('1.1').independent).toBe(false);
    });

    test('should refuse to decompose an exhausted node', () => {
      graph.markExhausted('1', 'no more ideas');
      expect(() => graph.decompose('1', [{ goal: 'x' }])).toThrow('Only recoverable failed nodes can be decomposed');
    });

    test('should enforce the depth limit', () => {
      graph.decompose('1', [{ goal: 'a' }, { goal: 'b' }]);
      failNode(graph, '1.1');
      graph.decompose('1.1', [{ goal: 'a1' }, { goal: 'a2' }]);
      failNode(graph, '1.1.1');

      expect(() => graph.decompose('1.1.1', [{ goal: 'deeper' }])).toThrow('maximum depth 2');
    });

    test('should raise RESOURCE_EXHAUSTED past maxNodes', () => {
      let error: unknown;
      try {
        graph.decompose('1', [{ goal: 'a' }, { goal: 'b' }, { goal: 'c' }, { goal: 'd' }, { goal: 'e' }, { goal: 'f' }]);
      } catch (e) {
        error = e;
      }
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ code: 'RESOURCE_EXHAUSTED' });
      expect(graph.size()).toBe(1);
    });
  });

  describe('nextActiveLeaf', () => {
    beforeEach(() => {
      graph.submitRoot('root goal');
    });

    test('should return the pending root', () => {
      expect(graph.nextActiveLeaf()?.id).toBe('1');
    });

    test('should return null while the root is active', () => {
      graph.transition('1', 'active');
      expect(graph.nextActiveLeaf()).toBeNull();
    });

    test('should run dependent siblings in order', () => {
      failNode(graph, '1');
      graph.decompose('1', [{ goal: 'a' }, { goal: 'b' }]);

      expect(graph.nextActiveLeaf()?.id).toBe('1.1');
      graph.transition('1.1', 'active');
      expect(graph.nextActiveLeaf()).toBeNull();

      graph.transition('1.1', 'success');
      expect(graph.nextActiveLeaf()?.id).toBe('1.2');
    });

    test('should offer adjacent independent siblings together', () => {
      failNode(graph, '1');
      graph.decompose('1', [
        { goal: 'a', independent: true },
        { goal: 'b', independent: true },
        { goal: 'c' },
      ]);

      graph.transition('1.1', 'active');
      expect(graph.nextActiveLeaf()?.id).toBe('1.2');

      graph.transition('1.2', 'active');
      expect(graph.nextActiveLeaf()).toBeNull();
    });

    test('should return a copy', () => {
      const leaf = graph.nextActiveLeaf();
      expect(leaf).not.toBeNull();
      if (leaf) leaf.goal = 'changed';
      expect(graph.getNode('1').goal).toBe('root goal');
    });
  });

  describe('reevaluate', () => {
    beforeEach(() => {
      graph.submitRoot('root goal');
      failNode(graph, '1');
      graph.decompose('1', [{ goal: 'a' }, { goal: 'b' }]);
    });

    test('should wait for open children', () => {
      graph.transition('1.1', 'active');
      graph.transition('1.1', 'success');
      expect(graph.reevaluate('1')).toBeNull();
      expect(graph.getNode('1').status).toBe('decomposed');
    });

    test('should succeed when every child succeeded', () => {
      for (const id of ['1.1', '1.2']) {
        graph.transition(id, 'active');
        graph.transition(id, 'success');
      }
      expect(graph.reevaluate('1')).toBe('success');
      expect(graph.getNode('1').status).toBe('success');
    });

    test('should fail terminally when a child did not succeed', () => {
      graph.transition('1.1', 'active');
      graph.transition('1.1', 'success');
      graph.transition('1.2', 'cancelled');

      expect(graph.reevaluate('1')).toBe('failed');
      const root = graph.getNode('1');
      expect(root.status).toBe('failed');
      expect(root.exhausted).toBe(true);
    });
  });

  describe('cancelSubtree', () => {
    test('should cancel open descendants children first', () => {
      graph.submitRoot('root goal');
      failNode(graph, '1');
      graph.decompose('1', [{ goal: 'a' }, { goal: 'b' }]);
      graph.transition('1.1', 'active');
      graph.transition('1.1', 'success');

      expect(graph.cancelSubtree('1')).toEqual(['1.2', '1']);
      expect(graph.getNode('1.1').status).toBe('success');
      expect(graph.getNode('1.2').status).toBe('cancelled');
    });
  });

  describe('archive', () => {
    test('should freeze the graph', () => {
      graph.submitRoot('root goal');
      graph.transition('1', 'cancelled');
      graph.archive();

      expect(graph.isArchived()).toBe(true);
      expect(graph.nextActiveLeaf()).toBeNull();
      expect(() => graph.setTemperature('1', 0.5)).toThrow('Run run-1 is archived');
    });
  });

  describe('queries', () => {
    test('should build the tree and status counts', () => {
      graph.submitRoot('root goal');
      failNode(graph, '1');
      graph.decompose('1', [{ goal: 'a' }, { goal: 'b' }]);

      const tree = graph.toTree();
      expect(tree?.node.id).toBe('1');
      expect(tree?.children.map((c) => c.node.id)).toEqual(['1.1', '1.2']);
      expect(graph.subtreeIds('1')).toEqual(['1', '1.1', '1.2']);

      const counts = graph.getStatusCounts();
      expect(counts.decomposed).toBe(1);
      expect(counts.pending).toBe(2);
    });

    test('should report no problems for a well-formed graph', () => {
      graph.submitRoot('root goal');
      failNode(graph, '1');
      graph.decompose('1', [{ goal: 'a' }, { goal: 'b' }]);

      expect(graph.validate()).toEqual([]);
    });
  });
});
