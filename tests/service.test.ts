/**
 * Tests for AssistantService
 */

import { describe, test, expect, afterEach } from 'vitest';
import { AssistantService } from '../src/service';
import { MemoryStore } from '../src/memory/memory-store';
import { RunArchive } from '../src/state/run-archive';
import { FatalError, ValidationError } from '../src/errors';
import type { AgentSet } from '../src/agents/capabilities';
import type { OrchestratorConfig, PlanProposal, RunSnapshot } from '../src/types';
import { ToolExecutor } from '../src/agents/executor';
import { DangerGate } from '../src/agents/danger-gate';
import { ScriptedPlanner, ScriptedVerifier, deferred, testConfig } from './helpers/harness';

function agents(planner: ScriptedPlanner, verifier = new ScriptedVerifier()): AgentSet {
  const broker = {
    invoke: async () => ({ success: true, payload: 'ok', durationMs: 0, toolName: 'noop' }),
  };
  const gate = new DangerGate({ deny: [], allow: [] });
  return {
    planner,
    executor: new ToolExecutor(broker, gate, { workerPoolSize: 1, defaultDeadlineMs: 100 }),
    verifier,
  };
}

describe('AssistantService', () => {
  let service: AssistantService | undefined;

  function createService(set: AgentSet, orchestrator: Partial<OrchestratorConfig> = {}): AssistantService {
    service = new AssistantService({
      config: testConfig(orchestrator),
      agents: set,
      memory: new MemoryStore({ topK: 3, minSimilarity: 0.3 }),
      archive: new RunArchive(),
    });
    return service;
  }

  afterEach(() => {
    service?.close();
    service = undefined;
  });

  describe('submitGoal', () => {
    test('should run a goal to a result', async () => {
      const svc = createService(agents(new ScriptedPlanner()));

      const runId = svc.submitGoal('water the plants');
      const result = await svc.result(runId);

      expect(result.runId).toBe(runId);
      expect(result.status).toBe('success');
      expect(result.goal).toBe('water the plants');
    });

    test('should not start a second run for the same id', async () => {
      const planner = new ScriptedPlanner();
      const svc = createService(agents(planner));

      const first = svc.submitGoal('water the plants', { runId: 'run-fixed' });
      const second = svc.submitGoal('water the plants', { runId: 'run-fixed' });
      await svc.result(first);
      const third = svc.submitGoal('water the plants', { runId: 'run-fixed' });

      expect([first, second, third]).toEqual(['run-fixed', 'run-fixed', 'run-fixed']);
      expect(planner.planCalls).toHaveLength(1);
    });

    test('should archive finished runs', async () => {
      const svc = createService(agents(new ScriptedPlanner()));

      const runId = svc.submitGoal('water the plants');
      await svc.result(runId);

      expect(svc.archive.get(runId)?.status).toBe('success');
      expect(svc.listRuns()).toEqual([runId]);
    });

    test('should serve a finished run from the archive only', async () => {
      const svc = createService(agents(new ScriptedPlanner()));

      const runId = svc.submitGoal('water the plants');
      await svc.result(runId);

      expect(() => svc.subscribe(runId, () => undefined)).toThrow(`Unknown or archived run ${runId}`);
      expect(svc.getSnapshot(runId)).toMatchObject({ version: 0, status: 'success', activeNodeIds: [] });
      expect((await svc.result(runId)).status).toBe('success');
      expect(svc.cancel(runId)).toEqual([]);
      expect(svc.listRuns()).toEqual([runId]);
    });

    test('should keep raising FatalError for an aborted run after archiving it', async () => {
      const planner = new ScriptedPlanner({ decompose: () => [{ goal: 'a' }, { goal: 'b' }] });
      const verifier = new ScriptedVerifier(() => ({ verdict: 'reject', rationale: 'nope' }));
      const svc = createService(agents(planner, verifier), { maxAttempts: 1, maxNodes: 2 });

      const runId = svc.submitGoal('root');
      await expect(svc.result(runId)).rejects.toBeInstanceOf(FatalError);
      await expect(svc.result(runId)).rejects.toMatchObject({ reason: 'resource_exhausted', runId });
      expect(svc.archive.get(runId)?.status).toBe('aborted');
    });

    test('should reject an empty goal', () => {
      const svc = createService(agents(new ScriptedPlanner()));
      expect(() => svc.submitGoal('  ')).toThrow('Goal cannot be empty');
    });
  });

  describe('unknown runs', () => {
    test('should fail lookups with UNKNOWN_RUN', async () => {
      const svc = createService(agents(new ScriptedPlanner()));

      await expect(svc.result('missing')).rejects.toMatchObject({ code: 'UNKNOWN_RUN' });
      expect(() => svc.getSnapshot('missing')).toThrow(ValidationError);
      expect(() => svc.cancel('missing')).toThrow('Unknown or archived run missing');
    });
  });

  describe('snapshots', () => {
    test('should publish increasing versions to subscribers', async () => {
      const gate = deferred();
      const planner = new ScriptedPlanner({
        plan: async () => {
          await gate.promise;
          return { strategy: 'wait', toolIntents: [] };
        },
      });
      const svc = createService(agents(planner));

      const runId = svc.submitGoal('water the plants');
      const seen: RunSnapshot[] = [];
      const unsubscribe = svc.subscribe(runId, (snapshot) => seen.push(snapshot));

      const running = svc.getSnapshot(runId);
      expect(running.status).toBe('running');
      expect(running.activeNodeIds).toEqual(['1']);

      gate.resolve();
      await svc.result(runId);
      unsubscribe();

      const versions = seen.map((s) => s.version);
      expect(versions.length).toBeGreaterThan(0);
      expect(versions).toEqual([...versions].sort((a, b) => a - b));
      expect(seen[seen.length - 1].status).toBe('success');
      expect(seen[seen.length - 1].logs.length).toBeGreaterThan(0);
    });

    test('should finish the run when a subscriber throws', async () => {
      const gate = deferred();
      const planner = new ScriptedPlanner({
        plan: async () => {
          await gate.promise;
          return { strategy: 'wait', toolIntents: [] };
        },
      });
      const svc = createService(agents(planner));

      const runId = svc.submitGoal('water the plants');
      let calls = 0;
      svc.subscribe(runId, () => {
        calls++;
        throw new Error('dashboard went away');
      });
      gate.resolve();

      const result = await svc.result(runId);
      expect(result.status).toBe('success');
      expect(calls).toBeGreaterThan(0);
    });
  });

  describe('cancel', () => {
    test('should cancel the whole run', async () => {
      const started = deferred();
      const planner = new ScriptedPlanner({
        plan: (goal, call, signal) => {
          started.resolve();
          return new Promise<PlanProposal>((_, reject) => {
            signal?.addEventListener('abort', () => reject(new Error('aborted')));
          });
        },
      });
      const svc = createService(agents(planner));

      const runId = svc.submitGoal('long task');
      await started.promise;

      expect(svc.cancel(runId)).toEqual(['1']);
      const result = await svc.result(runId);
      expect(result.status).toBe('cancelled');
      expect(svc.cancel(runId)).toEqual([]);
    });
  });

  describe('injectFeedback', () => {
    test('should replace the agents for a pending node', async () => {
      const firstStep = deferred();
      const planner = new ScriptedPlanner({
        plan: async (goal) => {
          if (goal === 'book a venue') await firstStep.promise;
          return { strategy: `do ${goal}`, toolIntents: [] };
        },
        decompose: () => [{ goal: 'book a venue' }, { goal: 'send invites' }],
      });
      const verifier = new ScriptedVerifier((goal) =>
        goal === 'plan offsite' ? { verdict: 'reject', rationale: 'too big' } : { verdict: 'approve', rationale: 'ok' }
      );
      const svc = createService(agents(planner, verifier), { maxAttempts: 1 });

      const runId = svc.submitGoal('plan offsite');
      await expect.poll(() => planner.planCalls.some((c) => c.goal === 'book a venue')).toBe(true);

      svc.injectFeedback(runId, '1.2', { verdict: 'approve', rationale: ' invites already sent ' });
      firstStep.resolve();
      const result = await svc.result(runId);

      expect(result.status).toBe('success');
      expect(planner.planCalls.map((c) => c.goal)).toEqual(['plan offsite', 'book a venue']);

      const chain = svc.audit.chain(runId, '1.2');
      expect(chain.map((e) => `${e.actor}.${e.outcome}`)).toEqual(['human.approve']);
      expect(chain[0].detail).toBe('invites already sent');
    });

    test('should refuse feedback for a node that is not pending', async () => {
      const started = deferred();
      const planner = new ScriptedPlanner({
        plan: (goal, call, signal) => {
          started.resolve();
          return new Promise<PlanProposal>((_, reject) => {
            signal?.addEventListener('abort', () => reject(new Error('aborted')));
          });
        },
      });
      const svc = createService(agents(planner));

      const runId = svc.submitGoal('long task');
      await started.promise;

      expect(() => svc.injectFeedback(runId, '1', { verdict: 'approve', rationale: '' })).toThrow(
        'Feedback only applies to pending nodes (1 is active)'
      );
      svc.cancel(runId);
      await svc.result(runId);
    });
  });

  describe('consolidate', () => {
    test('should turn verdicts into strategy records', async () => {
      const svc = createService(agents(new ScriptedPlanner()));

      const runId = svc.submitGoal('water the plants');
      await svc.result(runId);
      const before = svc.memory.size();
      const report = await svc.consolidate();

      expect(report.recorded).toBe(1);
      expect(svc.memory.size()).toBe(before + 1);
      const latest = svc.memory.all()[svc.memory.size() - 1];
      expect(latest.source).toBe('consolidation');
      expect(latest.narrative).toBe('1 approved, 0 rejected');
    });
  });
});
