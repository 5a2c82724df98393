/**
 * Run Archive - completed run results, in memory and optionally on disk
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { RunResult, TaskTree } from '../types';
import { writeJsonAtomic } from './atomic';
import { getLogger } from '../utils/logger';

const ToolCallIntentSchema = z.object({
  id: z.string(),
  serverHint: z.string().optional(),
  toolName: z.string(),
  args: z.record(z.unknown()),
  deadlineMs: z.number().optional(),
  independent: z.boolean().optional(),
});

const TaskNodeSchema = z.object({
  id: z.string(),
  parentId: z.string().nullable(),
  goal: z.string(),
  status: z.enum(['pending', 'active', 'success', 'failed', 'suspended', 'decomposed', 'cancelled']),
  contextStack: z.array(z.string()),
  attemptCount: z.number().int().nonnegative(),
  strategy: z.string(),
  toolIntents: z.array(ToolCallIntentSchema),
  constraints: z.object({
    deadline: z.number().optional(),
    allowDangerousOps: z.boolean(),
  }),
  children: z.array(z.string()),
  depth: z.number().int().nonnegative(),
  independent: z.boolean(),
  temperature: z.number(),
  rejections: z.array(z.string()),
  exhausted: z.boolean(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

const TaskTreeSchema: z.ZodType<TaskTree, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    node: TaskNodeSchema,
    children: z.array(TaskTreeSchema),
  })
);

const RunResultSchema = z.object({
  runId: z.string(),
  goal: z.string(),
  status: z.enum(['running', 'success', 'failed', 'cancelled', 'aborted']),
  rootId: z.string(),
  tree: TaskTreeSchema,
  fatal: z.object({ reason: z.string(), message: z.string() }).optional(),
  completedAt: z.string(),
});

const FILE_PREFIX = 'run-';

export class RunArchive {
  private dir?: string;
  private results: Map<string, RunResult>;

  constructor(dir?: string) {
    this.dir = dir;
    this.results = new Map();
  }

  /**
   * Store a finished run. The disk copy is written atomically.
   */
  save(result: RunResult): void {
    this.results.set(result.runId, result);
    if (!this.dir) return;

    try {
      writeJsonAtomic(this.pathFor(result.runId), result);
      getLogger().debug('Run archived', { runId: result.runId, dir: this.dir });
    } catch (error) {
      getLogger().error('Failed to archive run', {
        runId: result.runId,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  /**
   * Finished result for a run id, looking on disk when it is not in memory
   */
  get(runId: string): RunResult | undefined {
    const cached = this.results.get(runId);
    if (cached || !this.dir) {
      return cached;
    }

    const path = this.pathFor(runId);
    if (!existsSync(path)) {
      return undefined;
    }

    const loaded = this.load(path);
    if (loaded && loaded.runId === runId) {
      this.results.set(runId, loaded);
      return loaded;
    }
    return undefined;
  }

  has(runId: string): boolean {
    return this.get(runId) !== undefined;
  }

  /**
   * Ids of every archived run, in memory or on disk
   */
  list(): string[] {
    const ids = new Set(this.results.keys());
    if (this.dir && existsSync(this.dir)) {
      for (const file of readdirSync(this.dir)) {
        if (!file.startsWith(FILE_PREFIX) || !file.endsWith('.json')) continue;
        const loaded = this.load(join(this.dir, file));
        if (loaded) ids.add(loaded.runId);
      }
    }
    return Array.from(ids).sort();
  }

  private load(path: string): RunResult | undefined {
    try {
      const parsed = RunResultSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
      if (parsed.success) {
        return parsed.data;
      }
      getLogger().warn('Ignoring malformed run archive', { path, issues: parsed.error.issues.length });
    } catch (error) {
      getLogger().warn('Failed to read run archive', {
        path,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
    return undefined;
  }

  private pathFor(runId: string): string {
    if (!this.dir) {
      throw new Error('Run archive has no directory');
    }
    return join(this.dir, `${FILE_PREFIX}${runId.replace(/[^A-Za-z0-9_-]/g, '_')}.json`);
  }
}
