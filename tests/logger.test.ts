/**
 * Tests for the logger
 */

import { describe, test, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger } from '../src/utils/logger';

function readRecords(file: string): Record<string, unknown>[] {
  return readFileSync(file, 'utf-8')
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line));
}

describe('Logger', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  function fileLogger(level: 'debug' | 'warn'): { logger: Logger; file: string } {
    dir = mkdtempSync(join(tmpdir(), 'taskloom-log-'));
    const file = join(dir, 'nested', 'run.log');
    return { logger: new Logger({ level, file, console: false }), file };
  }

  test('should drop records below the level', () => {
    const { logger, file } = fileLogger('warn');
    logger.info('quiet');
    logger.warn('loud', { attempt: 2 });

    const records = readRecords(file);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: 'warn', message: 'loud', attempt: 2 });
  });

  test('should add child bindings to every record', () => {
    const { logger, file } = fileLogger('debug');
    const child = logger.child({ runId: 'run-7' });

    child.nodeEvent('rejected', '1.2', { rationale: 'missing file' });
    child.toolEvent('timeout', { toolName: 'read' });

    expect(readRecords(file)).toEqual([
      expect.objectContaining({ level: 'warn', message: 'node_rejected', runId: 'run-7', nodeId: '1.2', rationale: 'missing file' }),
      expect.objectContaining({ level: 'warn', message: 'tool_timeout', runId: 'run-7', toolName: 'read' }),
    ]);
  });

  test('should log aborted runs as critical', () => {
    const { logger, file } = fileLogger('warn');
    logger.runEvent('aborted', 'run-9', { reason: 'internal' });

    expect(readRecords(file)[0]).toMatchObject({ level: 'critical', message: 'run_aborted', runId: 'run-9' });
  });
});
