/**
 * Tests for the MCP session layer: lifecycles, caching and error mapping
 */

import { describe, test, expect } from 'vitest';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { checkArgs } from '../src/mcp/arg-check';
import { detectTransport, extractPayload } from '../src/mcp/client';
import { DescriptorCache } from '../src/mcp/descriptor-cache';
import { classifyError, isConnectionFailure } from '../src/mcp/errors';
import { PooledLifecycle, SpawnPerCallLifecycle } from '../src/mcp/lifecycle';
import type { RawCallResult, SessionFactory, ToolSession } from '../src/mcp/session';
import { ToolError } from '../src/errors';
import { Cancelled, DeadlineExceeded } from '../src/utils/deadline';
import type { ServerSpec, ToolDescriptor } from '../src/types';
import { deferred, inProcessServer } from './helpers/harness';

class FakeSession implements ToolSession {
  closed = false;

  constructor(readonly id: number) {}

  async listTools() {
    return [];
  }

  async callTool(): Promise<RawCallResult> {
    return { isError: false, payload: this.id };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Hands out numbered sessions; the first `failures` opens throw
 */
class FakeFactory implements SessionFactory {
  sessions: FakeSession[] = [];
  attempts = 0;

  constructor(private failures = 0) {}

  async open(): Promise<ToolSession> {
    this.attempts++;
    if (this.attempts <= this.failures) {
      throw new Error('connection refused');
    }
    const session = new FakeSession(this.sessions.length + 1);
    this.sessions.push(session);
    return session;
  }
}

const spec: ServerSpec = inProcessServer('fs');
const reconnect = { baseDelayMs: 1, maxDelayMs: 2, maxRetries: 2, jitterFactor: 0 };

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('PooledLifecycle', () => {
  test('should reuse the session between calls', async () => {
    const factory = new FakeFactory();
    const pool = new PooledLifecycle(spec, factory, { idleTtlMs: 0, reconnect });

    const first = await pool.withSession((s) => s.callTool('x', {}));
    const second = await pool.withSession((s) => s.callTool('x', {}));

    expect([first.payload, second.payload]).toEqual([1, 1]);
    expect(factory.attempts).toBe(1);
    await pool.close();
    expect(factory.sessions[0].closed).toBe(true);
  });

  test('should retry a failed connect with backoff', async () => {
    const factory = new FakeFactory(2);
    const pool = new PooledLifecycle(spec, factory, { idleTtlMs: 0, reconnect });

    const result = await pool.withSession((s) => s.callTool('x', {}));

    expect(result.payload).toBe(1);
    expect(factory.attempts).toBe(3);
  });

  test('should give up once reconnect retries run out', async () => {
    const factory = new FakeFactory(5);
    const pool = new PooledLifecycle(spec, factory, { idleTtlMs: 0, reconnect });

    await expect(pool.withSession((s) => s.callTool('x', {}))).rejects.toThrow('connection refused');
    expect(factory.attempts).toBe(3);
    expect(pool.isConnected()).toBe(false);
  });

  test('should drop the session after a connection failure', async () => {
    const factory = new FakeFactory();
    const pool = new PooledLifecycle(spec, factory, { idleTtlMs: 0, reconnect });

    await expect(
      pool.withSession(async () => {
        throw new Error('socket hang up');
      })
    ).rejects.toThrow('socket hang up');
    expect(factory.sessions[0].closed).toBe(true);

    const result = await pool.withSession((s) => s.callTool('x', {}));
    expect(result.payload).toBe(2);
  });

  test('should keep the session after a call-level error', async () => {
    const factory = new FakeFactory();
    const pool = new PooledLifecycle(spec, factory, { idleTtlMs: 0, reconnect });

    await expect(
      pool.withSession(async () => {
        throw new ToolError('invalid_args', 'bad');
      })
    ).rejects.toThrow('bad');

    expect(pool.isConnected()).toBe(true);
    expect(factory.sessions[0].closed).toBe(false);
    await pool.close();
  });

  test('should close an idle session', async () => {
    const factory = new FakeFactory();
    const pool = new PooledLifecycle(spec, factory, { idleTtlMs: 10, reconnect });

    await pool.withSession((s) => s.callTool('x', {}));
    expect(pool.isConnected()).toBe(true);

    await wait(40);
    expect(pool.isConnected()).toBe(false);
    expect(factory.sessions[0].closed).toBe(true);
  });
});

describe('SpawnPerCallLifecycle', () => {
  test('should open and close a session for every call', async () => {
    const factory = new FakeFactory();
    const lifecycle = new SpawnPerCallLifecycle(spec, factory);

    await lifecycle.withSession((s) => s.callTool('x', {}));
    await expect(
      lifecycle.withSession(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(factory.sessions.map((s) => s.closed)).toEqual([true, true]);
  });
});

describe('DescriptorCache', () => {
  const descriptor: ToolDescriptor = {
    serverId: 'fs',
    toolName: 'echo',
    description: '',
    inputSchema: {},
    capabilityTags: [],
  };

  test('should share one load between concurrent lookups', async () => {
    const cache = new DescriptorCache(1000);
    const gate = deferred<ToolDescriptor[]>();
    let loads = 0;
    const loader = () => {
      loads++;
      return gate.promise;
    };

    const first = cache.get('fs', loader);
    const second = cache.get('fs', loader);
    gate.resolve([descriptor]);

    expect(await first).toEqual([descriptor]);
    expect(await second).toEqual([descriptor]);
    expect(loads).toBe(1);
    expect(cache.peek('fs')).toEqual([descriptor]);
  });

  test('should not cache a failed load', async () => {
    const cache = new DescriptorCache(1000);

    await expect(cache.get('fs', () => Promise.reject(new Error('offline')))).rejects.toThrow('offline');
    expect(cache.peek('fs')).toBeUndefined();
    expect(await cache.get('fs', async () => [descriptor])).toEqual([descriptor]);
  });

  test('should forget everything on invalidate()', async () => {
    const cache = new DescriptorCache(1000);
    await cache.get('fs', async () => [descriptor]);
    await cache.get('web', async () => [descriptor]);

    cache.invalidate();

    expect(cache.peek('fs')).toBeUndefined();
    expect(cache.peek('web')).toBeUndefined();
  });
});

describe('classifyError', () => {
  test('should map local failures', () => {
    expect(classifyError(new Cancelled('x'))).toBe('cancelled');
    expect(classifyError(new DeadlineExceeded('x', 5))).toBe('timeout');
    expect(classifyError(new ToolError('invalid_args', 'x'))).toBe('invalid_args');
    expect(classifyError(new Error('x'))).toBe('remote_error');
  });

  test('should map protocol error codes', () => {
    expect(classifyError(new McpError(ErrorCode.InvalidParams, 'x'))).toBe('invalid_args');
    expect(classifyError(new McpError(ErrorCode.RequestTimeout, 'x'))).toBe('timeout');
    expect(classifyError(new McpError(ErrorCode.MethodNotFound, 'x'))).toBe('not_configured');
    expect(classifyError(new McpError(ErrorCode.InternalError, 'x'))).toBe('remote_error');
  });
});

describe('isConnectionFailure', () => {
  test('should only blame the connection for transport errors', () => {
    expect(isConnectionFailure(new Error('EPIPE'))).toBe(true);
    expect(isConnectionFailure(new McpError(ErrorCode.ConnectionClosed, 'x'))).toBe(true);
    expect(isConnectionFailure(new McpError(ErrorCode.InternalError, 'x'))).toBe(false);
    expect(isConnectionFailure(new DeadlineExceeded('x', 5))).toBe(false);
    expect(isConnectionFailure(new ToolError('remote_error', 'x'))).toBe(false);
  });
});

describe('extractPayload', () => {
  test('should parse JSON text blocks', () => {
    expect(extractPayload([{ type: 'text', text: '{"moved":2}' }])).toEqual({ moved: 2 });
  });

  test('should keep plain text as a string', () => {
    expect(extractPayload([{ type: 'text', text: 'done' }])).toBe('done');
  });

  test('should pass other content through', () => {
    const image = { type: 'image', data: 'AAAA', mimeType: 'image/png' };
    expect(extractPayload([image])).toEqual(image);
    expect(extractPayload([])).toEqual([]);
  });
});

describe('detectTransport', () => {
  test('should keep an explicit network transport', () => {
    expect(detectTransport({ ...spec, transport: 'http', endpoint: 'http://localhost/sse' })).toBe('http');
  });

  test('should infer the transport from the endpoint', () => {
    expect(detectTransport({ ...spec, endpoint: 'http://localhost:8931/sse' })).toBe('sse');
    expect(detectTransport({ ...spec, endpoint: 'https://tools.example.test/mcp' })).toBe('http');
    expect(detectTransport({ ...spec, endpoint: 'npx some-server' })).toBe('stdio');
  });
});

describe('checkArgs', () => {
  const schema = {
    type: 'object',
    properties: {
      path: { type: 'string' },
      count: { type: 'integer' },
      note: { type: ['string', 'null'] },
    },
    required: ['path'],
    additionalProperties: false,
  };

  test('should accept valid arguments', () => {
    expect(checkArgs(schema, { path: '/tmp', count: 2, note: null })).toEqual([]);
  });

  test('should list every problem', () => {
    expect(checkArgs(schema, { count: 1.5, extra: true })).toEqual([
      'missing required argument "path"',
      'argument "count" should be integer',
      'unexpected argument "extra"',
    ]);
  });

  test('should allow unknown keys on open schemas', () => {
    expect(checkArgs({ properties: {} }, { anything: 1 })).toEqual([]);
  });
});
