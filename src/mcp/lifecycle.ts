/**
 * Connection lifecycles: one pooled session per server, or a fresh
 * session per call.
 */

import type { BrokerConfig, ServerSpec } from '../types';
import { ToolError, errorMessage } from '../errors';
import { ExponentialBackoff } from '../rate-limit/backoff';
import type { BackoffConfig } from '../rate-limit/backoff';
import { getLogger } from '../utils/logger';
import { isConnectionFailure } from './errors';
import type { SessionFactory, ToolSession } from './session';

export interface ConnectionLifecycle {
  withSession<T>(fn: (session: ToolSession) => Promise<T>, signal?: AbortSignal): Promise<T>;
  close(): Promise<void>;
}

async function closeQuietly(serverId: string, session: ToolSession): Promise<void> {
  try {
    await session.close();
  } catch (error) {
    getLogger().warn('Error closing tool session', { serverId, error: errorMessage(error) });
  }
}

interface PooledOptions {
  idleTtlMs: number;
  reconnect: Partial<BackoffConfig>;
}

/**
 * Keeps one session open and shares it between calls. Connection failures
 * drop it; the next call reconnects with exponential backoff. The session
 * closes after `idleTtlMs` with no call in flight.
 */
export class PooledLifecycle implements ConnectionLifecycle {
  private spec: ServerSpec;
  private factory: SessionFactory;
  private options: PooledOptions;
  private session: Promise<ToolSession> | null;
  private inFlight: number;
  private idleTimer: NodeJS.Timeout | null;

  constructor(spec: ServerSpec, factory: SessionFactory, options: PooledOptions) {
    this.spec = spec;
    this.factory = factory;
    this.options = options;
    this.session = null;
    this.inFlight = 0;
    this.idleTimer = null;
  }

  async withSession<T>(fn: (session: ToolSession) => Promise<T>): Promise<T> {
    this.clearIdle();
    this.inFlight++;

    try {
      const pending = this.acquire();
      const session = await pending;
      try {
        return await fn(session);
      } catch (error) {
        if (isConnectionFailure(error) && this.session === pending) {
          getLogger().warn('Dropping tool session after connection failure', {
            serverId: this.spec.serverId,
            error: errorMessage(error),
          });
          this.session = null;
          await closeQuietly(this.spec.serverId, session);
        }
        throw error;
      }
    } finally {
      this.inFlight--;
      if (this.inFlight === 0) {
        this.armIdle();
      }
    }
  }

  isConnected(): boolean {
    return this.session !== null;
  }

  async close(): Promise<void> {
    this.clearIdle();
    const pending = this.session;
    this.session = null;
    if (!pending) return;

    try {
      await closeQuietly(this.spec.serverId, await pending);
    } catch (error) {
      getLogger().debug('Pooled session never connected', {
        serverId: this.spec.serverId,
        error: errorMessage(error),
      });
    }
  }

  private acquire(): Promise<ToolSession> {
    if (this.session) {
      return this.session;
    }

    const backoff = new ExponentialBackoff(this.options.reconnect);
    const opening = backoff.execute(
      () => this.factory.open(this.spec),
      (error) => !(error instanceof ToolError)
    );
    this.session = opening;
    void opening.catch(() => {
      if (this.session === opening) {
        this.session = null;
      }
    });
    return opening;
  }

  private armIdle(): void {
    if (this.options.idleTtlMs <= 0 || !this.session) return;
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      if (this.inFlight > 0) return;
      getLogger().debug('Closing idle tool session', { serverId: this.spec.serverId });
      this.close().catch((error: unknown) => {
        getLogger().warn('Idle close failed', { serverId: this.spec.serverId, error: errorMessage(error) });
      });
    }, this.options.idleTtlMs);
    this.idleTimer.unref();
  }

  private clearIdle(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }
}

/**
 * Opens a session for each call and closes it afterwards
 */
export class SpawnPerCallLifecycle implements ConnectionLifecycle {
  private spec: ServerSpec;
  private factory: SessionFactory;

  constructor(spec: ServerSpec, factory: SessionFactory) {
    this.spec = spec;
    this.factory = factory;
  }

  async withSession<T>(fn: (session: ToolSession) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const session = await this.factory.open(this.spec, signal);
    try {
      return await fn(session);
    } finally {
      await closeQuietly(this.spec.serverId, session);
    }
  }

  async close(): Promise<void> {
    // Nothing held between calls
  }
}

export function createLifecycle(
  spec: ServerSpec,
  factory: SessionFactory,
  config: BrokerConfig
): ConnectionLifecycle {
  if (spec.lifecycle === 'spawn-per-call') {
    return new SpawnPerCallLifecycle(spec, factory);
  }
  return new PooledLifecycle(spec, factory, {
    idleTtlMs: config.poolIdleTtlMs,
    reconnect: {
      baseDelayMs: config.reconnectBaseMs,
      maxDelayMs: config.reconnectMaxMs,
      maxRetries: config.reconnectRetries,
    },
  });
}
