/**
 * In-process tool servers: plain handlers behind the session contract
 */

import type { ServerSpec } from '../types';
import { ToolError } from '../errors';
import type { RawCallResult, RawTool, SessionFactory, ToolSession } from './session';

export interface InProcessTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  handler: (args: Record<string, unknown>, signal?: AbortSignal) => Promise<unknown>;
}

class InProcessSession implements ToolSession {
  private tools: Map<string, InProcessTool>;
  private closed: boolean;

  constructor(tools: readonly InProcessTool[]) {
    this.tools = new Map(tools.map((tool) => [tool.name, tool]));
    this.closed = false;
  }

  async listTools(): Promise<RawTool[]> {
    this.ensureOpen();
    return Array.from(this.tools.values()).map(({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema,
    }));
  }

  /**
   * Handler failures come back as error results, the way a remote server reports them
   */
  async callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<RawCallResult> {
    this.ensureOpen();
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolError('not_configured', `Unknown tool: ${name}`);
    }

    try {
      return { isError: false, payload: await tool.handler(args, signal) };
    } catch (error) {
      if (error instanceof ToolError || signal?.aborted) {
        throw error;
      }
      return { isError: true, payload: error instanceof Error ? error.message : String(error) };
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error('Session closed');
    }
  }
}

/**
 * Serves registered handler sets keyed by server id. `opened` counts
 * sessions handed out, so tests can tell pooled from per-call lifecycles.
 */
export class InProcessSessionFactory implements SessionFactory {
  private servers: Map<string, InProcessTool[]>;
  opened: number;

  constructor(servers: Record<string, InProcessTool[]> = {}) {
    this.servers = new Map(Object.entries(servers));
    this.opened = 0;
  }

  register(serverId: string, tools: InProcessTool[]): void {
    this.servers.set(serverId, tools);
  }

  async open(spec: ServerSpec): Promise<ToolSession> {
    const tools = this.servers.get(spec.serverId);
    if (!tools) {
      throw new ToolError('not_configured', `No in-process server registered as ${spec.serverId}`);
    }
    this.opened++;
    return new InProcessSession(tools);
  }
}
