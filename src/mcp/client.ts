/**
 * MCP Client - Model Context Protocol sessions over stdio, http or sse
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import type { ServerSpec } from '../types';
import { ToolError } from '../errors';
import { getLogger } from '../utils/logger';
import { isRecord } from './session';
import type { RawCallResult, RawTool, SessionFactory, ToolSession } from './session';

const CLIENT_INFO = { name: 'taskloom', version: '0.1.0' };

type McpTransport = StdioClientTransport | StreamableHTTPClientTransport | SSEClientTransport;

export class MCPSession implements ToolSession {
  private serverId: string;
  private client: Client;

  constructor(serverId: string, client: Client) {
    this.serverId = serverId;
    this.client = client;
  }

  async listTools(signal?: AbortSignal): Promise<RawTool[]> {
    const response = await this.client.listTools(undefined, { signal });
    return response.tools.map((tool) => ({
      name: tool.name,
      description: tool.description || '',
      inputSchema: { ...tool.inputSchema },
    }));
  }

  /**
   * Call a tool. Aborting the signal sends a cancellation notice to the server.
   */
  async callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<RawCallResult> {
    getLogger().debug('Calling MCP tool', { serverId: this.serverId, toolName: name });

    const result = await this.client.callTool({ name, arguments: args }, undefined, { signal });
    return {
      isError: result.isError === true,
      payload: extractPayload(result.content),
    };
  }

  async close(): Promise<void> {
    await this.client.close();
    getLogger().debug('Disconnected from MCP server', { serverId: this.serverId });
  }
}

/**
 * First content block of a tool result: parsed JSON when possible, else text
 */
export function extractPayload(content: unknown): unknown {
  if (!Array.isArray(content) || content.length === 0) {
    return content;
  }

  const first: unknown = content[0];
  if (isRecord(first) && typeof first.text === 'string') {
    try {
      return JSON.parse(first.text);
    } catch {
      return first.text;
    }
  }
  return first;
}

/**
 * Infer the transport when a spec leaves it generic
 */
export function detectTransport(spec: ServerSpec): 'stdio' | 'http' | 'sse' {
  if (spec.transport === 'stdio' || spec.transport === 'http' || spec.transport === 'sse') {
    return spec.transport;
  }
  if (/^https?:\/\//.test(spec.endpoint)) {
    return spec.endpoint.endsWith('/sse') ? 'sse' : 'http';
  }
  return 'stdio';
}

function createTransport(spec: ServerSpec): McpTransport {
  switch (detectTransport(spec)) {
    case 'stdio': {
      const [command, ...inlineArgs] = spec.endpoint.split(/\s+/).filter((part) => part.length > 0);
      if (!command) {
        throw new ToolError('not_configured', `Server ${spec.serverId} has no command`);
      }
      return new StdioClientTransport({
        command,
        args: [...inlineArgs, ...(spec.args ?? [])],
        env: { ...getDefaultEnvironment(), ...(spec.env ?? {}) },
        stderr: 'ignore',
      });
    }
    case 'sse':
      return new SSEClientTransport(new URL(spec.endpoint));
    case 'http':
      return new StreamableHTTPClientTransport(new URL(spec.endpoint));
  }
}

/**
 * Opens real MCP sessions
 */
export class MCPSessionFactory implements SessionFactory {
  async open(spec: ServerSpec, signal?: AbortSignal): Promise<ToolSession> {
    const logger = getLogger();
    logger.debug('Connecting to MCP server', { serverId: spec.serverId, endpoint: spec.endpoint });

    const client = new Client(CLIENT_INFO, { capabilities: {} });
    await client.connect(createTransport(spec), { signal });

    logger.info('Connected to MCP server', { serverId: spec.serverId });
    return new MCPSession(spec.serverId, client);
  }
}
