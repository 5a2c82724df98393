/**
 * Tool Broker - one calling convention over every configured tool server
 */

import type { BrokerConfig, ServerSpec, ToolCall, ToolDescriptor, ToolInvocationResult } from '../types';
import { ToolError, errorMessage } from '../errors';
import { withDeadline } from '../utils/deadline';
import { getLogger } from '../utils/logger';
import { checkArgs } from './arg-check';
import { DescriptorCache } from './descriptor-cache';
import { classifyError } from './errors';
import { createLifecycle } from './lifecycle';
import type { ConnectionLifecycle } from './lifecycle';
import { payloadText } from './session';
import type { SessionFactory } from './session';

export interface ToolBrokerOptions {
  /** Clock for descriptor TTLs */
  now?: () => number;
}

export class ToolBroker {
  private config: BrokerConfig;
  private factory: SessionFactory;
  private servers: Map<string, ServerSpec>;
  private lifecycles: Map<string, ConnectionLifecycle>;
  private cache: DescriptorCache;

  constructor(config: BrokerConfig, factory: SessionFactory, options: ToolBrokerOptions = {}) {
    this.config = config;
    this.factory = factory;
    this.servers = new Map(config.servers.map((spec) => [spec.serverId, spec]));
    this.lifecycles = new Map();
    this.cache = new DescriptorCache(config.descriptorTtlMs, options.now);
  }

  listServers(): ServerSpec[] {
    return Array.from(this.servers.values());
  }

  /**
   * Tool descriptors for one server, or for every enabled server. When
   * listing all, a server that fails is logged and left out.
   */
  async discover(serverId?: string): Promise<ToolDescriptor[]> {
    if (serverId !== undefined) {
      return this.discoverServer(this.requireServer(serverId));
    }

    const enabled = this.listServers().filter((spec) => spec.enabled);
    const results = await Promise.allSettled(enabled.map((spec) => this.discoverServer(spec)));

    const descriptors: ToolDescriptor[] = [];
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        descriptors.push(...result.value);
      } else {
        getLogger().toolEvent('failed', {
          serverId: enabled[i].serverId,
          stage: 'discover',
          error: errorMessage(result.reason),
        });
      }
    });
    return descriptors;
  }

  /**
   * Drop cached descriptors so the next lookup asks the server again
   */
  invalidate(serverId?: string): void {
    this.cache.invalidate(serverId);
  }

  /**
   * Run one tool call. Never throws: every failure comes back classified.
   */
  async invoke(call: ToolCall, signal?: AbortSignal): Promise<ToolInvocationResult> {
    const logger = getLogger();
    const started = Date.now();
    const deadlineMs = call.deadlineMs ?? this.config.defaultDeadlineMs;
    let serverId: string | undefined = call.serverHint;

    try {
      const payload = await withDeadline(
        async (callSignal) => {
          const descriptor = await this.resolve(call);
          serverId = descriptor.serverId;

          const problems = checkArgs(descriptor.inputSchema, call.args);
          if (problems.length > 0) {
            throw new ToolError('invalid_args', problems.join('; '));
          }

          const spec = this.requireServer(descriptor.serverId);
          const raw = await this.lifecycleFor(spec).withSession(
            (session) => session.callTool(call.toolName, call.args, callSignal),
            callSignal
          );
          if (raw.isError) {
            throw new ToolError('remote_error', payloadText(raw.payload) || `${call.toolName} reported an error`);
          }
          return raw.payload;
        },
        deadlineMs,
        `${call.serverHint ?? 'tool'}:${call.toolName}`,
        signal
      );

      const durationMs = Date.now() - started;
      logger.toolEvent('called', { serverId, toolName: call.toolName, durationMs });
      return { success: true, payload, durationMs, serverId, toolName: call.toolName };
    } catch (error) {
      const durationMs = Date.now() - started;
      const errorKind = classifyError(error);
      logger.toolEvent(errorKind === 'timeout' ? 'timeout' : 'failed', {
        serverId,
        toolName: call.toolName,
        errorKind,
        durationMs,
        error: errorMessage(error),
      });
      return {
        success: false,
        errorKind,
        error: errorMessage(error),
        durationMs,
        serverId,
        toolName: call.toolName,
      };
    }
  }

  /**
   * Release every session
   */
  async close(): Promise<void> {
    const lifecycles = Array.from(this.lifecycles.values());
    this.lifecycles.clear();
    await Promise.all(lifecycles.map((lifecycle) => lifecycle.close()));
  }

  private async resolve(call: ToolCall): Promise<ToolDescriptor> {
    if (call.serverHint !== undefined) {
      const descriptors = await this.discoverServer(this.requireServer(call.serverHint));
      const match = descriptors.find((d) => d.toolName === call.toolName);
      if (!match) {
        throw new ToolError('not_configured', `Tool ${call.toolName} not offered by ${call.serverHint}`);
      }
      return match;
    }

    for (const spec of this.listServers()) {
      if (!spec.enabled) continue;
      let descriptors: ToolDescriptor[];
      try {
        descriptors = await this.discoverServer(spec);
      } catch (error) {
        getLogger().debug('Skipping server during tool lookup', {
          serverId: spec.serverId,
          error: errorMessage(error),
        });
        continue;
      }
      const match = descriptors.find((d) => d.toolName === call.toolName);
      if (match) {
        return match;
      }
    }

    throw new ToolError('not_configured', `No enabled server offers ${call.toolName}`);
  }

  private requireServer(serverId: string): ServerSpec {
    const spec = this.servers.get(serverId);
    if (!spec) {
      throw new ToolError('not_configured', `Unknown server: ${serverId}`);
    }
    if (!spec.enabled) {
      throw new ToolError('not_configured', `Server disabled: ${serverId}`);
    }
    return spec;
  }

  private discoverServer(spec: ServerSpec): Promise<ToolDescriptor[]> {
    return this.cache.get(spec.serverId, async () => {
      const tools = await this.lifecycleFor(spec).withSession((session) => session.listTools());
      getLogger().toolEvent('discovered', { serverId: spec.serverId, count: tools.length });
      return tools.map((tool) => ({
        serverId: spec.serverId,
        toolName: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
        capabilityTags: spec.capabilityTags ?? [],
      }));
    });
  }

  private lifecycleFor(spec: ServerSpec): ConnectionLifecycle {
    let lifecycle = this.lifecycles.get(spec.serverId);
    if (!lifecycle) {
      lifecycle = createLifecycle(spec, this.factory, this.config);
      this.lifecycles.set(spec.serverId, lifecycle);
    }
    return lifecycle;
  }
}
