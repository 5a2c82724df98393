/**
 * Tool broker exports
 */

export { ToolBroker } from './broker';
export type { ToolBrokerOptions } from './broker';
export { MCPSession, MCPSessionFactory, detectTransport, extractPayload } from './client';
export { InProcessSessionFactory } from './in-process';
export type { InProcessTool } from './in-process';
export { PooledLifecycle, SpawnPerCallLifecycle, createLifecycle } from './lifecycle';
export type { ConnectionLifecycle } from './lifecycle';
export { DescriptorCache } from './descriptor-cache';
export { classifyError, isConnectionFailure } from './errors';
export { checkArgs } from './arg-check';
export type { RawCallResult, RawTool, SessionFactory, ToolSession } from './session';
