/**
 * Backend-neutral tool session contract
 */

import type { ServerSpec } from '../types';

export interface RawTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface RawCallResult {
  isError: boolean;
  payload: unknown;
}

/**
 * One live connection to a tool server
 */
export interface ToolSession {
  listTools(signal?: AbortSignal): Promise<RawTool[]>;
  callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<RawCallResult>;
  close(): Promise<void>;
}

/**
 * Opens sessions for a server spec
 */
export interface SessionFactory {
  open(spec: ServerSpec, signal?: AbortSignal): Promise<ToolSession>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text of a tool result payload for logs and verification prompts
 */
export function payloadText(payload: unknown): string {
  if (payload === undefined || payload === null) return '';
  if (typeof payload === 'string') return payload;
  return JSON.stringify(payload);
}
