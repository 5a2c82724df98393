/**
 * Classification of tool invocation failures
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { InvocationErrorKind } from '../types';
import { ToolError } from '../errors';
import { Cancelled, DeadlineExceeded } from '../utils/deadline';

export function classifyError(error: unknown): InvocationErrorKind {
  if (error instanceof Cancelled) return 'cancelled';
  if (error instanceof DeadlineExceeded) return 'timeout';
  if (error instanceof ToolError) return error.kind;
  if (error instanceof McpError) {
    switch (error.code) {
      case ErrorCode.InvalidParams:
        return 'invalid_args';
      case ErrorCode.RequestTimeout:
        return 'timeout';
      case ErrorCode.MethodNotFound:
        return 'not_configured';
      default:
        return 'remote_error';
    }
  }
  return 'remote_error';
}

/**
 * True when the connection itself is suspect and a pooled session should
 * be dropped. Call-level errors leave the session alone.
 */
export function isConnectionFailure(error: unknown): boolean {
  if (error instanceof Cancelled || error instanceof DeadlineExceeded || error instanceof ToolError) {
    return false;
  }
  if (error instanceof McpError) {
    return error.code === ErrorCode.ConnectionClosed;
  }
  return true;
}
