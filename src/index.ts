/**
 * Library entry point
 */

export * from './types';
export * from './errors';
export { loadConfig, validateConfig, DEFAULT_CONFIG } from './config';
export { AssistantService, generateRunId } from './service';
export type { AssistantServiceDeps, SubmitOptions } from './service';
export { AuditLog, digestPayload } from './audit/audit-log';
export type { AuditFilter, AuditInput } from './audit/audit-log';
export { RunArchive } from './state/run-archive';
export { writeJsonAtomic } from './state/atomic';
export * from './agents';
export * from './core';
export * from './mcp';
export * from './memory';
export * from './rate-limit';
export * from './utils';
