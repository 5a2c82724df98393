/**
 * Configuration management for the task orchestrator
 */

import { parse as parseYaml } from 'yaml';
import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import type { Config, CLIOptions } from './types';
import { DEFAULT_DENY_PATTERNS } from './agents/danger-gate';
import { ConfigError } from './errors';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Keys whose children are passed through untouched (environment maps) */
const VERBATIM_KEYS = new Set(['env']);

/**
 * Convert snake_case keys to camelCase recursively
 */
function snakeToCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(snakeToCamel);
  }
  if (isPlainObject(obj)) {
    return Object.fromEntries(
      Object.entries(obj).map(([key, value]) => {
        const camelKey = key.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
        return [camelKey, VERBATIM_KEYS.has(camelKey) ? value : snakeToCamel(value)];
      })
    );
  }
  return obj;
}

const DEFAULT_CONFIG: Config = {
  orchestrator: {
    maxAttempts: 3,
    maxDepth: 5,
    maxNodes: 200,
    minSubgoals: 2,
    nodeConcurrency: 2,
    agentDeadlineMs: 120000,
    temperature: { base: 0.1, step: 0.2, cap: 1.0 },
  },
  broker: {
    defaultDeadlineMs: 60000,
    descriptorTtlMs: 300000,
    poolIdleTtlMs: 120000,
    workerPoolSize: 4,
    reconnectBaseMs: 500,
    reconnectMaxMs: 10000,
    reconnectRetries: 3,
    servers: [],
  },
  agents: {
    model: 'claude-sonnet-4-20250514',
    maxTokens: 4096,
    requestsPerMinute: 50,
    apiKey: undefined,
  },
  danger: {
    deny: [...DEFAULT_DENY_PATTERNS],
    allow: [],
    approvalTimeoutMs: 300000,
  },
  memory: {
    file: 'data/memory.json',
    topK: 3,
    minSimilarity: 0.3,
    consolidationIntervalMs: 300000,
  },
  archive: {
    dir: 'data/runs',
  },
  logging: {
    level: 'info',
    file: 'logs/taskloom.log',
    console: true,
  },
};

// ============================================================================
// Schema
// ============================================================================

const ServerSpecSchema = z.object({
  serverId: z.string().min(1),
  transport: z.enum(['stdio', 'http', 'sse', 'inprocess']),
  endpoint: z.string(),
  enabled: z.boolean().default(true),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  lifecycle: z.enum(['pooled', 'spawn-per-call']).optional(),
  capabilityTags: z.array(z.string()).optional(),
});

const positiveInt = z.number().int().positive();

const ConfigSchema: z.ZodType<Config, z.ZodTypeDef, unknown> = z.object({
  orchestrator: z.object({
    maxAttempts: positiveInt,
    maxDepth: z.number().int().nonnegative(),
    maxNodes: positiveInt,
    minSubgoals: positiveInt,
    nodeConcurrency: positiveInt,
    agentDeadlineMs: positiveInt,
    temperature: z.object({
      base: z.number().min(0),
      step: z.number().min(0),
      cap: z.number().min(0),
    }),
  }),
  broker: z.object({
    defaultDeadlineMs: positiveInt,
    descriptorTtlMs: z.number().int().nonnegative(),
    poolIdleTtlMs: z.number().int().nonnegative(),
    workerPoolSize: positiveInt,
    reconnectBaseMs: positiveInt,
    reconnectMaxMs: positiveInt,
    reconnectRetries: z.number().int().nonnegative(),
    servers: z.array(ServerSpecSchema),
  }),
  agents: z.object({
    model: z.string().min(1),
    maxTokens: positiveInt,
    requestsPerMinute: positiveInt,
    apiKey: z.string().optional(),
  }),
  danger: z.object({
    deny: z.array(z.string()),
    allow: z.array(z.string()),
    approvalTimeoutMs: positiveInt.optional(),
  }),
  memory: z.object({
    file: z.string().optional(),
    topK: positiveInt,
    minSimilarity: z.number().min(0).max(1),
    consolidationIntervalMs: z.number().int().nonnegative(),
  }),
  archive: z.object({
    dir: z.string().optional(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'critical']),
    file: z.string().optional(),
    console: z.boolean(),
  }),
});

/**
 * Deep merge two objects, with source overriding target. Arrays replace.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load configuration from YAML file
 */
function loadConfigFile(path: string): PlainObject {
  if (!existsSync(path)) {
    return {};
  }

  const content = readFileSync(path, 'utf-8');
  const parsed = snakeToCamel(parseYaml(content));
  return isPlainObject(parsed) ? parsed : {};
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): PlainObject {
  const orchestrator: PlainObject = {};
  const agents: PlainObject = {};
  const logging: PlainObject = {};

  if (env.ANTHROPIC_API_KEY) {
    agents.apiKey = env.ANTHROPIC_API_KEY;
  }
  if (env.TASKLOOM_MODEL) {
    agents.model = env.TASKLOOM_MODEL;
  }
  if (env.TASKLOOM_MAX_ATTEMPTS) {
    orchestrator.maxAttempts = parseInt(env.TASKLOOM_MAX_ATTEMPTS, 10);
  }
  if (env.LOG_LEVEL) {
    logging.level = env.LOG_LEVEL;
  }

  // Only non-empty sections
  const config: PlainObject = {};
  if (Object.keys(orchestrator).length > 0) config.orchestrator = orchestrator;
  if (Object.keys(agents).length > 0) config.agents = agents;
  if (Object.keys(logging).length > 0) config.logging = logging;

  return config;
}

/**
 * Load and merge configuration from all sources
 * Priority (highest to lowest): CLI options > Environment > Config file > Defaults
 */
export function loadConfig(options: Partial<CLIOptions> = {}, env: NodeJS.ProcessEnv = process.env): Config {
  let merged: PlainObject = { ...DEFAULT_CONFIG };

  const configPath = options.config || 'config/default.yaml';
  merged = deepMerge(merged, loadConfigFile(configPath));
  merged = deepMerge(merged, loadEnvConfig(env));

  const cli: PlainObject = {};
  if (options.maxAttempts !== undefined) {
    cli.orchestrator = { maxAttempts: options.maxAttempts };
  }
  if (options.model) {
    cli.agents = { model: options.model };
  }
  if (options.verbose) {
    cli.logging = { level: 'debug' };
  }
  merged = deepMerge(merged, cli);

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}

/**
 * Validate configuration and return any errors
 */
export function validateConfig(config: Config, options: { requireApiKey?: boolean } = {}): string[] {
  const errors: string[] = [];
  const { orchestrator, broker } = config;

  if (options.requireApiKey && !config.agents.apiKey) {
    errors.push('ANTHROPIC_API_KEY is required');
  }

  if (orchestrator.minSubgoals < 2) {
    errors.push('minSubgoals must be at least 2');
  }

  if (orchestrator.temperature.base > orchestrator.temperature.cap) {
    errors.push('temperature base must not exceed its cap');
  }

  if (broker.reconnectBaseMs > broker.reconnectMaxMs) {
    errors.push('reconnectBaseMs must not exceed reconnectMaxMs');
  }

  const seen = new Set<string>();
  for (const server of broker.servers) {
    if (seen.has(server.serverId)) {
      errors.push(`duplicate server id "${server.serverId}"`);
    }
    seen.add(server.serverId);

    if (server.transport === 'stdio' && server.endpoint.trim().length === 0) {
      errors.push(`server "${server.serverId}" needs a command`);
    }
    if (server.transport === 'http' || server.transport === 'sse') {
      if (!URL.canParse(server.endpoint)) {
        errors.push(`server "${server.serverId}" endpoint is not a URL`);
      }
    }
  }

  for (const pattern of [...config.danger.deny, ...config.danger.allow]) {
    const regex = /^\/(.+)\/([gimsuy]*)$/.exec(pattern);
    if (regex && !isValidRegex(regex[1], regex[2])) {
      errors.push(`invalid danger pattern ${pattern}`);
    }
  }

  return errors;
}

function isValidRegex(source: string, flags: string): boolean {
  try {
    new RegExp(source, flags);
    return true;
  } catch {
    return false;
  }
}

export { DEFAULT_CONFIG };
