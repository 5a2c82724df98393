/**
 * Core types and interfaces for the task orchestrator
 */

// ============================================================================
// Task Tree Types
// ============================================================================

export type TaskStatus =
  | 'pending'
  | 'active'
  | 'success'
  | 'failed'
  | 'suspended'
  | 'decomposed'
  | 'cancelled';

export interface TaskConstraints {
  /** Absolute deadline (epoch ms) for the node and everything it dispatches */
  deadline?: number;
  allowDangerousOps: boolean;
}

export interface TaskNode {
  id: string;
  parentId: string | null;
  goal: string;
  status: TaskStatus;
  /** Ancestor goals, root first */
  contextStack: string[];
  attemptCount: number;
  strategy: string;
  toolIntents: ToolCallIntent[];
  constraints: TaskConstraints;
  children: string[];
  depth: number;
  /** May run alongside adjacent independent siblings */
  independent: boolean;
  temperature: number;
  /** Every rejection rationale, oldest first */
  rejections: string[];
  /** Failed with no further recovery */
  exhausted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface SubgoalSpec {
  goal: string;
  independent?: boolean;
}

export interface TaskTree {
  node: TaskNode;
  children: TaskTree[];
}

// ============================================================================
// Tool Types
// ============================================================================

export type TransportKind = 'stdio' | 'http' | 'sse' | 'inprocess';

export type LifecycleKind = 'pooled' | 'spawn-per-call';

export interface ServerSpec {
  serverId: string;
  transport: TransportKind;
  /** Command line for stdio, URL for http/sse, ignored for inprocess */
  endpoint: string;
  enabled: boolean;
  args?: string[];
  env?: Record<string, string>;
  lifecycle?: LifecycleKind;
  capabilityTags?: string[];
}

export interface ToolDescriptor {
  serverId: string;
  toolName: string;
  description: string;
  inputSchema: Record<string, unknown>;
  capabilityTags: string[];
}

export interface ToolCall {
  serverHint?: string;
  toolName: string;
  args: Record<string, unknown>;
  /** Relative budget in milliseconds */
  deadlineMs?: number;
}

export interface ToolCallIntent extends ToolCall {
  id: string;
  /** Runs concurrently with adjacent independent intents */
  independent?: boolean;
}

export type ToolErrorKind = 'not_configured' | 'timeout' | 'remote_error' | 'invalid_args';

export type InvocationErrorKind = ToolErrorKind | 'cancelled' | 'denied';

export interface ToolInvocationResult {
  success: boolean;
  payload?: unknown;
  errorKind?: InvocationErrorKind;
  error?: string;
  durationMs: number;
  serverId?: string;
  toolName: string;
}

// ============================================================================
// Agent Types
// ============================================================================

export interface PlanProposal {
  strategy: string;
  toolIntents: ToolCallIntent[];
  /** Opaque token handed back on the next plan call for the same node */
  continuityToken?: string;
}

export interface HeldCall {
  intentId: string;
  pattern: string;
  approved: boolean;
}

export interface ResultBundle {
  strategy: string;
  calls: Array<{ intent: ToolCallIntent; result: ToolInvocationResult }>;
  /** Calls the danger gate held for approval, in order */
  held: HeldCall[];
  /** Set when the danger gate denied a held call */
  aborted?: { reason: string; intentId: string };
  output: string;
}

export type VerdictKind = 'approve' | 'reject' | 'need_more_info';

export interface Verdict {
  verdict: VerdictKind;
  rationale: string;
  remediation?: string;
}

// ============================================================================
// Memory & Audit Types
// ============================================================================

export type StrategyOutcome = 'success' | 'failed';

export interface StrategyRecord {
  id: string;
  goalFingerprint: string;
  goal: string;
  outcome: StrategyOutcome;
  narrative: string;
  createdAt: string;
  source: 'settlement' | 'consolidation';
}

export type AuditActor =
  | 'graph'
  | 'orchestrator'
  | 'planner'
  | 'executor'
  | 'verifier'
  | 'human'
  | 'gate'
  | 'broker'
  | 'consolidation';

export interface AuditEntry {
  seq: number;
  timestamp: string;
  runId: string;
  nodeId?: string;
  actor: AuditActor;
  action: string;
  payloadDigest: string;
  outcome: string;
  detail?: string;
}

// ============================================================================
// Run Types
// ============================================================================

export type RunStatus = 'running' | 'success' | 'failed' | 'cancelled' | 'aborted';

export interface MetricsSnapshot {
  plans: number;
  executions: number;
  verifications: number;
  approvals: number;
  rejects: number;
  timeouts: number;
  toolCalls: number;
  toolFailures: number;
  decompositions: number;
  llmRequests: number;
  tokensUsed: TokenUsage;
  durationMs: number;
}

export interface RunSnapshot {
  runId: string;
  version: number;
  status: RunStatus;
  tree: TaskTree | null;
  activeNodeIds: string[];
  logs: string[];
  metrics: MetricsSnapshot;
}

export interface RunResult {
  runId: string;
  goal: string;
  status: RunStatus;
  rootId: string;
  tree: TaskTree;
  fatal?: { reason: string; message: string };
  completedAt: string;
}

export interface TokenUsage {
  input: number;
  output: number;
  total: number;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface Config {
  orchestrator: OrchestratorConfig;
  broker: BrokerConfig;
  agents: AgentsConfig;
  danger: DangerConfig;
  memory: MemoryConfig;
  archive: ArchiveConfig;
  logging: LoggingConfig;
}

export interface TemperatureCurve {
  base: number;
  step: number;
  cap: number;
}

export interface OrchestratorConfig {
  maxAttempts: number;
  maxDepth: number;
  maxNodes: number;
  minSubgoals: number;
  nodeConcurrency: number;
  agentDeadlineMs: number;
  temperature: TemperatureCurve;
}

export interface BrokerConfig {
  defaultDeadlineMs: number;
  descriptorTtlMs: number;
  poolIdleTtlMs: number;
  workerPoolSize: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  reconnectRetries: number;
  servers: ServerSpec[];
}

export interface AgentsConfig {
  model: string;
  maxTokens: number;
  requestsPerMinute: number;
  apiKey?: string;
}

export interface DangerConfig {
  deny: string[];
  allow: string[];
  /** How long a held call waits for a human answer before it is denied */
  approvalTimeoutMs?: number;
}

export interface MemoryConfig {
  file?: string;
  topK: number;
  minSimilarity: number;
  consolidationIntervalMs: number;
}

export interface ArchiveConfig {
  dir?: string;
}

export interface LoggingConfig {
  level: LogLevel;
  file?: string;
  console: boolean;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIOptions {
  config?: string;
  maxAttempts?: number;
  model?: string;
  allowDangerous: boolean;
  verbose: boolean;
}
