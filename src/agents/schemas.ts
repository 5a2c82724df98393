/**
 * Structured agent outputs
 *
 * Models are asked for JSON; replies are cut down to the JSON payload and
 * validated here before anything reaches the task graph.
 */

import { z } from 'zod';
import { AgentError } from '../errors';

// ============================================================================
// Plan
// ============================================================================

export const ToolCallSchema = z.object({
  server: z.string().min(1).optional(),
  tool: z.string().min(1),
  args: z.record(z.unknown()).default({}),
  independent: z.boolean().optional(),
  deadline_ms: z.number().int().positive().optional(),
});

export const PlanSchema = z.object({
  strategy: z.string().min(1),
  tool_calls: z.array(ToolCallSchema).default([]),
});

// ============================================================================
// Decomposition
// ============================================================================

export const SubgoalsSchema = z.object({
  subgoals: z.array(
    z.object({
      goal: z.string().min(1),
      independent: z.boolean().optional(),
    })
  ),
});

// ============================================================================
// Verdict
// ============================================================================

export const VerdictSchema = z.object({
  verdict: z.enum(['approve', 'reject', 'need_more_info']),
  rationale: z.string().default(''),
  remediation: z.string().optional(),
});

// ============================================================================
// Parsing
// ============================================================================

/**
 * The JSON object embedded in a model reply: a ```json fence, the bare
 * reply, or the outermost braces.
 */
export function extractJsonPayload(text: string): string {
  const fenced = /```(?:json)?\s*\n([\s\S]*?)```/.exec(text);
  const trimmed = (fenced ? fenced[1] : text).trim();
  if (trimmed.startsWith('{')) {
    return trimmed;
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new Error('No JSON payload found in response');
  }
  return trimmed.slice(start, end + 1);
}

export function parseStructured<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  text: string,
  role: AgentError['role']
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonPayload(text));
  } catch (error) {
    throw new AgentError(role, `Unparseable ${role} reply: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new AgentError(role, `Invalid ${role} reply: ${issues.join('; ')}`);
  }
  return parsed.data;
}
