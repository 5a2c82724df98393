/**
 * Prompt Builder - prompts for the planner and verifier roles
 */

import type { ResultBundle, StrategyRecord, ToolDescriptor } from '../types';

export interface PlanPromptInput {
  goal: string;
  contextStack: readonly string[];
  memoryHits: readonly StrategyRecord[];
  rejections: readonly string[];
  tools: readonly ToolDescriptor[];
}

export interface DecomposePromptInput {
  goal: string;
  contextStack: readonly string[];
  failures: readonly StrategyRecord[];
  rejections: readonly string[];
  minSubgoals: number;
}

const PLANNER_SYSTEM = `You are the planning agent of a personal automation assistant.
Given a goal, choose one concrete strategy and the tool calls that carry it out.
Use only the tools listed. Keep calls minimal and ordered; mark a call
"independent": true only when it does not depend on the calls before it.

Reply with a single JSON object:
{"strategy": "<approach>", "tool_calls": [{"server": "<server id>", "tool": "<tool name>", "args": {}, "independent": false}]}`;

const VERIFIER_SYSTEM = `You are the verification agent of a personal automation assistant.
Judge whether the execution result achieves the goal. Approve only when the
evidence shows the goal is met. A rejection must state what is wrong.

Reply with a single JSON object:
{"verdict": "approve" | "reject" | "need_more_info", "rationale": "<why>", "remediation": "<optional next step>"}`;

const MAX_SNIPPET = 500;

function truncate(text: string, max = MAX_SNIPPET): string {
  return text.length > max ? text.substring(0, max) + '...' : text;
}

export class PromptBuilder {
  getPlannerSystemPrompt(): string {
    return PLANNER_SYSTEM;
  }

  getVerifierSystemPrompt(): string {
    return VERIFIER_SYSTEM;
  }

  /**
   * Build a prompt for choosing a strategy
   */
  buildPlanPrompt(input: PlanPromptInput): string {
    const sections: string[] = [];

    sections.push(`# Goal: ${input.goal}`);
    sections.push('');

    if (input.contextStack.length > 0) {
      sections.push('## Context');
      sections.push('This goal is a step of the following larger goals (outermost first):');
      sections.push(input.contextStack.map((g) => `- ${g}`).join('\n'));
      sections.push('');
    }

    sections.push('## Available Tools');
    if (input.tools.length === 0) {
      sections.push('No tools are available. Answer with a strategy and no tool calls.');
    } else {
      for (const tool of input.tools) {
        sections.push(`- ${tool.serverId}/${tool.toolName}: ${tool.description}`);
        sections.push(`  input schema: ${JSON.stringify(tool.inputSchema)}`);
      }
    }
    sections.push('');

    if (input.memoryHits.length > 0) {
      sections.push('## Past Strategies For Similar Goals');
      for (const hit of input.memoryHits) {
        sections.push(`- [${hit.outcome}] ${hit.goal}: ${truncate(hit.narrative)}`);
      }
      sections.push('');
    }

    if (input.rejections.length > 0) {
      sections.push('## Previous Attempts Were Rejected');
      sections.push('Choose a different approach that addresses these rejections:');
      input.rejections.forEach((r, i) => sections.push(`${i + 1}. ${r}`));
      sections.push('');
    }

    sections.push('---');
    sections.push('Reply with the JSON object only.');

    return sections.join('\n');
  }

  /**
   * Build a prompt for splitting a goal that keeps failing
   */
  buildDecomposePrompt(input: DecomposePromptInput): string {
    const sections: string[] = [];

    sections.push(`# Goal: ${input.goal}`);
    sections.push('');
    sections.push(
      `Direct attempts at this goal failed. Split it into at least ${input.minSubgoals} smaller subgoals ` +
        'that together achieve it, in execution order.'
    );
    sections.push('');

    if (input.contextStack.length > 0) {
      sections.push('## Context');
      sections.push(input.contextStack.map((g) => `- ${g}`).join('\n'));
      sections.push('');
    }

    if (input.rejections.length > 0) {
      sections.push('## Why Attempts Failed');
      sections.push(input.rejections.map((r) => `- ${r}`).join('\n'));
      sections.push('');
    }

    if (input.failures.length > 0) {
      sections.push('## Similar Goals That Failed Before');
      for (const failure of input.failures) {
        sections.push(`- ${failure.goal}: ${truncate(failure.narrative)}`);
      }
      sections.push('');
    }

    sections.push('---');
    sections.push('Reply with a single JSON object:');
    sections.push('{"subgoals": [{"goal": "<subgoal>", "independent": false}]}');
    sections.push('Mark a subgoal independent only when it can run alongside its neighbours.');

    return sections.join('\n');
  }

  /**
   * Build a verification prompt
   */
  buildVerifyPrompt(bundle: ResultBundle, goal: string): string {
    const failed = bundle.calls.filter(({ result }) => !result.success).length;

    return `Please verify the following result for goal "${goal}":

## Strategy
${bundle.strategy}

## Tool Calls
- Total: ${bundle.calls.length}
- Failed: ${failed}

## Output
${bundle.output}

## Criteria
1. Does the output show the goal was achieved?
2. Are there errors or missing steps?

Reply with the JSON object only.`;
  }
}
