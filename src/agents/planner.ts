/**
 * LLM Planner - strategies and decompositions from a language model
 */

import type { PlanProposal, StrategyRecord, SubgoalSpec, ToolDescriptor } from '../types';
import { errorMessage } from '../errors';
import { getLogger } from '../utils/logger';
import type { AgentCallOptions, PlanOptions, Planner } from './capabilities';
import type { LlmProvider } from './llm-provider';
import { PromptBuilder } from './prompt-builder';
import { PlanSchema, SubgoalsSchema, parseStructured } from './schemas';

export type ToolCatalog = () => Promise<ToolDescriptor[]>;

interface LlmPlannerOptions {
  minSubgoals: number;
  decomposeTemperature?: number;
}

export class LlmPlanner implements Planner {
  private provider: LlmProvider;
  private catalog: ToolCatalog;
  private prompts: PromptBuilder;
  private options: Required<LlmPlannerOptions>;

  constructor(provider: LlmProvider, catalog: ToolCatalog, options: LlmPlannerOptions) {
    this.provider = provider;
    this.catalog = catalog;
    this.prompts = new PromptBuilder();
    this.options = { decomposeTemperature: 0.5, ...options };
  }

  async plan(
    goal: string,
    contextStack: readonly string[],
    memoryHits: readonly StrategyRecord[],
    options: PlanOptions
  ): Promise<PlanProposal> {
    const prompt = this.prompts.buildPlanPrompt({
      goal,
      contextStack,
      memoryHits,
      rejections: options.rejections,
      tools: await this.listTools(),
    });

    if (options.continuityToken) {
      getLogger().debug('Replanning after earlier attempt', { previous: options.continuityToken });
    }

    const completion = await this.provider.complete({
      role: 'planner',
      system: this.prompts.getPlannerSystemPrompt(),
      prompt,
      temperature: options.temperature,
      signal: options.signal,
    });
    options.onUsage?.(completion.usage);

    const output = parseStructured(PlanSchema, completion.text, 'planner');
    return {
      strategy: output.strategy,
      toolIntents: output.tool_calls.map((call, i) => ({
        id: `t${i + 1}`,
        serverHint: call.server,
        toolName: call.tool,
        args: call.args,
        independent: call.independent,
        deadlineMs: call.deadline_ms,
      })),
      continuityToken: completion.id,
    };
  }

  async decompose(
    goal: string,
    contextStack: readonly string[],
    failures: readonly StrategyRecord[],
    rejections: readonly string[],
    options: AgentCallOptions = {}
  ): Promise<SubgoalSpec[]> {
    const completion = await this.provider.complete({
      role: 'planner',
      system: this.prompts.getPlannerSystemPrompt(),
      prompt: this.prompts.buildDecomposePrompt({
        goal,
        contextStack,
        failures,
        rejections,
        minSubgoals: this.options.minSubgoals,
      }),
      temperature: this.options.decomposeTemperature,
      signal: options.signal,
    });
    options.onUsage?.(completion.usage);

    return parseStructured(SubgoalsSchema, completion.text, 'planner').subgoals;
  }

  private async listTools(): Promise<ToolDescriptor[]> {
    try {
      return await this.catalog();
    } catch (error) {
      getLogger().warn('Tool catalog unavailable, planning without tools', { error: errorMessage(error) });
      return [];
    }
  }
}
