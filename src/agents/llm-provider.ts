/**
 * LLM providers behind one completion call
 */

import Anthropic from '@anthropic-ai/sdk';
import type { AgentsConfig, TokenUsage } from '../types';
import { AgentError } from '../errors';
import { TokenBucket } from '../rate-limit/token-bucket';
import { getLogger } from '../utils/logger';

export interface CompletionRequest {
  role: AgentError['role'];
  system: string;
  prompt: string;
  temperature: number;
  signal?: AbortSignal;
}

export interface Completion {
  text: string;
  usage: TokenUsage;
  /** Provider response id, usable as a continuity token */
  id?: string;
}

export interface LlmProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<Completion>;
}

/**
 * Anthropic Messages API provider, paced by a per-minute token bucket
 */
export class AnthropicProvider implements LlmProvider {
  readonly name = 'anthropic';
  private client: Anthropic;
  private config: AgentsConfig;
  private bucket: TokenBucket;

  constructor(config: AgentsConfig, client?: Anthropic) {
    this.config = config;
    this.client = client ?? new Anthropic({ apiKey: config.apiKey });
    this.bucket = new TokenBucket({
      capacity: Math.max(1, config.requestsPerMinute),
      refillPerMinute: config.requestsPerMinute,
    });
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    const logger = getLogger();
    await this.bucket.acquire(1, request.signal);

    logger.debug('Requesting completion', {
      role: request.role,
      model: this.config.model,
      temperature: request.temperature,
    });

    try {
      const response = await this.client.messages.create(
        {
          model: this.config.model,
          max_tokens: this.config.maxTokens,
          temperature: Math.min(1, Math.max(0, request.temperature)),
          system: request.system,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal: request.signal }
      );

      const text = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('\n');

      return {
        text,
        id: response.id,
        usage: {
          input: response.usage.input_tokens,
          output: response.usage.output_tokens,
          total: response.usage.input_tokens + response.usage.output_tokens,
        },
      };
    } catch (error) {
      throw this.handleApiError(request.role, error);
    }
  }

  /**
   * Convert SDK errors into AgentError
   */
  private handleApiError(role: AgentError['role'], error: unknown): AgentError {
    if (error instanceof Anthropic.APIUserAbortError) {
      return new AgentError(role, 'Request aborted');
    }

    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new AgentError(role, 'Request timed out', true);
    }

    if (error instanceof Anthropic.APIError) {
      const status = error.status;
      if (status === 429) {
        getLogger().warn('Model rate limit hit', { role });
        return new AgentError(role, 'Rate limit exceeded');
      }
      if (status === 529) {
        return new AgentError(role, 'API is temporarily overloaded');
      }
      return new AgentError(role, `API error${status ? ` ${status}` : ''}: ${error.message}`);
    }

    return new AgentError(role, error instanceof Error ? error.message : 'Unknown error');
  }
}
