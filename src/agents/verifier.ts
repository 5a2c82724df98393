/**
 * LLM Verifier - rule checks first, then a model verdict
 */

import type { ResultBundle, Verdict } from '../types';
import { getLogger } from '../utils/logger';
import { normalizeVerdict } from './capabilities';
import type { AgentCallOptions, Verifier } from './capabilities';
import type { LlmProvider } from './llm-provider';
import { PromptBuilder } from './prompt-builder';
import { ResultValidator } from './result-validator';
import { VerdictSchema, parseStructured } from './schemas';

export class LlmVerifier implements Verifier {
  private provider: LlmProvider;
  private prompts: PromptBuilder;
  private validator: ResultValidator;

  constructor(provider: LlmProvider, validator: ResultValidator = new ResultValidator()) {
    this.provider = provider;
    this.prompts = new PromptBuilder();
    this.validator = validator;
  }

  async verify(bundle: ResultBundle, goal: string, options: AgentCallOptions = {}): Promise<Verdict> {
    const validation = this.validator.validate(bundle);
    if (!validation.valid) {
      getLogger().debug('Result failed rule checks', { errors: validation.errors });
      return normalizeVerdict({ verdict: 'reject', rationale: validation.errors.join('; ') });
    }

    const completion = await this.provider.complete({
      role: 'verifier',
      system: this.prompts.getVerifierSystemPrompt(),
      prompt: this.prompts.buildVerifyPrompt(bundle, goal),
      temperature: 0,
      signal: options.signal,
    });
    options.onUsage?.(completion.usage);

    return normalizeVerdict(parseStructured(VerdictSchema, completion.text, 'verifier'));
  }
}
