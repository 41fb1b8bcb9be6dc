/**
 * AI capability: provider-agnostic.
 *
 * Implementations throw AIUnavailableError for anything transient
 * (timeouts, rate limits, outages) and ContextTooLargeError when the prompt
 * does not fit.
 */

import { AIUnavailableError } from '../../../common/errors.js';

export interface GenerateOptions {
  maxContextTokens: number;
  maxOutputTokens?: number;
  system?: string;
  signal?: AbortSignal;
}

export interface GenerateResult {
  text: string;
  model: string;
}

export interface AICapability {
  generate(prompt: string, options: GenerateOptions): Promise<GenerateResult>;
}

/** Rough token count: ~4 characters per token for English prose and numbers. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** Stand-in used when no AI credentials are configured; everything goes to the backlog. */
export class UnconfiguredAICapability implements AICapability {
  constructor(private readonly reason = 'AI capability not configured') {}

  async generate(): Promise<GenerateResult> {
    throw new AIUnavailableError(this.reason);
  }
}
