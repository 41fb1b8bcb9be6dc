/**
 * Anthropic Messages API as the AI capability.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import { AIUnavailableError, ContextTooLargeError, errorMessage } from '../../../common/errors.js';
import { moduleLogger, type Logger } from '../../../core/logger.js';
import { estimateTokens, type AICapability, type GenerateOptions, type GenerateResult } from './ai.types.js';

/** The fields of a Messages API response read here. */
export interface CompletionMessage {
  model: string;
  content: ReadonlyArray<{ type: string; text?: string }>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

/** The part of the SDK client this module calls. */
export interface MessagesApi {
  create(body: MessageCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<CompletionMessage>;
}

export interface AnthropicCapabilityOptions {
  messages: MessagesApi;
  model: string;
  maxOutputTokens: number;
  logger?: Logger;
}

const PROMPT_TOO_LONG = /prompt is too long|context (window|length)|too many tokens/i;

export class AnthropicCapability implements AICapability {
  private readonly messages: MessagesApi;
  private readonly model: string;
  private readonly maxOutputTokens: number;
  private readonly log: Logger;

  constructor(options: AnthropicCapabilityOptions) {
    this.messages = options.messages;
    this.model = options.model;
    this.maxOutputTokens = options.maxOutputTokens;
    this.log = options.logger ?? moduleLogger('anthropic');
  }

  static fromApiKey(apiKey: string, model: string, maxOutputTokens: number, timeoutMs: number): AnthropicCapability {
    const client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 2 });
    return new AnthropicCapability({ messages: client.messages, model, maxOutputTokens });
  }

  async generate(prompt: string, options: GenerateOptions): Promise<GenerateResult> {
    const estimated = estimateTokens(prompt) + estimateTokens(options.system ?? '');
    if (estimated > options.maxContextTokens) {
      throw new ContextTooLargeError(
        `Prompt estimated at ${estimated} tokens exceeds ${options.maxContextTokens}`,
        estimated,
        options.maxContextTokens,
      );
    }

    const maxTokens = options.maxOutputTokens ?? this.maxOutputTokens;
    this.log.debug({ model: this.model, estimatedTokens: estimated, maxTokens }, 'calling messages API');

    let response: CompletionMessage;
    try {
      response = await this.messages.create(
        {
          model: this.model,
          max_tokens: maxTokens,
          ...(options.system ? { system: options.system } : {}),
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: options.signal },
      );
    } catch (err) {
      throw this.mapError(err, estimated, options.maxContextTokens);
    }

    const text = response.content
      .flatMap((block) => (block.type === 'text' && block.text !== undefined ? [block.text] : []))
      .join('\n')
      .trim();
    if (!text) {
      throw new AIUnavailableError(`Empty completion (stop_reason: ${response.stop_reason ?? 'none'})`);
    }

    this.log.info(
      {
        model: response.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        stopReason: response.stop_reason,
      },
      'completion received',
    );

    return { text, model: response.model };
  }

  private mapError(err: unknown, estimated: number, maxContextTokens: number): Error {
    if (err instanceof Anthropic.APIError && err.status === 400 && PROMPT_TOO_LONG.test(err.message)) {
      return new ContextTooLargeError(err.message, estimated, maxContextTokens);
    }
    if (err instanceof Anthropic.APIError) {
      return new AIUnavailableError(`Anthropic API error${err.status ? ` (HTTP ${err.status})` : ''}: ${err.message}`, err);
    }
    return new AIUnavailableError(`Anthropic call failed: ${errorMessage(err)}`, err);
  }
}
