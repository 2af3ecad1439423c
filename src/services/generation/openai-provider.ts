/**
 * OpenAI Provider
 *
 * Chat Completions client for roadmap generation. The SDK client is built on
 * first use and reused for the lifetime of the provider.
 */

import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { GenerationError } from '../../core/errors.js';
import { GenerationSettings } from '../config/config-service.js';
import { CompletionProvider, CompletionRequest } from './provider.js';

/**
 * The part of a chat completion the provider reads
 */
export interface ChatReply {
  choices: Array<{
    message: { content: string | null };
    finish_reason?: string | null;
  }>;
}

/**
 * The part of the SDK client the provider calls
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): PromiseLike<ChatReply>;
    };
  };
}

export interface ClientOptions {
  apiKey: string;
  timeout: number;
  maxRetries: number;
}

export type ClientFactory = (options: ClientOptions) => ChatCompletionsClient;

export interface OpenAiProviderOptions {
  apiKey: string;
  settings: Pick<GenerationSettings, 'model' | 'maxTokens' | 'timeoutMs'>;
  /** Overrides SDK client construction */
  clientFactory?: ClientFactory;
}

const defaultClientFactory: ClientFactory = options => new OpenAI(options);

/**
 * HTTP statuses worth retrying: timeouts, conflicts, rate limits, server errors
 */
function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

/**
 * Maps an SDK failure onto the generation error taxonomy
 */
export function classifyProviderError(error: unknown): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }

  // Connection errors carry no status; timeouts are a subclass
  if (error instanceof APIConnectionTimeoutError) {
    return new GenerationError('ProviderUnavailable', 'Provider request timed out');
  }
  if (error instanceof APIConnectionError) {
    return new GenerationError('ProviderUnavailable', `Could not reach provider: ${error.message}`);
  }

  if (error instanceof APIError) {
    const status = error.status;
    const context = { status, code: error.code ?? undefined };
    if (status !== undefined && isTransientStatus(status) && error.code !== 'insufficient_quota') {
      return new GenerationError('ProviderUnavailable', `Provider temporarily unavailable: ${error.message}`, context);
    }
    return new GenerationError('ProviderRejected', `Provider rejected the request: ${error.message}`, context);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new GenerationError('ProviderRejected', `Provider call failed: ${message}`);
}

/**
 * OpenAI Chat Completions provider
 */
export class OpenAiProvider implements CompletionProvider {
  readonly name = 'openai';
  private client: ChatCompletionsClient | null = null;
  private readonly clientFactory: ClientFactory;

  constructor(private readonly options: OpenAiProviderOptions) {
    this.clientFactory = options.clientFactory ?? defaultClientFactory;
  }

  /**
   * Builds the SDK client once. Retries are left to the generation client.
   */
  private getClient(): ChatCompletionsClient {
    if (this.client === null) {
      if (!this.options.apiKey) {
        throw new GenerationError('ProviderRejected', 'OpenAI API key is not configured');
      }
      this.client = this.clientFactory({
        apiKey: this.options.apiKey,
        timeout: this.options.settings.timeoutMs,
        maxRetries: 0
      });
    }
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const client = this.getClient();
    const { model, maxTokens } = this.options.settings;

    let reply: ChatReply;
    try {
      reply = await client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user }
        ],
        max_tokens: maxTokens,
        response_format: { type: 'json_object' }
      });
    } catch (error) {
      throw classifyProviderError(error);
    }

    const choice = reply.choices[0];
    if (!choice || choice.message.content === null || choice.message.content.trim() === '') {
      throw new GenerationError('MalformedResponse', 'Provider returned an empty reply');
    }
    if (choice.finish_reason === 'length') {
      throw new GenerationError('MalformedResponse', `Provider reply was cut off at ${maxTokens} tokens`);
    }
    return choice.message.content;
  }
}
