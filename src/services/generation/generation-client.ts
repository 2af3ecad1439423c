/**
 * Generation Client
 *
 * Builds the roadmap prompt, calls the provider and parses the reply.
 * Transient provider failures get a bounded number of extra attempts;
 * rejected requests and malformed replies fail immediately.
 */

import { setTimeout as sleep } from 'timers/promises';
import { GenerationError } from '../../core/errors.js';
import { Logger, logger as defaultLogger } from '../../core/logger.js';
import { GeneratedRoadmap, GenerationRequest } from '../../models/roadmap.js';
import { CompletionProvider } from './provider.js';
import { buildCompletionRequest } from './prompt.js';
import { DEFAULT_MAX_RESPONSE_CHARS, parseRoadmapReply } from './response-parser.js';

export interface GenerationClientOptions {
  /** Extra attempts after a ProviderUnavailable failure (default 1) */
  maxRetries?: number;
  /** Pause before each extra attempt (default 500ms) */
  retryDelayMs?: number;
  maxResponseChars?: number;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Anything that can turn a request into roadmap content
 */
export interface RoadmapGenerator {
  generate(request: GenerationRequest): Promise<GeneratedRoadmap>;
}

export class GenerationClient implements RoadmapGenerator {
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly maxResponseChars: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(private readonly provider: CompletionProvider, options: GenerationClientOptions = {}) {
    this.maxRetries = Math.max(0, options.maxRetries ?? 1);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? 500);
    this.maxResponseChars = options.maxResponseChars ?? DEFAULT_MAX_RESPONSE_CHARS;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Generates a three-phase roadmap for the organization
   *
   * @throws GenerationError
   */
  async generate(request: GenerationRequest): Promise<GeneratedRoadmap> {
    const completion = buildCompletionRequest(request, this.clock());
    const attempts = this.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      this.logger.debug('Requesting roadmap', {
        provider: this.provider.name,
        organization: request.organizationName,
        attempt
      });

      try {
        const content = await this.provider.complete(completion);
        return parseRoadmapReply(content, this.maxResponseChars);
      } catch (error) {
        const failure = error instanceof GenerationError
          ? error
          : new GenerationError(
            'ProviderRejected',
            `Provider call failed: ${error instanceof Error ? error.message : String(error)}`
          );

        if (failure.retryable && attempt < attempts) {
          this.logger.warn('Provider unavailable, retrying', {
            provider: this.provider.name,
            attempt,
            reason: failure.message
          });
          if (this.retryDelayMs > 0) {
            await sleep(this.retryDelayMs);
          }
          continue;
        }

        this.logger.error('Roadmap generation failed', {
          provider: this.provider.name,
          organization: request.organizationName,
          kind: failure.kind,
          attempts: attempt,
          reason: failure.message
        });
        throw failure;
      }
    }
  }
}
