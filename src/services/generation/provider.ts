// Provider abstraction for text generation

/**
 * A single prompt sent to the provider
 */
export interface CompletionRequest {
  /** Instructions fixing the reply format */
  system: string;
  /** Organization-specific request */
  user: string;
}

/**
 * Hosted text-generation API.
 *
 * Implementations return the raw reply text and throw a GenerationError
 * classified as ProviderUnavailable or ProviderRejected on failure.
 */
export interface CompletionProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}
