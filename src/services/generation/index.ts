/**
 * Generation Module
 *
 * Prompt construction, provider access and reply parsing for roadmaps.
 *
 * @module services/generation
 */

export {
  GenerationClient,
  type GenerationClientOptions,
  type RoadmapGenerator
} from './generation-client.js';
export {
  OpenAiProvider,
  classifyProviderError,
  type ChatCompletionsClient,
  type ChatReply,
  type ClientFactory,
  type OpenAiProviderOptions
} from './openai-provider.js';
export type { CompletionProvider, CompletionRequest } from './provider.js';
export { SYSTEM_PROMPT, buildUserPrompt, buildCompletionRequest } from './prompt.js';
export { parseRoadmapReply, extractJson, DEFAULT_MAX_RESPONSE_CHARS } from './response-parser.js';
