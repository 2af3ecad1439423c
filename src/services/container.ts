// Wires the services together from a loaded configuration

import { AppConfig } from './config/config-service.js';
import { GenerationClient } from './generation/generation-client.js';
import { OpenAiProvider } from './generation/openai-provider.js';
import { CompletionProvider } from './generation/provider.js';
import { SubmissionService } from './orchestrator/submission-service.js';
import { RoadmapStore } from './storage/roadmap-store.js';
import { Logger, logger as defaultLogger } from '../core/logger.js';

export interface Services {
  store: RoadmapStore;
  generator: GenerationClient;
  submissions: SubmissionService;
  close(): Promise<void>;
}

export interface ServiceOverrides {
  provider?: CompletionProvider;
  logger?: Logger;
}

/**
 * Opens the store, creates its tables and builds the generation pipeline
 */
export async function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Promise<Services> {
  const logger = overrides.logger ?? defaultLogger;
  const store = RoadmapStore.open(config.databaseUrl);
  try {
    await store.initialize();
  } catch (error) {
    await store.close();
    throw error;
  }

  const provider = overrides.provider ?? new OpenAiProvider({
    apiKey: config.openaiApiKey,
    settings: config.generation
  });
  const generator = new GenerationClient(provider, {
    maxRetries: config.generation.maxRetries,
    maxResponseChars: config.generation.maxResponseChars,
    logger
  });
  const submissions = new SubmissionService({ generator, repository: store, logger });

  return {
    store,
    generator,
    submissions,
    close: () => store.close()
  };
}
