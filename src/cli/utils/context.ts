// Shared setup for commands that need configuration and services

import { Logger } from '../../core/logger.js';
import { AppConfig, loadConfig } from '../../services/config/config-service.js';
import { createServices, Services } from '../../services/container.js';

export type GlobalOptions = {
  config?: string;
};

/**
 * Loads configuration and applies the log level
 */
export async function loadCliConfig(options: GlobalOptions): Promise<AppConfig> {
  const config = await loadConfig({ configPath: options.config });
  Logger.configure({ level: config.logLevel });
  return config;
}

/**
 * Runs a command body against freshly opened services, closing them afterwards
 */
export async function withServices<T>(
  options: GlobalOptions,
  fn: (services: Services, config: AppConfig) => Promise<T>
): Promise<T> {
  const config = await loadCliConfig(options);
  const services = await createServices(config);
  try {
    return await fn(services, config);
  } finally {
    await services.close();
  }
}
