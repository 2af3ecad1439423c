/**
 * Configuration Service
 *
 * Reads required credentials from the environment and optional tuning values
 * from a YAML file (roadmap.config.yaml by default). Environment values take
 * precedence over the file. Every problem is reported as a ConfigurationError
 * so the process can stop before it starts serving.
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../../core/errors.js';
import { LogLevel, parseLogLevel } from '../../core/logger.js';

/**
 * Settings for the provider call
 */
export interface GenerationSettings {
  model: string;
  maxTokens: number;
  timeoutMs: number;
  /** Extra attempts after a transient provider failure */
  maxRetries: number;
  /** Replies longer than this are rejected unparsed */
  maxResponseChars: number;
}

export interface ServerSettings {
  port: number;
  host: string;
}

/**
 * Fully resolved application configuration
 */
export interface AppConfig {
  databaseUrl: string;
  openaiApiKey: string;
  sessionSecret: string;
  logLevel: LogLevel;
  server: ServerSettings;
  generation: GenerationSettings;
}

/**
 * Environment variables that must be present at startup
 */
export const REQUIRED_ENV = ['DATABASE_URL', 'OPENAI_API_KEY', 'SESSION_SECRET'] as const;

export const DEFAULT_CONFIG_PATH = 'roadmap.config.yaml';

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  model: 'gpt-4o',
  maxTokens: 4096,
  timeoutMs: 60_000,
  maxRetries: 1,
  maxResponseChars: 100_000
};

export const DEFAULT_SERVER_SETTINGS: ServerSettings = {
  port: 5000,
  host: '0.0.0.0'
};

const PortSchema = z.coerce.number().int().min(1).max(65535);

/**
 * Schema of the optional YAML file
 */
export const FileConfigSchema = z
  .object({
    generation: z
      .object({
        model: z.string().min(1).optional(),
        maxTokens: z.number().int().positive().optional(),
        timeoutMs: z.number().int().min(1_000).max(600_000).optional(),
        maxRetries: z.number().int().min(0).max(3).optional(),
        maxResponseChars: z.number().int().min(1_000).optional()
      })
      .strict()
      .optional(),
    server: z
      .object({
        port: PortSchema.optional(),
        host: z.string().min(1).optional()
      })
      .strict()
      .optional()
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface ConfigServiceOptions {
  env?: NodeJS.ProcessEnv;
  /** YAML file path; falls back to ROADMAP_CONFIG, then roadmap.config.yaml */
  configPath?: string;
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Configuration Service
 */
export class ConfigService {
  private env: NodeJS.ProcessEnv;
  private configPath: string;
  private cachedConfig: AppConfig | null = null;

  constructor(options: ConfigServiceOptions = {}) {
    this.env = options.env ?? process.env;
    this.configPath = options.configPath ?? envValue(this.env, 'ROADMAP_CONFIG') ?? DEFAULT_CONFIG_PATH;
  }

  /**
   * Load and validate the configuration, with caching
   *
   * @throws ConfigurationError listing every missing required variable
   */
  async load(): Promise<AppConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    const missing = REQUIRED_ENV.filter(name => envValue(this.env, name) === undefined);
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Missing required environment variable(s): ${missing.join(', ')}`,
        [...missing]
      );
    }

    const fileConfig = await this.loadFile();

    const config: AppConfig = {
      databaseUrl: this.required('DATABASE_URL'),
      openaiApiKey: this.required('OPENAI_API_KEY'),
      sessionSecret: this.required('SESSION_SECRET'),
      logLevel: this.resolveLogLevel(),
      server: {
        port: this.resolvePort(fileConfig.server?.port),
        host: envValue(this.env, 'HOST') ?? fileConfig.server?.host ?? DEFAULT_SERVER_SETTINGS.host
      },
      generation: { ...DEFAULT_GENERATION_SETTINGS, ...fileConfig.generation }
    };

    this.cachedConfig = config;
    return config;
  }

  clearCache(): void {
    this.cachedConfig = null;
  }

  private required(name: typeof REQUIRED_ENV[number]): string {
    const value = envValue(this.env, name);
    if (value === undefined) {
      throw new ConfigurationError(`Missing required environment variable(s): ${name}`, [name]);
    }
    return value;
  }

  private resolvePort(filePort: number | undefined): number {
    const raw = envValue(this.env, 'PORT');
    if (raw === undefined) {
      return filePort ?? DEFAULT_SERVER_SETTINGS.port;
    }
    const parsed = PortSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid PORT: ${raw}`);
    }
    return parsed.data;
  }

  private resolveLogLevel(): LogLevel {
    const raw = envValue(this.env, 'LOG_LEVEL');
    if (raw === undefined) {
      return LogLevel.INFO;
    }
    const level = parseLogLevel(raw);
    if (level === undefined) {
      throw new ConfigurationError(`Invalid LOG_LEVEL: ${raw} (expected debug, info, warn, error or silent)`);
    }
    return level;
  }

  /**
   * A missing file means defaults; an unreadable or invalid one is fatal
   */
  private async loadFile(): Promise<FileConfig> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return {};
      }
      throw new ConfigurationError(`Cannot read config file ${this.configPath}: ${(error as Error).message}`);
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML in ${this.configPath}: ${(error as Error).message}`);
    }

    const result = FileConfigSchema.safeParse(parsed ?? {});
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid content';
      throw new ConfigurationError(`Invalid config file ${this.configPath} (${where})`);
    }
    return result.data;
  }
}

/**
 * Convenience wrapper for one-shot loading at startup
 */
export function loadConfig(options: ConfigServiceOptions = {}): Promise<AppConfig> {
  return new ConfigService(options).load();
}
