/**
 * Tests for the Configuration Service
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import {
  ConfigService,
  DEFAULT_GENERATION_SETTINGS,
  FileConfig,
  loadConfig
} from './config-service.js';
import { ConfigurationError } from '../../core/errors.js';
import { LogLevel } from '../../core/logger.js';

const TEST_DIR = '.roadmap-test-config-unit';
const CONFIG_PATH = path.join(TEST_DIR, 'roadmap.config.yaml');

const baseEnv: NodeJS.ProcessEnv = {
  DATABASE_URL: 'sqlite::memory:',
  OPENAI_API_KEY: 'test-key',
  SESSION_SECRET: 'test-secret'
};

async function writeConfig(config: FileConfig | string): Promise<void> {
  const content = typeof config === 'string' ? config : yaml.stringify(config);
  await fs.writeFile(CONFIG_PATH, content);
}

async function loadError(service: ConfigService): Promise<ConfigurationError> {
  try {
    await service.load();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected configuration to fail');
}

describe('ConfigService', () => {
  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(TEST_DIR, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('required environment', () => {
    it('should report every missing variable at once', async () => {
      const error = await loadError(new ConfigService({ env: {}, configPath: CONFIG_PATH }));
      expect(error.missing).toEqual(['DATABASE_URL', 'OPENAI_API_KEY', 'SESSION_SECRET']);
      expect(error.message).toBe(
        'Missing required environment variable(s): DATABASE_URL, OPENAI_API_KEY, SESSION_SECRET'
      );
    });

    it('should treat blank values as missing', async () => {
      const env = { ...baseEnv, SESSION_SECRET: '   ' };
      const error = await loadError(new ConfigService({ env, configPath: CONFIG_PATH }));
      expect(error.missing).toEqual(['SESSION_SECRET']);
    });

    it('should expose the required values', async () => {
      const config = await loadConfig({ env: baseEnv, configPath: CONFIG_PATH });
      expect(config.databaseUrl).toBe('sqlite::memory:');
      expect(config.openaiApiKey).toBe('test-key');
      expect(config.sessionSecret).toBe('test-secret');
    });
  });

  describe('defaults', () => {
    it('should use defaults when no config file exists', async () => {
      const config = await loadConfig({ env: baseEnv, configPath: CONFIG_PATH });
      expect(config.generation).toEqual(DEFAULT_GENERATION_SETTINGS);
      expect(config.server).toEqual({ port: 5000, host: '0.0.0.0' });
      expect(config.logLevel).toBe(LogLevel.INFO);
    });

    it('should treat an empty file as no overrides', async () => {
      await writeConfig('');
      const config = await loadConfig({ env: baseEnv, configPath: CONFIG_PATH });
      expect(config.generation).toEqual(DEFAULT_GENERATION_SETTINGS);
    });
  });

  describe('config file', () => {
    it('should merge generation settings over defaults', async () => {
      await writeConfig({ generation: { model: 'gpt-4o-mini', timeoutMs: 30_000 } });
      const config = await loadConfig({ env: baseEnv, configPath: CONFIG_PATH });
      expect(config.generation).toEqual({
        ...DEFAULT_GENERATION_SETTINGS,
        model: 'gpt-4o-mini',
        timeoutMs: 30_000
      });
    });

    it('should let the environment override the file', async () => {
      await writeConfig({ server: { port: 8080, host: '127.0.0.1' } });
      const config = await loadConfig({ env: { ...baseEnv, PORT: '9090' }, configPath: CONFIG_PATH });
      expect(config.server).toEqual({ port: 9090, host: '127.0.0.1' });
    });

    it('should find the file through ROADMAP_CONFIG', async () => {
      await writeConfig({ generation: { maxTokens: 2048 } });
      const config = await loadConfig({ env: { ...baseEnv, ROADMAP_CONFIG: CONFIG_PATH } });
      expect(config.generation.maxTokens).toBe(2048);
    });

    it('should reject unknown keys', async () => {
      await writeConfig('generation:\n  temperature: 0.2\n');
      const error = await loadError(new ConfigService({ env: baseEnv, configPath: CONFIG_PATH }));
      expect(error.message).toContain('Invalid config file');
    });

    it('should reject more than three retries', async () => {
      await writeConfig({ generation: { maxRetries: 4 } });
      const error = await loadError(new ConfigService({ env: baseEnv, configPath: CONFIG_PATH }));
      expect(error.message).toContain('generation.maxRetries');
    });

    it('should reject malformed YAML', async () => {
      await writeConfig('generation: [unclosed');
      const error = await loadError(new ConfigService({ env: baseEnv, configPath: CONFIG_PATH }));
      expect(error.message).toContain('Invalid YAML');
    });

    it('should accept any retry count from zero to three', async () => {
      await fc.assert(
        fc.asyncProperty(fc.integer({ min: 0, max: 3 }), async (maxRetries) => {
          await writeConfig({ generation: { maxRetries } });
          const config = await loadConfig({ env: baseEnv, configPath: CONFIG_PATH });
          expect(config.generation.maxRetries).toBe(maxRetries);
        }),
        { numRuns: 10 }
      );
    });
  });

  describe('environment options', () => {
    it('should parse LOG_LEVEL names', async () => {
      const config = await loadConfig({ env: { ...baseEnv, LOG_LEVEL: 'Debug' }, configPath: CONFIG_PATH });
      expect(config.logLevel).toBe(LogLevel.DEBUG);
    });

    it('should reject an unknown LOG_LEVEL', async () => {
      const error = await loadError(
        new ConfigService({ env: { ...baseEnv, LOG_LEVEL: 'verbose' }, configPath: CONFIG_PATH })
      );
      expect(error.message).toContain('Invalid LOG_LEVEL');
    });

    it('should reject a non-numeric PORT', async () => {
      const error = await loadError(
        new ConfigService({ env: { ...baseEnv, PORT: 'eighty' }, configPath: CONFIG_PATH })
      );
      expect(error.message).toBe('Invalid PORT: eighty');
    });
  });

  describe('caching', () => {
    it('should return the cached config until cleared', async () => {
      const service = new ConfigService({ env: baseEnv, configPath: CONFIG_PATH });
      const first = await service.load();
      await writeConfig({ generation: { model: 'gpt-4o-mini' } });
      expect((await service.load()).generation.model).toBe(first.generation.model);

      service.clearCache();
      expect((await service.load()).generation.model).toBe('gpt-4o-mini');
    });
  });
});
