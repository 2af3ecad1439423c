// Tests for SubmissionService

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SubmissionService } from './submission-service.js';
import { GenerationClient } from '../generation/generation-client.js';
import { RoadmapRepository, RoadmapStore } from '../storage/roadmap-store.js';
import { GenerationError, PersistenceError, ValidationError } from '../../core/errors.js';
import { Logger, LogLevel } from '../../core/logger.js';
import { GeneratedRoadmap } from '../../models/roadmap.js';
import { StubProvider } from '../../testing/stub-provider.js';
import { ACME_FORM, ACME_REQUEST, acmeReply, acmeRoadmap } from '../../testing/fixtures.js';

const createdAt = new Date('2025-03-01T10:00:00.000Z');
const quietLogger = new Logger({ level: LogLevel.SILENT });

function createGenerator(provider: StubProvider): GenerationClient {
  return new GenerationClient(provider, { retryDelayMs: 0, clock: () => createdAt, logger: quietLogger });
}

describe('SubmissionService', () => {
  let store: RoadmapStore;

  beforeEach(async () => {
    store = RoadmapStore.open('sqlite::memory:');
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
  });

  it('should validate, generate and store a roadmap', async () => {
    const provider = new StubProvider(JSON.stringify(acmeReply()));
    const service = new SubmissionService({
      generator: createGenerator(provider),
      repository: store,
      clock: () => createdAt,
      logger: quietLogger
    });

    const result = await service.handleSubmit(ACME_FORM);

    expect(result).toEqual({ ...acmeRoadmap(), request: ACME_REQUEST, createdAt, id: result.id });
    expect(await store.get(result.id)).toEqual(result);
  });

  it('should store exactly one record per submission', async () => {
    const provider = new StubProvider(JSON.stringify(acmeReply()));
    const saveSpy = vi.spyOn(store, 'save');
    const service = new SubmissionService({ generator: createGenerator(provider), repository: store, logger: quietLogger });

    await service.handleSubmit(ACME_FORM);

    expect(saveSpy).toHaveBeenCalledTimes(1);
    expect(provider.calls).toBe(1);
    expect(await store.listAll()).toHaveLength(1);
  });

  it('should reject a form without goals before calling the generator', async () => {
    const generate = vi.fn(async (): Promise<GeneratedRoadmap> => acmeRoadmap());
    const service = new SubmissionService({ generator: { generate }, repository: store, logger: quietLogger });

    const failure = service.handleSubmit({ ...ACME_FORM, goals: [] });

    await expect(failure).rejects.toBeInstanceOf(ValidationError);
    await expect(failure).rejects.toMatchObject({ field: 'goals', message: 'Select at least one goal' });
    expect(generate).toHaveBeenCalledTimes(0);
    expect(await store.listAll()).toEqual([]);
  });

  it('should report the first invalid field', async () => {
    const generate = vi.fn(async (): Promise<GeneratedRoadmap> => acmeRoadmap());
    const service = new SubmissionService({ generator: { generate }, repository: store, logger: quietLogger });

    await expect(service.handleSubmit({ ...ACME_FORM, organization_name: '   ' }))
      .rejects.toMatchObject({ field: 'organization_name' });
    expect(generate).not.toHaveBeenCalled();
  });

  it('should store nothing when the reply is malformed', async () => {
    const { phases, chart } = acmeRoadmap();
    const provider = new StubProvider(JSON.stringify({ phases: phases.slice(0, 2), chart }));
    const service = new SubmissionService({ generator: createGenerator(provider), repository: store, logger: quietLogger });

    const failure = service.handleSubmit(ACME_FORM);

    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toMatchObject({ kind: 'MalformedResponse' });
    expect(await store.listAll()).toEqual([]);
  });

  it('should log the generated content when saving fails', async () => {
    const logger = new Logger({ level: LogLevel.SILENT });
    const errorSpy = vi.spyOn(logger, 'error');
    const repository: RoadmapRepository = {
      save: vi.fn(async () => {
        throw new PersistenceError('Failed to save roadmap: disk I/O error');
      }),
      get: vi.fn(),
      listAll: vi.fn(async () => [])
    };
    const provider = new StubProvider(JSON.stringify(acmeReply()));
    const service = new SubmissionService({
      generator: createGenerator(provider),
      repository,
      clock: () => createdAt,
      logger
    });

    const failure = service.handleSubmit(ACME_FORM);

    await expect(failure).rejects.toBeInstanceOf(PersistenceError);
    await expect(failure).rejects.toMatchObject({
      message: 'Failed to store roadmap: Failed to save roadmap: disk I/O error',
      context: { draft: { ...acmeRoadmap(), request: ACME_REQUEST, createdAt } }
    });
    expect(errorSpy).toHaveBeenCalledWith('Failed to store generated roadmap', {
      reason: 'Failed to save roadmap: disk I/O error',
      request: ACME_REQUEST,
      phases: acmeRoadmap().phases,
      chart: acmeRoadmap().chart,
      createdAt: '2025-03-01T10:00:00.000Z'
    });
  });
});
