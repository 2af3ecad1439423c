/**
 * Submission service
 *
 * Handles one form submission end to end: validate, generate once, save once.
 */

import { PersistenceError } from '../../core/errors.js';
import { Logger, logger as defaultLogger } from '../../core/logger.js';
import { validateGenerationForm } from '../../core/validation.js';
import { RoadmapDraft, RoadmapResult } from '../../models/roadmap.js';
import { RoadmapGenerator } from '../generation/generation-client.js';
import { RoadmapRepository } from '../storage/roadmap-store.js';

export interface SubmissionServiceOptions {
  generator: RoadmapGenerator;
  repository: RoadmapRepository;
  clock?: () => Date;
  logger?: Logger;
}

export class SubmissionService {
  private readonly generator: RoadmapGenerator;
  private readonly repository: RoadmapRepository;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: SubmissionServiceOptions) {
    this.generator = options.generator;
    this.repository = options.repository;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Turns a raw form submission into a stored roadmap
   *
   * @throws ValidationError before the provider is contacted
   * @throws GenerationError when no usable roadmap could be generated
   * @throws PersistenceError when the generated roadmap could not be stored
   */
  async handleSubmit(rawForm: unknown): Promise<RoadmapResult> {
    const request = validateGenerationForm(rawForm);

    const roadmap = await this.generator.generate(request);
    const draft: RoadmapDraft = { ...roadmap, request, createdAt: this.clock() };

    try {
      const result = await this.repository.save(draft);
      this.logger.info('Roadmap stored', { id: result.id, organization: request.organizationName });
      return result;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      // Generation is the expensive part; keep enough to restore the record by hand
      this.logger.error('Failed to store generated roadmap', {
        reason,
        request,
        phases: draft.phases,
        chart: draft.chart,
        createdAt: draft.createdAt.toISOString()
      });
      throw new PersistenceError(`Failed to store roadmap: ${reason}`, { draft });
    }
  }
}
