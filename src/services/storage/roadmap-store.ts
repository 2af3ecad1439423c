// Roadmap store for persisting generated roadmaps

import { Kysely, Selectable } from 'kysely';
import { z } from 'zod';
import { AppError, NotFoundError, PersistenceError } from '../../core/errors.js';
import {
  AiMaturitySchema,
  GoalSchema,
  OrganizationSizeSchema,
  PrioritySchema
} from '../../core/schemas.js';
import {
  RoadmapDraft,
  RoadmapPhase,
  RoadmapPhases,
  RoadmapResult,
  RoadmapSummary
} from '../../models/roadmap.js';
import {
  RoadmapDatabase,
  RoadmapInitiativesTable,
  RoadmapPhasesTable,
  RoadmapsTable,
  createDatabase,
  migrate
} from './database.js';

/**
 * Storage operations the rest of the application depends on.
 * Append-only: roadmaps are never updated or deleted.
 */
export interface RoadmapRepository {
  save(draft: RoadmapDraft): Promise<RoadmapResult>;
  get(id: number): Promise<RoadmapResult>;
  listAll(): Promise<RoadmapSummary[]>;
}

const StoredGoalsSchema = z.array(GoalSchema).min(1);

type RoadmapRow = Selectable<RoadmapsTable>;
type PhaseRow = Selectable<RoadmapPhasesTable>;
type InitiativeRow = Selectable<RoadmapInitiativesTable>;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Roadmap store backed by SQLite
 */
export class RoadmapStore implements RoadmapRepository {
  constructor(private readonly db: Kysely<RoadmapDatabase>) {}

  /**
   * Opens the database named by a DATABASE_URL value
   */
  static open(databaseUrl: string): RoadmapStore {
    return new RoadmapStore(createDatabase(databaseUrl));
  }

  /**
   * Creates the tables if they don't exist
   */
  async initialize(): Promise<void> {
    try {
      await migrate(this.db);
    } catch (error) {
      throw new PersistenceError(`Failed to initialize database: ${errorMessage(error)}`);
    }
  }

  /**
   * Writes the roadmap, its phases and its initiatives in one transaction
   *
   * @returns the stored roadmap with its assigned ID
   * @throws PersistenceError if anything fails; nothing is written in that case
   */
  async save(draft: RoadmapDraft): Promise<RoadmapResult> {
    try {
      return await this.db.transaction().execute(async (trx) => {
        const { id } = await trx
          .insertInto('roadmaps')
          .values({
            organization_name: draft.request.organizationName,
            organization_size: draft.request.organizationSize,
            industry: draft.request.industry,
            ai_maturity: draft.request.aiMaturity,
            goals: JSON.stringify(draft.request.goals),
            chart: draft.chart,
            created_at: draft.createdAt.toISOString()
          })
          .returning('id')
          .executeTakeFirstOrThrow();

        for (const [phaseIndex, phase] of draft.phases.entries()) {
          const { id: phaseId } = await trx
            .insertInto('roadmap_phases')
            .values({
              roadmap_id: id,
              position: phaseIndex,
              label: phase.label,
              timeframe: phase.timeframe
            })
            .returning('id')
            .executeTakeFirstOrThrow();

          await trx
            .insertInto('roadmap_initiatives')
            .values(phase.initiatives.map((initiative, position) => ({
              phase_id: phaseId,
              position,
              title: initiative.title,
              description: initiative.description,
              priority: initiative.priority
            })))
            .execute();
        }

        return { ...draft, id };
      });
    } catch (error) {
      throw new PersistenceError(`Failed to save roadmap: ${errorMessage(error)}`, {
        organizationName: draft.request.organizationName
      });
    }
  }

  /**
   * Loads a roadmap by ID
   *
   * @throws NotFoundError if no roadmap has this ID
   */
  async get(id: number): Promise<RoadmapResult> {
    try {
      const row = await this.db
        .selectFrom('roadmaps')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst();

      if (!row) {
        throw new NotFoundError('Roadmap', id);
      }

      const phaseRows = await this.db
        .selectFrom('roadmap_phases')
        .selectAll()
        .where('roadmap_id', '=', id)
        .orderBy('position', 'asc')
        .execute();

      const initiativeRows = phaseRows.length === 0 ? [] : await this.db
        .selectFrom('roadmap_initiatives')
        .selectAll()
        .where('phase_id', 'in', phaseRows.map(p => p.id))
        .orderBy('phase_id', 'asc')
        .orderBy('position', 'asc')
        .execute();

      return this.toResult(row, phaseRows, initiativeRows);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new PersistenceError(`Failed to load roadmap ${id}: ${errorMessage(error)}`);
    }
  }

  /**
   * Lists stored roadmaps, newest first
   */
  async listAll(): Promise<RoadmapSummary[]> {
    try {
      const rows = await this.db
        .selectFrom('roadmaps')
        .select(['id', 'organization_name', 'organization_size', 'industry', 'ai_maturity', 'created_at'])
        .orderBy('created_at', 'desc')
        .orderBy('id', 'desc')
        .execute();

      return rows.map(row => ({
        id: row.id,
        organizationName: row.organization_name,
        organizationSize: OrganizationSizeSchema.parse(row.organization_size),
        industry: row.industry,
        aiMaturity: AiMaturitySchema.parse(row.ai_maturity),
        createdAt: new Date(row.created_at)
      }));
    } catch (error) {
      throw new PersistenceError(`Failed to list roadmaps: ${errorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }

  private toResult(row: RoadmapRow, phaseRows: PhaseRow[], initiativeRows: InitiativeRow[]): RoadmapResult {
    const phases = phaseRows.map((phase): RoadmapPhase => ({
      label: phase.label,
      timeframe: phase.timeframe,
      initiatives: initiativeRows
        .filter(initiative => initiative.phase_id === phase.id)
        .map(initiative => ({
          title: initiative.title,
          description: initiative.description,
          priority: PrioritySchema.parse(initiative.priority)
        }))
    }));

    const [first, second, third] = phases;
    if (phases.length !== 3 || !first || !second || !third) {
      throw new PersistenceError(`Roadmap ${row.id} has ${phases.length} stored phases, expected 3`);
    }
    const ordered: RoadmapPhases = [first, second, third];

    return {
      id: row.id,
      request: {
        organizationName: row.organization_name,
        organizationSize: OrganizationSizeSchema.parse(row.organization_size),
        industry: row.industry,
        aiMaturity: AiMaturitySchema.parse(row.ai_maturity),
        goals: StoredGoalsSchema.parse(JSON.parse(row.goals))
      },
      phases: ordered,
      chart: row.chart,
      createdAt: new Date(row.created_at)
    };
  }
}
