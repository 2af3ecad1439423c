// SQLite connection and table definitions

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { Generated, Kysely, SqliteDialect, sql } from 'kysely';
import { ConfigurationError } from '../../core/errors.js';

export interface RoadmapsTable {
  id: Generated<number>;
  organization_name: string;
  organization_size: string;
  industry: string;
  ai_maturity: string;
  /** JSON array of goal tags */
  goals: string;
  chart: string;
  /** ISO-8601 timestamp */
  created_at: string;
}

export interface RoadmapPhasesTable {
  id: Generated<number>;
  roadmap_id: number;
  position: number;
  label: string;
  timeframe: string;
}

export interface RoadmapInitiativesTable {
  id: Generated<number>;
  phase_id: number;
  position: number;
  title: string;
  description: string;
  priority: string;
}

export interface RoadmapDatabase {
  roadmaps: RoadmapsTable;
  roadmap_phases: RoadmapPhasesTable;
  roadmap_initiatives: RoadmapInitiativesTable;
}

const MEMORY = ':memory:';

/**
 * Resolves DATABASE_URL to a SQLite filename.
 *
 * Accepted forms: `sqlite::memory:`, `sqlite:<path>`, `sqlite://<path>`,
 * `file:<path>` and a bare path.
 */
export function parseDatabaseUrl(url: string): string {
  const trimmed = url.trim();
  if (trimmed === MEMORY || trimmed === `sqlite:${MEMORY}`) {
    return MEMORY;
  }

  for (const prefix of ['sqlite://', 'sqlite:', 'file://', 'file:']) {
    if (trimmed.startsWith(prefix)) {
      const filename = trimmed.slice(prefix.length);
      if (filename === '') {
        throw new ConfigurationError(`DATABASE_URL has no file path: ${url}`);
      }
      return filename;
    }
  }

  // Two or more scheme letters rule out a Windows drive letter
  const scheme = /^([a-z][a-z0-9+.-]+):/i.exec(trimmed);
  if (scheme) {
    throw new ConfigurationError(`Unsupported DATABASE_URL scheme "${scheme[1]}" (expected sqlite or file)`);
  }
  if (trimmed === '') {
    throw new ConfigurationError('DATABASE_URL is empty');
  }
  return trimmed;
}

/**
 * Opens the database named by DATABASE_URL, creating its directory if needed
 */
export function createDatabase(url: string): Kysely<RoadmapDatabase> {
  const filename = parseDatabaseUrl(url);

  if (filename !== MEMORY) {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const sqlite = new Database(filename);
  sqlite.pragma('foreign_keys = ON');
  if (filename !== MEMORY) {
    sqlite.pragma('journal_mode = WAL');
  }

  return new Kysely<RoadmapDatabase>({
    dialect: new SqliteDialect({ database: sqlite })
  });
}

/**
 * Creates the tables if they don't exist
 */
export async function migrate(db: Kysely<RoadmapDatabase>): Promise<void> {
  await db.schema
    .createTable('roadmaps')
    .ifNotExists()
    .addColumn('id', 'integer', col => col.primaryKey().autoIncrement())
    .addColumn('organization_name', 'text', col => col.notNull())
    .addColumn('organization_size', 'text', col => col.notNull())
    .addColumn('industry', 'text', col => col.notNull())
    .addColumn('ai_maturity', 'text', col => col.notNull())
    .addColumn('goals', 'text', col => col.notNull())
    .addColumn('chart', 'text', col => col.notNull())
    .addColumn('created_at', 'text', col => col.notNull())
    .execute();

  await db.schema
    .createTable('roadmap_phases')
    .ifNotExists()
    .addColumn('id', 'integer', col => col.primaryKey().autoIncrement())
    .addColumn('roadmap_id', 'integer', col => col.notNull().references('roadmaps.id'))
    .addColumn('position', 'integer', col => col.notNull())
    .addColumn('label', 'text', col => col.notNull())
    .addColumn('timeframe', 'text', col => col.notNull())
    .addUniqueConstraint('roadmap_phases_roadmap_position', ['roadmap_id', 'position'])
    .execute();

  await db.schema
    .createTable('roadmap_initiatives')
    .ifNotExists()
    .addColumn('id', 'integer', col => col.primaryKey().autoIncrement())
    .addColumn('phase_id', 'integer', col => col.notNull().references('roadmap_phases.id'))
    .addColumn('position', 'integer', col => col.notNull())
    .addColumn('title', 'text', col => col.notNull().check(sql`length(trim(title)) > 0`))
    .addColumn('description', 'text', col => col.notNull())
    .addColumn('priority', 'text', col => col.notNull().check(sql`priority in ('high', 'medium', 'low')`))
    .addUniqueConstraint('roadmap_initiatives_phase_position', ['phase_id', 'position'])
    .execute();
}
