import postgres from 'postgres';
import type { RunReport } from '@groundwork/shared';
import type { AppConfig } from '../config';
import { logger } from './logger';

/**
 * PostgreSQL connection pool for the run-report store.
 *
 * Reports are written after every run for later analysis; see
 * sql/001_generation_runs.sql for the table.
 */

export type Sql = postgres.Sql;

export function createSql(database: AppConfig['database']): Sql {
  return postgres({
    host: database.host,
    port: database.port,
    database: database.database,
    user: database.user,
    password: database.password,
    max: 10, // Maximum pool size
    idle_timeout: 20,
    connect_timeout: 10,
  });
}

/**
 * Health check: verify database connectivity.
 */
export async function checkDatabaseHealth(sql: Sql): Promise<boolean> {
  try {
    await sql`SELECT 1`;
    return true;
  } catch (error) {
    logger.warn({ error }, 'Database health check failed');
    return false;
  }
}

export interface RunReportStore {
  save(report: RunReport): Promise<void>;
}

export class PostgresRunReportStore implements RunReportStore {
  constructor(private readonly sql: Sql) {}

  async save(report: RunReport): Promise<void> {
    await this.sql`
      INSERT INTO generation_runs (
        run_id,
        status,
        started_at,
        finished_at,
        documents,
        chunks,
        work_items,
        accepted,
        duplicates,
        cancelled,
        retries,
        failures,
        failed_items
      ) VALUES (
        ${report.runId},
        ${report.status},
        ${report.startedAt},
        ${report.finishedAt},
        ${report.documents},
        ${report.chunks},
        ${report.workItems},
        ${report.accepted},
        ${report.duplicates},
        ${report.cancelled},
        ${report.retries},
        ${JSON.stringify(report.failures)},
        ${JSON.stringify(report.failed)}
      )
    `;
  }
}
