/**
 * Scam Report Repository - Kysely Implementation
 */

import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type DatabaseError } from '../../core/errors.js';

import type { ReportRepository } from '../../core/ports.js';
import type { NewScamReport, ReportStatus, ScamReport } from '../../core/types.js';
import type { GameDbClient, ScamReports } from '../../../../infra/database/client.js';
import type { Selectable } from 'kysely';
import type { Logger } from 'pino';

export interface ReportRepoOptions {
  db: GameDbClient;
  logger: Logger;
}

const toStatus = (value: string): ReportStatus => (value === 'reviewed' ? 'reviewed' : 'new');

class KyselyReportRepo implements ReportRepository {
  private readonly db: GameDbClient;
  private readonly log: Logger;

  constructor(options: ReportRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'report-repo' });
  }

  async create(report: NewScamReport): Promise<Result<ScamReport, DatabaseError>> {
    try {
      const row = await this.db
        .insertInto('scam_reports')
        .values({
          user_id: report.userId,
          description: report.description,
          link: report.link,
          contact: report.contact,
        })
        .returningAll()
        .executeTakeFirstOrThrow();
      return ok(this.mapRow(row));
    } catch (error) {
      this.log.error({ err: error, userId: report.userId }, 'Failed to save scam report');
      return err(createDatabaseError('Failed to save scam report', error));
    }
  }

  private mapRow(row: Selectable<ScamReports>): ScamReport {
    return {
      id: Number(row.id),
      userId: Number(row.user_id),
      description: row.description,
      link: row.link,
      contact: row.contact,
      status: toStatus(row.status),
      createdAt: row.created_at,
    };
  }
}

export const makeReportRepo = (options: ReportRepoOptions): ReportRepository => {
  return new KyselyReportRepo(options);
};
