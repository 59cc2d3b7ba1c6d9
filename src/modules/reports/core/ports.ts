/**
 * Reports Module - Ports
 */

import type { DatabaseError } from './errors.js';
import type { NewScamReport, ScamReport } from './types.js';
import type { Result } from 'neverthrow';

export interface ReportRepository {
  /** Stores the report with status `new` */
  create(report: NewScamReport): Promise<Result<ScamReport, DatabaseError>>;
}
