/**
 * Reports Module - Public API
 */

export type {
  ReportStage,
  ReportDraft,
  NewScamReport,
  ScamReport,
  ReportStatus,
} from './core/types.js';
export { MAX_DESCRIPTION_LENGTH, MAX_FIELD_LENGTH, SKIP_WORDS } from './core/types.js';

export type { ReportsError, InvalidReportInputError, DatabaseError } from './core/errors.js';
export { createDatabaseError } from './core/errors.js';

export type { ReportRepository } from './core/ports.js';

export { startReport, advanceReport, type ReportStep } from './core/machine.js';

export { makeReportRepo, type ReportRepoOptions } from './shell/repo/report-repo.js';
