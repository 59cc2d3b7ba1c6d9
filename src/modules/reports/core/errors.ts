/**
 * Reports Module - Domain Errors
 */

import type { ReportStage } from './types.js';

export interface InvalidReportInputError {
  readonly type: 'InvalidReportInputError';
  readonly message: string;
  readonly stage: ReportStage;
  readonly reason: 'empty' | 'too_long';
}

export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

export type ReportsError = InvalidReportInputError | DatabaseError;

export const createInvalidReportInputError = (
  stage: ReportStage,
  reason: InvalidReportInputError['reason']
): InvalidReportInputError => ({
  type: 'InvalidReportInputError',
  message: `Report ${stage} is ${reason === 'empty' ? 'empty' : 'too long'}`,
  stage,
  reason,
});

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});
