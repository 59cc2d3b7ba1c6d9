/**
 * Reports Module - Core Types
 */

import type { UserId } from '../../users/index.js';

/** What the next text message fills in */
export type ReportStage = 'description' | 'link' | 'contact';

/**
 * A report being collected over several messages. Lives in the session only.
 */
export interface ReportDraft {
  readonly stage: ReportStage;
  readonly description: string | null;
  readonly link: string | null;
}

export interface NewScamReport {
  userId: UserId;
  description: string;
  link: string | null;
  contact: string | null;
}

export type ReportStatus = 'new' | 'reviewed';

export interface ScamReport extends NewScamReport {
  id: number;
  status: ReportStatus;
  createdAt: Date;
}

export const MAX_DESCRIPTION_LENGTH = 2000;
export const MAX_FIELD_LENGTH = 500;

/** Answers that leave an optional field empty */
export const SKIP_WORDS: readonly string[] = ['no', 'n', 'нет', 'skip', '-'];
