/**
 * Scam Report Draft
 *
 * description → link → contact → Complete
 *
 * The description is required. Link and contact accept a skip word instead.
 */

import { ok, err, type Result } from 'neverthrow';

import { createInvalidReportInputError, type InvalidReportInputError } from './errors.js';
import {
  MAX_DESCRIPTION_LENGTH,
  MAX_FIELD_LENGTH,
  SKIP_WORDS,
  type NewScamReport,
  type ReportDraft,
  type ReportStage,
} from './types.js';

export type ReportStep =
  | { kind: 'pending'; draft: ReportDraft }
  | { kind: 'complete'; report: Omit<NewScamReport, 'userId'> };

export const startReport = (): ReportDraft => ({
  stage: 'description',
  description: null,
  link: null,
});

const isSkip = (value: string): boolean => SKIP_WORDS.includes(value.toLowerCase());

const readField = (
  stage: ReportStage,
  text: string,
  maxLength: number
): Result<string, InvalidReportInputError> => {
  const value = text.trim();
  if (value === '') {
    return err(createInvalidReportInputError(stage, 'empty'));
  }
  if (value.length > maxLength) {
    return err(createInvalidReportInputError(stage, 'too_long'));
  }
  return ok(value);
};

const readOptional = (
  stage: ReportStage,
  text: string
): Result<string | null, InvalidReportInputError> =>
  readField(stage, text, MAX_FIELD_LENGTH).map((value) => (isSkip(value) ? null : value));

/**
 * Stores `text` as the answer to the current stage and moves to the next one.
 */
export const advanceReport = (
  draft: ReportDraft,
  text: string
): Result<ReportStep, InvalidReportInputError> => {
  switch (draft.stage) {
    case 'description':
      return readField('description', text, MAX_DESCRIPTION_LENGTH).map((description) => ({
        kind: 'pending',
        draft: { ...draft, stage: 'link', description },
      }));

    case 'link':
      return readOptional('link', text).map((link) => ({
        kind: 'pending',
        draft: { ...draft, stage: 'contact', link },
      }));

    case 'contact':
      return readOptional('contact', text).map((contact) => ({
        kind: 'complete',
        report: { description: draft.description ?? '', link: draft.link, contact },
      }));

    default: {
      const unhandled: never = draft.stage;
      return err(createInvalidReportInputError(unhandled, 'empty'));
    }
  }
};
