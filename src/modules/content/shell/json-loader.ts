/**
 * JSON Content Loader
 *
 * Reads the content files listed in CONTENT_FILES from one directory and
 * validates them against the catalog schemas.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { Value } from '@sinclair/typebox/value';
import { ok, err, type Result } from 'neverthrow';

import {
  createContentUnavailableError,
  createInvalidContentError,
  type ContentError,
} from '../core/errors.js';
import {
  LessonsFileSchema,
  QuizFileSchema,
  ScenarioFileSchema,
  TipsFileSchema,
  type ContentBundle,
  type QuizFile,
  type ScenarioFile,
} from '../core/types.js';

import type { TSchema, Static } from '@sinclair/typebox';

export const CONTENT_FILES = {
  quizzes: 'quizzes.json',
  scenarios: 'scenarios.json',
  tips: 'tips.json',
  lessons: 'lessons.json',
} as const;

const readJsonFile = async <S extends TSchema>(
  directory: string,
  file: string,
  schema: S
): Promise<Result<Static<S>, ContentError>> => {
  let raw: string;
  try {
    raw = await readFile(path.join(directory, file), 'utf8');
  } catch (error) {
    return err(createContentUnavailableError(file, error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'malformed JSON';
    return err(createInvalidContentError(file, [message]));
  }

  if (!Value.Check(schema, parsed)) {
    const details = [...Value.Errors(schema, parsed)].map((e) => `${e.path}: ${e.message}`);
    return err(createInvalidContentError(file, details));
  }

  return ok(parsed);
};

/**
 * Rules the schemas cannot express.
 */
export const findQuizProblems = (quizzes: QuizFile): string[] => {
  const problems: string[] = [];
  for (const [language, byLevel] of Object.entries(quizzes.questions)) {
    for (const [level, questions] of Object.entries(byLevel)) {
      if (!quizzes.levels.includes(Number(level))) {
        problems.push(`/${language}/${level}: level is not listed in levels`);
      }
      questions.forEach((question, index) => {
        if (question.correctOptionIndex >= question.options.length) {
          problems.push(
            `/${language}/${level}/${String(index)}: correctOptionIndex is out of range`
          );
        }
      });
    }
  }
  return problems;
};

/** Node ids travel inside button data */
const NODE_ID_PATTERN = /^[A-Za-z0-9_-]{1,24}$/;

export const findScenarioProblems = (scenarios: ScenarioFile): string[] => {
  const problems: string[] = [];
  for (const [language, list] of Object.entries(scenarios)) {
    const seen = new Set<string>();
    for (const scenario of list) {
      if (seen.has(scenario.id)) {
        problems.push(`/${language}/${scenario.id}: duplicate scenario id`);
      }
      seen.add(scenario.id);
      for (const nodeId of Object.keys(scenario.nodes)) {
        if (!NODE_ID_PATTERN.test(nodeId)) {
          problems.push(`/${language}/${scenario.id}/nodes/${nodeId}: invalid node id`);
        }
      }
    }
  }
  return problems;
};

/**
 * Loads and validates the full content bundle.
 */
export const loadContentBundle = async (
  directory: string
): Promise<Result<ContentBundle, ContentError>> => {
  const quizzes = await readJsonFile(directory, CONTENT_FILES.quizzes, QuizFileSchema);
  if (quizzes.isErr()) {
    return err(quizzes.error);
  }
  const quizProblems = findQuizProblems(quizzes.value);
  if (quizProblems.length > 0) {
    return err(createInvalidContentError(CONTENT_FILES.quizzes, quizProblems));
  }

  const scenarios = await readJsonFile(directory, CONTENT_FILES.scenarios, ScenarioFileSchema);
  if (scenarios.isErr()) {
    return err(scenarios.error);
  }
  const scenarioProblems = findScenarioProblems(scenarios.value);
  if (scenarioProblems.length > 0) {
    return err(createInvalidContentError(CONTENT_FILES.scenarios, scenarioProblems));
  }

  const tips = await readJsonFile(directory, CONTENT_FILES.tips, TipsFileSchema);
  if (tips.isErr()) {
    return err(tips.error);
  }

  const lessons = await readJsonFile(directory, CONTENT_FILES.lessons, LessonsFileSchema);
  if (lessons.isErr()) {
    return err(lessons.error);
  }

  return ok({
    quizzes: quizzes.value,
    scenarios: scenarios.value,
    tips: tips.value,
    lessons: lessons.value,
  });
};
