/**
 * Content Module - Ports
 */

import type { Language, Lesson, QuizQuestion, Scenario, ScenarioSummary } from './types.js';

/**
 * Read-only catalog of learning content. Unknown languages fall back to the default
 * language; a missing (language, level) pair yields an empty question list.
 */
export interface ContentCatalog {
  /** Ordered quiz levels offered to users */
  listLevels(): readonly number[];
  /** Highest level in the catalog */
  maxLevel(): number;
  getQuestions(language: Language, level: number): readonly QuizQuestion[];
  listScenarios(language: Language): readonly ScenarioSummary[];
  getScenario(language: Language, scenarioId: string): Scenario | null;
  getTips(language: Language): readonly string[];
  /** Education lessons in reading order */
  listLessons(language: Language): readonly Lesson[];
}
