/**
 * Content Module - Public API
 */

export type {
  Language,
  QuizQuestion,
  Impact,
  ScenarioOutcome,
  ScenarioOption,
  DecisionNode,
  TerminalNode,
  ScenarioNode,
  Scenario,
  ScenarioSummary,
  Lesson,
  ContentBundle,
} from './core/types.js';
export { SUPPORTED_LANGUAGES, DEFAULT_LANGUAGE, isLanguage } from './core/types.js';

export type { ContentError, ContentUnavailableError, InvalidContentError } from './core/errors.js';

export type { ContentCatalog } from './core/ports.js';
export { createContentCatalog } from './core/catalog.js';

export { loadContentBundle, CONTENT_FILES } from './shell/json-loader.js';
