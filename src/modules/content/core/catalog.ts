/**
 * In-memory content catalog over a validated bundle.
 */

import { DEFAULT_LANGUAGE, type ContentBundle, type Language, type Scenario } from './types.js';

import type { ContentCatalog } from './ports.js';

const pickLanguage = <T>(byLanguage: Record<string, T>, language: Language): T | undefined =>
  byLanguage[language] ?? byLanguage[DEFAULT_LANGUAGE];

export const createContentCatalog = (bundle: ContentBundle): ContentCatalog => {
  const levels = [...new Set(bundle.quizzes.levels)].sort((a, b) => a - b);
  const maxLevel = levels[levels.length - 1] ?? 1;

  const scenariosFor = (language: Language): readonly Scenario[] =>
    pickLanguage(bundle.scenarios, language) ?? [];

  return {
    listLevels: () => levels,

    maxLevel: () => maxLevel,

    getQuestions(language, level) {
      const byLevel = pickLanguage(bundle.quizzes.questions, language);
      return byLevel?.[String(level)] ?? [];
    },

    listScenarios(language) {
      return scenariosFor(language).map((scenario) => ({
        id: scenario.id,
        title: scenario.title,
        reward: scenario.reward,
        badge: scenario.badge,
      }));
    },

    getScenario(language, scenarioId) {
      return scenariosFor(language).find((scenario) => scenario.id === scenarioId) ?? null;
    },

    getTips(language) {
      return pickLanguage(bundle.tips, language) ?? [];
    },

    listLessons(language) {
      return pickLanguage(bundle.lessons, language) ?? [];
    },
  };
};
