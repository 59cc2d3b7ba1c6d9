/**
 * Content Module - Core Types
 *
 * Static learning content: quiz questions per (language, level), branching
 * scenarios per language and short safety tips. Shapes are TypeBox schemas so the
 * JSON files are validated with the same definitions the code is typed with.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Languages
// ─────────────────────────────────────────────────────────────────────────────

export const SUPPORTED_LANGUAGES = ['en', 'ru'] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export const DEFAULT_LANGUAGE: Language = 'en';

export const isLanguage = (value: string): value is Language =>
  SUPPORTED_LANGUAGES.some((language) => language === value);

export const LanguageSchema = Type.Union([Type.Literal('en'), Type.Literal('ru')]);

// ─────────────────────────────────────────────────────────────────────────────
// Quiz
// ─────────────────────────────────────────────────────────────────────────────

export const QuizQuestionSchema = Type.Object({
  prompt: Type.String({ minLength: 1 }),
  options: Type.Array(Type.String({ minLength: 1 }), { minItems: 2 }),
  correctOptionIndex: Type.Integer({ minimum: 0 }),
});

export type QuizQuestion = Static<typeof QuizQuestionSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Scenarios
// ─────────────────────────────────────────────────────────────────────────────

export const ImpactSchema = Type.Union([
  Type.Literal('safe'),
  Type.Literal('warning'),
  Type.Literal('danger'),
  Type.Literal('report'),
]);

/**
 * How risky a chosen response was.
 */
export type Impact = Static<typeof ImpactSchema>;

export const OutcomeSchema = Type.Union([
  Type.Literal('success'),
  Type.Literal('fail'),
  Type.Literal('report'),
]);

export type ScenarioOutcome = Static<typeof OutcomeSchema>;

export const ScenarioOptionSchema = Type.Object({
  label: Type.String({ minLength: 1 }),
  feedback: Type.String(),
  impact: ImpactSchema,
  next: Type.Union([Type.String(), Type.Null()]),
});

export type ScenarioOption = Static<typeof ScenarioOptionSchema>;

export const DecisionNodeSchema = Type.Object({
  kind: Type.Literal('decision'),
  text: Type.String(),
  progress: Type.Optional(Type.String()),
  options: Type.Array(ScenarioOptionSchema, { minItems: 1 }),
});

export type DecisionNode = Static<typeof DecisionNodeSchema>;

export const TerminalNodeSchema = Type.Object({
  kind: Type.Literal('terminal'),
  outcome: OutcomeSchema,
  text: Type.String(),
  progress: Type.Optional(Type.String()),
});

export type TerminalNode = Static<typeof TerminalNodeSchema>;

export const ScenarioNodeSchema = Type.Union([DecisionNodeSchema, TerminalNodeSchema]);

export type ScenarioNode = Static<typeof ScenarioNodeSchema>;

export const ScenarioSchema = Type.Object({
  id: Type.String({ pattern: '^[a-z0-9_]+$', maxLength: 24 }),
  title: Type.String({ minLength: 1 }),
  intro: Type.String(),
  start: Type.String({ minLength: 1 }),
  reward: Type.Integer({ minimum: 0 }),
  badge: Type.Union([Type.String({ minLength: 1 }), Type.Null()]),
  nodes: Type.Record(Type.String({ pattern: '^[a-z0-9_]+$' }), ScenarioNodeSchema),
});

/**
 * A directed story graph. Terminal nodes use the scenario's reward and badge.
 */
export type Scenario = Static<typeof ScenarioSchema>;

export interface ScenarioSummary {
  id: string;
  title: string;
  reward: number;
  badge: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Bundle
// ─────────────────────────────────────────────────────────────────────────────

export const QuizFileSchema = Type.Object({
  levels: Type.Array(Type.Integer({ minimum: 1 }), { minItems: 1 }),
  questions: Type.Record(
    Type.String(),
    Type.Record(Type.String({ pattern: '^[0-9]+$' }), Type.Array(QuizQuestionSchema))
  ),
});

export type QuizFile = Static<typeof QuizFileSchema>;

export const ScenarioFileSchema = Type.Record(Type.String(), Type.Array(ScenarioSchema));

export type ScenarioFile = Static<typeof ScenarioFileSchema>;

export const TipsFileSchema = Type.Record(Type.String(), Type.Array(Type.String({ minLength: 1 })));

export type TipsFile = Static<typeof TipsFileSchema>;

export const LessonSchema = Type.Object({
  title: Type.String({ minLength: 1 }),
  body: Type.String({ minLength: 1 }),
});

/**
 * One screen of the education module. Lessons are read in order.
 */
export type Lesson = Static<typeof LessonSchema>;

export const LessonsFileSchema = Type.Record(Type.String(), Type.Array(LessonSchema));

export type LessonsFile = Static<typeof LessonsFileSchema>;

/**
 * Everything the catalog serves, as loaded from disk.
 */
export interface ContentBundle {
  quizzes: QuizFile;
  scenarios: ScenarioFile;
  tips: TipsFile;
  lessons: LessonsFile;
}
